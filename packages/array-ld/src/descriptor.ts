/**
 * @module descriptor
 *
 * Normalizes raw per-node metadata from a tree walker into
 * {@link NodeDescriptor} records.
 */

import { canonicalElementType, dtypeTag } from "./element-type.js";
import type { Result } from "./result.js";
import { err, ok } from "./result.js";
import { decodeText, toJsonText } from "./text.js";
import type {
  AttributeName,
  AttributeScalar,
  AttributeValue,
  DescriptorCollection,
  Diagnostic,
  NodeDescriptor,
  RawArrayNode,
  RawAxisLabel,
  Shape,
} from "./types.js";

type TypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

/** Result of extracting one node */
export interface DescriptorExtraction {
  /** null when the node could not be identified at all */
  descriptor: NodeDescriptor | null;
  diagnostics: Diagnostic[];
}

/** Result of extracting a whole tree */
export interface CollectionExtraction {
  descriptors: DescriptorCollection;
  diagnostics: Diagnostic[];
}

function isTypedArray(value: unknown): value is TypedArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

function isAttributeScalar(value: unknown): value is AttributeScalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean" ||
    value instanceof Uint8Array
  );
}

function isPairIterable(
  value: unknown,
): value is Iterable<readonly [AttributeName, unknown]> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

/**
 * Strip leading and trailing slashes from a hierarchical key.
 */
export function normalizePath(path: string): string {
  return path.replace(/^\/+|\/+$/g, "");
}

/**
 * Validate a shape: an array (or typed array) of non-negative safe integers.
 */
export function parseShape(shape: unknown): Result<Shape> {
  let values: unknown[];
  if (Array.isArray(shape)) {
    values = shape;
  } else if (isTypedArray(shape)) {
    values = [];
    for (const length of shape) values.push(length);
  } else {
    return err("invalid-shape", `Shape is not an array: ${toJsonText(shape)}`);
  }

  const lengths: number[] = [];
  for (const value of values) {
    const length = typeof value === "bigint" ? Number(value) : value;
    if (
      typeof length !== "number" ||
      !Number.isSafeInteger(length) ||
      length < 0
    ) {
      return err(
        "invalid-shape",
        `Shape has an invalid axis length: ${toJsonText(shape)}`,
      );
    }
    lengths.push(length);
  }
  return ok(lengths);
}

function normalizeScalar(value: unknown): AttributeScalar {
  if (value === undefined) return null;
  if (isAttributeScalar(value)) return value;
  return toJsonText(value);
}

/**
 * Convert an attribute payload to a scalar or a plain ordered sequence.
 *
 * A Uint8Array is treated as a byte string; other typed arrays become
 * arrays of numbers (or bigints). Nested objects are kept as JSON text.
 */
export function normalizeAttributeValue(value: unknown): AttributeValue {
  if (value === undefined) return null;
  if (isAttributeScalar(value)) return value;
  if (isTypedArray(value)) {
    const items: AttributeScalar[] = [];
    for (const item of value) items.push(item);
    return items;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => normalizeScalar(item));
  }
  return toJsonText(value);
}

function normalizeAttributes(
  attributes: RawArrayNode["attributes"],
): Map<AttributeName, AttributeValue> {
  const result = new Map<AttributeName, AttributeValue>();
  if (attributes === undefined) return result;

  const entries: Iterable<readonly [AttributeName, unknown]> = isPairIterable(
    attributes,
  )
    ? attributes
    : Object.entries(attributes);
  for (const [name, value] of entries) {
    result.set(name, normalizeAttributeValue(value));
  }
  return result;
}

function normalizeLabel(label: RawAxisLabel): string | null {
  if (label === null || label === undefined) return null;
  const text = typeof label === "string" ? label : decodeText(label);
  return text === "" ? null : text;
}

function readAxisLabels(
  node: RawArrayNode,
): Result<readonly RawAxisLabel[]> {
  const source = node.axisLabels;
  if (source === undefined) return ok([]);
  if (typeof source !== "function") return ok(source);
  try {
    return ok(source());
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err("axis-labels-unreadable", `Axis labels unreadable: ${reason}`);
  }
}

function diagnostic(
  path: string,
  failure: { code: Diagnostic["code"]; message: string },
  shape: Shape | null,
): Diagnostic {
  return {
    stage: "extract",
    code: failure.code,
    path,
    message: failure.message,
    shape,
  };
}

/**
 * Normalize one raw node.
 *
 * Problems with the shape or axis labels are reported as diagnostics and the
 * node is still returned with best-effort fields. Only a node with an empty
 * path yields no descriptor.
 */
export function extractDescriptor(node: RawArrayNode): DescriptorExtraction {
  const diagnostics: Diagnostic[] = [];
  const path = normalizePath(node.path);
  if (path === "") {
    diagnostics.push(
      diagnostic(
        node.path,
        { code: "empty-path", message: "Node has an empty path" },
        null,
      ),
    );
    return { descriptor: null, diagnostics };
  }

  const parsedShape = parseShape(node.shape);
  let shape: Shape | null = null;
  if (parsedShape.ok) {
    shape = parsedShape.value;
  } else {
    diagnostics.push(diagnostic(path, parsedShape, null));
  }

  let axisLabels: (string | null)[] = [];
  const rawLabels = readAxisLabels(node);
  if (!rawLabels.ok) {
    diagnostics.push(diagnostic(path, rawLabels, shape));
  } else if (rawLabels.value.length > 0) {
    const labels = rawLabels.value.map(normalizeLabel);
    if (shape === null || labels.length !== shape.length) {
      diagnostics.push(
        diagnostic(
          path,
          {
            code: "axis-label-mismatch",
            message:
              shape === null
                ? `${labels.length} axis labels for a node without a usable shape`
                : `${labels.length} axis labels for ${shape.length} axes`,
          },
          shape,
        ),
      );
    } else {
      axisLabels = labels;
    }
  }

  const descriptor: NodeDescriptor = {
    path,
    shape,
    dtype: dtypeTag(node.dtype) ?? toJsonText(node.dtype ?? null),
    elementType: canonicalElementType(node.dtype),
    localAttributes: normalizeAttributes(node.attributes),
    axisLabels,
  };
  return { descriptor, diagnostics };
}

/**
 * Normalize every node yielded by a tree walker.
 *
 * Descriptors are keyed by path in visitation order. A repeated path keeps
 * its first descriptor; later ones are reported and dropped.
 */
export function extractDescriptors(
  nodes: Iterable<RawArrayNode>,
): CollectionExtraction {
  const descriptors = new Map<string, NodeDescriptor>();
  const diagnostics: Diagnostic[] = [];

  for (const node of nodes) {
    const extraction = extractDescriptor(node);
    diagnostics.push(...extraction.diagnostics);
    const { descriptor } = extraction;
    if (!descriptor) continue;

    if (descriptors.has(descriptor.path)) {
      diagnostics.push({
        stage: "extract",
        code: "duplicate-path",
        path: descriptor.path,
        message: `Duplicate path '${descriptor.path}'; keeping the first node`,
        shape: descriptor.shape,
      });
      continue;
    }
    descriptors.set(descriptor.path, descriptor);
  }

  return { descriptors, diagnostics };
}

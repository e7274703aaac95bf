/**
 * @module classify
 *
 * Assigns every descriptor to exactly one of measures, dimensions or
 * attributes.
 *
 * Priority:
 * 1. Dimension candidates with a numeric element type, or with "time" in
 *    their display name, are dimensions. Other candidates are attributes.
 * 2. Non-candidates with at least one axis length equal to some candidate's
 *    first axis length are measures. Everything else is an attribute.
 *
 * A node that cannot be evaluated is reported and falls back to attribute.
 */

import { TIME_NAME_MARKER } from "./constants.js";
import { isNumericElementType } from "./element-type.js";
import { StructuralViolationError } from "./errors.js";
import type { Result } from "./result.js";
import { err, ok } from "./result.js";
import type {
  Classification,
  DescriptorCollection,
  Diagnostic,
  DimensionCandidateSet,
  NodeDescriptor,
  TaxonomyGroup,
} from "./types.js";

export interface ClassificationOutcome {
  classification: Classification;
  diagnostics: Diagnostic[];
}

/** Last segment of a slash-separated path */
export function displayName(path: string): string {
  return path.slice(path.lastIndexOf("/") + 1);
}

/**
 * First axis length of every candidate that has at least one axis.
 */
export function firstAxisLengths(
  descriptors: DescriptorCollection,
  candidates: DimensionCandidateSet,
): ReadonlySet<number> {
  const lengths = new Set<number>();
  for (const descriptor of descriptors.values()) {
    if (!candidates.has(descriptor.path)) continue;
    const { shape } = descriptor;
    if (shape && shape.length > 0) lengths.add(shape[0]);
  }
  return lengths;
}

function classifyCandidate(descriptor: NodeDescriptor): Result<TaxonomyGroup> {
  if (descriptor.elementType === "unknown") {
    return err(
      "unreadable-type",
      `Unreadable element type '${descriptor.dtype}'`,
    );
  }
  const isTimeNamed = displayName(descriptor.path)
    .toLowerCase()
    .includes(TIME_NAME_MARKER);
  return ok(
    isNumericElementType(descriptor.elementType) || isTimeNamed
      ? "dimensions"
      : "attributes",
  );
}

function classifyNonCandidate(
  descriptor: NodeDescriptor,
  axisLengths: ReadonlySet<number>,
): Result<TaxonomyGroup> {
  const { shape } = descriptor;
  if (shape === null) {
    return err("shape-unavailable", "Shape unavailable; cannot align to axes");
  }
  // Any axis position may match a candidate's first axis
  const aligned =
    shape.length > 0 && shape.some((length) => axisLengths.has(length));
  return ok(aligned ? "measures" : "attributes");
}

/**
 * Evaluate one descriptor against the taxonomy rules.
 */
export function classifyDescriptor(
  descriptor: NodeDescriptor,
  candidates: DimensionCandidateSet,
  axisLengths: ReadonlySet<number>,
): Result<TaxonomyGroup> {
  return candidates.has(descriptor.path)
    ? classifyCandidate(descriptor)
    : classifyNonCandidate(descriptor, axisLengths);
}

/**
 * Partition the collection into measures, dimensions and attributes.
 *
 * Group order follows collection order. Throws
 * {@link StructuralViolationError} if the result is not an exact partition.
 */
export function classifyDescriptors(
  descriptors: DescriptorCollection,
  candidates: DimensionCandidateSet,
): ClassificationOutcome {
  const axisLengths = firstAxisLengths(descriptors, candidates);
  const groups: Record<TaxonomyGroup, NodeDescriptor[]> = {
    measures: [],
    dimensions: [],
    attributes: [],
  };
  const diagnostics: Diagnostic[] = [];

  for (const descriptor of descriptors.values()) {
    const result = classifyDescriptor(descriptor, candidates, axisLengths);
    if (result.ok) {
      groups[result.value].push(descriptor);
      continue;
    }
    diagnostics.push({
      stage: "classify",
      code: result.code,
      path: descriptor.path,
      message: `${result.message}; classified as attribute`,
      shape: descriptor.shape,
    });
    groups.attributes.push(descriptor);
  }

  const classification: Classification = groups;
  assertPartition(descriptors, classification);
  return { classification, diagnostics };
}

/**
 * Check that every path in the collection appears in exactly one group, and
 * that no group holds anything else.
 */
export function assertPartition(
  descriptors: DescriptorCollection,
  classification: Classification,
): void {
  const seen = new Map<string, number>();
  for (const group of [
    classification.measures,
    classification.dimensions,
    classification.attributes,
  ]) {
    for (const descriptor of group) {
      seen.set(descriptor.path, (seen.get(descriptor.path) ?? 0) + 1);
    }
  }

  const missing: string[] = [];
  const duplicated: string[] = [];
  for (const path of descriptors.keys()) {
    const count = seen.get(path) ?? 0;
    if (count === 0) missing.push(path);
    if (count > 1) duplicated.push(path);
  }
  const unexpected = [...seen.keys()].filter((path) => !descriptors.has(path));

  if (missing.length > 0 || duplicated.length > 0 || unexpected.length > 0) {
    throw new StructuralViolationError(missing, duplicated, unexpected);
  }
}

/**
 * @module types
 *
 * Type definitions for array-node classification and linked-data output.
 * Readers produce {@link RawArrayNode} records; everything downstream works
 * on normalized {@link NodeDescriptor} values.
 */

// =============================================================================
// Input Types (what a tree walker yields)
// =============================================================================

/** Attribute name. Some formats store names as byte strings. */
export type AttributeName = string | Uint8Array;

/** Single attribute value as stored on an array node */
export type AttributeScalar =
  | string
  | number
  | bigint
  | boolean
  | null
  | Uint8Array;

/** Attribute value: a scalar or a homogeneous sequence of scalars */
export type AttributeValue = AttributeScalar | readonly AttributeScalar[];

/** Raw per-axis label as yielded by a reader */
export type RawAxisLabel = string | Uint8Array | null | undefined;

/**
 * One array node as yielded by an external tree walker.
 *
 * Fields are loosely typed because they come straight from file metadata;
 * the descriptor extractor validates them.
 */
export interface RawArrayNode {
  /** Slash-separated hierarchical key (e.g. 'entry/data/counts') */
  path: string;

  /** Axis lengths; anything other than an array of non-negative integers is rejected */
  shape: unknown;

  /** Element type tag (e.g. '<f4', 'float32', 'int64', '|S10') */
  dtype: unknown;

  /** Attributes local to this node */
  attributes?:
    | Readonly<Record<string, unknown>>
    | Iterable<readonly [AttributeName, unknown]>;

  /**
   * Per-axis labels (dimension names / attached scale labels).
   * May be an accessor, since some readers can only resolve labels lazily
   * and that lookup can fail.
   */
  axisLabels?: readonly RawAxisLabel[] | (() => readonly RawAxisLabel[]);
}

// =============================================================================
// Core Types
// =============================================================================

/** Axis lengths, outermost first. Empty for scalars. */
export type Shape = readonly number[];

/**
 * Canonical element type.
 *
 * - 'int' / 'uint' / 'float' / 'complex': numeric
 * - 'datetime' / 'timedelta': timestamp-like
 * - 'unknown': the dtype tag could not be read
 */
export type ElementType =
  | "int"
  | "uint"
  | "float"
  | "complex"
  | "bool"
  | "string"
  | "bytes"
  | "datetime"
  | "timedelta"
  | "object"
  | "unknown";

/** Normalized metadata for one array node */
export interface NodeDescriptor {
  /** Unique path, without leading or trailing slashes */
  readonly path: string;

  /** Axis lengths, or null if the reader supplied no usable shape */
  readonly shape: Shape | null;

  /** Element type tag as the reader reported it */
  readonly dtype: string;

  /** Canonical element type */
  readonly elementType: ElementType;

  /** Attributes local to this node, in source order */
  readonly localAttributes: ReadonlyMap<AttributeName, AttributeValue>;

  /** Empty, or exactly one entry per axis (null where unlabeled) */
  readonly axisLabels: readonly (string | null)[];
}

/** Descriptors keyed by path, in visitation order */
export type DescriptorCollection = ReadonlyMap<string, NodeDescriptor>;

/** Paths of descriptors that are structurally eligible to be coordinate axes */
export type DimensionCandidateSet = ReadonlySet<string>;

/** Taxonomy group a descriptor is assigned to */
export type TaxonomyGroup = "measures" | "dimensions" | "attributes";

/**
 * Partition of a descriptor collection into the three taxonomy groups.
 * Every path appears in exactly one group.
 */
export interface Classification {
  readonly measures: readonly NodeDescriptor[];
  readonly dimensions: readonly NodeDescriptor[];
  readonly attributes: readonly NodeDescriptor[];
}

// =============================================================================
// Output Types (JSON-LD)
// =============================================================================

/** Role tag emitted for each variable */
export type VariableRole = "Measure" | "Dimension" | "Attribute";

/** JSON-compatible property value */
export type PropertyValueContent =
  | string
  | number
  | boolean
  | null
  | readonly (string | number | boolean | null)[];

/** schema.org PropertyValue carrying one node attribute */
export interface PropertyValue {
  readonly "@type": "PropertyValue";
  readonly name: string;
  readonly value: PropertyValueContent;
}

/** One classified array node */
export interface VariableEntry {
  readonly "@type": "PropertyValue";
  /** Last path segment */
  readonly name: string;
  /** Full path, with a leading slash */
  readonly path: string;
  /** Media type of the source container */
  readonly encodingFormat: string;
  readonly role: VariableRole;
  readonly additionalProperty: readonly PropertyValue[];
}

/** JSON-LD context block */
export interface LinkedDataContext {
  readonly "@vocab": string;
  readonly ddi: string;
  readonly role: string;
  readonly path: string;
}

/** Linked-data description of a whole array store */
export interface LinkedDataDocument {
  readonly "@context": LinkedDataContext;
  readonly "@type": "Dataset";
  readonly name: string;
  readonly variableMeasured: readonly VariableEntry[];
}

// =============================================================================
// Diagnostics
// =============================================================================

/** Pipeline stage that reported a diagnostic */
export type DiagnosticStage = "extract" | "candidates" | "classify";

/** Codes for recoverable per-node problems */
export type DiagnosticCode =
  | "empty-path"
  | "duplicate-path"
  | "invalid-shape"
  | "axis-labels-unreadable"
  | "axis-label-mismatch"
  | "shape-unavailable"
  | "unreadable-type";

/**
 * A recoverable problem with a single node.
 * The node is still processed with best-effort values.
 */
export interface Diagnostic {
  readonly stage: DiagnosticStage;
  readonly code: DiagnosticCode;
  readonly path: string;
  readonly message: string;
  readonly shape?: Shape | null;
}

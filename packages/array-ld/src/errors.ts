/**
 * @module errors
 *
 * Fatal pipeline errors. Recoverable, per-node problems are reported as
 * {@link Diagnostic} records instead.
 */

/** Stable codes for fatal pipeline errors */
export type ArrayLdErrorCode = "EMPTY_INPUT" | "STRUCTURAL_VIOLATION";

export class ArrayLdError extends Error {
  readonly code: ArrayLdErrorCode;

  constructor(code: ArrayLdErrorCode, message: string) {
    super(message);
    this.name = "ArrayLdError";
    this.code = code;
  }
}

/** No array nodes to classify */
export class EmptyInputError extends ArrayLdError {
  constructor(message = "No array nodes to classify") {
    super("EMPTY_INPUT", message);
    this.name = "EmptyInputError";
  }
}

/**
 * The classification is not an exact partition of the descriptor collection.
 * This is a defect in the classifier, not a problem with the input.
 */
export class StructuralViolationError extends ArrayLdError {
  /** Paths that were assigned to no group */
  readonly missing: readonly string[];
  /** Paths that were assigned more than once */
  readonly duplicated: readonly string[];
  /** Paths that were assigned but are not in the collection */
  readonly unexpected: readonly string[];

  constructor(
    missing: readonly string[],
    duplicated: readonly string[],
    unexpected: readonly string[],
  ) {
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`unassigned: ${missing.join(", ")}`);
    if (duplicated.length > 0) {
      parts.push(`assigned more than once: ${duplicated.join(", ")}`);
    }
    if (unexpected.length > 0) {
      parts.push(`not in collection: ${unexpected.join(", ")}`);
    }
    super(
      "STRUCTURAL_VIOLATION",
      `Classification is not a partition of the descriptors (${parts.join("; ")})`,
    );
    this.name = "StructuralViolationError";
    this.missing = missing;
    this.duplicated = duplicated;
    this.unexpected = unexpected;
  }
}

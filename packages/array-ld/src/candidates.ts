/**
 * @module candidates
 *
 * Finds the nodes that are structurally eligible to be coordinate axes.
 */

import type { Result } from "./result.js";
import { err, ok } from "./result.js";
import type {
  DescriptorCollection,
  Diagnostic,
  DimensionCandidateSet,
  NodeDescriptor,
} from "./types.js";

export interface CandidateDetection {
  candidates: DimensionCandidateSet;
  diagnostics: Diagnostic[];
}

/** True if any axis carries a non-empty label */
export function hasAxisLabel(descriptor: NodeDescriptor): boolean {
  return descriptor.axisLabels.some((label) => label !== null && label !== "");
}

/**
 * Decide whether a single descriptor is a dimension candidate.
 *
 * Rank-1 arrays are candidates; so is any node with an explicit axis label,
 * whatever its rank. Scalars without labels never are.
 */
export function isDimensionCandidate(
  descriptor: NodeDescriptor,
): Result<boolean> {
  if (descriptor.shape === null) {
    return err(
      "shape-unavailable",
      "Shape unavailable; not considered as a dimension candidate",
    );
  }
  return ok(descriptor.shape.length === 1 || hasAxisLabel(descriptor));
}

/**
 * Single pass over the collection. Nodes without a usable shape are skipped
 * and reported.
 */
export function detectDimensionCandidates(
  descriptors: DescriptorCollection,
): CandidateDetection {
  const candidates = new Set<string>();
  const diagnostics: Diagnostic[] = [];

  for (const descriptor of descriptors.values()) {
    const result = isDimensionCandidate(descriptor);
    if (!result.ok) {
      diagnostics.push({
        stage: "candidates",
        code: result.code,
        path: descriptor.path,
        message: result.message,
        shape: descriptor.shape,
      });
      continue;
    }
    if (result.value) candidates.add(descriptor.path);
  }

  return { candidates, diagnostics };
}

/**
 * @module source
 *
 * Capability interface for readers of hierarchical array files.
 */

import type { RawArrayNode } from "./types.js";

/**
 * An opened array store or file that can enumerate its array nodes.
 *
 * Implementations are constructed and owned by the caller and passed into
 * the pipeline; they hold no process-wide state.
 */
export interface ArrayNodeSource {
  /** Media type of the container (e.g. 'application/x-zarr') */
  readonly encodingFormat: string;

  /** Yield every array node, in any order */
  nodes(): AsyncIterable<RawArrayNode>;
}

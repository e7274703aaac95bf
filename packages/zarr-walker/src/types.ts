/**
 * @module types
 *
 * Zarr V2/V3 metadata documents and store capabilities.
 */

import type { AsyncReadable, Readable } from "zarrita";

// =============================================================================
// Zarr Metadata Types
// =============================================================================

/** Zarr V2 consolidated metadata (.zmetadata) */
export interface ZarrV2ConsolidatedMetadata {
  metadata: Record<string, unknown>;
}

/** Zarr V2 array metadata (.zarray) */
export interface ZarrV2ArrayMetadata {
  shape: unknown;
  dtype: unknown;
}

/** Zarr V2 attributes (.zattrs) */
export interface ZarrV2Attributes {
  _ARRAY_DIMENSIONS?: unknown;
  [key: string]: unknown;
}

/** Zarr V3 array metadata (zarr.json for arrays) */
export interface ZarrV3ArrayMetadata {
  zarr_format?: 3;
  node_type: "array";
  shape: unknown;
  data_type: unknown;
  dimension_names?: unknown;
  attributes?: Record<string, unknown>;
}

/** Zarr V3 group metadata (zarr.json for groups) */
export interface ZarrV3GroupMetadata {
  zarr_format?: 3;
  node_type: "group";
  attributes?: Record<string, unknown>;
  consolidated_metadata?: {
    metadata?: Record<string, unknown>;
  };
}

/** Zarr format version */
export type ZarrVersion = 2 | 3;

// =============================================================================
// Hierarchy Types
// =============================================================================

/** One array found in the hierarchy */
export interface ZarrArrayEntry {
  /** Path relative to the root, without leading slash */
  path: string;
  shape: unknown;
  dtype: unknown;
  attributes: Record<string, unknown>;
  /** `dimension_names` (V3) or `_ARRAY_DIMENSIONS` (V2), as stored */
  dimensionNames: unknown;
}

/** How the arrays of the hierarchy were discovered */
export type DiscoveryMode = "consolidated" | "listing";

/** The arrays of a Zarr hierarchy and its root group attributes */
export interface ZarrHierarchy {
  version: ZarrVersion;
  mode: DiscoveryMode;
  rootAttributes: Record<string, unknown>;
  arrays: ZarrArrayEntry[];
}

// =============================================================================
// Store Types
// =============================================================================

/** Any zarrita-compatible store that metadata can be read from */
export type ZarrStore = Readable | AsyncReadable<RequestInit>;

/**
 * A store that can also list the child names under a prefix. Needed to walk
 * hierarchies without consolidated metadata.
 */
export interface ListableStore {
  /** Child names (not paths) directly under `prefix` ('' for the root) */
  list(prefix: string): Promise<string[]>;
}

export interface ZarrSourceOptions {
  /** Zarr version. Auto-detected if not specified. */
  version?: ZarrVersion;
  /** Skip consolidated metadata and walk the store listing instead */
  consolidated?: boolean;
}

/**
 * @module metadata
 *
 * Decoding and validation of Zarr metadata documents read from a store.
 */

import { decodeText } from "array-ld";
import { ZarrReadError } from "./errors.js";
import type {
  ZarrV2ArrayMetadata,
  ZarrV2Attributes,
  ZarrV2ConsolidatedMetadata,
  ZarrV3ArrayMetadata,
  ZarrV3GroupMetadata,
} from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode bytes to JSON.
 */
export function decodeJSON(bytes: Uint8Array, key: string): unknown {
  try {
    return JSON.parse(decodeText(bytes));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ZarrReadError(`Invalid JSON in ${key}: ${reason}`, key);
  }
}

export function asV2ConsolidatedMetadata(
  value: unknown,
  key: string,
): ZarrV2ConsolidatedMetadata {
  if (!isRecord(value) || !isRecord(value.metadata)) {
    throw new ZarrReadError(`${key} has no 'metadata' object`, key);
  }
  return { metadata: value.metadata };
}

export function asV2ArrayMetadata(
  value: unknown,
  key: string,
): ZarrV2ArrayMetadata {
  if (!isRecord(value)) {
    throw new ZarrReadError(`${key} is not a JSON object`, key);
  }
  return { shape: value.shape, dtype: value.dtype };
}

/** Missing or malformed .zattrs read as no attributes */
export function asV2Attributes(value: unknown): ZarrV2Attributes {
  return isRecord(value) ? value : {};
}

export function isV3Array(value: unknown): value is ZarrV3ArrayMetadata {
  return isRecord(value) && value.node_type === "array";
}

export function isV3Group(value: unknown): value is ZarrV3GroupMetadata {
  return isRecord(value) && value.node_type === "group";
}

/** Arrays listed in a V3 group's consolidated metadata, if it has any */
export function v3ConsolidatedEntries(
  group: ZarrV3GroupMetadata,
): Record<string, unknown> | null {
  const metadata = group.consolidated_metadata?.metadata;
  return isRecord(metadata) ? metadata : null;
}

export function v3Attributes(
  meta: ZarrV3ArrayMetadata | ZarrV3GroupMetadata,
): Record<string, unknown> {
  return isRecord(meta.attributes) ? meta.attributes : {};
}

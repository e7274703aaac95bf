/**
 * zarr-walker
 *
 * Enumerates the arrays of a Zarr V2 or V3 hierarchy as array-ld nodes.
 *
 * @example
 * ```typescript
 * import { describeSource, serializeLinkedDataDocument } from 'array-ld'
 * import { openZarrSource } from 'zarr-walker'
 *
 * const source = openZarrSource('https://example.com/data.zarr')
 * const { document } = await describeSource(source, { name: 'Example' })
 * console.log(serializeLinkedDataDocument(document))
 * ```
 *
 * @packageDocumentation
 */

export {
  coordinateAxisLabels,
  loadHierarchy,
  openZarrSource,
  readDimensionNames,
  toRawArrayNode,
  ZarrNodeSource,
} from "./zarr-source.js";
export {
  summarizeZarrSource,
  type ZarrSummary,
  type ZarrVariableSummary,
} from "./summary.js";
export { DirectoryStore } from "./directory-store.js";
export { ZarrReadError } from "./errors.js";

export type {
  DiscoveryMode,
  ListableStore,
  ZarrArrayEntry,
  ZarrHierarchy,
  ZarrSourceOptions,
  ZarrStore,
  ZarrV2ArrayMetadata,
  ZarrV2Attributes,
  ZarrV2ConsolidatedMetadata,
  ZarrV3ArrayMetadata,
  ZarrV3GroupMetadata,
  ZarrVersion,
} from "./types.js";

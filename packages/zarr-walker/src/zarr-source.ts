/**
 * @module zarr-source
 *
 * Enumerates the arrays of a Zarr V2 or V3 hierarchy as raw array nodes.
 *
 * Arrays are found from consolidated metadata when the store has it
 * (V3 `consolidated_metadata` in the root `zarr.json`, V2 `.zmetadata`),
 * otherwise by walking a listable store depth-first.
 */

import * as zarr from "zarrita";
import type { ArrayNodeSource, RawArrayNode } from "array-ld";
import { displayName, ENCODING_FORMATS } from "array-ld";
import { DirectoryStore } from "./directory-store.js";
import { ZarrReadError } from "./errors.js";
import {
  asV2ArrayMetadata,
  asV2Attributes,
  asV2ConsolidatedMetadata,
  decodeJSON,
  isV3Array,
  isV3Group,
  v3Attributes,
  v3ConsolidatedEntries,
} from "./metadata.js";
import type {
  ListableStore,
  ZarrArrayEntry,
  ZarrHierarchy,
  ZarrSourceOptions,
  ZarrStore,
} from "./types.js";

function isListable(store: object): store is ListableStore {
  return "list" in store && typeof store.list === "function";
}

function joinPath(prefix: string, name: string): string {
  return prefix === "" ? name : `${prefix}/${name}`;
}

async function readJSON(
  store: ZarrStore,
  key: `/${string}`,
): Promise<unknown> {
  const bytes = await store.get(key);
  return bytes ? decodeJSON(bytes, key) : undefined;
}

/**
 * Axis labels for an array: V3 `dimension_names`, or the V2
 * `_ARRAY_DIMENSIONS` attribute.
 */
export function readDimensionNames(
  entry: ZarrArrayEntry,
): (string | null)[] | undefined {
  const { dimensionNames } = entry;
  if (dimensionNames === undefined || dimensionNames === null) return undefined;
  if (!Array.isArray(dimensionNames)) {
    throw new ZarrReadError(`Dimension names of '${entry.path}' are not a list`);
  }
  const names: unknown[] = dimensionNames;
  return names.map((name) => {
    if (name === null || typeof name === "string") return name;
    throw new ZarrReadError(
      `Dimension name ${JSON.stringify(name)} of '${entry.path}' is not a string`,
    );
  });
}

/**
 * Axis labels that mark a coordinate scale: the axis named after the array
 * itself. Other dimension names stay in the attributes only, so data
 * variables are classified by shape alignment.
 */
export function coordinateAxisLabels(
  entry: ZarrArrayEntry,
): (string | null)[] {
  const name = displayName(entry.path);
  return (readDimensionNames(entry) ?? []).map((dimension) =>
    dimension === name ? dimension : null,
  );
}

export function toRawArrayNode(entry: ZarrArrayEntry): RawArrayNode {
  const node: RawArrayNode = {
    path: entry.path,
    shape: entry.shape,
    dtype: entry.dtype,
    attributes: entry.attributes,
  };
  if (entry.dimensionNames !== undefined && entry.dimensionNames !== null) {
    return { ...node, axisLabels: () => coordinateAxisLabels(entry) };
  }
  return node;
}

// =============================================================================
// V3
// =============================================================================

function v3Entry(path: string, meta: unknown): ZarrArrayEntry | null {
  if (!isV3Array(meta)) return null;
  const attributes = v3Attributes(meta);
  return {
    path,
    shape: meta.shape,
    dtype: meta.data_type,
    attributes,
    dimensionNames: meta.dimension_names ?? attributes._ARRAY_DIMENSIONS,
  };
}

async function* walkV3(
  store: ZarrStore,
  listable: ListableStore,
  prefix: string,
): AsyncGenerator<ZarrArrayEntry> {
  for (const name of await listable.list(prefix)) {
    const path = joinPath(prefix, name);
    const meta = await readJSON(store, `/${path}/zarr.json`);
    const entry = v3Entry(path, meta);
    if (entry) {
      yield entry;
    } else if (isV3Group(meta)) {
      yield* walkV3(store, listable, path);
    }
  }
}

async function loadV3(
  store: ZarrStore,
  root: unknown,
  consolidated: boolean,
): Promise<ZarrHierarchy> {
  if (isV3Array(root)) {
    throw new ZarrReadError("The root node is an array, not a group", "/zarr.json");
  }
  if (!isV3Group(root)) {
    throw new ZarrReadError("Root zarr.json is not a group", "/zarr.json");
  }
  const rootAttributes = v3Attributes(root);

  const entries = consolidated ? v3ConsolidatedEntries(root) : null;
  if (entries) {
    const arrays: ZarrArrayEntry[] = [];
    for (const [path, meta] of Object.entries(entries)) {
      const entry = v3Entry(path.replace(/^\/+/, ""), meta);
      if (entry) arrays.push(entry);
    }
    return { version: 3, mode: "consolidated", rootAttributes, arrays };
  }

  if (!isListable(store)) {
    throw new ZarrReadError(
      "No consolidated metadata and the store cannot be listed",
      "/zarr.json",
    );
  }
  const arrays: ZarrArrayEntry[] = [];
  for await (const entry of walkV3(store, store, "")) arrays.push(entry);
  return { version: 3, mode: "listing", rootAttributes, arrays };
}

// =============================================================================
// V2
// =============================================================================

function consolidatedV2Entries(
  metadata: Record<string, unknown>,
): ZarrArrayEntry[] {
  const arrays: ZarrArrayEntry[] = [];
  for (const [key, value] of Object.entries(metadata)) {
    if (key !== ".zarray" && !key.endsWith("/.zarray")) continue;
    const path = key.slice(0, -".zarray".length).replace(/\/$/, "");
    if (path === "") {
      throw new ZarrReadError("The root node is an array, not a group", key);
    }
    const zarray = asV2ArrayMetadata(value, key);
    const attributes = asV2Attributes(metadata[`${path}/.zattrs`]);
    arrays.push({
      path,
      shape: zarray.shape,
      dtype: zarray.dtype,
      attributes,
      dimensionNames: attributes._ARRAY_DIMENSIONS,
    });
  }
  return arrays;
}

async function* walkV2(
  store: ZarrStore,
  listable: ListableStore,
  prefix: string,
): AsyncGenerator<ZarrArrayEntry> {
  for (const name of await listable.list(prefix)) {
    const path = joinPath(prefix, name);
    const zarrayKey = `/${path}/.zarray` as const;
    const zarray = await readJSON(store, zarrayKey);
    if (zarray !== undefined) {
      const meta = asV2ArrayMetadata(zarray, zarrayKey);
      const attributes = asV2Attributes(
        await readJSON(store, `/${path}/.zattrs`),
      );
      yield {
        path,
        shape: meta.shape,
        dtype: meta.dtype,
        attributes,
        dimensionNames: attributes._ARRAY_DIMENSIONS,
      };
    } else if ((await store.get(`/${path}/.zgroup`)) !== undefined) {
      yield* walkV2(store, listable, path);
    }
  }
}

async function loadV2(
  store: ZarrStore,
  consolidated: boolean,
): Promise<ZarrHierarchy | null> {
  if (consolidated) {
    const zmetadata = await readJSON(store, "/.zmetadata");
    if (zmetadata !== undefined) {
      const { metadata } = asV2ConsolidatedMetadata(zmetadata, "/.zmetadata");
      return {
        version: 2,
        mode: "consolidated",
        rootAttributes: asV2Attributes(metadata[".zattrs"]),
        arrays: consolidatedV2Entries(metadata),
      };
    }
  }

  if ((await store.get("/.zarray")) !== undefined) {
    throw new ZarrReadError("The root node is an array, not a group", "/.zarray");
  }
  if ((await store.get("/.zgroup")) === undefined) return null;
  if (!isListable(store)) {
    throw new ZarrReadError(
      "No consolidated metadata and the store cannot be listed",
      "/.zgroup",
    );
  }
  const rootAttributes = asV2Attributes(await readJSON(store, "/.zattrs"));
  const arrays: ZarrArrayEntry[] = [];
  for await (const entry of walkV2(store, store, "")) arrays.push(entry);
  return { version: 2, mode: "listing", rootAttributes, arrays };
}

/**
 * Load the arrays of a Zarr hierarchy, trying V3 then V2 unless a version
 * is given.
 */
export async function loadHierarchy(
  store: ZarrStore,
  options: ZarrSourceOptions = {},
): Promise<ZarrHierarchy> {
  const { version, consolidated = true } = options;

  if (version !== 2) {
    const root = await readJSON(store, "/zarr.json");
    if (root !== undefined) return loadV3(store, root, consolidated);
    if (version === 3) {
      throw new ZarrReadError("No zarr.json found", "/zarr.json");
    }
  }

  const hierarchy = await loadV2(store, consolidated);
  if (hierarchy === null) {
    throw new ZarrReadError("No Zarr metadata found at the store root");
  }
  return hierarchy;
}

/**
 * An {@link ArrayNodeSource} over a Zarr store.
 *
 * The hierarchy is read once, on first use.
 */
export class ZarrNodeSource implements ArrayNodeSource {
  readonly encodingFormat = ENCODING_FORMATS.zarr;
  readonly store: ZarrStore;
  readonly options: ZarrSourceOptions;
  private hierarchy: Promise<ZarrHierarchy> | null = null;

  constructor(store: ZarrStore, options: ZarrSourceOptions = {}) {
    this.store = store;
    this.options = options;
  }

  /** Zarr version and arrays of the hierarchy */
  load(): Promise<ZarrHierarchy> {
    if (this.hierarchy === null) {
      this.hierarchy = loadHierarchy(this.store, this.options);
    }
    return this.hierarchy;
  }

  async *nodes(): AsyncGenerator<RawArrayNode> {
    const { arrays } = await this.load();
    for (const entry of arrays) yield toRawArrayNode(entry);
  }
}

/**
 * Open a Zarr hierarchy from an `http(s)://` URL or a local directory.
 */
export function openZarrSource(
  location: string,
  options: ZarrSourceOptions = {},
): ZarrNodeSource {
  const store = /^https?:\/\//i.test(location)
    ? new zarr.FetchStore(location)
    : new DirectoryStore(location);
  return new ZarrNodeSource(store, options);
}

/**
 * Test fixtures for array-ld tests.
 * Small array trees shaped like what HDF5/NetCDF/Zarr walkers report.
 */

import { canonicalElementType } from "./element-type.js";
import type {
  AttributeName,
  AttributeValue,
  NodeDescriptor,
  RawArrayNode,
  Shape,
} from "./types.js";

const textEncoder = new TextEncoder();

/** UTF-8 bytes for a string */
export function bytes(text: string): Uint8Array {
  return textEncoder.encode(text);
}

/**
 * Build a descriptor directly, bypassing extraction.
 */
export function makeDescriptor(
  path: string,
  shape: Shape | null,
  dtype: string,
  options: {
    attributes?: Iterable<readonly [AttributeName, AttributeValue]>;
    axisLabels?: readonly (string | null)[];
  } = {},
): NodeDescriptor {
  return {
    path,
    shape,
    dtype,
    elementType: canonicalElementType(dtype),
    localAttributes: new Map(options.attributes ?? []),
    axisLabels: options.axisLabels ?? [],
  };
}

/**
 * x(10) coordinate, y(10, 5) data, scalar string 'units'.
 */
export const coordinateAndDataNodes: RawArrayNode[] = [
  { path: "x", shape: [10], dtype: "<f8" },
  { path: "y", shape: [10, 5], dtype: "<f8" },
  { path: "units", shape: [], dtype: "|S8" },
];

/**
 * A NeXus-like tree: an entry group with a scan axis, detector counts aligned
 * to it, a labelled 2-D time grid, and instrument context.
 */
export const nexusLikeNodes: RawArrayNode[] = [
  {
    path: "entry/data/energy",
    shape: [200],
    dtype: "<f8",
    attributes: { units: "eV", long_name: "Photon energy" },
    axisLabels: ["energy"],
  },
  {
    path: "entry/data/counts",
    shape: [200, 16],
    dtype: "<u4",
    attributes: { units: "counts", signal: 1 },
    axisLabels: [null, null],
  },
  {
    path: "entry/data/time_grid",
    shape: [4, 4],
    dtype: "<f4",
    axisLabels: ["", "time"],
  },
  {
    path: "entry/instrument/name",
    shape: [],
    dtype: "|S12",
    attributes: { short_name: bytes("BL") },
  },
  {
    path: "entry/instrument/channel_names",
    shape: [16],
    dtype: "<U8",
  },
];

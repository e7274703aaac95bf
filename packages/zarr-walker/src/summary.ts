/**
 * @module summary
 *
 * Plain listing of a Zarr hierarchy: its variables, named dimensions and
 * root attributes.
 */

import { readDimensionNames, type ZarrNodeSource } from "./zarr-source.js";

export interface ZarrVariableSummary {
  path: string;
  shape: unknown;
  dtype: unknown;
  /** Dimension name per axis, null where unnamed */
  dimensions: (string | null)[];
}

export interface ZarrSummary {
  version: 2 | 3;
  variables: ZarrVariableSummary[];
  /** Size of each named dimension, from the first array that uses it */
  dimensions: Record<string, number>;
  attributes: Record<string, unknown>;
  /** Arrays whose dimension names could not be read */
  problems: string[];
}

function axisLength(shape: unknown, axis: number): number | null {
  if (!Array.isArray(shape)) return null;
  const length: unknown = shape[axis];
  return typeof length === "number" ? length : null;
}

export async function summarizeZarrSource(
  source: ZarrNodeSource,
): Promise<ZarrSummary> {
  const { version, arrays, rootAttributes } = await source.load();
  const dimensions: Record<string, number> = {};
  const variables: ZarrVariableSummary[] = [];
  const problems: string[] = [];

  for (const entry of arrays) {
    let names: (string | null)[] = [];
    try {
      names = readDimensionNames(entry) ?? [];
    } catch (error) {
      problems.push(error instanceof Error ? error.message : String(error));
    }
    names.forEach((name, axis) => {
      const length = axisLength(entry.shape, axis);
      if (name !== null && length !== null && !Object.hasOwn(dimensions, name)) {
        dimensions[name] = length;
      }
    });
    variables.push({
      path: entry.path,
      shape: entry.shape,
      dtype: entry.dtype,
      dimensions: names,
    });
  }

  return {
    version,
    variables,
    dimensions,
    attributes: rootAttributes,
    problems,
  };
}

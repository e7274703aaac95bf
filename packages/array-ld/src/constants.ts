/**
 * @module constants
 *
 * Vocabulary and media types used when assembling linked-data documents.
 */

import type { LinkedDataContext } from "./types.js";

/**
 * Media types for the source container, emitted as each variable's
 * `encodingFormat`.
 */
export const ENCODING_FORMATS = {
  hdf5: "application/x-hdf5",
  zarr: "application/x-zarr",
  xdi: "text/x-xdi",
} as const;

export const DEFAULT_ENCODING_FORMAT = ENCODING_FORMATS.hdf5;

export const DEFAULT_DATASET_NAME = "Array Dataset";

/** schema.org vocabulary with DDI-CDI terms for variable role and path */
export const LINKED_DATA_CONTEXT: LinkedDataContext = Object.freeze({
  "@vocab": "https://schema.org/",
  ddi: "https://ddi-alliance.org/ns/cdi#",
  role: "ddi:role",
  path: "ddi:path",
});

/**
 * Substring that marks a candidate as a time axis even when its element type
 * is not numeric. Matched case-insensitively against the display name.
 */
export const TIME_NAME_MARKER = "time";

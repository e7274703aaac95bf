/**
 * xdi-reader
 *
 * Reads XAS Data Interchange (XDI) files and exposes their columns and
 * header fields as array-ld nodes.
 *
 * @example
 * ```typescript
 * import { describeSource } from 'array-ld'
 * import { XdiNodeSource } from 'xdi-reader'
 *
 * const source = await XdiNodeSource.fromFile('cu_foil.xdi')
 * const { document } = await describeSource(source)
 * ```
 *
 * @packageDocumentation
 */

export { parseColumnDefinition, parseXdi, readXdiFile } from "./parser.js";
export { XdiNodeSource, xdiNodes } from "./xdi-source.js";
export { XdiParseError } from "./errors.js";
export type { XdiColumn, XdiFile } from "./types.js";

import type { ArrayNodeSource, RawArrayNode } from "array-ld";
import { ENCODING_FORMATS } from "array-ld";
import { readXdiFile } from "./parser.js";
import type { XdiColumn, XdiFile } from "./types.js";

function columnAttributes(column: XdiColumn): [string, string | number][] {
  const attributes: [string, string | number][] = [["column", column.index]];
  if (column.units !== null) attributes.push(["units", column.units]);
  if (column.address !== null) attributes.push(["address", column.address]);
  return attributes;
}

/**
 * Array nodes of an XDI file: a rank-1 `data/<label>` node per column, a
 * scalar `metadata/<family>` node per header family with its keywords as
 * attributes, and a scalar `comments` node when the file has comments.
 */
export function xdiNodes(file: XdiFile): RawArrayNode[] {
  const nodes: RawArrayNode[] = file.columns.map((column) => ({
    path: `data/${column.label}`,
    shape: [file.npts],
    dtype: "float64",
    attributes: columnAttributes(column),
  }));

  for (const [family, fields] of file.metadata) {
    nodes.push({
      path: `metadata/${family}`,
      shape: [],
      dtype: "string",
      attributes: fields,
    });
  }

  if (file.comments.length > 0) {
    nodes.push({
      path: "comments",
      shape: [],
      dtype: "string",
      attributes: [["text", file.comments.join("\n")]],
    });
  }
  return nodes;
}

export class XdiNodeSource implements ArrayNodeSource {
  readonly encodingFormat = ENCODING_FORMATS.xdi;
  readonly file: XdiFile;

  constructor(file: XdiFile) {
    this.file = file;
  }

  static async fromFile(path: string): Promise<XdiNodeSource> {
    return new XdiNodeSource(await readXdiFile(path));
  }

  async *nodes(): AsyncGenerator<RawArrayNode> {
    yield* xdiNodes(this.file);
  }
}

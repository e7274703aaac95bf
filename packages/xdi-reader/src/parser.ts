/**
 * @module parser
 *
 * Parser for the XAS Data Interchange (XDI) text format:
 *
 * ```text
 * # XDI/1.0 GSE/1.0
 * # Column.1: energy eV
 * # Column.2: i0
 * # Element.symbol: Cu
 * # ///
 * # free-form comments
 * #----
 * # energy i0
 *   8979.0  1.0e5
 * ```
 */

import { readFile } from "node:fs/promises";
import { XdiParseError } from "./errors.js";
import type { XdiColumn, XdiFile } from "./types.js";

const VERSION_LINE = /^#\s*XDI\/(\S+)(?:\s+(.*))?$/;
const FIELD_LINE = /^([A-Za-z][\w-]*)\.([\w-]+)\s*:\s*(.*)$/;
const COMMENTS_MARKER = /^\/{3,}/;
const SEPARATOR = /^-{3,}/;
const NUMBER = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

type Section = "header" | "comments" | "labels" | "data";

interface ColumnDefinition {
  label: string;
  units: string | null;
  address: string | null;
  line: number;
}

/**
 * Split a `Column.N` value into label, units and address:
 * `energy eV || BL.mono.energy`.
 */
export function parseColumnDefinition(
  value: string,
  line: number,
): ColumnDefinition {
  const bar = value.indexOf("||");
  const main = (bar === -1 ? value : value.slice(0, bar)).trim();
  const address = bar === -1 ? "" : value.slice(bar + 2).trim();
  const [label, ...units] = main.split(/\s+/);
  if (!label) {
    throw new XdiParseError("Column definition has no label", line);
  }
  return {
    label,
    units: units.length > 0 ? units.join(" ") : null,
    address: address === "" ? null : address,
    line,
  };
}

function parseRow(text: string, line: number): number[] {
  return text
    .trim()
    .split(/\s+/)
    .map((token) => {
      if (!NUMBER.test(token)) {
        throw new XdiParseError(`Invalid number '${token}'`, line);
      }
      return Number(token);
    });
}

/**
 * Parse XDI text.
 *
 * @throws {XdiParseError} on a missing version line, a malformed header
 *   field, data before the `#---` separator, a non-numeric or ragged row,
 *   or a file without data.
 */
export function parseXdi(text: string): XdiFile {
  const lines = text.split(/\r?\n/);
  const versionMatch = VERSION_LINE.exec(lines[0]?.trim() ?? "");
  if (!versionMatch) {
    throw new XdiParseError("Missing '# XDI/<version>' line", 1);
  }
  const [, version, extra] = versionMatch;

  const metadata = new Map<string, Map<string, string>>();
  const definitions = new Map<number, ColumnDefinition>();
  const comments: string[] = [];
  const rows: number[][] = [];
  let labelLine: string[] = [];
  let section: Section = "header";

  for (let i = 1; i < lines.length; i++) {
    const line = i + 1;
    const raw = lines[i];
    if (raw.trim() === "") continue;

    if (!raw.startsWith("#")) {
      if (section !== "labels" && section !== "data") {
        throw new XdiParseError("Data before the '#---' separator", line);
      }
      section = "data";
      const row = parseRow(raw, line);
      if (rows.length > 0 && row.length !== rows[0].length) {
        throw new XdiParseError(
          `Expected ${rows[0].length} values, found ${row.length}`,
          line,
        );
      }
      rows.push(row);
      continue;
    }

    const body = raw.slice(1).trim();
    if (section === "data") {
      throw new XdiParseError("Header line after data", line);
    }
    if (section === "labels") {
      labelLine = body.split(/\s+/).filter((token) => token !== "");
      continue;
    }
    if (SEPARATOR.test(body)) {
      section = "labels";
      continue;
    }
    if (section === "comments") {
      comments.push(body);
      continue;
    }
    if (COMMENTS_MARKER.test(body)) {
      section = "comments";
      continue;
    }
    if (body === "") continue;

    const field = FIELD_LINE.exec(body);
    if (!field) {
      throw new XdiParseError(`Invalid header field '${body}'`, line);
    }
    const family = field[1].toLowerCase();
    const keyword = field[2].toLowerCase();
    const value = field[3].trim();

    if (family === "column") {
      const index = Number(keyword);
      if (!Number.isInteger(index) || index < 1) {
        throw new XdiParseError(`Invalid column number '${field[2]}'`, line);
      }
      definitions.set(index, parseColumnDefinition(value, line));
      continue;
    }

    let fields = metadata.get(family);
    if (!fields) {
      fields = new Map();
      metadata.set(family, fields);
    }
    fields.set(keyword, value);
  }

  if (rows.length === 0) {
    throw new XdiParseError("No data rows", lines.length);
  }

  const ncols = rows[0].length;
  for (const [index, definition] of definitions) {
    if (index > ncols) {
      throw new XdiParseError(
        `Column.${index} defined but rows have ${ncols} values`,
        definition.line,
      );
    }
  }

  const columns: XdiColumn[] = [];
  for (let c = 0; c < ncols; c++) {
    const definition = definitions.get(c + 1);
    columns.push({
      index: c + 1,
      label: definition?.label ?? labelLine[c] ?? `col${c + 1}`,
      units: definition?.units ?? null,
      address: definition?.address ?? null,
      values: rows.map((row) => row[c]),
    });
  }

  return {
    version,
    extraVersion: extra?.trim() || null,
    metadata,
    columns,
    comments,
    npts: rows.length,
  };
}

/**
 * Read and parse an XDI file.
 */
export async function readXdiFile(path: string): Promise<XdiFile> {
  return parseXdi(await readFile(path, "utf8"));
}

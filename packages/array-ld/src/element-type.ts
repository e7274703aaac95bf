/**
 * @module element-type
 *
 * Normalizes the element type tags used by hierarchical array formats into a
 * small canonical set.
 */

import type { ElementType } from "./types.js";

const NUMERIC_TYPES: ReadonlySet<ElementType> = new Set<ElementType>([
  "int",
  "uint",
  "float",
  "complex",
]);

/** numpy array-interface kind codes */
const TYPESTR_KINDS: Record<string, ElementType> = {
  b: "bool",
  i: "int",
  u: "uint",
  f: "float",
  c: "complex",
  m: "timedelta",
  M: "datetime",
  O: "object",
  S: "bytes",
  a: "bytes",
  U: "string",
  V: "bytes",
};

// e.g. '<f4', '|u1', '<M8[ns]', '|S10', '>i8'
const TYPESTR_PATTERN = /^[<>|=]?([biufcmMOSaUV])(\d*)(\[[^\]]*\])?$/;

const NAMED_TYPES: Record<string, ElementType> = {
  float: "float",
  double: "float",
  half: "float",
  bfloat16: "float",
  int: "int",
  integer: "int",
  uint: "uint",
  complex: "complex",
  bool: "bool",
  boolean: "bool",
  string: "string",
  str: "string",
  unicode: "string",
  utf8: "string",
  "vlen-utf8": "string",
  bytes: "bytes",
  binary: "bytes",
  "vlen-bytes": "bytes",
  object: "object",
};

/**
 * Map a reader's element type tag to a canonical {@link ElementType}.
 *
 * Accepts numpy type strings ('<f4', '<M8[ns]'), Zarr v3 data type names
 * ('float32', 'int64', 'bool') or objects (`{ name: 'numpy.datetime64' }`),
 * and plain names ('float64', 'datetime64[s]', 'object'). Anything else is
 * 'unknown'.
 */
export function canonicalElementType(dtype: unknown): ElementType {
  if (Array.isArray(dtype)) {
    // Structured (record) dtype
    return dtype.length > 0 ? "object" : "unknown";
  }
  const tag = dtypeTag(dtype);
  if (tag === null) return "unknown";

  const typestr = TYPESTR_PATTERN.exec(tag);
  if (typestr) {
    return TYPESTR_KINDS[typestr[1]] ?? "unknown";
  }

  const name = tag.toLowerCase().replace(/^numpy\./, "");
  const named = NAMED_TYPES[name];
  if (named) return named;

  if (/^uint\d+$/.test(name)) return "uint";
  if (/^int\d+$/.test(name)) return "int";
  if (/^float\d+$/.test(name)) return "float";
  if (/^complex\d+$/.test(name)) return "complex";
  if (/^datetime64(\[[^\]]*\])?$/.test(name)) return "datetime";
  if (/^timedelta64(\[[^\]]*\])?$/.test(name)) return "timedelta";
  // Zarr v3 raw bits, e.g. 'r16'
  if (/^r\d+$/.test(name)) return "bytes";

  return "unknown";
}

/**
 * The type tag as text, or null when the reader supplied nothing usable.
 * Zarr v3 extension data types are objects with a `name`.
 */
export function dtypeTag(dtype: unknown): string | null {
  if (typeof dtype === "string") {
    const trimmed = dtype.trim();
    return trimmed === "" ? null : trimmed;
  }
  if (typeof dtype === "object" && dtype !== null && "name" in dtype) {
    const { name } = dtype;
    return typeof name === "string" && name.trim() !== "" ? name.trim() : null;
  }
  return null;
}

/** True for integer, unsigned, floating-point and complex types. */
export function isNumericElementType(type: ElementType): boolean {
  return NUMERIC_TYPES.has(type);
}

const utf8Decoder = new TextDecoder("utf-8");

/**
 * Decode a byte string as UTF-8. Undecodable sequences become U+FFFD.
 */
export function decodeText(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

/** JSON text for values that are not plain attribute scalars. */
export function toJsonText(value: unknown): string {
  try {
    const text = JSON.stringify(value, (_key, item: unknown) =>
      typeof item === "bigint" ? item.toString() : item,
    );
    return text ?? String(value);
  } catch {
    // Cyclic structures
    return String(value);
  }
}

import type { ListableStore } from "../src/types.js";

const encoder = new TextEncoder();

export function json(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

/** Read-only in-memory store without a listing */
export class MemoryStore {
  readonly data: Map<string, Uint8Array>;

  constructor(documents: Record<string, unknown> = {}) {
    this.data = new Map(
      Object.entries(documents).map(([key, value]) => [
        key,
        value instanceof Uint8Array ? value : json(value),
      ]),
    );
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    return this.data.get(key);
  }
}

/** In-memory store whose listing is derived from its keys */
export class ListableMemoryStore extends MemoryStore implements ListableStore {
  async list(prefix: string): Promise<string[]> {
    const base = prefix === "" ? "/" : `/${prefix}/`;
    const names = new Set<string>();
    for (const key of this.data.keys()) {
      if (!key.startsWith(base)) continue;
      const rest = key.slice(base.length).split("/");
      if (rest.length > 1) names.add(rest[0]);
    }
    return [...names].sort();
  }
}

/**
 * @module directory-store
 *
 * A read-only, listable zarrita store over a directory on the local
 * filesystem.
 */

import { readdir, readFile } from "node:fs/promises";
import { resolve, sep } from "node:path";
import type { AsyncReadable } from "zarrita";
import type { ListableStore } from "./types.js";

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

export class DirectoryStore implements AsyncReadable, ListableStore {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /** Filesystem path for a store key, or null if it escapes the root */
  private resolveKey(key: string): string | null {
    const path = resolve(this.root, `.${key.startsWith("/") ? "" : "/"}${key}`);
    if (path !== this.root && !path.startsWith(this.root + sep)) return null;
    return path;
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    const path = this.resolveKey(key);
    if (path === null) return undefined;
    try {
      return await readFile(path);
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw error;
    }
  }

  async list(prefix: string): Promise<string[]> {
    const path = this.resolveKey(`/${prefix}`);
    if (path === null) return [];
    try {
      const entries = await readdir(path, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }
}

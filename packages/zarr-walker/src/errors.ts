/** The store holds no Zarr hierarchy that can be read */
export class ZarrReadError extends Error {
  /** Store key that failed, when the failure is tied to one */
  readonly key: string | null;

  constructor(message: string, key: string | null = null) {
    super(message);
    this.name = "ZarrReadError";
    this.key = key;
  }
}

/** Malformed XDI text */
export class XdiParseError extends Error {
  /** 1-based line number */
  readonly line: number;

  constructor(message: string, line: number) {
    super(`${message} (line ${line})`);
    this.name = "XdiParseError";
    this.line = line;
  }
}

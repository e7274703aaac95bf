/**
 * @module result
 *
 * Per-node outcome values. Stages return these instead of throwing, so one
 * malformed node turns into a diagnostic and the rest of the tree carries on.
 */

import type { DiagnosticCode } from "./types.js";

/** Successful per-node evaluation */
export interface Ok<T> {
  ok: true;
  value: T;
}

/** Failed per-node evaluation */
export interface Err {
  ok: false;
  code: DiagnosticCode;
  message: string;
}

export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err(code: DiagnosticCode, message: string): Err {
  return { ok: false, code, message };
}

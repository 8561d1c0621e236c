import type { ErrorKind } from "./types.js";

export class ReconcileError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReconcileError";
    this.kind = kind;
  }
}

export function isReconcileError(error: unknown): error is ReconcileError {
  return error instanceof ReconcileError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error ?? "Unknown error");
}

/** Kind of an arbitrary thrown value; unclassified failures are commandFailed. */
export function errorKindOf(error: unknown): ErrorKind {
  return isReconcileError(error) ? error.kind : "commandFailed";
}

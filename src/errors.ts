// src/errors.ts

/** Outcome of a domain operation: callers branch on `ok`, never on message text. */
export type Result<T = undefined> = { ok: true; value: T } | { ok: false; message: string; code?: FailureCode };

export type FailureCode = "NOT_FOUND" | "CONFLICT" | "INVALID" | "STORAGE";

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(message: string, code?: FailureCode): Result<never> {
  return { ok: false, message, code };
}

export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = "HttpError";
  }
}

export function statusForFailure(code: FailureCode | undefined): number {
  switch (code) {
    case "NOT_FOUND":
      return 404;
    case "CONFLICT":
      return 409;
    case "STORAGE":
      return 500;
    default:
      return 400;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

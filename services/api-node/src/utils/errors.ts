import { ERROR_CATALOG, type ErrorKind } from "@roscaflow/shared";

export class HttpError extends Error {
  status: number;
  code: string;
  details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

/**
 * Typed engine failure. `code` carries the error kind so HTTP clients can
 * branch on it; `numericCode` is the stable catalog number.
 */
export class CircleError extends HttpError {
  readonly kind: ErrorKind;
  readonly numericCode: number;

  constructor(kind: ErrorKind, message?: string, details?: unknown) {
    const descriptor = ERROR_CATALOG[kind];
    super(descriptor.status, kind, message ?? descriptor.message, details);
    this.name = "CircleError";
    this.kind = kind;
    this.numericCode = descriptor.code;
  }
}

export function assert(condition: unknown, status: number, code: string, message: string): asserts condition {
  if (!condition) {
    throw new HttpError(status, code, message);
  }
}

export function ensure(condition: unknown, kind: ErrorKind, message?: string): asserts condition {
  if (!condition) {
    throw new CircleError(kind, message);
  }
}

export function isCircleError(error: unknown, kind?: ErrorKind): error is CircleError {
  return error instanceof CircleError && (kind === undefined || error.kind === kind);
}

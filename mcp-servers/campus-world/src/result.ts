export type ResultStatus = "success" | "failure" | "error";

export type ErrorCode =
  | "VALIDATION"
  | "PERMISSION_DENIED"
  | "NOT_FOUND"
  | "CONFLICT"
  | "INVALID_PATH"
  | "ALREADY_FINALIZED"
  | "INTERNAL";

/**
 * Outcome of every world operation.
 *
 * `success` means the described mutation (if any) is committed. `failure`
 * and `error` both guarantee that nothing changed.
 */
export interface OpResult<T = Record<string, unknown>> {
  status: ResultStatus;
  message: string;
  data?: T;
  error_code?: ErrorCode;
}

export function ok<T>(message: string, data?: T): OpResult<T> {
  return data === undefined ? { status: "success", message } : { status: "success", message, data };
}

export function fail<T = never>(code: Exclude<ErrorCode, "INTERNAL">, message: string): OpResult<T> {
  return { status: "failure", message, error_code: code };
}

export function internalError<T = never>(message: string): OpResult<T> {
  return { status: "error", message, error_code: "INTERNAL" };
}

export function isSuccess<T>(result: OpResult<T>): boolean {
  return result.status === "success";
}

/** Raised when static or restored data turns out to be inconsistent at run time. */
export class WorldStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WorldStateError";
  }
}

import type { ValidationIssue } from "./types.js";

export type DispatchErrorCode =
  | "validation_error"
  | "not_found"
  | "invalid_transition"
  | "publish_error"
  | "store_timeout"
  | "already_exists";

/**
 * Base class for every failure the dispatch service surfaces to callers.
 * `statusCode` is the HTTP status the API answers with.
 */
export class DispatchError extends Error {
  constructor(
    message: string,
    readonly code: DispatchErrorCode,
    readonly statusCode: number
  ) {
    super(message);
    this.name = "DispatchError";
  }
}

/** Malformed or cyclic input. Client fault, never retried. */
export class ValidationError extends DispatchError {
  constructor(
    message: string,
    readonly details: ValidationIssue[] = []
  ) {
    super(message, "validation_error", 400);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends DispatchError {
  constructor(message: string) {
    super(message, "not_found", 404);
    this.name = "NotFoundError";
  }
}

/** A node or result status would move backwards. */
export class InvalidTransitionError extends DispatchError {
  constructor(
    message: string,
    readonly from: string,
    readonly to: string
  ) {
    super(message, "invalid_transition", 409);
    this.name = "InvalidTransitionError";
  }
}

/** The broker did not acknowledge a publish. Retriable by the client. */
export class PublishError extends DispatchError {
  constructor(message: string) {
    super(message, "publish_error", 503);
    this.name = "PublishError";
  }
}

export class StoreTimeoutError extends DispatchError {
  constructor(message: string) {
    super(message, "store_timeout", 503);
    this.name = "StoreTimeoutError";
  }
}

/** Dispatch id collision. Only reachable if UUID generation repeats itself. */
export class AlreadyExistsError extends DispatchError {
  constructor(message: string) {
    super(message, "already_exists", 500);
    this.name = "AlreadyExistsError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

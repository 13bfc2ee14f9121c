import { DispatchError, ValidationError, isObject } from "@workflow-dispatch/shared";
import type { NextFunction, Request, Response } from "express";

export function sendError(response: Response, error: unknown): void {
  if (error instanceof ValidationError) {
    response.status(error.statusCode).json({
      error: error.code,
      message: error.message,
      details: error.details
    });
    return;
  }
  if (error instanceof DispatchError) {
    if (error.statusCode >= 500) {
      console.error(`${error.name}: ${error.message}`);
    }
    response.status(error.statusCode).json({ error: error.code, message: error.message });
    return;
  }
  console.error("unhandled request error", error);
  response.status(500).json({ error: "internal_error", message: "Internal server error." });
}

/** Turns body-parser failures (bad JSON, oversized body) into JSON responses. */
export function bodyErrorHandler(
  error: unknown,
  _request: Request,
  response: Response,
  next: NextFunction
): void {
  if (isObject(error) && typeof error.status === "number" && typeof error.type === "string") {
    const tooLarge = error.type === "entity.too.large";
    response.status(error.status).json({
      error: tooLarge ? "payload_too_large" : "validation_error",
      message: tooLarge ? "Request body is too large." : "Request body is not valid JSON."
    });
    return;
  }
  next(error);
}

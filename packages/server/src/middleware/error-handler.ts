import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import type { ErrorResponse } from "../models/responses.js";
import { ModelError, toModelError } from "../models/model-error.js";

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    console.warn(`[validation] ${JSON.stringify(err.errors)}`);
    const body: ErrorResponse = {
      error: "ModelError",
      message: "Validation failed",
      cause: "ValidationError",
      details: err.errors,
    };
    res.status(422).json(body);
    return;
  }

  // body-parser errors carry their own 4xx status
  if (!(err instanceof ModelError) && err instanceof Error && "status" in err && typeof err.status === "number") {
    console.warn(`[validation] ${err.message}`);
    const body: ErrorResponse = { error: "ModelError", message: err.message, cause: err.name };
    res.status(err.status).json(body);
    return;
  }

  const modelError = toModelError(err);
  if (modelError.status >= 500) {
    console.error(`[error] ${modelError.causeName}: ${modelError.message}`);
  } else {
    console.warn(`[error] ${modelError.causeName}: ${modelError.message}`);
  }
  const body: ErrorResponse = {
    error: "ModelError",
    message: modelError.message,
    cause: modelError.causeName,
  };
  res.status(modelError.status).json(body);
}

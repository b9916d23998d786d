import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { RenderError, RouteValidationError } from "@route-intel/intelligence";
import type { ErrorResponse } from "../models/responses.js";

function hasStatus(err: Error): err is Error & { status: number } {
  return "status" in err && typeof err.status === "number";
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response<ErrorResponse>,
  next: NextFunction,
): void {
  if (err instanceof ZodError) {
    const details = err.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
    console.warn(`[validation] ${JSON.stringify(details)}`);
    res.status(422).json({ message: "Validation failed", details });
    return;
  }

  if (err instanceof RouteValidationError) {
    console.warn(`[validation] ${JSON.stringify(err.issues)}`);
    res.status(422).json({ message: err.message, details: err.issues });
    return;
  }

  if (err instanceof RenderError) {
    console.error(`[error] ${err.message}`);
    res.status(500).json({ message: err.message });
    return;
  }

  if (err instanceof Error) {
    console.error(`[error] ${err.message}`);
    const status = hasStatus(err) ? err.status : 500;
    res.status(status).json({ message: err.message });
    return;
  }

  next(err);
}

import axios from "axios";
import type { ErrorResponse } from "./types.js";

/** The server answered with an error status */
export class ApiError extends Error {
  readonly status: number;
  /** Validation problems, one per line, when the server listed them */
  readonly details: string[];

  constructor(status: number, body: ErrorResponse) {
    super(body.message);
    this.name = "ApiError";
    this.status = status;
    this.details = body.details ?? [];
  }
}

function isErrorResponse(value: unknown): value is ErrorResponse {
  if (typeof value !== "object" || value === null) return false;
  if (!("message" in value) || typeof value.message !== "string") return false;
  if (!("details" in value)) return true;
  const { details } = value;
  return details === undefined || (Array.isArray(details) && details.every((d) => typeof d === "string"));
}

/**
 * Convert an axios failure carrying a server response into an ApiError.
 * Anything else (network errors, cancellation) is returned unchanged.
 */
export function toApiError(err: unknown): unknown {
  if (!axios.isAxiosError(err) || !err.response) return err;
  const { status, statusText, data } = err.response;
  const body: ErrorResponse = isErrorResponse(data)
    ? data
    : { message: `HTTP ${status}${statusText ? ` ${statusText}` : ""}` };
  return new ApiError(status, body);
}

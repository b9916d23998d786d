/**
 * Error types raised by the report pipeline.
 *
 * Only RenderError and RouteValidationError ever reach a caller: upstream
 * and construction failures are converted into provider statuses.
 */

/** An upstream HTTP call failed, timed out, or returned data we could not read */
export class UpstreamError extends Error {
  readonly status?: number;
  readonly service: string;

  constructor(service: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(`${service}: ${message}`, { cause: options.cause });
    this.name = "UpstreamError";
    this.service = service;
    this.status = options.status;
  }
}

/** A provider object could not be built from its declaration */
export class ProviderConstructionError extends Error {
  constructor(provider: string, cause: unknown) {
    super(`could not construct ${provider} provider: ${describeError(cause)}`, { cause });
    this.name = "ProviderConstructionError";
  }
}

/** The renderer could not emit the final document */
export class RenderError extends Error {
  readonly status = 500;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "RenderError";
  }
}

/** Route input failed validation */
export class RouteValidationError extends Error {
  readonly status = 422;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid route: ${issues.join("; ")}`);
    this.name = "RouteValidationError";
    this.issues = issues;
  }
}

/** Human-readable message for any thrown value */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

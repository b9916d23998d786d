/**
 * HTTP client for provider upstream calls.
 *
 * Wraps axios with a per-call timeout, a bounded retry on throttling and
 * server errors, and schema validation of the response body. Every failure
 * mode surfaces as an UpstreamError so providers can normalize it into a
 * single failure cause.
 */

import axios, { type AxiosInstance, type AxiosResponse, type Method } from "axios";
import type { ZodType, ZodTypeDef } from "zod";
import { UpstreamError } from "../errors.js";

export interface UpstreamRequest {
  url: string;
  params?: Record<string, string | number | boolean>;
  headers?: Record<string, string>;
  body?: unknown;
  /** Aborts the call when the provider times out or the run is cancelled */
  signal?: AbortSignal;
}

/** Schema for a response body; its input side is whatever JSON arrived */
export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * What providers depend on. Tests substitute an in-process fake.
 */
export interface UpstreamHttp {
  get<T>(service: string, request: UpstreamRequest, schema: ResponseSchema<T>): Promise<T>;
  post<T>(service: string, request: UpstreamRequest, schema: ResponseSchema<T>): Promise<T>;
}

export interface UpstreamClientOptions {
  /** Per-attempt timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Retries after the first attempt (default: 1) */
  maxRetries?: number;
  /** Delay before each retry; the last entry repeats (default: [500, 2000]) */
  retryDelaysMs?: number[];
  /** Injectable axios instance for testability */
  axiosInstance?: AxiosInstance;
}

const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_MAX_RETRIES = 1;
const DEFAULT_RETRY_DELAYS_MS = [500, 2000];

export class UpstreamClient implements UpstreamHttp {
  private readonly http: AxiosInstance;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  private readonly retryDelaysMs: number[];

  constructor(options: UpstreamClientOptions = {}) {
    this.http = options.axiosInstance ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelaysMs = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
  }

  get<T>(service: string, request: UpstreamRequest, schema: ResponseSchema<T>): Promise<T> {
    return this.send("GET", service, request, schema);
  }

  post<T>(service: string, request: UpstreamRequest, schema: ResponseSchema<T>): Promise<T> {
    return this.send("POST", service, request, schema);
  }

  private async send<T>(
    method: Method,
    service: string,
    request: UpstreamRequest,
    schema: ResponseSchema<T>
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      let res: AxiosResponse<unknown>;
      try {
        res = await this.http.request<unknown>({
          method,
          url: request.url,
          params: request.params,
          headers: request.headers,
          data: request.body,
          timeout: this.timeoutMs,
          signal: request.signal,
          validateStatus: () => true,
        });
      } catch (err) {
        if (request.signal?.aborted) {
          throw new UpstreamError(service, "request aborted", { cause: err });
        }
        if (attempt < this.maxRetries) {
          await this.backoff(service, attempt, describeTransportError(err, this.timeoutMs), request.signal);
          continue;
        }
        throw new UpstreamError(service, describeTransportError(err, this.timeoutMs), { cause: err });
      }

      if (res.status >= 200 && res.status < 300) {
        const parsed = schema.safeParse(res.data);
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
          throw new UpstreamError(
            service,
            `malformed response${where}: ${issue?.message ?? "unexpected shape"}`,
            { status: res.status, cause: parsed.error }
          );
        }
        return parsed.data;
      }

      const statusLine = `HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ""}`;
      if ((res.status === 429 || res.status >= 500) && attempt < this.maxRetries) {
        await this.backoff(service, attempt, statusLine, request.signal);
        continue;
      }
      throw new UpstreamError(service, statusLine, { status: res.status });
    }
  }

  private async backoff(
    service: string,
    attempt: number,
    reason: string,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const delayMs =
      this.retryDelaysMs[Math.min(attempt, this.retryDelaysMs.length - 1)] ?? 0;
    console.log(`[upstream] ${service}: ${reason}, retrying in ${delayMs}ms`);
    if (delayMs > 0) await delay(delayMs, signal);
    if (signal?.aborted) {
      throw new UpstreamError(service, "request aborted", { cause: signal.reason });
    }
  }
}

function describeTransportError(err: unknown, timeoutMs: number): string {
  if (axios.isAxiosError(err)) {
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") {
      return `timed out after ${timeoutMs}ms`;
    }
    return err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

/** Sleep for `ms`, ending early when the signal fires */
function delay(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

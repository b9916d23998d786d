import { describe, it, expect } from "vitest";
import { AxiosError, AxiosHeaders } from "axios";
import { BaseClient, type RequestParams } from "./baseClient.js";
import { ApiError, toApiError } from "./apiError.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

class ReportsResource extends BaseClient {
  constructor(timeout?: number) {
    super("api/reports", { baseUrl: "http://localhost:3000", timeout });
  }
  public pathFor(params: RequestParams) {
    return this.buildPath(params);
  }
  public configFor(params: RequestParams) {
    return this.buildConfig(params);
  }
}

function failedWith(status: number, data: unknown, statusText = "") {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", config, undefined, {
    data,
    status,
    statusText,
    headers: {},
    config,
  });
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("BaseClient", () => {
  it("addresses the resource and its sub-paths", () => {
    const client = new ReportsResource();
    expect(client.pathFor({})).toBe("/api/reports");
    expect(client.pathFor({ path: "latest" })).toBe("/api/reports/latest");
  });

  it("sends JSON to the configured server with a generous default timeout", () => {
    const config = new ReportsResource().configFor({});
    expect(config.baseURL).toBe("http://localhost:3000");
    expect(config.timeout).toBe(120000);
    expect(config.headers).toEqual({ "Content-Type": "application/json", Accept: "application/json" });
  });

  it("takes a custom timeout and forwards the abort signal", () => {
    const controller = new AbortController();
    const config = new ReportsResource(5000).configFor({ signal: controller.signal });
    expect(config.timeout).toBe(5000);
    expect(config.signal).toBe(controller.signal);
  });
});

describe("toApiError", () => {
  it("carries the server's message and validation details", () => {
    const err = toApiError(
      failedWith(422, { message: "Validation failed", details: ["route.points: Required"] })
    );
    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({
      status: 422,
      message: "Validation failed",
      details: ["route.points: Required"],
    });
  });

  it("falls back to the status line for a body that is not an error response", () => {
    const err = toApiError(failedWith(502, "<html>bad gateway</html>", "Bad Gateway"));
    expect(err).toMatchObject({ status: 502, message: "HTTP 502 Bad Gateway", details: [] });
  });

  it("leaves errors without a response untouched", () => {
    const network = new AxiosError("connect ECONNREFUSED", "ECONNREFUSED");
    expect(toApiError(network)).toBe(network);
  });
});

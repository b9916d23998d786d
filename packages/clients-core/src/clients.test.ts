import { describe, it, expect, vi, afterEach } from "vitest";
import axios, { AxiosError, AxiosHeaders } from "axios";
import { ApiError } from "./apiError.js";
import { HealthClient } from "./healthClient.js";
import { ProviderClient } from "./providerClient.js";
import { ReportClient } from "./reportClient.js";
import type { ProviderDescription } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const config = { baseUrl: "http://localhost:3000" };

function reply<T>(data: T) {
  return { data, status: 200, statusText: "OK", headers: {}, config: { headers: new AxiosHeaders() } };
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("domain clients", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("ReportClient posts the request to /api/reports", async () => {
    const post = vi.spyOn(axios, "post").mockResolvedValue(reply({ sections: [] }));
    const controller = new AbortController();
    const request = { route: { origin: "Bengaluru" }, credentials: { tomtom: "test-key" } };

    const result = await new ReportClient(config).generate(request, controller.signal);

    expect(result).toEqual({ sections: [] });
    expect(post).toHaveBeenCalledWith(
      "/api/reports",
      request,
      expect.objectContaining({ baseURL: "http://localhost:3000", signal: controller.signal })
    );
  });

  it("ReportClient surfaces validation failures as ApiError", async () => {
    const config422 = { headers: new AxiosHeaders() };
    vi.spyOn(axios, "post").mockRejectedValue(
      new AxiosError("Request failed with status code 422", "ERR_BAD_REQUEST", config422, undefined, {
        data: { message: "Validation failed", details: ["credentials.tomtom: Expected string, received number"] },
        status: 422,
        statusText: "Unprocessable Entity",
        headers: {},
        config: config422,
      })
    );

    const call = new ReportClient(config).generate({ route: {} });

    await expect(call).rejects.toBeInstanceOf(ApiError);
    await expect(call).rejects.toMatchObject({
      status: 422,
      message: "Validation failed",
      details: ["credentials.tomtom: Expected string, received number"],
    });
  });

  it("ProviderClient unwraps the provider list", async () => {
    const providers: ProviderDescription[] = [
      { id: "fleet", name: "Fleet Intelligence", secondaryCredentials: [], eligible: true },
    ];
    const get = vi.spyOn(axios, "get").mockResolvedValue(reply({ providers }));

    expect(await new ProviderClient(config).list()).toEqual(providers);
    expect(get).toHaveBeenCalledWith("/api/providers", expect.anything());
  });

  it("HealthClient calls /health", async () => {
    const get = vi.spyOn(axios, "get").mockResolvedValue(reply({ status: "ok", uptime: 1, providers: [] }));

    const health = await new HealthClient(config).check();

    expect(health.status).toBe("ok");
    expect(get).toHaveBeenCalledWith("/health", expect.anything());
  });
});

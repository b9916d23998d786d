import { describe, it, expect, vi, afterEach } from "vitest";
import axios, { AxiosError, type InternalAxiosRequestConfig } from "axios";
import { z } from "zod";
import { UpstreamClient } from "./client.js";
import { UpstreamError } from "../errors.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

type Reply = { status: number; statusText?: string; data?: unknown } | Error;

/** axios instance whose adapter answers from a queue; the last reply repeats */
function fakeAxios(...replies: Reply[]) {
  const requests: InternalAxiosRequestConfig[] = [];
  const instance = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const reply = replies.length > 1 ? replies.shift() : replies[0];
      if (!reply) throw new Error("no reply queued");
      if (reply instanceof Error) throw reply;
      return {
        data: reply.data,
        status: reply.status,
        statusText: reply.statusText ?? "",
        headers: {},
        config,
      };
    },
  });
  return { instance, requests };
}

const valueSchema = z.object({ value: z.number() });

function makeClient(instance: ReturnType<typeof fakeAxios>["instance"], timeoutMs = 10000) {
  return new UpstreamClient({ axiosInstance: instance, timeoutMs, retryDelaysMs: [0] });
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("UpstreamClient", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the validated body and forwards the request", async () => {
    const { instance, requests } = fakeAxios({ status: 200, data: { value: 7 } });
    const client = makeClient(instance);

    const body = await client.get(
      "tomtom",
      { url: "https://example.test/flow", params: { key: "test-key" } },
      valueSchema
    );

    expect(body).toEqual({ value: 7 });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.method).toBe("get");
    expect(requests[0]?.params).toEqual({ key: "test-key" });
    expect(requests[0]?.timeout).toBe(10000);
  });

  it("sends a POST body", async () => {
    const { instance, requests } = fakeAxios({ status: 200, data: { value: 1 } });
    await makeClient(instance).post(
      "google-places",
      { url: "https://example.test/search", body: { radius: 5000 } },
      valueSchema
    );
    expect(requests[0]?.method).toBe("post");
    expect(requests[0]?.data).toBe(JSON.stringify({ radius: 5000 }));
  });

  it("reports a malformed body with its path", async () => {
    const { instance } = fakeAxios({ status: 200, data: { value: "seven" } });
    await expect(
      makeClient(instance).get("tomtom", { url: "https://example.test" }, valueSchema)
    ).rejects.toThrow("tomtom: malformed response at value: Expected number, received string");
  });

  it("does not retry a client error", async () => {
    const { instance, requests } = fakeAxios({ status: 404, statusText: "Not Found" });
    const call = makeClient(instance).get("here", { url: "https://example.test" }, valueSchema);

    await expect(call).rejects.toThrow("here: HTTP 404 Not Found");
    await expect(call).rejects.toMatchObject({ status: 404 });
    expect(requests).toHaveLength(1);
  });

  it("retries a server error once", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const { instance, requests } = fakeAxios(
      { status: 503, statusText: "Service Unavailable" },
      { status: 200, data: { value: 3 } }
    );

    const body = await makeClient(instance).get("openweather", { url: "https://example.test" }, valueSchema);

    expect(body).toEqual({ value: 3 });
    expect(requests).toHaveLength(2);
    expect(log).toHaveBeenCalledWith(
      "[upstream] openweather: HTTP 503 Service Unavailable, retrying in 0ms"
    );
  });

  it("gives up after the retry budget", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const { instance, requests } = fakeAxios({ status: 429 });

    await expect(
      makeClient(instance).get("tomtom", { url: "https://example.test" }, valueSchema)
    ).rejects.toThrow("tomtom: HTTP 429");
    expect(requests).toHaveLength(2);
  });

  it("reports timeouts with the configured budget", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const { instance } = fakeAxios(new AxiosError("timeout of 50ms exceeded", "ECONNABORTED"));

    const call = makeClient(instance, 50).get("here", { url: "https://example.test" }, valueSchema);

    await expect(call).rejects.toBeInstanceOf(UpstreamError);
    await expect(call).rejects.toThrow("here: timed out after 50ms");
  });

  it("stops at once when the caller aborts", async () => {
    const controller = new AbortController();
    controller.abort();
    const { instance } = fakeAxios({ status: 200, data: { value: 1 } });

    await expect(
      makeClient(instance).get(
        "tomtom",
        { url: "https://example.test", signal: controller.signal },
        valueSchema
      )
    ).rejects.toThrow("tomtom: request aborted");
  });

  it("cuts the retry delay short when the caller aborts", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const controller = new AbortController();
    const { instance, requests } = fakeAxios({ status: 503 });
    const client = new UpstreamClient({ axiosInstance: instance, retryDelaysMs: [5000] });

    const started = Date.now();
    setTimeout(() => controller.abort(), 10);
    await expect(
      client.get("tomtom", { url: "https://example.test", signal: controller.signal }, valueSchema)
    ).rejects.toThrow("tomtom: request aborted");

    expect(Date.now() - started).toBeLessThan(1000);
    expect(requests).toHaveLength(1);
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ZodError } from "zod";
import type { Credentials } from "@route-intel/types";
import { ProviderRegistry, RouteValidationError } from "@route-intel/intelligence";
import { DEFAULT_POINTS, FakeUpstream } from "@route-intel/intelligence/testing";
import { ReportService } from "./report.service.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function makeService(http: FakeUpstream, credentials: Credentials = {}) {
  return new ReportService({
    registry: new ProviderRegistry({ http }),
    credentials,
    providerTimeoutMs: 1000,
    onStatus: () => {},
  });
}

const route = {
  points: DEFAULT_POINTS,
  vehicle: { vehicleClass: "car" },
  origin: "Bengaluru",
  destination: "Hosur",
};

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("ReportService", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs providers enabled by request credentials", async () => {
    const http = new FakeUpstream().respond("tomtom", {
      flowSegmentData: { currentSpeed: 45, freeFlowSpeed: 60 },
    });
    const service = makeService(http);

    const result = await service.generate({ route, credentials: { tomtom: "test-key" } });

    expect(result.statuses[0]?.state).toBe("succeeded");
    expect(http.callsTo("tomtom")[0]?.request.params?.["key"]).toBe("test-key");
  });

  it("lets request credentials override the server's", async () => {
    const http = new FakeUpstream().respond("tomtom", {
      flowSegmentData: { currentSpeed: 45, freeFlowSpeed: 60 },
    });
    const service = makeService(http, { tomtom: "server-key" });

    await service.generate({ route, credentials: { tomtom: "request-key" } });

    expect(http.callsTo("tomtom").every((c) => c.request.params?.["key"] === "request-key")).toBe(true);
  });

  it("rejects a malformed body", async () => {
    const service = makeService(new FakeUpstream());
    await expect(service.generate({ route, credentials: { tomtom: 5 } })).rejects.toBeInstanceOf(ZodError);
    await expect(
      service.generate({ route, options: { providerTimeoutMs: 500_000 } })
    ).rejects.toBeInstanceOf(ZodError);
  });

  it("rejects an invalid route before running anything", async () => {
    const http = new FakeUpstream();
    const service = makeService(http, { tomtom: "server-key" });

    await expect(service.generate({ route: { ...route, points: [] } })).rejects.toBeInstanceOf(
      RouteValidationError
    );
    expect(http.calls).toEqual([]);
  });

  it("describes providers against the server's credentials", () => {
    const service = makeService(new FakeUpstream(), { googleMaps: "test-key" });
    expect(service.describeProviders().map((p) => [p.id, p.eligible])).toEqual([
      ["traffic", false],
      ["weather", false],
      ["maps", true],
      ["realtime", true],
      ["fleet", true],
      ["emergency", true],
      ["location", true],
    ]);
  });
});

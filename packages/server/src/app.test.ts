import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import request from "supertest";
import type { Credentials } from "@route-intel/types";
import { ProviderRegistry } from "@route-intel/intelligence";
import { DEFAULT_POINTS, FakeUpstream } from "@route-intel/intelligence/testing";
import { createApp, startupBanner } from "./app.js";
import { ReportService } from "./services/report.service.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function makeApp(credentials: Credentials = {}) {
  const service = new ReportService({
    registry: new ProviderRegistry({ http: new FakeUpstream() }),
    credentials,
    providerTimeoutMs: 1000,
    onStatus: () => {},
  });
  return createApp(service);
}

const route = {
  points: DEFAULT_POINTS,
  vehicle: { vehicleClass: "bus" },
  origin: "Bengaluru",
  destination: "Hosur",
};

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("HTTP API", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("GET /health lists provider eligibility", async () => {
    const res = await request(makeApp()).get("/health");
    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
    expect(res.body.providers).toHaveLength(7);
    expect(res.body.providers[4]).toEqual({ id: "fleet", eligible: true });
  });

  it("GET /api/providers returns the capability table", async () => {
    const res = await request(makeApp({ tomtom: "test-key" })).get("/api/providers");
    expect(res.status).toBe(200);
    expect(res.body.providers[0]).toEqual({
      id: "traffic",
      name: "Traffic Intelligence",
      primaryCredential: "tomtom",
      secondaryCredentials: ["here"],
      eligible: true,
    });
  });

  it("POST /api/reports returns the report", async () => {
    const res = await request(makeApp()).post("/api/reports").send({ route });
    expect(res.status).toBe(200);
    expect(res.body.summary).toMatchObject({ declared: 7, succeeded: 1, skipped: 6, failed: 0 });
    expect(res.body.sections.length).toBeGreaterThan(0);
    expect(res.body.sections.every((s: { provider: string }) => s.provider === "fleet")).toBe(true);
  });

  it("POST /api/reports maps an invalid route to 422", async () => {
    const res = await request(makeApp())
      .post("/api/reports")
      .send({ route: { ...route, points: [{ lat: 12.97, lng: 77.59 }] } });
    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      message: "Invalid route: points: a route needs at least two points",
      details: ["points: a route needs at least two points"],
    });
  });

  it("POST /api/reports maps a malformed body to 422", async () => {
    const res = await request(makeApp())
      .post("/api/reports")
      .send({ route, credentials: { tomtom: 5 } });
    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      message: "Validation failed",
      details: ["credentials.tomtom: Expected string, received number"],
    });
  });

  it("rejects unparseable JSON with 400", async () => {
    const res = await request(makeApp())
      .post("/api/reports")
      .set("Content-Type", "application/json")
      .send("{not json");
    expect(res.status).toBe(400);
  });
});

describe("startupBanner", () => {
  it("lists the endpoints and which providers the server can run", () => {
    const service = new ReportService({
      registry: new ProviderRegistry({ http: new FakeUpstream() }),
      credentials: { tomtom: "test-key" },
      providerTimeoutMs: 1000,
    });

    expect(startupBanner("http://localhost:3000", service)).toEqual([
      "Route intelligence API server running at http://localhost:3000",
      "  POST http://localhost:3000/api/reports",
      "  GET  http://localhost:3000/api/providers",
      "  GET  http://localhost:3000/health",
      "[report] traffic: enabled",
      "[report] weather: disabled (needs openweather)",
      "[report] maps: disabled (needs googleMaps)",
      "[report] realtime: disabled (needs googleMaps)",
      "[report] fleet: enabled",
      "[report] emergency: disabled (needs googleMaps)",
      "[report] location: disabled (needs googleMaps)",
    ]);
  });
});

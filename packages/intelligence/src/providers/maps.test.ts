import { describe, it, expect } from "vitest";
import { MapsProvider, assessRoad, classifyRoadType } from "./maps.js";
import { FakeUpstream } from "../upstream/testing.js";
import { makeContext, makeRoute } from "./testing.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function geocode(...components: { long_name: string; types: string[] }[]) {
  return {
    status: "OK",
    results: [{ types: ["street_address"], address_components: components }],
  };
}

function makeProvider(http: FakeUpstream) {
  return new MapsProvider({ apiKey: "test-key", http });
}

function operation(provider: MapsProvider, kind: string) {
  const op = provider.operations.find((o) => o.kind === kind);
  if (!op) throw new Error(`no ${kind} operation`);
  return op;
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("classifyRoadType", () => {
  it("recognises highways by name", () => {
    expect(classifyRoadType("NH48", ["route"])).toBe("national_highway");
    expect(classifyRoadType("Mumbai-Pune Expressway", ["route"])).toBe("national_highway");
    expect(classifyRoadType("SH 17", ["route"])).toBe("state_highway");
    expect(classifyRoadType("Shivaji Nagar Main Road", ["route"])).toBe("major_road");
  });

  it("treats non-route places as local roads", () => {
    expect(classifyRoadType("NH48", ["establishment"])).toBe("local_road");
    expect(classifyRoadType(undefined, [])).toBe("local_road");
  });
});

describe("assessRoad", () => {
  it("grades by estimated width", () => {
    expect(assessRoad("national_highway")).toEqual({ suitability: "suitable", concerns: [] });
    expect(assessRoad("major_road")).toEqual({
      suitability: "caution",
      concerns: ["Limited overtaking opportunities"],
    });
    expect(assessRoad("local_road").suitability).toBe("unsuitable");
  });
});

describe("MapsProvider", () => {
  it("marks heavy-vehicle suitability as gated", () => {
    const provider = makeProvider(new FakeUpstream());
    expect(provider.operations.map((op) => [op.kind, op.heavyVehicleOnly ?? false])).toEqual([
      ["terrain-classification", false],
      ["elevation-profile", false],
      ["heavy-vehicle-suitability", true],
    ]);
  });

  it("classifies terrain per sampled point", async () => {
    const http = new FakeUpstream().respond(
      "google-geocoding",
      geocode(
        { long_name: "Koramangala", types: ["sublocality", "political"] },
        { long_name: "Bengaluru", types: ["locality", "political"] }
      ),
      geocode({ long_name: "Hosur", types: ["locality", "political"] }),
      { status: "ZERO_RESULTS", results: [] }
    );
    const result = await makeProvider(http).operations[0]!.run(makeContext());

    expect(result.ok).toBe(true);
    if (!result.ok || result.data.kind !== "terrain-classification") return;
    expect(result.data.samples?.map((s) => [s.terrain, s.locality])).toEqual([
      ["urban", "Bengaluru"],
      ["semi-urban", "Hosur"],
      ["rural", undefined],
    ]);
    expect(result.data.distribution).toEqual({ urban: 33.3, "semi-urban": 33.3, rural: 33.3 });
  });

  it("surfaces a rejected Google request as the cause", async () => {
    const http = new FakeUpstream().respond("google-geocoding", {
      status: "REQUEST_DENIED",
      error_message: "The provided API key is invalid.",
    });
    const result = await makeProvider(http).operations[0]!.run(makeContext());
    expect(result).toEqual({
      ok: false,
      cause: "google-geocoding: REQUEST_DENIED (The provided API key is invalid.)",
    });
  });

  it("scores heavy-vehicle suitability from roads and turns", async () => {
    const http = new FakeUpstream()
      .respond("google-roads", {
        snappedPoints: [
          { location: { latitude: 12.97, longitude: 77.59 }, originalIndex: 0, placeId: "p1" },
          { location: { latitude: 12.98, longitude: 77.6 }, originalIndex: 1, placeId: "p1" },
          { location: { latitude: 12.99, longitude: 77.61 }, originalIndex: 2, placeId: "p2" },
        ],
      })
      .respond(
        "google-places",
        { status: "OK", result: { name: "NH48", types: ["route"] } },
        { status: "OK", result: { name: "Church Street", types: ["establishment"] } }
      );
    const route = makeRoute({
      vehicle: { vehicleClass: "heavy_goods_vehicle" },
      turns: [
        { coordinate: { lat: 12.975, lng: 77.595 }, angleDegrees: 95 },
        { coordinate: { lat: 12.985, lng: 77.605 }, angleDegrees: 75 },
        { coordinate: { lat: 12.986, lng: 77.606 }, angleDegrees: 50 },
      ],
    });
    const result = await operation(makeProvider(http), "heavy-vehicle-suitability").run(
      makeContext(route)
    );

    expect(http.callsTo("google-roads")[0]!.request.params?.["points"]).toBe(
      "12.970000,77.590000|12.980000,77.600000|12.990000,77.610000"
    );
    expect(http.callsTo("google-places")).toHaveLength(2);
    expect(result.ok).toBe(true);
    if (!result.ok || result.data.kind !== "heavy-vehicle-suitability") return;
    expect(result.data.vehicleClass).toBe("heavy_goods_vehicle");
    expect(result.data.roads?.map((r) => [r.roadType, r.suitability])).toEqual([
      ["national_highway", "suitable"],
      ["local_road", "unsuitable"],
    ]);
    expect(result.data.suitabilityScore).toBe(50);
    expect(result.data.recommendations).toHaveLength(3);
  });

  it("profiles gradients from Open-Meteo elevations", async () => {
    const http = new FakeUpstream().respond("open-meteo", { elevation: [900, 1100, 1110] });
    const result = await operation(makeProvider(http), "elevation-profile").run(makeContext());

    expect(http.callsTo("open-meteo")[0]!.request.params).toEqual({
      latitude: "12.97,12.98,12.99",
      longitude: "77.59,77.6,77.61",
    });
    expect(result.ok).toBe(true);
    if (!result.ok || result.data.kind !== "elevation-profile") return;
    expect(result.data.statistics).toEqual({
      minMeters: 900,
      maxMeters: 1110,
      rangeMeters: 210,
      averageMeters: 1036.7,
      totalAscentMeters: 210,
      totalDescentMeters: 0,
    });
    expect(result.data.gradientDistribution).toEqual({ very_steep: 1, flat: 1 });
    expect(result.data.riskSegments).toEqual([
      { coordinate: { lat: 12.98, lng: 77.6 }, distanceKm: 0, gradientPercent: 12.9, riskLevel: "critical" },
    ]);
    expect(result.data.maxClimbPercent).toBe(12.9);
    expect(result.data.overallRisk).toBe("high");
    expect(result.data.recommendations?.[0]).toBe(
      "1 critical steep sections: use low gear on climbs and descents"
    );
  });
});

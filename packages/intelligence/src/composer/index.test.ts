import { describe, it, expect } from "vitest";
import type { ConstructionZone, OperationPayload } from "@route-intel/types";
import { composeSections } from "./index.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function zones(count: number): ConstructionZone[] {
  return Array.from({ length: count }, (_, i) => ({
    roadName: `Road ${i}`,
    description: "Lane closure",
    severity: "moderate",
    endTime: "2026-12-01",
  }));
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("composeSections", () => {
  it("lists seasons in calendar order with the first two peak windows", () => {
    const [s] = composeSections({
      kind: "seasonal-congestion",
      seasonalPatterns: {
        monsoon: {
          congestionLevel: "heavy",
          averageCongestion: 52,
          peakHours: ["08:00-10:00", "18:00-20:00", "13:00-14:00"],
        },
        winter: { congestionLevel: "light", averageCongestion: 10, peakHours: [] },
      },
      peakCongestionMonths: ["Jul", "Aug"],
    });
    expect(s?.id).toBe("traffic.seasonal-congestion");
    expect(s?.blocks[0]).toEqual({
      kind: "table",
      title: undefined,
      columns: ["Period", "Congestion Level", "Average Congestion", "Peak Hours"],
      rows: [
        ["Winter (Dec-Feb)", "Light", "10%", "-"],
        ["Monsoon (Jul-Oct)", "Heavy", "52%", "08:00-10:00, 18:00-20:00"],
      ],
    });
    expect(s?.blocks[1]).toEqual({
      kind: "summary",
      label: "Peak Congestion Months",
      value: "Jul, Aug",
    });
  });

  it("treats an empty collection the same as an omitted field", () => {
    const withEmpty = composeSections({
      kind: "construction-zones",
      activeConstruction: [],
      plannedConstruction: [],
      recommendations: [],
    });
    expect(withEmpty).toEqual(composeSections({ kind: "construction-zones" }));
    expect(withEmpty).toEqual([]);
  });

  it("caps construction zones at ten rows", () => {
    const [s] = composeSections({ kind: "construction-zones", activeConstruction: zones(15) });
    const block = s?.blocks[0];
    expect(block?.kind).toBe("table");
    if (block?.kind === "table") {
      expect(block.title).toBe("Active Construction");
      expect(block.rows).toHaveLength(10);
      expect(block.rows[0]).toEqual(["Road 0", "Lane closure", "Moderate", "2026-12-01"]);
    }
  });

  it("cleans control characters out of upstream text", () => {
    const [s] = composeSections({
      kind: "business-opportunities",
      commercialCenters: [{ name: "Forum\nMall", address: "Hosur Rd", rating: 4.6 }],
    });
    expect(s?.blocks[0]).toEqual({
      kind: "table",
      title: "Commercial Centres",
      columns: ["Name", "Address", "Rating"],
      rows: [["Forum Mall", "Hosur Rd", "4.6"]],
    });
  });

  it("scores compliance with a tone and ordered action items", () => {
    const [s] = composeSections({
      kind: "compliance-tracking",
      complianceScore: 55,
      actionItems: ["Install AIS-140 tracking device"],
    });
    expect(s?.category).toBe("primary");
    expect(s?.blocks).toEqual([
      { kind: "summary", label: "Compliance Score", value: "55/100", tone: "bad" },
      {
        kind: "list",
        title: "Action Items",
        items: ["Install AIS-140 tracking device"],
        ordered: true,
      },
    ]);
  });

  it("renders only the terrain types present in the distribution", () => {
    const [s] = composeSections({
      kind: "terrain-classification",
      distribution: { urban: 62.5, rural: 37.5 },
    });
    expect(s?.blocks).toHaveLength(1);
    const block = s?.blocks[0];
    if (block?.kind === "table") {
      expect(block.rows.map((r) => r[0])).toEqual(["Urban", "Rural"]);
      expect(block.rows[0]?.[1]).toBe("62.5%");
    }
  });

  it("lays out the elevation profile", () => {
    const [s] = composeSections({
      kind: "elevation-profile",
      statistics: { minMeters: 900, maxMeters: 1110.4, totalAscentMeters: 210 },
      gradientDistribution: { very_steep: 1, flat: 1 },
      maxClimbPercent: 12.9,
      riskSegments: [
        { coordinate: { lat: 12.98, lng: 77.6 }, distanceKm: 0, gradientPercent: 12.9, riskLevel: "critical" },
      ],
      overallRisk: "high",
      recommendations: [],
    });

    expect(s?.id).toBe("maps.elevation-profile");
    expect(s?.blocks).toEqual([
      {
        kind: "table",
        title: "Elevation Statistics",
        columns: ["Metric", "Value"],
        rows: [
          ["Minimum Elevation", "900 m"],
          ["Maximum Elevation", "1110 m"],
          ["Total Ascent", "210 m"],
        ],
      },
      { kind: "summary", label: "Overall Gradient Risk", value: "High", tone: "bad" },
      { kind: "summary", label: "Steepest Climb", value: "12.9%" },
      {
        kind: "table",
        title: "Gradient Distribution",
        columns: ["Gradient", "Segments"],
        rows: [
          ["Flat (0-2%)", "1"],
          ["Very steep (>12%)", "1"],
        ],
      },
      {
        kind: "table",
        title: "Steep Segments",
        columns: ["Location", "From Start", "Gradient", "Direction", "Risk"],
        rows: [["12.9800, 77.6000", "0 km", "12.9%", "Climb", "Critical"]],
      },
    ]);
  });

  it("drops an elevation profile with nothing to show", () => {
    expect(
      composeSections({ kind: "elevation-profile", gradientDistribution: {}, riskSegments: [] })
    ).toEqual([]);
  });

  it("names sections after their provider and operation", () => {
    const payloads: OperationPayload[] = [
      { kind: "current-conditions", observations: [{ coordinate: { lat: 1, lng: 2 }, temperatureC: 30 }] },
      { kind: "live-traffic", lastUpdated: "2026-01-01T00:00:00.000Z" },
      { kind: "driver-behavior", safetyScores: { overall: 90 } },
      { kind: "communication-system", primaryChannels: ["Mobile phone"] },
      { kind: "demographics", localities: ["Hosur"] },
    ];
    expect(payloads.flatMap(composeSections).map((s) => s.id)).toEqual([
      "weather.current-conditions",
      "realtime.live-traffic",
      "fleet.driver-behavior",
      "emergency.communication-system",
      "location.demographics",
    ]);
  });

  it("is deterministic", () => {
    const payload: OperationPayload = {
      kind: "fuel-prices",
      stations: [{ name: "Shell", petrolPrice: 102.5, currency: "INR" }],
      priceAnalysis: { averagePetrolPrice: 102.5, currency: "INR" },
    };
    expect(composeSections(payload)).toEqual(composeSections(payload));
  });
});

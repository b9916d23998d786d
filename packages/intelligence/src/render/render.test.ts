import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomBytes } from "node:crypto";
import type { ReportResult, Section } from "@route-intel/types";
import { composeSections } from "../composer/index.js";
import { RenderError, RouteValidationError } from "../errors.js";
import { makeRoute, DEFAULT_POINTS } from "../providers/testing.js";
import { ProviderRegistry } from "../registry/registry.js";
import { FakeUpstream } from "../upstream/testing.js";
import { generateReport, type ReportRenderer } from "./renderer.js";
import { TextReportRenderer, formatTextReport } from "./text-renderer.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

let dir: string;

function makeResult(sections: Section[]): ReportResult {
  return {
    route: makeRoute({ distanceKm: 42 }),
    sections,
    summary: {
      declared: 7,
      succeeded: 1,
      failed: 0,
      skipped: 6,
      sectionsEmitted: sections.length,
      operationsFailed: 0,
      durationMs: 5,
    },
    statuses: [],
    generatedAt: "2026-03-01T08:00:00.000Z",
  };
}

class FailingRenderer implements ReportRenderer {
  readonly format = "fake";
  async render(): Promise<void> {
    throw new Error("disk full");
  }
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("formatTextReport", () => {
  it("renders the header, sections and run summary", () => {
    const sections = composeSections({
      kind: "compliance-tracking",
      complianceScore: 90,
      actionItems: ["Carry documents"],
    });

    expect(formatTextReport(makeResult(sections))).toBe(
      [
        "ROUTE INTELLIGENCE REPORT",
        "Route: Bengaluru -> Hosur",
        "Vehicle: car",
        "Distance: 42 km",
        "Generated: 2026-03-01T08:00:00.000Z",
        "",
        "== Regulatory Compliance ==",
        "",
        "Compliance Score: 90/100",
        "",
        "Action Items",
        "1. Carry documents",
        "",
        "== Run Summary ==",
        "Providers: 1 succeeded, 0 failed, 6 skipped of 7",
        "Sections: 1",
        "Failed operations: 0",
        "",
      ].join("\n")
    );
  });

  it("pads table columns to their widest cell", () => {
    const sections = composeSections({
      kind: "terrain-classification",
      distribution: { urban: 50, rural: 50 },
    });
    const lines = formatTextReport(makeResult(sections)).split("\n");

    const header = lines.indexOf("Distribution");
    expect(lines.slice(header, header + 5)).toEqual([
      "Distribution",
      "Terrain | Share | Description",
      `${"-".repeat(7)}-+-${"-".repeat(5)}-+-${"-".repeat(39)}`,
      "Urban   | 50%   | Built-up areas, cities, heavy traffic",
      "Rural   | 50%   | Open areas, villages, agricultural land",
    ]);
  });
});

describe("TextReportRenderer", () => {
  beforeEach(() => {
    dir = join(tmpdir(), `report-render-${randomBytes(4).toString("hex")}`);
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("writes the formatted report", async () => {
    const file = join(dir, "report.txt");
    const result = makeResult([]);
    await new TextReportRenderer().render(result, file);
    expect(readFileSync(file, "utf-8")).toBe(formatTextReport(result));
  });

  it("raises RenderError for an unwritable destination", async () => {
    const file = join(dir, "missing", "report.txt");
    await expect(new TextReportRenderer().render(makeResult([]), file)).rejects.toBeInstanceOf(
      RenderError
    );
  });

  it("generates a report end to end", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const file = join(dir, "report.txt");
    const result = await generateReport(
      {
        points: DEFAULT_POINTS,
        vehicle: { vehicleClass: "car" },
        origin: "Bengaluru",
        destination: "Hosur",
      },
      {},
      {
        registry: new ProviderRegistry({ http: new FakeUpstream() }),
        renderer: new TextReportRenderer(),
        destination: file,
        onStatus: () => {},
      }
    );
    expect(result.summary.succeeded).toBe(1);
    expect(readFileSync(file, "utf-8")).toContain("== Run Summary ==");
  });

  it("rejects invalid input before running any provider", async () => {
    const render = vi.fn();
    await expect(
      generateReport(
        { points: [], vehicle: { vehicleClass: "car" }, origin: "A", destination: "B" },
        {},
        {
          registry: new ProviderRegistry({ http: new FakeUpstream() }),
          renderer: { format: "fake", render },
          destination: "unused",
        }
      )
    ).rejects.toBeInstanceOf(RouteValidationError);
    expect(render).not.toHaveBeenCalled();
  });

  it("wraps renderer failures in RenderError", async () => {
    await expect(
      generateReport(
        { points: DEFAULT_POINTS, vehicle: { vehicleClass: "car" }, origin: "A", destination: "B" },
        {},
        {
          registry: new ProviderRegistry({ http: new FakeUpstream() }),
          renderer: new FailingRenderer(),
          destination: "unused",
          onStatus: () => {},
        }
      )
    ).rejects.toThrow("fake renderer failed: disk full");
  });
});

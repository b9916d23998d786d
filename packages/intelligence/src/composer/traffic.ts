import type {
  ConstructionZone,
  ConstructionZonesPayload,
  Season,
  SeasonalCongestionPayload,
  Section,
  SummaryBlock,
} from "@route-intel/types";
import { CAPS, cell, humanize, list, section, summary, table } from "./blocks.js";

const SEASON_LABELS: Record<Season, string> = {
  winter: "Winter (Dec-Feb)",
  spring: "Spring (Mar-May)",
  summer: "Summer (Jun-Aug)",
  monsoon: "Monsoon (Jul-Oct)",
};

const SEASON_ORDER: readonly Season[] = ["winter", "spring", "summer", "monsoon"];

export function levelTone(level: string | undefined): SummaryBlock["tone"] {
  switch (level) {
    case "severe":
    case "heavy":
    case "high":
    case "extreme":
      return "bad";
    case "moderate":
      return "fair";
    case "light":
    case "low":
    case "minimal":
      return "good";
    default:
      return undefined;
  }
}

export function composeSeasonalCongestion(payload: SeasonalCongestionPayload): Section[] {
  const patterns = payload.seasonalPatterns ?? {};
  const rows = SEASON_ORDER.flatMap((season) => {
    const p = patterns[season];
    if (!p) return [];
    return [
      [
        SEASON_LABELS[season],
        humanize(p.congestionLevel),
        cell(p.averageCongestion, "%"),
        p.peakHours && p.peakHours.length > 0 ? p.peakHours.slice(0, 2).join(", ") : "-",
      ],
    ];
  });

  const months = payload.peakCongestionMonths ?? [];
  return section("traffic", "seasonal-congestion", "Seasonal Traffic Patterns", "warning", [
    table(["Period", "Congestion Level", "Average Congestion", "Peak Hours"], rows),
    summary("Peak Congestion Months", months.length > 0 ? months.join(", ") : undefined),
    list(payload.recommendations, { title: "Seasonal Recommendations" }),
  ]);
}

function zoneRows(zones: readonly ConstructionZone[] | undefined): string[][] {
  return (zones ?? []).map((z) => [
    cell(z.roadName),
    cell(z.description),
    humanize(z.severity),
    cell(z.endTime),
  ]);
}

function alternateRoute(recommended: boolean | undefined): string | undefined {
  if (recommended === undefined) return undefined;
  return recommended ? "Recommended" : "Not required";
}

export function composeConstructionZones(payload: ConstructionZonesPayload): Section[] {
  const impact = payload.impactAssessment;
  const columns = ["Road", "Description", "Severity", "Until"];
  return section("traffic", "construction-zones", "Construction Zones", "warning", [
    summary(
      "Overall Impact",
      impact?.overallImpact && humanize(impact.overallImpact),
      levelTone(impact?.overallImpact)
    ),
    summary("Total Zones", impact?.totalZones),
    summary("Estimated Delay", impact?.delayEstimate),
    summary("Alternate Route", alternateRoute(impact?.alternateRouteRecommended)),
    table(columns, zoneRows(payload.activeConstruction), {
      title: "Active Construction",
      cap: CAPS.constructionZones,
    }),
    table(columns, zoneRows(payload.plannedConstruction), {
      title: "Planned Construction",
      cap: CAPS.constructionZones,
    }),
    list(payload.recommendations, { title: "Construction Recommendations" }),
  ]);
}

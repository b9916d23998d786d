import type {
  ElevationProfilePayload,
  GradientCategory,
  HeavyVehicleSuitabilityPayload,
  Section,
  TerrainClassificationPayload,
  TerrainType,
} from "@route-intel/types";
import { CAPS, cell, formatCoordinate, humanize, list, section, summary, table } from "./blocks.js";

const TERRAIN_ORDER: readonly TerrainType[] = ["urban", "semi-urban", "rural"];

const TERRAIN_DESCRIPTIONS: Record<TerrainType, string> = {
  urban: "Built-up areas, cities, heavy traffic",
  "semi-urban": "Town areas, moderate development",
  rural: "Open areas, villages, agricultural land",
};

export function composeTerrainClassification(payload: TerrainClassificationPayload): Section[] {
  const distribution = payload.distribution ?? {};
  const distributionRows = TERRAIN_ORDER.flatMap((terrain) => {
    const share = distribution[terrain];
    return share === undefined
      ? []
      : [[humanize(terrain), cell(share, "%"), TERRAIN_DESCRIPTIONS[terrain]]];
  });
  const sampleRows = (payload.samples ?? []).map((s) => [
    formatCoordinate(s.coordinate),
    humanize(s.terrain),
    cell(s.locality),
  ]);
  return section("maps", "terrain-classification", "Terrain Classification", "info", [
    table(["Terrain", "Share", "Description"], distributionRows, { title: "Distribution" }),
    table(["Location", "Terrain", "Locality"], sampleRows, { title: "Sampled Points" }),
  ]);
}

const GRADIENT_LABELS: Record<GradientCategory, string> = {
  flat: "Flat (0-2%)",
  gentle: "Gentle (2-5%)",
  moderate: "Moderate (5-8%)",
  steep: "Steep (8-12%)",
  very_steep: "Very steep (>12%)",
};

const GRADIENT_ORDER: readonly GradientCategory[] = ["flat", "gentle", "moderate", "steep", "very_steep"];

function riskTone(risk: ElevationProfilePayload["overallRisk"]) {
  if (risk === undefined) return undefined;
  if (risk === "low") return "good" as const;
  if (risk === "medium") return "fair" as const;
  return "bad" as const;
}

function meters(value: number | undefined): string | undefined {
  return value === undefined ? undefined : `${Math.round(value)} m`;
}

function percent(value: number | undefined): string | undefined {
  return value === undefined ? undefined : `${value.toFixed(1)}%`;
}

export function composeElevationProfile(payload: ElevationProfilePayload): Section[] {
  const stats = payload.statistics ?? {};
  const statRows = (
    [
      ["Minimum Elevation", meters(stats.minMeters)],
      ["Maximum Elevation", meters(stats.maxMeters)],
      ["Elevation Range", meters(stats.rangeMeters)],
      ["Total Ascent", meters(stats.totalAscentMeters)],
      ["Total Descent", meters(stats.totalDescentMeters)],
      ["Average Elevation", meters(stats.averageMeters)],
    ] as const
  ).flatMap(([label, value]) => (value === undefined ? [] : [[label, value]]));

  const distribution = payload.gradientDistribution ?? {};
  const distributionRows = GRADIENT_ORDER.flatMap((category) => {
    const segments = distribution[category];
    return segments === undefined ? [] : [[GRADIENT_LABELS[category], String(segments)]];
  });

  const riskRows = (payload.riskSegments ?? []).map((r) => [
    formatCoordinate(r.coordinate),
    cell(r.distanceKm, " km"),
    cell(percent(r.gradientPercent)),
    r.gradientPercent === undefined ? "-" : r.gradientPercent > 0 ? "Climb" : "Descent",
    humanize(r.riskLevel),
  ]);

  return section("maps", "elevation-profile", "Elevation Profile", "info", [
    table(["Metric", "Value"], statRows, { title: "Elevation Statistics" }),
    summary(
      "Overall Gradient Risk",
      payload.overallRisk && humanize(payload.overallRisk),
      riskTone(payload.overallRisk)
    ),
    summary("Steepest Climb", percent(payload.maxClimbPercent)),
    summary("Steepest Descent", percent(payload.maxDescentPercent)),
    table(["Gradient", "Segments"], distributionRows, { title: "Gradient Distribution" }),
    table(["Location", "From Start", "Gradient", "Direction", "Risk"], riskRows, {
      title: "Steep Segments",
      cap: CAPS.gradientRisks,
    }),
    list(payload.recommendations, { title: "Gradient Recommendations" }),
  ]);
}

function suitabilityTone(score: number | undefined) {
  if (score === undefined) return undefined;
  if (score >= 80) return "good" as const;
  if (score >= 50) return "fair" as const;
  return "bad" as const;
}

export function composeHeavyVehicleSuitability(payload: HeavyVehicleSuitabilityPayload): Section[] {
  const rows = (payload.roads ?? []).map((r) => [
    formatCoordinate(r.coordinate),
    humanize(r.roadType),
    humanize(r.suitability),
    r.concerns && r.concerns.length > 0 ? r.concerns.join("; ") : "-",
  ]);
  return section("maps", "heavy-vehicle-suitability", "Heavy Vehicle Suitability", "warning", [
    summary("Vehicle Class", payload.vehicleClass && humanize(payload.vehicleClass)),
    summary(
      "Suitability Score",
      payload.suitabilityScore === undefined ? undefined : `${payload.suitabilityScore}/100`,
      suitabilityTone(payload.suitabilityScore)
    ),
    table(["Location", "Road Type", "Suitability", "Concerns"], rows, { title: "Road Assessment" }),
    list(payload.recommendations, { title: "Heavy Vehicle Recommendations" }),
  ]);
}

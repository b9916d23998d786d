/**
 * Elevation lookups and gradient analysis.
 *
 * Elevations come from the Open-Meteo elevation API, which needs no key and
 * answers up to 100 coordinates per request. The analysis is pure: sampled
 * points plus their elevations in, gradient profile out.
 */

import { z } from "zod";
import type {
  Coordinate,
  ElevationProfilePayload,
  GradientCategory,
  GradientRisk,
} from "@route-intel/types";
import { haversineDistance } from "../geo/index.js";
import type { UpstreamHttp } from "../upstream/client.js";
import { round1 } from "./provider.js";

const elevationSchema = z.object({
  elevation: z.array(z.number()),
});

/** Open-Meteo's per-request coordinate limit */
export const MAX_ELEVATION_POINTS = 100;

export async function fetchElevations(
  http: UpstreamHttp,
  points: readonly Coordinate[],
  signal: AbortSignal
): Promise<number[]> {
  const { elevation } = await http.get(
    "open-meteo",
    {
      url: "https://api.open-meteo.com/v1/elevation",
      params: {
        latitude: points.map((p) => p.lat).join(","),
        longitude: points.map((p) => p.lng).join(","),
      },
      signal,
    },
    elevationSchema
  );
  return elevation;
}

// ---------------------------------------------------------------------------
// Gradients
// ---------------------------------------------------------------------------

const STEEP_PERCENT = 8;
const CRITICAL_PERCENT = 12;
/** Elevation range above which the route counts as a major climb (m) */
const MAJOR_RANGE_METERS = 1000;

export function categorizeGradient(percent: number): GradientCategory {
  const abs = Math.abs(percent);
  if (abs <= 2) return "flat";
  if (abs <= 5) return "gentle";
  if (abs <= STEEP_PERCENT) return "moderate";
  if (abs <= CRITICAL_PERCENT) return "steep";
  return "very_steep";
}

export function overallGradientRisk(
  risks: readonly GradientRisk[]
): NonNullable<ElevationProfilePayload["overallRisk"]> {
  const critical = risks.filter((r) => r.riskLevel === "critical").length;
  const high = risks.filter((r) => r.riskLevel === "high").length;
  if (critical > 2) return "extreme";
  if (critical > 0 || high > 3) return "high";
  if (high > 0) return "medium";
  return "low";
}

/**
 * Build the elevation profile for sampled points. Points and elevations are
 * paired by index; segments of zero length carry no gradient.
 *
 * @throws Error when fewer than two points have an elevation
 */
export function analyzeElevationProfile(
  points: readonly Coordinate[],
  elevations: readonly number[]
): Omit<ElevationProfilePayload, "kind"> {
  const count = Math.min(points.length, elevations.length);
  if (count < 2) {
    throw new Error("not enough elevation data for a gradient profile");
  }

  const gradientDistribution: Partial<Record<GradientCategory, number>> = {};
  const riskSegments: GradientRisk[] = [];
  let maxClimb = 0;
  let maxDescent = 0;
  let ascent = 0;
  let descent = 0;
  let distanceKm = 0;

  for (let i = 1; i < count; i++) {
    const from = points[i - 1]!;
    const to = points[i]!;
    const rise = elevations[i]! - elevations[i - 1]!;
    if (rise > 0) ascent += rise;
    else descent -= rise;

    const meters = haversineDistance(from, to);
    const startKm = distanceKm;
    distanceKm += meters / 1000;
    if (meters === 0) continue;

    const gradient = (rise / meters) * 100;
    const category = categorizeGradient(gradient);
    gradientDistribution[category] = (gradientDistribution[category] ?? 0) + 1;
    maxClimb = Math.max(maxClimb, gradient);
    maxDescent = Math.min(maxDescent, gradient);

    if (Math.abs(gradient) > STEEP_PERCENT) {
      riskSegments.push({
        coordinate: { lat: to.lat, lng: to.lng },
        distanceKm: round1(startKm),
        gradientPercent: round1(gradient),
        riskLevel: Math.abs(gradient) > CRITICAL_PERCENT ? "critical" : "high",
      });
    }
  }

  const sampled = elevations.slice(0, count);
  const min = Math.min(...sampled);
  const max = Math.max(...sampled);
  const average = sampled.reduce((sum, e) => sum + e, 0) / count;

  // Steepest first, climbs and descents alike
  riskSegments.sort((a, b) => Math.abs(b.gradientPercent ?? 0) - Math.abs(a.gradientPercent ?? 0));

  const critical = riskSegments.filter((r) => r.riskLevel === "critical").length;
  const recommendations: string[] = [];
  if (critical > 0) {
    recommendations.push(
      `${critical} critical steep sections: use low gear on climbs and descents`,
      "Check the brake system before the journey",
      "Avoid overloading the vehicle for steep sections"
    );
  }
  if (max - min > MAJOR_RANGE_METERS) {
    recommendations.push(
      `Major elevation change of ${Math.round(max - min)} m: monitor engine temperature on climbs`,
      "Carry extra coolant and brake fluid"
    );
  }
  recommendations.push(
    "Maintain a steady speed on gradients",
    "Use engine braking on descents",
    "Keep an adequate following distance"
  );

  return {
    statistics: {
      minMeters: round1(min),
      maxMeters: round1(max),
      rangeMeters: round1(max - min),
      averageMeters: round1(average),
      totalAscentMeters: round1(ascent),
      totalDescentMeters: round1(descent),
    },
    gradientDistribution,
    maxClimbPercent: round1(maxClimb),
    maxDescentPercent: round1(maxDescent),
    riskSegments,
    overallRisk: overallGradientRisk(riskSegments),
    recommendations,
  };
}

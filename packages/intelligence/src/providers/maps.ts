/**
 * Maps provider, backed by Google Maps Platform.
 *
 * Terrain classification reverse-geocodes sampled route points. The
 * elevation profile grades the gradients between sampled points. The
 * heavy-vehicle suitability check snaps points to roads, classifies each
 * road by its name, and scores the route against estimated road widths and
 * the turn angles along it. It only runs when the vehicle class calls for
 * heavy-vehicle analysis.
 */

import { z } from "zod";
import type {
  ElevationProfilePayload,
  HeavyVehicleSuitabilityPayload,
  RoadSuitability,
  TerrainClassificationPayload,
  TerrainSample,
  TerrainType,
} from "@route-intel/types";
import { formatLatLng, sampleRoutePoints } from "../geo/index.js";
import type { UpstreamHttp } from "../upstream/client.js";
import { MAX_ELEVATION_POINTS, analyzeElevationProfile, fetchElevations } from "./elevation.js";
import { classifyArea, googleGet, reverseGeocode } from "./google.js";
import {
  DEFAULT_MAX_SAMPLE_POINTS,
  attempt,
  round1,
  type IntelligenceProvider,
  type OperationContext,
  type ProviderOperation,
  type SamplingOptions,
} from "./provider.js";

// ---------------------------------------------------------------------------
// Upstream schemas
// ---------------------------------------------------------------------------

const nearestRoadsSchema = z.object({
  snappedPoints: z
    .array(
      z.object({
        location: z.object({ latitude: z.number(), longitude: z.number() }),
        originalIndex: z.number().optional(),
        placeId: z.string(),
      })
    )
    .default([]),
});

const placeDetailsSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  result: z
    .object({
      name: z.string().optional(),
      types: z.array(z.string()).default([]),
    })
    .optional(),
});

// ---------------------------------------------------------------------------
// Road classification
// ---------------------------------------------------------------------------

const SAMPLE_LIMIT = 8;

export type RoadType =
  | "national_highway"
  | "state_highway"
  | "major_road"
  | "local_road";

/** Estimated carriageway width per road type, in meters */
const ROAD_WIDTHS: Record<RoadType, number> = {
  national_highway: 12,
  state_highway: 10,
  major_road: 8,
  local_road: 6,
};

/** Minimum width for safe heavy vehicle operation, in meters */
const MIN_HEAVY_VEHICLE_WIDTH = 7.5;

export function classifyRoadType(name: string | undefined, types: readonly string[]): RoadType {
  if (!types.includes("route")) return "local_road";
  const lower = (name ?? "").toLowerCase();
  if (/\bnh[\s-]?\d|\bnh\b|national highway|expressway/.test(lower)) return "national_highway";
  if (/\bsh[\s-]?\d|\bsh\b|state highway/.test(lower)) return "state_highway";
  return "major_road";
}

export function assessRoad(roadType: RoadType): Pick<RoadSuitability, "suitability" | "concerns"> {
  const width = ROAD_WIDTHS[roadType];
  const concerns: string[] = [];
  if (width < MIN_HEAVY_VEHICLE_WIDTH) {
    concerns.push(`Width ${width}m insufficient for safe heavy vehicle operation`);
  }
  if (roadType === "local_road") {
    concerns.push("Local road may have weight restrictions");
  }
  if (width < 10) {
    concerns.push("Limited overtaking opportunities");
  }

  let suitability: RoadSuitability["suitability"] = "unsuitable";
  if (width >= 10) suitability = "suitable";
  else if (width >= MIN_HEAVY_VEHICLE_WIDTH) suitability = "caution";
  return { suitability, concerns };
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface MapsProviderOptions extends SamplingOptions {
  /** Google Maps Platform API key */
  apiKey: string;
  http: UpstreamHttp;
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class MapsProvider implements IntelligenceProvider {
  readonly id = "maps" as const;
  readonly name = "Maps";
  readonly operations: readonly ProviderOperation[];

  private readonly apiKey: string;
  private readonly http: UpstreamHttp;
  private readonly maxSamplePoints: number;

  constructor(options: MapsProviderOptions) {
    if (options.apiKey.trim() === "") {
      throw new Error("Google Maps API key is required");
    }
    this.apiKey = options.apiKey;
    this.http = options.http;
    this.maxSamplePoints = options.maxSamplePoints ?? DEFAULT_MAX_SAMPLE_POINTS;

    this.operations = [
      {
        kind: "terrain-classification",
        run: (ctx) => attempt(() => this.classifyTerrain(ctx)),
      },
      {
        kind: "elevation-profile",
        run: (ctx) => attempt(() => this.profileElevation(ctx)),
      },
      {
        kind: "heavy-vehicle-suitability",
        heavyVehicleOnly: true,
        run: (ctx) => attempt(() => this.assessHeavyVehicleSuitability(ctx)),
      },
    ];
  }

  async classifyTerrain(ctx: OperationContext): Promise<TerrainClassificationPayload> {
    const points = sampleRoutePoints(ctx.route.points, Math.min(SAMPLE_LIMIT, this.maxSamplePoints));
    const samples = await Promise.all(
      points.map(async (point): Promise<TerrainSample> => {
        const area = classifyArea(await reverseGeocode(this.http, this.apiKey, point, ctx.signal));
        return { coordinate: { lat: point.lat, lng: point.lng }, ...area };
      })
    );

    const counts = new Map<TerrainType, number>();
    for (const sample of samples) {
      counts.set(sample.terrain, (counts.get(sample.terrain) ?? 0) + 1);
    }
    const distribution: Partial<Record<TerrainType, number>> = {};
    for (const [terrain, count] of counts) {
      distribution[terrain] = round1((count / samples.length) * 100);
    }
    return { kind: "terrain-classification", samples, distribution };
  }

  async profileElevation(ctx: OperationContext): Promise<ElevationProfilePayload> {
    const points = sampleRoutePoints(
      ctx.route.points,
      Math.min(MAX_ELEVATION_POINTS, this.maxSamplePoints)
    );
    const elevations = await fetchElevations(this.http, points, ctx.signal);
    return { kind: "elevation-profile", ...analyzeElevationProfile(points, elevations) };
  }

  async assessHeavyVehicleSuitability(
    ctx: OperationContext
  ): Promise<HeavyVehicleSuitabilityPayload> {
    const points = sampleRoutePoints(ctx.route.points, Math.min(SAMPLE_LIMIT, this.maxSamplePoints));
    const snapped = await this.http.get(
      "google-roads",
      {
        url: "https://roads.googleapis.com/v1/nearestRoads",
        params: { points: points.map(formatLatLng).join("|"), key: this.apiKey },
        signal: ctx.signal,
      },
      nearestRoadsSchema
    );

    // One road per place; the first snap wins
    const seen = new Set<string>();
    const unique = snapped.snappedPoints.filter((snap) => {
      if (seen.has(snap.placeId)) return false;
      seen.add(snap.placeId);
      return true;
    });

    const roads = await Promise.all(
      unique.map(async (snap): Promise<RoadSuitability> => {
        const details = await googleGet(
          this.http,
          "google-places",
          "https://maps.googleapis.com/maps/api/place/details/json",
          { place_id: snap.placeId, fields: "types,name", key: this.apiKey },
          placeDetailsSchema,
          ctx.signal
        );
        const roadType = classifyRoadType(details.result?.name, details.result?.types ?? []);
        return {
          coordinate: { lat: snap.location.latitude, lng: snap.location.longitude },
          roadType,
          ...assessRoad(roadType),
        };
      })
    );

    const impossibleTurns = ctx.route.turns.filter((t) => t.angleDegrees > 90).length;
    const difficultTurns = ctx.route.turns.filter(
      (t) => t.angleDegrees > 70 && t.angleDegrees <= 90
    ).length;
    const narrowRoads = roads.filter((r) => r.suitability === "unsuitable").length;
    const suitabilityScore = Math.max(
      0,
      Math.min(100, 100 - impossibleTurns * 25 - difficultTurns * 10 - narrowRoads * 15)
    );

    const recommendations: string[] = [];
    if (impossibleTurns > 0) {
      recommendations.push(
        `${impossibleTurns} turns too sharp for heavy vehicles: find an alternate route or use an escort vehicle`
      );
    }
    if (difficultTurns > 0) {
      recommendations.push(`${difficultTurns} very difficult turns: multi-point turns may be required`);
    }
    if (narrowRoads > 0) {
      recommendations.push(
        `${narrowRoads} road width concerns: conduct a physical width check and travel in low-traffic hours`
      );
    }
    if (recommendations.length === 0) {
      recommendations.push("Route is navigable for heavy vehicles at standard operating speeds");
    }

    return {
      kind: "heavy-vehicle-suitability",
      vehicleClass: ctx.vehicle.vehicleClass,
      suitabilityScore,
      roads,
      recommendations,
    };
  }
}

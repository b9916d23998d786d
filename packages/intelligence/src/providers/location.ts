/**
 * Location intelligence provider.
 *
 * Demographics reverse-geocode sampled points to estimate how urban the
 * route is. Business opportunities come from shopping centres found near
 * the route with the Places nearby search.
 */

import type {
  BusinessOpportunitiesPayload,
  CommercialCenter,
  DemographicsPayload,
  PopulationDensity,
  TerrainType,
} from "@route-intel/types";
import { sampleRoutePoints } from "../geo/index.js";
import type { UpstreamHttp } from "../upstream/client.js";
import { classifyArea, mergeUnique, reverseGeocode, searchNearby } from "./google.js";
import {
  DEFAULT_MAX_SAMPLE_POINTS,
  attempt,
  round1,
  type IntelligenceProvider,
  type OperationContext,
  type ProviderOperation,
  type SamplingOptions,
} from "./provider.js";

const DEMOGRAPHICS_SAMPLE_LIMIT = 8;
const BUSINESS_SAMPLE_LIMIT = 4;
const BUSINESS_SEARCH_RADIUS_M = 5000;

/** Tie-break order when two terrain types are equally common */
const TERRAIN_PRIORITY: readonly TerrainType[] = ["urban", "semi-urban", "rural"];

export function routeCharacter(urbanPercentage: number): PopulationDensity["routeCharacter"] {
  if (urbanPercentage >= 60) return "urban_corridor";
  if (urbanPercentage <= 25) return "rural_highway";
  return "mixed";
}

export function investmentGrade(centerCount: number): BusinessOpportunitiesPayload["investmentGrade"] {
  if (centerCount >= 6) return "A";
  if (centerCount >= 3) return "B";
  return "C";
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface LocationProviderOptions extends SamplingOptions {
  /** Google Maps Platform API key */
  googleMapsKey: string;
  http: UpstreamHttp;
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class LocationProvider implements IntelligenceProvider {
  readonly id = "location" as const;
  readonly name = "Location Intelligence";
  readonly operations: readonly ProviderOperation[];

  private readonly googleMapsKey: string;
  private readonly http: UpstreamHttp;
  private readonly maxSamplePoints: number;

  constructor(options: LocationProviderOptions) {
    if (options.googleMapsKey.trim() === "") {
      throw new Error("Google Maps API key is required");
    }
    this.googleMapsKey = options.googleMapsKey;
    this.http = options.http;
    this.maxSamplePoints = options.maxSamplePoints ?? DEFAULT_MAX_SAMPLE_POINTS;

    this.operations = [
      {
        kind: "demographics",
        run: (ctx) => attempt(() => this.analyzeDemographics(ctx)),
      },
      {
        kind: "business-opportunities",
        run: (ctx) => attempt(() => this.findBusinessOpportunities(ctx)),
      },
    ];
  }

  async analyzeDemographics(ctx: OperationContext): Promise<DemographicsPayload> {
    const points = sampleRoutePoints(
      ctx.route.points,
      Math.min(DEMOGRAPHICS_SAMPLE_LIMIT, this.maxSamplePoints)
    );
    const counts = new Map<TerrainType, number>();
    const localities: string[] = [];
    const geocoded = await Promise.all(
      points.map((point) => reverseGeocode(this.http, this.googleMapsKey, point, ctx.signal))
    );
    for (const res of geocoded) {
      const area = classifyArea(res);
      counts.set(area.terrain, (counts.get(area.terrain) ?? 0) + 1);
      if (area.locality && !localities.includes(area.locality)) {
        localities.push(area.locality);
      }
    }

    const total = points.length;
    const urbanPercentage = total > 0 ? round1(((counts.get("urban") ?? 0) / total) * 100) : 0;
    let predominantType: TerrainType | undefined;
    let highest = 0;
    for (const terrain of TERRAIN_PRIORITY) {
      const count = counts.get(terrain) ?? 0;
      if (count > highest) {
        highest = count;
        predominantType = terrain;
      }
    }

    return {
      kind: "demographics",
      populationDensity: {
        predominantType,
        urbanPercentage,
        routeCharacter: routeCharacter(urbanPercentage),
      },
      localities,
    };
  }

  async findBusinessOpportunities(ctx: OperationContext): Promise<BusinessOpportunitiesPayload> {
    const points = sampleRoutePoints(
      ctx.route.points,
      Math.min(BUSINESS_SAMPLE_LIMIT, this.maxSamplePoints)
    );
    const commercialCenters: CommercialCenter[] = [];
    const seen = new Set<string>();
    const found = await Promise.all(
      points.map((point) =>
        searchNearby(
          this.http,
          this.googleMapsKey,
          point,
          "shopping_mall",
          BUSINESS_SEARCH_RADIUS_M,
          ctx.signal
        )
      )
    );
    for (const places of found) {
      mergeUnique(
        commercialCenters,
        seen,
        places.map((p) => ({ name: p.name, address: p.vicinity, rating: p.rating }))
      );
    }

    const grade = investmentGrade(commercialCenters.length);
    const recommendedInvestments: string[] = [];
    if (grade === "A") {
      recommendedInvestments.push(
        "High commercial density: suitable for distribution hubs and retail logistics"
      );
    } else if (grade === "B") {
      recommendedInvestments.push("Moderate commercial activity: consider last-mile delivery points");
    } else {
      recommendedInvestments.push("Sparse commercial activity: roadside fuel and rest facilities");
    }
    const topRated = commercialCenters.find((c) => (c.rating ?? 0) >= 4.5);
    if (topRated?.name) {
      recommendedInvestments.push(`Partnership opportunities near ${topRated.name}`);
    }

    return {
      kind: "business-opportunities",
      commercialCenters,
      investmentGrade: grade,
      recommendedInvestments,
    };
  }
}

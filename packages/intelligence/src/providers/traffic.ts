/**
 * Traffic intelligence provider.
 *
 * Seasonal congestion comes from TomTom flow segment data sampled along the
 * route and scaled by a per-season factor. Construction zones come from the
 * HERE incidents API, which needs its own key.
 */

import { z } from "zod";
import type {
  CongestionLevel,
  ConstructionImpact,
  ConstructionZone,
  ConstructionZonesPayload,
  Season,
  SeasonalCongestionPayload,
  SeasonalPattern,
} from "@route-intel/types";
import { formatLatLng, routeBounds, sampleRoutePoints } from "../geo/index.js";
import type { UpstreamHttp } from "../upstream/client.js";
import {
  DEFAULT_MAX_SAMPLE_POINTS,
  attempt,
  requireSecret,
  round1,
  type IntelligenceProvider,
  type OperationContext,
  type ProviderOperation,
  type SamplingOptions,
} from "./provider.js";

// ---------------------------------------------------------------------------
// Upstream schemas
// ---------------------------------------------------------------------------

const flowSegmentSchema = z.object({
  flowSegmentData: z.object({
    currentSpeed: z.number(),
    freeFlowSpeed: z.number(),
  }),
});

const hereIncidentsSchema = z.object({
  results: z
    .array(
      z.object({
        location: z
          .object({
            description: z.string().optional(),
            shape: z
              .object({
                links: z.array(
                  z.object({ points: z.array(z.object({ lat: z.number(), lng: z.number() })) })
                ),
              })
              .optional(),
          })
          .optional(),
        incidentDetails: z.object({
          id: z.string().optional(),
          type: z.string().optional(),
          criticality: z.string().optional(),
          description: z.object({ value: z.string() }).optional(),
          startTime: z.string().optional(),
          endTime: z.string().optional(),
        }),
      })
    )
    .default([]),
});

type HereIncident = z.infer<typeof hereIncidentsSchema>["results"][number];

// ---------------------------------------------------------------------------
// Classification tables
// ---------------------------------------------------------------------------

const FLOW_SAMPLE_LIMIT = 5;

const SEASONS: readonly Season[] = ["winter", "spring", "summer", "monsoon"];

/** Multiplier applied to live congestion to estimate each season */
const SEASON_FACTORS: Record<Season, number> = {
  winter: 1.15,
  spring: 1.0,
  summer: 0.95,
  monsoon: 1.3,
};

const SEASON_PEAK_HOURS: Record<Season, string[]> = {
  winter: ["08:00-10:00", "17:00-20:00"],
  spring: ["08:00-10:00", "17:00-19:00"],
  summer: ["07:00-09:00", "18:00-20:00"],
  monsoon: ["08:00-11:00", "16:00-20:00"],
};

const PEAK_MONTHS: Partial<Record<Season, string[]>> = {
  winter: ["December", "January", "February"],
  monsoon: ["July", "August", "September"],
};

const CONSTRUCTION_KEYWORDS = [
  "construction",
  "roadwork",
  "road works",
  "maintenance",
  "repair",
  "bridge work",
  "resurfacing",
  "lane closure",
];

export function classifyCongestion(percent: number): CongestionLevel {
  if (percent > 60) return "severe";
  if (percent > 40) return "heavy";
  if (percent > 20) return "moderate";
  return "light";
}

export function assessConstructionImpact(
  activeCount: number,
  plannedCount: number
): ConstructionImpact {
  let overallImpact: ConstructionImpact["overallImpact"] = "minimal";
  if (activeCount > 3) overallImpact = "severe";
  else if (activeCount > 1) overallImpact = "moderate";

  return {
    overallImpact,
    totalZones: activeCount + plannedCount,
    delayEstimate: `${activeCount * 15}-${activeCount * 30} minutes`,
    alternateRouteRecommended: activeCount > 2,
  };
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface TrafficProviderOptions extends SamplingOptions {
  /** TomTom API key */
  tomtomKey: string;
  /** HERE API key; construction zones fail without it */
  hereKey?: string;
  http: UpstreamHttp;
  /** Injectable clock for testability */
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class TrafficProvider implements IntelligenceProvider {
  readonly id = "traffic" as const;
  readonly name = "Traffic Intelligence";
  readonly operations: readonly ProviderOperation[];

  private readonly tomtomKey: string;
  private readonly hereKey: string | undefined;
  private readonly http: UpstreamHttp;
  private readonly now: () => Date;
  private readonly maxSamplePoints: number;

  constructor(options: TrafficProviderOptions) {
    if (options.tomtomKey.trim() === "") {
      throw new Error("TomTom API key is required");
    }
    this.tomtomKey = options.tomtomKey;
    this.hereKey = options.hereKey;
    this.http = options.http;
    this.now = options.now ?? (() => new Date());
    this.maxSamplePoints = options.maxSamplePoints ?? DEFAULT_MAX_SAMPLE_POINTS;

    this.operations = [
      {
        kind: "seasonal-congestion",
        run: (ctx) => attempt(() => this.analyzeSeasonalCongestion(ctx)),
      },
      {
        kind: "construction-zones",
        run: (ctx) => attempt(() => this.detectConstructionZones(ctx)),
      },
    ];
  }

  async analyzeSeasonalCongestion(ctx: OperationContext): Promise<SeasonalCongestionPayload> {
    const points = sampleRoutePoints(ctx.route.points, Math.min(10, this.maxSamplePoints)).slice(
      0,
      FLOW_SAMPLE_LIMIT
    );
    if (points.length === 0) {
      throw new Error("route has no points to sample");
    }

    const flows = await Promise.all(
      points.map((point) =>
        this.http.get(
          "tomtom",
          {
            url: "https://api.tomtom.com/traffic/services/4/flowSegmentData/absolute/10/json",
            params: { point: formatLatLng(point), unit: "KMPH", key: this.tomtomKey },
            signal: ctx.signal,
          },
          flowSegmentSchema
        )
      )
    );

    let total = 0;
    for (const res of flows) {
      const { currentSpeed, freeFlowSpeed } = res.flowSegmentData;
      const ratio = freeFlowSpeed > 0 ? currentSpeed / freeFlowSpeed : 1;
      total += Math.max(0, (1 - ratio) * 100);
    }
    const baseCongestion = total / points.length;

    const seasonalPatterns: Partial<Record<Season, SeasonalPattern>> = {};
    const peakCongestionMonths: string[] = [];
    for (const season of SEASONS) {
      const averageCongestion = round1(Math.min(100, baseCongestion * SEASON_FACTORS[season]));
      seasonalPatterns[season] = {
        congestionLevel: classifyCongestion(averageCongestion),
        averageCongestion,
        peakHours: SEASON_PEAK_HOURS[season],
      };
      if (averageCongestion > 50) {
        peakCongestionMonths.push(...(PEAK_MONTHS[season] ?? []));
      }
    }

    return {
      kind: "seasonal-congestion",
      seasonalPatterns,
      peakCongestionMonths,
      recommendations: seasonalRecommendations(peakCongestionMonths),
    };
  }

  async detectConstructionZones(ctx: OperationContext): Promise<ConstructionZonesPayload> {
    const hereKey = requireSecret(this.hereKey, "HERE API key not provided");
    const bounds = routeBounds(ctx.route.points);
    if (!bounds) {
      throw new Error("route has no points to bound");
    }

    const res = await this.http.get(
      "here",
      {
        url: "https://data.traffic.hereapi.com/v7/incidents",
        params: {
          in: `bbox:${bounds.minLng},${bounds.minLat},${bounds.maxLng},${bounds.maxLat}`,
          locationReferencing: "shape",
          apiKey: hereKey,
        },
        signal: ctx.signal,
      },
      hereIncidentsSchema
    );

    const now = this.now().getTime();
    const activeConstruction: ConstructionZone[] = [];
    const plannedConstruction: ConstructionZone[] = [];
    for (const incident of res.results) {
      if (!isConstruction(incident)) continue;
      const zone = toConstructionZone(incident);
      const starts = zone.startTime ? Date.parse(zone.startTime) : NaN;
      if (!Number.isNaN(starts) && starts > now) {
        plannedConstruction.push(zone);
      } else {
        activeConstruction.push(zone);
      }
    }

    const impactAssessment = assessConstructionImpact(
      activeConstruction.length,
      plannedConstruction.length
    );
    return {
      kind: "construction-zones",
      activeConstruction,
      plannedConstruction,
      impactAssessment,
      recommendations: constructionRecommendations(activeConstruction.length, impactAssessment),
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isConstruction(incident: HereIncident): boolean {
  const type = incident.incidentDetails.type?.toLowerCase() ?? "";
  const description = incident.incidentDetails.description?.value.toLowerCase() ?? "";
  return CONSTRUCTION_KEYWORDS.some((k) => type.includes(k) || description.includes(k));
}

function toConstructionZone(incident: HereIncident): ConstructionZone {
  const details = incident.incidentDetails;
  const first = incident.location?.shape?.links[0]?.points[0];
  return {
    id: details.id,
    description: details.description?.value,
    severity: details.criticality,
    impact: details.type,
    startTime: details.startTime,
    endTime: details.endTime,
    roadName: incident.location?.description,
    coordinate: first ? { lat: first.lat, lng: first.lng } : undefined,
  };
}

function seasonalRecommendations(peakMonths: readonly string[]): string[] {
  const recommendations: string[] = [];
  if (peakMonths.includes("July") || peakMonths.includes("August")) {
    recommendations.push(
      "MONSOON ALERT: Expect 40-60% longer travel times during July-August",
      "Avoid travel during heavy rain warnings"
    );
  }
  if (peakMonths.includes("December") || peakMonths.includes("January")) {
    recommendations.push(
      "WINTER PEAK: Plan extra time during December-January holiday season",
      "Early morning travel (6-8 AM) recommended during winter months"
    );
  }
  recommendations.push(
    "Check seasonal traffic updates before departure",
    "Plan alternate routes during festival seasons",
    "Monitor monsoon forecasts for route adjustments"
  );
  return recommendations;
}

function constructionRecommendations(activeCount: number, impact: ConstructionImpact): string[] {
  const recommendations: string[] = [];
  if (activeCount > 0) {
    recommendations.push(
      `CONSTRUCTION ALERT: ${activeCount} active construction zones detected`,
      "Reduce speed in construction areas (25-40 km/h)",
      "Maintain extra following distance",
      "Follow temporary traffic signals and flaggers"
    );
  }
  if (impact.alternateRouteRecommended) {
    recommendations.push(
      "CONSIDER ALTERNATE ROUTE: Multiple construction zones may cause significant delays"
    );
  }
  recommendations.push(
    "Check local traffic updates for construction schedule changes",
    "Plan extra 20-30 minutes for construction delays"
  );
  return recommendations;
}

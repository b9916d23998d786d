/**
 * Emergency response provider.
 *
 * The response plan lists hospitals, police and fire stations near sampled
 * route points (Google Places nearby search) and scores how well the route
 * is covered. The communication plan is computed locally from gaps between
 * route points.
 */

import type {
  CommunicationSystemPayload,
  ContactLevel,
  CoverageAnalysis,
  ResponsePlanPayload,
  ServicePoint,
} from "@route-intel/types";
import { findGaps, formatLatLng, sampleRoutePoints } from "../geo/index.js";
import type { UpstreamHttp } from "../upstream/client.js";
import { mergeUnique, searchNearby, toServicePoint } from "./google.js";
import {
  DEAD_ZONE_GAP_KM,
  DEFAULT_MAX_SAMPLE_POINTS,
  attempt,
  type IntelligenceProvider,
  type OperationContext,
  type ProviderOperation,
  type SamplingOptions,
} from "./provider.js";

const SAMPLE_LIMIT = 4;
const SEARCH_RADIUS_M = 10000;

const CONTACT_HIERARCHY: readonly ContactLevel[] = [
  {
    level: 1,
    contactType: "Route supervisor",
    responseTime: "Immediate",
    purpose: "Incident report and immediate guidance",
  },
  {
    level: 2,
    contactType: "Fleet manager",
    responseTime: "Within 15 minutes",
    purpose: "Resource dispatch and route changes",
  },
  {
    level: 3,
    contactType: "Emergency coordinator",
    responseTime: "Within 30 minutes",
    purpose: "Coordination with emergency services",
  },
  {
    level: 4,
    contactType: "Senior management",
    responseTime: "Within 1 hour",
    purpose: "Escalation and stakeholder communication",
  },
];

export function gradeCoverage(score: number): CoverageAnalysis["overall"] {
  if (score >= 80) return "excellent";
  if (score >= 60) return "good";
  if (score >= 40) return "limited";
  return "poor";
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface EmergencyProviderOptions extends SamplingOptions {
  /** Google Maps Platform API key */
  googleMapsKey: string;
  /** Emergency dispatch API key; adds a dispatch channel to the communication plan */
  emergencyApiKey?: string;
  http: UpstreamHttp;
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class EmergencyProvider implements IntelligenceProvider {
  readonly id = "emergency" as const;
  readonly name = "Emergency Response";
  readonly operations: readonly ProviderOperation[];

  private readonly googleMapsKey: string;
  private readonly hasDispatchApi: boolean;
  private readonly http: UpstreamHttp;
  private readonly maxSamplePoints: number;

  constructor(options: EmergencyProviderOptions) {
    if (options.googleMapsKey.trim() === "") {
      throw new Error("Google Maps API key is required");
    }
    this.googleMapsKey = options.googleMapsKey;
    this.hasDispatchApi = (options.emergencyApiKey ?? "").trim() !== "";
    this.http = options.http;
    this.maxSamplePoints = options.maxSamplePoints ?? DEFAULT_MAX_SAMPLE_POINTS;

    this.operations = [
      {
        kind: "response-plan",
        run: (ctx) => attempt(() => this.buildResponsePlan(ctx)),
      },
      {
        kind: "communication-system",
        run: (ctx) => attempt(async () => this.planCommunication(ctx)),
      },
    ];
  }

  async buildResponsePlan(ctx: OperationContext): Promise<ResponsePlanPayload> {
    const points = sampleRoutePoints(ctx.route.points, Math.min(SAMPLE_LIMIT, this.maxSamplePoints));
    const hospitals: ServicePoint[] = [];
    const policeStations: ServicePoint[] = [];
    const fireStations: ServicePoint[] = [];
    const seen = { hospital: new Set<string>(), police: new Set<string>(), fire: new Set<string>() };
    const gaps: string[] = [];
    let coveredPoints = 0;

    // Per point: hospitals, police, fire stations
    const nearby = await Promise.all(
      points.map((point) => {
        const search = (type: string) =>
          searchNearby(this.http, this.googleMapsKey, point, type, SEARCH_RADIUS_M, ctx.signal);
        return Promise.all([search("hospital"), search("police"), search("fire_station")]);
      })
    );

    for (let i = 0; i < points.length; i++) {
      const point = points[i]!;
      const [nearbyHospitals, nearbyPolice, nearbyFire] = nearby[i]!;
      if (nearbyHospitals.length > 0) coveredPoints++;
      else gaps.push(`No hospital within ${SEARCH_RADIUS_M / 1000} km of ${formatLatLng(point)}`);
      mergeUnique(hospitals, seen.hospital, nearbyHospitals.map(toServicePoint));
      mergeUnique(policeStations, seen.police, nearbyPolice.map(toServicePoint));
      mergeUnique(fireStations, seen.fire, nearbyFire.map(toServicePoint));
    }

    const score = Math.round(
      (points.length > 0 ? (coveredPoints / points.length) * 60 : 0) +
        (Math.min(policeStations.length, 4) / 4) * 20 +
        (Math.min(fireStations.length, 4) / 4) * 20
    );
    return {
      kind: "response-plan",
      hospitals,
      policeStations,
      fireStations,
      coverage: { overall: gradeCoverage(score), score, gaps },
    };
  }

  planCommunication(ctx: OperationContext): CommunicationSystemPayload {
    const deadZones = findGaps(ctx.route.points, DEAD_ZONE_GAP_KM);

    const primaryChannels = [
      "Mobile voice call to 112 (national emergency number)",
      "Mobile data messaging with live location sharing",
    ];
    if (this.hasDispatchApi) {
      primaryChannels.push("Emergency dispatch API alerts");
    }

    const backupMethods: string[] = [];
    if (deadZones.length > 0) {
      backupMethods.push("Satellite phone for stretches without network coverage");
    }
    backupMethods.push(
      "Two-way radio with the fleet control room",
      "Scheduled check-in calls at planned stops"
    );

    return {
      kind: "communication-system",
      primaryChannels,
      backupMethods,
      deadZones,
      contactHierarchy: [...CONTACT_HIERARCHY],
    };
  }
}

/**
 * Real-time intelligence provider.
 *
 * Live traffic compares Google Distance Matrix travel times with and without
 * traffic for consecutive sampled segments, and adds TomTom incidents when a
 * TomTom key is configured. Fuel prices come from the Places API (New)
 * nearby search with fuel options.
 */

import { z } from "zod";
import type {
  Coordinate,
  FuelPriceAnalysis,
  FuelPricesPayload,
  FuelStation,
  LiveTrafficPayload,
  SegmentCondition,
  TrafficIncident,
} from "@route-intel/types";
import { formatLatLng, routeBounds, sampleRoutePoints } from "../geo/index.js";
import type { UpstreamHttp } from "../upstream/client.js";
import { googleGet, mergeUnique } from "./google.js";
import {
  DEFAULT_MAX_SAMPLE_POINTS,
  attempt,
  type IntelligenceProvider,
  type OperationContext,
  type ProviderOperation,
  type SamplingOptions,
} from "./provider.js";
import { classifyCongestion } from "./traffic.js";

// ---------------------------------------------------------------------------
// Upstream schemas
// ---------------------------------------------------------------------------

const distanceMatrixSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  rows: z
    .array(
      z.object({
        elements: z.array(
          z.object({
            status: z.string(),
            duration: z.object({ value: z.number() }).optional(),
            duration_in_traffic: z.object({ value: z.number() }).optional(),
          })
        ),
      })
    )
    .default([]),
});

const tomtomIncidentsSchema = z.object({
  incidents: z
    .array(
      z.object({
        properties: z.object({
          iconCategory: z.number(),
          magnitudeOfDelay: z.number().optional(),
          events: z.array(z.object({ description: z.string() })).default([]),
          delay: z.number().nullable().optional(),
        }),
      })
    )
    .default([]),
});

const fuelSearchSchema = z.object({
  places: z
    .array(
      z.object({
        displayName: z.object({ text: z.string() }).optional(),
        formattedAddress: z.string().optional(),
        location: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
        fuelOptions: z
          .object({
            fuelPrices: z
              .array(
                z.object({
                  type: z.string(),
                  price: z.object({
                    currencyCode: z.string(),
                    units: z.string().optional(),
                    nanos: z.number().optional(),
                  }),
                })
              )
              .default([]),
          })
          .optional(),
      })
    )
    .default([]),
});

type FuelPrice = NonNullable<
  z.infer<typeof fuelSearchSchema>["places"][number]["fuelOptions"]
>["fuelPrices"][number];

// ---------------------------------------------------------------------------
// Lookup tables
// ---------------------------------------------------------------------------

/** Distance Matrix allows 100 elements per request: 9 origins x 9 destinations */
const TRAFFIC_SAMPLE_LIMIT = 10;
const FUEL_SAMPLE_LIMIT = 3;
const FUEL_SEARCH_RADIUS_M = 5000;

const INCIDENT_TYPES: Record<number, string> = {
  1: "Accident",
  2: "Fog",
  3: "Dangerous conditions",
  4: "Rain",
  5: "Ice",
  6: "Jam",
  7: "Lane closed",
  8: "Road closed",
  9: "Road works",
  10: "Wind",
  11: "Flooding",
  14: "Broken down vehicle",
};

const INCIDENT_SEVERITIES: Record<number, string> = {
  1: "minor",
  2: "moderate",
  3: "major",
  4: "undefined",
};

const PETROL_TYPES = ["REGULAR_UNLEADED", "MIDGRADE", "PREMIUM"];

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RealtimeProviderOptions extends SamplingOptions {
  /** Google Maps Platform API key */
  googleMapsKey: string;
  /** TomTom API key; incidents are omitted without it */
  tomtomKey?: string;
  http: UpstreamHttp;
  /** Injectable clock for testability */
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class RealtimeProvider implements IntelligenceProvider {
  readonly id = "realtime" as const;
  readonly name = "Real-time Intelligence";
  readonly operations: readonly ProviderOperation[];

  private readonly googleMapsKey: string;
  private readonly tomtomKey: string | undefined;
  private readonly http: UpstreamHttp;
  private readonly now: () => Date;
  private readonly maxSamplePoints: number;

  constructor(options: RealtimeProviderOptions) {
    if (options.googleMapsKey.trim() === "") {
      throw new Error("Google Maps API key is required");
    }
    this.googleMapsKey = options.googleMapsKey;
    this.tomtomKey = options.tomtomKey?.trim() ? options.tomtomKey : undefined;
    this.http = options.http;
    this.now = options.now ?? (() => new Date());
    this.maxSamplePoints = options.maxSamplePoints ?? DEFAULT_MAX_SAMPLE_POINTS;

    this.operations = [
      {
        kind: "live-traffic",
        run: (ctx) => attempt(() => this.fetchLiveTraffic(ctx)),
      },
      {
        kind: "fuel-prices",
        run: (ctx) => attempt(() => this.fetchFuelPrices(ctx)),
      },
    ];
  }

  async fetchLiveTraffic(ctx: OperationContext): Promise<LiveTrafficPayload> {
    const points = sampleRoutePoints(
      ctx.route.points,
      Math.min(TRAFFIC_SAMPLE_LIMIT, this.maxSamplePoints)
    );
    if (points.length < 2) {
      throw new Error("need at least two sampled points for live traffic");
    }
    const origins = points.slice(0, -1);
    const destinations = points.slice(1);

    const matrix = await googleGet(
      this.http,
      "google-distance-matrix",
      "https://maps.googleapis.com/maps/api/distancematrix/json",
      {
        origins: origins.map(formatLatLng).join("|"),
        destinations: destinations.map(formatLatLng).join("|"),
        departure_time: "now",
        key: this.googleMapsKey,
      },
      distanceMatrixSchema,
      ctx.signal
    );

    // Segment i runs from origin i to destination i: the matrix diagonal
    const currentConditions: SegmentCondition[] = [];
    origins.forEach((origin, i) => {
      const element = matrix.rows[i]?.elements[i];
      if (!element || element.status !== "OK" || !element.duration || !element.duration_in_traffic) {
        return;
      }
      if (element.duration.value <= 0) return;
      const travelTimeIndex = round2(element.duration_in_traffic.value / element.duration.value);
      currentConditions.push({
        segmentId: i + 1,
        coordinate: { lat: origin.lat, lng: origin.lng },
        travelTimeIndex,
        congestionLevel: classifyCongestion(Math.max(0, (travelTimeIndex - 1) * 100)),
      });
    });

    const incidents = this.tomtomKey
      ? await this.fetchIncidents(this.tomtomKey, ctx)
      : undefined;

    return {
      kind: "live-traffic",
      currentConditions,
      incidents,
      lastUpdated: this.now().toISOString(),
    };
  }

  private async fetchIncidents(key: string, ctx: OperationContext): Promise<TrafficIncident[]> {
    const bounds = routeBounds(ctx.route.points);
    if (!bounds) return [];
    const res = await this.http.get(
      "tomtom",
      {
        url: "https://api.tomtom.com/traffic/services/5/incidentDetails",
        params: {
          bbox: `${bounds.minLng},${bounds.minLat},${bounds.maxLng},${bounds.maxLat}`,
          fields: "{incidents{properties{iconCategory,magnitudeOfDelay,events{description},delay}}}",
          language: "en-GB",
          key,
        },
        signal: ctx.signal,
      },
      tomtomIncidentsSchema
    );
    return res.incidents.map(({ properties: p }) => ({
      type: INCIDENT_TYPES[p.iconCategory] ?? "Unknown",
      description: p.events.map((e) => e.description).join("; ") || undefined,
      severity:
        p.magnitudeOfDelay !== undefined ? INCIDENT_SEVERITIES[p.magnitudeOfDelay] : undefined,
      estimatedDelay: p.delay ? `${Math.round(p.delay / 60)} min` : undefined,
      status: "active",
    }));
  }

  async fetchFuelPrices(ctx: OperationContext): Promise<FuelPricesPayload> {
    const points = sampleRoutePoints(
      ctx.route.points,
      Math.min(FUEL_SAMPLE_LIMIT, this.maxSamplePoints)
    );
    const stations: FuelStation[] = [];
    const seen = new Set<string>();
    const found = await Promise.all(points.map((point) => this.searchFuelStations(point, ctx.signal)));
    for (const nearby of found) {
      mergeUnique(stations, seen, nearby);
    }

    const priceAnalysis = analyzePrices(stations);
    const recommendations: string[] = [];
    if (stations.length === 0) {
      recommendations.push("No fuel stations found near the route: refuel before departure");
    }
    if (priceAnalysis?.cheapestStation) {
      recommendations.push(`Cheapest petrol found at ${priceAnalysis.cheapestStation}`);
    }
    if (priceAnalysis?.petrolPriceRange !== undefined && priceAnalysis.petrolPriceRange > 2) {
      recommendations.push("Petrol prices vary noticeably along the route: plan refuelling stops");
    }
    recommendations.push("Keep the tank above one quarter on long stretches");

    return { kind: "fuel-prices", stations, priceAnalysis, recommendations };
  }

  private async searchFuelStations(point: Coordinate, signal: AbortSignal): Promise<FuelStation[]> {
    const res = await this.http.post(
      "google-places",
      {
        url: "https://places.googleapis.com/v1/places:searchNearby",
        headers: {
          "X-Goog-Api-Key": this.googleMapsKey,
          "X-Goog-FieldMask":
            "places.displayName,places.formattedAddress,places.location,places.fuelOptions",
        },
        body: {
          includedTypes: ["gas_station"],
          maxResultCount: 5,
          locationRestriction: {
            circle: {
              center: { latitude: point.lat, longitude: point.lng },
              radius: FUEL_SEARCH_RADIUS_M,
            },
          },
        },
        signal,
      },
      fuelSearchSchema
    );

    return res.places.map((place) => {
      const prices = place.fuelOptions?.fuelPrices ?? [];
      const petrol = PETROL_TYPES.map((t) => prices.find((p) => p.type === t)).find(
        (p) => p !== undefined
      );
      const diesel = prices.find((p) => p.type === "DIESEL");
      return {
        name: place.displayName?.text,
        address: place.formattedAddress,
        coordinate: place.location
          ? { lat: place.location.latitude, lng: place.location.longitude }
          : undefined,
        petrolPrice: petrol ? priceValue(petrol) : undefined,
        dieselPrice: diesel ? priceValue(diesel) : undefined,
        currency: (petrol ?? diesel)?.price.currencyCode,
      };
    });
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function priceValue(fuel: FuelPrice): number {
  return round2(Number(fuel.price.units ?? "0") + (fuel.price.nanos ?? 0) / 1e9);
}

export function analyzePrices(stations: readonly FuelStation[]): FuelPriceAnalysis | undefined {
  const priced = stations.filter(
    (s): s is FuelStation & { petrolPrice: number } => s.petrolPrice !== undefined
  );
  if (priced.length === 0) return undefined;

  const prices = priced.map((s) => s.petrolPrice);
  const cheapest = priced.reduce((best, s) => (s.petrolPrice < best.petrolPrice ? s : best));
  return {
    averagePetrolPrice: round2(prices.reduce((sum, p) => sum + p, 0) / prices.length),
    petrolPriceRange: round2(Math.max(...prices) - Math.min(...prices)),
    cheapestStation: cheapest.name,
    currency: cheapest.currency,
  };
}

/**
 * Google Maps Platform helpers shared by the Maps, Realtime, Emergency and
 * Location providers.
 *
 * The legacy web services answer HTTP 200 even for rejected requests and put
 * the outcome in a `status` field, so every call goes through googleGet.
 */

import { z } from "zod";
import type { Coordinate, ServicePoint, TerrainType } from "@route-intel/types";
import { UpstreamError } from "../errors.js";
import { formatLatLng } from "../geo/index.js";
import type { ResponseSchema, UpstreamHttp } from "../upstream/client.js";

const ACCEPTED_STATUSES = new Set(["OK", "ZERO_RESULTS"]);

/**
 * GET a legacy Google web service and reject non-OK statuses.
 */
export async function googleGet<T extends { status: string; error_message?: string }>(
  http: UpstreamHttp,
  service: string,
  url: string,
  params: Record<string, string | number>,
  schema: ResponseSchema<T>,
  signal: AbortSignal
): Promise<T> {
  const res = await http.get(service, { url, params, signal }, schema);
  if (!ACCEPTED_STATUSES.has(res.status)) {
    const detail = res.error_message ? ` (${res.error_message})` : "";
    throw new UpstreamError(service, `${res.status}${detail}`);
  }
  return res;
}

// ---------------------------------------------------------------------------
// Geocoding
// ---------------------------------------------------------------------------

export const geocodeSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        formatted_address: z.string().optional(),
        types: z.array(z.string()).default([]),
        address_components: z
          .array(z.object({ long_name: z.string(), types: z.array(z.string()) }))
          .default([]),
      })
    )
    .default([]),
});

export type GeocodeResponse = z.infer<typeof geocodeSchema>;

export interface AreaClassification {
  terrain: TerrainType;
  locality?: string;
}

export function reverseGeocode(
  http: UpstreamHttp,
  key: string,
  point: Coordinate,
  signal: AbortSignal
): Promise<GeocodeResponse> {
  return googleGet(
    http,
    "google-geocoding",
    "https://maps.googleapis.com/maps/api/geocode/json",
    { latlng: formatLatLng(point), key },
    geocodeSchema,
    signal
  );
}

/**
 * Classify the area around a reverse-geocoded point from the place types of
 * its best match and that match's address components.
 */
export function classifyArea(res: GeocodeResponse): AreaClassification {
  const best = res.results[0];
  if (!best) return { terrain: "rural" };

  const types = new Set(best.types);
  for (const component of best.address_components) {
    for (const t of component.types) types.add(t);
  }
  const locality = best.address_components.find((c) => c.types.includes("locality"))?.long_name;

  if (types.has("sublocality") || types.has("neighborhood")) {
    return { terrain: "urban", locality };
  }
  if (types.has("locality") || types.has("postal_town") || types.has("administrative_area_level_3")) {
    return { terrain: "semi-urban", locality };
  }
  return { terrain: "rural", locality };
}

// ---------------------------------------------------------------------------
// Places nearby search
// ---------------------------------------------------------------------------

export const nearbySearchSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        name: z.string().optional(),
        vicinity: z.string().optional(),
        rating: z.number().optional(),
        geometry: z
          .object({ location: z.object({ lat: z.number(), lng: z.number() }) })
          .optional(),
      })
    )
    .default([]),
});

export type NearbyPlace = z.infer<typeof nearbySearchSchema>["results"][number];

export async function searchNearby(
  http: UpstreamHttp,
  key: string,
  point: Coordinate,
  type: string,
  radiusMeters: number,
  signal: AbortSignal
): Promise<NearbyPlace[]> {
  const res = await googleGet(
    http,
    "google-places",
    "https://maps.googleapis.com/maps/api/place/nearbysearch/json",
    { location: formatLatLng(point), radius: radiusMeters, type, key },
    nearbySearchSchema,
    signal
  );
  return res.results;
}

export function toServicePoint(place: NearbyPlace): ServicePoint {
  return {
    name: place.name,
    address: place.vicinity,
    coordinate: place.geometry ? { ...place.geometry.location } : undefined,
  };
}

/**
 * Append places not already present, keyed by name and address.
 */
export function mergeUnique<T extends { name?: string; address?: string }>(
  into: T[],
  seen: Set<string>,
  items: readonly T[]
): void {
  for (const item of items) {
    const key = `${item.name ?? ""}|${item.address ?? ""}`;
    if (seen.has(key)) continue;
    seen.add(key);
    into.push(item);
  }
}

/**
 * Geometry helpers shared by providers.
 */

import type { BoundingBox, Coordinate } from "@route-intel/types";

const EARTH_RADIUS_METERS = 6371000;

/**
 * Great-circle distance between two coordinates in meters.
 */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  const toRad = Math.PI / 180;
  const dLat = (b.lat - a.lat) * toRad;
  const dLng = (b.lng - a.lng) * toRad;
  const sinHalfLat = Math.sin(dLat / 2);
  const sinHalfLng = Math.sin(dLng / 2);
  const h =
    sinHalfLat * sinHalfLat +
    Math.cos(a.lat * toRad) * Math.cos(b.lat * toRad) * sinHalfLng * sinHalfLng;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(h));
}

/**
 * Total length of a polyline in kilometers.
 */
export function pathLengthKm(points: readonly Coordinate[]): number {
  let meters = 0;
  for (let i = 1; i < points.length; i++) {
    meters += haversineDistance(points[i - 1]!, points[i]!);
  }
  return meters / 1000;
}

/**
 * Pick at most `maxPoints` points spread evenly along the route.
 *
 * Keeps every `step`-th point, where step = floor(length / maxPoints),
 * then truncates to `maxPoints`. Routes already within the limit are
 * returned unchanged.
 */
export function sampleRoutePoints<T extends Coordinate>(
  points: readonly T[],
  maxPoints: number
): T[] {
  if (maxPoints <= 0) return [];
  if (points.length <= maxPoints) return [...points];

  const step = Math.floor(points.length / maxPoints);
  const sampled: T[] = [];
  for (let i = 0; i < points.length && sampled.length < maxPoints; i += step) {
    sampled.push(points[i]!);
  }
  return sampled;
}

/**
 * Smallest bounding box containing every point.
 *
 * @returns null for an empty point list
 */
export function routeBounds(points: readonly Coordinate[]): BoundingBox | null {
  if (points.length === 0) return null;

  let minLat = Infinity;
  let maxLat = -Infinity;
  let minLng = Infinity;
  let maxLng = -Infinity;
  for (const p of points) {
    if (p.lat < minLat) minLat = p.lat;
    if (p.lat > maxLat) maxLat = p.lat;
    if (p.lng < minLng) minLng = p.lng;
    if (p.lng > maxLng) maxLng = p.lng;
  }
  return { minLat, maxLat, minLng, maxLng };
}

/** Format a coordinate as "lat,lng" with 6 decimals */
export function formatLatLng(c: Coordinate): string {
  return `${c.lat.toFixed(6)},${c.lng.toFixed(6)}`;
}

export interface PointGap {
  from: Coordinate;
  to: Coordinate;
  gapKm: number;
}

/**
 * Consecutive point pairs further apart than `minGapKm`, a proxy for
 * stretches with no nearby infrastructure.
 */
export function findGaps(points: readonly Coordinate[], minGapKm: number): PointGap[] {
  const gaps: PointGap[] = [];
  for (let i = 1; i < points.length; i++) {
    const from = points[i - 1]!;
    const to = points[i]!;
    const gapKm = haversineDistance(from, to) / 1000;
    if (gapKm > minGapKm) {
      gaps.push({
        from: { lat: from.lat, lng: from.lng },
        to: { lat: to.lat, lng: to.lng },
        gapKm: Math.round(gapKm * 10) / 10,
      });
    }
  }
  return gaps;
}

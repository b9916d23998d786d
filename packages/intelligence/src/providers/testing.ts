/**
 * Shared fixtures for provider tests.
 */

import type { RouteContext, Turn, VehicleDescriptor } from "@route-intel/types";
import { createRouteContext, requiresHeavyVehicleAnalysis } from "../route/context.js";
import type { OperationContext } from "./provider.js";

/** Three points south-east of Bengaluru */
export const DEFAULT_POINTS = [
  { lat: 12.97, lng: 77.59 },
  { lat: 12.98, lng: 77.6 },
  { lat: 12.99, lng: 77.61 },
];

export function makeRoute(
  options: {
    pointCount?: number;
    vehicle?: VehicleDescriptor;
    turns?: Turn[];
    distanceKm?: number;
    durationHours?: number;
  } = {}
): RouteContext {
  const points =
    options.pointCount === undefined
      ? DEFAULT_POINTS
      : Array.from({ length: options.pointCount }, (_, i) => ({
          lat: 12.97 + i * 0.01,
          lng: 77.59 + i * 0.01,
        }));
  return createRouteContext({
    points,
    turns: options.turns ?? [],
    vehicle: options.vehicle ?? { vehicleClass: "car" },
    origin: "Bengaluru",
    destination: "Hosur",
    distanceKm: options.distanceKm,
    durationHours: options.durationHours,
  });
}

export function makeContext(route: RouteContext = makeRoute()): OperationContext {
  return {
    route,
    vehicle: route.vehicle,
    heavyVehicle: requiresHeavyVehicleAnalysis(route.vehicle),
    signal: new AbortController().signal,
  };
}

/**
 * Route context construction.
 *
 * Validates raw route input and returns a deep-frozen RouteContext. Every
 * provider reads the same instance.
 */

import { z } from "zod";
import type { RouteContext, VehicleDescriptor } from "@route-intel/types";
import { RouteValidationError } from "../errors.js";

export const coordinateSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

export const vehicleSchema = z.object({
  vehicleClass: z.enum([
    "car",
    "two_wheeler",
    "light_motor_vehicle",
    "medium_goods_vehicle",
    "heavy_goods_vehicle",
    "bus",
  ]),
  weightKg: z.number().positive().optional(),
  fuelType: z.enum(["petrol", "diesel", "cng", "electric"]).optional(),
  baseConsumptionLPer100Km: z.number().positive().optional(),
  heightMeters: z.number().positive().optional(),
  axleCount: z.number().int().positive().optional(),
});

export const turnSchema = z.object({
  coordinate: coordinateSchema,
  angleDegrees: z.number().min(0).max(180),
  direction: z.enum(["left", "right"]).optional(),
  classification: z.string().optional(),
});

export const routeInputSchema = z.object({
  points: z.array(coordinateSchema).min(2, "a route needs at least two points"),
  turns: z.array(turnSchema).default([]),
  vehicle: vehicleSchema,
  origin: z.string().trim().min(1),
  destination: z.string().trim().min(1),
  distanceKm: z.number().nonnegative().optional(),
  durationHours: z.number().nonnegative().optional(),
});

/**
 * Validate route input and freeze it.
 *
 * @throws RouteValidationError listing every problem found
 */
export function createRouteContext(input: unknown): RouteContext {
  const parsed = routeInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new RouteValidationError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return deepFreeze(parsed.data);
}

/**
 * Whether this run should request heavy-vehicle-only operations.
 */
export function requiresHeavyVehicleAnalysis(vehicle: Readonly<VehicleDescriptor>): boolean {
  return (
    vehicle.vehicleClass === "heavy_goods_vehicle" ||
    vehicle.vehicleClass === "medium_goods_vehicle" ||
    vehicle.vehicleClass === "bus"
  );
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

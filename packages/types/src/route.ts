/**
 * Route description - the immutable input of a report run.
 *
 * A route is a polyline of sampled points plus the turns along it and the
 * vehicle that will drive it. Every provider reads the same RouteContext;
 * none may modify it.
 */

import type { Coordinate } from "./geo.js";

/** Vehicle classes recognised by the report pipeline */
export type VehicleClass =
  | "car"
  | "two_wheeler"
  | "light_motor_vehicle"
  | "medium_goods_vehicle"
  | "heavy_goods_vehicle"
  | "bus";

/** Description of the vehicle driving the route */
export interface VehicleDescriptor {
  vehicleClass: VehicleClass;
  /** Gross weight in kilograms */
  weightKg?: number;
  fuelType?: "petrol" | "diesel" | "cng" | "electric";
  /** Manufacturer consumption figure (L/100km) */
  baseConsumptionLPer100Km?: number;
  heightMeters?: number;
  axleCount?: number;
}

/** A turn along the route */
export interface Turn {
  coordinate: Coordinate;
  /** Deflection angle in degrees (0 = straight on, 180 = U-turn) */
  angleDegrees: number;
  direction?: "left" | "right";
  /** Free-form label from the route source, e.g. "hairpin" */
  classification?: string;
}

/** Immutable description of the route under analysis */
export interface RouteContext {
  readonly points: readonly Readonly<Coordinate>[];
  readonly turns: readonly Readonly<Turn>[];
  readonly vehicle: Readonly<VehicleDescriptor>;
  /** Origin address as entered by the user */
  readonly origin: string;
  /** Destination address as entered by the user */
  readonly destination: string;
  /** Route length in kilometers, if the route source supplied one */
  readonly distanceKm?: number;
  /** Planned driving time in hours, if the route source supplied one */
  readonly durationHours?: number;
}

/** Raw route input, before validation and freezing */
export interface RouteInput {
  points: Coordinate[];
  turns?: Turn[];
  vehicle: VehicleDescriptor;
  origin: string;
  destination: string;
  distanceKm?: number;
  durationHours?: number;
}

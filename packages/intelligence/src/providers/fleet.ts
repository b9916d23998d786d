/**
 * Fleet intelligence provider.
 *
 * Credential-free: every operation is computed locally from the route and
 * the vehicle descriptor.
 */

import type {
  ComplianceTrackingPayload,
  DriverBehaviorPayload,
  FuelEfficiency,
  RouteContext,
  SafetyScores,
  VehicleClass,
  VehiclePerformancePayload,
} from "@route-intel/types";
import { findGaps, pathLengthKm } from "../geo/index.js";
import {
  DEAD_ZONE_GAP_KM,
  attempt,
  round1,
  type IntelligenceProvider,
  type OperationContext,
  type ProviderOperation,
} from "./provider.js";

// ---------------------------------------------------------------------------
// Reference figures
// ---------------------------------------------------------------------------

/** Gross weight assumed when the vehicle descriptor has none */
export const DEFAULT_WEIGHT_KG = 18000;

/** Base fuel consumption by vehicle class, L/100km */
const BASE_CONSUMPTION: Record<VehicleClass, number> = {
  car: 8,
  two_wheeler: 3,
  light_motor_vehicle: 12,
  medium_goods_vehicle: 18,
  heavy_goods_vehicle: 25,
  bus: 22,
};

/** Average speed used to estimate driving time when none is supplied */
const ASSUMED_SPEED_KMH = 50;

export function weightFactor(weightKg: number): number {
  if (weightKg > 20000) return 1.2;
  if (weightKg > 15000) return 1.1;
  if (weightKg > 10000) return 1.0;
  return 0.9;
}

export function rateEfficiency(litersPer100Km: number): FuelEfficiency["efficiencyRating"] {
  if (litersPer100Km < 15) return "excellent";
  if (litersPer100Km < 20) return "good";
  if (litersPer100Km < 25) return "average";
  return "poor";
}

export function rateSafety(score: number): SafetyScores["rating"] {
  if (score >= 90) return "excellent";
  if (score >= 75) return "good";
  if (score >= 60) return "fair";
  return "poor";
}

function routeDistanceKm(route: RouteContext): number {
  return route.distanceKm ?? pathLengthKm(route.points);
}

function drivingHours(route: RouteContext): number {
  return route.durationHours ?? routeDistanceKm(route) / ASSUMED_SPEED_KMH;
}

// ---------------------------------------------------------------------------
// Provider
// ---------------------------------------------------------------------------

export class FleetProvider implements IntelligenceProvider {
  readonly id = "fleet" as const;
  readonly name = "Fleet Intelligence";
  readonly operations: readonly ProviderOperation[] = [
    {
      kind: "vehicle-performance",
      run: (ctx) => attempt(async () => analyzeVehiclePerformance(ctx)),
    },
    {
      kind: "driver-behavior",
      run: (ctx) => attempt(async () => assessDriverBehavior(ctx)),
    },
    {
      kind: "compliance-tracking",
      run: (ctx) => attempt(async () => trackCompliance(ctx)),
    },
  ];
}

export function analyzeVehiclePerformance(ctx: OperationContext): VehiclePerformancePayload {
  const { vehicle, route } = ctx;
  const baseConsumptionRate =
    vehicle.baseConsumptionLPer100Km ?? BASE_CONSUMPTION[vehicle.vehicleClass];
  const weightAdjustmentFactor = weightFactor(vehicle.weightKg ?? DEFAULT_WEIGHT_KG);

  const turnCount = route.turns.length;
  let routeDifficultyFactor = 1.0;
  if (turnCount > 20) routeDifficultyFactor += 0.15;
  else if (turnCount > 10) routeDifficultyFactor += 0.1;

  const adjustedConsumptionRate = round1(
    baseConsumptionRate * weightAdjustmentFactor * routeDifficultyFactor
  );
  const estimatedFuelLiters = round1((adjustedConsumptionRate / 100) * routeDistanceKm(route));

  const recommendations: string[] = [];
  if (routeDifficultyFactor > 1.1) {
    recommendations.push(
      "Route has challenging conditions - use cruise control on straight sections"
    );
  }
  if (turnCount > 15) {
    recommendations.push("Many sharp turns detected - practice smooth acceleration and braking");
  }
  recommendations.push(
    "Maintain steady speeds for optimal fuel efficiency",
    "Plan route to avoid heavy traffic and stop-and-go conditions",
    "Regular vehicle maintenance improves fuel efficiency by 10-15%",
    "Proper tire pressure can improve efficiency by 3-5%"
  );

  return {
    kind: "vehicle-performance",
    fuelEfficiency: {
      baseConsumptionRate,
      adjustedConsumptionRate,
      estimatedFuelLiters,
      efficiencyRating: rateEfficiency(adjustedConsumptionRate),
      weightAdjustmentFactor,
      routeDifficultyFactor,
    },
    recommendations,
  };
}

export function assessDriverBehavior(ctx: OperationContext): DriverBehaviorPayload {
  const { route } = ctx;
  const extremeTurns = route.turns.filter((t) => t.angleDegrees > 80).length;
  const dangerTurns = route.turns.filter(
    (t) => t.angleDegrees >= 70 && t.angleDegrees <= 80
  ).length;
  const deadZones = findGaps(route.points, DEAD_ZONE_GAP_KM).length;
  const hours = drivingHours(route);

  const overall = Math.max(0, 100 - extremeTurns * 15 - dangerTurns * 10 - deadZones * 5);
  const turnSafety = Math.max(0, 100 - (extremeTurns * 20 + dangerTurns * 15));
  let fatigueSafety = 100;
  if (hours > 10) fatigueSafety = 50;
  else if (hours > 8) fatigueSafety = 65;
  else if (hours > 4) fatigueSafety = 85;

  const criticalFactors: string[] = [];
  if (extremeTurns > 0) {
    criticalFactors.push(`${extremeTurns} extreme turns (over 80°) require very low speed`);
  }
  if (deadZones > 0) {
    criticalFactors.push(`${deadZones} stretches without network coverage`);
  }
  if (hours > 8) {
    criticalFactors.push(`${round1(hours)} hours of driving: fatigue risk`);
  }

  return {
    kind: "driver-behavior",
    safetyScores: {
      overall,
      turnSafety,
      fatigueSafety,
      rating: rateSafety(overall),
      criticalFactors,
    },
  };
}

export function trackCompliance(ctx: OperationContext): ComplianceTrackingPayload {
  const { route, vehicle } = ctx;
  const distanceKm = routeDistanceKm(route);
  let score = 100;
  const actionItems: string[] = [];

  if (ctx.heavyVehicle) {
    score -= 20;
    actionItems.push("Install and verify an AIS-140 compliant GPS tracking device");
  }
  if (route.turns.length >= 20) {
    score -= 15;
    actionItems.push("High-risk route: complete a route safety assessment before dispatch");
  }
  if (vehicle.fuelType !== "electric") {
    score -= 10;
    actionItems.push("Verify BS6 emission compliance and a valid pollution certificate");
  }
  if (distanceKm > 500) {
    actionItems.push("Schedule mandatory driver rest breaks for a route over 500 km");
  }
  if (distanceKm > 1000) {
    actionItems.push("Assign a co-driver and enforce breaks every 4 hours");
  }
  actionItems.push("Carry registration, insurance, driver and permit documents");

  return {
    kind: "compliance-tracking",
    complianceScore: Math.max(60, score),
    actionItems,
  };
}

import type {
  ComplianceTrackingPayload,
  DriverBehaviorPayload,
  Section,
  SummaryBlock,
  VehiclePerformancePayload,
} from "@route-intel/types";
import { humanize, list, section, summary } from "./blocks.js";

function ratingTone(rating: string | undefined): SummaryBlock["tone"] {
  switch (rating) {
    case "excellent":
    case "good":
      return "good";
    case "average":
    case "fair":
      return "fair";
    case "poor":
      return "bad";
    default:
      return undefined;
  }
}

function scoreTone(score: number | undefined): SummaryBlock["tone"] {
  if (score === undefined) return undefined;
  if (score >= 80) return "good";
  if (score >= 60) return "fair";
  return "bad";
}

function withSuffix(value: number | undefined, suffix: string): string | undefined {
  return value === undefined ? undefined : `${value}${suffix}`;
}

export function composeVehiclePerformance(payload: VehiclePerformancePayload): Section[] {
  const fe = payload.fuelEfficiency;
  return section("fleet", "vehicle-performance", "Vehicle Performance", "info", [
    summary("Base Consumption", withSuffix(fe?.baseConsumptionRate, " L/100km")),
    summary("Adjusted Consumption", withSuffix(fe?.adjustedConsumptionRate, " L/100km")),
    summary("Estimated Fuel", withSuffix(fe?.estimatedFuelLiters, " L")),
    summary(
      "Efficiency Rating",
      fe?.efficiencyRating && humanize(fe.efficiencyRating),
      ratingTone(fe?.efficiencyRating)
    ),
    list(payload.recommendations, { title: "Performance Recommendations" }),
  ]);
}

export function composeDriverBehavior(payload: DriverBehaviorPayload): Section[] {
  const scores = payload.safetyScores;
  return section("fleet", "driver-behavior", "Driver Safety Analysis", "warning", [
    summary("Overall Safety", withSuffix(scores?.overall, "/100"), scoreTone(scores?.overall)),
    summary("Turn Safety", withSuffix(scores?.turnSafety, "/100"), scoreTone(scores?.turnSafety)),
    summary(
      "Fatigue Safety",
      withSuffix(scores?.fatigueSafety, "/100"),
      scoreTone(scores?.fatigueSafety)
    ),
    summary("Safety Rating", scores?.rating && humanize(scores.rating), ratingTone(scores?.rating)),
    list(scores?.criticalFactors, { title: "Critical Factors" }),
  ]);
}

export function composeComplianceTracking(payload: ComplianceTrackingPayload): Section[] {
  return section("fleet", "compliance-tracking", "Regulatory Compliance", "primary", [
    summary(
      "Compliance Score",
      withSuffix(payload.complianceScore, "/100"),
      scoreTone(payload.complianceScore)
    ),
    list(payload.actionItems, { title: "Action Items", ordered: true }),
  ]);
}

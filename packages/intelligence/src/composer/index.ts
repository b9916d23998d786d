/**
 * Section composer.
 *
 * Translates operation payloads into report sections. Pure: no I/O, and
 * the same payload always yields the same sections.
 */

import type { OperationPayload, Section } from "@route-intel/types";
import { composeCommunicationSystem, composeResponsePlan } from "./emergency.js";
import {
  composeComplianceTracking,
  composeDriverBehavior,
  composeVehiclePerformance,
} from "./fleet.js";
import { composeBusinessOpportunities, composeDemographics } from "./location.js";
import {
  composeElevationProfile,
  composeHeavyVehicleSuitability,
  composeTerrainClassification,
} from "./maps.js";
import { composeFuelPrices, composeLiveTraffic } from "./realtime.js";
import { composeConstructionZones, composeSeasonalCongestion } from "./traffic.js";
import { composeCurrentConditions, composeMonsoonRisks, composeSummerRisks } from "./weather.js";

export { CAPS, cleanText } from "./blocks.js";

export function composeSections(payload: OperationPayload): Section[] {
  switch (payload.kind) {
    case "seasonal-congestion":
      return composeSeasonalCongestion(payload);
    case "construction-zones":
      return composeConstructionZones(payload);
    case "current-conditions":
      return composeCurrentConditions(payload);
    case "summer-risks":
      return composeSummerRisks(payload);
    case "monsoon-risks":
      return composeMonsoonRisks(payload);
    case "terrain-classification":
      return composeTerrainClassification(payload);
    case "elevation-profile":
      return composeElevationProfile(payload);
    case "heavy-vehicle-suitability":
      return composeHeavyVehicleSuitability(payload);
    case "live-traffic":
      return composeLiveTraffic(payload);
    case "fuel-prices":
      return composeFuelPrices(payload);
    case "vehicle-performance":
      return composeVehiclePerformance(payload);
    case "driver-behavior":
      return composeDriverBehavior(payload);
    case "compliance-tracking":
      return composeComplianceTracking(payload);
    case "response-plan":
      return composeResponsePlan(payload);
    case "communication-system":
      return composeCommunicationSystem(payload);
    case "demographics":
      return composeDemographics(payload);
    case "business-opportunities":
      return composeBusinessOpportunities(payload);
    default: {
      const unhandled: never = payload;
      throw new Error(`No composer for payload ${JSON.stringify(unhandled)}`);
    }
  }
}

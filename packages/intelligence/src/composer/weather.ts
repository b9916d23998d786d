import type {
  CurrentConditionsPayload,
  MonsoonRisksPayload,
  RiskArea,
  Section,
  SummerRisksPayload,
} from "@route-intel/types";
import { CAPS, cell, formatCoordinate, humanize, list, section, table } from "./blocks.js";

export function composeCurrentConditions(payload: CurrentConditionsPayload): Section[] {
  const rows = (payload.observations ?? []).map((o) => [
    formatCoordinate(o.coordinate),
    cell(o.temperatureC, " °C"),
    humanize(o.condition),
    cell(o.humidity, "%"),
    cell(o.windSpeedKmh, " km/h"),
    cell(o.visibilityKm, " km"),
  ]);
  return section("weather", "current-conditions", "Current Weather Along Route", "info", [
    table(["Location", "Temperature", "Condition", "Humidity", "Wind", "Visibility"], rows),
  ]);
}

export function composeSummerRisks(payload: SummerRisksPayload): Section[] {
  const hotspots = payload.temperatureHotspots ?? [];
  const rows = hotspots.map((h) => [
    formatCoordinate(h.coordinate),
    cell(h.maxTemperatureC, " °C"),
    humanize(h.riskLevel),
  ]);
  return section("weather", "summer-risks", "Summer Heat Risks", "danger", [
    table(["Location", "Max Temperature", "Risk Level"], rows, {
      title: "Temperature Hotspots",
      cap: CAPS.hotspots,
    }),
    list(hotspots[0]?.recommendations, { title: "Extreme Heat Precautions" }),
    list(payload.recommendations, { title: "Summer Travel Recommendations" }),
  ]);
}

function riskRows(areas: readonly RiskArea[] | undefined): string[][] {
  return (areas ?? []).map((a) => [
    formatCoordinate(a.coordinate),
    cell(a.precipitationMm, " mm"),
    cell(a.elevationMeters, " m"),
    humanize(a.riskLevel),
  ]);
}

export function composeMonsoonRisks(payload: MonsoonRisksPayload): Section[] {
  const columns = ["Location", "Precipitation", "Elevation", "Risk Level"];
  return section("weather", "monsoon-risks", "Monsoon Risks", "danger", [
    table(columns, riskRows(payload.floodProneAreas), {
      title: "Flood-Prone Areas",
      cap: CAPS.hotspots,
    }),
    table(columns, riskRows(payload.landslideZones), {
      title: "Landslide Zones",
      cap: CAPS.hotspots,
    }),
    list(payload.recommendations, { title: "Monsoon Recommendations" }),
  ]);
}

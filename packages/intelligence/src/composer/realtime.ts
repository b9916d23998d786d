import type { FuelPricesPayload, LiveTrafficPayload, Section } from "@route-intel/types";
import { CAPS, cell, formatCoordinate, humanize, list, section, summary, table } from "./blocks.js";

export function composeLiveTraffic(payload: LiveTrafficPayload): Section[] {
  const conditionRows = (payload.currentConditions ?? []).map((c) => [
    cell(c.segmentId),
    formatCoordinate(c.coordinate),
    cell(c.travelTimeIndex),
    humanize(c.congestionLevel),
  ]);
  const incidentRows = (payload.incidents ?? []).map((i) => [
    cell(i.type),
    cell(i.description),
    humanize(i.severity),
    cell(i.estimatedDelay),
  ]);
  return section("realtime", "live-traffic", "Live Traffic Conditions", "primary", [
    table(["Segment", "Start", "Travel Time Index", "Congestion"], conditionRows, {
      title: "Current Conditions",
    }),
    table(["Type", "Description", "Severity", "Delay"], incidentRows, {
      title: "Incidents",
      cap: CAPS.incidents,
    }),
    summary("Last Updated", payload.lastUpdated),
  ]);
}

export function composeFuelPrices(payload: FuelPricesPayload): Section[] {
  const analysis = payload.priceAnalysis;
  const currency = analysis?.currency ? `${analysis.currency} ` : "";
  const rows = (payload.stations ?? []).map((s) => [
    cell(s.name),
    cell(s.address),
    s.petrolPrice === undefined ? "-" : `${s.currency ?? ""} ${s.petrolPrice}`.trim(),
    s.dieselPrice === undefined ? "-" : `${s.currency ?? ""} ${s.dieselPrice}`.trim(),
  ]);
  return section("realtime", "fuel-prices", "Fuel Stations and Prices", "info", [
    table(["Station", "Address", "Petrol", "Diesel"], rows, { cap: CAPS.fuelStations }),
    summary(
      "Average Petrol Price",
      analysis?.averagePetrolPrice === undefined ? undefined : `${currency}${analysis.averagePetrolPrice}`
    ),
    summary(
      "Petrol Price Range",
      analysis?.petrolPriceRange === undefined ? undefined : `${currency}${analysis.petrolPriceRange}`
    ),
    summary("Cheapest Station", analysis?.cheapestStation),
    list(payload.recommendations, { title: "Fuel Recommendations", cap: CAPS.fuelStations }),
  ]);
}

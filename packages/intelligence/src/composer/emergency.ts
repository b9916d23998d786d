import type {
  CommunicationSystemPayload,
  ResponsePlanPayload,
  Section,
  ServicePoint,
  SummaryBlock,
} from "@route-intel/types";
import { CAPS, cell, formatCoordinate, humanize, list, section, summary, table } from "./blocks.js";

function serviceRows(points: readonly ServicePoint[] | undefined): string[][] {
  return (points ?? []).map((p) => [cell(p.name), cell(p.address)]);
}

function coverageTone(overall: string | undefined): SummaryBlock["tone"] {
  switch (overall) {
    case "excellent":
    case "good":
      return "good";
    case "limited":
      return "fair";
    case "poor":
      return "bad";
    default:
      return undefined;
  }
}

export function composeResponsePlan(payload: ResponsePlanPayload): Section[] {
  const coverage = payload.coverage;
  const columns = ["Name", "Address"];
  return section("emergency", "response-plan", "Emergency Response Plan", "danger", [
    summary(
      "Coverage",
      coverage?.overall && humanize(coverage.overall),
      coverageTone(coverage?.overall)
    ),
    summary("Coverage Score", coverage?.score === undefined ? undefined : `${coverage.score}/100`),
    table(columns, serviceRows(payload.hospitals), {
      title: "Hospitals",
      cap: CAPS.servicePoints,
    }),
    table(columns, serviceRows(payload.policeStations), {
      title: "Police Stations",
      cap: CAPS.servicePoints,
    }),
    table(columns, serviceRows(payload.fireStations), {
      title: "Fire Stations",
      cap: CAPS.servicePoints,
    }),
    list(coverage?.gaps, { title: "Coverage Gaps" }),
  ]);
}

export function composeCommunicationSystem(payload: CommunicationSystemPayload): Section[] {
  const deadZoneRows = (payload.deadZones ?? []).map((z) => [
    formatCoordinate(z.from),
    formatCoordinate(z.to),
    cell(z.gapKm, " km"),
  ]);
  const contactRows = (payload.contactHierarchy ?? []).map((c) => [
    cell(c.level),
    cell(c.contactType),
    cell(c.responseTime),
    cell(c.purpose),
  ]);
  return section("emergency", "communication-system", "Emergency Communication", "primary", [
    list(payload.primaryChannels, { title: "Primary Channels" }),
    list(payload.backupMethods, { title: "Backup Methods" }),
    table(["From", "To", "Gap"], deadZoneRows, { title: "Communication Dead Zones" }),
    table(["Level", "Contact", "Response Time", "Purpose"], contactRows, {
      title: "Contact Hierarchy",
    }),
  ]);
}

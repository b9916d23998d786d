import type { BusinessOpportunitiesPayload, DemographicsPayload, Section } from "@route-intel/types";
import { CAPS, cell, humanize, list, section, summary, table } from "./blocks.js";

export function composeDemographics(payload: DemographicsPayload): Section[] {
  const density = payload.populationDensity;
  return section("location", "demographics", "Route Demographics", "info", [
    summary("Predominant Area Type", density?.predominantType && humanize(density.predominantType)),
    summary(
      "Urban Share",
      density?.urbanPercentage === undefined ? undefined : `${density.urbanPercentage}%`
    ),
    summary("Route Character", density?.routeCharacter && humanize(density.routeCharacter)),
    list(payload.localities, { title: "Localities Along Route", cap: CAPS.rows }),
  ]);
}

export function composeBusinessOpportunities(payload: BusinessOpportunitiesPayload): Section[] {
  const rows = (payload.commercialCenters ?? []).map((c) => [
    cell(c.name),
    cell(c.address),
    cell(c.rating),
  ]);
  return section("location", "business-opportunities", "Business Opportunities", "success", [
    summary("Investment Grade", payload.investmentGrade),
    table(["Name", "Address", "Rating"], rows, {
      title: "Commercial Centres",
      cap: CAPS.servicePoints,
    }),
    list(payload.recommendedInvestments, { title: "Recommended Investments" }),
  ]);
}

/**
 * Plain-text report renderer.
 */

import { writeFile } from "node:fs/promises";
import type { Block, ReportResult, Section, TableBlock } from "@route-intel/types";
import { RenderError, describeError } from "../errors.js";
import type { ReportRenderer } from "./renderer.js";

function formatTable(block: TableBlock): string[] {
  const widths = block.columns.map((column, i) =>
    Math.max(column.length, ...block.rows.map((row) => (row[i] ?? "").length))
  );
  const line = (cells: readonly string[]) =>
    widths.map((w, i) => (cells[i] ?? "").padEnd(w)).join(" | ").trimEnd();
  const lines = [line(block.columns), widths.map((w) => "-".repeat(w)).join("-+-")];
  for (const row of block.rows) lines.push(line(row));
  return block.title ? [block.title, ...lines] : lines;
}

function formatBlock(block: Block): string[] {
  switch (block.kind) {
    case "table":
      return formatTable(block);
    case "list": {
      const items = block.items.map((item, i) => (block.ordered ? `${i + 1}. ${item}` : `- ${item}`));
      return block.title ? [block.title, ...items] : items;
    }
    case "summary":
      return [`${block.label}: ${block.value}`];
  }
}

function formatSection(section: Section): string {
  return [`== ${section.title} ==`, ...section.blocks.map((b) => formatBlock(b).join("\n"))].join("\n\n");
}

function formatHeader(result: ReportResult): string {
  const { route } = result;
  const lines = [
    "ROUTE INTELLIGENCE REPORT",
    `Route: ${route.origin} -> ${route.destination}`,
    `Vehicle: ${route.vehicle.vehicleClass}`,
  ];
  if (route.distanceKm !== undefined) lines.push(`Distance: ${route.distanceKm} km`);
  if (route.durationHours !== undefined) lines.push(`Duration: ${route.durationHours} h`);
  lines.push(`Generated: ${result.generatedAt}`);
  return lines.join("\n");
}

function formatSummary(result: ReportResult): string {
  const s = result.summary;
  return [
    "== Run Summary ==",
    `Providers: ${s.succeeded} succeeded, ${s.failed} failed, ${s.skipped} skipped of ${s.declared}`,
    `Sections: ${s.sectionsEmitted}`,
    `Failed operations: ${s.operationsFailed}`,
  ].join("\n");
}

/** Render a report as plain text */
export function formatTextReport(result: ReportResult): string {
  const parts = [formatHeader(result), ...result.sections.map(formatSection), formatSummary(result)];
  return `${parts.join("\n\n")}\n`;
}

export class TextReportRenderer implements ReportRenderer {
  readonly format = "text" as const;

  async render(result: ReportResult, destination: string): Promise<void> {
    try {
      await writeFile(destination, formatTextReport(result), "utf-8");
    } catch (err) {
      throw new RenderError(`could not write report to ${destination}: ${describeError(err)}`, err);
    }
  }
}

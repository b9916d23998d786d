/**
 * Block builders shared by the translation tables.
 *
 * Each builder returns null when it has nothing to show: an undefined field
 * and an empty collection both produce no block. `section` drops a section
 * whose blocks are all null.
 */

import type {
  Block,
  Coordinate,
  ListBlock,
  OperationKind,
  ProviderId,
  Section,
  SectionCategory,
  SummaryBlock,
  TableBlock,
} from "@route-intel/types";

/** Row and item caps per block */
export const CAPS = {
  recommendations: 8,
  constructionZones: 10,
  hotspots: 8,
  incidents: 8,
  fuelStations: 6,
  servicePoints: 8,
  gradientRisks: 10,
  rows: 12,
} as const;

const MISSING = "-";

/** Strip control characters and collapse whitespace */
export function cleanText(value: string): string {
  return value
    .replace(/[\u0000-\u001f\u007f]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Format a table cell; absent values render as "-" */
export function cell(value: string | number | boolean | undefined, suffix = ""): string {
  if (value === undefined) return MISSING;
  if (typeof value === "boolean") return value ? "Yes" : "No";
  const text = cleanText(String(value));
  return text === "" ? MISSING : `${text}${suffix}`;
}

export function formatCoordinate(c: Coordinate | undefined): string {
  return c ? `${c.lat.toFixed(4)}, ${c.lng.toFixed(4)}` : MISSING;
}

/** "semi-urban" -> "Semi-urban", "urban_corridor" -> "Urban corridor" */
export function humanize(value: string | undefined): string {
  if (value === undefined || value === "") return MISSING;
  const spaced = value.replace(/_/g, " ");
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

export function table(
  columns: string[],
  rows: readonly string[][],
  options: { title?: string; cap?: number } = {}
): TableBlock | null {
  if (rows.length === 0) return null;
  const capped = rows.slice(0, options.cap ?? CAPS.rows);
  return { kind: "table", title: options.title, columns, rows: capped.map((r) => [...r]) };
}

export function list(
  items: readonly string[] | undefined,
  options: { title?: string; ordered?: boolean; cap?: number } = {}
): ListBlock | null {
  const cleaned = (items ?? []).map(cleanText).filter((item) => item !== "");
  if (cleaned.length === 0) return null;
  return {
    kind: "list",
    title: options.title,
    items: cleaned.slice(0, options.cap ?? CAPS.recommendations),
    ordered: options.ordered ?? false,
  };
}

export function summary(
  label: string,
  value: string | number | undefined,
  tone?: SummaryBlock["tone"]
): SummaryBlock | null {
  if (value === undefined) return null;
  const text = cleanText(String(value));
  if (text === "") return null;
  return tone ? { kind: "summary", label, value: text, tone } : { kind: "summary", label, value: text };
}

/**
 * Assemble one section, or none when every block was omitted.
 */
export function section(
  provider: ProviderId,
  operation: OperationKind,
  title: string,
  category: SectionCategory,
  blocks: readonly (Block | null)[]
): Section[] {
  const present = blocks.filter((b): b is Block => b !== null);
  if (present.length === 0) return [];
  return [
    freezeSection({
      id: `${provider}.${operation}`,
      provider,
      operation,
      title,
      category,
      blocks: present,
    }),
  ];
}

function freezeSection(s: Section): Section {
  for (const block of s.blocks) {
    if (block.kind === "table") {
      block.rows.forEach((row) => Object.freeze(row));
      Object.freeze(block.rows);
      Object.freeze(block.columns);
    } else if (block.kind === "list") {
      Object.freeze(block.items);
    }
    Object.freeze(block);
  }
  Object.freeze(s.blocks);
  return Object.freeze(s);
}

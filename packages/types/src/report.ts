/**
 * Report results - the output of a pipeline run.
 *
 * A report is an ordered list of sections plus a run summary. Sections are
 * produced by the composer and are never mutated afterwards; renderers
 * consume them as-is.
 */

import type { CredentialName } from "./credentials.js";
import type { OperationKind, OperationPayload } from "./intelligence.js";
import type { RouteContext } from "./route.js";

/** Declared intelligence providers */
export type ProviderId =
  | "traffic"
  | "weather"
  | "maps"
  | "realtime"
  | "fleet"
  | "emergency"
  | "location";

/** Outcome of one provider operation: a payload or a failure cause, never both */
export type ProviderResult<T = OperationPayload> =
  | { ok: true; data: T }
  | { ok: false; cause: string };

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

/** Category tag a renderer may map to colors or icons */
export type SectionCategory = "primary" | "success" | "warning" | "danger" | "info";

export interface TableBlock {
  kind: "table";
  title?: string;
  columns: string[];
  rows: string[][];
}

export interface ListBlock {
  kind: "list";
  title?: string;
  items: string[];
  ordered: boolean;
}

export interface SummaryBlock {
  kind: "summary";
  label: string;
  value: string;
  tone?: "good" | "fair" | "bad";
}

export type Block = TableBlock | ListBlock | SummaryBlock;

/** One titled unit of the final report */
export interface Section {
  /** Stable identifier, e.g. "traffic.seasonal-congestion" */
  id: string;
  provider: ProviderId;
  operation: OperationKind;
  title: string;
  category: SectionCategory;
  blocks: Block[];
}

// ---------------------------------------------------------------------------
// Observability
// ---------------------------------------------------------------------------

/** Outcome of one operation, as recorded for observability */
export interface OperationStatus {
  operation: OperationKind;
  ok: boolean;
  cause?: string;
  sectionCount: number;
}

/** Terminal state of one provider in a run */
export type ProviderStatus =
  | { provider: ProviderId; state: "skipped"; missingCredential: CredentialName }
  | {
      provider: ProviderId;
      state: "succeeded";
      operations: OperationStatus[];
      sectionCount: number;
      durationMs: number;
    }
  | { provider: ProviderId; state: "failed"; cause: string; durationMs: number };

/** Aggregate outcome counts, produced once per run */
export interface RunSummary {
  declared: number;
  succeeded: number;
  failed: number;
  skipped: number;
  sectionsEmitted: number;
  /** Failed operations inside succeeded providers */
  operationsFailed: number;
  durationMs: number;
}

/** Everything a renderer needs */
export interface ReportResult {
  route: RouteContext;
  sections: Section[];
  summary: RunSummary;
  statuses: ProviderStatus[];
  /** ISO-8601 timestamp */
  generatedAt: string;
}

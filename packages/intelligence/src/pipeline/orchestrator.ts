/**
 * Report orchestrator.
 *
 * Runs every eligible provider concurrently, bounds each by a timeout,
 * and merges the composed sections in canonical provider order once all
 * tasks have settled. Provider failures never reach the caller: they are
 * recorded as statuses and counted in the run summary.
 */

import type {
  Credentials,
  OperationStatus,
  ProviderResult,
  ProviderStatus,
  ReportResult,
  RouteContext,
  RunSummary,
  Section,
} from "@route-intel/types";
import { composeSections } from "../composer/index.js";
import { describeError } from "../errors.js";
import type {
  IntelligenceProvider,
  OperationContext,
  ProviderOperation,
} from "../providers/provider.js";
import type { ProviderRegistry, Resolution } from "../registry/registry.js";
import { requiresHeavyVehicleAnalysis } from "../route/context.js";

export const DEFAULT_PROVIDER_TIMEOUT_MS = 30_000;

export const ABORTED_CAUSE = "run aborted";

export type StatusListener = (status: ProviderStatus) => void;

export interface RunOptions {
  registry: ProviderRegistry;
  /**
   * Upper bound on one provider's task (default: 30000). Operations still
   * pending when it elapses fail; settled siblings keep their sections.
   */
  providerTimeoutMs?: number;
  /** Cancels the run; unfinished providers are recorded as failed */
  signal?: AbortSignal;
  /** Called once per provider when it reaches a terminal state */
  onStatus?: StatusListener;
  /** Injectable clock for testability */
  now?: () => Date;
}

interface ProviderOutcome {
  status: ProviderStatus;
  sections: Section[];
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

/** Default status listener */
export function logProviderStatus(status: ProviderStatus): void {
  switch (status.state) {
    case "skipped":
      console.log(`[report] ${status.provider}: skipped (missing ${status.missingCredential})`);
      return;
    case "succeeded":
      console.log(
        `[report] ${status.provider}: succeeded (${status.sectionCount} sections) in ${status.durationMs}ms`
      );
      for (const op of status.operations) {
        if (!op.ok) console.warn(`[report] ${status.provider}.${op.operation}: ${op.cause}`);
      }
      return;
    case "failed":
      console.warn(`[report] ${status.provider}: failed (${status.cause})`);
      return;
  }
}

// ---------------------------------------------------------------------------
// Provider task
// ---------------------------------------------------------------------------

type Interruption = { cause: string };

/**
 * Resolve when the timeout elapses or the run signal fires, whichever comes
 * first. `clear` releases the timer and the abort listener.
 */
function interruption(
  timeoutMs: number,
  signal: AbortSignal | undefined
): { promise: Promise<Interruption>; clear(): void } {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;
  const promise = new Promise<Interruption>((resolve) => {
    timer = setTimeout(() => resolve({ cause: `timed out after ${timeoutMs}ms` }), timeoutMs);
    onAbort = () => resolve({ cause: ABORTED_CAUSE });
    signal?.addEventListener("abort", onAbort, { once: true });
  });
  return {
    promise,
    clear() {
      clearTimeout(timer);
      if (onAbort) signal?.removeEventListener("abort", onAbort);
    },
  };
}

/** Run one operation; a thrown error is folded into a failure result */
async function runOperation(op: ProviderOperation, context: OperationContext): Promise<ProviderResult> {
  try {
    return await op.run(context);
  } catch (err) {
    return { ok: false, cause: describeError(err) };
  }
}

function composeOperation(
  op: ProviderOperation,
  result: ProviderResult
): { status: OperationStatus; sections: Section[] } {
  if (!result.ok) {
    return { status: { operation: op.kind, ok: false, cause: result.cause, sectionCount: 0 }, sections: [] };
  }
  const sections = composeSections(result.data);
  return { status: { operation: op.kind, ok: true, sectionCount: sections.length }, sections };
}

async function runProvider(
  resolution: Resolution,
  route: RouteContext,
  heavyVehicle: boolean,
  timeoutMs: number,
  runSignal: AbortSignal | undefined
): Promise<ProviderOutcome> {
  const provider = resolution.declaration.id;
  if (resolution.status === "skipped") {
    return {
      status: { provider, state: "skipped", missingCredential: resolution.missingCredential },
      sections: [],
    };
  }

  const start = performance.now();
  const elapsed = () => Math.round(performance.now() - start);
  const failed = (cause: string): ProviderOutcome => ({
    status: { provider, state: "failed", cause, durationMs: elapsed() },
    sections: [],
  });

  if (runSignal?.aborted) return failed(ABORTED_CAUSE);

  let instance: IntelligenceProvider;
  try {
    instance = resolution.construct();
  } catch (err) {
    return failed(describeError(err));
  }

  const controller = new AbortController();
  const context: OperationContext = {
    route,
    vehicle: route.vehicle,
    heavyVehicle,
    signal: controller.signal,
  };
  const operations = instance.operations.filter((op) => heavyVehicle || !op.heavyVehicleOnly);

  // Settled results land here as they arrive so a timeout can keep them
  const results: (ProviderResult | undefined)[] = operations.map(() => undefined);
  const stop = interruption(timeoutMs, runSignal);
  const work = Promise.all(
    operations.map(async (op, i) => {
      results[i] = await runOperation(op, context);
    })
  );
  const settled = await Promise.race([work.then(() => null), stop.promise]);
  stop.clear();

  if (settled !== null) {
    controller.abort(new Error(settled.cause));
    if (settled.cause === ABORTED_CAUSE || results.every((r) => r === undefined)) {
      return failed(settled.cause);
    }
  }

  const composed = operations.map((op, i) =>
    composeOperation(op, results[i] ?? { ok: false, cause: settled?.cause ?? "did not complete" })
  );
  const sections = composed.flatMap((c) => c.sections);
  return {
    status: {
      provider,
      state: "succeeded",
      operations: composed.map((c) => c.status),
      sectionCount: sections.length,
      durationMs: elapsed(),
    },
    sections,
  };
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

function summarize(outcomes: readonly ProviderOutcome[], durationMs: number): RunSummary {
  const summary: RunSummary = {
    declared: outcomes.length,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    sectionsEmitted: 0,
    operationsFailed: 0,
    durationMs,
  };
  for (const { status, sections } of outcomes) {
    summary.sectionsEmitted += sections.length;
    if (status.state === "succeeded") {
      summary.succeeded++;
      summary.operationsFailed += status.operations.filter((op) => !op.ok).length;
    } else if (status.state === "failed") {
      summary.failed++;
    } else {
      summary.skipped++;
    }
  }
  return summary;
}

/**
 * Produce a report for one route.
 *
 * Resolves every declared provider against the credentials, runs the
 * eligible ones concurrently and waits for all of them before merging.
 */
export async function runReport(
  route: RouteContext,
  credentials: Credentials,
  options: RunOptions
): Promise<ReportResult> {
  const {
    registry,
    providerTimeoutMs = DEFAULT_PROVIDER_TIMEOUT_MS,
    signal,
    onStatus = logProviderStatus,
    now = () => new Date(),
  } = options;

  const start = performance.now();
  const heavyVehicle = requiresHeavyVehicleAnalysis(route.vehicle);

  const outcomes = await Promise.all(
    registry.resolveAll(credentials).map(async (resolution) => {
      const outcome = await runProvider(resolution, route, heavyVehicle, providerTimeoutMs, signal);
      try {
        onStatus(outcome.status);
      } catch (err) {
        console.warn(`[report] status listener failed: ${describeError(err)}`);
      }
      return outcome;
    })
  );

  return {
    route,
    sections: outcomes.flatMap((o) => o.sections),
    summary: summarize(outcomes, Math.round(performance.now() - start)),
    statuses: outcomes.map((o) => o.status),
    generatedAt: now().toISOString(),
  };
}

/**
 * Intelligence provider interface.
 *
 * A provider is a named set of independent operations. Each operation reads
 * the shared route context and returns either a payload or a failure cause;
 * operations never throw and never see each other's results. The pipeline
 * decides which operations run and composes their payloads into sections.
 */

import type {
  OperationKind,
  OperationPayload,
  ProviderId,
  ProviderResult,
  RouteContext,
  VehicleDescriptor,
} from "@route-intel/types";
import { describeError } from "../errors.js";

/** Everything an operation may read during a run */
export interface OperationContext {
  readonly route: RouteContext;
  readonly vehicle: Readonly<VehicleDescriptor>;
  /** True when heavy-vehicle analysis was requested for this run */
  readonly heavyVehicle: boolean;
  /** Fires when the provider times out or the run is cancelled */
  readonly signal: AbortSignal;
}

export interface ProviderOperation {
  readonly kind: OperationKind;
  /** Only requested when the heavy-vehicle gate holds */
  readonly heavyVehicleOnly?: boolean;
  run(context: OperationContext): Promise<ProviderResult>;
}

export interface IntelligenceProvider {
  readonly id: ProviderId;
  /** Human-readable name */
  readonly name: string;
  /** Operations in the order their sections appear in the report */
  readonly operations: readonly ProviderOperation[];
}

/**
 * Run an analysis and fold any thrown error into a failure result.
 */
export async function attempt<T extends OperationPayload>(
  analysis: () => Promise<T>
): Promise<ProviderResult<T>> {
  try {
    return { ok: true, data: await analysis() };
  } catch (err) {
    return { ok: false, cause: describeError(err) };
  }
}

/**
 * Return a secondary credential, or throw the failure cause an operation
 * reports when it is missing.
 */
export function requireSecret(secret: string | undefined, message: string): string {
  if (secret === undefined || secret.trim() === "") {
    throw new Error(message);
  }
  return secret;
}

/** Options shared by every provider that calls an upstream service */
export interface SamplingOptions {
  /** Upper bound on route points any operation samples (default: 20) */
  maxSamplePoints?: number;
}

export const DEFAULT_MAX_SAMPLE_POINTS = 20;

/** Consecutive route points further apart than this mark a coverage dead zone */
export const DEAD_ZONE_GAP_KM = 25;

/** Round to one decimal place */
export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

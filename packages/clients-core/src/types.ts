/**
 * API request/response types for the route intelligence server.
 *
 * These mirror the server's models. Report payloads themselves come from
 * @route-intel/types.
 */

import type { CredentialName, Credentials, ProviderId } from "@route-intel/types";

export type {
  Block,
  Coordinate,
  Credentials,
  ProviderId,
  ProviderStatus,
  ReportResult,
  RouteInput,
  RunSummary,
  Section,
  VehicleDescriptor,
} from "@route-intel/types";

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

export interface GenerateReportRequest {
  /** Route input; the server validates it */
  route: unknown;
  /** Per-request secrets, overriding the server's own per name */
  credentials?: Credentials;
  options?: {
    /** Upper bound on one provider's task, at most 120000 */
    providerTimeoutMs?: number;
  };
}

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

export interface ProviderDescription {
  id: ProviderId;
  name: string;
  primaryCredential?: CredentialName;
  secondaryCredentials: CredentialName[];
  eligible: boolean;
}

export interface ProvidersResponse {
  providers: ProviderDescription[];
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthResponse {
  status: "ok";
  uptime: number;
  providers: { id: ProviderId; eligible: boolean }[];
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  message: string;
  details?: string[];
}

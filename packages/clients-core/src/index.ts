// Base
export { BaseClient, type ClientConfig, type RequestParams } from "./baseClient.js";
export { ApiError } from "./apiError.js";

// Domain clients
export { ReportClient } from "./reportClient.js";
export { ProviderClient } from "./providerClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Reports
  GenerateReportRequest,
  ReportResult,
  RunSummary,
  Section,
  Block,
  ProviderStatus,
  // Route
  Coordinate,
  RouteInput,
  VehicleDescriptor,
  Credentials,
  // Providers
  ProviderId,
  ProviderDescription,
  ProvidersResponse,
  // Health
  HealthResponse,
  // Errors
  ErrorResponse,
} from "./types.js";

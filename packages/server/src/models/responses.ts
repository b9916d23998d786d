import type { ProviderId } from "@route-intel/types";
import type { ProviderDescription } from "@route-intel/intelligence";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  providers: { id: ProviderId; eligible: boolean }[];
}

export interface ProvidersResponse {
  providers: ProviderDescription[];
}

export interface ErrorResponse {
  message: string;
  details?: string[];
}

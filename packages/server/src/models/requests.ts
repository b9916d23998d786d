import { z } from "zod";
import { CREDENTIAL_NAMES } from "@route-intel/types";

/** Longest provider timeout a request may ask for */
export const MAX_PROVIDER_TIMEOUT_MS = 120_000;

export const generateReportRequestSchema = z.object({
  /** Raw route input; validated by createRouteContext */
  route: z.unknown(),
  /** Per-request secrets, overriding the server's own per name */
  credentials: z.record(z.enum(CREDENTIAL_NAMES), z.string()).optional(),
  options: z
    .object({
      providerTimeoutMs: z.number().int().positive().max(MAX_PROVIDER_TIMEOUT_MS).optional(),
    })
    .optional(),
});

export type GenerateReportRequest = z.infer<typeof generateReportRequestSchema>;

/**
 * Run configuration loader.
 *
 * Defaults live in configs/report/default.json at the repo root. An
 * optional override file is deep-merged on top, and the result is
 * validated before use.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

export const reportConfigSchema = z.object({
  providerTimeoutMs: z.number().int().positive(),
  upstream: z.object({
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().min(0),
    retryDelaysMs: z.array(z.number().int().min(0)),
  }),
  sampling: z.object({
    maxPoints: z.number().int().min(1),
  }),
});

export type ReportConfig = z.infer<typeof reportConfigSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Merge source into target; nested objects merge, everything else replaces */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    const tgtVal = target[key];
    if (isRecord(srcVal) && isRecord(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Locate the configs/report directory by walking up from this file.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "report");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // packages/intelligence/src/config -> repo root
  return join(resolve(__dirname, "..", "..", "..", ".."), "configs", "report");
}

function readJson(filePath: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  if (!isRecord(parsed)) {
    throw new Error(`${filePath}: expected a JSON object`);
  }
  return parsed;
}

/**
 * Load the default run configuration, optionally overlaid with a JSON file.
 *
 * @throws ZodError when the merged configuration is invalid
 */
export function loadReportConfig(overridePath?: string): ReportConfig {
  const defaults = readJson(join(findConfigsRoot(), "default.json"));
  const merged = overridePath ? deepMerge(defaults, readJson(overridePath)) : defaults;
  return reportConfigSchema.parse(merged);
}

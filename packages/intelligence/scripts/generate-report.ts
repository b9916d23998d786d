/**
 * Generate a plain-text intelligence report for a route.
 *
 * Usage: npx tsx scripts/generate-report.ts <route.json> [output-path] [--config override.json]
 *
 * Credentials are read from the environment (GOOGLE_MAPS_API_KEY,
 * TOMTOM_API_KEY, ...). Providers without their key are skipped.
 *
 * Default output: route-report.txt in the current directory
 * Sample input: scripts/sample-route.json
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  ProviderRegistry,
  TextReportRenderer,
  UpstreamClient,
  generateReport,
  loadCredentials,
  loadReportConfig,
} from "../src/index.js";

const args = process.argv.slice(2);
const configFlag = args.indexOf("--config");
const overridePath = configFlag >= 0 ? args[configFlag + 1] : undefined;
const positional = args.filter((a, i) => !a.startsWith("--") && (configFlag < 0 || i !== configFlag + 1));

const routePath = positional[0];
const outputPath = resolve(positional[1] ?? "route-report.txt");

async function main() {
  if (!routePath) {
    console.error("Usage: generate-report <route.json> [output-path] [--config override.json]");
    process.exit(1);
  }

  const config = loadReportConfig(overridePath);
  const input: unknown = JSON.parse(readFileSync(resolve(routePath), "utf-8"));

  const http = new UpstreamClient(config.upstream);
  const registry = new ProviderRegistry({ http, maxSamplePoints: config.sampling.maxPoints });

  const result = await generateReport(input, loadCredentials(), {
    registry,
    providerTimeoutMs: config.providerTimeoutMs,
    renderer: new TextReportRenderer(),
    destination: outputPath,
  });

  const s = result.summary;
  console.log(
    `Providers: ${s.succeeded} succeeded, ${s.failed} failed, ${s.skipped} skipped; ${s.sectionsEmitted} sections`
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

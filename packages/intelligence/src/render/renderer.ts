/**
 * Renderer interface and the end-to-end report entry point.
 *
 * The renderer is the only stage whose failure reaches the caller.
 */

import type { Credentials, ReportResult } from "@route-intel/types";
import { RenderError, describeError } from "../errors.js";
import { runReport, type RunOptions } from "../pipeline/orchestrator.js";
import { createRouteContext } from "../route/context.js";

export interface ReportRenderer {
  readonly format: string;
  /** @throws RenderError when the document cannot be emitted */
  render(result: ReportResult, destination: string): Promise<void>;
}

export interface GenerateOptions extends RunOptions {
  renderer: ReportRenderer;
  destination: string;
}

/**
 * Validate route input, run every provider and render the result.
 *
 * @throws RouteValidationError before any provider runs
 * @throws RenderError when the renderer fails
 */
export async function generateReport(
  input: unknown,
  credentials: Credentials,
  options: GenerateOptions
): Promise<ReportResult> {
  const route = createRouteContext(input);
  const result = await runReport(route, credentials, options);
  const { renderer, destination } = options;
  try {
    await renderer.render(result, destination);
  } catch (err) {
    throw err instanceof RenderError
      ? err
      : new RenderError(`${renderer.format} renderer failed: ${describeError(err)}`, err);
  }
  console.log(
    `[report] wrote ${result.summary.sectionsEmitted} sections to ${destination} in ${result.summary.durationMs}ms`
  );
  return result;
}

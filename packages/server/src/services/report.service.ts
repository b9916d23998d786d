/**
 * Report service: validates a request, merges credentials and runs the
 * report pipeline. Shared by every controller.
 */

import type { Credentials, ReportResult } from "@route-intel/types";
import {
  ProviderRegistry,
  UpstreamClient,
  createRouteContext,
  loadCredentials,
  loadReportConfig,
  mergeCredentials,
  runReport,
  type ProviderDescription,
  type StatusListener,
} from "@route-intel/intelligence";
import { generateReportRequestSchema } from "../models/requests.js";

export interface ReportServiceOptions {
  registry: ProviderRegistry;
  /** Secrets the server was started with */
  credentials: Credentials;
  providerTimeoutMs: number;
  onStatus?: StatusListener;
}

export class ReportService {
  private readonly registry: ProviderRegistry;
  private readonly credentials: Credentials;
  private readonly providerTimeoutMs: number;
  private readonly onStatus?: StatusListener;

  constructor(options: ReportServiceOptions) {
    this.registry = options.registry;
    this.credentials = options.credentials;
    this.providerTimeoutMs = options.providerTimeoutMs;
    this.onStatus = options.onStatus;
  }

  /** Build a service from the environment and configs/report */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): ReportService {
    const config = loadReportConfig(env["REPORT_CONFIG"]);
    const http = new UpstreamClient(config.upstream);
    return new ReportService({
      registry: new ProviderRegistry({ http, maxSamplePoints: config.sampling.maxPoints }),
      credentials: loadCredentials(env),
      providerTimeoutMs: config.providerTimeoutMs,
    });
  }

  /**
   * Generate a report from a request body.
   *
   * @throws ZodError for a malformed body
   * @throws RouteValidationError for an invalid route
   */
  async generate(body: unknown, signal?: AbortSignal): Promise<ReportResult> {
    const req = generateReportRequestSchema.parse(body);
    const route = createRouteContext(req.route);
    const credentials = mergeCredentials(this.credentials, req.credentials);

    console.log(
      `[report] ${route.origin} -> ${route.destination}, ${route.points.length} points, ${route.vehicle.vehicleClass}`
    );

    return runReport(route, credentials, {
      registry: this.registry,
      providerTimeoutMs: req.options?.providerTimeoutMs ?? this.providerTimeoutMs,
      signal,
      onStatus: this.onStatus,
    });
  }

  describeProviders(): ProviderDescription[] {
    return this.registry.describe(this.credentials);
  }
}

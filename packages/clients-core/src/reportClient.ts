import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { GenerateReportRequest, ReportResult } from "./types.js";

export class ReportClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/reports", config);
  }

  /** Run every eligible provider for a route and return the composed report */
  public async generate(request: GenerateReportRequest, signal?: AbortSignal): Promise<ReportResult> {
    return this.client.post<ReportResult>({ body: request, signal });
  }
}

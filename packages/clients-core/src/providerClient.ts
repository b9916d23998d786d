import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { ProviderDescription, ProvidersResponse } from "./types.js";

export class ProviderClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/providers", config);
  }

  /** Declared providers, in report order, with eligibility */
  public async list(): Promise<ProviderDescription[]> {
    const res = await this.client.get<ProvidersResponse>();
    return res.providers;
  }
}

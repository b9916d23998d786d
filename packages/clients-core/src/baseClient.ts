import axios, { type AxiosRequestConfig } from "axios";
import { toApiError } from "./apiError.js";

export interface ClientConfig {
  /** Base URL for the report server (e.g., "http://localhost:3000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 120000) */
  timeout?: number;
}

export interface RequestParams {
  path?: string;
  body?: unknown;
  /** Cancels the request */
  signal?: AbortSignal;
}

/**
 * JSON client for one server resource. Error statuses are rethrown as
 * ApiError so callers can read the server's message and details.
 */
export class BaseClient {
  protected readonly resource: string;
  protected readonly baseUrl: string;
  protected readonly timeout: number;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 120000;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    return {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      signal: params.signal,
    };
  }

  public async get<T>(params: RequestParams = {}): Promise<T> {
    try {
      const response = await axios.get<T>(this.buildPath(params), this.buildConfig(params));
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  public async post<T>(params: RequestParams = {}): Promise<T> {
    try {
      const response = await axios.post<T>(this.buildPath(params), params.body, this.buildConfig(params));
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }
}

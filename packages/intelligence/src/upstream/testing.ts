/**
 * In-process stand-in for UpstreamHttp, used by provider tests.
 *
 * Responses are registered per service; each call takes the next queued
 * response for its service (the last one repeats). A queued Error is thrown
 * instead of parsed, so tests can exercise upstream failures.
 */

import type { ResponseSchema, UpstreamHttp, UpstreamRequest } from "./client.js";

export interface RecordedCall {
  method: "GET" | "POST";
  service: string;
  request: UpstreamRequest;
}

export class FakeUpstream implements UpstreamHttp {
  readonly calls: RecordedCall[] = [];
  private readonly responses = new Map<string, unknown[]>();

  /** Queue one or more responses for a service */
  respond(service: string, ...bodies: unknown[]): this {
    const queue = this.responses.get(service) ?? [];
    queue.push(...bodies);
    this.responses.set(service, queue);
    return this;
  }

  callsTo(service: string): RecordedCall[] {
    return this.calls.filter((c) => c.service === service);
  }

  get<T>(service: string, request: UpstreamRequest, schema: ResponseSchema<T>): Promise<T> {
    return this.handle("GET", service, request, schema);
  }

  post<T>(service: string, request: UpstreamRequest, schema: ResponseSchema<T>): Promise<T> {
    return this.handle("POST", service, request, schema);
  }

  private async handle<T>(
    method: "GET" | "POST",
    service: string,
    request: UpstreamRequest,
    schema: ResponseSchema<T>
  ): Promise<T> {
    this.calls.push({ method, service, request });
    const queue = this.responses.get(service);
    if (!queue || queue.length === 0) {
      throw new Error(`${service}: no response registered`);
    }
    const body = queue.length > 1 ? queue.shift() : queue[0];
    if (body instanceof Error) throw body;
    return schema.parse(body);
  }
}

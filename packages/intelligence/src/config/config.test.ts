import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomBytes } from "node:crypto";
import { ZodError } from "zod";
import { loadCredentials, mergeCredentials } from "./credentials.js";
import { deepMerge, loadReportConfig } from "./report-config.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

let dir: string;

function writeOverride(content: unknown): string {
  const file = join(dir, "override.json");
  writeFileSync(file, JSON.stringify(content));
  return file;
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("loadCredentials", () => {
  it("reads known variables and drops blank ones", () => {
    const credentials = loadCredentials({
      TOMTOM_API_KEY: "test-key",
      HERE_API_KEY: "   ",
      GOOGLE_MAPS_API_KEY: " test-maps ",
      UNRELATED: "x",
    });
    expect(credentials).toEqual({ tomtom: "test-key", googleMaps: "test-maps" });
  });
});

describe("mergeCredentials", () => {
  it("lets non-blank overrides win", () => {
    expect(
      mergeCredentials({ tomtom: "base", googleMaps: "base-maps" }, { tomtom: "request", googleMaps: "" })
    ).toEqual({ tomtom: "request", googleMaps: "base-maps" });
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    expect(
      deepMerge({ a: 1, nested: { b: 2, c: 3 }, list: [1, 2] }, { nested: { c: 4 }, list: [9] })
    ).toEqual({ a: 1, nested: { b: 2, c: 4 }, list: [9] });
  });
});

describe("loadReportConfig", () => {
  beforeEach(() => {
    dir = join(tmpdir(), `report-config-${randomBytes(4).toString("hex")}`);
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads the repository defaults", () => {
    expect(loadReportConfig()).toEqual({
      providerTimeoutMs: 30000,
      upstream: { timeoutMs: 10000, maxRetries: 1, retryDelaysMs: [500, 2000] },
      sampling: { maxPoints: 20 },
    });
  });

  it("overlays an override file", () => {
    const config = loadReportConfig(writeOverride({ upstream: { maxRetries: 3 } }));
    expect(config.upstream).toEqual({ timeoutMs: 10000, maxRetries: 3, retryDelaysMs: [500, 2000] });
    expect(config.providerTimeoutMs).toBe(30000);
  });

  it("rejects an invalid merged configuration", () => {
    expect(() => loadReportConfig(writeOverride({ providerTimeoutMs: -1 }))).toThrow(ZodError);
  });

  it("rejects an override that is not an object", () => {
    const file = writeOverride([1, 2]);
    expect(() => loadReportConfig(file)).toThrow(`${file}: expected a JSON object`);
  });
});

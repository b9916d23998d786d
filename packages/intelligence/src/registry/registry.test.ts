import { describe, it, expect } from "vitest";
import { ProviderRegistry, isEligible } from "./registry.js";
import { PROVIDER_CATALOG, secretOf, type ProviderDeclaration } from "./catalog.js";
import { ProviderConstructionError } from "../errors.js";
import { FakeUpstream } from "../upstream/testing.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function declaration(id: string): ProviderDeclaration {
  const found = PROVIDER_CATALOG.find((d) => d.id === id);
  if (!found) throw new Error(`no declaration ${id}`);
  return found;
}

function makeRegistry(declarations?: readonly ProviderDeclaration[]) {
  return new ProviderRegistry({ http: new FakeUpstream() }, declarations);
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("PROVIDER_CATALOG", () => {
  it("declares seven providers in canonical order", () => {
    expect(PROVIDER_CATALOG.map((d) => d.id)).toEqual([
      "traffic",
      "weather",
      "maps",
      "realtime",
      "fleet",
      "emergency",
      "location",
    ]);
  });

  it("maps each provider to its primary credential", () => {
    expect(PROVIDER_CATALOG.map((d) => d.primaryCredential)).toEqual([
      "tomtom",
      "openweather",
      "googleMaps",
      "googleMaps",
      undefined,
      "googleMaps",
      "googleMaps",
    ]);
  });
});

describe("secretOf", () => {
  it("treats blank secrets as absent", () => {
    expect(secretOf({ tomtom: "test-key" }, "tomtom")).toBe("test-key");
    expect(secretOf({ tomtom: "   " }, "tomtom")).toBeUndefined();
    expect(secretOf({}, "tomtom")).toBeUndefined();
  });
});

describe("isEligible", () => {
  it("requires only the primary credential", () => {
    expect(isEligible(declaration("traffic"), { tomtom: "x" })).toBe(true);
    expect(isEligible(declaration("traffic"), { here: "x" })).toBe(false);
  });

  it("always admits credential-free providers", () => {
    expect(isEligible(declaration("fleet"), {})).toBe(true);
  });
});

describe("ProviderRegistry", () => {
  it("skips providers without their primary credential", () => {
    const resolutions = makeRegistry().resolveAll({});
    expect(resolutions.map((r) => r.status)).toEqual([
      "skipped",
      "skipped",
      "skipped",
      "skipped",
      "eligible",
      "skipped",
      "skipped",
    ]);
    const traffic = resolutions[0];
    expect(traffic?.status === "skipped" && traffic.missingCredential).toBe("tomtom");
  });

  it("constructs eligible providers lazily", () => {
    const resolution = makeRegistry().resolve(declaration("traffic"), { tomtom: "test-key" });
    expect(resolution.status).toBe("eligible");
    if (resolution.status !== "eligible") return;
    const provider = resolution.construct();
    expect(provider.id).toBe("traffic");
    expect(provider.operations).toHaveLength(2);
  });

  it("wraps construction failures", () => {
    const broken: ProviderDeclaration = {
      id: "fleet",
      name: "Broken",
      secondaryCredentials: [],
      create: () => {
        throw new Error("bad configuration");
      },
    };
    const resolution = makeRegistry([broken]).resolve(broken, {});
    if (resolution.status !== "eligible") throw new Error("expected eligible");
    expect(() => resolution.construct()).toThrow(ProviderConstructionError);
    expect(() => resolution.construct()).toThrow(
      "could not construct fleet provider: bad configuration"
    );
  });

  it("describes eligibility for a credential set", () => {
    const rows = makeRegistry().describe({ googleMaps: "test-key" });
    expect(rows.filter((r) => r.eligible).map((r) => r.id)).toEqual([
      "maps",
      "realtime",
      "fleet",
      "emergency",
      "location",
    ]);
    expect(rows[0]).toEqual({
      id: "traffic",
      name: "Traffic Intelligence",
      primaryCredential: "tomtom",
      secondaryCredentials: ["here"],
      eligible: false,
    });
  });
});

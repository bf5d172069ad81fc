import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, mergeConfig, resolveConfig } from "../src/config";
import { parseConfigOverrides } from "../src/config-schema";
import { ConfigError } from "../src/errors";

describe("mergeConfig", () => {
  it("returns the base when there is nothing to merge", () => {
    expect(mergeConfig(DEFAULT_CONFIG, undefined)).toBe(DEFAULT_CONFIG);
  });

  it("merges nested objects one level deep", () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { smoothing: { factor: 0.5 } });
    expect(merged.smoothing).toEqual({ factor: 0.5, window: 2 });
    expect(merged.bands).toEqual(DEFAULT_CONFIG.bands);
  });

  it("replaces a band wholesale", () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { bands: { blunder: { min: 200, max: 900 } } });
    expect(merged.bands.blunder).toEqual({ min: 200, max: 900 });
    expect(merged.bands.inaccuracy).toEqual({ min: 20, max: 80 });
  });
});

describe("resolveConfig", () => {
  it("accepts the defaults", () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
  });

  it("collects every semantic problem", () => {
    try {
      resolveConfig({
        bands: { inaccuracy: { min: 90, max: 80 } },
        smoothing: { factor: 2 },
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual([
          "bands.inaccuracy: need 0 <= min <= max",
          "smoothing.factor: must be in [0, 1]",
        ]);
        expect(err.message).toBe(
          "Invalid configuration:\n  bands.inaccuracy: need 0 <= min <= max\n  smoothing.factor: must be in [0, 1]"
        );
      }
    }
  });

  it("rejects anchors out of order", () => {
    const [a, b] = DEFAULT_CONFIG.skillAnchors;
    expect(() => resolveConfig({ skillAnchors: [b, a] })).toThrow(
      "skillAnchors[1].rating: anchors must be strictly ascending"
    );
  });

  it("rejects a mistake band that can lose nothing", () => {
    expect(() => resolveConfig({ bands: { blunder: { min: 0, max: 600 } } })).toThrow(
      "bands.blunder.min: a mistake must lose something (> 0)"
    );
  });
});

describe("parseConfigOverrides", () => {
  it("reads a partial override", () => {
    const result = parseConfigOverrides({
      smoothing: { factor: 0.5 },
      thinkTime: { enabled: false, bookMoveRange: [100, 200] },
    });
    expect(result).toEqual({
      ok: true,
      value: {
        smoothing: { factor: 0.5 },
        thinkTime: { enabled: false, bookMoveRange: [100, 200] },
      },
    });
  });

  it("reports unknown keys and wrong types with their paths", () => {
    const result = parseConfigOverrides({ foo: 1, book: { enabled: "yes" } });
    expect(result).toEqual({
      ok: false,
      errors: ["arbiter.foo: unknown key", "arbiter.book.enabled: must be a boolean"],
    });
  });

  it("requires every anchor field", () => {
    const result = parseConfigOverrides({ skillAnchors: [{ rating: 800, depth: "deep" }] });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toContain("arbiter.skillAnchors[0].blunder: is required");
      expect(result.errors).toContain("arbiter.skillAnchors[0].depth: must be a finite number");
      expect(result.errors).toHaveLength(6);
    }
  });

  it("rejects a malformed range", () => {
    const result = parseConfigOverrides({ thinkTime: { bookMoveRange: [1, 2, 3] } }, "cfg");
    expect(result).toEqual({
      ok: false,
      errors: ["cfg.thinkTime.bookMoveRange: must be a [min, max] pair of numbers"],
    });
  });

  it("rejects a non-object", () => {
    expect(parseConfigOverrides([1, 2])).toEqual({
      ok: false,
      errors: ["arbiter: must be an object"],
    });
  });
});

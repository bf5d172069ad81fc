import type { ArbiterConfig, ConfigOverrides } from "./types";
import { ConfigError } from "./errors";

/**
 * Deep-merge partial overrides into a base config.
 *
 * ArbiterConfig has nested plain objects (bands, smoothing, search, etc.).
 * A naive `{ ...base, ...partial }` shallow-merge would replace entire
 * sub-objects when only one field is overridden: e.g.
 *   { smoothing: { factor: 0.5 } }
 * would wipe out smoothing.window.
 *
 * This merges one level deep. Arrays (like skillAnchors) and the bands
 * inside `bands` are replaced wholesale, not merged element-wise.
 */
export function mergeConfig(
  base: ArbiterConfig,
  partial: ConfigOverrides | undefined
): ArbiterConfig {
  if (!partial) return base;

  return {
    skillAnchors: partial.skillAnchors ?? base.skillAnchors,
    mateBlunderMaxRating:
      partial.mateBlunderMaxRating ?? base.mateBlunderMaxRating,
    bands: { ...base.bands, ...partial.bands },
    smoothing: { ...base.smoothing, ...partial.smoothing },
    style: { ...base.style, ...partial.style },
    search: { ...base.search, ...partial.search },
    book: { ...base.book, ...partial.book },
    thinkTime: { ...base.thinkTime, ...partial.thinkTime },
  };
}

/**
 * Default arbiter configuration.
 *
 * Blunder anchors follow 800 → 0.12, 1500 → 0.04, 2500 → 0.01 so the
 * strongest setting stays slightly fallible.
 */
export const DEFAULT_CONFIG: ArbiterConfig = {
  // --- Rating anchors ---
  // Linear interpolation between neighbours; ratings clamp to 800..2500
  skillAnchors: [
    { rating: 800, blunder: 0.12, inaccuracy: 0.25, brilliancy: 0.01, depth: 4, noise: 60, candidates: 12 },
    { rating: 1200, blunder: 0.07, inaccuracy: 0.2, brilliancy: 0.015, depth: 6, noise: 45, candidates: 10 },
    { rating: 1500, blunder: 0.04, inaccuracy: 0.15, brilliancy: 0.02, depth: 8, noise: 35, candidates: 8 },
    { rating: 2000, blunder: 0.02, inaccuracy: 0.08, brilliancy: 0.03, depth: 12, noise: 20, candidates: 6 },
    { rating: 2500, blunder: 0.01, inaccuracy: 0.03, brilliancy: 0.04, depth: 18, noise: 10, candidates: 5 },
  ],

  mateBlunderMaxRating: 900,

  // --- Centipawn-loss bands (vs the engine's top move) ---
  bands: {
    inaccuracy: { min: 20, max: 80 },
    blunder: { min: 150, max: 600 },
    brilliancy: { min: 0, max: 30 },
  },

  // --- Mistake smoothing ---
  smoothing: {
    factor: 0.35,
    window: 2,
  },

  style: {
    ceiling: 60,
  },

  search: {
    timeoutMs: 15000,
    movetimeMs: 0,
  },

  // --- Opening book ---
  book: {
    enabled: true,
    maxPly: 20,
    preferredWeight: 0.8,
  },

  // --- Think time ---
  thinkTime: {
    enabled: true,
    baseMs: 2500,
    skillReductionMs: 1200,
    bookMoveRange: [500, 2000],
    difficultyBonusMax: 2000,
    closeEvalThreshold: 20,
    jitter: 1000,
    minimum: 300,
  },
};

/**
 * Semantic checks on a fully merged config.
 * Returns the list of problems; empty means valid.
 */
export function configIssues(config: ArbiterConfig): string[] {
  const issues: string[] = [];
  const anchors = config.skillAnchors;

  if (anchors.length === 0) {
    issues.push("skillAnchors: must contain at least one anchor");
  }
  anchors.forEach((a, i) => {
    const path = `skillAnchors[${i}]`;
    for (const key of ["blunder", "inaccuracy", "brilliancy"] as const) {
      if (a[key] < 0 || a[key] > 1) {
        issues.push(`${path}.${key}: must be a probability in [0, 1]`);
      }
    }
    if (a.depth < 1) issues.push(`${path}.depth: must be at least 1`);
    if (a.candidates < 1) issues.push(`${path}.candidates: must be at least 1`);
    if (a.noise < 0) issues.push(`${path}.noise: must not be negative`);
    if (i > 0 && a.rating <= anchors[i - 1].rating) {
      issues.push(`${path}.rating: anchors must be strictly ascending`);
    }
  });

  for (const name of ["inaccuracy", "blunder", "brilliancy"] as const) {
    const band = config.bands[name];
    if (band.min < 0 || band.max < band.min) {
      issues.push(`bands.${name}: need 0 <= min <= max`);
    }
  }
  for (const name of ["inaccuracy", "blunder"] as const) {
    if (config.bands[name].min <= 0) {
      issues.push(`bands.${name}.min: a mistake must lose something (> 0)`);
    }
  }

  if (config.smoothing.factor < 0 || config.smoothing.factor > 1) {
    issues.push("smoothing.factor: must be in [0, 1]");
  }
  if (!Number.isInteger(config.smoothing.window) || config.smoothing.window < 0) {
    issues.push("smoothing.window: must be a non-negative integer");
  }
  if (config.style.ceiling < 0) issues.push("style.ceiling: must not be negative");
  if (config.search.timeoutMs <= 0) issues.push("search.timeoutMs: must be positive");
  if (config.search.movetimeMs < 0) issues.push("search.movetimeMs: must not be negative");
  if (config.book.preferredWeight < 0 || config.book.preferredWeight > 1) {
    issues.push("book.preferredWeight: must be in [0, 1]");
  }
  const [bookMin, bookMax] = config.thinkTime.bookMoveRange;
  if (bookMin > bookMax) issues.push("thinkTime.bookMoveRange: min must not exceed max");

  return issues;
}

/** Merge overrides onto DEFAULT_CONFIG and throw ConfigError on semantic problems. */
export function resolveConfig(overrides?: ConfigOverrides): ArbiterConfig {
  const config = mergeConfig(DEFAULT_CONFIG, overrides);
  const issues = configIssues(config);
  if (issues.length > 0) throw new ConfigError(issues);
  return config;
}

import type { ArbiterConfig, SkillAnchor, SkillProfile } from "./types";
import { DEFAULT_CONFIG } from "./config";

/**
 * Clamp a target rating into the anchored range.
 * Out-of-range ratings are never rejected: the bot must always be playable.
 */
export function clampRating(
  rating: number,
  config: Pick<ArbiterConfig, "skillAnchors"> = DEFAULT_CONFIG
): number {
  const anchors = config.skillAnchors;
  const min = anchors[0].rating;
  const max = anchors[anchors.length - 1].rating;
  const r = Number.isFinite(rating) ? Math.round(rating) : min;
  return Math.max(min, Math.min(max, r));
}

/** Whether `rating` lies within the anchored range, before any rounding. */
export function isRatingInRange(
  rating: number,
  config: Pick<ArbiterConfig, "skillAnchors"> = DEFAULT_CONFIG
): boolean {
  const anchors = config.skillAnchors;
  return rating >= anchors[0].rating && rating <= anchors[anchors.length - 1].rating;
}

/**
 * Resolve a target rating to a skill profile.
 *
 * Linear interpolation between the two surrounding anchors:
 *   t = (rating - lo.rating) / (hi.rating - lo.rating)
 *   value = lo + (hi - lo) * t
 * Depth and candidate count are rounded to whole numbers.
 */
export function resolveSkillProfile(
  rating: number,
  config: Pick<ArbiterConfig, "skillAnchors" | "mateBlunderMaxRating"> = DEFAULT_CONFIG
): SkillProfile {
  const target = clampRating(rating, config);
  const anchors = config.skillAnchors;

  let lo: SkillAnchor = anchors[0];
  let hi: SkillAnchor = anchors[0];
  for (let i = 0; i < anchors.length; i++) {
    hi = anchors[i];
    if (hi.rating >= target) break;
    lo = hi;
  }

  const span = hi.rating - lo.rating;
  const t = span > 0 ? (target - lo.rating) / span : 0;
  // Exact anchor values when the rating sits on an anchor
  const lerp = (key: keyof Omit<SkillAnchor, "rating">) =>
    t >= 1 ? hi[key] : lo[key] + (hi[key] - lo[key]) * t;

  return Object.freeze({
    targetRating: target,
    blunderProbability: lerp("blunder"),
    inaccuracyProbability: lerp("inaccuracy"),
    brilliancyProbability: lerp("brilliancy"),
    searchDepthCap: Math.max(1, Math.round(lerp("depth"))),
    evalNoiseStddev: lerp("noise"),
    candidateCount: Math.max(1, Math.round(lerp("candidates"))),
    allowMateBlunders: target <= config.mateBlunderMaxRating,
  });
}

/** Sum of the mistake/brilliancy probabilities; `normal` gets the rest. */
export function deviationProbability(skill: SkillProfile): number {
  return (
    skill.blunderProbability +
    skill.inaccuracyProbability +
    skill.brilliancyProbability
  );
}

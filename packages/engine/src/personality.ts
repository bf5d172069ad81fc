/**
 * Personality profiles: stylistic taste layered over engine scores.
 *
 * Two main exports:
 *   resolvePersonality(): look up a named profile
 *   applyPersonality()  : adjust and re-rank candidates before arbitration
 */

import type {
  ArbiterConfig,
  CandidateMove,
  MoveTag,
  PersonalityName,
  PersonalityProfile,
} from "./types";
import { UnknownPersonalityError } from "./errors";

/* ── Profiles ────────────────────────────────────────────── */

/*
 * Tag adjustments come from trait weights scaled per tag:
 *   capture      50 × material
 *   check        40 × tactical
 *   pawn-advance 30 × pawn advancement
 *   central      20 × piece activity
 * plus a direct taste for sacrifices and quiet moves.
 */
const PROFILES: Record<PersonalityName, PersonalityProfile> = {
  aggressive: {
    name: "aggressive",
    description: "Prefers attacking moves and sacrifices",
    tagAdjustments: {
      capture: -5,
      check: 8,
      "pawn-advance": 4.5,
      central: 3,
      sacrifice: 15,
      quiet: -5,
    },
    openingPreferences: [
      "King's Gambit",
      "Vienna Gambit",
      "Sicilian Dragon",
      "Alekhine Defense",
      "Benko Gambit",
      "Evans Gambit",
      "Scotch Gambit",
    ],
  },
  defensive: {
    name: "defensive",
    description: "Prefers solid positions and safety",
    tagAdjustments: {
      capture: 5,
      check: -4,
      "pawn-advance": -3,
      sacrifice: -20,
      quiet: 6,
    },
    openingPreferences: [
      "Caro-Kann",
      "French Defense",
      "Berlin Defense",
      "Queen's Gambit Declined",
      "Slav Defense",
      "Petroff Defense",
    ],
  },
  creative: {
    name: "creative",
    description: "Plays unusual and surprising moves",
    tagAdjustments: {
      capture: -5,
      check: 4,
      central: 4,
      sacrifice: 10,
    },
    openingPreferences: [
      "Sicilian Najdorf",
      "King's Indian",
      "Modern Defense",
      "Nimzo-Indian",
      "Alekhine Defense",
      "Budapest Gambit",
    ],
  },
  solid: {
    name: "solid",
    description: "Plays principled, theoretically sound moves",
    tagAdjustments: {
      castle: 4,
    },
    openingPreferences: [
      "Queen's Gambit",
      "Ruy Lopez",
      "Italian Game",
      "London System",
      "Semi-Slav",
      "Caro-Kann",
    ],
  },
  positional: {
    name: "positional",
    description: "Focuses on long-term positional advantages",
    tagAdjustments: {
      capture: -2.5,
      check: -4,
      "pawn-advance": 1.5,
      central: 2,
      quiet: 5,
      sacrifice: -5,
    },
    openingPreferences: [
      "Catalan Opening",
      "English Opening",
      "Reti Opening",
      "Queen's Indian Defense",
      "Nimzo-Indian",
      "Closed Sicilian",
    ],
  },
};

for (const profile of Object.values(PROFILES)) {
  Object.freeze(profile.tagAdjustments);
  Object.freeze(profile.openingPreferences);
  Object.freeze(profile);
}

export const PERSONALITY_NAMES: readonly PersonalityName[] = Object.freeze([
  "aggressive",
  "defensive",
  "creative",
  "solid",
  "positional",
]);

export const DEFAULT_PERSONALITY: PersonalityName = "solid";

export function isPersonalityName(name: string): name is PersonalityName {
  return PERSONALITY_NAMES.some((known) => known === name);
}

/** Look up a personality by name (case-insensitive). */
export function resolvePersonality(name: string): PersonalityProfile {
  const key = name.trim().toLowerCase();
  if (!isPersonalityName(key)) {
    throw new UnknownPersonalityError(name, PERSONALITY_NAMES);
  }
  return PROFILES[key];
}

/* ── Style adjustment ────────────────────────────────────── */

export interface RankedCandidate {
  candidate: CandidateMove;
  /** Index in the evaluator's best-first order */
  engineRank: number;
  /** Clamped style bonus actually applied */
  styleBonus: number;
  adjustedScore: number;
}

/** Raw (unclamped) bonus for a set of tags. */
export function styleBonus(
  tags: readonly MoveTag[],
  personality: PersonalityProfile
): number {
  let bonus = 0;
  for (const tag of tags) bonus += personality.tagAdjustments[tag] ?? 0;
  return bonus;
}

/** Adjusted order: higher adjusted score first, earlier engine rank on ties. */
export function compareRanked(a: RankedCandidate, b: RankedCandidate): number {
  return b.adjustedScore - a.adjustedScore || a.engineRank - b.engineRank;
}

/**
 * Apply a personality to best-first candidates and re-rank them.
 * Returns a NEW array (no mutation).
 *
 * Each bonus is clamped to ±ceiling/2, so two candidates can swap places
 * only when their true scores are within `ceiling` of each other. Style
 * chooses among comparable moves; it never turns a blunder into a pick.
 */
export function applyPersonality(
  candidates: readonly CandidateMove[],
  personality: PersonalityProfile,
  style: ArbiterConfig["style"]
): RankedCandidate[] {
  const cap = style.ceiling / 2;

  return candidates
    .map((candidate, engineRank) => {
      const bonus = Math.max(-cap, Math.min(cap, styleBonus(candidate.tags, personality)));
      return {
        candidate,
        engineRank,
        styleBonus: bonus,
        adjustedScore: candidate.score + bonus,
      };
    })
    .sort(compareRanked);
}

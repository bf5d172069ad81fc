/**
 * Short, deterministic rationales for move decisions.
 */

import type {
  CandidateMove,
  DecisionCategory,
  MoveTag,
  Outcome,
  PersonalityProfile,
} from "./types";
import { formatScore, isMatedScore } from "./score";

/** Most telling tag first */
const TAG_PHRASES: [MoveTag, string][] = [
  ["sacrifice", "a sacrifice"],
  ["check", "a check"],
  ["capture", "a capture"],
  ["promotion", "a promotion"],
  ["castle", "castling"],
  ["pawn-advance", "a pawn push"],
  ["quiet", "a quiet move"],
];

export function describeTags(tags: readonly MoveTag[]): string {
  for (const [tag, phrase] of TAG_PHRASES) {
    if (tags.includes(tag)) return phrase;
  }
  return "a move";
}

export interface RationaleInput {
  category: DecisionCategory;
  drawnOutcome: Outcome;
  move: CandidateMove;
  /** Engine's top move (candidates[0]) */
  engineBest: CandidateMove;
  centipawnLoss: number;
  personality: PersonalityProfile;
}

const OUTCOME_NOUN: Record<Exclude<Outcome, "normal">, string> = {
  inaccuracy: "an inaccuracy",
  blunder: "a blunder",
  brilliancy: "a brilliancy",
};

export function buildRationale(input: RationaleInput): string {
  const { category, drawnOutcome, move, engineBest, centipawnLoss, personality } = input;
  const kind = describeTags(move.tags);

  switch (category) {
    case "brilliant":
      return `played a brilliancy: ${move.san} is ${kind} within ${centipawnLoss}cp of the best move`;
    case "inaccuracy":
      return `played an inaccuracy: ${move.san} is ${kind} that gives up ${centipawnLoss}cp`;
    case "blunder":
      return isMatedScore(move.score)
        ? `blundered: ${move.san} walks into a forced mate`
        : `blundered: ${move.san} is ${kind} that loses ${centipawnLoss}cp`;
    case "best": {
      const fallback =
        drawnOutcome !== "normal"
          ? ` (no candidate fit ${OUTCOME_NOUN[drawnOutcome]})`
          : "";
      if (move.uci !== engineBest.uci) {
        return `chose ${move.san} over ${engineBest.san} as ${personality.name} taste, ${centipawnLoss}cp from the top line${fallback}`;
      }
      return `played the best move ${move.san} (${formatScore(move.score)})${fallback}`;
    }
  }
}

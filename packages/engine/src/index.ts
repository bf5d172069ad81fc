// --- Core modules ---
export { BotController } from "./bot-controller";
export type { BotControllerOptions } from "./bot-controller";
export {
  decideMove,
  drawOutcome,
  outcomeProbabilities,
} from "./move-arbitrator";
export type { DecisionRequest, OutcomeProbabilities } from "./move-arbitrator";
export { DecisionHistory } from "./decision-history";
export {
  resolveSkillProfile,
  clampRating,
  isRatingInRange,
  deviationProbability,
} from "./skill-profile";
export {
  resolvePersonality,
  applyPersonality,
  styleBonus,
  isPersonalityName,
  PERSONALITY_NAMES,
  DEFAULT_PERSONALITY,
} from "./personality";
export type { RankedCandidate } from "./personality";
export { EngineEvaluator, toCandidates, terminalReason } from "./evaluator";
export { inspectMove, tagMove, isValidUCI } from "./move-tags";
export {
  buildOpeningBook,
  lookupBook,
  sampleBookMove,
  normalizeFen,
  plyFromFen,
} from "./opening-book";
export type { OpeningBook, BookMove, RepertoireLine } from "./opening-book";
export { buildRationale, describeTags } from "./commentary";
export {
  MATE_SCORE,
  MATE_THRESHOLD,
  mateToScore,
  isMateScore,
  isMatedScore,
  centipawnLoss,
  formatScore,
} from "./score";
export { createSeededRandom, gaussian, pickOne } from "./random";

// --- Errors ---
export {
  MovecraftError,
  EngineUnavailableError,
  NoLegalMovesError,
  InvalidPositionError,
  UnknownPersonalityError,
  EmptyCandidateSetError,
  ConfigError,
} from "./errors";
export type { TerminalReason } from "./errors";

// --- Configuration ---
export { DEFAULT_CONFIG, mergeConfig, configIssues, resolveConfig } from "./config";
export { parseConfigOverrides, isRecord } from "./config-schema";
export type { ValidationResult } from "./config-schema";

// --- Types ---
export type {
  ArbiterConfig,
  BotMoveResult,
  CandidateMove,
  ChessEngine,
  ConfigOverrides,
  DecisionCategory,
  EngineLine,
  Evaluator,
  Logger,
  LossBand,
  MoveDecision,
  MoveSource,
  MoveTag,
  Outcome,
  PersonalityName,
  PersonalityProfile,
  Position,
  RandomSource,
  SearchBudget,
  SkillAnchor,
  SkillProfile,
} from "./types";

// --- Factory ---

import type { ChessEngine, ConfigOverrides, Logger, RandomSource } from "./types";
import { BotController } from "./bot-controller";
import { EngineEvaluator } from "./evaluator";
import { resolveConfig } from "./config";

/**
 * Create a bot controller for one game: the primary entry point for consumers.
 *
 * Wraps the engine in an EngineEvaluator using the configured search timeout.
 */
export function createBot(
  engine: ChessEngine,
  options: {
    rating: number;
    personality: string;
    config?: ConfigOverrides;
    random?: RandomSource;
    logger?: Logger;
  }
): BotController {
  const { timeoutMs } = resolveConfig(options.config).search;
  return new BotController({
    evaluator: new EngineEvaluator(engine, { timeoutMs }),
    ...options,
  });
}

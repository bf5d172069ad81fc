import type {
  ArbiterConfig,
  BotMoveResult,
  CandidateMove,
  ConfigOverrides,
  Evaluator,
  Logger,
  PersonalityProfile,
  Position,
  RandomSource,
  SearchBudget,
  SkillProfile,
} from "./types";
import { resolveConfig } from "./config";
import { EmptyCandidateSetError } from "./errors";
import { DecisionHistory } from "./decision-history";
import { resolveSkillProfile } from "./skill-profile";
import { resolvePersonality } from "./personality";
import { decideMove } from "./move-arbitrator";
import {
  buildOpeningBook,
  lookupBook,
  plyFromFen,
  sampleBookMove,
  type OpeningBook,
} from "./opening-book";

const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface BotControllerOptions {
  evaluator: Evaluator;
  rating: number;
  personality: string | PersonalityProfile;
  config?: ConfigOverrides;
  /** Defaults to Math.random; pass a seeded source for replayable games */
  random?: RandomSource;
  logger?: Logger;
  /** Defaults to the built-in repertoire */
  book?: OpeningBook;
}

/* ── Bot Controller ────────────────────────────────────────── */

/**
 * One game's worth of bot state: profiles, decision history, book.
 * Turns must be requested one at a time.
 */
export class BotController {
  private evaluator: Evaluator;
  private config: ArbiterConfig;
  private random: RandomSource;
  private logger: Logger;
  private book: OpeningBook;
  readonly skill: SkillProfile;
  readonly personality: PersonalityProfile;
  readonly history = new DecisionHistory();

  constructor(options: BotControllerOptions) {
    this.config = resolveConfig(options.config);
    this.evaluator = options.evaluator;
    this.skill = resolveSkillProfile(options.rating, this.config);
    this.personality =
      typeof options.personality === "string"
        ? resolvePersonality(options.personality)
        : options.personality;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? silentLogger;
    this.book = options.book ?? buildOpeningBook();
  }

  /** Budget for this bot's strength. */
  searchBudget(): SearchBudget {
    const budget: SearchBudget = {
      depth: this.skill.searchDepthCap,
      multiPv: this.skill.candidateCount,
    };
    if (this.config.search.movetimeMs > 0) {
      budget.movetimeMs = this.config.search.movetimeMs;
    }
    return budget;
  }

  /**
   * Get the bot's next move.
   *
   * Logic:
   * 1. Look up FEN in the opening book → if found, sample a move, return as 'book'
   * 2. Evaluate candidates within this skill's budget (one retry on an empty set)
   * 3. Arbitrate: personality, skill draw, band resolution
   * 4. Calculate think time
   *
   * EngineUnavailableError, NoLegalMovesError and InvalidPositionError
   * propagate to the caller.
   */
  async getMove(fen: Position): Promise<BotMoveResult> {
    // 1. Opening book
    const bookResult = this.tryBook(fen);
    if (bookResult) return bookResult;

    // 2. Evaluate
    const budget = this.searchBudget();
    let candidates = await this.evaluator.evaluate(fen, budget);
    if (candidates.length === 0) {
      this.logger.warn("Evaluator returned no candidates, retrying once", { fen });
      candidates = await this.evaluator.evaluate(fen, budget);
    }
    if (candidates.length === 0) {
      this.logger.error("Evaluator returned no candidates twice", { fen });
      throw new EmptyCandidateSetError(fen);
    }

    // 3. Arbitrate
    const decision = decideMove(
      {
        position: fen,
        candidates,
        skill: this.skill,
        personality: this.personality,
        random: this.random,
        history: this.history,
      },
      this.config
    );
    this.logger.debug("Move decided", {
      move: decision.move.uci,
      category: decision.category,
      drawn: decision.drawnOutcome,
      loss: decision.centipawnLoss,
    });

    // 4. Think time
    return {
      uci: decision.move.uci,
      san: decision.move.san,
      source: "engine",
      category: decision.category,
      rationale: decision.rationale,
      thinkTimeMs: this.computeEngineThinkTime(candidates),
      decision,
      candidates,
    };
  }

  private tryBook(fen: Position): BotMoveResult | null {
    if (!this.config.book.enabled) return null;
    if (plyFromFen(fen) >= this.config.book.maxPly) return null;

    const moves = lookupBook(this.book, fen);
    if (!moves) return null;

    const sampled = sampleBookMove(moves, this.personality, this.random, this.config);
    if (!sampled) return null;

    return {
      uci: sampled.move.uci,
      san: sampled.move.san,
      source: "book",
      category: "book",
      rationale: `book move from the ${sampled.opening}`,
      thinkTimeMs: this.computeBookThinkTime(),
      opening: sampled.opening,
    };
  }

  /* ── Think time helpers ────────────────────────────────── */

  private computeBookThinkTime(): number {
    if (!this.config.thinkTime.enabled) return 0;
    const [min, max] = this.config.thinkTime.bookMoveRange;
    return Math.round(min + this.random() * (max - min));
  }

  private computeEngineThinkTime(candidates: readonly CandidateMove[]): number {
    if (!this.config.thinkTime.enabled) return 0;

    const tt = this.config.thinkTime;
    const anchors = this.config.skillAnchors;
    const lo = anchors[0].rating;
    const hi = anchors[anchors.length - 1].rating;
    const strength = hi > lo ? (this.skill.targetRating - lo) / (hi - lo) : 1;

    // Stronger bots answer faster
    let time = tt.baseMs - strength * tt.skillReductionMs;

    // Difficulty bonus: if top two candidates are close, add thinking time
    if (candidates.length >= 2 && tt.closeEvalThreshold > 0) {
      const scoreDiff = Math.abs(candidates[0].score - candidates[1].score);
      if (scoreDiff <= tt.closeEvalThreshold) {
        const difficultyFactor = 1 - scoreDiff / tt.closeEvalThreshold;
        time += difficultyFactor * tt.difficultyBonusMax;
      }
    }

    // Random jitter
    time += (this.random() * 2 - 1) * tt.jitter;

    return Math.max(tt.minimum, Math.round(time));
  }
}

/* ── Positions ─────────────────────────────────────────────── */

/** A FEN string. Compared and cached as plain text. */
export type Position = string;

/* ── Chess Engine Abstraction ─────────────────────────────── */

/**
 * Search limits for one engine request.
 * `movetimeMs` is passed as `go movetime` alongside the depth when set.
 */
export interface SearchBudget {
  depth: number;
  multiPv: number;
  movetimeMs?: number;
}

/**
 * One MultiPV line as reported by a UCI engine.
 */
export interface EngineLine {
  /** UCI notation, e.g. "e2e4" */
  uci: string;
  /** Centipawns from side-to-move's perspective (mate scores encoded, see score.ts) */
  score: number;
  /** Mate distance when the engine reported `score mate N` */
  mate?: number;
  /** Search depth reached */
  depth: number;
  /** Principal variation as space-separated UCI moves */
  pv: string;
}

/**
 * Platform-agnostic chess engine interface.
 *
 * The CLI provides a spawned-process adapter and a WASM adapter;
 * tests provide in-process fakes. All implement this interface.
 */
export interface ChessEngine {
  /** Analyze a position and return MultiPV lines, in MultiPV order. */
  analyze(fen: Position, budget: SearchBudget): Promise<EngineLine[]>;

  /** Clean up resources (child processes, WASM module, etc.) */
  dispose(): void;
}

/* ── Candidates ───────────────────────────────────────────── */

export type MoveTag =
  | "capture"
  | "check"
  | "sacrifice"
  | "quiet"
  | "promotion"
  | "castle"
  | "pawn-advance"
  | "central";

/**
 * A legal move paired with the engine's assessment of the resulting position.
 * Produced fresh each turn by the evaluator; never mutated.
 */
export interface CandidateMove {
  readonly uci: string;
  readonly san: string;
  /** Centipawns from the mover's perspective */
  readonly score: number;
  readonly mate?: number;
  readonly depth: number;
  readonly pv: string;
  readonly resultingPosition: Position;
  readonly tags: readonly MoveTag[];
}

/**
 * Evaluator Adapter contract: best-first candidates for a position.
 */
export interface Evaluator {
  evaluate(position: Position, budget: SearchBudget): Promise<CandidateMove[]>;
}

/* ── Profiles ─────────────────────────────────────────────── */

export interface SkillProfile {
  readonly targetRating: number;
  readonly blunderProbability: number;
  readonly inaccuracyProbability: number;
  readonly brilliancyProbability: number;
  readonly searchDepthCap: number;
  readonly evalNoiseStddev: number;
  /** MultiPV lines to request; weaker profiles look wider so mistake bands can be filled */
  readonly candidateCount: number;
  /** Blunders into a forced mate are only allowed at the lowest tier */
  readonly allowMateBlunders: boolean;
}

export type PersonalityName =
  | "aggressive"
  | "defensive"
  | "creative"
  | "solid"
  | "positional";

export interface PersonalityProfile {
  readonly name: PersonalityName;
  readonly description: string;
  /** Additive centipawn adjustments per move tag */
  readonly tagAdjustments: Readonly<Partial<Record<MoveTag, number>>>;
  /** Opening names from the repertoire this style prefers */
  readonly openingPreferences: readonly string[];
}

/* ── Decisions ────────────────────────────────────────────── */

/** What the skill draw asked for. */
export type Outcome = "normal" | "inaccuracy" | "blunder" | "brilliancy";

/** What was actually played. */
export type DecisionCategory = "best" | "brilliant" | "inaccuracy" | "blunder";

export interface MoveDecision {
  position: Position;
  move: CandidateMove;
  category: DecisionCategory;
  drawnOutcome: Outcome;
  /** Loss against the engine's top move, never negative */
  centipawnLoss: number;
  adjustedScore: number;
  rationale: string;
}

/** Uniform [0, 1) source. Injected so decisions can be replayed. */
export type RandomSource = () => number;

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/* ── Bot Output ───────────────────────────────────────────── */

export type MoveSource = "book" | "engine";

export interface BotMoveResult {
  uci: string;
  san: string;
  source: MoveSource;
  category: DecisionCategory | "book";
  rationale: string;
  thinkTimeMs: number;
  /** Present for engine moves */
  decision?: MoveDecision;
  /** MultiPV candidates from engine evaluation (absent for book moves). */
  candidates?: CandidateMove[];
  /** Opening name for book moves */
  opening?: string;
}

/* ── Configuration ────────────────────────────────────────── */

export interface SkillAnchor {
  rating: number;
  blunder: number;
  inaccuracy: number;
  brilliancy: number;
  depth: number;
  noise: number;
  candidates: number;
}

/** Inclusive centipawn-loss range */
export interface LossBand {
  min: number;
  max: number;
}

export interface ArbiterConfig {
  /**
   * Anchor points for skill interpolation, ascending by rating.
   * The first and last anchors bound the accepted rating range.
   */
  skillAnchors: SkillAnchor[];

  /** Ratings at or below this may blunder into a forced mate */
  mateBlunderMaxRating: number;

  /** Centipawn-loss bands against the engine's top move */
  bands: {
    inaccuracy: LossBand;
    blunder: LossBand;
    /** A brilliancy may cost at most `max` */
    brilliancy: LossBand;
  };

  /** Anti-clustering of mistakes */
  smoothing: {
    /** Probability multiplier is (1 - factor) for a recently used category */
    factor: number;
    /** How many previous decisions count as "recent" */
    window: number;
  };

  /** Personality bounds */
  style: {
    /** Never prefer a move worse by more than this for style */
    ceiling: number;
  };

  search: {
    /** Per-turn budget at the adapter boundary */
    timeoutMs: number;
    /** 0 = depth-limited search only */
    movetimeMs: number;
  };

  book: {
    enabled: boolean;
    /** Stop consulting the book after this many plies */
    maxPly: number;
    /** Chance to restrict the pick to personality-preferred openings */
    preferredWeight: number;
  };

  /** Think time simulation */
  thinkTime: {
    enabled: boolean;
    /** Base ms at the lowest rating anchor */
    baseMs: number;
    /** Ms shaved off at the highest rating anchor */
    skillReductionMs: number;
    bookMoveRange: [number, number];
    /** Max bonus ms when top 2 candidates are close */
    difficultyBonusMax: number;
    /** cp gap threshold for "difficult" decisions */
    closeEvalThreshold: number;
    /** ± random jitter in ms */
    jitter: number;
    /** Floor for think time in ms */
    minimum: number;
  };
}

/**
 * Partial overrides, merged one level deep.
 * Arrays and tuples are replaced wholesale.
 */
export type ConfigOverrides = {
  [K in keyof ArbiterConfig]?: ArbiterConfig[K] extends unknown[]
    ? ArbiterConfig[K]
    : Partial<ArbiterConfig[K]>;
};

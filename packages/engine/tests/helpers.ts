import type {
  CandidateMove,
  ChessEngine,
  EngineLine,
  Evaluator,
  MoveTag,
  Position,
  SearchBudget,
} from "../src/types";

/** Hand-built candidate; the resulting position is not needed by the arbitrator. */
export function cand(
  uci: string,
  score: number,
  tags: MoveTag[] = ["quiet"],
  san = uci
): CandidateMove {
  return {
    uci,
    san,
    score,
    depth: 12,
    pv: uci,
    resultingPosition: `after-${uci}`,
    tags,
  };
}

/** Always returns the same value. */
export function constantRandom(value: number): () => number {
  return () => value;
}

/** Replays values in order, then repeats the last one. */
export function sequenceRandom(values: number[]): () => number {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)];
}

/**
 * In-process engine stand-in: answers each position from a script.
 */
export class ScriptedEngine implements ChessEngine {
  readonly requests: { fen: Position; budget: SearchBudget }[] = [];
  disposed = false;

  constructor(
    private readonly script: (fen: Position, budget: SearchBudget) => Promise<EngineLine[]>
  ) {}

  analyze(fen: Position, budget: SearchBudget): Promise<EngineLine[]> {
    this.requests.push({ fen, budget });
    return this.script(fen, budget);
  }

  dispose(): void {
    this.disposed = true;
  }
}

export function line(uci: string, score: number, depth = 10): EngineLine {
  return { uci, score, depth, pv: uci };
}

/** Evaluator stand-in returning queued results in order. */
export class QueuedEvaluator implements Evaluator {
  calls = 0;

  constructor(private readonly results: (CandidateMove[] | Error)[]) {}

  async evaluate(): Promise<CandidateMove[]> {
    const next = this.results[Math.min(this.calls, this.results.length - 1)];
    this.calls++;
    if (next instanceof Error) throw next;
    return next;
  }
}

export const START_FEN = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1";

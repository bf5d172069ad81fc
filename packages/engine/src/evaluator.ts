/**
 * Evaluator adapter: turns raw engine lines into tagged, best-first
 * candidates and maps engine trouble onto the error taxonomy.
 */

import { Chess } from "chess.js";
import type {
  CandidateMove,
  ChessEngine,
  EngineLine,
  Evaluator,
  Position,
  SearchBudget,
} from "./types";
import {
  EngineUnavailableError,
  InvalidPositionError,
  NoLegalMovesError,
  type TerminalReason,
} from "./errors";
import { inspectMove } from "./move-tags";

/** Why the side to move has no moves, or null when it has some. */
export function terminalReason(fen: Position): TerminalReason | null {
  const chess = new Chess(fen);
  if (chess.moves().length > 0) return null;
  if (chess.isCheckmate()) return "checkmate";
  if (chess.isStalemate()) return "stalemate";
  return "no-moves";
}

/**
 * Build candidates from MultiPV lines.
 * Malformed, illegal and duplicate moves are dropped; the rest are sorted
 * by score with ties kept in MultiPV order (Array.sort is stable).
 */
export function toCandidates(fen: Position, lines: readonly EngineLine[]): CandidateMove[] {
  const seen = new Set<string>();
  const candidates: CandidateMove[] = [];

  for (const line of lines) {
    if (seen.has(line.uci)) continue;
    const inspected = inspectMove(fen, line.uci);
    if (!inspected) continue;
    seen.add(line.uci);

    candidates.push(
      Object.freeze({
        uci: line.uci,
        san: inspected.san,
        score: line.score,
        ...(line.mate !== undefined ? { mate: line.mate } : {}),
        depth: line.depth,
        pv: line.pv,
        resultingPosition: inspected.resultingPosition,
        tags: Object.freeze(inspected.tags),
      })
    );
  }

  return candidates.sort((a, b) => b.score - a.score);
}

export class EngineEvaluator implements Evaluator {
  private engine: ChessEngine;
  private timeoutMs: number;

  constructor(engine: ChessEngine, options: { timeoutMs: number }) {
    this.engine = engine;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Best-first candidates for `position`.
   *
   * Throws InvalidPositionError for an unreadable FEN, NoLegalMovesError
   * for terminal positions (checked before the engine is asked, and again
   * when the engine answers `bestmove (none)`), and EngineUnavailableError
   * when the engine fails or exceeds the timeout.
   */
  async evaluate(position: Position, budget: SearchBudget): Promise<CandidateMove[]> {
    let reason: TerminalReason | null;
    try {
      reason = terminalReason(position);
    } catch (err) {
      throw new InvalidPositionError(position, { cause: err });
    }
    if (reason) throw new NoLegalMovesError(reason, position);

    const lines = await this.analyzeWithTimeout(position, budget);
    return toCandidates(position, lines);
  }

  private async analyzeWithTimeout(
    position: Position,
    budget: SearchBudget
  ): Promise<EngineLine[]> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new EngineUnavailableError(
              `Engine did not answer within ${this.timeoutMs}ms`
            )
          ),
        this.timeoutMs
      );
    });

    try {
      return await Promise.race([this.engine.analyze(position, budget), timeout]);
    } catch (err) {
      if (err instanceof EngineUnavailableError || err instanceof NoLegalMovesError) throw err;
      throw new EngineUnavailableError("Engine request failed", { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Self-play: two bots share one engine and play a game from a start
 * position until it ends or the ply limit is reached.
 */

import { Chess } from "chess.js";
import {
  createBot,
  createSeededRandom,
  NoLegalMovesError,
  type BotMoveResult,
  type ChessEngine,
  type ConfigOverrides,
  type Logger,
} from "@movecraft/engine";

export const START_FEN = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1";

export type Side = "white" | "black";
export type GameResult = "1-0" | "0-1" | "1/2-1/2" | "*";

export interface SideSetup {
  rating: number;
  personality: string;
}

export interface PlyRecord {
  ply: number;
  side: Side;
  fen: string;
  uci: string;
  san: string;
  source: BotMoveResult["source"];
  category: BotMoveResult["category"];
  /** Engine moves only */
  centipawnLoss?: number;
  rationale: string;
}

export interface GameRecord {
  white: SideSetup;
  black: SideSetup;
  seed: number;
  startFen: string;
  result: GameResult;
  termination: string;
  plies: PlyRecord[];
  pgn: string;
}

export interface GameOptions {
  engine: ChessEngine;
  white: SideSetup;
  black: SideSetup;
  seed: number;
  maxPlies: number;
  startFen?: string;
  config?: ConfigOverrides;
  logger?: Logger;
  onPly?: (record: PlyRecord) => void;
}

export async function playGame(options: GameOptions): Promise<GameRecord> {
  const startFen = options.startFen ?? START_FEN;
  const chess = new Chess(startFen);
  // Each side draws from its own stream so one bot's choices never shift the other's
  const bots = {
    white: createBot(options.engine, {
      ...options.white,
      config: options.config,
      random: createSeededRandom(options.seed),
      logger: options.logger,
    }),
    black: createBot(options.engine, {
      ...options.black,
      config: options.config,
      random: createSeededRandom(options.seed + 1),
      logger: options.logger,
    }),
  };

  const plies: PlyRecord[] = [];
  while (plies.length < options.maxPlies && !chess.isGameOver()) {
    const side: Side = chess.turn() === "w" ? "white" : "black";
    const fen = chess.fen();

    let move: BotMoveResult;
    try {
      move = await bots[side].getMove(fen);
    } catch (err) {
      if (err instanceof NoLegalMovesError) break;
      throw err;
    }

    chess.move({
      from: move.uci.substring(0, 2),
      to: move.uci.substring(2, 4),
      promotion: move.uci.length > 4 ? move.uci.substring(4) : undefined,
    });

    const record: PlyRecord = {
      ply: plies.length + 1,
      side,
      fen,
      uci: move.uci,
      san: move.san,
      source: move.source,
      category: move.category,
      rationale: move.rationale,
    };
    if (move.decision) record.centipawnLoss = move.decision.centipawnLoss;
    plies.push(record);
    options.logger?.debug(`${record.ply}. ${side} ${move.san}`, { category: move.category });
    options.onPly?.(record);
  }

  const { result, termination } = gameOutcome(chess);
  const headers: [string, string][] = [
    ["Event", "movecraft self-play"],
    ["White", `movecraft ${options.white.rating} ${options.white.personality}`],
    ["Black", `movecraft ${options.black.rating} ${options.black.personality}`],
    ["Result", result],
    ["Termination", termination],
  ];
  if (startFen !== START_FEN) {
    headers.push(["SetUp", "1"], ["FEN", startFen]);
  }

  return {
    white: options.white,
    black: options.black,
    seed: options.seed,
    startFen,
    result,
    termination,
    plies,
    pgn: formatPgn(headers, startFen, plies.map((p) => p.san), result),
  };
}

function gameOutcome(chess: Chess): { result: GameResult; termination: string } {
  if (chess.isCheckmate()) {
    return { result: chess.turn() === "w" ? "0-1" : "1-0", termination: "checkmate" };
  }
  if (chess.isStalemate()) return { result: "1/2-1/2", termination: "stalemate" };
  if (chess.isInsufficientMaterial()) {
    return { result: "1/2-1/2", termination: "insufficient material" };
  }
  if (chess.isThreefoldRepetition()) {
    return { result: "1/2-1/2", termination: "threefold repetition" };
  }
  if (chess.isDraw()) return { result: "1/2-1/2", termination: "fifty-move rule" };
  return { result: "*", termination: "move limit" };
}

/** PGN text: tag pairs, a blank line, numbered movetext ending in the result. */
export function formatPgn(
  headers: readonly [string, string][],
  startFen: string,
  sans: readonly string[],
  result: GameResult
): string {
  const fields = startFen.split(" ");
  let moveNumber = parseInt(fields[5] ?? "1", 10) || 1;
  let whiteToMove = fields[1] !== "b";

  const tokens: string[] = [];
  sans.forEach((san, i) => {
    if (whiteToMove) tokens.push(`${moveNumber}.`);
    else if (i === 0) tokens.push(`${moveNumber}...`);
    tokens.push(san);
    if (!whiteToMove) moveNumber++;
    whiteToMove = !whiteToMove;
  });
  tokens.push(result);

  const tags = headers.map(([key, value]) => `[${key} "${value.replace(/"/g, '\\"')}"]`);
  return `${tags.join("\n")}\n\n${tokens.join(" ")}\n`;
}

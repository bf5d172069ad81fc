/**
 * Move tagging: categorizes a candidate so personalities and the
 * brilliancy rule can react to what kind of move it is.
 */

import { Chess, type Move, type Square } from "chess.js";
import type { MoveTag, Position } from "./types";

const PIECE_VALUES: Record<string, number> = { p: 1, n: 3, b: 3, r: 5, q: 9, k: 0 };

/** Check that a string looks like a valid UCI move (e.g. "e2e4", "e7e8q") */
export function isValidUCI(uci: string): boolean {
  return /^[a-h][1-8][a-h][1-8][qrbn]?$/.test(uci);
}

export interface MoveInspection {
  san: string;
  resultingPosition: Position;
  tags: MoveTag[];
}

/**
 * Play a UCI move on a copy of the position and describe it.
 * Returns null for malformed or illegal moves.
 */
export function inspectMove(fen: Position, uci: string): MoveInspection | null {
  if (!isValidUCI(uci)) return null;

  let chess: Chess;
  try {
    chess = new Chess(fen);
  } catch {
    return null;
  }

  const mover = chess.turn();
  const opponent = mover === "w" ? "b" : "w";

  let move: Move;
  try {
    move = chess.move({
      from: uci.substring(0, 2),
      to: uci.substring(2, 4),
      promotion: uci.length > 4 ? uci.substring(4) : undefined,
    });
  } catch {
    return null;
  }

  const tags: MoveTag[] = [];
  const isCapture = move.captured !== undefined;
  const isPromotion = move.promotion !== undefined;
  const givesCheck = chess.inCheck();

  if (isCapture) tags.push("capture");
  if (givesCheck) tags.push("check");
  if (isPromotion) tags.push("promotion");
  if (move.flags.includes("k") || move.flags.includes("q")) tags.push("castle");
  if (move.piece === "p" && !isCapture) tags.push("pawn-advance");
  if (isCentral(move.to)) tags.push("central");
  if (isSacrifice(chess, move.to, move.promotion ?? move.piece, move.captured, mover, opponent)) {
    tags.push("sacrifice");
  }
  if (!isCapture && !givesCheck && !isPromotion) tags.push("quiet");

  return { san: move.san, resultingPosition: chess.fen(), tags };
}

/** Tags only; empty for illegal moves. */
export function tagMove(fen: Position, uci: string): MoveTag[] {
  return inspectMove(fen, uci)?.tags ?? [];
}

/* ── Helpers ──────────────────────────────────────────────── */

/** c3..f6 */
function isCentral(square: Square): boolean {
  const file = square.charCodeAt(0) - 97;
  const rank = Number(square[1]) - 1;
  return file >= 2 && file <= 5 && rank >= 2 && rank <= 5;
}

/**
 * Material offered on the destination square.
 * Defended: the piece must be worth at least 2 more than what it took.
 * Undefended: anything worth more than what it took.
 */
function isSacrifice(
  after: Chess,
  to: Square,
  piece: string,
  captured: string | undefined,
  mover: "w" | "b",
  opponent: "w" | "b"
): boolean {
  if (piece === "k") return false;
  if (!after.isAttacked(to, opponent)) return false;

  const offered = PIECE_VALUES[piece] ?? 0;
  const taken = captured ? PIECE_VALUES[captured] ?? 0 : 0;
  const defended = after.isAttacked(to, mover);

  return defended ? offered - taken >= 2 : offered > taken;
}

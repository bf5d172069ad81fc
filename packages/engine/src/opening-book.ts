import { Chess } from "chess.js";
import type { ArbiterConfig, PersonalityProfile, Position, RandomSource } from "./types";
import { pickOne } from "./random";
import repertoire from "../data/openings.json";

export interface RepertoireLine {
  name: string;
  /** UCI moves from the initial position */
  moves: string[];
}

export interface BookMove {
  uci: string;
  san: string;
  /** Openings whose main line continues with this move */
  openings: string[];
}

export interface OpeningBook {
  [fenKey: string]: BookMove[];
}

/**
 * Normalize a FEN by dropping halfmove and fullmove clocks.
 * This merges transpositions that reach the same position.
 * An en-passant square is kept only when the capture is actually legal,
 * so "e3" after 1.e4 keys the same as "-".
 */
export function normalizeFen(fen: Position): string {
  const fields = fen.split(" ").slice(0, 4);
  if (fields.length === 4 && fields[3] !== "-" && !hasEnPassantCapture(fen)) {
    fields[3] = "-";
  }
  return fields.join(" ");
}

function hasEnPassantCapture(fen: Position): boolean {
  try {
    return new Chess(fen).moves({ verbose: true }).some((m) => m.flags.includes("e"));
  } catch {
    // Unreadable FENs never match a book key; the evaluator reports them
    return false;
  }
}

/**
 * Build a FEN-keyed book from repertoire lines.
 * Lines that stop being legal are cut at the first illegal move.
 */
export function buildOpeningBook(
  lines: readonly RepertoireLine[] = repertoire
): OpeningBook {
  const book: OpeningBook = {};

  for (const line of lines) {
    const chess = new Chess();
    for (const uci of line.moves) {
      const key = normalizeFen(chess.fen());
      let san: string;
      try {
        san = chess.move({
          from: uci.substring(0, 2),
          to: uci.substring(2, 4),
          promotion: uci.length > 4 ? uci.substring(4) : undefined,
        }).san;
      } catch {
        break;
      }

      if (!book[key]) book[key] = [];
      const moves = book[key];
      const existing = moves.find((m) => m.uci === uci);
      if (existing) {
        if (!existing.openings.includes(line.name)) existing.openings.push(line.name);
      } else {
        moves.push({ uci, san, openings: [line.name] });
      }
    }
  }

  return book;
}

/**
 * Look up the current position in the book.
 * Returns the available moves or null if out of book.
 */
export function lookupBook(book: OpeningBook, fen: Position): BookMove[] | null {
  const moves = book[normalizeFen(fen)];
  return moves && moves.length > 0 ? moves : null;
}

/** Fullmove counter and side to move → plies played so far. */
export function plyFromFen(fen: Position): number {
  const parts = fen.split(" ");
  const fullmove = parseInt(parts[5] ?? "1", 10) || 1;
  return (fullmove - 1) * 2 + (parts[1] === "b" ? 1 : 0);
}

/**
 * Sample a book move for a personality.
 *
 * With probability `preferredWeight`, the pick is restricted to moves that
 * continue one of the personality's preferred openings (when any exist);
 * otherwise any book move. Uniform within the chosen group.
 */
export function sampleBookMove(
  moves: readonly BookMove[],
  personality: PersonalityProfile,
  random: RandomSource,
  config: Pick<ArbiterConfig, "book">
): { move: BookMove; opening: string } | null {
  if (moves.length === 0) return null;

  const prefers = (name: string) => personality.openingPreferences.includes(name);
  const preferred = moves.filter((m) => m.openings.some(prefers));
  const usePreferred =
    preferred.length > 0 && random() < config.book.preferredWeight;

  const move = pickOne(usePreferred ? preferred : moves, random);
  const opening =
    (usePreferred ? move.openings.find(prefers) : undefined) ?? move.openings[0];
  return { move, opening };
}

/**
 * Per-side summaries of a finished game.
 */

import type { DecisionCategory } from "@movecraft/engine";
import type { GameRecord, PlyRecord, Side } from "./self-play";

export interface SideMetrics {
  moves: number;
  bookMoves: number;
  engineMoves: number;
  categories: Record<DecisionCategory, number>;
  /** Mean loss over engine moves; NaN when there were none */
  avgCPL: number;
}

export function computeSideMetrics(plies: readonly PlyRecord[]): SideMetrics {
  const categories: Record<DecisionCategory, number> = {
    best: 0,
    brilliant: 0,
    inaccuracy: 0,
    blunder: 0,
  };
  let bookMoves = 0;
  const losses: number[] = [];

  for (const ply of plies) {
    if (ply.category === "book") {
      bookMoves++;
      continue;
    }
    categories[ply.category]++;
    if (ply.centipawnLoss !== undefined) losses.push(ply.centipawnLoss);
  }

  return {
    moves: plies.length,
    bookMoves,
    engineMoves: plies.length - bookMoves,
    categories,
    // No data → NaN (not 0, which would mean "perfect play")
    avgCPL: losses.length > 0 ? losses.reduce((sum, l) => sum + l, 0) / losses.length : NaN,
  };
}

export function computeGameMetrics(game: GameRecord): Record<Side, SideMetrics> {
  return {
    white: computeSideMetrics(game.plies.filter((p) => p.side === "white")),
    black: computeSideMetrics(game.plies.filter((p) => p.side === "black")),
  };
}

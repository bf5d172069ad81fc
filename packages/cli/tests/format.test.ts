import { describe, it, expect } from "vitest";
import { resolvePersonality, resolveSkillProfile } from "@movecraft/engine";
import {
  formatGameSummary,
  formatPersonalities,
  formatSkillProfile,
  progressBar,
} from "../src/format";
import { computeGameMetrics, computeSideMetrics } from "../src/metrics";
import type { GameRecord, PlyRecord } from "../src/self-play";

function ply(
  n: number,
  side: PlyRecord["side"],
  category: PlyRecord["category"],
  centipawnLoss?: number
): PlyRecord {
  return {
    ply: n,
    side,
    fen: "fen",
    uci: "e2e4",
    san: "e4",
    source: category === "book" ? "book" : "engine",
    category,
    centipawnLoss,
    rationale: "",
  };
}

describe("computeSideMetrics", () => {
  it("tallies categories and averages engine-move loss", () => {
    const m = computeSideMetrics([
      ply(1, "white", "book"),
      ply(3, "white", "best", 0),
      ply(5, "white", "inaccuracy", 40),
      ply(7, "white", "blunder", 300),
    ]);
    expect(m).toEqual({
      moves: 4,
      bookMoves: 1,
      engineMoves: 3,
      categories: { best: 1, brilliant: 0, inaccuracy: 1, blunder: 1 },
      avgCPL: 340 / 3,
    });
  });

  it("has no average without engine moves", () => {
    expect(computeSideMetrics([ply(1, "white", "book")]).avgCPL).toBeNaN();
  });
});

describe("format", () => {
  it("draws a progress bar", () => {
    expect(progressBar(5, 10, 10)).toBe("[█████░░░░░] 5/10 (50.0%)");
    expect(progressBar(0, 0, 4)).toBe("[░░░░] 0/0 (0.0%)");
  });

  it("prints a skill profile", () => {
    const lines = formatSkillProfile(resolveSkillProfile(800)).split("\n");
    expect(lines).toContain("  Skill profile @ 800");
    expect(lines).toContain("  Blunder probability:     12.0%");
    expect(lines).toContain("  Mate blunders allowed:   yes");
  });

  it("lists personality adjustments", () => {
    const lines = formatPersonalities([resolvePersonality("solid")]).split("\n");
    expect(lines).toContain("  solid        Plays principled, theoretically sound moves");
    expect(lines).toContain("               adjustments: castle +4");
  });

  it("summarizes a game per side", () => {
    const game: GameRecord = {
      white: { rating: 1200, personality: "aggressive" },
      black: { rating: 1800, personality: "solid" },
      seed: 1,
      startFen: "start",
      result: "*",
      termination: "move limit",
      plies: [ply(1, "white", "book"), ply(2, "black", "blunder", 250)],
      pgn: "",
    };
    const lines = formatGameSummary(game, computeGameMetrics(game)).split("\n");
    expect(lines).toContain("  Result: * (move limit) after 2 plies");
    expect(lines).toContain(
      "  white     1200  aggressive       1     0      0      0      0    n/a"
    );
    expect(lines).toContain(
      "  black     1800  solid            0     0      0      0      1  250.0"
    );
  });
});

import { describe, it, expect } from "vitest";
import { Chess } from "chess.js";
import { formatPgn, playGame } from "../src/self-play";
import { MaterialEngine } from "./helpers";

const BACK_RANK = "6k1/5ppp/8/8/8/8/8/R5K1 w - - 0 1";

describe("playGame", () => {
  it("finishes a game that ends in mate", async () => {
    const game = await playGame({
      engine: new MaterialEngine(),
      white: { rating: 2500, personality: "solid" },
      black: { rating: 2500, personality: "solid" },
      seed: 1,
      maxPlies: 10,
      startFen: BACK_RANK,
    });

    expect(game.result).toBe("1-0");
    expect(game.termination).toBe("checkmate");
    expect(game.plies).toHaveLength(1);
    expect(game.plies[0]).toMatchObject({ side: "white", uci: "a1a8", san: "Ra8#", source: "engine", category: "best" });
    expect(game.pgn).toBe(
      [
        '[Event "movecraft self-play"]',
        '[White "movecraft 2500 solid"]',
        '[Black "movecraft 2500 solid"]',
        '[Result "1-0"]',
        '[Termination "checkmate"]',
        '[SetUp "1"]',
        `[FEN "${BACK_RANK}"]`,
        "",
        "1. Ra8# 1-0",
        "",
      ].join("\n")
    );
  });

  it("plays legal, reproducible games from the start position", async () => {
    const run = () =>
      playGame({
        engine: new MaterialEngine(),
        white: { rating: 1200, personality: "aggressive" },
        black: { rating: 1800, personality: "positional" },
        seed: 2024,
        maxPlies: 16,
      });

    const game = await run();
    expect(await run()).toEqual(game);

    expect(game.plies.length).toBeLessThanOrEqual(16);
    if (game.result === "*") expect(game.plies).toHaveLength(16);
    expect(game.plies[0].source).toBe("book");

    const replay = new Chess();
    for (const ply of game.plies) {
      expect(replay.fen()).toBe(ply.fen);
      replay.move(ply.san);
    }
    expect(game.pgn.startsWith('[Event "movecraft self-play"]')).toBe(true);
  });

  it("stops at the ply limit", async () => {
    const game = await playGame({
      engine: new MaterialEngine(),
      white: { rating: 1500, personality: "solid" },
      black: { rating: 1500, personality: "solid" },
      seed: 3,
      maxPlies: 2,
    });
    expect(game.plies).toHaveLength(2);
    expect(game.result).toBe("*");
    expect(game.termination).toBe("move limit");
  });
});

describe("formatPgn", () => {
  it("numbers moves from a black-to-move start", () => {
    expect(
      formatPgn([["Event", "test"]], "8/8/8/8/8/8/8/8 b - - 0 7", ["e5", "Nf3", "Nc6"], "*")
    ).toBe('[Event "test"]\n\n7... e5 8. Nf3 Nc6 *\n');
  });
});

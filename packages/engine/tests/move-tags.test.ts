import { describe, it, expect } from "vitest";
import { inspectMove, isValidUCI, tagMove } from "../src/move-tags";
import { START_FEN } from "./helpers";

describe("isValidUCI", () => {
  it("accepts plain moves and promotions", () => {
    expect(isValidUCI("e2e4")).toBe(true);
    expect(isValidUCI("e7e8q")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isValidUCI("e2")).toBe(false);
    expect(isValidUCI("e2e9")).toBe(false);
    expect(isValidUCI("e7e8k")).toBe(false);
    expect(isValidUCI("Nf3")).toBe(false);
  });
});

describe("inspectMove", () => {
  it("tags a central pawn push", () => {
    const result = inspectMove(START_FEN, "e2e4");
    expect(result?.san).toBe("e4");
    expect(result?.tags).toEqual(["pawn-advance", "central", "quiet"]);
    expect(result?.resultingPosition.split(" ")[0]).toBe(
      "rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR"
    );
  });

  it("tags a developing knight move", () => {
    expect(tagMove(START_FEN, "g1f3")).toEqual(["central", "quiet"]);
  });

  it("tags an even pawn trade as a capture, not a sacrifice", () => {
    const fen = "rnbqkbnr/ppp1pppp/8/3p4/4P3/8/PPPP1PPP/RNBQKBNR w KQkq d6 0 2";
    const result = inspectMove(fen, "e4d5");
    expect(result?.san).toBe("exd5");
    expect(result?.tags).toEqual(["capture", "central"]);
  });

  it("tags a checking move", () => {
    const result = inspectMove("4k3/8/8/8/8/8/8/4K2R w K - 0 1", "h1h8");
    expect(result?.san).toBe("Rh8+");
    expect(result?.tags).toEqual(["check"]);
  });

  it("tags a piece left en prise as a sacrifice", () => {
    const result = inspectMove("4k3/8/3p4/8/8/5N2/8/4K3 w - - 0 1", "f3e5");
    expect(result?.san).toBe("Ne5");
    expect(result?.tags).toEqual(["central", "sacrifice", "quiet"]);
  });

  it("tags castling", () => {
    const result = inspectMove("r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1", "e1g1");
    expect(result?.san).toBe("O-O");
    expect(result?.tags).toEqual(["castle", "quiet"]);
  });

  it("tags a promotion", () => {
    const result = inspectMove("8/4P3/8/8/8/8/k7/4K3 w - - 0 1", "e7e8q");
    expect(result?.san).toBe("e8=Q");
    expect(result?.tags).toEqual(["promotion", "pawn-advance"]);
  });

  it("returns null for illegal or malformed input", () => {
    expect(inspectMove(START_FEN, "e2e5")).toBeNull();
    expect(inspectMove(START_FEN, "e2")).toBeNull();
    expect(inspectMove("not a fen", "e2e4")).toBeNull();
    expect(tagMove(START_FEN, "e2e5")).toEqual([]);
  });
});

import { describe, it, expect } from "vitest";
import {
  resolvePersonality,
  applyPersonality,
  styleBonus,
  PERSONALITY_NAMES,
} from "../src/personality";
import { UnknownPersonalityError } from "../src/errors";
import type { PersonalityProfile } from "../src/types";
import { cand } from "./helpers";

const STYLE = { ceiling: 60 };

describe("resolvePersonality", () => {
  it("resolves every known name, case-insensitively", () => {
    for (const name of PERSONALITY_NAMES) {
      expect(resolvePersonality(name).name).toBe(name);
    }
    expect(resolvePersonality("  Aggressive ").name).toBe("aggressive");
  });

  it("rejects unknown names and lists the valid ones", () => {
    try {
      resolvePersonality("reckless");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownPersonalityError);
      if (err instanceof UnknownPersonalityError) {
        expect(err.personality).toBe("reckless");
        expect(err.known).toEqual(["aggressive", "defensive", "creative", "solid", "positional"]);
      }
    }
  });

  it("returns shared, frozen profiles", () => {
    const a = resolvePersonality("solid");
    expect(resolvePersonality("solid")).toBe(a);
    expect(Object.isFrozen(a)).toBe(true);
    expect(Object.isFrozen(a.tagAdjustments)).toBe(true);
  });
});

describe("applyPersonality", () => {
  it("sums tag adjustments", () => {
    const aggressive = resolvePersonality("aggressive");
    expect(styleBonus(["check", "sacrifice"], aggressive)).toBe(23);
    expect(styleBonus(["quiet"], aggressive)).toBe(-5);
    expect(styleBonus([], aggressive)).toBe(0);
  });

  it("re-ranks near-equal moves by taste", () => {
    const ranked = applyPersonality(
      [cand("e2e4", 50, ["quiet"]), cand("d1h5", 45, ["check", "sacrifice"])],
      resolvePersonality("aggressive"),
      STYLE
    );
    expect(ranked.map((r) => r.candidate.uci)).toEqual(["d1h5", "e2e4"]);
    expect(ranked[0].adjustedScore).toBe(68);
    expect(ranked[0].engineRank).toBe(1);
    expect(ranked[1].adjustedScore).toBe(45);
  });

  it("never lets style overtake a move more than the ceiling better", () => {
    const extreme: PersonalityProfile = {
      name: "creative",
      description: "test",
      tagAdjustments: { sacrifice: 500, quiet: -500 },
      openingPreferences: [],
    };

    const farBehind = applyPersonality(
      [cand("a2a3", 100, ["quiet"]), cand("b2b4", 39, ["sacrifice"])],
      extreme,
      STYLE
    );
    expect(farBehind[0].candidate.uci).toBe("a2a3");
    expect(farBehind[0].adjustedScore).toBe(70);
    expect(farBehind[1].adjustedScore).toBe(69);

    const close = applyPersonality(
      [cand("a2a3", 100, ["quiet"]), cand("b2b4", 41, ["sacrifice"])],
      extreme,
      STYLE
    );
    expect(close[0].candidate.uci).toBe("b2b4");
    expect(close[0].styleBonus).toBe(30);
  });

  it("breaks ties by engine order", () => {
    const ranked = applyPersonality(
      [cand("g1f3", 20), cand("b1c3", 20), cand("e2e4", 20)],
      resolvePersonality("solid"),
      STYLE
    );
    expect(ranked.map((r) => r.engineRank)).toEqual([0, 1, 2]);
  });

  it("does not mutate its input", () => {
    const input = [cand("e2e4", 10), cand("d2d4", 30)];
    const copy = input.map((c) => ({ ...c }));
    applyPersonality(input, resolvePersonality("positional"), STYLE);
    expect(input).toEqual(copy);
  });
});

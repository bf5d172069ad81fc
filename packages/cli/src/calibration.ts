/**
 * Calibration: run the arbitrator over synthetic candidate sets (no
 * engine) and compare realized category rates with the nominal ones.
 */

import {
  createSeededRandom,
  decideMove,
  DecisionHistory,
  deviationProbability,
  resolveConfig,
  resolvePersonality,
  resolveSkillProfile,
  type CandidateMove,
  type ConfigOverrides,
  type DecisionCategory,
  type MoveTag,
  type RandomSource,
  type SkillProfile,
} from "@movecraft/engine";

export interface CalibrationOptions {
  rating: number;
  personality: string;
  games: number;
  movesPerGame: number;
  seed: number;
  config?: ConfigOverrides;
  onGame?: (completed: number, total: number) => void;
}

export interface CalibrationReport {
  skill: SkillProfile;
  personality: string;
  decisions: number;
  counts: Record<DecisionCategory, number>;
  realized: Record<DecisionCategory, number>;
  nominal: Record<DecisionCategory, number>;
  avgCPL: number;
}

/** Loss range (cp) and tags for each slot of a synthetic set, best first. */
const SLOTS: { loss: [number, number]; tags: MoveTag[] }[] = [
  { loss: [0, 0], tags: ["quiet"] },
  { loss: [5, 15], tags: ["check"] },
  { loss: [25, 75], tags: ["quiet"] },
  { loss: [30, 70], tags: ["capture"] },
  { loss: [180, 480], tags: ["quiet"] },
  { loss: [200, 550], tags: ["capture"] },
];

/**
 * A best-first candidate set that can satisfy every outcome: a near-best
 * check, moves in the inaccuracy band and moves in the blunder band.
 */
export function syntheticCandidates(random: RandomSource): CandidateMove[] {
  const top = Math.round((random() * 2 - 1) * 150);
  return SLOTS.map(({ loss: [min, max], tags }, i) => {
    const uci = `s${i + 1}`;
    return {
      uci,
      san: uci,
      score: top - Math.round(min + random() * (max - min)),
      depth: 0,
      pv: uci,
      resultingPosition: "synthetic",
      tags,
    };
  });
}

const CATEGORIES: readonly DecisionCategory[] = ["best", "brilliant", "inaccuracy", "blunder"];

export function runCalibration(options: CalibrationOptions): CalibrationReport {
  const config = resolveConfig(options.config);
  const skill = resolveSkillProfile(options.rating, config);
  const personality = resolvePersonality(options.personality);
  const random = createSeededRandom(options.seed);

  const counts: Record<DecisionCategory, number> = {
    best: 0,
    brilliant: 0,
    inaccuracy: 0,
    blunder: 0,
  };
  let totalLoss = 0;
  let decisions = 0;

  for (let game = 0; game < options.games; game++) {
    const history = new DecisionHistory();
    for (let move = 0; move < options.movesPerGame; move++) {
      const decision = decideMove(
        {
          position: `synthetic-${game}-${move}`,
          candidates: syntheticCandidates(random),
          skill,
          personality,
          random,
          history,
        },
        config
      );
      totalLoss += decision.centipawnLoss;
      decisions++;
    }
    const tally = history.tally();
    for (const category of CATEGORIES) counts[category] += tally[category];
    options.onGame?.(game + 1, options.games);
  }

  const rate = (n: number) => (decisions > 0 ? n / decisions : 0);
  const deviation = deviationProbability(skill);

  return {
    skill,
    personality: personality.name,
    decisions,
    counts,
    realized: {
      best: rate(counts.best),
      brilliant: rate(counts.brilliant),
      inaccuracy: rate(counts.inaccuracy),
      blunder: rate(counts.blunder),
    },
    nominal: {
      best: Math.max(0, 1 - deviation),
      brilliant: skill.brilliancyProbability,
      inaccuracy: skill.inaccuracyProbability,
      blunder: skill.blunderProbability,
    },
    avgCPL: decisions > 0 ? totalLoss / decisions : NaN,
  };
}

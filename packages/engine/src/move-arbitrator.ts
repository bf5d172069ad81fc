import type {
  ArbiterConfig,
  CandidateMove,
  DecisionCategory,
  MoveDecision,
  Outcome,
  PersonalityProfile,
  Position,
  RandomSource,
  SkillProfile,
} from "./types";
import { DEFAULT_CONFIG } from "./config";
import { EmptyCandidateSetError } from "./errors";
import { DecisionHistory } from "./decision-history";
import { applyPersonality, type RankedCandidate } from "./personality";
import { centipawnLoss, isMatedScore } from "./score";
import { gaussian } from "./random";
import { buildRationale } from "./commentary";

export type OutcomeProbabilities = Record<Outcome, number>;

const CATEGORY_FOR: Record<Outcome, DecisionCategory> = {
  normal: "best",
  inaccuracy: "inaccuracy",
  blunder: "blunder",
  brilliancy: "brilliant",
};

/** Draw order; `normal` takes whatever is left */
const DEVIATIONS = ["blunder", "inaccuracy", "brilliancy"] as const;

/**
 * Per-turn outcome probabilities.
 *
 * A deviation whose category was played in the last `smoothing.window`
 * decisions is scaled by (1 - smoothing.factor), so mistakes do not
 * cluster. If the deviations sum above 1 they are normalized and
 * `normal` gets 0.
 */
export function outcomeProbabilities(
  skill: SkillProfile,
  history: DecisionHistory,
  config: Pick<ArbiterConfig, "smoothing"> = DEFAULT_CONFIG
): OutcomeProbabilities {
  const { factor, window } = config.smoothing;
  const base: Record<(typeof DEVIATIONS)[number], number> = {
    blunder: skill.blunderProbability,
    inaccuracy: skill.inaccuracyProbability,
    brilliancy: skill.brilliancyProbability,
  };

  const probs = { normal: 0, blunder: 0, inaccuracy: 0, brilliancy: 0 };
  let total = 0;
  for (const outcome of DEVIATIONS) {
    const recent = history.usedRecently(CATEGORY_FOR[outcome], window);
    probs[outcome] = Math.max(0, base[outcome]) * (recent ? 1 - factor : 1);
    total += probs[outcome];
  }

  if (total > 1) {
    for (const outcome of DEVIATIONS) probs[outcome] /= total;
    probs.normal = 0;
  } else {
    probs.normal = 1 - total;
  }
  return probs;
}

/** One categorical draw. */
export function drawOutcome(
  probs: OutcomeProbabilities,
  random: RandomSource
): Outcome {
  const r = random();
  let acc = 0;
  for (const outcome of DEVIATIONS) {
    acc += probs[outcome];
    if (r < acc) return outcome;
  }
  return "normal";
}

/**
 * Pick within a band: highest adjusted score plus Gaussian noise,
 * earlier engine rank on exact ties. Noise is drawn per candidate in
 * engine order so the draw sequence is reproducible.
 */
function pickWithNoise(
  pool: RankedCandidate[],
  noiseStddev: number,
  random: RandomSource
): RankedCandidate {
  const byEngine = [...pool].sort((a, b) => a.engineRank - b.engineRank);
  let best = byEngine[0];
  let bestKey = -Infinity;
  for (const r of byEngine) {
    const key = r.adjustedScore + (noiseStddev > 0 ? gaussian(random, noiseStddev) : 0);
    if (key > bestKey) {
      best = r;
      bestKey = key;
    }
  }
  return best;
}

export interface DecisionRequest {
  position: Position;
  /** Best-first, engine's top move at index 0 */
  candidates: readonly CandidateMove[];
  skill: SkillProfile;
  personality: PersonalityProfile;
  random: RandomSource;
  /** Per-game state; the decision is recorded into it */
  history: DecisionHistory;
  /** Skip the draw and resolve this outcome (tests, tooling) */
  forceOutcome?: Outcome;
}

/**
 * Choose the move to play this turn.
 *
 * 1. Personality-adjust and re-rank candidates
 * 2. Draw blunder / inaccuracy / brilliancy / normal from the skill profile
 * 3. Resolve the outcome against centipawn-loss bands on the TRUE engine
 *    scores; anything that cannot be satisfied falls back to normal
 * 4. Record the category in the game's history
 * 5. Return the decision with a rationale
 *
 * Deterministic for a fixed random source and inputs.
 */
export function decideMove(
  request: DecisionRequest,
  config: Pick<ArbiterConfig, "bands" | "smoothing" | "style"> = DEFAULT_CONFIG
): MoveDecision {
  const { position, candidates, skill, personality, random, history } = request;
  if (candidates.length === 0) throw new EmptyCandidateSetError(position);

  const engineBest = candidates[0];
  const ranked = applyPersonality(candidates, personality, config.style);
  const normalPick = ranked[0];
  const lossOf = (r: RankedCandidate) =>
    centipawnLoss(engineBest.score, r.candidate.score);

  const drawnOutcome =
    request.forceOutcome ??
    drawOutcome(outcomeProbabilities(skill, history, config), random);

  let pick: RankedCandidate = normalPick;
  let category: DecisionCategory = "best";

  switch (drawnOutcome) {
    case "inaccuracy": {
      const { min, max } = config.bands.inaccuracy;
      const pool = ranked.filter((r) => {
        const loss = lossOf(r);
        return loss >= min && loss <= max && !isMatedScore(r.candidate.score);
      });
      if (pool.length > 0) {
        pick = pickWithNoise(pool, skill.evalNoiseStddev, random);
        category = "inaccuracy";
      }
      break;
    }
    case "blunder": {
      const { min, max } = config.bands.blunder;
      const pool = ranked.filter((r) => {
        const loss = lossOf(r);
        if (loss <= 0) return false;
        if (isMatedScore(r.candidate.score)) {
          return skill.allowMateBlunders && !isMatedScore(engineBest.score);
        }
        return loss >= min && loss <= max;
      });
      if (pool.length > 0) {
        pick = pickWithNoise(pool, skill.evalNoiseStddev, random);
        category = "blunder";
      }
      break;
    }
    case "brilliancy": {
      const { min, max } = config.bands.brilliancy;
      const eligible = ranked
        .filter(
          (r) =>
            r.engineRank > 0 &&
            r !== normalPick &&
            lossOf(r) >= min &&
            lossOf(r) <= max &&
            (r.candidate.tags.includes("sacrifice") ||
              r.candidate.tags.includes("check"))
        )
        .sort((a, b) => a.engineRank - b.engineRank);
      if (eligible.length > 0) {
        pick = eligible[0];
        category = "brilliant";
      }
      break;
    }
    case "normal":
      break;
  }

  history.record(category);

  const loss = lossOf(pick);
  return {
    position,
    move: pick.candidate,
    category,
    drawnOutcome,
    centipawnLoss: loss,
    adjustedScore: pick.adjustedScore,
    rationale: buildRationale({
      category,
      drawnOutcome,
      move: pick.candidate,
      engineBest,
      centipawnLoss: loss,
      personality,
    }),
  };
}

/**
 * Mate scores are folded into the centipawn scale so every candidate
 * compares by plain ordering: mate in N for the mover scores 30000 - N,
 * getting mated in N scores -30000 + N.
 */
export const MATE_SCORE = 30000;

/** Any score beyond this magnitude is a mate score */
export const MATE_THRESHOLD = 29000;

/** Encode a UCI `score mate N` (N > 0: mover mates; N <= 0: mover is mated). */
export function mateToScore(mateIn: number): number {
  return mateIn > 0 ? MATE_SCORE - mateIn : -MATE_SCORE - mateIn;
}

/** True when the mover is getting mated. */
export function isMatedScore(score: number): boolean {
  return score <= -MATE_THRESHOLD;
}

export function isMateScore(score: number): boolean {
  return Math.abs(score) >= MATE_THRESHOLD;
}

/** Centipawn loss of `score` against the best available score. */
export function centipawnLoss(bestScore: number, score: number): number {
  return Math.max(0, bestScore - score);
}

/** "+0.35", "-1.20", "#3", "#-2" */
export function formatScore(score: number): string {
  if (isMateScore(score)) {
    const n = MATE_SCORE - Math.abs(score);
    return score > 0 ? `#${n}` : `#-${n}`;
  }
  const pawns = score / 100;
  return `${pawns >= 0 ? "+" : ""}${pawns.toFixed(2)}`;
}

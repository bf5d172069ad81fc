/**
 * CLI output formatting: tables, progress bars and summaries.
 */

import {
  formatScore,
  type BotMoveResult,
  type PersonalityProfile,
  type SkillProfile,
} from "@movecraft/engine";
import type { CalibrationReport } from "./calibration";
import type { SideMetrics } from "./metrics";
import type { GameRecord, Side } from "./self-play";

const RULE = "  " + "─".repeat(50);

const pct = (x: number) => `${(x * 100).toFixed(1)}%`;
const cpl = (x: number) => (Number.isNaN(x) ? "n/a" : x.toFixed(1));

// ── Progress bar ────────────────────────────────────────────────────

export function progressBar(current: number, total: number, width = 40): string {
  const ratio = total > 0 ? current / total : 0;
  const filled = Math.round(ratio * width);
  const bar = "█".repeat(filled) + "░".repeat(width - filled);
  return `[${bar}] ${current}/${total} (${(ratio * 100).toFixed(1)}%)`;
}

// ── Profiles ────────────────────────────────────────────────────────

export function formatSkillProfile(p: SkillProfile): string {
  const lines: string[] = [];
  lines.push("");
  lines.push(`  Skill profile @ ${p.targetRating}`);
  lines.push(RULE);
  lines.push(`  Blunder probability:     ${pct(p.blunderProbability)}`);
  lines.push(`  Inaccuracy probability:  ${pct(p.inaccuracyProbability)}`);
  lines.push(`  Brilliancy probability:  ${pct(p.brilliancyProbability)}`);
  lines.push(`  Search depth cap:        ${p.searchDepthCap}`);
  lines.push(`  Candidates (MultiPV):    ${p.candidateCount}`);
  lines.push(`  Eval noise (cp stddev):  ${p.evalNoiseStddev.toFixed(1)}`);
  lines.push(`  Mate blunders allowed:   ${p.allowMateBlunders ? "yes" : "no"}`);
  lines.push("");
  return lines.join("\n");
}

export function formatPersonalities(profiles: readonly PersonalityProfile[]): string {
  const lines: string[] = [""];
  for (const p of profiles) {
    const adjustments = Object.entries(p.tagAdjustments)
      .flatMap(([tag, bonus]) =>
        bonus === undefined ? [] : [`${tag} ${bonus > 0 ? "+" : ""}${bonus}`]
      )
      .join(", ");
    lines.push(`  ${p.name.padEnd(12)} ${p.description}`);
    lines.push(`  ${"".padEnd(12)} adjustments: ${adjustments || "none"}`);
    lines.push(`  ${"".padEnd(12)} openings:    ${p.openingPreferences.join(", ")}`);
    lines.push("");
  }
  return lines.join("\n");
}

// ── Single move ─────────────────────────────────────────────────────

export function formatMove(result: BotMoveResult): string {
  const lines: string[] = [];
  lines.push("");
  lines.push(`  Move:       ${result.san} (${result.uci})`);
  lines.push(`  Category:   ${result.category}`);
  lines.push(`  Rationale:  ${result.rationale}`);
  lines.push(`  Think time: ${result.thinkTimeMs}ms`);

  if (result.candidates && result.decision) {
    const played = result.decision.move.uci;
    lines.push("");
    lines.push("  Candidates");
    lines.push(RULE);
    lines.push("     Move      Eval   Loss  Tags");
    const best = result.candidates[0].score;
    for (const c of result.candidates) {
      const marker = c.uci === played ? ">" : " ";
      lines.push(
        `  ${marker}  ${c.san.padEnd(8)} ${formatScore(c.score).padStart(6)} ${String(Math.max(0, best - c.score)).padStart(6)}  ${c.tags.join(" ")}`
      );
    }
  }
  lines.push("");
  return lines.join("\n");
}

// ── Self-play ───────────────────────────────────────────────────────

export function formatGameSummary(game: GameRecord, metrics: Record<Side, SideMetrics>): string {
  const lines: string[] = [];
  lines.push("");
  lines.push(`  Result: ${game.result} (${game.termination}) after ${game.plies.length} plies`);
  lines.push(RULE);
  lines.push("  Side    Rating  Personality   Book  Best  Brill  Inacc  Blund   aCPL");
  for (const side of ["white", "black"] as const) {
    const setup = game[side];
    const m = metrics[side];
    lines.push(
      `  ${side.padEnd(6)} ${String(setup.rating).padStart(7)}  ${setup.personality.padEnd(12)} ${String(m.bookMoves).padStart(5)} ${String(m.categories.best).padStart(5)} ${String(m.categories.brilliant).padStart(6)} ${String(m.categories.inaccuracy).padStart(6)} ${String(m.categories.blunder).padStart(6)} ${cpl(m.avgCPL).padStart(6)}`
    );
  }
  lines.push("");
  return lines.join("\n");
}

// ── Calibration ─────────────────────────────────────────────────────

export function formatCalibration(report: CalibrationReport): string {
  const lines: string[] = [];
  lines.push("");
  lines.push(
    `  Calibration @ ${report.skill.targetRating} (${report.personality}), ${report.decisions} decisions`
  );
  lines.push(RULE);
  lines.push("  Category     Nominal  Realized  Count");
  for (const category of ["best", "brilliant", "inaccuracy", "blunder"] as const) {
    lines.push(
      `  ${category.padEnd(12)} ${pct(report.nominal[category]).padStart(7)} ${pct(report.realized[category]).padStart(9)} ${String(report.counts[category]).padStart(6)}`
    );
  }
  lines.push(`  Avg CPL: ${cpl(report.avgCPL)}`);
  lines.push("");
  return lines.join("\n");
}

/**
 * calibrate command: realized vs nominal category rates for a rating,
 * measured on synthetic candidate sets without an engine.
 */

import { ConfigError, type Logger } from "@movecraft/engine";
import { runCalibration } from "../calibration";
import { formatCalibration, progressBar } from "../format";
import { personalityOrDefault, resolveSettings, type SettingsFlags } from "../settings";

export interface CalibrateOptions extends SettingsFlags {
  games: string;
  moves: string;
  json?: boolean;
}

function positiveInt(name: string, value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError([`${name}: must be a positive integer, got "${value}"`]);
  }
  return n;
}

export async function calibrate(options: CalibrateOptions, logger: Logger): Promise<void> {
  const settings = resolveSettings(options);
  const games = positiveInt("--games", options.games);
  const movesPerGame = positiveInt("--moves", options.moves);
  const showProgress = Boolean(process.stderr.isTTY) && !options.json;

  const report = runCalibration({
    rating: settings.rating,
    personality: personalityOrDefault(settings.personality, logger),
    games,
    movesPerGame,
    seed: settings.seed,
    config: settings.arbiter,
    onGame: (done, total) => {
      if (showProgress) process.stderr.write(`\r  ${progressBar(done, total)}`);
    },
  });
  if (showProgress) process.stderr.write("\n");

  console.log(options.json ? JSON.stringify(report, null, 2) : formatCalibration(report));
}

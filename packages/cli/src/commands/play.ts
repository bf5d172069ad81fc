/**
 * play command: a self-play game between two bots on one engine.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { validateFen } from "chess.js";
import { ConfigError, type Logger } from "@movecraft/engine";
import { withEngine } from "../engine-factory";
import { formatGameSummary, progressBar } from "../format";
import { computeGameMetrics } from "../metrics";
import { playGame } from "../self-play";
import { personalityOrDefault, resolveSettings, type SettingsFlags } from "../settings";

export interface PlayOptions extends SettingsFlags {
  whiteRating?: string;
  blackRating?: string;
  whitePersonality?: string;
  blackPersonality?: string;
  maxPlies: string;
  fen?: string;
  output?: string;
}

function ratingOption(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isFinite(n)) throw new ConfigError([`${name}: must be a number, got "${value}"`]);
  return n;
}

export async function play(options: PlayOptions, logger: Logger): Promise<void> {
  const settings = resolveSettings(options);
  const maxPlies = parseInt(options.maxPlies, 10);
  if (!Number.isInteger(maxPlies) || maxPlies <= 0) {
    throw new ConfigError([`--max-plies: must be a positive integer, got "${options.maxPlies}"`]);
  }
  if (options.fen !== undefined) {
    const check = validateFen(options.fen);
    if (!check.ok) throw new ConfigError([`--fen: ${check.error ?? "invalid FEN"}`]);
  }

  const white = {
    rating: ratingOption("--white-rating", options.whiteRating, settings.rating),
    personality: personalityOrDefault(options.whitePersonality ?? settings.personality, logger),
  };
  const black = {
    rating: ratingOption("--black-rating", options.blackRating, settings.rating),
    personality: personalityOrDefault(options.blackPersonality ?? settings.personality, logger),
  };

  logger.info(
    `Self-play: ${white.rating} ${white.personality} vs ${black.rating} ${black.personality}, seed ${settings.seed}`
  );

  const showProgress = Boolean(process.stderr.isTTY);
  const game = await withEngine(settings.engine, logger, (engine) =>
    playGame({
      engine,
      white,
      black,
      seed: settings.seed,
      maxPlies,
      startFen: options.fen,
      config: settings.arbiter,
      logger,
      onPly: (ply) => {
        if (showProgress) process.stderr.write(`\r  ${progressBar(ply.ply, maxPlies)}`);
      },
    })
  );
  if (showProgress) process.stderr.write("\n");

  const metrics = computeGameMetrics(game);
  console.log(game.pgn);
  console.log(formatGameSummary(game, metrics));

  if (options.output) {
    mkdirSync(dirname(options.output), { recursive: true });
    writeFileSync(options.output, JSON.stringify({ game, metrics }, null, 2));
    logger.info(`Game saved: ${options.output}`);
  }
}

/**
 * move command: decide one move for a position and explain it.
 */

import { validateFen } from "chess.js";
import { ConfigError, createBot, createSeededRandom, type Logger } from "@movecraft/engine";
import { withEngine } from "../engine-factory";
import { formatMove } from "../format";
import { personalityOrDefault, resolveSettings, type SettingsFlags } from "../settings";

export interface MoveOptions extends SettingsFlags {
  fen: string;
  json?: boolean;
}

export async function move(options: MoveOptions, logger: Logger): Promise<void> {
  const check = validateFen(options.fen);
  if (!check.ok) throw new ConfigError([`--fen: ${check.error ?? "invalid FEN"}`]);

  const settings = resolveSettings(options);
  const personality = personalityOrDefault(settings.personality, logger);

  const result = await withEngine(settings.engine, logger, (engine) => {
    const bot = createBot(engine, {
      rating: settings.rating,
      personality,
      config: settings.arbiter,
      random: createSeededRandom(settings.seed),
      logger,
    });
    return bot.getMove(options.fen);
  });

  console.log(options.json ? JSON.stringify(result, null, 2) : formatMove(result));
}

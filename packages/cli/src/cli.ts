#!/usr/bin/env -S npx tsx

/**
 * movecraft CLI: single moves, profiles, self-play and calibration.
 */

import { Command } from "commander";
import type { Logger } from "@movecraft/engine";
import { createLogger } from "./logger";
import { loadEnvFile } from "./settings";
import { move } from "./commands/move";
import { profile } from "./commands/profile";
import { personalities } from "./commands/personalities";
import { play } from "./commands/play";
import { calibrate } from "./commands/calibrate";

loadEnvFile();
const logger = createLogger();

/** Log failures and set a non-zero exit code instead of throwing out of commander. */
function handled<T>(action: (options: T, logger: Logger) => Promise<void>) {
  return async (options: T): Promise<void> => {
    try {
      await action(options, logger);
    } catch (err) {
      logger.error(err instanceof Error ? err.message : String(err));
      if (err instanceof Error && err.cause !== undefined) {
        logger.debug("Caused by", String(err.cause));
      }
      process.exitCode = 1;
    }
  };
}

function withSettings(command: Command): Command {
  return command
    .option("-c, --config <path>", "Settings file (JSON); defaults to $MOVECRAFT_CONFIG")
    .option("-r, --rating <n>", "Target rating (800-2500)")
    .option("-p, --personality <name>", "Playing style")
    .option("--engine <path>", "UCI engine binary to spawn")
    .option("--wasm", "Use the bundled stockfish WASM build")
    .option("--seed <n>", "Random seed for reproducibility");
}

const program = new Command()
  .name("movecraft")
  .description("Human-like move selection on top of a UCI engine")
  .version("0.1.0");

withSettings(
  program
    .command("move")
    .description("Decide one move for a position")
    .requiredOption("--fen <fen>", "Position to move in")
    .option("--json", "Print the full result as JSON")
).action(handled(move));

withSettings(
  program
    .command("profile")
    .description("Print the skill profile for a rating")
    .option("--json", "Print as JSON")
).action(handled(profile));

program
  .command("personalities")
  .description("List personalities and their adjustments")
  .action(handled(personalities));

withSettings(
  program
    .command("play")
    .description("Play a self-play game between two bots")
    .option("--white-rating <n>", "White's rating (default: --rating)")
    .option("--black-rating <n>", "Black's rating (default: --rating)")
    .option("--white-personality <name>", "White's style (default: --personality)")
    .option("--black-personality <name>", "Black's style (default: --personality)")
    .option("--max-plies <n>", "Stop after this many plies", "200")
    .option("--fen <fen>", "Start position")
    .option("-o, --output <file>", "Write the game and metrics as JSON")
).action(handled(play));

withSettings(
  program
    .command("calibrate")
    .description("Compare realized and nominal mistake rates on synthetic positions")
    .option("--games <n>", "Games to simulate", "50")
    .option("--moves <n>", "Decisions per game", "40")
    .option("--json", "Print the report as JSON")
).action(handled(calibrate));

await program.parseAsync();

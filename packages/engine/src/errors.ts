/**
 * Error taxonomy for the move-selection core.
 *
 * Only engine failures and terminal positions reach the player; quality
 * fallbacks inside the arbitrator never throw.
 */

export class MovecraftError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The external engine could not be reached or did not answer in time. */
export class EngineUnavailableError extends MovecraftError {}

export type TerminalReason = "checkmate" | "stalemate" | "no-moves";

/** The position is terminal. Authoritative game end, not something to retry. */
export class NoLegalMovesError extends MovecraftError {
  readonly reason: TerminalReason;

  constructor(reason: TerminalReason, position: string) {
    super(`No legal moves (${reason}) in ${position}`);
    this.reason = reason;
  }
}

/** The position is not a readable FEN. Asking again will not help. */
export class InvalidPositionError extends MovecraftError {
  readonly position: string;

  constructor(position: string, options?: ErrorOptions) {
    super(`Cannot read position: ${position}`, options);
    this.position = position;
  }
}

export class UnknownPersonalityError extends MovecraftError {
  readonly personality: string;
  readonly known: readonly string[];

  constructor(personality: string, known: readonly string[]) {
    super(
      `Unknown personality "${personality}". Valid options: ${known.join(", ")}`
    );
    this.personality = personality;
    this.known = known;
  }
}

/** The evaluator broke its contract and returned nothing to choose from. */
export class EmptyCandidateSetError extends MovecraftError {
  constructor(position?: string) {
    super(
      position
        ? `No candidate moves to select from in ${position}`
        : "No candidate moves to select from"
    );
  }
}

export class ConfigError extends MovecraftError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.issues = issues;
  }
}

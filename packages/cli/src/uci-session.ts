/**
 * UCI session: implements ChessEngine on top of any UciTransport.
 *
 * Searches are serialized: a second analyze() waits for the first
 * bestmove. No command is sent from inside a line listener, which the
 * WASM build does not tolerate.
 */

import {
  EngineUnavailableError,
  NoLegalMovesError,
  mateToScore,
  type ChessEngine,
  type EngineLine,
  type Logger,
  type Position,
  type SearchBudget,
} from "@movecraft/engine";
import type { UciTransport } from "./transports/types";
import { parseBestMove, parseIdName, parseInfoLine, type UciScore } from "./uci-parser";

export interface SessionOptions {
  threads?: number;
  hashMb?: number;
}

type LineHandler = (line: string) => void;

const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export class UciSession implements ChessEngine {
  private handlers: LineHandler[] = [];
  private pending = new Set<(error: Error) => void>();
  private queue: Promise<unknown> = Promise.resolve();
  private failure: Error | null = null;
  engineName = "unknown engine";

  constructor(
    private readonly transport: UciTransport,
    private readonly logger: Logger = silentLogger
  ) {
    transport.onLine((line) => {
      for (const handler of [...this.handlers]) handler(line);
    });
    transport.onExit((error) => {
      this.fail(new EngineUnavailableError(`Engine exited: ${error.message}`, { cause: error }));
    });
  }

  /** UCI handshake and options. */
  async init(options: SessionOptions = {}): Promise<void> {
    await this.request<void>("uci", (line, done) => {
      const name = parseIdName(line);
      if (name) this.engineName = name;
      if (line.trim() === "uciok") done();
    });
    if (options.threads !== undefined) {
      this.transport.send(`setoption name Threads value ${options.threads}`);
    }
    if (options.hashMb !== undefined) {
      this.transport.send(`setoption name Hash value ${options.hashMb}`);
    }
    await this.ready();
    this.logger.info("Engine ready", { engine: this.engineName });
  }

  analyze(fen: Position, budget: SearchBudget): Promise<EngineLine[]> {
    const run = this.queue.then(() => this.search(fen, budget));
    // The caller sees the failure through `run`; the queue only orders searches
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  dispose(): void {
    if (!this.failure) {
      try {
        this.transport.send("quit");
      } catch (err) {
        this.logger.debug("Engine did not take quit", { error: String(err) });
      }
    }
    this.fail(new EngineUnavailableError("Engine session closed"));
    this.transport.close();
  }

  /* ── Internals ─────────────────────────────────────────── */

  private async search(fen: Position, budget: SearchBudget): Promise<EngineLine[]> {
    await this.ready();
    this.transport.send(`setoption name MultiPV value ${budget.multiPv}`);
    await this.ready();
    this.transport.send(`position fen ${fen}`);

    let go = `go depth ${budget.depth}`;
    if (budget.movetimeMs !== undefined) go += ` movetime ${budget.movetimeMs}`;
    this.logger.debug("Search", { fen, go });

    const slots = new Map<number, EngineLine>();
    return this.request<EngineLine[]>(go, (line, done, reject) => {
      const info = parseInfoLine(line);
      if (info) {
        const entry = toEngineLine(info.depth, info.score, info.pv);
        if (!entry) return;
        const slot = info.multipv ?? 1;
        const existing = slots.get(slot);
        // Keep the deepest report per MultiPV slot
        if (!existing || entry.depth >= existing.depth) slots.set(slot, entry);
        return;
      }
      const best = parseBestMove(line);
      if (best?.bestmove === "(none)") {
        reject(new NoLegalMovesError("no-moves", fen));
      } else if (best) {
        done([...slots.entries()].sort(([a], [b]) => a - b).map(([, entry]) => entry));
      }
    });
  }

  private ready(): Promise<void> {
    return this.request<void>("isready", (line, done) => {
      if (line.trim() === "readyok") done();
    });
  }

  /**
   * Send `command` and feed every following line to `onLine` until it
   * calls done() or reject(). Rejects if the engine goes away first.
   */
  private request<T>(
    command: string,
    onLine: (line: string, done: (value: T) => void, reject: (error: Error) => void) => void
  ): Promise<T> {
    if (this.failure) return Promise.reject(this.failure);

    return new Promise<T>((resolve, reject) => {
      const handler: LineHandler = (line) => onLine(line, finish, abort);
      const settle = () => {
        this.removeHandler(handler);
        this.pending.delete(reject);
      };
      const finish = (value: T) => {
        settle();
        resolve(value);
      };
      const abort = (error: Error) => {
        settle();
        reject(error);
      };
      this.pending.add(reject);
      this.handlers.push(handler);
      this.transport.send(command);
    });
  }

  private removeHandler(handler: LineHandler): void {
    const idx = this.handlers.indexOf(handler);
    if (idx !== -1) this.handlers.splice(idx, 1);
  }

  private fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    for (const reject of this.pending) reject(error);
    this.pending.clear();
    this.handlers = [];
  }
}

function toEngineLine(
  depth: number | undefined,
  score: UciScore | undefined,
  pv: string[] | undefined
): EngineLine | null {
  if (depth === undefined || !score || !pv || pv.length === 0) return null;
  if (score.type === "cp") {
    return { uci: pv[0], score: score.value, depth, pv: pv.join(" ") };
  }
  return { uci: pv[0], score: mateToScore(score.value), mate: score.value, depth, pv: pv.join(" ") };
}

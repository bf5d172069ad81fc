import { Chess } from "chess.js";
import {
  mateToScore,
  type ChessEngine,
  type EngineLine,
  type Position,
  type SearchBudget,
} from "@movecraft/engine";
import type { UciTransport } from "../src/transports/types";

/**
 * In-process UCI peer. Answers the handshake and isready at once; each
 * `go` is answered from `searches` (in order), either immediately or on
 * respond() when autoRespond is off.
 */
export class FakeTransport implements UciTransport {
  readonly sent: string[] = [];
  searches: string[][] = [];
  autoRespond = true;
  closed = false;
  private lineListeners: ((line: string) => void)[] = [];
  private exitListeners: ((error: Error) => void)[] = [];

  send(command: string): void {
    this.sent.push(command);
    if (command === "uci") {
      this.emit("id name FakeFish 1.0", "id author Test", "option name Hash type spin default 16 min 1 max 1024", "uciok");
    } else if (command === "isready") {
      this.emit("readyok");
    } else if (command.startsWith("go") && this.autoRespond) {
      this.respond();
    }
  }

  respond(): void {
    this.emit(...(this.searches.shift() ?? ["bestmove (none)"]));
  }

  emit(...lines: string[]): void {
    for (const line of lines) {
      for (const listener of this.lineListeners) listener(line);
    }
  }

  crash(error: Error): void {
    for (const listener of this.exitListeners) listener(error);
  }

  onLine(listener: (line: string) => void): void {
    this.lineListeners.push(listener);
  }

  onExit(listener: (error: Error) => void): void {
    this.exitListeners.push(listener);
  }

  close(): void {
    this.closed = true;
  }
}

/** Let pending promise callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

const VALUES: Record<string, number> = { p: 100, n: 300, b: 300, r: 500, q: 900, k: 0 };

/**
 * One-ply material engine: scores each legal move by the material
 * balance it leaves for the mover; mate in one scores as mate.
 */
export class MaterialEngine implements ChessEngine {
  calls = 0;

  async analyze(fen: Position, budget: SearchBudget): Promise<EngineLine[]> {
    this.calls++;
    const chess = new Chess(fen);
    const mover = chess.turn();

    const lines = chess.moves({ verbose: true }).map((move) => {
      chess.move(move);
      let score = 0;
      if (chess.isCheckmate()) {
        score = mateToScore(1);
      } else {
        for (const row of chess.board()) {
          for (const square of row) {
            if (!square) continue;
            score += (square.color === mover ? 1 : -1) * VALUES[square.type];
          }
        }
      }
      chess.undo();
      const uci = move.from + move.to + (move.promotion ?? "");
      return { uci, score, depth: budget.depth, pv: uci };
    });

    return lines.sort((a, b) => b.score - a.score).slice(0, budget.multiPv);
  }

  dispose(): void {}
}

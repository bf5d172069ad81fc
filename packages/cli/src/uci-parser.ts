/**
 * UCI line parsing.
 *
 * Only the parts of the protocol the session needs: search info,
 * bestmove and engine identification.
 */

export interface UciScore {
  type: "cp" | "mate";
  value: number;
}

export interface ParsedInfo {
  depth?: number;
  seldepth?: number;
  multipv?: number;
  score?: UciScore;
  nodes?: number;
  nps?: number;
  time?: number;
  pv?: string[];
  string?: string;
}

export interface ParsedBestMove {
  bestmove: string;
  ponder?: string;
}

/**
 * Parse a UCI info line.
 *
 * "info depth 24 seldepth 32 multipv 1 score cp 35 nodes 12345678 nps 2500000 time 4938 pv e2e4 e7e5 g1f3"
 */
export function parseInfoLine(line: string): ParsedInfo | null {
  if (!line.startsWith("info ")) return null;

  const result: ParsedInfo = {};
  const tokens = line.slice(5).trim().split(/\s+/);

  let i = 0;
  while (i < tokens.length) {
    switch (tokens[i]) {
      case "depth":
        result.depth = parseInt(tokens[++i], 10);
        break;
      case "seldepth":
        result.seldepth = parseInt(tokens[++i], 10);
        break;
      case "multipv":
        result.multipv = parseInt(tokens[++i], 10);
        break;
      case "score":
        i++;
        if (tokens[i] === "cp") {
          result.score = { type: "cp", value: parseInt(tokens[++i], 10) };
        } else if (tokens[i] === "mate") {
          result.score = { type: "mate", value: parseInt(tokens[++i], 10) };
        }
        // Bound flags only qualify the score
        while (tokens[i + 1] === "upperbound" || tokens[i + 1] === "lowerbound") i++;
        break;
      case "nodes":
        result.nodes = parseInt(tokens[++i], 10);
        break;
      case "nps":
        result.nps = parseInt(tokens[++i], 10);
        break;
      case "time":
        result.time = parseInt(tokens[++i], 10);
        break;
      case "pv":
        result.pv = tokens.slice(i + 1);
        i = tokens.length;
        break;
      case "string":
        result.string = tokens.slice(i + 1).join(" ");
        i = tokens.length;
        break;
      default:
        break;
    }
    i++;
  }

  return result;
}

/** "bestmove e2e4 ponder e7e5"; the move is "(none)" in terminal positions. */
export function parseBestMove(line: string): ParsedBestMove | null {
  if (!line.startsWith("bestmove")) return null;

  const tokens = line.trim().split(/\s+/);
  if (tokens.length < 2) return null;

  const result: ParsedBestMove = { bestmove: tokens[1] };
  if (tokens[2] === "ponder" && tokens[3]) result.ponder = tokens[3];
  return result;
}

/** "id name Stockfish 17" → "Stockfish 17" */
export function parseIdName(line: string): string | null {
  const match = line.match(/^id name (.+)$/);
  return match ? match[1].trim() : null;
}

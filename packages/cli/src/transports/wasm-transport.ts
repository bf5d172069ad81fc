/**
 * UCI over the stockfish npm package's single-threaded WASM build.
 *
 * The module exports a double factory:
 *   outerFactory() → innerFactory({ locateFile, listener }) → Promise<module>
 * Commands go in through module.ccall("command", ...); output arrives on
 * the listener, synchronously inside that call.
 */

import { createRequire } from "node:module";
import { dirname, join } from "node:path";
import type { UciTransport } from "./types";

interface StockfishModule {
  ccall(name: "command", returnType: "void", argTypes: ["string"], args: [string]): void;
}

interface StockfishOptions {
  locateFile(file: string): string;
  listener(line: string): void;
}

type StockfishFactory = () => (options: StockfishOptions) => Promise<StockfishModule>;

const BUILD = "stockfish/bin/stockfish-18-single.js";

export async function openWasmTransport(): Promise<UciTransport> {
  const require = createRequire(import.meta.url);
  const sfPath = require.resolve(BUILD);
  const wasmDir = dirname(sfPath);
  const lineListeners: ((line: string) => void)[] = [];

  const outerFactory: StockfishFactory = require(sfPath);
  let sf: StockfishModule | null = await outerFactory()({
    locateFile: (file) => {
      // The module asks for "stockfish.wasm"; the file ships under the build's name
      if (file.endsWith(".wasm")) return join(wasmDir, "stockfish-18-single.wasm");
      return join(wasmDir, file);
    },
    listener: (line) => {
      for (const listener of lineListeners) listener(line);
    },
  });

  return {
    send(command) {
      sf?.ccall("command", "void", ["string"], [command]);
    },
    onLine(listener) {
      lineListeners.push(listener);
    },
    // Runs in-process; it cannot exit on its own
    onExit() {},
    close() {
      sf = null;
      lineListeners.length = 0;
    },
  };
}

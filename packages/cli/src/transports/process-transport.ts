/**
 * UCI over a spawned engine binary (stdin/stdout, one command per line).
 */

import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import { EngineUnavailableError } from "@movecraft/engine";
import type { UciTransport } from "./types";

export function spawnTransport(binaryPath: string): UciTransport {
  const child = spawn(binaryPath, [], { stdio: ["pipe", "pipe", "pipe"] });
  const lineListeners: ((line: string) => void)[] = [];
  const exitListeners: ((error: Error) => void)[] = [];
  let exited = false;

  const exit = (error: Error) => {
    if (exited) return;
    exited = true;
    for (const listener of exitListeners) listener(error);
  };

  createInterface({ input: child.stdout }).on("line", (line) => {
    for (const listener of lineListeners) listener(line);
  });

  child.on("error", (err) => {
    exit(new EngineUnavailableError(`Cannot run engine at ${binaryPath}`, { cause: err }));
  });
  child.on("exit", (code, signal) => {
    exit(new EngineUnavailableError(`Engine process ended (code ${code}, signal ${signal})`));
  });
  child.stdin.on("error", (err) => {
    exit(new EngineUnavailableError("Engine input closed", { cause: err }));
  });

  return {
    send(command) {
      if (exited) throw new EngineUnavailableError("Engine process is not running");
      child.stdin.write(`${command}\n`);
    },
    onLine(listener) {
      lineListeners.push(listener);
    },
    onExit(listener) {
      exitListeners.push(listener);
    },
    close() {
      exited = true;
      child.stdin.end();
      child.kill();
    },
  };
}

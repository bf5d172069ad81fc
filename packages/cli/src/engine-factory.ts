import type { Logger } from "@movecraft/engine";
import type { EngineSettings } from "./settings";
import { UciSession } from "./uci-session";
import { spawnTransport } from "./transports/process-transport";
import { openWasmTransport } from "./transports/wasm-transport";

/** Start the configured engine and complete the UCI handshake. */
export async function openEngine(settings: EngineSettings, logger: Logger): Promise<UciSession> {
  logger.debug("Starting engine", { ...settings });
  const transport =
    settings.kind === "process" ? spawnTransport(settings.path) : await openWasmTransport();

  const session = new UciSession(transport, logger);
  try {
    await session.init({ threads: settings.threads, hashMb: settings.hashMb });
  } catch (err) {
    session.dispose();
    throw err;
  }
  return session;
}

/** Run `fn` with a fresh engine, always shutting it down afterwards. */
export async function withEngine<T>(
  settings: EngineSettings,
  logger: Logger,
  fn: (engine: UciSession) => Promise<T>
): Promise<T> {
  const engine = await openEngine(settings, logger);
  try {
    return await fn(engine);
  } finally {
    engine.dispose();
  }
}

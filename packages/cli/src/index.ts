export { UciSession } from "./uci-session";
export type { SessionOptions } from "./uci-session";
export type { UciTransport } from "./transports/types";
export { spawnTransport } from "./transports/process-transport";
export { openWasmTransport } from "./transports/wasm-transport";
export { openEngine, withEngine } from "./engine-factory";
export { parseInfoLine, parseBestMove, parseIdName } from "./uci-parser";
export { playGame, formatPgn, START_FEN } from "./self-play";
export type { GameOptions, GameRecord, PlyRecord, SideSetup } from "./self-play";
export { runCalibration, syntheticCandidates } from "./calibration";
export type { CalibrationOptions, CalibrationReport } from "./calibration";
export { computeGameMetrics, computeSideMetrics } from "./metrics";
export {
  resolveSettings,
  parseSettingsFile,
  readSettingsFile,
  loadEnvFile,
  personalityOrDefault,
  DEFAULT_SETTINGS,
} from "./settings";
export type { CliSettings, EngineSettings, SettingsFlags } from "./settings";
export { createLogger, parseLogLevel } from "./logger";
export type { LogLevel } from "./logger";

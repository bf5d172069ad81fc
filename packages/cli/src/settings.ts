/**
 * CLI settings: a JSON settings file, environment variables and flags.
 * Flags win over the environment, the environment over the file.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import {
  ConfigError,
  DEFAULT_PERSONALITY,
  isPersonalityName,
  isRecord,
  parseConfigOverrides,
  PERSONALITY_NAMES,
  type ConfigOverrides,
  type Logger,
  type ValidationResult,
} from "@movecraft/engine";

export type EngineKind = "process" | "wasm";

export interface EngineSettings {
  kind: EngineKind;
  /** Binary to spawn when kind is "process" */
  path: string;
  threads?: number;
  hashMb?: number;
}

export interface CliSettings {
  rating: number;
  personality: string;
  engine: EngineSettings;
  arbiter: ConfigOverrides;
  seed: number;
}

export interface SettingsFile {
  rating?: number;
  personality?: string;
  engine?: Partial<EngineSettings>;
  arbiter?: ConfigOverrides;
  seed?: number;
}

/** Raw command-line values, as commander hands them over. */
export interface SettingsFlags {
  config?: string;
  rating?: string;
  personality?: string;
  engine?: string;
  wasm?: boolean;
  seed?: string;
}

export const DEFAULT_SETTINGS: CliSettings = {
  rating: 1500,
  personality: DEFAULT_PERSONALITY,
  engine: { kind: "wasm", path: "stockfish" },
  arbiter: {},
  seed: 42,
};

const FILE_KEYS = ["rating", "personality", "engine", "arbiter", "seed"];
const ENGINE_KEYS = ["kind", "path", "threads", "hashMb"];

// ─── Settings file ───────────────────────────────────────────────────────────

export function parseSettingsFile(raw: unknown): ValidationResult<SettingsFile> {
  if (!isRecord(raw)) return { ok: false, errors: ["settings: must be an object"] };

  const errors: string[] = [];
  const settings: SettingsFile = {};

  for (const key of Object.keys(raw)) {
    if (!FILE_KEYS.includes(key)) errors.push(`${key}: unknown key`);
  }

  const { rating, personality, engine, arbiter, seed } = raw;
  if (rating !== undefined) {
    if (typeof rating === "number" && Number.isFinite(rating)) settings.rating = rating;
    else errors.push("rating: must be a finite number");
  }
  if (personality !== undefined) {
    if (typeof personality === "string") settings.personality = personality;
    else errors.push("personality: must be a string");
  }
  if (seed !== undefined) {
    if (typeof seed === "number" && Number.isInteger(seed)) settings.seed = seed;
    else errors.push("seed: must be an integer");
  }

  if (engine !== undefined) {
    if (isRecord(engine)) {
      settings.engine = readEngine(engine, errors);
    } else {
      errors.push("engine: must be an object");
    }
  }

  if (arbiter !== undefined) {
    const parsed = parseConfigOverrides(arbiter, "arbiter");
    if (parsed.ok) settings.arbiter = parsed.value;
    else errors.push(...parsed.errors);
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, value: settings };
}

function readEngine(raw: Record<string, unknown>, errors: string[]): Partial<EngineSettings> {
  const engine: Partial<EngineSettings> = {};
  for (const key of Object.keys(raw)) {
    if (!ENGINE_KEYS.includes(key)) errors.push(`engine.${key}: unknown key`);
  }

  const { kind, path, threads, hashMb } = raw;
  if (kind !== undefined) {
    if (kind === "process" || kind === "wasm") engine.kind = kind;
    else errors.push('engine.kind: must be "process" or "wasm"');
  }
  if (path !== undefined) {
    if (typeof path === "string" && path.length > 0) engine.path = path;
    else errors.push("engine.path: must be a non-empty string");
  }
  if (threads !== undefined) {
    if (typeof threads === "number" && Number.isInteger(threads) && threads > 0) engine.threads = threads;
    else errors.push("engine.threads: must be a positive integer");
  }
  if (hashMb !== undefined) {
    if (typeof hashMb === "number" && Number.isInteger(hashMb) && hashMb > 0) engine.hashMb = hashMb;
    else errors.push("engine.hashMb: must be a positive integer");
  }
  return engine;
}

export function readSettingsFile(path: string): SettingsFile {
  if (!existsSync(path)) throw new ConfigError([`${path}: settings file not found`]);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`${path}: not valid JSON (${reason})`]);
  }

  const parsed = parseSettingsFile(raw);
  if (!parsed.ok) throw new ConfigError(parsed.errors.map((e) => `${path}: ${e}`));
  return parsed.value;
}

// ─── .env ────────────────────────────────────────────────────────────────────

/**
 * Load KEY=VALUE lines from .env and .env.local in `dir`.
 * Variables that are already set are left alone. Returns the keys it set.
 */
export function loadEnvFile(
  dir: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const loaded: string[] = [];
  for (const name of [".env", ".env.local"]) {
    const envPath = join(dir, name);
    if (!existsSync(envPath)) continue;
    const content = readFileSync(envPath, "utf-8");
    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;
      const eqIdx = trimmed.indexOf("=");
      if (eqIdx === -1) continue;
      const key = trimmed.slice(0, eqIdx).trim();
      const value = unquote(trimmed.slice(eqIdx + 1).trim());
      if (!env[key]) {
        env[key] = value;
        loaded.push(key);
      }
    }
  }
  return loaded;
}

function unquote(value: string): string {
  const quoted =
    value.length >= 2 &&
    (value[0] === '"' || value[0] === "'") &&
    value[value.length - 1] === value[0];
  return quoted ? value.slice(1, -1) : value;
}

// ─── Resolution ──────────────────────────────────────────────────────────────

function numberSetting(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) throw new ConfigError([`${name}: must be a number, got "${value}"`]);
  return n;
}

function integerSetting(name: string, value: string | undefined): number | undefined {
  const n = numberSetting(name, value);
  if (n !== undefined && !Number.isInteger(n)) {
    throw new ConfigError([`${name}: must be an integer, got "${value}"`]);
  }
  return n;
}

/**
 * Merge defaults, the settings file (--config or MOVECRAFT_CONFIG),
 * MOVECRAFT_* variables and flags.
 */
export function resolveSettings(
  flags: SettingsFlags,
  env: NodeJS.ProcessEnv = process.env
): CliSettings {
  const configPath = flags.config ?? env.MOVECRAFT_CONFIG;
  const file = configPath ? readSettingsFile(configPath) : {};

  const enginePath = flags.engine ?? env.MOVECRAFT_ENGINE_PATH;
  const engine: EngineSettings = { ...DEFAULT_SETTINGS.engine, ...file.engine };
  if (enginePath) {
    engine.kind = "process";
    engine.path = enginePath;
  }
  if (flags.wasm) engine.kind = "wasm";

  return {
    rating:
      numberSetting("--rating", flags.rating) ??
      numberSetting("MOVECRAFT_RATING", env.MOVECRAFT_RATING) ??
      file.rating ??
      DEFAULT_SETTINGS.rating,
    personality:
      flags.personality ??
      env.MOVECRAFT_PERSONALITY ??
      file.personality ??
      DEFAULT_SETTINGS.personality,
    engine,
    arbiter: file.arbiter ?? DEFAULT_SETTINGS.arbiter,
    seed: integerSetting("--seed", flags.seed) ?? file.seed ?? DEFAULT_SETTINGS.seed,
  };
}

/** Unknown names fall back to the default personality with a warning. */
export function personalityOrDefault(name: string, logger: Logger): string {
  const normalized = name.trim().toLowerCase();
  if (isPersonalityName(normalized)) return normalized;
  logger.warn(
    `Unknown personality "${name}", using ${DEFAULT_PERSONALITY}. Valid options: ${PERSONALITY_NAMES.join(", ")}`
  );
  return DEFAULT_PERSONALITY;
}

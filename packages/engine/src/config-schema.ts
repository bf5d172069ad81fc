import type {
  ArbiterConfig,
  ConfigOverrides,
  LossBand,
  SkillAnchor,
} from "./types";

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[] };

/*
 * Closed-schema parsing of config overrides read from JSON.
 * Unknown keys are rejected at every level so typos never go unnoticed.
 */

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Collects errors while walking one object. */
class Reader {
  constructor(
    private readonly obj: Record<string, unknown>,
    private readonly path: string,
    private readonly errors: string[]
  ) {}

  at(key: string): string {
    return this.path ? `${this.path}.${key}` : key;
  }

  only(keys: readonly string[]): void {
    for (const key of Object.keys(this.obj)) {
      if (!keys.includes(key)) this.errors.push(`${this.at(key)}: unknown key`);
    }
  }

  has(key: string): boolean {
    return this.obj[key] !== undefined;
  }

  number(key: string): number | undefined {
    const v = this.obj[key];
    if (v === undefined) return undefined;
    if (typeof v === "number" && Number.isFinite(v)) return v;
    this.errors.push(`${this.at(key)}: must be a finite number`);
    return undefined;
  }

  boolean(key: string): boolean | undefined {
    const v = this.obj[key];
    if (v === undefined) return undefined;
    if (typeof v === "boolean") return v;
    this.errors.push(`${this.at(key)}: must be a boolean`);
    return undefined;
  }

  record(key: string): Reader | undefined {
    const v = this.obj[key];
    if (v === undefined) return undefined;
    if (isRecord(v)) return new Reader(v, this.at(key), this.errors);
    this.errors.push(`${this.at(key)}: must be an object`);
    return undefined;
  }

  array(key: string): unknown[] | undefined {
    const v = this.obj[key];
    if (v === undefined) return undefined;
    if (Array.isArray(v)) return v;
    this.errors.push(`${this.at(key)}: must be an array`);
    return undefined;
  }

  /** Reads a required number, recording a "missing" error. */
  required(key: string): number {
    if (!this.has(key)) {
      this.errors.push(`${this.at(key)}: is required`);
      return NaN;
    }
    return this.number(key) ?? NaN;
  }
}

/** Drops undefined members so spreads never overwrite defaults with undefined. */
function defined<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(obj) as (keyof T)[]) {
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

const ANCHOR_KEYS = [
  "rating",
  "blunder",
  "inaccuracy",
  "brilliancy",
  "depth",
  "noise",
  "candidates",
] as const;

function readAnchors(
  items: unknown[],
  path: string,
  errors: string[]
): SkillAnchor[] {
  const anchors: SkillAnchor[] = [];
  items.forEach((item, i) => {
    const itemPath = `${path}[${i}]`;
    if (!isRecord(item)) {
      errors.push(`${itemPath}: must be an object`);
      return;
    }
    const r = new Reader(item, itemPath, errors);
    r.only(ANCHOR_KEYS);
    anchors.push({
      rating: r.required("rating"),
      blunder: r.required("blunder"),
      inaccuracy: r.required("inaccuracy"),
      brilliancy: r.required("brilliancy"),
      depth: r.required("depth"),
      noise: r.required("noise"),
      candidates: r.required("candidates"),
    });
  });
  return anchors;
}

function readBand(r: Reader | undefined): LossBand | undefined {
  if (!r) return undefined;
  r.only(["min", "max"]);
  return { min: r.required("min"), max: r.required("max") };
}

function readRange(
  items: unknown[] | undefined,
  path: string,
  errors: string[]
): [number, number] | undefined {
  if (!items) return undefined;
  const [lo, hi] = items;
  if (items.length !== 2 || typeof lo !== "number" || typeof hi !== "number") {
    errors.push(`${path}: must be a [min, max] pair of numbers`);
    return undefined;
  }
  return [lo, hi];
}

const TOP_LEVEL_KEYS: readonly (keyof ArbiterConfig)[] = [
  "skillAnchors",
  "mateBlunderMaxRating",
  "bands",
  "smoothing",
  "style",
  "search",
  "book",
  "thinkTime",
];

/**
 * Parse raw JSON into ConfigOverrides.
 * Structural checks only; run configIssues() on the merged result for semantics.
 */
export function parseConfigOverrides(
  raw: unknown,
  path = "arbiter"
): ValidationResult<ConfigOverrides> {
  const errors: string[] = [];
  if (!isRecord(raw)) return { ok: false, errors: [`${path}: must be an object`] };

  const root = new Reader(raw, path, errors);
  root.only(TOP_LEVEL_KEYS);

  const overrides: ConfigOverrides = {};

  const anchorItems = root.array("skillAnchors");
  if (anchorItems) {
    overrides.skillAnchors = readAnchors(anchorItems, root.at("skillAnchors"), errors);
  }

  const mateMax = root.number("mateBlunderMaxRating");
  if (mateMax !== undefined) overrides.mateBlunderMaxRating = mateMax;

  const bands = root.record("bands");
  if (bands) {
    bands.only(["inaccuracy", "blunder", "brilliancy"]);
    overrides.bands = defined({
      inaccuracy: readBand(bands.record("inaccuracy")),
      blunder: readBand(bands.record("blunder")),
      brilliancy: readBand(bands.record("brilliancy")),
    });
  }

  const smoothing = root.record("smoothing");
  if (smoothing) {
    smoothing.only(["factor", "window"]);
    overrides.smoothing = defined({
      factor: smoothing.number("factor"),
      window: smoothing.number("window"),
    });
  }

  const style = root.record("style");
  if (style) {
    style.only(["ceiling"]);
    overrides.style = defined({ ceiling: style.number("ceiling") });
  }

  const search = root.record("search");
  if (search) {
    search.only(["timeoutMs", "movetimeMs"]);
    overrides.search = defined({
      timeoutMs: search.number("timeoutMs"),
      movetimeMs: search.number("movetimeMs"),
    });
  }

  const book = root.record("book");
  if (book) {
    book.only(["enabled", "maxPly", "preferredWeight"]);
    overrides.book = defined({
      enabled: book.boolean("enabled"),
      maxPly: book.number("maxPly"),
      preferredWeight: book.number("preferredWeight"),
    });
  }

  const thinkTime = root.record("thinkTime");
  if (thinkTime) {
    thinkTime.only([
      "enabled",
      "baseMs",
      "skillReductionMs",
      "bookMoveRange",
      "difficultyBonusMax",
      "closeEvalThreshold",
      "jitter",
      "minimum",
    ]);
    overrides.thinkTime = defined({
      enabled: thinkTime.boolean("enabled"),
      baseMs: thinkTime.number("baseMs"),
      skillReductionMs: thinkTime.number("skillReductionMs"),
      bookMoveRange: readRange(
        thinkTime.array("bookMoveRange"),
        thinkTime.at("bookMoveRange"),
        errors
      ),
      difficultyBonusMax: thinkTime.number("difficultyBonusMax"),
      closeEvalThreshold: thinkTime.number("closeEvalThreshold"),
      jitter: thinkTime.number("jitter"),
      minimum: thinkTime.number("minimum"),
    });
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, value: overrides };
}

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { Logger } from "@movecraft/engine";
import { profile } from "../src/commands/profile";

describe("profile command", () => {
  const warnings: string[] = [];
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: (message) => warnings.push(message),
    error: () => {},
  };

  beforeEach(() => {
    warnings.length = 0;
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("does not warn about a fractional rating inside the range", async () => {
    await profile({ rating: "1500.4", json: true }, logger);
    expect(warnings).toEqual([]);
    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it("warns when the rating is clamped", async () => {
    await profile({ rating: "3000", json: true }, logger);
    expect(warnings).toEqual(["Rating 3000 is outside the supported range, using 2500"]);
  });
});

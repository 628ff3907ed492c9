/**
 * Tests for configuration loading
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config, defineConfig } from "../config.js";
import type { WeftConfig } from "../config.js";
import { rootFrame } from "../frame.js";

describe("config.get and config.set", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  it("should return default values", () => {
    expect(config.get()).toEqual({ debug: false, limits: { depth: 0 } });
  });

  it("should set simple values", () => {
    config.set({ debug: true });
    expect(config.get().debug).toBe(true);
  });

  it("should merge nested values", () => {
    config.set({ debug: true });
    config.set({ limits: { depth: 100 } });
    expect(config.get()).toEqual({ debug: true, limits: { depth: 100 } });
  });

  it("should ignore negative depths", () => {
    config.set({ limits: { depth: -5 } });
    expect(config.get().limits.depth).toBe(0);
  });

  it("should forget programmatic values on reset", () => {
    config.set({ debug: true });
    config.reset();
    expect(config.get().debug).toBe(false);
  });
});

describe("environment variables", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("should read WEFT_DEBUG", () => {
    vi.stubEnv("WEFT_DEBUG", "1");
    expect(config.get().debug).toBe(true);
  });

  it("should read nested keys", () => {
    vi.stubEnv("WEFT_LIMITS_DEPTH", "250");
    expect(config.get().limits.depth).toBe(250);
  });

  it("should let config.set override the environment", () => {
    vi.stubEnv("WEFT_LIMITS_DEPTH", "250");
    config.set({ limits: { depth: 10 } });
    expect(config.get().limits.depth).toBe(10);
  });

  it("should ignore values of the wrong type", () => {
    vi.stubEnv("WEFT_DEBUG", "sometimes");
    expect(config.get().debug).toBe(false);
  });
});

describe("config files", () => {
  const originalCwd = process.cwd();
  let dir: string;

  beforeEach(() => {
    dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "weft-")));
    process.chdir(dir);
    config.reset();
  });

  afterEach(() => {
    process.chdir(originalCwd);
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
    config.reset();
  });

  it("should load .weftrc.json from the working directory", () => {
    fs.writeFileSync(path.join(dir, ".weftrc.json"), JSON.stringify({ limits: { depth: 40 } }));
    expect(config.getConfigFilePath()).toBe(path.join(dir, ".weftrc.json"));
    expect(config.get()).toEqual({ debug: false, limits: { depth: 40 } });
  });

  it("should read the weft key of package.json", () => {
    fs.writeFileSync(path.join(dir, "package.json"), JSON.stringify({ name: "demo", weft: { debug: true } }));
    expect(config.getConfigFilePath()).toBe(path.join(dir, "package.json"));
    expect(config.get().debug).toBe(true);
  });

  it("should have no path when no file is found", () => {
    expect(config.getConfigFilePath()).toBeUndefined();
    expect(config.get()).toEqual({ debug: false, limits: { depth: 0 } });
  });

  it("should warn and fall back to defaults for a broken file", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    fs.writeFileSync(path.join(dir, ".weftrc.json"), "{oops");
    expect(config.getConfigFilePath()).toBeUndefined();
    expect(config.get().limits.depth).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("rootFrame", () => {
  afterEach(() => {
    config.reset();
  });

  it("should take its default bound from limits.depth", () => {
    config.set({ limits: { depth: 42 } });
    expect(rootFrame()).toEqual({ depth: 0, maxDepth: 42 });
    expect(rootFrame(7)).toEqual({ depth: 0, maxDepth: 7 });
  });
});

describe("defineConfig", () => {
  it("should return its argument", () => {
    const cfg: WeftConfig = { debug: true, limits: { depth: 64 } };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});

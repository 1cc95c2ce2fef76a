/**
 * Tests for the unified configuration system
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { config, defineConfig } from "@weft/core";

const ENV_KEYS = ["WEFT_DEBUG", "WEFT_COMPILE__DUMP_SOURCE", "WEFT_COMPILE__ENABLED", "WEFT_LIMIT"];

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) delete process.env[key];
    config.reset();
  });

  describe("defaults", () => {
    it("starts with debug off and compilation on", () => {
      expect(config.get("debug")).toBe(false);
      expect(config.isDebug()).toBe(false);
      expect(config.compileOptions()).toEqual({ enabled: true, dumpSource: false });
    });

    it("returns undefined for unknown paths", () => {
      expect(config.get("nope.not.here")).toBeUndefined();
      expect(config.has("nope")).toBe(false);
    });
  });

  describe("programmatic", () => {
    it("deep merges nested values", () => {
      config.set({ compile: { dumpSource: true } });
      expect(config.get("compile.dumpSource")).toBe(true);
      expect(config.get("compile.enabled")).toBe(true);
    });

    it("keeps custom keys", () => {
      config.set({ grammar: { name: "arith" } });
      expect(config.get("grammar.name")).toBe("arith");
      expect(config.has("grammar.name")).toBe(true);
    });

    it("reset drops programmatic values", () => {
      config.set({ debug: true });
      config.reset();
      expect(config.isDebug()).toBe(false);
    });

    it("ignores non-boolean compile.enabled", () => {
      config.set({ compile: { enabled: true } });
      config.set({ compile: { enabled: undefined } });
      expect(config.compileOptions().enabled).toBe(true);
    });
  });

  describe("environment", () => {
    it("maps WEFT_DEBUG to debug", () => {
      process.env.WEFT_DEBUG = "1";
      expect(config.isDebug()).toBe(true);
    });

    it("uses double underscores for nesting and camel-cases segments", () => {
      process.env.WEFT_COMPILE__DUMP_SOURCE = "true";
      process.env.WEFT_COMPILE__ENABLED = "0";
      expect(config.compileOptions()).toEqual({ enabled: false, dumpSource: true });
    });

    it("parses integers", () => {
      process.env.WEFT_LIMIT = "42";
      expect(config.get("limit")).toBe(42);
    });

    it("is overridden by later programmatic values until reset", () => {
      process.env.WEFT_DEBUG = "false";
      config.set({ debug: true });
      expect(config.isDebug()).toBe(true);
      config.reset();
      expect(config.isDebug()).toBe(false);
    });

    it("yields to config.set in both directions", () => {
      process.env.WEFT_DEBUG = "1";
      expect(config.isDebug()).toBe(true);
      config.set({ debug: false });
      expect(config.isDebug()).toBe(false);
    });
  });

  describe("config files", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "weft-config-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("loads .weftrc.json from the search directory", () => {
      writeFileSync(join(dir, ".weftrc.json"), JSON.stringify({ compile: { dumpSource: true } }));
      config.loadFrom(dir);
      expect(config.compileOptions().dumpSource).toBe(true);
      expect(config.getConfigFilePath()).toBe(join(dir, ".weftrc.json"));
    });

    it("reads the weft key of package.json", () => {
      writeFileSync(join(dir, "package.json"), JSON.stringify({ name: "x", weft: { debug: true } }));
      config.loadFrom(dir);
      expect(config.isDebug()).toBe(true);
    });

    it("lets the environment override the file", () => {
      writeFileSync(join(dir, ".weftrc.json"), JSON.stringify({ debug: true }));
      process.env.WEFT_DEBUG = "0";
      config.loadFrom(dir);
      expect(config.isDebug()).toBe(false);
    });

    it("rejects a config file that is not an object", () => {
      writeFileSync(join(dir, ".weftrc.json"), JSON.stringify([1, 2]));
      expect(() => config.loadFrom(dir)).toThrow("must export an object");
    });

    it("falls back to defaults when no file exists", () => {
      config.loadFrom(dir);
      expect(config.getConfigFilePath()).toBeUndefined();
      expect(config.getAll()).toEqual({
        debug: false,
        compile: { enabled: true, dumpSource: false },
      });
    });
  });

  it("defineConfig returns its argument", () => {
    const cfg = { debug: true };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});

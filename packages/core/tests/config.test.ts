/**
 * Tests for the configuration store
 */

import { mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config, defineConfig } from "@iterum/core";

describe("config", () => {
  const saved = { ...process.env };

  beforeEach(() => {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith("ITERUM_")) delete process.env[key];
    }
    config.reset();
  });

  afterEach(() => {
    process.env = { ...saved };
    config.reset();
  });

  describe("defaults", () => {
    it("should have debug off", () => {
      expect(config.get("debug")).toBe(false);
      expect(config.has("debug")).toBe(false);
    });

    it("should return undefined for unknown paths", () => {
      expect(config.get("nope")).toBeUndefined();
      expect(config.get("debug.deeper")).toBeUndefined();
    });
  });

  describe("environment variables", () => {
    it("should read ITERUM_DEBUG as a boolean", () => {
      process.env.ITERUM_DEBUG = "1";
      expect(config.get("debug")).toBe(true);
    });

    it("should treat 'false' and empty strings as false", () => {
      process.env.ITERUM_DEBUG = "false";
      expect(config.get("debug")).toBe(false);

      config.reset();
      process.env.ITERUM_DEBUG = "";
      expect(config.get("debug")).toBe(false);
    });

    it("should nest on underscores and parse integers", () => {
      process.env.ITERUM_LIMITS__CYCLE = "42";
      process.env.ITERUM_MODE = "strict";
      expect(config.get("limits.cycle")).toBe(42);
      expect(config.get("mode")).toBe("strict");
    });

    it("should only be read once until reset", () => {
      expect(config.get("debug")).toBe(false);
      process.env.ITERUM_DEBUG = "true";
      expect(config.get("debug")).toBe(false);

      config.reset();
      expect(config.get("debug")).toBe(true);
    });
  });

  describe("programmatic overrides", () => {
    it("should take precedence over the environment", () => {
      process.env.ITERUM_DEBUG = "1";
      config.set({ debug: false });
      expect(config.get("debug")).toBe(false);
    });

    it("should deep-merge nested values", () => {
      config.set({ features: { a: true } });
      config.set({ features: { b: true } });
      expect(config.get("features")).toEqual({ a: true, b: true });
    });

    it("should expose the merged store", () => {
      config.set({ debug: true });
      expect(config.getAll().debug).toBe(true);
    });
  });

  describe("config files", () => {
    const cwd = process.cwd();
    let dir: string;

    beforeEach(() => {
      dir = realpathSync(mkdtempSync(join(tmpdir(), "iterum-config-")));
      process.chdir(dir);
    });

    afterEach(() => {
      process.chdir(cwd);
      rmSync(dir, { recursive: true, force: true });
    });

    it("should load .iterumrc.json", () => {
      writeFileSync(join(dir, ".iterumrc.json"), JSON.stringify({ debug: true }));
      expect(config.get("debug")).toBe(true);
      expect(config.getConfigFilePath()).toBe(join(dir, ".iterumrc.json"));
    });

    it("should load the iterum key of package.json", () => {
      writeFileSync(
        join(dir, "package.json"),
        JSON.stringify({ name: "app", iterum: { debug: true, mode: "strict" } })
      );
      expect(config.get("mode")).toBe("strict");
      expect(config.getConfigFilePath()).toBe(join(dir, "package.json"));
    });

    it("should let the environment override the file", () => {
      writeFileSync(join(dir, ".iterumrc.json"), JSON.stringify({ debug: true }));
      process.env.ITERUM_DEBUG = "0";
      expect(config.get("debug")).toBe(false);
    });

    it("should load quietly when there is no config file", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      expect(config.get("debug")).toBe(false);
      expect(config.getConfigFilePath()).toBeUndefined();
      expect(warn).not.toHaveBeenCalled();
      warn.mockRestore();
    });

    it("should warn and keep the defaults when a file is broken", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      writeFileSync(join(dir, ".iterumrc.json"), "{ not json");
      expect(config.get("debug")).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toBe("[iterum] Failed to load config file:");
      warn.mockRestore();
    });
  });

  it("defineConfig should return its argument", () => {
    const values = { debug: true };
    expect(defineConfig(values)).toBe(values);
  });
});

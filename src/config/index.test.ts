import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { DEFAULT_ENGINE_CONFIG, DEFAULT_LLM_CONFIG } from "../types/index.js";
import { createDefaultConfig, describeConfig, loadConfig, validateAndNormalizeConfig } from "./index.js";

describe("config", () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), "ideatree-config-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(configDir, { recursive: true, force: true });
  });

  describe("loadConfig", () => {
    it("writes a default config on first run", () => {
      const config = loadConfig(configDir);

      expect(config).toEqual(createDefaultConfig(configDir));
      expect(config.storage).toEqual({ type: "file", basePath: join(configDir, "data") });
      expect(existsSync(join(configDir, "data"))).toBe(true);
      expect(JSON.parse(readFileSync(join(configDir, "config.json"), "utf-8"))).toEqual(config);
    });

    it("reads an existing config and fills the missing sections", () => {
      writeFileSync(join(configDir, "config.json"), JSON.stringify({ engine: { locale: "en" } }));

      const config = loadConfig(configDir);
      expect(config.engine).toEqual({ locale: "en", reminderPollIntervalMs: DEFAULT_ENGINE_CONFIG.reminderPollIntervalMs });
      expect(config.llm).toEqual(DEFAULT_LLM_CONFIG);
    });

    it("rejects a config file that is not JSON", () => {
      writeFileSync(join(configDir, "config.json"), "{ not json");
      expect(() => loadConfig(configDir)).toThrow(SyntaxError);
    });
  });

  describe("validateAndNormalizeConfig", () => {
    it("names the first invalid field", () => {
      expect(() => validateAndNormalizeConfig({ llm: { provider: "gpt" } }, configDir)).toThrow(
        /^Invalid config at llm\.provider: /
      );
    });

    it("keeps memory storage as-is", () => {
      const config = validateAndNormalizeConfig({ storage: { type: "memory" } }, configDir);
      expect(config.storage).toEqual({ type: "memory" });
    });

    it("places a SQLite database without a path in the data directory", () => {
      const config = validateAndNormalizeConfig({ storage: { type: "sqlite" } }, configDir);
      expect(config.storage).toEqual({ type: "sqlite", path: join(configDir, "data", "ideatree.db") });
    });

    it("fills PostgreSQL connection defaults", () => {
      const config = validateAndNormalizeConfig({ storage: { type: "postgres", database: "notes" } }, configDir);
      expect(config.storage).toEqual({
        type: "postgres",
        host: "localhost",
        port: 5432,
        database: "notes",
        user: "ideatree",
        password: "",
        ssl: false,
      });
    });
  });

  describe("describeConfig", () => {
    it("lists provider, storage and engine settings", () => {
      const config = validateAndNormalizeConfig({ storage: { type: "memory" }, engine: { locale: "en" } }, configDir);
      const lines = describeConfig(config).split("\n");

      expect(lines[0]).toBe(`LLM Provider: ${DEFAULT_LLM_CONFIG.provider}`);
      expect(lines).toContain("Storage: memory");
      expect(lines).toContain("  (not persisted)");
      expect(lines).toContain("Locale: en");
    });
  });
});

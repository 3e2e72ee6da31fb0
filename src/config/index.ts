// ============================================================================
// CONFIGURATION MANAGEMENT
// ============================================================================
// Handles loading, saving, and validating configuration from the ~/.ideatree
// directory. IDEATREE_HOME overrides the location.

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

import {
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_LLM_CONFIG,
  type FileStorageConfig,
  type IdeaTreeConfig,
  type PostgresStorageConfig,
  type SQLiteStorageConfig,
  type StorageConfig,
} from "../types/index.js";

// ---- Path Constants ----

export function getConfigDir(): string {
  return process.env.IDEATREE_HOME || join(homedir(), ".ideatree");
}

/**
 * Get the data directory path
 */
export function getDataDir(configDir = getConfigDir()): string {
  return join(configDir, "data");
}

/**
 * Get the path to the config file
 */
export function getConfigPath(configDir = getConfigDir()): string {
  return join(configDir, "config.json");
}

// ---- Config Schema ----
// Sections may be missing; they are filled with defaults below.

const LLMConfigSchema = z.object({
  provider: z.enum(["bedrock", "openai", "local"]).default(DEFAULT_LLM_CONFIG.provider),
  bedrock: z.object({ model: z.string().optional(), region: z.string().optional() }).optional(),
  openai: z.object({ baseUrl: z.string(), apiKey: z.string(), model: z.string() }).optional(),
  local: z.object({ baseUrl: z.string(), model: z.string(), apiKey: z.string().optional() }).optional(),
  timeoutMs: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  toolCalling: z.boolean().optional(),
});

const StorageConfigSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("file"), basePath: z.string().optional() }),
  z.object({ type: z.literal("sqlite"), path: z.string().optional() }),
  z.object({
    type: z.literal("postgres"),
    host: z.string().optional(),
    port: z.number().int().optional(),
    database: z.string().optional(),
    user: z.string().optional(),
    password: z.string().optional(),
    ssl: z.boolean().optional(),
  }),
  z.object({ type: z.literal("memory") }),
]);

const EngineConfigSchema = z.object({
  locale: z.enum(["es", "en"]).default(DEFAULT_ENGINE_CONFIG.locale),
  reminderPollIntervalMs: z.number().int().positive().default(DEFAULT_ENGINE_CONFIG.reminderPollIntervalMs),
});

const ConfigFileSchema = z.object({
  llm: LLMConfigSchema.optional(),
  storage: StorageConfigSchema.optional(),
  engine: EngineConfigSchema.optional(),
});

// ---- Directory Management ----

/**
 * Ensure the config directory structure exists
 */
export function ensureConfigDirectories(configDir = getConfigDir()): void {
  for (const dir of [configDir, getDataDir(configDir)]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}

// ---- Config Loading ----

/**
 * Load configuration from config.json, creating it with defaults on first run.
 * Throws when the file exists but is not a valid configuration.
 */
export function loadConfig(configDir = getConfigDir()): IdeaTreeConfig {
  ensureConfigDirectories(configDir);
  const configPath = getConfigPath(configDir);

  if (existsSync(configPath)) {
    try {
      const raw: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
      return validateAndNormalizeConfig(raw, configDir);
    } catch (error) {
      console.error(`\x1b[31mError reading config from ${configPath}\x1b[0m`);
      throw error;
    }
  }

  const defaultConfig = createDefaultConfig(configDir);
  saveConfig(defaultConfig, configDir);
  console.log(`\x1b[33mCreated default config at ${configPath}\x1b[0m`);

  return defaultConfig;
}

/**
 * Save configuration to config.json
 */
export function saveConfig(config: IdeaTreeConfig, configDir = getConfigDir()): void {
  ensureConfigDirectories(configDir);
  writeFileSync(getConfigPath(configDir), JSON.stringify(config, null, 2));
}

// ---- Config Creation ----

/**
 * Create a default configuration
 */
export function createDefaultConfig(configDir = getConfigDir()): IdeaTreeConfig {
  return {
    llm: { ...DEFAULT_LLM_CONFIG },
    storage: createFileStorageConfig(getDataDir(configDir)),
    engine: { ...DEFAULT_ENGINE_CONFIG },
  };
}

function normalizeStorage(storage: z.infer<typeof StorageConfigSchema>, dataDir: string): StorageConfig {
  switch (storage.type) {
    case "file":
      return createFileStorageConfig(storage.basePath || dataDir);
    case "sqlite":
      return createSQLiteStorageConfig(storage.path || join(dataDir, "ideatree.db"));
    case "postgres":
      return createPostgresStorageConfig(storage);
    case "memory":
      return { type: "memory" };
  }
}

/**
 * Validate a parsed config file and fill every missing field with its default
 */
export function validateAndNormalizeConfig(value: unknown, configDir = getConfigDir()): IdeaTreeConfig {
  const parsed = ConfigFileSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid config at ${issue.path.join(".") || "(root)"}: ${issue.message}`);
  }

  const { llm, storage, engine } = parsed.data;
  const dataDir = getDataDir(configDir);

  const normalizedStorage = storage ? normalizeStorage(storage, dataDir) : createFileStorageConfig(dataDir);

  return {
    llm: llm ? { ...DEFAULT_LLM_CONFIG, ...llm } : { ...DEFAULT_LLM_CONFIG },
    storage: normalizedStorage,
    engine: { ...DEFAULT_ENGINE_CONFIG, ...engine },
  };
}

// ---- Config Helpers ----

/**
 * Create a file storage config
 */
export function createFileStorageConfig(basePath?: string): FileStorageConfig {
  return {
    type: "file",
    basePath: basePath || getDataDir(),
  };
}

/**
 * Create a SQLite storage config
 */
export function createSQLiteStorageConfig(path?: string): SQLiteStorageConfig {
  return {
    type: "sqlite",
    path: path || join(getDataDir(), "ideatree.db"),
  };
}

/**
 * Create a PostgreSQL storage config
 */
export function createPostgresStorageConfig(options: {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: boolean;
}): PostgresStorageConfig {
  return {
    type: "postgres",
    host: options.host || "localhost",
    port: options.port || 5432,
    database: options.database || "ideatree",
    user: options.user || "ideatree",
    password: options.password || "",
    ssl: options.ssl ?? false,
  };
}

// ---- Display Helpers ----

/**
 * Get a human-readable description of the current config
 */
export function describeConfig(config: IdeaTreeConfig): string {
  const lines: string[] = [];

  // LLM
  lines.push(`LLM Provider: ${config.llm.provider}`);

  switch (config.llm.provider) {
    case "bedrock":
      lines.push(`  Model: ${config.llm.bedrock?.model || "default"}`);
      lines.push(`  Region: ${config.llm.bedrock?.region || "default"}`);
      break;
    case "openai":
      lines.push(`  Base URL: ${config.llm.openai?.baseUrl || "not set"}`);
      lines.push(`  Model: ${config.llm.openai?.model || "not set"}`);
      break;
    case "local":
      lines.push(`  Base URL: ${config.llm.local?.baseUrl || "not set"}`);
      lines.push(`  Model: ${config.llm.local?.model || "not set"}`);
      break;
  }
  lines.push(`  Timeout: ${config.llm.timeoutMs ?? DEFAULT_LLM_CONFIG.timeoutMs}ms`);
  lines.push(`  Tool calling: ${config.llm.toolCalling ? "enabled" : "disabled"}`);

  // Storage
  lines.push(`Storage: ${config.storage.type}`);

  switch (config.storage.type) {
    case "file":
      lines.push(`  Path: ${config.storage.basePath}`);
      break;
    case "sqlite":
      lines.push(`  Database: ${config.storage.path}`);
      break;
    case "postgres":
      lines.push(`  Host: ${config.storage.host}:${config.storage.port}`);
      lines.push(`  Database: ${config.storage.database}`);
      lines.push(`  User: ${config.storage.user}`);
      lines.push(`  SSL: ${config.storage.ssl ? "enabled" : "disabled"}`);
      break;
    case "memory":
      lines.push("  (not persisted)");
      break;
  }

  // Engine
  lines.push(`Locale: ${config.engine.locale}`);
  lines.push(`Reminder poll interval: ${config.engine.reminderPollIntervalMs}ms`);

  return lines.join("\n");
}

// ============================================================================
// STORAGE MODULE EXPORTS
// ============================================================================
// Central export point for storage implementations and factory.

export type { IStorage, StorageFactory, StorageSnapshot } from "./interface.js";
export { BaseStorage, createReminder, isDue } from "./interface.js";
export { FileStorage } from "./file.js";
export { SQLiteStorage } from "./sqlite.js";
export { PostgresStorage } from "./postgres.js";
export { MemoryStorage } from "./memory.js";
export { parseSnapshot } from "./schema.js";

import type { IStorage } from "./interface.js";
import { FileStorage } from "./file.js";
import { SQLiteStorage } from "./sqlite.js";
import { PostgresStorage } from "./postgres.js";
import { MemoryStorage } from "./memory.js";
import type { StorageConfig } from "../types/index.js";

/**
 * Factory function to create the appropriate storage backend
 * based on configuration.
 */
export function createStorage(config: StorageConfig): IStorage {
  switch (config.type) {
    case "file":
      return new FileStorage(config);
    case "sqlite":
      return new SQLiteStorage(config);
    case "postgres":
      return new PostgresStorage(config);
    case "memory":
      return new MemoryStorage(config);
  }
}

/**
 * Helper to get the storage type name for display
 */
export function getStorageTypeName(config: StorageConfig): string {
  switch (config.type) {
    case "file":
      return `File (${config.basePath})`;
    case "sqlite":
      return `SQLite (${config.path})`;
    case "postgres":
      return `PostgreSQL (${config.host}:${config.port}/${config.database})`;
    case "memory":
      return "Memory (not persisted)";
  }
}

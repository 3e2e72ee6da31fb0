// ============================================================================
// CORE TYPES - Shared across CLI, Engine, Server, and Storage
// ============================================================================

// ---- Tree Types ----

/**
 * Second-level node. Scopes ideas by place or context inside a group
 * (e.g. "super" under "compras").
 */
export interface Subgroup {
  name: string;
  ideas: string[];
}

/**
 * Top-level category node. Names are unique case-insensitively.
 */
export interface Group {
  name: string;
  ideas: string[]; // root-level ideas, insertion order
  subgroups: Subgroup[];
}

export interface IdeaTree {
  groups: Group[];
}

// ---- Classification Types ----

export type MutationAction = "add" | "delete" | "remind";

export interface GroupRename {
  oldName: string;
  newName: string;
}

/**
 * A proposal as the oracle produced it, after boundary validation but before
 * any safety-net correction. Every field is optional because the oracle is
 * not trusted to send them.
 */
export interface ClassificationProposal {
  action?: string;
  makesSense?: boolean;
  reason?: string | null;
  group?: string | null;
  subgroup?: string | null;
  idea?: string | null;
  isNewGroup?: boolean;
  isNewSubgroup?: boolean;
  inheritParentIdeas?: boolean;
  rename?: GroupRename | null;
  remindAt?: string | null;
}

/**
 * Normalized, internally consistent instruction for the reconciler.
 * Also the per-idea result shape returned to callers.
 */
export interface CanonicalMutation {
  action: MutationAction;
  makesSense: boolean;
  reason: string | null;
  group: string | null;
  subgroup: string | null;
  idea: string | null;
  isNewGroup: boolean;
  isNewSubgroup: boolean;
  inheritParentIdeas: boolean;
  rename: GroupRename | null; // non-null only when isNewGroup
  remindAt: string | null; // local wall-clock ISO, remind only
}

// ---- Oracle Types ----

export type RawProposal =
  | { kind: "text"; text: string }
  | { kind: "tool-call"; calls: unknown[] };

// ---- Change Set Types ----

export type TreeChange =
  | { type: "group_renamed"; from: string; to: string }
  | { type: "group_created"; group: string }
  | { type: "group_removed"; group: string }
  | { type: "subgroup_created"; group: string; subgroup: string; inherited: string[] }
  | { type: "subgroup_removed"; group: string; subgroup: string }
  | { type: "idea_added"; group: string; subgroup: string | null; idea: string }
  | { type: "idea_removed"; group: string; subgroup: string | null; idea: string };

export interface ReconciliationConflict {
  mutationIndex: number;
  reason: string;
}

export interface ReminderDraft {
  message: string;
  fireAt: string;
}

export interface ChangeSet {
  changes: TreeChange[];
  conflicts: ReconciliationConflict[];
  reminders: Reminder[];
}

// ---- Reminder Types ----

export interface Reminder {
  id: string;
  message: string;
  fireAt: string; // local wall-clock ISO (YYYY-MM-DDTHH:MM:SS)
  sent: boolean;
  createdAt: string;
  sentAt?: string;
}

// ---- Unclassified Notes ----

/**
 * A note stored without classification because the oracle was unreachable.
 */
export interface UnclassifiedNote {
  id: string;
  text: string;
  reason: string;
  createdAt: string;
}

// ---- Engine Result Types ----

export type ResultSource = "pre-detector" | "oracle" | "degraded";

export interface NoteProcessingResult {
  results: CanonicalMutation[];
  changes: ChangeSet;
  source: ResultSource;
  oracleSkipped: boolean;
  unclassified?: UnclassifiedNote;
}

// ---- Search Types ----

export type SearchHitKind = "group" | "subgroup" | "idea";

export interface SearchHit {
  kind: SearchHitKind;
  group: string;
  subgroup: string | null;
  idea: string | null;
}

// ---- Summary Types ----

export type KeyPointCategory = "action" | "goal" | "reminder" | "resource";

export interface KeyPoint {
  text: string;
  category: KeyPointCategory;
}

export interface GroupSummary {
  group: string;
  suggestedTitle: string;
  summary: string;
  keyPoints: KeyPoint[];
}

export interface TreeSummary {
  groups: GroupSummary[];
  globalSummary: string;
}

// ---- LLM Configuration Types ----

export type LLMProvider = "bedrock" | "openai" | "local";

export interface BedrockConfig {
  model?: string;
  region?: string;
}

export interface OpenAIConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
}

export interface LocalConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
}

export interface LLMConfig {
  provider: LLMProvider;
  bedrock?: BedrockConfig;
  openai?: OpenAIConfig;
  local?: LocalConfig;
  timeoutMs?: number;
  temperature?: number;
  toolCalling?: boolean;
}

// ---- Storage Configuration Types ----

export type StorageType = "file" | "sqlite" | "postgres" | "memory";

export interface FileStorageConfig {
  type: "file";
  basePath: string;
}

export interface SQLiteStorageConfig {
  type: "sqlite";
  path: string;
}

export interface PostgresStorageConfig {
  type: "postgres";
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
}

export interface MemoryStorageConfig {
  type: "memory";
}

export type StorageConfig =
  | FileStorageConfig
  | SQLiteStorageConfig
  | PostgresStorageConfig
  | MemoryStorageConfig;

// ---- Engine Configuration ----

export type Locale = "es" | "en";

export interface EngineConfig {
  locale: Locale;
  reminderPollIntervalMs: number;
}

// ---- Main Configuration ----

export interface IdeaTreeConfig {
  llm: LLMConfig;
  storage: StorageConfig;
  engine: EngineConfig;
}

// ---- Defaults ----

export const DEFAULT_LLM_CONFIG: LLMConfig = {
  provider: "local",
  local: {
    baseUrl: "http://localhost:11434/v1",
    model: "llama3.1:8b",
  },
  timeoutMs: 240_000,
  temperature: 0.1,
  toolCalling: false,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  locale: "es",
  reminderPollIntervalMs: 30_000,
};

export function emptyTree(): IdeaTree {
  return { groups: [] };
}

export function emptyChangeSet(): ChangeSet {
  return { changes: [], conflicts: [], reminders: [] };
}

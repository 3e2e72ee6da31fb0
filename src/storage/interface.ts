// ============================================================================
// STORAGE INTERFACE CONTRACT
// ============================================================================
// This interface defines the contract that all storage backends must implement.
// It provides a clean abstraction layer between the engine and the underlying
// persistence mechanism (file, SQLite, PostgreSQL, memory).

import { randomUUID } from "crypto";

import { reconcile } from "../reconciler/index.js";
import { formatLocalIso } from "../reminders/time.js";
import type {
  CanonicalMutation,
  ChangeSet,
  IdeaTree,
  Reminder,
  ReminderDraft,
  StorageConfig,
  UnclassifiedNote,
} from "../types/index.js";

export interface StorageSnapshot {
  tree: IdeaTree;
  reminders: Reminder[];
  unclassified: UnclassifiedNote[];
}

/**
 * What a tree transaction writes back: the new tree and the reminders it
 * created, plus whatever the caller wants returned.
 */
export interface TreeTransactionResult<T> {
  tree: IdeaTree;
  reminders: Reminder[];
  result: T;
}

/**
 * Storage interface that all backends must implement.
 * This enables swapping between file-based, SQLite, PostgreSQL and in-memory
 * storage without changing any engine logic.
 */
export interface IStorage {
  // ---- Lifecycle ----

  /**
   * Initialize the storage backend (create directories, tables, etc.)
   */
  initialize(): Promise<void>;

  /**
   * Close any open connections and clean up resources
   */
  close(): Promise<void>;

  isReady(): Promise<boolean>;

  // ---- Tree Operations ----

  loadTree(): Promise<IdeaTree>;

  /**
   * Replace the whole tree
   */
  saveTree(tree: IdeaTree): Promise<void>;

  /**
   * Reconcile a batch against the stored tree and persist the result in one
   * transaction. Either every mutation of the batch is visible afterwards or
   * none is.
   */
  applyBatch(mutations: readonly CanonicalMutation[]): Promise<ChangeSet>;

  // ---- Reminder Operations ----

  saveReminder(reminder: Reminder): Promise<void>;

  listReminders(includeSent?: boolean): Promise<Reminder[]>;

  /**
   * Unsent reminders whose fire time is at or before `now`
   */
  listDueReminders(now: Date): Promise<Reminder[]>;

  /**
   * Mark a reminder sent. Returns false when it was already claimed, so a
   * reminder is delivered at most once even with several pollers.
   */
  claimReminder(id: string, sentAt: Date): Promise<boolean>;

  /**
   * Undo a claim after a failed delivery
   */
  releaseReminder(id: string): Promise<void>;

  // ---- Unclassified Notes ----

  saveUnclassifiedNote(note: UnclassifiedNote): Promise<void>;

  listUnclassifiedNotes(): Promise<UnclassifiedNote[]>;

  // ---- Bulk Operations ----

  /**
   * Export all data (for backup/migration)
   */
  exportAll(): Promise<StorageSnapshot>;

  /**
   * Import data (for restore/migration)
   */
  importAll(data: StorageSnapshot): Promise<void>;
}

/**
 * Factory function type for creating storage instances
 */
export type StorageFactory = (config: StorageConfig) => IStorage;

export function createReminder(draft: ReminderDraft, createdAt = new Date()): Reminder {
  return {
    id: randomUUID(),
    message: draft.message,
    fireAt: draft.fireAt,
    sent: false,
    createdAt: createdAt.toISOString(),
  };
}

/**
 * True when `reminder` is unsent and due at `now`. Fire times are local
 * wall-clock strings of a fixed width, so they compare as text.
 */
export function isDue(reminder: Reminder, now: Date): boolean {
  return !reminder.sent && reminder.fireAt <= formatLocalIso(now);
}

/**
 * Abstract base class with common utility methods.
 * Backends provide a tree transaction; batch application is shared.
 */
export abstract class BaseStorage implements IStorage {
  protected config: StorageConfig;

  constructor(config: StorageConfig) {
    this.config = config;
  }

  // Abstract methods that must be implemented
  abstract initialize(): Promise<void>;
  abstract close(): Promise<void>;
  abstract isReady(): Promise<boolean>;
  abstract loadTree(): Promise<IdeaTree>;
  abstract saveTree(tree: IdeaTree): Promise<void>;
  abstract saveReminder(reminder: Reminder): Promise<void>;
  abstract listReminders(includeSent?: boolean): Promise<Reminder[]>;
  abstract claimReminder(id: string, sentAt: Date): Promise<boolean>;
  abstract releaseReminder(id: string): Promise<void>;
  abstract saveUnclassifiedNote(note: UnclassifiedNote): Promise<void>;
  abstract listUnclassifiedNotes(): Promise<UnclassifiedNote[]>;

  /**
   * Read the tree, let `work` compute the next one, and write the tree and
   * any new reminders atomically. Concurrent transactions must not
   * interleave between the read and the write.
   */
  protected abstract withTreeTransaction<T>(
    work: (tree: IdeaTree) => TreeTransactionResult<T>
  ): Promise<T>;

  async applyBatch(mutations: readonly CanonicalMutation[]): Promise<ChangeSet> {
    return this.withTreeTransaction((current) => {
      const outcome = reconcile(current, mutations);
      const reminders = outcome.reminders.map((draft) => createReminder(draft));
      return {
        tree: outcome.tree,
        reminders,
        result: { changes: outcome.changes, conflicts: outcome.conflicts, reminders },
      };
    });
  }

  /**
   * Default implementation of listDueReminders using listReminders.
   * Can be overridden for database-native query execution
   */
  async listDueReminders(now: Date): Promise<Reminder[]> {
    const reminders = await this.listReminders(false);
    return reminders.filter((r) => isDue(r, now)).sort((a, b) => a.fireAt.localeCompare(b.fireAt));
  }

  /**
   * Default implementation of exportAll
   */
  async exportAll(): Promise<StorageSnapshot> {
    const [tree, reminders, unclassified] = await Promise.all([
      this.loadTree(),
      this.listReminders(true),
      this.listUnclassifiedNotes(),
    ]);

    return { tree, reminders, unclassified };
  }

  /**
   * Default implementation of importAll
   */
  async importAll(data: StorageSnapshot): Promise<void> {
    await this.saveTree(data.tree);

    for (const reminder of data.reminders) {
      await this.saveReminder(reminder);
    }

    for (const note of data.unclassified) {
      await this.saveUnclassifiedNote(note);
    }
  }
}

// ============================================================================
// FILE-BASED STORAGE IMPLEMENTATION
// ============================================================================
// The whole state (tree, reminders, unclassified notes) lives in one JSON
// file. Writes go to a temporary file that is renamed over the old one, so a
// reader sees either the previous state or the next one, never half of it.

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { join } from "path";

import { BaseStorage, type StorageSnapshot, type TreeTransactionResult } from "./interface.js";
import { parseSnapshot } from "./schema.js";
import { emptyTree, type FileStorageConfig, type IdeaTree, type Reminder, type UnclassifiedNote } from "../types/index.js";

function emptySnapshot(): StorageSnapshot {
  return { tree: emptyTree(), reminders: [], unclassified: [] };
}

export class FileStorage extends BaseStorage {
  private basePath: string;
  private statePath: string;
  private initialized: boolean = false;
  // Every read-modify-write is chained here so two in-process writers never
  // read the same previous state
  private queue: Promise<void> = Promise.resolve();

  constructor(config: FileStorageConfig) {
    super(config);
    this.basePath = config.basePath;
    this.statePath = join(this.basePath, "ideatree.json");
  }

  async initialize(): Promise<void> {
    if (!existsSync(this.basePath)) {
      mkdirSync(this.basePath, { recursive: true });
    }
    this.initialized = true;
  }

  async close(): Promise<void> {
    await this.queue;
    this.initialized = false;
  }

  async isReady(): Promise<boolean> {
    return this.initialized && existsSync(this.basePath);
  }

  // ---- Tree Operations ----

  async loadTree(): Promise<IdeaTree> {
    await this.ensureInitialized();
    return this.read().tree;
  }

  async saveTree(tree: IdeaTree): Promise<void> {
    await this.update((state) => ({ ...state, tree }));
  }

  protected async withTreeTransaction<T>(work: (tree: IdeaTree) => TreeTransactionResult<T>): Promise<T> {
    return this.transact((state) => {
      const next = work(state.tree);
      return {
        state: { ...state, tree: next.tree, reminders: [...state.reminders, ...next.reminders] },
        result: next.result,
      };
    });
  }

  // ---- Reminder Operations ----

  async saveReminder(reminder: Reminder): Promise<void> {
    await this.update((state) => ({
      ...state,
      reminders: [...state.reminders.filter((r) => r.id !== reminder.id), reminder],
    }));
  }

  async listReminders(includeSent = true): Promise<Reminder[]> {
    await this.ensureInitialized();
    return this.read().reminders.filter((r) => includeSent || !r.sent);
  }

  async claimReminder(id: string, sentAt: Date): Promise<boolean> {
    return this.transact((state) => {
      const target = state.reminders.find((r) => r.id === id);
      if (!target || target.sent) return { state, result: false };
      return {
        state: {
          ...state,
          reminders: state.reminders.map((r) => (r === target ? { ...r, sent: true, sentAt: sentAt.toISOString() } : r)),
        },
        result: true,
      };
    });
  }

  async releaseReminder(id: string): Promise<void> {
    await this.update((state) => ({
      ...state,
      reminders: state.reminders.map((r) => (r.id === id ? { ...r, sent: false, sentAt: undefined } : r)),
    }));
  }

  // ---- Unclassified Notes ----

  async saveUnclassifiedNote(note: UnclassifiedNote): Promise<void> {
    await this.update((state) => ({
      ...state,
      unclassified: [...state.unclassified.filter((n) => n.id !== note.id), note],
    }));
  }

  async listUnclassifiedNotes(): Promise<UnclassifiedNote[]> {
    await this.ensureInitialized();
    return this.read().unclassified;
  }

  // ---- Private Helpers ----

  private read(): StorageSnapshot {
    if (!existsSync(this.statePath)) return emptySnapshot();
    return parseSnapshot(JSON.parse(readFileSync(this.statePath, "utf-8")));
  }

  private write(state: StorageSnapshot): void {
    const tempPath = `${this.statePath}.${process.pid}.tmp`;
    writeFileSync(tempPath, JSON.stringify(state, null, 2));
    renameSync(tempPath, this.statePath);
  }

  private transact<R>(change: (state: StorageSnapshot) => { state: StorageSnapshot; result: R }): Promise<R> {
    const run = async (): Promise<R> => {
      await this.ensureInitialized();
      const next = change(this.read());
      this.write(next.state);
      return next.result;
    };
    const pending = this.queue.then(run);
    // A failed write is reported to its own caller; later writes still run
    this.queue = pending.then(
      () => undefined,
      () => undefined
    );
    return pending;
  }

  private update(change: (state: StorageSnapshot) => StorageSnapshot): Promise<void> {
    return this.transact((state) => ({ state: change(state), result: undefined }));
  }

  private async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
    }
  }
}

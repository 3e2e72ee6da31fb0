// ============================================================================
// IN-MEMORY STORAGE IMPLEMENTATION
// ============================================================================
// Process-local storage for tests and throwaway sessions. Nothing survives a
// restart.

import { BaseStorage, type TreeTransactionResult } from "./interface.js";
import { cloneTree } from "../reconciler/index.js";
import {
  emptyTree,
  type IdeaTree,
  type MemoryStorageConfig,
  type Reminder,
  type UnclassifiedNote,
} from "../types/index.js";

export class MemoryStorage extends BaseStorage {
  private tree: IdeaTree = emptyTree();
  private reminders = new Map<string, Reminder>();
  private unclassified: UnclassifiedNote[] = [];
  private initialized = false;

  constructor(config: MemoryStorageConfig = { type: "memory" }) {
    super(config);
  }

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async close(): Promise<void> {
    this.initialized = false;
  }

  async isReady(): Promise<boolean> {
    return this.initialized;
  }

  // ---- Tree Operations ----

  async loadTree(): Promise<IdeaTree> {
    return cloneTree(this.tree);
  }

  async saveTree(tree: IdeaTree): Promise<void> {
    this.tree = cloneTree(tree);
  }

  // The whole transaction runs synchronously, so nothing can interleave
  protected async withTreeTransaction<T>(work: (tree: IdeaTree) => TreeTransactionResult<T>): Promise<T> {
    const { tree, reminders, result } = work(cloneTree(this.tree));
    // Nothing is assigned until the whole next state is built
    const nextTree = cloneTree(tree);
    const copies = reminders.map((reminder) => ({ ...reminder }));

    this.tree = nextTree;
    for (const reminder of copies) {
      this.reminders.set(reminder.id, reminder);
    }
    return result;
  }

  // ---- Reminder Operations ----

  async saveReminder(reminder: Reminder): Promise<void> {
    this.reminders.set(reminder.id, { ...reminder });
  }

  async listReminders(includeSent = true): Promise<Reminder[]> {
    return [...this.reminders.values()]
      .filter((r) => includeSent || !r.sent)
      .map((r) => ({ ...r }));
  }

  async claimReminder(id: string, sentAt: Date): Promise<boolean> {
    const reminder = this.reminders.get(id);
    if (!reminder || reminder.sent) return false;
    reminder.sent = true;
    reminder.sentAt = sentAt.toISOString();
    return true;
  }

  async releaseReminder(id: string): Promise<void> {
    const reminder = this.reminders.get(id);
    if (reminder) {
      reminder.sent = false;
      delete reminder.sentAt;
    }
  }

  // ---- Unclassified Notes ----

  async saveUnclassifiedNote(note: UnclassifiedNote): Promise<void> {
    this.unclassified = [...this.unclassified.filter((n) => n.id !== note.id), { ...note }];
  }

  async listUnclassifiedNotes(): Promise<UnclassifiedNote[]> {
    return this.unclassified.map((n) => ({ ...n }));
  }
}

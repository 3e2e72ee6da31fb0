// ============================================================================
// SQLITE STORAGE IMPLEMENTATION
// ============================================================================
// SQLite-based storage for local single-user deployments.
// The tree is one JSON row; reminders and unclassified notes are tables.

import type BetterSqlite3 from "better-sqlite3";
import { z } from "zod";

import { BaseStorage, type TreeTransactionResult } from "./interface.js";
import { parseTree } from "./schema.js";
import { formatLocalIso } from "../reminders/time.js";
import {
  emptyTree,
  type IdeaTree,
  type Reminder,
  type SQLiteStorageConfig,
  type UnclassifiedNote,
} from "../types/index.js";

// Note: better-sqlite3 is synchronous, so a transaction body cannot be
// interrupted by another caller in this process.

const TreeRowSchema = z.object({ data: z.string() });

const ReminderRowSchema = z.object({
  id: z.string(),
  message: z.string(),
  fire_at: z.string(),
  sent: z.number(),
  created_at: z.string(),
  sent_at: z.string().nullable(),
});

const NoteRowSchema = z.object({
  id: z.string(),
  text: z.string(),
  reason: z.string(),
  created_at: z.string(),
});

function rowToReminder(row: unknown): Reminder {
  const r = ReminderRowSchema.parse(row);
  return {
    id: r.id,
    message: r.message,
    fireAt: r.fire_at,
    sent: r.sent === 1,
    createdAt: r.created_at,
    ...(r.sent_at ? { sentAt: r.sent_at } : {}),
  };
}

function rowToNote(row: unknown): UnclassifiedNote {
  const r = NoteRowSchema.parse(row);
  return { id: r.id, text: r.text, reason: r.reason, createdAt: r.created_at };
}

export class SQLiteStorage extends BaseStorage {
  private db: BetterSqlite3.Database | null = null;
  private dbPath: string;

  constructor(config: SQLiteStorageConfig) {
    super(config);
    this.dbPath = config.path;
  }

  async initialize(): Promise<void> {
    // Dynamic import to avoid loading the native module unless selected
    const Database = (await import("better-sqlite3")).default;
    this.db = new Database(this.dbPath);

    this.db.exec(`
      -- The whole tree (one row)
      CREATE TABLE IF NOT EXISTS tree_state (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        data TEXT NOT NULL,
        updated TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS reminders (
        id TEXT PRIMARY KEY,
        message TEXT NOT NULL,
        fire_at TEXT NOT NULL,
        sent INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        sent_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_reminders_due ON reminders(sent, fire_at);

      CREATE TABLE IF NOT EXISTS unclassified_notes (
        id TEXT PRIMARY KEY,
        text TEXT NOT NULL,
        reason TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
    `);

    const treeExists = this.db.prepare("SELECT 1 FROM tree_state WHERE id = 1").get();
    if (!treeExists) {
      this.db
        .prepare("INSERT INTO tree_state (id, data, updated) VALUES (1, ?, ?)")
        .run(JSON.stringify(emptyTree()), new Date().toISOString());
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async isReady(): Promise<boolean> {
    return this.db !== null;
  }

  // ---- Tree Operations ----

  async loadTree(): Promise<IdeaTree> {
    return this.readTree(this.ensureDb());
  }

  async saveTree(tree: IdeaTree): Promise<void> {
    this.writeTree(this.ensureDb(), tree);
  }

  protected async withTreeTransaction<T>(work: (tree: IdeaTree) => TreeTransactionResult<T>): Promise<T> {
    const db = this.ensureDb();

    const transaction = db.transaction((): T => {
      const next = work(this.readTree(db));
      this.writeTree(db, next.tree);
      for (const reminder of next.reminders) {
        this.insertReminder(db, reminder);
      }
      return next.result;
    });

    // IMMEDIATE takes the write lock before the tree is read
    return transaction.immediate();
  }

  // ---- Reminder Operations ----

  async saveReminder(reminder: Reminder): Promise<void> {
    this.insertReminder(this.ensureDb(), reminder);
  }

  async listReminders(includeSent = true): Promise<Reminder[]> {
    const db = this.ensureDb();
    const sql = includeSent
      ? "SELECT * FROM reminders ORDER BY fire_at"
      : "SELECT * FROM reminders WHERE sent = 0 ORDER BY fire_at";
    return db.prepare(sql).all().map(rowToReminder);
  }

  async listDueReminders(now: Date): Promise<Reminder[]> {
    const db = this.ensureDb();
    return db
      .prepare("SELECT * FROM reminders WHERE sent = 0 AND fire_at <= ? ORDER BY fire_at")
      .all(formatLocalIso(now))
      .map(rowToReminder);
  }

  async claimReminder(id: string, sentAt: Date): Promise<boolean> {
    const result = this.ensureDb()
      .prepare("UPDATE reminders SET sent = 1, sent_at = ? WHERE id = ? AND sent = 0")
      .run(sentAt.toISOString(), id);
    return result.changes === 1;
  }

  async releaseReminder(id: string): Promise<void> {
    this.ensureDb().prepare("UPDATE reminders SET sent = 0, sent_at = NULL WHERE id = ?").run(id);
  }

  // ---- Unclassified Notes ----

  async saveUnclassifiedNote(note: UnclassifiedNote): Promise<void> {
    this.ensureDb()
      .prepare("INSERT OR REPLACE INTO unclassified_notes (id, text, reason, created_at) VALUES (?, ?, ?, ?)")
      .run(note.id, note.text, note.reason, note.createdAt);
  }

  async listUnclassifiedNotes(): Promise<UnclassifiedNote[]> {
    return this.ensureDb().prepare("SELECT * FROM unclassified_notes ORDER BY created_at").all().map(rowToNote);
  }

  // ---- Private Helpers ----

  private ensureDb(): BetterSqlite3.Database {
    if (!this.db) {
      throw new Error("SQLite database not initialized. Call initialize() first.");
    }
    return this.db;
  }

  private readTree(db: BetterSqlite3.Database): IdeaTree {
    const row = db.prepare("SELECT data FROM tree_state WHERE id = 1").get();
    if (row === undefined) return emptyTree();
    return parseTree(JSON.parse(TreeRowSchema.parse(row).data));
  }

  private writeTree(db: BetterSqlite3.Database, tree: IdeaTree): void {
    db.prepare(
      "INSERT INTO tree_state (id, data, updated) VALUES (1, ?, ?) " +
        "ON CONFLICT(id) DO UPDATE SET data = excluded.data, updated = excluded.updated"
    ).run(JSON.stringify(tree), new Date().toISOString());
  }

  private insertReminder(db: BetterSqlite3.Database, reminder: Reminder): void {
    db.prepare(
      "INSERT OR REPLACE INTO reminders (id, message, fire_at, sent, created_at, sent_at) VALUES (?, ?, ?, ?, ?, ?)"
    ).run(
      reminder.id,
      reminder.message,
      reminder.fireAt,
      reminder.sent ? 1 : 0,
      reminder.createdAt,
      reminder.sentAt ?? null
    );
  }
}

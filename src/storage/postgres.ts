// ============================================================================
// POSTGRESQL STORAGE IMPLEMENTATION
// ============================================================================
// PostgreSQL-based storage for server deployments and multi-user scenarios.
// The tree row is locked with SELECT ... FOR UPDATE for the length of a
// batch, so concurrent servers cannot lose each other's updates.

import type { Pool, PoolClient } from "pg";
import { z } from "zod";

import { BaseStorage, type TreeTransactionResult } from "./interface.js";
import { parseTree } from "./schema.js";
import { formatLocalIso } from "../reminders/time.js";
import {
  emptyTree,
  type IdeaTree,
  type PostgresStorageConfig,
  type Reminder,
  type UnclassifiedNote,
} from "../types/index.js";

const TreeRowSchema = z.object({ data: z.unknown() });

const ReminderRowSchema = z.object({
  id: z.string(),
  message: z.string(),
  fire_at: z.string(),
  sent: z.boolean(),
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
    sent: r.sent,
    createdAt: r.created_at,
    ...(r.sent_at ? { sentAt: r.sent_at } : {}),
  };
}

function rowToNote(row: unknown): UnclassifiedNote {
  const r = NoteRowSchema.parse(row);
  return { id: r.id, text: r.text, reason: r.reason, createdAt: r.created_at };
}

export class PostgresStorage extends BaseStorage {
  private pool: Pool | null = null;
  private pgConfig: PostgresStorageConfig;

  constructor(config: PostgresStorageConfig) {
    super(config);
    this.pgConfig = config;
  }

  async initialize(): Promise<void> {
    // Dynamic import to avoid loading the driver unless selected
    const pg = (await import("pg")).default;

    this.pool = new pg.Pool({
      host: this.pgConfig.host,
      port: this.pgConfig.port,
      database: this.pgConfig.database,
      user: this.pgConfig.user,
      password: this.pgConfig.password,
      ssl: this.pgConfig.ssl ? { rejectUnauthorized: false } : false,
    });

    // Timestamps stay TEXT: fire times are local wall-clock strings
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS tree_state (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        data JSONB NOT NULL,
        updated TIMESTAMPTZ NOT NULL
      );

      CREATE TABLE IF NOT EXISTS reminders (
        id TEXT PRIMARY KEY,
        message TEXT NOT NULL,
        fire_at TEXT NOT NULL,
        sent BOOLEAN NOT NULL DEFAULT FALSE,
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

    await this.pool.query(
      "INSERT INTO tree_state (id, data, updated) VALUES (1, $1, NOW()) ON CONFLICT (id) DO NOTHING",
      [JSON.stringify(emptyTree())]
    );
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }

  async isReady(): Promise<boolean> {
    if (!this.pool) return false;

    try {
      await this.pool.query("SELECT 1");
      return true;
    } catch (error) {
      console.error(`\x1b[90mPostgreSQL health check failed: ${error instanceof Error ? error.message : String(error)}\x1b[0m`);
      return false;
    }
  }

  // ---- Tree Operations ----

  async loadTree(): Promise<IdeaTree> {
    return this.withClient((client) => this.readTree(client, false));
  }

  async saveTree(tree: IdeaTree): Promise<void> {
    await this.withClient((client) => this.writeTree(client, tree));
  }

  protected async withTreeTransaction<T>(work: (tree: IdeaTree) => TreeTransactionResult<T>): Promise<T> {
    const client = await this.ensurePool().connect();
    try {
      await client.query("BEGIN");

      const next = work(await this.readTree(client, true));
      await this.writeTree(client, next.tree);
      for (const reminder of next.reminders) {
        await this.insertReminder(client, reminder);
      }

      await client.query("COMMIT");
      return next.result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  // ---- Reminder Operations ----

  async saveReminder(reminder: Reminder): Promise<void> {
    await this.withClient((client) => this.insertReminder(client, reminder));
  }

  async listReminders(includeSent = true): Promise<Reminder[]> {
    const sql = includeSent
      ? "SELECT * FROM reminders ORDER BY fire_at"
      : "SELECT * FROM reminders WHERE sent = FALSE ORDER BY fire_at";
    const result = await this.ensurePool().query(sql);
    return result.rows.map(rowToReminder);
  }

  async listDueReminders(now: Date): Promise<Reminder[]> {
    const result = await this.ensurePool().query(
      "SELECT * FROM reminders WHERE sent = FALSE AND fire_at <= $1 ORDER BY fire_at",
      [formatLocalIso(now)]
    );
    return result.rows.map(rowToReminder);
  }

  async claimReminder(id: string, sentAt: Date): Promise<boolean> {
    const result = await this.ensurePool().query(
      "UPDATE reminders SET sent = TRUE, sent_at = $1 WHERE id = $2 AND sent = FALSE",
      [sentAt.toISOString(), id]
    );
    return result.rowCount === 1;
  }

  async releaseReminder(id: string): Promise<void> {
    await this.ensurePool().query("UPDATE reminders SET sent = FALSE, sent_at = NULL WHERE id = $1", [id]);
  }

  // ---- Unclassified Notes ----

  async saveUnclassifiedNote(note: UnclassifiedNote): Promise<void> {
    await this.ensurePool().query(
      `INSERT INTO unclassified_notes (id, text, reason, created_at) VALUES ($1, $2, $3, $4)
       ON CONFLICT (id) DO UPDATE SET text = EXCLUDED.text, reason = EXCLUDED.reason`,
      [note.id, note.text, note.reason, note.createdAt]
    );
  }

  async listUnclassifiedNotes(): Promise<UnclassifiedNote[]> {
    const result = await this.ensurePool().query("SELECT * FROM unclassified_notes ORDER BY created_at");
    return result.rows.map(rowToNote);
  }

  // ---- Private Helpers ----

  private ensurePool(): Pool {
    if (!this.pool) {
      throw new Error("PostgreSQL pool not initialized. Call initialize() first.");
    }
    return this.pool;
  }

  private async withClient<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.ensurePool().connect();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  private async readTree(db: PoolClient, forUpdate: boolean): Promise<IdeaTree> {
    const result = await db.query(`SELECT data FROM tree_state WHERE id = 1${forUpdate ? " FOR UPDATE" : ""}`);
    const row = result.rows[0];
    if (row === undefined) return emptyTree();
    return parseTree(TreeRowSchema.parse(row).data);
  }

  private async writeTree(db: PoolClient, tree: IdeaTree): Promise<void> {
    await db.query(
      `INSERT INTO tree_state (id, data, updated) VALUES (1, $1, NOW())
       ON CONFLICT (id) DO UPDATE SET data = EXCLUDED.data, updated = EXCLUDED.updated`,
      [JSON.stringify(tree)]
    );
  }

  private async insertReminder(db: PoolClient, reminder: Reminder): Promise<void> {
    await db.query(
      `INSERT INTO reminders (id, message, fire_at, sent, created_at, sent_at) VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (id) DO UPDATE SET message = EXCLUDED.message, fire_at = EXCLUDED.fire_at,
         sent = EXCLUDED.sent, sent_at = EXCLUDED.sent_at`,
      [reminder.id, reminder.message, reminder.fireAt, reminder.sent, reminder.createdAt, reminder.sentAt ?? null]
    );
  }
}

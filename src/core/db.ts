import sqlite3 from "sqlite3";
import { promisify } from "node:util";
import type { SessionStore, StoredSession, TranscriptEntry, TranscriptRole, TranscriptSink, UserId } from "../types.js";

sqlite3.verbose();

interface RunResult {
  lastID: number;
  changes: number;
}

interface SessionRow {
  user_id: number;
  display_name: string | null;
}

interface MessageRow {
  user_id: number;
  role: TranscriptRole;
  body: string;
  created_at: string;
}

type SessionTable = "pending" | "active";

export class Db implements SessionStore, TranscriptSink {
  private readonly db: sqlite3.Database;

  constructor(dbPath: string) {
    this.db = new sqlite3.Database(dbPath);
  }

  async close(): Promise<void> {
    await promisify(this.db.close.bind(this.db))();
  }

  private run(sql: string, params: unknown[] = []): Promise<RunResult> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function onRun(err) {
        if (err) {
          reject(err);
          return;
        }
        resolve({ lastID: this.lastID, changes: this.changes });
      });
    });
  }

  private get<T>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    return new Promise((resolve, reject) => {
      this.db.get<T>(sql, params, (err, row) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(row);
      });
    });
  }

  private all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.db.all<T>(sql, params, (err, rows) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(rows);
      });
    });
  }

  async migrate(): Promise<void> {
    await this.run(`
      CREATE TABLE IF NOT EXISTS banned (
        user_id INTEGER PRIMARY KEY,
        ts INTEGER NOT NULL
      )
    `);
    await this.run(`
      CREATE TABLE IF NOT EXISTS pending (
        user_id INTEGER PRIMARY KEY,
        display_name TEXT,
        ts INTEGER NOT NULL
      )
    `);
    await this.run(`
      CREATE TABLE IF NOT EXISTS active (
        user_id INTEGER PRIMARY KEY,
        display_name TEXT,
        ts INTEGER NOT NULL
      )
    `);
    await this.run(`
      CREATE TABLE IF NOT EXISTS messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL,
        role TEXT NOT NULL,
        body TEXT NOT NULL,
        created_at TEXT NOT NULL
      )
    `);
    await this.run(`CREATE INDEX IF NOT EXISTS messages_user_idx ON messages (user_id, id)`);
  }

  private async upsertSession(table: SessionTable, userId: UserId, displayName: string | null): Promise<void> {
    await this.run(
      `INSERT INTO ${table} (user_id, display_name, ts) VALUES (?, ?, ?)
       ON CONFLICT(user_id) DO UPDATE SET display_name = COALESCE(excluded.display_name, ${table}.display_name), ts = excluded.ts`,
      [userId, displayName, Math.floor(Date.now() / 1000)]
    );
  }

  private async listSessions(table: SessionTable): Promise<StoredSession[]> {
    const rows = await this.all<SessionRow>(`SELECT user_id, display_name FROM ${table} ORDER BY ts ASC, user_id ASC`);
    return rows.map((row) => ({ userId: row.user_id, displayName: row.display_name }));
  }

  async addPending(userId: UserId, displayName: string | null): Promise<void> {
    await this.upsertSession("pending", userId, displayName);
  }

  async removePending(userId: UserId): Promise<void> {
    await this.run(`DELETE FROM pending WHERE user_id = ?`, [userId]);
  }

  async listPending(): Promise<StoredSession[]> {
    return await this.listSessions("pending");
  }

  async addActive(userId: UserId, displayName: string | null): Promise<void> {
    await this.upsertSession("active", userId, displayName);
  }

  async removeActive(userId: UserId): Promise<void> {
    await this.run(`DELETE FROM active WHERE user_id = ?`, [userId]);
  }

  async listActive(): Promise<StoredSession[]> {
    return await this.listSessions("active");
  }

  async ban(userId: UserId): Promise<void> {
    await this.run(`INSERT OR IGNORE INTO banned (user_id, ts) VALUES (?, ?)`, [userId, Math.floor(Date.now() / 1000)]);
  }

  async unban(userId: UserId): Promise<void> {
    await this.run(`DELETE FROM banned WHERE user_id = ?`, [userId]);
  }

  async isBanned(userId: UserId): Promise<boolean> {
    const row = await this.get<{ found: number }>(`SELECT 1 AS found FROM banned WHERE user_id = ? LIMIT 1`, [userId]);
    return row !== undefined;
  }

  async listBanned(): Promise<UserId[]> {
    const rows = await this.all<{ user_id: number }>(`SELECT user_id FROM banned ORDER BY ts ASC, user_id ASC`);
    return rows.map((row) => row.user_id);
  }

  async saveMessage(userId: UserId, role: TranscriptRole, body: string): Promise<void> {
    await this.run(
      `INSERT INTO messages (user_id, role, body, created_at) VALUES (?, ?, ?, ?)`,
      [userId, role, body, new Date().toISOString()]
    );
  }

  async listMessages(userId: UserId, limit = 50): Promise<TranscriptEntry[]> {
    const rows = await this.all<MessageRow>(
      `SELECT user_id, role, body, created_at FROM messages WHERE user_id = ? ORDER BY id DESC LIMIT ?`,
      [userId, limit]
    );
    return rows.reverse().map((row) => ({
      userId: row.user_id,
      role: row.role,
      body: row.body,
      createdAt: row.created_at
    }));
  }
}

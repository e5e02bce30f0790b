/**
 * SQLite State Store
 * Persists the association/selection document, written whole on every mutation
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { z } from 'zod';
import type { PersistedState } from '../types/index.js';

const STATE_KEY = 'engine-state';

export const PersistedStateSchema = z.object({
  associations: z.record(z.string(), z.string()).default({}),
  selection: z.record(z.string(), z.boolean()).default({}),
  textured: z.record(z.string(), z.string()).default({}),
});

const DocumentRowSchema = z.object({
  body: z.string(),
  updated_at: z.number(),
});

export function emptyState(): PersistedState {
  return { associations: {}, selection: {}, textured: {} };
}

export class StateDatabase {
  private db: Database.Database;

  constructor(readonly dbPath: string) {
    if (dbPath !== ':memory:') {
      const dbDir = path.dirname(dbPath);
      if (!fs.existsSync(dbDir)) {
        fs.mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        key TEXT PRIMARY KEY,
        body TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `);
  }

  // ========== State document ==========

  saveState(state: PersistedState): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO documents (key, body, updated_at)
      VALUES (?, ?, ?)
    `).run(STATE_KEY, JSON.stringify(state), Date.now());
  }

  /** Stored document, or an empty one when nothing valid is stored */
  loadState(): PersistedState {
    const row = DocumentRowSchema.safeParse(
      this.db.prepare('SELECT body, updated_at FROM documents WHERE key = ?').get(STATE_KEY)
    );
    if (!row.success) return emptyState();

    let body: unknown;
    try {
      body = JSON.parse(row.data.body);
    } catch (err) {
      console.warn('[StateDatabase] Stored state is not valid JSON, starting empty:', err);
      return emptyState();
    }

    const parsed = PersistedStateSchema.safeParse(body);
    if (!parsed.success) {
      console.warn(`[StateDatabase] Stored state failed validation, starting empty: ${parsed.error.message}`);
      return emptyState();
    }
    return parsed.data;
  }

  close(): void {
    this.db.close();
  }
}

// Singleton instance
let dbInstance: StateDatabase | null = null;

export function getDatabase(dbPath: string): StateDatabase {
  if (dbInstance && dbInstance.dbPath !== dbPath) {
    closeDatabase();
  }
  if (!dbInstance) {
    dbInstance = new StateDatabase(dbPath);
  }
  return dbInstance;
}

export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}

import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { PROMPTRAIL_DB_PATH } from '../utils/paths.js';
import { PromptrailError, StorageError, describeError } from '../utils/errors.js';
import { MIGRATIONS } from './schema.js';
import { debug } from '../utils/logger.js';

let _db: BetterSqlite3.Database | null = null;

export interface StoreOptions {
  /** How long a writer waits on a lock held by another process before failing. */
  busyTimeoutMs?: number;
}

export function runMigrations(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db
    .prepare<[], { v: number | null }>('SELECT MAX(version) as v FROM _migrations')
    .get();
  const currentVersion = row?.v ?? 0;

  const pending = MIGRATIONS.filter((m) => m.version > currentVersion);
  if (pending.length === 0) return;

  const applyAll = db.transaction(() => {
    for (const migration of pending) {
      debug(`Applying migration ${migration.version}: ${migration.description}`);
      db.exec(migration.up);
      db.prepare('INSERT INTO _migrations (version) VALUES (?)').run(
        migration.version,
      );
    }
  });

  applyAll.immediate();
}

/**
 * Runs one logical store operation. Domain errors pass through; anything the
 * driver throws (busy timeouts, I/O, constraint violations) becomes a
 * StorageError.
 */
export function withStore<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof PromptrailError) throw err;
    throw new StorageError(`${operation} failed: ${describeError(err)}`, operation);
  }
}

export function openDatabase(
  dbPath: string,
  opts: StoreOptions = {},
): BetterSqlite3.Database {
  return withStore('open store', () => {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const db = new Database(dbPath, { timeout: opts.busyTimeoutMs ?? 2000 });
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');

    runMigrations(db);
    return db;
  });
}

export async function initStore(
  dbPath: string = PROMPTRAIL_DB_PATH,
  opts: StoreOptions = {},
): Promise<BetterSqlite3.Database> {
  closeStore();
  _db = openDatabase(dbPath, opts);
  return _db;
}

export function getStore(): BetterSqlite3.Database {
  if (!_db) {
    throw new StorageError('Store not initialized. Call initStore() first.');
  }
  return _db;
}

export function closeStore(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, renameSync } from 'node:fs';
import { dirname } from 'node:path';
import { log } from './logger.js';
import { StoreLoadError, errorMessage } from './errors.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS seen (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    source_name TEXT NOT NULL,
    listing_key TEXT NOT NULL UNIQUE,
    first_seen_at TEXT NOT NULL
  )
`;

interface PendingEntry {
  source: string;
  firstSeenAt: string;
}

interface SeenRow {
  listing_key: string;
}

function isSeenRow(row: unknown): row is SeenRow {
  return typeof row === 'object' && row !== null && 'listing_key' in row && typeof row.listing_key === 'string';
}

function openDatabase(path: string): { db: Database.Database; keys: Set<string> } {
  const db = new Database(path);
  try {
    db.exec(SCHEMA);
    const rows = db.prepare('SELECT listing_key FROM seen').all();
    return { db, keys: new Set(rows.filter(isSeenRow).map((row) => row.listing_key)) };
  } catch (err) {
    db.close();
    throw err;
  }
}

/**
 * Listing URLs already delivered by earlier runs. Everything is read into
 * memory on open; new ids are staged by markSeen and only written by persist
 * (or close), so a run that never marks anything leaves the file untouched.
 */
export class SeenStore {
  private db: Database.Database | null;
  private readonly keys: Set<string>;
  private readonly pending = new Map<string, PendingEntry>();

  private constructor(db: Database.Database, keys: Set<string>) {
    this.db = db;
    this.keys = keys;
  }

  static open(path: string): SeenStore {
    const inMemory = path === ':memory:';
    if (!inMemory) mkdirSync(dirname(path), { recursive: true });
    const existed = !inMemory && existsSync(path);
    try {
      const { db, keys } = openDatabase(path);
      log.info(`Seen store loaded from ${path}: ${keys.size} known listings`);
      return new SeenStore(db, keys);
    } catch (err: unknown) {
      if (!existed) throw err;
      const failure = new StoreLoadError(`Seen store at ${path} is unreadable: ${errorMessage(err)}`, {
        cause: err,
      });
      const aside = `${path}.corrupt-${Date.now()}`;
      renameSync(path, aside);
      log.warn(`${failure.message} — moved to ${aside}, starting with an empty history`);
      const { db, keys } = openDatabase(path);
      return new SeenStore(db, keys);
    }
  }

  get size(): number {
    return this.keys.size + this.pending.size;
  }

  contains(id: string): boolean {
    return this.keys.has(id) || this.pending.has(id);
  }

  markSeen(ids: Iterable<string>, timestamp: Date, source = ''): void {
    const firstSeenAt = timestamp.toISOString();
    for (const id of ids) {
      if (this.contains(id)) continue;
      this.pending.set(id, { source, firstSeenAt });
    }
  }

  persist(): number {
    if (this.pending.size === 0) return 0;
    const db = this.requireOpen();

    const insert = db.prepare(
      'INSERT OR IGNORE INTO seen (source_name, listing_key, first_seen_at) VALUES (?, ?, ?)',
    );
    const entries = [...this.pending.entries()];
    db.transaction(() => {
      for (const [id, entry] of entries) {
        insert.run(entry.source, id, entry.firstSeenAt);
      }
    })();

    for (const [id] of entries) this.keys.add(id);
    this.pending.clear();
    log.info(`Seen store: ${entries.length} listings recorded`);
    return entries.length;
  }

  close(): void {
    if (!this.db) return;
    this.persist();
    this.db.close();
    this.db = null;
  }

  private requireOpen(): Database.Database {
    if (!this.db) throw new Error('Seen store is closed');
    return this.db;
  }
}

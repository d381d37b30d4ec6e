/**
 * portwatch — SQLite history backend
 *
 * Stores history one row per address, so a persist touches only the
 * address that changed instead of rewriting the whole document.
 */

import Database from 'better-sqlite3';
import path from 'node:path';
import type { HistoryDocument } from '../types/entities.js';
import type { Logger } from '../logging/logger.js';
import type { HistoryBackend } from '../engine/history-store.js';
import { migrateDatabase } from './migrate.js';
import { HostHistoryRepository } from './repository/host-history-repository.js';

export class SqliteHistoryBackend implements HistoryBackend {
  readonly location: string;
  private readonly db: Database.Database;
  private readonly repo: HostHistoryRepository;
  private readonly logger: Logger;

  /** Accepts a file path or an already opened database (e.g. `:memory:` in tests). */
  constructor(source: string | Database.Database, logger: Logger) {
    if (typeof source === 'string') {
      this.location = source === ':memory:' ? source : path.resolve(source);
      this.db = new Database(this.location);
    } else {
      this.location = source.name;
      this.db = source;
    }
    migrateDatabase(this.db);
    this.repo = new HostHistoryRepository(this.db);
    this.logger = logger;
  }

  load(): HistoryDocument {
    const document: HistoryDocument = {};
    const rows = this.repo.findAll((address, err) =>
      this.logger.error(`dropping malformed history row for ${address}`, err),
    );
    for (const [address, history] of rows) {
      document[address] = history;
    }
    return document;
  }

  persist(document: HistoryDocument, address: string): void {
    const history = document[address];
    if (history === undefined) return;
    this.repo.upsert(address, history);
  }

  close(): void {
    this.db.close();
  }
}

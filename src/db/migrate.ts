import type Database from 'better-sqlite3';
import { SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';

/**
 * Get the current schema version from the database.
 */
export function getSchemaVersion(db: Database.Database): number {
  const row = db.prepare<[], { user_version: number }>('PRAGMA user_version').get();
  return row?.user_version ?? 0;
}

/**
 * Bring the database to SCHEMA_VERSION.
 *
 * - New database (user_version = 0): runs the schema SQL and sets the version.
 * - Up to date: re-runs the IF NOT EXISTS schema, which is a no-op.
 * - Newer than this build: refused, so an old binary never rewrites rows it
 *   does not understand.
 */
export function migrateDatabase(db: Database.Database): void {
  const currentVersion = getSchemaVersion(db);

  if (currentVersion > SCHEMA_VERSION) {
    throw new Error(
      `database schema v${currentVersion} is newer than supported v${SCHEMA_VERSION}`,
    );
  }

  const apply = db.transaction(() => {
    db.exec(SCHEMA_SQL);
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  });
  apply();
}

import type Database from 'better-sqlite3';
import type { HostHistory } from '../../types/entities.js';

/**
 * Raw row shape returned by better-sqlite3 for the `host_history` table.
 * Column names are snake_case as defined in the schema.
 */
interface HostHistoryRow {
  address: string;
  first_seen: string;
  last_seen: string;
  ports_json: string;
  services_json: string;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}

function isPortArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => Number.isInteger(v));
}

/**
 * Maps a snake_case DB row to a camelCase HostHistory.
 *
 * @throws when the JSON columns do not hold a port list / banner map
 */
function rowToHistory(row: HostHistoryRow): HostHistory {
  const ports: unknown = JSON.parse(row.ports_json);
  const services: unknown = JSON.parse(row.services_json);
  if (!isPortArray(ports) || !isStringRecord(services)) {
    throw new Error(`malformed history row for ${row.address}`);
  }
  return {
    firstSeen: row.first_seen,
    lastSeen: row.last_seen,
    ports,
    services,
  };
}

/**
 * Repository for the `host_history` table.
 *
 * All queries use prepared statements to prevent SQL injection.
 */
export class HostHistoryRepository {
  private readonly db: Database.Database;

  private readonly upsertStmt: Database.Statement<[string, string, string, string, string]>;
  private readonly selectByAddressStmt: Database.Statement<[string], HostHistoryRow>;
  private readonly selectAllStmt: Database.Statement<[], HostHistoryRow>;

  constructor(db: Database.Database) {
    this.db = db;

    this.upsertStmt = this.db.prepare<[string, string, string, string, string]>(
      `INSERT INTO host_history (address, first_seen, last_seen, ports_json, services_json)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(address) DO UPDATE SET
         first_seen    = excluded.first_seen,
         last_seen     = excluded.last_seen,
         ports_json    = excluded.ports_json,
         services_json = excluded.services_json`,
    );

    this.selectByAddressStmt = this.db.prepare<[string], HostHistoryRow>(
      `SELECT address, first_seen, last_seen, ports_json, services_json
       FROM host_history
       WHERE address = ?`,
    );

    this.selectAllStmt = this.db.prepare<[], HostHistoryRow>(
      `SELECT address, first_seen, last_seen, ports_json, services_json
       FROM host_history
       ORDER BY address`,
    );
  }

  /** Insert or replace the row for `address`. */
  upsert(address: string, history: HostHistory): void {
    this.upsertStmt.run(
      address,
      history.firstSeen,
      history.lastSeen,
      JSON.stringify(history.ports),
      JSON.stringify(history.services),
    );
  }

  /** Find the history of one address. Returns undefined if not found. */
  findByAddress(address: string): HostHistory | undefined {
    const row = this.selectByAddressStmt.get(address);
    return row ? rowToHistory(row) : undefined;
  }

  /**
   * Return every stored address. Rows that fail to decode are passed to
   * `onMalformed` and left out.
   */
  findAll(onMalformed?: (address: string, error: unknown) => void): Map<string, HostHistory> {
    const result = new Map<string, HostHistory>();
    for (const row of this.selectAllStmt.all()) {
      try {
        result.set(row.address, rowToHistory(row));
      } catch (err) {
        onMalformed?.(row.address, err);
      }
    }
    return result;
  }
}

/**
 * portwatch — SQLite history schema
 *
 * One row per address. Ports and banners are stored as JSON text so a row
 * maps 1:1 to a HostHistory.
 */

export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
-- ============================================================
-- アドレスごとの履歴
-- ============================================================
CREATE TABLE IF NOT EXISTS host_history (
  address        TEXT PRIMARY KEY,
  first_seen     TEXT NOT NULL,
  last_seen      TEXT NOT NULL,
  ports_json     TEXT NOT NULL DEFAULT '[]',   -- 昇順・重複なし
  services_json  TEXT NOT NULL DEFAULT '{}'    -- "port" -> banner
);

CREATE INDEX IF NOT EXISTS idx_host_history_last_seen ON host_history(last_seen);
`;

/**
 * portwatch — masscan JSON output parser
 *
 * masscan -oJ writes one JSON object per host line, wrapped in a JSON array
 * whose brackets and separator commas may sit on their own lines or stick
 * to the objects. Each line is decoded independently; a line that cannot be
 * decoded is skipped without aborting the rest of the file.
 */

import type { Protocol, ScanRecord } from '../types/entities.js';
import { PROTOCOLS } from '../types/entities.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage, silentLogger } from '../logging/logger.js';

/** Anything shorter cannot hold an address and a port list. */
export const MIN_RECORD_LENGTH = 10;

// ============================================================
// masscan record shapes (narrowed from unknown)
// ============================================================

interface MasscanPortEntry {
  port: number;
  proto?: string;
  status?: string;
}

interface MasscanHostEntry {
  ip: string;
  ports: unknown[];
}

export interface MasscanParseResult {
  records: ScanRecord[];
  /** Non-empty lines that were not decodable host entries. */
  skipped: number;
}

// ============================================================
// type guards
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHostEntry(value: unknown): value is MasscanHostEntry {
  if (!isRecord(value)) return false;
  if (typeof value.ip !== 'string' || value.ip === '') return false;
  return Array.isArray(value.ports);
}

function isPortEntry(value: unknown): value is MasscanPortEntry {
  if (!isRecord(value)) return false;
  const port = value.port;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
    return false;
  }
  if (value.proto !== undefined && typeof value.proto !== 'string') return false;
  if (value.status !== undefined && typeof value.status !== 'string') return false;
  return true;
}

function isProtocol(value: string): value is Protocol {
  return (PROTOCOLS as readonly string[]).includes(value);
}

// ============================================================
// line handling
// ============================================================

/** Removes array brackets and separator commas around a host object. */
export function stripDelimiters(line: string): string {
  let s = line.trim();
  while (s.startsWith('[') || s.startsWith(',')) {
    s = s.slice(1).trimStart();
  }
  while (s.endsWith(']') || s.endsWith(',')) {
    s = s.slice(0, -1).trimEnd();
  }
  return s;
}

function toRecords(entry: MasscanHostEntry, logger: Logger): ScanRecord[] {
  const records: ScanRecord[] = [];
  for (const raw of entry.ports) {
    if (!isPortEntry(raw)) {
      logger.debug(`skipping malformed port entry for ${entry.ip}`);
      continue;
    }
    const protocol = (raw.proto ?? 'tcp').toLowerCase();
    if (!isProtocol(protocol)) {
      logger.debug(`skipping ${entry.ip}:${raw.port} with unsupported protocol ${protocol}`);
      continue;
    }
    const status = raw.status ?? 'open';
    if (status !== 'open') {
      logger.debug(`skipping ${entry.ip}:${raw.port} with status ${status}`);
      continue;
    }
    records.push({ address: entry.ip, port: raw.port, protocol, status });
  }
  return records;
}

// ============================================================
// main parser
// ============================================================

/**
 * Parses masscan JSON output into scan records.
 *
 * Empty lines are ignored. Lines that are only delimiters, too short,
 * undecodable, or not host entries count as skipped and are logged at
 * debug level.
 */
export function parseMasscanOutput(
  content: string,
  logger: Logger = silentLogger,
): MasscanParseResult {
  const result: MasscanParseResult = { records: [], skipped: 0 };

  const lines = content.split(/\r?\n/);
  lines.forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }

    const body = stripDelimiters(line);
    if (body.length < MIN_RECORD_LENGTH) {
      result.skipped += 1;
      logger.debug(`line ${index + 1}: skipped short or delimiter-only line`);
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      result.skipped += 1;
      logger.debug(`line ${index + 1}: skipped undecodable line (${errorMessage(err)})`);
      return;
    }

    if (!isHostEntry(parsed)) {
      result.skipped += 1;
      logger.debug(`line ${index + 1}: skipped entry without ip/ports`);
      return;
    }

    result.records.push(...toRecords(parsed, logger));
  });

  return result;
}

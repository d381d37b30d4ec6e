/**
 * portwatch — JSON document history backend
 *
 * The whole history lives in one JSON file keyed by address and is
 * rewritten on every persist.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { HistoryDocument } from '../types/entities.js';
import type { Logger } from '../logging/logger.js';
import type { HistoryBackend } from './history-store.js';
import { sortedUnique } from './history-store.js';

/** On-disk shape of one address entry. */
const HostHistoryFileSchema = z.object({
  first_seen: z.string(),
  last_seen: z.string(),
  ports: z.array(z.number().int().min(0).max(65535)),
  services: z.record(z.string(), z.string()).default({}),
});

type HostHistoryFile = z.infer<typeof HostHistoryFileSchema>;

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/** Write-to-temp then rename, so a crash never leaves half a document. */
export function atomicWriteFileSync(filePath: string, payload: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, payload, 'utf-8');
  try {
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}

export class JsonHistoryBackend implements HistoryBackend {
  readonly location: string;
  private readonly logger: Logger;

  constructor(filePath: string, logger: Logger) {
    this.location = path.resolve(filePath);
    this.logger = logger;
  }

  load(): HistoryDocument {
    let raw: string;
    try {
      raw = fs.readFileSync(this.location, 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        return {};
      }
      throw err;
    }

    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('history document is not a JSON object');
    }

    const document: HistoryDocument = {};
    for (const [address, entry] of Object.entries(parsed)) {
      const result = HostHistoryFileSchema.safeParse(entry);
      if (!result.success) {
        this.logger.warn(`dropping malformed history entry for ${address}`);
        continue;
      }
      document[address] = {
        firstSeen: result.data.first_seen,
        lastSeen: result.data.last_seen,
        ports: sortedUnique(result.data.ports),
        services: result.data.services,
      };
    }
    return document;
  }

  persist(document: HistoryDocument): void {
    const out: Record<string, HostHistoryFile> = {};
    for (const [address, history] of Object.entries(document)) {
      out[address] = {
        first_seen: history.firstSeen,
        last_seen: history.lastSeen,
        ports: history.ports,
        services: history.services,
      };
    }
    fs.mkdirSync(path.dirname(this.location), { recursive: true });
    atomicWriteFileSync(this.location, `${JSON.stringify(out, null, 2)}\n`);
  }
}

/**
 * portwatch — History Store
 *
 * Per-address port/service history. The in-memory document is
 * authoritative for the lifetime of the process; the backend is only a
 * best-effort durable copy. Every update persists immediately.
 */

import type { HistoryDocument, HostHistory, ServiceChange } from '../types/entities.js';
import type { Logger } from '../logging/logger.js';

/** Durable storage for a HistoryDocument. */
export interface HistoryBackend {
  /** Human-readable location (file path) for log lines. */
  readonly location: string;
  /**
   * Returns the stored document, or an empty one when nothing is stored yet.
   * May throw when the stored data cannot be read.
   */
  load(): HistoryDocument;
  /** Writes the document after `address` changed. May throw. */
  persist(document: HistoryDocument, address: string): void;
}

/** Ascending, duplicates removed. */
export function sortedUnique(ports: Iterable<number>): number[] {
  return [...new Set(ports)].sort((a, b) => a - b);
}

function cloneHistory(history: HostHistory): HostHistory {
  return {
    firstSeen: history.firstSeen,
    lastSeen: history.lastSeen,
    ports: [...history.ports],
    services: { ...history.services },
  };
}

export class HistoryStore {
  private readonly document: HistoryDocument;
  private readonly backend: HistoryBackend;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private constructor(
    document: HistoryDocument,
    backend: HistoryBackend,
    logger: Logger,
    now: () => Date,
  ) {
    this.document = document;
    this.backend = backend;
    this.logger = logger;
    this.now = now;
  }

  /**
   * Loads the store from `backend`. Unreadable data is logged and replaced
   * by an empty store so startup never blocks on it.
   */
  static open(backend: HistoryBackend, logger: Logger, now: () => Date = () => new Date()): HistoryStore {
    let document: HistoryDocument = {};
    try {
      document = backend.load();
      logger.info(`loaded history for ${Object.keys(document).length} addresses from ${backend.location}`);
    } catch (err) {
      logger.error(`history at ${backend.location} is unreadable; starting empty`, err);
    }
    return new HistoryStore(document, backend, logger, now);
  }

  addresses(): string[] {
    return Object.keys(this.document);
  }

  get(address: string): HostHistory | undefined {
    const history = this.document[address];
    return history ? cloneHistory(history) : undefined;
  }

  snapshot(): HistoryDocument {
    const copy: HistoryDocument = {};
    for (const [address, history] of Object.entries(this.document)) {
      copy[address] = cloneHistory(history);
    }
    return copy;
  }

  /** Ports stored by the last update; empty for unknown addresses. */
  previousPorts(address: string): number[] {
    return [...(this.document[address]?.ports ?? [])];
  }

  /** Every banner ever stored for the address, including closed ports. */
  previousServices(address: string): Record<string, string> {
    return { ...(this.document[address]?.services ?? {}) };
  }

  /** Ports in `currentPorts` that the stored state does not have. */
  findNewPorts(address: string, currentPorts: number[]): number[] {
    const previous = new Set(this.previousPorts(address));
    return sortedUnique(currentPorts).filter((port) => !previous.has(port));
  }

  /** Ports whose stored banner exists and differs from the current one. */
  findChangedServices(address: string, currentServices: Record<string, string>): ServiceChange[] {
    const previous = this.document[address]?.services ?? {};
    const changes: ServiceChange[] = [];
    for (const [port, current] of Object.entries(currentServices)) {
      const before = previous[port];
      if (before !== undefined && before !== current) {
        changes.push({ port: Number(port), previous: before, current });
      }
    }
    return changes.sort((a, b) => a.port - b.port);
  }

  /**
   * Replaces the port set, merges banners and persists. A persist failure
   * is logged; the in-memory update stands.
   */
  update(address: string, currentPorts: number[], currentServices: Record<string, string>): HostHistory {
    const timestamp = this.now().toISOString();
    const existing = this.document[address];

    const next: HostHistory = {
      firstSeen: existing?.firstSeen ?? timestamp,
      lastSeen: timestamp,
      ports: sortedUnique(currentPorts),
      services: { ...(existing?.services ?? {}), ...currentServices },
    };
    this.document[address] = next;

    try {
      this.backend.persist(this.document, address);
    } catch (err) {
      this.logger.error(`failed to persist history for ${address} to ${this.backend.location}`, err);
    }
    return cloneHistory(next);
  }
}

/**
 * Test doubles shared across suites.
 */

import type { HistoryBackend } from '../../src/engine/history-store.js';
import type { Logger } from '../../src/logging/logger.js';
import { createLogger } from '../../src/logging/logger.js';
import type { MessageSender, SendOptions } from '../../src/notify/telegram-notifier.js';
import type { HistoryDocument, ScanRecord } from '../../src/types/entities.js';
import type { ProbeOutcome, ServiceProbe } from '../../src/types/engine.js';

export const FIXED_NOW = new Date('2026-01-15T10:30:00.000Z');

/** Logger that keeps every line (debug and up). */
export function recordingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({
    level: 'debug',
    sink: (line) => lines.push(line),
    now: () => FIXED_NOW,
  });
  return { logger, lines };
}

/** In-process history backend; the stored copy is what a restart would load. */
export class MemoryHistoryBackend implements HistoryBackend {
  readonly location = 'memory://history';
  stored: HistoryDocument;
  persistedAddresses: string[] = [];
  failPersist = false;

  constructor(initial: HistoryDocument = {}) {
    this.stored = structuredClone(initial);
  }

  load(): HistoryDocument {
    return structuredClone(this.stored);
  }

  persist(document: HistoryDocument, address: string): void {
    if (this.failPersist) {
      throw new Error('disk full');
    }
    this.persistedAddresses.push(address);
    this.stored = structuredClone(document);
  }
}

/** Probe answering from a fixed banner table per address. */
export class FakeProbe implements ServiceProbe {
  readonly calls: Array<{ address: string; ports: number[] }> = [];
  banners: Record<string, Record<number, string>>;
  failing = new Set<string>();

  constructor(banners: Record<string, Record<number, string>> = {}) {
    this.banners = banners;
  }

  async identify(address: string, ports: number[]): Promise<Map<number, ProbeOutcome>> {
    this.calls.push({ address, ports: [...ports] });
    if (this.failing.has(address)) {
      throw new Error(`probe crashed on ${address}`);
    }
    const table = this.banners[address] ?? {};
    const result = new Map<number, ProbeOutcome>();
    for (const port of ports) {
      const banner = table[port];
      result.set(
        port,
        banner !== undefined ? { kind: 'open', banner } : { kind: 'closed', state: 'no data' },
      );
    }
    return result;
  }
}

/** Sender that records messages instead of delivering them. */
export class RecordingSender implements MessageSender {
  readonly messages: string[] = [];
  readonly options: Array<SendOptions | undefined> = [];
  result = true;

  async send(message: string, options?: SendOptions): Promise<boolean> {
    this.messages.push(message);
    this.options.push(options);
    return this.result;
  }
}

export function records(address: string, ports: number[]): ScanRecord[] {
  return ports.map((port) => ({ address, port, protocol: 'tcp', status: 'open' }));
}

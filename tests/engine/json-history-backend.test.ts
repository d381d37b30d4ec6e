import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { HistoryStore } from '../../src/engine/history-store.js';
import { JsonHistoryBackend } from '../../src/engine/json-history-backend.js';
import { silentLogger } from '../../src/logging/logger.js';
import { recordingLogger } from '../helpers/fakes.js';

describe('JsonHistoryBackend', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'portwatch-history-'));
    file = path.join(dir, 'scan_history.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('missing file loads as an empty document', () => {
    const backend = new JsonHistoryBackend(file, silentLogger);

    expect(backend.load()).toEqual({});
  });

  it('writes snake_case entries keyed by address', () => {
    const backend = new JsonHistoryBackend(file, silentLogger);
    backend.persist({
      '10.0.0.5': {
        firstSeen: '2026-01-01T00:00:00.000Z',
        lastSeen: '2026-01-02T00:00:00.000Z',
        ports: [22, 80],
        services: { '22': 'ssh OpenSSH 8.2' },
      },
    });

    const onDisk: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    expect(onDisk).toEqual({
      '10.0.0.5': {
        first_seen: '2026-01-01T00:00:00.000Z',
        last_seen: '2026-01-02T00:00:00.000Z',
        ports: [22, 80],
        services: { '22': 'ssh OpenSSH 8.2' },
      },
    });
    expect(fs.existsSync(`${file}.tmp`)).toBe(false);
  });

  it('creates the parent directory on first persist', () => {
    const nested = path.join(dir, 'state', 'history.json');
    const backend = new JsonHistoryBackend(nested, silentLogger);

    backend.persist({});

    expect(fs.readFileSync(nested, 'utf-8')).toBe('{}\n');
  });

  it('round-trips through a HistoryStore restart', () => {
    const first = HistoryStore.open(new JsonHistoryBackend(file, silentLogger), silentLogger);
    first.update('10.0.0.5', [80, 22], { '22': 'ssh', '80': 'http' });

    const second = HistoryStore.open(new JsonHistoryBackend(file, silentLogger), silentLogger);

    expect(second.previousPorts('10.0.0.5')).toEqual([22, 80]);
    expect(second.previousServices('10.0.0.5')).toEqual({ '22': 'ssh', '80': 'http' });
  });

  it('corrupt document throws on load, and the store starts empty', () => {
    fs.writeFileSync(file, '{"10.0.0.5": {"first_seen": ', 'utf-8');
    const backend = new JsonHistoryBackend(file, silentLogger);

    expect(() => backend.load()).toThrow();
    expect(HistoryStore.open(backend, silentLogger).addresses()).toEqual([]);
  });

  it('non-object document is rejected', () => {
    fs.writeFileSync(file, '[1, 2, 3]', 'utf-8');

    expect(() => new JsonHistoryBackend(file, silentLogger).load()).toThrow(
      'history document is not a JSON object',
    );
  });

  it('drops malformed entries and keeps the rest', () => {
    const { logger, lines } = recordingLogger();
    fs.writeFileSync(
      file,
      JSON.stringify({
        '10.0.0.1': { first_seen: 'a', last_seen: 'b', ports: [443, 22], services: {} },
        '10.0.0.2': { first_seen: 'a', ports: 'nope' },
      }),
      'utf-8',
    );

    const document = new JsonHistoryBackend(file, logger).load();

    expect(document).toEqual({
      '10.0.0.1': { firstSeen: 'a', lastSeen: 'b', ports: [22, 443], services: {} },
    });
    expect(lines).toEqual([
      '2026-01-15T10:30:00.000Z WARN dropping malformed history entry for 10.0.0.2',
    ]);
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { MasscanConfigSchema } from '../../src/config/schema.js';
import type { MasscanConfig } from '../../src/config/schema.js';
import { silentLogger } from '../../src/logging/logger.js';
import { MasscanExecutor } from '../../src/scanner/masscan-executor.js';
import type { ProcessResult, ProcessRunner } from '../../src/scanner/process-runner.js';
import { recordingLogger } from '../helpers/fakes.js';

const OUTPUT = `[
{   "ip": "10.0.0.1",   "timestamp": "1700000000", "ports": [ {"port": 22, "proto": "tcp", "status": "open", "reason": "syn-ack", "ttl": 64} ] }
,
{   "ip": "10.0.0.2",   "timestamp": "1700000000", "ports": [ {"port": 80, "proto": "tcp", "status": "open", "reason": "syn-ack", "ttl": 64} ] }
]
`;

function result(overrides: Partial<ProcessResult> = {}): ProcessResult {
  return { exitCode: 0, signal: null, stdout: '', stderr: '', timedOut: false, ...overrides };
}

/** Path passed after -oJ. */
function outputArg(args: string[]): string {
  return args[args.indexOf('-oJ') + 1] ?? '';
}

describe('MasscanExecutor', () => {
  let dir: string;
  let config: MasscanConfig;
  let calls: Array<{ command: string; args: string[]; timeoutMs: number }>;

  /** Runner that writes `content` to the requested output file, if given. */
  function fakeRunner(content: string | undefined, res: ProcessResult = result()): ProcessRunner {
    return async (command, args, options) => {
      calls.push({ command, args, timeoutMs: options.timeoutMs });
      if (content !== undefined) fs.writeFileSync(outputArg(args), content, 'utf-8');
      return res;
    };
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'portwatch-masscan-'));
    config = MasscanConfigSchema.parse({ output_dir: dir, rate: 500, timeout_seconds: 30 });
    calls = [];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('runs masscan with the expected arguments and parses its output', async () => {
    const executor = new MasscanExecutor({
      config,
      logger: silentLogger,
      runner: fakeRunner(OUTPUT),
    });

    const records = await executor.scan('10.0.0.0/30', '22,80');

    expect(records).toEqual([
      { address: '10.0.0.1', port: 22, protocol: 'tcp', status: 'open' },
      { address: '10.0.0.2', port: 80, protocol: 'tcp', status: 'open' },
    ]);
    const call = calls[0];
    expect(call?.command).toBe('masscan');
    expect(call?.timeoutMs).toBe(30_000);
    expect(call?.args).toEqual([
      '10.0.0.0/30',
      '-p22,80',
      '--rate',
      '500',
      '--open-only',
      '--wait',
      '0',
      '-oJ',
      outputArg(call?.args ?? []),
    ]);
    expect(path.dirname(outputArg(call?.args ?? []))).toBe(dir);
  });

  it('removes the output file afterwards', async () => {
    const executor = new MasscanExecutor({ config, logger: silentLogger, runner: fakeRunner(OUTPUT) });

    await executor.scan('10.0.0.0/30', '22');

    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('uses a distinct output file per invocation', async () => {
    const executor = new MasscanExecutor({
      config,
      logger: silentLogger,
      runner: fakeRunner(OUTPUT),
      now: () => new Date('2026-01-15T10:30:00.000Z'),
    });

    await executor.scan('10.0.0.0/30', '22');
    await executor.scan('10.0.1.0/30', '22');

    const [first, second] = calls.map((c) => outputArg(c.args));
    expect(first).toMatch(/masscan-2026-01-15T10-30-00-000Z-[0-9a-f]{8}\.json$/);
    expect(first).not.toBe(second);
  });

  it('accepts the partial-unreachability exit code', async () => {
    const { logger, lines } = recordingLogger();
    const executor = new MasscanExecutor({
      config,
      logger,
      runner: fakeRunner(OUTPUT, result({ exitCode: 1 })),
    });

    const records = await executor.scan('10.0.0.0/30', '22,80');

    expect(records).toHaveLength(2);
    expect(lines).toContain(
      '2026-01-15T10:30:00.000Z WARN masscan finished with exit 1 for 10.0.0.0/30; some hosts unreachable',
    );
  });

  it('returns nothing for exit codes outside the whitelist', async () => {
    const { logger, lines } = recordingLogger();
    const executor = new MasscanExecutor({
      config,
      logger,
      runner: fakeRunner(OUTPUT, result({ exitCode: 2, stderr: 'FAIL: permission denied\n' })),
    });

    expect(await executor.scan('10.0.0.0/30', '22')).toEqual([]);
    expect(lines).toContain(
      '2026-01-15T10:30:00.000Z ERROR masscan failed for 10.0.0.0/30 (exit 2): FAIL: permission denied',
    );
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('returns nothing on timeout', async () => {
    const executor = new MasscanExecutor({
      config,
      logger: silentLogger,
      runner: fakeRunner(OUTPUT, result({ exitCode: null, signal: 'SIGTERM', timedOut: true })),
    });

    expect(await executor.scan('10.0.0.0/30', '22')).toEqual([]);
  });

  it('returns nothing when the process cannot start', async () => {
    const executor = new MasscanExecutor({
      config,
      logger: silentLogger,
      runner: async () => {
        throw new Error('spawn masscan ENOENT');
      },
    });

    expect(await executor.scan('10.0.0.0/30', '22')).toEqual([]);
  });

  it('returns nothing when no output file was written', async () => {
    const executor = new MasscanExecutor({
      config,
      logger: silentLogger,
      runner: fakeRunner(undefined),
    });

    expect(await executor.scan('10.0.0.0/30', '22')).toEqual([]);
  });

  it('honours a custom exit code whitelist', async () => {
    const strict = MasscanConfigSchema.parse({ output_dir: dir, accepted_exit_codes: [0] });
    const executor = new MasscanExecutor({
      config: strict,
      logger: silentLogger,
      runner: fakeRunner(OUTPUT, result({ exitCode: 1 })),
    });

    expect(await executor.scan('10.0.0.0/30', '22')).toEqual([]);
  });
});

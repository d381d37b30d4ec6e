import { describe, it, expect } from 'vitest';
import { NmapConfigSchema } from '../../src/config/schema.js';
import { silentLogger } from '../../src/logging/logger.js';
import type { ProcessResult, ProcessRunner } from '../../src/scanner/process-runner.js';
import { ServiceIdentifier } from '../../src/scanner/service-identifier.js';

const NMAP_XML = `<?xml version="1.0" encoding="UTF-8"?>
<nmaprun scanner="nmap">
  <host>
    <address addr="10.0.0.5" addrtype="ipv4"/>
    <ports>
      <port protocol="tcp" portid="22">
        <state state="open" reason="syn-ack"/>
        <service name="ssh" product="OpenSSH" version="8.2"/>
      </port>
      <port protocol="tcp" portid="80">
        <state state="open" reason="syn-ack"/>
        <service name="http" product="nginx" version="1.18"/>
      </port>
    </ports>
  </host>
</nmaprun>`;

const config = NmapConfigSchema.parse({});

function runner(res: Partial<ProcessResult>, seen?: string[][]): ProcessRunner {
  return async (_command, args) => {
    seen?.push(args);
    return { exitCode: 0, signal: null, stdout: '', stderr: '', timedOut: false, ...res };
  };
}

describe('ServiceIdentifier', () => {
  it('probes the whole batch in one nmap call', async () => {
    const seen: string[][] = [];
    const identifier = new ServiceIdentifier({
      config,
      logger: silentLogger,
      runner: runner({ stdout: NMAP_XML }, seen),
    });

    const outcomes = await identifier.identify('10.0.0.5', [22, 80, 443]);

    expect(seen).toEqual([['-sV', '-T4', '--open', '-p', '22,80,443', '-oX', '-', '10.0.0.5']]);
    expect(outcomes).toEqual(
      new Map([
        [22, { kind: 'open', banner: 'ssh OpenSSH 8.2' }],
        [80, { kind: 'open', banner: 'http nginx 1.18' }],
        [443, { kind: 'closed', state: 'no data' }],
      ]),
    );
  });

  it('marks every port failed on a non-zero exit', async () => {
    const identifier = new ServiceIdentifier({
      config,
      logger: silentLogger,
      runner: runner({ exitCode: 1, stderr: 'Failed to resolve' }),
    });

    const outcomes = await identifier.identify('10.0.0.5', [22, 80]);

    expect([...outcomes.values()]).toEqual([
      { kind: 'failed', reason: 'nmap exit 1' },
      { kind: 'failed', reason: 'nmap exit 1' },
    ]);
  });

  it('marks every port failed on timeout', async () => {
    const identifier = new ServiceIdentifier({
      config,
      logger: silentLogger,
      runner: runner({ exitCode: null, signal: 'SIGTERM', timedOut: true }),
    });

    const outcomes = await identifier.identify('10.0.0.5', [22]);

    expect(outcomes.get(22)).toEqual({ kind: 'failed', reason: 'timed out after 300s' });
  });

  it('marks every port failed on unparseable output', async () => {
    const identifier = new ServiceIdentifier({
      config,
      logger: silentLogger,
      runner: runner({ stdout: '<nmaprun><host>' }),
    });

    const outcome = (await identifier.identify('10.0.0.5', [22])).get(22);

    expect(outcome?.kind).toBe('failed');
  });

  it('marks every port failed when nmap cannot start', async () => {
    const identifier = new ServiceIdentifier({
      config,
      logger: silentLogger,
      runner: async () => {
        throw new Error('spawn nmap ENOENT');
      },
    });

    const outcomes = await identifier.identify('10.0.0.5', [22]);

    expect(outcomes.get(22)).toEqual({ kind: 'failed', reason: 'spawn nmap ENOENT' });
  });

  it('does not run nmap for an empty batch', async () => {
    const seen: string[][] = [];
    const identifier = new ServiceIdentifier({
      config,
      logger: silentLogger,
      runner: runner({}, seen),
    });

    expect((await identifier.identify('10.0.0.5', [])).size).toBe(0);
    expect(seen).toEqual([]);
  });
});

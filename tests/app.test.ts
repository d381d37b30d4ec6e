import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createApp } from '../src/app.js';
import { PortwatchConfigSchema } from '../src/config/schema.js';
import type { ProcessRunner } from '../src/scanner/process-runner.js';
import { MemoryHistoryBackend, recordingLogger } from './helpers/fakes.js';

const MASSCAN_JSON = `[
{   "ip": "192.168.1.10",   "timestamp": "1700000000", "ports": [ {"port": 22, "proto": "tcp", "status": "open", "reason": "syn-ack", "ttl": 64} ] }
]
`;

const NMAP_XML = `<?xml version="1.0"?>
<nmaprun>
  <host>
    <address addr="192.168.1.10" addrtype="ipv4"/>
    <ports>
      <port protocol="tcp" portid="22">
        <state state="open"/>
        <service name="ssh" product="OpenSSH" version="9.6"/>
      </port>
    </ports>
  </host>
</nmaprun>`;

describe('createApp', () => {
  it('wires scanner, identifier and history into one run', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'portwatch-app-'));
    try {
      const config = PortwatchConfigSchema.parse({
        targets: [{ name: 'home', target: '192.168.1.0/24', ports: '22' }],
        masscan: { output_dir: dir },
        telegram: {},
        schedule: {},
      });
      const commands: string[] = [];
      const runner: ProcessRunner = async (command, args) => {
        commands.push(command);
        if (command === 'masscan') {
          fs.writeFileSync(args[args.indexOf('-oJ') + 1] ?? '', MASSCAN_JSON);
          return { exitCode: 0, signal: null, stdout: '', stderr: '', timedOut: false };
        }
        return { exitCode: 0, signal: null, stdout: NMAP_XML, stderr: '', timedOut: false };
      };
      const backend = new MemoryHistoryBackend();
      const app = createApp(config, recordingLogger().logger, { runner, backend });

      const results = await app.orchestrator.runOnce();
      app.close();

      expect(commands).toEqual(['masscan', 'nmap']);
      expect(results).toHaveLength(1);
      expect(results[0]?.reports).toEqual([
        {
          address: '192.168.1.10',
          newPorts: [22],
          changedServices: [],
          services: { '22': 'ssh OpenSSH 9.6' },
          allPorts: [22],
        },
      ]);
      expect(backend.stored['192.168.1.10']?.services).toEqual({ '22': 'ssh OpenSSH 9.6' });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

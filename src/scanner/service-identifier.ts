/**
 * portwatch — Service Identifier
 *
 * One nmap -sV invocation per address with the whole port batch. Failures
 * are reported per port as `failed` outcomes instead of being thrown.
 */

import type { NmapConfig } from '../config/schema.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../logging/logger.js';
import { parseNmapServices } from '../parser/nmap-parser.js';
import type { ProbeOutcome, ServiceProbe } from '../types/engine.js';
import type { ProcessRunner } from './process-runner.js';
import { runProcess } from './process-runner.js';

export interface ServiceIdentifierOptions {
  config: NmapConfig;
  logger: Logger;
  runner?: ProcessRunner;
}

/** Every port gets the same failure reason. */
export function failAll(ports: number[], reason: string): Map<number, ProbeOutcome> {
  return new Map(
    ports.map((port): [number, ProbeOutcome] => [port, { kind: 'failed', reason }]),
  );
}

export class ServiceIdentifier implements ServiceProbe {
  private readonly config: NmapConfig;
  private readonly logger: Logger;
  private readonly runner: ProcessRunner;

  constructor(options: ServiceIdentifierOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.runner = options.runner ?? runProcess;
  }

  buildArgs(address: string, ports: number[]): string[] {
    return [...this.config.arguments, '-p', ports.join(','), '-oX', '-', address];
  }

  async identify(address: string, ports: number[]): Promise<Map<number, ProbeOutcome>> {
    if (ports.length === 0) {
      return new Map();
    }

    const args = this.buildArgs(address, ports);
    this.logger.info(`nmap ${address} ports=${ports.join(',')}`);

    try {
      const result = await this.runner(this.config.binary, args, {
        timeoutMs: this.config.timeout_seconds * 1000,
      });
      if (result.timedOut) {
        return this.failed(address, ports, `timed out after ${this.config.timeout_seconds}s`);
      }
      if (result.exitCode !== 0) {
        const code = result.exitCode ?? `signal ${result.signal ?? 'unknown'}`;
        return this.failed(address, ports, `nmap exit ${code}`);
      }

      const found = parseNmapServices(result.stdout, address);
      const outcomes = new Map<number, ProbeOutcome>();
      for (const port of ports) {
        outcomes.set(port, found.get(port) ?? { kind: 'closed', state: 'no data' });
      }
      return outcomes;
    } catch (err) {
      return this.failed(address, ports, errorMessage(err));
    }
  }

  private failed(address: string, ports: number[], reason: string): Map<number, ProbeOutcome> {
    this.logger.error(`service identification failed for ${address}: ${reason}`);
    return failAll(ports, reason);
  }
}

/**
 * portwatch — Scan Executor
 *
 * Runs masscan for one target into a per-invocation output file and turns
 * the file into ScanRecords. Every failure degrades to an empty result.
 */

import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type { MasscanConfig } from '../config/schema.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../logging/logger.js';
import { parseMasscanOutput } from '../parser/masscan-parser.js';
import type { ScanRecord } from '../types/entities.js';
import type { PortScanner } from '../types/engine.js';
import type { ProcessRunner } from './process-runner.js';
import { runProcess } from './process-runner.js';

export interface MasscanExecutorOptions {
  config: MasscanConfig;
  logger: Logger;
  runner?: ProcessRunner;
  now?: () => Date;
}

export class MasscanExecutor implements PortScanner {
  private readonly config: MasscanConfig;
  private readonly logger: Logger;
  private readonly runner: ProcessRunner;
  private readonly now: () => Date;

  constructor(options: MasscanExecutorOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.runner = options.runner ?? runProcess;
    this.now = options.now ?? (() => new Date());
  }

  /** Unique per call, so two targets in one process never share a file. */
  outputPath(): string {
    const stamp = this.now().toISOString().replace(/[:.]/g, '-');
    const suffix = crypto.randomBytes(4).toString('hex');
    return path.join(this.config.output_dir, `masscan-${stamp}-${suffix}.json`);
  }

  buildArgs(target: string, ports: string, outputFile: string): string[] {
    return [
      target,
      `-p${ports}`,
      '--rate',
      String(this.config.rate),
      '--open-only',
      '--wait',
      '0',
      '-oJ',
      outputFile,
    ];
  }

  async scan(target: string, ports: string): Promise<ScanRecord[]> {
    const outputFile = this.outputPath();
    try {
      return await this.runAndParse(target, ports, outputFile);
    } finally {
      this.cleanup(outputFile);
    }
  }

  private async runAndParse(
    target: string,
    ports: string,
    outputFile: string,
  ): Promise<ScanRecord[]> {
    const args = this.buildArgs(target, ports, outputFile);
    this.logger.info(`masscan ${target} ports=${ports} rate=${this.config.rate}`);

    let result;
    try {
      result = await this.runner(this.config.binary, args, {
        timeoutMs: this.config.timeout_seconds * 1000,
      });
    } catch (err) {
      this.logger.error(`masscan could not be started for ${target}`, err);
      return [];
    }

    if (result.timedOut) {
      this.logger.error(
        `masscan timed out after ${this.config.timeout_seconds}s for ${target}`,
      );
      return [];
    }
    if (result.exitCode === null || !this.config.accepted_exit_codes.includes(result.exitCode)) {
      const code = result.exitCode ?? `signal ${result.signal ?? 'unknown'}`;
      this.logger.error(
        `masscan failed for ${target} (exit ${code}): ${result.stderr.trim().slice(0, 500)}`,
      );
      return [];
    }
    if (result.exitCode !== 0) {
      this.logger.warn(`masscan finished with exit ${result.exitCode} for ${target}; some hosts unreachable`);
    }

    let content: string;
    try {
      content = fs.readFileSync(outputFile, 'utf-8');
    } catch (err) {
      // masscan writes no file when nothing answered
      this.logger.warn(`masscan output missing for ${target}: ${errorMessage(err)}`);
      return [];
    }

    const parsed = parseMasscanOutput(content, this.logger);
    if (parsed.skipped > 0) {
      this.logger.debug(`masscan output for ${target}: ${parsed.skipped} lines skipped`);
    }
    this.logger.info(`masscan found ${parsed.records.length} open ports on ${target}`);
    return parsed.records;
  }

  private cleanup(outputFile: string): void {
    try {
      fs.rmSync(outputFile, { force: true });
    } catch (err) {
      this.logger.warn(`could not remove ${outputFile}: ${errorMessage(err)}`);
    }
  }
}

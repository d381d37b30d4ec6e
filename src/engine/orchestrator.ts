/**
 * portwatch — Orchestrator
 *
 * Drives runs over every configured target, strictly one after another:
 * scan → change detection → notification. A failing target is logged and
 * skipped; it never ends the run.
 *
 * Scheduled mode loops until its signal is aborted. Aborting wakes the
 * sleep between cycles and stops before the next target; a target already
 * being scanned runs to completion.
 *
 * Every runTarget call, whichever entry point it comes from, goes through
 * one queue, so at most one scan is in flight per orchestrator.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { ChangeReport, TargetConfig } from '../types/entities.js';
import type { PortScanner, RunMode, ScheduleStats, TargetRunResult } from '../types/engine.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../logging/logger.js';
import type { Notifications } from '../notify/notifications.js';
import type { ChangeEngine } from './change-engine.js';

/** Resolves after `ms`, or early (without error) once `signal` aborts. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal.aborted) return;
    throw err;
  }
};

const HOUR_MS = 60 * 60 * 1000;

export interface OrchestratorOptions {
  targets: TargetConfig[];
  scanner: PortScanner;
  engine: ChangeEngine;
  notifications: Notifications;
  logger: Logger;
  intervalHours: number;
  sleep?: Sleep;
  now?: () => Date;
}

function countPorts(results: TargetRunResult[]): number {
  return results.reduce(
    (sum, result) => sum + result.reports.reduce((n, r) => n + r.allPorts.length, 0),
    0,
  );
}

function hasChanges(report: ChangeReport): boolean {
  return report.newPorts.length > 0 || report.changedServices.length > 0;
}

export class Orchestrator {
  private readonly targets: TargetConfig[];
  private readonly scanner: PortScanner;
  private readonly engine: ChangeEngine;
  private readonly notifications: Notifications;
  private readonly logger: Logger;
  private readonly intervalHours: number;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  /** Tail of the target queue; never rejects. */
  private lane: Promise<unknown> = Promise.resolve();

  constructor(options: OrchestratorOptions) {
    this.targets = options.targets;
    this.scanner = options.scanner;
    this.engine = options.engine;
    this.notifications = options.notifications;
    this.logger = options.logger;
    this.intervalHours = options.intervalHours;
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? (() => new Date());
  }

  findTarget(name: string): TargetConfig | undefined {
    return this.targets.find((t) => t.name === name);
  }

  /** One pass over every target. */
  async runAllScans(mode: RunMode, signal?: AbortSignal): Promise<TargetRunResult[]> {
    const results: TargetRunResult[] = [];
    for (const target of this.targets) {
      if (signal?.aborted) {
        this.logger.info(`stop requested; skipping remaining targets from ${target.name}`);
        break;
      }
      results.push(await this.runTarget(target, mode, signal));
    }

    if (mode === 'once') {
      await this.notifications.notifyRunComplete(results);
    }
    return results;
  }

  runOnce(signal?: AbortSignal): Promise<TargetRunResult[]> {
    return this.runAllScans('once', signal);
  }

  /**
   * Scan, diff and notify for one target; errors end up in `error`.
   * Waits for any target already running.
   */
  runTarget(target: TargetConfig, mode: RunMode, signal?: AbortSignal): Promise<TargetRunResult> {
    const run = this.lane.then(() => this.scanTarget(target, mode, signal));
    this.lane = run.catch(() => undefined);
    return run;
  }

  private async scanTarget(
    target: TargetConfig,
    mode: RunMode,
    signal: AbortSignal | undefined,
  ): Promise<TargetRunResult> {
    const log = this.logger.child(target.name);
    let reports: ChangeReport[] = [];
    try {
      if (mode === 'once') {
        await this.notifications.notifyScanStarted(target, { signal });
      }

      log.info(`scanning ${target.target} ports ${target.ports}`);
      const records = await this.scanner.scan(target.target, target.ports);
      reports = await this.engine.process(records);

      await this.notify(target, mode, reports, signal);
      log.info(`done: ${reports.length} addresses, ${reports.filter(hasChanges).length} with changes`);
      return { target, reports };
    } catch (err) {
      log.error(`target ${target.name} failed`, err);
      return { target, reports, error: errorMessage(err) };
    }
  }

  private async notify(
    target: TargetConfig,
    mode: RunMode,
    reports: ChangeReport[],
    signal: AbortSignal | undefined,
  ): Promise<void> {
    if (mode === 'once') {
      await this.notifications.notifyTargetSummary(target, reports, { signal });
      return;
    }
    for (const report of reports) {
      await this.notifications.notifyNewPorts(target, report, { signal });
      await this.notifications.notifyChangedServices(target, report, { signal });
    }
  }

  /**
   * Runs cycles until `signal` aborts, then sends the stop notification and
   * returns the cumulative counters.
   */
  async runSchedule(signal: AbortSignal): Promise<ScheduleStats> {
    const stats: ScheduleStats = {
      cycles: 0,
      portChecks: 0,
      startedAt: this.now().toISOString(),
    };

    this.logger.info(
      `schedule started: ${this.targets.length} targets every ${this.intervalHours}h`,
    );
    await this.notifications.notifyScheduleStarted(this.targets, this.intervalHours);

    while (!signal.aborted) {
      const results = await this.runAllScans('scheduled', signal);
      stats.cycles += 1;
      stats.portChecks += countPorts(results);
      this.logger.info(
        `cycle ${stats.cycles} finished: ${countPorts(results)} open ports across ${results.length} targets`,
      );

      if (signal.aborted) break;
      this.logger.info(`next cycle in ${this.intervalHours}h`);
      await this.sleep(this.intervalHours * HOUR_MS, signal);
    }

    stats.stoppedAt = this.now().toISOString();
    this.logger.info(`schedule stopped after ${stats.cycles} cycles`);
    await this.notifications.notifyScheduleStopped(stats);
    return stats;
  }
}

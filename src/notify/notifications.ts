/**
 * portwatch — Notifications
 *
 * Formats an event and hands it to the sender. Nothing here touches scan
 * or history state; a failed send is only reported back as `false`.
 */

import type { ChangeReport, TargetConfig } from '../types/entities.js';
import type { ScheduleStats, TargetRunResult } from '../types/engine.js';
import {
  formatChangedServices,
  formatNewPorts,
  formatRunComplete,
  formatScanStarted,
  formatScheduleStarted,
  formatScheduleStopped,
  formatTargetSummary,
} from './messages.js';
import type { MessageSender, SendOptions } from './telegram-notifier.js';

export class Notifications {
  private readonly sender: MessageSender;
  private readonly now: () => Date;

  constructor(sender: MessageSender, now: () => Date = () => new Date()) {
    this.sender = sender;
    this.now = now;
  }

  send(message: string, options?: SendOptions): Promise<boolean> {
    return this.sender.send(message, options);
  }

  notifyScanStarted(target: TargetConfig, options?: SendOptions): Promise<boolean> {
    return this.send(formatScanStarted(target, this.now()), options);
  }

  notifyTargetSummary(
    target: TargetConfig,
    reports: ChangeReport[],
    options?: SendOptions,
  ): Promise<boolean> {
    return this.send(formatTargetSummary(target, reports, this.now()), options);
  }

  /** Sends nothing when the report has no new ports. */
  async notifyNewPorts(
    target: TargetConfig,
    report: ChangeReport,
    options?: SendOptions,
  ): Promise<boolean> {
    if (report.newPorts.length === 0) return false;
    return this.send(formatNewPorts(target, report, this.now()), options);
  }

  /** Sends nothing when no banner changed. */
  async notifyChangedServices(
    target: TargetConfig,
    report: ChangeReport,
    options?: SendOptions,
  ): Promise<boolean> {
    if (report.changedServices.length === 0) return false;
    return this.send(formatChangedServices(target, report, this.now()), options);
  }

  notifyRunComplete(results: TargetRunResult[], options?: SendOptions): Promise<boolean> {
    return this.send(formatRunComplete(results, this.now()), options);
  }

  notifyScheduleStarted(
    targets: TargetConfig[],
    intervalHours: number,
    options?: SendOptions,
  ): Promise<boolean> {
    return this.send(formatScheduleStarted(targets, intervalHours, this.now()), options);
  }

  notifyScheduleStopped(stats: ScheduleStats, options?: SendOptions): Promise<boolean> {
    return this.send(formatScheduleStopped(stats, this.now()), options);
  }
}

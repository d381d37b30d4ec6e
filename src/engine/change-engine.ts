/**
 * portwatch — Change Engine
 *
 * Turns one run's scan records into one ChangeReport per address and
 * advances the history as a side effect.
 *
 * Only banners from ports the probe saw open are compared and stored.
 * Placeholder text for closed or failed probes appears in the report but
 * never reaches history, so a probe outage does not show up as a banner
 * change on the next run.
 */

import type { ChangeReport, ScanRecord } from '../types/entities.js';
import type { ProbeOutcome, ServiceProbe } from '../types/engine.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../logging/logger.js';
import { failAll } from '../scanner/service-identifier.js';
import type { HistoryStore } from './history-store.js';
import { sortedUnique } from './history-store.js';

export interface ChangeEngineOptions {
  history: HistoryStore;
  probe: ServiceProbe;
  logger: Logger;
}

/** Distinct ports per address, in order of first appearance. */
export function groupByAddress(records: ScanRecord[]): Map<string, number[]> {
  const groups = new Map<string, number[]>();
  for (const record of records) {
    const ports = groups.get(record.address);
    if (ports === undefined) {
      groups.set(record.address, [record.port]);
    } else if (!ports.includes(record.port)) {
      ports.push(record.port);
    }
  }
  return groups;
}

/** Text shown for a port in reports. */
export function describeOutcome(outcome: ProbeOutcome): string {
  switch (outcome.kind) {
    case 'open':
      return outcome.banner;
    case 'closed':
      return `closed (${outcome.state})`;
    case 'failed':
      return `probe failed: ${outcome.reason}`;
    default: {
      const _exhaustive: never = outcome;
      throw new Error(`Unknown probe outcome: ${String(_exhaustive)}`);
    }
  }
}

export class ChangeEngine {
  private readonly history: HistoryStore;
  private readonly probe: ServiceProbe;
  private readonly logger: Logger;

  constructor(options: ChangeEngineOptions) {
    this.history = options.history;
    this.probe = options.probe;
    this.logger = options.logger;
  }

  /** Addresses are processed sequentially in discovery order. */
  async process(records: ScanRecord[]): Promise<ChangeReport[]> {
    const reports: ChangeReport[] = [];
    for (const [address, ports] of groupByAddress(records)) {
      try {
        reports.push(await this.processAddress(address, ports));
      } catch (err) {
        this.logger.error(`change detection failed for ${address}`, err);
      }
    }
    return reports;
  }

  async processAddress(address: string, ports: number[]): Promise<ChangeReport> {
    const allPorts = sortedUnique(ports);
    const outcomes = await this.identify(address, allPorts);

    const services: Record<string, string> = {};
    const openBanners: Record<string, string> = {};
    for (const port of allPorts) {
      const outcome: ProbeOutcome = outcomes.get(port) ?? { kind: 'closed', state: 'no data' };
      services[String(port)] = describeOutcome(outcome);
      if (outcome.kind === 'open') {
        openBanners[String(port)] = outcome.banner;
      }
    }

    // both diffs read the pre-update state
    const newPorts = this.history.findNewPorts(address, allPorts);
    const changedServices = this.history.findChangedServices(address, openBanners);

    this.history.update(address, allPorts, openBanners);

    if (newPorts.length > 0 || changedServices.length > 0) {
      this.logger.info(
        `${address}: ${newPorts.length} new ports, ${changedServices.length} changed services`,
      );
    }

    return { address, newPorts, changedServices, services, allPorts };
  }

  /** One probe call per address; a thrown probe counts as failed for every port. */
  private async identify(address: string, ports: number[]): Promise<Map<number, ProbeOutcome>> {
    try {
      return await this.probe.identify(address, ports);
    } catch (err) {
      this.logger.error(`service probe threw for ${address}`, err);
      return failAll(ports, errorMessage(err));
    }
  }
}

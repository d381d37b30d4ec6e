/**
 * portwatch - Engine type definitions
 */

import type { ChangeReport, ScanRecord, TargetConfig } from './entities.js';

// ============================================================
// probe outcomes
// ============================================================

/** Result of identifying one port. */
export type ProbeOutcome =
  | { kind: 'open'; banner: string }
  | { kind: 'closed'; state: string }
  | { kind: 'failed'; reason: string };

/** Banner-relevant attributes of an identified service. */
export interface ServiceFingerprint {
  name?: string;
  product?: string;
  version?: string;
  extrainfo?: string;
}

// ============================================================
// collaborators
// ============================================================

export interface PortScanner {
  scan(target: string, ports: string): Promise<ScanRecord[]>;
}

export interface ServiceProbe {
  identify(address: string, ports: number[]): Promise<Map<number, ProbeOutcome>>;
}

// ============================================================
// runs
// ============================================================

/** `once` always reports a summary; `scheduled` reports only changes. */
export type RunMode = 'once' | 'scheduled';

export interface TargetRunResult {
  target: TargetConfig;
  reports: ChangeReport[];
  error?: string;
}

export interface ScheduleStats {
  cycles: number;
  portChecks: number;
  startedAt: string;
  stoppedAt?: string;
}

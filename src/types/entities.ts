/**
 * portwatch - Entity type definitions
 *
 * Conventions:
 *   port           -> number (0..65535)
 *   port map keys  -> string (decimal port number)
 *   timestamps     -> string (ISO 8601)
 */

// ============================================================
// scan records (ephemeral)
// ============================================================

export const PROTOCOLS = ['tcp', 'udp'] as const;
export type Protocol = (typeof PROTOCOLS)[number];

/** One open port reported by the sweeper. Never persisted. */
export interface ScanRecord {
  address: string;
  port: number;
  protocol: Protocol;
  status: string;
}

// ============================================================
// history (persisted)
// ============================================================

/**
 * Persisted state of a single address.
 *
 * `ports` is replaced on every update; `services` is merged, so a banner
 * for a port that has since closed stays as its last known banner.
 */
export interface HostHistory {
  firstSeen: string;
  lastSeen: string;
  ports: number[];
  services: Record<string, string>;
}

/** Whole history keyed by address. */
export type HistoryDocument = Record<string, HostHistory>;

// ============================================================
// change reports (ephemeral)
// ============================================================

/** A banner that differs from the one stored for the same port. */
export interface ServiceChange {
  port: number;
  previous: string;
  current: string;
}

/** Delta for one address in one run. */
export interface ChangeReport {
  address: string;
  newPorts: number[];
  changedServices: ServiceChange[];
  services: Record<string, string>;
  allPorts: number[];
}

// ============================================================
// targets
// ============================================================

export interface TargetConfig {
  name: string;
  /** Single address or CIDR range. */
  target: string;
  /** masscan port spec, e.g. "22,80,8000-8100,U:53". */
  ports: string;
}

/**
 * portwatch — Startup errors
 *
 * Both are fatal: the CLI prints them and exits with status 1.
 */

/** Missing, unreadable or invalid configuration document. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** An external tool binary could not be found on PATH. */
export class ToolNotFoundError extends Error {
  readonly binary: string;

  constructor(binary: string) {
    super(`Required binary not found on PATH: ${binary}`);
    this.name = 'ToolNotFoundError';
    this.binary = binary;
  }
}

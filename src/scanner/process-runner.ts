/**
 * portwatch — Subprocess runner
 *
 * Runs an external tool with a hard time limit and collects its output.
 * The executor and identifier take a ProcessRunner so tests can substitute
 * a fake without spawning anything.
 *
 * Children run in their own process group, so a terminal Ctrl-C reaches
 * only portwatch; the CLI decides when to stop them via
 * terminateActiveProcesses.
 */

import type { ChildProcess } from 'node:child_process';
import { spawn } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import { ToolNotFoundError } from '../errors.js';

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  timeoutMs: number;
}

/** Rejects only when the process cannot be started. */
export type ProcessRunner = (
  command: string,
  args: string[],
  options: RunOptions,
) => Promise<ProcessResult>;

/** Grace period between SIGTERM and SIGKILL on timeout. */
const KILL_GRACE_MS = 5_000;

const active = new Set<ChildProcess>();

/** Sends `signal` to every child still running; returns how many there were. */
export function terminateActiveProcesses(signal: NodeJS.Signals = 'SIGTERM'): number {
  for (const child of active) {
    child.kill(signal);
  }
  return active.size;
}

export const runProcess: ProcessRunner = (command, args, options) =>
  new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], detached: true });
    active.add(child);

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
    }, options.timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.once('error', (err) => {
      active.delete(child);
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      reject(err);
    });

    child.once('close', (exitCode, signal) => {
      active.delete(child);
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      resolve({
        exitCode,
        signal,
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
        timedOut,
      });
    });
  });

/** Returns the resolved path of `binary`, searching PATH for bare names. */
export function findBinary(
  binary: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const isExecutable = (candidate: string): boolean => {
    try {
      fs.accessSync(candidate, fs.constants.X_OK);
      return fs.statSync(candidate).isFile();
    } catch {
      return false;
    }
  };

  if (binary.includes(path.sep)) {
    return isExecutable(binary) ? binary : undefined;
  }
  const dirs = (env['PATH'] ?? '').split(path.delimiter).filter((d) => d !== '');
  for (const dir of dirs) {
    const candidate = path.join(dir, binary);
    if (isExecutable(candidate)) return candidate;
  }
  return undefined;
}

/**
 * @throws ToolNotFoundError when the binary is not on PATH
 */
export function assertBinaryAvailable(binary: string, env: NodeJS.ProcessEnv = process.env): void {
  if (findBinary(binary, env) === undefined) {
    throw new ToolNotFoundError(binary);
  }
}

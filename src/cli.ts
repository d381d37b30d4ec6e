/**
 * portwatch — CLI
 *
 * scan   one pass over every target, summary notifications, exit
 * watch  scheduled loop until SIGINT/SIGTERM
 * serve  MCP server on stdio
 *
 * Without a command, `schedule.enabled` picks between watch and scan.
 */

import { Command } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { App } from './app.js';
import { createApp } from './app.js';
import type { PortwatchConfig } from './config/schema.js';
import { loadConfig, resolveConfigPath } from './config/loader.js';
import { ConfigError, ToolNotFoundError } from './errors.js';
import type { Logger } from './logging/logger.js';
import { createLogger } from './logging/logger.js';
import { createMcpServer, SERVER_VERSION } from './mcp/server.js';
import {
  assertBinaryAvailable,
  findBinary,
  terminateActiveProcesses,
} from './scanner/process-runner.js';

interface GlobalOptions {
  config?: string;
}

interface Session {
  config: PortwatchConfig;
  logger: Logger;
  app: App;
}

/** Loads config and verifies the external tools before anything runs. */
function startSession(options: GlobalOptions): Session {
  const config = loadConfig(resolveConfigPath(options.config));
  const logger = createLogger({ level: config.logging.level, file: config.logging.file });

  assertBinaryAvailable(config.masscan.binary);
  if (findBinary(config.nmap.binary) === undefined) {
    logger.warn(`${config.nmap.binary} not found on PATH; service identification will fail`);
  }

  return { config, logger, app: createApp(config, logger) };
}

/**
 * First SIGINT/SIGTERM aborts `controller` and lets the current target
 * finish; a second one terminates the scan subprocesses still running.
 */
function onStopSignals(logger: Logger, controller: AbortController): () => void {
  const stop = (signal: NodeJS.Signals): void => {
    if (!controller.signal.aborted) {
      logger.info(`${signal} received; stopping after the current target (repeat to abort it)`);
      controller.abort();
      return;
    }
    const killed = terminateActiveProcesses();
    logger.warn(`${signal} received again; terminated ${killed} running scan processes`);
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);
  return () => {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  };
}

async function runScan(options: GlobalOptions): Promise<void> {
  const { logger, app } = startSession(options);
  const controller = new AbortController();
  const release = onStopSignals(logger, controller);
  try {
    const results = await app.orchestrator.runOnce(controller.signal);
    const failed = results.filter((r) => r.error !== undefined).length;
    logger.info(`one-shot run finished: ${results.length} targets, ${failed} failed`);
  } finally {
    release();
    app.close();
  }
}

async function runWatch(options: GlobalOptions): Promise<void> {
  const { logger, app } = startSession(options);
  const controller = new AbortController();
  const release = onStopSignals(logger, controller);
  try {
    await app.orchestrator.runSchedule(controller.signal);
  } finally {
    release();
    app.close();
  }
}

async function runServe(options: GlobalOptions): Promise<void> {
  const { logger, app } = startSession(options);
  const server = createMcpServer({ history: app.history, orchestrator: app.orchestrator });
  const transport = new StdioServerTransport();

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info(`${signal} received; shutting down MCP server`);
    terminateActiveProcesses();
    try {
      await server.close();
    } catch (err) {
      logger.error('MCP server close failed', err);
    } finally {
      app.close();
    }
    process.exit(0);
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  await server.connect(transport);
  logger.info('MCP server listening on stdio');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('portwatch')
    .description('Watch targets for newly opened ports and changed services')
    .version(SERVER_VERSION)
    .option('-c, --config <path>', 'configuration file (default: $PORTWATCH_CONFIG or ./config.json)');

  program
    .command('scan')
    .description('Scan every target once and send a summary per target')
    .action(async () => runScan(program.opts<GlobalOptions>()));

  program
    .command('watch')
    .description('Scan on the configured interval, notifying only on changes')
    .action(async () => runWatch(program.opts<GlobalOptions>()));

  program
    .command('serve')
    .description('Expose history and on-demand scans as an MCP server on stdio')
    .action(async () => runServe(program.opts<GlobalOptions>()));

  program.action(async () => {
    const options = program.opts<GlobalOptions>();
    const config = loadConfig(resolveConfigPath(options.config));
    if (config.schedule.enabled) {
      await runWatch(options);
    } else {
      await runScan(options);
    }
  });

  return program;
}

/** Exit status: 0 on success, 1 on fatal startup errors. */
export async function main(argv: string[]): Promise<number> {
  try {
    await createProgram().parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof ConfigError || err instanceof ToolNotFoundError) {
      process.stderr.write(`portwatch: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}

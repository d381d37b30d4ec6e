/**
 * portwatch — Application wiring
 *
 * Builds every component from one configuration value and one logger.
 */

import type { PortwatchConfig } from './config/schema.js';
import { SqliteHistoryBackend } from './db/sqlite-history-backend.js';
import { ChangeEngine } from './engine/change-engine.js';
import type { HistoryBackend } from './engine/history-store.js';
import { HistoryStore } from './engine/history-store.js';
import { JsonHistoryBackend } from './engine/json-history-backend.js';
import { Orchestrator } from './engine/orchestrator.js';
import type { Logger } from './logging/logger.js';
import { Notifications } from './notify/notifications.js';
import { TelegramNotifier } from './notify/telegram-notifier.js';
import { MasscanExecutor } from './scanner/masscan-executor.js';
import type { ProcessRunner } from './scanner/process-runner.js';
import { ServiceIdentifier } from './scanner/service-identifier.js';

export interface App {
  history: HistoryStore;
  orchestrator: Orchestrator;
  close(): void;
}

export interface AppOverrides {
  runner?: ProcessRunner;
  backend?: HistoryBackend;
}

function createBackend(config: PortwatchConfig, logger: Logger): HistoryBackend {
  switch (config.history.backend) {
    case 'json':
      return new JsonHistoryBackend(config.history.path, logger);
    case 'sqlite':
      return new SqliteHistoryBackend(config.history.path, logger);
    default: {
      const _exhaustive: never = config.history.backend;
      throw new Error(`Unknown history backend: ${String(_exhaustive)}`);
    }
  }
}

export function createApp(
  config: PortwatchConfig,
  logger: Logger,
  overrides: AppOverrides = {},
): App {
  const backend = overrides.backend ?? createBackend(config, logger.child('history'));
  const history = HistoryStore.open(backend, logger.child('history'));

  const scanner = new MasscanExecutor({
    config: config.masscan,
    logger: logger.child('masscan'),
    runner: overrides.runner,
  });
  const probe = new ServiceIdentifier({
    config: config.nmap,
    logger: logger.child('nmap'),
    runner: overrides.runner,
  });
  const engine = new ChangeEngine({ history, probe, logger: logger.child('engine') });

  const notifier = new TelegramNotifier({
    config: config.telegram,
    logger: logger.child('telegram'),
  });

  const orchestrator = new Orchestrator({
    targets: config.targets,
    scanner,
    engine,
    notifications: new Notifications(notifier),
    logger: logger.child('orchestrator'),
    intervalHours: config.schedule.interval_hours,
  });

  return {
    history,
    orchestrator,
    close: () => {
      if (backend instanceof SqliteHistoryBackend) backend.close();
    },
  };
}

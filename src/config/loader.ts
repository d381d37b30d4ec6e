import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../errors.js';
import { errorMessage } from '../logging/logger.js';
import { PortwatchConfigSchema, type PortwatchConfig } from './schema.js';

export const DEFAULT_CONFIG_PATH = 'config.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** PORTWATCH_CONFIG, then config.json in the working directory. */
export function resolveConfigPath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return path.resolve(explicit ?? env['PORTWATCH_CONFIG'] ?? DEFAULT_CONFIG_PATH);
}

/** Credentials may come from the environment instead of the document. */
function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  const token = env['PORTWATCH_TELEGRAM_TOKEN'];
  const chatId = env['PORTWATCH_TELEGRAM_CHAT_ID'];
  if (token === undefined && chatId === undefined) return;

  const telegram = isRecord(raw['telegram']) ? { ...raw['telegram'] } : {};
  if (token !== undefined) telegram['bot_token'] = token;
  if (chatId !== undefined) telegram['chat_id'] = chatId;
  raw['telegram'] = telegram;
}

/**
 * Parses and validates a configuration document.
 *
 * @throws ConfigError on malformed JSON or schema violations
 */
export function parseConfig(
  content: string,
  source: string,
  env: NodeJS.ProcessEnv = process.env,
): PortwatchConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Failed to parse config JSON: ${source} (${errorMessage(err)})`);
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Config must be a JSON object: ${source}`);
  }

  applyEnvOverrides(raw, env);

  const parsed = PortwatchConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config ${source}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Reads the configuration document from disk.
 *
 * @throws ConfigError when the file is missing or invalid
 */
export function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): PortwatchConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Config file not readable: ${configPath} (${errorMessage(err)})`);
  }
  return parseConfig(content, configPath, env);
}

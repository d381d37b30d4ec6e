import os from 'node:os';
import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';

const MAX_PORT = 65535;
/** One comma-separated item: `80`, `8000-8100`, `U:53`, `T:1-1024`. */
const PORT_ITEM = /^(?:[TU]:)?(\d{1,5})(?:-(\d{1,5}))?$/;

/** masscan `-p` syntax, with every bound in 0..65535 and ranges ascending. */
export function isPortSpec(spec: string): boolean {
  return spec.split(',').every((item) => {
    const match = PORT_ITEM.exec(item);
    if (!match) return false;
    const low = Number(match[1]);
    const high = match[2] === undefined ? low : Number(match[2]);
    return high <= MAX_PORT && low <= high;
  });
}

export const TargetSchema = z.object({
  name: z.string().min(1),
  target: z.string().min(1),
  ports: z
    .string()
    .refine(isPortSpec, 'expected a port spec like "22,80,8000-8100,U:53" with ports up to 65535'),
});

export const MasscanConfigSchema = z.object({
  binary: z.string().min(1).default('masscan'),
  rate: z.number().int().positive().default(1000),
  timeout_seconds: z.number().positive().default(600),
  /** 0 = success, 1 = finished with some hosts unreachable. */
  accepted_exit_codes: z.array(z.number().int()).nonempty().default([0, 1]),
  output_dir: z.string().min(1).default(os.tmpdir()),
});

export const NmapConfigSchema = z.object({
  binary: z.string().min(1).default('nmap'),
  arguments: z.array(z.string()).default(['-sV', '-T4', '--open']),
  timeout_seconds: z.number().positive().default(300),
});

export const TelegramConfigSchema = z.object({
  bot_token: z.string().default(''),
  chat_id: z.union([z.string(), z.number()]).transform(String).default(''),
  timeout_seconds: z.number().positive().default(15),
  api_base: z.string().url().default('https://api.telegram.org'),
});

export const ScheduleConfigSchema = z.object({
  enabled: z.boolean().default(false),
  interval_hours: z.number().positive().default(6),
});

export const HistoryConfigSchema = z.object({
  backend: z.enum(['json', 'sqlite']).default('json'),
  path: z.string().min(1).default('scan_history.json'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  file: z.string().optional(),
});

export const PortwatchConfigSchema = z.object({
  targets: z.array(TargetSchema).min(1, 'targets must not be empty'),
  masscan: MasscanConfigSchema,
  nmap: NmapConfigSchema.default({}),
  telegram: TelegramConfigSchema,
  schedule: ScheduleConfigSchema,
  history: HistoryConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type PortwatchConfig = z.infer<typeof PortwatchConfigSchema>;
export type MasscanConfig = z.infer<typeof MasscanConfigSchema>;
export type NmapConfig = z.infer<typeof NmapConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;
export type ScheduleConfig = z.infer<typeof ScheduleConfigSchema>;
export type HistoryConfig = z.infer<typeof HistoryConfigSchema>;

/**
 * portwatch — Telegram transport
 *
 * Primary delivery goes through axios. Only when that call is cancelled is
 * the message posted once more through fetch; every other failure is
 * logged and reported as `false`.
 */

import axios, { isCancel } from 'axios';
import type { TelegramConfig } from '../config/schema.js';
import type { Logger } from '../logging/logger.js';
import { errorMessage } from '../logging/logger.js';

export interface SendOptions {
  /** Aborting cancels the primary call and triggers the fallback. */
  signal?: AbortSignal;
}

export interface MessageSender {
  send(message: string, options?: SendOptions): Promise<boolean>;
}

export interface TelegramPayload {
  chat_id: string;
  text: string;
  parse_mode: 'HTML';
  disable_web_page_preview: boolean;
}

export interface TelegramResponse {
  ok: boolean;
  description?: string;
}

export interface PostOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export type TelegramPost = (
  url: string,
  payload: TelegramPayload,
  options: PostOptions,
) => Promise<TelegramResponse>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toTelegramResponse(data: unknown): TelegramResponse {
  if (!isRecord(data)) {
    return { ok: false, description: 'unexpected response body' };
  }
  const ok = data.ok === true;
  const description = typeof data.description === 'string' ? data.description : undefined;
  return { ok, ...(description !== undefined ? { description } : {}) };
}

export const axiosPost: TelegramPost = async (url, payload, options) => {
  const response = await axios.post<unknown>(url, payload, {
    timeout: options.timeoutMs,
    signal: options.signal,
  });
  return toTelegramResponse(response.data);
};

export const fetchPost: TelegramPost = async (url, payload, options) => {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(options.timeoutMs),
  });
  const data: unknown = await response.json();
  return toTelegramResponse(data);
};

export interface TelegramNotifierOptions {
  config: TelegramConfig;
  logger: Logger;
  primary?: TelegramPost;
  fallback?: TelegramPost;
}

export class TelegramNotifier implements MessageSender {
  private readonly config: TelegramConfig;
  private readonly logger: Logger;
  private readonly primary: TelegramPost;
  private readonly fallback: TelegramPost;

  constructor(options: TelegramNotifierOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.primary = options.primary ?? axiosPost;
    this.fallback = options.fallback ?? fetchPost;
  }

  get endpoint(): string {
    return `${this.config.api_base}/bot${this.config.bot_token}/sendMessage`;
  }

  async send(message: string, options: SendOptions = {}): Promise<boolean> {
    if (!this.config.bot_token || !this.config.chat_id) {
      this.logger.warn('telegram bot_token/chat_id not configured; notification dropped');
      return false;
    }

    const payload: TelegramPayload = {
      chat_id: this.config.chat_id,
      text: message,
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    };
    const timeoutMs = this.config.timeout_seconds * 1000;

    try {
      const response = await this.primary(this.endpoint, payload, {
        timeoutMs,
        signal: options.signal,
      });
      return this.accept(response, 'primary');
    } catch (err) {
      if (!isCancel(err)) {
        this.logger.error('telegram notification failed', err);
        return false;
      }
      this.logger.warn('telegram call cancelled; retrying over fallback transport');
    }

    try {
      const response = await this.fallback(this.endpoint, payload, { timeoutMs });
      return this.accept(response, 'fallback');
    } catch (err) {
      this.logger.error(`telegram fallback failed: ${errorMessage(err)}`);
      return false;
    }
  }

  private accept(response: TelegramResponse, transport: string): boolean {
    if (!response.ok) {
      this.logger.error(
        `telegram rejected message (${transport}): ${response.description ?? 'no description'}`,
      );
      return false;
    }
    this.logger.info(`telegram notification sent (${transport})`);
    return true;
  }
}

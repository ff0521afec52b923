/**
 * Reload Notifier
 *
 * Asks the dashboard to re-read its services file with a single POST.
 * Failures are reported as a value; the watcher keeps running either way.
 */

import ky from 'ky';
import { errorMessage, type Logger } from '@dockwatch/core';

export interface ReloadNotifierConfig {
  url: string;
  timeoutMs: number;
}

export interface ReloadResponse {
  status: number;
  statusText: string;
}

/**
 * Minimal HTTP seam so tests can stand in for the dashboard
 */
export interface ReloadTransport {
  post(url: string): Promise<ReloadResponse>;
}

export type ReloadResult =
  | { ok: true; status: 200 }
  | { ok: false; status?: number; error: string };

/**
 * ky-backed transport: no retries, HTTP errors come back as responses
 */
export function createKyTransport(timeoutMs: number): ReloadTransport {
  const http = ky.create({
    timeout: timeoutMs,
    retry: 0,
    throwHttpErrors: false,
  });

  return {
    async post(url: string): Promise<ReloadResponse> {
      const response = await http.post(url);
      return { status: response.status, statusText: response.statusText };
    },
  };
}

export class ReloadNotifier {
  private logger: Logger;
  private transport: ReloadTransport;

  constructor(
    private config: ReloadNotifierConfig,
    logger: Logger,
    transport?: ReloadTransport
  ) {
    this.logger = logger.child({ component: 'reload-notifier' });
    this.transport = transport ?? createKyTransport(config.timeoutMs);
  }

  async notify(): Promise<ReloadResult> {
    const { url } = this.config;
    this.logger.debug('Requesting dashboard reload', { url });

    let response: ReloadResponse;
    try {
      response = await this.transport.post(url);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error('Dashboard reload request failed', { url, error: message });
      return { ok: false, error: message };
    }

    if (response.status === 200) {
      this.logger.info('Dashboard reload triggered', { url });
      return { ok: true, status: 200 };
    }

    const error = `HTTP ${response.status}: ${response.statusText}`;
    this.logger.warn('Dashboard rejected reload request', { url, status: response.status, error });
    return { ok: false, status: response.status, error };
  }
}

import type { CacheToken, CheckFailure, FetchFailureReason } from '../types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type FetchResult =
  | { status: 'fresh'; payload: string; cacheToken: CacheToken }
  | { status: 'not_modified' }
  | { status: 'failed'; failure: CheckFailure };

export interface PriceSource {
  fetch(priorToken: CacheToken | null): Promise<FetchResult>;
}

export interface PriceFetcherOptions {
  url: string;
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

interface AttemptFailure {
  reason: FetchFailureReason;
  message: string;
}

const USER_AGENT = 'PriceChannelBot/1.0 (Discord Bot)';

const TRANSIENT_REASONS: ReadonlySet<FetchFailureReason> = new Set([
  'timeout',
  'connection_refused',
  'network_error',
  'http_5xx',
  'rate_limited',
]);

export class PriceFetcher implements PriceSource {
  private url: string;
  private timeoutMs: number;
  private maxAttempts: number;
  private retryDelayMs: number;
  private fetchImpl: FetchLike;
  private sleep: (ms: number) => Promise<void>;
  private logger: Logger;

  constructor(options: PriceFetcherOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.retryDelayMs = options.retryDelayMs;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger('Fetcher');
  }

  async fetch(priorToken: CacheToken | null): Promise<FetchResult> {
    let lastFailure: AttemptFailure | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const result = await this.attempt(priorToken);
      if ('status' in result) {
        return result;
      }

      lastFailure = result;
      if (!PriceFetcher.isTransient(result.reason)) {
        this.logger.warn(`Permanent failure, not retrying: ${result.message}`);
        return {
          status: 'failed',
          failure: { kind: 'permanent_request', reason: `${result.reason}: ${result.message}` },
        };
      }

      if (attempt < this.maxAttempts) {
        const delay = this.retryDelayMs * attempt;
        this.logger.warn(`Attempt ${attempt}/${this.maxAttempts} failed (${result.message}), retrying in ${delay}ms`);
        await this.sleep(delay);
      }
    }

    const reason = lastFailure
      ? `${lastFailure.reason}: ${lastFailure.message} (after ${this.maxAttempts} attempts)`
      : 'no attempts made';
    const kind = lastFailure?.reason === 'rate_limited' ? 'rate_limited' : 'transient_network';
    return { status: 'failed', failure: { kind, reason } };
  }

  private async attempt(priorToken: CacheToken | null): Promise<FetchResult | AttemptFailure> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'GET',
        headers: PriceFetcher.buildHeaders(priorToken),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      return PriceFetcher.classifyError(error, this.timeoutMs);
    }

    if (response.status === 304) {
      this.logger.debug('Source not modified (HTTP 304)');
      return { status: 'not_modified' };
    }

    if (!response.ok) {
      return PriceFetcher.classifyStatus(response.status, response.statusText);
    }

    try {
      const payload = await response.text();
      return {
        status: 'fresh',
        payload,
        cacheToken: {
          etag: response.headers.get('etag'),
          lastModified: response.headers.get('last-modified'),
        },
      };
    } catch (error) {
      return PriceFetcher.classifyError(error, this.timeoutMs);
    }
  }

  static buildHeaders(priorToken: CacheToken | null): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': USER_AGENT,
      Accept: 'application/json, text/plain, */*',
      'Cache-Control': 'no-cache',
    };

    if (priorToken?.etag) {
      headers['If-None-Match'] = priorToken.etag;
    }
    if (priorToken?.lastModified) {
      headers['If-Modified-Since'] = priorToken.lastModified;
    }

    return headers;
  }

  static isTransient(reason: FetchFailureReason): boolean {
    return TRANSIENT_REASONS.has(reason);
  }

  static classifyStatus(status: number, statusText: string): AttemptFailure {
    const message = `HTTP ${status}${statusText ? ` ${statusText}` : ''}`;
    if (status === 429) return { reason: 'rate_limited', message };
    if (status >= 500) return { reason: 'http_5xx', message };
    return { reason: 'http_4xx', message };
  }

  static classifyError(error: unknown, timeoutMs: number): AttemptFailure {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return { reason: 'timeout', message: `timed out after ${timeoutMs}ms` };
    }

    const code = PriceFetcher.errorCode(error);
    switch (code) {
      case 'ECONNREFUSED':
        return { reason: 'connection_refused', message: 'connection refused' };
      case 'ENOTFOUND':
      case 'EAI_AGAIN':
        return { reason: 'dns_failure', message: `DNS lookup failed (${code})` };
      case 'UND_ERR_CONNECT_TIMEOUT':
      case 'UND_ERR_HEADERS_TIMEOUT':
      case 'UND_ERR_BODY_TIMEOUT':
      case 'ETIMEDOUT':
        return { reason: 'timeout', message: `timed out (${code})` };
    }

    const message = error instanceof Error ? error.message : String(error);
    return { reason: 'network_error', message: code ? `${message} (${code})` : message };
  }

  // undici wraps socket errors as `TypeError('fetch failed', { cause })`
  private static errorCode(error: unknown): string | null {
    let current: unknown = error;
    for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
      if ('code' in current && typeof current.code === 'string') {
        return current.code;
      }
      current = current.cause;
    }
    return null;
  }
}

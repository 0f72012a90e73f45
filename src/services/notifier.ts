import type { NotificationCall, NotificationFailure, NotificationResult, PriceChange } from '../types.js';
import { createPriceChangeEmbed } from '../utils/embed.js';
import { buildChannelName } from '../utils/format.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { RateLimitedError, type ChatGateway } from './chat-gateway.js';

export interface PriceNotifier {
  notify(change: PriceChange): Promise<NotificationResult>;
}

export interface NotifierOptions {
  channelId: string;
  channelNamePrefix: string;
  maxAttempts?: number;
  maxRateLimitWaitMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_MAX_RATE_LIMIT_WAIT_MS = 30_000;

export class Notifier implements PriceNotifier {
  private gateway: ChatGateway;
  private channelId: string;
  private channelNamePrefix: string;
  private maxAttempts: number;
  private maxRateLimitWaitMs: number;
  private sleep: (ms: number) => Promise<void>;
  private logger: Logger;

  constructor(gateway: ChatGateway, options: NotifierOptions) {
    this.gateway = gateway;
    this.channelId = options.channelId;
    this.channelNamePrefix = options.channelNamePrefix;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.maxRateLimitWaitMs = options.maxRateLimitWaitMs ?? DEFAULT_MAX_RATE_LIMIT_WAIT_MS;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger('Notifier');
  }

  async notify(change: PriceChange): Promise<NotificationResult> {
    const channelName = buildChannelName(this.channelNamePrefix, change.current.value, change.delta.trend);
    const embed = createPriceChangeEmbed(change);

    const [renameFailure, postFailure] = await Promise.all([
      this.attempt('rename', () => this.gateway.renameChannel(this.channelId, channelName)),
      this.attempt('post', () => this.gateway.postMessage(this.channelId, { embeds: [embed] })),
    ]);

    const failures = [renameFailure, postFailure].filter(
      (failure): failure is NotificationFailure => failure !== null
    );

    if (!renameFailure) {
      this.logger.info(`Renamed channel ${this.channelId} to ${channelName}`);
    }
    if (!postFailure) {
      this.logger.info(`Posted price update to channel ${this.channelId}`);
    }

    return { ok: failures.length === 0, failures };
  }

  private async attempt(call: NotificationCall, action: () => Promise<void>): Promise<NotificationFailure | null> {
    for (let attempt = 1; ; attempt++) {
      try {
        await action();
        return null;
      } catch (error) {
        if (!(error instanceof RateLimitedError)) {
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.error(`${call} failed: ${reason}`);
          return { call, kind: 'error', reason };
        }

        if (attempt >= this.maxAttempts || error.retryAfterMs > this.maxRateLimitWaitMs) {
          this.logger.warn(`${call} rate limited, giving up after ${attempt} attempt(s): ${error.message}`);
          return { call, kind: 'rate_limited', reason: error.message };
        }

        this.logger.warn(`${call} rate limited, retrying in ${error.retryAfterMs}ms`);
        await this.sleep(error.retryAfterMs);
      }
    }
  }
}

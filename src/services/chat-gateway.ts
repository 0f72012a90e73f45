import { DiscordAPIError, GuildChannel, RateLimitError } from 'discord.js';
import type { Client, MessageCreateOptions } from 'discord.js';

export interface ChatGateway {
  renameChannel(channelId: string, name: string): Promise<void>;
  postMessage(channelId: string, message: MessageCreateOptions): Promise<void>;
}

export class RateLimitedError extends Error {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number, message = `rate limited, retry after ${retryAfterMs}ms`) {
    super(message);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

const DEFAULT_RETRY_AFTER_MS = 1000;

/**
 * ChatGateway over a logged-in discord.js client. The client must be created with
 * `rejectOnRateLimit` covering `/channels` (see `createClient`) so rate limits surface
 * here as errors instead of being queued.
 */
export class DiscordGateway implements ChatGateway {
  private client: Client;

  constructor(client: Client) {
    this.client = client;
  }

  async renameChannel(channelId: string, name: string): Promise<void> {
    await DiscordGateway.mapRateLimit(async () => {
      const channel = await this.client.channels.fetch(channelId);
      if (!(channel instanceof GuildChannel)) {
        throw new Error(`Channel ${channelId} is not a renamable guild channel`);
      }
      if (channel.name !== name) {
        await channel.setName(name);
      }
    });
  }

  async postMessage(channelId: string, message: MessageCreateOptions): Promise<void> {
    await DiscordGateway.mapRateLimit(async () => {
      const channel = await this.client.channels.fetch(channelId);
      if (!channel?.isSendable()) {
        throw new Error(`Channel ${channelId} is not a text channel`);
      }
      await channel.send(message);
    });
  }

  private static async mapRateLimit(call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error) {
      if (error instanceof RateLimitError) {
        throw new RateLimitedError(error.retryAfter, `rate limited on ${error.route}`);
      }
      if (error instanceof DiscordAPIError && error.status === 429) {
        throw new RateLimitedError(DEFAULT_RETRY_AFTER_MS);
      }
      throw error;
    }
  }
}

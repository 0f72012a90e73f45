import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { Notifier } from '../../src/services/notifier.js';
import { RateLimitedError, type ChatGateway } from '../../src/services/chat-gateway.js';
import { computeDelta } from '../../src/services/change-detector.js';
import type { PriceChange } from '../../src/types.js';
import type { Logger } from '../../src/utils/logger.js';

const silentLogger: Logger = { debug() {}, info() {}, warn() {}, error() {} };

const CHANNEL_ID = '123456789012345678';

const change: PriceChange = {
  previous: { value: 72.59, cycle: 6547, observedAt: '2024-01-01T14:00:00.000Z' },
  current: { value: 76.28, cycle: 6548, observedAt: '2024-01-01T14:30:00.000Z' },
  delta: computeDelta(72.59, 76.28),
};

describe('Notifier', () => {
  let renameChannel: Mock<ChatGateway['renameChannel']>;
  let postMessage: Mock<ChatGateway['postMessage']>;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let notifier: Notifier;

  beforeEach(() => {
    renameChannel = vi.fn<ChatGateway['renameChannel']>().mockResolvedValue(undefined);
    postMessage = vi.fn<ChatGateway['postMessage']>().mockResolvedValue(undefined);
    sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
    notifier = new Notifier(
      { renameChannel, postMessage },
      { channelId: CHANNEL_ID, channelNamePrefix: 'oil-price', sleep, logger: silentLogger }
    );
  });

  it('renames the channel and posts an embed', async () => {
    const result = await notifier.notify(change);

    expect(result).toEqual({ ok: true, failures: [] });
    expect(renameChannel).toHaveBeenCalledWith(CHANNEL_ID, 'oil-price💲76-28📈');
    expect(postMessage).toHaveBeenCalledTimes(1);
    expect(postMessage.mock.calls[0]?.[0]).toBe(CHANNEL_ID);
    expect(postMessage.mock.calls[0]?.[1].embeds).toHaveLength(1);
  });

  it('waits out a short rate limit and retries', async () => {
    renameChannel.mockRejectedValueOnce(new RateLimitedError(2000)).mockResolvedValueOnce(undefined);

    const result = await notifier.notify(change);

    expect(result.ok).toBe(true);
    expect(renameChannel).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('gives up at once when the rate limit wait is too long', async () => {
    renameChannel.mockRejectedValue(new RateLimitedError(600_000, 'rate limited on /channels/123456789012345678'));

    const result = await notifier.notify(change);

    expect(result).toEqual({
      ok: false,
      failures: [{ call: 'rename', kind: 'rate_limited', reason: 'rate limited on /channels/123456789012345678' }],
    });
    expect(renameChannel).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(postMessage).toHaveBeenCalledTimes(1);
  });

  it('stops retrying after three rate limited attempts', async () => {
    postMessage.mockRejectedValue(new RateLimitedError(500));

    const result = await notifier.notify(change);

    expect(result.failures).toEqual([{ call: 'post', kind: 'rate_limited', reason: 'rate limited, retry after 500ms' }]);
    expect(postMessage).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('does not retry other errors', async () => {
    postMessage.mockRejectedValue(new Error('Missing Permissions'));

    const result = await notifier.notify(change);

    expect(result.failures).toEqual([{ call: 'post', kind: 'error', reason: 'Missing Permissions' }]);
    expect(postMessage).toHaveBeenCalledTimes(1);
  });

  it('attempts both calls even when both fail', async () => {
    renameChannel.mockRejectedValue(new Error('Unknown Channel'));
    postMessage.mockRejectedValue(new Error('Missing Access'));

    const result = await notifier.notify(change);

    expect(result).toEqual({
      ok: false,
      failures: [
        { call: 'rename', kind: 'error', reason: 'Unknown Channel' },
        { call: 'post', kind: 'error', reason: 'Missing Access' },
      ],
    });
  });
});

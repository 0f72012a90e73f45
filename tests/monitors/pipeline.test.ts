import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { PricePipeline, hashPayload } from '../../src/monitors/pipeline.js';
import type { PriceSource } from '../../src/services/price-fetcher.js';
import type { PriceNotifier } from '../../src/services/notifier.js';
import { emptyPollState } from '../../src/services/state-store.js';
import type { CacheToken, PollState, PriceRecord } from '../../src/types.js';
import type { Logger } from '../../src/utils/logger.js';

const silentLogger: Logger = { debug() {}, info() {}, warn() {}, error() {} };

const NEW_TOKEN: CacheToken = { etag: '"v2"', lastModified: null };
const OLD_TOKEN: CacheToken = { etag: '"v1"', lastModified: null };

const payload = (price: number, cycle: number) =>
  JSON.stringify([{ price, cycle, timestamp: '2024-01-01T14:30:00Z' }]);

const record = (value: number, cycle: number): PriceRecord => ({
  value,
  cycle,
  observedAt: '2024-01-01T14:00:00.000Z',
});

const stateWith = (lastRecord: PriceRecord): PollState => ({
  lastRecord,
  lastPayloadHash: 'aaaaaaaaaaaaaaaa',
  cacheToken: OLD_TOKEN,
});

describe('PricePipeline', () => {
  let fetch: Mock<PriceSource['fetch']>;
  let notify: Mock<PriceNotifier['notify']>;
  let pipeline: PricePipeline;

  const serve = (body: string) => fetch.mockResolvedValue({ status: 'fresh', payload: body, cacheToken: NEW_TOKEN });

  beforeEach(() => {
    fetch = vi.fn<PriceSource['fetch']>();
    notify = vi.fn<PriceNotifier['notify']>().mockResolvedValue({ ok: true, failures: [] });
    pipeline = new PricePipeline(
      { fetch },
      { notify },
      { now: () => new Date('2024-01-01T15:00:00.000Z'), logger: silentLogger }
    );
  });

  it('passes the stored cache token to the source', async () => {
    fetch.mockResolvedValue({ status: 'not_modified' });
    const state = stateWith(record(72.59, 6547));

    await pipeline.run(state);

    expect(fetch).toHaveBeenCalledWith(OLD_TOKEN);
  });

  it('keeps the state untouched when the source is not modified', async () => {
    fetch.mockResolvedValue({ status: 'not_modified' });
    const state = stateWith(record(72.59, 6547));

    const result = await pipeline.run(state);

    expect(result.state).toBe(state);
    expect(result.outcome).toEqual({ status: 'not_modified' });
    expect(notify).not.toHaveBeenCalled();
  });

  it('keeps the state untouched when the fetch fails', async () => {
    const failure = { kind: 'transient_network' as const, reason: 'timeout: timed out after 10000ms (after 3 attempts)' };
    fetch.mockResolvedValue({ status: 'failed', failure });
    const state = stateWith(record(72.59, 6547));

    const result = await pipeline.run(state);

    expect(result.state).toBe(state);
    expect(result.outcome).toEqual({ status: 'failed', failure });
  });

  it('records the first observation without notifying', async () => {
    const body = payload(72.59, 6547);
    serve(body);

    const result = await pipeline.run(emptyPollState());

    const expected: PriceRecord = { value: 72.59, cycle: 6547, observedAt: '2024-01-01T14:30:00.000Z' };
    expect(result.outcome).toEqual({ status: 'initial', record: expected });
    expect(result.state).toEqual({ lastRecord: expected, lastPayloadHash: hashPayload(body), cacheToken: NEW_TOKEN });
    expect(notify).not.toHaveBeenCalled();
  });

  it('only refreshes the cache token when the payload is identical', async () => {
    const body = payload(72.59, 6547);
    serve(body);
    const previous = record(72.59, 6547);
    const state: PollState = { lastRecord: previous, lastPayloadHash: hashPayload(body), cacheToken: OLD_TOKEN };

    const result = await pipeline.run(state);

    expect(result.outcome).toEqual({ status: 'unchanged', reason: 'same_payload' });
    expect(result.state).toEqual({ ...state, cacheToken: NEW_TOKEN });
  });

  it('returns the same state when payload and cache token are unchanged', async () => {
    const body = payload(72.59, 6547);
    serve(body);
    const state: PollState = { lastRecord: record(72.59, 6547), lastPayloadHash: hashPayload(body), cacheToken: { ...NEW_TOKEN } };

    const result = await pipeline.run(state);

    expect(result.state).toBe(state);
    expect(result.outcome).toEqual({ status: 'unchanged', reason: 'same_payload' });
  });

  it('keeps the prior state when the payload cannot be parsed', async () => {
    serve('<html>maintenance</html>');
    const state = stateWith(record(72.59, 6547));

    const result = await pipeline.run(state);

    expect(result.state).toBe(state);
    expect(result.outcome.status === 'failed' && result.outcome.failure.kind).toBe('malformed_payload');
  });

  it('notifies on a price change and stores the new record', async () => {
    const body = payload(76.28, 6548);
    serve(body);
    const previous = record(72.59, 6547);

    const result = await pipeline.run(stateWith(previous));

    expect(notify).toHaveBeenCalledTimes(1);
    const change = notify.mock.calls[0]?.[0];
    expect(change?.previous).toBe(previous);
    expect(change?.current.value).toBe(76.28);
    expect(change?.delta.trend).toBe('up');
    expect(result.outcome.status).toBe('changed');
    expect(result.state.lastRecord?.value).toBe(76.28);
    expect(result.state.lastPayloadHash).toBe(hashPayload(body));
    expect(result.state.cacheToken).toEqual(NEW_TOKEN);
  });

  it('advances the state even when notification fails', async () => {
    serve(payload(68.1, 6548));
    const failures = [{ call: 'post' as const, kind: 'error' as const, reason: 'Missing Access' }];
    notify.mockResolvedValue({ ok: false, failures });

    const result = await pipeline.run(stateWith(record(72.59, 6547)));

    expect(result.outcome.status === 'changed' && result.outcome.notification).toEqual({ ok: false, failures });
    expect(result.state.lastRecord?.value).toBe(68.1);
  });

  it('ignores stale cycles entirely', async () => {
    serve(payload(80, 6547));
    const state = stateWith(record(72.59, 6548));

    const result = await pipeline.run(state);

    expect(result.state).toBe(state);
    expect(result.outcome.status === 'unchanged' && result.outcome.reason).toBe('stale');
    expect(notify).not.toHaveBeenCalled();
  });

  it('keeps the stored record within the same cycle', async () => {
    const body = payload(80, 6548);
    serve(body);
    const previous = record(72.59, 6548);

    const result = await pipeline.run(stateWith(previous));

    expect(result.state).toEqual({ lastRecord: previous, lastPayloadHash: hashPayload(body), cacheToken: NEW_TOKEN });
    expect(result.outcome.status === 'unchanged' && result.outcome.reason).toBe('same_cycle');
    expect(notify).not.toHaveBeenCalled();
  });

  it('advances the cycle without notifying when the price is republished', async () => {
    serve(payload(72.59, 6548));

    const result = await pipeline.run(stateWith(record(72.59, 6547)));

    expect(result.state.lastRecord?.cycle).toBe(6548);
    expect(result.outcome.status === 'unchanged' && result.outcome.reason).toBe('same_value');
    expect(notify).not.toHaveBeenCalled();
  });
});

describe('hashPayload', () => {
  it('returns a stable 16 character hex digest', () => {
    const hash = hashPayload('[{"price":1,"cycle":1}]');

    expect(hash).toMatch(/^[0-9a-f]{16}$/);
    expect(hashPayload('[{"price":1,"cycle":1}]')).toBe(hash);
    expect(hashPayload('[{"price":2,"cycle":1}]')).not.toBe(hash);
  });
});

import { createHash } from 'node:crypto';
import type { CacheToken, CheckOutcome, PollState } from '../types.js';
import type { PriceSource } from '../services/price-fetcher.js';
import type { PriceNotifier } from '../services/notifier.js';
import { parsePricePayload } from '../services/price-parser.js';
import { detectChange } from '../services/change-detector.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface PipelineResult {
  state: PollState;
  outcome: CheckOutcome;
}

export interface CheckPipeline {
  run(state: PollState): Promise<PipelineResult>;
}

export function hashPayload(payload: string): string {
  return createHash('sha256').update(payload, 'utf8').digest('hex').slice(0, 16);
}

function sameCacheToken(a: CacheToken | null, b: CacheToken): boolean {
  return a !== null && a.etag === b.etag && a.lastModified === b.lastModified;
}

/**
 * One fetch → parse → detect → notify pass over an explicitly passed PollState.
 * Returns the state to keep; the input state is never mutated.
 */
export class PricePipeline implements CheckPipeline {
  private source: PriceSource;
  private notifier: PriceNotifier;
  private now: () => Date;
  private logger: Logger;

  constructor(
    source: PriceSource,
    notifier: PriceNotifier,
    options: { now?: () => Date; logger?: Logger } = {}
  ) {
    this.source = source;
    this.notifier = notifier;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('Monitor');
  }

  async run(state: PollState): Promise<PipelineResult> {
    const fetched = await this.source.fetch(state.cacheToken);

    if (fetched.status === 'not_modified') {
      return { state, outcome: { status: 'not_modified' } };
    }
    if (fetched.status === 'failed') {
      return { state, outcome: { status: 'failed', failure: fetched.failure } };
    }

    const payloadHash = hashPayload(fetched.payload);
    if (payloadHash === state.lastPayloadHash) {
      const outcome: CheckOutcome = { status: 'unchanged', reason: 'same_payload' };
      if (sameCacheToken(state.cacheToken, fetched.cacheToken)) {
        return { state, outcome };
      }
      return { state: { ...state, cacheToken: fetched.cacheToken }, outcome };
    }

    const parsed = parsePricePayload(fetched.payload, this.now().toISOString());
    if (parsed.status === 'failed') {
      return { state, outcome: { status: 'failed', failure: parsed.failure } };
    }

    const current = parsed.record;
    const previous = state.lastRecord;
    const detection = detectChange(previous, current);

    const accepted: PollState = {
      lastRecord: current,
      lastPayloadHash: payloadHash,
      cacheToken: fetched.cacheToken,
    };

    if (detection.kind === 'initial' || !previous) {
      this.logger.info(`Initial price recorded: ${current.value} (cycle ${current.cycle})`);
      return { state: accepted, outcome: { status: 'initial', record: current } };
    }

    switch (detection.kind) {
      case 'stale':
        this.logger.debug(`Ignoring stale cycle ${current.cycle} (have ${previous.cycle})`);
        return { state, outcome: { status: 'unchanged', reason: 'stale', previous, current } };

      case 'same_cycle':
        return {
          state: { ...state, lastPayloadHash: payloadHash, cacheToken: fetched.cacheToken },
          outcome: { status: 'unchanged', reason: 'same_cycle', previous, current },
        };

      case 'same_value':
        this.logger.debug(`Cycle ${current.cycle} republished price ${current.value}`);
        return { state: accepted, outcome: { status: 'unchanged', reason: 'same_value', previous, current } };

      case 'changed': {
        const change = { previous, current, delta: detection.delta };
        this.logger.info(
          `Price changed: ${previous.value} → ${current.value} (cycle ${previous.cycle} → ${current.cycle})`
        );
        const notification = await this.notifier.notify(change);
        return { state: accepted, outcome: { status: 'changed', change, notification } };
      }
    }
  }
}

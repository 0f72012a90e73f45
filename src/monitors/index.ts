import type { CheckOutcome, PollState, PriceRecord } from '../types.js';
import type { SaveResult } from '../services/state-store.js';
import type { CheckPipeline } from './pipeline.js';
import { formatChangeSummary } from '../utils/format.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface StateSaver {
  save(state: PollState): SaveResult;
}

export type CheckTrigger = 'timer' | 'manual';

export interface SchedulerStatus {
  running: boolean;
  inFlight: boolean;
  pollIntervalMs: number;
  lastRecord: PriceRecord | null;
  lastCheckAt: string | null;
  lastOutcome: CheckOutcome['status'] | null;
  nextCheckAt: string | null;
  unsavedState: boolean;
}

interface SchedulerOptions {
  pollIntervalMs: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Drives the price pipeline. Idle until a timer tick or manual trigger, then Polling until
 * the run settles. Only one run is ever in flight; triggers that arrive meanwhile are dropped.
 */
export class PriceScheduler {
  private pipeline: CheckPipeline;
  private store: StateSaver;
  private state: PollState;
  private pollIntervalMs: number;
  private now: () => Date;
  private logger: Logger;
  private intervalId: NodeJS.Timeout | null = null;
  private inFlight = false;
  private unsavedState = false;
  private lastCheckAt: Date | null = null;
  private lastOutcome: CheckOutcome | null = null;
  private nextCheckAt: Date | null = null;

  constructor(pipeline: CheckPipeline, store: StateSaver, initialState: PollState, options: SchedulerOptions) {
    this.pipeline = pipeline;
    this.store = store;
    this.state = initialState;
    this.pollIntervalMs = options.pollIntervalMs;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('Monitor');
  }

  start(): void {
    if (this.intervalId) {
      this.logger.warn('Price monitor is already running');
      return;
    }

    this.logger.info(`Starting price monitor (interval: ${this.pollIntervalMs}ms)`);

    this.intervalId = setInterval(() => {
      this.scheduleNext();
      this.runScheduledCheck().catch(error => this.logger.error('Scheduled check crashed:', error));
    }, this.pollIntervalMs);
    this.scheduleNext();

    this.runScheduledCheck().catch(error => this.logger.error('Scheduled check crashed:', error));
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      this.nextCheckAt = null;
      this.logger.info('Stopped price monitor');
    }
  }

  isRunning(): boolean {
    return this.intervalId !== null;
  }

  getState(): PollState {
    return this.state;
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.isRunning(),
      inFlight: this.inFlight,
      pollIntervalMs: this.pollIntervalMs,
      lastRecord: this.state.lastRecord,
      lastCheckAt: this.lastCheckAt?.toISOString() ?? null,
      lastOutcome: this.lastOutcome?.status ?? null,
      nextCheckAt: this.nextCheckAt?.toISOString() ?? null,
      unsavedState: this.unsavedState,
    };
  }

  /** Timer entry point. A tick that lands while a run is in flight is dropped. */
  async runScheduledCheck(): Promise<void> {
    if (this.inFlight) {
      this.logger.debug('Tick dropped: a check is already in flight');
      return;
    }
    await this.runCheck('timer');
  }

  /** Forces an immediate check; answers `busy` instead of queueing when one is in flight. */
  async triggerManualCheck(): Promise<CheckOutcome> {
    if (this.inFlight) {
      this.logger.info('Manual check dropped: a check is already in flight');
      return { status: 'busy' };
    }
    return this.runCheck('manual');
  }

  private async runCheck(trigger: CheckTrigger): Promise<CheckOutcome> {
    this.inFlight = true;
    this.logger.debug(`Running price check (${trigger})`);

    let outcome: CheckOutcome;
    try {
      const previousState = this.state;
      const result = await this.pipeline.run(previousState);
      outcome = result.outcome;
      this.state = result.state;

      if (result.state !== previousState || this.unsavedState) {
        this.persist();
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error('Unexpected error during price check:', error);
      outcome = { status: 'failed', failure: { kind: 'internal_error', reason } };
    } finally {
      this.inFlight = false;
      this.lastCheckAt = this.now();
    }

    this.lastOutcome = outcome;
    this.logOutcome(trigger, outcome);
    return outcome;
  }

  private persist(): void {
    const saved = this.store.save(this.state);
    if (saved.status === 'ok') {
      this.unsavedState = false;
      return;
    }
    this.unsavedState = true;
    this.logger.error(`Could not persist state, keeping it in memory: ${saved.reason}`);
  }

  private scheduleNext(): void {
    this.nextCheckAt = new Date(this.now().getTime() + this.pollIntervalMs);
  }

  private logOutcome(trigger: CheckTrigger, outcome: CheckOutcome): void {
    switch (outcome.status) {
      case 'failed':
        this.logger.warn(`Check (${trigger}) failed [${outcome.failure.kind}]: ${outcome.failure.reason}`);
        break;
      case 'changed':
        this.logger.info(`Check (${trigger}): ${formatChangeSummary(outcome.change)}`);
        for (const failure of outcome.notification.failures) {
          this.logger.warn(`Notification ${failure.call} failed [${failure.kind}]: ${failure.reason}`);
        }
        break;
      case 'unchanged':
        this.logger.info(`Check (${trigger}) complete: no change (${outcome.reason})`);
        break;
      default:
        this.logger.info(`Check (${trigger}) complete: ${outcome.status}`);
    }
  }
}

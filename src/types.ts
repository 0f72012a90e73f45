export interface PriceRecord {
  readonly value: number;
  readonly cycle: number;
  readonly observedAt: string;
}

export interface CacheToken {
  etag: string | null;
  lastModified: string | null;
}

export interface PollState {
  lastRecord: PriceRecord | null;
  lastPayloadHash: string | null;
  cacheToken: CacheToken | null;
}

export type Trend = 'up' | 'down' | 'flat';

export interface PriceDelta {
  absoluteChange: number;
  percentChange: number;
  trend: Trend;
}

export interface PriceChange {
  previous: PriceRecord;
  current: PriceRecord;
  delta: PriceDelta;
}

export type FetchFailureReason =
  | 'timeout'
  | 'connection_refused'
  | 'dns_failure'
  | 'network_error'
  | 'http_4xx'
  | 'http_5xx'
  | 'rate_limited';

export type CheckFailureKind =
  | 'transient_network'
  | 'rate_limited'
  | 'permanent_request'
  | 'malformed_payload'
  | 'empty_payload'
  | 'internal_error';

export interface CheckFailure {
  kind: CheckFailureKind;
  reason: string;
}

export type NotificationCall = 'rename' | 'post';

export interface NotificationFailure {
  call: NotificationCall;
  kind: 'rate_limited' | 'error';
  reason: string;
}

export interface NotificationResult {
  ok: boolean;
  failures: NotificationFailure[];
}

export type CheckOutcome =
  | { status: 'not_modified' }
  | { status: 'unchanged'; reason: 'same_payload' }
  | {
      status: 'unchanged';
      reason: 'same_cycle' | 'same_value' | 'stale';
      previous: PriceRecord;
      current: PriceRecord;
    }
  | { status: 'initial'; record: PriceRecord }
  | { status: 'changed'; change: PriceChange; notification: NotificationResult }
  | { status: 'failed'; failure: CheckFailure }
  | { status: 'busy' };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  discord: {
    token: string;
    clientId?: string;
    guildId?: string;
    priceChannelId: string;
    commandPrefix: string;
    statusText: string;
  };
  source: {
    url: string;
    timeoutMs: number;
    maxAttempts: number;
    retryDelayMs: number;
  };
  monitoring: {
    pollIntervalMs: number;
    channelNamePrefix: string;
    stateFile: string;
  };
  logLevel: LogLevel;
}

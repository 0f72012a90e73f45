import { z } from 'zod';
import type { CheckFailure, PriceRecord } from '../types.js';

export type ParseResult =
  | { status: 'ok'; record: PriceRecord }
  | { status: 'failed'; failure: CheckFailure };

// Epoch values below this are taken as seconds rather than milliseconds. A millisecond
// value from before September 2001 is therefore misread as seconds; it lands past year
// 9999 and is rejected by the range check below.
const EPOCH_MS_THRESHOLD = 1e12;

const observationSchema = z
  .object({
    price: z.number().finite().optional(),
    value: z.number().finite().optional(),
    cycle: z.number().int().nonnegative(),
    timestamp: z.union([z.string(), z.number().finite()]).optional(),
  })
  .transform((raw, ctx) => {
    const value = raw.value ?? raw.price;
    if (value === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing numeric price' });
      return z.NEVER;
    }

    let timestampMs: number | null = null;
    if (raw.timestamp !== undefined) {
      timestampMs = toEpochMs(raw.timestamp);
      if (timestampMs === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable timestamp "${raw.timestamp}"` });
        return z.NEVER;
      }
    }

    return { value, cycle: raw.cycle, timestampMs };
  });

const payloadSchema = z.array(observationSchema);

type Observation = z.output<typeof observationSchema>;

// Observation times must fit a four-digit ISO year so they survive the state file.
const MIN_OBSERVED_MS = Date.parse('0000-01-01T00:00:00.000Z');
const MAX_OBSERVED_MS = Date.UTC(10000, 0, 1);

function toEpochMs(timestamp: string | number): number | null {
  const ms = typeof timestamp === 'number'
    ? (timestamp < EPOCH_MS_THRESHOLD ? timestamp * 1000 : timestamp)
    : Date.parse(timestamp);
  return Number.isNaN(ms) || ms < MIN_OBSERVED_MS || ms >= MAX_OBSERVED_MS ? null : ms;
}

function isNewer(candidate: Observation, best: Observation): boolean {
  if (candidate.cycle !== best.cycle) {
    return candidate.cycle > best.cycle;
  }
  return (candidate.timestampMs ?? -Infinity) > (best.timestampMs ?? -Infinity);
}

/**
 * Picks the latest observation out of a raw price payload.
 *
 * The payload is a JSON array of `{ price | value, cycle, timestamp? }` entries. The entry
 * with the highest cycle wins; equal cycles are decided by the later timestamp. When the
 * winner carries no timestamp, `receivedAt` becomes its observation time.
 */
export function parsePricePayload(payload: string, receivedAt: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { status: 'failed', failure: { kind: 'malformed_payload', reason: `invalid JSON: ${message}` } };
  }

  const parsed = payloadSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `at [${issue.path.join('.')}] ` : '';
    return {
      status: 'failed',
      failure: { kind: 'malformed_payload', reason: `${where}${issue?.message ?? 'unexpected shape'}` },
    };
  }

  const [first, ...rest] = parsed.data;
  if (!first) {
    return { status: 'failed', failure: { kind: 'empty_payload', reason: 'no price observations in payload' } };
  }

  const latest = rest.reduce((best, candidate) => (isNewer(candidate, best) ? candidate : best), first);

  return {
    status: 'ok',
    record: Object.freeze({
      value: latest.value,
      cycle: latest.cycle,
      observedAt: latest.timestampMs !== null ? new Date(latest.timestampMs).toISOString() : receivedAt,
    }),
  };
}

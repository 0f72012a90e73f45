import type { PriceDelta, PriceRecord, Trend } from '../types.js';

export type Detection =
  | { kind: 'initial' }
  | { kind: 'stale' }
  | { kind: 'same_cycle' }
  | { kind: 'same_value' }
  | { kind: 'changed'; delta: PriceDelta };

/**
 * Compares a freshly parsed record against the last stored one.
 *
 * A change needs both a new cycle and a different value: upstream sometimes republishes the
 * same price under a new cycle, and that must not notify. Records with a lower cycle than the
 * stored one are stale and reported as such so the caller leaves its state alone.
 */
export function detectChange(previous: PriceRecord | null, current: PriceRecord): Detection {
  if (!previous) {
    return { kind: 'initial' };
  }
  if (current.cycle < previous.cycle) {
    return { kind: 'stale' };
  }
  if (current.cycle === previous.cycle) {
    return { kind: 'same_cycle' };
  }
  if (current.value === previous.value) {
    return { kind: 'same_value' };
  }
  return { kind: 'changed', delta: computeDelta(previous.value, current.value) };
}

export function computeDelta(previousValue: number, currentValue: number): PriceDelta {
  const absoluteChange = currentValue - previousValue;
  const percentChange = previousValue === 0 ? 0 : (absoluteChange / previousValue) * 100;
  return { absoluteChange, percentChange, trend: trendOf(absoluteChange) };
}

export function trendOf(absoluteChange: number): Trend {
  if (absoluteChange > 0) return 'up';
  if (absoluteChange < 0) return 'down';
  return 'flat';
}

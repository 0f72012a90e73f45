import type { CheckOutcome, NotificationFailure, PriceChange, Trend } from '../types.js';

export const TREND_GLYPHS: Record<Trend, string> = {
  up: '📈',
  down: '📉',
  flat: '➖',
};

const MAX_CHANNEL_NAME_LENGTH = 100;

export function formatPrice(value: number): string {
  return `$${value.toFixed(2)}`;
}

export function formatSignedPrice(value: number): string {
  const sign = value < 0 ? '-' : '+';
  return `${sign}$${Math.abs(value).toFixed(2)}`;
}

export function formatPercent(value: number): string {
  const sign = value < 0 ? '-' : '+';
  return `${sign}${Math.abs(value).toFixed(2)}%`;
}

export function formatUtcTime(iso: string): string {
  const date = new Date(iso);
  const hours = String(date.getUTCHours()).padStart(2, '0');
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  return `${hours}:${minutes} UTC`;
}

/**
 * Channel label such as `oil-price💲76-28📈`. The prefix is cut by code point to keep
 * within Discord's limit, so an emoji in it is never split.
 */
export function buildChannelName(prefix: string, value: number, trend: Trend): string {
  const [dollars, cents = '00'] = value.toFixed(2).split('.');
  const suffix = `💲${dollars}-${cents}${TREND_GLYPHS[trend]}`;
  const room = Math.max(0, MAX_CHANNEL_NAME_LENGTH - Array.from(suffix).length);
  return `${Array.from(prefix).slice(0, room).join('')}${suffix}`;
}

export function formatChangeSummary(change: PriceChange): string {
  const { previous, current, delta } = change;
  return (
    `${TREND_GLYPHS[delta.trend]} Price changed: ${formatPrice(previous.value)} → ${formatPrice(current.value)} ` +
    `(${formatSignedPrice(delta.absoluteChange)}, ${formatPercent(delta.percentChange)}) ` +
    `· cycle ${current.cycle} · ${formatUtcTime(current.observedAt)}`
  );
}

function formatNotificationFailure(failure: NotificationFailure): string {
  const kind = failure.kind === 'rate_limited' ? 'rate limited' : 'error';
  return `${failure.call} (${kind}: ${failure.reason})`;
}

function formatUnchanged(outcome: Extract<CheckOutcome, { status: 'unchanged' }>): string {
  switch (outcome.reason) {
    case 'same_payload':
      return '✅ No change: the source returned the same data as last time.';
    case 'same_cycle':
      return `✅ No change: still on cycle ${outcome.current.cycle} at ${formatPrice(outcome.previous.value)}.`;
    case 'same_value':
      return `✅ No change: price still ${formatPrice(outcome.current.value)} (cycle ${outcome.current.cycle}).`;
    case 'stale':
      return `✅ No change: ignored a stale response (cycle ${outcome.current.cycle} < ${outcome.previous.cycle}).`;
  }
}

/** Reply text for a manual check. */
export function formatOutcome(outcome: CheckOutcome): string {
  switch (outcome.status) {
    case 'busy':
      return '⏳ A price check is already running. Try again in a moment.';
    case 'not_modified':
      return '✅ No change: the source reported no new data.';
    case 'unchanged':
      return formatUnchanged(outcome);
    case 'initial':
      return `📌 Recorded initial price ${formatPrice(outcome.record.value)} (cycle ${outcome.record.cycle}).`;
    case 'changed': {
      const summary = formatChangeSummary(outcome.change);
      if (outcome.notification.ok) {
        return summary;
      }
      const failures = outcome.notification.failures.map(formatNotificationFailure).join(', ');
      return `${summary}\n⚠️ Notification partially failed: ${failures}`;
    }
    case 'failed':
      return `❌ Check failed (${outcome.failure.kind}): ${outcome.failure.reason}`;
  }
}

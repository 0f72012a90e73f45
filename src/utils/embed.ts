import { EmbedBuilder } from 'discord.js';
import type { PriceChange, PriceRecord, Trend } from '../types.js';
import type { SchedulerStatus } from '../monitors/index.js';
import {
  TREND_GLYPHS,
  formatPercent,
  formatPrice,
  formatSignedPrice,
  formatUtcTime,
} from './format.js';

const FOOTER = 'Price Channel Monitor';

const COLORS: Record<Trend, number> = {
  up: 0x00ff00,
  down: 0xff0000,
  flat: 0x0099ff,
};

const INFO_COLOR = 0x0099ff;

function relativeTime(iso: string): string {
  return `<t:${Math.floor(Date.parse(iso) / 1000)}:R>`;
}

export function createPriceChangeEmbed(change: PriceChange): EmbedBuilder {
  const { previous, current, delta } = change;

  return new EmbedBuilder()
    .setColor(COLORS[delta.trend])
    .setTitle(`${TREND_GLYPHS[delta.trend]} Price Updated`)
    .setDescription(`Cycle ${previous.cycle} → ${current.cycle}`)
    .addFields(
      { name: 'Old Price', value: formatPrice(previous.value), inline: true },
      { name: 'New Price', value: formatPrice(current.value), inline: true },
      { name: 'Cycle', value: String(current.cycle), inline: true },
      {
        name: 'Change',
        value: `${formatSignedPrice(delta.absoluteChange)} (${formatPercent(delta.percentChange)})`,
        inline: true,
      },
      { name: 'Observed', value: formatUtcTime(current.observedAt), inline: true }
    )
    .setTimestamp(new Date(current.observedAt))
    .setFooter({ text: FOOTER });
}

export function createPriceEmbed(record: PriceRecord): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(INFO_COLOR)
    .setTitle('Current Price')
    .addFields(
      { name: 'Price', value: formatPrice(record.value), inline: true },
      { name: 'Cycle', value: String(record.cycle), inline: true },
      { name: 'Observed', value: `${formatUtcTime(record.observedAt)} (${relativeTime(record.observedAt)})`, inline: true }
    )
    .setTimestamp(new Date(record.observedAt))
    .setFooter({ text: FOOTER });
}

export function createStatusEmbed(status: SchedulerStatus, sourceUrl: string): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(status.running ? 0x00ff00 : 0xff0000)
    .setTitle('Price Monitor Status')
    .addFields(
      { name: 'Monitoring', value: status.running ? 'Active' : 'Stopped', inline: true },
      { name: 'Check Running', value: status.inFlight ? 'Yes' : 'No', inline: true },
      { name: 'Poll Interval', value: `${status.pollIntervalMs / 1000}s`, inline: true },
      {
        name: 'Current Price',
        value: status.lastRecord ? `${formatPrice(status.lastRecord.value)} (cycle ${status.lastRecord.cycle})` : 'None yet',
        inline: true,
      },
      { name: 'Last Check', value: status.lastCheckAt ? relativeTime(status.lastCheckAt) : 'Never', inline: true },
      { name: 'Last Outcome', value: status.lastOutcome ?? 'n/a', inline: true },
      { name: 'Next Check', value: status.nextCheckAt ? relativeTime(status.nextCheckAt) : 'Not scheduled', inline: true },
      { name: 'Source', value: sourceUrl, inline: false }
    )
    .setTimestamp()
    .setFooter({ text: FOOTER });

  if (status.unsavedState) {
    embed.addFields({ name: '⚠️ State File', value: 'Last save failed; will retry after the next check', inline: false });
  }

  return embed;
}

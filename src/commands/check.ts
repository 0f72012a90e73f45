import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import type { PriceScheduler } from '../monitors/index.js';
import { formatOutcome } from '../utils/format.js';

export function createCheckCommand(scheduler: PriceScheduler): Command {
  return {
    data: new SlashCommandBuilder()
      .setName('check')
      .setDescription('Check the price source for an update right now'),

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      await interaction.deferReply();
      const outcome = await scheduler.triggerManualCheck();
      await interaction.editReply(formatOutcome(outcome));
    },
  };
}

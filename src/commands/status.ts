import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import type { PriceScheduler } from '../monitors/index.js';
import { createStatusEmbed } from '../utils/embed.js';

export function createStatusCommand(scheduler: PriceScheduler, sourceUrl: string): Command {
  return {
    data: new SlashCommandBuilder()
      .setName('status')
      .setDescription('Show price monitor status'),

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const embed = createStatusEmbed(scheduler.getStatus(), sourceUrl);
      await interaction.reply({ embeds: [embed] });
    },
  };
}

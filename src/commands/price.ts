import { SlashCommandBuilder, MessageFlags } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import type { PriceScheduler } from '../monitors/index.js';
import { createPriceEmbed } from '../utils/embed.js';

export function createPriceCommand(scheduler: PriceScheduler): Command {
  return {
    data: new SlashCommandBuilder()
      .setName('price')
      .setDescription('Show the last recorded price'),

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const record = scheduler.getState().lastRecord;
      if (!record) {
        await interaction.reply({
          content: 'No price recorded yet. Run `/check` to fetch one.',
          flags: MessageFlags.Ephemeral,
        });
        return;
      }

      await interaction.reply({ embeds: [createPriceEmbed(record)] });
    },
  };
}

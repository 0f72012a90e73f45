import { SlashCommandBuilder, PermissionFlagsBits, MessageFlags } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import type { PriceScheduler } from '../monitors/index.js';

export function createMonitorCommand(scheduler: PriceScheduler): Command {
  const data = new SlashCommandBuilder()
    .setName('monitor')
    .setDescription('Start or stop automatic price polling (Manage Channels only)')
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageChannels)
    .addSubcommand(sub =>
      sub
        .setName('start')
        .setDescription('Resume automatic polling')
    )
    .addSubcommand(sub =>
      sub
        .setName('stop')
        .setDescription('Pause automatic polling')
    );

  return {
    data,
    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const subcommand = interaction.options.getSubcommand();

      switch (subcommand) {
        case 'start':
          if (scheduler.isRunning()) {
            await interaction.reply({ content: '⚠️ Price monitoring is already running.', flags: MessageFlags.Ephemeral });
            return;
          }
          scheduler.start();
          await interaction.reply('🚀 **Price monitoring started.**');
          break;
        case 'stop':
          if (!scheduler.isRunning()) {
            await interaction.reply({ content: '⚠️ Price monitoring is not running.', flags: MessageFlags.Ephemeral });
            return;
          }
          scheduler.stop();
          await interaction.reply('🛑 **Price monitoring stopped.**');
          break;
      }
    },
  };
}

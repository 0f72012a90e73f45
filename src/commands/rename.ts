import { SlashCommandBuilder, PermissionFlagsBits, MessageFlags } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import { RateLimitedError, type ChatGateway } from '../services/chat-gateway.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Rename');

export function createRenameCommand(gateway: ChatGateway, channelId: string): Command {
  return {
    data: new SlashCommandBuilder()
      .setName('rename')
      .setDescription('Rename the price channel (Manage Channels only)')
      .setDefaultMemberPermissions(PermissionFlagsBits.ManageChannels)
      .addStringOption(option =>
        option
          .setName('name')
          .setDescription('New channel name')
          .setRequired(true)
          .setMinLength(1)
          .setMaxLength(100)
      ),

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const name = interaction.options.getString('name', true);
      await interaction.deferReply({ flags: MessageFlags.Ephemeral });

      try {
        await gateway.renameChannel(channelId, name);
        logger.info(`Channel ${channelId} renamed to "${name}" by ${interaction.user.tag}`);
        await interaction.editReply(`✅ Channel <#${channelId}> renamed to **${name}**`);
      } catch (error) {
        if (error instanceof RateLimitedError) {
          const seconds = Math.ceil(error.retryAfterMs / 1000);
          await interaction.editReply(`⏳ Discord is rate limiting renames. Try again in ${seconds}s.`);
          return;
        }
        logger.error('Failed to rename channel:', error);
        await interaction.editReply('❌ Failed to rename the channel. Check my Manage Channels permission.');
      }
    },
  };
}

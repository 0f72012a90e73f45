import { Client, GatewayIntentBits, Events, Collection, MessageFlags } from 'discord.js';
import type { ChatInputCommandInteraction, Message } from 'discord.js';
import type { PriceScheduler } from './monitors/index.js';
import { createPriceEmbed, createStatusEmbed } from './utils/embed.js';
import { formatOutcome } from './utils/format.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Bot');

export interface Command {
  data: {
    name: string;
    description: string;
    toJSON(): unknown;
  };
  execute(interaction: ChatInputCommandInteraction): Promise<void>;
}

export interface BotClient extends Client {
  commands: Collection<string, Command>;
}

export function createClient(): BotClient {
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
    ],
    // Rate-limited channel requests reject instead of queueing; Notifier owns the retry.
    rest: { rejectOnRateLimit: ['/channels'] },
  }) as BotClient;

  client.commands = new Collection<string, Command>();

  client.on(Events.InteractionCreate, async (interaction) => {
    if (!interaction.isChatInputCommand()) return;

    const command = client.commands.get(interaction.commandName);
    if (!command) {
      logger.error(`Unknown command: ${interaction.commandName}`);
      return;
    }

    try {
      await command.execute(interaction);
    } catch (error) {
      logger.error('Command error:', error);
      const reply = { content: 'An error occurred while executing this command.', flags: MessageFlags.Ephemeral } as const;
      if (interaction.replied || interaction.deferred) {
        await interaction.followUp(reply);
      } else {
        await interaction.reply(reply);
      }
    }
  });

  return client;
}

export interface PrefixCommandContext {
  prefix: string;
  scheduler: PriceScheduler;
  sourceUrl: string;
}

/** Parses `<prefix><command> args...`; returns null for messages that are not commands. */
export function parsePrefixCommand(content: string, prefix: string): { command: string; args: string[] } | null {
  if (!content.startsWith(prefix)) return null;
  const [command = '', ...args] = content.slice(prefix.length).trim().split(/\s+/);
  if (!command) return null;
  return { command: command.toLowerCase(), args };
}

export function setupMessageHandler(client: BotClient, context: PrefixCommandContext): void {
  const { prefix, scheduler, sourceUrl } = context;

  client.on(Events.MessageCreate, async (message: Message) => {
    if (message.author.bot) return;

    const parsed = parsePrefixCommand(message.content, prefix);
    if (!parsed) return;

    try {
      switch (parsed.command) {
        case 'check': {
          const outcome = await scheduler.triggerManualCheck();
          await message.reply(formatOutcome(outcome));
          break;
        }
        case 'price': {
          const record = scheduler.getState().lastRecord;
          if (record) {
            await message.reply({ embeds: [createPriceEmbed(record)] });
          } else {
            await message.reply(`No price recorded yet. Try \`${prefix}check\`.`);
          }
          break;
        }
        case 'status':
          await message.reply({ embeds: [createStatusEmbed(scheduler.getStatus(), sourceUrl)] });
          break;
        case 'ping':
          await message.reply(`🏓 Pong! Latency: ${client.ws.ping}ms`);
          break;
        case 'help':
          await message.reply(
            '**Available commands:**\n' +
            `• \`${prefix}check\` - Check the price source now\n` +
            `• \`${prefix}price\` - Show the last recorded price\n` +
            `• \`${prefix}status\` - Show monitor status\n` +
            `• \`${prefix}ping\` - Check bot latency\n\n` +
            'Slash commands: `/check`, `/price`, `/status`, `/monitor`, `/rename`.'
          );
          break;
      }
    } catch (error) {
      logger.error('Message handler error:', error);
      await message.reply('An error occurred processing your request.').catch((replyError: unknown) => {
        logger.error('Could not send error reply:', replyError);
      });
    }
  });
}

import { ActivityType, Events } from 'discord.js';
import { createClient, setupMessageHandler } from './bot.js';
import { ConfigError, loadConfig } from './config.js';
import { StateStore } from './services/state-store.js';
import { PriceFetcher } from './services/price-fetcher.js';
import { DiscordGateway } from './services/chat-gateway.js';
import { Notifier } from './services/notifier.js';
import { PricePipeline } from './monitors/pipeline.js';
import { PriceScheduler } from './monitors/index.js';
import { loadCommands } from './commands/index.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const logger = createLogger('Main');

async function main(): Promise<void> {
  logger.info('Starting Price Channel Bot...');

  const config = loadConfig();
  setLogLevel(config.logLevel);
  logger.info('Configuration loaded');

  const store = new StateStore(config.monitoring.stateFile);
  const initialState = store.load();

  const client = createClient();
  const gateway = new DiscordGateway(client);

  const fetcher = new PriceFetcher(config.source);
  const notifier = new Notifier(gateway, {
    channelId: config.discord.priceChannelId,
    channelNamePrefix: config.monitoring.channelNamePrefix,
  });
  const pipeline = new PricePipeline(fetcher, notifier);
  const scheduler = new PriceScheduler(pipeline, store, initialState, {
    pollIntervalMs: config.monitoring.pollIntervalMs,
  });

  const commands = loadCommands({
    scheduler,
    gateway,
    priceChannelId: config.discord.priceChannelId,
    sourceUrl: config.source.url,
  });
  for (const command of commands) {
    client.commands.set(command.data.name, command);
  }
  logger.info(`Loaded ${commands.length} commands`);

  setupMessageHandler(client, {
    prefix: config.discord.commandPrefix,
    scheduler,
    sourceUrl: config.source.url,
  });

  client.once(Events.ClientReady, (readyClient) => {
    logger.info(`Logged in as ${readyClient.user.tag}`);
    readyClient.user.setActivity(config.discord.statusText, { type: ActivityType.Watching });

    scheduler.start();

    const shutdown = () => {
      logger.info('Shutting down...');
      scheduler.stop();
      client.destroy().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Error while closing the Discord client:', error);
          process.exit(1);
        }
      );
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });

  await client.login(config.discord.token);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error(error.message);
  } else {
    logger.error('Fatal error:', error);
  }
  process.exit(1);
});

import { REST, Routes } from 'discord.js';
import { loadConfig } from './config.js';
import { loadCommands } from './commands/index.js';
import { PriceScheduler } from './monitors/index.js';
import type { CheckPipeline } from './monitors/pipeline.js';
import { emptyPollState } from './services/state-store.js';
import type { ChatGateway } from './services/chat-gateway.js';

// Command definitions only need their builders; nothing here is ever executed.
const idlePipeline: CheckPipeline = {
  run: async (state) => ({ state, outcome: { status: 'not_modified' } }),
};
const idleGateway: ChatGateway = {
  renameChannel: async () => undefined,
  postMessage: async () => undefined,
};

async function deployCommands(): Promise<void> {
  const config = loadConfig();
  const { clientId, guildId } = config.discord;
  if (!clientId) {
    throw new Error('DISCORD_CLIENT_ID is required to deploy commands');
  }

  const scheduler = new PriceScheduler(idlePipeline, { save: () => ({ status: 'ok' }) }, emptyPollState(), {
    pollIntervalMs: config.monitoring.pollIntervalMs,
  });
  const commands = loadCommands({
    scheduler,
    gateway: idleGateway,
    priceChannelId: config.discord.priceChannelId,
    sourceUrl: config.source.url,
  });

  const commandData = commands.map(c => c.data.toJSON());

  const rest = new REST().setToken(config.discord.token);

  console.log(`Deploying ${commandData.length} commands...`);

  if (guildId) {
    await rest.put(Routes.applicationGuildCommands(clientId, guildId), { body: commandData });
    console.log(`Commands deployed to guild ${guildId}`);
  } else {
    await rest.put(Routes.applicationCommands(clientId), { body: commandData });
    console.log('Commands deployed globally (may take up to 1 hour to propagate)');
  }
}

deployCommands().catch((error: unknown) => {
  console.error('Failed to deploy commands:', error);
  process.exit(1);
});

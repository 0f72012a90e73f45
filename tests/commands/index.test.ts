import { describe, it, expect, vi } from 'vitest';
import { PermissionFlagsBits } from 'discord.js';
import { loadCommands } from '../../src/commands/index.js';
import { PriceScheduler } from '../../src/monitors/index.js';
import { emptyPollState } from '../../src/services/state-store.js';
import type { Logger } from '../../src/utils/logger.js';

const silentLogger: Logger = { debug() {}, info() {}, warn() {}, error() {} };

describe('loadCommands', () => {
  const scheduler = new PriceScheduler(
    { run: async state => ({ state, outcome: { status: 'not_modified' } }) },
    { save: () => ({ status: 'ok' }) },
    emptyPollState(),
    { pollIntervalMs: 60_000, logger: silentLogger }
  );
  const commands = loadCommands({
    scheduler,
    gateway: { renameChannel: vi.fn(), postMessage: vi.fn() },
    priceChannelId: '123456789012345678',
    sourceUrl: 'https://prices.example.com/feed',
  });

  it('registers every slash command', () => {
    expect(commands.map(command => command.data.name)).toEqual(['check', 'price', 'status', 'monitor', 'rename']);
  });

  it('restricts channel management commands to Manage Channels', () => {
    const permissionsOf = (json: unknown) =>
      typeof json === 'object' && json !== null && 'default_member_permissions' in json
        ? json.default_member_permissions
        : undefined;

    const restricted = commands
      .filter(command => permissionsOf(command.data.toJSON()) != null)
      .map(command => [command.data.name, permissionsOf(command.data.toJSON())]);

    expect(restricted).toEqual([
      ['monitor', PermissionFlagsBits.ManageChannels.toString()],
      ['rename', PermissionFlagsBits.ManageChannels.toString()],
    ]);
  });
});

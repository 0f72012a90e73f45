import type { Command } from '../bot.js';
import type { PriceScheduler } from '../monitors/index.js';
import type { ChatGateway } from '../services/chat-gateway.js';
import { createCheckCommand } from './check.js';
import { createPriceCommand } from './price.js';
import { createStatusCommand } from './status.js';
import { createMonitorCommand } from './monitor.js';
import { createRenameCommand } from './rename.js';

export interface CommandContext {
  scheduler: PriceScheduler;
  gateway: ChatGateway;
  priceChannelId: string;
  sourceUrl: string;
}

export function loadCommands(context: CommandContext): Command[] {
  return [
    createCheckCommand(context.scheduler),
    createPriceCommand(context.scheduler),
    createStatusCommand(context.scheduler, context.sourceUrl),
    createMonitorCommand(context.scheduler),
    createRenameCommand(context.gateway, context.priceChannelId),
  ];
}

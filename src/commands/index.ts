/**
 * Subcommand handlers, in the order they are registered on the CLI.
 */

import { guildCommand } from './guild.js';
import { webhookCommand } from './webhook.js';
import { messageCommand } from './message.js';
import { channelCommand } from './channel.js';
import { interactionCommand } from './interaction.js';
import type { CommandHandler } from './types.js';

export type { CommandHandler } from './types.js';
export { guildCommand, webhookCommand, messageCommand, channelCommand, interactionCommand };
export { NO_WEBHOOK_MESSAGE } from './interaction.js';

export const COMMANDS: readonly CommandHandler[] = [
  webhookCommand,
  messageCommand,
  channelCommand,
  guildCommand,
  interactionCommand,
];

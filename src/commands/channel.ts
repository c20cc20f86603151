import type { CommandHandler } from './types.js';

export const channelCommand: CommandHandler = {
  name: 'channel',
  description: 'Manage channels',
  project: (config) => ({ ...config.discord.webhooks }),
};

import type { CommandHandler } from './types.js';

export const guildCommand: CommandHandler = {
  name: 'guild',
  description: 'Query guild metadata',
  project: (config) => ({ application_id: config.discord.applicationId }),
};

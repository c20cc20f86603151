import type { CommandHandler } from './types.js';

// Reports only the token's length; the token itself never reaches stdout.
export const messageCommand: CommandHandler = {
  name: 'message',
  description: 'Send or edit messages',
  project: (config) => ({ token_length: config.discord.botToken.length }),
};

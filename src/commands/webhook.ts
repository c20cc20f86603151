import { DEFAULT_WEBHOOK } from '../config/defaults.js';
import type { CommandHandler } from './types.js';

export const webhookCommand: CommandHandler = {
  name: 'webhook',
  description: 'Interact with configured webhooks',
  project: (config) => ({
    default_webhook: config.discord.webhooks[DEFAULT_WEBHOOK] ?? '',
  }),
};

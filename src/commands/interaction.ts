import { DEFAULT_WEBHOOK } from '../config/defaults.js';
import type { DisplayValue } from '../output/index.js';
import type { CommandHandler } from './types.js';

export const NO_WEBHOOK_MESSAGE = 'no webhook configured';

/**
 * Interaction responses go out through a webhook. With any webhook
 * configured this reports the default one, which may be empty.
 */
export const interactionCommand: CommandHandler = {
  name: 'interaction',
  description: 'Respond to interactions',
  project: (config): DisplayValue => {
    const { webhooks } = config.discord;
    if (Object.keys(webhooks).length === 0) {
      return { error: NO_WEBHOOK_MESSAGE };
    }
    return { webhook: webhooks[DEFAULT_WEBHOOK] ?? '' };
  },
};

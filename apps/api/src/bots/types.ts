import type pino from 'pino';
import type { CompletionClient } from '@keyrelay/openrouter';

import type { SessionStore } from '../sessionStore';
import type { TelegramClient, TelegramUpdate } from '../telegram';

export type BotContext = {
  logger: pino.Logger;
  sessions: SessionStore;
  telegram: TelegramClient;
  completion: CompletionClient;
};

// Resolves once the update is fully handled; never rejects.
export type UpdateHandler = (update: TelegramUpdate) => Promise<void>;

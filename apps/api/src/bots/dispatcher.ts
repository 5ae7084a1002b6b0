import {
  chunkText,
  classifyMessage,
  Command,
  DEFAULT_IMAGE_PROMPT,
  EMPTY_KEY_TEXT,
  IMAGE_FETCH_FAILED_TEXT,
  KEY_REMOVED_TEXT,
  KEY_SAVED_TEXT,
  MAX_MESSAGE_LENGTH,
  MISSING_KEY_TEXT,
  SET_API_KEY_TEXT,
  START_TEXT,
} from '@keyrelay/core';

import type { TelegramUpdate } from '../telegram';
import type { BotContext, UpdateHandler } from './types';

/**
 * Sends `text` to `chatId`, split into chunks Telegram accepts. A chunk that
 * fails is logged and the rest are still sent.
 */
export async function sendText(
  ctx: Pick<BotContext, 'telegram' | 'logger'>,
  chatId: number,
  text: string,
): Promise<void> {
  for (const chunk of chunkText(text, MAX_MESSAGE_LENGTH)) {
    try {
      await ctx.telegram.sendMessage(chatId, chunk);
    } catch (err) {
      ctx.logger.error({ err, chatId }, 'Error sending Telegram message');
    }
  }
}

export function createDispatcher(ctx: BotContext): UpdateHandler {
  return async (update) => {
    try {
      await dispatchUpdate(ctx, update);
    } catch (err) {
      ctx.logger.error({ err, updateId: update.update_id }, 'Error handling update');
    }
  };
}

async function dispatchUpdate(ctx: BotContext, update: TelegramUpdate): Promise<void> {
  const { sessions, telegram, completion, logger } = ctx;

  const message = update.message;
  if (!message) return;

  const chatId = message.chat.id;
  const userId = message.from?.id;
  if (userId === undefined) return;

  const action = classifyMessage(
    { text: message.text, caption: message.caption, photo: message.photo },
    { pending: sessions.isPending(userId) },
  );

  logger.debug({ updateId: update.update_id, chatId, userId, kind: action.kind }, 'Dispatching update');

  switch (action.kind) {
    case 'ignore':
      return;

    case 'command':
      switch (action.command) {
        case Command.START:
          await sendText(ctx, chatId, START_TEXT);
          return;
        case Command.SET_API_KEY:
          sessions.markPending(userId);
          await sendText(ctx, chatId, SET_API_KEY_TEXT);
          return;
        case Command.FORGET_KEY:
          sessions.removeCredential(userId);
          sessions.clearPending(userId);
          await sendText(ctx, chatId, KEY_REMOVED_TEXT);
          return;
      }
      return;

    case 'credential':
      sessions.clearPending(userId);
      if (!action.value) {
        await sendText(ctx, chatId, EMPTY_KEY_TEXT);
        return;
      }
      sessions.setCredential(userId, action.value);
      await sendText(ctx, chatId, KEY_SAVED_TEXT);
      return;

    case 'chat': {
      const apiKey = sessions.getCredential(userId);
      if (!apiKey) {
        await sendText(ctx, chatId, MISSING_KEY_TEXT);
        return;
      }

      const reply = await completion.chat(apiKey, action.text);
      await sendText(ctx, chatId, reply);
      return;
    }

    case 'photo': {
      const apiKey = sessions.getCredential(userId);
      if (!apiKey) {
        await sendText(ctx, chatId, MISSING_KEY_TEXT);
        return;
      }

      let imageUrl: string;
      try {
        imageUrl = await telegram.getFileUrl(action.fileId);
      } catch (err) {
        logger.error({ err, fileId: action.fileId }, 'Error getting Telegram file URL');
        await sendText(ctx, chatId, IMAGE_FETCH_FAILED_TEXT);
        return;
      }

      const prompt = action.caption ?? DEFAULT_IMAGE_PROMPT;
      const reply = await completion.vision(apiKey, prompt, imageUrl);
      await sendText(ctx, chatId, reply);
      return;
    }
  }
}

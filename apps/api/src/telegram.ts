import { z } from 'zod';

// Minimal subset of Telegram Bot API updates we care about.
export const TelegramUpdateSchema = z
  .object({
    update_id: z.number().int(),
    message: z
      .object({
        message_id: z.number().int().optional(),
        chat: z.object({ id: z.number().int() }).passthrough(),
        from: z.object({ id: z.number().int() }).passthrough().optional(),
        text: z.string().optional(),
        caption: z.string().optional(),
        photo: z
          .array(
            z
              .object({
                file_id: z.string(),
                width: z.number().optional(),
                height: z.number().optional(),
              })
              .passthrough(),
          )
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

// What getUpdates hands back before each update is validated on its own.
export const RawUpdateSchema = z.object({ update_id: z.number().int() }).passthrough();

export type RawUpdate = z.infer<typeof RawUpdateSchema>;

const TelegramResponseSchema = z
  .object({
    ok: z.boolean(),
    result: z.unknown().optional(),
    description: z.string().optional(),
  })
  .passthrough();

const FileSchema = z.object({ file_path: z.string().min(1) }).passthrough();

export const TELEGRAM_API_BASE_URL = 'https://api.telegram.org';

const CONTROL_TIMEOUT_MS = 20_000;
// getUpdates holds the connection open for its own timeout; allow for it.
const POLL_GRACE_MS = 10_000;

export class TelegramApiError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'TelegramApiError';
  }
}

export interface TelegramClient {
  sendMessage(chatId: number, text: string): Promise<void>;
  getFileUrl(fileId: string): Promise<string>;
  getUpdates(params: { offset: number; timeout: number }): Promise<RawUpdate[]>;
}

export function createTelegramClient(params: { token: string; baseUrl?: string }): TelegramClient {
  const baseUrl = params.baseUrl ?? TELEGRAM_API_BASE_URL;

  async function callTelegram(
    method: string,
    payload: Record<string, unknown>,
    timeoutMs: number,
  ): Promise<unknown> {
    const res = await fetch(`${baseUrl}/bot${params.token}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new TelegramApiError(`Telegram ${method} failed: ${res.status} ${body}`, res.status);
    }

    const parsed = TelegramResponseSchema.safeParse(await res.json());
    if (!parsed.success || !parsed.data.ok) {
      const description = parsed.success ? parsed.data.description : undefined;
      throw new TelegramApiError(`Telegram ${method} error: ${description ?? 'unexpected response'}`, res.status);
    }
    return parsed.data.result;
  }

  return {
    async sendMessage(chatId, text) {
      await callTelegram('sendMessage', { chat_id: chatId, text }, CONTROL_TIMEOUT_MS);
    },

    async getFileUrl(fileId) {
      const result = await callTelegram('getFile', { file_id: fileId }, CONTROL_TIMEOUT_MS);
      const file = FileSchema.safeParse(result);
      if (!file.success) {
        throw new TelegramApiError(`Telegram getFile returned no file_path for ${fileId}`);
      }
      return `${baseUrl}/file/bot${params.token}/${file.data.file_path}`;
    },

    async getUpdates({ offset, timeout }) {
      const result = await callTelegram(
        'getUpdates',
        { offset, timeout, allowed_updates: ['message'] },
        timeout * 1000 + POLL_GRACE_MS,
      );
      return z.array(RawUpdateSchema).parse(result ?? []);
    },
  };
}

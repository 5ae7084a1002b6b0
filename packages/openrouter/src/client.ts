import type pino from 'pino';

import {
  ChatCompletionResponseSchema,
  type ChatCompletionRequest,
  type ChatMessage,
  type CompletionClient,
} from './types';

export const OPENROUTER_URL = 'https://openrouter.ai/api/v1/chat/completions';

export const SYSTEM_PROMPT = 'You are a helpful assistant that can also analyze images.';

const TEXT_TIMEOUT_MS = 90_000;
const VISION_TIMEOUT_MS = 120_000;

export type OpenRouterOptions = {
  model: string;
  referrer?: string | undefined;
  title?: string | undefined;
  url?: string | undefined;
  logger?: pino.Logger | undefined;
};

export function buildHeaders(
  apiKey: string,
  params: { referrer?: string | undefined; title?: string | undefined },
): Record<string, string> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json',
  };
  if (params.referrer) headers['HTTP-Referer'] = params.referrer;
  if (params.title) headers['X-Title'] = params.title;
  return headers;
}

/**
 * Client for the OpenRouter chat-completions endpoint.
 *
 * Neither method throws: failures come back as a reply the caller can show
 * the user as is.
 */
export function createOpenRouterClient(options: OpenRouterOptions): CompletionClient {
  const url = options.url ?? OPENROUTER_URL;

  async function complete(params: {
    apiKey: string;
    messages: ChatMessage[];
    timeoutMs: number;
    failurePrefix: string;
  }): Promise<string> {
    const request: ChatCompletionRequest = { model: options.model, messages: params.messages };
    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: buildHeaders(params.apiKey, options),
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(params.timeoutMs),
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        options.logger?.warn({ status: res.status }, 'OpenRouter returned an error status');
        return `❌ OpenRouter error ${res.status}: ${body}`;
      }

      const parsed = ChatCompletionResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error('OpenRouter response has no choices[0].message.content');
      }
      return parsed.data.choices[0].message.content;
    } catch (err) {
      options.logger?.error({ err }, 'OpenRouter request failed');
      const message = err instanceof Error ? err.message : String(err);
      return `${params.failurePrefix}: ${message}`;
    }
  }

  return {
    chat(apiKey, text) {
      return complete({
        apiKey,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: text },
        ],
        timeoutMs: TEXT_TIMEOUT_MS,
        failurePrefix: '❌ Error talking to Grok',
      });
    },

    vision(apiKey, prompt, imageUrl) {
      return complete({
        apiKey,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: prompt },
              { type: 'image_url', image_url: { url: imageUrl } },
            ],
          },
        ],
        timeoutMs: VISION_TIMEOUT_MS,
        failurePrefix: '❌ Error while analyzing the image',
      });
    },
  };
}

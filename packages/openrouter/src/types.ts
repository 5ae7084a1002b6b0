import { z } from 'zod';

export type ContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export type ChatMessage = {
  role: 'system' | 'user' | 'assistant';
  content: string | ContentPart[];
};

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessage[];
};

// Only the part of the response we read.
export const ChatCompletionResponseSchema = z
  .object({
    choices: z
      .array(
        z
          .object({
            message: z.object({ content: z.string() }).passthrough(),
          })
          .passthrough(),
      )
      .nonempty(),
  })
  .passthrough();

export interface CompletionClient {
  chat(apiKey: string, text: string): Promise<string>;
  vision(apiKey: string, prompt: string, imageUrl: string): Promise<string>;
}

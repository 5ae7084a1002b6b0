import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config({ path: process.env.ENV_FILE ?? '.env' });

// Blank optional values count as unset.
const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1),
  OPENROUTER_MODEL: z.string().trim().min(1).default('x-ai/grok-4.1-fast:free'),
  OPENROUTER_REFERRER: optionalText.pipe(z.string().url().optional()),
  OPENROUTER_TITLE: z
    .string()
    .default('Telegram Grok Vision Bot')
    .transform((v) => (v.trim() ? v.trim() : undefined)),
  DELIVERY_MODE: z.enum(['webhook', 'polling']).default('webhook'),
  PORT: z.coerce.number().int().positive().default(3000),
  POLL_TIMEOUT_SECONDS: z.coerce.number().int().min(0).max(50).default(30),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Env = z.infer<typeof EnvSchema>;

export function getEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    // Keep this readable in logs.
    const message = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid environment:\n${message}`);
  }
  return parsed.data;
}

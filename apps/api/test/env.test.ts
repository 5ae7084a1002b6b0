import { describe, expect, it } from 'vitest';

import { getEnv } from '../src/env';

describe('getEnv', () => {
  it('applies defaults', () => {
    const env = getEnv({ TELEGRAM_BOT_TOKEN: 'test-token' });

    expect(env).toEqual({
      TELEGRAM_BOT_TOKEN: 'test-token',
      OPENROUTER_MODEL: 'x-ai/grok-4.1-fast:free',
      OPENROUTER_REFERRER: undefined,
      OPENROUTER_TITLE: 'Telegram Grok Vision Bot',
      DELIVERY_MODE: 'webhook',
      PORT: 3000,
      POLL_TIMEOUT_SECONDS: 30,
      LOG_LEVEL: 'info',
    });
  });

  it('fails without a bot token', () => {
    expect(() => getEnv({})).toThrow(/^Invalid environment:\nTELEGRAM_BOT_TOKEN: /);
  });

  it('treats blank optional headers as unset', () => {
    const env = getEnv({ TELEGRAM_BOT_TOKEN: 'test-token', OPENROUTER_REFERRER: ' ', OPENROUTER_TITLE: '' });

    expect(env.OPENROUTER_REFERRER).toBeUndefined();
    expect(env.OPENROUTER_TITLE).toBeUndefined();
  });

  it('reads polling settings', () => {
    const env = getEnv({
      TELEGRAM_BOT_TOKEN: 'test-token',
      DELIVERY_MODE: 'polling',
      POLL_TIMEOUT_SECONDS: '10',
      OPENROUTER_REFERRER: 'https://example.com',
    });

    expect(env.DELIVERY_MODE).toBe('polling');
    expect(env.POLL_TIMEOUT_SECONDS).toBe(10);
    expect(env.OPENROUTER_REFERRER).toBe('https://example.com');
  });

  it('rejects an unknown delivery mode', () => {
    expect(() => getEnv({ TELEGRAM_BOT_TOKEN: 'test-token', DELIVERY_MODE: 'push' })).toThrow(/DELIVERY_MODE/);
  });
});

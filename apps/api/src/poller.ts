import { setTimeout as sleep } from 'node:timers/promises';
import type pino from 'pino';

import type { UpdateHandler } from './bots/types';
import { TelegramUpdateSchema, type TelegramClient } from './telegram';

const DEFAULT_RETRY_DELAY_MS = 1000;

/**
 * Pull-mode delivery: long-polls getUpdates and hands each update to the
 * dispatcher one at a time. The next fetch waits until every update in the
 * current batch has been handled.
 */
export class Poller {
  private offset = 0;
  private running = false;

  constructor(
    private readonly params: {
      telegram: TelegramClient;
      handleUpdate: UpdateHandler;
      logger: pino.Logger;
      timeoutSeconds: number;
      retryDelayMs?: number;
    },
  ) {}

  get nextOffset(): number {
    return this.offset;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Polls until `stop()` is called. Fetch failures are logged and retried. */
  async start(): Promise<void> {
    const { logger } = this.params;
    this.running = true;
    logger.info({ timeoutSeconds: this.params.timeoutSeconds }, 'Polling for updates');

    while (this.running) {
      try {
        await this.runOnce();
      } catch (err) {
        logger.error({ err, offset: this.offset }, 'Error fetching updates');
        if (this.running) await sleep(this.params.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
      }
    }
  }

  // Takes effect once the in-flight getUpdates call returns.
  stop(): void {
    this.running = false;
  }

  /** Fetches one batch and handles it in order. Returns the batch size. */
  async runOnce(): Promise<number> {
    const { telegram, handleUpdate, logger, timeoutSeconds } = this.params;

    const updates = await telegram.getUpdates({ offset: this.offset, timeout: timeoutSeconds });
    for (const raw of updates) {
      this.offset = raw.update_id + 1;

      const parsed = TelegramUpdateSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn({ updateId: raw.update_id, issues: parsed.error.issues }, 'Ignoring malformed update');
        continue;
      }

      logger.debug({ updateId: raw.update_id }, 'Received update');
      await handleUpdate(parsed.data);
    }
    return updates.length;
  }
}

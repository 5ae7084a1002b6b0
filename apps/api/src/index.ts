import { createOpenRouterClient } from '@keyrelay/openrouter';

import { createApp } from './app';
import { createDispatcher } from './bots/dispatcher';
import { getEnv } from './env';
import { createLogger } from './logger';
import { Poller } from './poller';
import { InMemorySessionStore } from './sessionStore';
import { createTelegramClient } from './telegram';

const env = getEnv();
const logger = createLogger(env.LOG_LEVEL);

const telegram = createTelegramClient({ token: env.TELEGRAM_BOT_TOKEN });
const completion = createOpenRouterClient({
  model: env.OPENROUTER_MODEL,
  referrer: env.OPENROUTER_REFERRER,
  title: env.OPENROUTER_TITLE,
  logger,
});

const handleUpdate = createDispatcher({
  logger,
  sessions: new InMemorySessionStore(),
  telegram,
  completion,
});

if (env.DELIVERY_MODE === 'polling') {
  const poller = new Poller({ telegram, handleUpdate, logger, timeoutSeconds: env.POLL_TIMEOUT_SECONDS });

  const shutdown = () => {
    logger.info('Stopping poller');
    poller.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  poller.start().catch((err: unknown) => {
    logger.fatal({ err }, 'Poller crashed');
    process.exitCode = 1;
  });
} else {
  const app = createApp({ logger, handleUpdate });
  const server = app.listen(env.PORT, () => {
    logger.info(`API listening on http://localhost:${env.PORT}`);
  });

  const shutdown = () => {
    logger.info('Closing HTTP server');
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

import express from "express";
import type pino from "pino";

import type { UpdateHandler } from "./bots/types";
import { RecentUpdateIds } from "./recentUpdates";
import { TelegramUpdateSchema } from "./telegram";

const WEBHOOK_PATH = "/webhook";

// Telegram only needs a quick 200; anything else makes it redeliver.
const ACK = { ok: true } as const;

export function createApp(params: {
  logger: pino.Logger;
  handleUpdate: UpdateHandler;
  recentUpdates?: RecentUpdateIds;
}): express.Express {
  const { logger, handleUpdate } = params;
  const recentUpdates = params.recentUpdates ?? new RecentUpdateIds();

  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.post(WEBHOOK_PATH, async (req, res) => {
    const parsed = TelegramUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues }, "Ignoring malformed update");
      return res.status(200).json(ACK);
    }

    const update = parsed.data;
    logger.info({ updateId: update.update_id }, "Received update");

    if (recentUpdates.seen(update.update_id)) {
      logger.info({ updateId: update.update_id }, "Skipping redelivered update");
      return res.status(200).json(ACK);
    }

    await handleUpdate(update);
    return res.status(200).json(ACK);
  });

  app.get("/", (_req, res) => {
    res.json({ status: "ok", message: "Grok vision bot is running" });
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use(
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    (err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (req.path === WEBHOOK_PATH) {
        // Usually a body that is not JSON at all.
        logger.warn({ err }, "Ignoring unreadable webhook request");
        res.status(200).json(ACK);
        return;
      }

      const statusCandidate =
        typeof err === "object" && err !== null && "status" in err ? err.status : undefined;
      const status = typeof statusCandidate === "number" ? statusCandidate : 500;
      const message = err instanceof Error ? err.message : "Unknown error";
      if (status >= 500) logger.error({ err }, "Request failed");
      res.status(status).json({ ok: false, error: message });
    },
  );

  return app;
}

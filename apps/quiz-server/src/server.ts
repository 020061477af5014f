/**
 * Webhook HTTP server.
 *
 * GET  /api/webhook  subscription handshake
 * POST /api/webhook  inbound events; always acknowledged with 200
 * GET  /api/health   liveness
 *
 * In sync mode the acknowledgement waits until every extracted message has
 * been processed. In async mode it goes out first and processing continues in
 * the background.
 */
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { Config, DeliveryModes, type DeliveryMode } from '@chat-quiz/shared-types';
import { processPlayerMessage, type GameApplicationContext } from '@chat-quiz/quiz-engine';
import { describeError, log } from '@chat-quiz/logger';
import { extractMessages, toPlayerMessage, verifySubscription, type TextMessage } from './webhook';

export interface WebhookServerOptions {
  verifyToken: string;
  deliveryMode: DeliveryMode;
}

/** Processes messages one after another. A failure is logged and never stops the rest. */
export async function processMessages(messages: TextMessage[], ctx: GameApplicationContext): Promise<void> {
  for (const message of messages) {
    try {
      await processPlayerMessage(toPlayerMessage(message), ctx);
    } catch (err) {
      log('ERROR', 'Message processing failed', {
        layer: 'SERVER',
        channelId: message.to,
        playerId: message.from,
        ...describeError(err),
      });
    }
  }
}

/** HTTP status of an http-errors style error; 500 for anything else. */
export function errorStatus(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err) {
    const { status } = err;
    if (typeof status === 'number' && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}

export function createWebhookServer(ctx: GameApplicationContext, options: WebhookServerOptions): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use((req, _res, next) => {
    log('DEBUG', 'Request', { layer: 'SERVER', method: req.method, path: req.path });
    next();
  });

  app.get(Config.server.webhookPath, (req: Request, res: Response) => {
    const challenge = verifySubscription(req.query, options.verifyToken);
    if (challenge === undefined) {
      log('WARN', 'Webhook subscription refused', { layer: 'SERVER', mode: req.query['hub.mode'] });
      res.sendStatus(403);
      return;
    }
    log('INFO', 'Webhook subscription confirmed', { layer: 'SERVER' });
    res.status(200).type('text/plain').send(challenge);
  });

  app.post(Config.server.webhookPath, express.json(), async (req: Request, res: Response) => {
    const messages = extractMessages(req.body);
    if (messages.length > 0) {
      log('DEBUG', 'Webhook event', { layer: 'SERVER', messages: messages.length });
    }

    if (options.deliveryMode === DeliveryModes.SYNC) {
      await processMessages(messages, ctx);
      res.sendStatus(200);
      return;
    }

    res.sendStatus(200);
    processMessages(messages, ctx).catch((err: unknown) => {
      log('ERROR', 'Background processing failed', { layer: 'SERVER', ...describeError(err) });
    });
  });

  app.get(Config.server.healthPath, (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use((_req: Request, res: Response) => {
    res.sendStatus(404);
  });

  // Body parser failures (malformed JSON, oversized body) carry their own status
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    log(status >= 500 ? 'ERROR' : 'WARN', 'Rejected request', { layer: 'SERVER', status, ...describeError(err) });
    res.sendStatus(status);
  });

  return app;
}

import express, { ErrorRequestHandler, Express } from 'express';
import { WebhookOrchestrator } from '../../application/services/WebhookOrchestrator.js';

/**
 * The webhook answers 200 no matter what happened. The transport retries anything
 * else, and a retried delivery would store the expense twice.
 */
export const createWebhookApp = (orchestrator: WebhookOrchestrator): Express => {
  const app = express();

  app.use(express.json({ limit: '2mb' }));

  app.get('/', (req, res) => {
    res.json({
      status: 'Service is running',
      message: 'Listening for POST requests from Telegram...',
    });
  });

  app.post('/', async (req, res) => {
    const outcome = await orchestrator.handleUpdate(req.body);
    res.status(200).json(outcome);
  });

  const acknowledgeBrokenBody: ErrorRequestHandler = (error, req, res, next) => {
    if (res.headersSent) {
      return next(error);
    }

    const message = error instanceof Error ? error.message : 'Unreadable request';
    console.error(`❌ Webhook request rejected before handling: ${message}`);
    res.status(200).json({ status: 'error', message });
  };

  app.use(acknowledgeBrokenBody);

  return app;
};

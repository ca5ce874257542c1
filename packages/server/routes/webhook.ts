import express, { Router, Request, Response } from 'express';
import type { WebhookResponse, CallbackResponse } from '@survey-transcription/shared';
import { TranscriptionOrchestrator } from '../services/TranscriptionOrchestrator.js';
import { log } from '../lib/logger.js';
import { toError } from '../lib/errors.js';

/**
 * POST /webhook
 * Receives survey platform events and provider job notifications.
 * Always answers 200 so neither sender retries; failures are reported in the body.
 */
export function createWebhookRouter(orchestrator: TranscriptionOrchestrator): Router {
  const router: Router = express.Router();

  router.post('/', async (req: Request, res: Response): Promise<void> => {
    let body: WebhookResponse | CallbackResponse;
    try {
      body = await orchestrator.handleWebhook(req.body);
    } catch (error) {
      const failure = toError(error);
      log.error('webhook', 'Webhook processing failed', failure);
      body = { status: 'processed', errors: [{ error: failure.message }], jobs: [] };
    }
    res.status(200).json(body);
  });

  return router;
}

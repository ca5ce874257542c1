import express, { Router, Request, Response } from 'express';
import { isObject } from '@survey-transcription/shared';
import { TranscriptionOrchestrator } from '../services/TranscriptionOrchestrator.js';
import { asyncHandler } from '../middleware/error.js';
import { ValidationError } from '../lib/errors.js';

/**
 * Manual submission endpoints
 * Errors propagate to the error middleware, which maps them to 400/500/502/504.
 */
export function createManualRouter(orchestrator: TranscriptionOrchestrator): Router {
  const router: Router = express.Router();

  /**
   * POST /manual/transcribe
   * Body: { media_url, email, question?, wait_for_completion?, max_wait_time? }
   */
  router.post('/transcribe', asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const result = await orchestrator.transcribe(req.body);
    res.status(200).json(result);
  }));

  // GET /manual/status/:jobId
  router.get('/status/:jobId', asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const result = await orchestrator.getJobStatus(req.params.jobId);
    res.status(200).json(result);
  }));

  /**
   * POST /manual/batch
   * Body: { requests: [...] }; each entry is validated and submitted on its own
   */
  router.post('/batch', asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    const requests = isObject(body) ? body.requests : undefined;
    if (!Array.isArray(requests) || requests.length === 0) {
      throw new ValidationError('requests array is required');
    }

    const result = await orchestrator.submitBatch(requests);
    res.status(200).json(result);
  }));

  return router;
}

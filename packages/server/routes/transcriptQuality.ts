import express, { Router, Request, Response } from 'express';
import { TranscriptionOrchestrator } from '../services/TranscriptionOrchestrator.js';
import { log } from '../lib/logger.js';
import { toError } from '../lib/errors.js';

/**
 * GET /transcript/quality/:jobId
 * Acoustic quality report for a job; provider failures answer 502
 */
export function createTranscriptQualityRouter(orchestrator: TranscriptionOrchestrator): Router {
  const router: Router = express.Router();

  router.get('/:jobId', async (req: Request, res: Response): Promise<void> => {
    const { jobId } = req.params;
    try {
      const report = await orchestrator.getQualityReport(jobId);
      res.status(200).json(report);
    } catch (error) {
      const failure = toError(error);
      log.error('transcription', 'Quality report failed', failure, { job_id: jobId });
      res.status(502).json({ status: 'error', error: failure.message });
    }
  });

  return router;
}

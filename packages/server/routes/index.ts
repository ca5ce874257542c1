import express, { Router } from 'express';
import { API_ENDPOINTS } from '@survey-transcription/shared';
import { TranscriptionOrchestrator } from '../services/TranscriptionOrchestrator.js';
import { createWebhookRouter } from './webhook.js';
import { createTranscriptQualityRouter } from './transcriptQuality.js';
import { createManualRouter } from './manual.js';
import { createHealthRouter, HealthDependencies } from './health.js';

export interface RouteDependencies {
  orchestrator: TranscriptionOrchestrator;
  health: HealthDependencies;
}

export function createRoutes(deps: RouteDependencies): Router {
  const router: Router = express.Router();

  router.use(API_ENDPOINTS.WEBHOOK, createWebhookRouter(deps.orchestrator));                       // Survey events and provider callbacks
  router.use(API_ENDPOINTS.TRANSCRIPT_QUALITY, createTranscriptQualityRouter(deps.orchestrator));  // Acoustic quality reports
  router.use('/manual', createManualRouter(deps.orchestrator));                                    // Manual and batch submission
  router.use(API_ENDPOINTS.HEALTH, createHealthRouter(deps.health));                              // Health check

  return router;
}

import express, { Application } from 'express';
import cors from 'cors';
import { ServiceConfig } from './config/serviceConfig.js';
import { TranscriptionClient } from './lib/clients/transcriptionClient.js';
import { GoogleSheetsClient } from './lib/db/googleSheetsClient.js';
import { ResultStore } from './lib/db/resultStore.js';
import { estimateMediaQuality } from './lib/mediaQuality.js';
import { CompromiseParser } from './lib/nlp/compromiseParser.js';
import { loadStopwords } from './lib/nlp/stopwords.js';
import { TextAnalyzer } from './lib/textAnalyzer.js';
import { TranscriptionOrchestrator } from './services/TranscriptionOrchestrator.js';
import { createRoutes, RouteDependencies } from './routes/index.js';
import { errorHandler, notFoundHandler } from './middleware/error.js';

/**
 * Wire the production components from configuration
 * Without a spreadsheet id the store is built unconfigured and every upsert reports false.
 */
export function createDependencies(config: ServiceConfig): RouteDependencies {
  const provider = new TranscriptionClient({
    apiUrl: config.transcriptionApiUrl,
    apiKey: config.transcriptionApiKey,
    supportedFormats: config.supportedFormats,
    pollIntervalMs: config.pollIntervalMs,
    maxWaitTimeMs: config.maxWaitTimeSeconds * 1000,
  });

  const sheets = config.spreadsheetId
    ? new GoogleSheetsClient(config.spreadsheetId, config.credentialsPath)
    : null;
  const store = new ResultStore(sheets, {
    sheetName: config.sheetName,
    emailColumn: config.emailColumn,
    questionColumns: config.questionColumns,
  });

  const orchestrator = new TranscriptionOrchestrator({
    config,
    provider,
    analyzer: new TextAnalyzer(new CompromiseParser(), loadStopwords()),
    store,
    estimateMediaQuality,
  });

  return {
    orchestrator,
    health: {
      transcriptionConfigured: Boolean(config.transcriptionApiKey),
      storageConfigured: store.configured,
    },
  };
}

/**
 * Build the Express application around already-wired components
 */
export function createApp(deps: RouteDependencies): Application {
  const app: Application = express();

  app.use(cors());
  app.use(express.json());

  app.use('/', createRoutes(deps));

  // Add 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}

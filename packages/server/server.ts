import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { getConfigSummary, getServiceConfig } from './config/serviceConfig.js';
import { log } from './lib/logger.js';
import { toError } from './lib/errors.js';
import { createApp, createDependencies } from './app.js';

// Get __dirname equivalent in ES modules
const __filename: string = fileURLToPath(import.meta.url);
const __dirname: string = path.dirname(__filename);

// Load environment variables
// Priority: 1) .env.local (for local dev overrides) 2) .env (default)
// In production env vars are injected by the platform so these files are ignored.
dotenv.config({ path: path.join(__dirname, '../../.env') });
dotenv.config({ path: path.join(__dirname, '../../.env.local'), override: true });

const startServer = (): void => {
  try {
    const config = getServiceConfig();
    const app = createApp(createDependencies(config));

    app.listen(config.port, (): void => {
      log.info('system', `Server running on http://localhost:${config.port}`, {
        environment: process.env.NODE_ENV || 'development',
        ...getConfigSummary(config)
      });

      if (!config.transcriptionApiKey) {
        log.warn('system', 'TRANSCRIPTION_API_KEY is not set; submissions will be rejected per item');
      }
      if (!config.callbackUrl) {
        log.warn('system', 'WEBHOOK_CALLBACK_URL is not set; only synchronous waits can complete jobs');
      }
    });
  } catch (error) {
    log.error('system', 'Failed to start server', toError(error));
    process.exit(1);
  }
};

startServer();

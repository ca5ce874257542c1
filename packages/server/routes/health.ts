import express, { Router, Request, Response } from 'express';
import { HealthCheckResponse } from '@survey-transcription/shared';

export interface HealthDependencies {
    transcriptionConfigured: boolean;
    storageConfigured: boolean;
}

/**
 * Health check endpoint
 * GET /healthz
 * Reports whether the provider credential and the spreadsheet are configured
 */
export function createHealthRouter(deps: HealthDependencies): Router {
    const router: Router = express.Router();

    router.get('/', (_req: Request, res: Response): void => {
        const startTime: number = Date.now();

        const uptimeMs: number = process.uptime() * 1000;
        const version: string | undefined = process.env.npm_package_version;

        const healthResponse: HealthCheckResponse = {
            status: 'healthy',
            timestamp: new Date().toISOString(),
            uptime: uptimeMs,
            ...(version && { version }),
            services: {
                transcription: deps.transcriptionConfigured ? 'configured' : 'unconfigured',
                storage: deps.storageConfigured ? 'configured' : 'unconfigured'
            }
        };

        const responseTime: number = Date.now() - startTime;
        res.set('X-Response-Time', `${responseTime}ms`);

        res.status(200).json(healthResponse);
    });

    return router;
}

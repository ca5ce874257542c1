/**
 * Unit tests for packages/server/routes/health.ts
 * Tests the health check endpoint
 */

import { describe, it, expect } from 'vitest'
import request from 'supertest'
import express from 'express'
import type { HealthCheckResponse } from '@survey-transcription/shared'
import { createHealthRouter } from '../health.js'

const buildApp = (transcriptionConfigured: boolean, storageConfigured: boolean) => {
  const app = express()
  app.use('/healthz', createHealthRouter({ transcriptionConfigured, storageConfigured }))
  return app
}

describe('Health Check Route (/healthz)', () => {
  it('should return 200 OK with service availability', async () => {
    const response = await request(buildApp(true, true)).get('/healthz')

    expect(response.status).toBe(200)

    const body = response.body as HealthCheckResponse
    expect(body).toMatchObject({
      status: 'healthy',
      timestamp: expect.any(String),
      uptime: expect.any(Number),
      services: {
        transcription: 'configured',
        storage: 'configured',
      },
    })

    // Verify timestamp is a valid ISO string
    expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp)
    expect(body.uptime).toBeGreaterThan(0)
    expect(response.headers['x-response-time']).toMatch(/^\d+ms$/)
  })

  it('should report unconfigured services without failing', async () => {
    const response = await request(buildApp(false, false)).get('/healthz')

    expect(response.status).toBe(200)
    expect((response.body as HealthCheckResponse).services).toEqual({
      transcription: 'unconfigured',
      storage: 'unconfigured',
    })
  })
})

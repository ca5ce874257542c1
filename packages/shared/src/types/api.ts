/**
 * API-related type definitions for HTTP requests and responses
 * Covers the webhook, manual submission and status endpoints
 */

import { JobStatus } from './transcript.js';
import { MergedQualityReport } from './quality.js';

// Base response types
export interface ApiResponse<T = unknown> {
  success: boolean
  data?: T
  error?: string
  message?: string
  timestamp?: string
}

// Error response type for consistent error handling
export interface ApiErrorResponse extends ApiResponse {
  success: false
  error: string
  code?: string
  details?: unknown
  stack?: string
}

// Health check API types
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy'
  timestamp: string
  uptime: number
  version?: string
  services?: {
    transcription: 'configured' | 'unconfigured'
    storage: 'configured' | 'unconfigured'
  }
}

// Webhook API types
export interface WebhookItemError {
  media_url?: string
  error: string
}

export interface SubmittedJobRef {
  media_url: string
  job_id: string
}

export interface WebhookResponse {
  status: 'processed'
  errors: WebhookItemError[]
  jobs: SubmittedJobRef[]
}

export interface CallbackResponse {
  status: 'stored' | 'not_stored' | 'failed' | 'acknowledged'
  job_id: string
  job_status: JobStatus
  error?: string
}

// Manual transcription API types
export interface ManualTranscriptionRequest {
  media_url: string
  email: string
  question?: string
  wait_for_completion?: boolean
  max_wait_time?: number        // Seconds
}

export type ManualTranscriptionResponse =
  | {
      status: 'completed'
      job_id: string
      transcript: string
      quality_metrics: MergedQualityReport
      stored: boolean
    }
  | {
      status: JobStatus
      job_id: string
      message: string
    }

export type JobStatusResponse =
  | {
      status: 'completed'
      job_id: string
      transcript: string
      quality_metrics: MergedQualityReport
    }
  | {
      status: JobStatus
      job_id: string
      failure_detail?: string
    }

// Batch API types
export type BatchResultEntry =
  | { media_url?: string; job_id: string; status: JobStatus }
  | { media_url?: string; error: string; status: 'error' }

export interface BatchTranscriptionResponse {
  results: BatchResultEntry[]
  total: number
  failed: number
}

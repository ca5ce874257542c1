import { JobStatus, TERMINAL_JOB_STATUSES } from './types/index.js';

// Endpoint paths served by the transcription service
export const API_ENDPOINTS = Object.freeze({
  WEBHOOK: '/webhook',
  TRANSCRIPT_QUALITY: '/transcript/quality',
  MANUAL_TRANSCRIBE: '/manual/transcribe',
  MANUAL_STATUS: '/manual/status',
  MANUAL_BATCH: '/manual/batch',
  HEALTH: '/healthz'
} as const);

// Type for API endpoints
export type ApiEndpoint = typeof API_ENDPOINTS[keyof typeof API_ENDPOINTS];

/**
 * Whether a job has reached a state the provider will not leave
 */
export function isTerminalJobStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

// Export all types
export * from './types/index.js';

/**
 * Error taxonomy for the transcription pipeline
 *
 * Every error carries the HTTP status and machine-readable code the error
 * middleware turns into an API response.
 */

export abstract class ServiceError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/** Bad caller input such as a missing field or unsupported media format */
export class ValidationError extends ServiceError {
  readonly statusCode = 400;
  readonly code = 'VALIDATION_ERROR';
}

/** Missing credential or completion path; fails fast and is never retried */
export class ConfigurationError extends ServiceError {
  readonly statusCode = 500;
  readonly code = 'CONFIGURATION_ERROR';
}

/**
 * Transport or HTTP failure talking to the speech-to-text provider.
 * `transient` is true for network errors, 429 and 5xx responses.
 */
export class ProviderError extends ServiceError {
  readonly statusCode = 502;
  readonly code = 'PROVIDER_ERROR';
  readonly providerStatus?: number;
  readonly transient: boolean;

  constructor(message: string, options: { providerStatus?: number; transient?: boolean; details?: unknown } = {}) {
    super(message, options.details);
    this.providerStatus = options.providerStatus;
    this.transient = options.transient ?? isTransientStatus(options.providerStatus);
  }
}

/** Synchronous wait ceiling elapsed before the job reached a terminal state */
export class TimeoutError extends ServiceError {
  readonly statusCode = 504;
  readonly code = 'JOB_TIMEOUT';
  readonly jobId: string;

  constructor(jobId: string, waitedMs: number) {
    super(`Transcription job ${jobId} did not complete within ${Math.round(waitedMs / 1000)} seconds`);
    this.jobId = jobId;
  }
}

/** The provider reported the job as failed */
export class JobFailedError extends ServiceError {
  readonly statusCode = 502;
  readonly code = 'JOB_FAILED';
  readonly jobId: string;
  readonly failureDetail: string;

  constructor(jobId: string, failureDetail: string) {
    super(`Transcription job ${jobId} failed: ${failureDetail}`, { failure_detail: failureDetail });
    this.jobId = jobId;
    this.failureDetail = failureDetail;
  }
}

/** Result store transport failure; the store converts it to `false` */
export class StoreError extends ServiceError {
  readonly statusCode = 500;
  readonly code = 'STORE_ERROR';
}

export function isTransientStatus(status: number | undefined): boolean {
  if (status === undefined) {
    return true;
  }
  return status === 429 || status >= 500;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

import {
  CallbackNotification,
  JobDetails,
  JobMetadata,
  JobStatus,
  Monologue,
  Transcript,
  TranscriptElement,
  isNumber,
  isObject,
  isString,
  isTerminalJobStatus,
  optionalString,
} from '@survey-transcription/shared';
import { logger } from '../logger.js';
import { debugTranscription } from '../debugLogger.js';
import { ConfigurationError, JobFailedError, ProviderError, TimeoutError, ValidationError, toError } from '../errors.js';
import { validateMediaFormat } from '../mediaFormat.js';

/**
 * Job reference returned by a successful submission
 */
export interface JobHandle {
  job_id: string;
  status: JobStatus;
  created_on?: string;
}

export interface SubmitOptions {
  /** Where the provider should POST its completion notification */
  callbackUrl?: string;
  /** The caller will poll for completion instead of relying on a callback */
  waitForCompletion?: boolean;
}

export interface WaitOptions {
  maxWaitTimeMs?: number;
  pollIntervalMs?: number;
}

/**
 * Operations the orchestrator needs from a speech-to-text provider
 */
export interface TranscriptionProvider {
  submit(mediaUrl: string, metadata: JobMetadata, options?: SubmitOptions): Promise<JobHandle>;
  pollStatus(jobId: string): Promise<JobDetails>;
  fetchTranscript(jobId: string): Promise<Transcript>;
  parseCallback(payload: unknown): CallbackNotification;
  waitForCompletion(jobId: string, options?: WaitOptions): Promise<JobDetails>;
}

/**
 * Configuration for the TranscriptionClient
 */
export interface TranscriptionClientConfig {
  apiUrl: string;
  apiKey?: string;
  supportedFormats: ReadonlySet<string>;
  /** Per-request timeout in milliseconds */
  requestTimeoutMs?: number;
  /** Defaults for waitForCompletion */
  pollIntervalMs?: number;
  maxWaitTimeMs?: number;
  /** Delay implementation, replaced in tests */
  sleep?: (ms: number) => Promise<void>;
  /** Clock, replaced in tests */
  now?: () => number;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
const DEFAULT_POLL_INTERVAL_MS = 10000;
const DEFAULT_MAX_WAIT_TIME_MS = 300000;

const METADATA_KEYS = [
  'email',
  'question',
  'media_url',
  'interaction_id',
  'answer_id',
  'share_id',
  'answer_type',
  'contact_name',
] as const;

/**
 * Client for a REST speech-to-text job API
 *
 * Jobs are created with `POST /jobs`, observed with `GET /jobs/{id}` and their
 * transcript read from `GET /jobs/{id}/transcript`. Survey correlation data
 * rides along in the job's metadata string so a callback can be matched back
 * to the contact and question without a local job table.
 *
 * Every response is decoded by an explicit parser; a payload that does not
 * match the expected shape surfaces as a ProviderError.
 *
 * Usage:
 * ```typescript
 * const client = new TranscriptionClient({
 *   apiUrl: config.transcriptionApiUrl,
 *   apiKey: config.transcriptionApiKey,
 *   supportedFormats: config.supportedFormats,
 * });
 * const handle = await client.submit(mediaUrl, metadata, { waitForCompletion: true });
 * await client.waitForCompletion(handle.job_id, { maxWaitTimeMs: 60000 });
 * const transcript = await client.fetchTranscript(handle.job_id);
 * ```
 */
export class TranscriptionClient implements TranscriptionProvider {
  private readonly config: TranscriptionClientConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(config: TranscriptionClientConfig) {
    this.config = config;
    this.sleep = config.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.now = config.now ?? Date.now;

    debugTranscription('TranscriptionClient initialized', {
      apiUrl: config.apiUrl,
      hasApiKey: !!config.apiKey,
      formats: [...config.supportedFormats],
    });
  }

  /**
   * Submit a media URL for transcription
   *
   * @throws ValidationError if the media format is not supported
   * @throws ConfigurationError if no credential is configured, or if the job
   *         would have no completion path (no callback URL and no synchronous wait)
   * @throws ProviderError on transport failure or a non-2xx response
   */
  async submit(mediaUrl: string, metadata: JobMetadata, options: SubmitOptions = {}): Promise<JobHandle> {
    const validation = validateMediaFormat(mediaUrl, this.config.supportedFormats);
    if (!validation.isValid) {
      throw new ValidationError(validation.reason, { media_url: mediaUrl });
    }

    if (!this.config.apiKey) {
      throw new ConfigurationError('Transcription API key is not configured');
    }

    if (!options.callbackUrl && !options.waitForCompletion) {
      throw new ConfigurationError(
        'No completion path: set WEBHOOK_CALLBACK_URL or request wait_for_completion'
      );
    }

    const body: Record<string, unknown> = {
      media_url: mediaUrl,
      metadata: JSON.stringify(metadata),
    };
    if (options.callbackUrl) {
      body.notification_config = { url: options.callbackUrl, method: 'POST' };
    }

    const payload = await this.request('submit', 'POST', '/jobs', body);
    const job = parseJobResource(payload);

    logger.info('transcription', 'Transcription job submitted', {
      component: 'transcription_client',
      job_id: job.job_id,
      metadata: { media_url: mediaUrl, status: job.status, callback: !!options.callbackUrl },
    });

    const handle: JobHandle = { job_id: job.job_id, status: job.status };
    if (job.created_on) {
      handle.created_on = job.created_on;
    }
    return handle;
  }

  /**
   * Read the current state of a job
   */
  async pollStatus(jobId: string): Promise<JobDetails> {
    const payload = await this.request('poll_status', 'GET', `/jobs/${encodeURIComponent(jobId)}`);
    return parseJobResource(payload);
  }

  /**
   * Download the transcript of a completed job
   * The provider rejects this call before completion, which surfaces as a ProviderError.
   */
  async fetchTranscript(jobId: string): Promise<Transcript> {
    const payload = await this.request(
      'fetch_transcript',
      'GET',
      `/jobs/${encodeURIComponent(jobId)}/transcript`,
      undefined,
      'application/vnd.rev.transcript.v1.0+json'
    );
    return parseTranscript(payload);
  }

  parseCallback(payload: unknown): CallbackNotification {
    return parseCallbackPayload(payload);
  }

  /**
   * Poll a job until it reaches a terminal state
   *
   * @returns Job details once the job has completed
   * @throws TimeoutError when the wait ceiling elapses first
   * @throws JobFailedError when the provider reports the job as failed
   */
  async waitForCompletion(jobId: string, options: WaitOptions = {}): Promise<JobDetails> {
    const maxWaitTimeMs = options.maxWaitTimeMs ?? this.config.maxWaitTimeMs ?? DEFAULT_MAX_WAIT_TIME_MS;
    const pollIntervalMs = options.pollIntervalMs ?? this.config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const startedAt = this.now();

    for (;;) {
      const details = await this.pollStatus(jobId);

      if (isTerminalJobStatus(details.status)) {
        if (details.status === 'failed') {
          throw new JobFailedError(jobId, details.failure_detail ?? 'Unknown failure');
        }
        return details;
      }

      // The last poll lands on the ceiling, never past it
      const elapsed = this.now() - startedAt;
      if (elapsed >= maxWaitTimeMs) {
        throw new TimeoutError(jobId, maxWaitTimeMs);
      }

      debugTranscription('Job still running, waiting before next poll', {
        jobId,
        status: details.status,
        elapsedMs: elapsed,
      });
      await this.sleep(Math.min(pollIntervalMs, maxWaitTimeMs - elapsed));
    }
  }

  private async request(
    operation: string,
    method: 'GET' | 'POST',
    path: string,
    body?: Record<string, unknown>,
    accept = 'application/json'
  ): Promise<unknown> {
    if (!this.config.apiKey) {
      throw new ConfigurationError('Transcription API key is not configured');
    }

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.config.apiKey}`,
      Accept: accept,
    };
    if (body) {
      headers['Content-Type'] = 'application/json';
    }

    const startTime = this.now();
    let response: Response;
    try {
      response = await fetch(`${this.config.apiUrl}${path}`, {
        method,
        headers,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS),
      });
    } catch (error) {
      const message = toError(error).message;
      logger.warn('transcription', `Provider call failed: ${operation}`, {
        component: 'transcription_client',
        success: false,
        duration_ms: this.now() - startTime,
        error: message,
      });
      throw new ProviderError(`Transcription provider request failed: ${message}`, { transient: true });
    }

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      logger.warn('transcription', `Provider call failed: ${operation}`, {
        component: 'transcription_client',
        success: false,
        duration_ms: this.now() - startTime,
        error: detail,
        metadata: { provider_status: response.status },
      });
      throw new ProviderError(`Transcription provider returned ${response.status}: ${detail}`, {
        providerStatus: response.status,
        details: { provider_status: response.status, detail },
      });
    }

    debugTranscription(`Provider call succeeded: ${operation}`, {
      status: response.status,
      durationMs: this.now() - startTime,
    });

    try {
      return await response.json();
    } catch (error) {
      throw new ProviderError(`Transcription provider sent an unreadable response: ${toError(error).message}`, {
        providerStatus: response.status,
        transient: false,
      });
    }
  }
}

/**
 * Pull the most useful message out of a provider error body
 */
async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  if (!text) {
    return response.statusText || 'No error detail';
  }

  try {
    const parsed: unknown = JSON.parse(text);
    if (isObject(parsed)) {
      const detail = optionalString(parsed.detail) ?? optionalString(parsed.title) ?? optionalString(parsed.message);
      if (detail) {
        return detail;
      }
    }
  } catch {
    // Not JSON; the raw body is the detail
  }
  return text.slice(0, 500);
}

/**
 * Map a provider status string onto the normalized job status
 */
export function normalizeJobStatus(status: unknown): JobStatus {
  switch (status) {
    case 'transcribed':
    case 'completed':
      return 'completed';
    case 'in_progress':
    case 'processing':
      return 'in_progress';
    case 'queued':
    case 'pending':
      return 'pending';
    case 'failed':
      return 'failed';
    default:
      throw new ProviderError(`Unrecognized job status from provider: ${String(status)}`, { transient: false });
  }
}

/**
 * Decode the job metadata the service attached at submission
 * The provider stores it as a string; unknown keys and non-string values are dropped.
 */
export function parseJobMetadata(raw: unknown): Partial<JobMetadata> {
  let value: unknown = raw;
  if (isString(raw)) {
    try {
      value = JSON.parse(raw);
    } catch {
      return {};
    }
  }

  if (!isObject(value)) {
    return {};
  }

  const metadata: Partial<JobMetadata> = {};
  for (const key of METADATA_KEYS) {
    const field = optionalString(value[key]);
    if (field !== undefined) {
      metadata[key] = field;
    }
  }
  return metadata;
}

/**
 * Decode a job resource (`POST /jobs` and `GET /jobs/{id}` responses)
 */
export function parseJobResource(payload: unknown): JobDetails {
  if (!isObject(payload)) {
    throw new ProviderError('Provider job response is not an object', { transient: false });
  }

  const jobId = optionalString(payload.id) ?? optionalString(payload.job_id);
  if (!jobId) {
    throw new ProviderError('Provider job response is missing the job id', { transient: false });
  }

  const details: JobDetails = {
    job_id: jobId,
    status: normalizeJobStatus(payload.status),
    metadata: parseJobMetadata(payload.metadata),
  };

  const mediaUrl = optionalString(payload.media_url);
  if (mediaUrl) {
    details.media_url = mediaUrl;
  }
  const failure = optionalString(payload.failure_detail) ?? optionalString(payload.failure);
  if (failure) {
    details.failure_detail = failure;
  }
  const createdOn = optionalString(payload.created_on);
  if (createdOn) {
    details.created_on = createdOn;
  }
  return details;
}

function parseElement(raw: unknown): TranscriptElement | null {
  if (!isObject(raw) || !isString(raw.value)) {
    return null;
  }
  const type = raw.type;
  if (type !== 'text' && type !== 'punct') {
    return null;
  }

  const element: TranscriptElement = {
    type,
    value: raw.value,
    confidence: isNumber(raw.confidence) ? raw.confidence : 0,
  };
  if (isNumber(raw.ts)) {
    element.ts = raw.ts;
  }
  if (isNumber(raw.end_ts)) {
    element.end_ts = raw.end_ts;
  }
  return element;
}

/**
 * Decode a transcript document (`{monologues: [{speaker, elements}]}`)
 * Elements of unknown type are skipped.
 */
export function parseTranscript(payload: unknown): Transcript {
  if (!isObject(payload) || !Array.isArray(payload.monologues)) {
    throw new ProviderError('Provider transcript is missing monologues', { transient: false });
  }

  const monologues: Monologue[] = [];
  for (const rawMonologue of payload.monologues) {
    if (!isObject(rawMonologue)) {
      continue;
    }
    const elements: TranscriptElement[] = [];
    if (Array.isArray(rawMonologue.elements)) {
      for (const rawElement of rawMonologue.elements) {
        const element = parseElement(rawElement);
        if (element) {
          elements.push(element);
        }
      }
    }
    monologues.push({
      speaker: isNumber(rawMonologue.speaker) ? rawMonologue.speaker : 0,
      elements,
    });
  }
  return { monologues };
}

/**
 * Decode a provider job notification
 *
 * Accepts the provider envelope `{job: {...}}` as well as a bare job object.
 * An embedded transcript is read from `job.transcript` or a top-level
 * `transcript` when it carries monologues.
 */
export function parseCallbackPayload(payload: unknown): CallbackNotification {
  if (!isObject(payload)) {
    throw new ProviderError('Callback payload is not an object', { transient: false });
  }

  const job = isObject(payload.job) ? payload.job : payload;
  const jobId = optionalString(job.id) ?? optionalString(job.job_id);
  if (!jobId) {
    throw new ProviderError('Callback payload is missing the job id', { transient: false });
  }

  const details = parseJobResource({ ...job, id: jobId });
  const notification: CallbackNotification = {
    job_id: details.job_id,
    status: details.status,
    metadata: details.metadata,
  };
  if (details.media_url) {
    notification.media_url = details.media_url;
  }
  if (details.failure_detail) {
    notification.failure_detail = details.failure_detail;
  }

  const embedded = [job.transcript, payload.transcript].find(
    candidate => isObject(candidate) && Array.isArray(candidate.monologues)
  );
  if (embedded !== undefined) {
    notification.transcript = parseTranscript(embedded);
  }
  return notification;
}

/**
 * Flatten a transcript into plain text
 * Punctuation attaches to the preceding word; words are space separated.
 */
export function transcriptToText(transcript: Transcript): string {
  const parts: string[] = [];

  for (const monologue of transcript.monologues) {
    let text = '';
    for (const element of monologue.elements) {
      if (element.type === 'text' && text.length > 0 && !/\s$/.test(text)) {
        text += ' ';
      }
      text += element.value;
    }
    parts.push(text.replace(/\s+/g, ' ').trim());
  }

  return parts.filter(part => part.length > 0).join(' ');
}

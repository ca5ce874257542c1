import {
  BatchResultEntry,
  BatchTranscriptionResponse,
  CallbackResponse,
  EnhancedTranscript,
  JobMetadata,
  JobStatusResponse,
  ManualTranscriptionRequest,
  ManualTranscriptionResponse,
  MediaQualityReport,
  MergedQualityReport,
  QualityReport,
  SubmittedJobRef,
  Transcript,
  WebhookItemError,
  WebhookResponse,
  isBoolean,
  isNumber,
  isObject,
  optionalString,
} from '@survey-transcription/shared';
import { ServiceConfig } from '../config/serviceConfig.js';
import { JobHandle, TranscriptionProvider, transcriptToText } from '../lib/clients/transcriptionClient.js';
import { ResultStore } from '../lib/db/resultStore.js';
import { ValidationError, toError } from '../lib/errors.js';
import { Logger, TranscriptionJobLogger, logger } from '../lib/logger.js';
import { MediaQualityEstimator } from '../lib/mediaQuality.js';
import { validateMediaFormat } from '../lib/mediaFormat.js';
import { getEventAnswers, readSurveyEvent, resolveQuestionLabel } from '../lib/surveyEvent.js';
import { TextAnalyzer } from '../lib/textAnalyzer.js';
import { scoreCompletedTranscript, scoreTranscript } from '../lib/transcriptQuality.js';
import { RetryPolicy, SUBMISSION_RETRY_POLICY, withRetry } from '../lib/utils/retry.js';

export type OrchestratorConfig = Pick<
  ServiceConfig,
  'callbackUrl' | 'supportedFormats' | 'pollIntervalMs' | 'maxWaitTimeSeconds'
>;

export type TranscriptStore = Pick<ResultStore, 'upsert'>;

export interface OrchestratorDependencies {
  config: OrchestratorConfig;
  provider: TranscriptionProvider;
  analyzer: TextAnalyzer;
  store: TranscriptStore;
  estimateMediaQuality: MediaQualityEstimator;
  retryPolicy?: RetryPolicy;
  /** Delay used between submission retries, replaced in tests */
  retrySleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Enhanced text plus the acoustic and linguistic metrics merged into one report
 */
export interface ProcessedTranscript {
  enhanced: EnhancedTranscript;
  metrics: MergedQualityReport;
}

const MANUAL_QUESTION = 'Manual request';
const BATCH_QUESTION = 'Batch request';
const MAX_WAIT_TIME_SECONDS = 3600;

const MISSING_MEDIA_URL_QUALITY: MediaQualityReport = {
  tier: 'unknown',
  warnings: ['Media URL not found in job details'],
};

/**
 * Validate a manual or batch transcription request body
 * @throws ValidationError naming the first problem found
 */
export function parseTranscriptionRequest(
  body: unknown,
  supportedFormats: ReadonlySet<string>
): ManualTranscriptionRequest {
  if (!isObject(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const mediaUrl = optionalString(body.media_url);
  if (!mediaUrl) {
    throw new ValidationError('media_url is required');
  }

  const format = validateMediaFormat(mediaUrl, supportedFormats);
  if (!format.isValid) {
    throw new ValidationError(format.reason, { media_url: mediaUrl });
  }

  const email = optionalString(body.email);
  if (!email) {
    throw new ValidationError('email is required');
  }

  const request: ManualTranscriptionRequest = { media_url: mediaUrl, email };

  const question = optionalString(body.question);
  if (question) {
    request.question = question;
  }

  if (body.wait_for_completion !== undefined) {
    if (!isBoolean(body.wait_for_completion)) {
      throw new ValidationError('wait_for_completion must be a boolean');
    }
    request.wait_for_completion = body.wait_for_completion;
  }

  if (body.max_wait_time !== undefined) {
    const maxWait = body.max_wait_time;
    if (!isNumber(maxWait) || maxWait <= 0 || maxWait > MAX_WAIT_TIME_SECONDS) {
      throw new ValidationError(`max_wait_time must be a number of seconds between 1 and ${MAX_WAIT_TIME_SECONDS}`);
    }
    request.max_wait_time = maxWait;
  }

  return request;
}

/**
 * TranscriptionOrchestrator - drives an answer from webhook to stored transcript
 *
 * Each answer moves through received → validated → submitted → polling or
 * awaiting_callback → reconciled → stored, or to failed from any stage.
 * Jobs are tracked only by their provider id; the survey context travels in
 * the job metadata, so webhook, callback and synchronous paths share no state.
 *
 * Completion by polling and completion by callback end in the same
 * processing step: analyze, score, merge, then upsert the enhanced text.
 */
export class TranscriptionOrchestrator {
  private readonly config: OrchestratorConfig;
  private readonly provider: TranscriptionProvider;
  private readonly analyzer: TextAnalyzer;
  private readonly store: TranscriptStore;
  private readonly estimateMediaQuality: MediaQualityEstimator;
  private readonly retryPolicy: RetryPolicy;
  private readonly retrySleep?: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(deps: OrchestratorDependencies) {
    this.config = deps.config;
    this.provider = deps.provider;
    this.analyzer = deps.analyzer;
    this.store = deps.store;
    this.estimateMediaQuality = deps.estimateMediaQuality;
    this.retryPolicy = deps.retryPolicy ?? SUBMISSION_RETRY_POLICY;
    this.retrySleep = deps.retrySleep;
    this.logger = deps.logger ?? logger;
  }

  /**
   * Entry point for POST /webhook
   *
   * A body with a `job` object is a provider notification and goes down the
   * callback path. Anything else is a survey event: every answer carrying a
   * media URL is submitted, and failures are collected per answer instead of
   * failing the request.
   */
  async handleWebhook(payload: unknown): Promise<WebhookResponse | CallbackResponse> {
    if (isObject(payload) && isObject(payload.job)) {
      return this.handleCallback(payload);
    }

    const event = readSurveyEvent(payload);
    const errors: WebhookItemError[] = [];
    const jobs: SubmittedJobRef[] = [];

    for (const answer of getEventAnswers(event)) {
      const mediaUrl = answer.media_url;
      if (!mediaUrl) {
        continue;
      }

      const jobLog = new TranscriptionJobLogger(undefined, this.logger);
      jobLog.transition('received', { media_url: mediaUrl, interaction_id: event.interaction_id });

      try {
        const email = event.contact?.email;
        if (!email) {
          throw new ValidationError('Contact email is missing from the webhook event');
        }

        const metadata: JobMetadata = {
          email,
          question: resolveQuestionLabel(answer, event),
          media_url: mediaUrl,
          interaction_id: event.interaction_id,
          answer_id: answer.answer_id,
          share_id: answer.share_id,
          answer_type: answer.type,
          contact_name: event.contact?.name,
        };
        jobLog.transition('validated', { question: metadata.question });

        const jobId = await this.submit(mediaUrl, metadata, false, jobLog);
        jobs.push({ media_url: mediaUrl, job_id: jobId });
        jobLog.transition('awaiting_callback');
      } catch (error) {
        const failure = toError(error);
        jobLog.transition('failed', { stage: 'submission', error: failure.message });
        errors.push({ media_url: mediaUrl, error: failure.message });
      }
    }

    this.logger.info('webhook', 'Webhook event processed', {
      metadata: { jobs: jobs.length, errors: errors.length, event_type: event.event_type },
    });

    return { status: 'processed', errors, jobs };
  }

  /**
   * Reconcile a provider notification
   *
   * A completed job uses the transcript embedded in the notification when
   * there is one and fetches it otherwise. Failed jobs are reported without
   * storing anything; other statuses are acknowledged.
   *
   * @throws ProviderError if the payload carries no job id
   */
  async handleCallback(payload: unknown): Promise<CallbackResponse> {
    const notification = this.provider.parseCallback(payload);
    const jobLog = new TranscriptionJobLogger(notification.job_id, this.logger);
    jobLog.transition('reconciled', { status: notification.status });

    if (notification.status === 'failed') {
      const detail = notification.failure_detail ?? 'Unknown failure';
      jobLog.transition('failed', { failure_detail: detail });
      return { status: 'failed', job_id: notification.job_id, job_status: 'failed', error: detail };
    }

    if (notification.status !== 'completed') {
      return { status: 'acknowledged', job_id: notification.job_id, job_status: notification.status };
    }

    const { email, question } = notification.metadata;
    const mediaUrl = notification.metadata.media_url ?? notification.media_url;

    try {
      const transcript = notification.transcript ?? await this.provider.fetchTranscript(notification.job_id);
      const processed = await this.processTranscript(transcript, mediaUrl);

      if (!email || !question || !mediaUrl) {
        jobLog.logError('Job metadata lacks the contact, question or media URL; not storing');
        return { status: 'not_stored', job_id: notification.job_id, job_status: 'completed' };
      }

      const stored = await this.store.upsert(email, question, mediaUrl, processed.enhanced.enhanced_text, processed.metrics);
      jobLog.storeWrite(email, question, stored);
      if (stored) {
        jobLog.transition('stored');
      }

      return { status: stored ? 'stored' : 'not_stored', job_id: notification.job_id, job_status: 'completed' };
    } catch (error) {
      const failure = toError(error);
      jobLog.logError('Failed to process completed job', failure);
      return { status: 'failed', job_id: notification.job_id, job_status: 'completed', error: failure.message };
    }
  }

  /**
   * Manual submission, optionally waiting for the result
   *
   * When waiting, the job is polled until it finishes and then processed and
   * stored inline; TimeoutError and JobFailedError propagate and nothing is
   * stored. Without waiting, the job completes through the callback.
   */
  async transcribe(body: unknown): Promise<ManualTranscriptionResponse> {
    const request = parseTranscriptionRequest(body, this.config.supportedFormats);
    const question = request.question ?? MANUAL_QUESTION;
    const waitForCompletion = request.wait_for_completion ?? false;

    const jobLog = new TranscriptionJobLogger(undefined, this.logger);
    jobLog.transition('validated', { media_url: request.media_url, wait: waitForCompletion });

    const metadata: JobMetadata = { email: request.email, question, media_url: request.media_url };
    const handle = await this.submitForHandle(request.media_url, metadata, waitForCompletion, jobLog);

    if (!waitForCompletion) {
      jobLog.transition('awaiting_callback');
      return { status: handle.status, job_id: handle.job_id, message: 'Transcription job submitted successfully' };
    }

    jobLog.transition('polling');
    try {
      await this.provider.waitForCompletion(handle.job_id, {
        maxWaitTimeMs: (request.max_wait_time ?? this.config.maxWaitTimeSeconds) * 1000,
        pollIntervalMs: this.config.pollIntervalMs,
      });
    } catch (error) {
      jobLog.transition('failed', { stage: 'polling', error: toError(error).message });
      throw error;
    }
    jobLog.transition('reconciled', { status: 'completed' });

    const transcript = await this.provider.fetchTranscript(handle.job_id);
    const processed = await this.processTranscript(transcript, request.media_url);

    const stored = await this.store.upsert(
      request.email,
      question,
      request.media_url,
      processed.enhanced.enhanced_text,
      processed.metrics
    );
    jobLog.storeWrite(request.email, question, stored);
    if (stored) {
      jobLog.transition('stored');
    }

    return {
      status: 'completed',
      job_id: handle.job_id,
      transcript: processed.enhanced.enhanced_text,
      quality_metrics: processed.metrics,
      stored,
    };
  }

  /**
   * Current job status; completed jobs also get the enhanced transcript and
   * merged metrics, which are not stored
   */
  async getJobStatus(jobId: string): Promise<JobStatusResponse> {
    const details = await this.provider.pollStatus(jobId);

    if (details.status !== 'completed') {
      return details.failure_detail
        ? { status: details.status, job_id: details.job_id, failure_detail: details.failure_detail }
        : { status: details.status, job_id: details.job_id };
    }

    const transcript = await this.provider.fetchTranscript(jobId);
    const processed = await this.processTranscript(transcript, details.media_url ?? details.metadata.media_url);

    return {
      status: 'completed',
      job_id: details.job_id,
      transcript: processed.enhanced.enhanced_text,
      quality_metrics: processed.metrics,
    };
  }

  /**
   * Acoustic quality report: job details, then the media estimate, then the
   * transcript confidences (skipped while the job is incomplete)
   */
  async getQualityReport(jobId: string): Promise<QualityReport> {
    const details = await this.provider.pollStatus(jobId);
    const mediaQuality = await this.mediaQualityFor(details.media_url ?? details.metadata.media_url);

    if (details.status !== 'completed') {
      return scoreTranscript(details.status, null, mediaQuality);
    }

    const transcript = await this.provider.fetchTranscript(jobId);
    return scoreTranscript('completed', transcript, mediaQuality);
  }

  /**
   * Validate and submit each request independently; completion goes through
   * the callback path
   */
  async submitBatch(requests: unknown[]): Promise<BatchTranscriptionResponse> {
    const results: BatchResultEntry[] = [];

    for (const raw of requests) {
      const mediaUrl = isObject(raw) ? optionalString(raw.media_url) : undefined;

      try {
        const request = parseTranscriptionRequest(raw, this.config.supportedFormats);
        const jobLog = new TranscriptionJobLogger(undefined, this.logger);
        jobLog.transition('validated', { media_url: request.media_url, batch: true });

        const handle = await this.submitForHandle(
          request.media_url,
          { email: request.email, question: request.question ?? BATCH_QUESTION, media_url: request.media_url },
          false,
          jobLog
        );
        jobLog.transition('awaiting_callback');
        results.push({ media_url: request.media_url, job_id: handle.job_id, status: handle.status });
      } catch (error) {
        results.push({ media_url: mediaUrl, error: toError(error).message, status: 'error' });
      }
    }

    const failed = results.filter(result => result.status === 'error').length;
    this.logger.info('orchestrator', 'Batch submitted', {
      metadata: { total: results.length, failed },
    });

    return { results, total: results.length, failed };
  }

  /**
   * Analyze, score and merge a completed transcript
   * The merged report always carries both acoustic and linguistic fields.
   */
  async processTranscript(transcript: Transcript, mediaUrl: string | undefined): Promise<ProcessedTranscript> {
    const mediaQuality = await this.mediaQualityFor(mediaUrl);
    const acoustic = scoreCompletedTranscript(transcript, mediaQuality);
    const enhanced = this.analyzer.analyzeAndEnhance(transcriptToText(transcript));

    return {
      enhanced,
      metrics: {
        ...acoustic,
        linguistic_quality_score: enhanced.quality_score,
        enhancement_warnings: enhanced.enhancement_warnings,
        linguistic_analysis: enhanced.linguistic_analysis,
      },
    };
  }

  private async mediaQualityFor(mediaUrl: string | undefined): Promise<MediaQualityReport> {
    if (!mediaUrl) {
      return { ...MISSING_MEDIA_URL_QUALITY, warnings: [...MISSING_MEDIA_URL_QUALITY.warnings] };
    }
    return this.estimateMediaQuality(mediaUrl);
  }

  private async submit(
    mediaUrl: string,
    metadata: JobMetadata,
    waitForCompletion: boolean,
    jobLog: TranscriptionJobLogger
  ): Promise<string> {
    const handle = await this.submitForHandle(mediaUrl, metadata, waitForCompletion, jobLog);
    return handle.job_id;
  }

  // Retries wrap the submit call only. The callback is registered even when waiting, so a job that outlives the wait still lands
  private async submitForHandle(
    mediaUrl: string,
    metadata: JobMetadata,
    waitForCompletion: boolean,
    jobLog: TranscriptionJobLogger
  ): Promise<JobHandle> {
    const startTime = Date.now();
    try {
      const handle = await withRetry(
        () => this.provider.submit(mediaUrl, metadata, {
          callbackUrl: this.config.callbackUrl,
          waitForCompletion,
        }),
        this.retryPolicy,
        this.retrySleep
      );
      jobLog.setJobId(handle.job_id);
      jobLog.providerCall('submit', true, Date.now() - startTime);
      jobLog.transition('submitted', { status: handle.status });
      return handle;
    } catch (error) {
      jobLog.providerCall('submit', false, Date.now() - startTime, toError(error).message);
      throw error;
    }
  }
}

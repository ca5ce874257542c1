import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { TranscriptionOrchestrator, parseTranscriptionRequest } from '../TranscriptionOrchestrator.js';
import { TextAnalyzer } from '../../lib/textAnalyzer.js';
import { TranscriptionClient } from '../../lib/clients/transcriptionClient.js';
import { ResultStore } from '../../lib/db/resultStore.js';
import {
  ConfigurationError,
  JobFailedError,
  ProviderError,
  TimeoutError,
  ValidationError,
} from '../../lib/errors.js';
import type { MediaQualityEstimator } from '../../lib/mediaQuality.js';
import {
  FakeProvider,
  FakeSheet,
  HIGH_MEDIA_QUALITY,
  SAMPLE_TRANSCRIPT,
  STORE_CONFIG,
  TEST_CALLBACK_URL,
  TEST_EMAIL,
  TEST_MEDIA_URL,
  TEST_QUESTION,
  createMediaQualityStub,
  stubParser,
} from '../../tests/fakes.js';

const SUPPORTED_FORMATS: ReadonlySet<string> = new Set(['mp3', 'mp4', 'wav', 'm4a']);

const surveyEvent = (contact: Record<string, unknown> = { email: TEST_EMAIL, name: 'Test User' }) => ({
  event_type: 'interaction.completed',
  interaction_id: 'int-1',
  contact,
  answers: [
    { type: 'audio', media_url: TEST_MEDIA_URL, question_id: 'q1', answer_id: 'a1', share_id: 's1' },
    { type: 'text', question_id: 'q2' },
  ],
  form: {
    questions: [{ question_id: 'q1', metadata: { text: TEST_QUESTION } }],
  },
});

const callback = (job: Record<string, unknown>) => ({
  job: {
    id: 'job-1',
    metadata: JSON.stringify({ email: TEST_EMAIL, question: TEST_QUESTION, media_url: TEST_MEDIA_URL }),
    ...job,
  },
});

describe('TranscriptionOrchestrator', () => {
  let provider: FakeProvider;
  let sheet: FakeSheet;
  let estimate: Mock<MediaQualityEstimator>;
  let retrySleep: Mock<(ms: number) => Promise<void>>;
  let orchestrator: TranscriptionOrchestrator;

  const storedRows = () => sheet.writes;

  beforeEach(() => {
    provider = new FakeProvider();
    sheet = new FakeSheet();
    estimate = createMediaQualityStub();
    retrySleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);

    orchestrator = new TranscriptionOrchestrator({
      config: {
        callbackUrl: TEST_CALLBACK_URL,
        supportedFormats: SUPPORTED_FORMATS,
        pollIntervalMs: 10,
        maxWaitTimeSeconds: 60,
      },
      provider,
      analyzer: new TextAnalyzer(stubParser, new Set(['the'])),
      store: new ResultStore(sheet, STORE_CONFIG),
      estimateMediaQuality: estimate,
      retrySleep,
    });
  });

  describe('handleWebhook', () => {
    it('should submit every answer carrying a media URL with its survey context', async () => {
      const response = await orchestrator.handleWebhook(surveyEvent());

      expect(response).toEqual({
        status: 'processed',
        errors: [],
        jobs: [{ media_url: TEST_MEDIA_URL, job_id: 'job-1' }],
      });
      expect(provider.submit).toHaveBeenCalledTimes(1);
      expect(provider.submit).toHaveBeenCalledWith(
        TEST_MEDIA_URL,
        {
          email: TEST_EMAIL,
          question: TEST_QUESTION,
          media_url: TEST_MEDIA_URL,
          interaction_id: 'int-1',
          answer_id: 'a1',
          share_id: 's1',
          answer_type: 'audio',
          contact_name: 'Test User',
        },
        { callbackUrl: TEST_CALLBACK_URL, waitForCompletion: false }
      );
    });

    it('should fall back to the contact answers', async () => {
      const response = await orchestrator.handleWebhook({
        contact: {
          email: TEST_EMAIL,
          answers: [{ type: 'video', media_url: 'https://media.example.com/clip.mp4', poll_option_content: 'Option A' }],
        },
      });

      expect(response).toEqual({
        status: 'processed',
        errors: [],
        jobs: [{ media_url: 'https://media.example.com/clip.mp4', job_id: 'job-1' }],
      });
      expect(provider.submit.mock.calls[0]?.[1].question).toBe('Option A');
    });

    it('should record an error per answer when the contact email is missing', async () => {
      const response = await orchestrator.handleWebhook(surveyEvent({ name: 'No Email' }));

      expect(response).toEqual({
        status: 'processed',
        errors: [{ media_url: TEST_MEDIA_URL, error: 'Contact email is missing from the webhook event' }],
        jobs: [],
      });
      expect(provider.submit).not.toHaveBeenCalled();
    });

    it('should retry transient provider failures before succeeding', async () => {
      provider.submit
        .mockRejectedValueOnce(new ProviderError('Transcription provider returned 503: unavailable', { providerStatus: 503 }))
        .mockResolvedValueOnce({ job_id: 'job-7', status: 'pending' });

      const response = await orchestrator.handleWebhook(surveyEvent());

      expect(response).toEqual({
        status: 'processed',
        errors: [],
        jobs: [{ media_url: TEST_MEDIA_URL, job_id: 'job-7' }],
      });
      expect(provider.submit).toHaveBeenCalledTimes(2);
      expect(retrySleep.mock.calls).toEqual([[1000]]);
    });

    it('should not retry a rejected submission', async () => {
      provider.submit.mockRejectedValue(
        new ProviderError('Transcription provider returned 400: invalid media_url', { providerStatus: 400 })
      );

      const response = await orchestrator.handleWebhook(surveyEvent());

      expect(response).toEqual({
        status: 'processed',
        errors: [{ media_url: TEST_MEDIA_URL, error: 'Transcription provider returned 400: invalid media_url' }],
        jobs: [],
      });
      expect(provider.submit).toHaveBeenCalledTimes(1);
      expect(retrySleep).not.toHaveBeenCalled();
    });

    it('should report a missing credential per answer', async () => {
      provider.submit.mockRejectedValue(new ConfigurationError('Transcription API key is not configured'));

      const response = await orchestrator.handleWebhook(surveyEvent());

      expect(response).toEqual({
        status: 'processed',
        errors: [{ media_url: TEST_MEDIA_URL, error: 'Transcription API key is not configured' }],
        jobs: [],
      });
    });

    it('should surface a missing provider credential from the real client per answer', async () => {
      const fetchMock = vi.fn<typeof fetch>();
      vi.stubGlobal('fetch', fetchMock);
      const unconfigured = new TranscriptionOrchestrator({
        config: { callbackUrl: TEST_CALLBACK_URL, supportedFormats: SUPPORTED_FORMATS, pollIntervalMs: 10, maxWaitTimeSeconds: 60 },
        provider: new TranscriptionClient({ apiUrl: 'https://stt.example.com/v1', supportedFormats: SUPPORTED_FORMATS }),
        analyzer: new TextAnalyzer(stubParser, new Set()),
        store: new ResultStore(sheet, STORE_CONFIG),
        estimateMediaQuality: estimate,
        retrySleep,
      });

      const response = await unconfigured.handleWebhook(surveyEvent());

      expect(response).toEqual({
        status: 'processed',
        errors: [{ media_url: TEST_MEDIA_URL, error: 'Transcription API key is not configured' }],
        jobs: [],
      });
      expect(fetchMock).not.toHaveBeenCalled();
      expect(retrySleep).not.toHaveBeenCalled();
    });

    it('should treat a non-object body as an event without answers', async () => {
      const response = await orchestrator.handleWebhook('not json');

      expect(response).toEqual({ status: 'processed', errors: [], jobs: [] });
    });

    it('should route provider notifications to the callback path', async () => {
      const response = await orchestrator.handleWebhook(callback({ status: 'in_progress' }));

      expect(response).toEqual({ status: 'acknowledged', job_id: 'job-1', job_status: 'in_progress' });
    });
  });

  describe('handleCallback', () => {
    it('should store an embedded transcript without fetching it', async () => {
      const response = await orchestrator.handleCallback(
        callback({ status: 'transcribed', transcript: SAMPLE_TRANSCRIPT })
      );

      expect(response).toEqual({ status: 'stored', job_id: 'job-1', job_status: 'completed' });
      expect(provider.fetchTranscript).not.toHaveBeenCalled();
      expect(storedRows()).toEqual([
        { range: 'Responses!O1', value: TEST_MEDIA_URL },
        { range: 'Responses!P1', value: 'Hello world.' },
      ]);
    });

    it('should fetch the transcript when the notification has none', async () => {
      const response = await orchestrator.handleCallback(callback({ status: 'completed' }));

      expect(response).toEqual({ status: 'stored', job_id: 'job-1', job_status: 'completed' });
      expect(provider.fetchTranscript).toHaveBeenCalledWith('job-1');
      expect(estimate).toHaveBeenCalledWith(TEST_MEDIA_URL);
    });

    it('should report provider failures without storing', async () => {
      const response = await orchestrator.handleCallback(
        callback({ status: 'failed', failure_detail: 'media download failed' })
      );

      expect(response).toEqual({
        status: 'failed',
        job_id: 'job-1',
        job_status: 'failed',
        error: 'media download failed',
      });
      expect(storedRows()).toEqual([]);
    });

    it('should report not_stored when the question has no column mapping', async () => {
      const response = await orchestrator.handleCallback({
        job: {
          id: 'job-2',
          status: 'transcribed',
          metadata: { email: TEST_EMAIL, question: 'Unmapped question', media_url: TEST_MEDIA_URL },
        },
      });

      expect(response).toEqual({ status: 'not_stored', job_id: 'job-2', job_status: 'completed' });
      expect(storedRows()).toEqual([]);
    });

    it('should report not_stored when the job metadata lacks the contact', async () => {
      const response = await orchestrator.handleCallback({ job: { id: 'job-3', status: 'transcribed' } });

      expect(response).toEqual({ status: 'not_stored', job_id: 'job-3', job_status: 'completed' });
    });

    it('should report a failed fetch as a failed reconciliation', async () => {
      provider.fetchTranscript.mockRejectedValue(new ProviderError('Transcription provider returned 404: not found'));

      const response = await orchestrator.handleCallback(callback({ status: 'transcribed' }));

      expect(response).toEqual({
        status: 'failed',
        job_id: 'job-1',
        job_status: 'completed',
        error: 'Transcription provider returned 404: not found',
      });
    });

    it('should reject notifications without a job id', async () => {
      await expect(orchestrator.handleCallback({ job: { status: 'transcribed' } }))
        .rejects.toThrow('Callback payload is missing the job id');
    });
  });

  describe('transcribe', () => {
    it('should submit with the callback and return immediately by default', async () => {
      const response = await orchestrator.transcribe({ media_url: TEST_MEDIA_URL, email: TEST_EMAIL });

      expect(response).toEqual({
        status: 'pending',
        job_id: 'job-1',
        message: 'Transcription job submitted successfully',
      });
      expect(provider.submit).toHaveBeenCalledWith(
        TEST_MEDIA_URL,
        { email: TEST_EMAIL, question: 'Manual request', media_url: TEST_MEDIA_URL },
        { callbackUrl: TEST_CALLBACK_URL, waitForCompletion: false }
      );
      expect(provider.waitForCompletion).not.toHaveBeenCalled();
    });

    it('should wait, enhance and store when asked to wait', async () => {
      provider.waitForCompletion.mockResolvedValue({ job_id: 'job-1', status: 'completed', metadata: {} });

      const response = await orchestrator.transcribe({
        media_url: TEST_MEDIA_URL,
        email: TEST_EMAIL,
        question: TEST_QUESTION,
        wait_for_completion: true,
        max_wait_time: 30,
      });

      expect(provider.submit).toHaveBeenCalledWith(
        TEST_MEDIA_URL,
        { email: TEST_EMAIL, question: TEST_QUESTION, media_url: TEST_MEDIA_URL },
        { callbackUrl: TEST_CALLBACK_URL, waitForCompletion: true }
      );
      expect(provider.waitForCompletion).toHaveBeenCalledWith('job-1', { maxWaitTimeMs: 30000, pollIntervalMs: 10 });

      if (response.status !== 'completed' || !('stored' in response)) {
        throw new Error(`Expected a completed response, got ${response.status}`);
      }
      expect(response.transcript).toBe('Hello world.');
      expect(response.stored).toBe(true);
      expect(response.quality_metrics.overall_confidence).toBeCloseTo(0.95);
      expect(response.quality_metrics.total_words).toBe(2);
      expect(response.quality_metrics.media_quality).toEqual(HIGH_MEDIA_QUALITY);
      expect(response.quality_metrics.linguistic_quality_score).toBeCloseTo(0.5);
      expect(response.quality_metrics.enhancement_warnings).toEqual([]);
      expect(response.quality_metrics.linguistic_analysis.quality_issues).toEqual([
        'Very short response',
        "Frequent repetition of word 'hello'",
        "Frequent repetition of word 'world'",
      ]);
      expect(storedRows()).toEqual([
        { range: 'Responses!O1', value: TEST_MEDIA_URL },
        { range: 'Responses!P1', value: 'Hello world.' },
      ]);
    });

    it('should fall back to the configured wait ceiling', async () => {
      provider.waitForCompletion.mockResolvedValue({ job_id: 'job-1', status: 'completed', metadata: {} });

      await orchestrator.transcribe({ media_url: TEST_MEDIA_URL, email: TEST_EMAIL, wait_for_completion: true });

      expect(provider.waitForCompletion).toHaveBeenCalledWith('job-1', { maxWaitTimeMs: 60000, pollIntervalMs: 10 });
    });

    it('should propagate a timeout without storing', async () => {
      provider.waitForCompletion.mockRejectedValue(new TimeoutError('job-1', 30000));

      await expect(orchestrator.transcribe({
        media_url: TEST_MEDIA_URL,
        email: TEST_EMAIL,
        wait_for_completion: true,
      })).rejects.toBeInstanceOf(TimeoutError);
      expect(provider.fetchTranscript).not.toHaveBeenCalled();
      expect(storedRows()).toEqual([]);
    });

    it('should store a job that outlives the wait once its callback arrives', async () => {
      provider.waitForCompletion.mockRejectedValue(new TimeoutError('job-1', 30000));

      await expect(orchestrator.transcribe({
        media_url: TEST_MEDIA_URL,
        email: TEST_EMAIL,
        question: TEST_QUESTION,
        wait_for_completion: true,
        max_wait_time: 30,
      })).rejects.toBeInstanceOf(TimeoutError);
      expect(provider.submit.mock.calls[0]?.[2]).toEqual({ callbackUrl: TEST_CALLBACK_URL, waitForCompletion: true });

      const response = await orchestrator.handleWebhook(callback({ status: 'transcribed' }));

      expect(response).toEqual({ status: 'stored', job_id: 'job-1', job_status: 'completed' });
      expect(storedRows()).toEqual([
        { range: 'Responses!O1', value: TEST_MEDIA_URL },
        { range: 'Responses!P1', value: 'Hello world.' },
      ]);
    });

    it('should wait without a callback when none is configured', async () => {
      provider.waitForCompletion.mockResolvedValue({ job_id: 'job-1', status: 'completed', metadata: {} });
      const polling = new TranscriptionOrchestrator({
        config: { supportedFormats: SUPPORTED_FORMATS, pollIntervalMs: 10, maxWaitTimeSeconds: 60 },
        provider,
        analyzer: new TextAnalyzer(stubParser, new Set()),
        store: new ResultStore(sheet, STORE_CONFIG),
        estimateMediaQuality: estimate,
        retrySleep,
      });

      await polling.transcribe({ media_url: TEST_MEDIA_URL, email: TEST_EMAIL, wait_for_completion: true });

      expect(provider.submit.mock.calls[0]?.[2]).toEqual({ callbackUrl: undefined, waitForCompletion: true });
    });

    it('should propagate a failed job', async () => {
      provider.waitForCompletion.mockRejectedValue(new JobFailedError('job-1', 'media download failed'));

      await expect(orchestrator.transcribe({
        media_url: TEST_MEDIA_URL,
        email: TEST_EMAIL,
        wait_for_completion: true,
      })).rejects.toThrow('Transcription job job-1 failed: media download failed');
    });

    it('should reject invalid requests before calling the provider', async () => {
      await expect(orchestrator.transcribe({ email: TEST_EMAIL })).rejects.toThrow('media_url is required');
      expect(provider.submit).not.toHaveBeenCalled();
    });
  });

  describe('getJobStatus', () => {
    it('should return the status of an unfinished job', async () => {
      provider.pollStatus.mockResolvedValue({ job_id: 'job-1', status: 'in_progress', metadata: {} });

      await expect(orchestrator.getJobStatus('job-1')).resolves.toEqual({ status: 'in_progress', job_id: 'job-1' });
    });

    it('should include the failure detail of a failed job', async () => {
      provider.pollStatus.mockResolvedValue({
        job_id: 'job-1',
        status: 'failed',
        metadata: {},
        failure_detail: 'unsupported codec',
      });

      await expect(orchestrator.getJobStatus('job-1')).resolves.toEqual({
        status: 'failed',
        job_id: 'job-1',
        failure_detail: 'unsupported codec',
      });
    });

    it('should return the enhanced transcript of a completed job without storing it', async () => {
      provider.pollStatus.mockResolvedValue({
        job_id: 'job-1',
        status: 'completed',
        media_url: TEST_MEDIA_URL,
        metadata: {},
      });

      const response = await orchestrator.getJobStatus('job-1');

      expect(response.status).toBe('completed');
      expect('transcript' in response && response.transcript).toBe('Hello world.');
      expect(storedRows()).toEqual([]);
    });
  });

  describe('getQualityReport', () => {
    it('should short-circuit while the job is running', async () => {
      provider.pollStatus.mockResolvedValue({
        job_id: 'job-1',
        status: 'in_progress',
        media_url: TEST_MEDIA_URL,
        metadata: {},
      });

      await expect(orchestrator.getQualityReport('job-1')).resolves.toEqual({
        status: 'in_progress',
        message: 'Transcript not ready yet',
        media_quality: HIGH_MEDIA_QUALITY,
      });
      expect(provider.fetchTranscript).not.toHaveBeenCalled();
    });

    it('should note a missing media URL in the media quality', async () => {
      provider.pollStatus.mockResolvedValue({ job_id: 'job-1', status: 'completed', metadata: {} });

      const report = await orchestrator.getQualityReport('job-1');

      expect(estimate).not.toHaveBeenCalled();
      expect(report.media_quality).toEqual({ tier: 'unknown', warnings: ['Media URL not found in job details'] });
      expect(report.status).toBe('completed');
    });

    it('should read the media URL from the job metadata', async () => {
      provider.pollStatus.mockResolvedValue({
        job_id: 'job-1',
        status: 'completed',
        metadata: { media_url: TEST_MEDIA_URL },
      });

      await orchestrator.getQualityReport('job-1');

      expect(estimate).toHaveBeenCalledWith(TEST_MEDIA_URL);
      expect(provider.fetchTranscript).toHaveBeenCalledWith('job-1');
    });
  });

  describe('submitBatch', () => {
    it('should submit each request independently', async () => {
      const response = await orchestrator.submitBatch([
        { media_url: TEST_MEDIA_URL, email: TEST_EMAIL },
        { email: TEST_EMAIL },
      ]);

      expect(response).toEqual({
        total: 2,
        failed: 1,
        results: [
          { media_url: TEST_MEDIA_URL, job_id: 'job-1', status: 'pending' },
          { media_url: undefined, error: 'media_url is required', status: 'error' },
        ],
      });
      expect(provider.submit).toHaveBeenCalledWith(
        TEST_MEDIA_URL,
        { email: TEST_EMAIL, question: 'Batch request', media_url: TEST_MEDIA_URL },
        { callbackUrl: TEST_CALLBACK_URL, waitForCompletion: false }
      );
    });

    it('should record provider failures per request', async () => {
      provider.submit.mockRejectedValue(new ConfigurationError('Transcription API key is not configured'));

      const response = await orchestrator.submitBatch([{ media_url: TEST_MEDIA_URL, email: TEST_EMAIL }]);

      expect(response).toEqual({
        total: 1,
        failed: 1,
        results: [{ media_url: TEST_MEDIA_URL, error: 'Transcription API key is not configured', status: 'error' }],
      });
    });
  });
});

describe('parseTranscriptionRequest', () => {
  it('should accept a complete request', () => {
    expect(parseTranscriptionRequest({
      media_url: TEST_MEDIA_URL,
      email: TEST_EMAIL,
      question: TEST_QUESTION,
      wait_for_completion: true,
      max_wait_time: 120,
    }, SUPPORTED_FORMATS)).toEqual({
      media_url: TEST_MEDIA_URL,
      email: TEST_EMAIL,
      question: TEST_QUESTION,
      wait_for_completion: true,
      max_wait_time: 120,
    });
  });

  it('should name the first problem found', () => {
    expect(() => parseTranscriptionRequest(null, SUPPORTED_FORMATS)).toThrow('Request body must be a JSON object');
    expect(() => parseTranscriptionRequest({ email: TEST_EMAIL }, SUPPORTED_FORMATS)).toThrow('media_url is required');
    expect(() => parseTranscriptionRequest({ media_url: TEST_MEDIA_URL }, SUPPORTED_FORMATS)).toThrow('email is required');
    expect(() => parseTranscriptionRequest(
      { media_url: 'https://media.example.com/notes.txt', email: TEST_EMAIL },
      SUPPORTED_FORMATS
    )).toThrow('Unsupported file format: txt. Supported formats: mp3, mp4, wav, m4a');
  });

  it('should reject wait options of the wrong type or range', () => {
    const base = { media_url: TEST_MEDIA_URL, email: TEST_EMAIL };

    expect(() => parseTranscriptionRequest({ ...base, wait_for_completion: 'yes' }, SUPPORTED_FORMATS))
      .toThrow(ValidationError);
    expect(() => parseTranscriptionRequest({ ...base, max_wait_time: 0 }, SUPPORTED_FORMATS))
      .toThrow('max_wait_time must be a number of seconds between 1 and 3600');
    expect(() => parseTranscriptionRequest({ ...base, max_wait_time: 7200 }, SUPPORTED_FORMATS))
      .toThrow(ValidationError);
  });
});

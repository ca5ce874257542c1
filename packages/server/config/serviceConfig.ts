/**
 * Configuration for the transcription service
 * Reads and validates environment variables with sensible defaults.
 * The returned object is frozen and handed to each component at construction.
 */

import { isObject, isString } from '@survey-transcription/shared';

/** Column letters for one survey question in the results sheet */
export interface QuestionColumns {
  linkColumn: string;
  transcriptColumn: string;
}

export interface ServiceConfig {
  /** Base URL of the speech-to-text job API */
  transcriptionApiUrl: string;
  /** Bearer credential for the speech-to-text API; absence is reported per submission */
  transcriptionApiKey?: string;
  /** Where the provider should POST job notifications */
  callbackUrl?: string;
  /** Interval between status polls in synchronous wait mode */
  pollIntervalMs: number;
  /** Default ceiling for synchronous waits, in seconds */
  maxWaitTimeSeconds: number;
  /** Lowercase file extensions accepted for transcription */
  supportedFormats: ReadonlySet<string>;

  // Google Sheets result store
  spreadsheetId?: string;
  sheetName: string;
  credentialsPath: string;
  emailColumn: string;
  questionColumns: Readonly<Record<string, QuestionColumns>>;

  port: number;
}

export const DEFAULT_TRANSCRIPTION_API_URL = 'https://api.rev.ai/speechtotext/v1';

export const DEFAULT_SUPPORTED_FORMATS: readonly string[] = [
  'mp3', 'mp4', 'ogg', 'wav', 'pcm', 'flac', 'aac', 'm4a', 'wma', 'aiff'
];

const DEFAULT_QUESTION_COLUMNS: Record<string, QuestionColumns> = {
  'Staying Connected': { linkColumn: 'O', transcriptColumn: 'P' }
};

const COLUMN_LETTERS = /^[A-Z]{1,3}$/;

/**
 * Parse and validate service configuration from environment variables
 * @param env - Environment to read, defaults to process.env
 * @returns Frozen configuration object
 * @throws Error if validation fails
 */
export function getServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const transcriptionApiUrl = (env.TRANSCRIPTION_API_URL || DEFAULT_TRANSCRIPTION_API_URL).replace(/\/+$/, '');
  if (!isHttpUrl(transcriptionApiUrl)) {
    throw new Error(`Invalid TRANSCRIPTION_API_URL: "${env.TRANSCRIPTION_API_URL}". Must be an http(s) URL.`);
  }

  const callbackUrl = env.WEBHOOK_CALLBACK_URL || undefined;
  if (callbackUrl !== undefined && !isHttpUrl(callbackUrl)) {
    throw new Error(`Invalid WEBHOOK_CALLBACK_URL: "${callbackUrl}". Must be an http(s) URL.`);
  }

  const pollIntervalMs = parseInt(env.TRANSCRIPTION_POLL_INTERVAL_MS || '10000', 10);
  if (isNaN(pollIntervalMs) || pollIntervalMs < 1 || pollIntervalMs > 600000) {
    throw new Error(`Invalid TRANSCRIPTION_POLL_INTERVAL_MS: "${env.TRANSCRIPTION_POLL_INTERVAL_MS}". Must be a number between 1 and 600000.`);
  }

  const maxWaitTimeSeconds = parseInt(env.TRANSCRIPTION_MAX_WAIT_SECONDS || '300', 10);
  if (isNaN(maxWaitTimeSeconds) || maxWaitTimeSeconds < 1 || maxWaitTimeSeconds > 3600) {
    throw new Error(`Invalid TRANSCRIPTION_MAX_WAIT_SECONDS: "${env.TRANSCRIPTION_MAX_WAIT_SECONDS}". Must be a number between 1 and 3600.`);
  }

  const supportedFormats = parseSupportedFormats(env.SUPPORTED_MEDIA_FORMATS);

  const emailColumn = (env.EMAIL_COLUMN || 'E').toUpperCase();
  if (!COLUMN_LETTERS.test(emailColumn)) {
    throw new Error(`Invalid EMAIL_COLUMN: "${env.EMAIL_COLUMN}". Must be a column letter such as "E".`);
  }

  const questionColumns = env.QUESTION_COLUMN_MAP
    ? parseQuestionColumnMap(env.QUESTION_COLUMN_MAP)
    : DEFAULT_QUESTION_COLUMNS;

  const port = parseInt(env.PORT || '3000', 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT: "${env.PORT}". Must be a number between 1 and 65535.`);
  }

  return Object.freeze({
    transcriptionApiUrl,
    transcriptionApiKey: env.TRANSCRIPTION_API_KEY || undefined,
    callbackUrl,
    pollIntervalMs,
    maxWaitTimeSeconds,
    supportedFormats,
    spreadsheetId: env.SPREADSHEET_ID || undefined,
    sheetName: env.SHEET_NAME || 'Sheet1',
    credentialsPath: env.GOOGLE_APPLICATION_CREDENTIALS || 'credentials.json',
    emailColumn,
    questionColumns: Object.freeze({ ...questionColumns }),
    port,
  });
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function parseSupportedFormats(raw: string | undefined): ReadonlySet<string> {
  if (!raw) {
    return new Set(DEFAULT_SUPPORTED_FORMATS);
  }

  const formats = raw
    .split(',')
    .map(s => s.trim().toLowerCase().replace(/^\./, ''))
    .filter(s => s.length > 0);

  if (formats.length === 0) {
    throw new Error(`Invalid SUPPORTED_MEDIA_FORMATS: "${raw}". Must list at least one extension.`);
  }
  return new Set(formats);
}

/**
 * Parse QUESTION_COLUMN_MAP, a JSON object of
 * `{ "<question>": { "link_column": "O", "transcript_column": "P" } }`
 */
export function parseQuestionColumnMap(raw: string): Record<string, QuestionColumns> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error('Invalid QUESTION_COLUMN_MAP: must be a JSON object.');
  }

  if (!isObject(parsed)) {
    throw new Error('Invalid QUESTION_COLUMN_MAP: must be a JSON object.');
  }

  const result: Record<string, QuestionColumns> = {};
  for (const [question, columns] of Object.entries(parsed)) {
    if (!isObject(columns) || !isString(columns.link_column) || !isString(columns.transcript_column)) {
      throw new Error(`Invalid QUESTION_COLUMN_MAP entry for "${question}": expected link_column and transcript_column.`);
    }
    const linkColumn = columns.link_column.toUpperCase();
    const transcriptColumn = columns.transcript_column.toUpperCase();
    if (!COLUMN_LETTERS.test(linkColumn) || !COLUMN_LETTERS.test(transcriptColumn)) {
      throw new Error(`Invalid QUESTION_COLUMN_MAP entry for "${question}": columns must be letters such as "O".`);
    }
    result[question] = { linkColumn, transcriptColumn };
  }
  return result;
}

/**
 * Get a log-safe summary of the current configuration
 * Credentials are reported by presence only
 */
export function getConfigSummary(config: ServiceConfig): Record<string, unknown> {
  return {
    transcription_api_url: config.transcriptionApiUrl,
    transcription_api_key_present: Boolean(config.transcriptionApiKey),
    callback_url: config.callbackUrl ?? null,
    poll_interval_ms: config.pollIntervalMs,
    max_wait_time_seconds: config.maxWaitTimeSeconds,
    supported_formats: [...config.supportedFormats],
    spreadsheet_configured: Boolean(config.spreadsheetId),
    sheet_name: config.sheetName,
    email_column: config.emailColumn,
    mapped_questions: Object.keys(config.questionColumns),
    port: config.port,
  };
}

/**
 * Transcription job and transcript types
 * Mirrors the speech-to-text provider's job resource, decoded into named fields
 */

/**
 * Normalized job status values
 * - pending: Job accepted but not yet picked up by the provider
 * - in_progress: Provider is transcribing the media
 * - completed: Transcript is available (terminal)
 * - failed: Provider gave up on the job, see failure detail (terminal)
 */
export type JobStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = Object.freeze(['completed', 'failed'] as const);

/**
 * Survey context carried with every job so the callback can be correlated
 * back to a contact and question without a local job table
 */
export interface JobMetadata {
  email: string;
  question: string;
  media_url: string;
  interaction_id?: string;
  answer_id?: string;
  share_id?: string;
  answer_type?: string;
  contact_name?: string;
}

// Status snapshot returned by the provider's job endpoint
export interface JobDetails {
  job_id: string;
  status: JobStatus;
  media_url?: string;
  metadata: Partial<JobMetadata>;
  failure_detail?: string;
  created_on?: string;
}

export type TranscriptElementType = 'text' | 'punct';

// One transcribed token or punctuation mark
export interface TranscriptElement {
  type: TranscriptElementType;
  value: string;
  confidence: number;           // 0..1, punctuation is typically 0
  ts?: number;                  // Seconds from media start
  end_ts?: number;
}

// A contiguous speaker turn
export interface Monologue {
  speaker: number;
  elements: TranscriptElement[];
}

export interface Transcript {
  monologues: Monologue[];
}

/**
 * Parsed provider callback. The transcript is only present when the
 * provider embedded it in the notification body.
 */
export interface CallbackNotification {
  job_id: string;
  status: JobStatus;
  metadata: Partial<JobMetadata>;
  media_url?: string;
  failure_detail?: string;
  transcript?: Transcript;
}

/**
 * Quality reporting types for media, transcript confidence and language analysis
 */

import { JobStatus } from './transcript.js';

export type MediaQualityTier = 'high' | 'medium' | 'low' | 'unknown';

export type MediaKind = 'audio' | 'video';

export type RecommendedBitrate =
  | number
  | { audio: number; video: number };

export interface MediaQualityReport {
  tier: MediaQualityTier;
  media_type?: MediaKind;
  format?: string;
  content_type?: string;
  estimated_bitrate_kbps?: number;
  recommended_minimum_bitrate?: RecommendedBitrate;
  warnings: string[];
  error?: string;
}

export type QualityRating = 'good' | 'fair' | 'poor';

export interface LowConfidenceWord {
  word: string;
  confidence: number;
  timestamp?: number;
}

// Acoustic confidence report for a completed transcript
export interface CompletedQualityReport {
  status: 'completed';
  overall_confidence: number;
  total_words: number;
  low_confidence_count: number;
  low_confidence_words: LowConfidenceWord[];
  quality_rating: QualityRating;
  media_quality: MediaQualityReport;
  warnings: string[];
}

// Returned while the job is still running (or has failed)
export interface PendingQualityReport {
  status: Exclude<JobStatus, 'completed'>;
  message: string;
  media_quality: MediaQualityReport;
}

export type QualityReport = CompletedQualityReport | PendingQualityReport;

export interface TextMetrics {
  sentence_count: number;
  word_count: number;
  avg_words_per_sentence: number;
}

export interface FrequentWord {
  word: string;
  count: number;
}

export interface EntitySpan {
  text: string;
  label: string;
  start: number;
  end: number;
}

export interface LinguisticAnalysis {
  metrics: TextMetrics;
  frequent_words: FrequentWord[];
  entities: EntitySpan[];
  quality_issues: string[];
}

export interface EnhancedTranscript {
  original_text: string;
  enhanced_text: string;
  enhancement_warnings: string[];
  linguistic_analysis: LinguisticAnalysis;
  quality_score: number;
}

/**
 * Acoustic report extended with the linguistic signals.
 * This is the shape written alongside every stored transcript.
 */
export interface MergedQualityReport extends CompletedQualityReport {
  linguistic_quality_score: number;
  enhancement_warnings: string[];
  linguistic_analysis: LinguisticAnalysis;
}

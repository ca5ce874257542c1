import {
  CompletedQualityReport,
  JobStatus,
  LowConfidenceWord,
  MediaQualityReport,
  QualityRating,
  QualityReport,
  Transcript,
} from '@survey-transcription/shared';

/** Words below this confidence are reported individually */
export const LOW_CONFIDENCE_THRESHOLD = 0.8;

/** Fraction of low-confidence words above which the transcript is flagged */
const UNCERTAIN_WORD_RATIO = 0.1;

export function rateConfidence(confidence: number): QualityRating {
  if (confidence > 0.9) {
    return 'good';
  }
  return confidence > 0.8 ? 'fair' : 'poor';
}

/**
 * Score a transcript from the provider's per-word confidences
 *
 * Only `text` elements count as words. A job that is not completed
 * short-circuits to a not-ready report carrying the media quality alone.
 * A completed job without a transcript scores as zero words.
 */
export function scoreTranscript(
  status: JobStatus,
  transcript: Transcript | null,
  mediaQuality: MediaQualityReport
): QualityReport {
  if (status !== 'completed') {
    return {
      status,
      message: 'Transcript not ready yet',
      media_quality: mediaQuality,
    };
  }

  return scoreCompletedTranscript(transcript ?? { monologues: [] }, mediaQuality);
}

/**
 * Confidence metrics for a transcript known to be complete
 */
export function scoreCompletedTranscript(
  transcript: Transcript,
  mediaQuality: MediaQualityReport
): CompletedQualityReport {
  let totalConfidence = 0;
  let totalWords = 0;
  const lowConfidenceWords: LowConfidenceWord[] = [];

  for (const monologue of transcript.monologues) {
    for (const element of monologue.elements) {
      if (element.type !== 'text') {
        continue;
      }
      totalWords++;
      totalConfidence += element.confidence;

      if (element.confidence < LOW_CONFIDENCE_THRESHOLD) {
        const word: LowConfidenceWord = { word: element.value, confidence: element.confidence };
        if (element.ts !== undefined) {
          word.timestamp = element.ts;
        }
        lowConfidenceWords.push(word);
      }
    }
  }

  const overallConfidence = totalWords > 0 ? totalConfidence / totalWords : 0;

  const warnings: string[] = [];
  if (overallConfidence < LOW_CONFIDENCE_THRESHOLD) {
    warnings.push('Low overall confidence score');
  }
  if (totalWords > 0 && lowConfidenceWords.length / totalWords > UNCERTAIN_WORD_RATIO) {
    warnings.push('High number of uncertain words');
  }

  const report: CompletedQualityReport = {
    status: 'completed',
    overall_confidence: overallConfidence,
    total_words: totalWords,
    low_confidence_count: lowConfidenceWords.length,
    low_confidence_words: lowConfidenceWords,
    quality_rating: rateConfidence(overallConfidence),
    media_quality: mediaQuality,
    warnings,
  };
  return report;
}

/**
 * Media quality estimation from a HEAD request
 *
 * The bitrate is derived from the file size under a fixed three minute
 * duration, so tiers are indicative only.
 */

import { lookup } from 'mime-types';
import { MediaKind, MediaQualityReport, MediaQualityTier } from '@survey-transcription/shared';
import { getFileExtension } from './mediaFormat.js';
import { debugMediaQuality } from './debugLogger.js';
import { logger } from './logger.js';
import { toError } from './errors.js';

export type MediaQualityEstimator = (
  url: string,
  headers?: Record<string, string>
) => Promise<MediaQualityReport>;

interface BitrateBands {
  high: number;
  medium: number;
  low: number;
}

interface VideoBitrateBands {
  high: { audio: number; video: number };
  medium: { audio: number; video: number };
  low: { audio: number; video: number };
}

// kbps, keyed by file extension
export const AUDIO_QUALITY_THRESHOLDS: Readonly<Record<string, BitrateBands>> = {
  mp3: { high: 192, medium: 128, low: 64 },
  aac: { high: 256, medium: 192, low: 128 },
  m4a: { high: 256, medium: 192, low: 128 },
};

export const VIDEO_QUALITY_THRESHOLDS: Readonly<Record<string, VideoBitrateBands>> = {
  mp4: {
    high: { audio: 192, video: 2000 },
    medium: { audio: 128, video: 1000 },
    low: { audio: 96, video: 500 },
  },
};

const ASSUMED_DURATION_SECONDS = 180;
const HEAD_TIMEOUT_MS = 15000;

/**
 * Media kind from the URL's MIME type
 */
export function getMediaKind(url: string): MediaKind | null {
  let path = url;
  try {
    path = new URL(url).pathname;
  } catch {
    path = url.split(/[?#]/)[0] ?? url;
  }

  const mimeType = lookup(path);
  if (!mimeType) {
    return null;
  }

  const kind = mimeType.split('/')[0];
  return kind === 'audio' || kind === 'video' ? kind : null;
}

function tierFor(bitrate: number, high: number, medium: number): MediaQualityTier {
  if (bitrate >= high) {
    return 'high';
  }
  return bitrate >= medium ? 'medium' : 'low';
}

/**
 * Estimate media quality for a URL
 * Never throws; failures come back as an `unknown` tier with the error attached.
 */
export async function estimateMediaQuality(
  url: string,
  headers: Record<string, string> = {}
): Promise<MediaQualityReport> {
  const kind = getMediaKind(url);
  if (!kind) {
    return { tier: 'unknown', warnings: ['Could not determine media type'] };
  }

  const format = getFileExtension(url) ?? undefined;

  try {
    const response = await fetch(url, {
      method: 'HEAD',
      headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(HEAD_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new Error(`HEAD ${url} returned ${response.status}`);
    }

    const contentLength = parseInt(response.headers.get('content-length') ?? '0', 10) || 0;
    const contentType = response.headers.get('content-type') ?? '';
    const bitrate = (contentLength * 8) / (ASSUMED_DURATION_SECONDS * 1000);

    const report: MediaQualityReport = {
      tier: 'unknown',
      media_type: kind,
      content_type: contentType,
      estimated_bitrate_kbps: bitrate,
      warnings: [],
    };
    if (format) {
      report.format = format;
    }

    const audioBands = kind === 'audio' && format ? AUDIO_QUALITY_THRESHOLDS[format] : undefined;
    const videoBands = kind === 'video' && format ? VIDEO_QUALITY_THRESHOLDS[format] : undefined;

    if (audioBands) {
      report.tier = tierFor(bitrate, audioBands.high, audioBands.medium);
      report.recommended_minimum_bitrate = audioBands.medium;
      if (report.tier === 'low') {
        report.warnings.push(
          'Low quality audio file may result in poor transcription',
          `Recommended minimum bitrate: ${audioBands.medium} kbps`
        );
      }
    } else if (videoBands) {
      report.tier = tierFor(
        bitrate,
        videoBands.high.audio + videoBands.high.video,
        videoBands.medium.audio + videoBands.medium.video
      );
      report.recommended_minimum_bitrate = { ...videoBands.medium };
      if (report.tier === 'low') {
        report.warnings.push(
          'Low quality video file may result in poor transcription',
          `Recommended minimum bitrate: Audio ${videoBands.medium.audio} kbps, Video ${videoBands.medium.video} kbps`
        );
      }
    }

    debugMediaQuality('Media quality estimated', {
      url,
      tier: report.tier,
      bitrateKbps: bitrate,
      contentLength,
    });
    return report;
  } catch (error) {
    const message = toError(error).message;
    logger.warn('media_quality', 'Could not analyze media quality', {
      error: message,
      metadata: { url },
    });
    return { tier: 'unknown', warnings: ['Could not analyze media quality'], error: message };
  }
}

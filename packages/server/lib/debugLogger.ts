/**
 * Debug Logger Utility
 *
 * Debug logs are suppressed in test mode unless LOG_LEVEL=debug or
 * DEBUG_LOGGING=true is set.
 */

import { Logger, LogContext } from './logger.js';

const debugLogger = new Logger({
  minLevel: process.env.NODE_ENV === 'test' ? 'warn' : 'debug'
});

export function debugLog(context: LogContext, message: string, metadata?: Record<string, unknown>): void {
  if (process.env.NODE_ENV === 'test') {
    const debugEnabled = process.env.LOG_LEVEL === 'debug' || process.env.DEBUG_LOGGING === 'true';
    if (!debugEnabled) {
      return;
    }
  }

  debugLogger.debug(context, message, { metadata });
}

export function debugTranscription(message: string, metadata?: Record<string, unknown>): void {
  debugLog('transcription', message, metadata);
}

export function debugMediaQuality(message: string, metadata?: Record<string, unknown>): void {
  debugLog('media_quality', message, metadata);
}

export function debugNlp(message: string, metadata?: Record<string, unknown>): void {
  debugLog('nlp', message, metadata);
}

export function debugStorage(message: string, metadata?: Record<string, unknown>): void {
  debugLog('storage', message, metadata);
}

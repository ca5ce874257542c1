import { readFileSync } from 'node:fs';
import { isString } from '@survey-transcription/shared';

const STOPWORDS_FILE = new URL('../../data/stopwords.json', import.meta.url);

let cached: ReadonlySet<string> | undefined;

/**
 * Lowercase English stopwords excluded from word frequency counts
 * Read once from data/stopwords.json.
 */
export function loadStopwords(): ReadonlySet<string> {
  if (cached) {
    return cached;
  }

  const parsed: unknown = JSON.parse(readFileSync(STOPWORDS_FILE, 'utf8'));
  if (!Array.isArray(parsed) || !parsed.every(isString)) {
    throw new Error(`Invalid stopword list in ${STOPWORDS_FILE.pathname}: expected an array of strings`);
  }

  cached = new Set(parsed.map(word => word.toLowerCase()));
  return cached;
}

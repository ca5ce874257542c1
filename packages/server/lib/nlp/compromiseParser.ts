import nlp from 'compromise';
import { EntitySpan, isNumber, isObject, isString } from '@survey-transcription/shared';
import { LanguageParser, ParsedText, TextSpan } from './languageParser.js';

const WORD_PATTERN = /[\p{L}\p{N}]/u;

/**
 * LanguageParser backed by compromise
 *
 * compromise returns loosely typed JSON, so every field read from it is
 * checked before use. Spans are located in the original text by exact match,
 * falling back to the library's own offsets.
 */
export class CompromiseParser implements LanguageParser {
  parse(text: string): ParsedText {
    if (!text.trim()) {
      return { sentences: [], words: [], entities: [] };
    }

    const doc = nlp(text);
    const sentenceItems = asItems(doc.json({ offset: true }));

    const sentences = locateSpans(sentenceItems, text);
    const words = sentenceItems.flatMap(readWords);

    const entities: EntitySpan[] = [
      ...toEntities(asItems(doc.people().json({ offset: true })), text, 'PERSON'),
      ...toEntities(asItems(doc.places().json({ offset: true })), text, 'PLACE'),
      ...toEntities(asItems(doc.organizations().json({ offset: true })), text, 'ORG'),
    ].sort((a, b) => a.start - b.start);

    return { sentences, words, entities };
  }
}

function asItems(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isObject) : [];
}

function readWords(item: Record<string, unknown>): string[] {
  if (!Array.isArray(item.terms)) {
    return [];
  }
  const words: string[] = [];
  for (const term of item.terms) {
    if (isObject(term) && isString(term.text) && WORD_PATTERN.test(term.text)) {
      words.push(term.text);
    }
  }
  return words;
}

function readOffset(item: Record<string, unknown>): { start: number; length: number } | null {
  const offset = item.offset;
  if (isObject(offset) && isNumber(offset.start) && isNumber(offset.length)) {
    return { start: offset.start, length: offset.length };
  }
  return null;
}

/**
 * Resolve each item to a span of `text`, searching forward from the previous match
 */
function locateSpans(items: Record<string, unknown>[], text: string): TextSpan[] {
  const spans: TextSpan[] = [];
  let cursor = 0;

  for (const item of items) {
    const itemText = isString(item.text) ? item.text.trim() : '';
    if (!itemText) {
      continue;
    }

    let start = text.indexOf(itemText, cursor);
    let end = start + itemText.length;

    if (start === -1) {
      const offset = readOffset(item);
      if (!offset) {
        continue;
      }
      start = offset.start;
      end = offset.start + offset.length;
      // Offsets may include leading whitespace
      while (start < end && /\s/.test(text.charAt(start))) {
        start++;
      }
    }

    spans.push({ text: text.slice(start, end), start, end });
    cursor = end;
  }

  return spans;
}

function toEntities(items: Record<string, unknown>[], text: string, label: string): EntitySpan[] {
  return locateSpans(items, text).map(span => ({
    text: span.text,
    label,
    start: span.start,
    end: span.end,
  }));
}

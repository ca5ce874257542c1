import { EntitySpan } from '@survey-transcription/shared';

/** A character range of the parsed text; `end` is exclusive */
export interface TextSpan {
  text: string;
  start: number;
  end: number;
}

export interface ParsedText {
  /** Sentences in document order */
  sentences: TextSpan[];
  /** Word tokens with punctuation removed */
  words: string[];
  entities: EntitySpan[];
}

/**
 * Boundary around the NLP toolkit
 * The analyzer only needs sentence spans, word tokens and named entities.
 */
export interface LanguageParser {
  parse(text: string): ParsedText;
}

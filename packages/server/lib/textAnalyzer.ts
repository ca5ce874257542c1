/**
 * Linguistic analysis and readability enhancement of transcript text
 */

import {
  EnhancedTranscript,
  FrequentWord,
  LinguisticAnalysis,
} from '@survey-transcription/shared';
import { LanguageParser, ParsedText } from './nlp/languageParser.js';
import { debugNlp } from './debugLogger.js';

export interface EnhancementResult {
  enhancedText: string;
  warnings: string[];
}

const TOP_WORD_LIMIT = 10;
const REPETITION_RATIO = 0.1;
const PARAGRAPH_THRESHOLD = 5;
const SENTENCES_PER_PARAGRAPH = 3;

export class TextAnalyzer {
  private readonly parser: LanguageParser;
  private readonly stopwords: ReadonlySet<string>;

  constructor(parser: LanguageParser, stopwords: ReadonlySet<string>) {
    this.parser = parser;
    this.stopwords = stopwords;
  }

  /**
   * Sentence and word metrics, frequent words, entities and content issues
   */
  analyze(text: string): LinguisticAnalysis {
    return this.analyzeParsed(this.parser.parse(text));
  }

  /**
   * Capitalize sentence starts, break long answers into paragraphs and
   * close the final sentence. All three steps edit the same working text.
   */
  enhance(text: string): EnhancementResult {
    return this.enhanceParsed(text, this.parser.parse(text));
  }

  /**
   * Score in [0, 1]; each issue, a short answer and a missing or run-on
   * sentence structure lower it
   */
  score(analysis: LinguisticAnalysis): number {
    const { metrics } = analysis;
    let score = 1.0;

    score -= analysis.quality_issues.length * 0.1;

    if (metrics.word_count < 20) {
      score -= 0.2;
    } else if (metrics.word_count < 50) {
      score -= 0.1;
    }

    if (metrics.sentence_count === 0) {
      score -= 0.3;
    } else if (metrics.avg_words_per_sentence > 40) {
      score -= 0.2;
    }

    return Math.max(0, Math.min(1, score));
  }

  analyzeAndEnhance(text: string): EnhancedTranscript {
    const parsed = this.parser.parse(text);
    const analysis = this.analyzeParsed(parsed);
    const { enhancedText, warnings } = this.enhanceParsed(text, parsed);
    const qualityScore = this.score(analysis);

    debugNlp('Transcript analyzed', {
      sentences: analysis.metrics.sentence_count,
      words: analysis.metrics.word_count,
      issues: analysis.quality_issues.length,
      qualityScore,
    });

    return {
      original_text: text,
      enhanced_text: enhancedText,
      enhancement_warnings: warnings,
      linguistic_analysis: analysis,
      quality_score: qualityScore,
    };
  }

  private analyzeParsed(parsed: ParsedText): LinguisticAnalysis {
    const sentenceCount = parsed.sentences.length;
    const wordCount = parsed.words.length;

    const frequentWords = this.topWords(parsed.words);

    const issues: string[] = [];
    if (sentenceCount === 0) {
      issues.push('No complete sentences detected');
    } else if (sentenceCount === 1 && wordCount > 50) {
      issues.push('Long text without proper sentence breaks');
    }

    if (wordCount < 10) {
      issues.push('Very short response');
    }

    for (const { word, count } of frequentWords) {
      if (count > wordCount * REPETITION_RATIO) {
        issues.push(`Frequent repetition of word '${word}'`);
      }
    }

    return {
      metrics: {
        sentence_count: sentenceCount,
        word_count: wordCount,
        avg_words_per_sentence: sentenceCount > 0 ? wordCount / sentenceCount : 0,
      },
      frequent_words: frequentWords,
      entities: parsed.entities,
      quality_issues: issues,
    };
  }

  // Count descending; Map keeps first-seen order and sort is stable, so ties stay in text order
  private topWords(words: string[]): FrequentWord[] {
    const counts = new Map<string, number>();
    for (const word of words) {
      const key = word.toLowerCase().trim();
      if (!key || this.stopwords.has(key)) {
        continue;
      }
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    return [...counts.entries()]
      .map(([word, count]) => ({ word, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, TOP_WORD_LIMIT);
  }

  private enhanceParsed(text: string, parsed: ParsedText): EnhancementResult {
    if (!text.trim()) {
      return { enhancedText: text.trim(), warnings: [] };
    }

    const warnings: string[] = [];
    const starts = parsed.sentences.map(sentence => sentence.start).sort((a, b) => a - b);
    let working = text;

    for (const start of starts) {
      const first = working.charAt(start);
      const upper = first.toUpperCase();
      if (/\p{Ll}/u.test(first) && upper.length === 1) {
        working = working.slice(0, start) + upper + working.slice(start + 1);
      }
    }

    if (starts.length > PARAGRAPH_THRESHOLD) {
      const sentences = starts
        .map((start, index) => working.slice(start, starts[index + 1] ?? working.length).trim())
        .filter(sentence => sentence.length > 0);

      const paragraphs: string[] = [];
      for (let i = 0; i < sentences.length; i += SENTENCES_PER_PARAGRAPH) {
        paragraphs.push(sentences.slice(i, i + SENTENCES_PER_PARAGRAPH).join(' '));
      }
      working = paragraphs.join('\n\n');
    }

    let enhancedText = working.trim();
    if (!/[.!?]$/.test(enhancedText)) {
      enhancedText += '.';
      warnings.push('Added missing sentence-ending punctuation');
    }

    return { enhancedText, warnings };
  }
}

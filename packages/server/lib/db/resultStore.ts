import { CompletedQualityReport } from '@survey-transcription/shared';
import { QuestionColumns } from '../../config/serviceConfig.js';
import { log } from '../logger.js';
import { toError } from '../errors.js';
import { SheetRangeClient } from './googleSheetsClient.js';

export interface ResultStoreConfig {
  sheetName: string;
  emailColumn: string;
  questionColumns: Readonly<Record<string, QuestionColumns>>;
}

/** The parts of a quality report that end up in the sheet */
export type StoredQualitySummary = Pick<CompletedQualityReport, 'overall_confidence' | 'warnings'>;

/**
 * Append the quality footer when the report carries warnings
 */
export function formatTranscriptCell(transcriptText: string, quality: StoredQualitySummary): string {
  if (quality.warnings.length === 0) {
    return transcriptText;
  }

  const lines = [
    'Quality Notes:',
    `- Confidence: ${(quality.overall_confidence * 100).toFixed(2)}%`,
    ...quality.warnings.map(warning => `- ${warning}`),
  ];
  return `${transcriptText}\n\n${lines.join('\n')}`;
}

/**
 * A1 range on a named sheet; names other than plain letters, digits and
 * underscores are quoted, with embedded quotes doubled
 */
export function sheetRange(sheetName: string, cells: string): string {
  if (/^[A-Za-z0-9_]+$/.test(sheetName)) {
    return `${sheetName}!${cells}`;
  }
  return `'${sheetName.replace(/'/g, "''")}'!${cells}`;
}

/**
 * Writes transcripts into a results spreadsheet, one row per contact email
 *
 * The row is found by scanning the email column; an unknown email goes on
 * the row after the last filled cell of column A. The read and the append are
 * separate calls, so two concurrent writes for the same new email can both
 * append.
 */
export class ResultStore {
  private readonly client: SheetRangeClient | null;
  private readonly config: ResultStoreConfig;

  constructor(client: SheetRangeClient | null, config: ResultStoreConfig) {
    this.client = client;
    this.config = config;
  }

  get configured(): boolean {
    return this.client !== null;
  }

  /**
   * Write the media link and transcript for one answer
   * @returns false when the question has no column mapping, no spreadsheet is
   *          configured, or a sheet call fails
   */
  async upsert(
    email: string,
    question: string,
    mediaUrl: string,
    transcriptText: string,
    quality: StoredQualitySummary
  ): Promise<boolean> {
    const columns = this.config.questionColumns[question];
    if (!columns) {
      log.warn('storage', 'No column mapping for question', { question });
      return false;
    }

    if (!this.client) {
      log.warn('storage', 'Result store is not configured; transcript not stored', { email, question });
      return false;
    }

    try {
      const row = await this.findOrAllocateRow(this.client, email);
      const { sheetName } = this.config;

      await this.client.writeCell(sheetRange(sheetName, `${columns.linkColumn}${row}`), mediaUrl);
      await this.client.writeCell(
        sheetRange(sheetName, `${columns.transcriptColumn}${row}`),
        formatTranscriptCell(transcriptText, quality)
      );

      log.info('storage', 'Transcript stored', { email, question, row });
      return true;
    } catch (error) {
      log.error('storage', 'Failed to store transcript', toError(error), { email, question });
      return false;
    }
  }

  private async findOrAllocateRow(client: SheetRangeClient, email: string): Promise<number> {
    const { sheetName, emailColumn } = this.config;

    const emails = await client.readColumn(sheetRange(sheetName, `${emailColumn}:${emailColumn}`));
    const index = emails.findIndex(value => value === email);
    if (index !== -1) {
      return index + 1;
    }

    const filled = await client.readColumn(sheetRange(sheetName, 'A:A'));
    return filled.length + 1;
  }
}

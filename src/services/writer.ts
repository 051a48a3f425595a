import fs from 'fs';
import path from 'path';
import { ReportRecord } from '../types/report';
import { WriteError } from '../errors';
import { formatRecordDate } from './dates';

/**
 * Destination for extracted records
 */
export interface RecordSink {
  open(): Promise<void>;
  write(records: Iterable<ReportRecord>): Promise<number>;
}

// Pipes inside a field would shift the columns
function psvField(value: string): string {
  return value.replace(/\|/g, ' ').trim();
}

export function formatRecord(record: ReportRecord): string {
  return [formatRecordDate(record.date), record.unit, record.power, record.reason]
    .map((field, index) => (index === 0 ? field : psvField(field)))
    .join('|');
}

/**
 * Appends records as pipe-delimited lines to a single output file
 */
export class PsvWriter implements RecordSink {
  readonly outputPath: string;

  constructor(outputPath: string) {
    this.outputPath = outputPath;
  }

  /**
   * Create the output directory and start the file empty
   */
  async open(): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.outputPath), { recursive: true });
      await fs.promises.writeFile(this.outputPath, '', 'utf8');
    } catch (error) {
      throw new WriteError(this.outputPath, error);
    }
  }

  /**
   * Append one day's records in the order given.
   * The sequence is fully consumed before anything is written.
   */
  async write(records: Iterable<ReportRecord>): Promise<number> {
    const lines: string[] = [];
    for (const record of records) {
      lines.push(`${formatRecord(record)}\n`);
    }
    if (lines.length === 0) return 0;

    try {
      await fs.promises.appendFile(this.outputPath, lines.join(''), 'utf8');
    } catch (error) {
      throw new WriteError(this.outputPath, error);
    }
    return lines.length;
  }
}

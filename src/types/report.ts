/**
 * A calendar day, independent of time zone. Month and day are 1-based.
 */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/**
 * One reactor unit's status line for one report day
 */
export interface ReportRecord {
  readonly date: CalendarDate;
  readonly unit: string;
  readonly power: string;
  readonly reason: string;
}

export type ErrorPolicy = 'skip' | 'abort';

export interface DayFailure {
  date: string;
  error: string;
}

/**
 * Outcome of a full scraping run
 */
export interface RunSummary {
  daysProcessed: number;
  daysFailed: number;
  recordsWritten: number;
  failures: DayFailure[];
  outputPath: string;
  durationSeconds: number;
}

import { CalendarDate } from './types/report';
import { formatIsoDate } from './services/dates';

/**
 * Base class for failures tied to a single report day
 */
export class ScraperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Report page could not be retrieved (network error, non-2xx status, or cache write failure)
 */
export class FetchError extends ScraperError {
  readonly date: CalendarDate;
  readonly url: string;
  readonly status?: number;
  readonly attempts: number;

  constructor(
    date: CalendarDate,
    url: string,
    attempts: number,
    options: { status?: number; cause?: unknown } = {}
  ) {
    const reason = options.cause instanceof Error ? options.cause.message : 'unknown error';
    super(`Failed to fetch ${url} for ${formatIsoDate(date)} after ${attempts} attempt(s): ${reason}`, {
      cause: options.cause,
    });
    this.date = date;
    this.url = url;
    this.status = options.status;
    this.attempts = attempts;
  }
}

/**
 * Report page has a status table whose layout cannot be read
 */
export class ParseError extends ScraperError {
  readonly date: CalendarDate;

  constructor(date: CalendarDate, message: string) {
    super(`Could not parse report for ${formatIsoDate(date)}: ${message}`);
    this.date = date;
  }
}

export class WriteError extends ScraperError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${path}: ${reason}`, { cause });
    this.path = path;
  }
}

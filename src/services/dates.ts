import { CalendarDate } from '../types/report';

export const NRC_1999_BASE_URL =
  'https://www.nrc.gov/reading-rm/doc-collections/event-status/reactor-status/1999';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Yield every day of the given year in ascending order
 */
export function* iterDates(year: number): Generator<CalendarDate> {
  const end = Date.UTC(year, 11, 31);
  for (let t = Date.UTC(year, 0, 1); t <= end; t += DAY_MS) {
    const d = new Date(t);
    yield { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
  }
}

export function iterDates1999(): Generator<CalendarDate> {
  return iterDates(1999);
}

const pad = (n: number, width: number): string => n.toString().padStart(width, '0');

/**
 * YYYYMMDD, as used in report URLs and cache file names
 */
export function formatCompactDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}${pad(date.month, 2)}${pad(date.day, 2)}`;
}

/**
 * M/D/YYYY without zero padding
 */
export function formatRecordDate(date: CalendarDate): string {
  return `${date.month}/${date.day}/${date.year}`;
}

export function formatIsoDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

export function reportUrlForDate(date: CalendarDate, baseUrl: string = NRC_1999_BASE_URL): string {
  return `${baseUrl.replace(/\/+$/, '')}/${formatCompactDate(date)}ps.html`;
}

export function daysInYear(year: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return leap ? 366 : 365;
}

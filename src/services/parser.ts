import * as cheerio from 'cheerio';
import { CalendarDate, ReportRecord } from '../types/report';
import { ParseError } from '../errors';

type TableRows = string[][];

export function normalizeSpace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Read the cell text of every outermost table on the page.
 * Rows of nested tables are read as rows of the outermost table, and a row that
 * only wraps a nested table is skipped. Blank rows are dropped; <br> and <p>
 * inside a cell count as whitespace.
 */
export function readTables(html: string): TableRows[] {
  const $ = cheerio.load(html);
  const tables: TableRows[] = [];

  $('table').each((_, table) => {
    if ($(table).parents('table').length > 0) return;

    const rows: TableRows = [];
    $(table)
      .find('tr')
      .filter((_, tr) => $(tr).find('table').length === 0)
      .each((_, tr) => {
        const cells = $(tr)
          .children('td, th')
          .map((_, cell) => {
            const $cell = $(cell);
            $cell.find('br, p').before(' ');
            return normalizeSpace($cell.text());
          })
          .get();

        if (cells.some(cell => cell !== '')) {
          rows.push(cells);
        }
      });

    if (rows.length > 0) {
      tables.push(rows);
    }
  });

  return tables;
}

function findColumn(headers: string[], predicate: (header: string) => boolean): number | null {
  const index = headers.findIndex(predicate);
  return index === -1 ? null : index;
}

/**
 * Lazily extract unit status records from one day's report page.
 * Tables without a Unit/Power header and rows that do not fit the header are skipped.
 */
export function* extractRecords(date: CalendarDate, html: string): Generator<ReportRecord> {
  for (const table of readTables(html)) {
    const headerIndex = table.findIndex(row => {
      const lowered = row.map(cell => cell.toLowerCase());
      return lowered.some(cell => cell === 'unit') && lowered.some(cell => cell.startsWith('power'));
    });
    if (headerIndex === -1) continue;

    const headers = table[headerIndex].map(cell => cell.toLowerCase());
    const unitIndex = findColumn(headers, h => h === 'unit' || h.startsWith('unit '));
    const powerIndex = findColumn(headers, h => h === 'power' || h.startsWith('power '));
    const reasonIndex = findColumn(headers, h => h.includes('reason') && h.includes('comment'));

    if (unitIndex === null || powerIndex === null) {
      throw new ParseError(date, `status table header has no usable power column: ${headers.join(' | ')}`);
    }

    for (const row of table.slice(headerIndex + 1)) {
      if (unitIndex >= row.length || powerIndex >= row.length) continue;

      const unit = row[unitIndex];
      // Repeated header rows appear on long reports
      if (unit === '' || unit.toLowerCase() === 'unit') continue;

      yield {
        date,
        unit,
        power: row[powerIndex],
        reason: reasonIndex !== null && reasonIndex < row.length ? row[reasonIndex] : '',
      };
    }
  }
}

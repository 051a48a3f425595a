#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig } from './config';
import { runOnce } from './jobs/runOnce';

export { loadConfig } from './config';
export type { ScraperConfig } from './config';
export { runOnce } from './jobs/runOnce';
export { ReportFetcher } from './services/fetcher';
export { extractRecords } from './services/parser';
export { PsvWriter, formatRecord } from './services/writer';
export { iterDates, iterDates1999 } from './services/dates';
export { ScraperError, FetchError, ParseError, WriteError } from './errors';
export type { CalendarDate, ReportRecord, RunSummary } from './types/report';

/**
 * Command-line entry point
 */
async function main(): Promise<void> {
  dotenv.config();

  const config = loadConfig(process.argv.slice(2));
  if (config.onError === 'abort') {
    console.log('🔄 Running with abort-on-error policy');
  }

  const summary = await runOnce(config);

  console.log('\n=== SCRAPING SUMMARY ===');
  console.log(`Days processed: ${summary.daysProcessed}`);
  console.log(`Days failed: ${summary.daysFailed}`);
  console.log(`Rows written: ${summary.recordsWritten}`);
  console.log(`Duration: ${summary.durationSeconds.toFixed(1)}s`);
  if (summary.failures.length > 0) {
    console.log('\nFailures:');
    summary.failures.forEach(failure => {
      console.log(`  - ${failure.date}: ${failure.error}`);
    });
  }
  console.log('========================\n');
}

if (require.main === module) {
  main()
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      console.error('Script failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}

import { RunSummary, DayFailure } from '../types/report';
import { ScraperConfig } from '../config';
import { ScraperError } from '../errors';
import { ReportFetcher } from '../services/fetcher';
import { extractRecords } from '../services/parser';
import { PsvWriter, RecordSink } from '../services/writer';
import { NotificationService } from '../services/notifications';
import { daysInYear, formatIsoDate, iterDates1999 } from '../services/dates';

export interface RunDependencies {
  fetcher: Pick<ReportFetcher, 'fetchReport'>;
  sink: RecordSink;
  notifier: NotificationService | null;
}

const PROGRESS_EVERY = 10;

// Only dependencies the caller did not supply are built
function resolveDependencies(config: ScraperConfig, overrides: Partial<RunDependencies>): RunDependencies {
  let notifier = overrides.notifier;
  if (notifier === undefined) {
    notifier = config.ntfyTopic ? new NotificationService(config.ntfyTopic, config.ntfyServer) : null;
  }

  return {
    fetcher: overrides.fetcher ?? new ReportFetcher(config.fetcher),
    sink: overrides.sink ?? new PsvWriter(config.outputPath),
    notifier,
  };
}

/**
 * Scrape every 1999 report day once: fetch, extract, append to the output file
 */
async function runOnce(config: ScraperConfig, overrides: Partial<RunDependencies> = {}): Promise<RunSummary> {
  const { fetcher, sink, notifier } = resolveDependencies(config, overrides);
  const started = Date.now();
  const totalDays = daysInYear(1999);

  console.log('Starting NRC 1999 reactor status scrape...');
  console.log(`Output: ${config.outputPath}`);
  console.log(config.fetcher.cacheDir ? `Cache: ${config.fetcher.cacheDir}` : '🚫 HTML cache disabled');

  let daysProcessed = 0;
  let recordsWritten = 0;
  const failures: DayFailure[] = [];
  let stage = 'opening output';

  try {
    await sink.open();

    for (const date of iterDates1999()) {
      daysProcessed++;
      stage = `day ${daysProcessed} of ${totalDays}`;

      try {
        const html = await fetcher.fetchReport(date);
        recordsWritten += await sink.write(extractRecords(date, html));
      } catch (error) {
        if (!(error instanceof ScraperError) || config.onError === 'abort') {
          throw error;
        }
        console.warn(`[WARN] ${formatIsoDate(date)} failed: ${error.message}`);
        failures.push({ date: formatIsoDate(date), error: error.message });
      }

      if (daysProcessed % PROGRESS_EVERY === 0) {
        console.log(`[INFO] processed ${daysProcessed}/${totalDays} days; rows so far: ${recordsWritten}`);
      }
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    console.error('❌ Scrape aborted:', errorMessage);

    if (notifier) {
      await notifier.sendErrorNotification(errorMessage, stage);
    }
    throw error;
  }

  const summary: RunSummary = {
    daysProcessed,
    daysFailed: failures.length,
    recordsWritten,
    failures,
    outputPath: config.outputPath,
    durationSeconds: (Date.now() - started) / 1000,
  };

  console.log(`✅ Wrote ${recordsWritten} rows to ${config.outputPath}`);

  if (notifier) {
    await notifier.sendRunSummary(summary);
  }

  return summary;
}

export { runOnce };

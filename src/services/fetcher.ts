import fs from 'fs';
import path from 'path';
import axios from 'axios';
import { CalendarDate } from '../types/report';
import { FetchError } from '../errors';
import { NRC_1999_BASE_URL, formatCompactDate, formatIsoDate, reportUrlForDate } from './dates';

export interface FetcherOptions {
  baseUrl: string;
  /** Directory holding one HTML file per day; null disables caching */
  cacheDir: string | null;
  retries: number;
  backoffMs: number;
  timeoutMs: number;
  userAgent: string;
}

export const DEFAULT_FETCHER_OPTIONS: FetcherOptions = {
  baseUrl: NRC_1999_BASE_URL,
  cacheDir: path.join('.cache', 'nrc_1999_html'),
  retries: 5,
  backoffMs: 1250,
  timeoutMs: 30000,
  userAgent: 'Mozilla/5.0 (compatible; nrc-status-scraper/1.0)',
};

/**
 * Retrieves daily report pages, serving them from the on-disk cache when present
 */
export class ReportFetcher {
  private options: FetcherOptions;

  constructor(options: Partial<FetcherOptions> = {}) {
    this.options = { ...DEFAULT_FETCHER_OPTIONS, ...options };

    if (this.options.retries < 1) {
      throw new Error('Fetcher retries must be at least 1');
    }
  }

  cachePathFor(date: CalendarDate): string | null {
    if (this.options.cacheDir === null) return null;
    return path.join(this.options.cacheDir, `${formatCompactDate(date)}.html`);
  }

  /**
   * Return the raw HTML for a day's report
   */
  async fetchReport(date: CalendarDate): Promise<string> {
    const cachePath = this.cachePathFor(date);

    if (cachePath !== null && fs.existsSync(cachePath)) {
      try {
        return await fs.promises.readFile(cachePath, 'utf8');
      } catch (error) {
        throw new FetchError(date, cachePath, 0, { cause: error });
      }
    }

    const url = reportUrlForDate(date, this.options.baseUrl);
    const html = await this.download(date, url);

    if (cachePath !== null) {
      await this.storeInCache(date, url, cachePath, html);
    }

    return html;
  }

  /**
   * Write through a temporary file so a cache entry is either complete or absent
   */
  private async storeInCache(date: CalendarDate, url: string, cachePath: string, html: string): Promise<void> {
    const tmpPath = `${cachePath}.tmp`;

    try {
      await fs.promises.mkdir(path.dirname(cachePath), { recursive: true });
      await fs.promises.writeFile(tmpPath, html, 'utf8');
      await fs.promises.rename(tmpPath, cachePath);
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        console.error(`Could not remove partial cache file ${tmpPath}:`, cleanupError);
      });
      throw new FetchError(date, url, 1, { cause: error });
    }
  }

  private async download(date: CalendarDate, url: string): Promise<string> {
    const { retries, backoffMs } = this.options;
    let lastError: unknown = null;
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= retries; attempt++) {
      try {
        const response = await axios.get<string>(url, {
          headers: { 'User-Agent': this.options.userAgent },
          timeout: this.options.timeoutMs,
          responseType: 'text',
        });
        return typeof response.data === 'string' ? response.data : String(response.data);
      } catch (error) {
        lastError = error;
        lastStatus = axios.isAxiosError(error) ? error.response?.status : undefined;
        const message = error instanceof Error ? error.message : String(error);
        console.log(`Fetch attempt ${attempt}/${retries} for ${formatIsoDate(date)} failed: ${message}`);

        if (attempt < retries && backoffMs > 0) {
          const waitTime = backoffMs * attempt;
          await new Promise(resolve => setTimeout(resolve, waitTime));
        }
      }
    }

    throw new FetchError(date, url, retries, { status: lastStatus, cause: lastError });
  }
}

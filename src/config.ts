import path from 'path';
import { ErrorPolicy } from './types/report';
import { DEFAULT_FETCHER_OPTIONS, FetcherOptions } from './services/fetcher';

export interface ScraperConfig {
  outputPath: string;
  fetcher: FetcherOptions;
  onError: ErrorPolicy;
  ntfyTopic: string | null;
  ntfyServer: string;
}

export const DEFAULT_OUTPUT_PATH = path.join('output', 'nrc_reactor_status_1999.psv');

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid ${name}: expected a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readPolicy(env: NodeJS.ProcessEnv): ErrorPolicy {
  const raw = env.ON_ERROR?.toLowerCase();
  if (raw === undefined || raw === '') return 'skip';
  if (raw === 'skip' || raw === 'abort') return raw;
  throw new Error(`Invalid ON_ERROR: expected "skip" or "abort", got "${env.ON_ERROR}"`);
}

function flagValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;

  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

/**
 * Build run configuration from environment variables, with command-line flags taking precedence
 */
export function loadConfig(args: string[] = [], env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const noCache = args.includes('--no-cache') || env.NO_CACHE === 'true';
  const cacheDir = flagValue(args, '--cache-dir') || env.CACHE_DIR || DEFAULT_FETCHER_OPTIONS.cacheDir;

  return {
    outputPath: flagValue(args, '--out') || env.OUTPUT_PATH || DEFAULT_OUTPUT_PATH,
    fetcher: {
      baseUrl: env.NRC_BASE_URL || DEFAULT_FETCHER_OPTIONS.baseUrl,
      cacheDir: noCache ? null : cacheDir,
      retries: Math.max(1, readInt(env, 'FETCH_RETRIES', DEFAULT_FETCHER_OPTIONS.retries)),
      backoffMs: readInt(env, 'FETCH_BACKOFF_MS', DEFAULT_FETCHER_OPTIONS.backoffMs),
      timeoutMs: readInt(env, 'FETCH_TIMEOUT_MS', DEFAULT_FETCHER_OPTIONS.timeoutMs),
      userAgent: DEFAULT_FETCHER_OPTIONS.userAgent,
    },
    onError: args.includes('--abort-on-error') ? 'abort' : readPolicy(env),
    ntfyTopic: env.NTFY_TOPIC || null,
    ntfyServer: env.NTFY_SERVER || 'https://ntfy.sh',
  };
}

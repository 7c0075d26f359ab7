import { CONSENT_SELECTORS } from './consent';
import { ConfigurationError } from './errors';
import { DEFAULT_RULE_SET } from './rules';
import type { ScraperConfig } from './types';

export const DEFAULT_SEARCH_URL =
  'https://asunnot.oikotie.fi/myytavat-asunnot?pagination=1&locations=%5B%5B5695451,4,%22Kalasatama,%20Helsinki%22%5D%5D&cardType=100&roomCount%5B%5D=2';

type Env = Record<string, string | undefined>;

export const envInt = (v: string | undefined, fallback: number): number => {
  if (v === undefined || v === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
};

export const envBool = (v: string | undefined, fallback: boolean): boolean => {
  if (v === undefined || v === '') return fallback;
  return !['false', '0', 'no'].includes(v.toLowerCase());
};

const isCount = (n: number, min: number) => Number.isInteger(n) && n >= min;

export const isDelimiter = (value: string) => value.length === 1 && !/["\r\n]/.test(value);

/**
 * Rejects settings the crawl cannot terminate or write with. Limits may be
 * Infinity; a page size below 1 would never signal the last page.
 */
export function validateConfig(config: ScraperConfig): ScraperConfig {
  const problems: string[] = [];
  if (!isCount(config.pageSize, 1)) problems.push(`pageSize must be a positive integer (got ${config.pageSize})`);
  for (const key of ['maxPages', 'maxListings'] as const) {
    const value = config[key];
    if (value !== Infinity && !isCount(value, 1)) {
      problems.push(`${key} must be a positive integer or unlimited (got ${value})`);
    }
  }
  for (const key of [
    'navTimeoutMs',
    'renderTimeoutMs',
    'settleTimeoutMs',
    'consentTimeoutMs',
    'pollIntervalMs',
    'scrollPauseMs',
    'maxScrollRounds',
  ] as const) {
    if (!isCount(config[key], 0)) problems.push(`${key} must be a non-negative integer (got ${config[key]})`);
  }
  if (!isDelimiter(config.delimiter)) {
    problems.push(`delimiter must be a single character other than a quote or line break (got "${config.delimiter}")`);
  }
  if (problems.length > 0) throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
  return config;
}

export function loadConfig(env: Env = process.env): ScraperConfig {
  return validateConfig({
    baseUrl: env.SCRAPER_URL || DEFAULT_SEARCH_URL,
    ruleSet: env.SCRAPER_RULES || DEFAULT_RULE_SET,
    pageSize: envInt(env.SCRAPER_PAGE_SIZE, 25),
    maxPages: envInt(env.SCRAPER_PAGE_LIMIT, Infinity),
    maxListings: envInt(env.SCRAPER_LIMIT, Infinity),
    paginationParam: env.PAGINATION_PARAM || 'pagination',
    navTimeoutMs: envInt(env.NAV_TIMEOUT_MS, 30000),
    renderTimeoutMs: envInt(env.RENDER_TIMEOUT_MS, 20000),
    settleTimeoutMs: envInt(env.SETTLE_TIMEOUT_MS, 10000),
    pollIntervalMs: envInt(env.POLL_INTERVAL_MS, 250),
    scrollPauseMs: envInt(env.SCROLL_PAUSE_MS, 1000),
    maxScrollRounds: envInt(env.MAX_SCROLL_ROUNDS, 50),
    consentSelector: env.CONSENT_SELECTOR ?? CONSENT_SELECTORS.join(', '),
    consentTimeoutMs: envInt(env.CONSENT_TIMEOUT_MS, 5000),
    headless: envBool(env.HEADLESS, true),
    outputDir: env.OUTPUT_DIR || process.cwd(),
    outputCsv: env.OUTPUT_CSV || 'properties.csv',
    outputZip: env.OUTPUT_ZIP || 'properties.zip',
    zipOutput: envBool(env.ZIP_OUTPUT, false),
    delimiter: env.CSV_DELIMITER || ';',
  });
}

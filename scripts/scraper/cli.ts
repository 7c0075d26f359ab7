import { Command, InvalidArgumentError } from 'commander';
import { isDelimiter } from './config';
import { RULE_SETS } from './rules';
import type { ScraperConfig } from './types';

export type CliOptions = {
  url?: string;
  single?: string;
  rules?: string;
  pageSize?: number;
  maxPages?: number;
  limit?: number;
  output?: string;
  delimiter?: string;
  zip?: boolean;
  headed?: boolean;
  yes?: boolean;
};

export type Questioner = {
  question(query: string): Promise<string>;
};

const positiveInt = (value: string): number => {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
};

const delimiter = (value: string): string => {
  if (!isDelimiter(value)) {
    throw new InvalidArgumentError('Expected a single character other than a quote or line break.');
  }
  return value;
};

export function buildProgram(): Command {
  return new Command()
    .name('listing-scraper')
    .description('Crawl real-estate search results and export listing details to CSV')
    .option('--url <url>', 'search results URL to crawl')
    .option('--single <url>', 'scrape a single listing page instead of crawling')
    .option('--rules <name>', `extraction rule set (${Object.keys(RULE_SETS).join(', ')})`)
    .option('--page-size <n>', 'listings on a full results page', positiveInt)
    .option('--max-pages <n>', 'stop after this many results pages', positiveInt)
    .option('--limit <n>', 'scrape at most this many listings', positiveInt)
    .option('--output <file>', 'CSV file name')
    .option('--delimiter <char>', 'CSV delimiter', delimiter)
    .option('--zip', 'also write a zip archive of the CSV')
    .option('--headed', 'show the browser window')
    .option('-y, --yes', 'do not prompt, use the configured URL');
}

export function applyCliOptions(config: ScraperConfig, opts: CliOptions): ScraperConfig {
  return {
    ...config,
    baseUrl: opts.url ?? config.baseUrl,
    ruleSet: opts.rules ?? config.ruleSet,
    pageSize: opts.pageSize ?? config.pageSize,
    maxPages: opts.maxPages ?? config.maxPages,
    maxListings: opts.limit ?? config.maxListings,
    outputCsv: opts.output ?? config.outputCsv,
    delimiter: opts.delimiter ?? config.delimiter,
    zipOutput: opts.zip ?? config.zipOutput,
    headless: opts.headed ? false : config.headless,
  };
}

/** Asks whether to use `defaultUrl`; on "no", asks for another one. */
export async function promptForUrl(defaultUrl: string, rl: Questioner): Promise<string> {
  const answer = (await rl.question(`Use default search URL ${defaultUrl}? (y/n) `)).trim();
  if (answer === '' || /^y(es)?$/i.test(answer)) return defaultUrl;
  const url = (await rl.question('Enter search URL: ')).trim();
  return url || defaultUrl;
}

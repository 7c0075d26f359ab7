#!/usr/bin/env node
import * as readline from 'readline/promises';
import { applyCliOptions, buildProgram, type CliOptions, promptForUrl } from './cli';
import { loadConfig, validateConfig } from './config';
import { ListingDiscovery } from './discovery';
import { AxiosHttpClient } from './http';
import { error, errorMessage, log } from './logger';
import { ScrapePipeline } from './pipeline';
import { PlaywrightRenderer } from './renderer';
import { getRuleSet } from './rules';
import { CsvSink } from './storage';

async function resolveBaseUrl(baseUrl: string, opts: CliOptions): Promise<string> {
  if (opts.url || opts.yes || !process.stdin.isTTY) return baseUrl;
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await promptForUrl(baseUrl, rl);
  } finally {
    rl.close();
  }
}

(async function main() {
  const opts = buildProgram().parse(process.argv).opts<CliOptions>();
  let renderer: PlaywrightRenderer | null = null;
  try {
    const config = validateConfig(applyCliOptions(loadConfig(), opts));
    renderer = new PlaywrightRenderer(config);
    const rules = getRuleSet(config.ruleSet);
    const pipeline = new ScrapePipeline({
      discovery: new ListingDiscovery(renderer, rules.discovery, config),
      http: new AxiosHttpClient(),
      rules,
      sink: new CsvSink({
        outputDir: config.outputDir,
        outputCsv: config.outputCsv,
        delimiter: config.delimiter,
        outputZip: config.zipOutput ? config.outputZip : undefined,
      }),
      maxListings: config.maxListings,
    });

    if (opts.single) {
      log(`Scraping single listing with rule set ${rules.name}.`);
      await pipeline.runSingle(opts.single);
      return;
    }

    const baseUrl = await resolveBaseUrl(config.baseUrl, opts);
    log('Starting scraper with config:', { ...config, baseUrl });
    await pipeline.run(baseUrl);
  } catch (err) {
    error('Scraper failed:', errorMessage(err));
    process.exitCode = 1;
  } finally {
    if (renderer) await renderer.close();
  }
})();

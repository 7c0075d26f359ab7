import { log, warn } from './logger';
import type { RuleSet } from './rules';
import { scrapeListing } from './scraper';
import type { HttpClient, PropertyRecord, RecordSink } from './types';

export type Discoverer = {
  discover(baseUrl: string): Promise<string[]>;
};

export type PipelineDeps = {
  discovery: Discoverer;
  http: HttpClient;
  rules: RuleSet;
  sink: RecordSink;
  maxListings?: number;
};

export const countDuplicates = (urls: string[]): number => urls.length - new Set(urls).size;

/** Discovery, then one sequential fetch-and-extract per URL, then the sink. */
export class ScrapePipeline {
  constructor(private readonly deps: PipelineDeps) {}

  async run(baseUrl: string): Promise<PropertyRecord[]> {
    const discovered = await this.deps.discovery.discover(baseUrl);
    const duplicates = countDuplicates(discovered);
    if (duplicates > 0) {
      warn(`${duplicates} listing URLs were discovered more than once; they are kept as-is.`);
    }
    const limit = this.deps.maxListings ?? Infinity;
    const urls = discovered.length > limit ? discovered.slice(0, limit) : discovered;

    const properties: PropertyRecord[] = [];
    for (const [idx, url] of urls.entries()) {
      log(`(${idx + 1}/${urls.length}) Fetching ${url}`);
      const record = await scrapeListing(this.deps.http, url, this.deps.rules);
      if (record) properties.push(record);
    }
    log(`Extracted ${properties.length} of ${urls.length} listings.`);

    await this.save(properties);
    return properties;
  }

  async runSingle(url: string): Promise<PropertyRecord | null> {
    const record = await scrapeListing(this.deps.http, url, this.deps.rules);
    await this.save(record ? [record] : []);
    return record;
  }

  private async save(properties: PropertyRecord[]): Promise<void> {
    if (properties.length === 0) {
      log('No properties found.');
      return;
    }
    const file = await this.deps.sink.write(properties);
    log(`Wrote ${properties.length} listings to ${file}.`);
  }
}

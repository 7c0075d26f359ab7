import { log, warn } from './logger';
import { getListingLinks } from './scraper';
import type { RuleSet } from './rules';
import type { RenderedPage, RenderingClient, ScraperConfig } from './types';
import { sleep, withPageParam } from './utils';
import { waitFor } from './wait';

export type DiscoveryOptions = Pick<
  ScraperConfig,
  | 'pageSize'
  | 'maxPages'
  | 'maxListings'
  | 'paginationParam'
  | 'renderTimeoutMs'
  | 'settleTimeoutMs'
  | 'pollIntervalMs'
  | 'scrollPauseMs'
  | 'maxScrollRounds'
>;

/**
 * Walks paginated search results through a rendering client. Each page is
 * scrolled until its height stops growing, then its card links are
 * collected. The crawl ends on the first page with fewer than `pageSize`
 * links, or once `maxListings` URLs are in hand.
 */
export class ListingDiscovery {
  constructor(
    private readonly client: RenderingClient,
    private readonly rules: RuleSet['discovery'],
    private readonly opts: DiscoveryOptions
  ) {}

  async discover(baseUrl: string): Promise<string[]> {
    const urls: string[] = [];
    for (let pageNum = 1; pageNum <= this.opts.maxPages; pageNum++) {
      const pageUrl = withPageParam(baseUrl, this.opts.paginationParam, pageNum);
      const links = await this.collectPage(pageUrl, pageNum);
      urls.push(...links);
      log(`Page ${pageNum}: ${links.length} listings (total: ${urls.length}).`);
      if (links.length < this.opts.pageSize) {
        log(`Last page reached (${links.length} < ${this.opts.pageSize}).`);
        break;
      }
      if (urls.length >= this.opts.maxListings) {
        log(`Reached listings limit (${this.opts.maxListings}).`);
        break;
      }
      if (pageNum === this.opts.maxPages) {
        log(`Reached max pages limit (${this.opts.maxPages}).`);
      }
    }
    log(`Found ${urls.length} listing URLs`);
    return urls;
  }

  async collectPage(pageUrl: string, pageNum: number): Promise<string[]> {
    log(`Opening results page ${pageNum}: ${pageUrl}`);
    const page = await this.client.open(pageUrl);
    try {
      log(`Waiting for listings on page ${pageNum}...`);
      await waitFor(() => page.hasSelector(this.rules.cardMarker), {
        timeoutMs: this.opts.renderTimeoutMs,
        intervalMs: this.opts.pollIntervalMs,
        description: `listing cards on page ${pageNum}`,
      });
      await this.scrollToEnd(page, pageNum);
      return getListingLinks(await page.content(), this.rules.cardLink, pageUrl);
    } finally {
      await page.close();
    }
  }

  private async scrollToEnd(page: RenderedPage, pageNum: number): Promise<void> {
    let lastHeight = await page.documentHeight();
    for (let round = 1; round <= this.opts.maxScrollRounds; round++) {
      await page.scrollToBottom();
      if (this.opts.scrollPauseMs > 0) await sleep(this.opts.scrollPauseMs);
      await waitFor(() => page.isSettled(), {
        timeoutMs: this.opts.settleTimeoutMs,
        intervalMs: this.opts.pollIntervalMs,
        description: `page ${pageNum} to settle after scrolling`,
      });
      const newHeight = await page.documentHeight();
      if (newHeight <= lastHeight) return;
      lastHeight = newHeight;
    }
    warn(`Page ${pageNum} still growing after ${this.opts.maxScrollRounds} scrolls, collecting what is loaded.`);
  }
}

import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';
import { acceptCookieConsent } from './consent';
import { log } from './logger';
import type { RenderedPage, RenderingClient, ScraperConfig } from './types';
import { waitFor } from './wait';

export type RendererOptions = Pick<
  ScraperConfig,
  'headless' | 'navTimeoutMs' | 'consentSelector' | 'consentTimeoutMs' | 'pollIntervalMs' | 'settleTimeoutMs'
>;

class PlaywrightPage implements RenderedPage {
  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page
  ) {}

  async hasSelector(selector: string): Promise<boolean> {
    return (await this.page.$(selector)) !== null;
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }

  documentHeight(): Promise<number> {
    return this.page.evaluate(() => document.body.scrollHeight);
  }

  isSettled(): Promise<boolean> {
    return this.page.evaluate(() => document.readyState === 'complete');
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

/** Chromium-backed rendering client; each opened page gets its own context. */
export class PlaywrightRenderer implements RenderingClient {
  private browser: Browser | null = null;

  constructor(private readonly opts: RendererOptions) {}

  private async getBrowser(): Promise<Browser> {
    if (!this.browser) {
      log('Launching browser...');
      this.browser = await chromium.launch({
        headless: this.opts.headless,
        args: ['--no-sandbox', '--disable-setuid-sandbox'],
      });
    }
    return this.browser;
  }

  async open(url: string): Promise<RenderedPage> {
    const browser = await this.getBrowser();
    const context = await browser.newContext({ viewport: { width: 1920, height: 1080 } });
    try {
      const page = await context.newPage();
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.opts.navTimeoutMs });
      const rendered = new PlaywrightPage(context, page);
      const consent = await acceptCookieConsent(page, {
        selector: this.opts.consentSelector,
        timeoutMs: this.opts.consentTimeoutMs,
        intervalMs: this.opts.pollIntervalMs,
      });
      if (consent !== 'none') {
        await waitFor(() => rendered.isSettled(), {
          timeoutMs: this.opts.settleTimeoutMs,
          intervalMs: this.opts.pollIntervalMs,
          description: 'page to settle after cookie consent',
        });
      }
      return rendered;
    } catch (err) {
      await context.close();
      throw err;
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
      log('Browser closed.');
    }
  }
}

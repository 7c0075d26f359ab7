import * as cheerio from 'cheerio';
import { extract } from './extractor';
import { isOk } from './http';
import { errorMessage, log, warn } from './logger';
import type { RuleSet } from './rules';
import type { HttpClient, PropertyRecord } from './types';
import { resolveUrl } from './utils';

/** Card links in document order; relative hrefs are resolved against `pageUrl`. */
export const getListingLinks = (html: string, cardLink: string, pageUrl: string): string[] => {
  const $ = cheerio.load(html);
  const hrefs: string[] = [];
  $(cardLink).each((_, a) => {
    const href = $(a).attr('href');
    if (!href) return;
    hrefs.push(resolveUrl(href, pageUrl));
  });
  return hrefs;
};

/**
 * Fetches one listing and extracts it. Returns null when the page could not
 * be fetched; missing structure on a fetched page never yields null.
 */
export const scrapeListing = async (
  http: HttpClient,
  url: string,
  rules: RuleSet
): Promise<PropertyRecord | null> => {
  log(`🔎 Scraping URL: ${url}`);
  let body: string;
  try {
    const res = await http.get(url);
    if (!isOk(res.status)) {
      warn(`Failed to retrieve the page. Status code: ${res.status}`);
      return null;
    }
    body = res.body;
  } catch (err) {
    warn(`Failed to retrieve ${url}: ${errorMessage(err)}`);
    return null;
  }
  const record = extract(body, rules);
  log(`📌 Title: ${record.title}`);
  return record;
};

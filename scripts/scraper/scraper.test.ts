import { describe, expect, it } from 'vitest';
import { RULE_SETS } from './rules';
import { getListingLinks, scrapeListing } from './scraper';
import type { HttpClient, HttpResponse } from './types';

const v2 = RULE_SETS['oikotie-v2'];

const httpReturning = (res: HttpResponse | Error): HttpClient => ({
  get: async () => {
    if (res instanceof Error) throw res;
    return res;
  },
});

describe('getListingLinks', () => {
  it('collects card links in document order and resolves relative hrefs', () => {
    const html = `
      <a class="ot-card-v2 link link--muted" href="/myytavat-asunnot/helsinki/2">B</a>
      <a class="link" href="/not-a-card">x</a>
      <a class="ot-card-v2 link link--muted">no href</a>
      <a class="ot-card-v2 link link--muted" href="https://other.example.test/1">A</a>`;
    expect(getListingLinks(html, v2.discovery.cardLink, 'https://asunnot.example.test/search?pagination=1')).toEqual([
      'https://asunnot.example.test/myytavat-asunnot/helsinki/2',
      'https://other.example.test/1',
    ]);
  });
});

describe('scrapeListing', () => {
  it('extracts a fetched page', async () => {
    const http = httpReturning({ status: 200, body: '<h1 class="listing-header__headline">Yksiö</h1>' });
    const record = await scrapeListing(http, 'https://asunnot.example.test/1', v2);
    expect(record?.title).toBe('Yksiö');
    expect(record?.price).toBe('N/A');
  });

  it('returns null for a non-success status', async () => {
    const http = httpReturning({ status: 404, body: 'gone' });
    expect(await scrapeListing(http, 'https://asunnot.example.test/1', v2)).toBeNull();
  });

  it('returns null when the request fails', async () => {
    const http = httpReturning(new Error('socket hang up'));
    expect(await scrapeListing(http, 'https://asunnot.example.test/1', v2)).toBeNull();
  });
});

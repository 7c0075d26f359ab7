import { describe, expect, it } from 'vitest';
import { type Questioner, applyCliOptions, buildProgram, promptForUrl } from './cli';
import { loadConfig } from './config';

const DEFAULT_URL = 'https://asunnot.example.test/search';

const answering = (...answers: string[]): Questioner & { asked: string[] } => {
  const asked: string[] = [];
  return {
    asked,
    question: async (query: string) => {
      asked.push(query);
      return answers.shift() ?? '';
    },
  };
};

describe('buildProgram', () => {
  it('parses options', () => {
    const opts = buildProgram()
      .parse(['--url', DEFAULT_URL, '--page-size', '10', '--zip', '-y'], { from: 'user' })
      .opts();
    expect(opts).toEqual({ url: DEFAULT_URL, pageSize: 10, zip: true, yes: true });
  });
});

describe('option parsing errors', () => {
  const parse = (...args: string[]) =>
    buildProgram()
      .exitOverride()
      .configureOutput({ writeErr: () => undefined })
      .parse(args, { from: 'user' });

  it.each(['', ';;', '"'])('rejects the delimiter %j', (value) => {
    expect(() => parse('--delimiter', value)).toThrow('Expected a single character other than a quote or line break.');
  });

  it('accepts a single-character delimiter', () => {
    expect(parse('--delimiter', ',').opts()).toEqual({ delimiter: ',' });
  });

  it('rejects a zero page size', () => {
    expect(() => parse('--page-size', '0')).toThrow('Expected a positive integer.');
  });
});

describe('applyCliOptions', () => {
  it('overrides only the options that were given', () => {
    const base = loadConfig({});
    const config = applyCliOptions(base, { pageSize: 10, limit: 5, headed: true, output: 'out.csv' });
    expect(config).toEqual({
      ...base,
      pageSize: 10,
      maxListings: 5,
      headless: false,
      outputCsv: 'out.csv',
    });
  });
});

describe('promptForUrl', () => {
  it('keeps the default on yes', async () => {
    const rl = answering('y');
    expect(await promptForUrl(DEFAULT_URL, rl)).toBe(DEFAULT_URL);
    expect(rl.asked).toHaveLength(1);
  });

  it('asks for a URL on no', async () => {
    const rl = answering('n', ' https://asunnot.example.test/other ');
    expect(await promptForUrl(DEFAULT_URL, rl)).toBe('https://asunnot.example.test/other');
    expect(rl.asked).toEqual([`Use default search URL ${DEFAULT_URL}? (y/n) `, 'Enter search URL: ']);
  });

  it('falls back to the default when no URL is entered', async () => {
    expect(await promptForUrl(DEFAULT_URL, answering('no', ''))).toBe(DEFAULT_URL);
  });
});

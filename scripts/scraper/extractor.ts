import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { log, warn } from './logger';
import { normalize } from './normalize';
import type { DetailsRule, LabelRule, RuleSet, TextRule } from './rules';
import { NA, type PropertyRecord, emptyRecord } from './types';
import { cleanText } from './utils';

function readText($: CheerioAPI, rule: TextRule): string | null {
  const el = $(rule.selector).first();
  if (!el.length) return null;
  let text: string;
  if (rule.parts) {
    text = el
      .find(rule.parts)
      .map((_, part) => cleanText($(part).text()))
      .get()
      .filter(Boolean)
      .join(' ');
  } else if (rule.ownText) {
    text = cleanText(el.clone().children().remove().end().text());
  } else {
    text = cleanText(el.text());
  }
  return text || null;
}

export function applyLabel(record: PropertyRecord, rule: LabelRule, value: string): void {
  switch (rule.kind) {
    case 'text':
      record[rule.field] = value;
      break;
    case 'numeric':
      record[rule.field] = normalize(value, rule.unit);
      break;
    case 'floor': {
      const sep = value.indexOf('/');
      if (sep === -1) {
        record.floor = normalize(value);
      } else {
        record.floor = normalize(value.slice(0, sep));
        record.totalFloors = normalize(value.slice(sep + 1));
      }
      break;
    }
  }
}

function extractDetails($: CheerioAPI, details: DetailsRule, record: PropertyRecord): void {
  const section = $(details.container).first();
  if (!section.length) {
    warn('Details section not found, detail fields left as N/A.');
    return;
  }
  section.find(details.pair).each((i, pair) => {
    const term = cleanText($(pair).find(details.term).first().text());
    const value = cleanText($(pair).find(details.value).first().text());
    if (!term || !value) {
      log(`Skipping detail row ${i + 1}: missing term or value.`);
      return;
    }
    if (!Object.hasOwn(details.labels, term)) return;
    applyLabel(record, details.labels[term], value);
  });
}

/**
 * Maps a rendered listing page onto a PropertyRecord. Every lookup is
 * independent; anything missing is left as the N/A sentinel.
 */
export function extract(document: string | CheerioAPI, rules: RuleSet): PropertyRecord {
  const $ = typeof document === 'string' ? cheerio.load(document) : document;
  const record = emptyRecord();

  record.title = readText($, rules.title) ?? NA;

  const headline = $(rules.headline.container).first();
  if (headline.length) {
    const values = headline.find(rules.headline.values);
    const price = values.eq(0);
    const size = values.eq(1);
    if (price.length) record.price = normalize(cleanText(price.text()), rules.currency);
    if (size.length) record.size = normalize(cleanText(size.text()), rules.areaUnit);
  } else {
    log('Price/size headline not found.');
  }

  record.address = readText($, rules.address) ?? NA;
  record.description = readText($, rules.description) ?? NA;

  if (rules.details) extractDetails($, rules.details, record);

  return record;
}

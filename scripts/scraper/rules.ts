import { ConfigurationError } from './errors';
import { DETAIL_FIELDS, type DetailField } from './types';

export type TextRule = {
  selector: string;
  /** Join the text of these descendants instead of the node's own text. */
  parts?: string;
  /** Read only the node's direct text, skipping nested elements. */
  ownText?: boolean;
};

export type HeadlineRule = {
  container: string;
  /** First match is the price, second the size. */
  values: string;
};

export type LabelRule =
  | { field: DetailField; kind: 'text' }
  | { field: DetailField; kind: 'numeric'; unit?: string }
  | { field: 'floor'; kind: 'floor' };

export type DetailsRule = {
  container: string;
  pair: string;
  term: string;
  value: string;
  labels: Record<string, LabelRule>;
};

export type RuleSet = {
  name: string;
  currency: string;
  areaUnit: string;
  discovery: {
    cardMarker: string;
    cardLink: string;
  };
  title: TextRule;
  headline: HeadlineRule;
  address: TextRule;
  description: TextRule;
  details?: DetailsRule;
};

const OIKOTIE_CARD = {
  cardMarker: '.ot-card-v2__info-container',
  cardLink: 'a.ot-card-v2.link.link--muted',
};

export const OIKOTIE_LABELS: Record<string, LabelRule> = {
  Rakennusvuosi: { field: 'buildingYear', kind: 'text' },
  'Rakennuksen tyyppi': { field: 'apartmentType', kind: 'text' },
  'Velaton hinta': { field: 'debtFreePrice', kind: 'numeric', unit: '€' },
  Hoitovastike: { field: 'maintenanceCharge', kind: 'numeric', unit: '€ / kk' },
  'Asuinpinta-ala': { field: 'livingArea', kind: 'numeric', unit: 'm²' },
  Huoneita: { field: 'rooms', kind: 'text' },
  Kerros: { field: 'floor', kind: 'floor' },
  Kaupunginosa: { field: 'district', kind: 'text' },
  Kaupunki: { field: 'city', kind: 'text' },
};

export const RULE_SETS: Record<string, RuleSet> = {
  'oikotie-v1': {
    name: 'oikotie-v1',
    currency: '€',
    areaUnit: 'm²',
    discovery: OIKOTIE_CARD,
    title: { selector: 'h1.listing-header__headline' },
    headline: {
      container: 'div.card-v2-text-container__group--boxed',
      values: 'h2.card-v2-text-container__title',
    },
    address: { selector: 'dd.info-table__value', parts: 'span.link__text' },
    description: { selector: 'div.listing-overview', parts: 'p' },
  },
  'oikotie-v2': {
    name: 'oikotie-v2',
    currency: '€',
    areaUnit: 'm²',
    discovery: OIKOTIE_CARD,
    title: { selector: 'h1.listing-header__headline', ownText: true },
    headline: {
      container: 'h2.listing-header__headline--secondary',
      values: 'span',
    },
    address: { selector: 'h1.listing-header__headline span' },
    description: { selector: 'span.text-overflow' },
    details: {
      container: 'div.listing-details-container',
      pair: 'div.info-table__row',
      term: 'dt.info-table__title',
      value: 'dd.info-table__value',
      labels: OIKOTIE_LABELS,
    },
  },
};

export const DEFAULT_RULE_SET = 'oikotie-v2';

/**
 * Checks that a rule set's label vocabulary covers every detail field.
 * A `floor` label fills both `floor` and `totalFloors`.
 */
export function validateRuleSet(rules: RuleSet): RuleSet {
  if (!rules.details) return rules;
  const detailFields: readonly string[] = DETAIL_FIELDS;
  const covered = new Set<DetailField>();
  for (const [label, rule] of Object.entries(rules.details.labels)) {
    if (!detailFields.includes(rule.field)) {
      throw new ConfigurationError(
        `Rule set "${rules.name}": label "${label}" targets unknown field "${rule.field}"`
      );
    }
    covered.add(rule.field);
    if (rule.kind === 'floor') covered.add('totalFloors');
  }
  const missing = DETAIL_FIELDS.filter((field) => !covered.has(field));
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Rule set "${rules.name}" has no label for: ${missing.join(', ')}`
    );
  }
  return rules;
}

export function getRuleSet(name: string): RuleSet {
  const rules = RULE_SETS[name];
  if (!rules) {
    throw new ConfigurationError(
      `Unknown rule set "${name}" (available: ${Object.keys(RULE_SETS).join(', ')})`
    );
  }
  return validateRuleSet(rules);
}

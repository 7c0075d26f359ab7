import * as fs from 'fs';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { applyLabel, extract } from './extractor';
import { OIKOTIE_LABELS, getRuleSet } from './rules';
import { NA, PROPERTY_FIELDS, emptyRecord } from './types';

const fixture = (name: string) => fs.readFileSync(path.join(__dirname, '__fixtures__', name), 'utf8');

const v2 = getRuleSet('oikotie-v2');
const v1 = getRuleSet('oikotie-v1');

const detailPage = (rows: string) => `
  <div class="listing-details-container"><dl>${rows}</dl></div>`;

const row = (term: string, value: string) =>
  `<div class="info-table__row"><dt class="info-table__title">${term}</dt><dd class="info-table__value">${value}</dd></div>`;

describe('extract (oikotie-v2)', () => {
  it('extracts every field from a complete listing page', () => {
    expect(extract(fixture('listing-v2.html'), v2)).toEqual({
      title: 'Kerrostalo, 2h+kk+s',
      price: '350000',
      size: '45.5',
      address: 'Capellan puistotie 10, Helsinki',
      description: 'Valoisa koti merinäköalalla.',
      buildingYear: '2019',
      apartmentType: 'Kerrostalo',
      debtFreePrice: '362500',
      maintenanceCharge: '187.50',
      livingArea: '45.5',
      rooms: '2',
      floor: '3',
      totalFloors: '8',
      district: 'Kalasatama',
      city: 'Helsinki',
    });
  });

  it('fills every field with N/A for an empty document', () => {
    const record = extract('<html><body></body></html>', v2);
    for (const field of PROPERTY_FIELDS) {
      expect(record[field]).toBe(NA);
    }
  });

  it('leaves the title as N/A when the heading is missing', () => {
    const html = fixture('listing-v2.html').replace(/<h1[\s\S]*?<\/h1>/, '');
    const record = extract(html, v2);
    expect(record.title).toBe(NA);
    expect(record.address).toBe(NA);
    expect(record.price).toBe('350000');
  });

  it('sets the price but not the size when only one headline span exists', () => {
    const html = '<h2 class="listing-header__headline--secondary"><span>199 000 €</span></h2>';
    const record = extract(html, v2);
    expect(record.price).toBe('199000');
    expect(record.size).toBe(NA);
  });

  it('maps Huoneita to rooms and touches nothing else', () => {
    const record = extract(detailPage(row('Huoneita', '3')), v2);
    expect(record).toEqual({ ...emptyRecord(), rooms: '3' });
  });

  it('splits the floor on a slash', () => {
    const record = extract(detailPage(row('Kerros', '3/5')), v2);
    expect(record.floor).toBe('3');
    expect(record.totalFloors).toBe('5');
  });

  it('sets only the current floor when there is no separator', () => {
    const record = extract(detailPage(row('Kerros', '3')), v2);
    expect(record.floor).toBe('3');
    expect(record.totalFloors).toBe(NA);
  });

  it('skips rows without a value and ignores unknown labels', () => {
    const html = detailPage(
      '<div class="info-table__row"><dt class="info-table__title">Kaupunki</dt></div>' +
        row('Sauna', 'Kyllä') +
        row('Rakennusvuosi', '1962')
    );
    expect(extract(html, v2)).toEqual({ ...emptyRecord(), buildingYear: '1962' });
  });

  it('does not treat inherited object keys as labels', () => {
    const record = extract(detailPage(row('constructor', '5')), v2);
    expect(record).toEqual(emptyRecord());
  });
});

describe('extract (oikotie-v1)', () => {
  it('reads the basic fields and leaves the details as N/A', () => {
    expect(extract(fixture('listing-v1.html'), v1)).toEqual({
      ...emptyRecord(),
      title: 'Rivitalo, 4h+k+s',
      price: '289000',
      size: '98',
      address: 'Koivukuja 4 Hollola',
      description: 'Tilava rivitaloasunto. Oma piha.',
    });
  });
});

describe('applyLabel', () => {
  it('normalizes numeric values with the label unit', () => {
    const record = emptyRecord();
    applyLabel(record, OIKOTIE_LABELS['Hoitovastike'], '210,00 € / kk');
    expect(record.maintenanceCharge).toBe('210.00');
  });

  it('copies text values as-is', () => {
    const record = emptyRecord();
    applyLabel(record, OIKOTIE_LABELS['Rakennuksen tyyppi'], 'Rivitalo');
    expect(record.apartmentType).toBe('Rivitalo');
  });
});

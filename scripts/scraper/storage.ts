import * as fs from 'fs/promises';
import * as fss from 'fs';
import * as path from 'path';
import archiver from 'archiver';
import { log } from './logger';
import { PROPERTY_FIELDS, type PropertyField, type PropertyRecord, type RecordSink } from './types';

export const CSV_HEADERS: Record<PropertyField, string> = {
  title: 'Title',
  price: 'Price (€)',
  size: 'Size (m²)',
  address: 'Address',
  description: 'Description',
  buildingYear: 'Building Year',
  apartmentType: 'Apartment Type',
  debtFreePrice: 'Debt-free Price (€)',
  maintenanceCharge: 'Maintenance Charge (€/month)',
  livingArea: 'Living Area (m²)',
  rooms: 'Rooms',
  floor: 'Floor',
  totalFloors: 'Total Floors',
  district: 'District',
  city: 'City',
};

export function escapeCell(value: string, delimiter: string): string {
  if (value.includes(delimiter) || /["\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(records: PropertyRecord[], delimiter = ';'): string {
  const row = (cells: string[]) => cells.map((c) => escapeCell(c, delimiter)).join(delimiter);
  const lines = [
    row(PROPERTY_FIELDS.map((f) => CSV_HEADERS[f])),
    ...records.map((r) => row(PROPERTY_FIELDS.map((f) => r[f]))),
  ];
  return lines.join('\n') + '\n';
}

export async function zipFile(filePath: string, outDir: string, zipName: string): Promise<string> {
  const zipPath = path.join(outDir, zipName);
  const output = fss.createWriteStream(zipPath);
  const closed = new Promise<void>((resolve, reject) => {
    output.on('close', () => resolve());
    output.on('error', reject);
  });
  const archive = archiver('zip', { zlib: { level: 9 } });
  archive.pipe(output);
  archive.file(filePath, { name: path.basename(filePath) });
  await archive.finalize();
  await closed;
  return zipPath;
}

export type CsvSinkOptions = {
  outputDir: string;
  outputCsv: string;
  delimiter: string;
  /** When set, the CSV is also packed into this zip archive. */
  outputZip?: string;
};

export class CsvSink implements RecordSink {
  constructor(private readonly opts: CsvSinkOptions) {}

  async write(records: PropertyRecord[]): Promise<string> {
    await fs.mkdir(this.opts.outputDir, { recursive: true });
    const csvPath = path.join(this.opts.outputDir, this.opts.outputCsv);
    await fs.writeFile(csvPath, toCsv(records, this.opts.delimiter), 'utf8');
    log(`💾 Data saved to ${csvPath} (${records.length} rows)`);
    if (this.opts.outputZip) {
      const zipPath = await zipFile(csvPath, this.opts.outputDir, this.opts.outputZip);
      log(`ZIP:  ${zipPath}`);
    }
    return csvPath;
  }
}

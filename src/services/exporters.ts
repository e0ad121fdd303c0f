import { promises as fs } from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { PropertyResult, RunSnapshot, UnitRecord } from '../types/property';
import { toSnapshotFile } from './snapshotStore';

export type ExportFormat = 'json' | 'csv' | 'txt';

export const EXPORT_FORMATS: ExportFormat[] = ['json', 'csv', 'txt'];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some(format => format === value);
}

const CSV_COLUMNS = [
  'url',
  'name',
  'title',
  'status',
  'unit_count',
  'units',
  'phone',
  'phone_source',
  'transportation',
  'transportation_source',
  'address',
  'address_source',
  'management_years',
  'management_years_source',
  'error',
];

export function formatUnit(unit: UnitRecord): string {
  return `${unit.layout}/${unit.rent}/${unit.floorArea}/${unit.floorLevel}`;
}

/**
 * One CSV row per property, units flattened into a single cell.
 * Starts with a BOM so spreadsheet apps pick up UTF-8.
 */
export function toCsv(results: PropertyResult[]): string {
  const rows = results.map(result => [
    result.url,
    result.name,
    result.title,
    result.status,
    String(result.unitCount),
    result.units.map(formatUnit).join('; '),
    result.phone,
    result.phoneSource,
    result.transportation,
    result.transportationSource,
    result.address,
    result.addressSource,
    result.managementYears,
    result.managementYearsSource,
    result.error ?? '',
  ]);

  return stringify(rows, { bom: true, header: true, columns: CSV_COLUMNS });
}

/**
 * Plain-text report, one block per property
 */
export function toText(results: PropertyResult[]): string {
  return results
    .map(result => {
      const lines = [
        `Name: ${result.name}`,
        `URL: ${result.url}`,
        `Vacant units: ${result.unitCount}`,
        `Status: ${result.status}${result.error ? ` (${result.error})` : ''}`,
        `Phone: ${result.phone}`,
        `Transportation: ${result.transportation}`,
        `Address: ${result.address}`,
        `Management years: ${result.managementYears}`,
      ];
      if (result.units.length > 0) {
        lines.push('Units:', ...result.units.map(unit => `  - ${formatUnit(unit)}`));
      }
      lines.push('-'.repeat(50));
      return `${lines.join('\n')}\n`;
    })
    .join('\n');
}

/**
 * Write a view of the snapshot. These views are output only; the snapshot
 * held by the store is the record read back by later runs.
 */
export async function writeExport(
  snapshot: RunSnapshot,
  format: ExportFormat,
  outputPath: string
): Promise<string> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });

  let content: string;
  if (format === 'csv') {
    content = toCsv(snapshot.results);
  } else if (format === 'txt') {
    content = toText(snapshot.results);
  } else {
    content = `${JSON.stringify(toSnapshotFile(snapshot), null, 2)}\n`;
  }

  await fs.writeFile(outputPath, content, 'utf-8');
  return outputPath;
}

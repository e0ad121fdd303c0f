import { promises as fs } from 'fs';
import { parse as parseCSV } from 'csv-parse/sync';
import { Target } from '../types/property';

/** Header of the property listing sheet: No., name, vacancies, station, address, phone, years, URL */
const LISTING_SHEET_HEADER = 'No.,物件名,対象空室数,最寄駅,住所,電話番号,管理年数,URL';

const COLUMN_ALIASES = {
  url: ['url', 'リンク', 'link'],
  name: ['name', '名称', '物件名', 'property_name', '団地名'],
  phone: ['phone', '電話', '電話番号', 'tel'],
  transportation: ['transportation', '交通', '交通機関', 'access', '最寄駅'],
  address: ['address', '住所', '所在地', 'location'],
  managementYears: ['management_years', '管理年数', 'years', '年数'],
} satisfies Record<keyof Target, string[]>;

const OPTIONAL_FIELDS = ['name', 'transportation', 'address', 'phone', 'managementYears'] as const;

export interface TargetSource {
  urls?: string[];
  file?: string;
  csv?: string;
}

function isRowArray(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'))
  );
}

function cell(row: string[], index: number): string | undefined {
  const value = row[index]?.trim();
  return value ? value : undefined;
}

function isHttpUrl(value: string | undefined): value is string {
  return value !== undefined && /^https?:\/\//.test(value);
}

/**
 * Build a target without the optional fields that are blank
 */
function makeTarget(url: string, fields: Omit<Target, 'url'>): Target {
  const target: Target = { url };
  for (const key of OPTIONAL_FIELDS) {
    const value = fields[key];
    if (value) target[key] = value;
  }
  return target;
}

/**
 * Keep the first target for each URL
 */
export function dedupeTargets(targets: Target[]): Target[] {
  const seen = new Set<string>();
  return targets.filter(target => {
    if (seen.has(target.url)) return false;
    seen.add(target.url);
    return true;
  });
}

export function targetsFromUrls(urls: string[]): Target[] {
  return dedupeTargets(urls.map(url => url.trim()).filter(isHttpUrl).map(url => ({ url })));
}

/**
 * Every listing URL found in free text
 */
export function parseUrlsFromText(text: string, pattern: RegExp): string[] {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  const matcher = new RegExp(pattern.source, flags);
  return [...new Set(text.match(matcher) ?? [])];
}

/**
 * Targets from CSV content. Three layouts are understood:
 * - the listing sheet (`No.,物件名,...,URL` header, URL in column 8),
 * - headerless rows of at least 8 columns with the name first and URL in column 8,
 * - any sheet with a header row naming a url column (aliases in COLUMN_ALIASES).
 */
export function parseTargetsFromCsv(content: string): Target[] {
  const parsed: unknown = parseCSV(content, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    trim: true,
  });
  if (!isRowArray(parsed) || parsed.length === 0) return [];

  const [first, ...rest] = parsed;

  if (first.join(',').includes(LISTING_SHEET_HEADER)) {
    return dedupeTargets(
      rest.flatMap(row => {
        const url = cell(row, 7);
        if (row.length < 8 || !isHttpUrl(url)) return [];
        return [
          makeTarget(url, {
            name: cell(row, 1),
            transportation: cell(row, 3),
            address: cell(row, 4),
            phone: cell(row, 5),
            managementYears: cell(row, 6),
          }),
        ];
      })
    );
  }

  const header = first.map(column => column.trim().toLowerCase());
  const urlColumn = header.findIndex(column => COLUMN_ALIASES.url.includes(column));

  if (urlColumn === -1) {
    return dedupeTargets(
      parsed.flatMap(row => {
        const url = cell(row, 7);
        if (row.length < 8 || !isHttpUrl(url)) return [];
        return [
          makeTarget(url, {
            name: cell(row, 0),
            transportation: cell(row, 3),
            address: cell(row, 4),
            phone: cell(row, 5),
            managementYears: cell(row, 6),
          }),
        ];
      })
    );
  }

  const columnOf = (aliases: string[]): number => header.findIndex(column => aliases.includes(column));
  const columns = {
    name: columnOf(COLUMN_ALIASES.name),
    phone: columnOf(COLUMN_ALIASES.phone),
    transportation: columnOf(COLUMN_ALIASES.transportation),
    address: columnOf(COLUMN_ALIASES.address),
    managementYears: columnOf(COLUMN_ALIASES.managementYears),
  };

  return dedupeTargets(
    rest.flatMap(row => {
      const url = cell(row, urlColumn);
      if (!isHttpUrl(url)) return [];
      return [
        makeTarget(url, {
          name: cell(row, columns.name),
          phone: cell(row, columns.phone),
          transportation: cell(row, columns.transportation),
          address: cell(row, columns.address),
          managementYears: cell(row, columns.managementYears),
        }),
      ];
    })
  );
}

/**
 * Source for a single targets file; a .csv extension selects the CSV parser
 */
export function targetSourceForFile(filePath: string): TargetSource {
  return filePath.toLowerCase().endsWith('.csv') ? { csv: filePath } : { file: filePath };
}

/**
 * Load targets from whichever source was given (urls, then text file, then CSV)
 */
export async function loadTargets(source: TargetSource, urlPattern: RegExp): Promise<Target[]> {
  if (source.urls && source.urls.length > 0) {
    return targetsFromUrls(source.urls);
  }

  if (source.file) {
    const content = await fs.readFile(source.file, 'utf-8');
    return targetsFromUrls(parseUrlsFromText(content, urlPattern));
  }

  if (source.csv) {
    const content = await fs.readFile(source.csv, 'utf-8');
    return parseTargetsFromCsv(content);
  }

  return [];
}

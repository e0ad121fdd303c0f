import { PropertyResult, Provenance, Target, UNKNOWN } from '../types/property';

export type DescriptiveField = 'transportation' | 'address' | 'phone' | 'managementYears';

export const DESCRIPTIVE_FIELDS: DescriptiveField[] = ['transportation', 'address', 'phone', 'managementYears'];

export interface FieldValue {
  value: string;
  source: Provenance;
}

/**
 * Caller-supplied value for a field, if any (blank strings count as absent)
 */
export function predefinedValue(target: Target, field: DescriptiveField | 'name'): string | null {
  const value = target[field]?.trim();
  return value ? value : null;
}

/**
 * Scraped value first, then the caller's value, then the sentinel
 */
export function withFallback(target: Target, field: DescriptiveField, scraped: string | null): FieldValue {
  if (scraped) return { value: scraped, source: 'scraped' };

  const predefined = predefinedValue(target, field);
  if (predefined) return { value: predefined, source: 'predefined' };

  return { value: UNKNOWN, source: 'unknown' };
}

/**
 * True when the caller supplied every descriptive field, so none need scraping
 */
export function hasCompletePredefinedInfo(target: Target): boolean {
  return DESCRIPTIVE_FIELDS.every(field => predefinedValue(target, field) !== null);
}

/**
 * Result for a target that could not be checked. Descriptive fields still
 * carry whatever the caller supplied.
 */
export function failedResult(target: Target, error: string): PropertyResult {
  const transportation = withFallback(target, 'transportation', null);
  const address = withFallback(target, 'address', null);
  const phone = withFallback(target, 'phone', null);
  const managementYears = withFallback(target, 'managementYears', null);

  return {
    url: target.url,
    name: predefinedValue(target, 'name') ?? UNKNOWN,
    title: '',
    units: [],
    unitCount: 0,
    phone: phone.value,
    phoneSource: phone.source,
    transportation: transportation.value,
    transportationSource: transportation.source,
    address: address.value,
    addressSource: address.source,
    managementYears: managementYears.value,
    managementYearsSource: managementYears.source,
    status: 'failed',
    error,
  };
}

export function isVacantProperty(result: PropertyResult): boolean {
  return result.status === 'success' && result.unitCount > 0;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  vacantUnits: number;
  vacantProperties: number;
}

export function summarizeResults(results: PropertyResult[]): RunSummary {
  const succeeded = results.filter(result => result.status === 'success');

  return {
    total: results.length,
    succeeded: succeeded.length,
    failed: results.length - succeeded.length,
    vacantUnits: succeeded.reduce((sum, result) => sum + result.unitCount, 0),
    vacantProperties: succeeded.filter(result => result.unitCount > 0).length,
  };
}

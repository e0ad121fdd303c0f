/**
 * Value written for any field that could not be resolved
 */
export const UNKNOWN = 'unknown';

/**
 * Where a field's value came from
 */
export type Provenance = 'predefined' | 'scraped' | 'unknown';

/**
 * Caller-supplied data for a listing page (from the command line or a CSV sheet)
 */
export interface Target {
  url: string;
  name?: string;
  transportation?: string;
  address?: string;
  phone?: string;
  managementYears?: string;
}

/**
 * One vacant unit found on a listing page
 */
export interface UnitRecord {
  layout: string;
  rent: string;
  floorArea: string;
  floorLevel: string;
}

export type CheckStatus = 'success' | 'failed';

/**
 * Outcome of checking one target
 */
export interface PropertyResult {
  url: string;
  name: string;
  title: string;
  units: UnitRecord[];
  unitCount: number;
  phone: string;
  phoneSource: Provenance;
  transportation: string;
  transportationSource: Provenance;
  address: string;
  addressSource: Provenance;
  managementYears: string;
  managementYearsSource: Provenance;
  status: CheckStatus;
  error?: string;
}

/**
 * Persisted output of one complete run
 */
export interface RunSnapshot {
  timestamp: string;
  totalChecked: number;
  totalVacantUnits: number;
  results: PropertyResult[];
}

/**
 * Snapshot file structure as stored on disk
 */
export interface UnitRecordFile {
  layout: string;
  rent: string;
  floor_area: string;
  floor_level: string;
}

export interface PropertyResultFile {
  url: string;
  name: string;
  title: string;
  units: UnitRecordFile[];
  unit_count: number;
  phone: string;
  phone_source: Provenance;
  transportation: string;
  transportation_source: Provenance;
  address: string;
  address_source: Provenance;
  management_years: string;
  management_years_source: Provenance;
  status: CheckStatus;
  error?: string;
}

export interface RunSnapshotFile {
  timestamp: string;
  total_checked: number;
  total_vacant_units: number;
  results: PropertyResultFile[];
}

export type ChangeType = 'new' | 'increased';

export interface NewlyVacant {
  url: string;
  changeType: ChangeType;
  result: PropertyResult;
}

export interface ComparisonSummary {
  previousSnapshot?: string;
  previousVacantCount: number;
  currentVacantCount: number;
  newVacantProperties: number;
  increasedVacantProperties: number;
  totalNewChanges: number;
  error?: string;
}

/**
 * Whether the current run warrants a notification, and why
 */
export interface NotificationDecision {
  shouldNotify: boolean;
  reason: string;
  isFirstRun: boolean;
  newlyVacant: NewlyVacant[];
  summary: ComparisonSummary;
}

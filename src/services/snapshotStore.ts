import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { SnapshotExistsError, SnapshotFormatError } from '../errors';
import {
  PropertyResult,
  PropertyResultFile,
  RunSnapshot,
  RunSnapshotFile,
} from '../types/property';
import { summarizeResults } from './results';

export const SNAPSHOT_PREFIX = 'vacancy_results_';
export const SNAPSHOT_EXTENSION = '.json';

const STAMP_PATTERN = /^vacancy_results_(\d{8}_\d{6})\.json$/;
const MIN_STAMP = '00000000_000000';

export interface SnapshotRef {
  path: string;
  name: string;
  stamp: string;
}

const provenanceSchema = z.enum(['predefined', 'scraped', 'unknown']);

const unitFileSchema = z.object({
  layout: z.string(),
  rent: z.string(),
  floor_area: z.string(),
  floor_level: z.string(),
});

const resultFileSchema = z
  .object({
    url: z.string(),
    name: z.string(),
    title: z.string(),
    units: z.array(unitFileSchema),
    unit_count: z.number().int().nonnegative(),
    phone: z.string(),
    phone_source: provenanceSchema,
    transportation: z.string(),
    transportation_source: provenanceSchema,
    address: z.string(),
    address_source: provenanceSchema,
    management_years: z.string(),
    management_years_source: provenanceSchema,
    status: z.enum(['success', 'failed']),
    error: z.string().optional(),
  })
  .refine(result => result.unit_count === result.units.length, {
    message: 'unit_count does not match the number of units',
    path: ['unit_count'],
  });

const snapshotFileSchema = z.object({
  timestamp: z.string(),
  total_checked: z.number().int().nonnegative(),
  total_vacant_units: z.number().int().nonnegative(),
  results: z.array(resultFileSchema),
});

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

/**
 * `YYYYMMDD_HHMMSS` in UTC; fixed width so names sort chronologically across DST changes
 */
export function formatStamp(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}`;
}

export function snapshotFileName(date: Date): string {
  return `${SNAPSHOT_PREFIX}${formatStamp(date)}${SNAPSHOT_EXTENSION}`;
}

/**
 * Timestamp part of a snapshot filename; malformed names rank lowest
 */
export function stampOf(fileName: string): string {
  return STAMP_PATTERN.exec(fileName)?.[1] ?? MIN_STAMP;
}

export function createSnapshot(results: PropertyResult[], now: Date = new Date()): RunSnapshot {
  return {
    timestamp: now.toISOString(),
    totalChecked: results.length,
    totalVacantUnits: summarizeResults(results).vacantUnits,
    results,
  };
}

export function toSnapshotFile(snapshot: RunSnapshot): RunSnapshotFile {
  return {
    timestamp: snapshot.timestamp,
    total_checked: snapshot.totalChecked,
    total_vacant_units: snapshot.totalVacantUnits,
    results: snapshot.results.map(
      (result): PropertyResultFile => ({
        url: result.url,
        name: result.name,
        title: result.title,
        units: result.units.map(unit => ({
          layout: unit.layout,
          rent: unit.rent,
          floor_area: unit.floorArea,
          floor_level: unit.floorLevel,
        })),
        unit_count: result.unitCount,
        phone: result.phone,
        phone_source: result.phoneSource,
        transportation: result.transportation,
        transportation_source: result.transportationSource,
        address: result.address,
        address_source: result.addressSource,
        management_years: result.managementYears,
        management_years_source: result.managementYearsSource,
        status: result.status,
        ...(result.error !== undefined ? { error: result.error } : {}),
      })
    ),
  };
}

export function fromSnapshotFile(file: RunSnapshotFile): RunSnapshot {
  return {
    timestamp: file.timestamp,
    totalChecked: file.total_checked,
    totalVacantUnits: file.total_vacant_units,
    results: file.results.map(
      (result): PropertyResult => ({
        url: result.url,
        name: result.name,
        title: result.title,
        units: result.units.map(unit => ({
          layout: unit.layout,
          rent: unit.rent,
          floorArea: unit.floor_area,
          floorLevel: unit.floor_level,
        })),
        unitCount: result.unit_count,
        phone: result.phone,
        phoneSource: result.phone_source,
        transportation: result.transportation,
        transportationSource: result.transportation_source,
        address: result.address,
        addressSource: result.address_source,
        managementYears: result.management_years,
        managementYearsSource: result.management_years_source,
        status: result.status,
        ...(result.error !== undefined ? { error: result.error } : {}),
      })
    ),
  };
}

/**
 * Append-only history of run snapshots, one JSON file per run
 */
export class SnapshotStore {
  constructor(private readonly directory: string) {}

  get dir(): string {
    return this.directory;
  }

  /**
   * Most recent snapshot by filename timestamp, or null when there is none
   */
  async latest(): Promise<SnapshotRef | null> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return null;
      throw error;
    }

    const candidates = entries
      .filter(name => name.startsWith(SNAPSHOT_PREFIX) && name.endsWith(SNAPSHOT_EXTENSION))
      .map(name => ({ name, stamp: stampOf(name), path: path.join(this.directory, name) }));

    if (candidates.length === 0) return null;

    return candidates.reduce((best, candidate) => {
      if (candidate.stamp !== best.stamp) return candidate.stamp > best.stamp ? candidate : best;
      return candidate.name > best.name ? candidate : best;
    });
  }

  async load(ref: SnapshotRef): Promise<RunSnapshot> {
    const content = await fs.readFile(ref.path, 'utf-8');

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new SnapshotFormatError(ref.path, error instanceof Error ? error.message : 'invalid JSON');
    }

    const parsed = snapshotFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SnapshotFormatError(ref.path, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }

    return fromSnapshotFile(parsed.data);
  }

  /**
   * Write a snapshot under its timestamp-derived name. Never overwrites.
   */
  async save(snapshot: RunSnapshot): Promise<SnapshotRef> {
    const date = new Date(snapshot.timestamp);
    if (Number.isNaN(date.getTime())) {
      throw new SnapshotFormatError(snapshot.timestamp, 'timestamp is not a valid date');
    }

    await fs.mkdir(this.directory, { recursive: true });

    const name = snapshotFileName(date);
    const filePath = path.join(this.directory, name);
    const content = `${JSON.stringify(toSnapshotFile(snapshot), null, 2)}\n`;

    try {
      await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      if (isNodeError(error) && error.code === 'EEXIST') {
        throw new SnapshotExistsError(filePath);
      }
      throw error;
    }

    return { path: filePath, name, stamp: formatStamp(date) };
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

import { CrawlEvents } from '../events/crawlEvents';
import { describeError } from '../errors';
import {
  ComparisonSummary,
  NewlyVacant,
  NotificationDecision,
  PropertyResult,
  RunSnapshot,
  UnitRecord,
} from '../types/property';
import { isVacantProperty } from './results';
import { SnapshotRef } from './snapshotStore';

/**
 * Read side of the snapshot history, as far as the diff engine needs it
 */
export interface SnapshotSource {
  latest(): Promise<SnapshotRef | null>;
  load(ref: SnapshotRef): Promise<RunSnapshot>;
}

interface VacantEntry {
  name: string;
  unitCount: number;
  units: UnitRecord[];
}

export interface Comparison {
  newlyVacant: NewlyVacant[];
  summary: ComparisonSummary;
}

/**
 * url -> vacancy for successful results with at least one vacant unit
 */
export function vacantMap(results: PropertyResult[]): Map<string, VacantEntry> {
  const map = new Map<string, VacantEntry>();
  for (const result of results) {
    if (isVacantProperty(result)) {
      map.set(result.url, { name: result.name, unitCount: result.unitCount, units: result.units });
    }
  }
  return map;
}

/**
 * Properties that became vacant, or gained vacant units, since `previous`.
 * Decreases and disappearances are not reported. Entries follow the order
 * of `current`.
 */
export function compareResults(current: PropertyResult[], previous: PropertyResult[]): Comparison {
  const currentVacant = vacantMap(current);
  const previousVacant = vacantMap(previous);
  const newlyVacant: NewlyVacant[] = [];
  const seen = new Set<string>();

  for (const result of current) {
    const now = currentVacant.get(result.url);
    if (!now || seen.has(result.url)) continue;
    seen.add(result.url);

    const before = previousVacant.get(result.url);
    if (!before) {
      newlyVacant.push({ url: result.url, changeType: 'new', result });
    } else if (now.unitCount > before.unitCount) {
      newlyVacant.push({ url: result.url, changeType: 'increased', result });
    }
  }

  const newCount = newlyVacant.filter(entry => entry.changeType === 'new').length;

  return {
    newlyVacant,
    summary: {
      previousVacantCount: previousVacant.size,
      currentVacantCount: currentVacant.size,
      newVacantProperties: newCount,
      increasedVacantProperties: newlyVacant.length - newCount,
      totalNewChanges: newlyVacant.length,
    },
  };
}

function describeChanges(summary: ComparisonSummary): string {
  if (summary.totalNewChanges === 0) return 'no new vacancies';
  const noun = summary.totalNewChanges === 1 ? 'change' : 'changes';
  return `${summary.totalNewChanges} new vacancy ${noun}: ${summary.newVacantProperties} new, ${summary.increasedVacantProperties} increased`;
}

/**
 * Decides whether the current results warrant a notification by comparing
 * them with the most recent stored snapshot.
 *
 * When the previous snapshot cannot be found or read, the decision fails
 * open: notifying about a non-change is preferred to missing a real one.
 */
export class DiffEngine {
  constructor(
    private readonly snapshots: SnapshotSource,
    private readonly events?: CrawlEvents
  ) {}

  async decide(current: PropertyResult[]): Promise<NotificationDecision> {
    const decision = await this.buildDecision(current);
    this.events?.emit('decision', decision);
    return decision;
  }

  private async buildDecision(current: PropertyResult[]): Promise<NotificationDecision> {
    let previous: { ref: SnapshotRef; snapshot: RunSnapshot } | null;

    try {
      previous = await this.loadPrevious();
    } catch (error) {
      const message = describeError(error);
      return {
        shouldNotify: true,
        reason: `comparison failed: ${message}`,
        isFirstRun: false,
        newlyVacant: [],
        summary: { ...emptySummary(vacantMap(current).size), error: message },
      };
    }

    if (!previous) {
      return {
        shouldNotify: true,
        reason: 'first run',
        isFirstRun: true,
        newlyVacant: [],
        summary: emptySummary(vacantMap(current).size),
      };
    }

    const { newlyVacant, summary } = compareResults(current, previous.snapshot.results);

    return {
      shouldNotify: newlyVacant.length > 0,
      reason: describeChanges(summary),
      isFirstRun: false,
      newlyVacant,
      summary: { previousSnapshot: previous.ref.name, ...summary },
    };
  }

  private async loadPrevious(): Promise<{ ref: SnapshotRef; snapshot: RunSnapshot } | null> {
    const ref = await this.snapshots.latest();
    if (!ref) return null;
    return { ref, snapshot: await this.snapshots.load(ref) };
  }
}

function emptySummary(currentVacantCount: number): ComparisonSummary {
  return {
    previousVacantCount: 0,
    currentVacantCount,
    newVacantProperties: 0,
    increasedVacantProperties: 0,
    totalNewChanges: 0,
  };
}

import path from 'path';
import { CrawlEvents } from '../events/crawlEvents';
import { NotificationDecision, PropertyResult, RunSnapshot, Target } from '../types/property';
import { PageRenderer } from '../types/renderer';
import { Settings } from '../config/settings';
import { SiteProfile, urNetProfile } from '../extraction/profile';
import { RecordClassifier } from '../services/classifier';
import { CrawlOrchestrator } from '../services/crawler';
import { DiffEngine } from '../services/diffEngine';
import { ExportFormat, writeExport } from '../services/exporters';
import { FieldExtractor } from '../services/extractor';
import { RunSummary, isVacantProperty, summarizeResults } from '../services/results';
import { SNAPSHOT_PREFIX, SnapshotRef, SnapshotStore, createSnapshot, formatStamp } from '../services/snapshotStore';

export interface VacancyCheckDeps {
  crawler: { run(targets: Target[], signal?: AbortSignal): Promise<PropertyResult[]> };
  diffEngine: { decide(current: PropertyResult[]): Promise<NotificationDecision> };
  store: { readonly dir: string; save(snapshot: RunSnapshot): Promise<SnapshotRef> };
  notifier?: {
    sendVacancyNotification(decision: NotificationDecision, results: PropertyResult[]): Promise<void>;
  };
  events?: CrawlEvents;
  now?: () => Date;
}

export interface VacancyCheckOptions {
  /** Skip the comparison and treat every run as worth a notification */
  ignoreHistory?: boolean;
  exportFormat?: ExportFormat;
  exportPath?: string;
  signal?: AbortSignal;
}

export interface VacancyCheckReport {
  results: PropertyResult[];
  decision: NotificationDecision;
  snapshotPath: string;
  exportPath?: string;
  notified: boolean;
  summary: RunSummary;
}

/**
 * Wire the crawl pipeline from settings
 */
export function createCheckDeps(
  settings: Settings,
  renderer: PageRenderer,
  events: CrawlEvents,
  notifier?: VacancyCheckDeps['notifier'],
  profile: SiteProfile = urNetProfile
): VacancyCheckDeps {
  const classifier = new RecordClassifier({
    detail: profile.detail,
    completeRowImpliesVacancy: settings.crawl.completeRowImpliesVacancy,
  });
  const extractor = new FieldExtractor(profile, classifier);
  const crawler = new CrawlOrchestrator(
    renderer,
    extractor,
    {
      maxRetries: settings.crawl.maxRetries,
      navigationTimeoutMs: settings.crawl.navigationTimeoutMs,
      settleDelayMs: settings.crawl.settleDelayMs,
      requestDelayMs: settings.crawl.requestDelayMs,
    },
    events
  );
  const store = new SnapshotStore(settings.resultsDir);

  return { crawler, diffEngine: new DiffEngine(store, events), store, notifier, events };
}

function historyIgnored(results: PropertyResult[]): NotificationDecision {
  return {
    shouldNotify: true,
    reason: 'history ignored',
    isFirstRun: false,
    newlyVacant: [],
    summary: {
      previousVacantCount: 0,
      currentVacantCount: results.filter(isVacantProperty).length,
      newVacantProperties: 0,
      increasedVacantProperties: 0,
      totalNewChanges: 0,
    },
  };
}

/**
 * Crawl, decide, notify, persist.
 *
 * The decision is made before the new snapshot is written so the comparison
 * is always against the previous run. The snapshot is written only after the
 * notification went out: a failed delivery leaves history untouched and the
 * next run (or the job's retry) reports the same vacancies again.
 */
export async function runVacancyCheck(
  targets: Target[],
  deps: VacancyCheckDeps,
  options: VacancyCheckOptions = {}
): Promise<VacancyCheckReport> {
  const now = deps.now ?? (() => new Date());

  const results = await deps.crawler.run(targets, options.signal);

  const decision = options.ignoreHistory ? historyIgnored(results) : await deps.diffEngine.decide(results);

  let notified = false;
  if (decision.shouldNotify && deps.notifier) {
    await deps.notifier.sendVacancyNotification(decision, results);
    notified = true;
  }

  const snapshot = createSnapshot(results, now());
  const saved = await deps.store.save(snapshot);

  let exportPath: string | undefined;
  if (options.exportPath || (options.exportFormat && options.exportFormat !== 'json')) {
    const format = options.exportFormat ?? 'json';
    const target =
      options.exportPath ?? path.join(deps.store.dir, `${SNAPSHOT_PREFIX}${formatStamp(new Date(snapshot.timestamp))}.${format}`);
    exportPath = await writeExport(snapshot, format, target);
  }

  const summary = summarizeResults(results);
  deps.events?.emit('run:complete', { summary, snapshotPath: saved.path, exportPath, notified });

  return { results, decision, snapshotPath: saved.path, exportPath, notified, summary };
}

import { CrawlEvents } from './crawlEvents';

type Log = Pick<Console, 'log' | 'warn' | 'error'>;

/**
 * Print crawl progress to the console
 */
export function attachConsoleReporter(events: CrawlEvents, log: Log = console): void {
  events.on('run:start', ({ total, requestDelayMs, maxRetries }) => {
    log.log(`🚀 Checking ${total} listing page${total === 1 ? '' : 's'}...`);
    log.log(`⏱️  Request delay: ${requestDelayMs / 1000}s, max retries: ${maxRetries}`);
  });

  events.on('target:start', ({ index, total, url }) => {
    log.log(`🔍 [${index}/${total}] Checking: ${url}`);
  });

  events.on('target:retry', ({ attempt, maxRetries, delayMs, error }) => {
    log.warn(`   ⚠️  Page load failed (attempt ${attempt}/${maxRetries}): ${error}`);
    log.log(`   Waiting ${delayMs}ms before retry...`);
  });

  events.on('target:complete', ({ index, total, result }) => {
    if (result.status === 'success') {
      log.log(`✅ [${index}/${total}] ${result.name} (${result.unitCount} vacant unit${result.unitCount === 1 ? '' : 's'})`);
    } else {
      log.error(`❌ [${index}/${total}] Failed: ${result.url} - ${result.error ?? 'unknown error'}`);
    }
  });

  events.on('page:release-failed', ({ url, error }) => {
    log.warn(`Page cleanup warning for ${url} (non-fatal): ${error}`);
  });

  events.on('decision', decision => {
    const { summary } = decision;
    if (summary.error) {
      log.warn(`⚠️ Comparison with previous snapshot failed: ${summary.error}`);
    } else if (!decision.isFirstRun) {
      log.log(`📊 Compared with ${summary.previousSnapshot ?? 'previous snapshot'}:`);
      log.log(`   Previously vacant properties: ${summary.previousVacantCount}`);
      log.log(`   Currently vacant properties: ${summary.currentVacantCount}`);
      log.log(`   New: ${summary.newVacantProperties}, increased: ${summary.increasedVacantProperties}`);
    }
    log.log(`📧 Notify: ${decision.shouldNotify ? 'yes' : 'no'} (${decision.reason})`);
  });

  events.on('run:complete', ({ summary, snapshotPath, exportPath, notified }) => {
    log.log('\n=== CHECK SUMMARY ===');
    log.log(`Checked: ${summary.total}`);
    log.log(`Succeeded: ${summary.succeeded}`);
    log.log(`Failed: ${summary.failed}`);
    log.log(`Vacant units: ${summary.vacantUnits} across ${summary.vacantProperties} properties`);
    log.log(`Snapshot: ${snapshotPath}`);
    if (exportPath) {
      log.log(`Export: ${exportPath}`);
    }
    log.log(`Notification sent: ${notified ? 'yes' : 'no'}`);
    log.log('=====================\n');
  });
}

#!/usr/bin/env node
import { Settings, loadSettings } from '../config/settings';
import { ConfigurationError, CrawlAbortedError, describeError } from '../errors';
import { attachConsoleReporter } from '../events/consoleReporter';
import { CrawlEvents } from '../events/crawlEvents';
import { PlaywrightRenderer } from '../services/browser';
import { NotificationService } from '../services/notifications';
import { loadTargets } from '../services/targets';
import { CliOptions, USAGE, parseCliArgs } from './cli';
import { VacancyCheckReport, createCheckDeps, runVacancyCheck } from './vacancyCheck';

/**
 * Settings with the command line overrides applied
 */
export function applyCliOverrides(settings: Settings, opts: CliOptions): Settings {
  return {
    ...settings,
    crawl: {
      ...settings.crawl,
      requestDelayMs: opts.delaySeconds !== undefined ? opts.delaySeconds * 1000 : settings.crawl.requestDelayMs,
      maxRetries: opts.maxRetries ?? settings.crawl.maxRetries,
      headless: opts.headless ?? settings.crawl.headless,
    },
  };
}

/**
 * Run the vacancy check once (for manual runs or cron jobs).
 * Resolves to null when only the usage text or a test notification was requested.
 */
async function runOnce(argv: string[] = process.argv.slice(2)): Promise<VacancyCheckReport | null> {
  const opts = parseCliArgs(argv);
  if (opts.help) {
    console.log(USAGE);
    return null;
  }

  const settings = applyCliOverrides(loadSettings(), opts);

  if (opts.testNotification) {
    const sent = await new NotificationService(settings).testNotification();
    if (!sent) {
      throw new Error('Test notification could not be delivered');
    }
    return null;
  }

  // Configuration problems surface before any page is visited
  const notificationService = opts.notify ? new NotificationService(settings) : null;
  if (!notificationService) {
    console.log('🔕 Notifications disabled for this run');
  }

  const targets = await loadTargets({ urls: opts.urls, file: opts.file, csv: opts.csv }, settings.targetUrlPattern);
  if (targets.length === 0) {
    throw new ConfigurationError('No valid target URLs found. Pass --urls, --file or --csv.');
  }

  console.log('Starting one-time vacancy check...');
  if (opts.ignoreHistory) {
    console.log('🚫 History checks disabled - will notify for all vacant properties');
  }

  const events = new CrawlEvents();
  attachConsoleReporter(events);

  const renderer = new PlaywrightRenderer({
    headless: settings.crawl.headless,
    executablePath: settings.crawl.chromiumPath,
  });

  const controller = new AbortController();
  const onInterrupt = () => {
    console.log('\nInterrupted - stopping after the current page...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    await renderer.initialize();

    const report = await runVacancyCheck(
      targets,
      createCheckDeps(settings, renderer, events, notificationService ?? undefined),
      {
        ignoreHistory: opts.ignoreHistory,
        exportFormat: opts.outputFormat,
        exportPath: opts.outputPath,
        signal: controller.signal,
      }
    );

    console.log('✅ One-time vacancy check completed successfully');
    return report;
  } catch (error) {
    const errorMessage = describeError(error);
    console.error('❌ One-time vacancy check failed:', errorMessage);

    if (notificationService && !(error instanceof CrawlAbortedError)) {
      await notificationService.sendErrorNotification(errorMessage, 'one-time vacancy check');
    }

    throw error;
  } finally {
    process.off('SIGINT', onInterrupt);
    await renderer.cleanup();
  }
}

if (require.main === module) {
  runOnce()
    .then(() => {
      console.log('Script completed');
      process.exit(0);
    })
    .catch(error => {
      if (error instanceof CrawlAbortedError) {
        console.error(`Stopped after ${error.completed} page(s)`);
        process.exit(130);
      }
      if (error instanceof ConfigurationError) {
        console.error(error.message);
        console.error(USAGE);
        process.exit(2);
      }
      console.error('Script failed:', error);
      process.exit(1);
    });
}

export { runOnce };

import { Worker, Job } from 'bullmq';
import IORedis from 'ioredis';
import { Settings } from '../config/settings';
import { ConfigurationError, CrawlAbortedError, describeError } from '../errors';
import { attachConsoleReporter } from '../events/consoleReporter';
import { CrawlEvents } from '../events/crawlEvents';
import { CHECK_QUEUE, CheckJobData } from '../jobs/checkScheduler';
import { createCheckDeps, runVacancyCheck, VacancyCheckReport } from '../jobs/vacancyCheck';
import { PlaywrightRenderer } from '../services/browser';
import { NotificationService } from '../services/notifications';
import { RunSummary } from '../services/results';
import { TargetSource, loadTargets, targetSourceForFile } from '../services/targets';
import { Target } from '../types/property';

/**
 * BullMQ worker that runs one vacancy check per job, one job at a time
 */
export class CheckWorker {
  private worker: Worker<CheckJobData, RunSummary>;
  private redis: IORedis;
  private notificationService: NotificationService;
  private events = new CrawlEvents();
  // Aborted on shutdown so an in-flight crawl releases its page and stops
  private abortController = new AbortController();

  constructor(private readonly settings: Settings) {
    this.redis = new IORedis(settings.redisUrl, {
      maxRetriesPerRequest: null, // Required for BullMQ blocking operations
      lazyConnect: true,
    });

    this.notificationService = new NotificationService(settings);
    attachConsoleReporter(this.events);

    // Only the summary is stored as the job's return value
    this.worker = new Worker<CheckJobData, RunSummary>(
      CHECK_QUEUE,
      async job => (await this.processJob(job)).summary,
      {
        connection: this.redis,
        concurrency: 1,
        maxStalledCount: 3,
        stalledInterval: 30 * 1000,
        lockDuration: 30 * 60 * 1000, // A full crawl with retries can take a while
      }
    );

    this.setupEventHandlers();
    console.log('Vacancy check worker initialized');
  }

  /**
   * Targets for a job: explicit URLs, then the job's file, then TARGETS_FILE
   */
  async resolveTargets(data: CheckJobData): Promise<Target[]> {
    const file = data.targetsFile ?? this.settings.targetsFile;
    const source: TargetSource = data.urls?.length ? { urls: data.urls } : file ? targetSourceForFile(file) : {};

    const targets = await loadTargets(source, this.settings.targetUrlPattern);
    if (targets.length === 0) {
      throw new ConfigurationError('No targets to check. Set TARGETS_FILE or pass urls in the job data.');
    }
    return targets;
  }

  async processJob(job: Pick<Job<CheckJobData>, 'id' | 'data' | 'updateProgress'>): Promise<VacancyCheckReport> {
    console.log(`Starting vacancy check job ${job.id} at ${new Date().toISOString()}`);

    const renderer = new PlaywrightRenderer({
      headless: this.settings.crawl.headless,
      executablePath: this.settings.crawl.chromiumPath,
    });

    try {
      const targets = await this.resolveTargets(job.data);
      await job.updateProgress(10);

      await renderer.initialize();
      await job.updateProgress(20);

      const report = await runVacancyCheck(
        targets,
        createCheckDeps(this.settings, renderer, this.events, this.notificationService),
        { ignoreHistory: job.data.ignoreHistory, signal: this.abortController.signal }
      );

      await job.updateProgress(100);
      console.log(`Vacancy check job ${job.id} completed successfully`);
      return report;
    } catch (error) {
      const errorMessage = describeError(error);
      console.error(`Vacancy check job ${job.id} failed:`, errorMessage);

      if (!(error instanceof CrawlAbortedError)) {
        await this.notificationService.sendErrorNotification(errorMessage, `vacancy check job ${job.id}`);
      }

      throw error; // Re-throw to mark job as failed
    } finally {
      await renderer.cleanup();
    }
  }

  private setupEventHandlers(): void {
    this.worker.on('completed', job => {
      console.log(`Job ${job.id} completed successfully`);
    });

    this.worker.on('failed', (job, err) => {
      console.error(`Job ${job?.id} failed:`, err.message);
    });

    this.worker.on('error', err => {
      console.error('Worker error:', err);
    });

    this.worker.on('stalled', jobId => {
      console.warn(`Job ${jobId} stalled`);
    });
  }

  async start(): Promise<void> {
    console.log('Starting vacancy check worker...');
    // The worker starts processing on construction; wait for Redis
    await this.redis.ping();
    console.log('Vacancy check worker started and connected to Redis');
  }

  async shutdown(): Promise<void> {
    console.log('Shutting down vacancy check worker...');
    this.abortController.abort();

    try {
      await this.worker.close();
      this.redis.disconnect();
      console.log('Worker shutdown complete');
    } catch (error) {
      console.error('Error during worker shutdown:', error);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.redis.ping();
      return !this.worker.closing;
    } catch (error) {
      console.error('Worker health check failed:', error);
      return false;
    }
  }
}

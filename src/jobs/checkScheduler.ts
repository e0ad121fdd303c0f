import { Queue } from 'bullmq';
import IORedis from 'ioredis';
import { Settings } from '../config/settings';

export const CHECK_QUEUE = 'vacancy-check';
export const CHECK_JOB = 'check-vacancies';

export interface CheckJobData {
  /** Overrides TARGETS_FILE for this job */
  targetsFile?: string;
  urls?: string[];
  ignoreHistory?: boolean;
}

export interface QueueStats {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

/**
 * Job scheduler for periodic vacancy checks
 */
export class CheckScheduler {
  private queue: Queue<CheckJobData>;
  private redis: IORedis;

  constructor(private readonly settings: Settings) {
    this.redis = new IORedis(settings.redisUrl, {
      maxRetriesPerRequest: null, // Required for BullMQ blocking operations
      lazyConnect: true,
    });

    this.queue = new Queue<CheckJobData>(CHECK_QUEUE, {
      connection: this.redis,
      defaultJobOptions: {
        removeOnComplete: 50,
        removeOnFail: 20,
        attempts: 2,
        backoff: {
          type: 'exponential',
          delay: 60000,
        },
      },
    });

    console.log('Vacancy check scheduler initialized');
  }

  /**
   * Queue a one-time check
   */
  async addCheckJob(data: CheckJobData = {}, jobId?: string): Promise<string | undefined> {
    const job = await this.queue.add(CHECK_JOB, data, {
      jobId: jobId || `check-${Date.now()}`,
      removeOnComplete: 5,
      removeOnFail: 3,
    });

    console.log(`Added vacancy check job ${job.id}`);
    return job.id;
  }

  /**
   * Replace the recurring check with one at CHECK_CRON / CHECK_TZ
   */
  async scheduleRecurringJobs(): Promise<void> {
    await this.removeRecurringJobs();

    const job = await this.queue.add(
      CHECK_JOB,
      {},
      {
        repeat: {
          pattern: this.settings.checkCron,
          tz: this.settings.checkTimezone,
        },
        jobId: 'recurring-check',
      }
    );

    console.log(`Scheduled recurring vacancy check ${job.id} (${this.settings.checkCron}, ${this.settings.checkTimezone})`);
  }

  async removeRecurringJobs(): Promise<void> {
    const repeatableJobs = await this.queue.getRepeatableJobs();

    for (const job of repeatableJobs) {
      if (job.name === CHECK_JOB) {
        await this.queue.removeRepeatableByKey(job.key);
        console.log(`Removed recurring job: ${job.key}`);
      }
    }
  }

  async getQueueStats(): Promise<QueueStats> {
    const counts = await this.queue.getJobCounts('waiting', 'active', 'completed', 'failed', 'delayed');

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
    };
  }

  /**
   * Drop finished jobs older than a week
   */
  async cleanOldJobs(): Promise<void> {
    const oneWeekAgo = 7 * 24 * 60 * 60 * 1000;

    await Promise.all([
      this.queue.clean(oneWeekAgo, 100, 'completed'),
      this.queue.clean(oneWeekAgo, 50, 'failed'),
    ]);

    console.log('Cleaned up old jobs');
  }

  async start(): Promise<void> {
    console.log('Starting vacancy check scheduler...');
    await this.redis.ping();
    await this.scheduleRecurringJobs();
    console.log('Vacancy check scheduler started');
  }

  async shutdown(): Promise<void> {
    console.log('Shutting down vacancy check scheduler...');

    try {
      await this.queue.close();
      this.redis.disconnect();
      console.log('Scheduler shutdown complete');
    } catch (error) {
      console.error('Error during scheduler shutdown:', error);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.redis.ping();
      return true;
    } catch (error) {
      console.error('Scheduler health check failed:', error);
      return false;
    }
  }
}

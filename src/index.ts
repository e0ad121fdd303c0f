import { Settings, loadSettings } from './config/settings';
import { ConfigurationError, describeError } from './errors';
import { CheckScheduler, QueueStats } from './jobs/checkScheduler';
import { CheckWorker } from './workers/checkWorker';

/**
 * Main application entry point.
 * Starts the BullMQ worker and the scheduler for periodic vacancy checks.
 */
class VacancyWatcherApp {
  private worker: CheckWorker;
  private scheduler: CheckScheduler;
  private isShuttingDown = false;
  private timers: NodeJS.Timeout[] = [];

  constructor(private readonly settings: Settings = loadSettings()) {
    this.worker = new CheckWorker(settings);
    this.scheduler = new CheckScheduler(settings);
  }

  async start(): Promise<void> {
    console.log('🏠 Starting Vacancy Watcher...');
    console.log(`Environment: ${this.settings.nodeEnv}`);

    try {
      await this.scheduler.start();
      await this.worker.start();

      // Check straight away outside production
      if (this.settings.nodeEnv !== 'production') {
        console.log('Adding startup vacancy check...');
        await this.scheduler.addCheckJob({}, 'startup-check');
      }

      console.log('✅ Vacancy Watcher started successfully');
      console.log(`Checks run on "${this.settings.checkCron}" (${this.settings.checkTimezone})`);

      this.keepAlive();
    } catch (error) {
      console.error('❌ Failed to start application:', error);
      await this.shutdown();
      throw error;
    }
  }

  /**
   * Shut down on the first signal, exit on the second
   */
  setupGracefulShutdown(): void {
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];

    signals.forEach(signal => {
      process.on(signal, () => {
        if (this.isShuttingDown) {
          console.log(`Received ${signal} again, forcing exit...`);
          process.exit(1);
        }

        console.log(`\nReceived ${signal}, starting graceful shutdown...`);
        this.shutdown()
          .then(() => process.exit(0))
          .catch(error => {
            console.error('Shutdown failed:', error);
            process.exit(1);
          });
      });
    });
  }

  /**
   * Periodic health logging and queue cleanup
   */
  private keepAlive(): void {
    const healthCheck = setInterval(() => {
      this.logHealth().catch(error => console.error('❌ Health check failed:', error));
    }, 30 * 60 * 1000);

    const cleanup = setInterval(() => {
      this.scheduler.cleanOldJobs().catch(error => console.error('Failed to clean old jobs:', error));
    }, 24 * 60 * 60 * 1000);

    this.timers.push(healthCheck, cleanup);
  }

  private async logHealth(): Promise<void> {
    const status = await this.getStatus();

    if (status.worker && status.scheduler) {
      console.log('💚 Health check passed - Application running normally');
      const stats = status.queueStats;
      console.log(
        `Queue stats - Waiting: ${stats.waiting}, Active: ${stats.active}, Completed: ${stats.completed}, Failed: ${stats.failed}`
      );
    } else {
      console.warn('⚠️  Health check warning - Some components unhealthy');
      console.log(`Worker healthy: ${status.worker}, Scheduler healthy: ${status.scheduler}`);
    }
  }

  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    console.log('🔄 Shutting down Vacancy Watcher...');
    this.timers.forEach(timer => clearInterval(timer));
    this.timers = [];

    await Promise.all([this.worker.shutdown(), this.scheduler.shutdown()]);
    console.log('✅ Application shutdown complete');
  }

  async getStatus(): Promise<{ worker: boolean; scheduler: boolean; queueStats: QueueStats }> {
    const [worker, scheduler, queueStats] = await Promise.all([
      this.worker.healthCheck(),
      this.scheduler.healthCheck(),
      this.scheduler.getQueueStats(),
    ]);

    return { worker, scheduler, queueStats };
  }
}

/**
 * Build and start the app; configuration errors surface as a rejection
 */
async function startApp(loadAppSettings: () => Settings = loadSettings): Promise<VacancyWatcherApp> {
  const app = new VacancyWatcherApp(loadAppSettings());
  app.setupGracefulShutdown();
  await app.start();
  return app;
}

if (require.main === module) {
  startApp().catch(error => {
    console.error('Failed to start application:', describeError(error));
    process.exit(error instanceof ConfigurationError ? 2 : 1);
  });
}

export { VacancyWatcherApp, startApp };

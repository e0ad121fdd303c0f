import { CrawlEvents } from '../events/crawlEvents';
import { CrawlAbortedError, NavigationError, describeError } from '../errors';
import { PropertyResult, Target } from '../types/property';
import { PageRenderer, RenderedPage } from '../types/renderer';
import { FieldExtractor } from './extractor';
import { failedResult } from './results';

export interface CrawlOptions {
  maxRetries: number;
  navigationTimeoutMs: number;
  settleDelayMs: number;
  requestDelayMs: number;
  /** Backoff after failed attempt n (0-based) is 2^n of this */
  backoffUnitMs?: number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

class SleepAbortedError extends Error {
  constructor() {
    super('Sleep aborted');
    this.name = 'SleepAbortedError';
  }
}

/**
 * setTimeout-based delay that rejects as soon as the signal aborts
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SleepAbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new SleepAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Visits targets one at a time, in order, with retry and pacing.
 *
 * Each target gets its own page, released before the next target starts.
 * A target's failure becomes a failed result; only an abort stops the batch.
 */
export class CrawlOrchestrator {
  private readonly backoffUnitMs: number;

  constructor(
    private readonly renderer: PageRenderer,
    private readonly extractor: FieldExtractor,
    private readonly options: CrawlOptions,
    private readonly events: CrawlEvents = new CrawlEvents(),
    private readonly wait: Sleep = sleep
  ) {
    this.backoffUnitMs = options.backoffUnitMs ?? 1000;
  }

  async run(targets: Target[], signal?: AbortSignal): Promise<PropertyResult[]> {
    const results: PropertyResult[] = [];
    const total = targets.length;

    this.events.emit('run:start', {
      total,
      requestDelayMs: this.options.requestDelayMs,
      maxRetries: this.options.maxRetries,
    });

    for (let i = 0; i < total; i++) {
      this.throwIfAborted(signal, results.length);

      const result = await this.checkTarget(targets[i], i + 1, total, signal);
      results.push(result);
      this.events.emit('target:complete', { index: i + 1, total, result });

      if (i < total - 1) {
        await this.pause(this.options.requestDelayMs, signal, results.length);
      }
    }

    return results;
  }

  /**
   * Check a single target. Resolves to a failed result on navigation or
   * extraction failure; rejects only when the crawl is aborted.
   */
  async checkTarget(target: Target, index: number, total: number, signal?: AbortSignal): Promise<PropertyResult> {
    this.events.emit('target:start', { index, total, url: target.url });

    let page: RenderedPage;
    try {
      page = await this.renderer.newPage();
    } catch (error) {
      return failedResult(target, `could not open page: ${describeError(error)}`);
    }

    try {
      await this.navigate(page, target.url, signal);
      await this.pause(this.options.settleDelayMs, signal, index - 1);
      return await this.extractor.extract(page, target);
    } catch (error) {
      if (signal?.aborted) {
        throw error instanceof CrawlAbortedError ? error : new CrawlAbortedError(index - 1);
      }
      if (error instanceof NavigationError) {
        return failedResult(target, 'navigation failed');
      }
      return failedResult(target, describeError(error));
    } finally {
      await this.release(page, target.url);
    }
  }

  private async navigate(page: RenderedPage, url: string, signal?: AbortSignal): Promise<void> {
    const { maxRetries, navigationTimeoutMs } = this.options;
    let lastError: unknown;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      try {
        await page.navigate(url, navigationTimeoutMs);
        return;
      } catch (error) {
        lastError = error;
        if (signal?.aborted) throw error;

        if (attempt < maxRetries - 1) {
          const delayMs = 2 ** attempt * this.backoffUnitMs;
          this.events.emit('target:retry', {
            url,
            attempt: attempt + 1,
            maxRetries,
            delayMs,
            error: describeError(error),
          });
          await this.wait(delayMs, signal);
        }
      }
    }

    throw new NavigationError(url, maxRetries, lastError);
  }

  private async pause(ms: number, signal: AbortSignal | undefined, completed: number): Promise<void> {
    try {
      await this.wait(ms, signal);
    } catch (error) {
      if (signal?.aborted) throw new CrawlAbortedError(completed);
      throw error;
    }
  }

  private throwIfAborted(signal: AbortSignal | undefined, completed: number): void {
    if (signal?.aborted) {
      throw new CrawlAbortedError(completed);
    }
  }

  private async release(page: RenderedPage, url: string): Promise<void> {
    try {
      await page.close();
    } catch (error) {
      this.events.emit('page:release-failed', { url, error: describeError(error) });
    }
  }
}

/**
 * Raised when required configuration is missing or malformed.
 * Always fatal: the run aborts before any target is checked.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class NavigationError extends Error {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    public readonly lastError?: unknown
  ) {
    super(`navigation failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${url}`);
    this.name = 'NavigationError';
  }
}

export class SnapshotExistsError extends Error {
  constructor(public readonly path: string) {
    super(`Snapshot already exists: ${path}`);
    this.name = 'SnapshotExistsError';
  }
}

export class SnapshotFormatError extends Error {
  constructor(public readonly path: string, detail: string) {
    super(`Invalid snapshot file ${path}: ${detail}`);
    this.name = 'SnapshotFormatError';
  }
}

export class CrawlAbortedError extends Error {
  constructor(public readonly completed: number) {
    super(`Crawl interrupted after ${completed} target${completed === 1 ? '' : 's'}`);
    this.name = 'CrawlAbortedError';
  }
}

/**
 * Human-readable description of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}

import { EventEmitter } from 'events';
import { NotificationDecision, PropertyResult } from '../types/property';
import { RunSummary } from '../services/results';

export interface TargetStartEvent {
  index: number;
  total: number;
  url: string;
}

export interface TargetRetryEvent {
  url: string;
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: string;
}

export interface TargetCompleteEvent {
  index: number;
  total: number;
  result: PropertyResult;
}

export interface RunCompleteEvent {
  summary: RunSummary;
  snapshotPath: string;
  exportPath?: string;
  notified: boolean;
}

export interface CrawlEventMap {
  'run:start': { total: number; requestDelayMs: number; maxRetries: number };
  'target:start': TargetStartEvent;
  'target:retry': TargetRetryEvent;
  'target:complete': TargetCompleteEvent;
  'page:release-failed': { url: string; error: string };
  decision: NotificationDecision;
  'run:complete': RunCompleteEvent;
}

export type CrawlEventName = keyof CrawlEventMap;

/**
 * Typed event bus for crawl progress. Emission is fire-and-forget: nothing
 * in the crawl or the decision depends on who is listening.
 */
export class CrawlEvents {
  private emitter = new EventEmitter();

  on<K extends CrawlEventName>(event: K, listener: (payload: CrawlEventMap[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  emit<K extends CrawlEventName>(event: K, payload: CrawlEventMap[K]): void {
    this.emitter.emit(event, payload);
  }
}

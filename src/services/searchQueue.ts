import { SettingsChangedEvent } from '../types/Show';
import { showsModel } from '../models/shows';
import { settingsEvents } from './settingsEvents';
import { logger } from './structuredLogging';

export const SearchPriority = {
  EXTREME: 5,
  HIGH: 10,
  NORMAL: 20,
  LOW: 30,
} as const;

export type SearchPriorityValue = (typeof SearchPriority)[keyof typeof SearchPriority];

export type SearchKind = 'backlog' | 'daily' | 'manual';

export interface SearchItem {
  showId: number;
  kind: SearchKind;
  priority: SearchPriorityValue;
  addedAt: Date;
}

/**
 * In-memory queue of per-show searches. Lower priority values run first,
 * FIFO within a priority. Paused shows never get items queued.
 */
export class SearchQueue {
  private items: SearchItem[] = [];
  private pausedShows = new Set<number>();
  private queuePaused = false;
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly isShowPaused: (showId: number) => boolean = (showId) => Boolean(showsModel.getById(showId)?.paused)) {}

  /** Follow settings changes so pausing a show drops its queued searches. */
  attach(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = settingsEvents.onChanged((event) => this.handleSettingsChanged(event));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  handleSettingsChanged(event: SettingsChangedEvent): void {
    if (!event.changedFields.includes('paused')) return;

    if (event.current.paused) {
      this.pausedShows.add(event.showId);
      const dropped = this.removeShow(event.showId);
      logger.info('scheduler', `Show ${event.showId} paused, dropped ${dropped} queued search(es)`, { showId: event.showId });
    } else {
      this.pausedShows.delete(event.showId);
      logger.info('scheduler', `Show ${event.showId} resumed`, { showId: event.showId });
    }
  }

  isPausedShow(showId: number): boolean {
    return this.pausedShows.has(showId) || this.isShowPaused(showId);
  }

  put(showId: number, kind: SearchKind, priority: SearchPriorityValue = SearchPriority.NORMAL): SearchItem | null {
    if (this.isPausedShow(showId)) {
      logger.debug('scheduler', `Not queueing ${kind} search for paused show ${showId}`, { showId });
      return null;
    }
    if (this.items.some((item) => item.showId === showId && item.kind === kind)) {
      return null;
    }

    const item: SearchItem = { showId, kind, priority, addedAt: new Date() };
    // Insert after the last item of equal or higher priority
    const index = this.items.findIndex((queued) => queued.priority > priority);
    if (index === -1) {
      this.items.push(item);
    } else {
      this.items.splice(index, 0, item);
    }
    return item;
  }

  next(): SearchItem | null {
    if (this.queuePaused) return null;
    return this.items.shift() ?? null;
  }

  removeShow(showId: number): number {
    const before = this.items.length;
    this.items = this.items.filter((item) => item.showId !== showId);
    return before - this.items.length;
  }

  pause(): void {
    logger.info('scheduler', 'Pausing search queue');
    this.queuePaused = true;
  }

  unpause(): void {
    logger.info('scheduler', 'Un-pausing search queue');
    this.queuePaused = false;
  }

  get isPaused(): boolean {
    return this.queuePaused;
  }

  get size(): number {
    return this.items.length;
  }

  snapshot(): SearchItem[] {
    return [...this.items];
  }
}

export const searchQueue = new SearchQueue();

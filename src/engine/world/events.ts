/**
 * Event bus: typed publish/subscribe with queued or immediate dispatch and a
 * bounded history.
 *
 * Dispatch order for one event: timestamp, global listeners, subscribers
 * for its type, then history. A throwing handler is logged and reported as a
 * DispatchFailure; it never stops the remaining handlers or events.
 */

import { createLogger, describeError } from '../logger';
import type { EntityId, EventData, EventInit, LocationId, SimEvent } from '../types';

const log = createLogger('Events');

export const EventTypes = {
  // NPCs
  NPC_SPAWNED: 'npc_spawned',
  NPC_DIED: 'npc_died',
  NPC_STARTED_WORKING: 'npc_started_working',
  NPC_STARTED_TRAVELING: 'npc_started_traveling',
  NPC_ARRIVED: 'npc_arrived',
  NPC_ENTERED_LOCATION: 'npc_entered_location',
  NPC_EXITED_LOCATION: 'npc_exited_location',

  // Items
  ITEM_CRAFTED: 'item_crafted',

  // Locations
  LOCATION_CREATED: 'location_created',
  MARKET_OPENED: 'market_opened',
  MARKET_CLOSED: 'market_closed',

  // Time
  SEASON_CHANGED: 'season_changed',
  HOUR_PASSED: 'hour_passed',
  DAY_PASSED: 'day_passed',
  YEAR_PASSED: 'year_passed',
} as const;

export type StandardEventType = (typeof EventTypes)[keyof typeof EventTypes];

export type EventHandler = (event: SimEvent) => void;
export type Clock = () => number;

export interface DispatchFailure {
  eventId: string;
  eventType: string;
  listener: 'global' | 'subscriber';
  error: string;
}

export interface EventSummaryEntry {
  id: string;
  type: string;
  source: EntityId | null;
  target: EntityId | null;
  location: LocationId | null;
  timestamp: number | null;
  data: EventData;
}

export interface EventBusSummary {
  queueSize: number;
  historySize: number;
  maxHistory: number;
  recentEvents: EventSummaryEntry[];
}

export interface ProcessResult {
  processed: number;
  failures: DispatchFailure[];
}

export interface EventBusOptions {
  maxHistory?: number;
  clock?: Clock;
}

export interface PublishOptions extends EventInit {
  immediate?: boolean;
}

export class EventBus {
  readonly maxHistory: number;

  private subscribers = new Map<string, EventHandler[]>();
  private globalListeners: EventHandler[] = [];
  private queue: SimEvent[] = [];
  private history: SimEvent[] = [];
  private nextId = 1;
  private clock: Clock;

  constructor(options: EventBusOptions = {}) {
    this.maxHistory = options.maxHistory ?? 1000;
    if (!Number.isInteger(this.maxHistory) || this.maxHistory < 1) {
      throw new RangeError(`maxHistory must be a positive integer, got ${this.maxHistory}`);
    }
    this.clock = options.clock ?? (() => 0);
  }

  setClock(clock: Clock): void {
    this.clock = clock;
  }

  /**
   * Build an event with a fresh id. The timestamp stays null until dispatch.
   */
  createEvent(type: string, init: EventInit = {}): SimEvent {
    return {
      id: `evt_${this.nextId++}`,
      type,
      data: init.data ?? {},
      sourceId: init.sourceId ?? null,
      targetId: init.targetId ?? null,
      locationId: init.locationId ?? null,
      timestamp: null,
    };
  }

  /**
   * Subscribe to one event type. Returns an unsubscribe function.
   */
  subscribe(type: string, handler: EventHandler): () => void {
    const handlers = this.subscribers.get(type) ?? [];
    handlers.push(handler);
    this.subscribers.set(type, handlers);
    return () => {
      this.unsubscribe(type, handler);
    };
  }

  unsubscribe(type: string, handler: EventHandler): boolean {
    const handlers = this.subscribers.get(type);
    if (!handlers) return false;
    const index = handlers.indexOf(handler);
    if (index < 0) return false;
    handlers.splice(index, 1);
    if (handlers.length === 0) this.subscribers.delete(type);
    return true;
  }

  /**
   * Listen to every event regardless of type.
   */
  addGlobalListener(handler: EventHandler): () => void {
    this.globalListeners.push(handler);
    return () => {
      const index = this.globalListeners.indexOf(handler);
      if (index >= 0) this.globalListeners.splice(index, 1);
    };
  }

  /**
   * Dispatch now, or queue for the next processEvents call.
   */
  publish(event: SimEvent, immediate: boolean = false): DispatchFailure[] {
    if (immediate) {
      return this.dispatch(event);
    }
    this.queue.push(event);
    return [];
  }

  publishEvent(type: string, options: PublishOptions = {}): DispatchFailure[] {
    const { immediate = false, ...init } = options;
    return this.publish(this.createEvent(type, init), immediate);
  }

  /**
   * Drain up to `maxEvents` queued events oldest first, or everything
   * (including events queued by handlers along the way) when omitted.
   */
  processEvents(maxEvents?: number): ProcessResult {
    const failures: DispatchFailure[] = [];
    const limit = maxEvents ?? Number.POSITIVE_INFINITY;
    let processed = 0;
    while (this.queue.length > 0 && processed < limit) {
      // Handlers publish into a fresh queue while this batch drains
      const batch = this.queue;
      this.queue = [];
      let index = 0;
      while (index < batch.length && processed < limit) {
        failures.push(...this.dispatch(batch[index]));
        index++;
        processed++;
      }
      if (index < batch.length) {
        this.queue = [...batch.slice(index), ...this.queue];
      }
    }
    return { processed, failures };
  }

  private dispatch(event: SimEvent): DispatchFailure[] {
    const failures: DispatchFailure[] = [];
    event.timestamp = this.clock();

    const run = (handler: EventHandler, listener: DispatchFailure['listener']) => {
      try {
        handler(event);
      } catch (error) {
        log.error(`Handler for ${event.type} (${event.id}) failed:`, describeError(error));
        failures.push({ eventId: event.id, eventType: event.type, listener, error: describeError(error) });
      }
    };

    for (const listener of [...this.globalListeners]) {
      run(listener, 'global');
    }
    for (const handler of [...(this.subscribers.get(event.type) ?? [])]) {
      run(handler, 'subscriber');
    }

    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }
    return failures;
  }

  // --- History readers (most recent first) ------------------------

  private newestFirst(predicate: (event: SimEvent) => boolean, limit?: number): SimEvent[] {
    const matching: SimEvent[] = [];
    for (let i = this.history.length - 1; i >= 0; i--) {
      if (limit !== undefined && matching.length >= limit) break;
      if (predicate(this.history[i])) matching.push(this.history[i]);
    }
    return matching;
  }

  getEventsByType(type: string, limit?: number): SimEvent[] {
    return this.newestFirst((event) => event.type === type, limit);
  }

  getEventsBySource(sourceId: EntityId, limit?: number): SimEvent[] {
    return this.newestFirst((event) => event.sourceId === sourceId, limit);
  }

  getEventsByLocation(locationId: LocationId, limit?: number): SimEvent[] {
    return this.newestFirst((event) => event.locationId === locationId, limit);
  }

  getRecentEvents(limit: number = 10): SimEvent[] {
    return this.newestFirst(() => true, limit);
  }

  /** Full history, oldest first. */
  getHistory(): SimEvent[] {
    return [...this.history];
  }

  /** Pending events, oldest first. */
  getQueue(): SimEvent[] {
    return [...this.queue];
  }

  get queueSize(): number {
    return this.queue.length;
  }

  get historySize(): number {
    return this.history.length;
  }

  clearHistory(): void {
    this.history = [];
  }

  clearQueue(): void {
    this.queue = [];
  }

  summary(recent: number = 20): EventBusSummary {
    return {
      queueSize: this.queue.length,
      historySize: this.history.length,
      maxHistory: this.maxHistory,
      recentEvents: this.getRecentEvents(recent).map((event) => ({
        id: event.id,
        type: event.type,
        source: event.sourceId,
        target: event.targetId,
        location: event.locationId,
        timestamp: event.timestamp,
        data: event.data,
      })),
    };
  }

  /**
   * Resume id numbering and re-queue pending events after a restore.
   */
  restore(nextId: number, pending: SimEvent[]): void {
    this.nextId = Math.max(this.nextId, nextId);
    this.queue = [...pending];
  }

  get nextEventId(): number {
    return this.nextId;
  }
}

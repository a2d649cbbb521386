/**
 * World - owns the clock, the event bus, the generator and every living
 * entity, and advances them together one tick at a time.
 *
 * Tick order: advance time, update locations, update NPCs, drain the event
 * queue, then dispatch hour/day/season/year boundary events immediately.
 * NPCs removed during a tick stay in the map (inactive) until it finishes.
 */

import { loadConfig, type EngineConfig } from './config';
import { LookupError } from './errors';
import { ContentGenerator } from './generation/ContentGenerator';
import type { TemplateStore } from './generation/templateStore';
import { createLogger, describeError, setLogLevel } from './logger';
import type { EntityId, LocationId, LocationRecord, Season, TimeState } from './types';
import { deserializeEntity, type EntityKind, type WorldContext } from './world/entities';
import { createNpc, createWorldFromGenerated } from './world/entityFactory';
import { EventBus, EventTypes, type DispatchFailure } from './world/events';
import type { LivingLocation } from './world/LivingLocation';
import type { LivingNpc } from './world/LivingNpc';
import {
  FileSnapshotStorage,
  StateManager,
  type SnapshotFormat,
  type SnapshotStorage,
  type WorldState,
} from './world/snapshot';
import { TimeManager, type CallbackFailure } from './world/TimeManager';
import {
  mergeValidation,
  validateConnections,
  validateMembership,
  type ValidationResult,
} from './world/validation';

const log = createLogger('World');

export interface WorldOptions {
  name?: string;
  description?: string;
  seed?: number;
  config?: Partial<EngineConfig>;
  templates?: TemplateStore;
  /** Snapshot storage; files under config.saveDir when omitted */
  storage?: SnapshotStorage;
  /** Resume the clock from a saved state */
  time?: TimeState;
}

export interface CreateWorldOptions extends WorldOptions {
  /** Root locations to generate; their connections add more */
  locationCount?: number;
}

export interface SpawnOptions {
  professions?: string[];
  race?: string;
  faction?: string;
}

export interface EntityFailure {
  entityId: EntityId;
  kind: EntityKind;
  error: string;
}

export interface TickReport {
  minutes: number;
  time: string;
  eventsProcessed: number;
  entityFailures: EntityFailure[];
  dispatchFailures: DispatchFailure[];
  callbackFailures: CallbackFailure[];
  boundaryEvents: string[];
}

export interface WorldSummary {
  name: string;
  time: string;
  totalMinutes: number;
  locations: number;
  npcs: number;
  activeNpcs: number;
  eventsInQueue: number;
  eventsInHistory: number;
}

type TickListener = (report: TickReport, world: World) => void;

export class World implements WorldContext {
  readonly config: EngineConfig;
  readonly generator: ContentGenerator;
  readonly time: TimeManager;
  readonly events: EventBus;
  readonly stateManager: StateManager;

  readonly locations = new Map<LocationId, LivingLocation>();
  readonly npcs = new Map<EntityId, LivingNpc>();

  name: string;
  description: string;

  private listeners: Set<TickListener> = new Set();
  private ticking = false;
  private pendingRemovals: EntityId[] = [];

  // Calendar values seen at the end of the previous tick
  private lastHour: number;
  private lastDay: number;
  private lastSeason: Season;
  private lastYear: number;

  constructor(options: WorldOptions = {}) {
    this.config = loadConfig({}, options.config);
    if (options.config?.logLevel !== undefined) {
      setLogLevel(this.config.logLevel);
    }
    this.name = options.name ?? 'New World';
    this.description = options.description ?? '';

    this.generator = new ContentGenerator({
      seed: options.seed ?? this.config.seed,
      templates: options.templates,
      dataDir: this.config.dataDir,
      maxItemAttempts: this.config.maxItemAttempts,
    });

    this.time = options.time
      ? TimeManager.fromState(options.time, this.config.missedCallbacks)
      : new TimeManager({ missedCallbacks: this.config.missedCallbacks });

    this.events = new EventBus({
      maxHistory: this.config.maxEventHistory,
      clock: () => this.time.totalMinutes,
    });

    this.stateManager = new StateManager(options.storage ?? new FileSnapshotStorage(this.config.saveDir));

    this.lastHour = this.time.hour;
    this.lastDay = this.time.day;
    this.lastSeason = this.time.season;
    this.lastYear = this.time.year;
  }

  /**
   * Generate a world and populate it with living locations and NPCs.
   */
  static createNew(options: CreateWorldOptions = {}): World {
    const { locationCount = 10, ...worldOptions } = options;
    const world = new World(worldOptions);

    log.info(`Generating "${world.name}" from ${locationCount} root locations (seed ${world.seed})`);
    const generated = world.generator.generateWorld(locationCount);
    const population = createWorldFromGenerated(generated, world, world.config.npcMemorySize);

    for (const [id, location] of population.locations) world.locations.set(id, location);
    for (const [id, npc] of population.npcs) world.npcs.set(id, npc);

    log.info(`Created ${world.locations.size} locations and ${world.npcs.size} NPCs`);
    world.events.publishEvent(EventTypes.LOCATION_CREATED, {
      data: { worldName: world.name, numLocations: world.locations.size, numNpcs: world.npcs.size },
    });
    return world;
  }

  get seed(): number {
    return this.generator.seed;
  }

  /**
   * Subscribe to completed ticks
   */
  subscribe(listener: TickListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify(report: TickReport): void {
    this.listeners.forEach((listener) => listener(report, this));
  }

  /**
   * Run one tick. Fractional minutes are dropped. Faults inside entities,
   * handlers and callbacks are collected in the report rather than thrown.
   */
  step(minutes: number = 1): TickReport {
    if (!Number.isFinite(minutes) || minutes < 0) {
      throw new RangeError(`Cannot step by ${minutes} minutes`);
    }
    const report = this.runTick(Math.trunc(minutes));
    this.notify(report);
    return report;
  }

  private runTick(minutes: number): TickReport {
    const entityFailures: EntityFailure[] = [];
    this.ticking = true;
    try {
      const callbackFailures = this.time.advanceMinutes(minutes);

      for (const location of [...this.locations.values()]) {
        this.updateEntity(location, minutes, entityFailures);
      }
      for (const npc of [...this.npcs.values()]) {
        this.updateEntity(npc, minutes, entityFailures);
      }

      const drained = this.events.processEvents();
      const boundary = this.publishBoundaryEvents();

      return {
        minutes,
        time: this.time.getFullDateTimeString(),
        eventsProcessed: drained.processed + boundary.types.length,
        entityFailures,
        dispatchFailures: [...drained.failures, ...boundary.failures],
        callbackFailures,
        boundaryEvents: boundary.types,
      };
    } finally {
      this.ticking = false;
      this.flushRemovals();
    }
  }

  private updateEntity(entity: LivingLocation | LivingNpc, minutes: number, failures: EntityFailure[]): void {
    try {
      entity.update(minutes, this);
    } catch (error) {
      log.error(`Update of ${entity.kind} ${entity.id} failed:`, describeError(error));
      failures.push({ entityId: entity.id, kind: entity.kind, error: describeError(error) });
    }
  }

  private publishBoundaryEvents(): { types: string[]; failures: DispatchFailure[] } {
    const { hour, day, season, year } = this.time;
    const boundaries: Array<[boolean, string, Record<string, unknown>]> = [
      [hour !== this.lastHour, EventTypes.HOUR_PASSED, { hour }],
      [day !== this.lastDay || year !== this.lastYear, EventTypes.DAY_PASSED, { day }],
      [season !== this.lastSeason, EventTypes.SEASON_CHANGED, { season, previous: this.lastSeason }],
      [year !== this.lastYear, EventTypes.YEAR_PASSED, { year }],
    ];

    this.lastHour = hour;
    this.lastDay = day;
    this.lastSeason = season;
    this.lastYear = year;

    const types: string[] = [];
    const failures: DispatchFailure[] = [];
    for (const [changed, type, data] of boundaries) {
      if (!changed) continue;
      types.push(type);
      failures.push(...this.events.publishEvent(type, { data, immediate: true }));
    }
    return { types, failures };
  }

  private flushRemovals(): void {
    for (const id of this.pendingRemovals) {
      this.npcs.delete(id);
    }
    this.pendingRemovals = [];
  }

  // --- Entity management ----------------------------------------

  /**
   * Generate a new NPC and place it at a location.
   */
  spawnNpc(locationId: LocationId, options: SpawnOptions = {}): LivingNpc {
    const location = this.locations.get(locationId);
    if (!location) {
      throw new LookupError('location', locationId);
    }

    const record = this.generator.generateNpc({ ...options, locationId });
    const npc = createNpc(record, this.generator.random, {
      isTaken: (id) => this.npcs.has(id),
      maxMemory: this.config.npcMemorySize,
    });

    this.npcs.set(npc.id, npc);
    location.addNpc(npc.id);

    this.events.publishEvent(EventTypes.NPC_SPAWNED, {
      sourceId: npc.id,
      locationId,
      data: { npcName: npc.name, profession: npc.primaryProfession },
    });
    log.debug(`Spawned ${npc.name} (${npc.id}) at ${locationId}`);
    return npc;
  }

  /**
   * Deactivate an NPC, detach it from its location and announce its death.
   * Outside a tick the NPC is deleted at once, so a second call throws
   * LookupError.
   * @returns false when the NPC was already deactivated during the current tick
   */
  removeNpc(npcId: EntityId): boolean {
    const npc = this.npcs.get(npcId);
    if (!npc) {
      throw new LookupError('npc', npcId);
    }
    if (!npc.active) return false;

    npc.destroy();
    if (npc.currentLocationId !== null) {
      this.locations.get(npc.currentLocationId)?.removeNpc(npcId);
    }

    if (this.ticking) {
      this.pendingRemovals.push(npcId);
    } else {
      this.npcs.delete(npcId);
    }

    this.events.publishEvent(EventTypes.NPC_DIED, {
      sourceId: npcId,
      locationId: npc.currentLocationId,
      data: { npcName: npc.name },
    });
    return true;
  }

  /**
   * Send an NPC travelling to another location.
   * @returns false when it is already there
   */
  moveNpc(npcId: EntityId, locationId: LocationId): boolean {
    const npc = this.npcs.get(npcId);
    if (!npc) {
      throw new LookupError('npc', npcId);
    }
    return npc.moveTo(locationId, this);
  }

  // --- Queries ---------------------------------------------------

  getLocation(id: LocationId): LivingLocation | undefined {
    return this.locations.get(id);
  }

  getNpc(id: EntityId): LivingNpc | undefined {
    return this.npcs.get(id);
  }

  getNpcsAtLocation(locationId: LocationId): LivingNpc[] {
    return [...this.npcs.values()].filter((npc) => npc.active && npc.currentLocationId === locationId);
  }

  getActiveNpcs(): LivingNpc[] {
    return [...this.npcs.values()].filter((npc) => npc.active);
  }

  getSummary(): WorldSummary {
    return {
      name: this.name,
      time: this.time.getFullDateTimeString(),
      totalMinutes: this.time.totalMinutes,
      locations: this.locations.size,
      npcs: this.npcs.size,
      activeNpcs: this.getActiveNpcs().length,
      eventsInQueue: this.events.queueSize,
      eventsInHistory: this.events.historySize,
    };
  }

  /**
   * Check the connection graph and NPC/location membership.
   */
  validate(): ValidationResult {
    const records: Record<LocationId, LocationRecord> = {};
    for (const [id, location] of this.locations) records[id] = location.record;
    return mergeValidation(validateConnections(records), validateMembership(this.locations.values(), this.npcs));
  }

  // --- Persistence -----------------------------------------------

  toState(): WorldState {
    const locations: WorldState['locations'] = {};
    for (const [id, location] of this.locations) locations[id] = location.serialize();
    const npcs: WorldState['npcs'] = {};
    for (const [id, npc] of this.npcs) npcs[id] = npc.serialize();

    return {
      name: this.name,
      description: this.description,
      seed: this.seed,
      time: this.time.toState(),
      locations,
      npcs,
      events: {
        ...this.events.summary(),
        nextId: this.events.nextEventId,
        queue: this.events.getQueue(),
      },
    };
  }

  /**
   * Rebuild a world from saved state. The generator is reseeded from the
   * saved seed, so content generated after a load does not continue the
   * original random stream.
   */
  static fromState(state: WorldState, options: WorldOptions = {}): World {
    const world = new World({
      ...options,
      name: state.name,
      description: state.description,
      seed: state.seed,
      time: state.time,
    });

    const restore = { npcMemorySize: world.config.npcMemorySize };
    for (const entityState of [...Object.values(state.locations), ...Object.values(state.npcs)]) {
      const entity = deserializeEntity(entityState, restore);
      if (entity.kind === 'location') {
        world.locations.set(entity.id, entity);
      } else {
        world.npcs.set(entity.id, entity);
      }
    }

    world.events.restore(state.events.nextId, state.events.queue);
    log.info(`Restored "${world.name}" at ${world.time.getFullDateTimeString()}`);
    return world;
  }

  save(name: string, format: SnapshotFormat = 'json', compressed: boolean = true): string {
    return this.stateManager.save(this.toState(), name, format, compressed);
  }

  static load(name: string, format?: SnapshotFormat, options: WorldOptions = {}): World {
    const storage = options.storage ?? new FileSnapshotStorage(loadConfig({}, options.config).saveDir);
    const state = new StateManager(storage).load(name, format);
    return World.fromState(state, { ...options, storage });
  }

  /**
   * Autosave when enabled on the state manager and due.
   */
  autosave(): string | null {
    return this.stateManager.autosave(this.toState());
  }
}

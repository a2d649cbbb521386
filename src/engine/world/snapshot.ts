/**
 * Save and load world snapshots.
 *
 * A snapshot is an envelope `{ version, timestamp, compressed, world_state }`
 * written as JSON or with Node's structured serializer, optionally gzipped.
 * Storage is pluggable: files under the save directory, or an in-memory map.
 */

import fs from 'node:fs';
import path from 'node:path';
import v8 from 'node:v8';
import zlib from 'node:zlib';
import { z } from 'zod';

import { SnapshotError } from '../errors';
import { createLogger, describeError } from '../logger';
import type { EntityId, LocationId, SimEvent, TimeState } from '../types';
import type { EventBusSummary } from './events';
import type { LocationState } from './LivingLocation';
import type { NpcState } from './LivingNpc';

const log = createLogger('Snapshot');

export const SNAPSHOT_VERSION = '1.0.0';
export const AUTOSAVE_KEEP = 5;

export type SnapshotFormat = 'json' | 'binary';

export interface EventLogState extends EventBusSummary {
  nextId: number;
  queue: SimEvent[];
}

export interface WorldState {
  name: string;
  description: string;
  seed: number;
  time: TimeState;
  locations: Record<LocationId, LocationState>;
  npcs: Record<EntityId, NpcState>;
  events: EventLogState;
}

export interface SnapshotEnvelope {
  version: string;
  timestamp: string;
  compressed: boolean;
  world_state: WorldState;
}

// --- Storage ---------------------------------------------------

export interface SnapshotStorage {
  setItem(key: string, value: Buffer): void;
  getItem(key: string): Buffer | undefined;
  removeItem(key: string): boolean;
  getAllKeys(): string[];
  /** Where a key lives, for messages and return values */
  locate(key: string): string;
}

export class FileSnapshotStorage implements SnapshotStorage {
  constructor(readonly directory: string) {}

  setItem(key: string, value: Buffer): void {
    fs.mkdirSync(this.directory, { recursive: true });
    fs.writeFileSync(this.locate(key), value);
  }

  getItem(key: string): Buffer | undefined {
    try {
      return fs.readFileSync(this.locate(key));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  removeItem(key: string): boolean {
    const file = this.locate(key);
    if (!fs.existsSync(file)) return false;
    fs.unlinkSync(file);
    return true;
  }

  getAllKeys(): string[] {
    if (!fs.existsSync(this.directory)) return [];
    return fs.readdirSync(this.directory);
  }

  locate(key: string): string {
    return path.join(this.directory, key);
  }
}

export class MemorySnapshotStorage implements SnapshotStorage {
  private items = new Map<string, Buffer>();

  setItem(key: string, value: Buffer): void {
    this.items.set(key, value);
  }

  getItem(key: string): Buffer | undefined {
    return this.items.get(key);
  }

  removeItem(key: string): boolean {
    return this.items.delete(key);
  }

  getAllKeys(): string[] {
    return Array.from(this.items.keys());
  }

  locate(key: string): string {
    return `memory://${key}`;
  }
}

// --- Envelope schema --------------------------------------------

const itemSchema = z.object({
  name: z.string(),
  template: z.string(),
  type: z.string(),
  subtype: z.string(),
  quality: z.string().nullable(),
  rarity: z.string().nullable(),
  material: z.string().nullable(),
  stats: z.record(z.string(), z.number()),
  value: z.number(),
  description: z.string(),
  properties: z.array(z.enum(['consumable', 'single_use', 'provides_defense'])),
  damageTypes: z.array(z.string()),
});

const npcRecordSchema = z.object({
  name: z.string(),
  title: z.string(),
  professions: z.array(z.string()),
  race: z.string(),
  faction: z.string().nullable(),
  stats: z.record(z.string(), z.number()),
  skills: z.array(z.string()),
  dialogue: z.string(),
  description: z.string(),
  inventory: z.array(itemSchema),
  locationId: z.string().nullable(),
});

const locationRecordSchema = z.object({
  id: z.string(),
  template: z.string(),
  name: z.string(),
  type: z.string(),
  biome: z.string(),
  environmentTags: z.array(z.string()),
  description: z.string(),
  npcs: z.array(npcRecordSchema),
  items: z.array(itemSchema),
  connections: z.record(z.string(), z.string()),
});

const weatherSchema = z.object({
  condition: z.string(),
  temperature: z.number(),
  windSpeed: z.number(),
  season: z.enum(['spring', 'summer', 'autumn', 'winter']),
  timeOfDay: z.enum(['night', 'dawn', 'morning', 'afternoon', 'dusk', 'evening']),
  description: z.string(),
});

const timeSchema = z.object({
  year: z.number().int(),
  day: z.number().int(),
  hour: z.number().int(),
  minute: z.number().int(),
  totalMinutes: z.number().int(),
  timeScale: z.number(),
});

const locationStateSchema = z.object({
  kind: z.literal('location'),
  id: z.string(),
  record: locationRecordSchema,
  npcIds: z.array(z.string()),
  itemIds: z.array(z.string()),
  weather: weatherSchema.nullable(),
  marketOpen: z.boolean(),
  active: z.boolean(),
  lastUpdate: z.number(),
});

const npcStateSchema = z.object({
  kind: z.literal('npc'),
  id: z.string(),
  record: npcRecordSchema,
  currentLocationId: z.string().nullable(),
  destinationLocationId: z.string().nullable(),
  activity: z.enum(['idle', 'working', 'traveling', 'eating', 'sleeping', 'socializing']),
  travelProgress: z.number(),
  energy: z.number(),
  hunger: z.number(),
  mood: z.number(),
  gold: z.number(),
  goal: z.string().nullable(),
  memory: z.array(z.string()),
  socializingMinutes: z.number(),
  inventory: z.array(itemSchema),
  active: z.boolean(),
  lastUpdate: z.number(),
});

const eventSchema = z.object({
  id: z.string(),
  type: z.string(),
  data: z.record(z.string(), z.unknown()),
  sourceId: z.string().nullable(),
  targetId: z.string().nullable(),
  locationId: z.string().nullable(),
  timestamp: z.number().nullable(),
});

const eventLogSchema = z.object({
  queueSize: z.number().int(),
  historySize: z.number().int(),
  maxHistory: z.number().int(),
  recentEvents: z.array(
    z.object({
      id: z.string(),
      type: z.string(),
      source: z.string().nullable(),
      target: z.string().nullable(),
      location: z.string().nullable(),
      timestamp: z.number().nullable(),
      data: z.record(z.string(), z.unknown()),
    }),
  ),
  nextId: z.number().int().positive(),
  queue: z.array(eventSchema),
});

const worldStateSchema: z.ZodType<WorldState> = z.object({
  name: z.string(),
  description: z.string(),
  seed: z.number().int(),
  time: timeSchema,
  locations: z.record(z.string(), locationStateSchema),
  npcs: z.record(z.string(), npcStateSchema),
  events: eventLogSchema,
});

const envelopeSchema: z.ZodType<SnapshotEnvelope> = z.object({
  version: z.string(),
  timestamp: z.string(),
  compressed: z.boolean(),
  world_state: worldStateSchema,
});

// --- Manager ----------------------------------------------------

const EXTENSIONS: Record<SnapshotFormat, string> = {
  json: '.json',
  binary: '.bin',
};

const KEY_PATTERN = /^(.+)\.(json|bin)(\.gz)?$/;

export interface SaveInfo {
  name: string;
  key: string;
  format: SnapshotFormat;
  compressed: boolean;
  location: string;
}

export interface StateManagerOptions {
  /** Wall clock in milliseconds, used for autosave spacing and names */
  now?: () => number;
}

export function snapshotKey(name: string, format: SnapshotFormat, compressed: boolean): string {
  return `${name}${EXTENSIONS[format]}${compressed ? '.gz' : ''}`;
}

function parseKey(key: string): Omit<SaveInfo, 'location'> | null {
  const match = KEY_PATTERN.exec(key);
  if (!match) return null;
  return {
    name: match[1],
    key,
    format: match[2] === 'bin' ? 'binary' : 'json',
    compressed: match[3] !== undefined,
  };
}

export class StateManager {
  readonly storage: SnapshotStorage;
  autosaveEnabled = false;
  autosaveIntervalSeconds = 300;

  private lastAutosave: number | null = null;
  private readonly now: () => number;

  constructor(storage: SnapshotStorage, options: StateManagerOptions = {}) {
    this.storage = storage;
    this.now = options.now ?? Date.now;
  }

  /**
   * Write a snapshot and return where it was stored.
   */
  save(state: WorldState, name: string, format: SnapshotFormat = 'json', compressed: boolean = false): string {
    const envelope: SnapshotEnvelope = {
      version: SNAPSHOT_VERSION,
      timestamp: new Date(this.now()).toISOString(),
      compressed,
      world_state: state,
    };

    const raw = format === 'json' ? Buffer.from(JSON.stringify(envelope, null, 2), 'utf8') : v8.serialize(envelope);
    const key = snapshotKey(name, format, compressed);
    this.storage.setItem(key, compressed ? zlib.gzipSync(raw) : raw);

    const location = this.storage.locate(key);
    log.info(`Saved "${name}" to ${location}`);
    return location;
  }

  /**
   * Read a snapshot by name. Without a format, JSON is tried before binary
   * and a compressed file before a plain one.
   */
  load(name: string, format?: SnapshotFormat): WorldState {
    const formats: SnapshotFormat[] = format ? [format] : ['json', 'binary'];
    for (const candidate of formats) {
      for (const compressed of [true, false]) {
        const key = snapshotKey(name, candidate, compressed);
        const data = this.storage.getItem(key);
        if (data !== undefined) {
          return this.decode(key, data, candidate, compressed).world_state;
        }
      }
    }
    throw new SnapshotError(`No save named "${name}"`);
  }

  private decode(key: string, data: Buffer, format: SnapshotFormat, compressed: boolean): SnapshotEnvelope {
    let parsed: unknown;
    try {
      const raw = compressed ? zlib.gunzipSync(data) : data;
      parsed = format === 'json' ? JSON.parse(raw.toString('utf8')) : v8.deserialize(raw);
    } catch (error) {
      throw new SnapshotError(`Could not read ${key}: ${describeError(error)}`);
    }

    const result = envelopeSchema.safeParse(parsed);
    if (!result.success) {
      const summary = result.error.issues
        .slice(0, 5)
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new SnapshotError(`Malformed snapshot ${key}: ${summary}`);
    }

    const envelope = result.data;
    if (envelope.version !== SNAPSHOT_VERSION) {
      log.warn(`Save file version ${envelope.version} differs from current ${SNAPSHOT_VERSION}`);
    }
    return envelope;
  }

  listSaves(): SaveInfo[] {
    const saves: SaveInfo[] = [];
    for (const key of this.storage.getAllKeys()) {
      const info = parseKey(key);
      if (info) saves.push({ ...info, location: this.storage.locate(key) });
    }
    return saves.sort((a, b) => a.key.localeCompare(b.key));
  }

  /**
   * Delete every stored format of a save.
   * @returns false when nothing was stored under the name
   */
  deleteSave(name: string): boolean {
    let removed = false;
    for (const save of this.listSaves()) {
      if (save.name === name && this.storage.removeItem(save.key)) {
        removed = true;
      }
    }
    if (removed) log.info(`Deleted save "${name}"`);
    return removed;
  }

  enableAutosave(intervalSeconds: number = 300): void {
    this.autosaveEnabled = true;
    this.autosaveIntervalSeconds = intervalSeconds;
    this.lastAutosave = this.now();
  }

  disableAutosave(): void {
    this.autosaveEnabled = false;
  }

  /**
   * Save under `${prefix}_<millis>` when enabled and the interval has passed,
   * keeping only the newest AUTOSAVE_KEEP autosaves.
   * @returns the stored location, or null when no save was due
   */
  autosave(state: WorldState, prefix: string = 'autosave'): string | null {
    if (!this.autosaveEnabled) return null;

    const now = this.now();
    if (this.lastAutosave !== null && now - this.lastAutosave < this.autosaveIntervalSeconds * 1000) {
      return null;
    }

    const location = this.save(state, `${prefix}_${now}`);
    this.lastAutosave = now;
    this.pruneAutosaves(prefix);
    return location;
  }

  private pruneAutosaves(prefix: string): void {
    const stamp = (name: string) => Number(name.slice(prefix.length + 1));
    const autosaves = this.listSaves()
      .filter((save) => save.name.startsWith(`${prefix}_`) && Number.isFinite(stamp(save.name)))
      .sort((a, b) => stamp(b.name) - stamp(a.name));

    for (const old of autosaves.slice(AUTOSAVE_KEEP)) {
      this.storage.removeItem(old.key);
      log.debug(`Pruned autosave ${old.key}`);
    }
  }
}

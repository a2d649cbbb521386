/**
 * Living location: a generated location plus who and what is present, the
 * current weather and, for markets and buildings, whether trade is open.
 *
 * Weather and market state are caches recomputed from world time.
 */

import type { EntityId, LocationId, LocationRecord, WeatherSnapshot } from '../types';
import type { Entity, WorldContext } from './entities';
import { EventTypes } from './events';
import { MINUTES_PER_HOUR } from './TimeManager';

/** Location types whose market follows working hours */
export const MARKET_TYPES: readonly string[] = ['market', 'building'];

export interface LocationState {
  kind: 'location';
  id: LocationId;
  record: LocationRecord;
  npcIds: EntityId[];
  itemIds: string[];
  weather: WeatherSnapshot | null;
  marketOpen: boolean;
  active: boolean;
  lastUpdate: number;
}

export class LivingLocation implements Entity<LocationState> {
  readonly kind = 'location' as const;
  readonly id: LocationId;
  readonly record: LocationRecord;

  active = true;
  npcIds = new Set<EntityId>();
  itemIds = new Set<string>();
  weather: WeatherSnapshot | null = null;
  marketOpen = false;
  lastUpdate = 0;

  constructor(record: LocationRecord) {
    this.id = record.id;
    this.record = record;
  }

  get name(): string {
    return this.record.name;
  }

  get type(): string {
    return this.record.type;
  }

  get biome(): string {
    return this.record.biome;
  }

  get connections(): Readonly<Record<string, LocationId>> {
    return this.record.connections;
  }

  get hasMarket(): boolean {
    return MARKET_TYPES.includes(this.record.type);
  }

  get npcCount(): number {
    return this.npcIds.size;
  }

  update(minutes: number, world: WorldContext): void {
    if (!this.active) return;

    const hourBefore = Math.floor(this.lastUpdate / MINUTES_PER_HOUR);
    this.lastUpdate += minutes;
    if (this.weather === null || Math.floor(this.lastUpdate / MINUTES_PER_HOUR) !== hourBefore) {
      this.refreshWeather(world);
    }

    this.updateMarket(world);
  }

  private refreshWeather(world: WorldContext): void {
    this.weather = world.generator.generateWeather(this.biome, world.time.season, world.time.timeOfDay);
  }

  /**
   * Open or close the market; events fire only on a change.
   */
  private updateMarket(world: WorldContext): void {
    if (!this.hasMarket) return;

    const shouldBeOpen = world.time.isWorkingHours;
    if (shouldBeOpen === this.marketOpen) return;

    this.marketOpen = shouldBeOpen;
    world.events.publishEvent(shouldBeOpen ? EventTypes.MARKET_OPENED : EventTypes.MARKET_CLOSED, {
      locationId: this.id,
      data: { locationName: this.name },
    });
  }

  addNpc(npcId: EntityId, world?: WorldContext): void {
    this.npcIds.add(npcId);
    world?.events.publishEvent(EventTypes.NPC_ENTERED_LOCATION, {
      sourceId: npcId,
      locationId: this.id,
      data: { locationName: this.name },
    });
  }

  removeNpc(npcId: EntityId, world?: WorldContext): void {
    if (!this.npcIds.delete(npcId)) return;
    world?.events.publishEvent(EventTypes.NPC_EXITED_LOCATION, {
      sourceId: npcId,
      locationId: this.id,
      data: { locationName: this.name },
    });
  }

  addItem(itemId: string): void {
    this.itemIds.add(itemId);
  }

  removeItem(itemId: string): boolean {
    return this.itemIds.delete(itemId);
  }

  destroy(): void {
    this.active = false;
  }

  serialize(): LocationState {
    return {
      kind: 'location',
      id: this.id,
      record: this.record,
      npcIds: [...this.npcIds],
      itemIds: [...this.itemIds],
      weather: this.weather === null ? null : { ...this.weather },
      marketOpen: this.marketOpen,
      active: this.active,
      lastUpdate: this.lastUpdate,
    };
  }

  static deserialize(state: LocationState): LivingLocation {
    const location = new LivingLocation(state.record);
    location.npcIds = new Set(state.npcIds);
    location.itemIds = new Set(state.itemIds);
    location.weather = state.weather === null ? null : { ...state.weather };
    location.marketOpen = state.marketOpen;
    location.active = state.active;
    location.lastUpdate = state.lastUpdate;
    return location;
  }
}

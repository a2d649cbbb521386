/**
 * Living NPC: a generated NPC record plus needs, activity and travel state.
 *
 * Each update first applies need rates, then lets an urgent need preempt the
 * current activity, and only otherwise runs the activity's own rules.
 */

import { LookupError } from '../errors';
import {
  BEHAVIOR,
  decideIdleActivity,
  shouldStopEating,
  shouldStopSocializing,
  shouldStopWorking,
  shouldWake,
} from '../systems/behavior';
import { canCraft, tryCraft } from '../systems/crafting';
import { applyNeedRates, createNeeds, modifyNeed, urgentActivity, type Needs } from '../systems/needs';
import type { Activity, EntityId, Item, LocationId, NpcRecord } from '../types';
import type { Entity, WorldContext } from './entities';
import { EventTypes } from './events';
import { cloneInventory, inventoryAdd, inventoryValue } from './inventory';

export const DEFAULT_MEMORY_SIZE = 20;

export interface NpcState {
  kind: 'npc';
  id: EntityId;
  record: NpcRecord;
  currentLocationId: LocationId | null;
  destinationLocationId: LocationId | null;
  activity: Activity;
  travelProgress: number;
  energy: number;
  hunger: number;
  mood: number;
  gold: number;
  goal: string | null;
  memory: string[];
  socializingMinutes: number;
  inventory: Item[];
  active: boolean;
  lastUpdate: number;
}

export interface LivingNpcOptions {
  gold: number;
  maxMemory?: number;
}

export class LivingNpc implements Entity<NpcState> {
  readonly kind = 'npc' as const;
  readonly id: EntityId;
  readonly record: NpcRecord;
  readonly maxMemory: number;

  active = true;
  activity: Activity = 'idle';
  currentLocationId: LocationId | null;
  destinationLocationId: LocationId | null = null;
  travelProgress = 0;
  needs: Needs = createNeeds();
  gold: number;
  goal: string | null = null;
  memory: string[] = [];
  socializingMinutes = 0;
  inventory: Item[];
  lastUpdate = 0;

  constructor(id: EntityId, record: NpcRecord, options: LivingNpcOptions) {
    this.id = id;
    this.record = record;
    this.currentLocationId = record.locationId;
    this.gold = options.gold;
    this.maxMemory = options.maxMemory ?? DEFAULT_MEMORY_SIZE;
    this.inventory = cloneInventory(record.inventory);
  }

  get name(): string {
    return this.record.name;
  }

  get professions(): readonly string[] {
    return this.record.professions;
  }

  /** First profession, or "wanderer" for generic NPCs */
  get primaryProfession(): string {
    return this.record.professions[0] ?? 'wanderer';
  }

  get inventoryValue(): number {
    return inventoryValue(this.inventory);
  }

  update(minutes: number, world: WorldContext): void {
    if (!this.active) return;
    this.lastUpdate += minutes;

    applyNeedRates(this.needs, this.activity, minutes);

    const urgent = urgentActivity(this.needs, this.activity);
    if (urgent !== null) {
      this.enter(urgent, world);
      return;
    }

    switch (this.activity) {
      case 'traveling':
        this.updateTravel(minutes, world);
        break;
      case 'working':
        this.updateWork(minutes, world);
        break;
      case 'eating':
        if (shouldStopEating(this.needs)) this.enter('idle', world);
        break;
      case 'sleeping':
        if (shouldWake(this.needs, world.time.isWorkingHours)) this.enter('idle', world);
        break;
      case 'socializing':
        this.socializingMinutes += minutes;
        if (shouldStopSocializing(this.socializingMinutes)) this.enter('idle', world);
        break;
      case 'idle':
        this.enter(
          decideIdleActivity({
            needs: this.needs,
            professions: this.professions,
            isDaytime: world.time.isDaytime,
            isWorkingHours: world.time.isWorkingHours,
            random: world.generator.random,
          }),
          world,
        );
        break;
    }
  }

  /**
   * Switch activity and run its entry effects. Leaving a journey abandons it.
   */
  private enter(next: Activity, world: WorldContext): void {
    if (this.activity === 'traveling' && next !== 'traveling') {
      this.destinationLocationId = null;
      this.travelProgress = 0;
    }
    const previous = this.activity;
    this.activity = next;
    if (previous === next) return;

    switch (next) {
      case 'working':
        this.remember(`Started work on day ${world.time.day} at ${world.time.getTimeString()}`);
        world.events.publishEvent(EventTypes.NPC_STARTED_WORKING, {
          sourceId: this.id,
          locationId: this.currentLocationId,
          data: { npcName: this.name },
        });
        break;
      case 'socializing':
        this.socializingMinutes = 0;
        modifyNeed(this.needs, 'mood', BEHAVIOR.socializeMoodBoost);
        break;
      default:
        break;
    }
  }

  private updateWork(minutes: number, world: WorldContext): void {
    if (shouldStopWorking(this.needs, world.time.isWorkingHours)) {
      this.enter('idle', world);
      return;
    }
    if (!canCraft(this.professions)) return;

    const item = tryCraft(world.generator, this.professions, minutes);
    if (item) {
      inventoryAdd(this.inventory, item);
      this.remember(`Crafted ${item.name}`);
      world.events.publishEvent(EventTypes.ITEM_CRAFTED, {
        sourceId: this.id,
        locationId: this.currentLocationId,
        data: { item, crafter: this.name },
      });
    }
  }

  /**
   * Start a journey. Travel always takes one hour regardless of distance.
   * @returns false when already at the destination
   */
  moveTo(locationId: LocationId, world: WorldContext): boolean {
    if (!world.getLocation(locationId)) {
      throw new LookupError('location', locationId);
    }
    if (locationId === this.currentLocationId) return false;

    this.enter('traveling', world);
    this.destinationLocationId = locationId;
    this.travelProgress = 0;

    world.events.publishEvent(EventTypes.NPC_STARTED_TRAVELING, {
      sourceId: this.id,
      locationId: this.currentLocationId,
      data: { npcName: this.name, destination: locationId },
    });
    return true;
  }

  private updateTravel(minutes: number, world: WorldContext): void {
    this.travelProgress += minutes / BEHAVIOR.travelMinutes;
    if (this.travelProgress < 1) return;

    const from = this.currentLocationId;
    const to = this.destinationLocationId;
    if (to === null) {
      this.enter('idle', world);
      return;
    }

    if (from !== null) {
      world.getLocation(from)?.removeNpc(this.id, world);
    }
    const destination = world.getLocation(to);
    destination?.addNpc(this.id, world);

    this.currentLocationId = to;
    this.enter('idle', world);

    this.remember(`Arrived at ${destination?.name ?? to}`);
    world.events.publishEvent(EventTypes.NPC_ARRIVED, {
      sourceId: this.id,
      locationId: to,
      data: { npcName: this.name, fromLocation: from },
    });
  }

  /**
   * Append to the bounded memory ring, dropping the oldest entry when full.
   */
  remember(entry: string): void {
    this.memory.push(entry);
    if (this.memory.length > this.maxMemory) {
      this.memory.splice(0, this.memory.length - this.maxMemory);
    }
  }

  destroy(): void {
    this.active = false;
  }

  serialize(): NpcState {
    return {
      kind: 'npc',
      id: this.id,
      record: this.record,
      currentLocationId: this.currentLocationId,
      destinationLocationId: this.destinationLocationId,
      activity: this.activity,
      travelProgress: this.travelProgress,
      energy: this.needs.energy,
      hunger: this.needs.hunger,
      mood: this.needs.mood,
      gold: this.gold,
      goal: this.goal,
      memory: [...this.memory],
      socializingMinutes: this.socializingMinutes,
      inventory: cloneInventory(this.inventory),
      active: this.active,
      lastUpdate: this.lastUpdate,
    };
  }

  static deserialize(state: NpcState, maxMemory: number = DEFAULT_MEMORY_SIZE): LivingNpc {
    const npc = new LivingNpc(state.id, state.record, { gold: state.gold, maxMemory });
    npc.currentLocationId = state.currentLocationId;
    npc.destinationLocationId = state.destinationLocationId;
    npc.activity = state.activity;
    npc.travelProgress = state.travelProgress;
    npc.needs = { energy: state.energy, hunger: state.hunger, mood: state.mood };
    npc.goal = state.goal;
    npc.memory = [...state.memory];
    npc.socializingMinutes = state.socializingMinutes;
    npc.inventory = cloneInventory(state.inventory);
    npc.active = state.active;
    npc.lastUpdate = state.lastUpdate;
    return npc;
  }
}

/**
 * Wraps generated records into living entities
 */

import type { Random } from '../random';
import type { EntityId, GeneratedWorld, LocationId, LocationRecord, NpcRecord } from '../types';
import type { WorldContext } from './entities';
import { LivingLocation } from './LivingLocation';
import { LivingNpc } from './LivingNpc';

export const STARTING_GOLD = { min: 10, max: 500 } as const;

export function itemIdFor(locationId: LocationId, index: number): string {
  return `${locationId}:item:${index}`;
}

export function createLocation(record: LocationRecord): LivingLocation {
  const location = new LivingLocation(record);
  record.items.forEach((_, index) => location.addItem(itemIdFor(record.id, index)));
  return location;
}

/**
 * Draw an NPC id from the shared random source, redrawing on collision.
 */
export function drawNpcId(random: Random, isTaken: (id: EntityId) => boolean): EntityId {
  let id = `npc_${random.id()}`;
  while (isTaken(id)) {
    id = `npc_${random.id()}`;
  }
  return id;
}

export interface CreateNpcOptions {
  isTaken: (id: EntityId) => boolean;
  maxMemory?: number;
}

export function createNpc(record: NpcRecord, random: Random, options: CreateNpcOptions): LivingNpc {
  const id = drawNpcId(random, options.isTaken);
  const gold = random.nextInt(STARTING_GOLD.min, STARTING_GOLD.max);
  return new LivingNpc(id, record, { gold, maxMemory: options.maxMemory });
}

export interface LivingPopulation {
  locations: Map<LocationId, LivingLocation>;
  npcs: Map<EntityId, LivingNpc>;
}

/**
 * Build living locations and NPCs for a generated world. NPCs are placed in
 * the location that generated them.
 */
export function createWorldFromGenerated(
  generated: GeneratedWorld,
  world: WorldContext,
  maxMemory?: number,
): LivingPopulation {
  const random = world.generator.random;
  const locations = new Map<LocationId, LivingLocation>();
  const npcs = new Map<EntityId, LivingNpc>();

  for (const record of Object.values(generated.locations)) {
    const location = createLocation(record);
    locations.set(location.id, location);

    for (const npcRecord of record.npcs) {
      const npc = createNpc(
        { ...npcRecord, locationId: record.id },
        random,
        { isTaken: (id) => npcs.has(id), maxMemory },
      );
      npcs.set(npc.id, npc);
      location.addNpc(npc.id, world);
    }
  }

  return { locations, npcs };
}

/**
 * Entity contract shared by living locations and NPCs.
 *
 * Generated records stay plain data; only these wrappers carry behavior.
 * Serialized states are tagged with `kind` so one function can restore
 * either entity type.
 */

import type { ContentGenerator } from '../generation/ContentGenerator';
import type { EntityId, LocationId } from '../types';
import type { EventBus } from './events';
import { LivingLocation, type LocationState } from './LivingLocation';
import { LivingNpc, type NpcState } from './LivingNpc';
import type { TimeManager } from './TimeManager';

export type EntityKind = 'npc' | 'location';

/**
 * What an entity may touch while it updates.
 */
export interface WorldContext {
  readonly time: TimeManager;
  readonly events: EventBus;
  readonly generator: ContentGenerator;
  getLocation(id: LocationId): LivingLocation | undefined;
}

export interface Entity<TState extends EntityState = EntityState> {
  readonly kind: EntityKind;
  readonly id: EntityId;
  active: boolean;
  update(minutes: number, world: WorldContext): void;
  serialize(): TState;
}

export type EntityState = NpcState | LocationState;

export interface RestoreOptions {
  npcMemorySize?: number;
}

export function deserializeEntity(state: EntityState, options: RestoreOptions = {}): LivingNpc | LivingLocation {
  switch (state.kind) {
    case 'npc':
      return LivingNpc.deserialize(state, options.npcMemorySize);
    case 'location':
      return LivingLocation.deserialize(state);
  }
}

/**
 * Consistency checks for generated graphs and living worlds.
 *
 * These never throw; they collect every problem so a test or a debug session
 * can see all of them at once.
 */

import { createLogger } from '../logger';
import type { EntityId, GeneratedWorld, LocationId, LocationRecord } from '../types';

const log = createLogger('Validation');

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function result(errors: string[]): ValidationResult {
  return { valid: errors.length === 0, errors };
}

/**
 * Every edge A -> B must have a matching edge B -> A.
 */
export function validateConnections(locations: Record<LocationId, LocationRecord>): ValidationResult {
  const errors: string[] = [];

  for (const location of Object.values(locations)) {
    for (const [type, neighborId] of Object.entries(location.connections)) {
      const neighbor = locations[neighborId];
      if (!neighbor) {
        errors.push(`Location ${location.id} connects (${type}) to missing location ${neighborId}`);
        continue;
      }
      if (!Object.values(neighbor.connections).includes(location.id)) {
        errors.push(`Connection ${location.id} -> ${neighborId} has no edge back`);
      }
    }
  }

  return result(errors);
}

/**
 * The summary must describe exactly the generated locations.
 */
export function validateGeneratedWorld(world: GeneratedWorld): ValidationResult {
  const errors = [...validateConnections(world.locations).errors];

  for (const id of Object.keys(world.locations)) {
    if (!world.summary[id]) errors.push(`Summary is missing location ${id}`);
  }
  for (const id of Object.keys(world.summary)) {
    if (!world.locations[id]) errors.push(`Summary lists unknown location ${id}`);
  }

  return result(errors);
}

export interface MemberView {
  id: EntityId;
  active: boolean;
  currentLocationId: LocationId | null;
}

export interface HostView {
  id: LocationId;
  npcIds: ReadonlySet<EntityId>;
}

/**
 * An active NPC is listed by exactly the location it stands in, and every
 * listed NPC exists and stands there.
 */
export function validateMembership(
  locations: Iterable<HostView>,
  npcs: ReadonlyMap<EntityId, MemberView>,
): ValidationResult {
  const errors: string[] = [];
  const listedAt = new Map<EntityId, LocationId[]>();

  for (const location of locations) {
    for (const npcId of location.npcIds) {
      listedAt.set(npcId, [...(listedAt.get(npcId) ?? []), location.id]);

      const npc = npcs.get(npcId);
      if (!npc) {
        errors.push(`Location ${location.id} lists unknown NPC ${npcId}`);
      } else if (npc.currentLocationId !== location.id) {
        errors.push(`Location ${location.id} lists NPC ${npcId}, who is at ${npc.currentLocationId ?? 'nowhere'}`);
      }
    }
  }

  for (const npc of npcs.values()) {
    if (!npc.active || npc.currentLocationId === null) continue;
    const hosts = listedAt.get(npc.id) ?? [];
    if (!hosts.includes(npc.currentLocationId)) {
      errors.push(`NPC ${npc.id} is missing from location ${npc.currentLocationId}`);
    }
    if (hosts.length > 1) {
      errors.push(`NPC ${npc.id} is listed by ${hosts.length} locations`);
    }
  }

  return result(errors);
}

export function mergeValidation(...results: ValidationResult[]): ValidationResult {
  return result(results.flatMap((entry) => entry.errors));
}

export function logValidationResults(validation: ValidationResult, subject: string = 'World'): void {
  if (validation.valid) {
    log.info(`${subject} is consistent`);
  } else {
    log.error(`${subject} validation failed:`);
    validation.errors.forEach((error) => log.error(`  - ${error}`));
  }
}

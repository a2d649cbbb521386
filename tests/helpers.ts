import { DEFAULT_DATA_DIR } from '../src/engine/config';
import { ContentGenerator } from '../src/engine/generation/ContentGenerator';
import { loadTemplates, type TemplateStore } from '../src/engine/generation/templateStore';
import type { LocationRecord, NpcRecord } from '../src/engine/types';
import type { WorldContext } from '../src/engine/world/entities';
import { EventBus } from '../src/engine/world/events';
import { LivingLocation } from '../src/engine/world/LivingLocation';
import { TimeManager, type TimeManagerOptions } from '../src/engine/world/TimeManager';

let cached: TemplateStore | undefined;

/** Templates from data/, loaded once per test file */
export function bundledTemplates(): TemplateStore {
  cached ??= loadTemplates(DEFAULT_DATA_DIR);
  return cached;
}

export function locationRecord(id: string, overrides: Partial<LocationRecord> = {}): LocationRecord {
  return {
    id,
    template: 'tavern',
    name: `Place ${id}`,
    type: 'building',
    biome: 'plains',
    environmentTags: [],
    description: '',
    npcs: [],
    items: [],
    connections: {},
    ...overrides,
  };
}

export function npcRecord(overrides: Partial<NpcRecord> = {}): NpcRecord {
  return {
    name: 'Test Person',
    title: 'Commoner',
    professions: [],
    race: 'human',
    faction: null,
    stats: { strength: 10 },
    skills: [],
    dialogue: 'Hello.',
    description: 'A test person.',
    inventory: [],
    locationId: null,
    ...overrides,
  };
}

export interface TestContext extends WorldContext {
  locations: Map<string, LivingLocation>;
}

/**
 * A minimal world for driving entities directly: real clock, bus and
 * generator, plus whatever locations the test adds.
 */
export function makeContext(seed: number = 7, time: TimeManagerOptions = {}): TestContext {
  const locations = new Map<string, LivingLocation>();
  const clock = new TimeManager(time);
  return {
    time: clock,
    events: new EventBus({ clock: () => clock.totalMinutes }),
    generator: new ContentGenerator({ seed, templates: bundledTemplates() }),
    locations,
    getLocation: (id) => locations.get(id),
  };
}

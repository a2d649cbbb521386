import { describe, expect, it } from 'vitest';

import { LookupError } from '../src/engine/errors';
import { World, type TickReport, type WorldOptions } from '../src/engine/World';
import { EventTypes } from '../src/engine/world/events';
import { LivingLocation } from '../src/engine/world/LivingLocation';
import { LivingNpc } from '../src/engine/world/LivingNpc';
import { MemorySnapshotStorage } from '../src/engine/world/snapshot';
import { bundledTemplates, locationRecord, npcRecord } from './helpers';

function options(seed: number): WorldOptions {
  return { seed, templates: bundledTemplates(), storage: new MemorySnapshotStorage() };
}

class BrokenLocation extends LivingLocation {
  update(): void {
    throw new Error('broken');
  }
}

describe('World.createNew', () => {
  it('builds a consistent populated world', () => {
    const world = World.createNew({ ...options(5), name: 'Testland', locationCount: 3 });
    expect(world.name).toBe('Testland');
    expect(world.seed).toBe(5);
    expect(world.locations.size).toBeGreaterThanOrEqual(3);
    expect(world.validate()).toEqual({ valid: true, errors: [] });

    for (const npc of world.npcs.values()) {
      expect(npc.currentLocationId).not.toBeNull();
      expect(world.getNpcsAtLocation(npc.currentLocationId ?? '')).toContain(npc);
    }

    // one arrival per NPC, then the creation notice
    const queue = world.events.getQueue();
    expect(queue).toHaveLength(world.npcs.size + 1);
    expect(queue[queue.length - 1].type).toBe(EventTypes.LOCATION_CREATED);
    expect(queue[queue.length - 1].data).toEqual({
      worldName: 'Testland',
      numLocations: world.locations.size,
      numNpcs: world.npcs.size,
    });
  });

  it('is deterministic for a seed', () => {
    const first = World.createNew({ ...options(21), locationCount: 2 });
    const second = World.createNew({ ...options(21), locationCount: 2 });
    first.step(120);
    second.step(120);
    expect(second.toState().npcs).toEqual(first.toState().npcs);
    expect(second.toState().locations).toEqual(first.toState().locations);
  });
});

describe('World.step', () => {
  it('drains the queue and reports the tick', () => {
    const world = World.createNew({ ...options(5), locationCount: 2 });
    const queued = world.events.queueSize;
    const report = world.step(1);

    expect(report.minutes).toBe(1);
    expect(report.time).toBe('Year 1, Spring, Month 1, Day 1 - 08:01 (morning)');
    expect(report.boundaryEvents).toEqual([]);
    expect(report.eventsProcessed).toBeGreaterThanOrEqual(queued);
    expect(report.entityFailures).toEqual([]);
    expect(world.events.queueSize).toBe(0);
    expect(world.validate().valid).toBe(true);
  });

  it('drops fractional minutes and rejects negative ones', () => {
    const world = new World(options(1));
    expect(world.step(2.7).minutes).toBe(2);
    expect(world.time.totalMinutes).toBe(2);
    expect(() => world.step(-5)).toThrow(RangeError);
  });

  it('publishes calendar boundaries once each', () => {
    const world = new World(options(1));

    const midnight = world.step(16 * 60);
    expect(midnight.boundaryEvents).toEqual([EventTypes.HOUR_PASSED, EventTypes.DAY_PASSED]);
    expect(midnight.eventsProcessed).toBe(2);

    const summer = world.step(89 * 24 * 60);
    expect(world.time.day).toBe(91);
    expect(summer.boundaryEvents).toEqual([EventTypes.DAY_PASSED, EventTypes.SEASON_CHANGED]);

    const newYear = world.step(270 * 24 * 60);
    expect(world.time.year).toBe(2);
    expect(newYear.boundaryEvents).toEqual([
      EventTypes.DAY_PASSED,
      EventTypes.SEASON_CHANGED,
      EventTypes.YEAR_PASSED,
    ]);
    expect(world.events.getEventsByType(EventTypes.SEASON_CHANGED)[0].data).toEqual({
      season: 'spring',
      previous: 'summer',
    });
    expect(world.events.getEventsByType(EventTypes.YEAR_PASSED)[0].timestamp).toBe(world.time.totalMinutes);
  });

  it('keeps ticking past a failing entity', () => {
    const world = new World(options(1));
    world.locations.set('broken', new BrokenLocation(locationRecord('broken')));
    const npc = new LivingNpc('npc_a', npcRecord(), { gold: 1 });
    world.npcs.set(npc.id, npc);

    const report = world.step(5);
    expect(report.entityFailures).toEqual([{ entityId: 'broken', kind: 'location', error: 'broken' }]);
    expect(npc.lastUpdate).toBe(5);
  });

  it('reports failing handlers and scheduled callbacks', () => {
    const world = new World(options(1));
    world.events.subscribe(EventTypes.HOUR_PASSED, () => {
      throw new Error('listener broke');
    });
    world.time.schedule(60, () => {
      throw new Error('callback broke');
    });

    const report = world.step(60);
    expect(report.dispatchFailures).toEqual([
      { eventId: 'evt_1', eventType: EventTypes.HOUR_PASSED, listener: 'subscriber', error: 'listener broke' },
    ]);
    expect(report.callbackFailures).toEqual([{ tick: 60, error: 'callback broke' }]);
  });

  it('notifies tick listeners until they unsubscribe', () => {
    const world = new World(options(1));
    const reports: TickReport[] = [];
    const unsubscribe = world.subscribe((report) => reports.push(report));
    world.step(3);
    unsubscribe();
    world.step(3);
    expect(reports.map((report) => report.minutes)).toEqual([3]);
  });
});

describe('World entities', () => {
  it('spawns an NPC into a location', () => {
    const world = World.createNew({ ...options(11), locationCount: 2 });
    const [locationId] = world.locations.keys();
    world.events.clearQueue();

    const npc = world.spawnNpc(locationId, { professions: ['bard'] });
    expect(npc.currentLocationId).toBe(locationId);
    expect(npc.record.professions).toEqual(['bard']);
    expect(world.getLocation(locationId)?.npcIds.has(npc.id)).toBe(true);
    expect(world.validate().valid).toBe(true);

    const [event] = world.events.getQueue();
    expect(event.type).toBe(EventTypes.NPC_SPAWNED);
    expect(event.data).toEqual({ npcName: npc.name, profession: 'bard' });
    expect(() => world.spawnNpc('nowhere')).toThrow(LookupError);
  });

  it('removes an NPC and detaches it', () => {
    const world = World.createNew({ ...options(11), locationCount: 2 });
    const [locationId] = world.locations.keys();
    const npc = world.spawnNpc(locationId);

    expect(world.removeNpc(npc.id)).toBe(true);
    expect(npc.active).toBe(false);
    expect(world.getNpc(npc.id)).toBeUndefined();
    expect(world.getLocation(locationId)?.npcIds.has(npc.id)).toBe(false);
    expect(world.events.getQueue().map((event) => event.type).slice(-1)).toEqual([EventTypes.NPC_DIED]);
    expect(() => world.removeNpc(npc.id)).toThrow(LookupError);
    expect(world.validate().valid).toBe(true);
  });

  it('defers removal made during a tick until it ends', () => {
    const world = new World(options(1));
    const inn = new LivingLocation(locationRecord('inn'));
    world.locations.set(inn.id, inn);
    const npc = new LivingNpc('npc_a', npcRecord({ locationId: 'inn' }), { gold: 1 });
    world.npcs.set(npc.id, npc);
    inn.addNpc(npc.id);

    const results: boolean[] = [];
    let presentDuringTick = false;
    world.events.subscribe(EventTypes.HOUR_PASSED, () => {
      results.push(world.removeNpc('npc_a'));
      results.push(world.removeNpc('npc_a'));
      presentDuringTick = world.npcs.has('npc_a');
    });

    world.step(60);
    expect(results).toEqual([true, false]);
    expect(presentDuringTick).toBe(true);
    expect(world.npcs.has('npc_a')).toBe(false);
    expect(inn.npcIds.has('npc_a')).toBe(false);
    expect(world.events.getQueue().map((event) => event.type)).toEqual([EventTypes.NPC_DIED]);
  });

  it('moves an NPC between locations over an hour', () => {
    const world = World.createNew({ ...options(11), locationCount: 2 });
    const [from, to] = world.locations.keys();
    const npc = world.spawnNpc(from);

    expect(world.moveNpc(npc.id, from)).toBe(false);
    expect(world.moveNpc(npc.id, to)).toBe(true);
    world.step(60);
    expect(npc.currentLocationId).toBe(to);
    expect(world.getNpcsAtLocation(to)).toContain(npc);
    expect(world.validate().valid).toBe(true);
    expect(() => world.moveNpc('npc_missing', to)).toThrow(LookupError);
  });

  it('summarizes counts and time', () => {
    const world = new World({ ...options(1), name: 'Empty' });
    world.step(30);
    expect(world.getSummary()).toEqual({
      name: 'Empty',
      time: 'Year 1, Spring, Month 1, Day 1 - 08:30 (morning)',
      totalMinutes: 30,
      locations: 0,
      npcs: 0,
      activeNpcs: 0,
      eventsInQueue: 0,
      eventsInHistory: 0,
    });
  });
});

describe('World persistence', () => {
  it('restores entities, clock and pending events from state', () => {
    const world = World.createNew({ ...options(3), locationCount: 2 });
    world.step(90);
    world.events.publishEvent('custom_later', { data: { note: 'pending' } });
    const state = world.toState();

    const restored = World.fromState(state, options(99));
    const again = restored.toState();
    expect(restored.seed).toBe(3);
    expect(again.time).toEqual(state.time);
    expect(again.locations).toEqual(state.locations);
    expect(again.npcs).toEqual(state.npcs);
    expect(again.events.queue).toEqual(state.events.queue);
    expect(restored.events.createEvent('next').id).toBe(`evt_${state.events.nextId}`);
    expect(restored.validate().valid).toBe(true);
  });

  it('saves and loads through the storage', () => {
    const storage = new MemorySnapshotStorage();
    const world = World.createNew({ ...options(3), storage, name: 'Saved', locationCount: 2 });
    world.step(30);

    expect(world.save('slot')).toBe('memory://slot.json.gz');
    expect(world.save('raw', 'binary', false)).toBe('memory://raw.bin');

    for (const name of ['slot', 'raw']) {
      const loaded = World.load(name, undefined, { storage, templates: bundledTemplates() });
      expect(loaded.name).toBe('Saved');
      expect(loaded.toState().npcs).toEqual(world.toState().npcs);
      expect(loaded.toState().locations).toEqual(world.toState().locations);
    }
  });
});

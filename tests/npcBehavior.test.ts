import { describe, expect, it } from 'vitest';

import { LookupError } from '../src/engine/errors';
import { EventTypes } from '../src/engine/world/events';
import { LivingLocation } from '../src/engine/world/LivingLocation';
import { LivingNpc } from '../src/engine/world/LivingNpc';
import { locationRecord, makeContext, npcRecord, type TestContext } from './helpers';

function npcAt(locationId: string | null, professions: string[] = [], maxMemory?: number): LivingNpc {
  return new LivingNpc('npc_test', npcRecord({ professions, locationId }), { gold: 50, maxMemory });
}

function withLocations(ctx: TestContext, ...ids: string[]): void {
  for (const id of ids) {
    ctx.locations.set(id, new LivingLocation(locationRecord(id)));
  }
}

describe('LivingNpc', () => {
  it('falls asleep at work once energy runs out', () => {
    const ctx = makeContext();
    const npc = npcAt(null, ['blacksmith']);
    npc.activity = 'working';
    npc.needs.energy = 15;
    npc.update(5, ctx);
    expect(npc.activity).toBe('sleeping');
  });

  it('drops everything to eat when starving', () => {
    const ctx = makeContext();
    const npc = npcAt(null);
    npc.needs.hunger = 85;
    npc.update(1, ctx);
    expect(npc.activity).toBe('eating');
  });

  it('stops eating once fed', () => {
    const ctx = makeContext();
    const npc = npcAt(null);
    npc.activity = 'eating';
    npc.needs.hunger = 25;
    npc.update(10, ctx);
    expect(npc.needs.hunger).toBeCloseTo(16);
    expect(npc.activity).toBe('idle');
  });

  it('starts work during working hours and remembers it', () => {
    const ctx = makeContext();
    const npc = npcAt('forge_1', ['blacksmith']);
    npc.update(1, ctx);

    expect(npc.activity).toBe('working');
    expect(npc.memory).toEqual(['Started work on day 1 at 08:00']);
    const [event] = ctx.events.getQueue();
    expect(event.type).toBe(EventTypes.NPC_STARTED_WORKING);
    expect(event.sourceId).toBe('npc_test');
    expect(event.locationId).toBe('forge_1');
    expect(event.data).toEqual({ npcName: 'Test Person' });
  });

  it('leaves work when the working day ends', () => {
    const ctx = makeContext(7, { hour: 18 });
    const npc = npcAt(null, ['guard']);
    npc.activity = 'working';
    npc.update(1, ctx);
    expect(npc.activity).toBe('idle');
  });

  it('crafts while working', () => {
    const ctx = makeContext();
    const npc = npcAt('forge_1', ['blacksmith']);
    npc.activity = 'working';
    npc.update(100, ctx);

    expect(npc.activity).toBe('working');
    expect(npc.inventory).toHaveLength(1);
    const [item] = npc.inventory;
    expect(['weapon_melee', 'armor']).toContain(item.template);
    expect(npc.memory).toEqual([`Crafted ${item.name}`]);
    expect(ctx.events.getQueue()[0].type).toBe(EventTypes.ITEM_CRAFTED);
    expect(npc.inventoryValue).toBe(item.value);
  });

  it('wakes for work above half energy but sleeps on at night', () => {
    const morning = makeContext();
    const early = npcAt(null);
    early.activity = 'sleeping';
    early.needs.energy = 60;
    early.update(1, morning);
    expect(early.activity).toBe('idle');

    const night = makeContext(7, { hour: 22 });
    const late = npcAt(null);
    late.activity = 'sleeping';
    late.needs.energy = 60;
    late.update(1, night);
    expect(late.activity).toBe('sleeping');
  });

  it('stops socializing after ten minutes', () => {
    const ctx = makeContext();
    const npc = npcAt(null);
    npc.activity = 'socializing';
    npc.update(10, ctx);
    expect(npc.activity).toBe('socializing');
    npc.update(1, ctx);
    expect(npc.activity).toBe('idle');
  });

  it('travels for an hour and arrives', () => {
    const ctx = makeContext();
    withLocations(ctx, 'a', 'b');
    const npc = npcAt('a');
    ctx.locations.get('a')?.addNpc(npc.id);

    expect(npc.moveTo('b', ctx)).toBe(true);
    expect(npc.activity).toBe('traveling');
    expect(npc.destinationLocationId).toBe('b');

    npc.update(30, ctx);
    expect(npc.travelProgress).toBeCloseTo(0.5);
    expect(npc.currentLocationId).toBe('a');

    npc.update(30, ctx);
    expect(npc.currentLocationId).toBe('b');
    expect(npc.activity).toBe('idle');
    expect(npc.destinationLocationId).toBeNull();
    expect(ctx.locations.get('a')?.npcIds.has(npc.id)).toBe(false);
    expect(ctx.locations.get('b')?.npcIds.has(npc.id)).toBe(true);
    expect(npc.memory).toEqual(['Arrived at Place b']);
    expect(ctx.events.getQueue().map((event) => event.type)).toEqual([
      EventTypes.NPC_STARTED_TRAVELING,
      EventTypes.NPC_EXITED_LOCATION,
      EventTypes.NPC_ENTERED_LOCATION,
      EventTypes.NPC_ARRIVED,
    ]);
  });

  it('abandons a journey when exhaustion takes over', () => {
    const ctx = makeContext();
    withLocations(ctx, 'a', 'b');
    const npc = npcAt('a');
    npc.moveTo('b', ctx);
    npc.needs.energy = 10;
    npc.update(1, ctx);
    expect(npc.activity).toBe('sleeping');
    expect(npc.destinationLocationId).toBeNull();
    expect(npc.travelProgress).toBe(0);
    expect(npc.currentLocationId).toBe('a');
  });

  it('refuses unknown or current destinations', () => {
    const ctx = makeContext();
    withLocations(ctx, 'a');
    const npc = npcAt('a');
    expect(npc.moveTo('a', ctx)).toBe(false);
    expect(() => npc.moveTo('nowhere', ctx)).toThrow(LookupError);
    expect(npc.activity).toBe('idle');
  });

  it('keeps only the newest memories', () => {
    const npc = npcAt(null, [], 3);
    for (let i = 1; i <= 5; i++) npc.remember(`memory ${i}`);
    expect(npc.memory).toEqual(['memory 3', 'memory 4', 'memory 5']);
  });

  it('does nothing once destroyed', () => {
    const ctx = makeContext();
    const npc = npcAt(null);
    npc.destroy();
    npc.update(60, ctx);
    expect(npc.needs.energy).toBe(100);
    expect(npc.lastUpdate).toBe(0);
  });

  it('restores from its serialized state', () => {
    const ctx = makeContext();
    withLocations(ctx, 'a', 'b');
    const npc = npcAt('a', ['blacksmith'], 4);
    npc.moveTo('b', ctx);
    npc.update(20, ctx);
    npc.remember('met a stranger');

    const state = npc.serialize();
    const restored = LivingNpc.deserialize(state, 4);
    expect(restored.serialize()).toEqual(state);
    expect(restored.primaryProfession).toBe('blacksmith');
  });

  it('uses wanderer as the profession of a generic NPC', () => {
    expect(npcAt(null).primaryProfession).toBe('wanderer');
  });
});

describe('LivingLocation', () => {
  it('opens its market during working hours, once', () => {
    const ctx = makeContext();
    const location = new LivingLocation(locationRecord('inn', { type: 'building' }));
    location.update(1, ctx);
    location.update(1, ctx);
    expect(location.marketOpen).toBe(true);
    expect(ctx.events.getQueue().map((event) => event.type)).toEqual([EventTypes.MARKET_OPENED]);

    ctx.time.advanceToTime(17);
    location.update(1, ctx);
    expect(location.marketOpen).toBe(false);
    expect(ctx.events.queueSize).toBe(2);
  });

  it('has no market in the wilderness', () => {
    const ctx = makeContext();
    const location = new LivingLocation(locationRecord('woods', { type: 'wilderness' }));
    location.update(1, ctx);
    expect(location.hasMarket).toBe(false);
    expect(ctx.events.queueSize).toBe(0);
  });

  it('rolls weather on the first update and again each hour', () => {
    const ctx = makeContext();
    const location = new LivingLocation(locationRecord('field'));
    location.update(1, ctx);
    const first = location.weather;
    expect(first?.season).toBe('spring');
    expect(first?.timeOfDay).toBe('morning');

    location.update(30, ctx);
    expect(location.weather).toBe(first);
    location.update(30, ctx);
    expect(location.weather).not.toBe(first);
  });

  it('announces arrivals only when given a world', () => {
    const ctx = makeContext();
    const location = new LivingLocation(locationRecord('inn'));
    location.addNpc('npc_1');
    location.addNpc('npc_2', ctx);
    location.removeNpc('npc_9', ctx);
    expect(location.npcCount).toBe(2);
    expect(ctx.events.getQueue().map((event) => event.sourceId)).toEqual(['npc_2']);
  });

  it('restores from its serialized state', () => {
    const ctx = makeContext();
    const location = new LivingLocation(locationRecord('inn'));
    location.addNpc('npc_1');
    location.addItem('inn:item:0');
    location.update(5, ctx);

    const state = location.serialize();
    expect(LivingLocation.deserialize(state).serialize()).toEqual(state);
  });
});

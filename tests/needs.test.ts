import { describe, expect, it } from 'vitest';

import { ContentGenerator } from '../src/engine/generation/ContentGenerator';
import { Random } from '../src/engine/random';
import { decideIdleActivity, isWorker, shouldWake } from '../src/engine/systems/behavior';
import { canCraft, pickCraftTemplate, tryCraft } from '../src/engine/systems/crafting';
import { applyNeedRates, clampNeed, createNeeds, modifyNeed, urgentActivity } from '../src/engine/systems/needs';
import { bundledTemplates } from './helpers';

/** Random source that always rolls the same value */
class FixedRandom extends Random {
  constructor(private readonly roll: number) {
    super(1);
  }

  next(): number {
    return this.roll;
  }
}

describe('needs', () => {
  it('starts rested, fed and neutral', () => {
    expect(createNeeds()).toEqual({ energy: 100, hunger: 0, mood: 50 });
  });

  it('clamps into 0..100', () => {
    expect(clampNeed(-4)).toBe(0);
    expect(clampNeed(140)).toBe(100);
    const needs = createNeeds();
    modifyNeed(needs, 'mood', 70);
    expect(needs.mood).toBe(100);
  });

  it('recovers energy while sleeping', () => {
    const needs = { energy: 50, hunger: 0, mood: 50 };
    applyNeedRates(needs, 'sleeping', 10);
    expect(needs.energy).toBeCloseTo(55);
    expect(needs.hunger).toBeCloseTo(1);
    expect(needs.mood).toBeCloseTo(50.5);
  });

  it('drains energy faster while working', () => {
    const needs = createNeeds();
    applyNeedRates(needs, 'working', 10);
    expect(needs.energy).toBeCloseTo(98.5);
  });

  it('feeds and rests while eating', () => {
    const needs = { energy: 50, hunger: 50, mood: 50 };
    applyNeedRates(needs, 'eating', 10);
    expect(needs.energy).toBeCloseTo(51.5);
    expect(needs.hunger).toBeCloseTo(41);
  });

  it('lowers mood when exhausted', () => {
    const needs = { energy: 25, hunger: 0, mood: 50 };
    applyNeedRates(needs, 'idle', 10);
    expect(needs.energy).toBeCloseTo(24.5);
    expect(needs.mood).toBeCloseTo(49);
  });

  it('forces sleep before food', () => {
    expect(urgentActivity({ energy: 15, hunger: 90, mood: 50 }, 'working')).toBe('sleeping');
    expect(urgentActivity({ energy: 15, hunger: 90, mood: 50 }, 'sleeping')).toBe('eating');
    expect(urgentActivity({ energy: 80, hunger: 85, mood: 50 }, 'eating')).toBeNull();
    expect(urgentActivity(createNeeds(), 'idle')).toBeNull();
  });
});

describe('decideIdleActivity', () => {
  const rested = { energy: 50, hunger: 0, mood: 50 };

  it('sleeps at night when tired', () => {
    expect(
      decideIdleActivity({
        needs: rested,
        professions: ['blacksmith'],
        isDaytime: false,
        isWorkingHours: false,
        random: new FixedRandom(0.99),
      }),
    ).toBe('sleeping');
  });

  it('sends workers to work during working hours', () => {
    expect(
      decideIdleActivity({
        needs: rested,
        professions: ['bard', 'miner'],
        isDaytime: true,
        isWorkingHours: true,
        random: new FixedRandom(0.99),
      }),
    ).toBe('working');
  });

  it('eats when hungry and otherwise maybe socializes', () => {
    const base = { professions: ['bard'], isDaytime: true, isWorkingHours: true };
    expect(decideIdleActivity({ ...base, needs: { ...rested, hunger: 60 }, random: new FixedRandom(0.99) })).toBe(
      'eating',
    );
    expect(decideIdleActivity({ ...base, needs: rested, random: new FixedRandom(0.05) })).toBe('socializing');
    expect(decideIdleActivity({ ...base, needs: rested, random: new FixedRandom(0.5) })).toBe('idle');
  });

  it('wakes early only for work', () => {
    expect(shouldWake({ energy: 60, hunger: 0, mood: 50 }, true)).toBe(true);
    expect(shouldWake({ energy: 60, hunger: 0, mood: 50 }, false)).toBe(false);
    expect(shouldWake({ energy: 95, hunger: 0, mood: 50 }, false)).toBe(true);
  });

  it('knows which professions work', () => {
    expect(isWorker(['bard'])).toBe(false);
    expect(isWorker(['bard', 'guard'])).toBe(true);
  });
});

describe('crafting', () => {
  it('only crafting professions craft', () => {
    expect(canCraft(['alchemist'])).toBe(true);
    expect(canCraft(['farmer', 'bard'])).toBe(false);
    expect(pickCraftTemplate(new FixedRandom(0), ['farmer'])).toBeNull();
  });

  it('prefers the first crafting profession in table order', () => {
    expect(pickCraftTemplate(new FixedRandom(0), ['alchemist', 'blacksmith'])).toBe('weapon_melee');
    expect(pickCraftTemplate(new FixedRandom(0.9), ['enchanter'])).toBe('jewelry');
  });

  it('always finishes an item after a hundred minutes', () => {
    const gen = new ContentGenerator({ seed: 3, templates: bundledTemplates() });
    const item = tryCraft(gen, ['alchemist'], 100);
    expect(item?.template).toBe('potion');
  });

  it('never crafts in zero minutes', () => {
    const gen = new ContentGenerator({ seed: 3, templates: bundledTemplates() });
    expect(tryCraft(gen, ['alchemist'], 0)).toBeNull();
  });
});

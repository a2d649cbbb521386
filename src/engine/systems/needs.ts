/**
 * NPC needs: energy, hunger and mood, each clamped between 0 and 100.
 *
 * Needs move every tick before any behavior decision is made.
 */

import type { Activity } from '../types';

export interface Needs {
  energy: number;
  hunger: number; // higher = hungrier
  mood: number;
}

/** Per-minute rates */
export const NEED_RATES = {
  energyWorking: -0.15,
  energyResting: -0.05,
  energySleeping: 0.5,
  energyEating: 0.2,
  hunger: 0.1,
  hungerEating: -1.0,
  moodDown: -0.1,
  moodUp: 0.05,
} as const;

/** Thresholds shared by the needs and behavior systems */
export const NEED_THRESHOLDS = {
  urgentEnergy: 20, // below: forced to sleep
  urgentHunger: 80, // above: forced to eat
  lowMoodEnergy: 30,
  lowMoodHunger: 70,
} as const;

export function createNeeds(): Needs {
  return { energy: 100, hunger: 0, mood: 50 };
}

/**
 * Clamp a need value between 0 and 100
 */
export function clampNeed(value: number): number {
  return Math.max(0, Math.min(100, value));
}

/**
 * Modify a need value by a delta and clamp
 */
export function modifyNeed(needs: Needs, need: keyof Needs, delta: number): void {
  needs[need] = clampNeed(needs[need] + delta);
}

/**
 * Apply `minutes` of passive change for the current activity.
 */
export function applyNeedRates(needs: Needs, activity: Activity, minutes: number): void {
  let energy = needs.energy;
  if (activity === 'working') {
    energy += minutes * NEED_RATES.energyWorking;
  } else if (activity === 'sleeping') {
    energy += minutes * NEED_RATES.energySleeping;
  } else {
    energy += minutes * NEED_RATES.energyResting;
  }

  let hunger = needs.hunger + minutes * NEED_RATES.hunger;

  if (activity === 'eating') {
    hunger += minutes * NEED_RATES.hungerEating;
    energy += minutes * NEED_RATES.energyEating;
  }

  needs.energy = clampNeed(energy);
  needs.hunger = clampNeed(hunger);

  // Mood reads the clamped values
  const struggling = needs.energy < NEED_THRESHOLDS.lowMoodEnergy || needs.hunger > NEED_THRESHOLDS.lowMoodHunger;
  modifyNeed(needs, 'mood', minutes * (struggling ? NEED_RATES.moodDown : NEED_RATES.moodUp));
}

/**
 * The activity an urgent need forces, or null when nothing is urgent.
 * Exhaustion wins over hunger.
 */
export function urgentActivity(needs: Needs, current: Activity): Activity | null {
  if (needs.energy < NEED_THRESHOLDS.urgentEnergy && current !== 'sleeping') {
    return 'sleeping';
  }
  if (needs.hunger > NEED_THRESHOLDS.urgentHunger && current !== 'eating') {
    return 'eating';
  }
  return null;
}

/**
 * Get need status as a string for debugging
 */
export function getNeedStatus(needs: Needs): string {
  return `Energy: ${needs.energy.toFixed(0)}, Hunger: ${needs.hunger.toFixed(0)}, Mood: ${needs.mood.toFixed(0)}`;
}

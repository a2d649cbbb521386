/**
 * NPC activity state machine rules.
 *
 * Pure decisions only: LivingNpc applies the transitions and publishes the
 * resulting events.
 */

import type { Random } from '../random';
import type { Activity } from '../types';
import type { Needs } from './needs';

/** Professions that go to work during working hours */
export const WORK_PROFESSIONS: readonly string[] = [
  'blacksmith',
  'merchant',
  'guard',
  'innkeeper',
  'alchemist',
  'enchanter',
  'farmer',
  'miner',
];

export const BEHAVIOR = {
  travelMinutes: 60,
  sleepIfTiredBelow: 60,
  eatIfHungerAbove: 50,
  socializeChance: 0.1,
  stopWorkEnergyBelow: 30,
  doneEatingHungerBelow: 20,
  wakeEnergyAbove: 90,
  wakeForWorkEnergyAbove: 50,
  socializeMinutes: 10,
  socializeMoodBoost: 5,
} as const;

export function isWorker(professions: readonly string[]): boolean {
  return professions.some((profession) => WORK_PROFESSIONS.includes(profession));
}

export interface IdleContext {
  needs: Needs;
  professions: readonly string[];
  isDaytime: boolean;
  isWorkingHours: boolean;
  random: Random;
}

/**
 * What an idle NPC does next; the first matching rule wins.
 */
export function decideIdleActivity(ctx: IdleContext): Activity {
  const { needs } = ctx;
  if (!ctx.isDaytime && needs.energy < BEHAVIOR.sleepIfTiredBelow) return 'sleeping';
  if (ctx.isWorkingHours && isWorker(ctx.professions)) return 'working';
  if (needs.hunger > BEHAVIOR.eatIfHungerAbove) return 'eating';
  if (ctx.random.chance(BEHAVIOR.socializeChance)) return 'socializing';
  return 'idle';
}

export function shouldStopWorking(needs: Needs, isWorkingHours: boolean): boolean {
  return !isWorkingHours || needs.energy < BEHAVIOR.stopWorkEnergyBelow;
}

export function shouldStopEating(needs: Needs): boolean {
  return needs.hunger < BEHAVIOR.doneEatingHungerBelow;
}

export function shouldWake(needs: Needs, isWorkingHours: boolean): boolean {
  return needs.energy > BEHAVIOR.wakeEnergyAbove || (needs.energy > BEHAVIOR.wakeForWorkEnergyAbove && isWorkingHours);
}

export function shouldStopSocializing(minutesSocializing: number): boolean {
  return minutesSocializing > BEHAVIOR.socializeMinutes;
}

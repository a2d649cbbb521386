/**
 * On-the-job crafting for crafting professions
 */

import type { ContentGenerator } from '../generation/ContentGenerator';
import { hasEntry } from '../generation/templateStore';
import type { Random } from '../random';
import type { Item } from '../types';

/** Per-minute chance that a working crafter finishes an item */
export const CRAFT_CHANCE_PER_MINUTE = 0.01;

/**
 * Item templates each crafting profession produces, in priority order: an
 * NPC with several crafting professions crafts for the first listed here.
 */
export const CRAFT_TEMPLATES: Readonly<Record<string, readonly string[]>> = {
  blacksmith: ['weapon_melee', 'armor'],
  alchemist: ['potion'],
  enchanter: ['scroll', 'jewelry'],
  jeweler: ['jewelry'],
};

export function canCraft(professions: readonly string[]): boolean {
  return professions.some((profession) => hasEntry(CRAFT_TEMPLATES, profession));
}

export function pickCraftTemplate(random: Random, professions: readonly string[]): string | null {
  for (const [profession, templates] of Object.entries(CRAFT_TEMPLATES)) {
    if (professions.includes(profession)) {
      return random.choice(templates);
    }
  }
  return null;
}

/**
 * Roll for a crafted item over `minutes` of work. Returns null when nothing
 * was made this time.
 */
export function tryCraft(generator: ContentGenerator, professions: readonly string[], minutes: number): Item | null {
  const { random } = generator;
  if (!random.chance(minutes * CRAFT_CHANCE_PER_MINUTE)) {
    return null;
  }
  const template = pickCraftTemplate(random, professions);
  return template === null ? null : generator.generateItem(template);
}

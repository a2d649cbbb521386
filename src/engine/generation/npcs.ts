/**
 * NPC composition from zero, one or many professions
 */

import type { Random } from '../random';
import type { Item, LocationId, NpcRecord, StatMap } from '../types';
import { generateItemsFromSet, type GeneratorContext } from './items';
import type { ProfessionTemplate, RaceTemplate, TemplateStore } from './templateStore';
import { fillTemplate, weightedKeys } from './weighted';

export interface NpcOptions {
  /** Omitted: one weighted-random profession. Empty: a generic commoner. */
  professions?: string[];
  race?: string;
  faction?: string;
  locationId?: LocationId | null;
}

const PROFESSION_JITTER = 1;
const GENERIC_JITTER = 2;

function unique<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

function pickName(random: Random, race: RaceTemplate): string {
  return `${random.choice(race.first_names)} ${random.choice(race.last_names)}`;
}

/**
 * Add racial modifiers to stats already present, then jitter each stat by
 * up to `spread` in either direction with a floor of 1.
 */
function finishStats(random: Random, base: StatMap, race: RaceTemplate, spread: number): StatMap {
  const stats: StatMap = { ...base };
  for (const [name, modifier] of Object.entries(race.stat_modifiers)) {
    if (stats[name] !== undefined) {
      stats[name] += modifier;
    }
  }
  for (const name of Object.keys(stats)) {
    stats[name] = Math.max(1, stats[name] + random.nextInt(-spread, spread));
  }
  return stats;
}

/**
 * Floored mean of each stat over the professions that define it.
 */
export function averageStats(professions: ProfessionTemplate[]): StatMap {
  const totals = new Map<string, { sum: number; count: number }>();
  for (const profession of professions) {
    for (const [name, value] of Object.entries(profession.base_stats)) {
      const entry = totals.get(name) ?? { sum: 0, count: 0 };
      entry.sum += value;
      entry.count += 1;
      totals.set(name, entry);
    }
  }
  const stats: StatMap = {};
  for (const [name, { sum, count }] of totals) {
    stats[name] = Math.floor(sum / count);
  }
  return stats;
}

function describe(random: Random, templates: TemplateStore, pool: string[], title: string): string {
  const { attributes } = templates;
  return fillTemplate(random.choice(pool), {
    trait: random.choice(attributes.npc_traits),
    title: title.toLowerCase(),
    tactile_adjective: random.choice(attributes.tactile_adjectives),
    visual_adjective: random.choice(attributes.visual_adjectives),
  });
}

function pickRace(random: Random, templates: TemplateStore, allowed: string[]): string {
  const table = weightedKeys(templates.races);
  const pool = allowed.length > 0 ? table.filter((entry) => allowed.includes(entry.value)) : table;
  return random.weightedChoice(pool);
}

function generateGenericNpc(ctx: GeneratorContext, options: NpcOptions): NpcRecord {
  const { random, templates } = ctx;
  const generic = templates.genericNpc;

  const raceName = options.race ?? pickRace(random, templates, []);
  const race = templates.getRace(raceName);
  const name = pickName(random, race);
  const stats = finishStats(random, generic.base_stats, race, GENERIC_JITTER);
  const dialogue = random.choice(generic.dialogue_hooks);
  const description = describe(random, templates, generic.description_templates, generic.title);

  return {
    name,
    title: generic.title,
    professions: [],
    race: raceName,
    faction: options.faction ?? null,
    stats,
    skills: unique(generic.skills),
    dialogue,
    description,
    inventory: [],
    locationId: options.locationId ?? null,
  };
}

/**
 * Compose an NPC record. Pinned names are resolved up front so an unknown
 * race, faction or profession fails before anything is drawn.
 */
export function generateNpc(ctx: GeneratorContext, options: NpcOptions = {}): NpcRecord {
  const { random, templates } = ctx;

  if (options.race !== undefined) templates.getRace(options.race);
  if (options.faction !== undefined) templates.getFaction(options.faction);

  const professionNames = options.professions === undefined
    ? [random.weightedChoice(weightedKeys(templates.professions))]
    : unique(options.professions);

  if (professionNames.length === 0) {
    return generateGenericNpc(ctx, options);
  }

  const professions = professionNames.map((name) => templates.getProfession(name));

  const raceName = options.race ?? pickRace(random, templates, unique(professions.flatMap((p) => p.races ?? [])));
  const race = templates.getRace(raceName);

  let faction: string | null = options.faction ?? null;
  if (options.faction === undefined) {
    const factionPool = unique(professions.flatMap((p) => p.factions ?? []));
    faction = factionPool.length > 0 ? random.choice(factionPool) : null;
  }

  const name = pickName(random, race);
  const stats = finishStats(random, averageStats(professions), race, PROFESSION_JITTER);
  const skills = unique(professions.flatMap((p) => p.skills));
  const title = professions.map((p) => p.title).join(' / ');

  const speaker = random.choice(professions);
  const dialogue = random.choice(speaker.dialogue_hooks);
  const description = describe(random, templates, random.choice(professions).description_templates, title);

  const inventory: Item[] = [];
  for (const profession of professions) {
    if (profession.item_set !== undefined) {
      inventory.push(...generateItemsFromSet(ctx, profession.item_set, random.nextInt(1, 3)));
    }
  }

  return {
    name,
    title,
    professions: professionNames,
    race: raceName,
    faction,
    stats,
    skills,
    dialogue,
    description,
    inventory,
    locationId: options.locationId ?? null,
  };
}

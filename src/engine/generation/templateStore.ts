/**
 * Template store: the read-only tables every generator draws from.
 *
 * Each data file is validated with zod on load, then cross-checked so that
 * every name one table uses to refer to another actually resolves.
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { LookupError, TemplateDataError } from '../errors';
import { createLogger, describeError } from '../logger';

const log = createLogger('Templates');

// --- Schemas ---------------------------------------------------

const intRange = z
  .object({ min: z.number().int(), max: z.number().int() })
  .refine((range) => range.min <= range.max, { message: 'min must not exceed max' });

const weight = z.number().nonnegative().optional();

const tierSchema = z.object({
  weight: z.number().nonnegative(),
  multiplier: z.number().positive(),
});

const attributesSchema = z.object({
  quality: z.record(tierSchema).refine((table) => Object.keys(table).length > 0, 'at least one quality tier'),
  rarity: z.record(tierSchema).refine((table) => Object.keys(table).length > 0, 'at least one rarity tier'),
  materials: z.array(z.string().min(1)),
  stats: z.record(intRange),
  damage_types: z.array(z.string().min(1)),
  tactile_adjectives: z.array(z.string()).min(1),
  visual_adjectives: z.array(z.string()).min(1),
  npc_traits: z.array(z.string()).min(1),
  environment_tags: z.array(z.string()),
});

const itemTemplateSchema = z.object({
  type: z.string().min(1),
  subtype: z.string().min(1),
  weight,
  base_names: z.array(z.string().min(1)).min(1),
  has_quality: z.boolean(),
  has_rarity: z.boolean(),
  has_material: z.boolean().default(false),
  stat_count: intRange,
  value_range: intRange,
  damage_type_count: intRange.optional(),
  description_templates: z.array(z.string()).min(1),
  consumable: z.boolean().default(false),
  single_use: z.boolean().default(false),
  provides_defense: z.boolean().default(false),
});

const itemsSchema = z.object({
  templates: z.record(itemTemplateSchema),
  item_sets: z.record(z.array(z.string()).min(1)),
});

const professionSchema = z.object({
  title: z.string().min(1),
  weight,
  base_stats: z.record(z.number().int()),
  skills: z.array(z.string()),
  dialogue_hooks: z.array(z.string()).min(1),
  description_templates: z.array(z.string()).min(1),
  races: z.array(z.string()).optional(),
  factions: z.array(z.string()).optional(),
  item_set: z.string().optional(),
});

const professionsSchema = z.object({ professions: z.record(professionSchema) });

const raceSchema = z.object({
  weight,
  stat_modifiers: z.record(z.number().int()),
  first_names: z.array(z.string().min(1)).min(1),
  last_names: z.array(z.string().min(1)).min(1),
});

const racesSchema = z.object({
  races: z.record(raceSchema).refine((table) => Object.keys(table).length > 0, 'at least one race'),
});

const factionsSchema = z.object({
  factions: z.record(z.object({ name: z.string(), description: z.string().optional(), weight })),
});

const genericNpcSchema = z.object({
  title: z.string().min(1),
  base_stats: z.record(z.number().int()),
  skills: z.array(z.string()),
  dialogue_hooks: z.array(z.string()).min(1),
  description_templates: z.array(z.string()).min(1),
});

const npcsSchema = z.object({ generic: genericNpcSchema });

const locationTemplateSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  weight,
  suitable_biomes: z.array(z.string()),
  base_environment_tags: z.array(z.string()),
  additional_tags_count: intRange,
  description_templates: z.array(z.string()).min(1),
  npc_spawn_count: intRange,
  spawnable_professions: z.array(z.string()),
  item_spawn_count: intRange,
  spawnable_items: z.array(z.string()),
  can_connect_to: z.array(z.string()),
});

const locationsSchema = z.object({
  templates: z.record(locationTemplateSchema).refine((table) => Object.keys(table).length > 0, 'at least one template'),
});

const seasonWeatherSchema = z.object({
  conditions: z.record(z.number().nonnegative()).refine((table) => Object.keys(table).length > 0, 'at least one condition'),
  temperature: intRange,
});

const biomeSchema = z.object({
  name: z.string(),
  weight,
  weather: z.object({
    spring: seasonWeatherSchema,
    summer: seasonWeatherSchema,
    autumn: seasonWeatherSchema,
    winter: seasonWeatherSchema,
  }),
});

const biomesSchema = z.object({
  biomes: z.record(biomeSchema),
  wind: z.record(intRange),
  time_of_day_offsets: z.object({
    night: z.number().int(),
    dawn: z.number().int(),
    morning: z.number().int(),
    afternoon: z.number().int(),
    dusk: z.number().int(),
    evening: z.number().int(),
  }),
  description_templates: z.array(z.string()).min(1),
});

export type IntRange = z.infer<typeof intRange>;
export type Tier = z.infer<typeof tierSchema>;
export type Attributes = z.infer<typeof attributesSchema>;
export type ItemTemplate = z.infer<typeof itemTemplateSchema>;
export type ProfessionTemplate = z.infer<typeof professionSchema>;
export type RaceTemplate = z.infer<typeof raceSchema>;
export type FactionTemplate = z.infer<typeof factionsSchema>['factions'][string];
export type GenericNpcTemplate = z.infer<typeof genericNpcSchema>;
export type LocationTemplate = z.infer<typeof locationTemplateSchema>;
export type BiomeTemplate = z.infer<typeof biomeSchema>;
export type SeasonWeather = z.infer<typeof seasonWeatherSchema>;
export type WeatherTables = Omit<z.infer<typeof biomesSchema>, 'biomes'>;

// --- Loading ---------------------------------------------------

/** Biome used when neither the caller nor the location template names one. */
export const FALLBACK_BIOME = 'temperate_forest';

export const TEMPLATE_FILES = [
  'attributes',
  'items',
  'professions',
  'races',
  'factions',
  'npcs',
  'locations',
  'biomes',
] as const;

export type TemplateFile = (typeof TEMPLATE_FILES)[number];

/** Raw, unvalidated file contents keyed by file name (without extension). */
export type TemplateSources = Record<TemplateFile, unknown>;

function parseSection<T extends z.ZodTypeAny>(source: string, schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new TemplateDataError(source, result.error.issues);
  }
  return result.data;
}

function readJson(file: string): unknown {
  let text: string;
  try {
    text = readFileSync(file, 'utf8');
  } catch (error) {
    throw new TemplateDataError(file, [], `cannot read file (${describeError(error)})`);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new TemplateDataError(file, [], `invalid JSON (${describeError(error)})`);
  }
}

/**
 * Read every template file from `dataDir` without validating it.
 */
export function loadTemplateSources(dataDir: string): TemplateSources {
  const read = (name: TemplateFile) => readJson(path.join(dataDir, `${name}.json`));
  return {
    attributes: read('attributes'),
    items: read('items'),
    professions: read('professions'),
    races: read('races'),
    factions: read('factions'),
    npcs: read('npcs'),
    locations: read('locations'),
    biomes: read('biomes'),
  };
}

export function loadTemplates(dataDir: string): TemplateStore {
  const store = TemplateStore.fromData(loadTemplateSources(dataDir));
  log.info(
    `Loaded ${store.itemTemplateNames().length} item templates, ${store.professionNames().length} professions, ` +
      `${store.locationTemplateNames().length} location templates from ${dataDir}`,
  );
  return store;
}

/**
 * Own-key test, so names such as "constructor" never match inherited members.
 */
export function hasEntry(record: object, name: string): boolean {
  return Object.hasOwn(record, name);
}

function entry<T>(record: Readonly<Record<string, T>>, name: string): T | undefined {
  return hasEntry(record, name) ? record[name] : undefined;
}

// --- Store -----------------------------------------------------

export class TemplateStore {
  readonly attributes: Attributes;
  readonly itemTemplates: Record<string, ItemTemplate>;
  readonly itemSets: Record<string, string[]>;
  readonly professions: Record<string, ProfessionTemplate>;
  readonly races: Record<string, RaceTemplate>;
  readonly factions: Record<string, FactionTemplate>;
  readonly genericNpc: GenericNpcTemplate;
  readonly locationTemplates: Record<string, LocationTemplate>;
  readonly biomes: Record<string, BiomeTemplate>;
  readonly weather: WeatherTables;

  private readonly qualityOrder: string[];
  private readonly rarityOrder: string[];

  private constructor(sources: TemplateSources) {
    this.attributes = parseSection('attributes.json', attributesSchema, sources.attributes);
    const items = parseSection('items.json', itemsSchema, sources.items);
    this.itemTemplates = items.templates;
    this.itemSets = items.item_sets;
    this.professions = parseSection('professions.json', professionsSchema, sources.professions).professions;
    this.races = parseSection('races.json', racesSchema, sources.races).races;
    this.factions = parseSection('factions.json', factionsSchema, sources.factions).factions;
    this.genericNpc = parseSection('npcs.json', npcsSchema, sources.npcs).generic;
    this.locationTemplates = parseSection('locations.json', locationsSchema, sources.locations).templates;
    const { biomes, ...weather } = parseSection('biomes.json', biomesSchema, sources.biomes);
    this.biomes = biomes;
    this.weather = weather;

    this.qualityOrder = Object.keys(this.attributes.quality);
    this.rarityOrder = Object.keys(this.attributes.rarity);
  }

  static fromData(sources: TemplateSources): TemplateStore {
    const store = new TemplateStore(sources);
    const problems = store.crossReferenceProblems();
    if (problems.length > 0) {
      throw new TemplateDataError('cross-references', [], problems.join('; '));
    }
    return store;
  }

  private crossReferenceProblems(): string[] {
    const problems: string[] = [];
    const missing = (what: string, name: string, owner: string) => problems.push(`${owner} refers to unknown ${what} "${name}"`);

    for (const [setName, templates] of Object.entries(this.itemSets)) {
      for (const template of templates) {
        if (!hasEntry(this.itemTemplates, template)) missing('item template', template, `item set ${setName}`);
      }
    }

    for (const [name, template] of Object.entries(this.itemTemplates)) {
      if (template.has_material && this.attributes.materials.length === 0) {
        problems.push(`item template ${name} needs materials but none are defined`);
      }
    }

    for (const [name, profession] of Object.entries(this.professions)) {
      if (profession.item_set !== undefined && !hasEntry(this.itemSets, profession.item_set)) {
        missing('item set', profession.item_set, `profession ${name}`);
      }
      for (const race of profession.races ?? []) {
        if (!hasEntry(this.races, race)) missing('race', race, `profession ${name}`);
      }
      for (const faction of profession.factions ?? []) {
        if (!hasEntry(this.factions, faction)) missing('faction', faction, `profession ${name}`);
      }
    }

    for (const [name, location] of Object.entries(this.locationTemplates)) {
      const owner = `location template ${name}`;
      for (const biome of location.suitable_biomes) {
        if (!hasEntry(this.biomes, biome)) missing('biome', biome, owner);
      }
      for (const profession of location.spawnable_professions) {
        if (!hasEntry(this.professions, profession)) missing('profession', profession, owner);
      }
      for (const item of location.spawnable_items) {
        if (!hasEntry(this.itemTemplates, item)) missing('item template', item, owner);
      }
      for (const neighbor of location.can_connect_to) {
        if (!hasEntry(this.locationTemplates, neighbor)) missing('location template', neighbor, owner);
      }
      if (location.npc_spawn_count.max > 0 && location.spawnable_professions.length === 0) {
        problems.push(`${owner} spawns NPCs but lists no professions`);
      }
      if (location.item_spawn_count.max > 0 && location.spawnable_items.length === 0) {
        problems.push(`${owner} spawns items but lists no item templates`);
      }
    }

    if (!hasEntry(this.biomes, FALLBACK_BIOME)) {
      problems.push(`fallback biome "${FALLBACK_BIOME}" is not defined`);
    }

    for (const [name, biome] of Object.entries(this.biomes)) {
      for (const season of Object.values(biome.weather)) {
        for (const condition of Object.keys(season.conditions)) {
          if (!hasEntry(this.weather.wind, condition)) problems.push(`biome ${name} uses condition "${condition}" without a wind range`);
        }
      }
    }

    return problems;
  }

  // --- Lookups ---------------------------------------------------

  getItemTemplate(name: string): ItemTemplate {
    const template = entry(this.itemTemplates, name);
    if (!template) throw new LookupError('item_template', name);
    return template;
  }

  getItemSet(name: string): string[] {
    const set = entry(this.itemSets, name);
    if (!set) throw new LookupError('item_set', name);
    return set;
  }

  getProfession(name: string): ProfessionTemplate {
    const profession = entry(this.professions, name);
    if (!profession) throw new LookupError('profession', name);
    return profession;
  }

  getRace(name: string): RaceTemplate {
    const race = entry(this.races, name);
    if (!race) throw new LookupError('race', name);
    return race;
  }

  getFaction(name: string): FactionTemplate {
    const faction = entry(this.factions, name);
    if (!faction) throw new LookupError('faction', name);
    return faction;
  }

  getLocationTemplate(name: string): LocationTemplate {
    const template = entry(this.locationTemplates, name);
    if (!template) throw new LookupError('location_template', name);
    return template;
  }

  getBiome(name: string): BiomeTemplate {
    const biome = entry(this.biomes, name);
    if (!biome) throw new LookupError('biome', name);
    return biome;
  }

  getStatRange(name: string): IntRange {
    const range = entry(this.attributes.stats, name);
    if (!range) throw new LookupError('stat', name);
    return range;
  }

  /**
   * Ordinal of a quality tier in the declared order (0 = lowest).
   */
  qualityRank(name: string): number {
    const rank = this.qualityOrder.indexOf(name);
    if (rank < 0) throw new LookupError('quality', name);
    return rank;
  }

  rarityRank(name: string): number {
    const rank = this.rarityOrder.indexOf(name);
    if (rank < 0) throw new LookupError('rarity', name);
    return rank;
  }

  qualityTiers(): string[] {
    return [...this.qualityOrder];
  }

  rarityTiers(): string[] {
    return [...this.rarityOrder];
  }

  itemTemplateNames(): string[] {
    return Object.keys(this.itemTemplates);
  }

  professionNames(): string[] {
    return Object.keys(this.professions);
  }

  raceNames(): string[] {
    return Object.keys(this.races);
  }

  locationTemplateNames(): string[] {
    return Object.keys(this.locationTemplates);
  }
}

/**
 * ContentGenerator - single entry point for procedural content.
 *
 * Owns the seeded Random that every generator, the World and its entities
 * draw from, plus the location session used to cross-reference the graph.
 * Construct one per run; two generators with the same seed and the same call
 * sequence produce identical output.
 */

import { DEFAULT_CONFIG } from '../config';
import { createLogger } from '../logger';
import { Random } from '../random';
import { generateWeather } from '../systems/weather';
import type {
  GeneratedWorld,
  Item,
  ItemConstraints,
  LocationRecord,
  NpcRecord,
  Season,
  TimeOfDay,
  WeatherSnapshot,
} from '../types';
import { generateItem, generateItemsFromSet, type GeneratorContext } from './items';
import { generateLocation, generateWorld, LocationSession, type LocationOptions } from './locations';
import { generateNpc, type NpcOptions } from './npcs';
import { loadTemplates, type TemplateStore } from './templateStore';

const log = createLogger('Generator');

export interface ContentGeneratorOptions {
  seed?: number;
  templates?: TemplateStore;
  dataDir?: string;
  maxItemAttempts?: number;
}

export type TemplateCategory = 'items' | 'item_sets' | 'professions' | 'races' | 'factions' | 'locations' | 'biomes';

export class ContentGenerator {
  readonly random: Random;
  readonly templates: TemplateStore;
  private readonly session = new LocationSession();
  private readonly ctx: GeneratorContext;

  constructor(options: ContentGeneratorOptions = {}) {
    this.random = new Random(options.seed);
    this.templates = options.templates ?? loadTemplates(options.dataDir ?? DEFAULT_CONFIG.dataDir);
    this.ctx = {
      random: this.random,
      templates: this.templates,
      maxItemAttempts: options.maxItemAttempts ?? DEFAULT_CONFIG.maxItemAttempts,
    };
    log.debug(`Seeded with ${this.random.seed}`);
  }

  get seed(): number {
    return this.random.seed;
  }

  generateItem(template?: string, constraints?: ItemConstraints): Item {
    return generateItem(this.ctx, template, constraints);
  }

  generateItemsFromSet(setName: string, count?: number): Item[] {
    return generateItemsFromSet(this.ctx, setName, count);
  }

  generateNpc(options: NpcOptions = {}): NpcRecord {
    return generateNpc(this.ctx, options);
  }

  generateLocation(options: LocationOptions = {}): LocationRecord {
    return generateLocation(this.ctx, this.session, options);
  }

  generateWorld(count: number = 5): GeneratedWorld {
    const world = generateWorld(this.ctx, this.session, count);
    log.info(`Generated world with ${Object.keys(world.locations).length} locations from ${count} roots`);
    return world;
  }

  generateWeather(biome: string, season: Season, timeOfDay: TimeOfDay): WeatherSnapshot {
    return generateWeather(this.ctx, biome, season, timeOfDay);
  }

  /**
   * Locations created since the last world generation or cache clear.
   */
  getCachedLocations(): LocationRecord[] {
    return this.session.records();
  }

  clearCache(): void {
    this.session.clear();
  }

  getAvailableTemplates(category: TemplateCategory): string[] {
    const { templates } = this;
    switch (category) {
      case 'items':
        return templates.itemTemplateNames();
      case 'item_sets':
        return Object.keys(templates.itemSets);
      case 'professions':
        return templates.professionNames();
      case 'races':
        return templates.raceNames();
      case 'factions':
        return Object.keys(templates.factions);
      case 'locations':
        return templates.locationTemplateNames();
      case 'biomes':
        return Object.keys(templates.biomes);
    }
  }
}

/**
 * Item generation: template rolls plus constraint-driven resampling
 */

import { GenerationExhaustedError } from '../errors';
import { createLogger } from '../logger';
import type { Random } from '../random';
import type { Item, ItemConstraints, ItemProperty, StatMap } from '../types';
import type { ItemTemplate, TemplateStore } from './templateStore';
import { capitalize, fillTemplate, weightedKeys } from './weighted';

const log = createLogger('Items');

/**
 * What every generator function needs: the shared random source, the
 * template tables and the resample bound.
 */
export interface GeneratorContext {
  random: Random;
  templates: TemplateStore;
  maxItemAttempts: number;
}

/**
 * Roll a map of `count` distinct stats; zero-valued rolls are dropped.
 */
export function rollStats(ctx: GeneratorContext, count: number): StatMap {
  const { random, templates } = ctx;
  const stats: StatMap = {};
  const names = random.sample(Object.keys(templates.attributes.stats), count);
  for (const name of names) {
    const range = templates.getStatRange(name);
    const value = random.nextInt(range.min, range.max);
    if (value !== 0) {
      stats[name] = value;
    }
  }
  return stats;
}

/**
 * A non-zero value for a stat the caller requires.
 */
function forcedStatValue(ctx: GeneratorContext, name: string): number {
  const range = ctx.templates.getStatRange(name);
  const value = ctx.random.nextInt(range.min, range.max);
  if (value !== 0) return value;
  if (range.max !== 0) return range.max;
  if (range.min !== 0) return range.min;
  return 1;
}

function itemProperties(template: ItemTemplate): ItemProperty[] {
  const properties: ItemProperty[] = [];
  if (template.consumable) properties.push('consumable');
  if (template.single_use) properties.push('single_use');
  if (template.provides_defense) properties.push('provides_defense');
  return properties;
}

/**
 * One unconstrained roll of a named template.
 */
export function rollItem(ctx: GeneratorContext, templateName: string, requiredStats: string[] = []): Item {
  const { random, templates } = ctx;
  const template = templates.getItemTemplate(templateName);
  const { attributes } = templates;

  const baseName = random.choice(template.base_names);
  const quality = template.has_quality ? random.weightedChoice(weightedKeys(attributes.quality)) : null;
  const rarity = template.has_rarity ? random.weightedChoice(weightedKeys(attributes.rarity)) : null;
  const material = template.has_material ? random.choice(attributes.materials) : null;

  const stats = rollStats(ctx, random.nextInt(template.stat_count.min, template.stat_count.max));
  for (const name of requiredStats) {
    if (stats[name] === undefined) {
      stats[name] = forcedStatValue(ctx, name);
    }
  }

  const baseValue = random.nextInt(template.value_range.min, template.value_range.max);
  const qualityMultiplier = quality === null ? 1 : attributes.quality[quality].multiplier;
  const rarityMultiplier = rarity === null ? 1 : attributes.rarity[rarity].multiplier;
  const value = Math.max(0, Math.floor(baseValue * qualityMultiplier * rarityMultiplier));

  const damageTypes = template.damage_type_count
    ? random.sample(
        attributes.damage_types,
        random.nextInt(template.damage_type_count.min, template.damage_type_count.max),
      )
    : [];

  const nameParts: string[] = [];
  if (quality) nameParts.push(quality);
  if (material) nameParts.push(capitalize(material));
  nameParts.push(baseName);

  const description = fillTemplate(random.choice(template.description_templates), {
    quality: quality ? quality.toLowerCase() : '',
    rarity: rarity ? rarity.toLowerCase() : '',
    material: material ?? '',
    base_name: baseName.toLowerCase(),
    tactile_adjective: random.choice(attributes.tactile_adjectives),
    visual_adjective: random.choice(attributes.visual_adjectives),
  });

  return {
    name: nameParts.join(' '),
    template: templateName,
    type: template.type,
    subtype: template.subtype,
    quality,
    rarity,
    material,
    stats,
    value,
    description,
    properties: itemProperties(template),
    damageTypes,
  };
}

/**
 * Resolve every tier and stat name a constraint set mentions, so typos
 * surface as lookup errors instead of exhausting the retry bound.
 */
export function checkConstraintNames(templates: TemplateStore, constraints: ItemConstraints): void {
  if (constraints.minQuality !== undefined) templates.qualityRank(constraints.minQuality);
  if (constraints.maxQuality !== undefined) templates.qualityRank(constraints.maxQuality);
  if (constraints.minRarity !== undefined) templates.rarityRank(constraints.minRarity);
  if (constraints.maxRarity !== undefined) templates.rarityRank(constraints.maxRarity);
  for (const stat of constraints.requiredStats ?? []) {
    templates.getStatRange(stat);
  }
}

/**
 * Tiers compare by position in the declared order, never by multiplier.
 * An item with no tier fails any bound on that tier.
 */
export function satisfiesConstraints(templates: TemplateStore, item: Item, constraints: ItemConstraints): boolean {
  const { minQuality, maxQuality, minRarity, maxRarity, minValue, maxValue, excludeMaterials } = constraints;

  if (minQuality !== undefined || maxQuality !== undefined) {
    if (item.quality === null) return false;
    const rank = templates.qualityRank(item.quality);
    if (minQuality !== undefined && rank < templates.qualityRank(minQuality)) return false;
    if (maxQuality !== undefined && rank > templates.qualityRank(maxQuality)) return false;
  }

  if (minRarity !== undefined || maxRarity !== undefined) {
    if (item.rarity === null) return false;
    const rank = templates.rarityRank(item.rarity);
    if (minRarity !== undefined && rank < templates.rarityRank(minRarity)) return false;
    if (maxRarity !== undefined && rank > templates.rarityRank(maxRarity)) return false;
  }

  if (minValue !== undefined && item.value < minValue) return false;
  if (maxValue !== undefined && item.value > maxValue) return false;

  if (excludeMaterials && item.material !== null && excludeMaterials.includes(item.material)) {
    return false;
  }

  return true;
}

/**
 * Generate an item, resampling until the constraints hold. Without a pinned
 * template a new one is drawn on every attempt.
 */
export function generateItem(ctx: GeneratorContext, templateName?: string, constraints: ItemConstraints = {}): Item {
  const { random, templates } = ctx;
  if (templateName !== undefined) {
    templates.getItemTemplate(templateName);
  }
  checkConstraintNames(templates, constraints);

  const requiredStats = constraints.requiredStats ?? [];
  const templateTable = weightedKeys(templates.itemTemplates);

  for (let attempt = 1; attempt <= ctx.maxItemAttempts; attempt++) {
    const chosen = templateName ?? random.weightedChoice(templateTable);
    const item = rollItem(ctx, chosen, requiredStats);
    if (satisfiesConstraints(templates, item, constraints)) {
      if (attempt > 1) {
        log.debug(`Constraints satisfied on attempt ${attempt} (${item.name})`);
      }
      return item;
    }
  }

  log.warn(`Gave up after ${ctx.maxItemAttempts} attempts`, constraints);
  throw new GenerationExhaustedError(ctx.maxItemAttempts, constraints);
}

/**
 * Draw `count` items (1-5 when omitted) from a named item set.
 */
export function generateItemsFromSet(ctx: GeneratorContext, setName: string, count?: number): Item[] {
  const set = ctx.templates.getItemSet(setName);
  const total = count ?? ctx.random.nextInt(1, 5);
  const items: Item[] = [];
  for (let i = 0; i < total; i++) {
    items.push(generateItem(ctx, ctx.random.choice(set)));
  }
  return items;
}

/**
 * Location and world-graph generation.
 *
 * A generation session keeps every location it creates in an indexed table
 * (the arena). Building a location happens in two phases: nodes are first
 * materialized into the table tagged with their depth, then edges are
 * assigned for nodes whose depth is below the connection cap. Edges are
 * always written on both endpoints.
 */

import type { GeneratedWorld, Item, LocationId, LocationRecord, LocationSummary, NpcRecord } from '../types';
import { generateItem, type GeneratorContext } from './items';
import { generateNpc } from './npcs';
import { FALLBACK_BIOME } from './templateStore';
import { fillTemplate, weightedKeys } from './weighted';

export interface LocationOptions {
  template?: string;
  connect?: boolean;
  maxConnections?: number;
  biome?: string;
}

/** Nodes at this depth or deeper never receive edges of their own. */
export const MAX_CONNECTION_DEPTH = 1;

const REUSE_CHANCE = 0.5;
const MAX_ID_REDRAWS = 100;

interface GraphNode {
  index: number;
  depth: number;
  record: LocationRecord;
}

export class LocationSession {
  private nodes: GraphNode[] = [];
  private byId = new Map<LocationId, GraphNode>();

  clear(): void {
    this.nodes = [];
    this.byId.clear();
  }

  get size(): number {
    return this.nodes.length;
  }

  has(id: LocationId): boolean {
    return this.byId.has(id);
  }

  get(id: LocationId): LocationRecord | undefined {
    return this.byId.get(id)?.record;
  }

  /** Records in creation order. */
  records(): LocationRecord[] {
    return this.nodes.map((node) => node.record);
  }

  add(record: LocationRecord, depth: number): GraphNode {
    const node: GraphNode = { index: this.nodes.length, depth, record };
    this.nodes.push(node);
    this.byId.set(record.id, node);
    return node;
  }

  /**
   * Nodes of `template` that could take a reciprocal edge keyed `reciprocal`.
   */
  reusable(template: string, reciprocal: string, exclude: LocationId): GraphNode[] {
    return this.nodes.filter(
      (node) =>
        node.record.template === template &&
        node.record.id !== exclude &&
        node.record.connections[reciprocal] === undefined,
    );
  }
}

function link(from: LocationRecord, to: LocationRecord): void {
  from.connections[to.template] = to.id;
  to.connections[from.template] = from.id;
}

function drawLocationId(ctx: GeneratorContext, session: LocationSession, template: string): LocationId {
  for (let i = 0; i < MAX_ID_REDRAWS; i++) {
    const id = `${template}_${ctx.random.nextInt(1000, 9999)}`;
    if (!session.has(id)) return id;
  }
  return `${template}_${ctx.random.id()}`;
}

function pickBiome(ctx: GeneratorContext, suitable: string[], requested?: string): string {
  if (requested !== undefined) {
    ctx.templates.getBiome(requested);
    return requested;
  }
  return suitable.length > 0 ? ctx.random.choice(suitable) : FALLBACK_BIOME;
}

/**
 * Phase one: build a location's own content and register it in the session.
 */
function materialize(
  ctx: GeneratorContext,
  session: LocationSession,
  templateName: string,
  depth: number,
  biomeName?: string,
): GraphNode {
  const { random, templates } = ctx;
  const template = templates.getLocationTemplate(templateName);

  const biome = pickBiome(ctx, template.suitable_biomes, biomeName);
  const id = drawLocationId(ctx, session, templateName);

  const environmentTags = [...new Set(template.base_environment_tags)];
  const extraCount = random.nextInt(template.additional_tags_count.min, template.additional_tags_count.max);
  const available = templates.attributes.environment_tags.filter((tag) => !environmentTags.includes(tag));
  environmentTags.push(...random.sample(available, extraCount));

  const descriptionValues: Record<string, string> = {
    visual_adjective: random.choice(templates.attributes.visual_adjectives),
    tactile_adjective: random.choice(templates.attributes.tactile_adjectives),
  };
  environmentTags.slice(0, 3).forEach((tag, i) => {
    descriptionValues[`environment_tag_${i + 1}`] = tag.toLowerCase();
  });
  const description = fillTemplate(random.choice(template.description_templates), descriptionValues);

  const npcCount = random.nextInt(template.npc_spawn_count.min, template.npc_spawn_count.max);
  const npcs: NpcRecord[] = [];
  for (let i = 0; i < npcCount; i++) {
    const profession = random.choice(template.spawnable_professions);
    npcs.push(generateNpc(ctx, { professions: [profession], locationId: id }));
  }

  const itemCount = random.nextInt(template.item_spawn_count.min, template.item_spawn_count.max);
  const items: Item[] = [];
  for (let i = 0; i < itemCount; i++) {
    items.push(generateItem(ctx, random.choice(template.spawnable_items)));
  }

  return session.add(
    {
      id,
      template: templateName,
      name: template.name,
      type: template.type,
      biome,
      environmentTags,
      description,
      npcs,
      items,
      connections: {},
    },
    depth,
  );
}

/**
 * Phase two: give `node` between 1 and `maxConnections` neighbors, reusing
 * session nodes half the time when one can take the reciprocal edge.
 */
function assignEdges(ctx: GeneratorContext, session: LocationSession, node: GraphNode, maxConnections: number): void {
  if (node.depth >= MAX_CONNECTION_DEPTH) return;

  const { random, templates } = ctx;
  const allowed = templates.getLocationTemplate(node.record.template).can_connect_to;
  const limit = Math.min(maxConnections, allowed.length);
  if (limit < 1) return;

  const slots = random.sample(allowed, random.nextInt(1, limit));
  for (const slot of slots) {
    if (node.record.connections[slot] !== undefined) continue;

    const candidates = session.reusable(slot, node.record.template, node.record.id);
    const neighbor = candidates.length > 0 && random.chance(REUSE_CHANCE)
      ? random.choice(candidates)
      : materialize(ctx, session, slot, node.depth + 1);

    link(node.record, neighbor.record);
  }
}

export function generateLocation(
  ctx: GeneratorContext,
  session: LocationSession,
  options: LocationOptions = {},
): LocationRecord {
  const { connect = true, maxConnections = 3 } = options;
  const templateName = options.template ?? ctx.random.weightedChoice(weightedKeys(ctx.templates.locationTemplates));

  const root = materialize(ctx, session, templateName, 0, options.biome);
  if (connect && maxConnections > 0) {
    assignEdges(ctx, session, root, maxConnections);
  }
  return root.record;
}

export function summarizeLocation(record: LocationRecord): LocationSummary {
  return {
    name: record.name,
    type: record.type,
    connections: Object.values(record.connections),
    npcCount: record.npcs.length,
    itemCount: record.items.length,
  };
}

/**
 * Clear the session, generate `count` connected roots, and return every
 * location the session produced along with a summary map.
 */
export function generateWorld(ctx: GeneratorContext, session: LocationSession, count: number): GeneratedWorld {
  session.clear();
  for (let i = 0; i < count; i++) {
    generateLocation(ctx, session, { maxConnections: 2 });
  }

  const locations: Record<LocationId, LocationRecord> = {};
  const summary: Record<LocationId, LocationSummary> = {};
  for (const record of session.records()) {
    locations[record.id] = record;
    summary[record.id] = summarizeLocation(record);
  }
  return { locations, summary };
}

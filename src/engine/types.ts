/**
 * Core data structures shared by generation and simulation
 */

export type EntityId = string;
export type LocationId = string;

// --- Generated records -----------------------------------------
// Plain data produced once by the ContentGenerator and never mutated.

export type ItemProperty = 'consumable' | 'single_use' | 'provides_defense';

export type StatMap = Record<string, number>;

export interface Item {
  name: string;
  template: string;
  type: string;
  subtype: string;
  quality: string | null;
  rarity: string | null;
  material: string | null;
  stats: StatMap; // zero-valued entries are omitted
  value: number;
  description: string;
  properties: ItemProperty[];
  damageTypes: string[];
}

export interface ItemConstraints {
  minQuality?: string;
  maxQuality?: string;
  minRarity?: string;
  maxRarity?: string;
  minValue?: number;
  maxValue?: number;
  excludeMaterials?: string[];
  requiredStats?: string[];
}

export interface NpcRecord {
  name: string;
  title: string;
  professions: string[];
  race: string;
  faction: string | null;
  stats: StatMap;
  skills: string[];
  dialogue: string;
  description: string;
  inventory: Item[];
  locationId: LocationId | null;
}

export interface LocationRecord {
  id: LocationId;
  template: string;
  name: string;
  type: string;
  biome: string;
  environmentTags: string[];
  description: string;
  npcs: NpcRecord[];
  items: Item[];
  // neighbor template name -> neighbor location id, always mirrored on the neighbor
  connections: Record<string, LocationId>;
}

export interface LocationSummary {
  name: string;
  type: string;
  connections: LocationId[];
  npcCount: number;
  itemCount: number;
}

export interface GeneratedWorld {
  locations: Record<LocationId, LocationRecord>;
  summary: Record<LocationId, LocationSummary>;
}

// --- Time ------------------------------------------------------

export type Season = 'spring' | 'summer' | 'autumn' | 'winter';

export type TimeOfDay = 'night' | 'dawn' | 'morning' | 'afternoon' | 'dusk' | 'evening';

export interface TimeState {
  year: number;
  day: number; // day of year, 1..360
  hour: number;
  minute: number;
  totalMinutes: number;
  timeScale: number;
}

// --- Weather ---------------------------------------------------

export interface WeatherSnapshot {
  condition: string;
  temperature: number;
  windSpeed: number;
  season: Season;
  timeOfDay: TimeOfDay;
  description: string;
}

// --- Simulation ------------------------------------------------

export type Activity = 'idle' | 'working' | 'traveling' | 'eating' | 'sleeping' | 'socializing';

export const ACTIVITIES: readonly Activity[] = [
  'idle',
  'working',
  'traveling',
  'eating',
  'sleeping',
  'socializing',
];

export type EventData = Record<string, unknown>;

export interface SimEvent {
  id: string;
  type: string;
  data: EventData;
  sourceId: EntityId | null;
  targetId: EntityId | null;
  locationId: LocationId | null;
  // Assigned when the event is dispatched, not when it is published
  timestamp: number | null;
}

export interface EventInit {
  data?: EventData;
  sourceId?: EntityId | null;
  targetId?: EntityId | null;
  locationId?: LocationId | null;
}

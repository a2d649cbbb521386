/**
 * Engine module exports
 */

export { World, type WorldOptions, type CreateWorldOptions, type SpawnOptions, type TickReport, type EntityFailure, type WorldSummary } from './World';
export { WorldSimulator, type SimulationCallback, type SimulationStatistics, type NpcStatus, type LocationStatus } from './simulation/Simulator';
export { ContentGenerator, type ContentGeneratorOptions, type TemplateCategory } from './generation/ContentGenerator';
export { TemplateStore, loadTemplates, loadTemplateSources, FALLBACK_BIOME, type TemplateSources } from './generation/templateStore';
export { Random, type Weighted } from './random';
export { loadConfig, DEFAULT_CONFIG, DEFAULT_DATA_DIR, DEFAULT_SAVE_DIR, type EngineConfig, type MissedCallbackPolicy } from './config';
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './logger';
export {
  WorldforgeError,
  LookupError,
  GenerationExhaustedError,
  TemplateDataError,
  ConfigError,
  SnapshotError,
  type ErrorCode,
  type LookupKind,
} from './errors';
export { ACTIVITIES } from './types';
export type {
  Activity,
  EntityId,
  EventData,
  EventInit,
  GeneratedWorld,
  Item,
  ItemConstraints,
  ItemProperty,
  LocationId,
  LocationRecord,
  LocationSummary,
  NpcRecord,
  Season,
  SimEvent,
  StatMap,
  TimeOfDay,
  TimeState,
  WeatherSnapshot,
} from './types';
export { TimeManager, SEASONS, type CallbackFailure, type ScheduledCallback } from './world/TimeManager';
export { EventBus, EventTypes, type DispatchFailure, type EventHandler, type ProcessResult } from './world/events';
export { LivingNpc, type NpcState } from './world/LivingNpc';
export { LivingLocation, type LocationState } from './world/LivingLocation';
export { deserializeEntity, type Entity, type EntityState, type WorldContext } from './world/entities';
export {
  StateManager,
  FileSnapshotStorage,
  MemorySnapshotStorage,
  SNAPSHOT_VERSION,
  type SnapshotFormat,
  type SnapshotStorage,
  type WorldState,
  type SaveInfo,
} from './world/snapshot';
export { validateConnections, validateGeneratedWorld, validateMembership, logValidationResults, type ValidationResult } from './world/validation';
export { inventoryAdd, inventoryRemove, inventoryValue, inventoryByType } from './world/inventory';
export { createNeeds, modifyNeed, clampNeed, getNeedStatus, type Needs } from './systems/needs';

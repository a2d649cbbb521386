/**
 * High-level driver for running a World over hours or days, with per-tick
 * callbacks and running statistics.
 */

import { createLogger, describeError } from '../logger';
import type { Activity } from '../types';
import type { TickReport, World, WorldSummary } from '../World';

const log = createLogger('Simulator');

export type SimulationCallback = (world: World, report: TickReport) => void;

export interface SimulationStatistics {
  ticks: number;
  minutesSimulated: number;
  eventsProcessed: number;
  entityFailures: number;
  dispatchFailures: number;
  callbackFailures: number;
  simulatorCallbackFailures: number;
}

export interface NpcStatus {
  id: string;
  name: string;
  profession: string;
  location: string;
  activity: Activity;
  energy: number;
  hunger: number;
  mood: number;
  travelingTo: string | null;
  travelProgress: number;
}

export interface LocationStatus {
  id: string;
  name: string;
  type: string;
  npcsPresent: number;
  marketOpen: boolean | null;
  weather: string | null;
}

export class WorldSimulator {
  readonly world: World;
  private callbacks: SimulationCallback[] = [];
  private stats: SimulationStatistics = {
    ticks: 0,
    minutesSimulated: 0,
    eventsProcessed: 0,
    entityFailures: 0,
    dispatchFailures: 0,
    callbackFailures: 0,
    simulatorCallbackFailures: 0,
  };

  constructor(world: World) {
    this.world = world;
  }

  /**
   * Call `callback` after every tick. Returns a remover.
   */
  addCallback(callback: SimulationCallback): () => void {
    this.callbacks.push(callback);
    return () => this.removeCallback(callback);
  }

  removeCallback(callback: SimulationCallback): boolean {
    const index = this.callbacks.indexOf(callback);
    if (index < 0) return false;
    this.callbacks.splice(index, 1);
    return true;
  }

  step(minutes: number = 1): TickReport {
    const report = this.world.step(minutes);

    this.stats.ticks += 1;
    this.stats.minutesSimulated += report.minutes;
    this.stats.eventsProcessed += report.eventsProcessed;
    this.stats.entityFailures += report.entityFailures.length;
    this.stats.dispatchFailures += report.dispatchFailures.length;
    this.stats.callbackFailures += report.callbackFailures.length;

    for (const callback of [...this.callbacks]) {
      try {
        callback(this.world, report);
      } catch (error) {
        this.stats.simulatorCallbackFailures += 1;
        log.error('Simulation callback failed:', describeError(error));
      }
    }
    return report;
  }

  /**
   * Run whole steps covering `hours`; a remainder shorter than one step is
   * not simulated.
   */
  simulateHours(hours: number, minutesPerStep: number = 60): number {
    if (!Number.isInteger(minutesPerStep) || minutesPerStep < 1) {
      throw new RangeError(`minutesPerStep must be a positive integer, got ${minutesPerStep}`);
    }
    const steps = Math.floor((hours * 60) / minutesPerStep);
    for (let i = 0; i < steps; i++) {
      this.step(minutesPerStep);
      if ((i + 1) % 10 === 0) {
        log.debug(`Progress: ${(((i + 1) / steps) * 100).toFixed(1)}% (${i + 1}/${steps} steps)`);
      }
    }
    return steps;
  }

  simulateDays(days: number, minutesPerStep: number = 60): number {
    log.info(`Simulating ${days} day(s)...`);
    return this.simulateHours(days * 24, minutesPerStep);
  }

  /**
   * Step until the calendar day changes.
   */
  simulateDay(minutesPerStep: number = 60): number {
    if (!Number.isInteger(minutesPerStep) || minutesPerStep < 1) {
      throw new RangeError(`minutesPerStep must be a positive integer, got ${minutesPerStep}`);
    }
    const startDay = this.world.time.day;
    let steps = 0;
    while (this.world.time.day === startDay) {
      this.step(minutesPerStep);
      steps++;
    }
    log.info(`Day ${startDay} complete. Now: ${this.world.time.getFullDateTimeString()}`);
    return steps;
  }

  /**
   * Step until `condition` holds or `maxIterations` steps have run.
   * @returns whether the condition was met
   */
  runUntil(condition: (world: World) => boolean, maxIterations: number = 10000, minutesPerStep: number = 1): boolean {
    let iterations = 0;
    while (!condition(this.world)) {
      if (iterations >= maxIterations) {
        log.warn(`Reached max iterations (${maxIterations})`);
        return false;
      }
      this.step(minutesPerStep);
      iterations++;
    }
    return true;
  }

  getStatistics(): SimulationStatistics & { worldSummary: WorldSummary } {
    return { ...this.stats, worldSummary: this.world.getSummary() };
  }

  npcStatus(limit: number = 10): NpcStatus[] {
    return [...this.world.npcs.values()].slice(0, limit).map((npc) => {
      const here = npc.currentLocationId === null ? undefined : this.world.getLocation(npc.currentLocationId);
      const destination =
        npc.destinationLocationId === null ? undefined : this.world.getLocation(npc.destinationLocationId);
      return {
        id: npc.id,
        name: npc.name,
        profession: npc.primaryProfession,
        location: here?.name ?? 'Unknown',
        activity: npc.activity,
        energy: npc.needs.energy,
        hunger: npc.needs.hunger,
        mood: npc.needs.mood,
        travelingTo: npc.destinationLocationId === null ? null : destination?.name ?? 'Unknown',
        travelProgress: npc.travelProgress,
      };
    });
  }

  locationStatus(limit: number = 10): LocationStatus[] {
    return [...this.world.locations.values()].slice(0, limit).map((location) => ({
      id: location.id,
      name: location.name,
      type: location.type,
      npcsPresent: this.world.getNpcsAtLocation(location.id).length,
      marketOpen: location.hasMarket ? location.marketOpen : null,
      weather: location.weather?.description ?? null,
    }));
  }
}

/**
 * Demo entry point: generate a world, run it for a day and save it
 */

import { EventTypes, loadConfig, World, WorldSimulator } from './engine';
import { createLogger, describeError } from './engine/logger';

const log = createLogger('Main');

function runDemo() {
  // World applies config.logLevel
  const config = loadConfig();
  const world = World.createNew({ name: 'Demo Realm', locationCount: 5, config });
  const simulator = new WorldSimulator(world);

  world.events.subscribe(EventTypes.ITEM_CRAFTED, (event) => {
    log.info(`${String(event.data.crafter)} crafted something at ${event.locationId ?? 'an unknown place'}`);
  });
  world.events.subscribe(EventTypes.DAY_PASSED, (event) => {
    log.info(`Day ${String(event.data.day)} begins`);
  });

  simulator.simulateDay(30);

  const stats = simulator.getStatistics();
  log.info(`${stats.worldSummary.name}: ${stats.worldSummary.time}`);
  log.info(`Ticks: ${stats.ticks}, minutes: ${stats.minutesSimulated}, events: ${stats.eventsProcessed}`);
  for (const npc of simulator.npcStatus(5)) {
    log.info(`  ${npc.name} (${npc.profession}) at ${npc.location}: ${npc.activity}`);
  }
  for (const location of simulator.locationStatus(5)) {
    log.info(`  ${location.name} [${location.type}] ${location.npcsPresent} present, ${location.weather ?? 'calm'}`);
  }

  const validation = world.validate();
  if (!validation.valid) {
    log.warn(`World has ${validation.errors.length} consistency problems`);
  }

  const saved = world.save('demo');
  log.info(`Saved to ${saved}`);
}

try {
  runDemo();
} catch (error) {
  log.error('Demo failed:', describeError(error));
  process.exitCode = 1;
}

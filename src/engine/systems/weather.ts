/**
 * Weather rolls from a biome's per-season tables
 */

import type { GeneratorContext } from '../generation/items';
import { capitalize, fillTemplate, weightedValues } from '../generation/weighted';
import type { Season, TimeOfDay, WeatherSnapshot } from '../types';

function windLabel(speed: number): string {
  if (speed < 5) return 'still air';
  if (speed < 20) return 'a light breeze';
  if (speed < 40) return 'a stiff wind';
  return 'a gale';
}

/**
 * Draw a condition, temperature and wind speed for one biome at one moment.
 */
export function generateWeather(
  ctx: Pick<GeneratorContext, 'random' | 'templates'>,
  biomeName: string,
  season: Season,
  timeOfDay: TimeOfDay,
): WeatherSnapshot {
  const { random, templates } = ctx;
  const biome = templates.getBiome(biomeName);
  const table = biome.weather[season];

  const condition = random.weightedChoice(weightedValues(table.conditions));
  const temperature =
    random.nextInt(table.temperature.min, table.temperature.max) + templates.weather.time_of_day_offsets[timeOfDay];
  const windRange = templates.weather.wind[condition];
  const windSpeed = random.nextInt(windRange.min, windRange.max);

  const label = condition.replace(/_/g, ' ');
  const description = fillTemplate(random.choice(templates.weather.description_templates), {
    condition_label: capitalize(label),
    condition_label_lower: label,
    season,
    time_of_day: timeOfDay,
    temperature,
    wind_label: windLabel(windSpeed),
  });

  return { condition, temperature, windSpeed, season, timeOfDay, description };
}

/**
 * Weighted table helpers and description templating
 */

import type { Weighted } from '../random';

const PLACEHOLDER = /\{[^}]+\}/g;

/**
 * Substitute every `{key}` present in `values`, then strip any placeholder
 * left unresolved.
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  let result = template;
  for (const [key, value] of Object.entries(values)) {
    result = result.split(`{${key}}`).join(String(value));
  }
  return result.replace(PLACEHOLDER, '');
}

/**
 * Turn a keyed table into weighted entries, keeping the table's key order.
 */
export function weightedKeys<T extends { weight?: number }>(table: Record<string, T>): Weighted<string>[] {
  return Object.entries(table).map(([key, entry]) => ({ value: key, weight: entry.weight }));
}

/**
 * Turn a `{ value: weight }` map into weighted entries.
 */
export function weightedValues(table: Record<string, number>): Weighted<string>[] {
  return Object.entries(table).map(([value, weight]) => ({ value, weight }));
}

export function capitalize(text: string): string {
  return text.length === 0 ? text : text[0].toUpperCase() + text.slice(1);
}

/**
 * Error taxonomy for the engine.
 *
 * Lookup and exhaustion errors are thrown to the caller. Faults raised by
 * event handlers, scheduled callbacks and entity updates are caught where they
 * happen and reported back as failure records instead (see world/events.ts).
 */

import type { ZodIssue } from 'zod';

export type ErrorCode =
  | 'LOOKUP'
  | 'GENERATION_EXHAUSTED'
  | 'TEMPLATE_DATA'
  | 'CONFIG'
  | 'SNAPSHOT';

export class WorldforgeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export type LookupKind =
  | 'item_template'
  | 'item_set'
  | 'profession'
  | 'race'
  | 'faction'
  | 'location_template'
  | 'location'
  | 'biome'
  | 'quality'
  | 'rarity'
  | 'stat'
  | 'npc';

/**
 * An identifier that does not name anything in the template store or world.
 */
export class LookupError extends WorldforgeError {
  readonly kind: LookupKind;
  readonly key: string;

  constructor(kind: LookupKind, key: string) {
    super('LOOKUP', `Unknown ${kind.replace(/_/g, ' ')}: ${key}`);
    this.kind = kind;
    this.key = key;
  }
}

/**
 * Item generation could not satisfy the caller's constraints within the
 * retry bound.
 */
export class GenerationExhaustedError extends WorldforgeError {
  readonly attempts: number;
  readonly constraints: object;

  constructor(attempts: number, constraints: object) {
    super(
      'GENERATION_EXHAUSTED',
      `Could not satisfy item constraints after ${attempts} attempts: ${JSON.stringify(constraints)}`,
    );
    this.attempts = attempts;
    this.constraints = constraints;
  }
}

export class TemplateDataError extends WorldforgeError {
  readonly source: string;
  readonly issues: ZodIssue[];

  constructor(source: string, issues: ZodIssue[], detail?: string) {
    const summary = issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    super('TEMPLATE_DATA', `Invalid template data in ${source}: ${detail ?? summary}`);
    this.source = source;
    this.issues = issues;
  }
}

export class ConfigError extends WorldforgeError {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    const summary = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    super('CONFIG', `Invalid configuration: ${summary}`);
    this.issues = issues;
  }
}

export class SnapshotError extends WorldforgeError {
  constructor(message: string) {
    super('SNAPSHOT', message);
  }
}

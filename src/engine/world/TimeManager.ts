/**
 * Simulation calendar and minute-exact scheduler.
 *
 * 60 minutes per hour, 24 hours per day, 30 days per month, 12 months per
 * year, four 90-day seasons. Time only moves when a caller advances it.
 */

import type { MissedCallbackPolicy } from '../config';
import { capitalize } from '../generation/weighted';
import { createLogger, describeError } from '../logger';
import type { Season, TimeOfDay, TimeState } from '../types';

const log = createLogger('Time');

export const MINUTES_PER_HOUR = 60;
export const HOURS_PER_DAY = 24;
export const DAYS_PER_MONTH = 30;
export const MONTHS_PER_YEAR = 12;
export const DAYS_PER_YEAR = DAYS_PER_MONTH * MONTHS_PER_YEAR;
export const DAYS_PER_SEASON = 90;
export const MINUTES_PER_DAY = MINUTES_PER_HOUR * HOURS_PER_DAY;

export const SEASONS: readonly Season[] = ['spring', 'summer', 'autumn', 'winter'];

/** [start, end) hours of each period */
const TIME_PERIODS: ReadonlyArray<[TimeOfDay, number, number]> = [
  ['night', 0, 6],
  ['dawn', 6, 8],
  ['morning', 8, 12],
  ['afternoon', 12, 17],
  ['dusk', 17, 19],
  ['evening', 19, 24],
];

export type ScheduledCallback = () => void;

export interface CallbackFailure {
  tick: number;
  error: string;
}

export interface TimeManagerOptions {
  year?: number;
  day?: number;
  hour?: number;
  minute?: number;
  timeScale?: number;
  missedCallbacks?: MissedCallbackPolicy;
}

export class TimeManager {
  year: number;
  day: number;
  hour: number;
  minute: number;
  totalMinutes = 0;
  timeScale: number;
  readonly missedCallbacks: MissedCallbackPolicy;

  private scheduled = new Map<number, ScheduledCallback[]>();

  constructor(options: TimeManagerOptions = {}) {
    this.year = options.year ?? 1;
    this.day = options.day ?? 1;
    this.hour = options.hour ?? 8;
    this.minute = options.minute ?? 0;
    this.timeScale = options.timeScale ?? 1;
    this.missedCallbacks = options.missedCallbacks ?? 'exact';
  }

  get timeOfDay(): TimeOfDay {
    for (const [period, start, end] of TIME_PERIODS) {
      if (this.hour >= start && this.hour < end) return period;
    }
    return 'night';
  }

  get season(): Season {
    return SEASONS[Math.floor((this.day - 1) / DAYS_PER_SEASON) % SEASONS.length];
  }

  /** 1-12 */
  get month(): number {
    return Math.floor((this.day - 1) / DAYS_PER_MONTH) + 1;
  }

  /** 1-30 */
  get dayOfMonth(): number {
    return ((this.day - 1) % DAYS_PER_MONTH) + 1;
  }

  get isDaytime(): boolean {
    return this.hour >= 6 && this.hour < 19;
  }

  get isWorkingHours(): boolean {
    return this.hour >= 8 && this.hour < 17;
  }

  /**
   * Move the clock forward, carry into hours, days and years, then fire the
   * callbacks that are due. Fractional minutes are dropped.
   */
  advanceMinutes(minutes: number): CallbackFailure[] {
    if (!Number.isFinite(minutes) || minutes < 0) {
      throw new RangeError(`Cannot advance time by ${minutes} minutes`);
    }
    const whole = Math.trunc(minutes);

    this.totalMinutes += whole;
    this.minute += whole;

    this.hour += Math.floor(this.minute / MINUTES_PER_HOUR);
    this.minute %= MINUTES_PER_HOUR;

    this.day += Math.floor(this.hour / HOURS_PER_DAY);
    this.hour %= HOURS_PER_DAY;

    while (this.day > DAYS_PER_YEAR) {
      this.day -= DAYS_PER_YEAR;
      this.year += 1;
    }

    return this.fireDueCallbacks();
  }

  advanceHours(hours: number): CallbackFailure[] {
    return this.advanceMinutes(hours * MINUTES_PER_HOUR);
  }

  advanceDays(days: number): CallbackFailure[] {
    return this.advanceHours(days * HOURS_PER_DAY);
  }

  /**
   * Advance to the next occurrence of hh:mm (tomorrow if it is now or past).
   */
  advanceToTime(hour: number, minute: number = 0): CallbackFailure[] {
    const target = hour * MINUTES_PER_HOUR + minute;
    const current = this.hour * MINUTES_PER_HOUR + this.minute;
    const delta = target > current ? target - current : MINUTES_PER_DAY - current + target;
    return this.advanceMinutes(delta);
  }

  /**
   * Run `callback` when the clock reaches now + `minutesFromNow`. Returns the
   * absolute tick it is keyed on.
   */
  schedule(minutesFromNow: number, callback: ScheduledCallback): number {
    if (!Number.isInteger(minutesFromNow) || minutesFromNow < 0) {
      throw new RangeError(`Cannot schedule ${minutesFromNow} minutes from now`);
    }
    const tick = this.totalMinutes + minutesFromNow;
    const bucket = this.scheduled.get(tick) ?? [];
    bucket.push(callback);
    this.scheduled.set(tick, bucket);
    return tick;
  }

  pendingCallbacks(): number {
    let count = 0;
    for (const bucket of this.scheduled.values()) count += bucket.length;
    return count;
  }

  private dueTicks(): number[] {
    if (this.missedCallbacks === 'exact') {
      return this.scheduled.has(this.totalMinutes) ? [this.totalMinutes] : [];
    }
    return [...this.scheduled.keys()].filter((tick) => tick <= this.totalMinutes).sort((a, b) => a - b);
  }

  private fireDueCallbacks(): CallbackFailure[] {
    const failures: CallbackFailure[] = [];
    for (const tick of this.dueTicks()) {
      const bucket = this.scheduled.get(tick) ?? [];
      // Removed before running so callbacks cannot touch their own bucket
      this.scheduled.delete(tick);
      for (const callback of bucket) {
        try {
          callback();
        } catch (error) {
          log.error(`Scheduled callback for tick ${tick} failed:`, describeError(error));
          failures.push({ tick, error: describeError(error) });
        }
      }
    }
    return failures;
  }

  getTimeString(): string {
    return `${String(this.hour).padStart(2, '0')}:${String(this.minute).padStart(2, '0')}`;
  }

  getDateString(): string {
    return `Year ${this.year}, Day ${this.day}`;
  }

  getFullDateTimeString(): string {
    return (
      `Year ${this.year}, ${capitalize(this.season)}, Month ${this.month}, Day ${this.dayOfMonth} - ` +
      `${this.getTimeString()} (${this.timeOfDay})`
    );
  }

  toState(): TimeState {
    return {
      year: this.year,
      day: this.day,
      hour: this.hour,
      minute: this.minute,
      totalMinutes: this.totalMinutes,
      timeScale: this.timeScale,
    };
  }

  static fromState(state: TimeState, missedCallbacks: MissedCallbackPolicy = 'exact'): TimeManager {
    const time = new TimeManager({
      year: state.year,
      day: state.day,
      hour: state.hour,
      minute: state.minute,
      timeScale: state.timeScale,
      missedCallbacks,
    });
    time.totalMinutes = state.totalMinutes;
    return time;
  }
}

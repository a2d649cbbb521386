import { describe, expect, it } from 'vitest';

import { TimeManager } from '../src/engine/world/TimeManager';

describe('TimeManager', () => {
  it('rolls 23:00 plus two hours into the next day', () => {
    const time = new TimeManager({ year: 1, day: 1, hour: 23, minute: 0 });
    time.advanceMinutes(120);
    expect(time.hour).toBe(1);
    expect(time.minute).toBe(0);
    expect(time.day).toBe(2);
    expect(time.year).toBe(1);
    expect(time.totalMinutes).toBe(120);
  });

  it('rolls the last day of the year into the next year', () => {
    const time = new TimeManager({ year: 3, day: 360, hour: 23, minute: 30 });
    time.advanceMinutes(45);
    expect(time.year).toBe(4);
    expect(time.day).toBe(1);
    expect(time.getTimeString()).toBe('00:15');
  });

  it('derives season, month and day of month from the day of year', () => {
    const time = new TimeManager({ day: 91 });
    expect(time.season).toBe('summer');
    expect(time.month).toBe(4);
    expect(time.dayOfMonth).toBe(1);

    expect(new TimeManager({ day: 360 }).season).toBe('winter');
    expect(new TimeManager({ day: 90 }).season).toBe('spring');
  });

  it('maps hours to periods and windows', () => {
    const at = (hour: number) => new TimeManager({ hour });
    expect(at(3).timeOfDay).toBe('night');
    expect(at(6).timeOfDay).toBe('dawn');
    expect(at(12).timeOfDay).toBe('afternoon');
    expect(at(18).timeOfDay).toBe('dusk');
    expect(at(22).timeOfDay).toBe('evening');
    expect(at(8).isWorkingHours).toBe(true);
    expect(at(17).isWorkingHours).toBe(false);
    expect(at(5).isDaytime).toBe(false);
    expect(at(18).isDaytime).toBe(true);
  });

  it('formats the full date', () => {
    expect(new TimeManager().getFullDateTimeString()).toBe('Year 1, Spring, Month 1, Day 1 - 08:00 (morning)');
    expect(new TimeManager({ day: 45, hour: 9, minute: 5 }).getDateString()).toBe('Year 1, Day 45');
  });

  it('advances to the next occurrence of a clock time', () => {
    const time = new TimeManager({ hour: 8 });
    time.advanceToTime(6);
    expect(time.day).toBe(2);
    expect(time.getTimeString()).toBe('06:00');

    time.advanceToTime(7, 30);
    expect(time.day).toBe(2);
    expect(time.getTimeString()).toBe('07:30');
  });

  it('drops fractional minutes and rejects negative ones', () => {
    const time = new TimeManager();
    time.advanceMinutes(1.9);
    expect(time.totalMinutes).toBe(1);
    expect(() => time.advanceMinutes(-1)).toThrow(RangeError);
    expect(() => time.advanceMinutes(Number.NaN)).toThrow(RangeError);
  });

  it('fires callbacks on their exact tick', () => {
    const time = new TimeManager();
    const fired: string[] = [];
    time.schedule(10, () => fired.push('a'));
    time.advanceMinutes(9);
    expect(fired).toEqual([]);
    time.advanceMinutes(1);
    expect(fired).toEqual(['a']);
    expect(time.pendingCallbacks()).toBe(0);
  });

  it('skips callbacks whose tick is jumped over by default', () => {
    const time = new TimeManager();
    const fired: string[] = [];
    time.schedule(10, () => fired.push('late'));
    time.advanceMinutes(30);
    expect(fired).toEqual([]);
    expect(time.pendingCallbacks()).toBe(1);
  });

  it('fires every overdue callback in tick order under catch-up', () => {
    const time = new TimeManager({ missedCallbacks: 'catch-up' });
    const fired: string[] = [];
    time.schedule(20, () => fired.push('second'));
    time.schedule(10, () => fired.push('first'));
    time.schedule(90, () => fired.push('future'));
    time.advanceMinutes(30);
    expect(fired).toEqual(['first', 'second']);
    expect(time.pendingCallbacks()).toBe(1);
  });

  it('reports failing callbacks and keeps running the rest', () => {
    const time = new TimeManager();
    const fired: string[] = [];
    time.schedule(5, () => {
      throw new Error('boom');
    });
    time.schedule(5, () => fired.push('ok'));
    const failures = time.advanceMinutes(5);
    expect(failures).toEqual([{ tick: 5, error: 'boom' }]);
    expect(fired).toEqual(['ok']);
  });

  it('restores from state', () => {
    const time = new TimeManager({ year: 2, day: 100, hour: 14, minute: 20 });
    time.advanceMinutes(75);
    const restored = TimeManager.fromState(time.toState());
    expect(restored.toState()).toEqual({
      year: 2,
      day: 100,
      hour: 15,
      minute: 35,
      totalMinutes: 75,
      timeScale: 1,
    });
  });
});

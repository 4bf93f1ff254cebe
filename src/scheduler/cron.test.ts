import { describe, it, expect } from 'vitest';
import { CronParseError, CronSchedule } from './cron.js';

const at = (iso: string) => new Date(iso);

describe('CronSchedule.parse', () => {
  it.each([
    '* * * * *',
    '*/15 * * * *',
    '0 9 * * MON-FRI',
    '0 0 3 * * *',
    '*/10 * * * * *',
    '0 0 12 1 JAN,jul ? 2027',
    '0 30 4 1-15/2 * *',
    '@daily',
    '@hourly',
    '0 0 3 * * Sunday',
    '0 0 0 1 January,July *',
  ])('accepts %j', (expr) => {
    expect(CronSchedule.parse(expr).expression).toBe(expr);
  });

  it.each([
    ['', 'expression is empty'],
    ['* * *', 'expected 5, 6 or 7 fields, got 3'],
    ['61 * * * *', 'minute 61 is outside 0-59'],
    ['* 24 * * *', 'hour 24 is outside 0-23'],
    ['5-1 * * * *', 'minute range 5-1 is reversed'],
    ['*/0 * * * *', 'must be a positive integer'],
    ['a * * * *', '"a" is not a valid minute value'],
    ['1,,2 * * * *', 'empty entry in minute field'],
    ['0 0 0 1 1 * 1969', 'year 1969 is outside 1970-2099'],
    ['@fortnightly', 'unknown macro @fortnightly'],
    ['0 0 3 * * 0', 'day-of-week 0 is outside 1-7'],
    ['0 0 3 * * 8', 'day-of-week 8 is outside 1-7'],
  ])('rejects %j', (expr, reason) => {
    expect(() => CronSchedule.parse(expr)).toThrow(CronParseError);
    expect(() => CronSchedule.parse(expr)).toThrow(reason);
  });
});

describe('CronSchedule.matches', () => {
  it('fixes the second at 0 for five-field expressions', () => {
    const schedule = CronSchedule.parse('30 2 * * *');
    expect(schedule.matches(at('2026-05-04T02:30:00Z'))).toBe(true);
    expect(schedule.matches(at('2026-05-04T02:30:01Z'))).toBe(false);
  });

  // 2026-10-17 is a Saturday, 2026-10-18 a Sunday
  it('numbers the days of the week from 1 = Sunday', () => {
    const schedule = CronSchedule.parse('0 0 0 * * 1');
    expect(schedule.matches(at('2026-10-18T00:00:00Z'))).toBe(true);
    expect(schedule.matches(at('2026-10-19T00:00:00Z'))).toBe(false);
  });

  it('treats day-of-week 7 as Saturday', () => {
    const schedule = CronSchedule.parse('0 0 0 * * 7');
    expect(schedule.matches(at('2026-10-17T00:00:00Z'))).toBe(true);
    expect(schedule.matches(at('2026-10-18T00:00:00Z'))).toBe(false);
  });

  it('accepts full day names in any case', () => {
    const schedule = CronSchedule.parse('0 0 3 * * MONDAY');
    expect(schedule.matches(at('2026-10-19T03:00:00Z'))).toBe(true);
    expect(CronSchedule.parse('0 0 3 * * monday').matches(at('2026-10-19T03:00:00Z'))).toBe(true);
  });

  it('requires both day-of-month and day-of-week to match', () => {
    const schedule = CronSchedule.parse('0 0 0 1 * MON');
    // 2026-03-01 is a Sunday
    expect(schedule.matches(at('2026-03-01T00:00:00Z'))).toBe(false);
  });
});

describe('CronSchedule.next', () => {
  it('finds the next quarter hour', () => {
    const schedule = CronSchedule.parse('*/15 * * * *');
    expect(schedule.next(at('2026-03-01T10:07:30Z'))?.toISOString()).toBe('2026-03-01T10:15:00.000Z');
  });

  it('is strictly after the given time even when that time matches', () => {
    const schedule = CronSchedule.parse('@daily');
    expect(schedule.next(at('2026-01-01T00:00:00Z'))?.toISOString()).toBe('2026-01-02T00:00:00.000Z');
  });

  it('honours a seconds field', () => {
    const schedule = CronSchedule.parse('*/10 * * * * *');
    expect(schedule.next(at('2026-03-01T10:00:05.500Z'))?.toISOString()).toBe('2026-03-01T10:00:10.000Z');
  });

  it('skips to the next weekday', () => {
    const schedule = CronSchedule.parse('0 9 * * MON-FRI');
    // Saturday noon -> Monday 09:00
    expect(schedule.next(at('2026-10-17T12:00:00Z'))?.toISOString()).toBe('2026-10-19T09:00:00.000Z');
  });

  it('fires day-of-week 1 on the coming Sunday', () => {
    const schedule = CronSchedule.parse('0 0 3 * * 1');
    expect(schedule.next(at('2026-10-17T12:00:00Z'))?.toISOString()).toBe('2026-10-18T03:00:00.000Z');
  });

  it('runs @weekly at midnight on Sunday', () => {
    const schedule = CronSchedule.parse('@weekly');
    expect(schedule.next(at('2026-10-18T12:00:00Z'))?.toISOString()).toBe('2026-10-25T00:00:00.000Z');
  });

  it('resolves full month names', () => {
    const schedule = CronSchedule.parse('0 0 0 1 January *');
    expect(schedule.next(at('2026-10-18T00:00:00Z'))?.toISOString()).toBe('2027-01-01T00:00:00.000Z');
  });

  it('rolls over month and year boundaries', () => {
    const schedule = CronSchedule.parse('0 0 0 29 2 *');
    expect(schedule.next(at('2026-03-01T00:00:00Z'))?.toISOString()).toBe('2028-02-29T00:00:00.000Z');
  });

  it('returns null when the year field is in the past', () => {
    const schedule = CronSchedule.parse('0 0 0 1 1 * 2020');
    expect(schedule.next(at('2026-10-18T00:00:00Z'))).toBeNull();
  });

  it('is deterministic for a fixed time', () => {
    const schedule = CronSchedule.parse('0 5 */6 * * *');
    const now = at('2026-10-18T13:42:09Z');
    const first = schedule.next(now);
    const second = schedule.next(now);
    expect(first?.toISOString()).toBe('2026-10-18T18:05:00.000Z');
    expect(second?.getTime()).toBe(first?.getTime());
  });
});

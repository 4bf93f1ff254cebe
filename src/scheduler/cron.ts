/**
 * Cron expressions, evaluated in UTC.
 *
 * Fields: [second] minute hour day-of-month month day-of-week [year]
 *   - 5 fields: minute-level schedule, second fixed at 0
 *   - 6 fields: leading seconds field
 *   - 7 fields: trailing year field (1970-2099)
 * Supports: *, ?, N, N-M, *\/S, N/S, N-M/S, comma-separated lists, month and
 * weekday names (short or full), and the @yearly/@monthly/@weekly/@daily/@hourly
 * macros. Day-of-week runs 1-7 with 1 = Sunday and 7 = Saturday.
 * Day-of-month and day-of-week must both match.
 */

export class CronParseError extends Error {
  constructor(
    public readonly expression: string,
    reason: string,
  ) {
    super(`Invalid cron expression "${expression}": ${reason}`);
    this.name = 'CronParseError';
  }
}

interface FieldSpec {
  name: string;
  min: number;
  max: number;
  aliases?: Record<string, number>;
}

const MONTH_NAMES: Record<string, number> = {
  JAN: 1, FEB: 2, MAR: 3, APR: 4, MAY: 5, JUN: 6,
  JUL: 7, AUG: 8, SEP: 9, OCT: 10, NOV: 11, DEC: 12,
  JANUARY: 1, FEBRUARY: 2, MARCH: 3, APRIL: 4, JUNE: 6, JULY: 7,
  AUGUST: 8, SEPTEMBER: 9, OCTOBER: 10, NOVEMBER: 11, DECEMBER: 12,
};

const DAY_NAMES: Record<string, number> = {
  SUN: 1, MON: 2, TUE: 3, WED: 4, THU: 5, FRI: 6, SAT: 7,
  SUNDAY: 1, MONDAY: 2, TUESDAY: 3, WEDNESDAY: 4, THURSDAY: 5, FRIDAY: 6, SATURDAY: 7,
};

const SECOND: FieldSpec = { name: 'second', min: 0, max: 59 };
const MINUTE: FieldSpec = { name: 'minute', min: 0, max: 59 };
const HOUR: FieldSpec = { name: 'hour', min: 0, max: 23 };
const DAY_OF_MONTH: FieldSpec = { name: 'day-of-month', min: 1, max: 31 };
const MONTH: FieldSpec = { name: 'month', min: 1, max: 12, aliases: MONTH_NAMES };
const DAY_OF_WEEK: FieldSpec = { name: 'day-of-week', min: 1, max: 7, aliases: DAY_NAMES };
const YEAR: FieldSpec = { name: 'year', min: 1970, max: 2099 };

const MACROS: Record<string, string> = {
  '@yearly': '0 0 0 1 1 *',
  '@annually': '0 0 0 1 1 *',
  '@monthly': '0 0 0 1 * *',
  '@weekly': '0 0 0 * * 1',
  '@daily': '0 0 0 * * *',
  '@midnight': '0 0 0 * * *',
  '@hourly': '0 0 * * * *',
};

/** How far ahead next() looks when the expression has no year field. */
const SEARCH_HORIZON_YEARS = 30;

function parseValue(token: string, spec: FieldSpec, expression: string): number {
  const alias = spec.aliases?.[token.toUpperCase()];
  if (alias !== undefined) return alias;
  if (!/^\d+$/.test(token)) {
    throw new CronParseError(expression, `"${token}" is not a valid ${spec.name} value`);
  }
  const value = Number(token);
  if (value < spec.min || value > spec.max) {
    throw new CronParseError(expression, `${spec.name} ${value} is outside ${spec.min}-${spec.max}`);
  }
  return value;
}

function parseField(field: string, spec: FieldSpec, expression: string): Set<number> {
  const result = new Set<number>();
  for (const part of field.split(',')) {
    if (!part) {
      throw new CronParseError(expression, `empty entry in ${spec.name} field`);
    }
    const pieces = part.split('/');
    if (pieces.length > 2) {
      throw new CronParseError(expression, `"${part}" has more than one step`);
    }
    const [range, stepStr] = pieces;

    let step = 1;
    if (stepStr !== undefined) {
      if (!/^\d+$/.test(stepStr) || Number(stepStr) === 0) {
        throw new CronParseError(expression, `step "${stepStr}" in ${spec.name} field must be a positive integer`);
      }
      step = Number(stepStr);
    }

    let lo: number;
    let hi: number;
    if (range === '*' || range === '?') {
      lo = spec.min;
      hi = spec.max;
    } else if (range.includes('-')) {
      const bounds = range.split('-');
      if (bounds.length !== 2) {
        throw new CronParseError(expression, `"${range}" is not a valid ${spec.name} range`);
      }
      lo = parseValue(bounds[0], spec, expression);
      hi = parseValue(bounds[1], spec, expression);
      if (lo > hi) {
        throw new CronParseError(expression, `${spec.name} range ${range} is reversed`);
      }
    } else {
      lo = parseValue(range, spec, expression);
      // "N/S" runs from N to the end of the field
      hi = stepStr !== undefined ? spec.max : lo;
    }

    for (let v = lo; v <= hi; v += step) {
      result.add(v);
    }
  }
  return result;
}

/** 1 = Sunday ... 7 = Saturday */
function weekday(date: Date): number {
  return date.getUTCDay() + 1;
}

export class CronSchedule {
  private constructor(
    readonly expression: string,
    private readonly seconds: Set<number>,
    private readonly minutes: Set<number>,
    private readonly hours: Set<number>,
    private readonly daysOfMonth: Set<number>,
    private readonly months: Set<number>,
    private readonly daysOfWeek: Set<number>,
    private readonly years: Set<number> | null,
  ) {}

  static parse(expression: string): CronSchedule {
    const trimmed = expression.trim();
    if (!trimmed) {
      throw new CronParseError(expression, 'expression is empty');
    }

    let source = trimmed;
    if (trimmed.startsWith('@')) {
      const macro = MACROS[trimmed.toLowerCase()];
      if (!macro) {
        throw new CronParseError(expression, `unknown macro ${trimmed}`);
      }
      source = macro;
    }

    const fields = source.split(/\s+/);
    let secondField = '0';
    let rest: string[];
    let yearField: string | null = null;
    switch (fields.length) {
      case 5:
        rest = fields;
        break;
      case 6:
        [secondField, ...rest] = fields;
        break;
      case 7:
        [secondField, ...rest] = fields.slice(0, 6);
        yearField = fields[6];
        break;
      default:
        throw new CronParseError(expression, `expected 5, 6 or 7 fields, got ${fields.length}`);
    }
    const [minuteField, hourField, domField, monthField, dowField] = rest;

    return new CronSchedule(
      trimmed,
      parseField(secondField, SECOND, expression),
      parseField(minuteField, MINUTE, expression),
      parseField(hourField, HOUR, expression),
      parseField(domField, DAY_OF_MONTH, expression),
      parseField(monthField, MONTH, expression),
      parseField(dowField, DAY_OF_WEEK, expression),
      yearField === null ? null : parseField(yearField, YEAR, expression),
    );
  }

  matches(date: Date): boolean {
    return (
      (this.years === null || this.years.has(date.getUTCFullYear())) &&
      this.months.has(date.getUTCMonth() + 1) &&
      this.daysOfMonth.has(date.getUTCDate()) &&
      this.daysOfWeek.has(weekday(date)) &&
      this.hours.has(date.getUTCHours()) &&
      this.minutes.has(date.getUTCMinutes()) &&
      this.seconds.has(date.getUTCSeconds())
    );
  }

  /**
   * First matching second strictly after `after`, or null when nothing
   * matches before the search horizon (the last listed year, or 30 years out).
   */
  next(after: Date): Date | null {
    const horizon = this.years
      ? Math.max(...this.years)
      : after.getUTCFullYear() + SEARCH_HORIZON_YEARS;
    let t = Math.floor(after.getTime() / 1000) * 1000 + 1000;

    for (;;) {
      const d = new Date(t);
      const year = d.getUTCFullYear();
      const month = d.getUTCMonth();
      const day = d.getUTCDate();
      const hour = d.getUTCHours();
      const minute = d.getUTCMinutes();

      if (year > horizon) return null;
      if (this.years && !this.years.has(year)) {
        t = Date.UTC(year + 1, 0, 1);
      } else if (!this.months.has(month + 1)) {
        t = Date.UTC(year, month + 1, 1);
      } else if (!this.daysOfMonth.has(day) || !this.daysOfWeek.has(weekday(d))) {
        t = Date.UTC(year, month, day + 1);
      } else if (!this.hours.has(hour)) {
        t = Date.UTC(year, month, day, hour + 1);
      } else if (!this.minutes.has(minute)) {
        t = Date.UTC(year, month, day, hour, minute + 1);
      } else if (!this.seconds.has(d.getUTCSeconds())) {
        t = Date.UTC(year, month, day, hour, minute, d.getUTCSeconds() + 1);
      } else {
        return d;
      }
    }
  }
}

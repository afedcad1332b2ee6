import { HolidaySet } from './holidays.js';
import type { Holiday } from './holidays.js';
import { addDays, dateKey, isWeekend, parseDate, startOfDay, wholeDaysBetween } from './time.js';
import { pick } from '../sampling/random.js';
import type { RandomSource } from '../sampling/random.js';

export interface CalendarDay {
  date: string;
  isBusinessDay: boolean;
  holidayName?: string;
}

export interface WindowSummary {
  start: Date;
  end: Date;
  totalDays: number;
  businessDays: number;
  weekendDays: number;
  timezone: string;
}

const DEFAULT_WINDOW_DAYS = 180;

/**
 * Working-day arithmetic over a single holiday set. Offsets walk one
 * calendar day at a time because holidays are irregular. Time of day is
 * carried through unchanged.
 */
export class BusinessCalendar {
  private readonly holidays: HolidaySet;

  constructor(
    extraHolidays: Holiday[] = [],
    readonly timezone = 'UTC'
  ) {
    this.holidays = new HolidaySet(extraHolidays);
  }

  isBusinessDay(date: Date): boolean {
    return !isWeekend(date) && !this.holidays.has(date);
  }

  describe(date: Date): CalendarDay {
    const holidayName = this.holidays.nameOf(date);
    return {
      date: dateKey(date),
      isBusinessDay: !isWeekend(date) && holidayName === undefined,
      ...(holidayName !== undefined ? { holidayName } : {}),
    };
  }

  offsetByBusinessDays(base: Date, n: number): Date {
    if (n === 0) return base;
    const step = n > 0 ? 1 : -1;
    let remaining = Math.abs(n);
    let current = base;
    while (remaining > 0) {
      current = addDays(current, step);
      if (this.isBusinessDay(current)) remaining -= 1;
    }
    return current;
  }

  nextBusinessDay(date: Date): Date {
    return this.offsetByBusinessDays(date, 1);
  }

  previousBusinessDay(date: Date): Date {
    return this.offsetByBusinessDays(date, -1);
  }

  businessDaysInRange(start: Date, end: Date): Date[] {
    const [from, to] = start.getTime() <= end.getTime() ? [start, end] : [end, start];
    const days: Date[] = [];
    for (let d = from; d.getTime() <= to.getTime(); d = addDays(d, 1)) {
      if (this.isBusinessDay(d)) days.push(d);
    }
    return days;
  }

  /** Falls back to the business day after `start` when the range has none. */
  randomBusinessDayInRange(rng: RandomSource, start: Date, end: Date): Date {
    const days = this.businessDaysInRange(start, end);
    if (days.length === 0) {
      return this.nextBusinessDay(start.getTime() <= end.getTime() ? start : end);
    }
    return pick(rng, days);
  }

  summarizeWindow(start: Date, end: Date): WindowSummary {
    const [from, to] = start.getTime() <= end.getTime() ? [start, end] : [end, start];
    const totalDays = wholeDaysBetween(startOfDay(from), startOfDay(to)) + 1;
    const businessDays = this.businessDaysInRange(startOfDay(from), startOfDay(to)).length;
    return {
      start: from,
      end: to,
      totalDays,
      businessDays,
      weekendDays: totalDays - businessDays,
      timezone: this.timezone,
    };
  }
}

/** The 180 days before `now`, day-aligned. */
export function defaultSimulationWindow(now: Date): { start: Date; end: Date } {
  return { start: addDays(startOfDay(now), -DEFAULT_WINDOW_DAYS), end: startOfDay(now) };
}

/**
 * Parses the simulation window. A malformed bound falls back to the
 * 180 days before `now`.
 */
export function parseSimulationWindow(
  startStr: string,
  endStr: string,
  now: Date
): { start: Date; end: Date } {
  const start = parseDate(startStr);
  const end = parseDate(endStr);
  if (!start || !end) {
    console.warn(
      `  [warn] Invalid simulation window "${startStr}".."${endStr}", ` +
      `using the last ${DEFAULT_WINDOW_DAYS} days`
    );
    return defaultSimulationWindow(now);
  }
  return start.getTime() <= end.getTime() ? { start, end } : { start: end, end: start };
}

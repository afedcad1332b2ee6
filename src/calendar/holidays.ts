import { dateKey } from './time.js';

export interface Holiday {
  date: string;
  name: string;
}

type HolidayRule = (year: number) => Date | null;

function fixed(month: number, day: number): HolidayRule {
  return (year) => new Date(Date.UTC(year, month - 1, day));
}

/** nth (1-based) occurrence of `dow` in the month; n = -1 means the last one. */
function nthWeekday(month: number, dow: number, n: number): HolidayRule {
  return (year) => {
    if (n > 0) {
      const first = new Date(Date.UTC(year, month - 1, 1));
      const offset = (dow - first.getUTCDay() + 7) % 7;
      return new Date(Date.UTC(year, month - 1, 1 + offset + (n - 1) * 7));
    }
    const last = new Date(Date.UTC(year, month, 0));
    const back = (last.getUTCDay() - dow + 7) % 7;
    return new Date(Date.UTC(year, month - 1, last.getUTCDate() - back));
  };
}

const US_FEDERAL: { name: string; rule: HolidayRule; observed: boolean }[] = [
  { name: "New Year's Day", rule: fixed(1, 1), observed: true },
  { name: 'Martin Luther King Jr. Day', rule: nthWeekday(1, 1, 3), observed: false },
  { name: "Washington's Birthday", rule: nthWeekday(2, 1, 3), observed: false },
  { name: 'Memorial Day', rule: nthWeekday(5, 1, -1), observed: false },
  {
    name: 'Juneteenth National Independence Day',
    rule: (year) => (year >= 2021 ? new Date(Date.UTC(year, 5, 19)) : null),
    observed: true,
  },
  { name: 'Independence Day', rule: fixed(7, 4), observed: true },
  { name: 'Labor Day', rule: nthWeekday(9, 1, 1), observed: false },
  { name: 'Columbus Day', rule: nthWeekday(10, 1, 2), observed: false },
  { name: 'Veterans Day', rule: fixed(11, 11), observed: true },
  { name: 'Thanksgiving', rule: nthWeekday(11, 4, 4), observed: false },
  { name: 'Christmas Day', rule: fixed(12, 25), observed: true },
];

function observedShift(date: Date): Date | null {
  const day = date.getUTCDay();
  if (day === 6) return new Date(date.getTime() - 86_400_000);
  if (day === 0) return new Date(date.getTime() + 86_400_000);
  return null;
}

export function usFederalHolidays(year: number): Holiday[] {
  const holidays: Holiday[] = [];
  for (const { name, rule, observed } of US_FEDERAL) {
    const date = rule(year);
    if (!date) continue;
    holidays.push({ date: dateKey(date), name });
    if (observed) {
      const shifted = observedShift(date);
      if (shifted) holidays.push({ date: dateKey(shifted), name: `${name} (observed)` });
    }
  }
  return holidays;
}

/**
 * Lazily materialised holiday lookup keyed by YYYY-MM-DD.
 * A year's table also pulls in next year's rules, since an observed
 * New Year's Day can land on December 31.
 */
export class HolidaySet {
  private readonly byYear = new Map<number, Map<string, string>>();
  private readonly extra = new Map<string, string>();

  constructor(extra: Holiday[] = []) {
    for (const h of extra) this.extra.set(h.date, h.name);
  }

  nameOf(date: Date): string | undefined {
    const key = dateKey(date);
    return this.extra.get(key) ?? this.tableFor(date.getUTCFullYear()).get(key);
  }

  has(date: Date): boolean {
    return this.nameOf(date) !== undefined;
  }

  private tableFor(year: number): Map<string, string> {
    let table = this.byYear.get(year);
    if (!table) {
      table = new Map();
      for (const h of [...usFederalHolidays(year), ...usFederalHolidays(year + 1)]) {
        if (h.date.startsWith(`${year}-`) && !table.has(h.date)) {
          table.set(h.date, h.name);
        }
      }
      this.byYear.set(year, table);
    }
    return table;
  }
}

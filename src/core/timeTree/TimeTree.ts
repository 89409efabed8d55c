import type { Entry, Journal } from '../journal/schema.js';
import { entryDay, entryMonth, entryYear } from '../journal/entry.js';

type DayBuckets = Map<number, Entry[]>;
type MonthBuckets = Map<number, DayBuckets>;

function sortedKeys(map: Map<number, unknown> | undefined): number[] {
  return map ? [...map.keys()].sort((a, b) => a - b) : [];
}

/**
 * Entries grouped by UTC year, month (1-12) and day of month.
 * Built once from a journal; bucket contents keep journal order.
 */
export class TimeTree {
  private readonly years = new Map<number, MonthBuckets>();
  private count = 0;

  private constructor() {}

  static build(journal: Pick<Journal, 'entries'>): TimeTree {
    const tree = new TimeTree();
    for (const entry of journal.entries) {
      tree.add(entry);
    }
    return tree;
  }

  private add(entry: Entry): void {
    const yearKey = entryYear(entry);
    const monthKey = entryMonth(entry);
    const dayKey = entryDay(entry);

    let months = this.years.get(yearKey);
    if (!months) {
      months = new Map();
      this.years.set(yearKey, months);
    }

    let days = months.get(monthKey);
    if (!days) {
      days = new Map();
      months.set(monthKey, days);
    }

    let entries = days.get(dayKey);
    if (!entries) {
      entries = [];
      days.set(dayKey, entries);
    }

    entries.push(entry);
    this.count += 1;
  }

  get size(): number {
    return this.count;
  }

  yearKeys(): number[] {
    return sortedKeys(this.years);
  }

  monthKeys(year: number): number[] {
    return sortedKeys(this.years.get(year));
  }

  dayKeys(year: number, month: number): number[] {
    return sortedKeys(this.years.get(year)?.get(month));
  }

  entries(year: number, month: number, day: number): readonly Entry[] {
    return this.years.get(year)?.get(month)?.get(day) ?? [];
  }
}

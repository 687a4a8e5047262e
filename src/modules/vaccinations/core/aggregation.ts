import { compareIsoDates } from './calendar-date.js';
import { ExactDecimal } from './types.js';

import type { Decimal } from 'decimal.js';

import type {
  Aggregates,
  CountryTotal,
  IsoDate,
  NormalizedRecord,
  SeriesEntry,
} from './types.js';

// Sums take the precision of the left operand, so folds start from this zero
const ZERO = new ExactDecimal(0);

const countOrZero = (record: NormalizedRecord): Decimal => record.totalVaccinations ?? ZERO;

/**
 * Sum of every count. Absent counts contribute zero.
 */
export function aggregateWorldwide(records: readonly NormalizedRecord[]): Decimal {
  return records.reduce((sum, record) => sum.plus(countOrZero(record)), ZERO);
}

/**
 * Per-location sums, highest first.
 *
 * Absent counts contribute zero, so a location whose rows are all absent
 * still appears with a total of 0. Equal totals keep the order in which the
 * locations were first seen (Array.prototype.sort is stable).
 */
export function aggregateByCountry(records: readonly NormalizedRecord[]): CountryTotal[] {
  // Map iteration follows insertion order, which is first-seen order
  const totals = new Map<string, Decimal>();

  for (const record of records) {
    const current = totals.get(record.location) ?? ZERO;
    totals.set(record.location, current.plus(countOrZero(record)));
  }

  return Array.from(totals, ([location, total]) => ({ location, total })).sort((a, b) =>
    b.total.comparedTo(a.total)
  );
}

/**
 * Per-(date, manufacturer) sums used as the charting series.
 *
 * Records without a count are dropped before grouping: an absent
 * measurement must not show up as a zero point. Entries are ordered by date,
 * then by the order in which each manufacturer first appears among the
 * measured records.
 */
export function aggregateByDateManufacturer(records: readonly NormalizedRecord[]): SeriesEntry[] {
  const byDate = new Map<IsoDate, Map<string, Decimal>>();
  const manufacturerRank = new Map<string, number>();

  for (const record of records) {
    const count = record.totalVaccinations;
    if (count === null) continue;

    if (!manufacturerRank.has(record.vaccine)) {
      manufacturerRank.set(record.vaccine, manufacturerRank.size);
    }

    let byVaccine = byDate.get(record.date);
    if (byVaccine === undefined) {
      byVaccine = new Map<string, Decimal>();
      byDate.set(record.date, byVaccine);
    }

    byVaccine.set(record.vaccine, (byVaccine.get(record.vaccine) ?? ZERO).plus(count));
  }

  const rankOf = (vaccine: string): number => manufacturerRank.get(vaccine) ?? Infinity;

  const dates = Array.from(byDate.keys()).sort(compareIsoDates);
  const series: SeriesEntry[] = [];

  for (const date of dates) {
    const byVaccine = byDate.get(date);
    if (byVaccine === undefined) continue;

    const vaccines = Array.from(byVaccine.keys()).sort((a, b) => rankOf(a) - rankOf(b));
    for (const vaccine of vaccines) {
      series.push({ key: { date, vaccine }, total: byVaccine.get(vaccine) ?? ZERO });
    }
  }

  return series;
}

/**
 * Runs the three reductions over the same records.
 */
export function aggregateAll(records: readonly NormalizedRecord[]): Aggregates {
  return {
    worldwideTotal: aggregateWorldwide(records),
    byCountry: aggregateByCountry(records),
    series: aggregateByDateManufacturer(records),
  };
}

/**
 * Sum of the per-country totals. Equals the worldwide total for any input.
 */
export function sumCountryTotals(byCountry: readonly CountryTotal[]): Decimal {
  return byCountry.reduce((sum, entry) => sum.plus(entry.total), ZERO);
}

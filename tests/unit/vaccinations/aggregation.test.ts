import { describe, expect, it } from 'vitest';

import {
  aggregateAll,
  aggregateByCountry,
  aggregateByDateManufacturer,
  aggregateWorldwide,
  sumCountryTotals,
} from '@/modules/vaccinations/core/aggregation.js';

import { makeNormalized } from '../../fixtures/fakes.js';

import type { CountryTotal, SeriesEntry } from '@/modules/vaccinations/core/types.js';

const countries = (rows: readonly CountryTotal[]): [string, string][] =>
  rows.map((row) => [row.location, row.total.toString()]);

const points = (entries: readonly SeriesEntry[]): [string, string, string][] =>
  entries.map((entry) => [entry.key.date, entry.key.vaccine, entry.total.toString()]);

describe('Aggregation', () => {
  describe('aggregateWorldwide', () => {
    it('sums every count', () => {
      const records = [
        makeNormalized('US', '2021-01-01', 'Pfizer', '1'),
        makeNormalized('US', '2021-01-02', 'Pfizer', '2'),
        makeNormalized('FR', '2021-01-01', 'Moderna', '0.5'),
      ];

      expect(aggregateWorldwide(records).toString()).toBe('3.5');
    });

    it('counts absent values as zero', () => {
      const records = [
        makeNormalized('US', '2021-01-01', 'Pfizer', '1'),
        makeNormalized('FR', '2021-01-01', 'Moderna', null),
      ];

      expect(aggregateWorldwide(records).toString()).toBe('1');
    });

    it('returns zero for empty input', () => {
      expect(aggregateWorldwide([]).toString()).toBe('0');
    });
  });

  describe('aggregateByCountry', () => {
    it('groups by location and sorts by total descending', () => {
      const records = [
        makeNormalized('FR', '2021-01-01', 'Moderna', '1'),
        makeNormalized('US', '2021-01-01', 'Pfizer', '2'),
        makeNormalized('US', '2021-01-02', 'Pfizer', '3'),
        makeNormalized('DE', '2021-01-01', 'Pfizer', '4'),
      ];

      expect(countries(aggregateByCountry(records))).toEqual([
        ['US', '5'],
        ['DE', '4'],
        ['FR', '1'],
      ]);
    });

    it('keeps a location whose counts are all absent with a zero total', () => {
      const records = [
        makeNormalized('FR', '2021-01-01', 'Moderna', null),
        makeNormalized('US', '2021-01-01', 'Pfizer', '1'),
      ];

      expect(countries(aggregateByCountry(records))).toEqual([
        ['US', '1'],
        ['FR', '0'],
      ]);
    });

    it('keeps first-seen order for equal totals', () => {
      const aa = makeNormalized('AA', '2021-01-01', 'Pfizer', '1');
      const bb = makeNormalized('BB', '2021-01-01', 'Pfizer', '1');
      const cc = makeNormalized('CC', '2021-01-01', 'Pfizer', '2');
      const forward = [aa, bb, cc];
      const reversed = [bb, aa, cc];

      expect(countries(aggregateByCountry(forward))).toEqual([
        ['CC', '2'],
        ['AA', '1'],
        ['BB', '1'],
      ]);
      expect(countries(aggregateByCountry(reversed))).toEqual([
        ['CC', '2'],
        ['BB', '1'],
        ['AA', '1'],
      ]);
    });

    it('has no duplicate locations', () => {
      const records = [
        makeNormalized('US', '2021-01-01', 'Pfizer', '1'),
        makeNormalized('US', '2021-01-01', 'Moderna', '1'),
        makeNormalized('US', '2021-01-02', 'Pfizer', null),
      ];

      const locations = aggregateByCountry(records).map((row) => row.location);
      expect(new Set(locations).size).toBe(locations.length);
      expect(locations).toEqual(['US']);
    });
  });

  describe('aggregateByDateManufacturer', () => {
    it('sums per date and manufacturer across locations', () => {
      const records = [
        makeNormalized('US', '2021-01-01', 'Pfizer', '1'),
        makeNormalized('FR', '2021-01-01', 'Pfizer', '2'),
      ];

      expect(points(aggregateByDateManufacturer(records))).toEqual([
        ['2021-01-01', 'Pfizer', '3'],
      ]);
    });

    it('orders by date, then by manufacturer first-seen order', () => {
      const records = [
        makeNormalized('US', '2021-01-02', 'Moderna', '1'),
        makeNormalized('US', '2021-01-01', 'Pfizer', '2'),
        makeNormalized('FR', '2021-01-01', 'Moderna', '3'),
        makeNormalized('FR', '2021-01-02', 'Pfizer', '4'),
      ];

      expect(points(aggregateByDateManufacturer(records))).toEqual([
        ['2021-01-01', 'Moderna', '3'],
        ['2021-01-01', 'Pfizer', '2'],
        ['2021-01-02', 'Moderna', '1'],
        ['2021-01-02', 'Pfizer', '4'],
      ]);
    });

    it('drops absent counts instead of treating them as zero', () => {
      const records = [
        makeNormalized('FR', '2021-01-01', 'Moderna', null),
        makeNormalized('US', '2021-01-01', 'Pfizer', '1'),
      ];

      expect(points(aggregateByDateManufacturer(records))).toEqual([
        ['2021-01-01', 'Pfizer', '1'],
      ]);
    });

    it('ranks manufacturers only by records that carry a count', () => {
      const records = [
        makeNormalized('US', '2021-01-01', 'Janssen', null),
        makeNormalized('US', '2021-01-01', 'Pfizer', '1'),
        makeNormalized('FR', '2021-01-01', 'Janssen', '2'),
      ];

      expect(points(aggregateByDateManufacturer(records))).toEqual([
        ['2021-01-01', 'Pfizer', '1'],
        ['2021-01-01', 'Janssen', '2'],
      ]);
    });

    it('keeps a measured zero', () => {
      const records = [makeNormalized('US', '2021-01-01', 'Pfizer', '0')];

      expect(points(aggregateByDateManufacturer(records))).toEqual([
        ['2021-01-01', 'Pfizer', '0'],
      ]);
    });
  });

  describe('aggregateAll', () => {
    it('computes the documented two-day example', () => {
      const records = [
        makeNormalized('US', '2021-01-01', 'Pfizer', '1'),
        makeNormalized('US', '2021-01-02', 'Pfizer', '2'),
      ];

      const aggregates = aggregateAll(records);

      expect(aggregates.worldwideTotal.toNumber()).toBe(3);
      expect(countries(aggregates.byCountry)).toEqual([['US', '3']]);
      expect(points(aggregates.series)).toEqual([
        ['2021-01-01', 'Pfizer', '1'],
        ['2021-01-02', 'Pfizer', '2'],
      ]);
    });

    it('returns empty views for empty input', () => {
      const aggregates = aggregateAll([]);

      expect(aggregates.worldwideTotal.toNumber()).toBe(0);
      expect(aggregates.byCountry).toEqual([]);
      expect(aggregates.series).toEqual([]);
    });

    it('keeps the worldwide total equal to the sum of country totals', () => {
      const records = [
        makeNormalized('US', '2021-01-01', 'Pfizer', '0.1'),
        makeNormalized('FR', '2021-01-01', 'Pfizer', '0.2'),
        makeNormalized('DE', '2021-01-01', 'Moderna', '0.000001'),
        makeNormalized('DE', '2021-01-02', 'Moderna', null),
        makeNormalized('US', '2021-01-02', 'Pfizer', '1234.567891'),
      ];

      const aggregates = aggregateAll(records);

      expect(aggregates.worldwideTotal.toString()).toBe('1234.867892');
      expect(sumCountryTotals(aggregates.byCountry).equals(aggregates.worldwideTotal)).toBe(true);
    });

    it('does not mutate its input', () => {
      const records = Object.freeze([
        makeNormalized('FR', '2021-01-02', 'Moderna', '1'),
        makeNormalized('US', '2021-01-01', 'Pfizer', '2'),
      ]);

      aggregateAll(records);

      expect(records.map((r) => r.location)).toEqual(['FR', 'US']);
    });

    it('produces identical tables on repeated runs', () => {
      const records = [
        makeNormalized('US', '2021-01-01', 'Pfizer', '1'),
        makeNormalized('FR', '2021-01-01', 'Moderna', '1'),
        makeNormalized('US', '2021-01-02', 'Moderna', null),
      ];

      const first = aggregateAll(records);
      const second = aggregateAll(records);

      expect(countries(second.byCountry)).toEqual(countries(first.byCountry));
      expect(points(second.series)).toEqual(points(first.series));
      expect(second.worldwideTotal.equals(first.worldwideTotal)).toBe(true);
    });
  });
});

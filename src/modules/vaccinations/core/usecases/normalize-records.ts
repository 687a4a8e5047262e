/**
 * Normalize Records Use Case
 *
 * Turns raw rows into typed records: strict date parsing, counts rescaled
 * to millions, absent counts kept as null. Repeated composite keys are
 * reported, never merged or dropped.
 */

import { err, ok, type Result } from 'neverthrow';

import { parseIsoDate } from '../calendar-date.js';
import { createInvalidDateError, type NormalizeError } from '../errors.js';
import { COUNT_SCALE, ExactDecimal } from '../types.js';

import type { Decimal } from 'decimal.js';

import type {
  DuplicateKey,
  IsoDate,
  NormalizeOptions,
  NormalizedRecord,
  RecordKey,
  SkippedRow,
  VaccinationRecord,
} from '../types.js';

export interface NormalizeRecordsResult {
  records: NormalizedRecord[];
  duplicates: DuplicateKey[];
  /** Total repeated rows, i.e. the sum of `rowNumbers.length` over `duplicates` */
  duplicateCount: number;
  skipped: SkippedRow[];
}

interface KeyOccurrence {
  key: RecordKey;
  firstRowNumber: number;
  repeats: number[];
}

/**
 * location -> date -> vaccine -> occurrence
 */
type KeyIndex = Map<string, Map<IsoDate, Map<string, KeyOccurrence>>>;

const trackKey = (index: KeyIndex, record: NormalizedRecord): void => {
  let byDate = index.get(record.location);
  if (byDate === undefined) {
    byDate = new Map();
    index.set(record.location, byDate);
  }

  let byVaccine = byDate.get(record.date);
  if (byVaccine === undefined) {
    byVaccine = new Map();
    byDate.set(record.date, byVaccine);
  }

  const existing = byVaccine.get(record.vaccine);
  if (existing === undefined) {
    byVaccine.set(record.vaccine, {
      key: { location: record.location, date: record.date, vaccine: record.vaccine },
      firstRowNumber: record.rowNumber,
      repeats: [],
    });
    return;
  }

  existing.repeats.push(record.rowNumber);
};

const collectDuplicates = (index: KeyIndex): DuplicateKey[] => {
  const duplicates: DuplicateKey[] = [];

  for (const byDate of index.values()) {
    for (const byVaccine of byDate.values()) {
      for (const occurrence of byVaccine.values()) {
        if (occurrence.repeats.length > 0) {
          duplicates.push({
            key: occurrence.key,
            firstRowNumber: occurrence.firstRowNumber,
            rowNumbers: occurrence.repeats,
          });
        }
      }
    }
  }

  // Report in source order
  return duplicates.sort((a, b) => a.firstRowNumber - b.firstRowNumber);
};

/**
 * Scales a validated count to millions. The loader guarantees the text is a
 * plain non-negative decimal.
 */
export const scaleCount = (count: string): Decimal =>
  new ExactDecimal(count).div(COUNT_SCALE);

export const normalizeRecords = (
  records: readonly VaccinationRecord[],
  options: NormalizeOptions = {}
): Result<NormalizeRecordsResult, NormalizeError> => {
  const normalized: NormalizedRecord[] = [];
  const skipped: SkippedRow[] = [];
  const index: KeyIndex = new Map();

  for (const record of records) {
    const date = parseIsoDate(record.date);

    if (date === null) {
      const error = createInvalidDateError(record.rowNumber, record.date);
      if (options.lenient !== true) {
        return err(error);
      }
      skipped.push({ rowNumber: record.rowNumber, type: error.type, message: error.message });
      continue;
    }

    const next: NormalizedRecord = {
      location: record.location,
      date,
      vaccine: record.vaccine,
      totalVaccinations:
        record.totalVaccinations === null ? null : scaleCount(record.totalVaccinations),
      rowNumber: record.rowNumber,
    };

    trackKey(index, next);
    normalized.push(next);
  }

  const duplicates = collectDuplicates(index);

  return ok({
    records: normalized,
    duplicates,
    duplicateCount: duplicates.reduce((sum, duplicate) => sum + duplicate.rowNumbers.length, 0),
    skipped,
  });
};

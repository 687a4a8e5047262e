/**
 * Test fakes and record builders
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { parseIsoDate } from '@/modules/vaccinations/core/calendar-date.js';
import { parseVaccinationCsv } from '@/modules/vaccinations/shell/source/csv-parser.js';

import type { LoadError, MalformedRowError } from '@/modules/vaccinations/core/errors.js';
import type { LoadedRecords, VaccinationSource } from '@/modules/vaccinations/core/ports.js';
import type {
  IsoDate,
  LoadOptions,
  NormalizedRecord,
  VaccinationRecord,
} from '@/modules/vaccinations/core/types.js';

export const CSV_HEADER = 'location,date,vaccine,total_vaccinations';

/**
 * Builds CSV text from data lines, prefixed with the standard header.
 */
export const csv = (...lines: string[]): string => [CSV_HEADER, ...lines].join('\n') + '\n';

export const isoDate = (value: string): IsoDate => {
  const parsed = parseIsoDate(value);
  if (parsed === null) {
    throw new Error(`Invalid test date '${value}'`);
  }
  return parsed;
};

/**
 * Raw record with sensible defaults. Row numbers start after the header.
 */
export const makeRecord = (overrides: Partial<VaccinationRecord> = {}): VaccinationRecord => ({
  location: 'Atlantis',
  date: '2021-01-01',
  vaccine: 'Pfizer/BioNTech',
  totalVaccinations: '1000000',
  rowNumber: 2,
  ...overrides,
});

/**
 * Normalized record; `millions` is the already scaled count, null when absent.
 */
export const makeNormalized = (
  location: string,
  date: string,
  vaccine: string,
  millions: string | null,
  rowNumber = 2
): NormalizedRecord => ({
  location,
  date: isoDate(date),
  vaccine,
  totalVaccinations: millions === null ? null : new Decimal(millions),
  rowNumber,
});

export interface FakeVaccinationSource extends VaccinationSource {
  readonly loadCalls: LoadOptions[];
}

export const makeFakeVaccinationSource = (
  options: {
    records?: VaccinationRecord[];
    skipped?: MalformedRowError[];
    error?: LoadError;
  } = {}
): FakeVaccinationSource => {
  const loadCalls: LoadOptions[] = [];

  return {
    description: 'fake',
    loadCalls,
    async load(loadOptions: LoadOptions = {}): Promise<Result<LoadedRecords, LoadError>> {
      loadCalls.push(loadOptions);

      if (options.error !== undefined) {
        return err(options.error);
      }

      return ok({ records: options.records ?? [], skipped: options.skipped ?? [] });
    },
  };
};

/**
 * Source over CSV text in memory, parsed exactly like a file source.
 */
export const makeCsvSource = (content: string): VaccinationSource => ({
  description: 'inline-csv',
  async load(loadOptions: LoadOptions = {}): Promise<Result<LoadedRecords, LoadError>> {
    return parseVaccinationCsv(content, loadOptions).mapErr((error): LoadError => error);
  },
});

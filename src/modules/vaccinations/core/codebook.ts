import { type Static, Type } from '@sinclair/typebox';
import type { Decimal } from 'decimal.js';

import type { NormalizedRecord, SourceColumn } from './types.js';

const ColumnDescriptionSchema = Type.Object({
  label: Type.String({ minLength: 1 }),
  description: Type.String(),
  unit: Type.Optional(Type.String({ description: 'Unit after normalization, e.g. millions' })),
});

export const CodebookFileSchema = Type.Object({
  title: Type.String(),
  source: Type.Optional(Type.String()),
  columns: Type.Object({
    location: ColumnDescriptionSchema,
    date: ColumnDescriptionSchema,
    vaccine: ColumnDescriptionSchema,
    total_vaccinations: ColumnDescriptionSchema,
  }),
});

export type CodebookFileDTO = Static<typeof CodebookFileSchema>;

export type ColumnDescription = Static<typeof ColumnDescriptionSchema>;

export type ColumnType = 'text' | 'date' | 'number';

export interface CodebookEntry {
  name: SourceColumn;
  label: string;
  type: ColumnType;
  description: string;
  unit: string | null;
  /** Rows without a value */
  missing: number;
  /** Distinct non-missing values */
  distinct: number;
  /** Smallest value for date and number columns */
  min: string | null;
  max: string | null;
}

export interface Codebook {
  title: string;
  source: string | null;
  rowCount: number;
  columns: CodebookEntry[];
}

interface ColumnStats {
  missing: number;
  distinct: number;
  min: string | null;
  max: string | null;
}

const textStats = (values: readonly string[]): ColumnStats => ({
  missing: 0,
  distinct: new Set(values).size,
  min: null,
  max: null,
});

const dateStats = (values: readonly string[]): ColumnStats => {
  const sorted = [...new Set(values)].sort();
  return {
    missing: 0,
    distinct: sorted.length,
    min: sorted[0] ?? null,
    max: sorted[sorted.length - 1] ?? null,
  };
};

const numberStats = (values: readonly (Decimal | null)[]): ColumnStats => {
  const present = values.filter((value): value is Decimal => value !== null);
  const distinct = new Set(present.map((value) => value.toString())).size;

  const [first, ...rest] = present;
  if (first === undefined) {
    return { missing: values.length, distinct: 0, min: null, max: null };
  }

  let min = first;
  let max = first;
  for (const value of rest) {
    if (value.lessThan(min)) min = value;
    if (value.greaterThan(max)) max = value;
  }

  return {
    missing: values.length - present.length,
    distinct,
    min: min.toString(),
    max: max.toString(),
  };
};

const toEntry = (
  name: SourceColumn,
  type: ColumnType,
  description: ColumnDescription,
  stats: ColumnStats
): CodebookEntry => ({
  name,
  label: description.label,
  type,
  description: description.description,
  unit: description.unit ?? null,
  ...stats,
});

/**
 * Data dictionary of the normalized table: one entry per source column with
 * its description and value statistics.
 */
export const buildCodebook = (
  records: readonly NormalizedRecord[],
  file: CodebookFileDTO
): Codebook => ({
  title: file.title,
  source: file.source ?? null,
  rowCount: records.length,
  columns: [
    toEntry(
      'location',
      'text',
      file.columns.location,
      textStats(records.map((r) => r.location))
    ),
    toEntry('date', 'date', file.columns.date, dateStats(records.map((r) => r.date))),
    toEntry('vaccine', 'text', file.columns.vaccine, textStats(records.map((r) => r.vaccine))),
    toEntry(
      'total_vaccinations',
      'number',
      file.columns.total_vaccinations,
      numberStats(records.map((r) => r.totalVaccinations))
    ),
  ],
});

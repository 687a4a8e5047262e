import { Decimal } from 'decimal.js';

/**
 * Divisor applied to raw vaccination counts. Derived values are in millions.
 */
export const COUNT_SCALE = 1_000_000;

/**
 * Decimal constructor for counts and their sums. Scaling a count or adding
 * two counts must never round: the worldwide total and the sum of country
 * totals are compared for exact equality.
 */
export const ExactDecimal = Decimal.clone({ precision: 1e9 });

/**
 * Header names the source must provide. Extra columns are ignored.
 */
export const REQUIRED_COLUMNS = ['location', 'date', 'vaccine', 'total_vaccinations'] as const;

export type SourceColumn = (typeof REQUIRED_COLUMNS)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One raw row of the vaccinations table, as read from the source.
 */
export interface VaccinationRecord {
  readonly location: string;
  /** Unparsed `YYYY-MM-DD` text */
  readonly date: string;
  /** Manufacturer label; combined labels such as "Pfizer/BioNTech, Moderna" stay whole */
  readonly vaccine: string;
  /** Cumulative count as plain decimal text, or null when the cell is empty */
  readonly totalVaccinations: string | null;
  /** Physical line in the source; the header is line 1 */
  readonly rowNumber: number;
}

/**
 * Calendar date in `YYYY-MM-DD` form. String order is chronological order.
 */
export type IsoDate = string & { readonly __brand: 'IsoDate' };

export interface NormalizedRecord {
  readonly location: string;
  readonly date: IsoDate;
  readonly vaccine: string;
  /** Count in millions; null when the source had no measurement */
  readonly totalVaccinations: Decimal | null;
  readonly rowNumber: number;
}

/**
 * Identity of a record. Expected unique across the source.
 */
export interface RecordKey {
  readonly location: string;
  readonly date: IsoDate;
  readonly vaccine: string;
}

/**
 * Grouping key of the manufacturer series.
 */
export interface SeriesKey {
  readonly date: IsoDate;
  readonly vaccine: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Aggregates
// ─────────────────────────────────────────────────────────────────────────────

export interface CountryTotal {
  readonly location: string;
  readonly total: Decimal;
}

export interface SeriesEntry {
  readonly key: SeriesKey;
  readonly total: Decimal;
}

export interface Aggregates {
  /** Sum of all counts, absent counted as zero */
  readonly worldwideTotal: Decimal;
  /** One entry per location, total descending, ties in first-seen order */
  readonly byCountry: readonly CountryTotal[];
  /** Measured counts only, date ascending then manufacturer first-seen order */
  readonly series: readonly SeriesEntry[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Stage outputs
// ─────────────────────────────────────────────────────────────────────────────

export interface LoadOptions {
  /** Skip malformed rows instead of failing */
  lenient?: boolean | undefined;
}

export interface NormalizeOptions {
  /** Skip rows with an invalid date instead of failing */
  lenient?: boolean | undefined;
}

export interface DuplicateKey {
  readonly key: RecordKey;
  /** Rows that repeat a key already seen earlier in the input */
  readonly rowNumbers: readonly number[];
  /** Row that first carried the key */
  readonly firstRowNumber: number;
}

export interface PipelineDiagnostics {
  /** Rows returned by the loader */
  readonly recordCount: number;
  /** Rows that reached aggregation */
  readonly normalizedCount: number;
  /** Normalized rows without a count */
  readonly absentCountRecords: number;
  /** Total number of repeated rows across all duplicate keys */
  readonly duplicateCount: number;
  readonly duplicateKeys: readonly DuplicateKey[];
  /** Rows dropped in lenient mode, with the reason each was dropped */
  readonly skippedRows: readonly SkippedRow[];
}

export interface SkippedRow {
  readonly rowNumber: number;
  readonly type: 'MalformedRow' | 'InvalidDate';
  readonly message: string;
}

export interface PipelineResult {
  readonly aggregates: Aggregates;
  readonly diagnostics: PipelineDiagnostics;
  /** Raw records, kept for consumers such as the codebook */
  readonly records: readonly VaccinationRecord[];
  readonly normalized: readonly NormalizedRecord[];
}

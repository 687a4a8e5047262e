/**
 * Domain error types for the vaccinations pipeline.
 */

import type { AppError } from '../../../common/types/errors.js';
import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

export interface SourceUnavailableError extends AppError {
  readonly type: 'SourceUnavailable';
  readonly path: string;
}

export type MalformedRowReason =
  | 'MissingColumn'
  | 'ColumnCount'
  | 'MissingField'
  | 'NonNumericCount'
  | 'NegativeCount'
  | 'Syntax';

export interface MalformedRowError extends AppError {
  readonly type: 'MalformedRow';
  readonly reason: MalformedRowReason;
  /** Physical line in the source; the header is line 1 */
  readonly rowNumber: number;
  readonly raw: string;
}

export interface InvalidDateError extends AppError {
  readonly type: 'InvalidDate';
  readonly rowNumber: number;
  readonly value: string;
}

export interface AggregationMismatchError extends AppError {
  readonly type: 'AggregationMismatch';
  readonly worldwideTotal: string;
  readonly countrySum: string;
}

export interface CodebookInvalidError extends AppError {
  readonly type: 'CodebookInvalid';
  readonly path: string;
  readonly details: readonly string[];
}

export interface ReportWriteError extends AppError {
  readonly type: 'ReportWriteError';
  readonly path: string;
}

export type LoadError = SourceUnavailableError | MalformedRowError;

export type NormalizeError = InvalidDateError;

export type PipelineError = LoadError | NormalizeError | AggregationMismatchError;

export type CodebookError = SourceUnavailableError | CodebookInvalidError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Factories
// ─────────────────────────────────────────────────────────────────────────────

export const createSourceUnavailableError = (
  path: string,
  message: string,
  cause?: unknown
): SourceUnavailableError => ({
  type: 'SourceUnavailable',
  message,
  path,
  cause,
});

export const createMalformedRowError = (
  reason: MalformedRowReason,
  rowNumber: number,
  raw: string,
  message: string
): MalformedRowError => ({
  type: 'MalformedRow',
  message: `Row ${String(rowNumber)}: ${message}`,
  reason,
  rowNumber,
  raw,
});

export const createInvalidDateError = (rowNumber: number, value: string): InvalidDateError => ({
  type: 'InvalidDate',
  message: `Row ${String(rowNumber)}: expected a YYYY-MM-DD calendar date, got '${value}'`,
  rowNumber,
  value,
});

export const createAggregationMismatchError = (
  worldwideTotal: Decimal,
  countrySum: Decimal
): AggregationMismatchError => ({
  type: 'AggregationMismatch',
  message: `Worldwide total ${worldwideTotal.toString()} does not match the sum of country totals ${countrySum.toString()}`,
  worldwideTotal: worldwideTotal.toString(),
  countrySum: countrySum.toString(),
});

export const createCodebookInvalidError = (
  path: string,
  message: string,
  details: readonly string[] = []
): CodebookInvalidError => ({
  type: 'CodebookInvalid',
  message,
  path,
  details,
});

export const createReportWriteError = (
  path: string,
  message: string,
  cause?: unknown
): ReportWriteError => ({
  type: 'ReportWriteError',
  message,
  path,
  cause,
});

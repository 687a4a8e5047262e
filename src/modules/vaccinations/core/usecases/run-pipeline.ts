/**
 * Run Pipeline Use Case
 *
 * Loads the source, normalizes it and computes the three aggregate views.
 * A failure at any stage returns the error and no tables.
 */

import { err, ok, type Result } from 'neverthrow';

import { normalizeRecords } from './normalize-records.js';
import { aggregateAll, sumCountryTotals } from '../aggregation.js';
import { createAggregationMismatchError, type PipelineError } from '../errors.js';

import type { VaccinationSource } from '../ports.js';
import type { PipelineResult, SkippedRow } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RunPipelineDeps {
  source: VaccinationSource;
  logger: Logger;
}

export interface RunPipelineInput {
  /**
   * Skip malformed rows and invalid dates instead of failing.
   * Skipped rows are listed in the diagnostics.
   */
  lenient?: boolean | undefined;
}

/**
 * Duplicate keys listed individually in the warning log; the full list is
 * always in the diagnostics.
 */
const MAX_LOGGED_DUPLICATES = 5;

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const runPipeline = async (
  deps: RunPipelineDeps,
  input: RunPipelineInput = {}
): Promise<Result<PipelineResult, PipelineError>> => {
  const { source, logger } = deps;
  const lenient = input.lenient === true;

  const log = logger.child({ usecase: 'runPipeline' });

  log.info({ source: source.description, lenient }, 'Loading vaccination records');

  const loadResult = await source.load({ lenient });
  if (loadResult.isErr()) {
    log.error({ error: loadResult.error }, 'Failed to load vaccination records');
    return err(loadResult.error);
  }

  const { records, skipped: malformed } = loadResult.value;

  if (malformed.length > 0) {
    log.warn({ count: malformed.length }, 'Skipped malformed rows');
  }

  const normalizeResult = normalizeRecords(records, { lenient });
  if (normalizeResult.isErr()) {
    log.error({ error: normalizeResult.error }, 'Failed to normalize vaccination records');
    return err(normalizeResult.error);
  }

  const normalized = normalizeResult.value;

  if (normalized.skipped.length > 0) {
    log.warn({ count: normalized.skipped.length }, 'Skipped rows with invalid dates');
  }

  if (normalized.duplicateCount > 0) {
    log.warn(
      {
        duplicateCount: normalized.duplicateCount,
        keys: normalized.duplicates.slice(0, MAX_LOGGED_DUPLICATES).map((d) => d.key),
      },
      'Duplicate (location, date, vaccine) rows found; they are counted in every total'
    );
  }

  const aggregates = aggregateAll(normalized.records);

  const countrySum = sumCountryTotals(aggregates.byCountry);
  if (!countrySum.equals(aggregates.worldwideTotal)) {
    const error = createAggregationMismatchError(aggregates.worldwideTotal, countrySum);
    log.error({ error }, 'Aggregate cross-check failed');
    return err(error);
  }

  const skippedRows: SkippedRow[] = [
    ...malformed.map((row) => ({
      rowNumber: row.rowNumber,
      type: row.type,
      message: row.message,
    })),
    ...normalized.skipped,
  ].sort((a, b) => a.rowNumber - b.rowNumber);

  const absentCountRecords = normalized.records.filter(
    (record) => record.totalVaccinations === null
  ).length;

  log.info(
    {
      recordCount: records.length,
      countries: aggregates.byCountry.length,
      seriesPoints: aggregates.series.length,
      worldwideTotal: aggregates.worldwideTotal.toString(),
    },
    'Aggregation completed'
  );

  return ok({
    aggregates,
    diagnostics: {
      recordCount: records.length,
      normalizedCount: normalized.records.length,
      absentCountRecords,
      duplicateCount: normalized.duplicateCount,
      duplicateKeys: normalized.duplicates,
      skippedRows,
    },
    records,
    normalized: normalized.records,
  });
};

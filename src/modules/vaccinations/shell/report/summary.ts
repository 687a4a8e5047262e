import type { PipelineResult } from '../../core/types.js';
import type { Decimal } from 'decimal.js';

export interface FormatSummaryOptions {
  /** Countries listed, highest total first */
  top?: number | undefined;
}

const DEFAULT_TOP = 10;

const formatMillions = (value: Decimal): string => `${value.toFixed(2)}M`;

/**
 * Plain-text overview of a pipeline run for the terminal.
 */
export const formatSummary = (result: PipelineResult, options: FormatSummaryOptions = {}): string => {
  const { aggregates, diagnostics } = result;
  const top = Math.max(0, options.top ?? DEFAULT_TOP);

  const lines: string[] = [
    `Worldwide total: ${formatMillions(aggregates.worldwideTotal)}`,
    `Records: ${String(diagnostics.recordCount)} (${String(diagnostics.absentCountRecords)} without a count)`,
    `Countries: ${String(aggregates.byCountry.length)}`,
    `Series points: ${String(aggregates.series.length)}`,
  ];

  if (diagnostics.duplicateCount > 0) {
    lines.push(`Duplicate rows: ${String(diagnostics.duplicateCount)}`);
  }

  if (diagnostics.skippedRows.length > 0) {
    lines.push(`Skipped rows: ${String(diagnostics.skippedRows.length)}`);
  }

  const leaders = aggregates.byCountry.slice(0, top);
  if (leaders.length > 0) {
    lines.push('', `Top ${String(leaders.length)} countries:`);
    leaders.forEach((row, position) => {
      lines.push(`${String(position + 1).padStart(3)}. ${row.location}: ${formatMillions(row.total)}`);
    });
  }

  return lines.join('\n');
};

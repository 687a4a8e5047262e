import type { Codebook } from '../../core/codebook.js';
import type { PipelineDiagnostics, PipelineResult } from '../../core/types.js';

export interface ReportCountryRow {
  location: string;
  total: number;
}

export interface ReportSeriesRow {
  date: string;
  vaccine: string;
  total: number;
}

/**
 * JSON document handed to chart and dictionary renderers.
 * Totals are in millions, unrounded.
 */
export interface ReportDocument {
  generatedAt: string;
  unit: 'millions';
  worldwideTotal: number;
  byCountry: ReportCountryRow[];
  series: ReportSeriesRow[];
  codebook: Codebook | null;
  diagnostics: PipelineDiagnostics;
}

export interface ToReportDocumentInput {
  result: PipelineResult;
  codebook?: Codebook | null | undefined;
  generatedAt?: Date | undefined;
}

export const toReportDocument = (input: ToReportDocumentInput): ReportDocument => {
  const { aggregates, diagnostics } = input.result;

  return {
    generatedAt: (input.generatedAt ?? new Date()).toISOString(),
    unit: 'millions',
    worldwideTotal: aggregates.worldwideTotal.toNumber(),
    byCountry: aggregates.byCountry.map((row) => ({
      location: row.location,
      total: row.total.toNumber(),
    })),
    series: aggregates.series.map((entry) => ({
      date: entry.key.date,
      vaccine: entry.key.vaccine,
      total: entry.total.toNumber(),
    })),
    codebook: input.codebook ?? null,
    diagnostics,
  };
};

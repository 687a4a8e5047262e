// Source
export { createCsvVaccinationSource, type CsvSourceOptions } from './shell/source/csv-source.js';
export { parseVaccinationCsv } from './shell/source/csv-parser.js';
export type { VaccinationSource, LoadedRecords } from './core/ports.js';

// Use cases
export {
  normalizeRecords,
  scaleCount,
  type NormalizeRecordsResult,
} from './core/usecases/normalize-records.js';
export {
  runPipeline,
  type RunPipelineDeps,
  type RunPipelineInput,
} from './core/usecases/run-pipeline.js';

// Aggregation
export {
  aggregateWorldwide,
  aggregateByCountry,
  aggregateByDateManufacturer,
  aggregateAll,
  sumCountryTotals,
} from './core/aggregation.js';
export { parseIsoDate, compareIsoDates } from './core/calendar-date.js';

// Codebook
export {
  buildCodebook,
  CodebookFileSchema,
  type Codebook,
  type CodebookEntry,
  type CodebookFileDTO,
  type ColumnType,
} from './core/codebook.js';
export { loadCodebookFile } from './shell/codebook/yaml-codebook.js';

// Report
export {
  toReportDocument,
  type ReportDocument,
  type ReportCountryRow,
  type ReportSeriesRow,
} from './shell/report/report-document.js';
export { writeReport } from './shell/report/json-writer.js';
export { formatSummary, type FormatSummaryOptions } from './shell/report/summary.js';

// Types
export { COUNT_SCALE, ExactDecimal, REQUIRED_COLUMNS } from './core/types.js';
export type {
  VaccinationRecord,
  NormalizedRecord,
  IsoDate,
  RecordKey,
  SeriesKey,
  CountryTotal,
  SeriesEntry,
  Aggregates,
  DuplicateKey,
  SkippedRow,
  PipelineDiagnostics,
  PipelineResult,
  LoadOptions,
  NormalizeOptions,
  SourceColumn,
} from './core/types.js';

// Errors
export type {
  SourceUnavailableError,
  MalformedRowError,
  MalformedRowReason,
  InvalidDateError,
  AggregationMismatchError,
  CodebookInvalidError,
  ReportWriteError,
  LoadError,
  NormalizeError,
  PipelineError,
  CodebookError,
} from './core/errors.js';

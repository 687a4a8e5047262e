import { CsvError, parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import { getErrorMessage } from '../../../../common/types/errors.js';
import { createMalformedRowError, type MalformedRowError } from '../../core/errors.js';
import {
  REQUIRED_COLUMNS,
  type LoadOptions,
  type SourceColumn,
  type VaccinationRecord,
} from '../../core/types.js';

import type { LoadedRecords } from '../../core/ports.js';

const COUNT_RE = /^\d+(\.\d+)?$/;
const NEGATIVE_COUNT_RE = /^-\d+(\.\d+)?$/;

interface ParsedLine {
  record: string[];
  raw: string;
  lineNumber: number;
}

type ColumnIndex = Record<SourceColumn, number>;

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((cell) => typeof cell === 'string');

/**
 * Shape produced by csv-parse with `info: true` and `raw: true`.
 */
const toParsedLine = (value: unknown): ParsedLine | null => {
  if (typeof value !== 'object' || value === null) return null;
  if (!('record' in value) || !('info' in value)) return null;

  const { record, info } = value;
  if (!isStringArray(record)) return null;
  if (typeof info !== 'object' || info === null || !('lines' in info)) return null;

  const { lines } = info;
  if (typeof lines !== 'number') return null;

  const raw = 'raw' in value && typeof value.raw === 'string' ? value.raw : record.join(',');

  return { record, raw: raw.replace(/\r?\n$/, ''), lineNumber: lines };
};

const lineOfCsvError = (error: CsvError): number => {
  const lines: unknown = error['lines'];
  return typeof lines === 'number' ? lines : 0;
};

/**
 * Text of a 1-based physical line, without the byte order mark.
 */
const sourceLine = (content: string, lineNumber: number): string => {
  const line = content.split(/\r?\n/)[lineNumber - 1] ?? '';
  return lineNumber === 1 ? line.replace(/^\uFEFF/, '') : line;
};

const resolveColumns = (header: ParsedLine): Result<ColumnIndex, MalformedRowError> => {
  const positions = new Map(header.record.map((name, position) => [name, position]));
  const missing = REQUIRED_COLUMNS.filter((column) => !positions.has(column));

  const [location, date, vaccine, total] = REQUIRED_COLUMNS.map((column) => positions.get(column));
  if (
    missing.length > 0 ||
    location === undefined ||
    date === undefined ||
    vaccine === undefined ||
    total === undefined
  ) {
    return err(
      createMalformedRowError(
        'MissingColumn',
        header.lineNumber,
        header.raw,
        `header is missing required column(s): ${missing.join(', ')}`
      )
    );
  }

  return ok({ location, date, vaccine, total_vaccinations: total });
};

const cellAt = (line: ParsedLine, position: number): string => line.record[position] ?? '';

const toRecord = (
  line: ParsedLine,
  columns: ColumnIndex,
  width: number
): Result<VaccinationRecord, MalformedRowError> => {
  if (line.record.length !== width) {
    return err(
      createMalformedRowError(
        'ColumnCount',
        line.lineNumber,
        line.raw,
        `expected ${String(width)} columns, got ${String(line.record.length)}`
      )
    );
  }

  const location = cellAt(line, columns.location);
  const date = cellAt(line, columns.date);
  const vaccine = cellAt(line, columns.vaccine);
  const count = cellAt(line, columns.total_vaccinations);

  const emptyField = (
    [
      ['location', location],
      ['date', date],
      ['vaccine', vaccine],
    ] as const
  ).find(([, value]) => value === '');

  if (emptyField !== undefined) {
    return err(
      createMalformedRowError(
        'MissingField',
        line.lineNumber,
        line.raw,
        `required field '${emptyField[0]}' is empty`
      )
    );
  }

  if (count !== '' && !COUNT_RE.test(count)) {
    const negative = NEGATIVE_COUNT_RE.test(count);
    return err(
      createMalformedRowError(
        negative ? 'NegativeCount' : 'NonNumericCount',
        line.lineNumber,
        line.raw,
        negative
          ? `total_vaccinations must not be negative, got '${count}'`
          : `total_vaccinations is not a number: '${count}'`
      )
    );
  }

  return ok({
    location,
    date,
    vaccine,
    totalVaccinations: count === '' ? null : count,
    rowNumber: line.lineNumber,
  });
};

/**
 * Parses CSV text into raw vaccination records.
 *
 * The first line is the header and must name every required column.
 * Empty lines are ignored. An empty count cell is an absent measurement.
 */
export const parseVaccinationCsv = (
  content: string,
  options: LoadOptions = {}
): Result<LoadedRecords, MalformedRowError> => {
  let rows: unknown;

  try {
    rows = parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
      info: true,
      raw: true,
    });
  } catch (error) {
    if (error instanceof CsvError) {
      const lineNumber = lineOfCsvError(error);
      const raw = sourceLine(content, lineNumber);
      return err(createMalformedRowError('Syntax', lineNumber, raw, error.message));
    }
    return err(createMalformedRowError('Syntax', 0, '', getErrorMessage(error)));
  }

  if (!Array.isArray(rows)) {
    return err(createMalformedRowError('Syntax', 0, '', 'parser returned no rows'));
  }

  const lines: ParsedLine[] = [];
  for (const row of rows) {
    const line = toParsedLine(row);
    if (line === null) {
      return err(createMalformedRowError('Syntax', 0, '', 'unexpected parser output'));
    }
    lines.push(line);
  }

  const [header, ...body] = lines;

  // A source with no header at all holds no records
  if (header === undefined) {
    return ok({ records: [], skipped: [] });
  }

  const columnsResult = resolveColumns(header);
  if (columnsResult.isErr()) {
    return err(columnsResult.error);
  }

  const records: VaccinationRecord[] = [];
  const skipped: MalformedRowError[] = [];

  for (const line of body) {
    const recordResult = toRecord(line, columnsResult.value, header.record.length);

    if (recordResult.isErr()) {
      if (options.lenient !== true) {
        return err(recordResult.error);
      }
      skipped.push(recordResult.error);
      continue;
    }

    records.push(recordResult.value);
  }

  return ok({ records, skipped });
};

import fs from 'node:fs/promises';

import { err, ok, type Result } from 'neverthrow';

import { parseVaccinationCsv } from './csv-parser.js';
import { getErrorCode, getErrorMessage } from '../../../../common/types/errors.js';
import { createSourceUnavailableError, type LoadError } from '../../core/errors.js';

import type { LoadedRecords, VaccinationSource } from '../../core/ports.js';
import type { LoadOptions } from '../../core/types.js';

export interface CsvSourceOptions {
  filePath: string;
  encoding?: BufferEncoding;
}

const readSourceFile = async (
  filePath: string,
  encoding: BufferEncoding
): Promise<Result<string, LoadError>> => {
  try {
    return ok(await fs.readFile(filePath, encoding));
  } catch (error) {
    const code = getErrorCode(error);
    if (code === 'ENOENT') {
      return err(
        createSourceUnavailableError(filePath, `Source file not found at ${filePath}`, error)
      );
    }

    return err(
      createSourceUnavailableError(
        filePath,
        `Failed to read source file at ${filePath}: ${getErrorMessage(error)}`,
        error
      )
    );
  }
};

/**
 * Vaccination source backed by a CSV file on disk.
 * The file is read again on every `load` call.
 */
export const createCsvVaccinationSource = (options: CsvSourceOptions): VaccinationSource => {
  const encoding = options.encoding ?? 'utf8';

  return {
    description: options.filePath,

    async load(loadOptions: LoadOptions = {}): Promise<Result<LoadedRecords, LoadError>> {
      const contents = await readSourceFile(options.filePath, encoding);
      if (contents.isErr()) {
        return err(contents.error);
      }

      return parseVaccinationCsv(contents.value, loadOptions).mapErr((error): LoadError => error);
    },
  };
};

import type { Result } from 'neverthrow';

import type { LoadError, MalformedRowError } from './errors.js';
import type { LoadOptions, VaccinationRecord } from './types.js';

export interface LoadedRecords {
  records: VaccinationRecord[];
  /** Rows dropped in lenient mode; always empty otherwise */
  skipped: MalformedRowError[];
}

export interface VaccinationSource {
  /**
   * Human-readable location of the source, used in logs.
   */
  readonly description: string;

  /**
   * Read every row of the source.
   * Fails on the first malformed row unless `lenient` is set.
   */
  load(options?: LoadOptions): Promise<Result<LoadedRecords, LoadError>>;
}

import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { getErrorMessage } from '../../../../common/types/errors.js';
import { createReportWriteError, type ReportWriteError } from '../../core/errors.js';

import type { ReportDocument } from './report-document.js';

/**
 * Writes the report as indented JSON, creating parent directories.
 * Returns the absolute path written.
 */
export const writeReport = async (
  filePath: string,
  document: ReportDocument
): Promise<Result<string, ReportWriteError>> => {
  const absolutePath = path.resolve(filePath);

  try {
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.writeFile(absolutePath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
  } catch (error) {
    return err(
      createReportWriteError(
        absolutePath,
        `Failed to write report to ${absolutePath}: ${getErrorMessage(error)}`,
        error
      )
    );
  }

  return ok(absolutePath);
};

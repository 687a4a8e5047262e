import fs from 'node:fs/promises';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { getErrorCode, getErrorMessage } from '../../../../common/types/errors.js';
import { CodebookFileSchema, type CodebookFileDTO } from '../../core/codebook.js';
import {
  createCodebookInvalidError,
  createSourceUnavailableError,
  type CodebookError,
} from '../../core/errors.js';

const validator = TypeCompiler.Compile(CodebookFileSchema);

/**
 * Reads the column descriptions of the data dictionary from a YAML file.
 */
export const loadCodebookFile = async (
  filePath: string
): Promise<Result<CodebookFileDTO, CodebookError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return err(
        createSourceUnavailableError(filePath, `Codebook file not found at ${filePath}`, error)
      );
    }

    return err(
      createSourceUnavailableError(
        filePath,
        `Failed to read codebook file at ${filePath}: ${getErrorMessage(error)}`,
        error
      )
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err(
      createCodebookInvalidError(
        filePath,
        `Failed to parse YAML at ${filePath}: ${getErrorMessage(error)}`
      )
    );
  }

  if (!validator.Check(parsed)) {
    const details = Array.from(validator.Errors(parsed)).map(
      (error) => `${error.path}: ${error.message}`
    );
    return err(
      createCodebookInvalidError(filePath, `Schema validation failed for ${filePath}`, details)
    );
  }

  return ok(parsed);
};

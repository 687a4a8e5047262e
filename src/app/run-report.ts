/**
 * Report application
 *
 * Wires the vaccinations pipeline to its file-based collaborators:
 * CSV source, codebook descriptions and the JSON report.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  buildCodebook,
  createCsvVaccinationSource,
  formatSummary,
  loadCodebookFile,
  runPipeline,
  toReportDocument,
  writeReport,
  type Codebook,
  type PipelineError,
  type PipelineResult,
  type ReportWriteError,
  type VaccinationSource,
} from '../modules/vaccinations/index.js';

import type { Logger } from 'pino';

export interface RunReportDeps {
  logger: Logger;
  /** Defaults to a CSV file source over `input.sourcePath` */
  source?: VaccinationSource | undefined;
  now?: (() => Date) | undefined;
}

export interface RunReportInput {
  sourcePath: string;
  lenient: boolean;
  codebookPath: string;
  outputPath?: string | undefined;
  top?: number | undefined;
}

export interface RunReportOutput {
  result: PipelineResult;
  codebook: Codebook | null;
  summary: string;
  /** Absolute path of the JSON report, when one was written */
  reportPath: string | null;
}

export type RunReportError = PipelineError | ReportWriteError;

export const runReport = async (
  deps: RunReportDeps,
  input: RunReportInput
): Promise<Result<RunReportOutput, RunReportError>> => {
  const log = deps.logger.child({ component: 'report' });
  const source = deps.source ?? createCsvVaccinationSource({ filePath: input.sourcePath });

  const pipelineResult = await runPipeline(
    { source, logger: deps.logger },
    { lenient: input.lenient }
  );
  if (pipelineResult.isErr()) {
    return err(pipelineResult.error);
  }

  const result = pipelineResult.value;

  // The data dictionary is an optional part of the report
  let codebook: Codebook | null = null;
  const codebookFile = await loadCodebookFile(input.codebookPath);
  if (codebookFile.isErr()) {
    log.warn({ error: codebookFile.error }, 'Codebook unavailable; report written without it');
  } else {
    codebook = buildCodebook(result.normalized, codebookFile.value);
  }

  let reportPath: string | null = null;
  if (input.outputPath !== undefined) {
    const document = toReportDocument({
      result,
      codebook,
      generatedAt: (deps.now ?? (() => new Date()))(),
    });

    const writeResult = await writeReport(input.outputPath, document);
    if (writeResult.isErr()) {
      log.error({ error: writeResult.error }, 'Failed to write report');
      return err(writeResult.error);
    }

    reportPath = writeResult.value;
    log.info({ reportPath }, 'Report written');
  }

  return ok({
    result,
    codebook,
    summary: formatSummary(result, { top: input.top }),
    reportPath,
  });
};

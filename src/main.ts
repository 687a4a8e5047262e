#!/usr/bin/env node

/**
 * Vaccination report CLI
 *
 * Usage:
 *   vaccination-report data/vaccinations-by-manufacturer.csv
 *   vaccination-report data/vaccinations-by-manufacturer.csv --out out/report.json --top 15
 *   vaccination-report --lenient
 *
 * Environment:
 *   VACCINATIONS_CSV, REPORT_OUTPUT, LENIENT_ROWS, CODEBOOK_PATH, LOG_LEVEL, NODE_ENV
 */

import { Command, InvalidArgumentError } from 'commander';

import { runReport } from './app/run-report.js';
import { getErrorMessage } from './common/types/errors.js';
import { createConfig, parseEnv } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';

interface CliOptions {
  lenient?: boolean | undefined;
  out?: string | undefined;
  top: number;
  codebook?: string | undefined;
}

const parseNonNegativeInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== value) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
};

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty && process.stderr.isTTY === true,
  });

  const program = new Command();

  program
    .name('vaccination-report')
    .description('Aggregate COVID-19 vaccination counts by country, date and manufacturer')
    .argument('[csv]', 'CSV source with location, date, vaccine and total_vaccinations columns')
    .option('--lenient', 'Skip malformed rows and invalid dates, reporting how many were skipped')
    .option('--out <path>', 'Write the aggregate tables and codebook as JSON')
    .option('--top <n>', 'Number of countries in the summary', parseNonNegativeInt, 10)
    .option('--codebook <path>', 'YAML file with the column descriptions')
    .action(async (csvPath: string | undefined, options: CliOptions) => {
      const outcome = await runReport(
        { logger },
        {
          sourcePath: csvPath ?? config.pipeline.sourcePath,
          lenient: options.lenient ?? config.pipeline.lenient,
          codebookPath: options.codebook ?? config.report.codebookPath,
          outputPath: options.out ?? config.report.outputPath,
          top: options.top,
        }
      );

      if (outcome.isErr()) {
        logger.error({ error: outcome.error }, outcome.error.message);
        process.exitCode = 1;
        return;
      }

      process.stdout.write(`${outcome.value.summary}\n`);
    });

  await program.parseAsync(process.argv);
};

await main().catch((error: unknown) => {
  console.error(getErrorMessage(error));
  process.exitCode = 1;
});

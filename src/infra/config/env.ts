/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Pipeline
  VACCINATIONS_CSV: Type.String({ minLength: 1 }),
  REPORT_OUTPUT: Type.Optional(Type.String({ minLength: 1 })),
  LENIENT_ROWS: Type.Boolean({ default: false }),
  CODEBOOK_PATH: Type.String({ minLength: 1 }),
});

export type Env = Static<typeof EnvSchema>;

export const DEFAULT_VACCINATIONS_CSV = 'data/vaccinations-by-manufacturer.csv';
export const DEFAULT_CODEBOOK_PATH = 'data/codebook.yaml';

/**
 * Boolean flags accept only the literal strings `true` and `false`;
 * anything else is passed through so the schema check reports it.
 */
const parseBooleanFlag = (value: string | undefined, fallback: boolean): unknown => {
  if (value === undefined || value === '') return fallback;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    VACCINATIONS_CSV: env['VACCINATIONS_CSV'] ?? DEFAULT_VACCINATIONS_CSV,
    REPORT_OUTPUT: env['REPORT_OUTPUT'],
    LENIENT_ROWS: parseBooleanFlag(env['LENIENT_ROWS'], false),
    CODEBOOK_PATH: env['CODEBOOK_PATH'] ?? DEFAULT_CODEBOOK_PATH,
  };

  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  runtime: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  pipeline: {
    /** Default CSV source when no path is given on the command line */
    sourcePath: env.VACCINATIONS_CSV,
    /** Skip malformed rows and invalid dates instead of failing the run */
    lenient: env.LENIENT_ROWS,
  },
  report: {
    outputPath: env.REPORT_OUTPUT,
    codebookPath: env.CODEBOOK_PATH,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;

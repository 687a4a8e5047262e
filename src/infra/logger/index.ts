/**
 * Logger factory using Pino
 *
 * The report summary owns stdout, so log lines always go to stderr.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const STDERR_FD = 2;

/**
 * Pretty output only for a person watching the terminal; piped or
 * production runs keep newline-delimited JSON.
 */
export const shouldPrettyPrint = (isProduction: boolean, isTerminal: boolean): boolean =>
  !isProduction && isTerminal;

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'vaccination-report',
  pretty: shouldPrettyPrint(
    process.env['NODE_ENV'] === 'production',
    process.stderr.isTTY === true
  ),
};

export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  if (finalConfig.pretty === true) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        destination: STDERR_FD,
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname,name',
      },
    };
    return pinoLib(options);
  }

  // pino rejects a destination stream alongside a transport
  return pinoLib(options, pinoLib.destination(STDERR_FD));
};

export { type Logger } from 'pino';

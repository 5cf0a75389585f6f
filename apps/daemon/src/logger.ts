import { join } from 'path';
import log from 'electron-log/node';
import type { Logger } from '@holdtype/core';
import { stateDir } from './paths';

export interface LoggingOptions {
  debug?: boolean;
  verbose?: boolean;
  /** Directory for the log file; defaults to the XDG state directory. */
  directory?: string;
}

export const consoleLevelFor = ({ debug, verbose }: LoggingOptions) => {
  if (debug) return 'debug' as const;
  if (verbose) return 'info' as const;
  return 'warn' as const;
};

export const configureLogging = (options: LoggingOptions = {}) => {
  const directory = options.directory ?? stateDir();
  log.transports.console.level = consoleLevelFor(options);
  log.transports.console.format = '{h}:{i}:{s} [{level}]{scope} {text}';
  log.transports.file.level = options.debug ? 'debug' : 'info';
  log.transports.file.resolvePathFn = () => join(directory, 'holdtype.log');
  log.transports.file.maxSize = 1024 * 1024;
  return log;
};

export const scopedLogger = (scope: string): Logger => log.scope(scope);

export default log;

import { Logger } from '../types';

const PREFIX = '[pydepgraph]';

export const consoleLogger: Logger = {
  debug(message) {
    console.error(`${PREFIX} ${message}`);
  },
  warn(message) {
    console.warn(`${PREFIX} ${message}`);
  },
  error(message) {
    console.error(`${PREFIX} ${message}`);
  },
};

export function logVerbose(verbose: boolean, message: string, logger: Logger = consoleLogger): void {
  if (!verbose) {
    return;
  }
  logger.debug(message);
}

export function logWarn(message: string, logger: Logger = consoleLogger): void {
  logger.warn(message);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

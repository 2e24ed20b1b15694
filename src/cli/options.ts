import { InvalidArgumentError } from 'commander';
import { parsePositiveInt } from '../utils/ConfigLoader';

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_USAGE = 2;
export const EXIT_SERVER = 3;

/**
 * Commander argument parser for positive integer options
 */
export function positiveInt(name: string): (value: string) => number {
  return (value: string) => {
    try {
      return parsePositiveInt(value, name);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
  };
}

/**
 * Resolve once the process receives SIGINT or SIGTERM
 */
export function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.removeListener('SIGINT', onSignal);
      process.removeListener('SIGTERM', onSignal);
      resolve(signal);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
}

import { InvalidArgumentError } from 'commander';
import { ServiceContainer } from '../../application/ServiceContainer';
import { errorHandler } from '../../shared/errors';
import { Period, parsePeriod } from '../../shared/utilities/period';

/**
 * Run a command against a fresh service container, closing it afterwards.
 * Failures are reported and set a non-zero exit code.
 */
export async function runWithContainer(
  operation: string,
  task: (container: ServiceContainer) => Promise<void> | void
): Promise<void> {
  let container: ServiceContainer | null = null;
  try {
    container = ServiceContainer.create();
    await task(container);
  } catch (error) {
    const handled = errorHandler.handleError(error, { operation: `cli.${operation}` }, { logErrors: false });
    console.error(`Error: ${handled.message}`);
    process.exitCode = 1;
  } finally {
    await container?.close();
  }
}

export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parsePeriodOption(value: string): Period {
  const period = parsePeriod(value);
  if (!period) {
    throw new InvalidArgumentError('Expected YYYY-MM.');
  }
  return period;
}

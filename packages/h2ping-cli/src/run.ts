import { logger } from 'h2ping';
import { formatError } from './format.js';

/**
 * Run a command body, reporting failures on stderr with exit status 1
 */
export function runAction(body: () => void): void {
  try {
    body();
  } catch (err) {
    logger.debug('command failed', { error: err instanceof Error ? err.name : typeof err });
    console.error(formatError(err));
    process.exit(1);
  }
}

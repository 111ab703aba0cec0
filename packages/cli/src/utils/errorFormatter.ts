/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { TesseraError } from '@tessera/core';
import { SessionError } from './session.js';

export interface FormattedError {
  title: string;
  nextSteps: string[];
}

/**
 * Title and next steps for anything a command may throw.
 */
export function formatError(error: unknown): FormattedError {
  if (error instanceof SessionError) {
    return { title: error.message, nextSteps: error.nextSteps };
  }
  if (error instanceof TesseraError) {
    return {
      title: `${error.message} (${error.code})`,
      nextSteps: error.suggestion === undefined ? [] : [error.suggestion],
    };
  }
  if (error instanceof Error) {
    return { title: error.message, nextSteps: [] };
  }
  return { title: String(error), nextSteps: [] };
}

/**
 * Print a standardized error message and exit.
 *
 * @example
 * exitWithError('No syntax trees loaded', [
 *   'Pass a tree file: --tree path/to/module.json'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }

  process.exit(1);
}

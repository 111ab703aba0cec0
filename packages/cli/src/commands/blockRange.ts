/**
 * Block range command - span of the clause holding a line
 */

import { blockRange, describeValue } from '@tessera/core';
import { createQueryCommand, parseLine, type QueryOptions } from '../utils/options.js';
import { exitWithError, formatError } from '../utils/errorFormatter.js';
import { openSession, type Session } from '../utils/session.js';
import { compoundAt } from '../utils/locate.js';

interface BlockRangeOptions extends QueryOptions {
  line: number;
}

export interface BlockRangeReport {
  module: string;
  line: number;
  /** Statement the range was computed for */
  statement: string;
  from: number;
  to: number;
}

export function runBlockRange(session: Session, line: number): BlockRangeReport {
  const { arena, target } = session;
  const statement = compoundAt(arena, target, line);
  const [from, to] = blockRange(arena, statement, line);
  return { module: target.name, line, statement: describeValue(arena, statement), from, to };
}

export function formatBlockRangeReport(report: BlockRangeReport): string {
  return `${report.module}:${report.line} in ${report.statement}: lines ${report.from}-${report.to}`;
}

export const blockRangeCommand = createQueryCommand('block-range')
  .description('Show the line span of the clause holding a line')
  .requiredOption('-l, --line <n>', 'Source line', parseLine)
  .addHelpText('after', `
Examples:
  tessera block-range --line 7 --tree app.json
  tessera block-range -l 7 -t app.json --json
`)
  .action(async (options: BlockRangeOptions) => {
    try {
      const session = await openSession({ project: options.project, trees: options.tree, module: options.module });
      try {
        const report = runBlockRange(session, options.line);
        console.log(options.json ? JSON.stringify(report, null, 2) : formatBlockRangeReport(report));
      } finally {
        await session.close();
      }
    } catch (error) {
      const { title, nextSteps } = formatError(error);
      exitWithError(title, nextSteps);
    }
  });

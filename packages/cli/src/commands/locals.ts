/**
 * Locals command - the binding table of a scope
 */

import { describeValue, qualifiedName, scopeOf } from '@tessera/core';
import { createQueryCommand, parseLine, type QueryOptions } from '../utils/options.js';
import { exitWithError, formatError } from '../utils/errorFormatter.js';
import { openSession, type Session } from '../utils/session.js';
import { statementAt } from '../utils/locate.js';

interface LocalsOptions extends QueryOptions {
  line?: number;
}

export interface LocalsReport {
  scope: string;
  locals: Array<{ name: string; bindings: string[] }>;
}

/**
 * Locals of the scope holding the statement at `line`, or of the module.
 * Names are sorted; bindings keep registration order.
 */
export function runLocals(session: Session, line?: number): LocalsReport {
  const { arena, target } = session;
  const statement = line === undefined ? null : statementAt(arena, target, line);
  const scope = statement === null ? target : scopeOf(arena, statement);

  const locals = [...scope.locals.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, ids]) => ({
      name,
      bindings: ids.map((id) => describeValue(arena, arena.node(id))),
    }));

  return { scope: qualifiedName(arena, scope), locals };
}

export function formatLocalsReport(report: LocalsReport): string {
  if (report.locals.length === 0) {
    return `${report.scope}: no locals`;
  }
  const width = Math.max(...report.locals.map((entry) => entry.name.length));
  const lines = [`${report.scope}:`];
  for (const entry of report.locals) {
    lines.push(`  ${entry.name.padEnd(width)}  ${entry.bindings.join(', ')}`);
  }
  return lines.join('\n');
}

export const localsCommand = createQueryCommand('locals')
  .description('List the names bound in a scope')
  .option('-l, --line <n>', 'Use the scope holding this line (default: module scope)', parseLine)
  .addHelpText('after', `
Examples:
  tessera locals --tree app.json
  tessera locals --line 14 --tree app.json --json
`)
  .action(async (options: LocalsOptions) => {
    try {
      const session = await openSession({ project: options.project, trees: options.tree, module: options.module });
      try {
        const report = runLocals(session, options.line);
        console.log(options.json ? JSON.stringify(report, null, 2) : formatLocalsReport(report));
      } finally {
        await session.close();
      }
    } catch (error) {
      const { title, nextSteps } = formatError(error);
      exitWithError(title, nextSteps);
    }
  });

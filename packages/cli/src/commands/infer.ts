/**
 * Infer command - values a name may hold at a source line
 *
 * Usage:
 *   tessera infer result --line 12 --tree app.json
 *   tessera infer self.total --line 8 --tree app.json --json
 */

import {
  DONE,
  collectInference,
  describeValue,
  type Inference,
  type InferenceEngine,
  type InferenceOutcome,
  type InferenceResult,
  type InferredValue,
} from '@tessera/core';
import { createQueryCommand, parseLine, type QueryOptions } from '../utils/options.js';
import { exitWithError, formatError } from '../utils/errorFormatter.js';
import { openSession, SessionError, type Session } from '../utils/session.js';
import { statementAt } from '../utils/locate.js';

interface InferOptions extends QueryOptions {
  line: number;
}

export interface InferReport {
  module: string;
  name: string;
  line: number;
  values: string[];
  /** Set when inference failed without producing anything */
  error?: { code: string; message: string };
}

/**
 * Infer a dotted name (`a`, `a.b.c`) from the innermost statement at `line`.
 * Attributes after the first segment resolve on each inferred owner.
 */
export function runInfer(session: Session, name: string, line: number): InferReport {
  const { arena, engine, target } = session;
  const node = statementAt(arena, target, line);
  if (node === null) {
    throw new SessionError(`No statement at line ${line} in module "${target.name}"`, [
      `Module "${target.name}" spans lines ${arena.sourceLine(target)}-${arena.lastSourceLine(target)}`,
    ]);
  }

  const [head, ...attributes] = name.split('.');
  let result: InferenceResult = collectInference(engine.inferName(node, head ?? name));
  for (const attribute of attributes) {
    if (result.kind !== 'values') break;
    result = collectInference(attributeOf(engine, result.values, attribute));
  }

  const report: InferReport = { module: target.name, name, line, values: [] };
  if (result.kind === 'values') {
    report.values = result.values.map((value) => describeValue(arena, value));
  } else if (result.kind === 'failed') {
    report.error = { code: result.error.code, message: result.error.message };
  }
  return report;
}

/** `attribute` on every owner; the last failure is kept for when nothing is found */
function* attributeOf(engine: InferenceEngine, owners: readonly InferredValue[], attribute: string): Inference {
  let outcome: InferenceOutcome = DONE;
  for (const owner of owners) {
    const current = yield* engine.igetattr(owner, attribute);
    if (current.kind === 'failed') outcome = current;
  }
  return outcome;
}

export function formatInferReport(report: InferReport): string {
  const lines = [`${report.name} at ${report.module}:${report.line}`];
  if (report.error !== undefined) {
    lines.push(`  no value: ${report.error.message} (${report.error.code})`);
  } else if (report.values.length === 0) {
    lines.push('  no value (every candidate leads back to itself)');
  } else {
    for (const value of report.values) lines.push(`  ${value}`);
  }
  return lines.join('\n');
}

export const inferCommand = createQueryCommand('infer')
  .description('Infer the values a name may hold at a line')
  .argument('<name>', 'Name or dotted attribute path')
  .requiredOption('-l, --line <n>', 'Source line to resolve from', parseLine)
  .addHelpText('after', `
Examples:
  tessera infer result --line 12 --tree app.json
  tessera infer self.total --line 8 --tree app.json
  tessera infer os.path --line 3 -t builtins.json -t app.json --json
`)
  .action(async (name: string, options: InferOptions) => {
    try {
      const session = await openSession({ project: options.project, trees: options.tree, module: options.module });
      try {
        const report = runInfer(session, name, options.line);
        console.log(options.json ? JSON.stringify(report, null, 2) : formatInferReport(report));
      } finally {
        await session.close();
      }
    } catch (error) {
      const { title, nextSteps } = formatError(error);
      exitWithError(title, nextSteps);
    }
  });

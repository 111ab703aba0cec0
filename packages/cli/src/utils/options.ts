/**
 * Option parsers and the shared query option set.
 */

import { Command, InvalidArgumentError } from 'commander';

export interface QueryOptions {
  project: string;
  tree: string[];
  module?: string;
  json?: boolean;
}

export function parseLine(value: string): number {
  const line = Number(value);
  if (!Number.isInteger(line) || line < 0) {
    throw new InvalidArgumentError('Line must be a non-negative integer.');
  }
  return line;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** --project, --tree (repeatable), --module, --json */
export function createQueryCommand(name: string): Command {
  return new Command(name)
    .option('-p, --project <path>', 'Project path', '.')
    .option('-t, --tree <file>', 'JSON syntax tree file (repeatable)', collect, [])
    .option('-m, --module <name>', 'Module the query runs in (default: last tree given)')
    .option('-j, --json', 'Output as JSON');
}

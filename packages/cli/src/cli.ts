#!/usr/bin/env node
/**
 * @tessera/cli - command line front end for tessera scope and inference queries
 */

import { Command } from 'commander';
import { TESSERA_VERSION } from '@tessera/core';
import { inferCommand } from './commands/infer.js';
import { blockRangeCommand } from './commands/blockRange.js';
import { localsCommand } from './commands/locals.js';

const program = new Command();

program
  .name('tessera')
  .description('Scope resolution and value inference over JSON syntax trees')
  .version(TESSERA_VERSION);

program.addCommand(inferCommand);
program.addCommand(blockRangeCommand);
program.addCommand(localsCommand);

await program.parseAsync();

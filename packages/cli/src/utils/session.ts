/**
 * Analysis session shared by the query commands.
 *
 * Loads the project config, builds the logger, and reads the configured
 * module trees followed by the trees named on the command line into one
 * arena.
 */

import { resolve } from 'path';
import {
  ConsoleLogger,
  InferenceEngine,
  MultiLogger,
  NodeArena,
  createLogger,
  loadConfig,
  loadTreeFile,
  type Logger,
  type TesseraConfig,
} from '@tessera/core';
import type { ModuleNode } from '@tessera/types';

export interface SessionOptions {
  project: string;
  trees: readonly string[];
  /** Module queries run in; default is the last tree file given */
  module?: string;
}

export interface Session {
  readonly config: TesseraConfig;
  readonly logger: Logger;
  readonly arena: NodeArena;
  readonly engine: InferenceEngine;
  /** Module the query runs in */
  readonly target: ModuleNode;
  close(): Promise<void>;
}

export class SessionError extends Error {
  constructor(
    message: string,
    readonly nextSteps: string[] = []
  ) {
    super(message);
    this.name = 'SessionError';
  }
}

export async function openSession(options: SessionOptions): Promise<Session> {
  const projectPath = resolve(options.project);
  const config = loadConfig(projectPath, new ConsoleLogger('warnings'));
  const logger = createLogger(config.logLevel, { logFile: config.logFile });
  const close = async (): Promise<void> => {
    if (logger instanceof MultiLogger) await logger.close();
  };

  try {
    const arena = new NodeArena();
    const loaded: ModuleNode[] = [];
    for (const file of [...config.modules, ...options.trees.map((tree) => resolve(tree))]) {
      const module = loadTreeFile(arena, file);
      logger.debug('Tree loaded', { file, module: module.name, nodes: arena.size });
      loaded.push(module);
    }

    const target = pickTarget(arena, loaded, options.module);
    const engine = new InferenceEngine(arena, { logger, builtinsModule: config.builtinsModule });
    return { config, logger, arena, engine, target, close };
  } catch (error) {
    await close();
    throw error;
  }
}

function pickTarget(arena: NodeArena, loaded: readonly ModuleNode[], name: string | undefined): ModuleNode {
  if (name !== undefined) {
    const module = arena.module(name);
    if (module === undefined) {
      throw new SessionError(`Module "${name}" is not loaded`, [
        `Loaded modules: ${loaded.map((m) => m.name).join(', ') || '(none)'}`,
      ]);
    }
    return module;
  }

  const last = loaded[loaded.length - 1];
  if (last === undefined) {
    throw new SessionError('No syntax trees loaded', [
      'Pass a tree file: --tree path/to/module.json',
      'Or list tree files under "modules" in .tessera/config.yaml',
    ]);
  }
  return last;
}

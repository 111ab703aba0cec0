/**
 * Logger Tests
 *
 * ConsoleLogger level gating and formatting, FileLogger JSON lines,
 * MultiLogger fan-out and the createLogger factory.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';

import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  ConsoleLogger,
  FileLogger,
  LOG_LEVELS,
  MultiLogger,
  createLogger,
  isLogLevel,
  type LogContext,
} from '@tessera/core';

// =============================================================================
// Test Helpers
// =============================================================================

interface ConsoleMock {
  logs: { method: string; line: unknown }[];
  install: () => void;
  restore: () => void;
}

function createConsoleMock(): ConsoleMock {
  const original = {
    error: console.error,
    warn: console.warn,
    info: console.info,
    debug: console.debug,
  };
  const mockObj: ConsoleMock = {
    logs: [],
    install() {
      console.error = (line?: unknown) => mockObj.logs.push({ method: 'error', line });
      console.warn = (line?: unknown) => mockObj.logs.push({ method: 'warn', line });
      console.info = (line?: unknown) => mockObj.logs.push({ method: 'info', line });
      console.debug = (line?: unknown) => mockObj.logs.push({ method: 'debug', line });
    },
    restore() {
      console.error = original.error;
      console.warn = original.warn;
      console.info = original.info;
      console.debug = original.debug;
    },
  };
  return mockObj;
}

function readEntries(path: string): Record<string, unknown>[] {
  return readFileSync(path, 'utf-8')
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line): Record<string, unknown> => JSON.parse(line));
}

// =============================================================================
// TESTS: ConsoleLogger
// =============================================================================

describe('Logger', () => {
  let consoleMock: ConsoleMock;

  beforeEach(() => {
    consoleMock = createConsoleMock();
    consoleMock.install();
  });

  afterEach(() => {
    consoleMock.restore();
  });

  describe('ConsoleLogger', () => {
    it('should drop messages below the threshold', () => {
      const logger = new ConsoleLogger('warnings');
      logger.error('broken');
      logger.warn('careful');
      logger.info('hello');
      logger.debug('details');
      logger.trace('steps');

      assert.deepStrictEqual(consoleMock.logs, [
        { method: 'error', line: '[ERROR] broken' },
        { method: 'warn', line: '[WARN] careful' },
      ]);
    });

    it('should route debug and trace to console.debug', () => {
      const logger = new ConsoleLogger('debug');
      logger.debug('details');
      logger.trace('steps');

      assert.deepStrictEqual(consoleMock.logs, [
        { method: 'debug', line: '[DEBUG] details' },
        { method: 'debug', line: '[TRACE] steps' },
      ]);
    });

    it('should print nothing when silent', () => {
      const logger = new ConsoleLogger('silent');
      logger.error('broken');
      assert.deepStrictEqual(consoleMock.logs, []);
    });

    it('should default to info', () => {
      const logger = new ConsoleLogger();
      assert.strictEqual(logger.level, 'info');
      logger.info('hello');
      logger.debug('details');
      assert.deepStrictEqual(consoleMock.logs, [{ method: 'info', line: '[INFO] hello' }]);
    });

    it('should append context as JSON', () => {
      const logger = new ConsoleLogger('info');
      logger.info('Tree loaded', { module: 'app', nodes: 12 });
      logger.info('No context', {});

      assert.deepStrictEqual(consoleMock.logs, [
        { method: 'info', line: '[INFO] Tree loaded {"module":"app","nodes":12}' },
        { method: 'info', line: '[INFO] No context' },
      ]);
    });

    it('should replace repeated references in context', () => {
      const context: LogContext = { name: 'a' };
      context.self = context;
      new ConsoleLogger('info').info('cyclic', context);

      assert.deepStrictEqual(consoleMock.logs, [
        { method: 'info', line: '[INFO] cyclic {"name":"a","self":"[Circular]"}' },
      ]);
    });
  });

  describe('log levels', () => {
    it('should list levels from quietest to loudest', () => {
      assert.deepStrictEqual(LOG_LEVELS, ['silent', 'errors', 'warnings', 'info', 'debug']);
    });

    it('should recognise only known level names', () => {
      assert.strictEqual(isLogLevel('debug'), true);
      assert.strictEqual(isLogLevel('trace'), false);
      assert.strictEqual(isLogLevel(3), false);
    });
  });

  // ===========================================================================
  // TESTS: FileLogger
  // ===========================================================================

  describe('FileLogger', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'tessera-logger-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should write one JSON object per accepted entry', async () => {
      const path = join(dir, 'logs', 'inference.log');
      const logger = new FileLogger('info', path);
      logger.info('Tree loaded', { module: 'app' });
      logger.warn('careful');
      logger.debug('dropped');
      await logger.close();

      const entries = readEntries(path);
      assert.strictEqual(entries.length, 2);
      assert.strictEqual(entries[0]?.level, 'INFO');
      assert.strictEqual(entries[0]?.message, 'Tree loaded');
      assert.deepStrictEqual(entries[0]?.context, { module: 'app' });
      assert.strictEqual(typeof entries[0]?.time, 'string');
      assert.strictEqual(entries[1]?.level, 'WARN');
      assert.strictEqual('context' in (entries[1] ?? {}), false);
      assert.strictEqual(logger.lastError, null);
    });

    it('should truncate an existing file', async () => {
      const path = join(dir, 'inference.log');
      writeFileSync(path, 'old content\n');

      const logger = new FileLogger('debug', path);
      logger.debug('fresh');
      await logger.close();

      assert.deepStrictEqual(
        readEntries(path).map((entry) => entry.message),
        ['fresh']
      );
    });

    it('should refuse a directory path', () => {
      const path = join(dir, 'taken');
      mkdirSync(path);
      assert.throws(() => new FileLogger('debug', path), {
        message: `Cannot write log file: '${path}' is a directory`,
      });
    });
  });

  // ===========================================================================
  // TESTS: MultiLogger and createLogger
  // ===========================================================================

  describe('MultiLogger', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'tessera-multi-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should let each logger apply its own level', async () => {
      const path = join(dir, 'all.log');
      const logger = new MultiLogger([new ConsoleLogger('warnings'), new FileLogger('debug', path)]);
      logger.warn('careful');
      logger.trace('steps');
      await logger.close();

      assert.deepStrictEqual(consoleMock.logs, [{ method: 'warn', line: '[WARN] careful' }]);
      assert.deepStrictEqual(
        readEntries(path).map((entry) => entry.level),
        ['WARN', 'TRACE']
      );
    });

    it('should build a console logger without a log file', () => {
      assert.ok(createLogger('info') instanceof ConsoleLogger);
    });

    it('should add a debug file logger for a log file', async () => {
      const path = join(dir, 'created.log');
      const logger = createLogger('errors', { logFile: path });
      assert.ok(logger instanceof MultiLogger);

      logger.debug('file only');
      await logger.close();

      assert.deepStrictEqual(consoleMock.logs, []);
      assert.deepStrictEqual(
        readEntries(path).map((entry) => entry.message),
        ['file only']
      );
    });
  });
});

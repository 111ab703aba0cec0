/**
 * Block range tests
 *
 * Each compound statement is built with explicit lines; the comment above
 * each tree shows the source it stands for.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';

import type { SyntaxNode } from '@tessera/types';
import { NodeArena, TreeBuilder, blockRange, elsedBlockRange } from '@tessera/core';

describe('blockRange', () => {
  let arena: NodeArena;
  let b: TreeBuilder;

  beforeEach(() => {
    arena = new NodeArena();
    b = new TreeBuilder(arena);
  });

  function place(statement: SyntaxNode): void {
    b.module('blocks', [statement]);
  }

  describe('definitions', () => {
    it('should span the whole definition for any line', () => {
      // 3 def f():
      // 4     pass
      // 6     pass
      const fn = b.functionDef('f', { body: [b.pass(4), b.pass(6)] }, 3);
      place(fn);

      assert.deepStrictEqual(blockRange(arena, fn, 5), [3, 6]);
      assert.deepStrictEqual(blockRange(arena, fn, 3), [3, 6]);
    });

    it('should anchor classes and modules at their header', () => {
      const cls = b.classDef('C', { body: [b.pass(2), b.pass(3)] }, 1);
      const module = b.module('blocks', [cls, b.pass(5)]);

      assert.deepStrictEqual(blockRange(arena, cls, 3), [1, 3]);
      assert.deepStrictEqual(blockRange(arena, module, 4), [0, 5]);
    });
  });

  describe('simple statements', () => {
    it('should run from the line to the statement end', () => {
      const assign = b.assign(b.assignName('x', 2), b.constant(1, 2), 2);
      place(assign);
      assert.deepStrictEqual(blockRange(arena, assign, 2), [2, 2]);
    });
  });

  describe('conditionals', () => {
    // 1 if a:
    // 2     x = 1
    // 3 elif b:
    // 4     y = 2
    // 5 elif c:
    // 6     z = 3
    // 7 else:
    // 8     w = 4
    // 9     v = 5
    function chainWithElse(): SyntaxNode {
      const node = b.ifStatement(
        [
          { test: b.name('a', 1), body: [b.pass(2)] },
          { test: b.name('b', 3), body: [b.pass(4)] },
          { test: b.name('c', 5), body: [b.pass(6)] },
        ],
        [b.pass(8), b.pass(9)],
        1
      );
      place(node);
      return node;
    }

    it('should give the header line alone', () => {
      assert.deepStrictEqual(blockRange(arena, chainWithElse(), 1), [1, 1]);
    });

    it('should give later branch headers alone', () => {
      const node = chainWithElse();
      assert.deepStrictEqual(blockRange(arena, node, 3), [3, 3]);
      assert.deepStrictEqual(blockRange(arena, node, 5), [5, 5]);
    });

    it('should end a later branch body at its last line', () => {
      const node = chainWithElse();
      assert.deepStrictEqual(blockRange(arena, node, 4), [4, 4]);
      assert.deepStrictEqual(blockRange(arena, node, 6), [6, 6]);
    });

    it('should stop the first body before the next branch', () => {
      assert.deepStrictEqual(blockRange(arena, chainWithElse(), 2), [2, 2]);
    });

    it('should run else lines to the end of the clause', () => {
      const node = chainWithElse();
      assert.deepStrictEqual(blockRange(arena, node, 8), [8, 9]);
      assert.deepStrictEqual(blockRange(arena, node, 9), [9, 9]);
    });

    it('should stop the first body before the next branch without an else', () => {
      // 1 if a:
      // 2     x = 1
      // 3     x = 2
      // 4 elif b:
      // 5     y = 2
      const node = b.ifStatement(
        [
          { test: b.name('a', 1), body: [b.pass(2), b.pass(3)] },
          { test: b.name('b', 4), body: [b.pass(5)] },
        ],
        null,
        1
      );
      place(node);

      assert.deepStrictEqual(blockRange(arena, node, 2), [2, 3]);
      assert.deepStrictEqual(blockRange(arena, node, 4), [4, 4]);
      assert.deepStrictEqual(blockRange(arena, node, 5), [5, 5]);
    });

    it('should run a lone branch to the statement end', () => {
      const node = b.ifStatement([{ test: b.name('a', 1), body: [b.pass(2), b.pass(3)] }], null, 1);
      place(node);
      assert.deepStrictEqual(blockRange(arena, node, 2), [2, 3]);
    });
  });

  describe('exception handling', () => {
    // 1 try:
    // 2     risky()
    // 3 except ValueError as e:
    // 4     handle()
    // 5     log()
    // 6 except:
    // 7     pass
    // 8 else:
    // 9     done()
    function tryWithElse(): SyntaxNode {
      const node = b.tryExcept(
        [b.expr(b.call(b.name('risky', 2), [], {}, 2), 2)],
        [
          b.exceptHandler(b.name('ValueError', 3), b.assignName('e', 3), [b.pass(4), b.pass(5)], 3),
          b.exceptHandler(null, null, [b.pass(7)], 6),
        ],
        [b.pass(9)],
        1
      );
      place(node);
      return node;
    }

    it('should give the try header and handler guards alone', () => {
      const node = tryWithElse();
      assert.deepStrictEqual(blockRange(arena, node, 1), [1, 1]);
      assert.deepStrictEqual(blockRange(arena, node, 3), [3, 3]);
    });

    it('should end handler lines at the handler body end', () => {
      const node = tryWithElse();
      assert.deepStrictEqual(blockRange(arena, node, 4), [4, 5]);
      assert.deepStrictEqual(blockRange(arena, node, 5), [5, 5]);
      assert.deepStrictEqual(blockRange(arena, node, 7), [7, 7]);
    });

    it('should give a bare handler header alone', () => {
      assert.deepStrictEqual(blockRange(arena, tryWithElse(), 6), [6, 6]);
    });

    it('should stop the try body before the first handler', () => {
      const node = tryWithElse();
      assert.deepStrictEqual(blockRange(arena, node, 2), [2, 2]);
      assert.deepStrictEqual(blockRange(arena, node, 9), [9, 9]);
    });

    it('should stop the try body before the first handler without an else', () => {
      // 1 try:
      // 2     risky()
      // 3 except ValueError:
      // 4     pass
      const node = b.tryExcept(
        [b.expr(b.call(b.name('risky', 2), [], {}, 2), 2)],
        [b.exceptHandler(b.name('ValueError', 3), null, [b.pass(4)], 3)],
        null,
        1
      );
      place(node);
      assert.deepStrictEqual(blockRange(arena, node, 2), [2, 2]);
    });
  });

  describe('loops and finally', () => {
    it('should split a while loop at its else clause', () => {
      // 1 while a:
      // 2     pass
      // 3     pass
      // 4 else:
      // 5     pass
      const node = b.whileLoop(b.name('a', 1), [b.pass(2), b.pass(3)], [b.pass(5)], 1);
      place(node);

      assert.deepStrictEqual(blockRange(arena, node, 1), [1, 1]);
      assert.deepStrictEqual(blockRange(arena, node, 2), [2, 4]);
      assert.deepStrictEqual(blockRange(arena, node, 5), [5, 5]);
    });

    it('should run a for body to the loop end without an else', () => {
      const node = b.forLoop(b.assignName('item', 1), b.name('items', 1), [b.pass(2), b.pass(3)], null, 1);
      place(node);
      assert.deepStrictEqual(blockRange(arena, node, 2), [2, 3]);
    });

    it('should treat the finally clause as the trailing clause', () => {
      // 1 try:
      // 2     pass
      // 3 finally:
      // 4     pass
      // 5     pass
      const node = b.tryFinally([b.pass(2)], [b.pass(4), b.pass(5)], 1);
      place(node);

      assert.deepStrictEqual(blockRange(arena, node, 2), [2, 3]);
      assert.deepStrictEqual(blockRange(arena, node, 4), [4, 5]);
    });

    it('should honor a caller-supplied end without a trailing clause', () => {
      const node = b.whileLoop(b.name('a', 1), [b.pass(2)], null, 1);
      place(node);
      assert.deepStrictEqual(elsedBlockRange(arena, node, 2, 10), [2, 10]);
      assert.deepStrictEqual(elsedBlockRange(arena, node, 2), [2, 2]);
    });

    it('should ignore a supplied end of 0', () => {
      // 1 while a:
      // 2     pass
      // 3     pass
      const node = b.whileLoop(b.name('a', 1), [b.pass(2), b.pass(3)], null, 1);
      place(node);
      assert.deepStrictEqual(elsedBlockRange(arena, node, 2, 0), [2, 3]);
    });
  });
});

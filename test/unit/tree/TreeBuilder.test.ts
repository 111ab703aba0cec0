/**
 * TreeBuilder and binder tests
 *
 * Tests:
 * - singleton constant transforms (None / True / False)
 * - generator detection stops at nested scopes
 * - binder fills module, function, class, lambda and generator tables
 * - global declarations, imports, except handlers, instance attributes
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';

import {
  CONST_NAME_TRANSFORMS,
  CONST_VALUE_TRANSFORMS,
  NodeArena,
  TreeBuilder,
  TreeStructureError,
} from '@tessera/core';

describe('TreeBuilder', () => {
  let arena: NodeArena;
  let b: TreeBuilder;

  beforeEach(() => {
    arena = new NodeArena();
    b = new TreeBuilder(arena);
  });

  describe('constant transforms', () => {
    it('should turn None, True and False names into singleton nodes', () => {
      const none = b.name('None', 1);
      const yes = b.name('True', 1);
      const no = b.name('False', 1);
      const plain = b.name('Nonesuch', 1);

      assert.deepStrictEqual([none.kind, yes.kind, no.kind, plain.kind], ['NoneConst', 'Bool', 'Bool', 'Name']);
      assert.strictEqual(yes.kind === 'Bool' && yes.value, true);
      assert.strictEqual(no.kind === 'Bool' && no.value, false);
    });

    it('should turn null and boolean values into singleton nodes', () => {
      assert.strictEqual(b.constant(null).kind, 'NoneConst');
      const flag = b.constant(true);
      assert.strictEqual(flag.kind, 'Bool');
      assert.strictEqual(flag.value, true);
      const number = b.constant(2.5);
      assert.strictEqual(number.kind, 'Const');
      assert.strictEqual(number.value, 2.5);
    });

    it('should keep the transform tables immutable', () => {
      assert.strictEqual(CONST_NAME_TRANSFORMS.size, 3);
      assert.strictEqual(CONST_VALUE_TRANSFORMS.size, 3);
      const none = CONST_NAME_TRANSFORMS.get('None');
      assert.ok(none !== undefined);
      assert.strictEqual(Object.isFrozen(none), true);
      assert.strictEqual(CONST_VALUE_TRANSFORMS.get(null), none);
    });
  });

  describe('generator detection', () => {
    it('should flag a function whose body yields', () => {
      const branch = b.ifStatement([{ test: b.name('ready', 2), body: [b.expr(b.yieldExpr(b.constant(1, 3), 3), 3)] }], null, 2);
      const fn = b.functionDef('produce', { body: [branch] }, 1);
      assert.strictEqual(fn.generator, true);
    });

    it('should ignore a yield inside a nested scope', () => {
      const inner = b.functionDef('inner', { body: [b.expr(b.yieldExpr(null, 3), 3)] }, 2);
      const lambda = b.expr(b.lambda([], b.yieldExpr(null, 4), 4), 4);
      const outer = b.functionDef('outer', { body: [inner, lambda] }, 1);
      assert.strictEqual(inner.generator, true);
      assert.strictEqual(outer.generator, false);
    });
  });

  it('should reject a node used in two places', () => {
    const shared = b.name('x', 1);
    b.expr(shared, 1);
    assert.throws(
      () => b.expr(shared, 2),
      (error: unknown) => error instanceof TreeStructureError && error.code === 'ERR_TREE_OWNERSHIP'
    );
  });
});

// =============================================================================
// TESTS: binder
// =============================================================================

describe('binder', () => {
  let arena: NodeArena;
  let b: TreeBuilder;

  beforeEach(() => {
    arena = new NodeArena();
    b = new TreeBuilder(arena);
  });

  it('should bind definitions and targets in the module scope', () => {
    const target = b.assignName('x', 1);
    const assign = b.assign(target, b.constant(1, 1), 1);
    const fn = b.functionDef('f', { body: [b.pass(3)] }, 2);
    const cls = b.classDef('C', { body: [b.pass(5)] }, 4);
    const module = b.module('m', [assign, fn, cls]);

    assert.deepStrictEqual(module.locals.get('x'), [target.id]);
    assert.deepStrictEqual(module.locals.get('f'), [fn.id]);
    assert.deepStrictEqual(module.locals.get('C'), [cls.id]);
  });

  it('should append rebindings in source order', () => {
    const first = b.assignName('x', 1);
    const second = b.assignName('x', 2);
    const module = b.module('m', [
      b.assign(first, b.constant(1, 1), 1),
      b.assign(second, b.constant(2, 2), 2),
    ]);
    assert.deepStrictEqual(module.locals.get('x'), [first.id, second.id]);
  });

  it('should bind parameters to their function and locals inside it', () => {
    const local = b.assignName('y', 2);
    const fn = b.functionDef('f', { params: [b.param('a', null, 1)], body: [b.assign(local, b.name('a', 2), 2)] }, 1);
    const module = b.module('m', [fn]);

    assert.deepStrictEqual(fn.locals.get('a'), [fn.id]);
    assert.deepStrictEqual(fn.locals.get('y'), [local.id]);
    assert.strictEqual(module.locals.has('y'), false);
  });

  it('should bind names declared global in the module', () => {
    const declaration = b.global(['counter'], 2);
    const target = b.assignName('counter', 3);
    const fn = b.functionDef('bump', { body: [declaration, b.assign(target, b.constant(1, 3), 3)] }, 1);
    const module = b.module('m', [fn]);

    assert.deepStrictEqual(module.locals.get('counter'), [target.id]);
    assert.deepStrictEqual(fn.locals.get('counter'), [declaration.id]);
  });

  it('should bind import statements under their visible names', () => {
    const plain = b.importModules(['os.path'], 1);
    const aliased = b.importFrom('pkg', [{ name: 'helper', asname: 'h' }, 'other'], 2);
    const module = b.module('m', [plain, aliased]);

    assert.deepStrictEqual(module.locals.get('os'), [plain.id]);
    assert.deepStrictEqual(module.locals.get('h'), [aliased.id]);
    assert.deepStrictEqual(module.locals.get('other'), [aliased.id]);
    assert.strictEqual(module.locals.has('helper'), false);
  });

  it('should bind an except handler name to the try statement', () => {
    const handler = b.exceptHandler(b.name('ValueError', 3), b.assignName('err', 3), [b.pass(4)], 3);
    const statement = b.tryExcept([b.pass(2)], [handler], null, 1);
    const module = b.module('m', [statement]);

    assert.deepStrictEqual(module.locals.get('err'), [statement.id]);
  });

  it('should register self attributes on the owning class', () => {
    const attr = b.assignAttr(b.name('self', 3), 'total', 3);
    const init = b.functionDef('__init__', {
      params: [b.param('self', null, 2)],
      body: [b.assign(attr, b.constant(0, 3), 3)],
    }, 2);
    const cls = b.classDef('Counter', { body: [init] }, 1);
    b.module('m', [cls]);

    assert.deepStrictEqual(cls.instanceAttrs.get('total'), [attr.id]);
    assert.deepStrictEqual(cls.locals.get('__init__'), [init.id]);
  });

  it('should not register attributes set on other receivers', () => {
    const attr = b.assignAttr(b.name('other', 3), 'total', 3);
    const method = b.functionDef('reset', {
      params: [b.param('self', null, 2), b.param('other', null, 2)],
      body: [b.assign(attr, b.constant(0, 3), 3)],
    }, 2);
    const cls = b.classDef('Counter', { body: [method] }, 1);
    b.module('m', [cls]);

    assert.strictEqual(cls.instanceAttrs.size, 0);
  });

  it('should give lambdas and generator expressions their own tables', () => {
    const lambda = b.lambda([b.param('k', null, 1)], b.name('k', 1), 1);
    const loopTarget = b.assignName('i', 2);
    const genexp = b.generatorExp(b.name('i', 2), [b.comprehension(loopTarget, b.name('items', 2), [], 2)], 2);
    const module = b.module('m', [b.expr(lambda, 1), b.expr(genexp, 2)]);

    assert.deepStrictEqual(lambda.locals.get('k'), [lambda.id]);
    assert.deepStrictEqual(genexp.locals.get('i'), [loopTarget.id]);
    assert.strictEqual(module.locals.has('i'), false);
  });
});

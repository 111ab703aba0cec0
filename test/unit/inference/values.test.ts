/**
 * Proxy model tests
 *
 *   1  class Callable:
 *   2      __name__ = 'custom'
 *   3      def __call__(self):
 *   4          return 5
 *   5  class Plain:
 *   6      pass
 *   7  def gen():
 *   8      yield 1
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';

import type { ClassDefNode, FunctionDefNode } from '@tessera/types';
import {
  DONE,
  GeneratorValue,
  InferenceEngine,
  Instance,
  InstanceMethod,
  NodeArena,
  NotFoundError,
  TreeBuilder,
  UNKNOWN,
  UnknownValue,
  collectInference,
  inferredValues,
  isProxy,
  isSyntaxNode,
} from '@tessera/core';

describe('proxy values', () => {
  let engine: InferenceEngine;
  let callable: ClassDefNode;
  let plain: ClassDefNode;
  let callMethod: FunctionDefNode;
  let gen: FunctionDefNode;

  beforeEach(() => {
    const arena = new NodeArena();
    const b = new TreeBuilder(arena);
    callMethod = b.functionDef(
      '__call__',
      { params: [b.param('self', null, 3)], body: [b.returnStatement(b.constant(5, 4), 4)] },
      3
    );
    callable = b.classDef(
      'Callable',
      { body: [b.assign(b.assignName('__name__', 2), b.constant('custom', 2), 2), callMethod] },
      1
    );
    plain = b.classDef('Plain', { body: [b.pass(6)] }, 5);
    gen = b.functionDef('gen', { body: [b.expr(b.yieldExpr(b.constant(1, 8), 8), 8)] }, 7);
    b.module('proxies', [callable, plain, gen]);
    engine = new InferenceEngine(arena, { logLevel: 'silent' });
  });

  describe('Unknown', () => {
    it('should be a single absorbing value', () => {
      assert.strictEqual(UnknownValue.instance, UNKNOWN);
      assert.strictEqual(UNKNOWN.getAttr('anything'), UNKNOWN);
      assert.strictEqual(UNKNOWN.call(1, 2), UNKNOWN);
      assert.deepStrictEqual([...UNKNOWN], [UNKNOWN]);
      assert.strictEqual(UNKNOWN.describe(), 'Unknown');
    });

    it('should count as a proxy', () => {
      assert.strictEqual(isProxy(UNKNOWN), true);
      assert.strictEqual(isSyntaxNode(UNKNOWN), false);
      assert.strictEqual(isSyntaxNode(plain), true);
      assert.strictEqual(isProxy(new Instance(plain, engine)), true);
    });
  });

  describe('Instance', () => {
    it('should return the wrapped class for __class__', () => {
      const lookup = new Instance(callable, engine).getAttr('__class__');
      assert.deepStrictEqual(lookup, { kind: 'found', nodes: [callable] });
    });

    it('should never find __name__ even when the class defines it', () => {
      assert.strictEqual(engine.classGetAttr(callable, '__name__').kind, 'found');

      const lookup = new Instance(callable, engine).getAttr('__name__');
      assert.strictEqual(lookup.kind, 'not_found');
      assert.ok(lookup.kind === 'not_found');
      assert.ok(lookup.error instanceof NotFoundError);
      assert.strictEqual(lookup.error.code, 'ERR_NOT_FOUND');
    });

    it('should fall back to class attributes only when asked', () => {
      const instance = new Instance(callable, engine);
      assert.deepStrictEqual(instance.getAttr('__call__'), { kind: 'found', nodes: [callMethod] });
      assert.strictEqual(instance.getAttr('__call__', false).kind, 'not_found');
    });

    it('should bind plain methods to the instance', () => {
      const instance = new Instance(callable, engine);
      const bound = instance.bindAttribute(callMethod);

      assert.ok(bound instanceof InstanceMethod);
      assert.strictEqual(bound.receiver, instance);
      assert.strictEqual(bound.proxied, callMethod);
      assert.strictEqual(instance.bindAttribute(plain), plain);
    });

    it('should be callable through __call__', () => {
      const instance = new Instance(callable, engine);
      assert.strictEqual(instance.isCallable(), true);

      const values = inferredValues(instance.inferCallResult(plain, null));
      assert.deepStrictEqual(values.map((value) => engine.describe(value)), ['5']);
    });

    it('should fail to call an instance without __call__', () => {
      const instance = new Instance(plain, engine);
      assert.strictEqual(instance.isCallable(), false);

      const result = collectInference(instance.inferCallResult(plain, null));
      assert.ok(result.kind === 'failed');
      assert.strictEqual(result.error.code, 'ERR_INFERENCE_FAILED');
      assert.strictEqual(result.error.message, 'proxies.Plain has no attribute "__call__"');
    });

    it('should describe itself by its class', () => {
      const instance = new Instance(callable, engine);
      assert.strictEqual(instance.name, 'Callable');
      assert.strictEqual(instance.typeName(), 'proxies.Callable');
      assert.strictEqual(instance.describe(), 'Instance of proxies.Callable');
    });
  });

  describe('InstanceMethod', () => {
    it('should describe the method and its owner', () => {
      const method = new InstanceMethod(callMethod, engine, new Instance(callable, engine));
      assert.strictEqual(method.name, '__call__');
      assert.strictEqual(method.isBound(), true);
      assert.strictEqual(method.typeName(), 'builtins.instancemethod');
      assert.strictEqual(method.describe(), 'Bound method __call__ of proxies.Callable');
    });
  });

  describe('GeneratorValue', () => {
    it('should stand for the object a generator function returns', () => {
      const value = new GeneratorValue(gen, engine);
      assert.strictEqual(gen.generator, true);
      assert.strictEqual(value.kind, 'Generator');
      assert.strictEqual(value.typeName(), 'builtins.generator');
      assert.strictEqual(value.isCallable(), false);
      assert.strictEqual(value.describe(), 'Generator of proxies.gen');
    });

    it('should infer to itself', () => {
      const value = new GeneratorValue(gen, engine);
      const inference = engine.infer(value);
      assert.strictEqual(inference.next().value, value);
      assert.deepStrictEqual(inference.next(), { done: true, value: DONE });
    });
  });
});

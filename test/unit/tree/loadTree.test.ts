/**
 * JSON tree loader tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { NodeArena, TreeStructureError, loadTree, loadTreeFile } from '@tessera/core';

const SAMPLE = {
  kind: 'Module',
  name: 'app',
  body: [
    {
      kind: 'Assign',
      line: 1,
      targets: [{ kind: 'AssignName', name: 'x', line: 1 }],
      value: { kind: 'Const', value: 1, line: 1 },
    },
    {
      kind: 'FunctionDef',
      name: 'f',
      line: 2,
      params: [{ kind: 'Parameter', name: 'a', line: 2, default: { kind: 'Name', name: 'None', line: 2 } }],
      body: [{ kind: 'Return', line: 3, value: { kind: 'Name', name: 'a', line: 3 } }],
    },
  ],
};

function treeError(message: string): (error: unknown) => boolean {
  return (error: unknown) => {
    assert.ok(error instanceof TreeStructureError);
    assert.strictEqual(error.code, 'ERR_TREE_INVALID');
    assert.strictEqual(error.message, message);
    return true;
  };
}

describe('loadTree', () => {
  let arena: NodeArena;

  beforeEach(() => {
    arena = new NodeArena();
  });

  it('should build, bind and register the module', () => {
    const module = loadTree(arena, SAMPLE);

    assert.strictEqual(module.name, 'app');
    assert.strictEqual(arena.module('app'), module);
    assert.deepStrictEqual([...module.locals.keys()], ['x', 'f']);
    assert.strictEqual(arena.lastSourceLine(module), 3);
  });

  it('should route singleton names through the constant transforms', () => {
    const module = loadTree(arena, SAMPLE);
    const [fnId] = module.locals.get('f') ?? [];
    assert.ok(fnId !== undefined);
    const fn = arena.nodeOfKind(fnId, 'FunctionDef');
    const [paramId] = fn.params;
    assert.ok(paramId !== undefined);
    const param = arena.nodeOfKind(paramId, 'Parameter');
    assert.ok(param.defaultValue !== null);
    assert.strictEqual(arena.node(param.defaultValue).kind, 'NoneConst');
  });

  it('should take the module name from the options when the document has none', () => {
    const module = loadTree(arena, { kind: 'Module', body: [] }, { moduleName: 'fallback' });
    assert.strictEqual(module.name, 'fallback');
  });

  it('should name the JSON path of the first bad entry', () => {
    const document = {
      kind: 'Module',
      name: 'broken',
      body: [{ kind: 'Assign', targets: [{ kind: 'AssignName', name: 'x' }], value: { kind: 'Bogus' } }],
    };
    assert.throws(() => loadTree(arena, document), treeError('Invalid tree at $.body[0].value.kind: unknown node kind "Bogus"'));
  });

  it('should reject a root that is not a module', () => {
    assert.throws(() => loadTree(arena, { kind: 'Pass' }), treeError('Invalid tree at $.kind: root must be a Module'));
  });

  it('should reject a nested module', () => {
    const document = { kind: 'Module', name: 'outer', body: [{ kind: 'Module', name: 'inner', body: [] }] };
    assert.throws(() => loadTree(arena, document), treeError('Invalid tree at $.body[0].kind: a Module can only be the root'));
  });

  it('should reject negative line numbers', () => {
    const document = { kind: 'Module', name: 'lines', body: [{ kind: 'Pass', line: -1 }] };
    assert.throws(() => loadTree(arena, document), treeError('Invalid tree at $.body[0].line: expected a non-negative integer'));
  });

  it('should require handler names to be assignment targets', () => {
    const document = {
      kind: 'Module',
      name: 'handlers',
      body: [
        {
          kind: 'TryExcept',
          body: [{ kind: 'Pass' }],
          handlers: [{ kind: 'ExceptHandler', name: { kind: 'Name', name: 'err' }, body: [{ kind: 'Pass' }] }],
        },
      ],
    };
    assert.throws(
      () => loadTree(arena, document),
      treeError('Invalid tree at $.body[0].handlers[0].name: expected AssignName, got Name')
    );
  });
});

describe('loadTreeFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tessera-tree-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should name the module after the file when the document has no name', () => {
    const file = join(dir, 'helpers.json');
    writeFileSync(file, JSON.stringify({ kind: 'Module', body: [{ kind: 'Pass', line: 1 }] }));

    const arena = new NodeArena();
    const module = loadTreeFile(arena, file);
    assert.strictEqual(module.name, 'helpers');
    assert.strictEqual(arena.module('helpers'), module);
  });

  it('should report unreadable JSON as a tree error', () => {
    const file = join(dir, 'broken.json');
    writeFileSync(file, '{ "kind": ');

    assert.throws(
      () => loadTreeFile(new NodeArena(), file),
      (error: unknown) => {
        assert.ok(error instanceof TreeStructureError);
        assert.strictEqual(error.code, 'ERR_TREE_INVALID');
        assert.ok(error.message.startsWith(`Cannot read tree file ${file}:`));
        return true;
      }
    );
  });
});

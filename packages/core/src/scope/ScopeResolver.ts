/**
 * Scope resolver - navigation and name-binding queries over the arena.
 *
 * Scope chain for name lookup:
 *   the node's scope -> enclosing scopes (class bodies skipped) -> builtins module
 *
 * Names in a function's parameter defaults, a function's or class's
 * decorators and a class's bases resolve from the scope around the definition.
 */

import {
  isFrame,
  isScope,
  isStatement,
  type BlockNode,
  type ClassDefNode,
  type FrameNode,
  type FunctionDefNode,
  type ImportFromNode,
  type ImportNode,
  type ModuleNode,
  type ScopeNode,
  type SyntaxNode,
} from '@tessera/types';
import { TreeStructureError } from '../errors/TesseraError.js';
import type { NodeArena } from '../tree/NodeArena.js';

export const DEFAULT_BUILTINS_MODULE = 'builtins';

export type NameLookupResult =
  | { kind: 'found'; scope: ScopeNode; bindings: SyntaxNode[] }
  | { kind: 'not_found' };

export type MethodKind = 'function' | 'method' | 'classmethod' | 'staticmethod';

export interface LookupOptions {
  builtinsModule?: string;
}

// ─── Ancestors ───────────────────────────────────────────────────────

/**
 * Nearest statement, self included.
 *
 * @throws TreeStructureError ERR_TREE_NO_STATEMENT when no ancestor is a statement
 */
export function statementOf(arena: NodeArena, node: SyntaxNode): SyntaxNode {
  for (let cursor: SyntaxNode | null = node; cursor !== null; cursor = arena.parent(cursor)) {
    if (isStatement(cursor)) return cursor;
  }
  throw new TreeStructureError(
    `${node.kind} node ${node.id} has no statement ancestor`,
    'ERR_TREE_NO_STATEMENT',
    { nodeId: node.id, nodeKind: node.kind }
  );
}

function detached(node: SyntaxNode): TreeStructureError {
  return new TreeStructureError(
    `${node.kind} node ${node.id} is not inside a module`,
    'ERR_TREE_DETACHED',
    { nodeId: node.id, nodeKind: node.kind },
    'Build the tree with TreeBuilder.module() before querying it'
  );
}

/** Nearest module, function or class, self included */
export function frameOf(arena: NodeArena, node: SyntaxNode): FrameNode {
  for (let cursor: SyntaxNode | null = node; cursor !== null; cursor = arena.parent(cursor)) {
    if (isFrame(cursor)) return cursor;
  }
  throw detached(node);
}

/** Nearest frame, lambda or generator expression, self included */
export function scopeOf(arena: NodeArena, node: SyntaxNode): ScopeNode {
  for (let cursor: SyntaxNode | null = node; cursor !== null; cursor = arena.parent(cursor)) {
    if (isScope(cursor)) return cursor;
  }
  throw detached(node);
}

export function rootOf(arena: NodeArena, node: SyntaxNode): SyntaxNode {
  let cursor = node;
  for (let parent = arena.parent(cursor); parent !== null; parent = arena.parent(cursor)) {
    cursor = parent;
  }
  return cursor;
}

/** Root of the node's tree, which must be a module */
export function moduleOf(arena: NodeArena, node: SyntaxNode): ModuleNode {
  const root = rootOf(arena, node);
  if (root.kind !== 'Module') throw detached(node);
  return root;
}

// ─── Siblings ────────────────────────────────────────────────────────

function statementPosition(arena: NodeArena, node: SyntaxNode): { block: BlockNode; index: number } {
  const statement = statementOf(arena, node);
  const block = arena.parent(statement);
  if (block === null || block.kind !== 'Block') {
    throw new TreeStructureError(
      `Statement ${statement.id} is not part of a statement sequence`,
      'ERR_TREE_NO_STATEMENT',
      { nodeId: statement.id, nodeKind: statement.kind }
    );
  }
  return { block, index: block.body.indexOf(statement.id) };
}

export function nextSibling(arena: NodeArena, node: SyntaxNode): SyntaxNode | null {
  const { block, index } = statementPosition(arena, node);
  const id = block.body[index + 1];
  return id === undefined ? null : arena.node(id);
}

export function previousSibling(arena: NodeArena, node: SyntaxNode): SyntaxNode | null {
  const { block, index } = statementPosition(arena, node);
  if (index === 0) return null;
  const id = block.body[index - 1];
  return id === undefined ? null : arena.node(id);
}

// ─── Bindings ────────────────────────────────────────────────────────

/**
 * Append `binding` under `name` in the nearest scope table, self included.
 * Only tree construction calls this.
 */
export function setLocal(arena: NodeArena, node: SyntaxNode, name: string, binding: SyntaxNode): void {
  const scope = scopeOf(arena, node);
  const existing = scope.locals.get(name);
  if (existing === undefined) {
    scope.locals.set(name, [binding.id]);
  } else {
    existing.push(binding.id);
  }
}

/**
 * Candidate with the greatest line not after the node's own line.
 * Candidates must come in non-decreasing line order; the scan stops at the
 * first one past the node.
 *
 * @throws TreeStructureError ERR_TREE_FOREIGN_NODE for a candidate from another tree
 */
export function nearest(arena: NodeArena, node: SyntaxNode, candidates: Iterable<SyntaxNode>): SyntaxNode | null {
  const root = rootOf(arena, node);
  const line = arena.sourceLine(node);
  let best: SyntaxNode | null = null;
  let bestLine = 0;

  for (const candidate of candidates) {
    if (rootOf(arena, candidate) !== root) {
      throw new TreeStructureError(
        `Candidate ${candidate.id} belongs to another tree`,
        'ERR_TREE_FOREIGN_NODE',
        { nodeId: candidate.id, nodeKind: candidate.kind }
      );
    }
    const candidateLine = arena.sourceLine(candidate);
    if (candidateLine > line) break;
    if (best === null || candidateLine > bestLine) {
      best = candidate;
      bestLine = candidateLine;
    }
  }

  return best;
}

// ─── Name lookup ─────────────────────────────────────────────────────

/** True when `node` sits in the part of `scope` evaluated inside it */
function insideScopeBody(arena: NodeArena, scope: ScopeNode, node: SyntaxNode): boolean {
  switch (scope.kind) {
    case 'FunctionDef':
    case 'ClassDef':
    case 'Lambda':
      return arena.parentOf(arena.node(scope.body), node);
    case 'Module':
    case 'GeneratorExp':
      return true;
  }
}

function startScope(arena: NodeArena, node: SyntaxNode): ScopeNode {
  const scope = scopeOf(arena, node);
  if (scope === node || insideScopeBody(arena, scope, node)) return scope;
  const outer = arena.parent(scope);
  return outer === null ? scope : scopeOf(arena, outer);
}

/** Next scope outward, class bodies skipped */
function enclosingScope(arena: NodeArena, scope: ScopeNode): ScopeNode | null {
  let parent = arena.parent(scope);
  while (parent !== null) {
    const outer = scopeOf(arena, parent);
    if (outer.kind !== 'ClassDef') return outer;
    parent = arena.parent(outer);
  }
  return null;
}

function bindingsIn(arena: NodeArena, scope: ScopeNode, name: string): SyntaxNode[] {
  return (scope.locals.get(name) ?? []).map((id) => arena.node(id));
}

export function lookup(
  arena: NodeArena,
  node: SyntaxNode,
  name: string,
  options: LookupOptions = {}
): NameLookupResult {
  for (let scope: ScopeNode | null = startScope(arena, node); scope !== null; scope = enclosingScope(arena, scope)) {
    const bindings = bindingsIn(arena, scope, name);
    if (bindings.length > 0) {
      return { kind: 'found', scope, bindings };
    }
  }

  const builtins = arena.module(options.builtinsModule ?? DEFAULT_BUILTINS_MODULE);
  if (builtins !== undefined) {
    const bindings = bindingsIn(arena, builtins, name);
    if (bindings.length > 0) {
      return { kind: 'found', scope: builtins, bindings };
    }
  }

  return { kind: 'not_found' };
}

// ─── Definitions ─────────────────────────────────────────────────────

/**
 * Dotted name an import alias stands for; null when the statement does not bind `asname`.
 * `import a.b` binds `a`, so `realName(node, 'a')` is `a`.
 */
export function realName(node: ImportNode | ImportFromNode, asname: string): string | null {
  for (const alias of node.names) {
    if (alias.name === '*') return asname;
    const real = alias.asname === null ? alias.name.split('.')[0] : alias.name;
    const bound = alias.asname ?? real;
    if (bound === asname) return real;
  }
  return null;
}

function decoratorNames(arena: NodeArena, fn: FunctionDefNode): string[] {
  const names: string[] = [];
  for (const id of fn.decorators) {
    const decorator = arena.node(id);
    if (decorator.kind === 'Name') names.push(decorator.name);
  }
  return names;
}

/** Class owning `fn` as a method, or null for plain functions */
export function methodOwner(arena: NodeArena, fn: FunctionDefNode): ClassDefNode | null {
  const parent = arena.parent(fn);
  if (parent === null) return null;
  const frame = frameOf(arena, parent);
  return frame.kind === 'ClassDef' ? frame : null;
}

export function methodKind(arena: NodeArena, fn: FunctionDefNode): MethodKind {
  if (methodOwner(arena, fn) === null) return 'function';
  const decorators = decoratorNames(arena, fn);
  if (decorators.includes('classmethod')) return 'classmethod';
  if (decorators.includes('staticmethod')) return 'staticmethod';
  return 'method';
}

/**
 * `module.Class.method` style name. Lambdas and generator expressions
 * appear as `<lambda>` and `<genexpr>`; other nodes take their scope's name.
 */
export function qualifiedName(arena: NodeArena, node: SyntaxNode): string {
  const scope = scopeOf(arena, node);
  if (scope.kind === 'Module') return scope.name;

  const own = scope.kind === 'Lambda' ? '<lambda>' : scope.kind === 'GeneratorExp' ? '<genexpr>' : scope.name;
  const parent = arena.parent(scope);
  return parent === null ? own : `${qualifiedName(arena, parent)}.${own}`;
}

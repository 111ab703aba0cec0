/**
 * Map a source line to the node a query runs from.
 */

import { STATEMENT_KINDS, type ModuleNode, type NodeKind, type SyntaxNode } from '@tessera/types';
import type { NodeArena } from '@tessera/core';

const COMPOUND_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  'ClassDef',
  'FunctionDef',
  'If',
  'While',
  'For',
  'TryExcept',
  'TryFinally',
]);

function contains(arena: NodeArena, node: SyntaxNode, line: number): boolean {
  return arena.sourceLine(node) <= line && line <= arena.lastSourceLine(node);
}

/**
 * Innermost statement whose lines cover `line`, or null.
 */
export function statementAt(arena: NodeArena, module: ModuleNode, line: number): SyntaxNode | null {
  let found: SyntaxNode | null = null;
  // pre-order: a later match is nested deeper
  for (const node of arena.nodesOfKind(module, STATEMENT_KINDS)) {
    if (contains(arena, node, line)) found = node;
  }
  return found;
}

/**
 * Innermost compound statement or definition covering `line`; the module
 * when there is none.
 */
export function compoundAt(arena: NodeArena, module: ModuleNode, line: number): SyntaxNode {
  let found: SyntaxNode = module;
  for (const node of arena.nodesOfKind(module, COMPOUND_KINDS)) {
    if (contains(arena, node, line)) found = node;
  }
  return found;
}

/**
 * Block range - map a line inside a compound statement to the
 * (start, end) span of the clause holding it.
 *
 * Definitions are one block anchored at their header. Conditionals and
 * try/except walk their later branches or handlers in order: a line before
 * one ends at the line above it, its header stands alone, a line in its body
 * ends with the body. Lines past them all use the trailing-clause rule
 * shared with loops and try/finally.
 */

import type { ForNode, IfNode, SyntaxNode, TryExceptNode, TryFinallyNode, WhileNode } from '@tessera/types';
import type { NodeArena } from '../tree/NodeArena.js';

export type LineRange = readonly [start: number, end: number];

type ElsedNode = IfNode | WhileNode | ForNode | TryExceptNode | TryFinallyNode;

function trailingClause(arena: NodeArena, node: ElsedNode): SyntaxNode | null {
  if (node.kind === 'TryFinally') return arena.node(node.finalbody);
  return node.orelse === null ? null : arena.node(node.orelse);
}

/**
 * Header line gives `(L, L)`; inside or after the trailing clause gives
 * `(L, clause end)`; before it `(L, clause start - 1)`; without one
 * `(L, last)` with `last` defaulting to the statement's last line. A `last`
 * of 0 comes from a line-less node and counts as absent.
 */
export function elsedBlockRange(arena: NodeArena, node: ElsedNode, line: number, last: number | null = null): LineRange {
  if (line === arena.sourceLine(node)) return [line, line];

  const clause = trailingClause(arena, node);
  if (clause !== null) {
    const clauseStart = arena.sourceLine(clause);
    if (line >= clauseStart) return [line, arena.lastSourceLine(clause)];
    return [line, clauseStart - 1];
  }

  return [line, last || arena.lastSourceLine(node)];
}

/** Lines before a branch belong to the clause above it */
function ifBlockRange(arena: NodeArena, node: IfNode, line: number): LineRange {
  if (line === arena.sourceLine(node)) return [line, line];

  for (const branch of node.branches.slice(1)) {
    const testLine = arena.sourceLine(arena.node(branch.test));
    if (line === testLine) return [line, line];
    if (line < testLine) return [line, testLine - 1];
    const bodyEnd = arena.lastSourceLine(arena.node(branch.body));
    if (line <= bodyEnd) return [line, bodyEnd];
  }
  return elsedBlockRange(arena, node, line);
}

function tryExceptBlockRange(arena: NodeArena, node: TryExceptNode, line: number): LineRange {
  if (line === arena.sourceLine(node)) return [line, line];

  for (const id of node.handlers) {
    const handler = arena.nodeOfKind(id, 'ExceptHandler');
    const headerLine = arena.sourceLine(handler);
    if (line === headerLine || (handler.type !== null && line === arena.sourceLine(arena.node(handler.type)))) {
      return [line, line];
    }
    if (line < headerLine) return [line, headerLine - 1];
    const bodyEnd = arena.lastSourceLine(arena.node(handler.body));
    if (line <= bodyEnd) return [line, bodyEnd];
  }
  return elsedBlockRange(arena, node, line);
}

export function blockRange(arena: NodeArena, node: SyntaxNode, line: number): LineRange {
  switch (node.kind) {
    case 'Module':
    case 'ClassDef':
    case 'FunctionDef':
      return [arena.sourceLine(node), arena.lastSourceLine(node)];
    case 'If':
      return ifBlockRange(arena, node, line);
    case 'TryExcept':
      return tryExceptBlockRange(arena, node, line);
    case 'While':
    case 'For':
    case 'TryFinally':
      return elsedBlockRange(arena, node, line);
    default:
      return [line, arena.lastSourceLine(node)];
  }
}

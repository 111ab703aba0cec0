import type { NodeArena } from '../tree/NodeArena.js';
import { qualifiedName } from '../scope/ScopeResolver.js';
import { isSyntaxNode, type InferredValue } from './values.js';

/**
 * One-line display form of an inferred value.
 */
export function describeValue(arena: NodeArena, value: InferredValue): string {
  if (!isSyntaxNode(value)) return value.describe();

  switch (value.kind) {
    case 'Const':
      return JSON.stringify(value.value);
    case 'Bool':
      return value.value ? 'True' : 'False';
    case 'NoneConst':
      return 'None';
    case 'Module':
      return `Module ${value.name}`;
    case 'ClassDef':
      return `Class ${qualifiedName(arena, value)}`;
    case 'FunctionDef':
      return `Function ${qualifiedName(arena, value)}`;
    default:
      return `${value.kind} at line ${arena.sourceLine(value)}`;
  }
}

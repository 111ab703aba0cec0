/**
 * Ordered child handles per node variant.
 *
 * The order is source order; siblings and `nodesOfKind` rely on it.
 */
import type { NodeId, SyntaxNode } from '@tessera/types';

function optional(id: NodeId | null): NodeId[] {
  return id === null ? [] : [id];
}

function assertNever(node: never): never {
  throw new Error(`Unhandled node variant: ${JSON.stringify(node)}`);
}

export function childIds(node: SyntaxNode): NodeId[] {
  switch (node.kind) {
    case 'Module':
      return [node.body];
    case 'ClassDef':
      return [...node.decorators, ...node.bases, node.body];
    case 'FunctionDef':
      return [...node.decorators, ...node.params, node.body];
    case 'Lambda':
      return [...node.params, node.body];
    case 'GeneratorExp':
      return [node.element, ...node.generators];
    case 'Comprehension':
      return [node.target, node.iter, ...node.ifs];
    case 'Parameter':
      return optional(node.defaultValue);
    case 'Block':
      return [...node.body];
    case 'Assign':
      return [...node.targets, node.value];
    case 'Expr':
      return [node.value];
    case 'Return':
      return optional(node.value);
    case 'If':
      return [...node.branches.flatMap((branch) => [branch.test, branch.body]), ...optional(node.orelse)];
    case 'While':
      return [node.test, node.body, ...optional(node.orelse)];
    case 'For':
      return [node.target, node.iter, node.body, ...optional(node.orelse)];
    case 'TryExcept':
      return [node.body, ...node.handlers, ...optional(node.orelse)];
    case 'ExceptHandler':
      return [...optional(node.type), ...optional(node.name), node.body];
    case 'TryFinally':
      return [node.body, node.finalbody];
    case 'AssignAttr':
    case 'Attribute':
      return [node.expr];
    case 'Call':
      return [node.func, ...node.args, ...node.keywords.map((keyword) => keyword.value)];
    case 'Tuple':
    case 'List':
      return [...node.elts];
    case 'Yield':
      return optional(node.value);
    case 'Pass':
    case 'Global':
    case 'Import':
    case 'ImportFrom':
    case 'Name':
    case 'AssignName':
    case 'Const':
    case 'Bool':
    case 'NoneConst':
      return [];
    default:
      return assertNever(node);
  }
}

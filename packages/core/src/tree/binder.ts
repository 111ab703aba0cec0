/**
 * Binder - fills the scope tables of a finished module tree.
 *
 * Runs once per module from `TreeBuilder.module()`:
 * - definitions bind their name in the scope above them
 * - parameters bind the owning function or lambda
 * - assignment, loop and comprehension targets bind themselves
 * - import forms and `global` bind the statement
 * - an except handler's name binds the try/except statement
 * - `self.x = ...` in a method lands in the class's instance attributes
 *
 * A name declared `global` in a frame is bound in the module instead.
 */

import type { AssignAttrNode, AssignNameNode, FrameNode, ModuleNode, SyntaxNode } from '@tessera/types';
import type { NodeArena } from './NodeArena.js';
import { frameOf, methodKind, methodOwner, setLocal } from '../scope/ScopeResolver.js';

type GlobalNames = Map<FrameNode, Set<string>>;

function collectGlobals(arena: NodeArena, module: ModuleNode): GlobalNames {
  const globals: GlobalNames = new Map();
  for (const statement of arena.nodesOfKind(module, ['Global'])) {
    const frame = frameOf(arena, statement);
    const names = globals.get(frame) ?? new Set<string>();
    for (const name of statement.names) names.add(name);
    globals.set(frame, names);
  }
  return globals;
}

export function bindModule(arena: NodeArena, module: ModuleNode): void {
  const globals = collectGlobals(arena, module);

  /** Bind in the node's scope, or in the module for declared globals */
  const bind = (node: SyntaxNode, name: string, binding: SyntaxNode): void => {
    const declared = globals.get(frameOf(arena, node));
    setLocal(arena, declared?.has(name) ? module : node, name, binding);
  };

  const visit = (node: SyntaxNode): void => {
    switch (node.kind) {
      case 'ClassDef':
      case 'FunctionDef': {
        const parent = arena.parent(node);
        if (parent !== null) bind(parent, node.name, node);
        break;
      }
      case 'Import':
        for (const alias of node.names) {
          bind(node, alias.asname ?? alias.name.split('.')[0], node);
        }
        break;
      case 'ImportFrom':
        for (const alias of node.names) {
          if (alias.name !== '*') bind(node, alias.asname ?? alias.name, node);
        }
        break;
      case 'Global':
        for (const name of node.names) setLocal(arena, node, name, node);
        break;
      case 'AssignName':
        bindTarget(node);
        break;
      case 'AssignAttr':
        bindInstanceAttribute(arena, node);
        break;
    }

    if (node.kind === 'FunctionDef' || node.kind === 'Lambda') {
      for (const id of node.params) {
        const param = arena.nodeOfKind(id, 'Parameter');
        setLocal(arena, node, param.name, node);
      }
    }

    for (const child of arena.children(node)) visit(child);
  };

  const bindTarget = (target: AssignNameNode): void => {
    const parent = arena.parent(target);
    if (parent !== null && parent.kind === 'ExceptHandler') {
      const statement = arena.parent(parent);
      if (statement !== null) bind(target, target.name, statement);
      return;
    }
    bind(target, target.name, target);
  };

  visit(module);
}

/**
 * `<first param>.<attr> = ...` inside a plain method registers the target
 * on the owning class.
 */
function bindInstanceAttribute(arena: NodeArena, target: AssignAttrNode): void {
  const receiver = arena.node(target.expr);
  if (receiver.kind !== 'Name') return;

  const frame = frameOf(arena, target);
  if (frame.kind !== 'FunctionDef' || methodKind(arena, frame) !== 'method') return;

  const selfId = frame.params[0];
  if (selfId === undefined || arena.nodeOfKind(selfId, 'Parameter').name !== receiver.name) return;

  const owner = methodOwner(arena, frame);
  if (owner === null) return;

  const existing = owner.instanceAttrs.get(target.attrname);
  if (existing === undefined) {
    owner.instanceAttrs.set(target.attrname, [target.id]);
  } else {
    existing.push(target.id);
  }
}

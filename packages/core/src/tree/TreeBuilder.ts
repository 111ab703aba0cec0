/**
 * TreeBuilder - bottom-up factory for syntax trees
 *
 * Each factory allocates a record in the arena and attaches the children it
 * was given, so a child built once can be placed only once. `module()` closes
 * a tree: it binds names into the scope tables and registers the module.
 *
 * Usage:
 *   const b = new TreeBuilder(arena);
 *   const mod = b.module('app', [
 *     b.assign(b.assignName('x'), b.constant(1), 1),
 *     b.expr(b.name('x'), 2),
 *   ]);
 */

import type {
  AssignAttrNode,
  AssignNameNode,
  AssignNode,
  AttributeNode,
  BlockNode,
  BoolNode,
  CallNode,
  ClassDefNode,
  ComprehensionNode,
  ConstNode,
  ExceptHandlerNode,
  ExprNode,
  ForNode,
  FunctionDefNode,
  GeneratorExpNode,
  GlobalNode,
  IfNode,
  ImportAlias,
  ImportFromNode,
  ImportNode,
  LambdaNode,
  ListNode,
  ModuleNode,
  NameNode,
  NodeId,
  NoneConstNode,
  ParameterNode,
  PassNode,
  ReturnNode,
  SyntaxNode,
  TryExceptNode,
  TryFinallyNode,
  TupleNode,
  WhileNode,
  YieldNode,
} from '@tessera/types';
import { NodeArena } from './NodeArena.js';
import { childIds } from './children.js';
import { CONST_NAME_TRANSFORMS, CONST_VALUE_TRANSFORMS, type SingletonConstant } from './constants.js';
import { bindModule } from './binder.js';
import { TreeStructureError } from '../errors/TesseraError.js';

/** Line metadata: a bare line number, or the full parser range */
export type Position =
  | number
  | { line?: number | null; fromLine?: number | null; toLine?: number | null }
  | null
  | undefined;

export type ImportSpec = string | { name: string; asname?: string | null };

export interface ClassParts {
  bases?: readonly SyntaxNode[];
  decorators?: readonly SyntaxNode[];
  body: readonly SyntaxNode[];
}

export interface FunctionParts {
  params?: readonly ParameterNode[];
  decorators?: readonly SyntaxNode[];
  body: readonly SyntaxNode[];
}

export interface BranchParts {
  test: SyntaxNode;
  body: readonly SyntaxNode[];
}

interface Lines {
  line: number | null;
  fromLine: number | null;
  toLine: number | null;
}

function lines(position: Position): Lines {
  if (position === null || position === undefined) {
    return { line: null, fromLine: null, toLine: null };
  }
  if (typeof position === 'number') {
    return { line: position, fromLine: null, toLine: null };
  }
  return {
    line: position.line ?? null,
    fromLine: position.fromLine ?? null,
    toLine: position.toLine ?? null,
  };
}

function ids(nodes: readonly SyntaxNode[]): NodeId[] {
  return nodes.map((node) => node.id);
}

function isNodeList(value: SyntaxNode | readonly SyntaxNode[]): value is readonly SyntaxNode[] {
  return Array.isArray(value);
}

function alias(spec: ImportSpec): ImportAlias {
  return typeof spec === 'string' ? { name: spec, asname: null } : { name: spec.name, asname: spec.asname ?? null };
}

/** Scopes whose `yield` belongs to themselves, not to an enclosing function */
const GENERATOR_BOUNDARY = ['FunctionDef', 'Lambda', 'ClassDef', 'GeneratorExp'] as const;

export class TreeBuilder {
  constructor(readonly arena: NodeArena) {}

  private create<T extends SyntaxNode>(build: (id: NodeId) => T): T {
    const node = this.arena.add(build);
    for (const child of childIds(node)) {
      this.arena.attach(child, node.id);
    }
    return node;
  }

  private block(body: readonly SyntaxNode[]): BlockNode {
    return this.create<BlockNode>((id) => ({ id, kind: 'Block', ...lines(null), body: ids(body) }));
  }

  private optionalBlock(body: readonly SyntaxNode[] | null | undefined): BlockNode | null {
    return body === null || body === undefined ? null : this.block(body);
  }

  private singleton(constant: SingletonConstant, position: Position): BoolNode | NoneConstNode {
    if (constant.kind === 'Bool') {
      const value = constant.value;
      return this.create<BoolNode>((id) => ({ id, kind: 'Bool', ...lines(position), value }));
    }
    return this.create<NoneConstNode>((id) => ({ id, kind: 'NoneConst', ...lines(position), value: null }));
  }

  // ─── Scopes ────────────────────────────────────────────────────────

  /**
   * Close a tree: attach the body, bind names, register under `name`.
   * The module line defaults to 0.
   */
  module(name: string, body: readonly SyntaxNode[], position: Position = 0): ModuleNode {
    const block = this.block(body);
    const module = this.create<ModuleNode>((id) => ({
      id,
      kind: 'Module',
      ...lines(position),
      name,
      body: block.id,
      locals: new Map(),
    }));
    bindModule(this.arena, module);
    this.arena.registerModule(module);
    return module;
  }

  classDef(name: string, parts: ClassParts, position?: Position): ClassDefNode {
    const block = this.block(parts.body);
    return this.create<ClassDefNode>((id) => ({
      id,
      kind: 'ClassDef',
      ...lines(position),
      name,
      bases: ids(parts.bases ?? []),
      decorators: ids(parts.decorators ?? []),
      body: block.id,
      locals: new Map(),
      instanceAttrs: new Map(),
    }));
  }

  functionDef(name: string, parts: FunctionParts, position?: Position): FunctionDefNode {
    const block = this.block(parts.body);
    const generator = this.arena.nodesOfKind(block, ['Yield'], GENERATOR_BOUNDARY).next().done !== true;
    return this.create<FunctionDefNode>((id) => ({
      id,
      kind: 'FunctionDef',
      ...lines(position),
      name,
      params: ids(parts.params ?? []),
      decorators: ids(parts.decorators ?? []),
      body: block.id,
      generator,
      locals: new Map(),
    }));
  }

  lambda(params: readonly ParameterNode[], body: SyntaxNode, position?: Position): LambdaNode {
    return this.create<LambdaNode>((id) => ({
      id,
      kind: 'Lambda',
      ...lines(position),
      params: ids(params),
      body: body.id,
      locals: new Map(),
    }));
  }

  generatorExp(element: SyntaxNode, generators: readonly ComprehensionNode[], position?: Position): GeneratorExpNode {
    return this.create<GeneratorExpNode>((id) => ({
      id,
      kind: 'GeneratorExp',
      ...lines(position),
      element: element.id,
      generators: ids(generators),
      locals: new Map(),
    }));
  }

  comprehension(
    target: SyntaxNode,
    iter: SyntaxNode,
    ifs: readonly SyntaxNode[] = [],
    position?: Position
  ): ComprehensionNode {
    return this.create<ComprehensionNode>((id) => ({
      id,
      kind: 'Comprehension',
      ...lines(position),
      target: target.id,
      iter: iter.id,
      ifs: ids(ifs),
    }));
  }

  param(name: string, defaultValue: SyntaxNode | null = null, position?: Position): ParameterNode {
    return this.create<ParameterNode>((id) => ({
      id,
      kind: 'Parameter',
      ...lines(position),
      name,
      defaultValue: defaultValue?.id ?? null,
    }));
  }

  // ─── Simple statements ─────────────────────────────────────────────

  assign(targets: SyntaxNode | readonly SyntaxNode[], value: SyntaxNode, position?: Position): AssignNode {
    const targetList = isNodeList(targets) ? targets : [targets];
    return this.create<AssignNode>((id) => ({
      id,
      kind: 'Assign',
      ...lines(position),
      targets: ids(targetList),
      value: value.id,
    }));
  }

  expr(value: SyntaxNode, position?: Position): ExprNode {
    return this.create<ExprNode>((id) => ({ id, kind: 'Expr', ...lines(position), value: value.id }));
  }

  returnStatement(value: SyntaxNode | null, position?: Position): ReturnNode {
    return this.create<ReturnNode>((id) => ({ id, kind: 'Return', ...lines(position), value: value?.id ?? null }));
  }

  pass(position?: Position): PassNode {
    return this.create<PassNode>((id) => ({ id, kind: 'Pass', ...lines(position) }));
  }

  global(names: readonly string[], position?: Position): GlobalNode {
    return this.create<GlobalNode>((id) => ({ id, kind: 'Global', ...lines(position), names: [...names] }));
  }

  importModules(names: readonly ImportSpec[], position?: Position): ImportNode {
    return this.create<ImportNode>((id) => ({ id, kind: 'Import', ...lines(position), names: names.map(alias) }));
  }

  importFrom(module: string, names: readonly ImportSpec[], position?: Position): ImportFromNode {
    return this.create<ImportFromNode>((id) => ({
      id,
      kind: 'ImportFrom',
      ...lines(position),
      module,
      names: names.map(alias),
    }));
  }

  // ─── Compound statements ───────────────────────────────────────────

  ifStatement(
    branches: readonly BranchParts[],
    orelse: readonly SyntaxNode[] | null = null,
    position?: Position
  ): IfNode {
    const built = branches.map((branch) => ({ test: branch.test.id, body: this.block(branch.body).id }));
    const elseBlock = this.optionalBlock(orelse);
    return this.create<IfNode>((id) => ({
      id,
      kind: 'If',
      ...lines(position),
      branches: built,
      orelse: elseBlock?.id ?? null,
    }));
  }

  whileLoop(
    test: SyntaxNode,
    body: readonly SyntaxNode[],
    orelse: readonly SyntaxNode[] | null = null,
    position?: Position
  ): WhileNode {
    const bodyBlock = this.block(body);
    const elseBlock = this.optionalBlock(orelse);
    return this.create<WhileNode>((id) => ({
      id,
      kind: 'While',
      ...lines(position),
      test: test.id,
      body: bodyBlock.id,
      orelse: elseBlock?.id ?? null,
    }));
  }

  forLoop(
    target: SyntaxNode,
    iter: SyntaxNode,
    body: readonly SyntaxNode[],
    orelse: readonly SyntaxNode[] | null = null,
    position?: Position
  ): ForNode {
    const bodyBlock = this.block(body);
    const elseBlock = this.optionalBlock(orelse);
    return this.create<ForNode>((id) => ({
      id,
      kind: 'For',
      ...lines(position),
      target: target.id,
      iter: iter.id,
      body: bodyBlock.id,
      orelse: elseBlock?.id ?? null,
    }));
  }

  tryExcept(
    body: readonly SyntaxNode[],
    handlers: readonly ExceptHandlerNode[],
    orelse: readonly SyntaxNode[] | null = null,
    position?: Position
  ): TryExceptNode {
    const bodyBlock = this.block(body);
    const elseBlock = this.optionalBlock(orelse);
    return this.create<TryExceptNode>((id) => ({
      id,
      kind: 'TryExcept',
      ...lines(position),
      body: bodyBlock.id,
      handlers: ids(handlers),
      orelse: elseBlock?.id ?? null,
    }));
  }

  exceptHandler(
    type: SyntaxNode | null,
    name: AssignNameNode | null,
    body: readonly SyntaxNode[],
    position?: Position
  ): ExceptHandlerNode {
    const bodyBlock = this.block(body);
    return this.create<ExceptHandlerNode>((id) => ({
      id,
      kind: 'ExceptHandler',
      ...lines(position),
      type: type?.id ?? null,
      name: name?.id ?? null,
      body: bodyBlock.id,
    }));
  }

  tryFinally(body: readonly SyntaxNode[], finalbody: readonly SyntaxNode[], position?: Position): TryFinallyNode {
    const bodyBlock = this.block(body);
    const finalBlock = this.block(finalbody);
    return this.create<TryFinallyNode>((id) => ({
      id,
      kind: 'TryFinally',
      ...lines(position),
      body: bodyBlock.id,
      finalbody: finalBlock.id,
    }));
  }

  // ─── Expressions ───────────────────────────────────────────────────

  /** `None`, `True` and `False` come back as NoneConst / Bool nodes */
  name(name: string, position?: Position): NameNode | BoolNode | NoneConstNode {
    const constant = CONST_NAME_TRANSFORMS.get(name);
    if (constant !== undefined) {
      return this.singleton(constant, position);
    }
    return this.create<NameNode>((id) => ({ id, kind: 'Name', ...lines(position), name }));
  }

  assignName(name: string, position?: Position): AssignNameNode {
    return this.create<AssignNameNode>((id) => ({ id, kind: 'AssignName', ...lines(position), name }));
  }

  assignAttr(expr: SyntaxNode, attrname: string, position?: Position): AssignAttrNode {
    return this.create<AssignAttrNode>((id) => ({ id, kind: 'AssignAttr', ...lines(position), expr: expr.id, attrname }));
  }

  attribute(expr: SyntaxNode, attrname: string, position?: Position): AttributeNode {
    return this.create<AttributeNode>((id) => ({ id, kind: 'Attribute', ...lines(position), expr: expr.id, attrname }));
  }

  call(
    func: SyntaxNode,
    args: readonly SyntaxNode[] = [],
    keywords: Readonly<Record<string, SyntaxNode>> = {},
    position?: Position
  ): CallNode {
    return this.create<CallNode>((id) => ({
      id,
      kind: 'Call',
      ...lines(position),
      func: func.id,
      args: ids(args),
      keywords: Object.entries(keywords).map(([name, value]) => ({ name, value: value.id })),
    }));
  }

  /** `null`, `true` and `false` come back as NoneConst / Bool nodes */
  constant(value: number | string | boolean | null, position?: Position): ConstNode | BoolNode | NoneConstNode {
    if (value === null || typeof value === 'boolean') {
      const constant = CONST_VALUE_TRANSFORMS.get(value);
      if (constant === undefined) {
        throw new TreeStructureError(`No constant transform for ${String(value)}`, 'ERR_TREE_INVALID');
      }
      return this.singleton(constant, position);
    }
    return this.create<ConstNode>((id) => ({ id, kind: 'Const', ...lines(position), value }));
  }

  tuple(elts: readonly SyntaxNode[], position?: Position): TupleNode {
    return this.create<TupleNode>((id) => ({ id, kind: 'Tuple', ...lines(position), elts: ids(elts) }));
  }

  list(elts: readonly SyntaxNode[], position?: Position): ListNode {
    return this.create<ListNode>((id) => ({ id, kind: 'List', ...lines(position), elts: ids(elts) }));
  }

  yieldExpr(value: SyntaxNode | null = null, position?: Position): YieldNode {
    return this.create<YieldNode>((id) => ({ id, kind: 'Yield', ...lines(position), value: value?.id ?? null }));
  }
}

/**
 * InferenceEngine - lazy, cycle-guarded value inference over an arena.
 *
 * Every node inference goes through `infer()`, which pushes the
 * (node, lookup name) pair on the context path, cuts the branch when the
 * pair is already there, and de-duplicates what the node produces.
 * Per-kind behaviour is one exhaustive switch (`inferNode`).
 *
 * Failures travel as outcomes: `inferStatements` skips not-found and
 * unresolvable candidates, turns inference failures into Unknown, and fails
 * only when no candidate produced anything.
 */

import type {
  AssignAttrNode,
  AssignNameNode,
  AttributeNode,
  BoolNode,
  CallNode,
  ClassDefNode,
  ConstNode,
  ExceptHandlerNode,
  FunctionDefNode,
  GlobalNode,
  ImportFromNode,
  ImportNode,
  LambdaNode,
  ModuleNode,
  NoneConstNode,
  ParameterNode,
  SyntaxNode,
  TryExceptNode,
} from '@tessera/types';
import {
  InferenceError,
  NotFoundError,
  UnresolvableNameError,
  type ErrorContext,
  type InferenceFailure,
} from '../errors/TesseraError.js';
import { createLogger, type Logger, type LogLevel } from '../logging/Logger.js';
import type { NodeArena } from '../tree/NodeArena.js';
import {
  DEFAULT_BUILTINS_MODULE,
  lookup,
  methodKind,
  methodOwner,
  moduleOf,
  qualifiedName,
  realName,
  type MethodKind,
} from '../scope/ScopeResolver.js';
import { InferenceContext } from './InferenceContext.js';
import { DONE, fail, filterValues, flatMapValues, inferredValues, mapValues, tap, type Inference } from './outcome.js';
import {
  GeneratorValue,
  Instance,
  InstanceMethod,
  UNKNOWN,
  UnknownValue,
  isSyntaxNode,
  type AttributeLookup,
  type InferredValue,
  type ObjectModel,
} from './values.js';
import { describeValue } from './describe.js';

export interface InferenceEngineOptions {
  logger?: Logger;
  logLevel?: LogLevel;
  /** Module consulted after the scope chain; default `builtins` */
  builtinsModule?: string;
}

/** Scopes whose `return` statements belong to themselves */
const NESTED_SCOPES = ['FunctionDef', 'Lambda', 'ClassDef', 'GeneratorExp'] as const;

/** Classes defining either make any missing non-dunder attribute Unknown */
const DYNAMIC_ATTRIBUTE_HOOKS = ['__getattr__', '__getattribute__'] as const;

function assertNever(node: never): never {
  throw new Error(`Unhandled node variant: ${JSON.stringify(node)}`);
}

export class InferenceEngine implements ObjectModel {
  readonly builtinsModule: string;
  private readonly logger: Logger;
  /** Classes whose base expressions are being inferred */
  private readonly resolvingBases = new Set<ClassDefNode>();

  constructor(
    readonly arena: NodeArena,
    options: InferenceEngineOptions = {}
  ) {
    this.builtinsModule = options.builtinsModule ?? DEFAULT_BUILTINS_MODULE;
    this.logger = options.logger ?? createLogger(options.logLevel ?? 'warnings');
  }

  // ─── Entry points ──────────────────────────────────────────────────

  /**
   * Values `value` may stand for. Proxies and Unknown infer to themselves.
   */
  *infer(value: InferredValue, context: InferenceContext | null = null): Inference {
    if (!isSyntaxNode(value)) {
      yield value;
      return DONE;
    }

    const ctx = context ?? new InferenceContext(value);
    if (!ctx.push(value)) {
      this.logger.trace('Inference cycle cut', { nodeId: value.id, nodeKind: value.kind, name: ctx.lookupName });
      return DONE;
    }

    try {
      const seen = new Set<InferredValue>();
      return yield* filterValues(this.inferNode(value, ctx), (result) => {
        // instances are equal when they wrap the same class
        const key = result instanceof Instance ? result.proxied : result;
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      });
    } finally {
      ctx.pop();
    }
  }

  /**
   * Values bound to `name` as seen from `node`.
   */
  *inferName(node: SyntaxNode, name: string, context: InferenceContext | null = null): Inference {
    const found = lookup(this.arena, node, name, { builtinsModule: this.builtinsModule });
    if (found.kind === 'not_found') {
      return fail(new UnresolvableNameError(name, this.where(node)));
    }
    const ctx = (context ?? new InferenceContext(node)).clone();
    ctx.lookupName = name;
    return yield* this.inferStatements(found.bindings, ctx, found.scope);
  }

  /**
   * Multi-candidate resolution.
   *
   * Unknown candidates pass through; each other candidate is inferred with
   * its own lookup name. Not-found and unresolvable candidates are skipped,
   * failed ones contribute Unknown. Fails when nothing at all was produced.
   */
  *inferStatements(
    candidates: readonly InferredValue[],
    context: InferenceContext | null,
    frame: InferredValue | null = null
  ): Inference {
    const name = context?.lookupName ?? null;
    const ctx = context === null ? new InferenceContext() : context.clone();
    let produced = false;
    let last: InferredValue | null = null;

    for (const candidate of candidates) {
      last = candidate;
      if (candidate === UNKNOWN) {
        yield UNKNOWN;
        produced = true;
        continue;
      }

      ctx.lookupName = this.candidateLookupName(candidate, frame, name);
      const outcome = yield* tap(this.infer(candidate, ctx), () => {
        produced = true;
      });

      if (outcome.kind === 'failed') {
        if (outcome.error instanceof InferenceError) {
          this.logger.debug('Candidate degraded to Unknown', this.failureContext(candidate, outcome.error));
          yield UNKNOWN;
          produced = true;
        } else {
          this.logger.trace('Candidate skipped', this.failureContext(candidate, outcome.error));
        }
      }
    }

    if (!produced) {
      const subject = last === null ? 'empty candidate list' : this.describe(last);
      return fail(new InferenceError(`No value inferred from ${subject}`, { name: name ?? undefined }));
    }
    return DONE;
  }

  /**
   * Attribute `name` of an inferred value.
   */
  *igetattr(owner: InferredValue, name: string, context: InferenceContext | null = null): Inference {
    if (owner instanceof UnknownValue) {
      yield UNKNOWN;
      return DONE;
    }
    if (owner instanceof Instance) {
      return yield* owner.inferredGetAttr(name, context);
    }
    if (owner instanceof InstanceMethod || owner instanceof GeneratorValue) {
      return yield* this.igetattr(owner.proxied, name, context);
    }

    switch (owner.kind) {
      case 'Module':
        return yield* this.moduleInferredGetAttr(owner, name, context);
      case 'ClassDef':
        return yield* this.classInferredGetAttr(owner, name, context);
      case 'Bool':
      case 'NoneConst':
      case 'Const': {
        const instance = this.builtinInstance(owner);
        if (instance === null) return fail(new NotFoundError(name, this.where(owner)));
        return yield* instance.inferredGetAttr(name, context);
      }
      default:
        return fail(new NotFoundError(name, this.where(owner)));
    }
  }

  /**
   * Values produced by calling `callee` from `caller`.
   */
  *inferCallResult(callee: InferredValue, caller: SyntaxNode, context: InferenceContext | null = null): Inference {
    const ctx = context ?? new InferenceContext(caller);

    if (callee instanceof UnknownValue) {
      yield UNKNOWN;
      return DONE;
    }
    if (callee instanceof Instance) {
      return yield* callee.inferCallResult(caller, ctx);
    }
    if (callee instanceof InstanceMethod) {
      const methodCtx = ctx.clone();
      methodCtx.boundNode = callee.receiver;
      return yield* this.functionCallResult(callee.proxied, methodCtx);
    }
    if (callee instanceof GeneratorValue) {
      return fail(new InferenceError(`${callee.describe()} is not callable`, this.where(caller)));
    }

    switch (callee.kind) {
      case 'ClassDef':
        yield new Instance(callee, this);
        return DONE;
      case 'FunctionDef':
        return yield* this.functionCallResult(callee, ctx);
      case 'Lambda':
        return yield* this.infer(this.arena.node(callee.body), ctx.clone());
      default:
        return fail(new InferenceError(`${this.describe(callee)} is not callable`, this.where(caller)));
    }
  }

  // ─── Object model ──────────────────────────────────────────────────

  /**
   * Base classes in lookup order (depth first, each class once).
   *
   * A base expression that needs the ancestry of a class whose bases are
   * still being inferred (`class A(A.x)`) sees no bases for that class.
   */
  ancestors(cls: ClassDefNode): ClassDefNode[] {
    if (this.resolvingBases.has(cls)) {
      this.logger.trace('Base class cycle cut', { nodeId: cls.id, name: cls.name });
      return [];
    }

    const result: ClassDefNode[] = [];
    const seen = new Set<ClassDefNode>([cls]);

    const visit = (klass: ClassDefNode): void => {
      const entered = !this.resolvingBases.has(klass);
      this.resolvingBases.add(klass);
      try {
        for (const id of klass.bases) {
          const baseExpr = this.arena.node(id);
          for (const base of inferredValues(this.infer(baseExpr, new InferenceContext(baseExpr)))) {
            if (base.kind !== 'ClassDef' || seen.has(base)) continue;
            seen.add(base);
            result.push(base);
            visit(base);
          }
        }
      } finally {
        if (entered) this.resolvingBases.delete(klass);
      }
    };

    visit(cls);
    return result;
  }

  instanceAttr(cls: ClassDefNode, name: string): AttributeLookup {
    for (const klass of [cls, ...this.ancestors(cls)]) {
      const ids = klass.instanceAttrs.get(name);
      if (ids !== undefined && ids.length > 0) {
        return { kind: 'found', nodes: ids.map((id) => this.arena.node(id)) };
      }
    }
    return { kind: 'not_found', error: new NotFoundError(name, this.where(cls)) };
  }

  classGetAttr(cls: ClassDefNode, name: string): AttributeLookup {
    for (const klass of [cls, ...this.ancestors(cls)]) {
      const ids = klass.locals.get(name);
      if (ids !== undefined && ids.length > 0) {
        return { kind: 'found', nodes: ids.map((id) => this.arena.node(id)) };
      }
    }
    return { kind: 'not_found', error: new NotFoundError(name, this.where(cls)) };
  }

  /**
   * Inferred class attribute. Descriptor instances come back as Unknown; a
   * missing non-dunder name is Unknown when the class hooks attribute access.
   */
  *classInferredGetAttr(cls: ClassDefNode, name: string, context: InferenceContext | null = null): Inference {
    const attrs = this.classGetAttr(cls, name);
    if (attrs.kind === 'not_found') {
      if (!name.startsWith('__') && this.hasDynamicAttributes(cls)) {
        yield UNKNOWN;
        return DONE;
      }
      return fail(
        new InferenceError(`${qualifiedName(this.arena, cls)} has no attribute "${name}"`, {
          ...this.where(cls),
          name,
        })
      );
    }

    const ctx = (context ?? new InferenceContext(cls)).clone();
    ctx.lookupName = name;
    return yield* mapValues(this.inferStatements(attrs.nodes, ctx, cls), (value) =>
      this.isDescriptor(value) ? UNKNOWN : value
    );
  }

  methodKind(fn: FunctionDefNode): MethodKind {
    return methodKind(this.arena, fn);
  }

  qualifiedName(node: SyntaxNode): string {
    return qualifiedName(this.arena, node);
  }

  describe(value: InferredValue): string {
    return describeValue(this.arena, value);
  }

  private isDescriptor(value: InferredValue): boolean {
    return value instanceof Instance && this.classGetAttr(value.proxied, '__get__').kind === 'found';
  }

  private hasDynamicAttributes(cls: ClassDefNode): boolean {
    return DYNAMIC_ATTRIBUTE_HOOKS.some((hook) => {
      const found = this.classGetAttr(cls, hook);
      return (
        found.kind === 'found' &&
        found.nodes.some((node) => moduleOf(this.arena, node).name !== this.builtinsModule)
      );
    });
  }

  private isInstanceOf(instance: Instance, cls: ClassDefNode): boolean {
    return instance.proxied === cls || this.ancestors(instance.proxied).includes(cls);
  }

  /** Instance of the builtins class backing a literal, when builtins are loaded */
  private builtinInstance(node: BoolNode | NoneConstNode | ConstNode): Instance | null {
    const className =
      node.kind === 'Bool'
        ? 'bool'
        : node.kind === 'NoneConst'
          ? 'NoneType'
          : typeof node.value === 'string'
            ? 'str'
            : Number.isInteger(node.value)
              ? 'int'
              : 'float';

    const builtins = this.arena.module(this.builtinsModule);
    for (const id of builtins?.locals.get(className) ?? []) {
      const binding = this.arena.node(id);
      if (binding.kind === 'ClassDef') return new Instance(binding, this);
    }
    return null;
  }

  private *moduleInferredGetAttr(module: ModuleNode, name: string, context: InferenceContext | null): Inference {
    const ids = module.locals.get(name);
    if (ids === undefined || ids.length === 0) {
      return fail(new InferenceError(`Module "${module.name}" has no attribute "${name}"`, { name, nodeId: module.id }));
    }
    const ctx = (context ?? new InferenceContext(module)).clone();
    ctx.lookupName = name;
    return yield* this.inferStatements(
      ids.map((id) => this.arena.node(id)),
      ctx,
      module
    );
  }

  // ─── Per-kind inference ────────────────────────────────────────────

  private inferNode(node: SyntaxNode, ctx: InferenceContext): Inference {
    switch (node.kind) {
      case 'Module':
      case 'ClassDef':
      case 'GeneratorExp':
      case 'Const':
      case 'Bool':
      case 'NoneConst':
      case 'Tuple':
      case 'List':
        return this.inferEnd(node);
      case 'FunctionDef':
      case 'Lambda':
        return this.inferCallable(node, ctx);
      case 'Parameter':
        return this.inferParameter(node, ctx);
      case 'Name':
        return this.inferName(node, node.name, ctx);
      case 'AssignName':
      case 'AssignAttr':
        return this.inferAssigned(node, ctx);
      case 'Attribute':
        return this.inferAttribute(node, ctx);
      case 'Call':
        return this.inferCall(node, ctx);
      case 'Import':
        return this.inferImport(node, ctx);
      case 'ImportFrom':
        return this.inferImportFrom(node, ctx);
      case 'Global':
        return this.inferGlobal(node, ctx);
      case 'TryExcept':
        return this.inferTryExcept(node, ctx);
      case 'Comprehension':
      case 'Block':
      case 'Assign':
      case 'Expr':
      case 'Return':
      case 'Pass':
      case 'If':
      case 'While':
      case 'For':
      case 'ExceptHandler':
      case 'TryFinally':
      case 'Yield':
        return this.noInference(node);
      default:
        return assertNever(node);
    }
  }

  private *inferEnd(node: SyntaxNode): Inference {
    yield node;
    return DONE;
  }

  private *noInference(node: SyntaxNode): Inference {
    return fail(new InferenceError(`No inference for ${node.kind}`, this.where(node)));
  }

  /** A function or lambda is itself, unless a parameter is being looked up */
  private *inferCallable(node: FunctionDefNode | LambdaNode, ctx: InferenceContext): Inference {
    const name = ctx.lookupName;
    if (name !== null && this.parameters(node).some((param) => param.name === name)) {
      return yield* this.inferArgument(node, name, ctx);
    }
    yield node;
    return DONE;
  }

  private *inferParameter(param: ParameterNode, ctx: InferenceContext): Inference {
    const owner = this.arena.parent(param);
    if (owner === null || (owner.kind !== 'FunctionDef' && owner.kind !== 'Lambda')) {
      return yield* this.noInference(param);
    }
    return yield* this.inferArgument(owner, param.name, ctx);
  }

  private parameters(fn: FunctionDefNode | LambdaNode): ParameterNode[] {
    return fn.params.map((id) => this.arena.nodeOfKind(id, 'Parameter'));
  }

  /**
   * Value of parameter `name`: the receiver for the first parameter of a
   * method, the call argument when a call context is present, else the
   * default. Without a call context the parameter may also be anything.
   */
  private *inferArgument(fn: FunctionDefNode | LambdaNode, name: string, ctx: InferenceContext): Inference {
    const params = this.parameters(fn);
    const index = params.findIndex((param) => param.name === name);
    const param = params[index];
    if (param === undefined) {
      return fail(new NotFoundError(name, this.where(fn)));
    }

    let offset = 0;
    if (fn.kind === 'FunctionDef') {
      const kind = this.methodKind(fn);
      const owner = methodOwner(this.arena, fn);
      if (owner !== null && (kind === 'method' || kind === 'classmethod')) {
        if (index === 0) {
          if (kind === 'classmethod') {
            yield owner;
          } else {
            const bound = ctx.boundNode;
            yield bound instanceof Instance && this.isInstanceOf(bound, owner) ? bound : new Instance(owner, this);
          }
          return DONE;
        }
        if (kind === 'classmethod' || ctx.boundNode instanceof Instance) offset = 1;
      }
    }

    const call = ctx.callContext;
    if (call !== null) {
      const argument = call.keywords.get(name) ?? call.args[index - offset];
      if (argument !== undefined) {
        const argCtx = ctx.clone();
        argCtx.callContext = call.caller;
        argCtx.boundNode = null;
        return yield* this.inferOrUnknown(argument, argCtx);
      }
    }

    if (param.defaultValue !== null) {
      const defaultCtx = ctx.clone();
      defaultCtx.callContext = null;
      yield* this.inferOrUnknown(this.arena.node(param.defaultValue), defaultCtx);
      if (call !== null) return DONE;
    }

    yield UNKNOWN;
    return DONE;
  }

  /** Infer `node`; a failure becomes Unknown */
  private *inferOrUnknown(node: SyntaxNode, ctx: InferenceContext): Inference {
    const outcome = yield* this.infer(node, ctx);
    if (outcome.kind === 'failed') {
      this.logger.debug('Value degraded to Unknown', this.failureContext(node, outcome.error));
      yield UNKNOWN;
    }
    return DONE;
  }

  /**
   * Value assigned to a target: the assignment's value, the matching
   * element when unpacking, the loop iterable's elements, or the handled
   * exception.
   */
  private *inferAssigned(node: AssignNameNode | AssignAttrNode, ctx: InferenceContext): Inference {
    const path: number[] = [];
    let current: SyntaxNode = node;
    let parent = this.arena.parent(node);
    while (parent !== null && (parent.kind === 'Tuple' || parent.kind === 'List')) {
      path.unshift(parent.elts.indexOf(current.id));
      current = parent;
      parent = this.arena.parent(parent);
    }

    if (parent === null) return yield* this.noInference(node);
    const valueCtx = ctx.clone();

    switch (parent.kind) {
      case 'Assign':
        if (!parent.targets.includes(current.id)) break;
        return yield* this.unpack(this.infer(this.arena.node(parent.value), valueCtx), path, valueCtx);
      case 'For':
      case 'Comprehension':
        if (parent.target !== current.id) break;
        return yield* this.unpack(this.iterate(this.arena.node(parent.iter), valueCtx), path, valueCtx);
      case 'ExceptHandler':
        return yield* this.exceptionInstances(parent, valueCtx);
    }
    return yield* this.noInference(node);
  }

  private *unpack(source: Inference, path: readonly number[], ctx: InferenceContext): Inference {
    const [index, ...rest] = path;
    if (index === undefined) return yield* source;

    return yield* flatMapValues(
      source,
      (value) => this.element(value, index, rest, ctx),
      (error, value) => this.logger.trace('Unpacking skipped', this.failureContext(value, error))
    );
  }

  private *element(value: InferredValue, index: number, rest: readonly number[], ctx: InferenceContext): Inference {
    if (value.kind === 'Tuple' || value.kind === 'List') {
      const id = value.elts[index];
      if (id !== undefined) {
        return yield* this.unpack(this.inferOrUnknown(this.arena.node(id), ctx.clone()), rest, ctx);
      }
    }
    yield UNKNOWN;
    return DONE;
  }

  /** Elements produced by iterating over `node` */
  private *iterate(node: SyntaxNode, ctx: InferenceContext): Inference {
    return yield* flatMapValues(
      this.infer(node, ctx),
      (value) => this.elements(value, ctx),
      (error, value) => this.logger.trace('Iteration skipped', this.failureContext(value, error))
    );
  }

  private *elements(value: InferredValue, ctx: InferenceContext): Inference {
    if (value.kind === 'Tuple' || value.kind === 'List') {
      for (const id of value.elts) {
        yield* this.inferOrUnknown(this.arena.node(id), ctx.clone());
      }
      return DONE;
    }
    yield UNKNOWN;
    return DONE;
  }

  private *exceptionInstances(handler: ExceptHandlerNode, ctx: InferenceContext): Inference {
    if (handler.type === null) {
      yield UNKNOWN;
      return DONE;
    }
    return yield* flatMapValues(
      this.infer(this.arena.node(handler.type), ctx),
      (value) => this.exceptionInstance(value, ctx),
      (error, value) => this.logger.trace('Exception class skipped', this.failureContext(value, error))
    );
  }

  private *exceptionInstance(value: InferredValue, ctx: InferenceContext): Inference {
    if (value instanceof UnknownValue) {
      yield UNKNOWN;
    } else if (value.kind === 'ClassDef') {
      yield new Instance(value, this);
    } else if (value.kind === 'Tuple') {
      for (const id of value.elts) {
        yield* flatMapValues(
          this.infer(this.arena.node(id), ctx.clone()),
          (member) => this.exceptionInstance(member, ctx),
          (error, member) => this.logger.trace('Exception class skipped', this.failureContext(member, error))
        );
      }
    }
    return DONE;
  }

  private *inferTryExcept(node: TryExceptNode, ctx: InferenceContext): Inference {
    const name = ctx.lookupName;
    if (name === null) {
      return fail(new InferenceError('A try/except binding needs a lookup name', this.where(node)));
    }

    let matched = false;
    for (const id of node.handlers) {
      const handler = this.arena.nodeOfKind(id, 'ExceptHandler');
      if (handler.name === null || this.arena.nodeOfKind(handler.name, 'AssignName').name !== name) continue;
      matched = true;
      const outcome = yield* this.exceptionInstances(handler, ctx.clone());
      if (outcome.kind === 'failed') {
        this.logger.trace('Handler skipped', this.failureContext(handler, outcome.error));
      }
    }

    if (!matched) return fail(new NotFoundError(name, this.where(node)));
    return DONE;
  }

  private *inferAttribute(node: AttributeNode, ctx: InferenceContext): Inference {
    return yield* flatMapValues(
      this.infer(this.arena.node(node.expr), ctx.clone()),
      (owner) => {
        const attrCtx = ctx.clone();
        attrCtx.boundNode = owner;
        return this.igetattr(owner, node.attrname, attrCtx);
      },
      (error, owner) => this.logger.trace('Attribute skipped', this.failureContext(owner, error))
    );
  }

  private *inferCall(node: CallNode, ctx: InferenceContext): Inference {
    const callCtx = ctx.clone();
    callCtx.callContext = {
      args: node.args.map((id) => this.arena.node(id)),
      keywords: new Map<string, SyntaxNode>(
        node.keywords.map((keyword): [string, SyntaxNode] => [keyword.name, this.arena.node(keyword.value)])
      ),
      caller: ctx.callContext,
    };
    callCtx.boundNode = null;

    return yield* flatMapValues(
      this.infer(this.arena.node(node.func), ctx.clone()),
      (callee) => this.inferCallResult(callee, node, callCtx),
      (error, callee) => this.logger.trace('Call result skipped', this.failureContext(callee, error))
    );
  }

  /**
   * Generator functions give a generator object; other functions give the
   * values of their own `return` statements.
   */
  private *functionCallResult(fn: FunctionDefNode, ctx: InferenceContext): Inference {
    if (fn.generator) {
      yield new GeneratorValue(fn, this);
      return DONE;
    }

    let produced = false;
    const returns = this.arena.nodesOfKind(this.arena.node(fn.body), ['Return'], NESTED_SCOPES);
    for (const statement of returns) {
      if (statement.value === null) continue;
      yield* tap(this.inferOrUnknown(this.arena.node(statement.value), ctx.clone()), () => {
        produced = true;
      });
    }

    if (!produced) {
      return fail(new InferenceError(`No return value inferred for ${qualifiedName(this.arena, fn)}`, this.where(fn)));
    }
    return DONE;
  }

  private *inferImport(node: ImportNode, ctx: InferenceContext): Inference {
    const name = ctx.lookupName;
    if (name === null) {
      return fail(new InferenceError('An import binding needs a lookup name', this.where(node)));
    }
    const real = realName(node, name);
    if (real === null) return fail(new NotFoundError(name, this.where(node)));

    const module = this.arena.module(real);
    if (module === undefined) {
      return fail(new InferenceError(`Module "${real}" is not loaded`, { ...this.where(node), name: real }));
    }
    yield module;
    return DONE;
  }

  private *inferImportFrom(node: ImportFromNode, ctx: InferenceContext): Inference {
    const name = ctx.lookupName;
    if (name === null) {
      return fail(new InferenceError('An import binding needs a lookup name', this.where(node)));
    }
    const real = realName(node, name);
    if (real === null) return fail(new NotFoundError(name, this.where(node)));

    const module = this.arena.module(node.module);
    if (module === undefined) {
      return fail(new InferenceError(`Module "${node.module}" is not loaded`, { ...this.where(node), name: node.module }));
    }
    return yield* this.moduleInferredGetAttr(module, real, ctx);
  }

  private *inferGlobal(node: GlobalNode, ctx: InferenceContext): Inference {
    const name = ctx.lookupName;
    if (name === null) {
      return fail(new InferenceError('A global binding needs a lookup name', this.where(node)));
    }
    return yield* this.moduleInferredGetAttr(moduleOf(this.arena, node), name, ctx);
  }

  // ─── Helpers ───────────────────────────────────────────────────────

  /**
   * Lookup name a candidate is inferred with: import forms, `global` and
   * try/except keep the name, as does the function or lambda whose scope
   * bound it (its parameters). Everything else starts without one.
   */
  private candidateLookupName(candidate: InferredValue, frame: InferredValue | null, name: string | null): string | null {
    switch (candidate.kind) {
      case 'Import':
      case 'ImportFrom':
      case 'Global':
      case 'TryExcept':
        return name;
      case 'FunctionDef':
      case 'Lambda':
        return candidate === frame ? name : null;
      default:
        return null;
    }
  }

  private where(node: SyntaxNode): ErrorContext {
    return { nodeId: node.id, nodeKind: node.kind, lineNumber: this.arena.sourceLine(node) };
  }

  private failureContext(value: InferredValue, error: InferenceFailure): Record<string, unknown> {
    return { value: this.describe(value), code: error.code, reason: error.message };
  }
}

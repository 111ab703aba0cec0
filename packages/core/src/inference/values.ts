/**
 * Runtime proxy model.
 *
 * Inference results are either syntax nodes or one of these stand-ins for
 * runtime objects: an Instance of a class, an InstanceMethod (function bound
 * to a receiver), a generator object, or the absorbing Unknown marker.
 * Proxies infer to themselves; the attribute and call logic they need comes
 * from an ObjectModel (the inference engine).
 */

import type { ClassDefNode, FunctionDefNode, SyntaxNode } from '@tessera/types';
import { InferenceError, NotFoundError } from '../errors/TesseraError.js';
import type { InferenceContext } from './InferenceContext.js';
import { DONE, fail, flatMapValues, mapValues, tap, type Inference } from './outcome.js';
import type { MethodKind } from '../scope/ScopeResolver.js';

export type AttributeLookup =
  | { kind: 'found'; nodes: SyntaxNode[] }
  | { kind: 'not_found'; error: NotFoundError };

/**
 * What proxies ask of the engine.
 */
export interface ObjectModel {
  /** Instance attribute targets of the class and its ancestors */
  instanceAttr(cls: ClassDefNode, name: string): AttributeLookup;
  /** Class-level bindings of the class and its ancestors */
  classGetAttr(cls: ClassDefNode, name: string): AttributeLookup;
  classInferredGetAttr(cls: ClassDefNode, name: string, context: InferenceContext | null): Inference;
  inferStatements(
    candidates: readonly InferredValue[],
    context: InferenceContext | null,
    frame?: InferredValue | null
  ): Inference;
  inferCallResult(callee: InferredValue, caller: SyntaxNode, context: InferenceContext | null): Inference;
  methodKind(fn: FunctionDefNode): MethodKind;
  qualifiedName(node: SyntaxNode): string;
}

export class UnknownValue {
  static readonly instance = new UnknownValue();

  readonly kind = 'Unknown';

  private constructor() {}

  getAttr(_name: string): UnknownValue {
    return this;
  }

  call(..._args: unknown[]): UnknownValue {
    return this;
  }

  *[Symbol.iterator](): Generator<UnknownValue, void, undefined> {
    yield this;
  }

  typeName(): string {
    return 'Unknown';
  }

  describe(): string {
    return 'Unknown';
  }
}

/** The one Unknown value */
export const UNKNOWN = UnknownValue.instance;

function notFound(name: string, cls: ClassDefNode): AttributeLookup {
  return { kind: 'not_found', error: new NotFoundError(name, { nodeId: cls.id, nodeKind: cls.kind }) };
}

/**
 * An object of the wrapped class.
 */
export class Instance {
  readonly kind = 'Instance';

  constructor(
    readonly proxied: ClassDefNode,
    private readonly model: ObjectModel
  ) {}

  get name(): string {
    return this.proxied.name;
  }

  /**
   * Instance attributes first; then `__class__` is the class itself and
   * `__name__` is never found on an instance; then class attributes when
   * `lookupClass` is set.
   */
  getAttr(name: string, lookupClass = true): AttributeLookup {
    const own = this.model.instanceAttr(this.proxied, name);
    if (own.kind === 'found') return own;

    if (name === '__class__') return { kind: 'found', nodes: [this.proxied] };
    if (name === '__name__') return notFound(name, this.proxied);
    if (lookupClass) return this.model.classGetAttr(this.proxied, name);

    return notFound(name, this.proxied);
  }

  *inferredGetAttr(name: string, context: InferenceContext | null): Inference {
    const own = this.getAttr(name, false);
    if (own.kind === 'found') {
      return yield* this.model.inferStatements(
        own.nodes.map((node) => this.bindAttribute(node)),
        context,
        this
      );
    }
    // class lookup knows about descriptors and dynamic attributes
    return yield* mapValues(this.model.classInferredGetAttr(this.proxied, name, context), (value) =>
      this.bindAttribute(value)
    );
  }

  /** Plain methods become bound methods; everything else passes through */
  bindAttribute(value: InferredValue): InferredValue {
    if (value.kind === 'FunctionDef' && this.model.methodKind(value) === 'method') {
      return new InstanceMethod(value, this.model, this);
    }
    return value;
  }

  /**
   * Values returned by calling the instance, through its `__call__`.
   */
  *inferCallResult(caller: SyntaxNode, context: InferenceContext | null): Inference {
    let produced = false;
    const failures: InferenceError[] = [];

    const callables = this.model.classInferredGetAttr(this.proxied, '__call__', context);
    const outcome = yield* tap(
      flatMapValues(
        callables,
        // `__call__` receives the instance as self
        (callable) => this.model.inferCallResult(this.bindAttribute(callable), caller, context),
        (error) => {
          failures.push(error instanceof InferenceError ? error : new InferenceError(error.message, error.context));
        }
      ),
      () => {
        produced = true;
      }
    );

    if (outcome.kind === 'failed') return outcome;
    if (!produced) {
      return fail(
        failures[failures.length - 1] ??
          new InferenceError(`${this.describe()} is not callable`, { nodeId: this.proxied.id, name: '__call__' })
      );
    }
    return DONE;
  }

  /** True when `__call__` is found by plain lookup */
  isCallable(): boolean {
    return this.model.classGetAttr(this.proxied, '__call__').kind === 'found';
  }

  typeName(): string {
    return this.model.qualifiedName(this.proxied);
  }

  describe(): string {
    return `Instance of ${this.model.qualifiedName(this.proxied)}`;
  }
}

/**
 * A method bound to a receiver.
 */
export class InstanceMethod {
  readonly kind = 'InstanceMethod';

  constructor(
    readonly proxied: FunctionDefNode,
    private readonly model: ObjectModel,
    readonly receiver: Instance
  ) {}

  get name(): string {
    return this.proxied.name;
  }

  isBound(): boolean {
    return true;
  }

  isCallable(): boolean {
    return true;
  }

  typeName(): string {
    return 'builtins.instancemethod';
  }

  describe(): string {
    const qualified = this.model.qualifiedName(this.proxied);
    const owner = qualified.slice(0, qualified.lastIndexOf('.'));
    return `Bound method ${this.proxied.name} of ${owner}`;
  }
}

/**
 * The object a generator function returns when called.
 */
export class GeneratorValue {
  readonly kind = 'Generator';

  constructor(
    readonly proxied: FunctionDefNode,
    private readonly model: ObjectModel
  ) {}

  get name(): string {
    return this.proxied.name;
  }

  /** Generator objects are iterated, not called */
  isCallable(): boolean {
    return false;
  }

  typeName(): string {
    return 'builtins.generator';
  }

  describe(): string {
    return `Generator of ${this.model.qualifiedName(this.proxied)}`;
  }
}

export type ProxyValue = Instance | InstanceMethod | GeneratorValue;

export type InferredValue = SyntaxNode | ProxyValue | UnknownValue;

export function isProxy(value: InferredValue): value is ProxyValue | UnknownValue {
  return (
    value instanceof Instance ||
    value instanceof InstanceMethod ||
    value instanceof GeneratorValue ||
    value instanceof UnknownValue
  );
}

export function isSyntaxNode(value: InferredValue): value is SyntaxNode {
  return !isProxy(value);
}

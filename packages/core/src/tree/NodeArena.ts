/**
 * NodeArena - owner of every syntax node record
 *
 * Records are immutable and addressed by `NodeId`. The arena keeps the
 * parent relation separately, so a child is linked to its parent only
 * through `attach`, which rejects a second owner and any cycle.
 *
 * Module roots are registered by name; import inference resolves modules
 * through the same arena.
 */

import type {
  NodeId,
  NodeKind,
  NodeOfKind,
  ModuleNode,
  SyntaxNode,
} from '@tessera/types';
import { TreeStructureError } from '../errors/TesseraError.js';
import { childIds } from './children.js';

export type KindFilter = ReadonlySet<NodeKind> | readonly NodeKind[];

export interface LineSpan {
  from: number;
  to: number;
}

function toKindSet(filter: KindFilter): ReadonlySet<NodeKind> {
  return filter instanceof Set ? filter : new Set<NodeKind>(filter);
}

export class NodeArena {
  private readonly records: SyntaxNode[] = [];
  private readonly parents: (NodeId | null)[] = [];
  private readonly lastLineCache = new Map<NodeId, number>();
  private readonly moduleIndex = new Map<string, ModuleNode>();

  get size(): number {
    return this.records.length;
  }

  /**
   * Allocate the next id and store the record `build` returns for it.
   */
  add<T extends SyntaxNode>(build: (id: NodeId) => T): T {
    const id = this.records.length;
    const record = build(id);
    if (record.id !== id) {
      throw new TreeStructureError(
        `Record id ${record.id} does not match allocated id ${id}`,
        'ERR_TREE_INVALID',
        { nodeId: id, nodeKind: record.kind }
      );
    }
    this.records.push(record);
    this.parents.push(null);
    return record;
  }

  node(id: NodeId): SyntaxNode {
    const record = this.records[id];
    if (record === undefined) {
      throw new TreeStructureError(`Unknown node id ${id}`, 'ERR_TREE_UNKNOWN_NODE', { nodeId: id });
    }
    return record;
  }

  /**
   * Fetch a record and check its variant.
   */
  nodeOfKind<K extends NodeKind>(id: NodeId, kind: K): NodeOfKind<K> {
    const record = this.node(id);
    if (!isKind(record, kind)) {
      throw new TreeStructureError(
        `Node ${id} is ${record.kind}, expected ${kind}`,
        'ERR_TREE_INVALID',
        { nodeId: id, nodeKind: record.kind }
      );
    }
    return record;
  }

  // ─── Parent relation ───────────────────────────────────────────────

  /**
   * Link `child` under `parent`.
   *
   * @throws TreeStructureError ERR_TREE_OWNERSHIP when the child already has a parent
   * @throws TreeStructureError ERR_TREE_CYCLE when the child is the parent or one of its ancestors
   */
  attach(child: NodeId, parent: NodeId): void {
    const childNode = this.node(child);
    this.node(parent);

    const owner = this.parents[child];
    if (owner !== null && owner !== undefined) {
      throw new TreeStructureError(
        `${childNode.kind} node ${child} already belongs to node ${owner}`,
        'ERR_TREE_OWNERSHIP',
        { nodeId: child, nodeKind: childNode.kind },
        'Build a fresh node for every position in the tree'
      );
    }

    for (let cursor: NodeId | null = parent; cursor !== null; cursor = this.parents[cursor] ?? null) {
      if (cursor === child) {
        throw new TreeStructureError(
          `Attaching node ${child} under node ${parent} would create a cycle`,
          'ERR_TREE_CYCLE',
          { nodeId: child, nodeKind: childNode.kind }
        );
      }
    }

    this.parents[child] = parent;

    // Last lines of the new parent and its ancestors may have grown
    for (let cursor: NodeId | null = parent; cursor !== null; cursor = this.parents[cursor] ?? null) {
      this.lastLineCache.delete(cursor);
    }
  }

  parent(node: SyntaxNode): SyntaxNode | null {
    const parentId = this.parents[node.id] ?? null;
    return parentId === null ? null : this.node(parentId);
  }

  children(node: SyntaxNode): SyntaxNode[] {
    return childIds(node).map((id) => this.node(id));
  }

  /**
   * True when `node` is `ancestor` or lies below it.
   */
  parentOf(ancestor: SyntaxNode, node: SyntaxNode): boolean {
    for (let cursor: SyntaxNode | null = node; cursor !== null; cursor = this.parent(cursor)) {
      if (cursor === ancestor) return true;
    }
    return false;
  }

  // ─── Modules ───────────────────────────────────────────────────────

  registerModule(module: ModuleNode): void {
    const existing = this.moduleIndex.get(module.name);
    if (existing !== undefined && existing !== module) {
      throw new TreeStructureError(
        `Module "${module.name}" is already registered`,
        'ERR_TREE_DUPLICATE_MODULE',
        { name: module.name, nodeId: module.id }
      );
    }
    this.moduleIndex.set(module.name, module);
  }

  module(name: string): ModuleNode | undefined {
    return this.moduleIndex.get(name);
  }

  modules(): ModuleNode[] {
    return [...this.moduleIndex.values()];
  }

  // ─── Lines ─────────────────────────────────────────────────────────

  /**
   * The node's own line, else its first child's, else its parent's.
   * Returns 0 when nothing in reach carries a line.
   */
  sourceLine(node: SyntaxNode): number {
    if (node.line !== null) return node.line;

    for (let child = this.children(node)[0]; child !== undefined; child = this.children(child)[0]) {
      if (child.line !== null) return child.line;
    }

    for (let ancestor = this.parent(node); ancestor !== null; ancestor = this.parent(ancestor)) {
      if (ancestor.line !== null) return ancestor.line;
    }

    return 0;
  }

  /**
   * Greatest source line within the subtree. Memoized per node; `attach`
   * drops the cached values of the parent chain.
   */
  lastSourceLine(node: SyntaxNode): number {
    const cached = this.lastLineCache.get(node.id);
    if (cached !== undefined) return cached;

    let last = this.sourceLine(node);
    for (const child of this.children(node)) {
      last = Math.max(last, this.lastSourceLine(child));
    }

    this.lastLineCache.set(node.id, last);
    return last;
  }

  /**
   * Line span for display: parser-provided range when present, computed otherwise.
   */
  lineSpan(node: SyntaxNode): LineSpan {
    return {
      from: node.fromLine ?? this.sourceLine(node),
      to: node.toLine ?? this.lastSourceLine(node),
    };
  }

  // ─── Traversal ─────────────────────────────────────────────────────

  /**
   * Lazy pre-order walk yielding nodes whose kind is in `kinds`, `start`
   * included.
   *
   * A descendant whose kind is in `skip` is still yielded when it matches
   * `kinds`, but its subtree is not entered. `start` itself is never skipped.
   */
  *nodesOfKind<K extends NodeKind>(
    start: SyntaxNode,
    kinds: ReadonlySet<K> | readonly K[],
    skip?: KindFilter
  ): Generator<NodeOfKind<K>, void, undefined> {
    const match: ReadonlySet<NodeKind> = toKindSet(kinds);
    const skipSet = skip === undefined ? null : toKindSet(skip);
    yield* this.walk(start, skipSet, (node): node is NodeOfKind<K> => match.has(node.kind));
  }

  private *walk<T extends SyntaxNode>(
    node: SyntaxNode,
    skip: ReadonlySet<NodeKind> | null,
    accept: (node: SyntaxNode) => node is T
  ): Generator<T, void, undefined> {
    if (accept(node)) yield node;

    for (const child of this.children(node)) {
      if (skip?.has(child.kind)) {
        if (accept(child)) yield child;
        continue;
      }
      yield* this.walk(child, skip, accept);
    }
  }
}

export function isKind<K extends NodeKind>(node: SyntaxNode, kind: K): node is NodeOfKind<K> {
  return node.kind === kind;
}

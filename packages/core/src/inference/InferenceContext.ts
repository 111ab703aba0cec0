/**
 * InferenceContext - state carried through one resolution chain.
 *
 * `path` holds the (node, lookup name) pairs currently being inferred. It is
 * shared by every clone made from the same chain, so re-entering a pair
 * anywhere down the chain is detected, while `lookupName` varies per branch.
 */

import type { NodeId, SyntaxNode } from '@tessera/types';
import type { InferredValue } from './values.js';

export interface CallContext {
  readonly args: readonly SyntaxNode[];
  readonly keywords: ReadonlyMap<string, SyntaxNode>;
  /** Call context the arguments themselves are evaluated in */
  readonly caller: CallContext | null;
}

interface PathEntry {
  readonly nodeId: NodeId;
  readonly name: string | null;
}

export class InferenceContext {
  lookupName: string | null = null;
  callContext: CallContext | null = null;
  /** Receiver while an attribute or bound method resolves */
  boundNode: InferredValue | null = null;

  constructor(
    readonly startingNode: SyntaxNode | null = null,
    private readonly path: PathEntry[] = []
  ) {}

  get depth(): number {
    return this.path.length;
  }

  /**
   * Enter (node, lookupName). Returns false when the pair is already on the
   * path; the caller then produces no further values for it.
   */
  push(node: SyntaxNode): boolean {
    const name = this.lookupName;
    if (this.path.some((entry) => entry.nodeId === node.id && entry.name === name)) {
      return false;
    }
    this.path.push({ nodeId: node.id, name });
    return true;
  }

  pop(): void {
    this.path.pop();
  }

  /**
   * Same path, same call context and receiver, lookup name reset.
   */
  clone(): InferenceContext {
    const copy = new InferenceContext(this.startingNode, this.path);
    copy.callContext = this.callContext;
    copy.boundNode = this.boundNode;
    return copy;
  }
}

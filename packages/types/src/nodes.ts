/**
 * Node Types - syntax tree node variants
 *
 * Every construct the engine understands is one member of the closed
 * `SyntaxNode` union, discriminated by `kind`. Child links are `NodeId`
 * handles into the owning arena; the parent relation is kept by the arena,
 * not by the records, so records never change after creation (scope tables
 * excepted, see `LocalsTable`).
 */

// === NODE KINDS ===
export const NODE_KIND = {
  // Definitions and scopes
  MODULE: 'Module',
  CLASS_DEF: 'ClassDef',
  FUNCTION_DEF: 'FunctionDef',
  LAMBDA: 'Lambda',
  GENERATOR_EXP: 'GeneratorExp',
  COMPREHENSION: 'Comprehension',
  PARAMETER: 'Parameter',
  BLOCK: 'Block',

  // Simple statements
  ASSIGN: 'Assign',
  EXPR: 'Expr',
  RETURN: 'Return',
  PASS: 'Pass',
  GLOBAL: 'Global',
  IMPORT: 'Import',
  IMPORT_FROM: 'ImportFrom',

  // Compound statements
  IF: 'If',
  WHILE: 'While',
  FOR: 'For',
  TRY_EXCEPT: 'TryExcept',
  EXCEPT_HANDLER: 'ExceptHandler',
  TRY_FINALLY: 'TryFinally',

  // Expressions
  NAME: 'Name',
  ASSIGN_NAME: 'AssignName',
  ASSIGN_ATTR: 'AssignAttr',
  ATTRIBUTE: 'Attribute',
  CALL: 'Call',
  CONST: 'Const',
  BOOL: 'Bool',
  NONE_CONST: 'NoneConst',
  TUPLE: 'Tuple',
  LIST: 'List',
  YIELD: 'Yield',
} as const;

export type NodeKind = typeof NODE_KIND[keyof typeof NODE_KIND];

/** Arena handle. Stable for the lifetime of the arena. */
export type NodeId = number;

/** name -> binding nodes, in registration order. Append-only. */
export type LocalsTable = Map<string, NodeId[]>;

// === NODE RECORDS ===
export interface BaseNode {
  readonly id: NodeId;
  readonly kind: NodeKind;
  /** Line assigned by the parser; null when the parser left it unset */
  readonly line: number | null;
  readonly fromLine: number | null;
  readonly toLine: number | null;
}

export interface ModuleNode extends BaseNode {
  readonly kind: 'Module';
  readonly name: string;
  readonly body: NodeId;
  readonly locals: LocalsTable;
}

export interface ClassDefNode extends BaseNode {
  readonly kind: 'ClassDef';
  readonly name: string;
  readonly bases: readonly NodeId[];
  readonly decorators: readonly NodeId[];
  readonly body: NodeId;
  readonly locals: LocalsTable;
  /** Attributes assigned through `self.<attr> = ...` inside methods */
  readonly instanceAttrs: LocalsTable;
}

export interface FunctionDefNode extends BaseNode {
  readonly kind: 'FunctionDef';
  readonly name: string;
  readonly params: readonly NodeId[];
  readonly decorators: readonly NodeId[];
  readonly body: NodeId;
  readonly generator: boolean;
  readonly locals: LocalsTable;
}

export interface LambdaNode extends BaseNode {
  readonly kind: 'Lambda';
  readonly params: readonly NodeId[];
  readonly body: NodeId;
  readonly locals: LocalsTable;
}

export interface GeneratorExpNode extends BaseNode {
  readonly kind: 'GeneratorExp';
  readonly element: NodeId;
  readonly generators: readonly NodeId[];
  readonly locals: LocalsTable;
}

export interface ComprehensionNode extends BaseNode {
  readonly kind: 'Comprehension';
  readonly target: NodeId;
  readonly iter: NodeId;
  readonly ifs: readonly NodeId[];
}

export interface ParameterNode extends BaseNode {
  readonly kind: 'Parameter';
  readonly name: string;
  readonly defaultValue: NodeId | null;
}

/** Ordered statement sequence: module, class and function bodies, clauses */
export interface BlockNode extends BaseNode {
  readonly kind: 'Block';
  readonly body: readonly NodeId[];
}

export interface AssignNode extends BaseNode {
  readonly kind: 'Assign';
  readonly targets: readonly NodeId[];
  readonly value: NodeId;
}

export interface ExprNode extends BaseNode {
  readonly kind: 'Expr';
  readonly value: NodeId;
}

export interface ReturnNode extends BaseNode {
  readonly kind: 'Return';
  readonly value: NodeId | null;
}

export interface PassNode extends BaseNode {
  readonly kind: 'Pass';
}

export interface GlobalNode extends BaseNode {
  readonly kind: 'Global';
  readonly names: readonly string[];
}

export interface ImportAlias {
  /** Dotted module name, or `*` for star imports */
  readonly name: string;
  readonly asname: string | null;
}

export interface ImportNode extends BaseNode {
  readonly kind: 'Import';
  readonly names: readonly ImportAlias[];
}

export interface ImportFromNode extends BaseNode {
  readonly kind: 'ImportFrom';
  readonly module: string;
  readonly names: readonly ImportAlias[];
}

export interface IfBranch {
  readonly test: NodeId;
  readonly body: NodeId;
}

/** `if` / `elif` chain: one branch per test, optional trailing `else` block */
export interface IfNode extends BaseNode {
  readonly kind: 'If';
  readonly branches: readonly IfBranch[];
  readonly orelse: NodeId | null;
}

export interface WhileNode extends BaseNode {
  readonly kind: 'While';
  readonly test: NodeId;
  readonly body: NodeId;
  readonly orelse: NodeId | null;
}

export interface ForNode extends BaseNode {
  readonly kind: 'For';
  readonly target: NodeId;
  readonly iter: NodeId;
  readonly body: NodeId;
  readonly orelse: NodeId | null;
}

export interface TryExceptNode extends BaseNode {
  readonly kind: 'TryExcept';
  readonly body: NodeId;
  readonly handlers: readonly NodeId[];
  readonly orelse: NodeId | null;
}

export interface ExceptHandlerNode extends BaseNode {
  readonly kind: 'ExceptHandler';
  /** Guard expression; null for a bare `except:` */
  readonly type: NodeId | null;
  /** AssignName receiving the exception, if any */
  readonly name: NodeId | null;
  readonly body: NodeId;
}

export interface TryFinallyNode extends BaseNode {
  readonly kind: 'TryFinally';
  readonly body: NodeId;
  readonly finalbody: NodeId;
}

export interface NameNode extends BaseNode {
  readonly kind: 'Name';
  readonly name: string;
}

export interface AssignNameNode extends BaseNode {
  readonly kind: 'AssignName';
  readonly name: string;
}

export interface AssignAttrNode extends BaseNode {
  readonly kind: 'AssignAttr';
  readonly expr: NodeId;
  readonly attrname: string;
}

export interface AttributeNode extends BaseNode {
  readonly kind: 'Attribute';
  readonly expr: NodeId;
  readonly attrname: string;
}

export interface KeywordArgument {
  readonly name: string;
  readonly value: NodeId;
}

export interface CallNode extends BaseNode {
  readonly kind: 'Call';
  readonly func: NodeId;
  readonly args: readonly NodeId[];
  readonly keywords: readonly KeywordArgument[];
}

export interface ConstNode extends BaseNode {
  readonly kind: 'Const';
  readonly value: number | string;
}

export interface BoolNode extends BaseNode {
  readonly kind: 'Bool';
  readonly value: boolean;
}

export interface NoneConstNode extends BaseNode {
  readonly kind: 'NoneConst';
  readonly value: null;
}

export interface TupleNode extends BaseNode {
  readonly kind: 'Tuple';
  readonly elts: readonly NodeId[];
}

export interface ListNode extends BaseNode {
  readonly kind: 'List';
  readonly elts: readonly NodeId[];
}

export interface YieldNode extends BaseNode {
  readonly kind: 'Yield';
  readonly value: NodeId | null;
}

export type SyntaxNode =
  | ModuleNode
  | ClassDefNode
  | FunctionDefNode
  | LambdaNode
  | GeneratorExpNode
  | ComprehensionNode
  | ParameterNode
  | BlockNode
  | AssignNode
  | ExprNode
  | ReturnNode
  | PassNode
  | GlobalNode
  | ImportNode
  | ImportFromNode
  | IfNode
  | WhileNode
  | ForNode
  | TryExceptNode
  | ExceptHandlerNode
  | TryFinallyNode
  | NameNode
  | AssignNameNode
  | AssignAttrNode
  | AttributeNode
  | CallNode
  | ConstNode
  | BoolNode
  | NoneConstNode
  | TupleNode
  | ListNode
  | YieldNode;

/** Narrow a node union to the member carrying `kind` K */
export type NodeOfKind<K extends NodeKind> = Extract<SyntaxNode, { kind: K }>;

// === CLASSIFICATION ===

/** Variants that are executable units within a block */
export const STATEMENT_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  NODE_KIND.CLASS_DEF,
  NODE_KIND.FUNCTION_DEF,
  NODE_KIND.ASSIGN,
  NODE_KIND.EXPR,
  NODE_KIND.RETURN,
  NODE_KIND.PASS,
  NODE_KIND.GLOBAL,
  NODE_KIND.IMPORT,
  NODE_KIND.IMPORT_FROM,
  NODE_KIND.IF,
  NODE_KIND.WHILE,
  NODE_KIND.FOR,
  NODE_KIND.TRY_EXCEPT,
  NODE_KIND.TRY_FINALLY,
]);

/** Name-binding targets: module, function, class */
export const FRAME_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  NODE_KIND.MODULE,
  NODE_KIND.FUNCTION_DEF,
  NODE_KIND.CLASS_DEF,
]);

/** Frames plus lambdas and generator expressions */
export const SCOPE_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  ...FRAME_KINDS,
  NODE_KIND.LAMBDA,
  NODE_KIND.GENERATOR_EXP,
]);

export type FrameNode = ModuleNode | FunctionDefNode | ClassDefNode;
export type ScopeNode = FrameNode | LambdaNode | GeneratorExpNode;

export function isStatement(node: SyntaxNode): boolean {
  return STATEMENT_KINDS.has(node.kind);
}

export function isFrame(node: SyntaxNode): node is FrameNode {
  return node.kind === 'Module' || node.kind === 'FunctionDef' || node.kind === 'ClassDef';
}

export function isScope(node: SyntaxNode): node is ScopeNode {
  return isFrame(node) || node.kind === 'Lambda' || node.kind === 'GeneratorExp';
}

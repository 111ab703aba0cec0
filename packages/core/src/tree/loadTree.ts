/**
 * JSON tree loader.
 *
 * A serialized tree is a nested object per node: `{ "kind": "...", "line": 3, ...fields }`.
 * Field names follow the node records, with child handles replaced by the
 * child objects themselves. Every node is rebuilt through TreeBuilder, so
 * constant transforms, generator flags and binding happen exactly as for
 * trees built in code.
 *
 * Example:
 *   {
 *     "kind": "Module", "name": "app",
 *     "body": [
 *       { "kind": "Assign", "line": 1,
 *         "targets": [{ "kind": "AssignName", "name": "x" }],
 *         "value": { "kind": "Const", "value": 1 } }
 *     ]
 *   }
 */

import { readFileSync } from 'fs';
import { basename, extname } from 'path';
import type {
  AssignNameNode,
  ComprehensionNode,
  ExceptHandlerNode,
  ModuleNode,
  NodeKind,
  NodeOfKind,
  ParameterNode,
  SyntaxNode,
} from '@tessera/types';
import { TreeStructureError } from '../errors/TesseraError.js';
import { isKind, type NodeArena } from './NodeArena.js';
import { TreeBuilder, type BranchParts, type ImportSpec, type Position } from './TreeBuilder.js';

type JsonObject = Record<string, unknown>;

export interface LoadTreeOptions {
  /** Module name when the document has none */
  moduleName?: string;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(path: string, problem: string): TreeStructureError {
  return new TreeStructureError(`Invalid tree at ${path}: ${problem}`, 'ERR_TREE_INVALID', { path });
}

class TreeReader {
  private readonly b: TreeBuilder;

  constructor(arena: NodeArena) {
    this.b = new TreeBuilder(arena);
  }

  // ─── Field readers ─────────────────────────────────────────────────

  private object(value: unknown, path: string): JsonObject {
    if (!isObject(value)) throw invalid(path, 'expected an object');
    return value;
  }

  private string(obj: JsonObject, key: string, path: string): string {
    const value = obj[key];
    if (typeof value !== 'string' || value === '') {
      throw invalid(`${path}.${key}`, 'expected a non-empty string');
    }
    return value;
  }

  private optionalString(obj: JsonObject, key: string, path: string): string | null {
    if (obj[key] === undefined || obj[key] === null) return null;
    return this.string(obj, key, path);
  }

  private stringList(obj: JsonObject, key: string, path: string): string[] {
    const value = obj[key];
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string' && item !== '')) {
      throw invalid(`${path}.${key}`, 'expected an array of non-empty strings');
    }
    return value;
  }

  private line(obj: JsonObject, key: string, path: string): number | null {
    const value = obj[key];
    if (value === undefined || value === null) return null;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw invalid(`${path}.${key}`, 'expected a non-negative integer');
    }
    return value;
  }

  private position(obj: JsonObject, path: string): Position {
    return {
      line: this.line(obj, 'line', path),
      fromLine: this.line(obj, 'fromLine', path),
      toLine: this.line(obj, 'toLine', path),
    };
  }

  private child(obj: JsonObject, key: string, path: string): SyntaxNode {
    if (obj[key] === undefined || obj[key] === null) {
      throw invalid(`${path}.${key}`, 'missing node');
    }
    return this.node(obj[key], `${path}.${key}`);
  }

  private optionalChild(obj: JsonObject, key: string, path: string): SyntaxNode | null {
    if (obj[key] === undefined || obj[key] === null) return null;
    return this.node(obj[key], `${path}.${key}`);
  }

  private children(obj: JsonObject, key: string, path: string, required = true): SyntaxNode[] {
    const value = obj[key];
    if (value === undefined && !required) return [];
    if (!Array.isArray(value)) throw invalid(`${path}.${key}`, 'expected an array of nodes');
    return value.map((item, index) => this.node(item, `${path}.${key}[${index}]`));
  }

  private optionalChildren(obj: JsonObject, key: string, path: string): SyntaxNode[] | null {
    if (obj[key] === undefined || obj[key] === null) return null;
    return this.children(obj, key, path);
  }

  private ofKind<K extends NodeKind>(node: SyntaxNode, kind: K, path: string): NodeOfKind<K> {
    if (!isKind(node, kind)) throw invalid(path, `expected ${kind}, got ${node.kind}`);
    return node;
  }

  private typedChildren<K extends NodeKind>(obj: JsonObject, key: string, kind: K, path: string): NodeOfKind<K>[] {
    return this.children(obj, key, path, false).map((node, index) => this.ofKind(node, kind, `${path}.${key}[${index}]`));
  }

  private params(obj: JsonObject, path: string): ParameterNode[] {
    return this.typedChildren(obj, 'params', 'Parameter', path);
  }

  private imports(obj: JsonObject, path: string): ImportSpec[] {
    const value = obj.names;
    if (!Array.isArray(value) || value.length === 0) {
      throw invalid(`${path}.names`, 'expected a non-empty array');
    }
    return value.map((item, index): ImportSpec => {
      const itemPath = `${path}.names[${index}]`;
      if (typeof item === 'string' && item !== '') return item;
      const spec = this.object(item, itemPath);
      return { name: this.string(spec, 'name', itemPath), asname: this.optionalString(spec, 'asname', itemPath) };
    });
  }

  private branches(obj: JsonObject, path: string): BranchParts[] {
    const value = obj.branches;
    if (!Array.isArray(value) || value.length === 0) {
      throw invalid(`${path}.branches`, 'expected a non-empty array');
    }
    return value.map((item, index) => {
      const branchPath = `${path}.branches[${index}]`;
      const branch = this.object(item, branchPath);
      return { test: this.child(branch, 'test', branchPath), body: this.children(branch, 'body', branchPath) };
    });
  }

  private keywords(obj: JsonObject, path: string): Record<string, SyntaxNode> {
    const value = obj.keywords;
    if (value === undefined || value === null) return {};
    const keywords = this.object(value, `${path}.keywords`);
    const result: Record<string, SyntaxNode> = {};
    for (const [name, item] of Object.entries(keywords)) {
      result[name] = this.node(item, `${path}.keywords.${name}`);
    }
    return result;
  }

  private constantValue(obj: JsonObject, path: string): number | string | boolean | null {
    const value = obj.value;
    if (value === null || typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
      return value;
    }
    throw invalid(`${path}.value`, 'expected a number, string, boolean or null');
  }

  // ─── Nodes ─────────────────────────────────────────────────────────

  module(value: unknown, fallbackName: string | undefined): ModuleNode {
    const path = '$';
    const obj = this.object(value, path);
    if (obj.kind !== 'Module') throw invalid(`${path}.kind`, 'root must be a Module');
    const name = this.optionalString(obj, 'name', path) ?? fallbackName;
    if (name === undefined) throw invalid(`${path}.name`, 'module name missing');
    const body = this.children(obj, 'body', path);
    const line = this.line(obj, 'line', path);
    return this.b.module(name, body, line ?? 0);
  }

  node(value: unknown, path: string): SyntaxNode {
    const obj = this.object(value, path);
    const at = this.position(obj, path);
    const b = this.b;

    switch (obj.kind) {
      case 'ClassDef':
        return b.classDef(
          this.string(obj, 'name', path),
          {
            bases: this.children(obj, 'bases', path, false),
            decorators: this.children(obj, 'decorators', path, false),
            body: this.children(obj, 'body', path),
          },
          at
        );
      case 'FunctionDef':
        return b.functionDef(
          this.string(obj, 'name', path),
          {
            params: this.params(obj, path),
            decorators: this.children(obj, 'decorators', path, false),
            body: this.children(obj, 'body', path),
          },
          at
        );
      case 'Lambda':
        return b.lambda(this.params(obj, path), this.child(obj, 'body', path), at);
      case 'GeneratorExp': {
        const element = this.child(obj, 'element', path);
        const generators: ComprehensionNode[] = this.typedChildren(obj, 'generators', 'Comprehension', path);
        return b.generatorExp(element, generators, at);
      }
      case 'Comprehension':
        return b.comprehension(
          this.child(obj, 'target', path),
          this.child(obj, 'iter', path),
          this.children(obj, 'ifs', path, false),
          at
        );
      case 'Parameter':
        return b.param(this.string(obj, 'name', path), this.optionalChild(obj, 'default', path), at);
      case 'Assign':
        return b.assign(this.children(obj, 'targets', path), this.child(obj, 'value', path), at);
      case 'Expr':
        return b.expr(this.child(obj, 'value', path), at);
      case 'Return':
        return b.returnStatement(this.optionalChild(obj, 'value', path), at);
      case 'Pass':
        return b.pass(at);
      case 'Global':
        return b.global(this.stringList(obj, 'names', path), at);
      case 'Import':
        return b.importModules(this.imports(obj, path), at);
      case 'ImportFrom':
        return b.importFrom(this.string(obj, 'module', path), this.imports(obj, path), at);
      case 'If':
        return b.ifStatement(this.branches(obj, path), this.optionalChildren(obj, 'orelse', path), at);
      case 'While':
        return b.whileLoop(
          this.child(obj, 'test', path),
          this.children(obj, 'body', path),
          this.optionalChildren(obj, 'orelse', path),
          at
        );
      case 'For':
        return b.forLoop(
          this.child(obj, 'target', path),
          this.child(obj, 'iter', path),
          this.children(obj, 'body', path),
          this.optionalChildren(obj, 'orelse', path),
          at
        );
      case 'TryExcept': {
        const body = this.children(obj, 'body', path);
        const handlers: ExceptHandlerNode[] = this.typedChildren(obj, 'handlers', 'ExceptHandler', path);
        return b.tryExcept(body, handlers, this.optionalChildren(obj, 'orelse', path), at);
      }
      case 'ExceptHandler': {
        const type = this.optionalChild(obj, 'type', path);
        const nameNode = this.optionalChild(obj, 'name', path);
        const name: AssignNameNode | null =
          nameNode === null ? null : this.ofKind(nameNode, 'AssignName', `${path}.name`);
        return b.exceptHandler(type, name, this.children(obj, 'body', path), at);
      }
      case 'TryFinally':
        return b.tryFinally(this.children(obj, 'body', path), this.children(obj, 'finalbody', path), at);
      case 'Name':
        return b.name(this.string(obj, 'name', path), at);
      case 'AssignName':
        return b.assignName(this.string(obj, 'name', path), at);
      case 'AssignAttr':
        return b.assignAttr(this.child(obj, 'expr', path), this.string(obj, 'attrname', path), at);
      case 'Attribute':
        return b.attribute(this.child(obj, 'expr', path), this.string(obj, 'attrname', path), at);
      case 'Call':
        return b.call(
          this.child(obj, 'func', path),
          this.children(obj, 'args', path, false),
          this.keywords(obj, path),
          at
        );
      case 'Const':
        return b.constant(this.constantValue(obj, path), at);
      case 'Bool':
        if (typeof obj.value !== 'boolean') throw invalid(`${path}.value`, 'expected a boolean');
        return b.constant(obj.value, at);
      case 'NoneConst':
        return b.constant(null, at);
      case 'Tuple':
        return b.tuple(this.children(obj, 'elts', path), at);
      case 'List':
        return b.list(this.children(obj, 'elts', path), at);
      case 'Yield':
        return b.yieldExpr(this.optionalChild(obj, 'value', path), at);
      case 'Module':
        throw invalid(`${path}.kind`, 'a Module can only be the root');
      case 'Block':
        throw invalid(`${path}.kind`, 'statement sequences are plain arrays');
      default:
        throw invalid(`${path}.kind`, `unknown node kind ${JSON.stringify(obj.kind)}`);
    }
  }
}

/**
 * Build and register a module from a parsed JSON document.
 *
 * @throws TreeStructureError ERR_TREE_INVALID naming the JSON path of the first bad entry
 */
export function loadTree(arena: NodeArena, document: unknown, options: LoadTreeOptions = {}): ModuleNode {
  return new TreeReader(arena).module(document, options.moduleName);
}

/**
 * Read a JSON tree file. The module name defaults to the file name without extension.
 */
export function loadTreeFile(arena: NodeArena, filePath: string): ModuleNode {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new TreeStructureError(
      `Cannot read tree file ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      'ERR_TREE_INVALID',
      { filePath },
      'Tree files must be JSON documents with a Module at the root'
    );
  }
  return loadTree(arena, document, { moduleName: basename(filePath, extname(filePath)) });
}

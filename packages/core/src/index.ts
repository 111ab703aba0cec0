/**
 * @tessera/core - Scope resolution and lazy value inference over syntax trees
 */

// Error types
export {
  TesseraError,
  NotFoundError,
  UnresolvableNameError,
  InferenceError,
  TreeStructureError,
  ConfigError,
} from './errors/TesseraError.js';
export type { ErrorContext, ErrorSeverity, TesseraErrorJSON, InferenceFailure } from './errors/TesseraError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  isLogLevel,
  LOG_LEVELS,
} from './logging/Logger.js';
export type { Logger, LogLevel, LogContext } from './logging/Logger.js';

// Config
export { loadConfig, DEFAULT_CONFIG, validateVersion, validateLogLevel, validateModules } from './config/index.js';
export type { TesseraConfig, ConfigWarnings } from './config/index.js';

// Version
export { TESSERA_VERSION, getSchemaVersion } from './version.js';

// Tree
export { NodeArena, isKind } from './tree/NodeArena.js';
export type { KindFilter, LineSpan } from './tree/NodeArena.js';
export { childIds } from './tree/children.js';
export { TreeBuilder } from './tree/TreeBuilder.js';
export type { Position, ImportSpec, ClassParts, FunctionParts, BranchParts } from './tree/TreeBuilder.js';
export { bindModule } from './tree/binder.js';
export { loadTree, loadTreeFile } from './tree/loadTree.js';
export type { LoadTreeOptions } from './tree/loadTree.js';
export { CONST_NAME_TRANSFORMS, CONST_VALUE_TRANSFORMS } from './tree/constants.js';
export type { SingletonConstant } from './tree/constants.js';

// Scope resolution
export {
  DEFAULT_BUILTINS_MODULE,
  statementOf,
  frameOf,
  scopeOf,
  rootOf,
  moduleOf,
  nextSibling,
  previousSibling,
  setLocal,
  nearest,
  lookup,
  realName,
  methodOwner,
  methodKind,
  qualifiedName,
} from './scope/ScopeResolver.js';
export type { NameLookupResult, MethodKind, LookupOptions } from './scope/ScopeResolver.js';

// Block ranges
export { blockRange, elsedBlockRange } from './blocks/blockRange.js';
export type { LineRange } from './blocks/blockRange.js';

// Inference
export { InferenceContext } from './inference/InferenceContext.js';
export type { CallContext } from './inference/InferenceContext.js';
export { InferenceEngine } from './inference/InferenceEngine.js';
export type { InferenceEngineOptions } from './inference/InferenceEngine.js';
export {
  DONE,
  fail,
  tap,
  mapValues,
  filterValues,
  flatMapValues,
  collectInference,
  inferredValues,
} from './inference/outcome.js';
export type { Inference, InferenceOutcome, InferenceResult } from './inference/outcome.js';
export {
  UnknownValue,
  UNKNOWN,
  Instance,
  InstanceMethod,
  GeneratorValue,
  isProxy,
  isSyntaxNode,
} from './inference/values.js';
export type { AttributeLookup, ObjectModel, ProxyValue, InferredValue } from './inference/values.js';
export { describeValue } from './inference/describe.js';

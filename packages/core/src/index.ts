/**
 * Strata core
 *
 * A uniform store contract over document sources, and composite stores
 * that join, federate, alias and partition them
 */

// Re-export types
export type {
  Document,
  Filter,
  Projection,
  Properties,
  Sort,
  KeySpec,
  QueryOptions,
  Group,
  ConnectOptions,
  NewerInOptions,
  Validator,
  StoreOptions,
  Store,
} from "./types.js";

// Stores
export { BaseStore, collect, keyFields, DEFAULT_KEY, DEFAULT_LAST_UPDATED_FIELD } from "./stores/base.js";
export { MemoryStore, type MemoryStoreOptions } from "./stores/memory.js";
export { JSONStore, parseJsonDocuments, type JSONStoreOptions } from "./stores/json.js";
export { JointStore, MERGE_OBJECTS_MIN_VERSION, type JointStoreOptions } from "./stores/joint.js";
export { ConcatStore } from "./stores/concat.js";
export { AliasingStore } from "./stores/aliasing.js";
export {
  SandboxStore,
  SANDBOX_FIELD,
  CORE_SANDBOX,
  type SandboxStoreOptions,
} from "./stores/sandbox.js";
export {
  FileStore,
  fileRecord,
  fileId,
  unprotected,
  PROTECTED_KEYS,
  fileStoreOptionsSchema,
  type FileRecord,
  type FileStoreOptions,
} from "./stores/file.js";

// Database
export {
  MemoryDatabase,
  compareVersions,
  type DocumentDatabase,
  type MemoryDatabaseOptions,
} from "./database.js";
export { runPipeline, evaluate, type PipelineStage, type Expression } from "./pipeline.js";

// Aliases
export {
  substitute,
  invertAliases,
  lookupKeys,
  lookupDict,
  lookupProperties,
  lookupSort,
  toInternalPath,
  parseAliases,
  aliasMapSchema,
  type AliasMap,
} from "./alias.js";

// Query engine
export {
  matches,
  project,
  getPath,
  setPath,
  sortDocuments,
  groupDocuments,
  toDate,
  isPlainObject,
} from "./query.js";

// Validation
export { JSONSchemaValidator, type JSONSchemaValidatorOptions } from "./schema/validator.js";

// Errors
export {
  StoreError,
  StoreNotConnectedError,
  UnsupportedOperationError,
  ServerVersionError,
  ReadOnlyError,
  ConfigurationError,
  DocumentValidationError,
  DuplicateKeyError,
  DocumentNotFoundError,
  DocumentReadError,
  DocumentWriteError,
  DirectoryError,
} from "./errors.js";

// Logging
export {
  logger,
  formatLogLine,
  type LogLevel,
  type LogEntry,
  type LogFields,
  type ScopedLogger,
} from "./observability/logs.js";

// Formatting
export { stableStringify } from "./format.js";

export {
  Q,
  Query,
  QueryGroup,
  and,
  or,
  type Predicate,
  type QueryOp,
  type QueryGroupOp,
  type QueryValues,
} from "./query";

export {
  Context,
  makeContext,
  parseOrder,
  type ContextOptions,
  type ContextState,
  type OrderEntry,
  type Ordering,
  type Returning,
  type Scope,
} from "./context";

export {
  Field,
  Index,
  Schema,
  type FieldDefinition,
  type FieldFlag,
  type FieldGetter,
  type FieldSetter,
  type IndexDefinition,
  type IndexFlag,
} from "./schema";

export {
  model,
  defaultRegistry,
  ModelBuilder,
  ModelDefinition,
  ModelRegistry,
  ValidationError,
  type LookupOptions,
  type ModelOptions,
  type ResolvedModelOptions,
} from "./model";

export { ModelRecord, type LocalChanges, type RecordInit } from "./record";

export {
  Collection,
  reverseLookup,
  type CollectionInit,
  type CollectionLike,
  type Collector,
  type CollectorSetter,
  type RecordFactory,
  type ReverseLookupOptions,
} from "./collection";

export {
  InvalidKeyError,
  MissingStoreError,
  ReadOnlyError,
  UnknownKeyError,
  UnknownModelError,
} from "./errors";

export { consoleLogger, silentLogger, type ConsoleLoggerOptions, type Logger, type LogLevel } from "./logger";

export {
  DuplicateRecordError,
  RecordNotFoundError,
  type RawRow,
  type Store,
} from "./engines/types";

export { memoryStore, type MemoryStore, type MemoryStoreOptions } from "./engines/memory";

export type { Values } from "./utils";

import type { StandardSchemaV1 } from "@standard-schema/spec";

import { Collection, type Collector } from "./collection";
import { makeContext, type ContextOptions } from "./context";
import type { RawRow, Store } from "./engines/types";
import { InvalidKeyError, MissingStoreError, ReadOnlyError, UnknownModelError } from "./errors";
import { silentLogger, type Logger } from "./logger";
import { Q, type Predicate } from "./query";
import { ModelRecord, type RecordInit } from "./record";
import { Field, Index, Schema, type FieldDefinition, type IndexDefinition } from "./schema";
import type { Values } from "./utils";

// ---------------------------------------------------------------------------
// Public model types
// ---------------------------------------------------------------------------

export interface ModelOptions {
  /** Default namespace (schema, database, keyspace) the store reads from. */
  namespace?: string | null;
  /** Marks the model as backed by a derived, non-writable source. */
  view?: boolean;
  store?: Store | null;
  registry?: ModelRegistry;
  logger?: Logger;
  /** Standard Schema validator run against the record state before every save. */
  shape?: StandardSchemaV1 | null;
}

export type ResolvedModelOptions = Required<ModelOptions>;

/** Lookup options plus the store to dispatch to, when it differs from the model's. */
export interface LookupOptions extends ContextOptions {
  store?: Store | null;
}

// ---------------------------------------------------------------------------
// ModelDefinition
// ---------------------------------------------------------------------------

export class ModelDefinition {
  readonly name: string;
  readonly options: ResolvedModelOptions;
  readonly schema: Schema;

  constructor(name: string, options: ResolvedModelOptions, schema: Schema) {
    this.name = name;
    this.options = options;
    this.schema = schema;
  }

  get isView(): boolean {
    return this.options.view;
  }

  get store(): Store | null {
    return this.options.store;
  }

  get registry(): ModelRegistry {
    return this.options.registry;
  }

  get logger(): Logger {
    return this.options.logger;
  }

  // Uses the Standard Schema `~standard` protocol. Models without a shape accept anything.
  async validate(data: Values): Promise<void> {
    const shape = this.options.shape;

    if (!shape) {
      return;
    }

    const result = await shape["~standard"].validate(data);

    if (result.issues) {
      throw new ValidationError(this.name, result.issues);
    }
  }

  instantiate(init: RecordInit = {}): ModelRecord {
    return new ModelRecord(this, init);
  }

  /** Builds a record from `values`, saves it and returns it. */
  async create(values: Values, options: LookupOptions = {}): Promise<ModelRecord> {
    if (this.isView) {
      throw new ReadOnlyError(this.name);
    }

    const { store, ...contextOptions } = options;
    const record = this.instantiate({ values, options: contextOptions, store });

    await record.save();

    return record;
  }

  /**
   * Looks up one record by key. A sequence matches the key fields
   * positionally; a scalar matches the single key field or any keyable field.
   */
  async fetch(key: unknown, options: LookupOptions = {}): Promise<ModelRecord | RawRow | null> {
    const { store: storeOverride, ...contextOptions } = options;
    const store = storeOverride ?? this.store;

    if (!store) {
      throw new MissingStoreError(this.name);
    }

    const filter = this.buildKeyFilter(key);

    // A key that addresses no field would otherwise match any row.
    if (filter.isNull) {
      throw new InvalidKeyError(
        this.name,
        this.schema.keyFields.length,
        Array.isArray(key) ? key.length : 1,
      );
    }

    const context = makeContext({
      ...contextOptions,
      where: filter.and(contextOptions.where),
      limit: 1,
    });

    this.logger.debug("fetching record", { model: this.name });

    const [row] = await store.getRecords(this, context);

    if (!row) {
      return null;
    }

    if (context.returning === "records") {
      return this.instantiate({
        state: { ...row },
        options: { namespace: context.namespace, locale: context.locale },
        store,
      });
    }

    return { ...row };
  }

  /** Returns a lazy collection; nothing is read until it is consumed. */
  select(options: LookupOptions = {}): Collection {
    const { store, ...contextOptions } = options;

    return new Collection({
      model: this,
      context: makeContext(contextOptions),
      store: store ?? this.store,
    });
  }

  private buildKeyFilter(key: unknown): Predicate {
    const keyFields = this.schema.keyFields;
    let filter: Predicate = Q();

    if (Array.isArray(key)) {
      const parts: readonly unknown[] = key;

      if (parts.length !== keyFields.length) {
        throw new InvalidKeyError(this.name, keyFields.length, parts.length);
      }

      keyFields.forEach((field, i) => {
        filter = filter.and(Q(field.name).equalTo(parts[i]));
      });

      return filter;
    }

    const [onlyKey] = keyFields;

    if (keyFields.length === 1 && onlyKey) {
      filter = filter.or(Q(onlyKey.name).equalTo(key));
    }

    for (const field of this.schema.fields.values()) {
      if (field.hasFlag("keyable")) {
        filter = filter.or(Q(field.name).equalTo(key));
      }
    }

    return filter;
  }
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/**
 * Maps model names to definitions. `build()` registers every model, so
 * collectors can refer to their target model by name.
 */
export class ModelRegistry {
  private readonly models = new Map<string, ModelDefinition>();

  /** Registers a definition, replacing any earlier model with the same name. */
  register(definition: ModelDefinition): ModelDefinition {
    this.models.set(definition.name, definition);
    return definition;
  }

  find(name: string): ModelDefinition | null {
    return this.models.get(name) ?? null;
  }

  get(name: string): ModelDefinition {
    const definition = this.models.get(name);

    if (!definition) {
      throw new UnknownModelError(name);
    }

    return definition;
  }

  has(name: string): boolean {
    return this.models.has(name);
  }

  names(): string[] {
    return [...this.models.keys()].sort();
  }

  clear(): void {
    this.models.clear();
  }
}

export const defaultRegistry = new ModelRegistry();

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

// Every step returns a new builder so partially declared models can be
// shared as a base for several variants.
export class ModelBuilder {
  private readonly name: string;
  private readonly options: ResolvedModelOptions;
  private readonly fields: readonly Field[];
  private readonly collectors: ReadonlyMap<string, Collector>;
  private readonly indexes: readonly Index[];

  constructor(
    name: string,
    options: ResolvedModelOptions,
    fields: readonly Field[] = [],
    collectors: ReadonlyMap<string, Collector> = new Map(),
    indexes: readonly Index[] = [],
  ) {
    this.name = name;
    this.options = options;
    this.fields = fields;
    this.collectors = collectors;
    this.indexes = indexes;
  }

  field(name: string, definition: FieldDefinition = {}): ModelBuilder {
    this.assertUnused(name);

    return new ModelBuilder(
      this.name,
      this.options,
      [...this.fields, new Field(name, definition)],
      this.collectors,
      this.indexes,
    );
  }

  collector(name: string, collector: Collector): ModelBuilder {
    this.assertUnused(name);

    const collectors = new Map(this.collectors);
    collectors.set(name, collector);

    return new ModelBuilder(this.name, this.options, this.fields, collectors, this.indexes);
  }

  index(definition: IndexDefinition): ModelBuilder {
    return new ModelBuilder(this.name, this.options, this.fields, this.collectors, [
      ...this.indexes,
      new Index(definition),
    ]);
  }

  build(): ModelDefinition {
    const schema = new Schema(
      this.name,
      this.options.namespace,
      this.fields,
      this.collectors,
      this.indexes,
    );
    const definition = new ModelDefinition(this.name, this.options, schema);

    return this.options.registry.register(definition);
  }

  private assertUnused(name: string): void {
    if (this.fields.some((field) => field.name === name) || this.collectors.has(name)) {
      throw new Error(`Model "${this.name}" already declares "${name}"`);
    }
  }
}

// ---------------------------------------------------------------------------
// model() factory
// ---------------------------------------------------------------------------

const DEFAULT_OPTIONS: ResolvedModelOptions = {
  namespace: null,
  view: false,
  store: null,
  registry: defaultRegistry,
  logger: silentLogger,
  shape: null,
};

export function model(name: string, options?: ModelOptions): ModelBuilder {
  const resolved: ResolvedModelOptions = {
    ...DEFAULT_OPTIONS,
    ...options,
  };

  return new ModelBuilder(name, resolved);
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ValidationError extends Error {
  readonly model: string;
  readonly issues: readonly StandardSchemaV1.Issue[];

  constructor(model: string, issues: readonly StandardSchemaV1.Issue[]) {
    super(`Validation failed for model "${model}": ${issues.map((i) => i.message).join(", ")}`);
    this.name = "ValidationError";
    this.model = model;
    this.issues = issues;
  }
}

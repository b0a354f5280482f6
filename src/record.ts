import type { CollectionLike, Collector, RecordFactory } from "./collection";
import { makeContext, type Context, type ContextOptions } from "./context";
import type { Store } from "./engines/types";
import { MissingStoreError, ReadOnlyError, UnknownKeyError } from "./errors";
import type { ModelDefinition } from "./model";
import { isSameValue, splitFirst, splitLast, type Values } from "./utils";

// ---------------------------------------------------------------------------
// Public record types
// ---------------------------------------------------------------------------

export interface RecordInit {
  /** Local overrides. They become pending changes. */
  values?: Values | null;
  /** Baseline state, as loaded from a store. */
  state?: Values | null;
  /** Base context the record's own options are merged over. */
  context?: Context | null;
  options?: ContextOptions;
  /** Overrides the model's store. */
  store?: Store | null;
}

/** Field name mapped to `[baseline, pending]`. */
export type LocalChanges = Record<string, [unknown, unknown]>;

// ---------------------------------------------------------------------------
// ModelRecord
// ---------------------------------------------------------------------------

/**
 * One instance of a model. Keeps the baseline state it was loaded with apart
 * from pending local writes, and only records a write while it differs from
 * the baseline.
 */
export class ModelRecord {
  readonly definition: ModelDefinition;
  readonly context: Context;
  readonly store: Store | null;

  private readonly baseline = new Map<string, unknown>();
  private readonly changes = new Map<string, unknown>();
  private readonly collections = new Map<string, unknown>();
  private readonly pendingCollections = new Map<string, Promise<CollectionLike>>();

  constructor(definition: ModelDefinition, init: RecordInit = {}) {
    this.definition = definition;
    this.context = makeContext(init.options, init.context ?? null);
    this.store = init.store ?? definition.store;

    // Object defaults are copied so records never share one mutable value.
    for (const [name, value] of Object.entries(definition.schema.defaultValues)) {
      const copy = typeof value === "object" && value !== null ? structuredClone(value) : value;
      this.baseline.set(name, copy);
    }

    const loaded = this.parseItems(init.state, "state");

    for (const [name, value] of loaded.fields) {
      this.baseline.set(name, value);
    }

    const overrides = this.parseItems(init.values, "values");

    for (const [name, value] of overrides.fields) {
      if (!isSameValue(this.baseline.get(name), value)) {
        this.changes.set(name, value);
      }
    }

    for (const [name, collection] of [...loaded.collections, ...overrides.collections]) {
      this.collections.set(name, collection);
    }
  }

  // -------------------------------------------------------------------------
  // State
  // -------------------------------------------------------------------------

  /** True while no key field has a persisted value. */
  get isNew(): boolean {
    return this.definition.schema.keyFields.every((field) => {
      const value = this.baseline.get(field.name);
      return value === undefined || value === null;
    });
  }

  get isDirty(): boolean {
    return this.changes.size > 0;
  }

  get baselineState(): Values {
    return Object.fromEntries(this.baseline);
  }

  get pendingChanges(): Values {
    return Object.fromEntries(this.changes);
  }

  get localChanges(): LocalChanges {
    const out: LocalChanges = {};

    for (const [name, value] of this.changes) {
      out[name] = [this.baseline.get(name), value];
    }

    return out;
  }

  /** Baseline with pending changes applied; collections are not included. */
  toObject(): Values {
    return { ...this.baselineState, ...this.pendingChanges };
  }

  /** Folds pending changes into the baseline. Called after a successful persist. */
  markLoaded(): void {
    for (const [name, value] of this.changes) {
      this.baseline.set(name, value);
    }

    this.changes.clear();
  }

  reset(): void {
    this.changes.clear();
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  /**
   * Resolves a field or collector by name. Dotted paths are forwarded into
   * the resolved value's own `get()`.
   */
  async get(key: string, fallback?: unknown): Promise<unknown> {
    const [head, rest] = splitFirst(key);
    const result = this.definition.schema.fields.has(head)
      ? await this.getValue(head, fallback)
      : await this.getCollection(head);

    if (rest === null || result === null || result === undefined) {
      return result;
    }

    if (!isGettable(result)) {
      throw new UnknownKeyError(this.definition.name, key);
    }

    return await result.get(rest);
  }

  /** Resolves several keys concurrently; results keep the order of `keys`. */
  async gather(...keys: string[]): Promise<unknown[]> {
    return await Promise.all(keys.map((key) => this.get(key)));
  }

  async gatherWith(keys: readonly string[], fallbacks: Values): Promise<unknown[]> {
    return await Promise.all(keys.map((key) => this.get(key, fallbacks[key])));
  }

  async getValue(name: string, fallback?: unknown): Promise<unknown> {
    const field = this.definition.schema.fields.get(name);

    if (!field) {
      throw new UnknownKeyError(this.definition.name, name);
    }

    if (field.getter) {
      return await field.getter(this);
    }

    if (this.changes.has(name)) {
      return this.changes.get(name);
    }

    return this.baseline.has(name) ? this.baseline.get(name) : fallback;
  }

  /** Returns the cached collection, asking the collector for it on first access. */
  async getCollection(name: string): Promise<unknown> {
    const collector = this.definition.schema.collectors.get(name);

    if (!collector) {
      throw new UnknownKeyError(this.definition.name, name);
    }

    if (this.collections.has(name)) {
      return this.collections.get(name);
    }

    return await this.resolveCollection(name, collector);
  }

  // Concurrent reads of the same collector share one in-flight lookup. A
  // failed lookup is forgotten so the next read retries.
  private resolveCollection(name: string, collector: Collector): Promise<CollectionLike> {
    const inFlight = this.pendingCollections.get(name);

    if (inFlight) {
      return inFlight;
    }

    const pending: Promise<CollectionLike> = collector.collectByRecord(this).then(
      (collection) => {
        if (this.pendingCollections.get(name) === pending) {
          this.pendingCollections.delete(name);
          this.collections.set(name, collection);
        }

        return collection;
      },
      (error: unknown) => {
        if (this.pendingCollections.get(name) === pending) {
          this.pendingCollections.delete(name);
        }

        throw error;
      },
    );

    this.pendingCollections.set(name, pending);

    return pending;
  }

  /** The key value, or a tuple of values in key order for composite keys. */
  async getKey(): Promise<unknown> {
    const values = await this.gather(...this.definition.schema.keyFields.map((f) => f.name));

    return values.length === 1 ? values[0] : values;
  }

  async getKeyDict(): Promise<Values> {
    const out: Values = {};

    for (const field of this.definition.schema.keyFields) {
      out[field.name] = await this.get(field.name);
    }

    return out;
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  /**
   * Writes a field or collector. For a dotted path the prefix is resolved
   * with `get()` and the last segment is set on that target.
   */
  async set(key: string, value: unknown): Promise<void> {
    const [targetKey, name] = splitLast(key);

    if (targetKey === null) {
      await this.setDirect(name, value);
      return;
    }

    const target = await this.get(targetKey);

    if (!isSettable(target)) {
      throw new UnknownKeyError(this.definition.name, key);
    }

    await target.set(name, value);
  }

  /** Applies many writes concurrently. Keys whose setters interact have no defined order. */
  async update(values: Values): Promise<void> {
    await Promise.all(Object.entries(values).map(([key, value]) => this.set(key, value)));
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  /**
   * Persists pending changes. Resolves `false` when there is nothing to save.
   * Pending changes are only folded into the baseline once the store succeeds.
   */
  async save(options: ContextOptions = {}): Promise<boolean> {
    if (this.definition.isView) {
      throw new ReadOnlyError(this.definition.name);
    }

    if (this.changes.size === 0) {
      return false;
    }

    const store = this.requireStore();

    await this.definition.validate(this.validationState());

    const context = makeContext(options, this.context);

    this.definition.logger.debug("saving record", {
      model: this.definition.name,
      fields: [...this.changes.keys()],
      isNew: this.isNew,
    });

    const values = await store.saveRecord(this, context);

    for (const [name, value] of Object.entries(values)) {
      if (this.definition.schema.fields.has(name)) {
        this.changes.set(name, value);
      }
    }

    this.markLoaded();

    return true;
  }

  async delete(options: ContextOptions = {}): Promise<number> {
    if (this.definition.isView) {
      throw new ReadOnlyError(this.definition.name);
    }

    const store = this.requireStore();
    const context = makeContext(options, this.context);

    this.definition.logger.debug("deleting record", { model: this.definition.name });

    return await store.deleteRecord(this, context);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async setDirect(name: string, value: unknown): Promise<void> {
    const schema = this.definition.schema;
    const field = schema.fields.get(name);

    if (field) {
      if (field.setter) {
        await field.setter(this, value);
      } else if (isSameValue(this.baseline.get(name), value)) {
        this.changes.delete(name);
      } else {
        this.changes.set(name, value);
      }

      return;
    }

    const collector = schema.collectors.get(name);

    if (!collector) {
      throw new UnknownKeyError(this.definition.name, name);
    }

    if (collector.setter) {
      await collector.setter(this, value);
    }

    this.pendingCollections.delete(name);
    this.collections.set(name, value);
  }

  // Splits incoming values into stored fields and collections. Virtual
  // fields are dropped; collector values are materialized through the
  // collector's target model.
  private parseItems(
    values: Values | null | undefined,
    mode: "state" | "values",
  ): { fields: [string, unknown][]; collections: [string, CollectionLike][] } {
    const fields: [string, unknown][] = [];
    const collections: [string, CollectionLike][] = [];

    if (!values) {
      return { fields, collections };
    }

    const schema = this.definition.schema;

    for (const [key, value] of Object.entries(values)) {
      const field = schema.fields.get(key);

      if (field) {
        if (!field.hasFlag("virtual")) {
          fields.push([key, value]);
        }
        continue;
      }

      const collector = schema.collectors.get(key);

      if (!collector) {
        throw new UnknownKeyError(this.definition.name, key);
      }

      const target = this.definition.registry.get(collector.model);
      const store = this.store;
      const factory: RecordFactory = {
        model: target,
        store,
        create: (row) =>
          mode === "state"
            ? target.instantiate({ state: row, store })
            : target.instantiate({ values: row, store }),
      };

      collections.push([key, collector.getCollection(value, factory)]);
    }

    return { fields, collections };
  }

  private validationState(): Values {
    const state: Values = {};

    for (const [name, value] of Object.entries(this.toObject())) {
      const field = this.definition.schema.fields.get(name);

      if (field && !field.hasFlag("virtual") && value !== undefined) {
        state[name] = value;
      }
    }

    return state;
  }

  private requireStore(): Store {
    if (!this.store) {
      throw new MissingStoreError(this.definition.name);
    }

    return this.store;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Gettable {
  get(key: string): unknown;
}

interface Settable {
  set(key: string, value: unknown): unknown;
}

function isGettable(value: unknown): value is Gettable {
  return (
    typeof value === "object" &&
    value !== null &&
    "get" in value &&
    typeof value.get === "function"
  );
}

function isSettable(value: unknown): value is Settable {
  return (
    typeof value === "object" &&
    value !== null &&
    "set" in value &&
    typeof value.set === "function"
  );
}

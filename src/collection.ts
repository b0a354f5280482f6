import { makeContext, type Context, type ContextOptions } from "./context";
import type { RawRow, Store } from "./engines/types";
import { MissingStoreError } from "./errors";
import type { ModelDefinition } from "./model";
import { Q } from "./query";
import { ModelRecord } from "./record";
import { isPlainRecord, splitFirst, type Values } from "./utils";

// ---------------------------------------------------------------------------
// Collector contract
// ---------------------------------------------------------------------------

/** Anything a dotted record path can traverse into. */
export interface CollectionLike {
  get(key: string): Promise<unknown>;
}

/** Builds records of a collector's target model for preloaded rows. */
export interface RecordFactory {
  readonly model: ModelDefinition;
  readonly store: Store | null;
  create(row: Values): ModelRecord;
}

export type CollectorSetter = (record: ModelRecord, value: unknown) => Promise<void>;

export interface Collector {
  /** Name of the registered model the collection holds. */
  readonly model: string;
  setter?: CollectorSetter;

  /** Resolves the related collection for a record, usually by querying its store. */
  collectByRecord(record: ModelRecord): Promise<CollectionLike>;
  /** Wraps rows or records that were handed to the owning record directly. */
  getCollection(records: unknown, factory: RecordFactory): CollectionLike;
}

// ---------------------------------------------------------------------------
// Collection
// ---------------------------------------------------------------------------

export interface CollectionInit {
  model: ModelDefinition;
  context: Context;
  store: Store | null;
  /** Preloaded members. When given, the store is never consulted. */
  records?: readonly ModelRecord[];
}

/**
 * A lazy selection of records. Nothing is read from the store until one of
 * the consuming methods is awaited; the result is kept for later calls.
 */
export class Collection implements CollectionLike {
  readonly model: ModelDefinition;
  readonly context: Context;
  readonly store: Store | null;

  private loaded: ModelRecord[] | null;
  private loading: Promise<ModelRecord[]> | null = null;

  constructor(init: CollectionInit) {
    this.model = init.model;
    this.context = init.context;
    this.store = init.store;
    this.loaded = init.records ? [...init.records] : null;
  }

  /** Narrows the selection. The new collection reads from the store afresh. */
  select(options: ContextOptions = {}): Collection {
    return new Collection({
      model: this.model,
      context: makeContext(options, this.context),
      store: this.store,
    });
  }

  async records(): Promise<ModelRecord[]> {
    if (this.loaded) {
      return [...this.loaded];
    }

    // Concurrent callers wait on the same read.
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null;
      });
    }

    return [...(await this.loading)];
  }

  /** Plain rows: the preloaded members as objects, otherwise read from the store without building records. */
  async data(): Promise<RawRow[]> {
    if (this.loaded) {
      return this.loaded.map((record) => record.toObject());
    }

    return await this.fetchRows();
  }

  async first(): Promise<ModelRecord | null> {
    const records = await this.records();
    return records[0] ?? null;
  }

  async last(): Promise<ModelRecord | null> {
    const records = await this.records();
    return records[records.length - 1] ?? null;
  }

  async count(): Promise<number> {
    const records = await this.records();
    return records.length;
  }

  /**
   * Resolves `first`, `last`, `count` or a numeric position, forwarding any
   * remaining path into that record. Any other key is read from every member.
   */
  async get(key: string): Promise<unknown> {
    const [head, rest] = splitFirst(key);

    if (head === "count" && rest === null) {
      return await this.count();
    }

    const member = await this.member(head);

    if (member === undefined) {
      const records = await this.records();
      return await Promise.all(records.map((record) => record.get(key)));
    }

    if (member === null || rest === null) {
      return member;
    }

    return await member.get(rest);
  }

  // Returns undefined when `name` does not address a single member.
  private async member(name: string): Promise<ModelRecord | null | undefined> {
    if (name === "first") {
      return await this.first();
    }

    if (name === "last") {
      return await this.last();
    }

    if (/^\d+$/.test(name)) {
      const records = await this.records();
      return records[Number(name)] ?? null;
    }

    return undefined;
  }

  private async load(): Promise<ModelRecord[]> {
    const rows = await this.fetchRows();
    const records = rows.map((row) =>
      this.model.instantiate({
        state: row,
        options: { namespace: this.context.namespace, locale: this.context.locale },
        store: this.store,
      }),
    );

    this.loaded = records;

    return records;
  }

  private async fetchRows(): Promise<RawRow[]> {
    if (!this.store) {
      throw new MissingStoreError(this.model.name);
    }

    return await this.store.getRecords(this.model, this.context);
  }
}

// ---------------------------------------------------------------------------
// Collectors
// ---------------------------------------------------------------------------

export interface ReverseLookupOptions {
  /** Model holding the referencing rows. */
  model: string;
  /** Field on that model that stores the owner's key. */
  field: string;
  setter?: CollectorSetter;
}

/**
 * One-to-many collector: selects the rows of `model` whose `field` equals the
 * owning record's key.
 */
export function reverseLookup(options: ReverseLookupOptions): Collector {
  return {
    model: options.model,
    setter: options.setter,

    async collectByRecord(record) {
      const target = record.definition.registry.get(options.model);
      const key = await record.getKey();

      return target.select({
        where: Q(options.field).equalTo(key),
        namespace: record.context.namespace,
        locale: record.context.locale,
        store: record.store ?? target.store,
      });
    },

    getCollection(records, factory) {
      const members: ModelRecord[] = [];

      if (Array.isArray(records)) {
        const items: readonly unknown[] = records;

        for (const item of items) {
          if (item instanceof ModelRecord) {
            members.push(item);
          } else if (isPlainRecord(item)) {
            members.push(factory.create(item));
          }
        }
      }

      return new Collection({
        model: factory.model,
        context: makeContext(),
        store: factory.store,
        records: members,
      });
    },
  };
}

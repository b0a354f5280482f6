import type { Collector } from "./collection";
import type { ModelRecord } from "./record";
import type { Values } from "./utils";

// ---------------------------------------------------------------------------
// Fields
// ---------------------------------------------------------------------------

/**
 * - `key`: part of the record's identity.
 * - `keyable`: may identify a record in a scalar `fetch()`.
 * - `translatable`: stored per locale by the backend.
 * - `virtual`: computed, never stored.
 * - `autoIncrement`: assigned by the backend when left unset on insert.
 */
export type FieldFlag = "key" | "keyable" | "translatable" | "virtual" | "autoIncrement";

export type FieldGetter = (record: ModelRecord) => Promise<unknown>;
export type FieldSetter = (record: ModelRecord, value: unknown) => Promise<void>;

export interface FieldDefinition {
  flags?: readonly FieldFlag[];
  default?: unknown;
  /** Replaces the stored-value lookup when reading the field. */
  getter?: FieldGetter;
  /** Replaces change tracking when writing the field. */
  setter?: FieldSetter;
}

export class Field {
  readonly name: string;
  readonly flags: ReadonlySet<FieldFlag>;
  readonly default: unknown;
  readonly getter: FieldGetter | null;
  readonly setter: FieldSetter | null;

  constructor(name: string, definition: FieldDefinition = {}) {
    this.name = name;
    this.flags = new Set(definition.flags ?? []);
    this.default = definition.default;
    this.getter = definition.getter ?? null;
    this.setter = definition.setter ?? null;
  }

  hasFlag(flag: FieldFlag): boolean {
    return this.flags.has(flag);
  }
}

// ---------------------------------------------------------------------------
// Indexes
// ---------------------------------------------------------------------------

export type IndexFlag = "key" | "unique";

export interface IndexDefinition {
  name: string;
  fields: readonly string[];
  flags?: readonly IndexFlag[];
}

export class Index {
  readonly name: string;
  readonly fields: readonly string[];
  readonly flags: ReadonlySet<IndexFlag>;

  constructor(definition: IndexDefinition) {
    this.name = definition.name;
    this.fields = Object.freeze([...definition.fields]);
    this.flags = new Set(definition.flags ?? []);
  }

  hasFlag(flag: IndexFlag): boolean {
    return this.flags.has(flag);
  }
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export class Schema {
  readonly model: string;
  readonly namespace: string | null;
  readonly fields: ReadonlyMap<string, Field>;
  readonly collectors: ReadonlyMap<string, Collector>;
  readonly indexes: readonly Index[];
  readonly keyFields: readonly Field[];

  constructor(
    model: string,
    namespace: string | null,
    fields: readonly Field[],
    collectors: ReadonlyMap<string, Collector>,
    indexes: readonly Index[],
  ) {
    this.model = model;
    this.namespace = namespace;
    this.fields = new Map(fields.map((field) => [field.name, field]));
    this.collectors = new Map(collectors);
    this.indexes = Object.freeze([...indexes]);
    this.keyFields = Object.freeze(this.resolveKeyFields());
  }

  /** Values every new record starts from, for fields that declare a default. */
  get defaultValues(): Values {
    const defaults: Values = {};

    for (const field of this.fields.values()) {
      if (field.default !== undefined) {
        defaults[field.name] = field.default;
      }
    }

    return defaults;
  }

  // A key index takes precedence over key-flagged fields and fixes the order
  // composite keys are given in.
  private resolveKeyFields(): Field[] {
    const keyIndex = this.indexes.find((index) => index.hasFlag("key"));

    if (keyIndex) {
      return keyIndex.fields.map((name) => {
        const field = this.fields.get(name);

        if (!field) {
          throw new Error(
            `Key index "${keyIndex.name}" references unknown field "${name}" on model "${this.model}"`,
          );
        }

        return field;
      });
    }

    return [...this.fields.values()].filter((field) => field.hasFlag("key"));
  }
}

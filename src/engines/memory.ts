import type { Context, OrderEntry } from "../context";
import type { ModelDefinition } from "../model";
import { QueryGroup, type Predicate, type Query } from "../query";
import { isPlainRecord, isSameValue } from "../utils";
import { DuplicateRecordError, RecordNotFoundError, type RawRow, type Store } from "./types";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface MemoryStoreOptions {
  /** Locale used for translatable fields when the context names none. Defaults to "en". */
  defaultLocale?: string;
  /**
   * Called before every insert or update. Throw to simulate a write failure.
   * Receives the model name and the values about to be written.
   */
  onBeforeWrite?: (model: string, values: RawRow) => void;
}

// ---------------------------------------------------------------------------
// Memory Store
// ---------------------------------------------------------------------------

export function memoryStore(options?: MemoryStoreOptions): MemoryStore {
  const tables = new Map<string, RawRow[]>();
  let storeOptions = options ?? {};

  function tableName(model: ModelDefinition, namespace: string | null): string {
    return `${namespace ?? model.schema.namespace ?? "default"}.${model.name}`;
  }

  function getTable(name: string): RawRow[] {
    let table = tables.get(name);

    if (!table) {
      table = [];
      tables.set(name, table);
    }

    return table;
  }

  function localeOf(context: Context): string {
    return context.locale ?? storeOptions.defaultLocale ?? "en";
  }

  const store: MemoryStore = {
    setOptions(newOptions: MemoryStoreOptions) {
      storeOptions = newOptions;
    },

    rows(model, namespace) {
      return getTable(tableName(model, namespace ?? null)).map((row) => structuredClone(row));
    },

    clear() {
      tables.clear();
    },

    async getRecords(model, context) {
      const table = getTable(tableName(model, context.namespace));
      const locale = localeOf(context);

      let rows = table
        .map((row) => resolveTranslations(model, row, locale))
        .filter((row) => matchesPredicate(model.name, row, context.where));

      if (context.distinct) {
        rows = distinctRows(rows, context.distinct);
      }

      if (context.order) {
        rows = sortRows(rows, context.order);
      }

      const start = context.start ?? 0;
      const limit = context.limit;
      rows = rows.slice(start, limit === null ? undefined : start + limit);

      const fields = context.fields;

      if (fields) {
        rows = rows.map((row) => project(model, row, fields));
      }

      return rows.map((row) => structuredClone(row));
    },

    async saveRecord(record, context) {
      const model = record.definition;
      const table = getTable(tableName(model, context.namespace));
      const locale = localeOf(context);

      if (record.isNew) {
        const values = { ...record.baselineState, ...record.pendingChanges };

        for (const field of model.schema.keyFields) {
          const current = values[field.name];

          if ((current === undefined || current === null) && field.hasFlag("autoIncrement")) {
            values[field.name] = nextSequence(table, field.name);
          }
        }

        if (table.some((row) => hasKey(model, row, values))) {
          throw new DuplicateRecordError(model.name, keyOf(model, values));
        }

        storeOptions.onBeforeWrite?.(model.name, values);

        const stored = writeRow(model, {}, values, locale);
        table.push(stored);

        return resolveTranslations(model, stored, locale);
      }

      const baseline = record.baselineState;
      const index = table.findIndex((row) => hasKey(model, row, baseline));
      const existing = table[index];

      if (!existing) {
        throw new RecordNotFoundError(model.name, keyOf(model, baseline));
      }

      const changes = record.pendingChanges;
      const nextKey = { ...baseline, ...changes };

      if (
        model.schema.keyFields.some((field) => field.name in changes) &&
        table.some((row, i) => i !== index && hasKey(model, row, nextKey))
      ) {
        throw new DuplicateRecordError(model.name, keyOf(model, nextKey));
      }

      storeOptions.onBeforeWrite?.(model.name, changes);

      const stored = writeRow(model, existing, changes, locale);
      table[index] = stored;

      return resolveTranslations(model, stored, locale);
    },

    async deleteRecord(record, context) {
      const model = record.definition;
      const table = getTable(tableName(model, context.namespace));
      const baseline = record.baselineState;
      const index = table.findIndex((row) => hasKey(model, row, baseline));

      if (index === -1) {
        return 0;
      }

      table.splice(index, 1);

      return 1;
    },
  };

  return store;
}

// ---------------------------------------------------------------------------
// Extended store type with test helpers
// ---------------------------------------------------------------------------

export interface MemoryStore extends Store {
  /** Replace store options at runtime (useful for injecting failures mid-test). */
  setOptions(options: MemoryStoreOptions): void;
  /** Copies of the stored rows, translatable fields still keyed by locale. */
  rows(model: ModelDefinition, namespace?: string | null): RawRow[];
  clear(): void;
}

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

// Only declared, non-virtual fields are stored. Translatable fields keep one
// value per locale.
function writeRow(
  model: ModelDefinition,
  existing: RawRow,
  values: RawRow,
  locale: string,
): RawRow {
  const next: RawRow = { ...existing };

  for (const [name, value] of Object.entries(values)) {
    const field = model.schema.fields.get(name);

    if (!field || field.hasFlag("virtual")) {
      continue;
    }

    if (field.hasFlag("translatable")) {
      const current = existing[name];
      next[name] = { ...(isPlainRecord(current) ? current : {}), [locale]: value };
    } else {
      next[name] = value;
    }
  }

  return structuredClone(next);
}

function nextSequence(table: RawRow[], field: string): number {
  let highest = 0;

  for (const row of table) {
    const value = row[field];

    if (typeof value === "number" && value > highest) {
      highest = value;
    }
  }

  return highest + 1;
}

function keyOf(model: ModelDefinition, values: RawRow): RawRow {
  const key: RawRow = {};

  for (const field of model.schema.keyFields) {
    key[field.name] = values[field.name];
  }

  return key;
}

function hasKey(model: ModelDefinition, row: RawRow, values: RawRow): boolean {
  const keyFields = model.schema.keyFields;

  return (
    keyFields.length > 0 &&
    keyFields.every((field) => isSameValue(row[field.name], values[field.name]))
  );
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

function resolveTranslations(model: ModelDefinition, row: RawRow, locale: string): RawRow {
  const resolved: RawRow = { ...row };

  for (const field of model.schema.fields.values()) {
    if (!field.hasFlag("translatable")) {
      continue;
    }

    const stored = row[field.name];

    if (isPlainRecord(stored)) {
      resolved[field.name] = stored[locale] ?? null;
    }
  }

  return resolved;
}

// Key fields always survive a projection so the rows can still be saved.
function project(model: ModelDefinition, row: RawRow, fields: readonly string[]): RawRow {
  const projected: RawRow = {};
  const names = [...model.schema.keyFields.map((field) => field.name), ...fields];

  for (const name of names) {
    if (name in row) {
      projected[name] = row[name];
    }
  }

  return projected;
}

function distinctRows(rows: RawRow[], fields: readonly string[]): RawRow[] {
  const seen = new Set<string>();
  const out: RawRow[] = [];

  for (const row of rows) {
    const signature = JSON.stringify(fields.map((field) => row[field] ?? null));

    if (!seen.has(signature)) {
      seen.add(signature);
      out.push(row);
    }
  }

  return out;
}

function sortRows(rows: RawRow[], order: readonly OrderEntry[]): RawRow[] {
  return [...rows].sort((a, b) => {
    for (const [field, direction] of order) {
      const cmp = compareValues(a[field], b[field]);

      if (cmp !== 0) {
        return direction === "desc" ? -cmp : cmp;
      }
    }

    return 0;
  });
}

// ---------------------------------------------------------------------------
// Predicate matching
// ---------------------------------------------------------------------------

function matchesPredicate(model: string, row: RawRow, predicate: Predicate | null): boolean {
  if (!predicate || predicate.isNull) {
    return true;
  }

  if (predicate instanceof QueryGroup) {
    return predicate.op === "and"
      ? predicate.members.every((member) => matchesPredicate(model, row, member))
      : predicate.members.some((member) => matchesPredicate(model, row, member));
  }

  // Queries scoped to another model, or to a model without a field, do not
  // constrain this table.
  if ((predicate.model && predicate.model !== model) || !predicate.name) {
    return true;
  }

  return matchesQuery(row[predicate.name], predicate);
}

function matchesQuery(value: unknown, query: Query): boolean {
  switch (query.op) {
    case "is":
      return isEqual(value, query.value);
    case "isNot":
      return !isEqual(value, query.value);
    case "lessThan":
      return isPresent(value) && compareValues(value, query.value) < 0;
    case "lessThanOrEqual":
      return isPresent(value) && compareValues(value, query.value) <= 0;
    case "greaterThan":
      return isPresent(value) && compareValues(value, query.value) > 0;
    case "greaterThanOrEqual":
      return isPresent(value) && compareValues(value, query.value) >= 0;
    case "in":
      return Array.isArray(query.value) && query.value.some((item) => isEqual(value, item));
    case "startsWith":
      return (
        typeof value === "string" &&
        typeof query.value === "string" &&
        value.startsWith(query.value)
      );
  }
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

// Unset and null compare equal.
function isEqual(a: unknown, b: unknown): boolean {
  return isSameValue(a ?? null, b ?? null);
}

// Unset values sort first. Numbers and dates compare numerically, everything
// else as strings.
function compareValues(a: unknown, b: unknown): number {
  if (!isPresent(a) || !isPresent(b)) {
    return Number(isPresent(a)) - Number(isPresent(b));
  }

  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }

  return String(a).localeCompare(String(b));
}

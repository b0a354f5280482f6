import type { Context } from "../context";
import type { ModelDefinition } from "../model";
import type { ModelRecord } from "../record";

// ---------------------------------------------------------------------------
// Shared store types: the contract between the core and a backend
// ---------------------------------------------------------------------------

/** A row as the backend hands it over: field name to stored value. */
export type RawRow = Record<string, unknown>;

/**
 * The backend dispatch point. Every call receives the fully merged context,
 * so `where`, `limit`, `start`, `namespace`, `locale` and `scope` are already
 * resolved. Failures propagate to the caller unchanged.
 */
export interface Store {
  getRecords(model: ModelDefinition, context: Context): Promise<RawRow[]>;

  /**
   * Persists the record's pending changes (or the whole record when it is
   * new) and resolves the authoritative values to fold back into it.
   */
  saveRecord(record: ModelRecord, context: Context): Promise<RawRow>;

  /** Resolves the number of rows removed. */
  deleteRecord(record: ModelRecord, context: Context): Promise<number>;
}

// ---------------------------------------------------------------------------
// Store errors
// ---------------------------------------------------------------------------

// Renders `{"id":1}`. Values JSON cannot encode, such as bigints, fall back to String().
function formatKey(key: RawRow): string {
  const parts = Object.entries(key).map(([name, value]) => {
    const rendered = typeof value === "string" ? JSON.stringify(value) : String(value);
    return `${JSON.stringify(name)}:${rendered}`;
  });

  return `{${parts.join(",")}}`;
}

/**
 * Raised on insert when a row with the same key already exists.
 */
export class DuplicateRecordError extends Error {
  readonly model: string;
  readonly key: RawRow;

  constructor(model: string, key: RawRow) {
    super(`Record ${formatKey(key)} already exists in model "${model}"`);
    this.name = "DuplicateRecordError";
    this.model = model;
    this.key = key;
  }
}

/**
 * Raised on update when no row matches the record's key.
 */
export class RecordNotFoundError extends Error {
  readonly model: string;
  readonly key: RawRow;

  constructor(model: string, key: RawRow) {
    super(`Record ${formatKey(key)} not found in model "${model}"`);
    this.name = "RecordNotFoundError";
    this.model = model;
    this.key = key;
  }
}

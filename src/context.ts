import type { Predicate } from "./query";

// ---------------------------------------------------------------------------
// Public context types
// ---------------------------------------------------------------------------

export type Ordering = "asc" | "desc";

/** Whether lookups materialize records or hand back raw rows. */
export type Returning = "data" | "records";

export type OrderEntry = readonly [field: string, direction: Ordering];

export type Scope = Readonly<Record<string, unknown>>;

/**
 * Lookup options accepted by `makeContext()`. A key that is absent (or
 * `undefined`) is inherited from the base context; an explicit `null` clears
 * it.
 */
export interface ContextOptions {
  /** Field names, or a comma-separated string. */
  distinct?: string | readonly string[] | null;
  /** Projection. Field names, or a comma-separated string. */
  fields?: string | readonly string[] | null;
  locale?: string | null;
  limit?: number | null;
  namespace?: string | null;
  /** Order entries, or a string such as `"-createdAt,+name"`. */
  order?: string | readonly OrderEntry[] | null;
  /** 1-based page number. */
  page?: number | null;
  pageSize?: number | null;
  returning?: Returning | null;
  /** Backend-specific hints. Merged key-wise over the base scope. */
  scope?: Scope | null;
  /** Zero-based offset. Ignored when `page` is set. */
  start?: number | null;
  timezone?: string | null;
  where?: Predicate | null;
}

export interface ContextState {
  distinct: readonly string[] | null;
  fields: readonly string[] | null;
  locale: string | null;
  limit: number | null;
  namespace: string | null;
  order: readonly OrderEntry[] | null;
  page: number | null;
  pageSize: number | null;
  returning: Returning;
  scope: Scope;
  start: number | null;
  timezone: string | null;
  where: Predicate | null;
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

/**
 * An immutable bundle of lookup options. Build one with `makeContext()`; the
 * constructor is the terminal case used when there is nothing to merge.
 */
export class Context {
  readonly distinct: readonly string[] | null;
  readonly fields: readonly string[] | null;
  readonly locale: string | null;
  readonly namespace: string | null;
  readonly order: readonly OrderEntry[] | null;
  readonly page: number | null;
  readonly pageSize: number | null;
  readonly returning: Returning;
  readonly scope: Scope;
  readonly timezone: string | null;
  readonly where: Predicate | null;

  private readonly rawLimitValue: number | null;
  private readonly rawStartValue: number | null;

  constructor(state: Partial<ContextState> = {}) {
    this.distinct = freezeList(state.distinct);
    this.fields = freezeList(state.fields);
    this.locale = state.locale ?? null;
    this.namespace = state.namespace ?? null;
    this.order = freezeList(state.order);
    this.page = state.page ?? null;
    this.pageSize = state.pageSize ?? null;
    this.returning = state.returning ?? "records";
    this.scope = Object.freeze({ ...state.scope });
    this.timezone = state.timezone ?? null;
    this.where = state.where ?? null;
    this.rawLimitValue = state.limit ?? null;
    this.rawStartValue = state.start ?? null;
  }

  /** The page size when paging, otherwise the explicit limit. */
  get limit(): number | null {
    return this.pageSize ?? this.rawLimitValue;
  }

  /** The offset derived from `page` when paging, otherwise the explicit start. */
  get start(): number | null {
    if (this.page) {
      return (this.page - 1) * (this.limit ?? 0);
    }

    return this.rawStartValue;
  }

  get rawLimit(): number | null {
    return this.rawLimitValue;
  }

  get rawStart(): number | null {
    return this.rawStartValue;
  }
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Builds a new context by layering `options` over `base`. Paging, ordering
 * and shape options replace what the base holds; `where` is conjoined with
 * the base predicate, `scope` is merged key-wise and `fields` keeps the base
 * fields the explicit list does not name.
 */
export function makeContext(options: ContextOptions = {}, base: Context | null = null): Context {
  return new Context({
    distinct: mergeDistinct(options.distinct, base),
    fields: mergeFields(options.fields, base),
    locale: inherit(options.locale, base?.locale),
    limit: inherit(options.limit, base?.rawLimit),
    namespace: inherit(options.namespace, base?.namespace),
    order: mergeOrder(options.order, base),
    page: inherit(options.page, base?.page),
    pageSize: inherit(options.pageSize, base?.pageSize),
    returning: mergeReturning(options.returning, base),
    scope: mergeScope(options.scope, base),
    start: inherit(options.start, base?.rawStart),
    timezone: inherit(options.timezone, base?.timezone),
    where: mergeWhere(options.where, base),
  });
}

function inherit<T>(explicit: T | null | undefined, inherited: T | null | undefined): T | null {
  if (explicit !== undefined) {
    return explicit;
  }

  return inherited ?? null;
}

function mergeDistinct(
  distinct: ContextOptions["distinct"],
  base: Context | null,
): readonly string[] | null {
  if (distinct === undefined) {
    return base?.distinct ?? null;
  }

  return distinct === null ? null : splitList(distinct);
}

function mergeFields(
  fields: ContextOptions["fields"],
  base: Context | null,
): readonly string[] | null {
  if (fields === undefined) {
    return base?.fields ?? null;
  }

  if (fields === null) {
    return null;
  }

  const explicit = splitList(fields);

  if (explicit.length > 0 && base?.fields) {
    return [...explicit, ...base.fields.filter((field) => !explicit.includes(field))];
  }

  return explicit;
}

function mergeOrder(
  order: ContextOptions["order"],
  base: Context | null,
): readonly OrderEntry[] | null {
  if (order === undefined) {
    return base?.order ?? null;
  }

  if (order === null) {
    return null;
  }

  return typeof order === "string" ? parseOrder(order) : order;
}

function mergeReturning(returning: ContextOptions["returning"], base: Context | null): Returning {
  if (returning === undefined) {
    return base?.returning ?? "records";
  }

  return returning ?? "records";
}

function mergeScope(scope: ContextOptions["scope"], base: Context | null): Scope {
  if (scope === undefined) {
    return base?.scope ?? {};
  }

  if (scope === null) {
    return {};
  }

  return { ...base?.scope, ...scope };
}

function mergeWhere(where: ContextOptions["where"], base: Context | null): Predicate | null {
  if (where === undefined) {
    return base?.where ?? null;
  }

  if (where === null) {
    return null;
  }

  return where.and(base?.where);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function splitList(value: string | readonly string[]): readonly string[] {
  if (typeof value !== "string") {
    return value;
  }

  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/** Parses `"-createdAt,+name,email"` into order entries; unsigned tokens sort ascending. */
export function parseOrder(value: string): OrderEntry[] {
  return splitList(value).map((token): OrderEntry => {
    const field = token.replace(/^[+-]+|[+-]+$/g, "");

    return [field, token.startsWith("-") ? "desc" : "asc"];
  });
}

function freezeList<T>(list: readonly T[] | null | undefined): readonly T[] | null {
  return list ? Object.freeze([...list]) : null;
}

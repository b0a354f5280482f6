// ---------------------------------------------------------------------------
// Query algebra
// ---------------------------------------------------------------------------

export type QueryOp =
  | "is"
  | "isNot"
  | "lessThan"
  | "lessThanOrEqual"
  | "greaterThan"
  | "greaterThanOrEqual"
  | "in"
  | "startsWith";

export type QueryGroupOp = "and" | "or";

export type Predicate = Query | QueryGroup;

export interface QueryValues {
  name?: string;
  model?: string;
  op?: QueryOp;
  value?: unknown;
}

/**
 * A single comparison against one field. Instances are immutable: every
 * operator method returns a new query, so a bare `Q("name")` can be reused as
 * a template.
 */
export class Query {
  readonly name: string;
  /** Qualifies the field to a model when the name alone is ambiguous. */
  readonly model: string;
  readonly op: QueryOp;
  readonly value: unknown;

  constructor(values: QueryValues = {}) {
    this.name = values.name ?? "";
    this.model = values.model ?? "";
    this.op = values.op ?? "is";
    this.value = values.value ?? null;
  }

  /** A query with neither a field nor a model matches everything and combines as an identity. */
  get isNull(): boolean {
    return !(this.name || this.model);
  }

  clone(values: QueryValues = {}): Query {
    return new Query({
      name: this.name,
      model: this.model,
      op: this.op,
      value: this.value,
      ...values,
    });
  }

  equalTo(value: unknown): Query {
    return this.clone({ op: "is", value });
  }

  notEqualTo(value: unknown): Query {
    return this.clone({ op: "isNot", value });
  }

  lessThan(value: unknown): Query {
    return this.clone({ op: "lessThan", value });
  }

  lessThanOrEqual(value: unknown): Query {
    return this.clone({ op: "lessThanOrEqual", value });
  }

  greaterThan(value: unknown): Query {
    return this.clone({ op: "greaterThan", value });
  }

  greaterThanOrEqual(value: unknown): Query {
    return this.clone({ op: "greaterThanOrEqual", value });
  }

  isIn(values: readonly unknown[]): Query {
    return this.clone({ op: "in", value: [...values] });
  }

  startsWith(prefix: string): Query {
    return this.clone({ op: "startsWith", value: prefix });
  }

  and(other?: Predicate | null): Predicate {
    return combine(this, other, "and");
  }

  or(other?: Predicate | null): Predicate {
    return combine(this, other, "or");
  }
}

/**
 * A boolean combination of predicates. Groups are only built by `and()` /
 * `or()`; chaining the same operator flattens into one member list.
 */
export class QueryGroup {
  readonly op: QueryGroupOp;
  readonly members: readonly Predicate[];

  constructor(op: QueryGroupOp, members: readonly Predicate[]) {
    this.op = op;
    this.members = Object.freeze([...members]);
  }

  get isNull(): boolean {
    return this.members.length === 0;
  }

  and(other?: Predicate | null): Predicate {
    return combine(this, other, "and");
  }

  or(other?: Predicate | null): Predicate {
    return combine(this, other, "or");
  }
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

/** Starts a query on a field, optionally scoped to a model. */
export function Q(name = "", model = ""): Query {
  return new Query({ name, model });
}

export function and(left?: Predicate | null, right?: Predicate | null): Predicate {
  if (!left) {
    return right ?? Q();
  }

  return combine(left, right, "and");
}

export function or(left?: Predicate | null, right?: Predicate | null): Predicate {
  if (!left) {
    return right ?? Q();
  }

  return combine(left, right, "or");
}

// A null side is the identity element. Members of same-operator groups are
// spliced into the new group rather than nested.
function combine(
  left: Predicate,
  right: Predicate | null | undefined,
  op: QueryGroupOp,
): Predicate {
  if (!right || right.isNull) {
    return left;
  }

  if (left.isNull) {
    return right;
  }

  const members: Predicate[] = [];

  for (const side of [left, right]) {
    if (side instanceof QueryGroup && side.op === op) {
      members.push(...side.members);
    } else {
      members.push(side);
    }
  }

  return new QueryGroup(op, members);
}

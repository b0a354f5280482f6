export type Values = Record<string, unknown>;

/** Splits `"a.b.c"` into `["a", "b.c"]`. The tail is `null` when there is no dot. */
export function splitFirst(path: string): [string, string | null] {
  const index = path.indexOf(".");

  if (index === -1) {
    return [path, null];
  }

  return [path.slice(0, index), path.slice(index + 1)];
}

/** Splits `"a.b.c"` into `["a.b", "c"]`. The head is `null` when there is no dot. */
export function splitLast(path: string): [string | null, string] {
  const index = path.lastIndexOf(".");

  if (index === -1) {
    return [null, path];
  }

  return [path.slice(0, index), path.slice(index + 1)];
}

export function isPlainRecord(value: unknown): value is Values {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

// Dates compare by timestamp; everything else by Object.is, so NaN equals NaN.
export function isSameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  return Object.is(a, b);
}

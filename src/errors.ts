// ---------------------------------------------------------------------------
// Core errors
// ---------------------------------------------------------------------------

/**
 * A get/set addressed a name that the model's schema declares neither as a
 * field nor as a collector.
 */
export class UnknownKeyError extends Error {
  readonly model: string;
  readonly key: string;

  constructor(model: string, key: string) {
    super(`Unknown key "${key}" for model "${model}"`);
    this.name = "UnknownKeyError";
    this.model = model;
    this.key = key;
  }
}

/**
 * A mutating operation (save, delete, create) was attempted on a view model.
 */
export class ReadOnlyError extends Error {
  readonly model: string;

  constructor(model: string) {
    super(`Model "${model}" is read-only`);
    this.name = "ReadOnlyError";
    this.model = model;
  }
}

/**
 * fetch() received a composite key whose arity does not match the model's
 * key fields.
 */
export class InvalidKeyError extends Error {
  readonly model: string;
  readonly expected: number;
  readonly received: number;

  constructor(model: string, expected: number, received: number) {
    super(`Invalid key for model "${model}": expected ${expected} values, got ${received}`);
    this.name = "InvalidKeyError";
    this.model = model;
    this.expected = expected;
    this.received = received;
  }
}

export class MissingStoreError extends Error {
  readonly model: string;

  constructor(model: string) {
    super(`No store configured for model "${model}"`);
    this.name = "MissingStoreError";
    this.model = model;
  }
}

export class UnknownModelError extends Error {
  readonly model: string;

  constructor(model: string) {
    super(`No model named "${model}" is registered`);
    this.name = "UnknownModelError";
    this.model = model;
  }
}

import { beforeEach, describe, expect, test } from "vitest";

import { memoryStore, type MemoryStore } from "../../src/engines/memory";
import { DuplicateRecordError, RecordNotFoundError, type RawRow } from "../../src/engines/types";
import { model, ModelRegistry, type ModelDefinition } from "../../src/model";
import { Q, type Predicate } from "../../src/query";
import { ModelRecord } from "../../src/record";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function buildUser(store: MemoryStore, registry = new ModelRegistry()) {
  return model("user", { registry, store })
    .field("id", { flags: ["key", "autoIncrement"] })
    .field("email", { flags: ["keyable"] })
    .field("name")
    .field("age")
    .field("role")
    .field("nickname", { flags: ["virtual"] })
    .build();
}

async function seed(user: ModelDefinition) {
  await user.create({ name: "Ada", email: "ada@example.com", age: 20, role: "member" });
  await user.create({ name: "Bob", email: "bob@example.com", age: 30, role: "admin" });
  await user.create({ name: "Cy", email: "cy@example.com", age: 40, role: "member" });
}

async function namesWhere(user: ModelDefinition, where: Predicate): Promise<unknown> {
  return await user.select({ where }).get("name");
}

async function fetchRecord(user: ModelDefinition, key: unknown): Promise<ModelRecord> {
  const record = await user.fetch(key);

  if (!(record instanceof ModelRecord)) throw new Error(`no record for ${String(key)}`);

  return record;
}

let store: MemoryStore;
let user: ModelDefinition;

beforeEach(() => {
  store = memoryStore();
  user = buildUser(store);
});

// ---------------------------------------------------------------------------
// Inserts
// ---------------------------------------------------------------------------

describe("memoryStore() inserts", () => {
  test("assigns increasing auto-increment keys", async () => {
    const first = await user.create({ name: "Ada" });
    const second = await user.create({ name: "Bob" });

    expect(await first.getKey()).toBe(1);
    expect(await second.getKey()).toBe(2);
  });

  test("continues after the highest explicit key", async () => {
    await user.create({ id: 10, name: "Ada" });
    const next = await user.create({ name: "Bob" });

    expect(await next.getKey()).toBe(11);
  });

  test("rejects a key that already exists", async () => {
    await user.create({ id: 1, name: "Ada" });

    const error = await user.create({ id: 1, name: "Bob" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DuplicateRecordError);
    expect(error).toHaveProperty("message", 'Record {"id":1} already exists in model "user"');
    expect(store.rows(user)).toEqual([{ id: 1, name: "Ada" }]);
  });

  test("does not store virtual fields", async () => {
    const record = user.instantiate({ values: { name: "Ada" } });
    await record.set("nickname", "A");
    await record.save();

    expect(store.rows(user)).toEqual([{ id: 1, name: "Ada" }]);
  });

  test("stored rows are copies", async () => {
    await user.create({ name: "Ada" });

    const [row] = await user.select().data();
    if (row) row.name = "changed";

    expect(store.rows(user)).toEqual([{ id: 1, name: "Ada" }]);
  });
});

// ---------------------------------------------------------------------------
// Updates and deletes
// ---------------------------------------------------------------------------

describe("memoryStore() updates", () => {
  test("writes only the pending changes", async () => {
    const writes: [string, RawRow][] = [];
    store.setOptions({ onBeforeWrite: (name, values) => writes.push([name, values]) });
    await seed(user);
    writes.length = 0;

    const bob = await fetchRecord(user, 2);
    await bob.set("role", "owner");

    expect(await bob.save()).toBe(true);
    expect(writes).toEqual([["user", { role: "owner" }]]);
    expect(store.rows(user)[1]).toEqual({
      id: 2,
      name: "Bob",
      email: "bob@example.com",
      age: 30,
      role: "owner",
    });
  });

  test("rejects updates to rows that are gone", async () => {
    const ghost = user.instantiate({ state: { id: 99 }, values: { name: "Ghost" } });

    await expect(ghost.save()).rejects.toBeInstanceOf(RecordNotFoundError);
    await expect(ghost.save()).rejects.toThrow('Record {"id":99} not found in model "user"');
  });

  test("a failing write keeps the pending changes", async () => {
    await seed(user);
    const ada = await fetchRecord(user, 1);
    await ada.set("name", "Ada L.");

    store.setOptions({
      onBeforeWrite: () => {
        throw new Error("disk full");
      },
    });

    await expect(ada.save()).rejects.toThrow("disk full");
    expect(ada.pendingChanges).toEqual({ name: "Ada L." });
    expect(store.rows(user)[0]).toHaveProperty("name", "Ada");

    store.setOptions({});

    expect(await ada.save()).toBe(true);
    expect(store.rows(user)[0]).toHaveProperty("name", "Ada L.");
  });

  test("rejects moving a row onto an existing key", async () => {
    await seed(user);
    const ada = await fetchRecord(user, 1);
    await ada.set("id", 2);

    await expect(ada.save()).rejects.toThrow('Record {"id":2} already exists in model "user"');
    expect(ada.pendingChanges).toEqual({ id: 2 });
    expect(store.rows(user).map((row) => row.id)).toEqual([1, 2, 3]);
  });

  test("a key change onto a free key moves the row", async () => {
    await seed(user);
    const ada = await fetchRecord(user, 1);
    await ada.set("id", 7);

    expect(await ada.save()).toBe(true);
    expect(store.rows(user).map((row) => row.id)).toEqual([7, 2, 3]);
  });

  test("delete finds the row by its stored key, not a local key change", async () => {
    await seed(user);
    const ada = await fetchRecord(user, 1);
    await ada.set("id", 2);

    expect(await ada.delete()).toBe(1);
    expect(await user.select().get("name")).toEqual(["Bob", "Cy"]);
  });

  test("delete resolves the number of removed rows", async () => {
    await seed(user);
    const bob = await fetchRecord(user, 2);

    expect(await bob.delete()).toBe(1);
    expect(await bob.delete()).toBe(0);
    expect(await user.select().get("name")).toEqual(["Ada", "Cy"]);
  });
});

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

describe("memoryStore() filters", () => {
  beforeEach(async () => {
    await seed(user);
  });

  test("equality operators", async () => {
    expect(await namesWhere(user, Q("role").equalTo("admin"))).toEqual(["Bob"]);
    expect(await namesWhere(user, Q("role").notEqualTo("admin"))).toEqual(["Ada", "Cy"]);
  });

  test("comparison operators", async () => {
    expect(await namesWhere(user, Q("age").lessThan(30))).toEqual(["Ada"]);
    expect(await namesWhere(user, Q("age").lessThanOrEqual(30))).toEqual(["Ada", "Bob"]);
    expect(await namesWhere(user, Q("age").greaterThan(30))).toEqual(["Cy"]);
    expect(await namesWhere(user, Q("age").greaterThanOrEqual(30))).toEqual(["Bob", "Cy"]);
  });

  test("membership and prefix operators", async () => {
    expect(await namesWhere(user, Q("age").isIn([20, 40]))).toEqual(["Ada", "Cy"]);
    expect(await namesWhere(user, Q("email").startsWith("b"))).toEqual(["Bob"]);
  });

  test("groups combine their members", async () => {
    const adminOrYoung = Q("role").equalTo("admin").or(Q("age").lessThan(25));
    const memberAndOld = Q("role").equalTo("member").and(Q("age").greaterThan(25));

    expect(await namesWhere(user, adminOrYoung)).toEqual(["Ada", "Bob"]);
    expect(await namesWhere(user, memberAndOld)).toEqual(["Cy"]);
  });

  test("unset values equal null and never satisfy comparisons", async () => {
    await user.create({ name: "Dee" });

    expect(await namesWhere(user, Q("age").equalTo(null))).toEqual(["Dee"]);
    expect(await namesWhere(user, Q("age").lessThan(100))).toEqual(["Ada", "Bob", "Cy"]);
  });

  test("queries scoped to another model are ignored", async () => {
    expect(await namesWhere(user, Q("age", "post").equalTo(99))).toEqual(["Ada", "Bob", "Cy"]);
    expect(await namesWhere(user, Q("age", "user").equalTo(20))).toEqual(["Ada"]);
  });

  test("fetch() matches keyable fields", async () => {
    const bob = await fetchRecord(user, "bob@example.com");

    expect(await bob.get("name")).toBe("Bob");
    expect(await user.fetch("nobody@example.com")).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Shaping
// ---------------------------------------------------------------------------

describe("memoryStore() result shaping", () => {
  beforeEach(async () => {
    await seed(user);
  });

  test("orders by one or more fields", async () => {
    expect(await user.select({ order: "-age" }).get("name")).toEqual(["Cy", "Bob", "Ada"]);
    expect(await user.select({ order: "role,-name" }).get("name")).toEqual(["Bob", "Cy", "Ada"]);
  });

  test("unset values sort first", async () => {
    await user.create({ name: "Dee" });

    expect(await user.select({ order: "age" }).get("name")).toEqual(["Dee", "Ada", "Bob", "Cy"]);
  });

  test("start and limit slice the ordered rows", async () => {
    expect(await user.select({ order: "age", start: 1, limit: 1 }).get("name")).toEqual(["Bob"]);
    expect(await user.select({ order: "age", start: 1 }).get("name")).toEqual(["Bob", "Cy"]);
  });

  test("pages by page size", async () => {
    expect(await user.select({ order: "age", page: 1, pageSize: 2 }).get("name")).toEqual([
      "Ada",
      "Bob",
    ]);
    expect(await user.select({ order: "age", page: 2, pageSize: 2 }).get("name")).toEqual(["Cy"]);
  });

  test("distinct keeps the first row per value", async () => {
    expect(await user.select({ distinct: "role" }).get("name")).toEqual(["Ada", "Bob"]);
  });

  test("projection keeps the key fields", async () => {
    expect(await user.select({ fields: "name", limit: 2 }).data()).toEqual([
      { id: 1, name: "Ada" },
      { id: 2, name: "Bob" },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Namespaces and locales
// ---------------------------------------------------------------------------

describe("memoryStore() namespaces", () => {
  test("each namespace holds its own rows", async () => {
    await user.create({ name: "Ada" });
    await user.create({ name: "Bob" }, { namespace: "tenant-b" });

    expect(await user.select().get("name")).toEqual(["Ada"]);
    expect(await user.select({ namespace: "tenant-b" }).get("name")).toEqual(["Bob"]);
    expect(store.rows(user, "tenant-b")).toEqual([{ id: 1, name: "Bob" }]);
  });

  test("falls back to the model's namespace", async () => {
    const contact = model("contact", { registry: new ModelRegistry(), store, namespace: "crm" })
      .field("id", { flags: ["key", "autoIncrement"] })
      .field("label")
      .build();

    await contact.create({ label: "a" });
    await contact.create({ id: 5, label: "b" }, { namespace: "other" });

    expect(store.rows(contact)).toEqual([{ id: 1, label: "a" }]);
    expect(store.rows(contact, "crm")).toEqual([{ id: 1, label: "a" }]);
    expect(store.rows(contact, "other")).toEqual([{ id: 5, label: "b" }]);
  });

  test("clear() drops every table", async () => {
    await user.create({ name: "Ada" });

    store.clear();

    expect(store.rows(user)).toEqual([]);
  });
});

describe("memoryStore() translations", () => {
  function buildArticle(target: MemoryStore) {
    return model("article", { registry: new ModelRegistry(), store: target })
      .field("id", { flags: ["key"] })
      .field("title", { flags: ["translatable"] })
      .build();
  }

  test("keeps one value per locale", async () => {
    const article = buildArticle(store);
    await article.create({ id: 1, title: "Hello" });

    const french = await article.fetch(1, { locale: "fr" });
    if (!(french instanceof ModelRecord)) throw new Error("expected a record");

    expect(await french.get("title")).toBeNull();

    await french.set("title", "Bonjour");
    await french.save();

    expect(store.rows(article)).toEqual([{ id: 1, title: { en: "Hello", fr: "Bonjour" } }]);
    expect(await article.select().get("title")).toEqual(["Hello"]);
    expect(await article.select({ locale: "fr" }).get("title")).toEqual(["Bonjour"]);
  });

  test("uses the configured default locale", async () => {
    const germanStore = memoryStore({ defaultLocale: "de" });
    const article = buildArticle(germanStore);

    await article.create({ id: 1, title: "Hallo" });

    expect(germanStore.rows(article)).toEqual([{ id: 1, title: { de: "Hallo" } }]);
  });
});

describe("store errors", () => {
  test("render keys that JSON cannot encode", () => {
    expect(new DuplicateRecordError("ledger", { id: 5n, region: "eu" }).message).toBe(
      'Record {"id":5,"region":"eu"} already exists in model "ledger"',
    );
    expect(new RecordNotFoundError("ledger", { id: 5n }).message).toBe(
      'Record {"id":5} not found in model "ledger"',
    );
  });
});

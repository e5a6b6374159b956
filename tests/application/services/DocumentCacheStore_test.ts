import assert from "node:assert/strict";
import { test } from "node:test";
import { InMemoryDocumentBackend } from "../../../src/adapters/out/memory/InMemoryDocumentBackend.ts";
import {
  type CacheStoreOptions,
  DocumentCacheStore,
} from "../../../src/application/services/DocumentCacheStore.ts";
import { createDefaultUser } from "../../../src/domain/models/collections.ts";
import { storeErrorToDomainError } from "../../../src/domain/models/errors.ts";

class FakeClock {
  current = 0;

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

async function openStore(options: Partial<CacheStoreOptions> = {}) {
  const backend = new InMemoryDocumentBackend();
  const clock = new FakeClock();
  const store = new DocumentCacheStore(backend, {
    ttlMs: 300_000,
    maxSize: 10_000,
    now: clock.now,
    ...options,
  });
  const opened = await store.open();
  assert.ok(opened.isOk());
  return { backend, clock, store };
}

test("DocumentCacheStore should create and persist the default user on first read", async () => {
  const { backend, store } = await openStore();

  const user = await store.get("users", 5n);

  assert.deepEqual(user._unsafeUnwrap(), createDefaultUser(5n));
  const persisted = await backend.collection("users").findOne({ _id: 5n });
  assert.deepEqual(persisted._unsafeUnwrap(), createDefaultUser(5n));
});

test("DocumentCacheStore should create an empty settings document for a new guild", async () => {
  const { backend, store } = await openStore();

  assert.deepEqual((await store.get("settings", 9n))._unsafeUnwrap(), { _id: 9n });
  assert.deepEqual((await backend.collection("settings").findOne({ _id: 9n }))._unsafeUnwrap(), { _id: 9n });
});

test("DocumentCacheStore should insert the default only once under concurrent reads", async () => {
  const { backend, store } = await openStore();

  const results = await Promise.all([store.get("users", 3n), store.get("users", 3n), store.get("users", 3n)]);

  for (const result of results) {
    assert.ok(result.isOk());
  }
  const stored = await backend.collection("users").find({});
  assert.equal(stored._unsafeUnwrap().length, 1);
});

test("DocumentCacheStore should hand out copies that cannot change the cache", async () => {
  const { store } = await openStore();

  const first = (await store.get("settings", 1n))._unsafeUnwrap();
  first.prefix = "changed";

  assert.deepEqual((await store.get("settings", 1n))._unsafeUnwrap(), { _id: 1n });
});

test("DocumentCacheStore should serve cached documents until asked to refresh", async () => {
  const { backend, store } = await openStore();
  await store.get("settings", 1n);

  await backend.collection("settings").updateOne({ _id: 1n }, { $set: { prefix: "?" } });

  assert.deepEqual((await store.get("settings", 1n))._unsafeUnwrap(), { _id: 1n });
  assert.deepEqual(
    (await store.get("settings", 1n, { forceRefresh: true }))._unsafeUnwrap(),
    { _id: 1n, prefix: "?" },
  );
});

test("DocumentCacheStore should read user sub-fields and fill in missing ones", async () => {
  const { backend, store } = await openStore();
  await backend.collection("users").insertOne({ _id: 8n, playlist: {} });

  assert.deepEqual((await store.getField("users", 8n, "history"))._unsafeUnwrap(), []);
  assert.deepEqual((await store.getField("users", 8n, "playlist"))._unsafeUnwrap(), {});
  assert.deepEqual((await store.get("users", 8n))._unsafeUnwrap(), { _id: 8n, playlist: {}, history: [] });
});

test("DocumentCacheStore should reject unknown sub-fields", async () => {
  const { store } = await openStore();

  const result = await store.getField("users", 8n, "toString");

  assert.ok(result.isErr());
  assert.deepEqual(result.error, {
    type: "validation",
    message: "Unknown field 'toString' for users",
    issues: ["Unknown field 'toString' for users"],
    field: "toString",
  });
  assert.deepEqual(storeErrorToDomainError(result.error).details, {
    issues: ["Unknown field 'toString' for users"],
    field: "toString",
  });
});

test("DocumentCacheStore should store and find documents keyed by ids above 2^53", async () => {
  const { backend, store } = await openStore();
  const guildId = 1071234567890123456n;

  await store.update("settings", guildId, { $set: { dj: 1071234567890123457n } });

  const expected = { _id: guildId, dj: 1071234567890123457n };
  assert.deepEqual((await store.get("settings", guildId))._unsafeUnwrap(), expected);
  assert.deepEqual((await backend.collection("settings").findOne({ _id: guildId }))._unsafeUnwrap(), expected);
  assert.equal((await backend.collection("settings").findOne({ _id: guildId + 1n }))._unsafeUnwrap(), null);
});

test("DocumentCacheStore should not create a document for operations it rejects", async () => {
  const { backend, store } = await openStore();

  const result = await store.update("settings", 77n, { $set: { _id: 5n } });

  assert.ok(result.isErr());
  assert.equal(result.error.type, "validation");
  assert.equal(result.error.message, "Invalid update operations");
  assert.equal((await backend.collection("settings").findOne({ _id: 77n }))._unsafeUnwrap(), null);
  assert.equal(store.stats().size, 0);
});

test("DocumentCacheStore should reject $inc and $push on null fields without touching the backend", async () => {
  const { backend, store } = await openStore();
  await store.update("settings", 2n, { $set: { volume: null, queue: null } });

  const inc = await store.update("settings", 2n, { $inc: { volume: 1 } });
  const push = await store.update("settings", 2n, { $push: { queue: "a" } });

  assert.ok(inc.isErr());
  assert.equal(inc.error.message, "Error updating volume: Cannot increment non-numeric field: volume");
  assert.ok(push.isErr());
  assert.equal(push.error.message, "Error updating queue: Cannot push to non-array field: queue");
  const expected = { _id: 2n, volume: null, queue: null };
  assert.deepEqual((await store.get("settings", 2n))._unsafeUnwrap(), expected);
  assert.deepEqual((await backend.collection("settings").findOne({ _id: 2n }))._unsafeUnwrap(), expected);
});

test("DocumentCacheStore should apply updates to both cache and backend", async () => {
  const { backend, store } = await openStore();
  await backend.collection("users").insertOne({ _id: 42n, playlist: {}, history: [], inbox: [] });

  const updated = await store.update("users", 42n, { $set: { "playlist.201.name": "Road Trip" } });

  assert.equal(updated._unsafeUnwrap(), true);
  const expected = { _id: 42n, playlist: { "201": { name: "Road Trip" } }, history: [], inbox: [] };
  assert.deepEqual((await store.get("users", 42n))._unsafeUnwrap(), expected);
  assert.deepEqual((await backend.collection("users").findOne({ _id: 42n }))._unsafeUnwrap(), expected);
});

test("DocumentCacheStore should leave an empty list after pushing then pulling a value", async () => {
  const { store } = await openStore();

  await store.update("settings", 7n, { $push: { history: "a" } });
  await store.update("settings", 7n, { $pull: { history: "a" } });

  assert.deepEqual((await store.get("settings", 7n))._unsafeUnwrap(), { _id: 7n, history: [] });
});

test("DocumentCacheStore should keep the last items for a negative $slice", async () => {
  const { store } = await openStore();

  await store.update("users", 1n, { $push: { history: { $each: [1, 2, 3, 4, 5], $slice: -3 } } });

  assert.deepEqual((await store.getField("users", 1n, "history"))._unsafeUnwrap(), [3, 4, 5]);
});

test("DocumentCacheStore should keep the first items for a positive $slice", async () => {
  const { store } = await openStore();

  await store.update("users", 1n, { $push: { history: { $each: [1, 2, 3, 4, 5], $slice: 3 } } });

  assert.deepEqual((await store.getField("users", 1n, "history"))._unsafeUnwrap(), [1, 2, 3]);
});

test("DocumentCacheStore should leave the cache unchanged when $inc hits a non-numeric field", async () => {
  const { backend, store } = await openStore();
  await store.update("settings", 2n, { $set: { count: "two", prefix: "!" } });

  const result = await store.update("settings", 2n, { $set: { prefix: "?" }, $inc: { count: 1 } });

  assert.ok(result.isErr());
  assert.equal(result.error.type, "validation");
  assert.equal(result.error.message, "Error updating count: Cannot increment non-numeric field: count");
  const expected = { _id: 2n, count: "two", prefix: "!" };
  assert.deepEqual((await store.get("settings", 2n))._unsafeUnwrap(), expected);
  assert.deepEqual((await backend.collection("settings").findOne({ _id: 2n }))._unsafeUnwrap(), expected);
});

test("DocumentCacheStore should evict and reload after a backend update failure", async () => {
  const { backend, store } = await openStore();
  await store.get("settings", 1n);
  backend.failNext("updateOne");

  const result = await store.update("settings", 1n, { $set: { prefix: "?" } });

  assert.ok(result.isErr());
  assert.equal(result.error.type, "connection");
  assert.equal(result.error.message, "Failed to update settings/1: Simulated updateOne failure");
  assert.equal(store.stats().size, 0);
  assert.deepEqual((await store.get("settings", 1n))._unsafeUnwrap(), { _id: 1n });
});

test("DocumentCacheStore should report no change when the update leaves the document equal", async () => {
  const { store } = await openStore();
  await store.update("settings", 1n, { $set: { prefix: "!" } });

  const result = await store.update("settings", 1n, { $set: { prefix: "!" } });

  assert.equal(result._unsafeUnwrap(), false);
});

test("DocumentCacheStore should evict and report false when the backend lost the document", async () => {
  const { backend, store } = await openStore();
  await store.get("settings", 4n);
  await backend.collection("settings").deleteOne({ _id: 4n });

  const result = await store.update("settings", 4n, { $set: { prefix: "?" } });

  assert.equal(result._unsafeUnwrap(), false);
  assert.equal(store.stats().size, 0);
});

test("DocumentCacheStore should upsert from $set when the backend lost the document", async () => {
  const { backend, store } = await openStore();
  await store.get("settings", 4n);
  await backend.collection("settings").deleteOne({ _id: 4n });

  const result = await store.update(
    "settings",
    4n,
    { $set: { prefix: "?" }, $inc: { uses: 1 } },
    { upsert: true },
  );

  assert.equal(result._unsafeUnwrap(), true);
  assert.deepEqual((await backend.collection("settings").findOne({ _id: 4n }))._unsafeUnwrap(), { _id: 4n, prefix: "?" });
  assert.deepEqual((await store.get("settings", 4n))._unsafeUnwrap(), { _id: 4n, prefix: "?" });
});

test("DocumentCacheStore should compose updates from the live document", async () => {
  const { store } = await openStore();
  await store.update("users", 6n, { $push: { inbox: "hello" } });

  const result = await store.withUpdate("users", 6n, (document) => {
    const inbox = document.inbox;
    return Array.isArray(inbox) ? { $set: { unread: inbox.length } } : null;
  });

  assert.equal(result._unsafeUnwrap(), true);
  assert.equal((await store.get("users", 6n))._unsafeUnwrap().unread, 1);
});

test("DocumentCacheStore should release the lock when composing returns null", async () => {
  const { store } = await openStore();

  const skipped = await store.withUpdate("users", 6n, () => null);

  assert.equal(skipped._unsafeUnwrap(), false);
  assert.ok((await store.get("users", 6n)).isOk());
});

test("DocumentCacheStore should release the lock when composing throws", async () => {
  const { store } = await openStore();

  await assert.rejects(
    store.withUpdate("users", 6n, () => {
      throw new Error("compose failed");
    }),
    { message: "compose failed" },
  );
  assert.ok((await store.get("users", 6n)).isOk());
});

test("DocumentCacheStore should close update handles exactly once", async () => {
  const { store } = await openStore();

  const handle = (await store.beginUpdate("settings", 3n))._unsafeUnwrap();
  assert.deepEqual(handle.document, { _id: 3n });
  assert.equal(store.abortUpdate(handle), true);
  assert.equal(store.abortUpdate(handle), false);

  const commit = await store.commitUpdate(handle, { $set: { prefix: "?" } });
  assert.ok(commit.isErr());
  assert.equal(commit.error.message, "Update handle is already closed");
});

test("DocumentCacheStore should commit through an explicit handle", async () => {
  const { store } = await openStore();

  const handle = (await store.beginUpdate("settings", 3n))._unsafeUnwrap();
  const committed = await store.commitUpdate(handle, { $set: { prefix: "?" } });

  assert.equal(committed._unsafeUnwrap(), true);
  assert.deepEqual((await store.get("settings", 3n))._unsafeUnwrap(), { _id: 3n, prefix: "?" });
});

test("DocumentCacheStore should delete documents and drop them from the cache", async () => {
  const { backend, store } = await openStore();
  await store.get("users", 11n);

  assert.equal((await store.delete("users", 11n))._unsafeUnwrap(), true);
  assert.equal(store.stats().size, 0);
  assert.equal((await backend.collection("users").findOne({ _id: 11n }))._unsafeUnwrap(), null);
  assert.equal((await store.delete("users", 11n))._unsafeUnwrap(), false);
});

test("DocumentCacheStore should keep the cache entry when the backend delete fails", async () => {
  const { backend, store } = await openStore();
  await store.get("users", 11n);
  backend.failNext("deleteOne");

  const result = await store.delete("users", 11n);

  assert.ok(result.isErr());
  assert.equal(result.error.message, "Failed to delete users/11: Simulated deleteOne failure");
  assert.equal(store.stats().size, 1);
});

test("DocumentCacheStore should cache every document a query returns", async () => {
  const { backend, store } = await openStore();
  const users = backend.collection("users");
  await users.insertOne({ _id: 1n, level: 3 });
  await users.insertOne({ _id: 2n, level: 8 });
  await users.insertOne({ _id: 3n, level: 9 });

  const found = await store.queryMany("users", { level: { $gt: 5 } }, { limit: 1, skip: 1 });

  assert.deepEqual(found._unsafeUnwrap(), [{ _id: 3n, level: 9 }]);
  assert.deepEqual(store.stats(), { size: 1, byCollection: { settings: 0, users: 1 } });
});

test("DocumentCacheStore should expire entries idle for longer than the TTL", async () => {
  const { clock, store } = await openStore({ ttlMs: 1000 });
  await store.get("settings", 1n);
  clock.advance(500);
  await store.get("settings", 2n);
  clock.advance(500);

  const atLimit = await store.evictExpired();
  assert.deepEqual(atLimit._unsafeUnwrap(), { expired: 0, evicted: 0, remaining: 2 });

  clock.advance(1);
  const swept = await store.evictExpired();
  assert.deepEqual(swept._unsafeUnwrap(), { expired: 1, evicted: 0, remaining: 1 });
  assert.deepEqual(store.stats().byCollection, { settings: 1, users: 0 });
});

test("DocumentCacheStore should refresh the access time on every cache hit", async () => {
  const { clock, store } = await openStore({ ttlMs: 1000 });
  await store.get("settings", 1n);
  clock.advance(900);
  await store.get("settings", 1n);
  clock.advance(900);

  assert.deepEqual((await store.evictExpired())._unsafeUnwrap(), { expired: 0, evicted: 0, remaining: 1 });
});

test("DocumentCacheStore should evict the least recently used entries beyond max size", async () => {
  const { clock, store } = await openStore({ maxSize: 2 });
  await store.get("settings", 1n);
  clock.advance(1);
  await store.get("users", 2n);
  clock.advance(1);
  await store.get("settings", 3n);
  clock.advance(1);
  await store.get("settings", 1n);

  const swept = await store.evictExpired();

  assert.deepEqual(swept._unsafeUnwrap(), { expired: 0, evicted: 1, remaining: 2 });
  assert.deepEqual(store.stats().byCollection, { settings: 2, users: 0 });
});

test("DocumentCacheStore should refuse operations once closed", async () => {
  const { backend, store } = await openStore();
  await store.get("settings", 1n);

  assert.ok((await store.close()).isOk());
  assert.equal(store.isOpen(), false);
  assert.equal(backend.isOpen(), false);
  assert.equal(store.stats().size, 0);

  const result = await store.get("settings", 1n);
  assert.ok(result.isErr());
  assert.equal(result.error.type, "closed");
});

test("DocumentCacheStore should report a failed backend open", async () => {
  const backend = new InMemoryDocumentBackend();
  const store = new DocumentCacheStore(backend, { ttlMs: 1000, maxSize: 10 });

  const result = await store.get("settings", 1n);

  assert.ok(result.isErr());
  assert.equal(result.error.message, "Document store is not open");
});

test("DocumentCacheStore should surface load failures without caching", async () => {
  const { backend, store } = await openStore();
  backend.failNext("findOne");

  const result = await store.get("users", 1n);

  assert.ok(result.isErr());
  assert.equal(result.error.message, "Failed to load users/1: Simulated findOne failure");
  assert.equal(store.stats().size, 0);
});

import assert from "node:assert/strict";
import { test } from "node:test";
import { loadConfig } from "../../src/config/env.ts";

test("loadConfig should apply defaults for the memory backend", () => {
  const config = loadConfig({ STORE_BACKEND: "memory" });

  assert.deepEqual(config._unsafeUnwrap(), {
    backend: "memory",
    mongo: { uri: "", dbName: "" },
    cache: { ttlMs: 300_000, maxSize: 10_000, sweepIntervalMs: 60_000 },
    port: 8088,
  });
});

test("loadConfig should read every setting from the environment", () => {
  const config = loadConfig({
    MONGODB_URI: "mongodb://localhost:27017",
    MONGODB_DB_NAME: "guilds",
    CACHE_TTL_SECONDS: "10",
    CACHE_MAX_SIZE: "50",
    CACHE_SWEEP_INTERVAL_SECONDS: "5",
    PORT: "9000",
  });

  assert.deepEqual(config._unsafeUnwrap(), {
    backend: "mongodb",
    mongo: { uri: "mongodb://localhost:27017", dbName: "guilds" },
    cache: { ttlMs: 10_000, maxSize: 50, sweepIntervalMs: 5000 },
    port: 9000,
  });
});

test("loadConfig should require connection settings for MongoDB", () => {
  const config = loadConfig({});

  assert.ok(config.isErr());
  assert.equal(config.error.message, "Invalid environment configuration");
  assert.deepEqual(config.error.issues, [
    "MONGODB_URI: Required when STORE_BACKEND is mongodb",
    "MONGODB_DB_NAME: Required when STORE_BACKEND is mongodb",
  ]);
});

test("loadConfig should treat empty variables as unset", () => {
  const config = loadConfig({ STORE_BACKEND: "memory", PORT: "", CACHE_TTL_SECONDS: undefined });

  assert.equal(config._unsafeUnwrap().port, 8088);
  assert.equal(config._unsafeUnwrap().cache.ttlMs, 300_000);
});

test("loadConfig should reject invalid numbers", () => {
  const config = loadConfig({ STORE_BACKEND: "memory", CACHE_MAX_SIZE: "-3" });

  assert.ok(config.isErr());
  assert.equal(config.error.issues.length, 1);
  assert.ok(config.error.issues[0]?.startsWith("CACHE_MAX_SIZE: "));
});

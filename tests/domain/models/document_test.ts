import assert from "node:assert/strict";
import { test } from "node:test";
import {
  cloneDocument,
  documentsEqual,
  isDocumentData,
  parseDocumentId,
  parseStoredDocument,
  type StoredDocument,
  toJsonValue,
  valuesEqual,
} from "../../../src/domain/models/document.ts";
import {
  createDefaultUser,
  isUserField,
  parseSettingsDocument,
  usersSchema,
} from "../../../src/domain/models/collections.ts";

const SNOWFLAKE = 1071234567890123456n;

test("cloneDocument should return an independent deep copy", () => {
  const original: StoredDocument = { _id: SNOWFLAKE, nested: { list: [1, 2n] } };
  const copy = cloneDocument(original);

  assert.deepEqual(copy, original);
  const nested = copy.nested;
  assert.ok(isDocumentData(nested));
  const list = nested.list;
  assert.ok(Array.isArray(list));
  list.push(3);

  assert.deepEqual(original, { _id: SNOWFLAKE, nested: { list: [1, 2n] } });
});

test("documentsEqual should compare values structurally", () => {
  assert.equal(documentsEqual({ a: [1, { b: "x" }] }, { a: [1, { b: "x" }] }), true);
  assert.equal(documentsEqual({ a: 1 }, { a: "1" }), false);
  assert.equal(documentsEqual(null, undefined), false);
});

test("isDocumentData should accept plain objects only", () => {
  assert.equal(isDocumentData({}), true);
  assert.equal(isDocumentData([]), false);
  assert.equal(isDocumentData(null), false);
  assert.equal(isDocumentData("text"), false);
});

test("valuesEqual should match numbers against 64-bit integers of the same value", () => {
  assert.equal(valuesEqual(5, 5n), true);
  assert.equal(valuesEqual(5.5, 5n), false);
  assert.equal(valuesEqual(SNOWFLAKE, SNOWFLAKE), true);
  assert.equal(valuesEqual("5", 5n), false);
  assert.equal(valuesEqual({ a: 1 }, { a: 1 }), true);
});

test("toJsonValue should write 64-bit integers as decimal strings", () => {
  assert.deepEqual(toJsonValue({ _id: SNOWFLAKE, perms: { read: [SNOWFLAKE, 3] }, name: "x" }), {
    _id: "1071234567890123456",
    perms: { read: ["1071234567890123456", 3] },
    name: "x",
  });
});

test("parseDocumentId should accept ids above 2^53 as bigint or decimal text", () => {
  assert.equal(parseDocumentId(SNOWFLAKE)._unsafeUnwrap(), SNOWFLAKE);
  assert.equal(parseDocumentId("1071234567890123456")._unsafeUnwrap(), SNOWFLAKE);
  assert.equal(parseDocumentId(42)._unsafeUnwrap(), 42n);

  for (const invalid of [-1, 1.5, -1n, "abc", "-5", "", Number.MAX_SAFE_INTEGER + 1, 1n << 63n]) {
    const result = parseDocumentId(invalid);
    assert.ok(result.isErr());
    assert.equal(result.error.type, "validation");
    assert.equal(result.error.message, `Invalid document id: ${String(invalid)}`);
  }
});

test("parseStoredDocument should accept Int32 and Int64 ids and nested 64-bit values", () => {
  const small = parseStoredDocument({ _id: 7, prefix: "!" });
  assert.deepEqual(small._unsafeUnwrap(), { _id: 7n, prefix: "!" });

  const large = parseStoredDocument({ _id: SNOWFLAKE, perms: { read: [SNOWFLAKE] } });
  assert.deepEqual(large._unsafeUnwrap(), { _id: SNOWFLAKE, perms: { read: [SNOWFLAKE] } });

  const missing = parseStoredDocument({ prefix: "!" });
  assert.ok(missing.isErr());
  assert.equal(missing.error.message, "Malformed stored document");
});

test("parseSettingsDocument should type the known settings fields", () => {
  const settings = parseSettingsDocument({
    _id: SNOWFLAKE,
    prefix: "?",
    volume: 80,
    "24/7": true,
    dj: 42n,
    music_request_channel: { text_channel_id: 5n, controller_msg_id: 6n },
    custom: "kept",
  })._unsafeUnwrap();

  assert.equal(settings.prefix, "?");
  assert.equal(settings.volume, 80);
  assert.equal(settings["24/7"], true);
  assert.equal(settings.dj, 42n);
  assert.equal(settings.music_request_channel?.text_channel_id, 5n);
  assert.equal(settings.custom, "kept");

  const malformed = parseSettingsDocument({ _id: 3n, volume: "loud" });
  assert.ok(malformed.isErr());
  assert.equal(malformed.error.message, "Malformed settings document 3");
});

test("createDefaultUser should build the favourite playlist and empty lists", () => {
  assert.deepEqual(createDefaultUser(SNOWFLAKE), {
    _id: SNOWFLAKE,
    playlist: {
      "200": {
        tracks: [],
        perms: { read: [], write: [], remove: [] },
        name: "Favourite",
        type: "playlist",
      },
    },
    history: [],
    inbox: [],
  });
});

test("users schema should give fresh default values for each call", () => {
  const first = usersSchema.fields.history();
  const second = usersSchema.fields.history();
  assert.deepEqual(first, []);
  assert.notEqual(first, second);
});

test("isUserField should recognise the user sub-fields", () => {
  assert.equal(isUserField("playlist"), true);
  assert.equal(isUserField("inbox"), true);
  assert.equal(isUserField("_id"), false);
});

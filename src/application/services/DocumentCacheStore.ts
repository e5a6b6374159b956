import { Mutex, type MutexInterface } from "async-mutex";
import { err, ok, type Result } from "neverthrow";
import {
  type CollectionName,
  type CollectionSchema,
  COLLECTIONS,
  defaultCollectionSchemas,
} from "../../domain/models/collections.ts";
import {
  cloneDocument,
  type DocumentId,
  type DocumentValue,
  type ReadonlyDocument,
  type StoredDocument,
} from "../../domain/models/document.ts";
import {
  type StoreError,
  validationError,
  withContext,
} from "../../domain/models/errors.ts";
import { parseUpdateOperations, type UpdateOperations } from "../../domain/models/update.ts";
import type { DocumentFilter } from "../../domain/services/filterMatcher.ts";
import { applyUpdate } from "../../domain/services/updateOperators.ts";
import type { DocumentBackend, FindOptions } from "../ports/out/DocumentBackend.ts";
import { debug, info, warn } from "../../config/logger.ts";

export interface CacheStoreOptions {
  ttlMs: number;
  maxSize: number;
  schemas?: Readonly<Record<CollectionName, CollectionSchema>>;
  now?: () => number;
}

export interface GetOptions {
  forceRefresh?: boolean;
}

export interface UpdateOptions {
  /**
   * Insert a document built from `$set` when the backend no longer holds one
   */
  upsert?: boolean;
}

/**
 * Exclusive access to one cached document between `beginUpdate` and
 * `commitUpdate` / `abortUpdate`. `document` is the live cached value: read
 * it to compose operations, never write to it.
 */
export interface UpdateHandle {
  readonly collection: CollectionName;
  readonly key: DocumentId;
  readonly document: ReadonlyDocument;
}

export type ComposeUpdate = (
  document: ReadonlyDocument,
) => UpdateOperations | null | Promise<UpdateOperations | null>;

export interface SweepReport {
  expired: number;
  evicted: number;
  remaining: number;
}

export interface CacheStats {
  size: number;
  byCollection: Record<CollectionName, number>;
}

interface CacheEntry {
  document: StoredDocument;
  lastAccess: number;
}

type StoreState = "created" | "open" | "closed";

/**
 * Write-through cache of settings and user documents in front of a
 * DocumentBackend.
 *
 * Every path that touches the cache runs under one mutex, so a key is loaded
 * (and its default inserted) at most once and sweeps never see a document
 * halfway through an update.
 */
export class DocumentCacheStore {
  private readonly mutex = new Mutex();
  private readonly entries = new Map<CollectionName, Map<DocumentId, CacheEntry>>();
  private readonly openHandles = new Map<UpdateHandle, MutexInterface.Releaser>();
  private readonly schemas: Readonly<Record<CollectionName, CollectionSchema>>;
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;
  private state: StoreState = "created";

  constructor(
    private readonly backend: DocumentBackend,
    options: CacheStoreOptions,
  ) {
    this.ttlMs = options.ttlMs;
    this.maxSize = options.maxSize;
    this.schemas = options.schemas ?? defaultCollectionSchemas;
    this.now = options.now ?? Date.now;
    for (const name of COLLECTIONS) {
      this.entries.set(name, new Map());
    }
  }

  async open(): Promise<Result<void, StoreError>> {
    if (this.state === "open") {
      warn("Document store is already open. Skipping.");
      return ok(undefined);
    }

    const opened = await this.backend.open();
    if (opened.isErr()) {
      return err(withContext(opened.error, "Failed to open document store"));
    }

    this.state = "open";
    info(`Document store opened (ttl: ${this.ttlMs}ms, max size: ${this.maxSize})`);
    return ok(undefined);
  }

  async close(): Promise<Result<void, StoreError>> {
    if (this.state !== "open") {
      return ok(undefined);
    }

    return await this.mutex.runExclusive(async () => {
      this.state = "closed";
      for (const cache of this.entries.values()) {
        cache.clear();
      }
      const closed = await this.backend.close();
      if (closed.isErr()) {
        return err(withContext(closed.error, "Failed to close document store"));
      }
      info("Document store closed");
      return ok(undefined);
    });
  }

  isOpen(): boolean {
    return this.state === "open";
  }

  /**
   * Read a whole document, creating and persisting the collection default the
   * first time a key is seen. Always returns a copy.
   */
  async get(
    collection: CollectionName,
    key: DocumentId,
    options: GetOptions = {},
  ): Promise<Result<StoredDocument, StoreError>> {
    const opened = this.ensureOpen();
    if (opened.isErr()) {
      return err(opened.error);
    }

    return await this.mutex.runExclusive(async () => {
      const loaded = await this.load(collection, key, options.forceRefresh ?? false);
      return loaded.map((entry) => cloneDocument(entry.document));
    });
  }

  /**
   * Read one declared top-level field of a document. A missing field is
   * filled in with its default inside the cached document.
   */
  async getField(
    collection: CollectionName,
    key: DocumentId,
    field: string,
    options: GetOptions = {},
  ): Promise<Result<DocumentValue, StoreError>> {
    const opened = this.ensureOpen();
    if (opened.isErr()) {
      return err(opened.error);
    }

    const fields = this.schemas[collection].fields;
    if (!Object.hasOwn(fields, field)) {
      return err({ ...validationError(`Unknown field '${field}' for ${collection}`), field });
    }
    const createDefault = fields[field];

    return await this.mutex.runExclusive(async () => {
      const loaded = await this.load(collection, key, options.forceRefresh ?? false);
      return loaded.map((entry) => {
        const value = entry.document[field] ?? createDefault();
        entry.document[field] = value;
        return cloneDocument(value);
      });
    });
  }

  /**
   * Take the store lock and load a document for composing an update. The lock
   * is held until the handle is committed or aborted.
   */
  async beginUpdate(collection: CollectionName, key: DocumentId): Promise<Result<UpdateHandle, StoreError>> {
    const opened = this.ensureOpen();
    if (opened.isErr()) {
      return err(opened.error);
    }

    const release = await this.mutex.acquire();
    const loaded = await this.load(collection, key, false);
    if (loaded.isErr()) {
      release();
      return err(loaded.error);
    }

    const handle: UpdateHandle = { collection, key, document: loaded.value.document };
    this.openHandles.set(handle, release);
    return ok(handle);
  }

  /**
   * Apply operations to the handle's document, persist them, and release the
   * lock. Resolves to whether the backend reports the document as changed.
   */
  async commitUpdate(
    handle: UpdateHandle,
    operations: UpdateOperations,
    options: UpdateOptions = {},
  ): Promise<Result<boolean, StoreError>> {
    const release = this.openHandles.get(handle);
    if (!release) {
      return err(validationError("Update handle is already closed"));
    }
    this.openHandles.delete(handle);

    try {
      return await this.applyAndPersist(handle.collection, handle.key, operations, options);
    } finally {
      release();
    }
  }

  /**
   * Release an update handle without changing anything. Returns false when
   * the handle was already closed.
   */
  abortUpdate(handle: UpdateHandle): boolean {
    const release = this.openHandles.get(handle);
    if (!release) {
      return false;
    }
    this.openHandles.delete(handle);
    release();
    return true;
  }

  /**
   * Build operations from the live document and commit them. Returning null
   * from `compose` leaves the document untouched. The lock is released even
   * when `compose` throws.
   */
  async withUpdate(
    collection: CollectionName,
    key: DocumentId,
    compose: ComposeUpdate,
    options: UpdateOptions = {},
  ): Promise<Result<boolean, StoreError>> {
    const begun = await this.beginUpdate(collection, key);
    if (begun.isErr()) {
      return err(begun.error);
    }

    const handle = begun.value;
    try {
      const operations = await compose(handle.document);
      if (operations === null) {
        return ok(false);
      }
      return await this.commitUpdate(handle, operations, options);
    } finally {
      this.abortUpdate(handle);
    }
  }

  async update(
    collection: CollectionName,
    key: DocumentId,
    operations: UpdateOperations,
    options: UpdateOptions = {},
  ): Promise<Result<boolean, StoreError>> {
    // Rejected operations must not load or create the document.
    const parsed = parseUpdateOperations(operations);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    const begun = await this.beginUpdate(collection, key);
    if (begun.isErr()) {
      return err(begun.error);
    }
    return await this.commitUpdate(begun.value, parsed.value, options);
  }

  /**
   * Delete a document from the backend. The cache entry only goes away once
   * the backend confirms the deletion.
   */
  async delete(collection: CollectionName, key: DocumentId): Promise<Result<boolean, StoreError>> {
    const opened = this.ensureOpen();
    if (opened.isErr()) {
      return err(opened.error);
    }

    return await this.mutex.runExclusive(async () => {
      const deleted = await this.backend.collection(collection).deleteOne({ _id: key });
      if (deleted.isErr()) {
        return err(withContext(deleted.error, `Failed to delete ${collection}/${key}`));
      }
      if (deleted.value.deletedCount === 0) {
        return ok(false);
      }
      this.evict(collection, key);
      debug(`Deleted ${collection}/${key}`);
      return ok(true);
    });
  }

  /**
   * Query the backend directly and refresh the cache with every document it
   * returns. Only the cache writes take the lock.
   */
  async queryMany(
    collection: CollectionName,
    filter: DocumentFilter,
    options: FindOptions = {},
  ): Promise<Result<StoredDocument[], StoreError>> {
    const opened = this.ensureOpen();
    if (opened.isErr()) {
      return err(opened.error);
    }

    const found = await this.backend.collection(collection).find(filter, options);
    if (found.isErr()) {
      return err(withContext(found.error, `Failed to query ${collection}`));
    }

    const documents = found.value;
    return await this.mutex.runExclusive(() => {
      const now = this.now();
      const cache = this.cacheOf(collection);
      for (const document of documents) {
        cache.set(document._id, { document, lastAccess: now });
      }
      return ok(documents.map((document) => cloneDocument(document)));
    });
  }

  /**
   * Drop entries idle for longer than the TTL, then the least recently
   * accessed ones until the cache fits its maximum size.
   */
  async evictExpired(): Promise<Result<SweepReport, StoreError>> {
    const opened = this.ensureOpen();
    if (opened.isErr()) {
      return err(opened.error);
    }

    return await this.mutex.runExclusive(() => {
      const now = this.now();
      let expired = 0;
      for (const cache of this.entries.values()) {
        for (const [key, entry] of cache) {
          if (now - entry.lastAccess > this.ttlMs) {
            cache.delete(key);
            expired++;
          }
        }
      }

      let evicted = 0;
      while (this.size() > this.maxSize) {
        const oldest = this.leastRecentlyAccessed();
        if (!oldest) {
          break;
        }
        this.evict(oldest.collection, oldest.key);
        evicted++;
        warn(`Cache size exceeded. Removed oldest entry: ${oldest.collection}/${oldest.key}`);
      }

      const remaining = this.size();
      info(`Cache cleanup completed. Expired: ${expired}, evicted: ${evicted}, remaining: ${remaining}`);
      return ok({ expired, evicted, remaining });
    });
  }

  stats(): CacheStats {
    return {
      size: this.size(),
      byCollection: {
        settings: this.cacheOf("settings").size,
        users: this.cacheOf("users").size,
      },
    };
  }

  private ensureOpen(): Result<void, StoreError> {
    if (this.state !== "open") {
      return err({ type: "closed", message: "Document store is not open" });
    }
    return ok(undefined);
  }

  private cacheOf(collection: CollectionName): Map<DocumentId, CacheEntry> {
    const cache = this.entries.get(collection);
    if (cache) {
      return cache;
    }
    const created = new Map<DocumentId, CacheEntry>();
    this.entries.set(collection, created);
    return created;
  }

  private size(): number {
    let total = 0;
    for (const cache of this.entries.values()) {
      total += cache.size;
    }
    return total;
  }

  private evict(collection: CollectionName, key: DocumentId): void {
    this.cacheOf(collection).delete(key);
  }

  private leastRecentlyAccessed(): { collection: CollectionName; key: DocumentId } | undefined {
    let oldest: { collection: CollectionName; key: DocumentId; lastAccess: number } | undefined;
    for (const [collection, cache] of this.entries) {
      for (const [key, entry] of cache) {
        if (!oldest || entry.lastAccess < oldest.lastAccess) {
          oldest = { collection, key, lastAccess: entry.lastAccess };
        }
      }
    }
    return oldest;
  }

  /**
   * Cached entry for a key, loading it (or creating the default document) on
   * a miss. Callers hold the lock.
   */
  private async load(
    collection: CollectionName,
    key: DocumentId,
    forceRefresh: boolean,
  ): Promise<Result<CacheEntry, StoreError>> {
    // The store may have been closed while this caller waited for the lock
    const opened = this.ensureOpen();
    if (opened.isErr()) {
      return err(opened.error);
    }

    const cache = this.cacheOf(collection);
    const cached = cache.get(key);
    if (cached && !forceRefresh) {
      cached.lastAccess = this.now();
      return ok(cached);
    }

    debug(`Cache miss for ${collection}/${key}, loading from backend`);
    const backendCollection = this.backend.collection(collection);
    const found = await backendCollection.findOne({ _id: key });
    if (found.isErr()) {
      return err(withContext(found.error, `Failed to load ${collection}/${key}`));
    }

    let document = found.value;
    if (!document) {
      document = this.schemas[collection].createDefault(key);
      const inserted = await backendCollection.insertOne(cloneDocument(document));
      if (inserted.isErr()) {
        return err(withContext(inserted.error, `Failed to create ${collection}/${key}`));
      }
      info(`Created default ${collection} document for ${key}`);
    }

    const entry: CacheEntry = { document, lastAccess: this.now() };
    cache.set(key, entry);
    return ok(entry);
  }

  /**
   * Validate and apply operations to a draft copy, send them to the backend,
   * and only then swap the draft into the cache. Callers hold the lock.
   */
  private async applyAndPersist(
    collection: CollectionName,
    key: DocumentId,
    input: UpdateOperations,
    options: UpdateOptions,
  ): Promise<Result<boolean, StoreError>> {
    const parsed = parseUpdateOperations(input);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    const operations = parsed.value;

    const loaded = await this.load(collection, key, false);
    if (loaded.isErr()) {
      return err(loaded.error);
    }
    const entry = loaded.value;

    const draft = cloneDocument(entry.document);
    const applied = applyUpdate(draft, operations);
    if (applied.isErr()) {
      debug(`Rejected update of ${collection}/${key}: ${applied.error.message}`);
      return err(applied.error);
    }

    const backendCollection = this.backend.collection(collection);
    const updated = await backendCollection.updateOne({ _id: key }, operations);
    if (updated.isErr()) {
      this.evict(collection, key);
      warn(`Update of ${collection}/${key} failed, cache entry evicted: ${updated.error.message}`);
      return err(withContext(updated.error, `Failed to update ${collection}/${key}`));
    }

    if (updated.value.matchedCount === 0) {
      this.evict(collection, key);
      if (!options.upsert) {
        warn(`No ${collection} document matched ${key}, cache entry evicted`);
        return ok(false);
      }
      return await this.upsert(collection, key, operations);
    }

    entry.document = draft;
    entry.lastAccess = this.now();
    return ok(updated.value.modifiedCount > 0);
  }

  private async upsert(
    collection: CollectionName,
    key: DocumentId,
    operations: UpdateOperations,
  ): Promise<Result<boolean, StoreError>> {
    const document: StoredDocument = { _id: key };
    const built = applyUpdate(document, { $set: operations.$set ?? {} });
    if (built.isErr()) {
      return err(built.error);
    }

    const inserted = await this.backend.collection(collection).insertOne(cloneDocument(document));
    if (inserted.isErr()) {
      return err(withContext(inserted.error, `Failed to upsert ${collection}/${key}`));
    }

    this.cacheOf(collection).set(key, { document, lastAccess: this.now() });
    info(`Upserted ${collection} document for ${key}`);
    return ok(true);
  }
}

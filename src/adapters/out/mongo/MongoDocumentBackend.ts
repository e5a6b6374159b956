import { type Collection, type Db, type Document, MongoClient, type UpdateFilter } from "mongodb";
import { err, ok, type Result, ResultAsync } from "neverthrow";
import type {
  DeleteOutcome,
  DocumentBackend,
  DocumentCollection,
  FindOptions,
  UpdateOutcome,
} from "../../../application/ports/out/DocumentBackend.ts";
import {
  type CollectionName,
  type CollectionSchema,
  defaultCollectionSchemas,
} from "../../../domain/models/collections.ts";
import { parseStoredDocument, type StoredDocument } from "../../../domain/models/document.ts";
import {
  type BackendError,
  connectionError,
  describeCause,
  validationError,
} from "../../../domain/models/errors.ts";
import type { UpdateOperations } from "../../../domain/models/update.ts";
import type { DocumentFilter } from "../../../domain/services/filterMatcher.ts";
import { debug, error, info, warn } from "../../../config/logger.ts";

export interface MongoBackendOptions {
  uri: string;
  dbName: string;
  schemas?: Readonly<Record<CollectionName, CollectionSchema>>;
}

const toConnectionError = (context: string) => (cause: unknown): BackendError =>
  connectionError(`${context}: ${describeCause(cause)}`, cause);

export function createMongoClient(uri: string): MongoClient {
  return new MongoClient(uri, {
    maxPoolSize: 50,
    minPoolSize: 5,
    maxIdleTimeMS: 60000,
    retryWrites: true,
    // Int64 values (snowflake ids) come back as bigint instead of Long
    useBigInt64: true,
  });
}

function toMongoUpdate(operations: UpdateOperations): UpdateFilter<StoredDocument> {
  const update: UpdateFilter<StoredDocument> = {};
  for (const [operator, edits] of Object.entries(operations)) {
    if (edits !== undefined) {
      update[operator] = edits;
    }
  }
  return update;
}

function parseDocuments(raw: Document[]): Result<StoredDocument[], BackendError> {
  const documents: StoredDocument[] = [];
  for (const item of raw) {
    const parsed = parseStoredDocument(item);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    documents.push(parsed.value);
  }
  return ok(documents);
}

/**
 * DocumentBackend on the official MongoDB driver. One client per backend,
 * pooled; collections are bound on open.
 */
export class MongoDocumentBackend implements DocumentBackend {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private readonly schemas: Readonly<Record<CollectionName, CollectionSchema>>;

  constructor(private readonly options: MongoBackendOptions) {
    this.schemas = options.schemas ?? defaultCollectionSchemas;
  }

  async open(): Promise<Result<void, BackendError>> {
    if (!this.options.uri || !this.options.dbName) {
      error("MongoDB initialization failed: URI or database name is missing.");
      return err(validationError("Both URI and database name must be provided."));
    }

    if (this.client) {
      warn("MongoDB client is already initialized. Skipping reinitialization.");
      return ok(undefined);
    }

    debug(`Initializing MongoDB client for database ${this.options.dbName}`);
    const client = createMongoClient(this.options.uri);

    const connected = await ResultAsync.fromPromise(
      client.connect().then(() => client.db("admin").command({ ping: 1 })),
      toConnectionError("Failed to initialize MongoDB"),
    );
    if (connected.isErr()) {
      error(connected.error.message);
      await this.closeQuietly(client);
      return err(connected.error);
    }

    this.client = client;
    this.db = client.db(this.options.dbName);
    info(`MongoDB database initialized: ${this.options.dbName}`);
    return ok(undefined);
  }

  async close(): Promise<Result<void, BackendError>> {
    const client = this.client;
    if (!client) {
      return ok(undefined);
    }

    this.client = null;
    this.db = null;
    const closed = await ResultAsync.fromPromise(
      client.close(),
      toConnectionError("Failed to close MongoDB client"),
    );
    if (closed.isOk()) {
      info("MongoDB client closed");
    }
    return closed;
  }

  collection(name: CollectionName): DocumentCollection {
    return new MongoCollection(name, () => this.bind(name));
  }

  private bind(name: CollectionName): Result<Collection<StoredDocument>, BackendError> {
    if (!this.db) {
      return err(connectionError("MongoDB client is not initialized"));
    }
    return ok(this.db.collection<StoredDocument>(this.schemas[name].backendName));
  }

  private async closeQuietly(client: MongoClient): Promise<void> {
    const closed = await ResultAsync.fromPromise(client.close(), toConnectionError("close"));
    if (closed.isErr()) {
      debug(`Ignoring close failure after failed connect: ${closed.error.message}`);
    }
  }
}

class MongoCollection implements DocumentCollection {
  constructor(
    private readonly name: CollectionName,
    private readonly bind: () => Result<Collection<StoredDocument>, BackendError>,
  ) {}

  async findOne(filter: DocumentFilter): Promise<Result<StoredDocument | null, BackendError>> {
    const collection = this.bind();
    if (collection.isErr()) {
      return err(collection.error);
    }

    const found = await ResultAsync.fromPromise(
      collection.value.findOne(filter),
      toConnectionError(`findOne on ${this.name} failed`),
    );
    return found.andThen((raw): Result<StoredDocument | null, BackendError> =>
      raw === null ? ok(null) : parseStoredDocument(raw)
    );
  }

  async insertOne(document: StoredDocument): Promise<Result<void, BackendError>> {
    const collection = this.bind();
    if (collection.isErr()) {
      return err(collection.error);
    }

    const inserted = await ResultAsync.fromPromise(
      collection.value.insertOne({ ...document }),
      toConnectionError(`insertOne on ${this.name} failed`),
    );
    return inserted.map(() => undefined);
  }

  async updateOne(
    filter: DocumentFilter,
    operations: UpdateOperations,
  ): Promise<Result<UpdateOutcome, BackendError>> {
    const collection = this.bind();
    if (collection.isErr()) {
      return err(collection.error);
    }

    const updated = await ResultAsync.fromPromise(
      collection.value.updateOne(filter, toMongoUpdate(operations)),
      toConnectionError(`updateOne on ${this.name} failed`),
    );
    return updated.map((result) => ({
      matchedCount: result.matchedCount,
      modifiedCount: result.modifiedCount,
    }));
  }

  async deleteOne(filter: DocumentFilter): Promise<Result<DeleteOutcome, BackendError>> {
    const collection = this.bind();
    if (collection.isErr()) {
      return err(collection.error);
    }

    const deleted = await ResultAsync.fromPromise(
      collection.value.deleteOne(filter),
      toConnectionError(`deleteOne on ${this.name} failed`),
    );
    return deleted.map((result) => ({ deletedCount: result.deletedCount }));
  }

  async find(filter: DocumentFilter, options: FindOptions = {}): Promise<Result<StoredDocument[], BackendError>> {
    const collection = this.bind();
    if (collection.isErr()) {
      return err(collection.error);
    }

    let cursor = collection.value.find(filter).skip(options.skip ?? 0);
    if (options.limit) {
      cursor = cursor.limit(options.limit);
    }

    const found = await ResultAsync.fromPromise(
      cursor.toArray(),
      toConnectionError(`find on ${this.name} failed`),
    );
    return found.andThen(parseDocuments);
  }
}

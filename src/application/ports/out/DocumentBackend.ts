import type { Result } from "neverthrow";
import type { CollectionName } from "../../../domain/models/collections.ts";
import type { StoredDocument } from "../../../domain/models/document.ts";
import type { BackendError } from "../../../domain/models/errors.ts";
import type { UpdateOperations } from "../../../domain/models/update.ts";
import type { DocumentFilter } from "../../../domain/services/filterMatcher.ts";

export interface FindOptions {
  skip?: number;
  limit?: number;
}

export interface UpdateOutcome {
  matchedCount: number;
  modifiedCount: number;
}

export interface DeleteOutcome {
  deletedCount: number;
}

/**
 * The five document operations the cache store needs from one collection
 */
export interface DocumentCollection {
  findOne(filter: DocumentFilter): Promise<Result<StoredDocument | null, BackendError>>;

  insertOne(document: StoredDocument): Promise<Result<void, BackendError>>;

  updateOne(
    filter: DocumentFilter,
    operations: UpdateOperations,
  ): Promise<Result<UpdateOutcome, BackendError>>;

  deleteOne(filter: DocumentFilter): Promise<Result<DeleteOutcome, BackendError>>;

  find(filter: DocumentFilter, options?: FindOptions): Promise<Result<StoredDocument[], BackendError>>;
}

/**
 * Output port for the persistent document store
 * Any backend offering these operations can sit behind the cache
 */
export interface DocumentBackend {
  open(): Promise<Result<void, BackendError>>;

  close(): Promise<Result<void, BackendError>>;

  collection(name: CollectionName): DocumentCollection;
}

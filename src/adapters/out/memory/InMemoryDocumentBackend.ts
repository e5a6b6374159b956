import { err, ok, type Result } from "neverthrow";
import type {
  DeleteOutcome,
  DocumentBackend,
  DocumentCollection,
  FindOptions,
  UpdateOutcome,
} from "../../../application/ports/out/DocumentBackend.ts";
import { type CollectionName, COLLECTIONS } from "../../../domain/models/collections.ts";
import {
  cloneDocument,
  type DocumentId,
  documentsEqual,
  type StoredDocument,
} from "../../../domain/models/document.ts";
import { type BackendError, connectionError } from "../../../domain/models/errors.ts";
import type { UpdateOperations } from "../../../domain/models/update.ts";
import { type DocumentFilter, matchesFilter } from "../../../domain/services/filterMatcher.ts";
import { applyUpdate } from "../../../domain/services/updateOperators.ts";

export type BackendOperation = keyof DocumentCollection;

/**
 * Document backend kept in process memory. Stands in for MongoDB in tests
 * and in `STORE_BACKEND=memory` deployments; data survives close/open but not
 * the process.
 */
export class InMemoryDocumentBackend implements DocumentBackend {
  private readonly collections = new Map<CollectionName, Map<DocumentId, StoredDocument>>();
  private readonly failures = new Map<BackendOperation, string>();
  private opened = false;

  constructor() {
    for (const name of COLLECTIONS) {
      this.collections.set(name, new Map());
    }
  }

  open(): Promise<Result<void, BackendError>> {
    this.opened = true;
    return Promise.resolve(ok(undefined));
  }

  close(): Promise<Result<void, BackendError>> {
    this.opened = false;
    return Promise.resolve(ok(undefined));
  }

  isOpen(): boolean {
    return this.opened;
  }

  /**
   * Make the next call of `operation`, on any collection, fail with a
   * connection error
   */
  failNext(operation: BackendOperation, message = `Simulated ${operation} failure`): void {
    this.failures.set(operation, message);
  }

  collection(name: CollectionName): DocumentCollection {
    return new InMemoryCollection(this.documentsOf(name), (operation) => this.checkAvailable(operation));
  }

  private documentsOf(name: CollectionName): Map<DocumentId, StoredDocument> {
    const documents = this.collections.get(name);
    if (documents) {
      return documents;
    }
    const created = new Map<DocumentId, StoredDocument>();
    this.collections.set(name, created);
    return created;
  }

  private checkAvailable(operation: BackendOperation): Result<void, BackendError> {
    if (!this.opened) {
      return err(connectionError("In-memory backend is not open"));
    }
    const failure = this.failures.get(operation);
    if (failure !== undefined) {
      this.failures.delete(operation);
      return err(connectionError(failure));
    }
    return ok(undefined);
  }
}

class InMemoryCollection implements DocumentCollection {
  constructor(
    private readonly documents: Map<DocumentId, StoredDocument>,
    private readonly checkAvailable: (operation: BackendOperation) => Result<void, BackendError>,
  ) {}

  findOne(filter: DocumentFilter): Promise<Result<StoredDocument | null, BackendError>> {
    return Promise.resolve(
      this.checkAvailable("findOne")
        .andThen(() => this.firstMatch(filter))
        .map((document) => (document ? cloneDocument(document) : null)),
    );
  }

  insertOne(document: StoredDocument): Promise<Result<void, BackendError>> {
    return Promise.resolve(
      this.checkAvailable("insertOne").andThen(() => {
        if (this.documents.has(document._id)) {
          return err(connectionError(`E11000 duplicate key error: _id ${document._id}`));
        }
        this.documents.set(document._id, cloneDocument(document));
        return ok(undefined);
      }),
    );
  }

  updateOne(
    filter: DocumentFilter,
    operations: UpdateOperations,
  ): Promise<Result<UpdateOutcome, BackendError>> {
    return Promise.resolve(
      this.checkAvailable("updateOne")
        .andThen(() => this.firstMatch(filter))
        .andThen((document): Result<UpdateOutcome, BackendError> => {
          if (!document) {
            return ok({ matchedCount: 0, modifiedCount: 0 });
          }
          const draft = cloneDocument(document);
          return applyUpdate(draft, operations).map(() => {
            const modified = !documentsEqual(document, draft);
            this.documents.set(document._id, draft);
            return { matchedCount: 1, modifiedCount: modified ? 1 : 0 };
          });
        }),
    );
  }

  deleteOne(filter: DocumentFilter): Promise<Result<DeleteOutcome, BackendError>> {
    return Promise.resolve(
      this.checkAvailable("deleteOne")
        .andThen(() => this.firstMatch(filter))
        .map((document) => {
          if (!document) {
            return { deletedCount: 0 };
          }
          this.documents.delete(document._id);
          return { deletedCount: 1 };
        }),
    );
  }

  find(filter: DocumentFilter, options: FindOptions = {}): Promise<Result<StoredDocument[], BackendError>> {
    return Promise.resolve(
      this.checkAvailable("find")
        .andThen(() => this.allMatches(filter))
        .map((documents) => {
          const start = options.skip ?? 0;
          const end = options.limit === undefined ? undefined : start + options.limit;
          return documents.slice(start, end).map((document) => cloneDocument(document));
        }),
    );
  }

  private firstMatch(filter: DocumentFilter): Result<StoredDocument | null, BackendError> {
    return this.allMatches(filter).map((documents) => documents[0] ?? null);
  }

  private allMatches(filter: DocumentFilter): Result<StoredDocument[], BackendError> {
    const matches: StoredDocument[] = [];
    for (const document of this.documents.values()) {
      const matched = matchesFilter(document, filter);
      if (matched.isErr()) {
        return err(matched.error);
      }
      if (matched.value) {
        matches.push(document);
      }
    }
    return ok(matches);
  }
}

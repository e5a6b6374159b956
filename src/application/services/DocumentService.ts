import { err, type Result } from "neverthrow";
import { z } from "zod";
import { parseSettingsDocument, type SettingsDocument, type UserField } from "../../domain/models/collections.ts";
import {
  type DocumentId,
  type DocumentValue,
  parseDocumentId,
  type StoredDocument,
} from "../../domain/models/document.ts";
import { type StoreError, validationError } from "../../domain/models/errors.ts";
import type { UpdateOperations } from "../../domain/models/update.ts";
import type { DocumentFilter } from "../../domain/services/filterMatcher.ts";
import { formatZodIssues } from "../../utils/validation.ts";
import type { DocumentUseCase } from "../ports/in/DocumentUseCase.ts";
import type { FindOptions } from "../ports/out/DocumentBackend.ts";
import type {
  CacheStats,
  ComposeUpdate,
  DocumentCacheStore,
  SweepReport,
  UpdateOptions,
} from "./DocumentCacheStore.ts";

const findOptionsSchema = z.object({
  skip: z.number().int().nonnegative().optional(),
  limit: z.number().int().positive().optional(),
});

/**
 * Implementation of the DocumentUseCase port
 * Validates ids and query options, then delegates to the cache store
 */
export class DocumentService implements DocumentUseCase {
  constructor(private readonly store: DocumentCacheStore) {}

  async getSettings(guildId: DocumentId): Promise<Result<SettingsDocument, StoreError>> {
    const id = parseDocumentId(guildId);
    if (id.isErr()) {
      return err(id.error);
    }
    const settings = await this.store.get("settings", id.value);
    return settings.andThen(parseSettingsDocument);
  }

  async updateSettings(
    guildId: DocumentId,
    operations: UpdateOperations,
    options?: UpdateOptions,
  ): Promise<Result<boolean, StoreError>> {
    const id = parseDocumentId(guildId);
    if (id.isErr()) {
      return err(id.error);
    }
    return await this.store.update("settings", id.value, operations, options);
  }

  getUser(userId: DocumentId): Promise<Result<StoredDocument, StoreError>>;
  getUser(userId: DocumentId, type: UserField): Promise<Result<DocumentValue, StoreError>>;
  async getUser(userId: DocumentId, type?: UserField): Promise<Result<DocumentValue, StoreError>> {
    const id = parseDocumentId(userId);
    if (id.isErr()) {
      return err(id.error);
    }
    if (type) {
      return await this.store.getField("users", id.value, type);
    }
    return await this.store.get("users", id.value);
  }

  async updateUser(
    userId: DocumentId,
    operations: UpdateOperations,
    options?: UpdateOptions,
  ): Promise<Result<boolean, StoreError>> {
    const id = parseDocumentId(userId);
    if (id.isErr()) {
      return err(id.error);
    }
    return await this.store.update("users", id.value, operations, options);
  }

  async updateUserWith(
    userId: DocumentId,
    compose: ComposeUpdate,
    options?: UpdateOptions,
  ): Promise<Result<boolean, StoreError>> {
    const id = parseDocumentId(userId);
    if (id.isErr()) {
      return err(id.error);
    }
    return await this.store.withUpdate("users", id.value, compose, options);
  }

  async deleteUser(userId: DocumentId): Promise<Result<boolean, StoreError>> {
    const id = parseDocumentId(userId);
    if (id.isErr()) {
      return err(id.error);
    }
    return await this.store.delete("users", id.value);
  }

  async getUsersByCriteria(
    filter: DocumentFilter,
    options: FindOptions = {},
  ): Promise<Result<StoredDocument[], StoreError>> {
    const parsed = findOptionsSchema.safeParse(options);
    if (!parsed.success) {
      return err(validationError("Invalid query options", formatZodIssues(parsed.error)));
    }
    return await this.store.queryMany("users", filter, parsed.data);
  }

  async sweepCache(): Promise<Result<SweepReport, StoreError>> {
    return await this.store.evictExpired();
  }

  cacheStats(): CacheStats {
    return this.store.stats();
  }
}

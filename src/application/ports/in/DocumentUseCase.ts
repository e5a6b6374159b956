import type { Result } from "neverthrow";
import type { SettingsDocument, UserField } from "../../../domain/models/collections.ts";
import type { DocumentId, DocumentValue, StoredDocument } from "../../../domain/models/document.ts";
import type { StoreError } from "../../../domain/models/errors.ts";
import type { DocumentFilter } from "../../../domain/services/filterMatcher.ts";
import type { UpdateOperations } from "../../../domain/models/update.ts";
import type {
  CacheStats,
  ComposeUpdate,
  SweepReport,
  UpdateOptions,
} from "../../services/DocumentCacheStore.ts";
import type { FindOptions } from "../out/DocumentBackend.ts";

/**
 * Input port used by command handlers, the HTTP API and the CLI
 */
export interface DocumentUseCase {
  getSettings(guildId: DocumentId): Promise<Result<SettingsDocument, StoreError>>;

  updateSettings(
    guildId: DocumentId,
    operations: UpdateOperations,
    options?: UpdateOptions,
  ): Promise<Result<boolean, StoreError>>;

  getUser(userId: DocumentId): Promise<Result<StoredDocument, StoreError>>;
  getUser(userId: DocumentId, type: UserField): Promise<Result<DocumentValue, StoreError>>;

  updateUser(
    userId: DocumentId,
    operations: UpdateOperations,
    options?: UpdateOptions,
  ): Promise<Result<boolean, StoreError>>;

  updateUserWith(
    userId: DocumentId,
    compose: ComposeUpdate,
    options?: UpdateOptions,
  ): Promise<Result<boolean, StoreError>>;

  deleteUser(userId: DocumentId): Promise<Result<boolean, StoreError>>;

  getUsersByCriteria(
    filter: DocumentFilter,
    options?: FindOptions,
  ): Promise<Result<StoredDocument[], StoreError>>;

  sweepCache(): Promise<Result<SweepReport, StoreError>>;

  cacheStats(): CacheStats;
}

import type { Hono } from "hono";
import { err, ok, type Result } from "neverthrow";
import type { DocumentUseCase } from "../application/ports/in/DocumentUseCase.ts";
import { CacheMaintenance } from "../application/services/CacheMaintenance.ts";
import { DocumentCacheStore } from "../application/services/DocumentCacheStore.ts";
import { DocumentService } from "../application/services/DocumentService.ts";
import { DocumentController } from "../adapters/in/http/DocumentController.ts";
import type { StoreError } from "../domain/models/errors.ts";
import type { AdapterContainer } from "./adapters.ts";
import type { AppConfig } from "./env.ts";
import { info } from "./logger.ts";

export type DIError =
  | { type: "already_initialized"; message: string }
  | { type: "not_initialized"; message: string };

/**
 * Dependency Injection container for the application
 */
export class AppDI {
  private adapters?: AdapterContainer;
  private config?: AppConfig;
  private store?: DocumentCacheStore;
  private documentService?: DocumentService;
  private maintenance?: CacheMaintenance;
  private httpController?: DocumentController;

  private initialized = false;

  /**
   * Initialize the DI container with adapters
   */
  initialize(adapterContainer: AdapterContainer, config: AppConfig): Result<this, DIError> {
    if (this.initialized) {
      return err({
        type: "already_initialized",
        message: "AppDI already initialized",
      });
    }

    this.adapters = adapterContainer;
    this.config = config;
    this.initialized = true;

    return ok(this);
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  private ready(): Result<{ adapters: AdapterContainer; config: AppConfig }, DIError> {
    if (!this.initialized || !this.adapters || !this.config) {
      return err({
        type: "not_initialized",
        message: "DI container not initialized. Call initialize() first.",
      });
    }
    return ok({ adapters: this.adapters, config: this.config });
  }

  getDocumentStore(): Result<DocumentCacheStore, DIError> {
    const readyResult = this.ready();
    if (readyResult.isErr()) {
      return err(readyResult.error);
    }

    if (!this.store) {
      const { adapters, config } = readyResult.value;
      this.store = new DocumentCacheStore(adapters.backend, {
        ttlMs: config.cache.ttlMs,
        maxSize: config.cache.maxSize,
      });
    }

    return ok(this.store);
  }

  getDocumentService(): Result<DocumentUseCase, DIError> {
    const storeResult = this.getDocumentStore();
    if (storeResult.isErr()) {
      return err(storeResult.error);
    }

    if (!this.documentService) {
      this.documentService = new DocumentService(storeResult.value);
    }

    return ok(this.documentService);
  }

  getMaintenance(): Result<CacheMaintenance, DIError> {
    const readyResult = this.ready();
    const storeResult = this.getDocumentStore();
    if (readyResult.isErr()) {
      return err(readyResult.error);
    }
    if (storeResult.isErr()) {
      return err(storeResult.error);
    }

    if (!this.maintenance) {
      this.maintenance = new CacheMaintenance(storeResult.value, readyResult.value.config.cache.sweepIntervalMs);
    }

    return ok(this.maintenance);
  }

  getHttpController(): Result<DocumentController, DIError> {
    const serviceResult = this.getDocumentService();
    if (serviceResult.isErr()) {
      return err(serviceResult.error);
    }

    if (!this.httpController) {
      this.httpController = new DocumentController(serviceResult.value);
    }
    return ok(this.httpController);
  }

  getHttpRouter(): Result<Hono, DIError> {
    const controllerResult = this.getHttpController();
    if (controllerResult.isErr()) {
      return err(controllerResult.error);
    }

    return ok(controllerResult.value.createRouter());
  }

  /**
   * Open the document store against its backend
   */
  async open(): Promise<Result<void, DIError | StoreError>> {
    const storeResult = this.getDocumentStore();
    if (storeResult.isErr()) {
      return err(storeResult.error);
    }
    return await storeResult.value.open();
  }

  /**
   * Stop the sweep timer and close the store
   */
  async shutdown(): Promise<Result<void, StoreError>> {
    this.maintenance?.stop();
    if (!this.store) {
      return ok(undefined);
    }
    const closed = await this.store.close();
    if (closed.isOk()) {
      info("Application shut down");
    }
    return closed;
  }
}

// Singleton instance of the DI container
export const appDI = new AppDI();

import type { DocumentBackend } from "../application/ports/out/DocumentBackend.ts";
import { InMemoryDocumentBackend } from "../adapters/out/memory/InMemoryDocumentBackend.ts";
import { MongoDocumentBackend } from "../adapters/out/mongo/MongoDocumentBackend.ts";
import type { AppConfig } from "./env.ts";
import { info } from "./logger.ts";
import { err, ok, type Result } from "neverthrow";

/**
 * Type definition representing the adapter container.
 */
export interface AdapterContainer {
  backend: DocumentBackend;
}

export type AdapterInitError = {
  type: "no_backend";
  message: string;
};

/**
 * Creates the document backend selected by the configuration.
 * @param config Application configuration.
 * @returns Result with initialized adapter container or error.
 */
export function initializeAdapters(config: AppConfig): Result<AdapterContainer, AdapterInitError> {
  if (config.backend === "memory") {
    info("Using in-memory document backend; data is lost on exit");
    return ok({ backend: new InMemoryDocumentBackend() });
  }

  if (!config.mongo.uri || !config.mongo.dbName) {
    return err({
      type: "no_backend",
      message: "MongoDB backend needs both a URI and a database name",
    });
  }

  info(`Using MongoDB document backend (database: ${config.mongo.dbName})`);
  return ok({
    backend: new MongoDocumentBackend({
      uri: config.mongo.uri,
      dbName: config.mongo.dbName,
    }),
  });
}

import { type Context, Hono } from "hono";
import { ResultAsync } from "neverthrow";
import { z } from "zod";
import type { DocumentUseCase } from "../../../application/ports/in/DocumentUseCase.ts";
import { isUserField } from "../../../domain/models/collections.ts";
import {
  documentDataSchema,
  type DocumentId,
  parseDocumentId,
  type ReadonlyValue,
  toJsonValue,
} from "../../../domain/models/document.ts";
import { getErrorStatusCode, type StoreError, storeErrorToDomainError } from "../../../domain/models/errors.ts";
import { parseUpdateOperations, type UpdateOperations } from "../../../domain/models/update.ts";
import { formatZodIssues } from "../../../utils/validation.ts";
import { error } from "../../../config/logger.ts";
import {
  ApiError,
  createErrorResponse,
  createSuccessResponse,
  domainErrorToApiError,
  domainErrorToResponse,
} from "./errors.ts";

const searchRequestSchema = z.object({
  filter: documentDataSchema.default({}),
  limit: z.number().int().positive().optional(),
  skip: z.number().int().nonnegative().optional(),
});

// Ids are 64-bit, so documents leave the API with them as decimal strings.
function documentResponse(c: Context, value: ReadonlyValue): Response {
  return c.json(createSuccessResponse(toJsonValue(value)));
}

/**
 * Controller for the document HTTP API
 */
export class DocumentController {
  constructor(private readonly documents: DocumentUseCase) {}

  createRouter(): Hono {
    const router = new Hono();

    router.get("/settings/:guildId", (c) => this.handleGetSettings(c));
    router.patch("/settings/:guildId", (c) => this.handleUpdateSettings(c));
    router.post("/users/search", (c) => this.handleSearchUsers(c));
    router.get("/users/:userId", (c) => this.handleGetUser(c));
    router.patch("/users/:userId", (c) => this.handleUpdateUser(c));
    router.delete("/users/:userId", (c) => this.handleDeleteUser(c));
    router.post("/maintenance/sweep", (c) => this.handleSweep(c));
    router.get("/maintenance/stats", (c) => c.json(createSuccessResponse(this.documents.cacheStats())));

    router.onError((cause, c) => {
      if (cause instanceof ApiError) {
        return c.json(createErrorResponse(cause.message, cause.details), { status: cause.status });
      }
      error(`Unhandled error in document API: ${cause.message}`);
      return c.json(createErrorResponse("Internal Server Error", { type: "server" }), { status: 500 });
    });

    return router;
  }

  private async handleGetSettings(c: Context): Promise<Response> {
    const guildId = this.requireId(c.req.param("guildId"));
    const result = await this.documents.getSettings(guildId);
    return result.match(
      (settings) => documentResponse(c, settings),
      (storeError) => this.handleStoreError(c, storeError),
    );
  }

  private async handleUpdateSettings(c: Context): Promise<Response> {
    const guildId = this.requireId(c.req.param("guildId"));
    const operations = await this.readOperations(c);
    const result = await this.documents.updateSettings(guildId, operations, {
      upsert: c.req.query("upsert") === "true",
    });
    return result.match(
      (modified) => c.json(createSuccessResponse({ modified })),
      (storeError) => this.handleStoreError(c, storeError),
    );
  }

  private async handleGetUser(c: Context): Promise<Response> {
    const userId = this.requireId(c.req.param("userId"));
    const type = c.req.query("type");
    if (type === undefined) {
      const result = await this.documents.getUser(userId);
      return result.match(
        (user) => documentResponse(c, user),
        (storeError) => this.handleStoreError(c, storeError),
      );
    }

    if (!isUserField(type)) {
      throw new ApiError(`Unknown user data type: ${type}`, 400, { type: "validation" });
    }
    const result = await this.documents.getUser(userId, type);
    return result.match(
      (value) => documentResponse(c, value),
      (storeError) => this.handleStoreError(c, storeError),
    );
  }

  private async handleUpdateUser(c: Context): Promise<Response> {
    const userId = this.requireId(c.req.param("userId"));
    const operations = await this.readOperations(c);
    const result = await this.documents.updateUser(userId, operations, {
      upsert: c.req.query("upsert") === "true",
    });
    return result.match(
      (modified) => c.json(createSuccessResponse({ modified })),
      (storeError) => this.handleStoreError(c, storeError),
    );
  }

  private async handleDeleteUser(c: Context): Promise<Response> {
    const userId = this.requireId(c.req.param("userId"));
    const result = await this.documents.deleteUser(userId);
    return result.match(
      (deleted) =>
        deleted
          ? c.json(createSuccessResponse({ deleted }))
          : c.json(createErrorResponse(`User ${userId} not found`, { type: "not_found" }), { status: 404 }),
      (storeError) => this.handleStoreError(c, storeError),
    );
  }

  private async handleSearchUsers(c: Context): Promise<Response> {
    const body = await this.readJson(c);
    const parsed = searchRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new ApiError("Invalid search request", 400, {
        type: "validation",
        issues: formatZodIssues(parsed.error),
      });
    }

    const { filter, limit, skip } = parsed.data;
    const result = await this.documents.getUsersByCriteria(filter, { limit, skip });
    return result.match(
      (users) => documentResponse(c, users),
      (storeError) => this.handleStoreError(c, storeError),
    );
  }

  private async handleSweep(c: Context): Promise<Response> {
    const result = await this.documents.sweepCache();
    return result.match(
      (report) => c.json(createSuccessResponse(report)),
      (storeError) => this.handleStoreError(c, storeError),
    );
  }

  private requireId(raw: string | undefined): DocumentId {
    const id = parseDocumentId(raw ?? "");
    if (id.isErr()) {
      throw domainErrorToApiError(storeErrorToDomainError(id.error));
    }
    return id.value;
  }

  private async readJson(c: Context): Promise<unknown> {
    const body = await ResultAsync.fromPromise(
      c.req.json<unknown>(),
      () => new ApiError("Request body must be valid JSON", 400, { type: "parse" }),
    );
    if (body.isErr()) {
      throw body.error;
    }
    return body.value;
  }

  private async readOperations(c: Context): Promise<UpdateOperations> {
    const operations = parseUpdateOperations(await this.readJson(c));
    if (operations.isErr()) {
      throw domainErrorToApiError(storeErrorToDomainError(operations.error));
    }
    return operations.value;
  }

  private handleStoreError(c: Context, storeError: StoreError): Response {
    const domainError = storeErrorToDomainError(storeError);
    const status = getErrorStatusCode(domainError);
    if (status >= 500) {
      error(`Document request failed: ${storeError.message}`);
    }
    return c.json(domainErrorToResponse(domainError), { status });
  }
}

export function createDocumentRouter(documents: DocumentUseCase): Hono {
  return new DocumentController(documents).createRouter();
}


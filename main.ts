import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { logger } from "hono/logger";
import { secureHeaders } from "hono/secure-headers";
import { loadConfig } from "./src/config/env.ts";
import { initializeAdapters } from "./src/config/adapters.ts";
import { appDI } from "./src/config/AppDI.ts";
import { ApiError, createErrorResponse } from "./src/adapters/in/http/errors.ts";
import { error, info } from "./src/config/logger.ts";

/**
 * Main entry point for the HTTP server
 */
async function main() {
  const config = loadConfig().match(
    (loaded) => loaded,
    (configError) => {
      error(`${configError.message}: ${configError.issues.join("; ")}`);
      process.exit(1);
    },
  );

  const adapterResult = initializeAdapters(config);
  if (adapterResult.isErr()) {
    error(`Failed to initialize adapters: ${adapterResult.error.message}`);
    process.exit(1);
  }

  appDI.initialize(adapterResult.value, config).match(
    (di) => di,
    (diError) => {
      error(`Failed to initialize DI container: ${diError.message}`);
      process.exit(1);
    },
  );

  const opened = await appDI.open();
  if (opened.isErr()) {
    error(opened.error.message);
    process.exit(1);
  }

  const router = appDI.getHttpRouter().match(
    (created) => created,
    (diError) => {
      error(`Failed to get HTTP router: ${diError.message}`);
      process.exit(1);
    },
  );

  const app = new Hono();
  app.use(logger());
  app.use(secureHeaders());

  app.get("/", (c) => {
    return c.json({
      name: "guild-docstore",
      status: "running",
      version: "0.1.0",
    });
  });

  app.route("/api", router);

  app.notFound((c) => {
    return c.json(createErrorResponse("Not Found"), { status: 404 });
  });

  app.onError((cause, c) => {
    error(`Error: ${cause}`);

    if (cause instanceof ApiError) {
      return c.json(
        createErrorResponse(cause.message, cause.details),
        { status: cause.status },
      );
    }

    return c.json(
      createErrorResponse(cause.message || "Internal Server Error"),
      { status: 500 },
    );
  });

  appDI.getMaintenance().match(
    (maintenance) => maintenance.start(),
    (diError) => error(`Cache maintenance disabled: ${diError.message}`),
  );

  const server = serve({ fetch: app.fetch, port: config.port }, (address) => {
    info(`Server running on http://localhost:${address.port}`);
  });

  const shutdown = (signal: string) => {
    info(`Received ${signal}, shutting down`);
    server.close();
    appDI.shutdown()
      .then((closed) => {
        if (closed.isErr()) {
          error(closed.error.message);
          process.exit(1);
        }
        process.exit(0);
      })
      .catch((cause: unknown) => {
        error(`Shutdown failed: ${String(cause)}`);
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((cause: unknown) => {
  error(`Fatal error: ${String(cause)}`);
  process.exit(1);
});

#!/usr/bin/env -S npx tsx

/**
 * Command line access to the document store
 *
 * Usage:
 *   cli.ts get-settings <guildId>
 *   cli.ts get-user <userId> [playlist|history|inbox]
 *   cli.ts delete-user <userId>
 *   cli.ts sweep
 */

import { err, errAsync, fromThrowable, ok, type Result, ResultAsync } from "neverthrow";
import { initializeAdapters } from "./src/config/adapters.ts";
import { AppDI, type DIError } from "./src/config/AppDI.ts";
import { loadConfig } from "./src/config/env.ts";
import { isUserField } from "./src/domain/models/collections.ts";
import { bigintReplacer, type DocumentId, parseDocumentId } from "./src/domain/models/document.ts";
import type { StoreError } from "./src/domain/models/errors.ts";
import type { DocumentUseCase } from "./src/application/ports/in/DocumentUseCase.ts";

const logToStderr = (message: string) => {
  process.stderr.write(message + "\n");
};

type CliError =
  | { type: "usage"; message: string }
  | { type: "setup"; message: string }
  | { type: "store"; error: StoreError }
  | { type: "di"; error: DIError };

const USAGE = "Usage: cli.ts <get-settings <guildId> | get-user <userId> [type] | delete-user <userId> | sweep>";

/**
 * Setup the dependency injection container
 */
function setupDependencyInjection(): Result<AppDI, CliError> {
  const configResult = loadConfig();
  if (configResult.isErr()) {
    return err({
      type: "setup",
      message: `${configResult.error.message}: ${configResult.error.issues.join("; ")}`,
    });
  }

  const initAdaptersResult = initializeAdapters(configResult.value);
  if (initAdaptersResult.isErr()) {
    return err({
      type: "setup",
      message: `Failed to initialize adapters: ${initAdaptersResult.error.message}`,
    });
  }

  const diResult = new AppDI().initialize(initAdaptersResult.value, configResult.value);
  if (diResult.isErr()) {
    return err({ type: "di", error: diResult.error });
  }
  return ok(diResult.value);
}

function parseId(raw: string | undefined): Result<DocumentId, CliError> {
  if (!raw || !/^\d+$/.test(raw)) {
    return err({ type: "usage", message: `Expected a numeric id, got '${raw ?? ""}'` });
  }
  return parseDocumentId(raw).mapErr((error): CliError => ({ type: "store", error }));
}

function fromStore<T>(promise: Promise<Result<T, StoreError>>): ResultAsync<T, CliError> {
  return ResultAsync.fromPromise(
    promise,
    (cause): CliError => ({ type: "setup", message: `Unexpected failure: ${String(cause)}` }),
  ).andThen((result) => result.mapErr((error): CliError => ({ type: "store", error })));
}

/**
 * Run one command against an opened document service
 */
function runCommand(documents: DocumentUseCase, args: string[]): ResultAsync<unknown, CliError> {
  const [command, first, second] = args;
  switch (command) {
    case "get-settings":
      return parseId(first).asyncAndThen((guildId) => fromStore(documents.getSettings(guildId)));
    case "get-user":
      return parseId(first).asyncAndThen((userId): ResultAsync<unknown, CliError> => {
        if (second === undefined) {
          return fromStore<unknown>(documents.getUser(userId));
        }
        if (!isUserField(second)) {
          return errAsync<unknown, CliError>({ type: "usage", message: `Unknown user data type: ${second}` });
        }
        return fromStore<unknown>(documents.getUser(userId, second));
      });
    case "delete-user":
      return parseId(first).asyncAndThen((userId) =>
        fromStore(documents.deleteUser(userId)).map((deleted) => ({ deleted }))
      );
    case "sweep":
      return fromStore(documents.sweepCache());
    default:
      return errAsync<unknown, CliError>({ type: "usage", message: USAGE });
  }
}

function openError(error: DIError | StoreError): CliError {
  return error.type === "already_initialized" || error.type === "not_initialized"
    ? { type: "di", error }
    : { type: "store", error };
}

function getErrorMessage(error: CliError): string {
  switch (error.type) {
    case "usage":
    case "setup":
      return error.message;
    case "store":
      return `${error.error.type}: ${error.error.message}`;
    case "di":
      return `DI error: ${error.error.type} - ${error.error.message}`;
  }
}

const stringify = fromThrowable(
  (value: unknown) => JSON.stringify(value, bigintReplacer, 2),
  (cause): CliError => ({ type: "setup", message: `Cannot print result: ${String(cause)}` }),
);

async function main(args: string[]): Promise<Result<string, CliError>> {
  const diResult = setupDependencyInjection();
  if (diResult.isErr()) {
    return err(diResult.error);
  }

  const di = diResult.value;
  const opened = await di.open();
  if (opened.isErr()) {
    return err(openError(opened.error));
  }

  const documents = di.getDocumentService();
  if (documents.isErr()) {
    return err({ type: "di", error: documents.error });
  }

  const output = await runCommand(documents.value, args).andThen((value) => stringify(value));
  const closed = await di.shutdown();
  if (closed.isErr()) {
    logToStderr(`Failed to close store: ${closed.error.message}`);
  }
  return output;
}

main(process.argv.slice(2))
  .then((result) => {
    result.match(
      (output) => {
        process.stdout.write(output + "\n");
      },
      (error) => {
        logToStderr(`Error: ${getErrorMessage(error)}`);
        process.exitCode = 1;
      },
    );
  })
  .catch((cause: unknown) => {
    logToStderr(`Fatal error: ${String(cause)}`);
    process.exitCode = 1;
  });

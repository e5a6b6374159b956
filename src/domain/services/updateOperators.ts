import { err, ok, type Result } from "neverthrow";
import {
  cloneDocument,
  type DocumentData,
  type DocumentValue,
  isDocumentData,
  valuesEqual,
} from "../models/document.ts";
import { type ValidationError, validationError } from "../models/errors.ts";
import {
  isUpdateOperator,
  readPullOperand,
  readPushOperand,
  type UpdateOperations,
} from "../models/update.ts";

interface FieldLocation {
  parent: DocumentData;
  field: string;
}

/**
 * Find the map holding the last segment of a dotted path. With `create`,
 * missing intermediate maps are added; without it a missing intermediate
 * yields `undefined`.
 */
function locateField(
  target: DocumentData,
  path: string,
  create: boolean,
): Result<FieldLocation | undefined, ValidationError> {
  const segments = path.split(".");
  const field = segments[segments.length - 1];
  let parent = target;

  for (const segment of segments.slice(0, -1)) {
    const next = parent[segment];
    if (next === undefined) {
      if (!create) {
        return ok(undefined);
      }
      const created: DocumentData = {};
      parent[segment] = created;
      parent = created;
    } else if (isDocumentData(next)) {
      parent = next;
    } else {
      return err(validationError(`Cannot traverse non-object field '${segment}' in path '${path}'`));
    }
  }

  return ok({ parent, field });
}

/**
 * MongoDB `$slice`: positive keeps the first n items, negative the last n
 */
export function sliceItems(items: DocumentValue[], slice: number): DocumentValue[] {
  if (slice === 0) {
    return [];
  }
  return slice > 0 ? items.slice(0, slice) : items.slice(slice);
}

function applySet(target: DocumentData, path: string, value: DocumentValue): Result<void, ValidationError> {
  return locateField(target, path, true).map((location) => {
    if (location) {
      location.parent[location.field] = cloneDocument(value);
    }
  });
}

function applyUnset(target: DocumentData, path: string): Result<void, ValidationError> {
  return locateField(target, path, false).map((location) => {
    if (location) {
      delete location.parent[location.field];
    }
  });
}

/**
 * Sum of two numeric values. Integers stay 64-bit when either side is; a
 * fractional amount cannot be added to a 64-bit field.
 */
function addNumeric(current: number | bigint, delta: number | bigint): Result<number | bigint, ValidationError> {
  if (typeof current === "number" && typeof delta === "number") {
    return ok(current + delta);
  }
  if (typeof current === "number" && !Number.isInteger(current)) {
    return err(validationError("Cannot add a 64-bit integer to a fractional value"));
  }
  if (typeof delta === "number" && !Number.isInteger(delta)) {
    return err(validationError("Cannot add a fractional amount to a 64-bit integer"));
  }
  return ok(BigInt(current) + BigInt(delta));
}

function applyInc(target: DocumentData, path: string, delta: number | bigint): Result<void, ValidationError> {
  return locateField(target, path, true).andThen((location) => {
    if (!location) {
      return ok(undefined);
    }
    // Only a missing field counts as zero; null is a non-numeric value.
    const existing = location.parent[location.field];
    const current = existing === undefined ? 0 : existing;
    if (typeof current !== "number" && typeof current !== "bigint") {
      return err(validationError(`Cannot increment non-numeric field: ${path}`));
    }
    return addNumeric(current, delta).map((sum) => {
      location.parent[location.field] = sum;
    });
  });
}

function applyPush(target: DocumentData, path: string, operand: DocumentValue): Result<void, ValidationError> {
  return readPushOperand(path, operand).andThen((modifier) =>
    locateField(target, path, true).andThen((location) => {
      if (!location) {
        return ok(undefined);
      }
      const existing = location.parent[location.field];
      const current = existing === undefined ? [] : existing;
      if (!Array.isArray(current)) {
        return err(validationError(`Cannot push to non-array field: ${path}`));
      }
      const extended = [...current, ...modifier.$each.map((item) => cloneDocument(item))];
      location.parent[location.field] = modifier.$slice === undefined
        ? extended
        : sliceItems(extended, modifier.$slice);
      return ok(undefined);
    })
  );
}

function applyPull(target: DocumentData, path: string, operand: DocumentValue): Result<void, ValidationError> {
  return readPullOperand(path, operand).andThen((candidates) =>
    locateField(target, path, false).andThen((location) => {
      if (!location || location.parent[location.field] === undefined) {
        return ok(undefined);
      }
      const current = location.parent[location.field];
      if (!Array.isArray(current)) {
        return err(validationError(`Cannot pull from non-array field: ${path}`));
      }
      location.parent[location.field] = current.filter(
        (item) => !candidates.some((candidate) => valuesEqual(item, candidate)),
      );
      return ok(undefined);
    })
  );
}

/**
 * Apply update operations to `target` in place, operator by operator and
 * path by path, stopping at the first invalid edit. Edits made before the
 * failing one stay applied, so callers pass a draft copy.
 */
export function applyUpdate(
  target: DocumentData,
  operations: UpdateOperations,
): Result<DocumentData, ValidationError> {
  for (const [operator, edits] of Object.entries(operations)) {
    if (!isUpdateOperator(operator)) {
      return err(validationError(`Unsupported update operator: ${operator}`));
    }
    if (edits === undefined) {
      continue;
    }

    for (const [path, operand] of Object.entries(edits)) {
      const applied = applyEdit(target, operator, path, operand);
      if (applied.isErr()) {
        return err(validationError(`Error updating ${path}: ${applied.error.message}`, applied.error.issues));
      }
    }
  }

  return ok(target);
}

function applyEdit(
  target: DocumentData,
  operator: string,
  path: string,
  operand: DocumentValue,
): Result<void, ValidationError> {
  switch (operator) {
    case "$set":
      return applySet(target, path, operand);
    case "$unset":
      return applyUnset(target, path);
    case "$inc":
      if (typeof operand !== "number" && typeof operand !== "bigint") {
        return err(validationError(`$inc amount for ${path} must be a number`));
      }
      return applyInc(target, path, operand);
    case "$push":
      return applyPush(target, path, operand);
    case "$pull":
      return applyPull(target, path, operand);
    default:
      return err(validationError(`Unsupported update operator: ${operator}`));
  }
}

import { err, ok, type Result } from "neverthrow";
import {
  type DocumentData,
  type DocumentValue,
  isDocumentData,
  isNumeric,
  valuesEqual,
} from "../models/document.ts";
import { type ValidationError, validationError } from "../models/errors.ts";

/**
 * Query filters use the MongoDB document syntax
 */
export type DocumentFilter = DocumentData;

type Comparison = "$gt" | "$gte" | "$lt" | "$lte";

function readPath(document: DocumentData, path: string): DocumentValue | undefined {
  let current: DocumentValue | undefined = document;
  for (const segment of path.split(".")) {
    if (!isDocumentData(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function isOperatorObject(condition: DocumentValue): condition is DocumentData {
  if (!isDocumentData(condition)) {
    return false;
  }
  const keys = Object.keys(condition);
  return keys.length > 0 && keys.every((key) => key.startsWith("$"));
}

/**
 * Equality as MongoDB applies it: an array field matches when it equals the
 * value or contains it, numbers match 64-bit integers of the same value, and
 * `null` also matches a missing field
 */
function matchesValue(value: DocumentValue | undefined, expected: DocumentValue): boolean {
  if (expected === null && value === undefined) {
    return true;
  }
  if (valuesEqual(value, expected)) {
    return true;
  }
  return Array.isArray(value) && value.some((item) => valuesEqual(item, expected));
}

function ordering(value: DocumentValue | undefined, operand: DocumentValue): number | undefined {
  if (isNumeric(value) && isNumeric(operand)) {
    return value < operand ? -1 : value > operand ? 1 : 0;
  }
  if (typeof value === "string" && typeof operand === "string") {
    return value < operand ? -1 : value > operand ? 1 : 0;
  }
  return undefined;
}

function compare(value: DocumentValue | undefined, operand: DocumentValue, comparison: Comparison): boolean {
  const order = ordering(value, operand);
  if (order === undefined) {
    return false;
  }

  switch (comparison) {
    case "$gt":
      return order > 0;
    case "$gte":
      return order >= 0;
    case "$lt":
      return order < 0;
    case "$lte":
      return order <= 0;
  }
}

function listOperand(operator: string, operand: DocumentValue): Result<DocumentValue[], ValidationError> {
  return Array.isArray(operand) ? ok(operand) : err(validationError(`${operator} requires an array`));
}

function matchesOperators(
  value: DocumentValue | undefined,
  operators: DocumentData,
): Result<boolean, ValidationError> {
  for (const [operator, operand] of Object.entries(operators)) {
    let matched: Result<boolean, ValidationError>;
    switch (operator) {
      case "$eq":
        matched = ok(matchesValue(value, operand));
        break;
      case "$ne":
        matched = ok(!matchesValue(value, operand));
        break;
      case "$in":
        matched = listOperand(operator, operand).map((options) =>
          options.some((option) => matchesValue(value, option))
        );
        break;
      case "$nin":
        matched = listOperand(operator, operand).map((options) =>
          !options.some((option) => matchesValue(value, option))
        );
        break;
      case "$exists":
        matched = ok((value !== undefined) === Boolean(operand));
        break;
      case "$gt":
      case "$gte":
      case "$lt":
      case "$lte":
        matched = ok(compare(value, operand, operator));
        break;
      default:
        return err(validationError(`Unsupported filter operator: ${operator}`));
    }

    if (matched.isErr() || !matched.value) {
      return matched;
    }
  }
  return ok(true);
}

function matchesEach(
  document: DocumentData,
  operator: "$and" | "$or",
  operand: DocumentValue,
): Result<boolean, ValidationError> {
  if (!Array.isArray(operand) || !operand.every(isDocumentData)) {
    return err(validationError(`${operator} requires an array of filters`));
  }

  for (const clause of operand) {
    const matched = matchesFilter(document, clause);
    if (matched.isErr()) {
      return matched;
    }
    if (operator === "$or" && matched.value) {
      return ok(true);
    }
    if (operator === "$and" && !matched.value) {
      return ok(false);
    }
  }
  return ok(operator === "$and");
}

/**
 * Evaluate a filter against a document. Supports field equality on dotted
 * paths, `$eq`, `$ne`, `$in`, `$nin`, `$exists`, `$gt`, `$gte`, `$lt`,
 * `$lte` and top-level `$and` / `$or`.
 */
export function matchesFilter(
  document: DocumentData,
  filter: DocumentFilter,
): Result<boolean, ValidationError> {
  for (const [key, condition] of Object.entries(filter)) {
    let matched: Result<boolean, ValidationError>;
    if (key === "$and" || key === "$or") {
      matched = matchesEach(document, key, condition);
    } else if (key.startsWith("$")) {
      return err(validationError(`Unsupported filter operator: ${key}`));
    } else {
      const value = readPath(document, key);
      matched = isOperatorObject(condition)
        ? matchesOperators(value, condition)
        : ok(matchesValue(value, condition));
    }

    if (matched.isErr() || !matched.value) {
      return matched;
    }
  }
  return ok(true);
}

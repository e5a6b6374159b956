import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { formatZodIssues } from "../../utils/validation.ts";
import { type DocumentValue, documentValueSchema, isDocumentData } from "./document.ts";
import { type ValidationError, validationError } from "./errors.ts";

export const UPDATE_OPERATORS = ["$set", "$unset", "$inc", "$push", "$pull"] as const;
export type UpdateOperator = typeof UPDATE_OPERATORS[number];

/**
 * Partial update of a single document, keyed by operator then by dotted
 * field path. A `$push` operand may be `{ $each: [...], $slice?: n }` and a
 * `$pull` operand may be `{ $in: [...] }`.
 */
export type UpdateOperations = {
  $set?: Record<string, DocumentValue>;
  $unset?: Record<string, DocumentValue>;
  $inc?: Record<string, number | bigint>;
  $push?: Record<string, DocumentValue>;
  $pull?: Record<string, DocumentValue>;
};

/**
 * Normalized `$push` operand
 */
export interface PushModifier {
  $each: DocumentValue[];
  $slice?: number;
}

export function isUpdateOperator(value: string): value is UpdateOperator {
  return UPDATE_OPERATORS.some((operator) => operator === value);
}

const fieldPathSchema = z
  .string()
  .min(1, "Field path must not be empty")
  .refine(
    (path) => path.split(".").every((segment) => segment.length > 0 && !segment.startsWith("$")),
    { message: "Field path segments must be non-empty and must not start with '$'" },
  )
  .refine((path) => path !== "_id" && !path.startsWith("_id."), {
    message: "The _id field cannot be updated",
  });

export const updateOperationsSchema = z
  .object({
    $set: z.record(fieldPathSchema, documentValueSchema).optional(),
    $unset: z.record(fieldPathSchema, documentValueSchema).optional(),
    $inc: z.record(fieldPathSchema, z.union([z.number(), z.bigint()])).optional(),
    $push: z.record(fieldPathSchema, documentValueSchema).optional(),
    $pull: z.record(fieldPathSchema, documentValueSchema).optional(),
  })
  .strict()
  .refine((operations) => Object.keys(operations).length > 0, {
    message: "At least one update operator is required",
  });

const pushModifierSchema = z
  .object({
    $each: z.array(documentValueSchema),
    $slice: z.number().int().optional(),
  })
  .strict();

const pullConditionSchema = z.object({ $in: z.array(documentValueSchema) }).strict();

/**
 * Validate update operations coming from an untyped caller. Unsupported
 * operators are reported before anything else is looked at.
 */
export function parseUpdateOperations(input: unknown): Result<UpdateOperations, ValidationError> {
  if (!isDocumentData(input)) {
    return err(validationError("Update operations must be an object"));
  }

  const unsupported = Object.keys(input).filter((key) => !isUpdateOperator(key));
  if (unsupported.length > 0) {
    return err(
      validationError(
        `Unsupported update operator: ${unsupported.join(", ")}`,
        unsupported.map((operator) => `${operator} is not one of ${UPDATE_OPERATORS.join(", ")}`),
      ),
    );
  }

  const parsed = updateOperationsSchema.safeParse(input);
  if (!parsed.success) {
    return err(validationError("Invalid update operations", formatZodIssues(parsed.error)));
  }
  return ok(parsed.data);
}

/**
 * Interpret a `$push` operand: a `{ $each }` object is a modifier, anything
 * else is a single item
 */
export function readPushOperand(
  path: string,
  operand: DocumentValue,
): Result<PushModifier, ValidationError> {
  if (!isDocumentData(operand) || !("$each" in operand)) {
    return ok({ $each: [operand] });
  }

  const parsed = pushModifierSchema.safeParse(operand);
  if (!parsed.success) {
    return err(
      validationError(`Invalid $push modifier for ${path}`, formatZodIssues(parsed.error)),
    );
  }
  return ok(parsed.data);
}

/**
 * Interpret a `$pull` operand as the list of values to remove
 */
export function readPullOperand(
  path: string,
  operand: DocumentValue,
): Result<DocumentValue[], ValidationError> {
  if (!isDocumentData(operand) || !("$in" in operand)) {
    return ok([operand]);
  }

  const parsed = pullConditionSchema.safeParse(operand);
  if (!parsed.success) {
    return err(
      validationError(`Invalid $pull condition for ${path}`, formatZodIssues(parsed.error)),
    );
  }
  return ok(parsed.data.$in);
}

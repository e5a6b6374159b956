import type { ZodError } from "zod";

/**
 * Flatten zod issues into "path: message" strings
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Contextual Validation Utilities
 *
 * Wraps Zod parsing so failures surface as ValidationError with a
 * flattened issue list.
 */

import { type ZodError, type ZodType } from "zod";

import { ValidationError, type ValidationIssue } from "./index";

function zodIssuesToValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validates input against a schema, naming the subject in error messages.
 *
 * @throws ValidationError if validation fails
 */
export function validateWithSchema<T>(
  schema: ZodType<T>,
  input: unknown,
  subject: string,
): T {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = zodIssuesToValidationIssues(result.error);
  const summary = issues
    .map((issue) => `${issue.path || "(root)"}: ${issue.message}`)
    .join("; ");

  throw new ValidationError(
    `Invalid ${subject}: ${summary}`,
    { subject, issues },
    { cause: result.error },
  );
}

/**
 * SliceQL Error Hierarchy
 *
 * All errors extend SliceQLError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   assembler.compile();
 * } catch (error) {
 *   if (isSliceQLError(error) && isUserRecoverable(error)) {
 *     console.error(error.toUserMessage());
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by incorrect usage. Recoverable by fixing the fragments or options.
 * - `system`: Internal error. May require investigation. Reserved: no
 *   built-in error uses it yet, but callers and extensions may.
 */
export type ErrorCategory = "user" | "system";

/**
 * Options for SliceQLError constructor.
 */
export type SliceQLErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all SliceQL errors.
 */
export class SliceQLError extends Error {
  /** Machine-readable error code (e.g., "MISSING_TIME_GRAIN") */
  readonly code: string;

  readonly category: ErrorCategory;

  readonly details: Readonly<Record<string, unknown>>;

  readonly suggestion?: string;

  constructor(message: string, code: string, options: SliceQLErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "SliceQLError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    if (Object.keys(this.details).length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Validation Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid field (e.g., "filters.0.column") */
  path: string;
  message: string;
  /** Zod error code */
  code?: string;
}>;

export type ValidationErrorDetails = Readonly<{
  /** What was being validated (e.g., "query definition") */
  subject?: string;
  issues: readonly ValidationIssue[];
}>;

/**
 * Thrown when a query definition fails schema validation.
 *
 * @example
 * ```typescript
 * try {
 *   parseQueryDefinition({ table: 42 });
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     console.log(error.details.issues);
 *   }
 * }
 * ```
 */
export class ValidationError extends SliceQLError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    const fieldList =
      details.issues.length > 0 ?
        details.issues.map((issue) => issue.path || "(root)").join(", ")
      : "unknown";

    super(message, "VALIDATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the following fields: ${fieldList}. See error.details.issues for specific validation failures.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

// ============================================================
// Filter Errors (category: "user")
// ============================================================

/**
 * Thrown when a list filter is rendered without an array of strings.
 */
export class InvalidFilterValueError extends SliceQLError {
  constructor(column: string, options?: { cause?: unknown }) {
    super(
      `Filter on "${column}" requires an array of strings for the 'list' kind`,
      "INVALID_FILTER_VALUE",
      {
        details: { column },
        category: "user",
        suggestion: `Pass the accepted values as an array, e.g. listFilter("${column}", ["a", "b"]).`,
        cause: options?.cause,
      },
    );
    this.name = "InvalidFilterValueError";
  }
}

/**
 * Thrown when a custom filter is rendered without an expression.
 */
export class MissingExpressionError extends SliceQLError {
  constructor(column: string) {
    super(
      `Filter on "${column}" requires a custom expression for the 'custom' kind`,
      "MISSING_EXPRESSION",
      {
        details: { column },
        category: "user",
        suggestion: "Provide a non-empty customExpression.",
      },
    );
    this.name = "MissingExpressionError";
  }
}

/**
 * Thrown when a filter carries a kind other than 'list' or 'custom'.
 */
export class UnsupportedFilterKindError extends SliceQLError {
  constructor(column: string, kind: string) {
    super(
      `Unsupported filter kind "${kind}" on "${column}"`,
      "UNSUPPORTED_FILTER_KIND",
      {
        details: { column, kind },
        category: "user",
        suggestion: "Use one of the supported filter kinds: list, custom.",
      },
    );
    this.name = "UnsupportedFilterKindError";
  }
}

// ============================================================
// Assembly Errors (category: "user")
// ============================================================

/**
 * Thrown when compile() runs before a time grain has been set.
 *
 * @example
 * ```typescript
 * try {
 *   createQueryAssembler("events").compile();
 * } catch (error) {
 *   if (error instanceof MissingTimeGrainError) {
 *     console.log(error.details.table); // "events"
 *   }
 * }
 * ```
 */
export class MissingTimeGrainError extends SliceQLError {
  constructor(table: string) {
    super(
      `Cannot compile query on "${table}" without a time grain`,
      "MISSING_TIME_GRAIN",
      {
        details: { table },
        category: "user",
        suggestion: "Call setTimeGrain(timeGrain(...)) before compile().",
      },
    );
    this.name = "MissingTimeGrainError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Thrown when assembler options are malformed.
 */
export class ConfigurationError extends SliceQLError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        "Check the options passed to createQueryAssembler().",
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Checks if an error is a SliceQLError.
 */
export function isSliceQLError(error: unknown): error is SliceQLError {
  return error instanceof SliceQLError;
}

/**
 * Checks if an error is recoverable by fixing the caller's input.
 */
export function isUserRecoverable(error: unknown): boolean {
  if (!isSliceQLError(error)) return false;
  return error.category === "user";
}

/**
 * Checks if an error indicates an internal problem.
 *
 * Reserved for the "system" category, which no built-in error uses yet.
 */
export function isSystemError(error: unknown): boolean {
  return isSliceQLError(error) && error.category === "system";
}

/**
 * Extracts the suggestion from an error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  if (isSliceQLError(error)) {
    return error.suggestion;
  }
  return undefined;
}

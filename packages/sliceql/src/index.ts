/**
 * SliceQL: composable fragments for analytical SELECT statements.
 *
 * @example
 * ```typescript
 * import * as sq from "sliceql";
 *
 * const sql = sq
 *   .createQueryAssembler("events")
 *   .setTimeGrain(sq.timeGrain("ts", "day", "day"))
 *   .addSlice(sq.slice("country"))
 *   .addMeasure(sq.measure("count(*)", "total"))
 *   .addRatio(sq.ratio("sum(clicks)", "sum(views)", "ctr"))
 *   .addFilter(sq.listFilter("status", ["ok"]))
 *   .compile();
 * ```
 */

// ============================================================
// Fragments
// ============================================================

export {
  customFilter,
  Filter,
  FILTER_KINDS,
  type FilterInit,
  type FilterKind,
  type Fragment,
  type FragmentType,
  isFilterKind,
  isLabeledFragment,
  type LabeledFragment,
  type LabeledSqlFragment,
  listFilter,
  Measure,
  measure,
  Ratio,
  ratio,
  renderFragment,
  Slice,
  slice,
  type SqlFragment,
  TimeGrain,
  timeGrain,
} from "./fragments";

// ============================================================
// Assembler
// ============================================================

export {
  type CompileHookContext,
  type CompileHooks,
  createQueryAssembler,
  QueryAssembler,
  type QueryAssemblerOptions,
  type QueryClauses,
} from "./assembler";

// ============================================================
// Definitions
// ============================================================

export {
  assembleQuery,
  type FilterDefinition,
  type MeasureDefinition,
  parseQueryDefinition,
  type QueryDefinition,
  queryDefinitionSchema,
  type RatioDefinition,
  type SliceDefinition,
  type TimeGrainDefinition,
} from "./definition";

// ============================================================
// Integrations
// ============================================================

export { toDrizzleSql } from "./drizzle";

// ============================================================
// Errors
// ============================================================

export {
  ConfigurationError,
  type ErrorCategory,
  getErrorSuggestion,
  InvalidFilterValueError,
  isSliceQLError,
  isSystemError,
  isUserRecoverable,
  MissingExpressionError,
  MissingTimeGrainError,
  SliceQLError,
  type SliceQLErrorOptions,
  UnsupportedFilterKindError,
  ValidationError,
  type ValidationErrorDetails,
  type ValidationIssue,
} from "./errors";

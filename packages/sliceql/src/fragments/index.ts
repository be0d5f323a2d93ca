/**
 * Query Fragments
 *
 * Self-rendering pieces of a SELECT statement, plus factory helpers.
 *
 * @example
 * ```typescript
 * const day = timeGrain("created_at", "day", "day");
 * const country = slice("country");
 * const total = measure("count(*)", "total");
 * const okOnly = listFilter("status", ["ok"]);
 * ```
 */
import { Measure, Ratio, Slice, TimeGrain } from "./columns";
import { Filter } from "./filter";

export { Measure, Ratio, Slice, TimeGrain } from "./columns";
export {
  Filter,
  FILTER_KINDS,
  type FilterInit,
  type FilterKind,
  isFilterKind,
} from "./filter";
export {
  type FragmentType,
  type LabeledSqlFragment,
  type SqlFragment,
} from "./types";

/**
 * Every fragment variant.
 */
export type Fragment = TimeGrain | Slice | Measure | Ratio | Filter;

/**
 * Fragments that appear in the SELECT list under a label.
 */
export type LabeledFragment = TimeGrain | Slice | Measure | Ratio;

// ============================================================
// Factories
// ============================================================

/**
 * Creates a time grain: `date_trunc('<grain>', <column>) AS "<label>"`.
 */
export function timeGrain(
  column: string,
  grain: string,
  label: string,
): TimeGrain {
  return new TimeGrain(column, grain, label);
}

/**
 * Creates a dimension slice. The label defaults to the column name.
 *
 * @example
 * ```typescript
 * slice("country")              // country AS "country"
 * slice("device_os", "os")      // device_os AS "os"
 * ```
 */
export function slice(column: string, label?: string): Slice {
  return new Slice(column, label);
}

/**
 * Creates a measure from a raw aggregate expression.
 */
export function measure(expression: string, label: string): Measure {
  return new Measure(expression, label);
}

/**
 * Creates a zero-guarded ratio of two expressions.
 *
 * @example
 * ```typescript
 * ratio("sum(clicks)", "sum(views)", "ctr")
 * // (sum(clicks)) / NULLIF(sum(views), 0) AS "ctr"
 * ```
 */
export function ratio(
  numerator: string,
  denominator: string,
  label: string,
): Ratio {
  return new Ratio(numerator, denominator, label);
}

/**
 * Creates a list-membership filter: `<column> IN ('a', 'b')`.
 */
export function listFilter(column: string, values: readonly string[]): Filter {
  return new Filter({ column, kind: "list", value: values });
}

/**
 * Creates a filter whose condition is emitted verbatim.
 */
export function customFilter(column: string, expression: string): Filter {
  return new Filter({ column, kind: "custom", customExpression: expression });
}

// ============================================================
// Helpers
// ============================================================

/**
 * Renders any fragment to its SQL snippet.
 */
export function renderFragment(fragment: Fragment): string {
  return fragment.render();
}

export function isLabeledFragment(
  fragment: Fragment,
): fragment is LabeledFragment {
  return fragment.__type !== "filter";
}

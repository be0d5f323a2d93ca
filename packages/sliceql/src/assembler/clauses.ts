/**
 * Clause builders for the assembled statement.
 *
 * GROUP BY and ORDER BY are positional. Position 1 is always the time
 * grain and slices follow at 2..N+1; measures and ratios sit after the
 * slices in the SELECT list but are never grouped or sorted.
 */
import { type Filter, type LabeledFragment } from "../fragments";
import { type QueryClauses } from "./types";

const SELECT_SEPARATOR = ",\n  ";
const WHERE_SEPARATOR = " AND\n  ";
const POSITION_SEPARATOR = ", ";

/** Keeps the WHERE clause valid when there are no filters. */
const WHERE_SENTINEL = "TRUE";

const TIME_GRAIN_POSITION = "1";

export function buildSelectClause(
  columns: readonly LabeledFragment[],
): string {
  const rendered = columns.map((column) => column.render());
  return `SELECT\n  ${rendered.join(SELECT_SEPARATOR)}`;
}

export function buildFromClause(table: string): string {
  return `FROM ${table}`;
}

export function buildWhereClause(filters: readonly Filter[]): string {
  const conditions = [
    WHERE_SENTINEL,
    ...filters.map((filter) => filter.render()),
  ];
  return `WHERE ${conditions.join(WHERE_SEPARATOR)}`;
}

/**
 * 1-based SELECT positions of the slices: "2" through String(1 + count).
 */
export function slicePositions(sliceCount: number): string[] {
  return Array.from({ length: sliceCount }, (_, index) => String(index + 2));
}

export function buildGroupByClause(sliceCount: number): string {
  const positions = [TIME_GRAIN_POSITION, ...slicePositions(sliceCount)];
  return `GROUP BY ${positions.join(POSITION_SEPARATOR)}`;
}

/**
 * Newest bucket first; slices break ties in ascending order.
 */
export function buildOrderByClause(sliceCount: number): string {
  const positions = [
    `${TIME_GRAIN_POSITION} DESC`,
    ...slicePositions(sliceCount),
  ];
  return `ORDER BY ${positions.join(POSITION_SEPARATOR)}`;
}

export function joinClauses(clauses: QueryClauses): string {
  return [
    clauses.select,
    clauses.from,
    clauses.where,
    clauses.groupBy,
    clauses.orderBy,
  ].join("\n");
}

/**
 * WHERE-clause fragments.
 */
import { z } from "zod";

import {
  InvalidFilterValueError,
  MissingExpressionError,
  UnsupportedFilterKindError,
} from "../errors";
import { type SqlFragment } from "./types";

/**
 * Filter kinds understood by Filter.render().
 */
export const FILTER_KINDS = ["list", "custom"] as const;

export type FilterKind = (typeof FILTER_KINDS)[number];

const listValueSchema = z.array(z.string());

/**
 * Checks whether a kind is one Filter.render() supports.
 */
export function isFilterKind(kind: string): kind is FilterKind {
  return FILTER_KINDS.some((supported) => supported === kind);
}

/**
 * Constructor input for Filter.
 *
 * `kind` is a plain string so that kinds read from external data reach
 * render(), which rejects anything outside FILTER_KINDS.
 */
export type FilterInit = Readonly<{
  column: string;
  /** Defaults to "list" */
  kind?: string;
  /** Accepted values for the "list" kind */
  value?: readonly string[];
  /** Raw SQL condition for the "custom" kind */
  customExpression?: string;
}>;

/**
 * A WHERE condition on a single column.
 *
 * - `list` renders `column IN ('a', 'b')` followed by a newline. Values are
 *   wrapped in single quotes without escaping.
 * - `custom` renders `customExpression` verbatim.
 *
 * Errors surface from render(), not from the constructor.
 */
export class Filter implements SqlFragment {
  readonly __type = "filter";
  readonly column: string;
  readonly kind: string;
  readonly value: readonly string[] | undefined;
  readonly customExpression: string | undefined;

  constructor(init: FilterInit) {
    this.column = init.column;
    this.kind = init.kind ?? "list";
    // Copied so later changes to the caller's array cannot alter the SQL.
    this.value =
      Array.isArray(init.value) ? Object.freeze([...init.value]) : init.value;
    this.customExpression = init.customExpression;
    Object.freeze(this);
  }

  /**
   * @throws InvalidFilterValueError for a list filter without string values
   * @throws MissingExpressionError for a custom filter without an expression
   * @throws UnsupportedFilterKindError for any other kind
   */
  render(): string {
    switch (this.kind) {
      case "list": {
        return this.#renderList();
      }
      case "custom": {
        return this.#renderCustom();
      }
      default: {
        throw new UnsupportedFilterKindError(this.column, this.kind);
      }
    }
  }

  #renderList(): string {
    const parsed = listValueSchema.safeParse(this.value);
    if (!parsed.success) {
      throw new InvalidFilterValueError(this.column, { cause: parsed.error });
    }
    const values = parsed.data.map((value) => `'${value}'`).join(", ");
    return `${this.column} IN (${values})\n`;
  }

  #renderCustom(): string {
    if (!this.customExpression) {
      throw new MissingExpressionError(this.column);
    }
    return this.customExpression;
  }
}

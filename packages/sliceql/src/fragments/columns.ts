/**
 * SELECT-list fragments: time grain, slices, measures and ratios.
 *
 * Values are interpolated as-is. Column names and expressions are not
 * quoted or validated; the caller owns their correctness.
 */
import { type LabeledSqlFragment } from "./types";

function aliased(expression: string, label: string): string {
  return `${expression} AS "${label}"`;
}

/**
 * Truncates a timestamp column to a bucket such as "day" or "month".
 *
 * Always occupies position 1 of the SELECT list.
 */
export class TimeGrain implements LabeledSqlFragment {
  readonly __type = "time_grain";

  constructor(
    readonly column: string,
    readonly grain: string,
    readonly label: string,
  ) {
    Object.freeze(this);
  }

  render(): string {
    return aliased(`date_trunc('${this.grain}', ${this.column})`, this.label);
  }
}

/**
 * A non-aggregated dimension column. Grouped and sorted by position.
 */
export class Slice implements LabeledSqlFragment {
  readonly __type = "slice";
  readonly label: string;

  constructor(
    readonly column: string,
    label?: string,
  ) {
    this.label = label ?? column;
    Object.freeze(this);
  }

  render(): string {
    return aliased(this.column, this.label);
  }
}

/**
 * An aggregate expression, e.g. `count(*)` or `sum(amount)`.
 */
export class Measure implements LabeledSqlFragment {
  readonly __type = "measure";

  constructor(
    readonly expression: string,
    readonly label: string,
  ) {
    Object.freeze(this);
  }

  render(): string {
    return aliased(this.expression, this.label);
  }
}

/**
 * A derived measure dividing two expressions.
 *
 * A zero denominator yields NULL instead of a division error.
 */
export class Ratio implements LabeledSqlFragment {
  readonly __type = "ratio";

  constructor(
    readonly numerator: string,
    readonly denominator: string,
    readonly label: string,
  ) {
    Object.freeze(this);
  }

  render(): string {
    return aliased(
      `(${this.numerator}) / NULLIF(${this.denominator}, 0)`,
      this.label,
    );
  }
}

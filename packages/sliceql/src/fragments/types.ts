/**
 * Shared fragment types.
 */

/**
 * Discriminant carried by every fragment.
 */
export type FragmentType =
  | "time_grain"
  | "slice"
  | "measure"
  | "ratio"
  | "filter";

/**
 * Anything that renders itself to a SQL text snippet.
 *
 * Rendering is pure: it never reads assembler state and never mutates
 * the fragment.
 */
export interface SqlFragment {
  readonly __type: FragmentType;
  render(): string;
}

/**
 * A fragment that occupies a named position in the SELECT list.
 */
export interface LabeledSqlFragment extends SqlFragment {
  /** Output column name, rendered inside double quotes */
  readonly label: string;
}

/**
 * QueryAssembler - accumulates fragments and renders one SELECT statement.
 */
import { z } from "zod";

import { ConfigurationError, MissingTimeGrainError } from "../errors";
import {
  type Filter,
  type LabeledFragment,
  type Measure,
  type Ratio,
  type Slice,
  type TimeGrain,
} from "../fragments";
import { generateId, warnInDevelopment } from "../utils";
import {
  buildFromClause,
  buildGroupByClause,
  buildOrderByClause,
  buildSelectClause,
  buildWhereClause,
  joinClauses,
} from "./clauses";
import {
  type CompileHookContext,
  type QueryAssemblerOptions,
  type QueryAssemblerState,
  type QueryClauses,
} from "./types";

function isFunction(value: unknown): boolean {
  return typeof value === "function";
}

const hookSchema = z.custom<unknown>(isFunction, "Hook must be a function");

const optionsSchema = z.object({
  hooks: z
    .object({
      onCompileStart: hookSchema.optional(),
      onCompileEnd: hookSchema.optional(),
      onError: hookSchema.optional(),
    })
    .optional(),
  warnOnDuplicateLabels: z.boolean().optional(),
  idGenerator: z
    .custom<unknown>(isFunction, "idGenerator must be a function")
    .optional(),
});

function validateOptions(options: QueryAssemblerOptions): void {
  const result = optionsSchema.safeParse(options);
  if (result.success) {
    return;
  }
  const issues = result.error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
  throw new ConfigurationError(
    `Invalid query assembler options: ${issues
      .map((issue) => `${issue.path || "(root)"}: ${issue.message}`)
      .join("; ")}`,
    { issues },
    { cause: result.error },
  );
}

/**
 * Fluent builder for analytical SELECT statements against one table.
 *
 * Mutators append or replace fragments and return the assembler.
 * compile() is pure with respect to the registered fragments, so it can
 * be called repeatedly.
 *
 * @example
 * ```typescript
 * const sql = createQueryAssembler("events")
 *   .setTimeGrain(timeGrain("ts", "day", "day"))
 *   .addSlice(slice("country"))
 *   .addMeasure(measure("count(*)", "total"))
 *   .addFilter(listFilter("status", ["ok"]))
 *   .compile();
 * ```
 */
export class QueryAssembler {
  readonly #state: QueryAssemblerState;
  readonly #options: QueryAssemblerOptions;

  constructor(table: string, options: QueryAssemblerOptions = {}) {
    validateOptions(options);
    this.#options = options;
    this.#state = {
      table,
      timeGrain: undefined,
      slices: [],
      measures: [],
      ratios: [],
      filters: [],
    };
  }

  // ============================================================
  // Accessors
  // ============================================================

  get table(): string {
    return this.#state.table;
  }

  get timeGrain(): TimeGrain | undefined {
    return this.#state.timeGrain;
  }

  get slices(): readonly Slice[] {
    return [...this.#state.slices];
  }

  get measures(): readonly Measure[] {
    return [...this.#state.measures];
  }

  get ratios(): readonly Ratio[] {
    return [...this.#state.ratios];
  }

  get filters(): readonly Filter[] {
    return [...this.#state.filters];
  }

  /**
   * Labels in SELECT-list order.
   */
  labels(): string[] {
    return this.#selectColumns().map((column) => column.label);
  }

  // ============================================================
  // Mutators
  // ============================================================

  setTable(name: string): this {
    this.#state.table = name;
    return this;
  }

  /**
   * Sets the time grain, replacing any existing one.
   */
  setTimeGrain(grain: TimeGrain): this {
    this.#warnIfLabelTaken(grain, this.#nonTimeColumns());
    this.#state.timeGrain = grain;
    return this;
  }

  addSlice(slice: Slice): this {
    this.#warnIfLabelTaken(slice, this.#selectColumns());
    this.#state.slices.push(slice);
    return this;
  }

  addMeasure(measure: Measure): this {
    this.#warnIfLabelTaken(measure, this.#selectColumns());
    this.#state.measures.push(measure);
    return this;
  }

  addRatio(ratio: Ratio): this {
    this.#warnIfLabelTaken(ratio, this.#selectColumns());
    this.#state.ratios.push(ratio);
    return this;
  }

  addFilter(filter: Filter): this {
    this.#state.filters.push(filter);
    return this;
  }

  /**
   * Replaces the whole filter sequence. Filters carry no label, so this is
   * the way to drop them.
   */
  setFilters(filters: readonly Filter[]): this {
    this.#state.filters = [...filters];
    return this;
  }

  /**
   * Removes the time grain, slices, measures and ratios labeled `label`.
   *
   * Filters are not affected. A label that matches nothing is a no-op.
   */
  removeByLabel(label: string): this {
    if (this.#state.timeGrain?.label === label) {
      this.#state.timeGrain = undefined;
    }
    this.#state.slices = this.#state.slices.filter((s) => s.label !== label);
    this.#state.measures = this.#state.measures.filter(
      (m) => m.label !== label,
    );
    this.#state.ratios = this.#state.ratios.filter((r) => r.label !== label);
    return this;
  }

  /**
   * Creates an independent assembler holding the same fragments and options.
   */
  clone(): QueryAssembler {
    const copy = new QueryAssembler(this.#state.table, this.#options);
    copy.#state.timeGrain = this.#state.timeGrain;
    copy.#state.slices = [...this.#state.slices];
    copy.#state.measures = [...this.#state.measures];
    copy.#state.ratios = [...this.#state.ratios];
    copy.#state.filters = [...this.#state.filters];
    return copy;
  }

  // ============================================================
  // Compilation
  // ============================================================

  /**
   * Renders each clause separately.
   *
   * @throws MissingTimeGrainError if no time grain is set
   * @throws SliceQLError subclasses raised by a filter's render()
   */
  compileClauses(): QueryClauses {
    const { table, timeGrain, slices, measures, ratios, filters } =
      this.#state;
    if (timeGrain === undefined) {
      throw new MissingTimeGrainError(table);
    }

    return {
      select: buildSelectClause([
        timeGrain,
        ...slices,
        ...measures,
        ...ratios,
      ]),
      from: buildFromClause(table),
      where: buildWhereClause(filters),
      groupBy: buildGroupByClause(slices.length),
      orderBy: buildOrderByClause(slices.length),
    };
  }

  /**
   * Renders the full statement: SELECT, FROM, WHERE, GROUP BY and
   * ORDER BY joined by newlines.
   *
   * @throws MissingTimeGrainError if no time grain is set
   */
  compile(): string {
    const hooks = this.#options.hooks;
    if (hooks === undefined) {
      return joinClauses(this.compileClauses());
    }

    const context = this.#createHookContext();
    hooks.onCompileStart?.(context);

    let sql: string;
    try {
      sql = joinClauses(this.compileClauses());
    } catch (error) {
      if (error instanceof Error) {
        hooks.onError?.(context, error);
      }
      throw error;
    }

    hooks.onCompileEnd?.(context, {
      sql,
      durationMs: Date.now() - context.startedAt.getTime(),
    });
    return sql;
  }

  // ============================================================
  // Internals
  // ============================================================

  #selectColumns(): LabeledFragment[] {
    const { timeGrain } = this.#state;
    const head = timeGrain === undefined ? [] : [timeGrain];
    return [...head, ...this.#nonTimeColumns()];
  }

  #nonTimeColumns(): LabeledFragment[] {
    const { slices, measures, ratios } = this.#state;
    return [...slices, ...measures, ...ratios];
  }

  #warnIfLabelTaken(
    fragment: LabeledFragment,
    existing: readonly LabeledFragment[],
  ): void {
    if (this.#options.warnOnDuplicateLabels === false) {
      return;
    }
    if (existing.some((column) => column.label === fragment.label)) {
      warnInDevelopment(
        `[sliceql] Label "${fragment.label}" is already in the SELECT list; removeByLabel() will remove every fragment with this label.`,
        { table: this.#state.table, fragment: fragment.__type },
      );
    }
  }

  #createHookContext(): CompileHookContext {
    const generate = this.#options.idGenerator ?? generateId;
    return {
      operationId: generate(),
      table: this.#state.table,
      startedAt: new Date(),
    };
  }
}

/**
 * Creates a query assembler for `table`.
 *
 * @throws ConfigurationError if the options are malformed
 */
export function createQueryAssembler(
  table: string,
  options?: QueryAssemblerOptions,
): QueryAssembler {
  return new QueryAssembler(table, options);
}

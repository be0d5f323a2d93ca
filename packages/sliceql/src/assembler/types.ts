import {
  type Filter,
  type Measure,
  type Ratio,
  type Slice,
  type TimeGrain,
} from "../fragments";
import { type IdGenerator } from "../utils";

// ============================================================
// Observability Hooks
// ============================================================

/**
 * Context passed to compile hooks.
 */
export type CompileHookContext = Readonly<{
  /** Unique ID for this compile call */
  operationId: string;
  /** Table the query targets */
  table: string;
  /** Timestamp when compilation started */
  startedAt: Date;
}>;

/**
 * Observability hooks for monitoring compilation.
 *
 * Hooks observe; they cannot change the result. An error thrown by
 * compile() is reported through `onError` and then rethrown unchanged.
 *
 * @example
 * ```typescript
 * const hooks: CompileHooks = {
 *   onCompileEnd: (ctx, result) => {
 *     console.log(`[${ctx.operationId}] ${ctx.table}:\n${result.sql}`);
 *   },
 *   onError: (ctx, error) => {
 *     console.error(`[${ctx.operationId}] Error:`, error);
 *   },
 * };
 *
 * const assembler = createQueryAssembler("events", { hooks });
 * ```
 */
export type CompileHooks = Readonly<{
  /** Called before the statement is rendered */
  onCompileStart?: (ctx: CompileHookContext) => void;
  /** Called after the statement renders successfully */
  onCompileEnd?: (
    ctx: CompileHookContext,
    result: Readonly<{ sql: string; durationMs: number }>,
  ) => void;
  /** Called when rendering fails */
  onError?: (ctx: CompileHookContext, error: Error) => void;
}>;

// ============================================================
// Assembler Configuration
// ============================================================

/**
 * Options for creating a query assembler.
 */
export type QueryAssemblerOptions = Readonly<{
  /** Observability hooks for monitoring */
  hooks?: CompileHooks;
  /**
   * Warn (outside production) when a labeled fragment reuses a label
   * already in the SELECT list. Defaults to true.
   */
  warnOnDuplicateLabels?: boolean;
  /** Generator for hook operation IDs. Defaults to nanoid. */
  idGenerator?: IdGenerator;
}>;

/**
 * Mutable fragment registry held by an assembler.
 */
export type QueryAssemblerState = {
  table: string;
  timeGrain: TimeGrain | undefined;
  slices: Slice[];
  measures: Measure[];
  ratios: Ratio[];
  filters: Filter[];
};

/**
 * The five rendered clauses of a statement, in output order.
 */
export type QueryClauses = Readonly<{
  select: string;
  from: string;
  where: string;
  groupBy: string;
  orderBy: string;
}>;

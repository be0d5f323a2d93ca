/**
 * Query Definitions
 *
 * Plain-data descriptions of a query, for callers that keep queries in
 * JSON or receive them over the wire.
 *
 * @example
 * ```typescript
 * const definition = parseQueryDefinition(JSON.parse(raw));
 * const sql = assembleQuery(definition).compile();
 * ```
 */
import {
  createQueryAssembler,
  type QueryAssembler,
  type QueryAssemblerOptions,
} from "../assembler";
import { validateWithSchema } from "../errors/validation";
import { Filter, Measure, Ratio, Slice, TimeGrain } from "../fragments";
import {
  type QueryDefinition,
  queryDefinitionSchema,
  type SliceDefinition,
} from "./schema";

export {
  type FilterDefinition,
  type MeasureDefinition,
  type QueryDefinition,
  queryDefinitionSchema,
  type RatioDefinition,
  type SliceDefinition,
  type TimeGrainDefinition,
} from "./schema";

/**
 * Validates unknown input as a query definition.
 *
 * @throws ValidationError listing every schema issue
 */
export function parseQueryDefinition(input: unknown): QueryDefinition {
  return validateWithSchema(queryDefinitionSchema, input, "query definition");
}

function toSlice(definition: SliceDefinition): Slice {
  if (typeof definition === "string") {
    return new Slice(definition);
  }
  return new Slice(definition.column, definition.label);
}

/**
 * Builds an assembler holding every fragment of a definition, in order.
 */
export function assembleQuery(
  definition: QueryDefinition,
  options?: QueryAssemblerOptions,
): QueryAssembler {
  const { timeGrain } = definition;
  const assembler = createQueryAssembler(
    definition.table,
    options,
  ).setTimeGrain(
    new TimeGrain(timeGrain.column, timeGrain.grain, timeGrain.label),
  );

  for (const sliceDefinition of definition.slices ?? []) {
    assembler.addSlice(toSlice(sliceDefinition));
  }
  for (const { expression, label } of definition.measures ?? []) {
    assembler.addMeasure(new Measure(expression, label));
  }
  for (const { numerator, denominator, label } of definition.ratios ?? []) {
    assembler.addRatio(new Ratio(numerator, denominator, label));
  }
  for (const filterDefinition of definition.filters ?? []) {
    assembler.addFilter(new Filter(filterDefinition));
  }

  return assembler;
}

/**
 * Zod schemas for declarative query definitions.
 */
import { z } from "zod";

const timeGrainDefinitionSchema = z.object({
  column: z.string(),
  grain: z.string(),
  label: z.string(),
});

/**
 * A slice is either a bare column name or `{ column, label? }`.
 */
const sliceDefinitionSchema = z.union([
  z.string(),
  z.object({
    column: z.string(),
    label: z.string().optional(),
  }),
]);

const measureDefinitionSchema = z.object({
  expression: z.string(),
  label: z.string(),
});

const ratioDefinitionSchema = z.object({
  numerator: z.string(),
  denominator: z.string(),
  label: z.string(),
});

// Kind stays an open string; Filter.render() rejects unsupported kinds.
const filterDefinitionSchema = z.object({
  column: z.string(),
  kind: z.string().optional(),
  value: z.array(z.string()).optional(),
  customExpression: z.string().optional(),
});

export const queryDefinitionSchema = z.object({
  table: z.string().min(1),
  timeGrain: timeGrainDefinitionSchema,
  slices: z.array(sliceDefinitionSchema).optional(),
  measures: z.array(measureDefinitionSchema).optional(),
  ratios: z.array(ratioDefinitionSchema).optional(),
  filters: z.array(filterDefinitionSchema).optional(),
});

export type TimeGrainDefinition = z.infer<typeof timeGrainDefinitionSchema>;
export type SliceDefinition = z.infer<typeof sliceDefinitionSchema>;
export type MeasureDefinition = z.infer<typeof measureDefinitionSchema>;
export type RatioDefinition = z.infer<typeof ratioDefinitionSchema>;
export type FilterDefinition = z.infer<typeof filterDefinitionSchema>;
export type QueryDefinition = z.infer<typeof queryDefinitionSchema>;

/**
 * Hand-off to drizzle-orm for callers that execute through a drizzle
 * database.
 *
 * @example
 * ```typescript
 * const rows = await db.execute(toDrizzleSql(assembler));
 * ```
 */
import { type SQL, sql } from "drizzle-orm";

import { type QueryAssembler } from "./assembler";

/**
 * Compiles the assembler and wraps the text as a raw SQL chunk.
 *
 * Nothing is parameterized: values are already inlined by the fragments.
 *
 * @throws MissingTimeGrainError if no time grain is set
 */
export function toDrizzleSql(assembler: QueryAssembler): SQL {
  return sql.raw(assembler.compile());
}

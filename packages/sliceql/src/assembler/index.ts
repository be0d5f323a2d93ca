export { createQueryAssembler, QueryAssembler } from "./query-assembler";
export {
  type CompileHookContext,
  type CompileHooks,
  type QueryAssemblerOptions,
  type QueryClauses,
} from "./types";

import { nanoid } from "nanoid";

/**
 * Generates a new unique ID for hook contexts.
 */
export function generateId(): string {
  return nanoid();
}

/**
 * ID generator function type.
 */
export type IdGenerator = () => string;

import { normalizeItems } from "../task/state.ts";

/**
 * Required items not among the available ones. Case-insensitive, sorted.
 */
export function reconcileItems(required: readonly string[], available: readonly string[]): string[] {
  const have = new Set(normalizeItems(available));
  return normalizeItems(required)
    .filter((item) => !have.has(item))
    .sort();
}

import type { SameIdentity } from './identity.js';

/**
 * Merge `incoming` into `base` in place and return `base`.
 * Matched items are handed to `update`; unmatched ones are appended (through
 * `adopt`) in incoming order. Nothing is ever removed from `base`.
 */
export function reconcile<T>(
  base: T[],
  incoming: readonly T[],
  same: SameIdentity<T>,
  update: (target: T, source: T) => void,
  adopt: (item: T) => T = item => item,
): T[] {
  // Snapshot so merging a collection into itself can't observe its own appends
  for (const item of [...incoming]) {
    const match = base.find(existing => same(existing, item));
    if (match === undefined) {
      base.push(adopt(item));
    } else if (match !== item) {
      update(match, item);
    }
  }
  return base;
}

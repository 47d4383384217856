/**
 * Set and number search over value-bearing items. Nothing here knows about
 * cards or game rules; callers pass a `valueOf` accessor.
 */

export type ValueOf<T> = (item: T) => number;
export type KeyOf<T> = (item: T) => string;

const sortDescending = <T>(items: readonly T[], valueOf: ValueOf<T>): T[] =>
  [...items].sort((a, b) => valueOf(b) - valueOf(a));

/**
 * Every subset of `items` whose values add up to `target`, with at least
 * `minSize` members. Items are visited largest first; a branch stops when the
 * values still available cannot reach the remaining target.
 */
export const findSubsetsWithSum = <T>(
  items: readonly T[],
  target: number,
  valueOf: ValueOf<T>,
  minSize = 1,
): T[][] => {
  if (items.length === 0 || target <= 0) {
    return [];
  }

  const sorted = sortDescending(items, valueOf);
  const values = sorted.map(valueOf);
  const suffixSums = new Array<number>(values.length + 1).fill(0);
  for (let i = values.length - 1; i >= 0; i -= 1) {
    suffixSums[i] = (suffixSums[i + 1] ?? 0) + (values[i] ?? 0);
  }

  const results: T[][] = [];
  const current: T[] = [];

  const search = (remaining: number, start: number): void => {
    if (remaining === 0) {
      if (current.length >= minSize) {
        results.push([...current]);
      }
      return;
    }
    if (start >= sorted.length || (suffixSums[start] ?? 0) < remaining) {
      return;
    }

    for (let i = start; i < sorted.length; i += 1) {
      const item = sorted[i];
      const value = values[i];
      if (item === undefined || value === undefined || value > remaining) {
        continue;
      }
      current.push(item);
      search(remaining - value, i + 1);
      current.pop();
    }
  };

  search(target, 0);
  return results;
};

/**
 * Splits `items` into `total / target` groups that each sum to exactly
 * `target`. Returns the first assignment found, or `null` when none exists.
 */
export const partitionExactSums = <T>(items: readonly T[], target: number, valueOf: ValueOf<T>): T[][] | null => {
  if (items.length === 0) {
    return [];
  }
  if (target <= 0) {
    return null;
  }

  const total = items.reduce((sum, item) => sum + valueOf(item), 0);
  if (total % target !== 0 || items.some((item) => valueOf(item) > target)) {
    return null;
  }

  const groupCount = total / target;
  const groups: T[][] = Array.from({ length: groupCount }, () => []);
  const sums = new Array<number>(groupCount).fill(0);
  const sorted = sortDescending(items, valueOf);

  const place = (index: number): boolean => {
    const item = sorted[index];
    if (item === undefined) {
      return true;
    }
    const value = valueOf(item);
    const tried = new Set<number>();

    for (let g = 0; g < groupCount; g += 1) {
      const sum = sums[g] ?? 0;
      const group = groups[g];
      if (!group || sum + value > target || tried.has(sum)) {
        continue;
      }
      tried.add(sum);

      group.push(item);
      sums[g] = sum + value;
      if (place(index + 1)) {
        return true;
      }
      group.pop();
      sums[g] = sum;
    }
    return false;
  };

  return place(0) ? groups : null;
};

/**
 * Among `sets`, finds every selection of pairwise-disjoint sets whose combined
 * size is the largest possible. Items are compared by `keyOf`.
 */
export const selectMaximalDisjointSets = <T>(sets: readonly (readonly T[])[], keyOf: KeyOf<T>): T[][][] => {
  if (sets.length === 0) {
    return [];
  }

  const results: T[][][] = [];
  let best = 0;
  const chosen: T[][] = [];

  const search = (start: number, used: ReadonlySet<string>, size: number): void => {
    if (chosen.length > 0) {
      if (size > best) {
        best = size;
        results.length = 0;
        results.push([...chosen]);
      } else if (size === best) {
        results.push([...chosen]);
      }
    }

    for (let i = start; i < sets.length; i += 1) {
      const set = sets[i];
      if (!set || set.some((item) => used.has(keyOf(item)))) {
        continue;
      }
      chosen.push([...set]);
      search(i + 1, new Set([...used, ...set.map(keyOf)]), size + set.length);
      chosen.pop();
    }
  };

  search(0, new Set(), 0);
  return results;
};

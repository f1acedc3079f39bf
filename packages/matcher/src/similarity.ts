/**
 * Lexical similarity primitives
 */

/**
 * |A ∩ B| / |A ∪ B|. Two empty sets are identical.
 */
export function jaccard<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let shared = 0;
  for (const item of a) {
    if (b.has(item)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

/**
 * Length of the longest common subsequence, by code point
 */
export function lcsLength(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  if (left.length === 0 || right.length === 0) return 0;

  let previous = new Array<number>(right.length + 1).fill(0);
  let current = new Array<number>(right.length + 1).fill(0);

  for (let i = 1; i <= left.length; i++) {
    for (let j = 1; j <= right.length; j++) {
      current[j] = left[i - 1] === right[j - 1]
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[right.length];
}

/**
 * 2 * LCS / (|a| + |b|), in [0, 1]
 */
export function sequenceRatio(a: string, b: string): number {
  const total = Array.from(a).length + Array.from(b).length;
  if (total === 0) return 1;
  return (2 * lcsLength(a, b)) / total;
}

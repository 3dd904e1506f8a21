/**
 * String similarity used by the fuzzy matchers
 */

export const FUZZ_STRONG = 95;
export const FUZZ_POSSIBLE = 90;

function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];

  let previous = new Array<number>(inner.length + 1).fill(0);
  let current = new Array<number>(inner.length + 1).fill(0);

  for (let i = 1; i <= outer.length; i++) {
    for (let j = 1; j <= inner.length; j++) {
      current[j] =
        outer[i - 1] === inner[j - 1]
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[inner.length];
}

/**
 * Normalized Indel similarity in [0, 100]: 100 * (1 - distance / (|a| + |b|)),
 * where the Indel distance counts insertions and deletions only.
 */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return (200 * longestCommonSubsequence(a, b)) / total;
}

/**
 * Score as written into review notes
 */
export function formatScore(score: number): string {
  return String(Math.round(score * 10) / 10);
}

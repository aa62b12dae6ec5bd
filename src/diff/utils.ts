/**
 * Diff Utilities
 *
 * Sequence helpers shared by the section and row passes.
 */

/**
 * Positions of one longest strictly increasing subsequence of `values`.
 * Patience sorting; on ties the subsequence ending in the smallest values wins.
 *
 * @returns Set of positions into `values`
 */
export function longestIncreasingSubsequence(values: readonly number[]): Set<number> {
  // tails[k] = position of the smallest tail of an increasing run of length k + 1
  const tails: number[] = [];
  const previous = new Array<number>(values.length).fill(-1);

  values.forEach((value, position) => {
    let low = 0;
    let high = tails.length;
    while (low < high) {
      const mid = (low + high) >> 1;
      if (values[tails[mid]] < value) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    if (low > 0) {
      previous[position] = tails[low - 1];
    }
    tails[low] = position;
  });

  const result = new Set<number>();
  let position = tails.length > 0 ? tails[tails.length - 1] : -1;
  while (position !== -1) {
    result.add(position);
    position = previous[position];
  }
  return result;
}

import type { DiffResult, IndexMatch, IndexMove } from '../types/diff.js';

/**
 * Positions (into `values`) of one longest strictly increasing subsequence, found by
 * patience sorting in O(n log n). Ties between equally long candidates resolve to the
 * subsequence ending at the smallest tail value.
 */
export function longestIncreasingSubsequence(values: readonly number[]): number[] {
  if (values.length === 0) return [];
  // tails[k] = position of the smallest tail of an increasing run of length k + 1
  const tails: number[] = [];
  const previous: number[] = new Array(values.length).fill(-1);

  for (let i = 0; i < values.length; i += 1) {
    const value = values[i];
    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (values[tails[mid]] < value) lo = mid + 1;
      else hi = mid;
    }
    if (lo > 0) previous[i] = tails[lo - 1];
    tails[lo] = i;
  }

  const out: number[] = new Array(tails.length);
  let cursor = tails[tails.length - 1];
  for (let k = tails.length - 1; k >= 0; k -= 1) {
    out[k] = cursor;
    cursor = previous[cursor];
  }
  return out;
}

/**
 * Splits matches into those that can stay put and those that must be moved.
 *
 * Matches are taken in new-index order; the longest run whose old indices also increase
 * keeps its relative order while everything around it shifts, so only the remainder is
 * reported. A match whose index did not change is reported only when it sits out of
 * order with that run.
 */
export function minimalMoves(matched: readonly IndexMatch[]): IndexMove[] {
  if (matched.length === 0) return [];
  const ordered = isSortedByNew(matched) ? matched : [...matched].sort((a, b) => a.new - b.new);
  const stay = new Set(longestIncreasingSubsequence(ordered.map((m) => m.old)));
  const moves: IndexMove[] = [];
  for (let i = 0; i < ordered.length; i += 1) {
    if (stay.has(i)) continue;
    moves.push({ from: ordered[i].old, to: ordered[i].new });
  }
  return moves;
}

/** Returns a copy of `result` whose moves are reduced to `minimalMoves(result.matched)`. */
export function withMinimalMoves(result: DiffResult): DiffResult {
  return { ...result, moves: minimalMoves(result.matched) };
}

function isSortedByNew(matched: readonly IndexMatch[]): boolean {
  for (let i = 1; i < matched.length; i += 1) {
    if (matched[i - 1].new > matched[i].new) return false;
  }
  return true;
}

import type { Key } from '../types/keys.js';
import { ErrorCode } from '../types/enums.js';
import { ListDiffError } from '../types/error.js';

type ReverseIndexState<S> =
  | { status: 'absent' }
  | { status: 'building' }
  | { status: 'present'; map: Map<Key, S> };

/**
 * Item key to section lookup, materialized on first use.
 *
 * Building a snapshot and handing it to the reconciler never needs reverse lookups, so
 * that path never pays for this map. Mutations that need O(1) lookup call `ensure`.
 * Bulk removals call `invalidate` instead of patching: deleting an arbitrary set of
 * items costs a scan either way, and the rebuild is paid at most once per build/diff
 * cycle. Appends and single moves patch the map only when it is already present.
 */
export class ReverseIndex<S> {
  private state: ReverseIndexState<S> = { status: 'absent' };
  private rebuilds = 0;

  get status(): ReverseIndexState<S>['status'] {
    return this.state.status;
  }

  /** Number of times the map has been built from scratch. */
  get buildCount(): number {
    return this.rebuilds;
  }

  /** The map if already materialized, without building it. */
  peek(): ReadonlyMap<Key, S> | undefined {
    return this.state.status === 'present' ? this.state.map : undefined;
  }

  ensure(entries: () => Iterable<readonly [Key, S]>): Map<Key, S> {
    if (this.state.status === 'present') return this.state.map;
    if (this.state.status === 'building') {
      throw new ListDiffError(ErrorCode.INVALID_STATE, 'Reverse index requested while it is being built');
    }
    this.state = { status: 'building' };
    const map = new Map<Key, S>();
    try {
      for (const [key, section] of entries()) {
        map.set(key, section);
      }
    } catch (err) {
      this.state = { status: 'absent' };
      throw err;
    }
    this.state = { status: 'present', map };
    this.rebuilds += 1;
    return map;
  }

  set(key: Key, section: S): void {
    if (this.state.status === 'present') this.state.map.set(key, section);
  }

  delete(key: Key): void {
    if (this.state.status === 'present') this.state.map.delete(key);
  }

  invalidate(): void {
    this.state = { status: 'absent' };
  }
}

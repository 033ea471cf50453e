import type { Snapshot } from '../snapshot/Snapshot.js';
import type { Key } from '../types/keys.js';

/** Returns true when two items with the same identity also render the same content. */
export type ContentEquality<I> = (next: I, previous: I) => boolean;

/** Items of `next` whose identity exists in `old` but whose content differs. */
export function itemsToReconfigure<S, I>(old: Snapshot<S, I>, next: Snapshot<S, I>, isContentEqual: ContentEquality<I>): I[] {
  if (old.numberOfItems === 0) return [];
  const previous = new Map<Key, I>();
  for (const item of old.itemIdentifiers) {
    previous.set(old.itemKey(item), item);
  }
  const out: I[] = [];
  for (const item of next.itemIdentifiers) {
    const before = previous.get(next.itemKey(item));
    if (before === undefined) continue;
    if (!isContentEqual(item, before)) out.push(item);
  }
  return out;
}

/**
 * Copy of `next` with content-changed items marked for reconfiguration. `next` itself is
 * returned when nothing changed.
 */
export function autoReconfigure<S, I>(old: Snapshot<S, I>, next: Snapshot<S, I>, isContentEqual: ContentEquality<I>): Snapshot<S, I> {
  const changed = itemsToReconfigure(old, next, isContentEqual);
  if (changed.length === 0) return next;
  const marked = next.clone();
  marked.reconfigureItems(changed);
  return marked;
}

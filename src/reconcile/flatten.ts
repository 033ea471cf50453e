import type { HierarchicalSnapshot } from '../snapshot/HierarchicalSnapshot.js';
import type { Snapshot } from '../snapshot/Snapshot.js';

/**
 * Copy of `snapshot` whose `section` holds the visible items of `tree`, in depth-first
 * order. Parent/child structure is not carried over. Returns undefined for an unknown
 * section.
 */
export function flattenIntoSection<S, I>(tree: HierarchicalSnapshot<I>, section: S, snapshot: Snapshot<S, I>): Snapshot<S, I> | undefined {
  if (!snapshot.containsSection(section)) return undefined;
  const next = snapshot.clone();
  next.deleteItems(next.itemIdentifiersInSection(section));
  const visible = tree.visibleItems;
  if (visible.length > 0) next.appendItems(visible, section);
  return next;
}

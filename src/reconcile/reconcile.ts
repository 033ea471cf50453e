import type { HierarchicalSnapshot } from '../snapshot/HierarchicalSnapshot.js';
import type { Snapshot } from '../snapshot/Snapshot.js';
import type { IndexPath, PathMove, StagedChangeset } from '../types/changeset.js';
import type { DiffResult } from '../types/diff.js';
import { sameKey, type Key, type KeyFn } from '../types/keys.js';
import { diffKeys } from '../diff/heckel.js';
import { minimalMoves, withMinimalMoves } from '../diff/lis.js';
import { createLogger } from '../utils/log.js';
import { changesetSize, compareIndexPath } from './changeset.js';

const log = createLogger('reconcile');

function sameItems<I>(a: readonly I[], b: readonly I[], keyOf: KeyFn<I>): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (!sameKey(keyOf(a[i]), keyOf(b[i]))) return false;
  }
  return true;
}

/**
 * Changeset turning the rendering of `old` into that of `next`.
 *
 * Sections are diffed first. Items are diffed only inside sections present in both
 * snapshots; items of deleted or inserted sections travel with their section. An item
 * that leaves one surviving section for another is reported as a single move. Within a
 * section, matches that keep their relative order are not reported as moves.
 *
 * Item deletes come sorted descending and inserts ascending, ready to be applied in
 * the order deletes, inserts, moves, then reloads and reconfigures.
 */
export function reconcile<S, I>(old: Snapshot<S, I>, next: Snapshot<S, I>): StagedChangeset {
  const sectionKey = next.sectionKey;
  const itemKey = next.itemKey;
  const sectionDiff = diffKeys(old.sectionIdentifiers, next.sectionIdentifiers, sectionKey);

  const itemDeletes: IndexPath[] = [];
  const itemInserts: IndexPath[] = [];
  const itemMoves: PathMove[] = [];

  // Cross-section moves need more than one section on some side.
  const crossSection = old.numberOfSections > 1 || next.numberOfSections > 1;
  const deleteCandidates = new Map<Key, IndexPath>();
  const insertCandidates = new Map<Key, IndexPath>();

  for (const match of sectionDiff.matched) {
    const oldItems = old.itemIdentifiersInSectionAt(match.old);
    const newItems = next.itemIdentifiersInSectionAt(match.new);
    if (sameItems(oldItems, newItems, itemKey)) continue;

    const itemDiff = diffKeys(oldItems, newItems, itemKey);
    for (const move of minimalMoves(itemDiff.matched)) {
      itemMoves.push({
        from: { section: match.old, item: move.from },
        to: { section: match.new, item: move.to }
      });
    }

    if (crossSection) {
      for (const index of itemDiff.deletes) {
        deleteCandidates.set(itemKey(oldItems[index]), { section: match.old, item: index });
      }
      for (const index of itemDiff.inserts) {
        insertCandidates.set(itemKey(newItems[index]), { section: match.new, item: index });
      }
    } else {
      for (const index of itemDiff.deletes) itemDeletes.push({ section: match.old, item: index });
      for (const index of itemDiff.inserts) itemInserts.push({ section: match.new, item: index });
    }
  }

  for (const [key, from] of deleteCandidates) {
    const to = insertCandidates.get(key);
    if (to === undefined) {
      itemDeletes.push(from);
      continue;
    }
    insertCandidates.delete(key);
    itemMoves.push({ from, to });
  }
  for (const path of insertCandidates.values()) {
    itemInserts.push(path);
  }

  const sectionReloads: number[] = [];
  for (const section of next.reloadedSectionIdentifiers) {
    const index = next.indexOfSection(section);
    if (index !== undefined && old.containsSection(section)) sectionReloads.push(index);
  }
  sectionReloads.sort((a, b) => a - b);

  const itemReloads: IndexPath[] = [];
  const itemReconfigures: IndexPath[] = [];
  if (next.reloadedItemIdentifiers.length > 0 || next.reconfiguredItemIdentifiers.length > 0) {
    // Markers only apply to items that existed before, outside inserted sections.
    const insertedSections = new Set(sectionDiff.inserts);
    const existing = new Set<Key>(old.itemIdentifiers.map(old.itemKey));
    for (let s = 0; s < next.numberOfSections; s += 1) {
      if (insertedSections.has(s)) continue;
      const items = next.itemIdentifiersInSectionAt(s);
      for (let i = 0; i < items.length; i += 1) {
        if (!existing.has(itemKey(items[i]))) continue;
        if (next.isItemReloaded(items[i])) itemReloads.push({ section: s, item: i });
        if (next.isItemReconfigured(items[i])) itemReconfigures.push({ section: s, item: i });
      }
    }
  }

  const changeset: StagedChangeset = {
    sectionDeletes: sectionDiff.deletes,
    sectionInserts: sectionDiff.inserts,
    sectionMoves: sectionDiff.moves,
    sectionReloads,
    itemDeletes: itemDeletes.sort((a, b) => compareIndexPath(b, a)),
    itemInserts: itemInserts.sort(compareIndexPath),
    itemMoves,
    itemReloads,
    itemReconfigures
  };
  log(
    'sections -%d +%d ~%d, items -%d +%d ~%d (%d ops)',
    changeset.sectionDeletes.length,
    changeset.sectionInserts.length,
    changeset.sectionMoves.length,
    changeset.itemDeletes.length,
    changeset.itemInserts.length,
    changeset.itemMoves.length,
    changesetSize(changeset)
  );
  return changeset;
}

/** Diff of the visible items of two hierarchical snapshots, with minimal moves. */
export function diffHierarchical<I>(old: HierarchicalSnapshot<I>, next: HierarchicalSnapshot<I>): DiffResult {
  return withMinimalMoves(diffKeys(old.visibleItems, next.visibleItems, next.itemKey));
}

import type { IndexPath, StagedChangeset } from '../types/changeset.js';

export function emptyChangeset(): StagedChangeset {
  return {
    sectionDeletes: [],
    sectionInserts: [],
    sectionMoves: [],
    sectionReloads: [],
    itemDeletes: [],
    itemInserts: [],
    itemMoves: [],
    itemReloads: [],
    itemReconfigures: []
  };
}

/** True when any delete, insert or move is present. */
export function hasStructuralChanges(changeset: StagedChangeset): boolean {
  return (
    changeset.sectionDeletes.length > 0 ||
    changeset.sectionInserts.length > 0 ||
    changeset.sectionMoves.length > 0 ||
    changeset.itemDeletes.length > 0 ||
    changeset.itemInserts.length > 0 ||
    changeset.itemMoves.length > 0
  );
}

export function hasMarkerChanges(changeset: StagedChangeset): boolean {
  return changeset.sectionReloads.length > 0 || changeset.itemReloads.length > 0 || changeset.itemReconfigures.length > 0;
}

export function isChangesetEmpty(changeset: StagedChangeset): boolean {
  return !hasStructuralChanges(changeset) && !hasMarkerChanges(changeset);
}

/** Total number of operations, used for logging. */
export function changesetSize(changeset: StagedChangeset): number {
  return (
    changeset.sectionDeletes.length +
    changeset.sectionInserts.length +
    changeset.sectionMoves.length +
    changeset.sectionReloads.length +
    changeset.itemDeletes.length +
    changeset.itemInserts.length +
    changeset.itemMoves.length +
    changeset.itemReloads.length +
    changeset.itemReconfigures.length
  );
}

export function compareIndexPath(a: IndexPath, b: IndexPath): number {
  if (a.section !== b.section) return a.section - b.section;
  return a.item - b.item;
}

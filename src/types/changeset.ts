export interface IndexPath {
  section: number;
  item: number;
}

export interface PathMove {
  from: IndexPath;
  to: IndexPath;
}

export interface SectionMove {
  from: number;
  to: number;
}

/**
 * Operations that turn the rendering of one snapshot into the next.
 *
 * Deletes and move sources use old positions; inserts, move destinations, reloads and
 * reconfigures use new positions.
 */
export interface StagedChangeset {
  sectionDeletes: number[];
  sectionInserts: number[];
  sectionMoves: SectionMove[];
  sectionReloads: number[];
  itemDeletes: IndexPath[];
  itemInserts: IndexPath[];
  itemMoves: PathMove[];
  itemReloads: IndexPath[];
  itemReconfigures: IndexPath[];
}

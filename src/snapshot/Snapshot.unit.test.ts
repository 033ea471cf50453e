import { beforeEach, describe, expect, it } from 'vitest';
import { Snapshot } from './Snapshot.js';
import { ErrorCode } from '../types/enums.js';
import { ListDiffError } from '../types/error.js';
import { configureAssertions } from '../utils/invariant.js';
import { errorCodeOf } from '../testing/errorTestHelpers.js';

function build(): Snapshot<string, number> {
  const snapshot = new Snapshot<string, number>();
  snapshot.appendSections(['A', 'B']);
  snapshot.appendItems([1, 2, 3], 'A');
  snapshot.appendItems([4, 5]);
  return snapshot;
}

beforeEach(() => {
  configureAssertions(true);
});

describe('Snapshot sections', () => {
  it('inserts sections next to an anchor', () => {
    const snapshot = build();
    snapshot.insertSectionsBefore(['Z'], 'B');
    snapshot.insertSectionsAfter(['Y'], 'B');
    expect(snapshot.sectionIdentifiers).toEqual(['A', 'Z', 'B', 'Y']);
    expect(snapshot.indexOfSection('B')).toBe(2);
    expect(snapshot.itemIdentifiersInSection('B')).toEqual([4, 5]);
    expect(snapshot.numberOfItemsInSection('Z')).toBe(0);
  });

  it('ignores inserts next to an unknown section', () => {
    const snapshot = build();
    snapshot.insertSectionsBefore(['Z'], 'Q');
    expect(snapshot.sectionIdentifiers).toEqual(['A', 'B']);
  });

  it('deletes sections together with their items', () => {
    const snapshot = build();
    snapshot.deleteSections(['A', 'Q']);
    expect(snapshot.sectionIdentifiers).toEqual(['B']);
    expect(snapshot.numberOfItems).toBe(2);
    expect(snapshot.containsItem(1)).toBe(false);
    expect(snapshot.indexOfSection('B')).toBe(0);
  });

  it('moves sections with their items', () => {
    const snapshot = build();
    snapshot.appendSections(['C']);
    snapshot.appendItems([6], 'C');

    snapshot.moveSectionAfter('A', 'C');
    expect(snapshot.sectionIdentifiers).toEqual(['B', 'C', 'A']);
    expect(snapshot.itemIdentifiersInSectionAt(2)).toEqual([1, 2, 3]);

    snapshot.moveSectionBefore('A', 'B');
    expect(snapshot.sectionIdentifiers).toEqual(['A', 'B', 'C']);
    expect(snapshot.itemIdentifiers).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('flags duplicate sections', () => {
    const snapshot = build();
    expect(errorCodeOf(() => snapshot.appendSections(['A']))).toBe(ErrorCode.DUPLICATE_SECTION);
    expect(errorCodeOf(() => snapshot.insertSectionsAfter(['B'], 'A'))).toBe(ErrorCode.DUPLICATE_SECTION);
  });
});

describe('Snapshot items', () => {
  it('appends to the last section by default', () => {
    const snapshot = build();
    expect(snapshot.itemIdentifiersInSection('B')).toEqual([4, 5]);
    expect(snapshot.itemIdentifiers).toEqual([1, 2, 3, 4, 5]);
    expect(snapshot.numberOfItems).toBe(5);
  });

  it('refuses to append without a target section', () => {
    const empty = new Snapshot<string, number>();
    expect(() => empty.appendItems([1])).toThrowError(ListDiffError);
    expect(errorCodeOf(() => empty.appendItems([1]))).toBe(ErrorCode.NO_SECTION);
    expect(errorCodeOf(() => build().appendItems([9], 'Q'))).toBe(ErrorCode.NO_SECTION);
  });

  it('refuses to append without a section even with assertions off', () => {
    configureAssertions(false);
    expect(errorCodeOf(() => new Snapshot<string, number>().appendItems([1]))).toBe(ErrorCode.NO_SECTION);
  });

  it('inserts items around an anchor', () => {
    const snapshot = build();
    snapshot.insertItemsBefore([10, 11], 1);
    snapshot.insertItemsAfter([12], 5);
    expect(snapshot.itemIdentifiersInSection('A')).toEqual([10, 11, 1, 2, 3]);
    expect(snapshot.itemIdentifiersInSection('B')).toEqual([4, 5, 12]);
    expect(snapshot.numberOfItems).toBe(8);
  });

  it('ignores inserts next to an unknown item', () => {
    const snapshot = build();
    snapshot.insertItemsAfter([10], 99);
    expect(snapshot.numberOfItems).toBe(5);
    expect(snapshot.containsItem(10)).toBe(false);
  });

  it('deletes items from any section', () => {
    const snapshot = build();
    snapshot.deleteItems([2, 5, 99]);
    expect(snapshot.itemIdentifiers).toEqual([1, 3, 4]);
    expect(snapshot.numberOfItems).toBe(3);
  });

  it('empties every section on deleteAllItems', () => {
    const snapshot = build();
    snapshot.deleteAllItems();
    expect(snapshot.numberOfItems).toBe(0);
    expect(snapshot.sectionIdentifiers).toEqual(['A', 'B']);
    expect(snapshot.itemIdentifiersInSection('A')).toEqual([]);
  });

  it('moves an item within its section', () => {
    const snapshot = build();
    snapshot.moveItemAfter(1, 3);
    expect(snapshot.itemIdentifiersInSection('A')).toEqual([2, 3, 1]);
  });

  it('moves an item into another section', () => {
    const snapshot = build();
    snapshot.moveItemBefore(5, 1);
    expect(snapshot.itemIdentifiersInSection('A')).toEqual([5, 1, 2, 3]);
    expect(snapshot.itemIdentifiersInSection('B')).toEqual([4]);
    expect(snapshot.sectionIdentifierContaining(5)).toBe('A');
    expect(snapshot.indexPathOfItem(5)).toEqual({ section: 0, item: 0 });
    expect(snapshot.numberOfItems).toBe(5);
  });

  it('leaves everything in place when the move anchor is unknown', () => {
    const snapshot = build();
    snapshot.moveItemAfter(1, 99);
    snapshot.moveItemBefore(99, 1);
    expect(snapshot.itemIdentifiersInSection('A')).toEqual([1, 2, 3]);
    expect(snapshot.itemIdentifiersInSection('B')).toEqual([4, 5]);
  });

  it('flags duplicate items within a batch', () => {
    expect(errorCodeOf(() => build().appendItems([7, 7], 'A'))).toBe(ErrorCode.DUPLICATE_ITEM);
  });

  it('flags items already present once the reverse index exists', () => {
    const snapshot = build();
    snapshot.insertItemsAfter([6], 5);
    expect(errorCodeOf(() => snapshot.appendItems([1], 'B'))).toBe(ErrorCode.DUPLICATE_ITEM);
  });

  it('skips duplicate checks with assertions off', () => {
    configureAssertions(false);
    const snapshot = build();
    snapshot.appendItems([7, 7], 'A');
    expect(snapshot.numberOfItemsInSection('A')).toBe(5);
  });
});

describe('Snapshot reverse index', () => {
  it('is not built by appends or by lookups', () => {
    const snapshot = build();
    expect(snapshot.sectionIdentifierContaining(4)).toBe('B');
    expect(snapshot.containsItem(99)).toBe(false);
    expect(snapshot.reverseIndexStatus).toBe('absent');
  });

  it('is built by anchored inserts and kept current by appends', () => {
    const snapshot = build();
    snapshot.insertItemsAfter([9], 1);
    expect(snapshot.reverseIndexStatus).toBe('present');
    snapshot.appendItems([10], 'B');
    expect(snapshot.sectionIdentifierContaining(10)).toBe('B');
    expect(snapshot.sectionIdentifierContaining(9)).toBe('A');
  });

  it('is dropped by deletes', () => {
    const snapshot = build();
    snapshot.insertItemsAfter([9], 1);
    snapshot.deleteItems([9]);
    expect(snapshot.reverseIndexStatus).toBe('absent');
    expect(snapshot.itemIdentifiersInSection('A')).toEqual([1, 2, 3]);
    expect(snapshot.numberOfItems).toBe(5);

    snapshot.moveItemBefore(3, 1);
    expect(snapshot.reverseIndexStatus).toBe('present');
    snapshot.deleteAllItems();
    expect(snapshot.reverseIndexStatus).toBe('absent');
  });

  it('is not copied by clone', () => {
    const snapshot = build();
    snapshot.insertItemsAfter([9], 1);
    expect(snapshot.clone().reverseIndexStatus).toBe('absent');
  });
});

describe('Snapshot queries', () => {
  it('answers positional lookups and returns undefined out of range', () => {
    const snapshot = build();
    expect(snapshot.itemIdentifierAt(1, 1)).toBe(5);
    expect(snapshot.itemIdentifierAt(0, 3)).toBeUndefined();
    expect(snapshot.itemIdentifierAt(0, -1)).toBeUndefined();
    expect(snapshot.itemIdentifierAt(5, 0)).toBeUndefined();
    expect(snapshot.sectionIdentifierAt(1)).toBe('B');
    expect(snapshot.sectionIdentifierAt(2)).toBeUndefined();
    expect(snapshot.indexOfSection('Q')).toBeUndefined();
    expect(snapshot.numberOfItemsInSectionAt(1)).toBe(2);
    expect(snapshot.numberOfItemsInSectionAt(7)).toBe(0);
    expect(snapshot.itemIdentifiersInSectionAt(7)).toEqual([]);
  });

  it('locates items by flat index and by path', () => {
    const snapshot = build();
    expect(snapshot.indexOfItem(4)).toBe(3);
    expect(snapshot.indexOfItem(99)).toBeUndefined();
    expect(snapshot.indexPathOfItem(3)).toEqual({ section: 0, item: 2 });
    expect(snapshot.indexPathOfItem(99)).toBeUndefined();
    expect(snapshot.containsSection('A')).toBe(true);
  });

  it('compares items through the key function', () => {
    interface Row {
      id: number;
      title: string;
    }
    const snapshot = new Snapshot<string, Row>({ itemKey: (row) => row.id });
    snapshot.appendSections(['main']);
    snapshot.appendItems([
      { id: 1, title: 'one' },
      { id: 2, title: 'two' }
    ]);
    expect(snapshot.containsItem({ id: 2, title: 'renamed' })).toBe(true);
    expect(snapshot.indexOfItem({ id: 2, title: 'renamed' })).toBe(1);
  });
});

describe('Snapshot markers', () => {
  it('records reloads and reconfigures without touching structure', () => {
    const snapshot = build();
    snapshot.reloadItems([2]);
    snapshot.reconfigureItems([3]);
    snapshot.reloadSections(['B']);
    expect(snapshot.hasMarkers).toBe(true);
    expect(snapshot.reloadedItemIdentifiers).toEqual([2]);
    expect(snapshot.reconfiguredItemIdentifiers).toEqual([3]);
    expect(snapshot.reloadedSectionIdentifiers).toEqual(['B']);
    expect(snapshot.isItemReloaded(2)).toBe(true);
    expect(snapshot.isItemReconfigured(2)).toBe(false);
    expect(snapshot.isSectionReloaded('B')).toBe(true);
    expect(snapshot.itemIdentifiers).toEqual([1, 2, 3, 4, 5]);
  });

  it('drops markers only on the copy from withoutMarkers', () => {
    const snapshot = build();
    snapshot.reloadItems([2]);
    const bare = snapshot.withoutMarkers();
    expect(bare.hasMarkers).toBe(false);
    expect(bare.itemIdentifiers).toEqual([1, 2, 3, 4, 5]);
    expect(snapshot.hasMarkers).toBe(true);
  });

  it('clones independently', () => {
    const snapshot = build();
    const copy = snapshot.clone();
    copy.appendItems([6], 'A');
    copy.reloadItems([1]);
    expect(snapshot.itemIdentifiersInSection('A')).toEqual([1, 2, 3]);
    expect(snapshot.hasMarkers).toBe(false);
    expect(copy.numberOfItems).toBe(6);
  });
});

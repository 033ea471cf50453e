import type { IndexPath } from '../types/changeset.js';
import { ErrorCode } from '../types/enums.js';
import { identityKey, sameKey, type Key, type KeyFn } from '../types/keys.js';
import { invariant, precondition } from '../utils/invariant.js';
import { createLogger } from '../utils/log.js';
import { ReverseIndex } from './reverseIndex.js';

const log = createLogger('snapshot');

export interface SnapshotOptions<S, I> {
  /** Identity of a section; defaults to the section value itself. */
  sectionKey?: KeyFn<S>;
  /** Identity of an item; defaults to the item value itself. */
  itemKey?: KeyFn<I>;
}

/**
 * Ordered sections, each owning an ordered list of items.
 *
 * An item identity may appear in at most one section. Item arrays are kept parallel to
 * the section list, so positional queries never hash. Reload and reconfigure markers
 * are bookkeeping carried into the next changeset; they do not change structure.
 */
export class Snapshot<S, I> {
  readonly sectionKey: KeyFn<S>;
  readonly itemKey: KeyFn<I>;

  private sections: S[] = [];
  private sectionItems: I[][] = [];
  private sectionIndex = new Map<Key, number>();
  private readonly reverse = new ReverseIndex<S>();
  private itemCount = 0;

  private reloadedItems = new Map<Key, I>();
  private reconfiguredItems = new Map<Key, I>();
  private reloadedSections = new Map<Key, S>();

  constructor(options: SnapshotOptions<S, I> = {}) {
    this.sectionKey = options.sectionKey ?? identityKey;
    this.itemKey = options.itemKey ?? identityKey;
  }

  /** Independent copy. The reverse index is not carried over; it rebuilds on demand. */
  clone(): Snapshot<S, I> {
    const copy = new Snapshot<S, I>({ sectionKey: this.sectionKey, itemKey: this.itemKey });
    copy.sections = [...this.sections];
    copy.sectionItems = this.sectionItems.map((items) => [...items]);
    copy.sectionIndex = new Map(this.sectionIndex);
    copy.itemCount = this.itemCount;
    copy.reloadedItems = new Map(this.reloadedItems);
    copy.reconfiguredItems = new Map(this.reconfiguredItems);
    copy.reloadedSections = new Map(this.reloadedSections);
    return copy;
  }

  /** Same structure, without reload or reconfigure markers. */
  withoutMarkers(): Snapshot<S, I> {
    const copy = this.clone();
    copy.clearMarkers();
    return copy;
  }

  clearMarkers(): void {
    this.reloadedItems.clear();
    this.reconfiguredItems.clear();
    this.reloadedSections.clear();
  }

  // --- Sections -----------------------------------------------------------

  appendSections(sections: readonly S[]): void {
    for (const section of sections) {
      const key = this.sectionKey(section);
      invariant(!this.sectionIndex.has(key), ErrorCode.DUPLICATE_SECTION, () => `Section ${String(key)} already exists`);
      this.sectionIndex.set(key, this.sections.length);
      this.sections.push(section);
      this.sectionItems.push([]);
    }
  }

  insertSectionsBefore(sections: readonly S[], before: S): void {
    const index = this.sectionIndex.get(this.sectionKey(before));
    if (index === undefined) return;
    this.spliceSections(index, sections);
  }

  insertSectionsAfter(sections: readonly S[], after: S): void {
    const index = this.sectionIndex.get(this.sectionKey(after));
    if (index === undefined) return;
    this.spliceSections(index + 1, sections);
  }

  deleteSections(sections: readonly S[]): void {
    const doomed = new Set<number>();
    for (const section of sections) {
      const index = this.sectionIndex.get(this.sectionKey(section));
      if (index === undefined || doomed.has(index)) continue;
      doomed.add(index);
      const items = this.sectionItems[index];
      this.itemCount -= items.length;
      for (const item of items) {
        this.reverse.delete(this.itemKey(item));
      }
    }
    if (doomed.size === 0) return;
    this.sections = this.sections.filter((_, index) => !doomed.has(index));
    this.sectionItems = this.sectionItems.filter((_, index) => !doomed.has(index));
    this.rebuildSectionIndex();
  }

  moveSectionBefore(section: S, before: S): void {
    this.moveSection(section, before, 0);
  }

  moveSectionAfter(section: S, after: S): void {
    this.moveSection(section, after, 1);
  }

  reloadSections(sections: readonly S[]): void {
    for (const section of sections) {
      this.reloadedSections.set(this.sectionKey(section), section);
    }
  }

  // --- Items --------------------------------------------------------------

  /**
   * Appends to `toSection`, or to the last section when omitted.
   *
   * Appending without any target section is a caller error and always throws. Duplicate
   * identities are only caught while assertions are on, and across sections only when the
   * reverse index happens to be built already.
   */
  appendItems(items: readonly I[], toSection?: S): void {
    const index =
      toSection === undefined
        ? this.sections.length > 0
          ? this.sections.length - 1
          : undefined
        : this.sectionIndex.get(this.sectionKey(toSection));
    precondition(index !== undefined, ErrorCode.NO_SECTION, () =>
      toSection === undefined ? 'No section available to append items' : `Section ${String(this.sectionKey(toSection))} does not exist`
    );
    const section = this.sections[index];
    this.assertNoDuplicates(items);

    const target = this.sectionItems[index];
    for (const item of items) {
      target.push(item);
      this.reverse.set(this.itemKey(item), section);
    }
    this.itemCount += items.length;
  }

  insertItemsBefore(items: readonly I[], before: I): void {
    this.insertItems(items, before, 0);
  }

  insertItemsAfter(items: readonly I[], after: I): void {
    this.insertItems(items, after, 1);
  }

  deleteItems(items: readonly I[]): void {
    if (items.length === 0) return;
    const doomed = new Set<Key>(items.map(this.itemKey));
    let remaining = doomed.size;
    for (let s = 0; s < this.sectionItems.length && remaining > 0; s += 1) {
      const before = this.sectionItems[s].length;
      const kept = this.sectionItems[s].filter((item) => !doomed.has(this.itemKey(item)));
      const removed = before - kept.length;
      if (removed === 0) continue;
      this.sectionItems[s] = kept;
      this.itemCount -= removed;
      remaining -= removed;
    }
    this.reverse.invalidate();
  }

  deleteAllItems(): void {
    this.sectionItems = this.sectionItems.map(() => []);
    this.itemCount = 0;
    this.reverse.invalidate();
  }

  moveItemBefore(item: I, before: I): void {
    this.moveItem(item, before, 0);
  }

  moveItemAfter(item: I, after: I): void {
    this.moveItem(item, after, 1);
  }

  reloadItems(items: readonly I[]): void {
    for (const item of items) {
      this.reloadedItems.set(this.itemKey(item), item);
    }
  }

  reconfigureItems(items: readonly I[]): void {
    for (const item of items) {
      this.reconfiguredItems.set(this.itemKey(item), item);
    }
  }

  // --- Queries ------------------------------------------------------------

  get sectionIdentifiers(): readonly S[] {
    return this.sections;
  }

  get numberOfSections(): number {
    return this.sections.length;
  }

  get numberOfItems(): number {
    return this.itemCount;
  }

  /** Every item, in section order. */
  get itemIdentifiers(): I[] {
    const out: I[] = [];
    for (const items of this.sectionItems) {
      for (const item of items) out.push(item);
    }
    return out;
  }

  get reloadedItemIdentifiers(): I[] {
    return [...this.reloadedItems.values()];
  }

  get reconfiguredItemIdentifiers(): I[] {
    return [...this.reconfiguredItems.values()];
  }

  get reloadedSectionIdentifiers(): S[] {
    return [...this.reloadedSections.values()];
  }

  get hasMarkers(): boolean {
    return this.reloadedItems.size > 0 || this.reconfiguredItems.size > 0 || this.reloadedSections.size > 0;
  }

  isItemReloaded(item: I): boolean {
    return this.reloadedItems.has(this.itemKey(item));
  }

  isItemReconfigured(item: I): boolean {
    return this.reconfiguredItems.has(this.itemKey(item));
  }

  isSectionReloaded(section: S): boolean {
    return this.reloadedSections.has(this.sectionKey(section));
  }

  /** Reverse-index state, exposed for diagnostics. */
  get reverseIndexStatus(): 'absent' | 'building' | 'present' {
    return this.reverse.status;
  }

  itemIdentifiersInSection(section: S): readonly I[] {
    const index = this.sectionIndex.get(this.sectionKey(section));
    return index === undefined ? [] : this.sectionItems[index];
  }

  itemIdentifiersInSectionAt(sectionIndex: number): readonly I[] {
    return this.sectionItems[sectionIndex] ?? [];
  }

  numberOfItemsInSection(section: S): number {
    return this.itemIdentifiersInSection(section).length;
  }

  numberOfItemsInSectionAt(sectionIndex: number): number {
    return this.sectionItems[sectionIndex]?.length ?? 0;
  }

  itemIdentifierAt(sectionIndex: number, itemIndex: number): I | undefined {
    const items = this.sectionItems[sectionIndex];
    if (!items || itemIndex < 0 || itemIndex >= items.length) return undefined;
    return items[itemIndex];
  }

  sectionIdentifierAt(index: number): S | undefined {
    if (index < 0 || index >= this.sections.length) return undefined;
    return this.sections[index];
  }

  indexOfSection(section: S): number | undefined {
    return this.sectionIndex.get(this.sectionKey(section));
  }

  containsSection(section: S): boolean {
    return this.sectionIndex.has(this.sectionKey(section));
  }

  /** Uses the reverse index when built; otherwise a linear scan that leaves it unbuilt. */
  sectionIdentifierContaining(item: I): S | undefined {
    const key = this.itemKey(item);
    const map = this.reverse.peek();
    if (map) return map.get(key);
    for (let s = 0; s < this.sectionItems.length; s += 1) {
      if (this.findItem(this.sectionItems[s], key) !== -1) return this.sections[s];
    }
    return undefined;
  }

  containsItem(item: I): boolean {
    return this.sectionIdentifierContaining(item) !== undefined;
  }

  /** Position across all sections, as in `itemIdentifiers`. */
  indexOfItem(item: I): number | undefined {
    const key = this.itemKey(item);
    let offset = 0;
    for (const items of this.sectionItems) {
      const local = this.findItem(items, key);
      if (local !== -1) return offset + local;
      offset += items.length;
    }
    return undefined;
  }

  indexPathOfItem(item: I): IndexPath | undefined {
    const key = this.itemKey(item);
    for (let s = 0; s < this.sectionItems.length; s += 1) {
      const local = this.findItem(this.sectionItems[s], key);
      if (local !== -1) return { section: s, item: local };
    }
    return undefined;
  }

  // --- Internals ----------------------------------------------------------

  private spliceSections(at: number, sections: readonly S[]): void {
    for (const section of sections) {
      const key = this.sectionKey(section);
      invariant(!this.sectionIndex.has(key), ErrorCode.DUPLICATE_SECTION, () => `Section ${String(key)} already exists`);
    }
    this.sections.splice(at, 0, ...sections);
    this.sectionItems.splice(at, 0, ...sections.map((): I[] => []));
    this.rebuildSectionIndex();
  }

  private moveSection(section: S, anchor: S, offset: 0 | 1): void {
    const from = this.sectionIndex.get(this.sectionKey(section));
    const to = this.sectionIndex.get(this.sectionKey(anchor));
    if (from === undefined || to === undefined || from === to) return;
    const [moved] = this.sections.splice(from, 1);
    const [items] = this.sectionItems.splice(from, 1);
    const anchorIndex = from < to ? to - 1 : to;
    this.sections.splice(anchorIndex + offset, 0, moved);
    this.sectionItems.splice(anchorIndex + offset, 0, items);
    this.rebuildSectionIndex();
  }

  private insertItems(items: readonly I[], anchor: I, offset: 0 | 1): void {
    const map = this.ensureReverseIndex();
    const section = map.get(this.itemKey(anchor));
    if (section === undefined) return;
    const s = this.sectionIndex.get(this.sectionKey(section));
    if (s === undefined) return;
    const position = this.findItem(this.sectionItems[s], this.itemKey(anchor));
    if (position === -1) return;
    this.assertNoDuplicates(items);

    this.sectionItems[s].splice(position + offset, 0, ...items);
    for (const item of items) {
      map.set(this.itemKey(item), section);
    }
    this.itemCount += items.length;
  }

  /**
   * Moves `item` next to `anchor`, possibly into another section. The destination is
   * resolved before the item leaves its source, so an unknown anchor leaves the snapshot
   * untouched.
   */
  private moveItem(item: I, anchor: I, offset: 0 | 1): void {
    const itemKey = this.itemKey(item);
    const anchorKey = this.itemKey(anchor);
    if (sameKey(itemKey, anchorKey)) return;
    const map = this.ensureReverseIndex();
    const fromSection = map.get(itemKey);
    const toSection = map.get(anchorKey);
    if (fromSection === undefined || toSection === undefined) return;
    const fromS = this.sectionIndex.get(this.sectionKey(fromSection));
    const toS = this.sectionIndex.get(this.sectionKey(toSection));
    if (fromS === undefined || toS === undefined) return;
    const fromIndex = this.findItem(this.sectionItems[fromS], itemKey);
    if (fromIndex === -1 || this.findItem(this.sectionItems[toS], anchorKey) === -1) return;

    const [moved] = this.sectionItems[fromS].splice(fromIndex, 1);
    const anchorIndex = this.findItem(this.sectionItems[toS], anchorKey);
    this.sectionItems[toS].splice(anchorIndex + offset, 0, moved);
    map.set(itemKey, toSection);
  }

  private ensureReverseIndex(): Map<Key, S> {
    const before = this.reverse.buildCount;
    const map = this.reverse.ensure(() => this.reverseEntries());
    if (this.reverse.buildCount !== before) {
      log('rebuilt reverse index (%d items)', map.size);
    }
    return map;
  }

  private *reverseEntries(): Generator<readonly [Key, S]> {
    for (let s = 0; s < this.sections.length; s += 1) {
      const section = this.sections[s];
      for (const item of this.sectionItems[s]) {
        yield [this.itemKey(item), section];
      }
    }
  }

  private assertNoDuplicates(items: readonly I[]): void {
    if (items.length > 1) {
      const seen = new Set<Key>();
      for (const item of items) {
        const key = this.itemKey(item);
        invariant(!seen.has(key), ErrorCode.DUPLICATE_ITEM, () => `Duplicate item ${String(key)} in batch`);
        seen.add(key);
      }
    }
    const map = this.reverse.peek();
    if (!map) return;
    for (const item of items) {
      const key = this.itemKey(item);
      invariant(!map.has(key), ErrorCode.DUPLICATE_ITEM, () => `Item ${String(key)} already exists in a section`);
    }
  }

  private findItem(items: readonly I[], key: Key): number {
    for (let i = 0; i < items.length; i += 1) {
      if (sameKey(this.itemKey(items[i]), key)) return i;
    }
    return -1;
  }

  private rebuildSectionIndex(): void {
    this.sectionIndex.clear();
    for (let i = 0; i < this.sections.length; i += 1) {
      this.sectionIndex.set(this.sectionKey(this.sections[i]), i);
    }
  }
}

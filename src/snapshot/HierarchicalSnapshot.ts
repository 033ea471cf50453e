import { ErrorCode } from '../types/enums.js';
import { identityKey, sameKey, type Key, type KeyFn } from '../types/keys.js';
import { invariant } from '../utils/invariant.js';

export interface HierarchicalSnapshotOptions<I> {
  itemKey?: KeyFn<I>;
}

/**
 * A single section shaped as a forest.
 *
 * `items` holds every node in depth-first order, including nodes hidden under collapsed
 * ancestors; that list is the canonical order. Parent and children maps describe
 * immediate relationships only and are kept as inverses of each other.
 */
export class HierarchicalSnapshot<I> {
  readonly itemKey: KeyFn<I>;

  private order: I[] = [];
  private readonly members = new Set<Key>();
  private readonly parents = new Map<Key, I>();
  private readonly childLists = new Map<Key, I[]>();
  private readonly expanded = new Set<Key>();

  constructor(options: HierarchicalSnapshotOptions<I> = {}) {
    this.itemKey = options.itemKey ?? identityKey;
  }

  // --- Mutations ----------------------------------------------------------

  /**
   * Appends `items` as roots, or as the last children of `parent`. Children land right
   * after the parent's current subtree. An unknown parent leaves the snapshot unchanged.
   */
  append(items: readonly I[], parent?: I): void {
    this.assertAbsent(items);
    if (parent === undefined) {
      this.adopt(items);
      this.order.push(...items);
      return;
    }
    const parentKey = this.itemKey(parent);
    if (!this.members.has(parentKey)) return;
    const at = this.subtreeEnd(this.indexOf(parentKey));
    this.adopt(items, parent);
    this.childList(parentKey).push(...items);
    this.order.splice(at, 0, ...items);
  }

  /** Inserts `items` as siblings directly before `sibling`. */
  insertBefore(items: readonly I[], sibling: I): void {
    this.insertSiblings(items, sibling, 'before');
  }

  /** Inserts `items` as siblings directly after `sibling` and its whole subtree. */
  insertAfter(items: readonly I[], sibling: I): void {
    this.insertSiblings(items, sibling, 'after');
  }

  /** Removes each item together with its whole subtree. */
  delete(items: readonly I[]): void {
    const removed = new Set<Key>();
    for (const item of items) {
      const key = this.itemKey(item);
      if (!this.members.has(key) || removed.has(key)) continue;
      const parent = this.parents.get(key);
      if (parent !== undefined) {
        const parentKey = this.itemKey(parent);
        const siblings = this.childLists.get(parentKey);
        if (siblings) {
          const index = siblings.findIndex((child) => sameKey(this.itemKey(child), key));
          if (index !== -1) siblings.splice(index, 1);
          if (siblings.length === 0) this.childLists.delete(parentKey);
        }
      }
      const stack: Key[] = [key];
      while (stack.length > 0) {
        const current = stack.pop();
        removed.add(current);
        for (const child of this.childLists.get(current) ?? []) {
          stack.push(this.itemKey(child));
        }
        this.members.delete(current);
        this.parents.delete(current);
        this.childLists.delete(current);
        this.expanded.delete(current);
      }
    }
    if (removed.size === 0) return;
    this.order = this.order.filter((item) => !removed.has(this.itemKey(item)));
  }

  expand(items: readonly I[]): void {
    for (const item of items) {
      const key = this.itemKey(item);
      if (this.members.has(key)) this.expanded.add(key);
    }
  }

  collapse(items: readonly I[]): void {
    for (const item of items) {
      this.expanded.delete(this.itemKey(item));
    }
  }

  // --- Queries ------------------------------------------------------------

  /** Every node, depth-first, whether visible or not. */
  get items(): readonly I[] {
    return this.order;
  }

  get rootItems(): I[] {
    return this.order.filter((item) => !this.parents.has(this.itemKey(item)));
  }

  /**
   * Nodes reachable from a root through expanded ancestors only, depth-first.
   *
   * One pass: parents precede their descendants in `items`, so a node is visible iff it
   * is a root or its parent was already seen as visible and is expanded.
   */
  get visibleItems(): I[] {
    const open = new Set<Key>();
    const out: I[] = [];
    for (const item of this.order) {
      const key = this.itemKey(item);
      const parent = this.parents.get(key);
      if (parent !== undefined && !open.has(this.itemKey(parent))) continue;
      out.push(item);
      if (this.expanded.has(key)) open.add(key);
    }
    return out;
  }

  contains(item: I): boolean {
    return this.members.has(this.itemKey(item));
  }

  parent(item: I): I | undefined {
    return this.parents.get(this.itemKey(item));
  }

  children(item: I): readonly I[] {
    return this.childLists.get(this.itemKey(item)) ?? [];
  }

  /** Distance to the root; 0 for roots and for unknown items. */
  level(item: I): number {
    let level = 0;
    let current = this.parents.get(this.itemKey(item));
    while (current !== undefined) {
      level += 1;
      current = this.parents.get(this.itemKey(current));
    }
    return level;
  }

  isExpanded(item: I): boolean {
    return this.expanded.has(this.itemKey(item));
  }

  isVisible(item: I): boolean {
    let current = this.parents.get(this.itemKey(item));
    while (current !== undefined) {
      const key = this.itemKey(current);
      if (!this.expanded.has(key)) return false;
      current = this.parents.get(key);
    }
    return true;
  }

  /**
   * Copies the subtree under `item` into a new snapshot; with `includingParent` the item
   * itself becomes the new root. Parent links that would point outside the copy are
   * dropped, so copied top-level nodes are roots of the new instance.
   */
  snapshotOf(item: I, includingParent = false): HierarchicalSnapshot<I> {
    const copy = new HierarchicalSnapshot<I>({ itemKey: this.itemKey });
    const rootKey = this.itemKey(item);
    if (!this.members.has(rootKey)) return copy;

    const start = this.indexOf(rootKey);
    const end = this.subtreeEnd(start);
    copy.order = this.order.slice(includingParent ? start : start + 1, end);
    for (const node of copy.order) {
      copy.members.add(this.itemKey(node));
    }
    for (const node of copy.order) {
      const key = this.itemKey(node);
      const parent = this.parents.get(key);
      if (parent !== undefined && copy.members.has(this.itemKey(parent))) {
        copy.parents.set(key, parent);
      }
      const children = this.childLists.get(key);
      if (children) copy.childLists.set(key, [...children]);
      if (this.expanded.has(key)) copy.expanded.add(key);
    }
    return copy;
  }

  // --- Internals ----------------------------------------------------------

  private insertSiblings(items: readonly I[], sibling: I, where: 'before' | 'after'): void {
    const siblingKey = this.itemKey(sibling);
    if (!this.members.has(siblingKey)) return;
    this.assertAbsent(items);
    const index = this.indexOf(siblingKey);
    const at = where === 'before' ? index : this.subtreeEnd(index);
    const parent = this.parents.get(siblingKey);
    this.adopt(items, parent);
    if (parent !== undefined) {
      const siblings = this.childList(this.itemKey(parent));
      const position = siblings.findIndex((child) => sameKey(this.itemKey(child), siblingKey));
      siblings.splice(where === 'before' ? position : position + 1, 0, ...items);
    }
    this.order.splice(at, 0, ...items);
  }

  private adopt(items: readonly I[], parent?: I): void {
    for (const item of items) {
      const key = this.itemKey(item);
      this.members.add(key);
      if (parent !== undefined) this.parents.set(key, parent);
    }
  }

  private childList(key: Key): I[] {
    let list = this.childLists.get(key);
    if (!list) {
      list = [];
      this.childLists.set(key, list);
    }
    return list;
  }

  private indexOf(key: Key): number {
    return this.order.findIndex((item) => sameKey(this.itemKey(item), key));
  }

  /** Index one past the last descendant of the node at `index`. */
  private subtreeEnd(index: number): number {
    const ancestorKey = this.itemKey(this.order[index]);
    let end = index + 1;
    while (end < this.order.length && this.isDescendant(this.order[end], ancestorKey)) {
      end += 1;
    }
    return end;
  }

  private isDescendant(item: I, ancestorKey: Key): boolean {
    let current = this.parents.get(this.itemKey(item));
    while (current !== undefined) {
      const key = this.itemKey(current);
      if (sameKey(key, ancestorKey)) return true;
      current = this.parents.get(key);
    }
    return false;
  }

  private assertAbsent(items: readonly I[]): void {
    const batch = new Set<Key>();
    for (const item of items) {
      const key = this.itemKey(item);
      invariant(!this.members.has(key) && !batch.has(key), ErrorCode.DUPLICATE_ITEM, () => `Item ${String(key)} already exists in the tree`);
      batch.add(key);
    }
  }
}

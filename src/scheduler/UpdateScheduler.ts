import { resolveSchedulerOptions, type ResolvedSchedulerOptions, type UpdateSchedulerOptions } from '../config.js';
import { isChangesetEmpty, changesetSize } from '../reconcile/changeset.js';
import { flattenIntoSection } from '../reconcile/flatten.js';
import { reconcile } from '../reconcile/reconcile.js';
import { autoReconfigure } from '../reconcile/reconfigure.js';
import { HierarchicalSnapshot } from '../snapshot/HierarchicalSnapshot.js';
import { Snapshot } from '../snapshot/Snapshot.js';
import type { IndexPath, StagedChangeset } from '../types/changeset.js';
import { ApplyOutcome, ErrorCode } from '../types/enums.js';
import { ListDiffError } from '../types/error.js';
import { createLogger } from '../utils/log.js';
import { deferredExecutor, inlineExecutor, type DiffExecutor } from './executor.js';

const log = createLogger('scheduler');

export interface SnapshotTransition<S, I> {
  previous: Snapshot<S, I>;
  next: Snapshot<S, I>;
}

/**
 * The rendering surface. Every method is only ever called from the scheduler's apply
 * pipeline, one transition at a time.
 */
export interface RenderTarget<S, I> {
  /**
   * Applies structural changes, then reloads and reconfigures. Deletes and move sources
   * refer to `previous`; everything else refers to `next`.
   */
  performBatchUpdates(changeset: StagedChangeset, transition: SnapshotTransition<S, I>): void | Promise<void>;
  /** Discards everything rendered and redraws from `snapshot`. */
  reloadData(snapshot: Snapshot<S, I>): void | Promise<void>;
  /** When present and false, transitions are dropped without touching state. */
  isAttached?(): boolean;
}

export interface ApplyOptions {
  animate?: boolean;
}

export interface UpdateSchedulerInit<S, I> extends UpdateSchedulerOptions<I> {
  initial?: Snapshot<S, I>;
}

/**
 * Serializes transitions of one render target from its current snapshot to new ones.
 *
 * Requests run strictly in issuance order on a promise chain. Each request takes a
 * generation number; a request that is no longer the latest when it reaches the head
 * of the chain, or when its diff completes, is dropped as superseded (with `coalesce`
 * on). The recorded snapshot only advances after the target accepted a changeset, so a
 * dropped or failed transition leaves it at the last fully applied state.
 */
export class UpdateScheduler<S, I> {
  private readonly options: ResolvedSchedulerOptions<I>;
  private readonly inline: DiffExecutor;
  private readonly background: DiffExecutor;
  private current: Snapshot<S, I>;
  private tail: Promise<void> = Promise.resolve();
  private generation = 0;
  private cancelledThrough = 0;
  private pending = 0;
  private idleResolvers: Array<() => void> = [];

  constructor(
    private readonly target: RenderTarget<S, I>,
    init: UpdateSchedulerInit<S, I> = {}
  ) {
    const { initial, ...options } = init;
    this.options = resolveSchedulerOptions(options);
    this.inline = this.options.inlineExecutor ?? inlineExecutor;
    this.background = this.options.backgroundExecutor ?? deferredExecutor;
    this.current = initial ? initial.withoutMarkers() : new Snapshot<S, I>();
  }

  /** Diffs `snapshot` against the current state and hands the changeset to the target. */
  apply(snapshot: Snapshot<S, I>, options: ApplyOptions = {}): Promise<ApplyOutcome> {
    const next = snapshot.clone();
    const animate = options.animate ?? this.options.animate;
    const token = ++this.generation;
    return this.enqueue(() => this.performApply(next, animate, token));
  }

  /** Replaces the current state without diffing. */
  applyUsingReloadData(snapshot: Snapshot<S, I>): Promise<ApplyOutcome> {
    const next = snapshot.withoutMarkers();
    const token = ++this.generation;
    return this.enqueue(async () => {
      if (this.isStale(token)) return this.finish(token, ApplyOutcome.SUPERSEDED);
      if (!this.attached()) return this.finish(token, ApplyOutcome.DETACHED);
      await this.target.reloadData(next);
      this.current = next;
      return this.finish(token, ApplyOutcome.APPLIED);
    });
  }

  /**
   * Replaces the items of `section` with the visible items of `tree`, diffed against the
   * state current when this request runs. `tree` is read at call time. Rejects for a
   * section that state lacks.
   */
  applySectionSnapshot(tree: HierarchicalSnapshot<I>, section: S, options: ApplyOptions = {}): Promise<ApplyOutcome> {
    const animate = options.animate ?? this.options.animate;
    const visible = new HierarchicalSnapshot<I>({ itemKey: tree.itemKey });
    visible.append(tree.visibleItems);
    const token = ++this.generation;
    return this.enqueue(async () => {
      if (this.isStale(token)) return this.finish(token, ApplyOutcome.SUPERSEDED);
      const next = flattenIntoSection(visible, section, this.current);
      if (!next) {
        throw new ListDiffError(ErrorCode.SECTION_NOT_FOUND, `Section ${String(this.current.sectionKey(section))} does not exist`);
      }
      return this.performApply(next, animate, token);
    });
  }

  /** Marks every request that has not committed yet as superseded. */
  cancel(): void {
    this.cancelledThrough = this.generation;
    log('cancel: generations up to %d dropped', this.generation);
  }

  /** Resolves once every request issued so far has settled. */
  awaitIdle(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleResolvers.push(resolve);
    });
  }

  /** Copy of the last fully applied snapshot. */
  snapshot(): Snapshot<S, I> {
    return this.current.clone();
  }

  /** A flat tree holding the current items of `section`, all as roots. */
  sectionSnapshot(section: S): HierarchicalSnapshot<I> {
    const tree = new HierarchicalSnapshot<I>({ itemKey: this.current.itemKey });
    tree.append(this.current.itemIdentifiersInSection(section));
    return tree;
  }

  itemIdentifierAt(path: IndexPath): I | undefined {
    return this.current.itemIdentifierAt(path.section, path.item);
  }

  indexPathOf(item: I): IndexPath | undefined {
    return this.current.indexPathOfItem(item);
  }

  sectionIdentifierAt(index: number): S | undefined {
    return this.current.sectionIdentifierAt(index);
  }

  indexOfSection(section: S): number | undefined {
    return this.current.indexOfSection(section);
  }

  get numberOfSections(): number {
    return this.current.numberOfSections;
  }

  numberOfItemsInSectionAt(index: number): number {
    return this.current.numberOfItemsInSectionAt(index);
  }

  // --- Pipeline -----------------------------------------------------------

  private enqueue(job: () => Promise<ApplyOutcome>): Promise<ApplyOutcome> {
    this.pending += 1;
    const run = this.tail.then(job);
    this.tail = run.then(
      () => this.settle(),
      () => this.settle()
    );
    return run;
  }

  private settle(): void {
    this.pending -= 1;
    if (this.pending > 0) return;
    const resolvers = this.idleResolvers;
    this.idleResolvers = [];
    for (const resolve of resolvers) resolve();
  }

  private async performApply(next: Snapshot<S, I>, animate: boolean, token: number): Promise<ApplyOutcome> {
    if (this.isStale(token)) return this.finish(token, ApplyOutcome.SUPERSEDED);
    if (!this.attached()) return this.finish(token, ApplyOutcome.DETACHED);

    const previous = this.current;
    const prepared = this.options.isContentEqual ? autoReconfigure(previous, next, this.options.isContentEqual) : next;
    const large = Math.max(previous.numberOfItems, prepared.numberOfItems) > this.options.backgroundThreshold;
    const executor = large ? this.background : this.inline;
    const changeset = await executor.run(() => reconcile(previous, prepared));

    if (this.isStale(token)) return this.finish(token, ApplyOutcome.SUPERSEDED);
    const settled = prepared.withoutMarkers();
    if (isChangesetEmpty(changeset)) {
      this.current = settled;
      return this.finish(token, ApplyOutcome.NO_CHANGES);
    }
    if (animate) {
      await this.target.performBatchUpdates(changeset, { previous, next: prepared });
    } else {
      await this.target.reloadData(prepared);
    }
    this.current = settled;
    log('generation %d: %d ops (%s)', token, changesetSize(changeset), large ? 'background' : 'inline');
    return this.finish(token, ApplyOutcome.APPLIED);
  }

  private isStale(token: number): boolean {
    if (token <= this.cancelledThrough) return true;
    return this.options.coalesce && token !== this.generation;
  }

  private attached(): boolean {
    return this.target.isAttached ? this.target.isAttached() : true;
  }

  private finish(token: number, outcome: ApplyOutcome): ApplyOutcome {
    if (outcome !== ApplyOutcome.APPLIED) log('generation %d: %s', token, outcome);
    return outcome;
  }
}

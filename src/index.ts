export * from './types/keys.js';
export * from './types/diff.js';
export * from './types/changeset.js';
export * from './types/enums.js';
export * from './types/error.js';
export { diffKeys, emptyDiffResult } from './diff/heckel.js';
export { longestIncreasingSubsequence, minimalMoves, withMinimalMoves } from './diff/lis.js';
export { Snapshot, type SnapshotOptions } from './snapshot/Snapshot.js';
export { HierarchicalSnapshot, type HierarchicalSnapshotOptions } from './snapshot/HierarchicalSnapshot.js';
export { reconcile, diffHierarchical } from './reconcile/reconcile.js';
export {
  emptyChangeset,
  isChangesetEmpty,
  hasStructuralChanges,
  hasMarkerChanges,
  changesetSize
} from './reconcile/changeset.js';
export { itemsToReconfigure, autoReconfigure, type ContentEquality } from './reconcile/reconfigure.js';
export { flattenIntoSection } from './reconcile/flatten.js';
export {
  UpdateScheduler,
  type RenderTarget,
  type SnapshotTransition,
  type ApplyOptions,
  type UpdateSchedulerInit
} from './scheduler/UpdateScheduler.js';
export { inlineExecutor, deferredExecutor, type DiffExecutor } from './scheduler/executor.js';
export {
  resolveSchedulerOptions,
  DEFAULT_BACKGROUND_THRESHOLD,
  type UpdateSchedulerOptions,
  type ResolvedSchedulerOptions
} from './config.js';
export { configureAssertions } from './utils/invariant.js';

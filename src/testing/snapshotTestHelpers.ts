import { Snapshot } from '../snapshot/Snapshot.js';
import type { Rng } from './rngTestHelpers.js';

/** Builds a snapshot from `{ section: items }`, keeping the object's key order. */
export function snapshotOf(layout: Record<string, number[]>): Snapshot<string, number> {
  const snapshot = new Snapshot<string, number>();
  for (const [section, items] of Object.entries(layout)) {
    snapshot.appendSections([section]);
    snapshot.appendItems(items, section);
  }
  return snapshot;
}

const SECTION_POOL = ['S0', 'S1', 'S2', 'S3', 'S4', 'S5'];

/** Random sections from a small pool, each holding random items from `0..itemRange - 1`. */
export function randomSnapshot(rng: Rng, itemRange = 40): Snapshot<string, number> {
  const snapshot = new Snapshot<string, number>();
  const sections = rng.sample(rng.shuffle(SECTION_POOL), 0.6);
  snapshot.appendSections(sections);
  if (sections.length === 0) return snapshot;
  const items = rng.sample(
    rng.shuffle(Array.from({ length: itemRange }, (_, i) => i)),
    0.6
  );
  for (const item of items) {
    snapshot.appendItems([item], sections[rng.int(0, sections.length - 1)]);
  }
  return snapshot;
}

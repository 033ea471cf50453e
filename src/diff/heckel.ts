import type { DiffResult, IndexMatch, IndexMove } from '../types/diff.js';
import { identityKey, sameKey, type Key, type KeyFn } from '../types/keys.js';

/** Occurrence count of a symbol in one of the two sequences. */
type Counter = { kind: 'zero' } | { kind: 'one'; index: number } | { kind: 'many' };

const ZERO: Counter = { kind: 'zero' };
const MANY: Counter = { kind: 'many' };

function increment(counter: Counter, index: number): Counter {
  if (counter.kind === 'zero') return { kind: 'one', index };
  return MANY;
}

interface SymbolEntry {
  oldCounter: Counter;
  newCounter: Counter;
}

/** A slot of the old (OA) or new (NA) working array. */
type ArrayEntry = { kind: 'symbol'; entry: SymbolEntry } | { kind: 'index'; other: number };

export function emptyDiffResult(): DiffResult {
  return { deletes: [], inserts: [], moves: [], matched: [] };
}

function entryFor(table: Map<Key, SymbolEntry>, key: Key): SymbolEntry {
  let entry = table.get(key);
  if (!entry) {
    entry = { oldCounter: ZERO, newCounter: ZERO };
    table.set(key, entry);
  }
  return entry;
}

/**
 * Paul Heckel's six-pass diff over two keyed sequences.
 *
 * Keys occurring exactly once in both sequences anchor the match; runs of equal keys
 * next to an anchor are matched by the forward and backward expansion passes. Keys
 * that occur several times are never anchors, so which duplicate pairs up with which
 * is left to expansion and is not otherwise defined.
 *
 * `moves` reports every match whose index changed; see `minimalMoves` for the
 * reduced set a renderer actually has to animate.
 */
export function diffKeys<T>(old: readonly T[], next: readonly T[], keyOf: KeyFn<T> = identityKey): DiffResult {
  if (old.length === 0 && next.length === 0) {
    return emptyDiffResult();
  }

  const oldKeys = old.map(keyOf);
  const newKeys = next.map(keyOf);
  const table = new Map<Key, SymbolEntry>();
  const na: ArrayEntry[] = new Array(newKeys.length);
  const oa: ArrayEntry[] = new Array(oldKeys.length);

  // Pass 1 + 2: symbol table over new, then old.
  for (let i = 0; i < newKeys.length; i += 1) {
    const entry = entryFor(table, newKeys[i]);
    entry.newCounter = increment(entry.newCounter, i);
    na[i] = { kind: 'symbol', entry };
  }
  for (let i = 0; i < oldKeys.length; i += 1) {
    const entry = entryFor(table, oldKeys[i]);
    entry.oldCounter = increment(entry.oldCounter, i);
    oa[i] = { kind: 'symbol', entry };
  }

  // Pass 3: keys unique in both sequences.
  for (let i = 0; i < na.length; i += 1) {
    const slot = na[i];
    if (slot.kind !== 'symbol') continue;
    const { oldCounter, newCounter } = slot.entry;
    if (oldCounter.kind === 'one' && newCounter.kind === 'one' && newCounter.index === i) {
      na[i] = { kind: 'index', other: oldCounter.index };
      oa[oldCounter.index] = { kind: 'index', other: i };
    }
  }

  // Pass 4: forward expansion.
  for (let i = 0; i < na.length - 1; i += 1) {
    const slot = na[i];
    if (slot.kind !== 'index') continue;
    const j = slot.other + 1;
    if (j >= oa.length) continue;
    if (na[i + 1].kind === 'symbol' && oa[j].kind === 'symbol' && sameKey(newKeys[i + 1], oldKeys[j])) {
      na[i + 1] = { kind: 'index', other: j };
      oa[j] = { kind: 'index', other: i + 1 };
    }
  }

  // Pass 5: backward expansion.
  for (let i = na.length - 1; i > 0; i -= 1) {
    const slot = na[i];
    if (slot.kind !== 'index') continue;
    const j = slot.other - 1;
    if (j < 0) continue;
    if (na[i - 1].kind === 'symbol' && oa[j].kind === 'symbol' && sameKey(newKeys[i - 1], oldKeys[j])) {
      na[i - 1] = { kind: 'index', other: j };
      oa[j] = { kind: 'index', other: i - 1 };
    }
  }

  // Pass 6: collect.
  const deletes: number[] = [];
  const inserts: number[] = [];
  const moves: IndexMove[] = [];
  const matched: IndexMatch[] = [];
  for (let i = 0; i < oa.length; i += 1) {
    if (oa[i].kind === 'symbol') deletes.push(i);
  }
  for (let i = 0; i < na.length; i += 1) {
    const slot = na[i];
    if (slot.kind === 'symbol') {
      inserts.push(i);
      continue;
    }
    matched.push({ old: slot.other, new: i });
    if (slot.other !== i) {
      moves.push({ from: slot.other, to: i });
    }
  }

  return { deletes, inserts, moves, matched };
}

/** Identity value of an element. Keys are compared with `Map` semantics (SameValueZero). */
export type Key = unknown;

/** Maps an element to the value its identity is decided by. */
export type KeyFn<T> = (value: T) => Key;

export function identityKey<T>(value: T): Key {
  return value;
}

/** SameValueZero, the comparison `Map` uses for its keys. */
export function sameKey(a: Key, b: Key): boolean {
  return a === b || (a !== a && b !== b);
}

export interface IndexMove {
  from: number;
  to: number;
}

export interface IndexMatch {
  old: number;
  new: number;
}

export interface DiffResult {
  /** Old-sequence indices, ascending. */
  deletes: number[];
  /** New-sequence indices, ascending. */
  inserts: number[];
  /** Matched elements whose old index differs from their new index. */
  moves: IndexMove[];
  /** Every identity match, unmoved ones included. */
  matched: IndexMatch[];
}

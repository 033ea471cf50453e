export enum ErrorCode {
  NO_SECTION = 'NO_SECTION',
  SECTION_NOT_FOUND = 'SECTION_NOT_FOUND',
  DUPLICATE_ITEM = 'DUPLICATE_ITEM',
  DUPLICATE_SECTION = 'DUPLICATE_SECTION',
  INVALID_OPTIONS = 'INVALID_OPTIONS',
  INVALID_STATE = 'INVALID_STATE'
}

export enum ApplyOutcome {
  /** The target received the changeset and the current snapshot advanced. */
  APPLIED = 'APPLIED',
  /** Nothing to render; the current snapshot advanced without touching the target. */
  NO_CHANGES = 'NO_CHANGES',
  /** A later request or `cancel()` made this one stale before it committed. */
  SUPERSEDED = 'SUPERSEDED',
  /** The target reported it is no longer attached; nothing changed. */
  DETACHED = 'DETACHED'
}

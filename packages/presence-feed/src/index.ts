/**
 * @presence-feed/core
 *
 * Framework-agnostic presence feed: polls a location's active participants,
 * backs off while nothing changes, and trickles arrivals into a short
 * on-screen list.
 *
 * For React bindings, use @presence-feed/react.
 */

// Feed
export { createPresenceFeed } from './core/feed.js'
export { PRESENCE_FEED_DEFAULTS, resolvePresenceFeedOptions } from './core/options.js'
export type { ResolvedPresenceFeedOptions } from './core/options.js'
export type {
  ActivityDescriptor,
  ActivityKind,
  BackoffConfig,
  EntryIdentity,
  FetchContext,
  FetchFailureReason,
  PollState,
  PresenceEntry,
  PresenceFeed,
  PresenceFeedEvent,
  PresenceFeedOptions,
  PresenceFeedState,
  PresenceFeedStatus,
  PresenceSnapshot,
  PresenceSource,
} from './core/types.js'

// Snapshot model
export {
  activityLabel,
  createInitialFeedState,
  hiddenCount,
  isSameActivity,
  validateSnapshot,
} from './core/snapshot.js'

// Diff engine
export { diffSnapshots, indexEntries } from './core/diff.js'
export type { SnapshotDiff } from './core/diff.js'

// Backoff controller
export { advancePollState, createPollState } from './core/backoff.js'

// Trickle applier
export {
  createTrickleApplier,
  insertEntry,
  refreshEntries,
  replaceEntries,
  sleep,
} from './core/trickle.js'
export type {
  InsertResult,
  TrickleApplier,
  TrickleApplierOptions,
  TrickleApplyOptions,
} from './core/trickle.js'

// Source wrappers
export { withFetchTimeout } from './core/timeout.js'
export type { FetchTimeoutOptions } from './core/timeout.js'

// Errors
export {
  PresenceAccessDeniedError,
  PresenceFetchTimeoutError,
  PresenceSnapshotValidationError,
  isAccessDeniedError,
} from './core/errors.js'

import type { Store } from '@tanstack/store'
import type { StandardSchemaV1 } from '@standard-schema/spec'

// ---------------------------------------------------------------------------
// Snapshot model
// ---------------------------------------------------------------------------

/** Stable key of a participant. Never reused for a different participant. */
export type EntryIdentity = string | number

/**
 * What a participant is doing right now.
 *
 * - `'idle'` — present but not acting.
 * - `'working'` — contributing to a construction contract.
 * - `'patrolling'` — on a timed patrol (see `expiresAt`).
 * - `'training'` / `'crafting'` — progressing a queued job.
 * - `'scouting'` — gathering intelligence.
 * - `'sabotage'` — acting against the location.
 */
export type ActivityKind =
  | 'idle'
  | 'working'
  | 'patrolling'
  | 'training'
  | 'crafting'
  | 'scouting'
  | 'sabotage'

export interface ActivityDescriptor {
  kind: ActivityKind
  /** Supporting text, e.g. `"Training Defense (2/5)"`. */
  details: string | null
  /** ISO-8601 end of a duration activity such as a patrol. */
  expiresAt?: string | null
}

/** One participant's presence record. */
export interface PresenceEntry {
  identity: EntryIdentity
  displayName: string
  isOnline: boolean
  activity: ActivityDescriptor
  level: number
  /** Highlights the owner (ruler) of the location. */
  isLocationOwner: boolean
}

/** One full read of the remote source of truth. */
export interface PresenceSnapshot {
  locationId: string
  /** Authoritative even when `entries` was truncated to the fetch limit. */
  totalCount: number
  onlineCount: number
  /** Most relevant first, as ordered by the source. */
  entries: ReadonlyArray<PresenceEntry>
}

// ---------------------------------------------------------------------------
// Source contract
// ---------------------------------------------------------------------------

export interface FetchContext {
  /** Aborted when the feed stops or the fetch times out. */
  signal: AbortSignal
}

/**
 * The remote collaborator the feed polls.
 *
 * Implementations reject with {@link PresenceAccessDeniedError} when the
 * caller has no visibility into the location; any other rejection is treated
 * as transient and retried on the next scheduled poll.
 *
 * @example
 * const source: PresenceSource = {
 *   async fetchSnapshot(locationId, limit, { signal }) {
 *     const res = await api.get(`/players/in-kingdom/${locationId}`, { limit, signal })
 *     if (res.status === 403) throw new PresenceAccessDeniedError(locationId, res.detail)
 *     return toSnapshot(res.body)
 *   },
 * }
 */
export interface PresenceSource {
  fetchSnapshot(
    locationId: string,
    resultLimit: number,
    context: FetchContext,
  ): Promise<PresenceSnapshot>
}

// ---------------------------------------------------------------------------
// Feed state
// ---------------------------------------------------------------------------

/**
 * - `'idle'` — the feed has never been started.
 * - `'loading'` — started, no successful fetch yet.
 * - `'ready'` — `items` and counts reflect a successful fetch.
 * - `'access-denied'` — the last non-transient outcome was a denial.
 */
export type PresenceFeedStatus = 'idle' | 'loading' | 'ready' | 'access-denied'

export interface PresenceFeedState {
  readonly locationId: string | null
  readonly status: PresenceFeedStatus
  /** The bounded on-screen list, most recently added first. */
  readonly items: ReadonlyArray<PresenceEntry>
  readonly totalCount: number
  readonly onlineCount: number
  /** Message of the surfaced access-denied error. */
  readonly deniedReason: string | null
  /** Epoch milliseconds of the last successful fetch. */
  readonly updatedAt: number | null
}

export interface BackoffConfig {
  baseInterval: number
  maxInterval: number
  growthFactor: number
  /** Consecutive unchanged polls required for one growth step. */
  idleThreshold: number
}

export interface PollState extends BackoffConfig {
  readonly currentInterval: number
  readonly unchangedStreak: number
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type FetchFailureReason = 'access-denied' | 'transient'

export type PresenceFeedEvent =
  | { type: 'started'; locationId: string }
  | { type: 'stopped'; locationId: string }
  | { type: 'poll'; locationId: string; interval: number }
  | { type: 'poll-skipped'; locationId: string }
  | {
      type: 'fetch-failed'
      locationId: string
      reason: FetchFailureReason
      error: unknown
    }
  | {
      type: 'snapshot'
      locationId: string
      added: number
      removed: number
      changed: boolean
      initial: boolean
    }
  | {
      type: 'interval-changed'
      locationId: string
      from: number
      to: number
    }
  | {
      type: 'entry-inserted'
      locationId: string
      identity: EntryIdentity
      evicted: EntryIdentity | null
    }

// ---------------------------------------------------------------------------
// Feed
// ---------------------------------------------------------------------------

export interface PresenceFeedOptions {
  /** The remote collaborator to poll. */
  source: PresenceSource

  /**
   * Maximum number of rows kept on screen.
   * @default 5
   */
  displayLimit?: number

  /**
   * Result-size hint sent to the source. Somewhat larger than
   * `displayLimit` so trickle transitions have material to work with.
   * @default displayLimit + 5
   */
  fetchLimit?: number

  /**
   * Poll interval while the location is active, in milliseconds.
   * @default 5000
   */
  baseInterval?: number

  /**
   * Upper bound of the poll interval, in milliseconds.
   * @default 15000
   */
  maxInterval?: number

  /**
   * Multiplier applied to the interval once per `idleThreshold`
   * consecutive unchanged polls.
   * @default 1.5
   */
  growthFactor?: number

  /** @default 3 */
  idleThreshold?: number

  /**
   * Delay between two trickled insertions, in milliseconds.
   * @default 600
   */
  trickleDelay?: number

  /**
   * Upper bound for a single fetch, in milliseconds. `0` disables the
   * timeout for sources that bound their own requests.
   * @default 10000
   */
  fetchTimeout?: number

  /**
   * Refresh rows that are still on screen with the latest snapshot data
   * (online badge, activity, level) without moving them.
   * @default true
   */
  refreshInPlace?: boolean

  /**
   * Standard Schema validator run on every payload before it is diffed.
   * Payloads that fail validation count as transient failures.
   */
  schema?: StandardSchemaV1<unknown, PresenceSnapshot>

  /**
   * Classify a rejected fetch as access denied. Use this when the source
   * throws its own HTTP errors instead of {@link PresenceAccessDeniedError}.
   * @default isAccessDeniedError
   */
  isAccessDenied?: (error: unknown) => boolean

  /** Receives every feed event. Same stream as `feed.subscribe()`. */
  onEvent?: (event: PresenceFeedEvent) => void
}

export interface PresenceFeed {
  /** TanStack Store holding the bounded view and aggregate counts. */
  readonly store: Store<PresenceFeedState>

  /** TanStack Store holding the backoff state of the current session. */
  readonly pollStore: Store<PollState>

  /** Whether a session is active. */
  readonly isRunning: boolean

  /**
   * Start polling `locationId`: fetch immediately, then on a recurring timer.
   * A no-op when already running for the same location; switching to a new
   * location stops the current session first.
   *
   * @throws {Error} if `locationId` is empty.
   */
  start(locationId: string): void

  /**
   * Cancel the timer, the in-flight fetch and any pending trickle delay.
   * No state is mutated after `stop()` returns.
   */
  stop(): void

  /** Subscribe to feed events. Returns an unsubscribe function. */
  subscribe(listener: (event: PresenceFeedEvent) => void): () => void

  /** Stop and drop all event listeners. */
  destroy(): void
}

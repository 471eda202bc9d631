import { Store } from '@tanstack/store'
import type {
  PollState,
  PresenceFeed,
  PresenceFeedEvent,
  PresenceFeedOptions,
  PresenceFeedState,
  PresenceSnapshot,
  PresenceSource,
} from './types.js'
import { resolvePresenceFeedOptions } from './options.js'
import { createInitialFeedState, validateSnapshot } from './snapshot.js'
import { diffSnapshots, indexEntries } from './diff.js'
import { advancePollState, createPollState } from './backoff.js'
import type { TrickleApplier } from './trickle.js'
import { createTrickleApplier, refreshEntries } from './trickle.js'
import { withFetchTimeout } from './timeout.js'

/**
 * Everything owned by one `start()` … `stop()` span. A new session starts
 * from scratch, so a fetch that never settles in an old session cannot hold
 * the single-flight gate of the next one.
 */
interface Session {
  readonly locationId: string
  readonly controller: AbortController
  readonly trickle: TrickleApplier
  timer: ReturnType<typeof setInterval> | null
  inFlight: boolean
  previous: PresenceSnapshot | null
}

/**
 * Creates a presence feed: a polling synchronizer that keeps a short,
 * ordered list of who is active at a location fresh without flicker.
 *
 * Each poll fetches a full snapshot, diffs it against the previous one,
 * adjusts the poll interval (backing off while nothing changes) and trickles
 * arrivals into the bounded list one at a time.
 *
 * @example
 * import { createPresenceFeed } from '@presence-feed/core'
 *
 * const feed = createPresenceFeed({ source: kingdomPlayersSource })
 * feed.store.subscribe(() => render(feed.store.state.items))
 *
 * feed.start(kingdomId) // when the view becomes visible
 * feed.stop()           // when it is torn down
 */
export function createPresenceFeed(options: PresenceFeedOptions): PresenceFeed {
  const config = resolvePresenceFeedOptions(options)
  const backoffConfig = {
    baseInterval: config.baseInterval,
    maxInterval: config.maxInterval,
    growthFactor: config.growthFactor,
    idleThreshold: config.idleThreshold,
  }

  const source: PresenceSource =
    config.fetchTimeout > 0
      ? withFetchTimeout(config.source, { timeout: config.fetchTimeout })
      : config.source

  const store = new Store<PresenceFeedState>(createInitialFeedState())
  const pollStore = new Store<PollState>(createPollState(backoffConfig))
  const listeners = new Set<(event: PresenceFeedEvent) => void>()

  let session: Session | null = null

  function deliver(
    listener: (event: PresenceFeedEvent) => void,
    event: PresenceFeedEvent,
  ): void {
    try {
      listener(event)
    } catch (err) {
      console.error('[presence-feed] event listener error', err)
    }
  }

  function emit(event: PresenceFeedEvent): void {
    if (config.onEvent) deliver(config.onEvent, event)
    for (const listener of listeners) deliver(listener, event)
  }

  // -------------------------------------------------------------------------
  // Timer
  // -------------------------------------------------------------------------

  function arm(s: Session): void {
    if (s.timer !== null) clearInterval(s.timer)
    s.timer = null
    // A listener may have stopped the session while it was being re-armed.
    if (s.controller.signal.aborted || session !== s) return
    s.timer = setInterval(() => {
      tick(s).catch((err: unknown) => {
        console.error('[presence-feed] poll cycle error', err)
      })
    }, pollStore.state.currentInterval)
  }

  async function tick(s: Session): Promise<void> {
    if (s.controller.signal.aborted) return
    if (s.inFlight) {
      emit({ type: 'poll-skipped', locationId: s.locationId })
      return
    }
    s.inFlight = true
    try {
      await runCycle(s)
    } finally {
      s.inFlight = false
    }
  }

  // -------------------------------------------------------------------------
  // Cycle: fetch → diff → backoff → trickle
  // -------------------------------------------------------------------------

  async function fetchSnapshot(
    locationId: string,
    signal: AbortSignal,
  ): Promise<PresenceSnapshot> {
    const payload = await source.fetchSnapshot(locationId, config.fetchLimit, {
      signal,
    })
    const snapshot = config.schema
      ? await validateSnapshot(config.schema, payload)
      : payload
    if (snapshot.locationId !== locationId) {
      throw new Error(
        `[presence-feed] received snapshot for "${snapshot.locationId}" while polling "${locationId}"`,
      )
    }
    return snapshot
  }

  function recordPoll(s: Session, changed: boolean): void {
    const before = pollStore.state
    const after = advancePollState(before, changed)
    if (after === before) return

    pollStore.setState(() => after)
    if (after.currentInterval !== before.currentInterval) {
      emit({
        type: 'interval-changed',
        locationId: s.locationId,
        from: before.currentInterval,
        to: after.currentInterval,
      })
      // The next firing must already use the new interval.
      arm(s)
    }
  }

  function commitSnapshot(snapshot: PresenceSnapshot, refresh: boolean): void {
    store.setState((state) => ({
      ...state,
      status: 'ready',
      totalCount: snapshot.totalCount,
      onlineCount: snapshot.onlineCount,
      deniedReason: null,
      updatedAt: Date.now(),
      items: refresh
        ? refreshEntries(state.items, indexEntries(snapshot.entries))
        : state.items,
    }))
  }

  async function runCycle(s: Session): Promise<void> {
    const { locationId } = s
    const { signal } = s.controller

    emit({
      type: 'poll',
      locationId,
      interval: pollStore.state.currentInterval,
    })
    if (signal.aborted) return

    let snapshot: PresenceSnapshot
    try {
      snapshot = await fetchSnapshot(locationId, signal)
    } catch (error) {
      if (signal.aborted) return
      const denied = config.isAccessDenied(error)
      if (denied) {
        store.setState((state) => ({
          ...state,
          status: 'access-denied',
          deniedReason: error instanceof Error ? error.message : 'Access denied',
        }))
      }
      emit({
        type: 'fetch-failed',
        locationId,
        reason: denied ? 'access-denied' : 'transient',
        error,
      })
      if (signal.aborted) return
      recordPoll(s, false)
      return
    }
    if (signal.aborted) return

    const delta = diffSnapshots(s.previous, snapshot)
    s.previous = snapshot

    emit({
      type: 'snapshot',
      locationId,
      added: delta.added.length,
      removed: delta.removed.length,
      changed: delta.changed,
      initial: delta.initial,
    })
    if (signal.aborted) return
    recordPoll(s, delta.changed)
    if (signal.aborted) return

    if (delta.initial) {
      await s.trickle.apply(delta.added, { mode: 'replace', signal })
      if (signal.aborted) return
      commitSnapshot(snapshot, false)
      return
    }

    commitSnapshot(snapshot, config.refreshInPlace)
    await s.trickle.apply(delta.added, { mode: 'trickle', signal })
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  function stop(): void {
    const s = session
    if (s === null) return
    session = null
    if (s.timer !== null) {
      clearInterval(s.timer)
      s.timer = null
    }
    s.controller.abort()
    emit({ type: 'stopped', locationId: s.locationId })
  }

  function start(locationId: string): void {
    if (!locationId) {
      throw new Error('[presence-feed] start() requires a non-empty locationId.')
    }
    if (session !== null) {
      if (session.locationId === locationId) return
      stop()
    }

    const s: Session = {
      locationId,
      controller: new AbortController(),
      trickle: createTrickleApplier({
        displayLimit: config.displayLimit,
        delay: config.trickleDelay,
        read: () => store.state.items,
        write: (items) => store.setState((state) => ({ ...state, items })),
        onInsert: (identity, evicted) =>
          emit({ type: 'entry-inserted', locationId, identity, evicted }),
      }),
      timer: null,
      inFlight: false,
      previous: null,
    }
    session = s

    store.setState(() => createInitialFeedState(locationId))
    pollStore.setState(() => createPollState(backoffConfig))
    emit({ type: 'started', locationId })

    arm(s)
    tick(s).catch((err: unknown) => {
      console.error('[presence-feed] poll cycle error', err)
    })
  }

  return {
    store,
    pollStore,

    get isRunning() {
      return session !== null
    },

    start,
    stop,

    subscribe(listener) {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },

    destroy() {
      stop()
      listeners.clear()
    },
  }
}

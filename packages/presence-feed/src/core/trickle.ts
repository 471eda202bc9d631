/**
 * Trickle applier — folds arrivals into the bounded on-screen list one at a
 * time instead of swapping the whole list.
 *
 * Each arrival is inserted at the top and the list is truncated to
 * `displayLimit`, so the bottom row is evicted first. Departures are never
 * spliced out: a participant who left drops off the bottom once enough new
 * arrivals push it down.
 */

import type { EntryIdentity, PresenceEntry } from './types.js'

// ---------------------------------------------------------------------------
// Pure list operations
// ---------------------------------------------------------------------------

export interface InsertResult {
  readonly items: ReadonlyArray<PresenceEntry>
  /** The row pushed off the bottom, if any. */
  readonly evicted: PresenceEntry | null
}

/**
 * Insert `entry` at position 0 and truncate to `limit`.
 *
 * If the identity is already on screen (it left and came back before being
 * evicted) the existing row moves to the top instead of being duplicated.
 */
export function insertEntry(
  items: ReadonlyArray<PresenceEntry>,
  entry: PresenceEntry,
  limit: number,
): InsertResult {
  const rest = items.filter((item) => item.identity !== entry.identity)
  const next = [entry, ...rest]
  if (next.length <= limit) return { items: next, evicted: null }
  return { items: next.slice(0, limit), evicted: next[limit] ?? null }
}

/** Bulk replace used for the initial load: first `limit` unique entries. */
export function replaceEntries(
  entries: ReadonlyArray<PresenceEntry>,
  limit: number,
): ReadonlyArray<PresenceEntry> {
  const seen = new Set<EntryIdentity>()
  const result: PresenceEntry[] = []
  for (const entry of entries) {
    if (result.length >= limit) break
    if (seen.has(entry.identity)) continue
    seen.add(entry.identity)
    result.push(entry)
  }
  return result
}

/**
 * Replace rows that are still on screen with their latest data, keeping
 * their position. Rows absent from `latest` are left untouched.
 */
export function refreshEntries(
  items: ReadonlyArray<PresenceEntry>,
  latest: ReadonlyMap<EntryIdentity, PresenceEntry>,
): ReadonlyArray<PresenceEntry> {
  let touched = false
  const next = items.map((item) => {
    const fresh = latest.get(item.identity)
    if (fresh === undefined || fresh === item) return item
    touched = true
    return fresh
  })
  return touched ? next : items
}

/**
 * Wait `ms` milliseconds. Resolves `false` as soon as `signal` aborts, so a
 * torn-down view never sees the next insertion.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false)
      return
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve(true)
    }, ms)
    function onAbort(): void {
      clearTimeout(timer)
      resolve(false)
    }
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

// ---------------------------------------------------------------------------
// Sequencing
// ---------------------------------------------------------------------------

export interface TrickleApplierOptions {
  /** Maximum number of rows kept on screen. */
  displayLimit: number
  /** Milliseconds between two insertions. */
  delay: number
  /** Read the current on-screen rows. */
  read: () => ReadonlyArray<PresenceEntry>
  /** Replace the on-screen rows. */
  write: (items: ReadonlyArray<PresenceEntry>) => void
  /** Called after each trickled insertion. */
  onInsert?: (identity: EntryIdentity, evicted: EntryIdentity | null) => void
}

export interface TrickleApplyOptions {
  /** `'replace'` swaps the list at once; `'trickle'` inserts one by one. */
  mode: 'replace' | 'trickle'
  /** Abort pending insertions. Nothing is written after it fires. */
  signal?: AbortSignal
}

export interface TrickleApplier {
  /**
   * Apply arrivals. A call made while an earlier sequence is still draining
   * waits for it to finish, so sequences never interleave.
   */
  apply(
    added: ReadonlyArray<PresenceEntry>,
    options: TrickleApplyOptions,
  ): Promise<void>
  /** Whether a sequence is in progress or queued. */
  readonly isDraining: boolean
}

/**
 * Create a trickle applier over a read/write pair.
 *
 * @example
 * const trickle = createTrickleApplier({
 *   displayLimit: 5,
 *   delay: 600,
 *   read: () => store.state.items,
 *   write: (items) => store.setState((s) => ({ ...s, items })),
 * })
 *
 * await trickle.apply(delta.added, { mode: 'trickle', signal })
 */
export function createTrickleApplier(
  options: TrickleApplierOptions,
): TrickleApplier {
  const { displayLimit, delay, read, write, onInsert } = options

  let queue: Promise<void> = Promise.resolve()
  let pending = 0

  async function run(
    added: ReadonlyArray<PresenceEntry>,
    { mode, signal }: TrickleApplyOptions,
  ): Promise<void> {
    if (signal?.aborted) return

    if (mode === 'replace') {
      write(replaceEntries(added, displayLimit))
      return
    }

    for (const [index, entry] of added.entries()) {
      if (index > 0 && delay > 0) {
        const completed = await sleep(delay, signal)
        if (!completed) return
      }
      if (signal?.aborted) return

      const result = insertEntry(read(), entry, displayLimit)
      write(result.items)
      onInsert?.(entry.identity, result.evicted?.identity ?? null)
    }
  }

  return {
    apply(added, applyOptions) {
      pending++
      const task = queue
        .then(() => run(added, applyOptions))
        .finally(() => {
          pending--
        })
      queue = task.then(
        () => undefined,
        // Rejections reach the caller through `task`.
        () => undefined,
      )
      return task
    },

    get isDraining() {
      return pending > 0
    },
  }
}

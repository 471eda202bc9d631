/**
 * Diff engine — compares two snapshots by participant identity.
 *
 * The result drives two consumers with different needs: the trickle applier
 * only animates arrivals (`added`), while the backoff controller wants to
 * know whether anything at all went stale (`changed`), including activity
 * changes of participants who stayed.
 */

import type { EntryIdentity, PresenceEntry, PresenceSnapshot } from './types.js'
import { isSameActivity } from './snapshot.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SnapshotDiff {
  /** Entries new in `next`, in source order. */
  readonly added: ReadonlyArray<PresenceEntry>
  /** Identities present in `previous` but gone from `next`. */
  readonly removed: ReadonlyArray<EntryIdentity>
  /**
   * Whether the view is stale: arrivals or departures, different aggregate
   * counts, or an online/activity change of a participant in both snapshots.
   */
  readonly changed: boolean
  /** No previous snapshot; apply `added` as one bulk replace. */
  readonly initial: boolean
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/** Index entries by identity; the first occurrence of a duplicate wins. */
export function indexEntries(
  entries: ReadonlyArray<PresenceEntry>,
): Map<EntryIdentity, PresenceEntry> {
  const index = new Map<EntryIdentity, PresenceEntry>()
  for (const entry of entries) {
    if (!index.has(entry.identity)) index.set(entry.identity, entry)
  }
  return index
}

/**
 * Compare `previous` (or `null` on the first fetch) with `next`.
 *
 * @example
 * const delta = diffSnapshots(last, fresh)
 * if (delta.changed) resetBackoff()
 * await trickle.apply(delta.added, { mode: delta.initial ? 'replace' : 'trickle' })
 */
export function diffSnapshots(
  previous: PresenceSnapshot | null,
  next: PresenceSnapshot,
): SnapshotDiff {
  const nextIndex = indexEntries(next.entries)

  if (previous === null) {
    return {
      added: [...nextIndex.values()],
      removed: [],
      changed: true,
      initial: true,
    }
  }

  const previousIndex = indexEntries(previous.entries)
  const added: PresenceEntry[] = []
  const removed: EntryIdentity[] = []
  let activityChanged = false

  for (const [identity, entry] of nextIndex) {
    const before = previousIndex.get(identity)
    if (before === undefined) {
      added.push(entry)
    } else if (
      before.isOnline !== entry.isOnline ||
      !isSameActivity(before.activity, entry.activity)
    ) {
      activityChanged = true
    }
  }

  for (const identity of previousIndex.keys()) {
    if (!nextIndex.has(identity)) removed.push(identity)
  }

  const countsChanged =
    previous.totalCount !== next.totalCount ||
    previous.onlineCount !== next.onlineCount

  return {
    added,
    removed,
    changed:
      added.length > 0 || removed.length > 0 || countsChanged || activityChanged,
    initial: false,
  }
}

/**
 * Shared builders and scripted sources for the presence feed tests.
 */

import { vi } from 'vitest'
import type {
  EntryIdentity,
  PresenceEntry,
  PresenceSnapshot,
  PresenceSource,
} from '@presence-feed/core'

export const LOCATION = 'kingdom-1'

export function entry(
  identity: EntryIdentity,
  overrides: Partial<PresenceEntry> = {},
): PresenceEntry {
  return {
    identity,
    displayName: `Player ${identity}`,
    isOnline: true,
    activity: { kind: 'idle', details: null },
    level: 1,
    isLocationOwner: false,
    ...overrides,
  }
}

export function snapshot(
  identities: ReadonlyArray<EntryIdentity>,
  counts: { total?: number; online?: number } = {},
  locationId: string = LOCATION,
): PresenceSnapshot {
  return {
    locationId,
    totalCount: counts.total ?? identities.length,
    onlineCount: counts.online ?? identities.length,
    entries: identities.map((id) => entry(id)),
  }
}

export function identities(
  items: ReadonlyArray<PresenceEntry>,
): Array<EntryIdentity> {
  return items.map((item) => item.identity)
}

/**
 * Source that answers with `responses` in order and then keeps repeating the
 * last one. `Error` values are thrown instead of returned.
 */
export function createScriptedSource(
  responses: ReadonlyArray<PresenceSnapshot | Error>,
) {
  let index = 0
  const fetchSnapshot = vi.fn<PresenceSource['fetchSnapshot']>(async () => {
    const response = responses[Math.min(index, responses.length - 1)]
    index++
    if (response === undefined) throw new Error('no scripted response')
    if (response instanceof Error) throw response
    return response
  })
  return { fetchSnapshot } satisfies PresenceSource
}

export interface PendingFetch {
  locationId: string
  signal: AbortSignal
  resolve: (snapshot: PresenceSnapshot) => void
  reject: (error: unknown) => void
}

/** Source whose fetches stay pending until the test settles them. */
export function createDeferredSource() {
  const pending: PendingFetch[] = []
  const fetchSnapshot = vi.fn<PresenceSource['fetchSnapshot']>(
    (locationId, _limit, { signal }) =>
      new Promise<PresenceSnapshot>((resolve, reject) => {
        pending.push({ locationId, signal, resolve, reject })
      }),
  )
  return { fetchSnapshot, pending }
}

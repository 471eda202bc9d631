import { use, useEffect, useRef, useState } from 'react'
import { useStore } from '@tanstack/react-store'
import { createPresenceFeed, hiddenCount } from '@presence-feed/core'
import type {
  PresenceEntry,
  PresenceFeed,
  PresenceFeedEvent,
  PresenceFeedOptions,
  PresenceFeedStatus,
  PresenceSource,
} from '@presence-feed/core'
import { PresenceSourceContext } from './context.js'

export interface UsePresenceFeedOptions
  extends Omit<PresenceFeedOptions, 'source'> {
  /** Location to poll. The feed stays stopped while this is empty. */
  locationId: string | null | undefined
  /** Overrides the source from `<PresenceSourceProvider>`. */
  source?: PresenceSource
  /**
   * Poll only while `true`, e.g. while the card is on screen.
   * @default true
   */
  enabled?: boolean
}

export interface UsePresenceFeedResult {
  /** The bounded list, most recently arrived first. */
  items: ReadonlyArray<PresenceEntry>
  totalCount: number
  onlineCount: number
  /** Participants present but not listed ("+N more"). */
  hiddenCount: number
  status: PresenceFeedStatus
  /** Set while the location is locked behind missing intelligence. */
  deniedReason: string | null
  /** The underlying feed, for events or backoff state. */
  feed: PresenceFeed
}

/**
 * Polls the participants of `locationId` for the lifetime of the component.
 *
 * The feed is created on first render with the options given then; later
 * changes to tuning options and to the source (the `source` option or the
 * provider's value) are ignored. Remount with a new `key` to switch sources.
 * `onEvent` is read through a ref and
 * always sees the latest callback. Changing `locationId` starts a fresh
 * session; unmounting stops it.
 *
 * @example
 * function KingdomActivityCard({ kingdomId }: { kingdomId: string }) {
 *   const { items, onlineCount, hiddenCount, status } = usePresenceFeed({
 *     locationId: kingdomId,
 *   })
 *   if (status === 'access-denied') return <IntelligenceRequired />
 *   return <PlayerList players={items} online={onlineCount} more={hiddenCount} />
 * }
 */
export function usePresenceFeed(
  options: UsePresenceFeedOptions,
): UsePresenceFeedResult {
  const contextSource = use(PresenceSourceContext)
  const { locationId, enabled = true, onEvent, ...feedOptions } = options
  const source = options.source ?? contextSource
  if (!source) {
    throw new Error(
      '[presence-feed] usePresenceFeed needs a `source` option or a <PresenceSourceProvider>.',
    )
  }

  const onEventRef = useRef(onEvent)
  onEventRef.current = onEvent

  const [feed] = useState(() =>
    createPresenceFeed({
      ...feedOptions,
      source,
      onEvent: (event: PresenceFeedEvent) => onEventRef.current?.(event),
    }),
  )

  useEffect(() => {
    if (!enabled || !locationId) return
    feed.start(locationId)
    return () => {
      feed.stop()
    }
  }, [feed, locationId, enabled])

  const state = useStore(feed.store)

  return {
    items: state.items,
    totalCount: state.totalCount,
    onlineCount: state.onlineCount,
    hiddenCount: hiddenCount(state),
    status: state.status,
    deniedReason: state.deniedReason,
    feed,
  }
}

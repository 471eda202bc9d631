import type { ReactNode } from 'react'
import type { PresenceSource } from '@presence-feed/core'
import { PresenceSourceContext } from './context.js'

export interface PresenceSourceProviderProps {
  /** The source every `usePresenceFeed` below this provider polls. */
  source: PresenceSource
  children: ReactNode
}

/**
 * Provides a default `PresenceSource` to the component tree. Hooks that pass
 * their own `source` option ignore it.
 *
 * @example
 * <PresenceSourceProvider source={kingdomPlayersSource}>
 *   <KingdomScreen />
 * </PresenceSourceProvider>
 */
export function PresenceSourceProvider({
  source,
  children,
}: PresenceSourceProviderProps) {
  return (
    <PresenceSourceContext.Provider value={source}>
      {children}
    </PresenceSourceContext.Provider>
  )
}

/**
 * @presence-feed/react
 *
 * React provider and hook for @presence-feed/core.
 */

export { PresenceSourceProvider } from './PresenceSourceProvider.js'
export type { PresenceSourceProviderProps } from './PresenceSourceProvider.js'

export { usePresenceFeed } from './usePresenceFeed.js'
export type {
  UsePresenceFeedOptions,
  UsePresenceFeedResult,
} from './usePresenceFeed.js'

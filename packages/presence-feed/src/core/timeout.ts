/**
 * Fetch timeout — wraps a source so a hung request cannot hold the feed's
 * single-flight gate forever.
 */

import type { PresenceSource } from './types.js'
import { PresenceFetchTimeoutError } from './errors.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FetchTimeoutOptions {
  /**
   * Milliseconds before the fetch is abandoned.
   * @default 10000
   */
  timeout?: number
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Wrap a source with a per-fetch time budget.
 *
 * The inner source receives a signal that aborts when either the caller's
 * signal aborts or the budget runs out, so cooperative sources can cancel
 * their request. The returned promise rejects with
 * {@link PresenceFetchTimeoutError} on timeout even if the inner source
 * ignores the signal.
 *
 * @example
 * const feed = createPresenceFeed({
 *   source: withFetchTimeout(kingdomPlayersSource, { timeout: 4000 }),
 *   fetchTimeout: 0, // already bounded
 * })
 */
export function withFetchTimeout(
  inner: PresenceSource,
  options: FetchTimeoutOptions = {},
): PresenceSource {
  const { timeout = 10_000 } = options

  return {
    async fetchSnapshot(locationId, resultLimit, { signal }) {
      const controller = new AbortController()
      const forwardAbort = () => controller.abort(signal.reason)
      if (signal.aborted) forwardAbort()
      else signal.addEventListener('abort', forwardAbort, { once: true })

      let timer: ReturnType<typeof setTimeout> | undefined
      const expired = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          const error = new PresenceFetchTimeoutError(timeout)
          controller.abort(error)
          reject(error)
        }, timeout)
      })

      try {
        return await Promise.race([
          inner.fetchSnapshot(locationId, resultLimit, {
            signal: controller.signal,
          }),
          expired,
        ])
      } finally {
        clearTimeout(timer)
        signal.removeEventListener('abort', forwardAbort)
      }
    },
  }
}

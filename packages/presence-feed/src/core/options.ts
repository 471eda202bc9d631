import type { PresenceFeedOptions } from './types.js'
import { isAccessDeniedError } from './errors.js'

/** Tuning defaults, matching the cadence of the in-game activity views. */
export const PRESENCE_FEED_DEFAULTS = {
  displayLimit: 5,
  /** Added to `displayLimit` when `fetchLimit` is not given. */
  fetchHeadroom: 5,
  baseInterval: 5_000,
  maxInterval: 15_000,
  growthFactor: 1.5,
  idleThreshold: 3,
  trickleDelay: 600,
  fetchTimeout: 10_000,
  refreshInPlace: true,
} as const

export type ResolvedPresenceFeedOptions = Required<
  Omit<PresenceFeedOptions, 'schema' | 'onEvent'>
> &
  Pick<PresenceFeedOptions, 'schema' | 'onEvent'>

function invalid(message: string): never {
  throw new Error(`[presence-feed] ${message}`)
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    invalid(`${name} must be a positive integer, got ${value}`)
  }
}

function assertNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    invalid(`${name} must be a non-negative number, got ${value}`)
  }
}

/**
 * Fill in defaults and validate.
 *
 * @throws {Error} on an inconsistent configuration.
 */
export function resolvePresenceFeedOptions(
  options: PresenceFeedOptions,
): ResolvedPresenceFeedOptions {
  const displayLimit = options.displayLimit ?? PRESENCE_FEED_DEFAULTS.displayLimit
  const resolved: ResolvedPresenceFeedOptions = {
    source: options.source,
    displayLimit,
    fetchLimit: options.fetchLimit ?? displayLimit + PRESENCE_FEED_DEFAULTS.fetchHeadroom,
    baseInterval: options.baseInterval ?? PRESENCE_FEED_DEFAULTS.baseInterval,
    maxInterval: options.maxInterval ?? PRESENCE_FEED_DEFAULTS.maxInterval,
    growthFactor: options.growthFactor ?? PRESENCE_FEED_DEFAULTS.growthFactor,
    idleThreshold: options.idleThreshold ?? PRESENCE_FEED_DEFAULTS.idleThreshold,
    trickleDelay: options.trickleDelay ?? PRESENCE_FEED_DEFAULTS.trickleDelay,
    fetchTimeout: options.fetchTimeout ?? PRESENCE_FEED_DEFAULTS.fetchTimeout,
    refreshInPlace: options.refreshInPlace ?? PRESENCE_FEED_DEFAULTS.refreshInPlace,
    isAccessDenied: options.isAccessDenied ?? isAccessDeniedError,
    schema: options.schema,
    onEvent: options.onEvent,
  }

  assertPositiveInteger('displayLimit', resolved.displayLimit)
  assertPositiveInteger('fetchLimit', resolved.fetchLimit)
  assertPositiveInteger('idleThreshold', resolved.idleThreshold)
  if (!Number.isFinite(resolved.baseInterval) || resolved.baseInterval <= 0) {
    invalid(`baseInterval must be positive, got ${resolved.baseInterval}`)
  }
  if (
    !Number.isFinite(resolved.maxInterval) ||
    resolved.maxInterval < resolved.baseInterval
  ) {
    invalid(
      `maxInterval (${resolved.maxInterval}) must be at least baseInterval (${resolved.baseInterval})`,
    )
  }
  if (!Number.isFinite(resolved.growthFactor) || resolved.growthFactor < 1) {
    invalid(`growthFactor must be at least 1, got ${resolved.growthFactor}`)
  }
  assertNonNegative('trickleDelay', resolved.trickleDelay)
  assertNonNegative('fetchTimeout', resolved.fetchTimeout)

  return resolved
}

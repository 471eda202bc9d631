import type { StandardSchemaV1 } from '@standard-schema/spec'

/**
 * Thrown by a {@link PresenceSource} when the caller lacks visibility into a
 * location, e.g. no intelligence has been gathered on that kingdom yet.
 *
 * The feed surfaces this as `status: 'access-denied'` until a later fetch
 * succeeds.
 */
export class PresenceAccessDeniedError extends Error {
  readonly locationId: string

  constructor(locationId: string, message = 'Intelligence required') {
    super(message)
    this.name = 'PresenceAccessDeniedError'
    this.locationId = locationId
  }
}

/** Raised by `withFetchTimeout` when a fetch exceeds its time budget. */
export class PresenceFetchTimeoutError extends Error {
  readonly timeout: number

  constructor(timeout: number) {
    super(`[presence-feed] fetch timed out after ${timeout}ms`)
    this.name = 'PresenceFetchTimeoutError'
    this.timeout = timeout
  }
}

/** A fetched payload did not pass the configured schema. */
export class PresenceSnapshotValidationError extends Error {
  readonly issues: ReadonlyArray<StandardSchemaV1.Issue>

  constructor(issues: ReadonlyArray<StandardSchemaV1.Issue>) {
    super(
      `[presence-feed] invalid snapshot: ${issues.map((i) => i.message).join('; ')}`,
    )
    this.name = 'PresenceSnapshotValidationError'
    this.issues = issues
  }
}

/** Default access-denied classifier. */
export function isAccessDeniedError(
  error: unknown,
): error is PresenceAccessDeniedError {
  return error instanceof PresenceAccessDeniedError
}

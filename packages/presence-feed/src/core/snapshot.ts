/**
 * Snapshot model helpers — labels, derived counts and payload validation.
 */

import type { StandardSchemaV1 } from '@standard-schema/spec'
import type {
  ActivityDescriptor,
  PresenceFeedState,
  PresenceSnapshot,
} from './types.js'
import { PresenceSnapshotValidationError } from './errors.js'

/** State of a feed that has not been started. */
export function createInitialFeedState(
  locationId: string | null = null,
): PresenceFeedState {
  return {
    locationId,
    status: locationId === null ? 'idle' : 'loading',
    items: [],
    totalCount: 0,
    onlineCount: 0,
    deniedReason: null,
    updatedAt: null,
  }
}

/**
 * Display text for an activity: the supporting details when present,
 * otherwise the capitalized kind.
 *
 * @example
 * activityLabel({ kind: 'patrolling', details: 'Watching the gates' }) // 'Watching the gates'
 * activityLabel({ kind: 'idle', details: null }) // 'Idle'
 */
export function activityLabel(activity: ActivityDescriptor): string {
  if (activity.details) return activity.details
  return activity.kind.charAt(0).toUpperCase() + activity.kind.slice(1)
}

export function isSameActivity(
  a: ActivityDescriptor,
  b: ActivityDescriptor,
): boolean {
  return a.kind === b.kind && a.details === b.details
}

/** Participants present at the location but not shown in `items`. */
export function hiddenCount(state: PresenceFeedState): number {
  return Math.max(0, state.totalCount - state.items.length)
}

/**
 * Run a Standard Schema validator over a fetched payload.
 *
 * @throws {PresenceSnapshotValidationError} when the schema reports issues.
 */
export async function validateSnapshot(
  schema: StandardSchemaV1<unknown, PresenceSnapshot>,
  value: unknown,
): Promise<PresenceSnapshot> {
  const result = await schema['~standard'].validate(value)
  if (result.issues) {
    throw new PresenceSnapshotValidationError(result.issues)
  }
  return result.value
}

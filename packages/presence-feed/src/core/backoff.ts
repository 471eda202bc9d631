/**
 * Backoff controller — bounded, stepwise lengthening of the poll interval.
 *
 * A busy location is polled at `baseInterval`. Every `idleThreshold`
 * consecutive unchanged polls multiply the interval by `growthFactor`, up to
 * `maxInterval`. Any change snaps the interval back to `baseInterval`. The
 * interval never grows past the ceiling, so a quiet location still shows a
 * new arrival within `maxInterval`.
 */

import type { BackoffConfig, PollState } from './types.js'

export function createPollState(config: BackoffConfig): PollState {
  return {
    ...config,
    currentInterval: config.baseInterval,
    unchangedStreak: 0,
  }
}

/**
 * Fold one poll outcome into the state. Failed polls are reported as
 * unchanged.
 *
 * @example
 * let state = createPollState({ baseInterval: 5000, maxInterval: 15000, growthFactor: 1.5, idleThreshold: 3 })
 * state = advancePollState(state, false) // streak 1
 * state = advancePollState(state, false) // streak 2
 * state = advancePollState(state, false) // interval 7500, streak 0
 */
export function advancePollState(state: PollState, changed: boolean): PollState {
  if (changed) {
    if (
      state.currentInterval === state.baseInterval &&
      state.unchangedStreak === 0
    ) {
      return state
    }
    return { ...state, currentInterval: state.baseInterval, unchangedStreak: 0 }
  }

  const unchangedStreak = state.unchangedStreak + 1
  if (unchangedStreak < state.idleThreshold) {
    return { ...state, unchangedStreak }
  }

  return {
    ...state,
    currentInterval: Math.min(
      state.currentInterval * state.growthFactor,
      state.maxInterval,
    ),
    unchangedStreak: 0,
  }
}

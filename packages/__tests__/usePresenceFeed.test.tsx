// @vitest-environment jsdom
/**
 * Tests for the React bindings (usePresenceFeed / PresenceSourceProvider).
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest'
import { Component, act } from 'react'
import type { ReactNode } from 'react'
import { createRoot } from 'react-dom/client'
import type { Root } from 'react-dom/client'
import { PresenceSourceProvider, usePresenceFeed } from '@presence-feed/react'
import type { PresenceFeedEvent, PresenceSource } from '@presence-feed/core'
import { LOCATION, createScriptedSource, snapshot } from './fixtures.js'

interface CardProps {
  locationId: string | null
  source?: PresenceSource
  events?: PresenceFeedEvent[]
}

function ActivityCard({ locationId, source, events }: CardProps) {
  const { items, status, hiddenCount, onlineCount } = usePresenceFeed({
    locationId,
    source,
    baseInterval: 60_000,
    maxInterval: 60_000,
    onEvent: (event) => events?.push(event),
  })
  return (
    <section data-status={status} data-hidden={hiddenCount} data-online={onlineCount}>
      {items.map((item) => (
        <p key={item.identity}>{item.displayName}</p>
      ))}
    </section>
  )
}

interface BoundaryState {
  message: string | null
}

class ErrorBoundary extends Component<{ children: ReactNode }, BoundaryState> {
  state: BoundaryState = { message: null }

  static getDerivedStateFromError(error: unknown): BoundaryState {
    return { message: error instanceof Error ? error.message : String(error) }
  }

  render() {
    if (this.state.message !== null) return <output>{this.state.message}</output>
    return this.props.children
  }
}

let container: HTMLDivElement
let root: Root
let caught: unknown[]

/** Renders, then lets the first fetch settle and flushes the resulting updates. */
async function render(element: ReactNode): Promise<void> {
  await act(async () => {
    root.render(element)
  })
  await act(async () => {
    await new Promise((resolve) => setTimeout(resolve, 0))
  })
}

function card(): HTMLElement | null {
  return container.querySelector('section')
}

function names(): string[] {
  return Array.from(container.querySelectorAll('p'), (p) => p.textContent ?? '')
}

beforeAll(() => {
  Reflect.set(globalThis, 'IS_REACT_ACT_ENVIRONMENT', true)
})

describe('usePresenceFeed', () => {
  beforeEach(() => {
    caught = []
    container = document.createElement('div')
    document.body.appendChild(container)
    root = createRoot(container, {
      onCaughtError: (error) => caught.push(error),
    })
  })

  afterEach(async () => {
    await act(async () => {
      root.unmount()
    })
    container.remove()
  })

  it('renders the first snapshot from a provided source', async () => {
    const source = createScriptedSource([snapshot(['A', 'B'], { total: 4, online: 3 })])

    await render(
      <PresenceSourceProvider source={source}>
        <ActivityCard locationId={LOCATION} />
      </PresenceSourceProvider>,
    )

    expect(names()).toEqual(['Player A', 'Player B'])
    expect(card()?.dataset.status).toBe('ready')
    expect(card()?.dataset.hidden).toBe('2')
    expect(card()?.dataset.online).toBe('3')
    expect(source.fetchSnapshot).toHaveBeenCalledTimes(1)
  })

  it('prefers the source option over the provider', async () => {
    const provided = createScriptedSource([snapshot(['A'])])
    const own = createScriptedSource([snapshot(['Z'])])

    await render(
      <PresenceSourceProvider source={provided}>
        <ActivityCard locationId={LOCATION} source={own} />
      </PresenceSourceProvider>,
    )

    expect(names()).toEqual(['Player Z'])
    expect(provided.fetchSnapshot).not.toHaveBeenCalled()
  })

  it('stays idle without a location', async () => {
    const source = createScriptedSource([snapshot(['A'])])

    await render(<ActivityCard locationId={null} source={source} />)

    expect(card()?.dataset.status).toBe('idle')
    expect(source.fetchSnapshot).not.toHaveBeenCalled()
  })

  it('starts a fresh session when the location changes', async () => {
    const source = createScriptedSource([
      snapshot(['A', 'B']),
      snapshot(['C'], {}, 'kingdom-2'),
    ])

    await render(<ActivityCard locationId={LOCATION} source={source} />)
    expect(names()).toEqual(['Player A', 'Player B'])

    await render(<ActivityCard locationId="kingdom-2" source={source} />)
    expect(names()).toEqual(['Player C'])
    expect(source.fetchSnapshot).toHaveBeenLastCalledWith('kingdom-2', 10, {
      signal: expect.any(AbortSignal),
    })
  })

  it('keeps the first source until remounted with a new key', async () => {
    const first = createScriptedSource([snapshot(['A'])])
    const second = createScriptedSource([snapshot(['Z'])])

    await render(<ActivityCard key="first" locationId={LOCATION} source={first} />)
    await render(<ActivityCard key="first" locationId={LOCATION} source={second} />)
    expect(names()).toEqual(['Player A'])
    expect(second.fetchSnapshot).not.toHaveBeenCalled()

    await render(<ActivityCard key="second" locationId={LOCATION} source={second} />)
    expect(names()).toEqual(['Player Z'])
    expect(second.fetchSnapshot).toHaveBeenCalledTimes(1)
  })

  it('stops polling on unmount', async () => {
    const source = createScriptedSource([snapshot(['A'])])
    const events: PresenceFeedEvent[] = []

    await render(<ActivityCard locationId={LOCATION} source={source} events={events} />)
    await act(async () => {
      root.unmount()
    })

    expect(events[0]).toEqual({ type: 'started', locationId: LOCATION })
    expect(events.at(-1)).toEqual({ type: 'stopped', locationId: LOCATION })
  })

  it('throws without a source', async () => {
    await render(
      <ErrorBoundary>
        <ActivityCard locationId={LOCATION} />
      </ErrorBoundary>,
    )

    expect(container.querySelector('output')?.textContent).toBe(
      '[presence-feed] usePresenceFeed needs a `source` option or a <PresenceSourceProvider>.',
    )
    expect(caught).not.toHaveLength(0)
  })
})

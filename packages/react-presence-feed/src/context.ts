import { createContext } from 'react'
import type { PresenceSource } from '@presence-feed/core'

export const PresenceSourceContext = createContext<PresenceSource | null>(null)

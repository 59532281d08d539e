import { afterEach, beforeEach, vi } from 'vitest'
import { logger } from '../src/core/logger'

// Engine warnings are expected in many tests; keep the output readable
beforeEach(() => {
  logger.setLevel('silent')
})

// Reset all timers after each test
afterEach(() => {
  vi.useRealTimers()
})

import type { Finder } from './finder'
import { sleep, type Listener, type Sleep } from './types'
import { errorMessage } from '../utils/errors'

export interface PortWaitOptions {
  timeoutMs: number
  intervalMs: number
  sleep?: Sleep
  now?: () => number
  /** Called after every lookup that still finds listeners. */
  onPoll?: (elapsedMs: number, remaining: Listener[]) => void
}

export interface PortWaitResult {
  free: boolean
  elapsedMs: number
  polls: number
  /** Listeners seen by the last lookup that succeeded (empty when free). */
  remaining: Listener[]
  /** Set when a lookup failed; the port state is then unknown. */
  error?: string
}

/**
 * Poll `finder` until nothing listens on `port` or `timeoutMs` elapses.
 * Always performs at least one lookup. A failed lookup ends the wait with `free: false`.
 */
export async function waitForPortFree(finder: Finder, port: number, options: PortWaitOptions): Promise<PortWaitResult> {
  const wait = options.sleep ?? sleep
  const now = options.now ?? Date.now
  const start = now()
  let polls = 0
  let seen: Listener[] = []

  for (;;) {
    let remaining: Listener[]
    try {
      remaining = await finder.findByPort(port)
    } catch (err) {
      return { free: false, elapsedMs: now() - start, polls, remaining: seen, error: errorMessage(err) }
    }
    polls++
    seen = remaining
    const elapsedMs = now() - start

    if (remaining.length === 0) return { free: true, elapsedMs, polls, remaining }
    if (elapsedMs >= options.timeoutMs) return { free: false, elapsedMs, polls, remaining }

    options.onPoll?.(elapsedMs, remaining)
    await wait(Math.min(options.intervalMs, options.timeoutMs - elapsedMs))
  }
}

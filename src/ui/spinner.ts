import pc from 'picocolors'

import type { Track } from '../core/types'
import { ansi } from '../utils/ansi'
import { spinnerFrames } from '../utils/symbols'

export interface Spinner {
  stop(): void
}

/**
 * Spinner on stderr, so stdout stays clean when piped. Starts after 100ms so
 * fast steps print nothing; does nothing at all off a TTY.
 */
export function createSpinner(text: string, stream: NodeJS.WriteStream = process.stderr): Spinner {
  let i = 0
  let timer: NodeJS.Timeout | undefined
  let active = false

  if (!stream.isTTY) return { stop() {} }

  const render = () => {
    const frame = spinnerFrames[i++ % spinnerFrames.length] ?? '-'
    stream.write(`\r${ansi.clearLine}${pc.cyan(frame)} ${pc.dim(text)}`)
  }

  const startDelay = setTimeout(() => {
    active = true
    stream.write(ansi.hideCursor)
    render()
    timer = setInterval(render, 80)
    timer.unref?.()
  }, 100)
  startDelay.unref?.()

  return {
    stop() {
      clearTimeout(startDelay)
      if (!active) return
      active = false
      if (timer) clearInterval(timer)
      stream.write(`\r${ansi.clearLine}${ansi.showCursor}`)
    },
  }
}

export const withSpinner: Track = async (text, fn) => {
  const s = createSpinner(text)
  try {
    return await fn()
  } finally {
    s.stop()
  }
}

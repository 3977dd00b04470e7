import { createInterface } from 'node:readline'

import { lineInfo } from '../ui/renderer'

/** Hold the console open until Enter, so a double-clicked run can be read. No-op without a TTY. */
export async function pauseForEnter(prompt = 'Press Enter to exit...'): Promise<void> {
  if (!process.stdin.isTTY) return

  const rl = createInterface({ input: process.stdin, output: process.stdout })
  try {
    await new Promise<void>((resolve) => rl.question(`${lineInfo(prompt)} `, () => resolve()))
  } finally {
    rl.close()
  }
}

export interface RunThenPauseOptions {
  pause: boolean
  onError: (err: unknown) => void
  wait?: () => Promise<void>
}

/** Run `task`; a failure is reported before the pause prompt so it is on screen while the console waits. */
export async function runThenPause(task: () => Promise<void>, options: RunThenPauseOptions): Promise<void> {
  try {
    await task()
  } catch (err) {
    options.onError(err)
  }
  if (options.pause) await (options.wait ?? pauseForEnter)()
}

import { sleep, type KillOptions, type KillResult, type Sleep } from '../types'
import { errorCode, errorMessage } from '../../utils/errors'

/** Same shape as `process.kill`. */
export type SignalSender = (pid: number, signal?: NodeJS.Signals | number) => boolean

export class PosixKiller {
  constructor(
    private readonly send: SignalSender = (pid, signal) => process.kill(pid, signal),
    private readonly wait: Sleep = sleep,
  ) {}

  isAlive(pid: number): boolean {
    try {
      this.send(pid, 0)
      return true
    } catch (err) {
      // ESRCH => gone. EPERM => exists but not ours.
      return errorCode(err) !== 'ESRCH'
    }
  }

  async kill(pid: number, options: KillOptions): Promise<KillResult> {
    if (!this.isAlive(pid)) return { status: 'not-found', pid, method: 'already-exited' }

    const timeoutMs = Math.max(0, options.timeoutMs ?? 0)

    // 1) SIGTERM
    try {
      this.send(pid, 'SIGTERM')
    } catch (err) {
      if (errorCode(err) === 'ESRCH') return { status: 'not-found', pid, method: 'already-exited' }
      return { status: 'error', pid, method: 'SIGTERM', message: errorMessage(err, 'SIGTERM failed'), errorCode: errorCode(err) }
    }

    // 2) Grace window
    if (timeoutMs > 0 && (await this.waitForExit(pid, timeoutMs))) {
      return { status: 'killed', pid, method: 'SIGTERM' }
    }

    // 3) SIGKILL
    try {
      this.send(pid, 'SIGKILL')
    } catch (err) {
      if (errorCode(err) === 'ESRCH') return { status: 'killed', pid, method: 'SIGTERM' }
      return { status: 'error', pid, method: 'SIGKILL', message: errorMessage(err, 'SIGKILL failed'), errorCode: errorCode(err) }
    }

    // 4) Confirm
    return (await this.waitForExit(pid, 200))
      ? { status: 'killed', pid, method: 'SIGKILL' }
      : { status: 'error', pid, method: 'SIGKILL', message: 'process still alive' }
  }

  private async waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
    const step = 30
    for (let waited = 0; waited < timeoutMs; waited += step) {
      if (!this.isAlive(pid)) return true
      await this.wait(step)
    }
    return !this.isAlive(pid)
  }
}

import type { KillOptions, KillResult } from '../types'
import { execFile, type CommandRunner } from '../../utils/exec'
import { platform, type Platform } from '../../utils/platform'

export interface Killer {
  kill(pid: number, options: KillOptions): Promise<KillResult>
}

export async function getKiller(run: CommandRunner = execFile, p: Platform = platform()): Promise<Killer> {
  if (p === 'win32') {
    const mod = await import('./windows')
    return new mod.WindowsKiller(run)
  }
  const mod = await import('./posix')
  return new mod.PosixKiller()
}

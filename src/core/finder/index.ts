import type { Listener } from '../types'
import { execFile, type CommandRunner } from '../../utils/exec'
import { platform, type Platform } from '../../utils/platform'

export interface Finder {
  /** TCP sockets in LISTEN state bound to `port`. */
  findByPort(port: number): Promise<Listener[]>
}

export async function getFinder(run: CommandRunner = execFile, p: Platform = platform()): Promise<Finder> {
  if (p === 'linux') {
    const mod = await import('./linux')
    return new mod.LinuxFinder(run)
  }
  if (p === 'win32') {
    const mod = await import('./windows')
    return new mod.WindowsFinder(run)
  }

  // macOS and anything POSIX-like: lsof.
  const mod = await import('./lsof')
  return new mod.LsofFinder(run)
}

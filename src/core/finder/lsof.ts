import type { Listener } from '../types'
import { isCommandNotFound, type CommandRunner } from '../../utils/exec'
import { uniqBy } from '../../utils/strings'
import { listenerKey, parseLsof } from './parsers'

export class LsofFinder {
  constructor(private readonly run: CommandRunner) {}

  async findByPort(port: number): Promise<Listener[]> {
    // lsof exits 1 when nothing matches; that is an empty result, not a failure.
    let stdout: string
    try {
      const res = await this.run('lsof', ['-nP', `-iTCP:${port}`, '-sTCP:LISTEN'], { timeoutMs: 2000 })
      stdout = res.stdout
    } catch (err) {
      if (isCommandNotFound(err)) {
        throw new Error('lsof not found. Install lsof to look up listeners on this platform.')
      }
      throw err
    }

    const found = parseLsof(stdout).filter((l) => l.port === port)
    return uniqBy(found, listenerKey)
  }
}

import type { Listener } from '../types'
import { isCommandNotFound, type CommandRunner } from '../../utils/exec'
import { uniqBy } from '../../utils/strings'
import { listenerKey, parseLsof, parseSs } from './parsers'

export class LinuxFinder {
  constructor(private readonly run: CommandRunner) {}

  async findByPort(port: number): Promise<Listener[]> {
    // Prefer `ss` (fast). Fall back to `lsof` when ss is missing or hides PIDs (not root).
    let out = await this.trySs(port)
    if (out.length === 0) out = await this.tryLsof(port)

    return uniqBy(
      out.filter((l) => l.port === port),
      listenerKey,
    )
  }

  private async trySs(port: number): Promise<Listener[]> {
    try {
      const res = await this.run('ss', ['-H', '-ltnp', `sport = :${port}`], { timeoutMs: 2000 })
      return parseSs(res.stdout)
    } catch (err) {
      if (isCommandNotFound(err)) return []
      throw err
    }
  }

  private async tryLsof(port: number): Promise<Listener[]> {
    try {
      const res = await this.run('lsof', ['-nP', `-iTCP:${port}`, '-sTCP:LISTEN'], { timeoutMs: 2000 })
      return parseLsof(res.stdout)
    } catch (err) {
      if (isCommandNotFound(err)) return []
      throw err
    }
  }
}

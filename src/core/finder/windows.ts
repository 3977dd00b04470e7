import type { Listener } from '../types'
import { isCommandNotFound, type CommandRunner } from '../../utils/exec'
import { uniqBy } from '../../utils/strings'
import { listenerKey, parseNetstat } from './parsers'

export class WindowsFinder {
  constructor(private readonly run: CommandRunner) {}

  async findByPort(port: number): Promise<Listener[]> {
    let stdout: string
    try {
      const res = await this.run('netstat', ['-ano', '-p', 'tcp'], { timeoutMs: 2000 })
      stdout = res.stdout
    } catch (err) {
      if (isCommandNotFound(err)) throw new Error('netstat not found.')
      throw err
    }

    return uniqBy(
      parseNetstat(stdout).filter((l) => l.port === port),
      listenerKey,
    )
  }
}

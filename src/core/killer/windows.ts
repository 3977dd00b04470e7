import type { KillOptions, KillResult } from '../types'
import { isCommandNotFound, type CommandRunner, type ExecResult } from '../../utils/exec'
import { errorCode, errorMessage } from '../../utils/errors'

export class WindowsKiller {
  constructor(private readonly run: CommandRunner) {}

  // taskkill /F is already forceful; there is no escalation window to honour.
  async kill(pid: number, _options: KillOptions): Promise<KillResult> {
    try {
      const res = await this.run('taskkill', ['/F', '/PID', String(pid)], { timeoutMs: 5000 })
      return classifyTaskkill(pid, res)
    } catch (err) {
      if (isCommandNotFound(err)) {
        return { status: 'error', pid, method: 'taskkill', message: 'taskkill not found', errorCode: 'ENOENT' }
      }
      return { status: 'error', pid, method: 'taskkill', message: stripNonAscii(errorMessage(err)), errorCode: errorCode(err) }
    }
  }
}

/** Read taskkill's verdict from its output (English and Chinese locales), then its exit code. */
export function classifyTaskkill(pid: number, res: Pick<ExecResult, 'stdout' | 'stderr' | 'code'>): KillResult {
  const out = `${res.stdout}\n${res.stderr}`.trim()

  if (/SUCCESS|成功/i.test(out)) return { status: 'killed', pid, method: 'taskkill /F' }
  if (/not found|找不到/i.test(out)) return { status: 'not-found', pid, method: 'taskkill /F' }
  if (/Access.+denied|拒绝访问/i.test(out)) {
    return { status: 'error', pid, method: 'taskkill /F', message: 'access denied', errorCode: 'EPERM' }
  }

  if (res.code === 0) return { status: 'killed', pid, method: 'taskkill /F' }

  return { status: 'error', pid, method: 'taskkill /F', message: stripNonAscii(out) || 'failed' }
}

// Console code pages other than UTF-8 come through garbled; keep the ASCII part.
function stripNonAscii(text: string): string {
  return text.replace(/[^\x20-\x7E]/g, '').trim()
}

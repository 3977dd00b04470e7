import { FORMATTER_FLAGS, FORMATTER_PACKAGE } from '../defaults'
import type { CommandRunner } from '../../utils/exec'

export class FormatterError extends Error {
  override name = 'FormatterError'
  constructor(message: string, public code: number | null, public stderr: string) {
    super(message)
  }
}

/** `-m autopep8 --in-place --aggressive --aggressive <files...>` */
export function inPlaceArgs(files: string[]): string[] {
  return ['-m', FORMATTER_PACKAGE, '--in-place', ...FORMATTER_FLAGS, ...files]
}

/** `-m autopep8 --aggressive --aggressive -`: source on stdin, result on stdout. */
export function stdinArgs(): string[] {
  return ['-m', FORMATTER_PACKAGE, ...FORMATTER_FLAGS, '-']
}

export class Autopep8 {
  constructor(
    private readonly python: string,
    private readonly run: CommandRunner,
  ) {}

  /** Destructive rewrite of every file in one invocation. */
  async formatInPlace(files: string[]): Promise<void> {
    const res = await this.run(this.python, inPlaceArgs(files), { timeoutMs: 120_000 })
    if (res.code !== 0) throw failure(res.code, res.stderr)
  }

  /** Formatted text for `source`; nothing on disk is touched. */
  async formatSource(source: string): Promise<string> {
    const res = await this.run(this.python, stdinArgs(), {
      stdin: source,
      timeoutMs: 60_000,
      // Python would otherwise decode stdin with the console code page on Windows.
      env: { ...process.env, PYTHONIOENCODING: 'utf-8' },
    })
    if (res.code !== 0) throw failure(res.code, res.stderr)
    // Python reads stdin with universal newlines on Windows, so CRLF comes back as LF.
    return res.stdout.replace(/\r?\n/g, lineEnding(source))
  }
}

/** The file's dominant line break, as autopep8 picks it for `--in-place`. */
export function lineEnding(text: string): '\r\n' | '\n' {
  const crlf = text.match(/\r\n/g)?.length ?? 0
  const lf = (text.match(/\n/g)?.length ?? 0) - crlf
  return crlf > lf ? '\r\n' : '\n'
}

function failure(code: number | null, stderr: string): FormatterError {
  const detail = stderr.trim().split(/\r?\n/).pop()?.trim()
  return new FormatterError(detail || `${FORMATTER_PACKAGE} exited with code ${code}`, code, stderr)
}

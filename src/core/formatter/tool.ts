import { isCommandNotFound, type CommandRunner } from '../../utils/exec'
import { errorMessage } from '../../utils/errors'

export type ToolStatus =
  | { status: 'present'; pkg: string }
  | { status: 'installed'; pkg: string }
  | { status: 'install-failed'; pkg: string; message: string }

/** `python -m pip show <pkg>` exits 0 only when the package is installed. */
export async function isPackageInstalled(python: string, pkg: string, run: CommandRunner): Promise<boolean> {
  const res = await run(python, ['-m', 'pip', 'show', pkg], { timeoutMs: 30_000 })
  return res.code === 0
}

/** Make sure `pkg` is importable by `python`, installing the latest release when it is not. */
export async function ensurePackage(python: string, pkg: string, run: CommandRunner): Promise<ToolStatus> {
  try {
    if (await isPackageInstalled(python, pkg, run)) return { status: 'present', pkg }

    const res = await run(python, ['-m', 'pip', 'install', pkg], { timeoutMs: 300_000 })
    if (res.code === 0) return { status: 'installed', pkg }

    return { status: 'install-failed', pkg, message: lastLine(res.stderr) || `pip exited with code ${res.code}` }
  } catch (err) {
    if (isCommandNotFound(err)) {
      return { status: 'install-failed', pkg, message: `Python interpreter not found: ${python}` }
    }
    return { status: 'install-failed', pkg, message: errorMessage(err) }
  }
}

function lastLine(text: string): string {
  const lines = text.split(/\r?\n/).map((l) => l.trim()).filter(Boolean)
  return lines[lines.length - 1] ?? ''
}

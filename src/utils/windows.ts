import { execFile, type CommandRunner } from './exec'

const IS_ADMIN_SCRIPT =
  '([Security.Principal.WindowsPrincipal][Security.Principal.WindowsIdentity]::GetCurrent()).IsInRole([Security.Principal.WindowsBuiltInRole]::Administrator)'

/**
 * Best-effort elevation check, only consulted after taskkill reported
 * "access denied". Any failure reads as "not elevated".
 */
export async function isWindowsAdmin(run: CommandRunner = execFile): Promise<boolean> {
  if (process.platform !== 'win32') return false

  const args = ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-Command', IS_ADMIN_SCRIPT]
  try {
    const res = await run('powershell.exe', args, { timeoutMs: 1500 })
    return /^true/i.test(res.stdout.trim())
  } catch {
    return false
  }
}

export async function elevationHint(port: number): Promise<string> {
  if (process.platform !== 'win32') return `Permission denied. Try: sudo portkick restart --port ${port}`
  return (await isWindowsAdmin())
    ? 'Access denied (even as Administrator). The process may be protected or owned by another security context.'
    : 'Access denied. Try running in an elevated terminal (Run as Administrator).'
}

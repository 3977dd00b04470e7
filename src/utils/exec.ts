import { spawn } from 'node:child_process'

import { errorCode, errorMessage } from './errors'

export interface ExecOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  timeoutMs?: number
  /** If provided, will be written to stdin and then stdin will be closed. */
  stdin?: string
}

export interface ExecResult {
  cmd: string
  args: string[]
  stdout: string
  stderr: string
  code: number | null
  signal: NodeJS.Signals | null
}

/** Captured-output command runner. Everything that shells out takes one of these. */
export type CommandRunner = (cmd: string, args: string[], options?: ExecOptions) => Promise<ExecResult>

export interface AttachedResult {
  code: number | null
  signal: NodeJS.Signals | null
}

export class ExecSpawnError extends Error {
  override name = 'ExecSpawnError'
  code?: string
  errno?: number
  syscall?: string

  constructor(message: string, props: { code?: string; errno?: number; syscall?: string }) {
    super(message)
    this.code = props.code
    this.errno = props.errno
    this.syscall = props.syscall
  }
}

export class ExecTimeoutError extends Error {
  override name = 'ExecTimeoutError'
  constructor(public cmd: string, public timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${cmd}`)
  }
}

function toSpawnError(err: Error & { errno?: number; syscall?: string }): ExecSpawnError {
  return new ExecSpawnError(errorMessage(err, 'spawn failed'), {
    code: errorCode(err),
    errno: typeof err.errno === 'number' ? err.errno : undefined,
    syscall: typeof err.syscall === 'string' ? err.syscall : undefined,
  })
}

export const execFile: CommandRunner = (cmd, args, options = {}) => {
  return new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(cmd, args, {
      cwd: options.cwd,
      env: options.env,
      windowsHide: true,
      stdio: ['pipe', 'pipe', 'pipe'],
    })

    const stdout: Buffer[] = []
    const stderr: Buffer[] = []

    let timedOut = false
    let timer: NodeJS.Timeout | undefined

    if (options.timeoutMs && options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true
        child.kill('SIGKILL')
      }, options.timeoutMs)
      timer.unref?.()
    }

    child.stdout.on('data', (d: Buffer) => stdout.push(d))
    child.stderr.on('data', (d: Buffer) => stderr.push(d))

    child.on('error', (err) => {
      if (timer) clearTimeout(timer)
      reject(toSpawnError(err))
    })

    child.on('close', (code, signal) => {
      if (timer) clearTimeout(timer)

      if (timedOut) {
        reject(new ExecTimeoutError(cmd, options.timeoutMs ?? 0))
        return
      }

      resolve({
        cmd,
        args,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        code,
        signal,
      })
    })

    // A child that exits before reading stdin raises EPIPE here; 'close' still reports it.
    child.stdin.on('error', () => undefined)
    if (options.stdin != null) child.stdin.write(options.stdin)
    child.stdin.end()
  })
}

/**
 * Run a long-lived command with the terminal attached (inherited stdio) and
 * resolve once it exits. Used for the server launch, whose output belongs to the user.
 */
export function spawnAttached(cmd: string, args: string[], options: { cwd?: string } = {}): Promise<AttachedResult> {
  return new Promise<AttachedResult>((resolve, reject) => {
    // Ctrl+C reaches the child through the terminal too; stay alive to report how it exited.
    const onSigInt = () => undefined
    process.on('SIGINT', onSigInt)

    const child = spawn(cmd, args, { cwd: options.cwd, stdio: 'inherit' })
    child.on('error', (err) => {
      process.off('SIGINT', onSigInt)
      reject(toSpawnError(err))
    })
    child.on('close', (code, signal) => {
      process.off('SIGINT', onSigInt)
      resolve({ code, signal })
    })
  })
}

export function isCommandNotFound(err: unknown): boolean {
  return errorCode(err) === 'ENOENT'
}

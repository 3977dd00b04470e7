export interface Listener {
  /** 1..65535 */
  port: number

  /** Process id */
  pid: number

  /** Best-effort local address (e.g. 127.0.0.1, 0.0.0.0, ::) */
  localAddress?: string

  /** Best-effort process name (e.g. python, streamlit, node) */
  processName?: string

  /** Original raw line (debug / troubleshooting) */
  raw?: string

  /** Strategy identifier that produced this record */
  source?: string
}

export interface KillOptions {
  /** Grace window between SIGTERM and SIGKILL. 0 escalates immediately. */
  timeoutMs?: number
}

export type KillResult =
  | { status: 'killed'; pid: number; method: string }
  | { status: 'not-found'; pid: number; method: string }
  | { status: 'refused'; pid: number; reason: string }
  | { status: 'error'; pid: number; method: string; message: string; errorCode?: string }


export interface LaunchSpec {
  command: string
  args: string[]
  cwd: string
}

export interface LaunchResult {
  code: number | null
  signal: NodeJS.Signals | null
}

export type Launcher = (spec: LaunchSpec) => Promise<LaunchResult>

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms))

/** Wraps a slow step; the CLI shows a spinner, tests pass straight through. */
export type Track = <T>(label: string, fn: () => Promise<T>) => Promise<T>

export const untracked: Track = (_label, fn) => fn()

import type { Finder } from './finder'
import type { Killer } from './killer'
import { streamlitLaunchSpec } from './launcher'
import { waitForPortFree, type PortWaitResult } from './portWait'
import { protectionFor } from './safety'
import { sleep, untracked, type KillResult, type LaunchResult, type LaunchSpec, type Launcher, type Listener, type Sleep, type Track } from './types'
import { errorMessage } from '../utils/errors'
import { platform, type Platform } from '../utils/platform'
import { uniqBy } from '../utils/strings'

export interface RestartOptions {
  port: number
  address: string
  app: string
  cwd: string
  graceMs: number
  waitTimeoutMs: number
  pollIntervalMs: number
  killTimeoutMs: number
  /** Kill protected processes too. */
  force: boolean
  /** Look up and report, but kill and launch nothing. */
  dryRun: boolean
}

/** Progress hooks; the CLI renders these as they happen since the launch blocks until the server exits. */
export interface RestartReporter {
  /** The first lookup failed; the restart carries on as if nothing listened. */
  lookupFailed?(message: string, port: number): void
  found?(listeners: Listener[], port: number): void
  killed?(result: KillResult, listener: Listener): void
  waited?(result: PortWaitResult, port: number): void
  launching?(spec: LaunchSpec, dryRun: boolean): void
}

export interface RestartDeps {
  finder: Finder
  killer: Killer
  launch: Launcher
  sleep?: Sleep
  now?: () => number
  track?: Track
  reporter?: RestartReporter
  platform?: Platform
}

export interface RestartReport {
  listeners: Listener[]
  /** Why the first lookup failed, when it did. */
  lookupError?: string
  kills: KillResult[]
  /** null when nothing was released, so there was nothing to wait for. */
  portWait: PortWaitResult | null
  launch: LaunchSpec
  /** null on a dry run. */
  result: LaunchResult | null
}

export async function restartOnPort(options: RestartOptions, deps: RestartDeps): Promise<RestartReport> {
  const track = deps.track ?? untracked
  const wait = deps.sleep ?? sleep
  const reporter: RestartReporter = deps.reporter ?? {}
  const p = deps.platform ?? platform()

  const launch = streamlitLaunchSpec(options)

  let listeners: Listener[] = []
  let lookupError: string | undefined
  try {
    listeners = await track(`Looking up :${options.port}`, () => deps.finder.findByPort(options.port))
  } catch (err) {
    lookupError = errorMessage(err)
  }
  if (lookupError == null) reporter.found?.(listeners, options.port)
  else reporter.lookupFailed?.(lookupError, options.port)

  if (options.dryRun) {
    reporter.launching?.(launch, true)
    return { listeners, lookupError, kills: [], portWait: null, launch, result: null }
  }

  // One kill per pid, even when a process holds several sockets on the port.
  const kills: KillResult[] = []
  for (const l of uniqBy(listeners, (x) => String(x.pid))) {
    const prot = protectionFor(l, p)
    const result: KillResult =
      prot.protected && !options.force
        ? { status: 'refused', pid: l.pid, reason: prot.reason ?? 'protected' }
        : await track(`Killing #${l.pid}`, () => deps.killer.kill(l.pid, { timeoutMs: options.killTimeoutMs }))
    kills.push(result)
    reporter.killed?.(result, l)
  }

  let portWait: PortWaitResult | null = null
  if (kills.some((k) => k.status === 'killed' || k.status === 'not-found')) {
    if (options.graceMs > 0) await wait(options.graceMs)
    portWait = await track(`Waiting for :${options.port} to close`, () =>
      waitForPortFree(deps.finder, options.port, {
        timeoutMs: options.waitTimeoutMs,
        intervalMs: options.pollIntervalMs,
        sleep: wait,
        now: deps.now,
      }),
    )
    reporter.waited?.(portWait, options.port)
  }

  reporter.launching?.(launch, false)
  const result = await deps.launch(launch)

  return { listeners, lookupError, kills, portWait, launch, result }
}

/** Process exit code for a finished restart: the server's own code, 1 if it died by signal. */
export function restartExitCode(report: RestartReport): number {
  if (!report.result) return 0
  if (report.result.code != null) return report.result.code
  return 1
}

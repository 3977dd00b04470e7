import { resolve } from 'node:path'
import { describe, expect, it, vi } from 'vitest'

import type { Finder } from './finder'
import type { Killer } from './killer'
import { restartExitCode, restartOnPort, type RestartOptions, type RestartReport } from './restart'
import type { KillOptions, KillResult, LaunchSpec, Listener } from './types'

const OPTIONS: RestartOptions = {
  port: 8502,
  address: '0.0.0.0',
  app: 'streamlit_app.py',
  cwd: '/srv/app',
  graceMs: 2000,
  waitTimeoutMs: 10_000,
  pollIntervalMs: 250,
  killTimeoutMs: 0,
  force: false,
  dryRun: false,
}

const EXPECTED_ARGS = ['run', 'streamlit_app.py', '--server.address', '0.0.0.0', '--server.port', '8502']

/** Each lookup answers with the next entry (the last one repeats); an Error entry makes that lookup throw. */
function harness(lookups: Array<Listener[] | Error>, kill?: (pid: number) => KillResult) {
  const events: string[] = []
  let n = 0
  let t = 0

  const finder: Finder = {
    async findByPort(port) {
      events.push(`find:${port}`)
      const answer = lookups[Math.min(n, lookups.length - 1)] ?? []
      n++
      if (answer instanceof Error) throw answer
      return answer
    },
  }

  const killFn = vi.fn(async (pid: number, _options: KillOptions): Promise<KillResult> => {
    events.push(`kill:${pid}`)
    return kill ? kill(pid) : { status: 'killed', pid, method: 'SIGKILL' }
  })
  const killer: Killer = { kill: killFn }

  const launch = vi.fn(async (spec: LaunchSpec) => {
    events.push(`launch:${spec.command}`)
    return { code: 0, signal: null }
  })

  const sleep = vi.fn(async (ms: number) => {
    events.push(`sleep:${ms}`)
    t += ms
  })

  return { deps: { finder, killer, launch, sleep, now: () => t, platform: 'linux' as const }, events, killFn, launch, sleep }
}

describe('restartOnPort', () => {
  it('launches without killing anything when the port is free', async () => {
    const h = harness([[]])

    const report = await restartOnPort(OPTIONS, h.deps)

    expect(h.killFn).not.toHaveBeenCalled()
    expect(h.sleep).not.toHaveBeenCalled()
    expect(report.kills).toEqual([])
    expect(report.portWait).toBeNull()
    expect(h.launch).toHaveBeenCalledTimes(1)
    expect(h.launch.mock.calls[0]?.[0]).toEqual({ command: 'streamlit', args: EXPECTED_ARGS, cwd: resolve('/srv/app') })
  })

  it('kills the single listener once, pauses, confirms the port closed, then launches', async () => {
    const l: Listener = { port: 8502, pid: 4242, processName: 'python3' }
    const h = harness([[l], []])

    const report = await restartOnPort(OPTIONS, h.deps)

    expect(h.killFn.mock.calls).toEqual([[4242, { timeoutMs: 0 }]])
    expect(h.events).toEqual(['find:8502', 'kill:4242', 'sleep:2000', 'find:8502', 'launch:streamlit'])
    expect(report.portWait).toEqual({ free: true, elapsedMs: expect.any(Number), polls: 1, remaining: [] })
    expect(report.result).toEqual({ code: 0, signal: null })
  })

  it('kills a pid once even when it holds the port on IPv4 and IPv6', async () => {
    const h = harness([
      [
        { port: 8502, pid: 5120, localAddress: '0.0.0.0' },
        { port: 8502, pid: 5120, localAddress: '::' },
      ],
      [],
    ])

    const report = await restartOnPort(OPTIONS, h.deps)

    expect(h.killFn).toHaveBeenCalledTimes(1)
    expect(report.listeners).toHaveLength(2)
  })

  it('still launches with the same arguments when the kill fails', async () => {
    const h = harness([[{ port: 8502, pid: 4242 }]], (pid) => ({
      status: 'error',
      pid,
      method: 'SIGTERM',
      message: 'kill EPERM',
      errorCode: 'EPERM',
    }))

    const report = await restartOnPort(OPTIONS, h.deps)

    expect(report.kills.map((k) => k.status)).toEqual(['error'])
    expect(report.portWait).toBeNull()
    expect(h.launch.mock.calls[0]?.[0].args).toEqual(EXPECTED_ARGS)
  })

  it('waits for the port after a not-found kill too', async () => {
    const h = harness([[{ port: 8502, pid: 4242 }], []], (pid) => ({ status: 'not-found', pid, method: 'already-exited' }))

    const report = await restartOnPort({ ...OPTIONS, graceMs: 0 }, h.deps)

    expect(h.sleep).not.toHaveBeenCalled()
    expect(report.portWait?.free).toBe(true)
  })

  it('refuses protected processes unless forced', async () => {
    const init: Listener = { port: 8502, pid: 1, processName: 'systemd' }

    const refused = harness([[init]])
    const report = await restartOnPort(OPTIONS, refused.deps)
    expect(refused.killFn).not.toHaveBeenCalled()
    expect(report.kills).toEqual([{ status: 'refused', pid: 1, reason: 'pid 1 (system init)' }])
    expect(refused.launch).toHaveBeenCalledTimes(1)

    const forced = harness([[init], []])
    await restartOnPort({ ...OPTIONS, force: true }, forced.deps)
    expect(forced.killFn).toHaveBeenCalledTimes(1)
  })

  it('reports progress in order', async () => {
    const l: Listener = { port: 8502, pid: 4242 }
    const h = harness([[l], []])
    const seen: string[] = []

    await restartOnPort(OPTIONS, {
      ...h.deps,
      reporter: {
        found: (ls) => seen.push(`found ${ls.length}`),
        killed: (r) => seen.push(`killed ${r.pid} ${r.status}`),
        waited: (w) => seen.push(`waited ${w.free}`),
        launching: (spec, dryRun) => seen.push(`launching ${spec.args[1]} ${dryRun}`),
      },
    })

    expect(seen).toEqual(['found 1', 'killed 4242 killed', 'waited true', 'launching streamlit_app.py false'])
  })

  it('honours a custom port, address and app', async () => {
    const h = harness([[]])
    const report = await restartOnPort({ ...OPTIONS, port: 8600, address: '127.0.0.1', app: 'main.py' }, h.deps)
    expect(report.launch.args).toEqual(['run', 'main.py', '--server.address', '127.0.0.1', '--server.port', '8600'])
  })

  it('launches anyway when the port is still busy after the wait', async () => {
    const l: Listener = { port: 8502, pid: 4242 }
    const h = harness([[l]])

    const report = await restartOnPort({ ...OPTIONS, graceMs: 0, waitTimeoutMs: 1000 }, h.deps)

    expect(report.portWait).toEqual({ free: false, elapsedMs: 1000, polls: 5, remaining: [l] })
    expect(h.launch).toHaveBeenCalledTimes(1)
    expect(h.launch.mock.calls[0]?.[0].args).toEqual(EXPECTED_ARGS)
  })

  it('treats a failed first lookup as a free port and still launches', async () => {
    const h = harness([new Error('netstat timed out')])
    const failures: string[] = []

    const report = await restartOnPort(OPTIONS, { ...h.deps, reporter: { lookupFailed: (m) => failures.push(m) } })

    expect(failures).toEqual(['netstat timed out'])
    expect(report.lookupError).toBe('netstat timed out')
    expect(report.listeners).toEqual([])
    expect(h.killFn).not.toHaveBeenCalled()
    expect(h.launch.mock.calls[0]?.[0].args).toEqual(EXPECTED_ARGS)
  })

  it('still launches when the port check after a kill fails', async () => {
    const l: Listener = { port: 8502, pid: 4242 }
    const h = harness([[l], new Error('lsof not found')])

    const report = await restartOnPort(OPTIONS, h.deps)

    expect(h.killFn).toHaveBeenCalledTimes(1)
    expect(report.portWait).toEqual({ free: false, elapsedMs: 0, polls: 0, remaining: [], error: 'lsof not found' })
    expect(h.events).toEqual(['find:8502', 'kill:4242', 'sleep:2000', 'find:8502', 'launch:streamlit'])
    expect(report.result).toEqual({ code: 0, signal: null })
  })

  it('touches nothing on a dry run', async () => {
    const h = harness([[{ port: 8502, pid: 4242 }]])

    const report = await restartOnPort({ ...OPTIONS, dryRun: true }, h.deps)

    expect(h.killFn).not.toHaveBeenCalled()
    expect(h.launch).not.toHaveBeenCalled()
    expect(report.result).toBeNull()
    expect(report.launch.args).toEqual(EXPECTED_ARGS)
  })
})

describe('restartExitCode', () => {
  const base: RestartReport = {
    listeners: [],
    kills: [],
    portWait: null,
    launch: { command: 'streamlit', args: EXPECTED_ARGS, cwd: '/srv/app' },
    result: null,
  }

  it('passes the server exit code through', () => {
    expect(restartExitCode({ ...base, result: { code: 3, signal: null } })).toBe(3)
    expect(restartExitCode({ ...base, result: { code: 0, signal: null } })).toBe(0)
  })

  it('maps a signal death to 1 and a dry run to 0', () => {
    expect(restartExitCode({ ...base, result: { code: null, signal: 'SIGTERM' } })).toBe(1)
    expect(restartExitCode(base)).toBe(0)
  })
})

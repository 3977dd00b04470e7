import type { Listener } from '../types'

/**
 * Split `host:port` as printed by netstat, ss and lsof.
 *
 * Examples: 0.0.0.0:8502, *:8502, [::]:8502, [::1]:8502, 127.0.0.1:8502
 */
export function parseAddrPort(token: string): { port: number | null; address?: string } {
  const m = token.match(/^(.*):(\d+)$/)
  if (!m) return { port: null }

  const port = parseInt(m[2] ?? '', 10)
  if (!Number.isFinite(port) || port < 1 || port > 65535) return { port: null }

  const address = (m[1] ?? '').replace(/^\[|\]$/g, '')
  return { port, address }
}

/** `netstat -ano -p tcp` (Windows). Only LISTENING rows are kept. */
export function parseNetstat(stdout: string): Listener[] {
  const out: Listener[] = []

  for (const raw of stdout.split(/\r?\n/)) {
    const line = raw.trim()
    if (!line) continue

    // Headers: "Active Connections", "Proto  Local Address ..."
    if (/^(proto|active)/i.test(line)) continue

    // Proto Local Foreign State PID
    const parts = line.split(/\s+/)
    if (parts.length < 5) continue
    if (parts[0]?.toLowerCase() !== 'tcp') continue
    if (parts[3]?.toLowerCase() !== 'listening') continue

    const pid = parseInt(parts[4] ?? '', 10)
    if (!Number.isFinite(pid)) continue

    const { port, address } = parseAddrPort(parts[1] ?? '')
    if (!port) continue

    out.push({ port, pid, localAddress: address, raw, source: 'netstat' })
  }

  return out
}

/** `ss -H -ltnp` (Linux). Rows without a pid (other users' sockets when not root) are dropped. */
export function parseSs(stdout: string): Listener[] {
  const out: Listener[] = []

  for (const raw of stdout.split(/\r?\n/)) {
    const line = raw.trim()
    if (!line) continue

    // State Recv-Q Send-Q Local:Port Peer:Port Process
    const parts = line.split(/\s+/)
    if (parts.length < 6) continue

    const { port, address } = parseAddrPort(parts[3] ?? '')
    if (!port) continue

    const proc = parts.slice(5).join(' ')
    const pidMatch = proc.match(/pid=(\d+)/)
    if (!pidMatch) continue
    const pid = parseInt(pidMatch[1] ?? '', 10)
    if (!Number.isFinite(pid)) continue

    out.push({
      port,
      pid,
      localAddress: address,
      processName: proc.match(/users:\(\("([^"]+)"/)?.[1],
      raw: line,
      source: 'ss',
    })
  }

  return out
}

/** `lsof -nP -iTCP:<port> -sTCP:LISTEN` (macOS, Linux fallback, other POSIX). */
export function parseLsof(stdout: string): Listener[] {
  const out: Listener[] = []
  let sawHeader = false

  for (const line of stdout.split(/\r?\n/)) {
    if (!line.trim()) continue
    if (!sawHeader) {
      // COMMAND PID USER FD TYPE DEVICE SIZE/OFF NODE NAME
      if (line.toLowerCase().startsWith('command')) sawHeader = true
      continue
    }

    // python3 4242 dev 6u IPv4 0x1f 0t0 TCP *:8502 (LISTEN)
    const parts = line.trim().split(/\s+/)
    if (parts.length < 9) continue
    if (parts[7] !== 'TCP') continue

    const name = parts.slice(8).join(' ')
    if (!name.includes('(LISTEN)')) continue

    const pid = parseInt(parts[1] ?? '', 10)
    if (!Number.isFinite(pid)) continue

    const { port, address } = parseAddrPort(parts[8] ?? '')
    if (!port) continue

    out.push({
      port,
      pid,
      localAddress: address,
      processName: parts[0],
      raw: line,
      source: 'lsof',
    })
  }

  return out
}

/** Dedupe key: netstat and lsof can repeat the same socket row. */
export function listenerKey(l: Listener): string {
  return `${l.port}:${l.pid}:${l.localAddress ?? ''}`
}

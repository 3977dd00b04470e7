import {
  DEFAULT_ADDRESS,
  DEFAULT_APP,
  DEFAULT_GRACE_MS,
  DEFAULT_KILL_TIMEOUT_MS,
  DEFAULT_PORT,
  DEFAULT_WAIT_TIMEOUT_MS,
  defaultPython,
} from '../core/defaults'
import type { NormalizeMode } from '../core/formatter/normalize'

export type Command = 'restart' | 'fix-indent'

export const COMMANDS: readonly Command[] = ['restart', 'fix-indent']

export interface CLIFlags {
  help: boolean
  version: boolean
  dryRun: boolean
  pause: boolean
}

export interface RestartFlags {
  port: number
  address: string
  app: string
  cwd: string
  graceMs: number
  waitTimeoutMs: number
  killTimeoutMs: number
  force: boolean
}

export interface FixIndentFlags {
  dir: string
  mode: NormalizeMode
  inPlace: boolean
  outDir?: string
  python: string
}

export interface ParsedArgs {
  command: Command | null
  flags: CLIFlags
  restart: RestartFlags
  fixIndent: FixIndentFlags
  unknown: string[]
}

interface ValueFlag {
  names: string[]
  commands: readonly Command[]
  /** Returns false when the value is unusable. */
  apply: (value: string) => boolean
}

const MODES: readonly NormalizeMode[] = ['batch', 'per-file', 'tree']

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
  const flags: CLIFlags = { help: false, version: false, dryRun: false, pause: false }

  const restart: RestartFlags = {
    port: DEFAULT_PORT,
    address: DEFAULT_ADDRESS,
    app: DEFAULT_APP,
    cwd: '.',
    graceMs: DEFAULT_GRACE_MS,
    waitTimeoutMs: DEFAULT_WAIT_TIMEOUT_MS,
    killTimeoutMs: DEFAULT_KILL_TIMEOUT_MS,
    force: false,
  }

  const fixIndent: FixIndentFlags = {
    dir: '.',
    mode: 'per-file',
    inPlace: false,
    python: defaultPython(env),
  }

  const valueFlags: ValueFlag[] = [
    {
      names: ['-p', '--port'],
      commands: ['restart'],
      apply: (v) => {
        const n = parseCount(v)
        if (n == null || n < 1 || n > 65535) return false
        restart.port = n
        return true
      },
    },
    { names: ['--address'], commands: ['restart'], apply: (v) => setString(v, (s) => (restart.address = s)) },
    { names: ['--app'], commands: ['restart'], apply: (v) => setString(v, (s) => (restart.app = s)) },
    { names: ['--cwd'], commands: ['restart'], apply: (v) => setString(v, (s) => (restart.cwd = s)) },
    { names: ['--grace'], commands: ['restart'], apply: (v) => setCount(v, (n) => (restart.graceMs = n)) },
    { names: ['--wait-timeout'], commands: ['restart'], apply: (v) => setCount(v, (n) => (restart.waitTimeoutMs = n)) },
    { names: ['--kill-timeout'], commands: ['restart'], apply: (v) => setCount(v, (n) => (restart.killTimeoutMs = n)) },
    {
      names: ['-m', '--mode'],
      commands: ['fix-indent'],
      apply: (v) => {
        const mode = MODES.find((m) => m === v)
        if (!mode) return false
        fixIndent.mode = mode
        return true
      },
    },
    { names: ['-o', '--out'], commands: ['fix-indent'], apply: (v) => setString(v, (s) => (fixIndent.outDir = s)) },
    { names: ['--python'], commands: ['fix-indent'], apply: (v) => setString(v, (s) => (fixIndent.python = s)) },
  ]

  let command: Command | null = null
  let dirSet = false
  const unknown: string[] = []

  let i = 0
  let stopParsing = false

  while (i < argv.length) {
    const a = argv[i] ?? ''

    if (!stopParsing && a === '--') {
      stopParsing = true
      i++
      continue
    }

    if (!stopParsing && a.startsWith('-') && a !== '-') {
      if (a === '-h' || a === '--help') {
        flags.help = true
        i++
        continue
      }

      if (a === '-v' || a === '--version') {
        flags.version = true
        i++
        continue
      }

      if (a === '--dry-run') {
        flags.dryRun = true
        i++
        continue
      }

      if (a === '--pause') {
        flags.pause = true
        i++
        continue
      }

      if ((a === '-f' || a === '--force') && command === 'restart') {
        restart.force = true
        i++
        continue
      }

      if (a === '--in-place' && command === 'fix-indent') {
        fixIndent.inPlace = true
        i++
        continue
      }

      // --name value | --name=value
      const eq = a.startsWith('--') ? a.indexOf('=') : -1
      const name = eq > 0 ? a.slice(0, eq) : a
      const vf = valueFlags.find((f) => f.names.includes(name))
      if (vf) {
        const inline = eq > 0
        const v = inline ? a.slice(eq + 1) : argv[i + 1]
        if (v == null) {
          unknown.push(a)
          i++
          continue
        }
        const accepted = command != null && vf.commands.includes(command) && vf.apply(v)
        if (!accepted) unknown.push(inline ? a : `${a} ${v}`)
        i += inline ? 1 : 2
        continue
      }

      unknown.push(a)
      i++
      continue
    }

    // Positionals: [help] <command> [dir]
    if (command == null) {
      const cmd = COMMANDS.find((c) => c === a)
      if (cmd) command = cmd
      else if (a === 'help' && !flags.help) flags.help = true
      else unknown.push(a)
      i++
      continue
    }

    if (command === 'fix-indent' && !dirSet) {
      fixIndent.dir = a
      dirSet = true
      i++
      continue
    }

    unknown.push(a)
    i++
  }

  return { command, flags, restart, fixIndent, unknown }
}

function parseCount(v: string): number | null {
  if (!/^\d+$/.test(v)) return null
  const n = parseInt(v, 10)
  return Number.isFinite(n) ? n : null
}

function setCount(v: string, set: (n: number) => void): boolean {
  const n = parseCount(v)
  if (n == null) return false
  set(n)
  return true
}

function setString(v: string, set: (s: string) => void): boolean {
  if (!v.trim()) return false
  set(v)
  return true
}

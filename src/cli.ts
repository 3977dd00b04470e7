import { resolve } from 'node:path'
import pc from 'picocolors'

import { parseArgs, type FixIndentFlags, type RestartFlags } from './cli/args'
import { printHelp } from './cli/help'
import { runThenPause } from './cli/pause'
import { POLL_INTERVAL_MS } from './core/defaults'
import { getFinder } from './core/finder'
import { normalizeExitCode, normalizeIndentation } from './core/formatter/normalize'
import { getKiller } from './core/killer'
import { describeLaunch, launchAttached } from './core/launcher'
import { restartExitCode, restartOnPort } from './core/restart'
import { version } from './version'
import { execFile, isCommandNotFound } from './utils/exec'
import { errorMessage } from './utils/errors'
import { elevationHint } from './utils/windows'
import { withSpinner } from './ui/spinner'
import {
  displayPath,
  fmtPort,
  formatKill,
  formatListener,
  formatOutcome,
  formatTool,
  lineErr,
  lineInfo,
  lineOk,
  lineStep,
  lineWarn,
  sym,
} from './ui/renderer'

async function main(): Promise<void> {
  const { command, flags, restart, fixIndent, unknown } = parseArgs(process.argv.slice(2))

  if (flags.help) {
    printHelp(command)
    return
  }

  if (flags.version) {
    process.stdout.write(`${version}\n`)
    return
  }

  if (unknown.length) {
    process.stderr.write(lineErr(`Unknown arguments: ${unknown.join(' ')}`) + '\n')
    process.stderr.write(lineInfo(`Run ${pc.bold('portkick --help')} for usage.`) + '\n')
    process.exitCode = 1
    return
  }

  if (command == null) {
    printHelp(null)
    process.exitCode = 1
    return
  }

  await runThenPause(
    () => (command === 'restart' ? runRestart(restart, flags.dryRun) : runFixIndent(fixIndent, flags.dryRun)),
    { pause: flags.pause, onError: reportError },
  )
}

function reportError(err: unknown): void {
  process.stderr.write(lineErr(errorMessage(err)) + '\n')
  process.exitCode = 1
}

async function runRestart(opts: RestartFlags, dryRun: boolean): Promise<void> {
  const finder = await getFinder()
  const killer = await getKiller()
  const needsHint: number[] = []

  const report = await restartOnPort(
    { ...opts, pollIntervalMs: POLL_INTERVAL_MS, dryRun },
    {
      finder,
      killer,
      launch: launchAttached,
      track: withSpinner,
      reporter: {
        lookupFailed(message, port) {
          process.stderr.write(lineWarn(`${sym.warn} could not look up ${port}: ${message}; launching anyway`) + '\n')
        },
        found(listeners, port) {
          if (listeners.length === 0) {
            process.stdout.write(lineInfo(`Nothing listening on ${fmtPort(port)}`) + '\n')
            return
          }
          if (!dryRun) return
          for (const l of listeners) {
            process.stdout.write(lineOk(`${sym.ok} would kill ${formatListener(l)}`) + '\n')
          }
        },
        killed(result, listener) {
          const out = result.status === 'killed' || result.status === 'not-found' ? process.stdout : process.stderr
          out.write(formatKill(result, listener) + '\n')
          if (result.status === 'refused') {
            process.stderr.write(lineInfo(`Re-run with ${pc.bold('--force')} to override.`) + '\n')
          }
          if (result.status === 'error' && result.errorCode === 'EPERM') needsHint.push(result.pid)
        },
        waited(result, port) {
          if (result.free) {
            process.stdout.write(lineInfo(`${fmtPort(port)} closed after ${result.elapsedMs}ms`) + '\n')
            return
          }
          if (result.error) {
            process.stderr.write(lineWarn(`${sym.warn} could not check ${port}: ${result.error}; launching anyway`) + '\n')
            return
          }
          const pids = result.remaining.map((l) => `#${l.pid}`).join(', ')
          process.stderr.write(
            lineWarn(`${sym.warn} ${port} still in use after ${result.elapsedMs}ms (${pids}); launching anyway`) + '\n',
          )
        },
        launching(spec, isDryRun) {
          const line = `${describeLaunch(spec)} ${pc.dim(`(in ${spec.cwd})`)}`
          process.stdout.write((isDryRun ? lineInfo(`would run ${line}`) : lineStep(line)) + '\n')
        },
      },
    },
  ).catch((err: unknown) => {
    if (isCommandNotFound(err)) {
      throw new Error(`Could not start the server: command not found. Is streamlit installed and on PATH?`)
    }
    throw err
  })

  if (needsHint.length) process.stderr.write(lineInfo(await elevationHint(opts.port)) + '\n')

  const code = restartExitCode(report)
  if (report.result?.signal) {
    process.stderr.write(lineInfo(`server stopped by ${report.result.signal}`) + '\n')
  }
  if (code !== 0) process.exitCode = code
}

async function runFixIndent(opts: FixIndentFlags, dryRun: boolean): Promise<void> {
  const root = resolve(opts.dir)

  if (opts.mode === 'batch' && opts.outDir) {
    process.stderr.write(lineErr('--out does not apply to --mode batch, which always rewrites in place') + '\n')
    process.exitCode = 1
    return
  }

  const report = await normalizeIndentation(
    {
      root,
      mode: opts.mode,
      strategy: opts.inPlace ? 'in-place' : 'staged',
      outDir: opts.outDir,
      dryRun,
      python: opts.python,
    },
    {
      run: execFile,
      track: withSpinner,
      reporter: {
        tool(status) {
          const out = status.status === 'install-failed' ? process.stderr : process.stdout
          out.write(formatTool(status) + '\n')
        },
        group(group) {
          process.stdout.write(lineStep(pc.bold(group.dir === root ? '.' : displayPath(group.dir, root))) + '\n')
          if (group.files.length === 0) process.stdout.write(pc.dim('  no .py files') + '\n')
          if (dryRun) {
            for (const f of group.files) process.stdout.write(`  ${pc.dim(sym.dash)} ${displayPath(f, root)}\n`)
          }
        },
        file(file) {
          process.stdout.write(pc.dim(`  Processing ${displayPath(file, root)}`) + '\n')
        },
        batch(files) {
          process.stdout.write(lineStep(`autopep8 --in-place on ${files.length} files`) + '\n')
        },
        outcome(o) {
          const out = o.status === 'failed' ? process.stderr : process.stdout
          out.write(formatOutcome(o, root) + '\n')
        },
      },
    },
  )

  if (dryRun) {
    const total = report.groups.reduce((n, g) => n + g.files.length, 0)
    process.stdout.write(lineInfo(`${total} files would be formatted (${opts.mode})`) + '\n')
    return
  }

  if (report.tool?.status !== 'install-failed') {
    const total = report.outcomes.length
    if (total === 0) {
      process.stdout.write(lineInfo('No Python files found.') + '\n')
    } else {
      const ok = report.outcomes.filter((o) => o.status !== 'failed').length
      const changed = report.outcomes.filter((o) => o.status === 'changed').length
      const summary = `${ok}/${total} files ok${opts.mode !== 'batch' && !opts.inPlace ? `, ${changed} changed` : ''}`
      process.stdout.write((ok === total ? lineOk(`${sym.ok} ${summary}`) : lineErr(`${sym.err} ${summary}`)) + '\n')
    }
  }

  const code = normalizeExitCode(report)
  if (code !== 0) process.exitCode = code
}

main().catch(reportError)

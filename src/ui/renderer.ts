import { relative } from 'node:path'
import pc from 'picocolors'

import type { FileOutcome } from '../core/formatter/normalize'
import type { ToolStatus } from '../core/formatter/tool'
import type { KillResult, Listener } from '../core/types'
import { truncate } from '../utils/strings'
import { symbols } from '../utils/symbols'

export const sym = symbols

export function fmtPort(port: number): string {
  return pc.bold(pc.cyan(String(port)))
}

export function fmtPid(pid: number): string {
  return pc.dim(`#${pid}`)
}

export function lineOk(text: string): string {
  return pc.green(text)
}

export function lineErr(text: string): string {
  return pc.red(text)
}

export function lineWarn(text: string): string {
  return pc.yellow(text)
}

export function lineInfo(text: string): string {
  return pc.dim(`${sym.info} ${text}`)
}

export function lineStep(text: string): string {
  return `${pc.cyan(sym.step)} ${text}`
}

/** 8502 #1234 (streamlit) 0.0.0.0 */
export function formatListener(l: Listener): string {
  const name = l.processName ? pc.dim(`(${truncate(l.processName, 32)})`) : ''
  const addr = l.localAddress ? pc.dim(l.localAddress) : ''
  return [fmtPort(l.port), fmtPid(l.pid), name, addr].filter(Boolean).join(' ')
}

export function formatKill(r: KillResult, l: Listener): string {
  const target = formatListener(l)
  switch (r.status) {
    case 'killed':
      return lineOk(`${sym.ok} killed ${target} ${pc.dim(r.method)}`)
    case 'not-found':
      return lineInfo(`already gone ${target}`)
    case 'refused':
      return lineErr(`${sym.err} refused ${target} ${pc.dim(r.reason)}`)
    case 'error':
      return lineErr(`${sym.err} failed ${target} ${pc.dim(r.message)}`)
  }
}

export function formatTool(t: ToolStatus): string {
  switch (t.status) {
    case 'present':
      return lineOk(`${sym.ok} ${pc.bold(t.pkg)} ${pc.dim('already installed')}`)
    case 'installed':
      return lineOk(`${sym.ok} ${pc.bold(t.pkg)} ${pc.dim('installed')}`)
    case 'install-failed':
      return lineErr(`${sym.err} ${pc.bold(t.pkg)} ${pc.dim(`install failed: ${t.message}`)}`)
  }
}

export function formatOutcome(o: FileOutcome, root: string): string {
  const name = displayPath(o.file, root)
  switch (o.status) {
    case 'changed':
      return lineOk(`  ${sym.ok} ${name}${o.written && o.written !== o.file ? pc.dim(` -> ${o.written}`) : ''}`)
    case 'formatted':
      return lineOk(`  ${sym.ok} ${name}`)
    case 'unchanged':
      return pc.dim(`  ${sym.dash} ${name} unchanged`)
    case 'failed':
      return lineErr(`  ${sym.err} ${name} ${pc.dim(o.message ?? 'failed')}`)
  }
}

export function displayPath(file: string, root: string): string {
  const rel = relative(root, file)
  return rel && !rel.startsWith('..') ? rel : file
}

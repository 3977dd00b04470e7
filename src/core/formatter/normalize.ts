import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname, join, relative, resolve } from 'node:path'
import { TextDecoder } from 'node:util'

import { FORMATTER_PACKAGE } from '../defaults'
import { Autopep8 } from './autopep8'
import { discoverPythonFiles, type FileGroup, type Layout } from './files'
import { ensurePackage, type ToolStatus } from './tool'
import { untracked, type Track } from '../types'
import type { CommandRunner } from '../../utils/exec'
import { errorCode, errorMessage } from '../../utils/errors'

/**
 * - batch:    one in-place invocation over the root's `*.py`
 * - per-file: one invocation per file, root then `pages/`
 * - tree:     one invocation per file, whole directory tree
 */
export type NormalizeMode = 'batch' | 'per-file' | 'tree'

/** staged: format via stdin and write only when the text changed. in-place: the tool rewrites the file. */
export type WriteStrategy = 'staged' | 'in-place'

export interface NormalizeOptions {
  root: string
  mode: NormalizeMode
  strategy: WriteStrategy
  /** Staged output goes here (same relative paths) instead of over the sources. */
  outDir?: string
  dryRun: boolean
  python: string
}

export type FileStatus = 'changed' | 'unchanged' | 'formatted' | 'failed'

export interface FileOutcome {
  file: string
  status: FileStatus
  /** Where the formatted text was written, when it was. */
  written?: string
  message?: string
}

export interface NormalizeReporter {
  tool?(status: ToolStatus): void
  group?(group: FileGroup): void
  /** Before a file is handed to the formatter. */
  file?(file: string): void
  outcome?(outcome: FileOutcome): void
  batch?(files: string[]): void
}

export interface NormalizeDeps {
  run: CommandRunner
  track?: Track
  reporter?: NormalizeReporter
}

export interface NormalizeReport {
  /** null on a dry run. */
  tool: ToolStatus | null
  groups: FileGroup[]
  outcomes: FileOutcome[]
}

const LAYOUT: Record<NormalizeMode, Layout> = {
  batch: 'flat',
  'per-file': 'pages',
  tree: 'tree',
}

export async function normalizeIndentation(options: NormalizeOptions, deps: NormalizeDeps): Promise<NormalizeReport> {
  const reporter: NormalizeReporter = deps.reporter ?? {}
  const track = deps.track ?? untracked

  let tool: ToolStatus | null = null
  if (!options.dryRun) {
    tool = await track(`Checking ${FORMATTER_PACKAGE}`, () => ensurePackage(options.python, FORMATTER_PACKAGE, deps.run))
    reporter.tool?.(tool)
    if (tool.status === 'install-failed') return { tool, groups: [], outcomes: [] }
  }

  const groups = await discoverPythonFiles(options.root, LAYOUT[options.mode])

  if (options.dryRun) {
    for (const g of groups) reporter.group?.(g)
    return { tool, groups, outcomes: [] }
  }

  const formatter = new Autopep8(options.python, deps.run)
  const outcomes: FileOutcome[] = []

  if (options.mode === 'batch') {
    const files = groups.flatMap((g) => g.files)
    if (files.length === 0) return { tool, groups, outcomes }

    reporter.batch?.(files)
    let failure: string | undefined
    try {
      await track(`Formatting ${files.length} files`, () => formatter.formatInPlace(files))
    } catch (err) {
      failure = errorMessage(err)
    }
    for (const file of files) {
      const o: FileOutcome = failure ? { file, status: 'failed', message: failure } : { file, status: 'formatted', written: file }
      outcomes.push(o)
      reporter.outcome?.(o)
    }
    return { tool, groups, outcomes }
  }

  const root = resolve(options.root)
  const outDir = options.outDir ? resolve(options.outDir) : undefined

  for (const g of groups) {
    reporter.group?.(g)
    for (const file of g.files) {
      reporter.file?.(file)
      const o =
        options.strategy === 'in-place' && !outDir
          ? await formatInPlace(formatter, file)
          : await formatStaged(formatter, file, outDir ? join(outDir, relative(root, file)) : file)
      outcomes.push(o)
      reporter.outcome?.(o)
    }
  }

  return { tool, groups, outcomes }
}

async function formatInPlace(formatter: Autopep8, file: string): Promise<FileOutcome> {
  try {
    await formatter.formatInPlace([file])
    return { file, status: 'formatted', written: file }
  } catch (err) {
    return { file, status: 'failed', message: errorMessage(err) }
  }
}

async function formatStaged(formatter: Autopep8, file: string, target: string): Promise<FileOutcome> {
  try {
    const source = decodeUtf8(await readFile(file))
    if (source == null) {
      return { file, status: 'failed', message: 'not valid UTF-8; use --in-place so autopep8 detects the encoding' }
    }
    const formatted = await formatter.formatSource(source)

    const current = target === file ? source : await readIfExists(target)
    if (current === formatted) return { file, status: 'unchanged' }

    if (target !== file) await mkdir(dirname(target), { recursive: true })
    await writeFile(target, formatted, 'utf8')
    return { file, status: 'changed', written: target }
  } catch (err) {
    return { file, status: 'failed', message: errorMessage(err) }
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

/** null when the bytes are not UTF-8; a BOM is kept so a rewrite preserves it. */
function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return utf8.decode(bytes)
  } catch (err) {
    if (err instanceof TypeError) return null
    throw err
  }
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8')
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null
    throw err
  }
}

export function normalizeExitCode(report: NormalizeReport): number {
  if (report.tool?.status === 'install-failed') return 1
  return report.outcomes.some((o) => o.status === 'failed') ? 1 : 0
}

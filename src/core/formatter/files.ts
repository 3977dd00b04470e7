import { readdir, stat } from 'node:fs/promises'
import type { Dirent } from 'node:fs'
import { join, resolve } from 'node:path'

import { PAGES_DIR, PYTHON_EXT, SKIPPED_DIRS } from '../defaults'
import { errorCode } from '../../utils/errors'

/**
 * - flat:  `*.py` directly in the root
 * - pages: flat, then `pages/*.py` when that directory exists
 * - tree:  every directory below the root, minus caches, VCS and virtualenvs
 */
export type Layout = 'flat' | 'pages' | 'tree'

export interface FileGroup {
  dir: string
  /** Absolute paths, sorted by file name. */
  files: string[]
}

export async function discoverPythonFiles(root: string, layout: Layout): Promise<FileGroup[]> {
  const base = resolve(root)
  if (!(await isDirectory(base))) throw new Error(`Directory not found: ${base}`)

  if (layout === 'tree') return walk(base)

  const groups: FileGroup[] = [{ dir: base, files: await listPython(base) }]

  if (layout === 'pages') {
    const pages = join(base, PAGES_DIR)
    if (await isDirectory(pages)) groups.push({ dir: pages, files: await listPython(pages) })
  }

  return groups
}

async function listPython(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  return pythonFiles(dir, entries)
}

function pythonFiles(dir: string, entries: Dirent[]): string[] {
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(PYTHON_EXT))
    .map((e) => e.name)
    .sort()
    .map((name) => join(dir, name))
}

// Top-down, like os.walk: a directory's own files come before its subdirectories'.
async function walk(root: string): Promise<FileGroup[]> {
  const skipped: readonly string[] = SKIPPED_DIRS
  const groups: FileGroup[] = []
  const stack = [root]

  while (stack.length) {
    const dir = stack.pop()
    if (dir == null) break

    const entries = await readdir(dir, { withFileTypes: true })
    const files = pythonFiles(dir, entries)
    if (files.length) groups.push({ dir, files })

    const subdirs = entries
      .filter((e) => e.isDirectory() && !skipped.includes(e.name))
      .map((e) => e.name)
      .sort()
      .map((name) => join(dir, name))
    // Reverse so the first listed subdirectory is visited first.
    stack.push(...subdirs.reverse())
  }

  return groups
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch (err) {
    if (errorCode(err) === 'ENOENT' || errorCode(err) === 'ENOTDIR') return false
    throw err
  }
}

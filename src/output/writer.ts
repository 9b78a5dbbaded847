/**
 * Rollcall — Artifact Writer
 *
 * Each file is written beside its target and renamed into place, so a
 * reader never sees a half-written artifact.
 */

import { writeFileSync, renameSync, mkdirSync, rmSync, readdirSync, existsSync } from 'node:fs'
import { dirname, join } from 'node:path'

export type ArtifactFile = {
  path: string
  content: string
}

export function writeFileAtomic(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true })
  const tmp = `${path}.tmp-${process.pid}`
  try {
    writeFileSync(tmp, content, 'utf-8')
    renameSync(tmp, path)
  } catch (err) {
    rmSync(tmp, { force: true })
    throw err
  }
}

/** Write every file; callers render all of them before calling this */
export function writeArtifacts(files: readonly ArtifactFile[]): void {
  for (const file of files) writeFileAtomic(file.path, file.content)
}

/**
 * Delete files in `dir` ending in `suffix` whose names are not in `keep`.
 * Returns the removed paths, sorted.
 */
export function removeStaleFiles(dir: string, suffix: string, keep: ReadonlySet<string>): string[] {
  if (!existsSync(dir)) return []

  const removed: string[] = []
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isFile() || !entry.name.endsWith(suffix) || keep.has(entry.name)) continue
    const path = join(dir, entry.name)
    rmSync(path)
    removed.push(path)
  }
  return removed.sort()
}

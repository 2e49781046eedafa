import { execFile } from 'node:child_process'
import { readdir, stat } from 'node:fs/promises'
import path from 'node:path'
import { promisify } from 'node:util'
import type { GitContext, GitRunner, StatusDirectory, StatusSnapshot } from './types'

const execFileAsync = promisify(execFile)

export const STATUS_DIRECTORIES: readonly StatusDirectory[] = [
  { label: 'NBA', path: 'data/raw/nba' },
  { label: 'MLB', path: 'data/raw/mlb' },
  { label: 'NFL', path: 'data/raw/nfl' },
  { label: 'Batches', path: 'data/batches' },
  { label: 'MLB Sims', path: 'data/models/mlb/sims' },
]

/**
 * Counts the visible regular files directly inside `directory` and finds the
 * newest modification time among them. A directory that cannot be read is
 * reported as missing with zero files.
 */
export async function scanDirectory(root: string, directory: StatusDirectory): Promise<StatusSnapshot> {
  const full = path.resolve(root, directory.path)
  const snapshot: StatusSnapshot = {
    label: directory.label,
    directoryPath: directory.path,
    exists: false,
    fileCount: 0,
    newestFileTimestamp: null,
  }

  let names: string[]
  try {
    const entries = await readdir(full, { withFileTypes: true })
    names = entries
      .filter((e) => (e.isFile() || e.isSymbolicLink()) && !e.name.startsWith('.'))
      .map((e) => e.name)
  } catch {
    return snapshot
  }

  let fileCount = 0
  let newest: Date | null = null
  for (const name of names) {
    let mtime: Date
    try {
      const info = await stat(path.join(full, name))
      // links to directories are not files
      if (!info.isFile()) continue
      mtime = info.mtime
    } catch {
      // dangling link, or removed between listing and stat
      continue
    }
    fileCount += 1
    if (!newest || mtime > newest) newest = mtime
  }
  return { ...snapshot, exists: true, fileCount, newestFileTimestamp: newest }
}

export async function collectStatus(root: string, directories: readonly StatusDirectory[] = STATUS_DIRECTORIES): Promise<StatusSnapshot[]> {
  const snapshots: StatusSnapshot[] = []
  for (const dir of directories) {
    snapshots.push(await scanDirectory(root, dir))
  }
  return snapshots
}

export const runGit: GitRunner = async (args, cwd) => {
  const { stdout } = await execFileAsync('git', args, { cwd })
  return stdout.trim()
}

// null when git is unavailable or cwd is not a repository
export async function readGitContext(cwd: string, git: GitRunner = runGit): Promise<GitContext | null> {
  try {
    const branch = await git(['rev-parse', '--abbrev-ref', 'HEAD'], cwd)
    const latestCommit = await git(['log', '-1', '--format=%h - %s'], cwd)
    return { branch, latestCommit }
  } catch {
    return null
  }
}

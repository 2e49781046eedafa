// @vitest-environment node
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, utimesSync, writeFileSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { collectStatus, readGitContext, scanDirectory } from '../statusReporter'

let root: string

beforeEach(() => {
  root = mkdtempSync(path.join(os.tmpdir(), 'bridge-status-'))
})

afterEach(() => {
  rmSync(root, { recursive: true, force: true })
})

function touch(rel: string, when: Date) {
  const file = path.join(root, rel)
  mkdirSync(path.dirname(file), { recursive: true })
  writeFileSync(file, '{}')
  utimesSync(file, when, when)
}

test('counts visible files and reports the newest timestamp', async () => {
  const newest = new Date(2026, 9, 17, 21, 15)
  touch('data/raw/nba/2026-10-15.json', new Date(2026, 9, 15, 8, 0))
  touch('data/raw/nba/2026-10-17.json', newest)
  touch('data/raw/nba/notes.txt', new Date(2026, 9, 16, 8, 0))
  touch('data/raw/nba/.gitkeep', new Date(2026, 9, 18, 8, 0))
  mkdirSync(path.join(root, 'data/raw/nba/archive'))

  const snap = await scanDirectory(root, { label: 'NBA', path: 'data/raw/nba' })

  expect(snap.exists).toBe(true)
  expect(snap.fileCount).toBe(3)
  expect(snap.newestFileTimestamp?.getTime()).toBe(newest.getTime())
})

test('missing directory is zero files without a timestamp', async () => {
  const snap = await scanDirectory(root, { label: 'NFL', path: 'data/raw/nfl' })
  expect(snap).toEqual({ label: 'NFL', directoryPath: 'data/raw/nfl', exists: false, fileCount: 0, newestFileTimestamp: null })
})

test('symlinked files count, links to folders and dangling links do not', async () => {
  const newest = new Date(2026, 9, 12, 6, 0)
  touch('data/raw/mlb/a.json', new Date(2026, 9, 10, 6, 0))
  touch('data/archive/b.json', newest)
  mkdirSync(path.join(root, 'data/archive/old'))
  const dir = path.join(root, 'data/raw/mlb')
  symlinkSync(path.join(root, 'data/archive/b.json'), path.join(dir, 'latest.json'))
  symlinkSync(path.join(root, 'data/archive/old'), path.join(dir, 'old'))
  symlinkSync(path.join(root, 'data/archive/gone.json'), path.join(dir, 'gone.json'))

  const snap = await scanDirectory(root, { label: 'MLB', path: 'data/raw/mlb' })

  expect(snap.fileCount).toBe(2)
  expect(snap.newestFileTimestamp?.getTime()).toBe(newest.getTime())
})

test('a path that cannot be listed is reported like a missing directory', async () => {
  touch('data/raw/nba', new Date(2026, 9, 1))
  const snap = await scanDirectory(root, { label: 'NBA', path: 'data/raw/nba' })
  expect(snap).toEqual({ label: 'NBA', directoryPath: 'data/raw/nba', exists: false, fileCount: 0, newestFileTimestamp: null })
})

test('empty directory exists with zero files', async () => {
  mkdirSync(path.join(root, 'data/batches'), { recursive: true })
  const snap = await scanDirectory(root, { label: 'Batches', path: 'data/batches' })
  expect(snap).toMatchObject({ exists: true, fileCount: 0, newestFileTimestamp: null })
})

test('reports directories in the requested order', async () => {
  touch('data/raw/mlb/a.json', new Date(2026, 9, 1))
  const snaps = await collectStatus(root, [
    { label: 'MLB', path: 'data/raw/mlb' },
    { label: 'NBA', path: 'data/raw/nba' },
  ])
  expect(snaps.map((s) => [s.label, s.fileCount])).toEqual([['MLB', 1], ['NBA', 0]])
})

test('default directory list covers the five data folders', async () => {
  const snaps = await collectStatus(root)
  expect(snaps.map((s) => s.label)).toEqual(['NBA', 'MLB', 'NFL', 'Batches', 'MLB Sims'])
})

test('git context comes from branch and latest commit', async () => {
  const git = vi.fn(async (args: string[]) => (args[0] === 'rev-parse' ? 'main' : 'abc1234 - Add batch config'))
  await expect(readGitContext(root, git)).resolves.toEqual({ branch: 'main', latestCommit: 'abc1234 - Add batch config' })
  expect(git).toHaveBeenCalledWith(['rev-parse', '--abbrev-ref', 'HEAD'], root)
  expect(git).toHaveBeenCalledWith(['log', '-1', '--format=%h - %s'], root)
})

test('git context is omitted when git fails', async () => {
  const git = async () => {
    throw new Error('spawn git ENOENT')
  }
  await expect(readGitContext(root, git)).resolves.toBeNull()
})

export type StatusDirectory = { label: string; path: string }

export type StatusSnapshot = {
  label: string
  directoryPath: string
  exists: boolean
  fileCount: number
  newestFileTimestamp: Date | null
}

export type GitContext = { branch: string; latestCommit: string }

export type GitRunner = (args: string[], cwd: string) => Promise<string>

export type LineWriter = (line: string) => void

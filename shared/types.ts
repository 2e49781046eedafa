export type CommandCategory = 'nba' | 'mlb' | 'nfl' | 'batch' | 'utility'

export type CommandEntry = {
  readonly key: string
  readonly displayText: string
  readonly description: string
  readonly category: CommandCategory
  // null for commands that only reply on the issue thread
  readonly targetDirectory: string | null
}

export type CommandGroup = {
  category: CommandCategory
  label: string
  entries: readonly CommandEntry[]
}

export type CommandLogEntry = {
  readonly timestamp: string
  readonly commandKey: string
}

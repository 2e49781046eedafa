import type { CommandCategory, CommandEntry, CommandGroup } from './types'

export const COMMAND_PREFIX = '/charlotte '

export const CATEGORY_ORDER: readonly CommandCategory[] = ['nba', 'mlb', 'nfl', 'batch', 'utility']

export const CATEGORY_LABELS: Readonly<Record<CommandCategory, string>> = {
  nba: 'NBA',
  mlb: 'MLB',
  nfl: 'NFL',
  batch: 'Batch Operations',
  utility: 'Utilities',
}

/**
 * Freezes the entries into a key-indexed catalog.
 * Throws on a duplicate key or on display text missing the command prefix.
 */
export function defineCatalog(entries: CommandEntry[]): ReadonlyMap<string, CommandEntry> {
  const map = new Map<string, CommandEntry>()
  for (const entry of entries) {
    if (map.has(entry.key)) throw new Error(`Duplicate command key '${entry.key}'`)
    if (!entry.displayText.startsWith(COMMAND_PREFIX)) {
      throw new Error(`Command '${entry.key}' must start with '${COMMAND_PREFIX.trim()}'`)
    }
    map.set(entry.key, Object.freeze({ ...entry }))
  }
  return map
}

export const CATALOG = defineCatalog([
  { key: 'nba_pull', displayText: '/charlotte nba pull', description: 'Pull latest NBA game data', category: 'nba', targetDirectory: 'data/raw/nba' },
  { key: 'mlb_pull', displayText: '/charlotte mlb pull', description: 'Pull latest MLB game data and schedules', category: 'mlb', targetDirectory: 'data/raw/mlb' },
  { key: 'mlb_sim', displayText: '/charlotte mlb sim pregame', description: 'Run MLB pregame simulation with EV edge detection', category: 'mlb', targetDirectory: 'data/models/mlb/sims' },
  { key: 'nfl_pull', displayText: '/charlotte nfl pull', description: 'Pull latest NFL game data', category: 'nfl', targetDirectory: 'data/raw/nfl' },
  { key: 'batch', displayText: '/charlotte batch starter', description: 'Generate pregame simulation configuration', category: 'batch', targetDirectory: 'data/batches' },
  { key: 'help', displayText: '/charlotte help', description: 'Display all available Charlotte commands', category: 'utility', targetDirectory: null },
  { key: 'release', displayText: '/charlotte release', description: 'Create a stable release tag with timestamp', category: 'utility', targetDirectory: null },
])

export function getCommand(key: string): CommandEntry | null {
  return CATALOG.get(key) ?? null
}

// Accepts either the key or the literal command text.
export function findCommand(input: string): CommandEntry | null {
  const needle = input.trim()
  if (!needle) return null
  const byKey = getCommand(needle)
  if (byKey) return byKey
  for (const entry of CATALOG.values()) {
    if (entry.displayText === needle) return entry
  }
  return null
}

export function groupByCategory(entries: Iterable<CommandEntry> = CATALOG.values()): CommandGroup[] {
  const buckets = new Map<CommandCategory, CommandEntry[]>()
  for (const entry of entries) {
    const bucket = buckets.get(entry.category)
    if (bucket) bucket.push(entry)
    else buckets.set(entry.category, [entry])
  }
  const groups: CommandGroup[] = []
  for (const category of CATEGORY_ORDER) {
    const bucket = buckets.get(category)
    if (bucket) groups.push({ category, label: CATEGORY_LABELS[category], entries: bucket })
  }
  return groups
}

/** Grouped order flattened; the interactive menu numbers commands in this order. */
export function orderedCommands(): CommandEntry[] {
  return groupByCategory().flatMap((g) => g.entries)
}

export function guidanceFor(entry: CommandEntry): string[] {
  return [
    `Post "${entry.displayText}" as a comment on a GitHub issue in this repository.`,
    entry.targetDirectory
      ? `The workflow commits its output to ${entry.targetDirectory}.`
      : 'The workflow replies on the issue thread; no data directory is written.',
    'Alternatively, run the bridge workflow manually from the GitHub Actions tab.',
  ]
}

/** Entries sharing a word with the input (e.g. "nba" or "mlb pull"), catalog order, at most `limit`. */
export function suggestCommands(input: string, limit = 3): CommandEntry[] {
  const prefixWord = COMMAND_PREFIX.trim().slice(1)
  const words = (text: string) => text.toLowerCase().split(/[\s_/]+/).filter((w) => w && w !== prefixWord)
  const wanted = new Set(words(input))
  if (!wanted.size) return []
  const matches: CommandEntry[] = []
  for (const entry of CATALOG.values()) {
    if ([...words(entry.key), ...words(entry.displayText)].some((w) => wanted.has(w))) matches.push(entry)
    if (matches.length === limit) break
  }
  return matches
}

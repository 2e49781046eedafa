import { CATALOG, COMMAND_PREFIX, defineCatalog, findCommand, getCommand, groupByCategory, guidanceFor, orderedCommands, suggestCommands } from '../catalog'

test('every key resolves to prefixed, non-empty display text', () => {
  for (const key of CATALOG.keys()) {
    const entry = getCommand(key)
    expect(entry).not.toBeNull()
    expect(entry?.displayText.length).toBeGreaterThan(COMMAND_PREFIX.length)
    expect(entry?.displayText.startsWith(COMMAND_PREFIX)).toBe(true)
  }
})

test('nba_pull maps to the nba pull command', () => {
  expect(getCommand('nba_pull')).toMatchObject({ displayText: '/charlotte nba pull', category: 'nba', targetDirectory: 'data/raw/nba' })
})

test('unknown key is not found', () => {
  expect(getCommand('nba_push')).toBeNull()
  expect(findCommand('   ')).toBeNull()
})

test('findCommand accepts keys and display text', () => {
  expect(findCommand(' mlb_sim ')?.key).toBe('mlb_sim')
  expect(findCommand('/charlotte batch starter')?.key).toBe('batch')
})

test('grouping lists every entry exactly once in category order', () => {
  const groups = groupByCategory()
  expect(groups.map((g) => g.category)).toEqual(['nba', 'mlb', 'nfl', 'batch', 'utility'])
  const keys = groups.flatMap((g) => g.entries.map((e) => e.key))
  expect(keys.slice().sort()).toEqual([...CATALOG.keys()].sort())
  expect(new Set(keys).size).toBe(CATALOG.size)
  expect(groups[1]).toMatchObject({ label: 'MLB' })
  expect(groups[1].entries.map((e) => e.key)).toEqual(['mlb_pull', 'mlb_sim'])
})

test('grouping omits empty categories', () => {
  const entries = [CATALOG.get('help'), CATALOG.get('nba_pull')].flatMap((e) => (e ? [e] : []))
  expect(groupByCategory(entries).map((g) => g.label)).toEqual(['NBA', 'Utilities'])
})

test('menu order follows the groups', () => {
  expect(orderedCommands().map((e) => e.key)).toEqual(['nba_pull', 'mlb_pull', 'mlb_sim', 'nfl_pull', 'batch', 'help', 'release'])
})

test('entries are frozen', () => {
  const entry = getCommand('help')
  expect(Object.isFrozen(entry)).toBe(true)
})

test('defineCatalog rejects duplicates and unprefixed text', () => {
  const entry = { key: 'x', displayText: '/charlotte x', description: 'x', category: 'utility' as const, targetDirectory: null }
  expect(() => defineCatalog([entry, entry])).toThrow("Duplicate command key 'x'")
  expect(() => defineCatalog([{ ...entry, displayText: 'x' }])).toThrow("Command 'x' must start with '/charlotte'")
})

test('guidance depends on whether the command writes data', () => {
  const pull = getCommand('nfl_pull')
  const release = getCommand('release')
  if (!pull || !release) throw new Error('catalog incomplete')
  expect(guidanceFor(pull)).toEqual([
    'Post "/charlotte nfl pull" as a comment on a GitHub issue in this repository.',
    'The workflow commits its output to data/raw/nfl.',
    'Alternatively, run the bridge workflow manually from the GitHub Actions tab.',
  ])
  expect(guidanceFor(release)[1]).toBe('The workflow replies on the issue thread; no data directory is written.')
})

test('suggestions share a word with the input', () => {
  expect(suggestCommands('pull').map((e) => e.key)).toEqual(['nba_pull', 'mlb_pull', 'nfl_pull'])
  expect(suggestCommands('/charlotte MLB').map((e) => e.key)).toEqual(['mlb_pull', 'mlb_sim'])
  expect(suggestCommands('pull', 1).map((e) => e.key)).toEqual(['nba_pull'])
})

test('no suggestions for unrelated or prefix-only input', () => {
  expect(suggestCommands('bogus')).toEqual([])
  expect(suggestCommands('/charlotte')).toEqual([])
})

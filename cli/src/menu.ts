import { createInterface } from 'node:readline'
import type { ChalkInstance } from 'chalk'
import { groupByCategory, orderedCommands } from '../../shared/catalog'
import { appendLogEntry } from '../../shared/session'
import type { CommandEntry, CommandLogEntry } from '../../shared/types'
import { renderMenu } from './render'
import type { LineWriter } from './types'

export type MenuOptions = {
  input: NodeJS.ReadableStream
  write: LineWriter
  prompt: (text: string) => void
  colors: ChalkInstance
  prepare: (entry: CommandEntry) => Promise<void>
  now?: () => Date
}

/**
 * Shows the numbered menu until the user picks 0 or input ends.
 * Resolves with the commands prepared during the session, oldest first.
 */
export async function runInteractiveMenu({ input, write, prompt, colors: c, prepare, now = () => new Date() }: MenuOptions): Promise<CommandLogEntry[]> {
  const rl = createInterface({ input, terminal: false })
  const lines = rl[Symbol.asyncIterator]()
  const closeOnInterrupt = () => rl.close()
  process.once('SIGINT', closeOnInterrupt)

  async function readLine(): Promise<string | null> {
    const next = await lines.next()
    return next.done ? null : next.value
  }

  const groups = groupByCategory()
  const commands = orderedCommands()
  let log: CommandLogEntry[] = []

  try {
    for (;;) {
      for (const line of renderMenu(c, groups)) write(line)
      prompt(c.bold(`Select command (0-${commands.length}): `))
      const answer = await readLine()
      if (answer === null) break
      const choice = answer.trim()
      if (choice === '0') break

      if (!/^-?\d+$/.test(choice)) {
        write(c.red('Invalid input. Please enter a number.'))
        write('')
        continue
      }
      const entry = commands[Number(choice) - 1]
      if (Number(choice) < 1 || !entry) {
        write(c.red(`Invalid choice. Please select 0-${commands.length}`))
        write('')
        continue
      }

      await prepare(entry)
      log = appendLogEntry(log, entry.key, now())
      prompt(c.bold('Press Enter to continue...'))
      if ((await readLine()) === null) break
    }
  } finally {
    process.off('SIGINT', closeOnInterrupt)
    rl.close()
  }

  const count = log.length
  write('')
  write(c.cyan(`Goodbye! 👋 Prepared ${count} ${count === 1 ? 'command' : 'commands'} this session.`))
  write('')
  return log
}

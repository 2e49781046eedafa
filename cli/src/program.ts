import { Command } from 'commander'
import type { ChalkInstance } from 'chalk'
import { CATALOG, findCommand } from '../../shared/catalog'
import type { CommandEntry } from '../../shared/types'
import type { ConsoleConfig } from './config'
import { runInteractiveMenu } from './menu'
import {
  renderCommand,
  renderCommandList,
  renderDataStatus,
  renderGitContext,
  renderHeader,
  renderNotRecognized,
  renderSystemStatus,
} from './render'
import { collectStatus, readGitContext } from './statusReporter'
import type { GitRunner, LineWriter } from './types'

export const VERSION = '0.1.0'

export type ConsoleDeps = {
  config: ConsoleConfig
  colors: ChalkInstance
  write: LineWriter
  prompt: (text: string) => void
  input: NodeJS.ReadableStream
  git?: GitRunner
  now?: () => Date
}

/** Runs one invocation and resolves with the exit code. */
export async function runConsole(target: string | undefined, deps: ConsoleDeps): Promise<number> {
  const { config, colors: c, write, git } = deps
  const now = deps.now ?? (() => new Date())
  const emit = (lines: string[]) => {
    for (const line of lines) write(line)
  }

  async function prepare(entry: CommandEntry) {
    const context = await readGitContext(config.repoRoot, git)
    emit(renderCommand(c, entry, context))
  }

  emit(renderHeader(c))

  if (target === undefined) {
    emit(renderSystemStatus(c, config, now()))
    await runInteractiveMenu({ input: deps.input, write, prompt: deps.prompt, colors: c, prepare, now })
    return 0
  }

  if (target === 'list') {
    emit(renderCommandList(c, CATALOG.values()))
    return 0
  }

  if (target === 'status') {
    emit(renderSystemStatus(c, config, now()))
    emit(renderDataStatus(c, await collectStatus(config.repoRoot)))
    emit(renderGitContext(c, await readGitContext(config.repoRoot, git)))
    return 0
  }

  const entry = findCommand(target)
  if (!entry) {
    emit(renderNotRecognized(c, target, CATALOG.values()))
    return 1
  }
  await prepare(entry)
  return 0
}

export function createProgram(deps: ConsoleDeps, onExit: (code: number) => void): Command {
  return new Command()
    .name('bridge-console')
    .description('Shows the bridge commands to post on a GitHub issue, and local data status')
    .version(VERSION)
    .argument('[target]', '"list", "status", a command key, or a full command; omit for the interactive menu')
    .action(async (target: string | undefined) => {
      onExit(await runConsole(target, deps))
    })
}

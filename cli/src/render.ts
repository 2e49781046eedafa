import type { ChalkInstance } from 'chalk'
import { CATEGORY_LABELS, guidanceFor } from '../../shared/catalog'
import type { CommandEntry, CommandGroup } from '../../shared/types'
import type { ConsoleConfig } from './config'
import type { GitContext, StatusSnapshot } from './types'

const RULE_WIDTH = 70

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

// Local time, YYYY-MM-DD HH:MM[:SS]
export function formatTimestamp(date: Date, withSeconds = false): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}`
  return `${day} ${time}${withSeconds ? `:${pad2(date.getSeconds())}` : ''}`
}

export function renderHeader(c: ChalkInstance): string[] {
  const rule = c.cyan('='.repeat(RULE_WIDTH))
  return [
    '',
    rule,
    c.bold.magenta('🎮 Bridge Command Console'),
    c.cyan('Bridge Command Hub - Automated Sports Data Operations'),
    rule,
    '',
  ]
}

export function renderSystemStatus(c: ChalkInstance, config: ConsoleConfig, now: Date): string[] {
  return [
    c.bold('📡 System Status:'),
    `  Workflow: ${c.green(`${config.workflowName} Active`)}`,
    `  Repository: ${c.cyan(config.repository)}`,
    `  Time: ${c.yellow(formatTimestamp(now, true))}`,
    '',
  ]
}

/** Numbers the commands 1..n across the groups, in group order. */
export function renderMenu(c: ChalkInstance, groups: readonly CommandGroup[]): string[] {
  const lines = [c.bold('📋 Available Commands:'), '']
  let i = 1
  for (const group of groups) {
    lines.push(c.bold.blue(`${group.label}:`))
    for (const entry of group.entries) {
      lines.push(`  ${c.green(`${i}.`)} ${entry.description}`)
      lines.push(`     ${c.yellow(entry.displayText)}`)
      i += 1
    }
    lines.push('')
  }
  lines.push(c.bold.red('0. Exit Console'), '')
  return lines
}

export function renderCommandList(c: ChalkInstance, entries: Iterable<CommandEntry>): string[] {
  const lines = [c.bold('Available Commands:'), '']
  for (const entry of entries) {
    lines.push(`  ${entry.key.padEnd(15)} - ${entry.description}`)
    lines.push(`  ${''.padEnd(15)}   ${c.yellow(entry.displayText)}`)
  }
  lines.push('')
  return lines
}

export function renderGitContext(c: ChalkInstance, git: GitContext | null): string[] {
  if (!git) return []
  return [
    c.bold('Git Context:'),
    `  Branch: ${c.cyan(git.branch)}`,
    `  Latest: ${c.cyan(git.latestCommit)}`,
    '',
  ]
}

export function renderCommand(c: ChalkInstance, entry: CommandEntry, git: GitContext | null): string[] {
  const rule = c.cyan('─'.repeat(RULE_WIDTH))
  const lines = [
    '',
    rule,
    `${c.bold('Prepared:')} ${c.yellow(entry.displayText)}`,
    rule,
    '',
    c.bold('Command Details:'),
    `  Description: ${entry.description}`,
    `  Category: ${CATEGORY_LABELS[entry.category]}`,
    `  Full Command: ${entry.displayText}`,
  ]
  if (entry.targetDirectory) lines.push(`  Target Directory: ${entry.targetDirectory}`)
  lines.push('', c.yellow('ℹ️  To run this command:'))
  guidanceFor(entry).forEach((line, idx) => lines.push(`  ${idx + 1}. ${line}`))
  lines.push('', ...renderGitContext(c, git))
  lines.push(c.green('✅ Command prepared successfully'), rule, '')
  return lines
}

export function renderDataStatus(c: ChalkInstance, snapshots: readonly StatusSnapshot[]): string[] {
  const lines = [c.bold('📊 Data Status:'), '']
  for (const snap of snapshots) {
    let status: string
    if (!snap.exists) {
      status = `${c.red('✗')} Not found`
    } else {
      status = `${c.green('✓')} ${snap.fileCount} ${snap.fileCount === 1 ? 'file' : 'files'}`
      if (snap.newestFileTimestamp) status += ` (latest: ${c.yellow(formatTimestamp(snap.newestFileTimestamp))})`
    }
    lines.push(`  ${snap.label.padEnd(12)} ${status}`)
  }
  lines.push('')
  return lines
}

export function renderNotRecognized(c: ChalkInstance, input: string, entries: Iterable<CommandEntry>): string[] {
  const lines = [c.red(`Command '${input}' not recognized. Run "list" to see available commands.`), '', c.yellow('Available commands:')]
  for (const entry of entries) {
    lines.push(`  ${entry.key.padEnd(15)} - ${entry.description}`)
  }
  lines.push('')
  return lines
}

import type { CommandLogEntry } from './types'

export function appendLogEntry(log: readonly CommandLogEntry[], commandKey: string, now: Date = new Date()): CommandLogEntry[] {
  return [...log, { timestamp: now.toISOString(), commandKey }]
}

export type { CommandCategory, CommandEntry, CommandGroup, CommandLogEntry } from '../../shared/types'

export type Toast = {
  id: string
  message: string
  type?: 'success' | 'error' | 'info'
  ttlMs?: number
}

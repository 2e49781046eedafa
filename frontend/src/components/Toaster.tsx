import { useEffect } from 'react'
import type { Toast } from '../types'

const DEFAULT_TTL_MS = 3000

const PALETTE: Record<NonNullable<Toast['type']>, { border: string; background: string; color: string }> = {
  success: { border: '#bfe3c7', background: '#f4fff7', color: '#1d4d26' },
  error: { border: '#f2c4c4', background: '#fff5f5', color: '#6b1111' },
  info: { border: '#c9d6e2', background: '#f6fbff', color: '#244c6b' },
}

type Props = {
  toasts: Toast[]
  onRemove: (id: string) => void
}

export function Toaster({ toasts, onRemove }: Props) {
  useEffect(() => {
    const timers = toasts.map((t) => setTimeout(() => onRemove(t.id), t.ttlMs ?? DEFAULT_TTL_MS))
    return () => { timers.forEach(clearTimeout) }
  }, [toasts, onRemove])

  if (!toasts.length) return null
  return (
    <div role="status" style={{ position: 'fixed', right: 12, top: 12, display: 'flex', flexDirection: 'column', gap: 8, zIndex: 10000 }}>
      {toasts.map((t) => {
        const colors = PALETTE[t.type ?? 'info']
        return (
          <div key={t.id} style={{
            minWidth: 220,
            padding: '8px 10px',
            borderRadius: 6,
            border: '1px solid ' + colors.border,
            background: colors.background,
            color: colors.color,
            boxShadow: '0 1px 4px rgba(0,0,0,0.1)',
            display: 'flex',
            alignItems: 'center',
            gap: 8
          }}>
            <div style={{ flex: 1 }}>{t.message}</div>
            <button type="button" aria-label="Dismiss" onClick={() => onRemove(t.id)} style={{ border: 'none', background: 'transparent', cursor: 'pointer' }}>✕</button>
          </div>
        )
      })}
    </div>
  )
}

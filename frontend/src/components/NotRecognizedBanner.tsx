import type { CommandEntry } from '../types'

type Props = {
  input: string | null
  suggestions: CommandEntry[]
  onPick: (key: string) => void
  onClose: () => void
}

export function NotRecognizedBanner({ input, suggestions, onPick, onClose }: Props) {
  if (input === null) return null
  return (
    <div role="alert" style={{
      margin: '10px',
      padding: '10px 12px',
      borderRadius: 6,
      border: '1px solid #f2c4c4',
      background: '#fff5f5',
      color: '#6b1111',
      display: 'flex',
      alignItems: 'center',
      gap: 10
    }}>
      <div style={{ flex: 1 }}>
        <div>{`"${input}" is not recognized. See the command list.`}</div>
        {suggestions.length ? (
          <div style={{ marginTop: 6, fontSize: 12 }}>
            Did you mean{' '}
            {suggestions.map((s) => (
              <button key={s.key} type="button" onClick={() => onPick(s.key)} style={{ marginRight: 4 }}>{s.displayText}</button>
            ))}
          </div>
        ) : null}
      </div>
      <button type="button" onClick={onClose} style={{ background: '#6b1111', color: '#fff', border: 'none', borderRadius: 4, padding: '4px 8px' }}>Dismiss</button>
    </div>
  )
}

import type { CommandLogEntry } from '../types'

type Props = { entries: readonly CommandLogEntry[] }

export function SessionLog({ entries }: Props) {
  return (
    <section aria-label="Session log" className="panel" style={{ border: '1px solid #ddd', padding: 10, borderRadius: 4 }}>
      <div className="title" style={{ fontWeight: 700, marginBottom: 6 }}>Session Log {entries.length ? <span style={{ background: '#eef6ff', border: '1px solid #c9d6e2', color: '#244c6b', padding: '0 6px', borderRadius: 10, fontSize: 12 }}>{entries.length}</span> : null}</div>
      {entries.length ? (
        <ol style={{ margin: 0, paddingLeft: 20, fontSize: 12 }}>
          {entries.map((e, i) => (
            <li key={i}>
              <span style={{ color: '#567' }}>{new Date(e.timestamp).toLocaleTimeString()}</span> <code>{e.commandKey}</code>
            </li>
          ))}
        </ol>
      ) : (
        <div style={{ fontSize: 12, color: '#999' }}>No commands selected yet</div>
      )}
      <div style={{ fontSize: 11, color: '#999', marginTop: 6 }}>Cleared when the page reloads.</div>
    </section>
  )
}

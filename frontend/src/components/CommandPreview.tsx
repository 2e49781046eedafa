import { CATEGORY_LABELS, guidanceFor } from '../../../shared/catalog'
import type { CommandEntry } from '../types'

type Props = {
  entry: CommandEntry | null
  onCopy: () => void
}

export function CommandPreview({ entry, onCopy }: Props) {
  return (
    <section aria-label="Command preview" className="panel" style={{ border: '1px solid #ddd', padding: 10, borderRadius: 4 }}>
      <div className="title" style={{ fontWeight: 700, marginBottom: 6 }}>Command Preview</div>
      {entry ? (
        <div>
          <pre style={{
            margin: 0,
            padding: '10px 12px',
            background: '#0b0d0e',
            color: '#d1e0e0',
            fontFamily: 'ui-monospace, SFMono-Regular, Menlo, Monaco, Consolas, "Liberation Mono", "Courier New", monospace',
            fontSize: 16,
            borderRadius: 4,
            textAlign: 'left',
            userSelect: 'all',
          }}>{entry.displayText}</pre>
          <div style={{ display: 'grid', gridTemplateColumns: '1fr 2fr', gap: 10, marginTop: 10 }}>
            <div style={{ textAlign: 'right' }}>
              <div><b>Category:</b></div>
              <div><b>Description:</b></div>
              <div><b>Writes to:</b></div>
            </div>
            <div style={{ textAlign: 'left' }}>
              <div>{CATEGORY_LABELS[entry.category]}</div>
              <div>{entry.description}</div>
              <div>{entry.targetDirectory ?? '-'}</div>
            </div>
          </div>
          <div style={{ marginTop: 12 }}>
            <div style={{ fontWeight: 700, marginBottom: 4 }}>How to run it</div>
            <ol style={{ margin: 0, paddingLeft: 20 }}>
              {guidanceFor(entry).map((line) => <li key={line}>{line}</li>)}
            </ol>
          </div>
          <div style={{ marginTop: 8 }}>
            <button type="button" onClick={onCopy}>Copy (C)</button>
          </div>
        </div>
      ) : (
        'Select a command to preview it.'
      )}
    </section>
  )
}

import type { CommandGroup } from '../types'

type Props = { groups: CommandGroup[]; selectedKey: string | null; onSelect: (key: string) => void }

export function CommandCatalog({ groups, selectedKey, onSelect }: Props) {
  return (
    <section aria-label="Commands" className="panel" style={{ border: '1px solid #ddd', padding: 10, borderRadius: 4 }}>
      <div className="title" style={{ fontWeight: 700, marginBottom: 6 }}>Commands</div>
      {groups.map((group) => (
        <div key={group.category} style={{ marginBottom: 10 }}>
          <div style={{ fontSize: 12, color: '#567', textTransform: 'uppercase', letterSpacing: 0.5 }}>{group.label}</div>
          {group.entries.map((entry) => (
            <button
              key={entry.key}
              type="button"
              className={'command' + (entry.key === selectedKey ? ' active' : '')}
              title={entry.description}
              aria-pressed={entry.key === selectedKey}
              onClick={() => onSelect(entry.key)}
            >
              {entry.displayText}
            </button>
          ))}
        </div>
      ))}
    </section>
  )
}

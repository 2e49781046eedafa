import { useState, type FormEvent } from 'react'

type Props = {
  onLookup: (input: string) => boolean
}

export function ConsoleHeader({ onLookup }: Props) {
  const [value, setValue] = useState('')

  function submit(e: FormEvent<HTMLFormElement>) {
    e.preventDefault()
    if (!value.trim()) return
    if (onLookup(value)) setValue('')
  }

  return (
    <header style={{ padding: '8px 12px', background: '#101820', color: '#fff', display: 'flex', alignItems: 'center', gap: 12 }}>
      <div>
        <div style={{ fontWeight: 700 }}>Bridge Command Console</div>
        <div style={{ color: '#9bb', fontSize: 12 }}>Copy a command into a GitHub issue comment to trigger the bridge workflow.</div>
      </div>
      <div style={{ flex: 1 }} />
      <form onSubmit={submit} style={{ display: 'flex', gap: 6 }}>
        <input
          aria-label="Command lookup"
          value={value}
          onChange={(e) => setValue(e.target.value)}
          placeholder="Key or command"
        />
        <button type="submit">Show</button>
      </form>
    </header>
  )
}

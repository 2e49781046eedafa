import { useCallback, useEffect, useMemo, useState } from 'react'
import './App.css'
import { findCommand, getCommand, groupByCategory, suggestCommands } from '../../shared/catalog'
import { appendLogEntry } from '../../shared/session'
import type { CommandEntry, CommandLogEntry, Toast } from './types'
import { copyText } from './clipboard'
import { ConsoleHeader } from './components/ConsoleHeader'
import { CommandCatalog } from './components/CommandCatalog'
import { CommandPreview } from './components/CommandPreview'
import { SessionLog } from './components/SessionLog'
import { NotRecognizedBanner } from './components/NotRecognizedBanner'
import { Toaster } from './components/Toaster'

function isTextField(target: EventTarget | null): boolean {
  if (!(target instanceof HTMLElement)) return false
  return target.tagName === 'INPUT' || target.tagName === 'TEXTAREA' || target.isContentEditable
}

function App() {
  const groups = useMemo(() => groupByCategory(), [])
  const [selected, setSelected] = useState<CommandEntry | null>(null)
  const [log, setLog] = useState<CommandLogEntry[]>([])
  const [unknownInput, setUnknownInput] = useState<string | null>(null)
  const [toasts, setToasts] = useState<Toast[]>([])

  const removeToast = useCallback((id: string) => setToasts((t) => t.filter((x) => x.id !== id)), [])

  function pushToast(message: string, type: Toast['type']) {
    const id = Math.random().toString(36).slice(2)
    setToasts((t) => [...t, { id, message, type, ttlMs: 2500 }])
  }

  function select(entry: CommandEntry) {
    setSelected(entry)
    setLog((l) => appendLogEntry(l, entry.key))
    setUnknownInput(null)
  }

  function selectByKey(key: string) {
    const entry = getCommand(key)
    if (entry) select(entry)
  }

  function lookup(input: string): boolean {
    const entry = findCommand(input)
    if (!entry) {
      setUnknownInput(input.trim())
      return false
    }
    select(entry)
    return true
  }

  async function copySelected() {
    if (!selected) return
    if (await copyText(selected.displayText)) {
      pushToast(`Copied ${selected.displayText}`, 'success')
    } else {
      pushToast('Clipboard unavailable. Select the command text and copy it manually.', 'error')
    }
  }

  useEffect(() => {
    const handler = (e: KeyboardEvent) => {
      if (!selected || e.metaKey || e.ctrlKey) return
      if (isTextField(e.target)) return
      if (e.key.toLowerCase() === 'c') {
        e.preventDefault()
        void copySelected()
      }
    }
    window.addEventListener('keydown', handler)
    return () => window.removeEventListener('keydown', handler)
  }, [selected])

  return (
    <div>
      <ConsoleHeader onLookup={lookup} />
      <NotRecognizedBanner
        input={unknownInput}
        suggestions={unknownInput === null ? [] : suggestCommands(unknownInput)}
        onPick={selectByKey}
        onClose={() => setUnknownInput(null)}
      />
      <Toaster toasts={toasts} onRemove={removeToast} />

      <div className="grid" style={{ display: 'grid', gridTemplateColumns: '2fr 3fr 2fr', gap: 10, padding: 10 }}>
        <CommandCatalog
          groups={groups}
          selectedKey={selected?.key ?? null}
          onSelect={selectByKey}
        />
        <CommandPreview entry={selected} onCopy={() => { void copySelected() }} />
        <SessionLog entries={log} />
      </div>

      <div style={{ padding: 10, color: '#567', fontSize: 12 }}>
        Nothing runs from this page. Shortcut: <b>C</b> copies the previewed command.
      </div>
    </div>
  )
}

export default App

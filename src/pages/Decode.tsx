import { useState } from 'react'
import { toast } from 'sonner'
import { useDecoderStore } from '../stores/decoderStore'
import { DEVICE_MODELS, DEVICE_PORT_COUNTS, registry } from '../lib/swos'
import type { DecodeOutcome, ViewMode } from '../lib/swos'
import { formatResponse } from '../utils/formatResponse'
import PortTableView from '../components/viewer/PortTableView'
import EntryTableView from '../components/viewer/EntryTableView'
import RecordTreeView from '../components/viewer/RecordTreeView'
import PortChart from '../components/viewer/PortChart'

const VIEW_MODES: Array<{ mode: ViewMode; label: string }> = [
  { mode: 'table', label: 'Table' },
  { mode: 'tree', label: 'Tree' },
  { mode: 'chart', label: 'Chart' },
]

const BUTTON = 'px-3 py-1 rounded text-sm border border-border-subtle bg-elevated text-text-secondary hover:text-text-primary transition-colors disabled:opacity-50'

function OutcomeView({ outcome, viewMode }: { outcome: DecodeOutcome; viewMode: ViewMode }) {
  if (outcome.mode === 'table') {
    if (viewMode === 'tree') return <RecordTreeView records={outcome.entries} />
    if (viewMode === 'chart') {
      return <div className="py-8 text-center text-text-muted text-sm">Charts are available for per-port endpoints only</div>
    }
    return <EntryTableView entries={outcome.entries} />
  }
  if (viewMode === 'tree') return <RecordTreeView records={[outcome.record]} titles={[outcome.endpoint.name]} />
  if (viewMode === 'chart') return <PortChart record={outcome.record} />
  return <PortTableView record={outcome.record} />
}

function summarize(outcome: DecodeOutcome): string {
  if (outcome.mode === 'table') {
    return `${outcome.endpoint.name}: ${outcome.entries.length} ${outcome.entries.length === 1 ? 'entry' : 'entries'}`
  }
  return `${outcome.endpoint.name}: ${Object.keys(outcome.record).length} fields`
}

export default function Decode() {
  const selectedPath = useDecoderStore((s) => s.selectedPath)
  const deviceModel = useDecoderStore((s) => s.deviceModel)
  const text = useDecoderStore((s) => s.inputs[s.selectedPath] ?? '')
  const viewMode = useDecoderStore((s) => s.viewMode)
  const outcome = useDecoderStore((s) => s.outcome)
  const failure = useDecoderStore((s) => s.failure)
  const { selectPath, setDeviceModel, setInput, setViewMode, loadSample, decode, clear } = useDecoderStore.getState()
  const [formatting, setFormatting] = useState(false)

  const handleDecode = () => {
    try {
      const result = decode()
      if (result) toast.success(summarize(result))
      else toast.error('Decoding failed')
    } catch (err) {
      console.error('Unexpected decoder failure', err)
      toast.error(err instanceof Error ? err.message : 'Unexpected error')
      throw err
    }
  }

  const handleFormat = async () => {
    setFormatting(true)
    try {
      setInput(await formatResponse(text))
    } catch (err) {
      toast.error(err instanceof Error ? err.message.split('\n')[0] : 'Could not format the response')
    } finally {
      setFormatting(false)
    }
  }

  return (
    <div className="space-y-4">
      <div className="flex flex-wrap items-center gap-3">
        <label className="flex items-center gap-2 text-sm text-text-secondary">
          Endpoint
          <select
            value={selectedPath}
            onChange={(e) => selectPath(e.target.value)}
            className="bg-elevated text-text-primary text-sm rounded px-2 py-1 border border-border-subtle focus:outline-none"
          >
            {registry.paths().map((path) => (
              <option key={path} value={path}>{path} ({registry.get(path)?.name})</option>
            ))}
          </select>
        </label>
        <label className="flex items-center gap-2 text-sm text-text-secondary">
          Device
          <select
            value={deviceModel}
            onChange={(e) => setDeviceModel(e.target.value)}
            className="bg-elevated text-text-primary text-sm rounded px-2 py-1 border border-border-subtle focus:outline-none"
          >
            {DEVICE_MODELS.map((model) => (
              <option key={model} value={model}>{model} ({DEVICE_PORT_COUNTS[model]} ports)</option>
            ))}
          </select>
        </label>
        <div className="ml-auto flex items-center gap-2">
          <button onClick={loadSample} className={BUTTON}>Sample</button>
          <button onClick={handleFormat} disabled={formatting || text.trim() === ''} className={BUTTON}>
            {formatting ? 'Formatting...' : 'Format'}
          </button>
          <button onClick={clear} className={BUTTON}>Clear</button>
          <button
            onClick={handleDecode}
            className="px-3 py-1 rounded text-sm bg-info-fill text-white hover:bg-info-fill/80 transition-colors"
          >
            Decode
          </button>
        </div>
      </div>

      <textarea
        value={text}
        onChange={(e) => setInput(e.target.value)}
        spellCheck={false}
        placeholder={`Paste the response of ${selectedPath}`}
        className="w-full h-48 bg-surface text-text-primary font-mono text-xs rounded border border-border-subtle p-3 focus:outline-none focus:border-border-medium"
      />

      {failure && (
        <div className="rounded border border-critical-text/40 bg-surface px-4 py-3 text-sm">
          <span className="mr-2 text-xs uppercase tracking-wider text-critical-text">{failure.kind} error</span>
          <span className="font-mono text-text-primary">{failure.message}</span>
        </div>
      )}

      {outcome && (
        <div className="rounded border border-border-subtle bg-surface p-4">
          <div className="mb-3 flex items-center gap-3">
            <span className="text-sm text-text-secondary">{summarize(outcome)}</span>
            <div className="ml-auto flex gap-1 text-sm">
              {VIEW_MODES.map(({ mode, label }) => (
                <button
                  key={mode}
                  onClick={() => setViewMode(mode)}
                  className={`px-2 py-1 rounded transition-colors ${
                    viewMode === mode ? 'text-text-primary bg-elevated' : 'text-text-secondary hover:text-text-primary'
                  }`}
                >
                  {label}
                </button>
              ))}
            </div>
          </div>
          <OutcomeView outcome={outcome} viewMode={viewMode} />
        </div>
      )}
    </div>
  )
}

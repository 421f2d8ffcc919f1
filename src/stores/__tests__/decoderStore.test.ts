import { describe, it, expect, beforeEach } from 'vitest'
import { STORAGE_KEY, portCountFor, useDecoderStore } from '../decoderStore'

describe('useDecoderStore', () => {
  beforeEach(() => {
    localStorage.clear()
    useDecoderStore.setState({
      selectedPath: 'link.b',
      deviceModel: 'css326',
      inputs: {},
      viewMode: 'table',
      outcome: null,
      failure: null,
    })
  })

  it('decodes a generated sample for the selected device', () => {
    const store = useDecoderStore.getState()
    store.setDeviceModel('css610')
    useDecoderStore.getState().loadSample()
    const outcome = useDecoderStore.getState().decode()

    expect(outcome?.mode).toBe('record')
    if (outcome?.mode !== 'record') return
    expect(outcome.record.name).toHaveLength(10)
    expect(useDecoderStore.getState().failure).toBeNull()
  })

  it('decodes table samples into entries', () => {
    useDecoderStore.getState().selectPath('vlan.b')
    useDecoderStore.getState().loadSample()
    const outcome = useDecoderStore.getState().decode()
    expect(outcome?.mode).toBe('table')
    if (outcome?.mode !== 'table') return
    expect(outcome.entries).toHaveLength(2)
  })

  it('records parse failures', () => {
    useDecoderStore.getState().setInput('{en:')
    expect(useDecoderStore.getState().decode()).toBeNull()
    expect(useDecoderStore.getState().failure?.kind).toBe('ParseError')
    expect(useDecoderStore.getState().outcome).toBeNull()
  })

  it('records field decode failures with the field named', () => {
    useDecoderStore.getState().setInput("{nm:['486']}")
    useDecoderStore.getState().decode()
    expect(useDecoderStore.getState().failure).toEqual({
      kind: 'FieldDecodeError',
      message: "LinkEndpoint: cannot decode field 'name' (nm): invalid hex string '486'",
    })
  })

  it('records schema mismatches', () => {
    useDecoderStore.getState().setInput("{nm:'4142'}")
    useDecoderStore.getState().decode()
    expect(useDecoderStore.getState().failure?.kind).toBe('SchemaError')
  })

  it('keeps one input per endpoint path', () => {
    useDecoderStore.getState().setInput('{i01:0x1}')
    useDecoderStore.getState().selectPath('sys.b')
    expect(useDecoderStore.getState().inputs['sys.b']).toBeUndefined()
    useDecoderStore.getState().selectPath('link.b')
    expect(useDecoderStore.getState().inputs['link.b']).toBe('{i01:0x1}')
  })

  it('clears the selected input and result', () => {
    useDecoderStore.getState().setInput('{i01:0x1}')
    useDecoderStore.getState().decode()
    useDecoderStore.getState().clear()
    expect(useDecoderStore.getState().inputs['link.b']).toBe('')
    expect(useDecoderStore.getState().outcome).toBeNull()
  })

  it('persists preferences and inputs but not results', () => {
    useDecoderStore.getState().setViewMode('chart')
    useDecoderStore.getState().setInput('{i01:0x1}')
    useDecoderStore.getState().decode()

    const saved = JSON.parse(localStorage.getItem(STORAGE_KEY) ?? 'null')
    expect(saved.state.inputs).toEqual({ 'link.b': '{i01:0x1}' })
    expect(saved.state.viewMode).toBe('chart')
    expect(saved.state).not.toHaveProperty('outcome')
  })
})

describe('portCountFor', () => {
  it('looks up the model and falls back to the default model', () => {
    expect(portCountFor('css610')).toBe(10)
    expect(portCountFor('unknown')).toBe(26)
  })
})

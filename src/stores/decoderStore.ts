import { create } from 'zustand'
import { createJSONStorage, persist } from 'zustand/middleware'
import type { DecodeOutcome, ViewMode } from '../lib/swos/types'
import type { ErrorKind } from '../lib/swos/errors'
import { SwitchOsError, errorKind } from '../lib/swos/errors'
import { registry } from '../lib/swos/registry'
import { DEVICE_PORT_COUNTS, generateResponse } from '../lib/swos/sample'

export const STORAGE_KEY = 'swos-decoder'

export interface DecodeFailure {
  kind: ErrorKind
  message: string
}

interface DecoderStore {
  // Persisted
  selectedPath: string
  deviceModel: string
  inputs: Record<string, string>
  viewMode: ViewMode

  // Last decode
  outcome: DecodeOutcome | null
  failure: DecodeFailure | null

  selectPath: (path: string) => void
  setDeviceModel: (model: string) => void
  setInput: (text: string) => void
  setViewMode: (mode: ViewMode) => void
  loadSample: () => void
  decode: () => DecodeOutcome | null
  clear: () => void
}

const DEFAULT_MODEL = 'css326'

export function portCountFor(model: string): number {
  return DEVICE_PORT_COUNTS[model] ?? DEVICE_PORT_COUNTS[DEFAULT_MODEL]
}

export const useDecoderStore = create<DecoderStore>()(
  persist(
    (set, get) => ({
      selectedPath: 'link.b',
      deviceModel: DEFAULT_MODEL,
      inputs: {},
      viewMode: 'table',
      outcome: null,
      failure: null,

      selectPath: (path) => set({ selectedPath: path, outcome: null, failure: null }),

      setDeviceModel: (model) => set({ deviceModel: model }),

      setInput: (text) =>
        set((state) => ({ inputs: { ...state.inputs, [state.selectedPath]: text } })),

      setViewMode: (mode) => set({ viewMode: mode }),

      loadSample: () => {
        const { selectedPath, deviceModel } = get()
        const endpoint = registry.get(selectedPath)
        if (!endpoint) return
        const text = generateResponse(endpoint, portCountFor(deviceModel), 2)
        set((state) => ({ inputs: { ...state.inputs, [selectedPath]: text }, outcome: null, failure: null }))
      },

      decode: () => {
        const { selectedPath, inputs } = get()
        try {
          const outcome = registry.decode(selectedPath, inputs[selectedPath] ?? '')
          set({ outcome, failure: null })
          return outcome
        } catch (err) {
          if (!(err instanceof SwitchOsError)) throw err
          set({ outcome: null, failure: { kind: errorKind(err), message: err.message } })
          return null
        }
      },

      clear: () =>
        set((state) => ({ inputs: { ...state.inputs, [state.selectedPath]: '' }, outcome: null, failure: null })),
    }),
    {
      name: STORAGE_KEY,
      storage: createJSONStorage(() => localStorage),
      partialize: (state) => ({
        selectedPath: state.selectedPath,
        deviceModel: state.deviceModel,
        inputs: state.inputs,
        viewMode: state.viewMode,
      }),
    },
  ),
)

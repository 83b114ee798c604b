import { createStore } from 'zustand/vanilla'
import type { ProgressSample, TransferDirection, TransferPhase } from '@/types/transfer'

/** What a progress view needs to render the current attempt */
export interface TransferView {
  attemptId: string | null
  direction: TransferDirection | null
  fileName: string
  phase: TransferPhase
  transferredBytes: number
  totalBytes: number
  speed: number        // bytes/sec
  eta: number          // seconds remaining
  startedAt?: number
  error?: string
}

interface TransferState extends TransferView {
  begin: (attemptId: string, direction: TransferDirection, fileName: string) => void
  setPhase: (phase: TransferPhase, error?: string) => void
  updateProgress: (sample: ProgressSample, now?: number) => void
  reset: () => void
}

const INITIAL_VIEW: TransferView = {
  attemptId: null,
  direction: null,
  fileName: '',
  phase: 'idle',
  transferredBytes: 0,
  totalBytes: 0,
  speed: 0,
  eta: 0
}

export const createTransferStore = () =>
  createStore<TransferState>((set) => ({
    ...INITIAL_VIEW,

    begin: (attemptId, direction, fileName) =>
      set({ ...INITIAL_VIEW, attemptId, direction, fileName, startedAt: undefined, error: undefined }),

    setPhase: (phase, error) =>
      set((state) => ({
        phase,
        error,
        startedAt: phase === 'transferring' ? Date.now() : state.startedAt
      })),

    updateProgress: (sample, now = Date.now()) =>
      set((state) => {
        const elapsed = (now - (state.startedAt ?? now)) / 1000
        const speed = elapsed > 0 ? sample.transferredBytes / elapsed : 0
        const remaining = sample.totalBytes - sample.transferredBytes
        return {
          transferredBytes: sample.transferredBytes,
          totalBytes: sample.totalBytes,
          speed,
          eta: speed > 0 ? remaining / speed : 0
        }
      }),

    reset: () => set({ ...INITIAL_VIEW, startedAt: undefined, error: undefined })
  }))

export type TransferStore = ReturnType<typeof createTransferStore>

/** Store backing the CLI's progress line */
export const transferStore = createTransferStore()

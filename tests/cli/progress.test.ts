import { describe, it, expect, afterEach, vi } from 'vitest'
import { formatTransferLine, renderProgress } from '../../main/cli/progress'
import { createTransferStore } from '../../src/stores/transferStore'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('formatTransferLine', () => {
  it('shows the file, progress, speed and ETA', () => {
    expect(
      formatTransferLine({
        attemptId: 'attempt-1',
        direction: 'download',
        fileName: 'report.csv',
        phase: 'transferring',
        transferredBytes: 512,
        totalBytes: 1024,
        speed: 256,
        eta: 2
      })
    ).toBe('Downloading report.csv  50.0% (512/1024 bytes)  256 B/s  ETA 2s')
  })
})

describe('renderProgress', () => {
  it('redraws one line while transferring and ends it afterwards', () => {
    vi.spyOn(Date, 'now').mockReturnValue(1_000)
    const store = createTransferStore()
    const writes: string[] = []
    const stop = renderProgress(store, { write: (text: string) => writes.push(text) })

    store.getState().begin('attempt-1', 'upload', 'a.txt')
    store.getState().setPhase('transferring')
    store.getState().updateProgress({ transferredBytes: 0, totalBytes: 3 }, 1_000)
    store.getState().updateProgress({ transferredBytes: 3, totalBytes: 3 }, 1_000)
    store.getState().setPhase('recording')
    stop()

    expect(writes).toEqual([
      '\rUploading a.txt  100.0% (0/0 bytes)\x1b[K',
      '\rUploading a.txt  0.0% (0/3 bytes)\x1b[K',
      '\rUploading a.txt  100.0% (3/3 bytes)\x1b[K',
      '\n'
    ])
  })
})

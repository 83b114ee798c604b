import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, readFile, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { HistoryStore, createHistoryEntry, formatHistoryDate } from '../../main/services/HistoryStore'
import { LogService, SYSTEM_LOG_ID } from '../../main/services/LogService'
import { StorageError } from '../../main/utils/errors'
import type { HistoryEntry } from '../../src/types/history'

let tmpDir: string
let log: LogService

function entry(overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  return { date: '2024-01-15 09:30', type: 'upload', file: 'a.txt', status: 'success', ...overrides }
}

function historyPath(): string {
  return join(tmpDir, 'transfer-history.json')
}

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'sftp-courier-history-test-'))
  log = new LogService()
})

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true })
})

describe('formatHistoryDate', () => {
  it('formats local time truncated to the minute', () => {
    expect(formatHistoryDate(new Date(2024, 0, 5, 7, 3, 59))).toBe('2024-01-05 07:03')
  })

  it('createHistoryEntry returns a frozen record', () => {
    const e = createHistoryEntry('download', 'b.bin', 'failed', new Date(2023, 11, 31, 23, 59))
    expect(e).toEqual({ date: '2023-12-31 23:59', type: 'download', file: 'b.bin', status: 'failed' })
    expect(Object.isFrozen(e)).toBe(true)
  })
})

describe('HistoryStore', () => {
  it('loads an empty log when nothing is persisted', () => {
    const store = new HistoryStore({ cwd: tmpDir, log })
    expect(store.load()).toEqual([])
  })

  it('append followed by load yields the entry as the last element', () => {
    const store = new HistoryStore({ cwd: tmpDir, log })
    store.load()
    store.append(entry({ file: 'first.txt' }))
    store.append(entry({ file: 'second.txt' }))

    const reloaded = new HistoryStore({ cwd: tmpDir, log }).load()
    expect(reloaded.map((e) => e.file)).toEqual(['first.txt', 'second.txt'])
    expect(reloaded[reloaded.length - 1]).toEqual(entry({ file: 'second.txt' }))
  })

  it('reads the existing file before the first append', () => {
    const first = new HistoryStore({ cwd: tmpDir, log })
    first.load()
    first.append(entry({ file: 'old.txt' }))

    const second = new HistoryStore({ cwd: tmpDir, log })
    second.append(entry({ file: 'a.txt' }))

    expect(second.getAll().map((e) => e.file)).toEqual(['old.txt', 'a.txt'])
    expect(new HistoryStore({ cwd: tmpDir, log }).load().map((e) => e.file)).toEqual(['old.txt', 'a.txt'])
  })

  it('deletes from the existing file without an explicit load', () => {
    new HistoryStore({ cwd: tmpDir, log }).append(entry({ file: 'keep.txt' }))
    new HistoryStore({ cwd: tmpDir, log }).append(entry({ file: 'drop.txt' }))

    const store = new HistoryStore({ cwd: tmpDir, log })
    expect(store.deleteMatching({ date: '2024-01-15 09:30', file: 'drop.txt', status: 'success' })).toBe(true)
    expect(new HistoryStore({ cwd: tmpDir, log }).load()).toEqual([entry({ file: 'keep.txt' })])
  })

  it('persists the four string fields under "history"', async () => {
    const store = new HistoryStore({ cwd: tmpDir, log })
    store.append(entry())

    const raw = JSON.parse(await readFile(historyPath(), 'utf-8'))
    expect(raw).toEqual({
      history: [{ date: '2024-01-15 09:30', type: 'upload', file: 'a.txt', status: 'success' }]
    })
  })

  it('keeps non-ASCII file names readable on disk', async () => {
    const store = new HistoryStore({ cwd: tmpDir, log })
    store.append(entry({ file: 'گزارش.pdf' }))

    const text = await readFile(historyPath(), 'utf-8')
    expect(text).toContain('"file": "گزارش.pdf"')
    expect(new HistoryStore({ cwd: tmpDir, log }).load()[0].file).toBe('گزارش.pdf')
  })

  it('uses the configured file name', async () => {
    const store = new HistoryStore({ cwd: tmpDir, fileName: 'custom-log', log })
    store.append(entry())
    expect(store.path).toBe(join(tmpDir, 'custom-log.json'))
    const raw = JSON.parse(await readFile(join(tmpDir, 'custom-log.json'), 'utf-8'))
    expect(raw.history).toHaveLength(1)
  })

  it('recovers from a corrupt file with an empty log and a warning', async () => {
    await writeFile(historyPath(), '{ not json', 'utf-8')
    const store = new HistoryStore({ cwd: tmpDir, log })

    expect(store.load()).toEqual([])
    const warnings = log.getEntries(SYSTEM_LOG_ID).filter((e) => e.level === 'warning')
    expect(warnings).toHaveLength(1)
    expect(warnings[0].source).toBe('history')

    store.append(entry())
    const raw = JSON.parse(await readFile(historyPath(), 'utf-8'))
    expect(raw.history).toEqual([entry()])
  })

  it('reports a corrupt file even after the path was looked up', async () => {
    const store = new HistoryStore({ cwd: tmpDir, log })
    expect(store.path).toBe(historyPath())
    await writeFile(historyPath(), '{ not json', 'utf-8')

    expect(store.load()).toEqual([])
    expect(log.getEntries(SYSTEM_LOG_ID).map((e) => e.message)).toEqual([
      'Transfer history could not be read; starting with an empty log.'
    ])
  })

  it('treats a non-list history value as corrupt', async () => {
    await writeFile(historyPath(), JSON.stringify({ history: 'oops' }), 'utf-8')
    const store = new HistoryStore({ cwd: tmpDir, log })
    expect(store.load()).toEqual([])
    expect(log.getEntries(SYSTEM_LOG_ID)).toHaveLength(1)
  })

  it('drops malformed records and keeps the rest', async () => {
    const good = entry({ file: 'ok.txt' })
    await writeFile(
      historyPath(),
      JSON.stringify({ history: [good, { date: 1, type: 'upload' }, { ...good, status: 'maybe' }] }),
      'utf-8'
    )
    const store = new HistoryStore({ cwd: tmpDir, log })

    expect(store.load()).toEqual([good])
    expect(log.getEntries(SYSTEM_LOG_ID)[0].message).toBe('Dropped 2 malformed history record(s).')
  })

  it('deleteMatching removes exactly one entry matching date, file and status', () => {
    const store = new HistoryStore({ cwd: tmpDir, log })
    store.append(entry({ date: '2024-01-15 09:30', status: 'success' }))
    store.append(entry({ date: '2024-01-15 09:31', status: 'success' }))
    store.append(entry({ date: '2024-01-15 09:30', status: 'failed' }))

    expect(store.deleteMatching({ date: '2024-01-15 09:30', file: 'a.txt', status: 'failed' })).toBe(true)

    const remaining = new HistoryStore({ cwd: tmpDir, log }).load()
    expect(remaining).toEqual([
      entry({ date: '2024-01-15 09:30', status: 'success' }),
      entry({ date: '2024-01-15 09:31', status: 'success' })
    ])
  })

  it('deleteMatching removes only the first of identical entries', () => {
    const store = new HistoryStore({ cwd: tmpDir, log })
    store.append(entry())
    store.append(entry())

    expect(store.deleteMatching({ date: '2024-01-15 09:30', file: 'a.txt', status: 'success' })).toBe(true)
    expect(store.load()).toEqual([entry()])
  })

  it('deleteMatching returns false when nothing matches', () => {
    const store = new HistoryStore({ cwd: tmpDir, log })
    store.append(entry())
    expect(store.deleteMatching({ date: '2024-01-15 09:30', file: 'b.txt', status: 'success' })).toBe(false)
    expect(store.getAll()).toHaveLength(1)
  })

  it('clear followed by load yields an empty log', () => {
    const store = new HistoryStore({ cwd: tmpDir, log })
    store.append(entry())
    store.append(entry({ file: 'b.txt' }))
    store.clear()

    expect(new HistoryStore({ cwd: tmpDir, log }).load()).toEqual([])
  })

  it('raises StorageError when the history cannot be written', async () => {
    const blocker = join(tmpDir, 'not-a-dir')
    await writeFile(blocker, 'x', 'utf-8')
    const store = new HistoryStore({ cwd: blocker, log })

    expect(() => store.append(entry())).toThrow(StorageError)
    expect(store.getAll()).toEqual([])
  })
})

import Conf from 'conf'
import { getLogService, LogService, SYSTEM_LOG_ID } from './LogService'
import { PROJECT_NAME, type StoreLocation } from './SettingsStore'
import { StorageError, errorMessage, type StorageOperation } from '../utils/errors'
import type { HistoryEntry, HistoryKey, HistoryLog, HistoryStatus } from '../../src/types/history'
import type { TransferDirection } from '../../src/types/transfer'

interface HistorySchema {
  history: HistoryEntry[]
}

export interface HistoryStoreOptions extends StoreLocation {
  /** Base name of the JSON file (without extension) */
  fileName?: string
  log?: LogService
}

const pad = (n: number): string => String(n).padStart(2, '0')

/** Local date-time truncated to the minute: "YYYY-MM-DD HH:MM" */
export function formatHistoryDate(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  )
}

export function createHistoryEntry(
  type: TransferDirection,
  file: string,
  status: HistoryStatus,
  now: Date = new Date()
): HistoryEntry {
  return Object.freeze({ date: formatHistoryDate(now), type, file, status })
}

function isHistoryEntry(value: unknown): value is HistoryEntry {
  if (typeof value !== 'object' || value === null) return false
  if (!('date' in value && 'type' in value && 'file' in value && 'status' in value)) return false
  return (
    typeof value.date === 'string' &&
    (value.type === 'upload' || value.type === 'download') &&
    typeof value.file === 'string' &&
    (value.status === 'success' || value.status === 'failed')
  )
}

/**
 * HistoryStore — append-only log of past transfer attempts.
 *
 * Every mutation is written synchronously before the in-memory copy is
 * replaced. Reading is lenient: a missing, unreadable or corrupt file yields an
 * empty log and a warning in the activity log, never an error.
 */
export class HistoryStore {
  private writer: Conf<HistorySchema> | null = null
  private entries: HistoryEntry[] | null = null
  private options: HistoryStoreOptions
  private log: LogService

  constructor(options: HistoryStoreOptions = {}) {
    this.options = options
    this.log = options.log ?? getLogService()
  }

  /** Read the persisted log, replacing the in-memory copy */
  load(): HistoryLog {
    let loaded: HistoryEntry[]
    try {
      const raw: unknown = this.createConf(false).get('history')
      loaded = this.parse(raw)
    } catch (err) {
      this.log.log(
        SYSTEM_LOG_ID,
        'warning',
        'history',
        'Transfer history could not be read; starting with an empty log.',
        errorMessage(err)
      )
      loaded = []
    }
    this.entries = loaded
    return [...loaded]
  }

  /** Current log, oldest first. Reads the file on first use. */
  getAll(): HistoryLog {
    return [...this.current()]
  }

  append(entry: HistoryEntry): void {
    this.commit('append', [...this.current(), entry])
  }

  /**
   * Remove the first entry with the same date, file and status.
   * Returns false when nothing matched.
   */
  deleteMatching(key: HistoryKey): boolean {
    const entries = this.current()
    const idx = entries.findIndex(
      (e) => e.date === key.date && e.file === key.file && e.status === key.status
    )
    if (idx === -1) return false

    this.commit('delete', entries.filter((_, i) => i !== idx))
    return true
  }

  clear(): void {
    this.commit('clear', [])
  }

  /** Absolute path of the history file */
  get path(): string {
    return this.createConf(true).path
  }

  private current(): HistoryEntry[] {
    if (this.entries === null) this.load()
    return this.entries ?? []
  }

  private commit(operation: StorageOperation, next: HistoryEntry[]): void {
    try {
      // A corrupt file is replaced on write; load() reports it before that
      if (!this.writer) this.writer = this.createConf(true)
      this.writer.set('history', next)
    } catch (err) {
      throw new StorageError(operation, `Failed to save transfer history: ${errorMessage(err)}`, err)
    }
    this.entries = next
  }

  private createConf(clearInvalidConfig: boolean): Conf<HistorySchema> {
    return new Conf<HistorySchema>({
      projectName: PROJECT_NAME,
      cwd: this.options.cwd,
      configName: this.options.fileName ?? 'transfer-history',
      clearInvalidConfig
    })
  }

  private parse(raw: unknown): HistoryEntry[] {
    if (raw === undefined) return []
    if (!Array.isArray(raw)) {
      throw new Error('history is not a list')
    }

    const valid = raw.filter(isHistoryEntry)
    if (valid.length < raw.length) {
      this.log.log(
        SYSTEM_LOG_ID,
        'warning',
        'history',
        `Dropped ${raw.length - valid.length} malformed history record(s).`
      )
    }
    return valid.map((e) => Object.freeze({ date: e.date, type: e.type, file: e.file, status: e.status }))
  }
}

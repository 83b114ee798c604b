import type { TransferDirection } from './transfer'

/** Outcome recorded for an attempt */
export type HistoryStatus = 'success' | 'failed'

/**
 * One persisted transfer attempt.
 * Field names match the on-disk record.
 */
export interface HistoryEntry {
  readonly date: string          // "YYYY-MM-DD HH:MM", local time
  readonly type: TransferDirection
  readonly file: string
  readonly status: HistoryStatus
}

/** Identifies an entry for deletion */
export type HistoryKey = Pick<HistoryEntry, 'date' | 'file' | 'status'>

/** Insertion-ordered (oldest first) */
export type HistoryLog = readonly HistoryEntry[]

import type { HistoryEntry, HistoryLog, HistoryStatus } from '@/types/history'
import type { TransferDirection } from '@/types/transfer'

const TYPE_LABELS: Record<TransferDirection, string> = {
  upload: 'Upload',
  download: 'Download'
}

const STATUS_LABELS: Record<HistoryStatus, string> = {
  success: 'Success',
  failed: 'Failed'
}

/** Most recent first */
export function toDisplayOrder(log: HistoryLog): HistoryEntry[] {
  return [...log].reverse()
}

export function typeLabel(type: TransferDirection): string {
  return TYPE_LABELS[type]
}

export function statusLabel(status: HistoryStatus): string {
  return STATUS_LABELS[status]
}

/** Map a display label (or the stored value) back to a status */
export function parseStatus(value: string): HistoryStatus | null {
  const normalized = value.trim().toLowerCase()
  if (normalized === 'success') return 'success'
  if (normalized === 'failed') return 'failed'
  return null
}

/**
 * Render the log as a fixed-width table, newest first.
 * Columns: date, type, file, status.
 */
export function formatHistoryTable(log: HistoryLog): string[] {
  const rows = toDisplayOrder(log).map((e) => [e.date, typeLabel(e.type), e.file, statusLabel(e.status)])
  const header = ['Date', 'Type', 'File', 'Status']
  const widths = header.map((h, col) => Math.max(h.length, ...rows.map((r) => r[col].length)))
  const line = (cells: string[]) =>
    cells
      .map((cell, col) => (col === cells.length - 1 ? cell : cell.padEnd(widths[col])))
      .join('  ')

  return [line(header), ...rows.map(line)]
}

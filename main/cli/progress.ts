import chalk from 'chalk'
import type { TransferStore, TransferView } from '../../src/stores/transferStore'
import { formatETA, formatProgress, formatSpeed } from '../../src/utils/fileSize'
import type { LogEntry, LogLevel } from '../../src/types/log'

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  info: chalk.cyan,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  debug: chalk.dim
}

/** One-line summary of the transfer in flight */
export function formatTransferLine(view: TransferView): string {
  const verb = view.direction === 'download' ? 'Downloading' : 'Uploading'
  const parts = [`${verb} ${view.fileName}`, formatProgress(view.transferredBytes, view.totalBytes)]
  if (view.speed > 0) parts.push(formatSpeed(view.speed))
  if (view.eta > 0) parts.push(`ETA ${formatETA(view.eta)}`)
  return parts.join('  ')
}

export function formatLogEntry(entry: LogEntry): string {
  const time = new Date(entry.timestamp).toLocaleTimeString()
  const line = `${chalk.dim(time)} ${LEVEL_COLORS[entry.level](entry.source.padEnd(7))} ${entry.message}`
  return entry.details ? `${line}\n  ${chalk.dim(entry.details)}` : line
}

/** Where progress is drawn; process.stderr in the CLI */
export interface LineWriter {
  write(text: string): unknown
}

/**
 * Draw the store's progress on stderr, redrawing a single line while
 * transferring. Returns the unsubscribe function.
 */
export function renderProgress(store: TransferStore, out: LineWriter = process.stderr): () => void {
  let lineOpen = false

  const endLine = () => {
    if (lineOpen) {
      out.write('\n')
      lineOpen = false
    }
  }

  const unsubscribe = store.subscribe((view, previous) => {
    if (view.phase !== previous.phase) {
      if (view.phase === 'connecting') {
        out.write(chalk.dim('Connecting...\n'))
      } else if (view.phase !== 'transferring') {
        endLine()
      }
    }

    const moved =
      view.phase !== previous.phase ||
      view.transferredBytes !== previous.transferredBytes ||
      view.totalBytes !== previous.totalBytes
    if (view.phase === 'transferring' && moved) {
      out.write(`\r${formatTransferLine(view)}\x1b[K`)
      lineOpen = true
    }
  })

  return () => {
    unsubscribe()
    endLine()
  }
}

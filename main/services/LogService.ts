import { EventEmitter } from 'events'
import { randomUUID } from 'crypto'
import type { LogEntry, LogLevel, LogSource } from '../../src/types/log'
import type { TransferDirection } from '../../src/types/transfer'

const DEFAULT_MAX_ENTRIES = 5000

/** Bucket for entries not tied to a transfer attempt */
export const SYSTEM_LOG_ID = 'system'

function toTextLine(entry: LogEntry): string {
  const time = new Date(entry.timestamp).toISOString()
  const line = `[${time}] [${entry.level.toUpperCase().padEnd(7)}] [${entry.source.toUpperCase().padEnd(7)}] ${entry.message}`
  return entry.details ? `${line}\n  ${entry.details}` : line
}

/**
 * LogService — central event-based log aggregator for transfer activity.
 *
 * Stores log entries per attempt in memory (FIFO with configurable max).
 * Emits 'entry' events with (attemptId, LogEntry) so the CLI can print them.
 */
export class LogService extends EventEmitter {
  private entries: Map<string, LogEntry[]> = new Map()
  private maxEntries: number
  private debugMode: boolean

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES, debugMode: boolean = false) {
    super()
    this.maxEntries = maxEntries
    this.debugMode = debugMode
  }

  /** Set the maximum number of log entries per attempt */
  setMaxEntries(max: number): void {
    this.maxEntries = max
  }

  /** Enable or disable debug-level log entries */
  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled
  }

  /**
   * Record an entry for an attempt and emit it. Debug entries are only kept
   * (and emitted) in debug mode; the entry is returned either way.
   */
  log(
    attemptId: string,
    level: LogLevel,
    source: LogSource,
    message: string,
    details?: string
  ): LogEntry {
    const entry: LogEntry = { id: randomUUID(), timestamp: Date.now(), attemptId, level, source, message, details }

    if (level !== 'debug' || this.debugMode) {
      this.keep(entry)
      this.emit('entry', attemptId, entry)
    }
    return entry
  }

  getEntries(attemptId: string): LogEntry[] {
    return this.entries.get(attemptId) ?? []
  }

  /** Entries of one attempt as plain text, one line each (details indented below) */
  exportLog(attemptId: string): string {
    return this.getEntries(attemptId).map(toTextLine).join('\n')
  }

  private keep(entry: LogEntry): void {
    const attemptLog = this.entries.get(entry.attemptId) ?? []
    attemptLog.push(entry)
    const overflow = attemptLog.length - this.maxEntries
    if (overflow > 0) attemptLog.splice(0, overflow)
    this.entries.set(entry.attemptId, attemptLog)
  }

  // ── Static helper methods for common log messages ──

  static connecting(log: LogService, attemptId: string, host: string, port: number): void {
    log.log(attemptId, 'info', 'ssh', `Connecting to SSH server ${host}:${port}...`)
  }

  static authenticating(log: LogService, attemptId: string, username: string): void {
    log.log(attemptId, 'info', 'ssh', `Authenticating as ${username} with method: password...`)
  }

  static authSuccess(log: LogService, attemptId: string): void {
    log.log(attemptId, 'success', 'ssh', 'Authentication successful.')
  }

  static connectionFailed(log: LogService, attemptId: string, reason: string): void {
    log.log(attemptId, 'error', 'ssh', `Connection failed: ${reason}`)
  }

  static terminated(log: LogService, attemptId: string): void {
    log.log(attemptId, 'info', 'ssh', 'SSH connection terminated.')
  }

  static sftpOpened(log: LogService, attemptId: string): void {
    log.log(attemptId, 'info', 'sftp', 'SFTP subsystem opened.')
  }

  static transferStarted(
    log: LogService,
    attemptId: string,
    filename: string,
    direction: TransferDirection
  ): void {
    log.log(attemptId, 'info', 'sftp', `File transfer started: ${filename} (${direction})`)
  }

  static transferCompleted(log: LogService, attemptId: string, filename: string): void {
    log.log(attemptId, 'success', 'sftp', `File transfer completed: ${filename}`)
  }

  static transferFailed(log: LogService, attemptId: string, filename: string, reason: string): void {
    log.log(attemptId, 'error', 'sftp', `File transfer failed: ${filename}: ${reason}`)
  }

  static historyRecorded(log: LogService, attemptId: string, filename: string, status: string): void {
    log.log(attemptId, 'debug', 'history', `Recorded ${status} entry for ${filename}.`)
  }

  static historyWriteFailed(log: LogService, attemptId: string, reason: string): void {
    log.log(attemptId, 'warning', 'history', `Transfer history not saved: ${reason}`)
  }
}

/** Singleton LogService instance */
let logServiceInstance: LogService | null = null

/** Get (or create) the singleton LogService */
export function getLogService(): LogService {
  if (!logServiceInstance) {
    logServiceInstance = new LogService()
  }
  return logServiceInstance
}

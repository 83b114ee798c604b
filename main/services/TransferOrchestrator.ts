import { randomUUID } from 'crypto'
import { promises as fsp, constants as fsConstants } from 'fs'
import { basename } from 'path'
import { createHistoryEntry, type HistoryStore } from './HistoryStore'
import { getLogService, LogService } from './LogService'
import { ProgressReporter } from './ProgressReporter'
import {
  TransferSession,
  validateConnectionParams,
  type ProgressCallback,
  type SessionOptions
} from './TransferSession'
import {
  ConnectionError,
  CourierError,
  StorageError,
  TransferError,
  ValidationError,
  errorMessage
} from '../utils/errors'
import { DEFAULT_SETTINGS, type AppSettings } from '../../src/types/settings'
import type { HistoryEntry } from '../../src/types/history'
import type {
  ConnectionParams,
  ProgressSample,
  TransferDirection,
  TransferErrorKind,
  TransferPhase,
  TransferRequest
} from '../../src/types/transfer'

/** What the orchestrator needs from an open session */
export interface RemoteSession {
  upload(localPath: string, remoteName: string, onProgress: ProgressCallback, signal?: AbortSignal): Promise<void>
  download(remoteName: string, localSavePath: string, onProgress: ProgressCallback, signal?: AbortSignal): Promise<void>
  close(): void
}

export type SessionFactory = (params: ConnectionParams, options: SessionOptions) => Promise<RemoteSession>

/** Caller-supplied observers and collaborators for one attempt */
export interface TransferHooks {
  onProgress?: (sample: ProgressSample) => void
  onStateChange?: (phase: TransferPhase, attemptId: string) => void
  /**
   * Asked for a download destination when the request carries none.
   * Returning null (or an empty string) declines the download.
   */
  chooseDestination?: (remoteName: string) => Promise<string | null> | string | null
  signal?: AbortSignal
}

interface OutcomeBase {
  attemptId: string
  direction: TransferDirection
  fileName: string
  /** Non-fatal problems, e.g. the history could not be saved */
  warnings: string[]
}

export interface TransferSuccess extends OutcomeBase {
  status: 'success'
  /** Remote name for uploads, local save path for downloads */
  effectivePath: string
  entry: HistoryEntry
}

export interface TransferFailure extends OutcomeBase {
  status: 'failed'
  errorKind: TransferErrorKind
  message: string
  error: CourierError
  /** Absent when the failure was not recorded (missing input) */
  entry?: HistoryEntry
}

export type TransferOutcome = TransferSuccess | TransferFailure

export interface OrchestratorOptions {
  history: HistoryStore
  settings?: Partial<AppSettings>
  log?: LogService
  openSession?: SessionFactory
  now?: () => Date
}

/** Resolved inputs of an attempt that passed validation */
interface ValidatedTransfer {
  connection: Required<ConnectionParams>
  fileName: string
  remoteName: string
  localPath: string
}

const NEXT_PHASES: Record<TransferPhase, TransferPhase[]> = {
  idle: ['validating'],
  validating: ['connecting', 'failed'],
  connecting: ['transferring', 'failed'],
  transferring: ['recording', 'failed'],
  recording: ['done'],
  done: [],
  failed: []
}

/** State machine for a single attempt */
class TransferAttempt {
  readonly id = randomUUID()
  private current: TransferPhase = 'idle'
  private onStateChange?: (phase: TransferPhase, attemptId: string) => void
  private log: LogService

  constructor(log: LogService, onStateChange?: (phase: TransferPhase, attemptId: string) => void) {
    this.log = log
    this.onStateChange = onStateChange
  }

  enter(next: TransferPhase): void {
    if (!NEXT_PHASES[this.current].includes(next)) {
      throw new Error(`Illegal transfer state change: ${this.current} -> ${next}`)
    }
    this.current = next
    this.log.log(this.id, 'debug', 'system', `Transfer state: ${next}`)

    try {
      this.onStateChange?.(next, this.id)
    } catch (err) {
      this.log.log(this.id, 'warning', 'system', 'State observer threw.', errorMessage(err))
    }
  }
}

const ACTION_LABEL: Record<TransferDirection, string> = {
  upload: 'Upload',
  download: 'Download'
}

function errorKindOf(err: CourierError): TransferErrorKind {
  if (err instanceof ValidationError) return 'validation'
  if (err instanceof ConnectionError) return 'connection'
  return 'transfer'
}

/**
 * TransferOrchestrator — runs one upload or download attempt end to end:
 * validate, connect, transfer, close, record.
 *
 * Every failure is returned as a `failed` outcome; nothing thrown by a
 * collaborator escapes execute(). Holds no per-attempt state, so it can be
 * reused for any number of sequential attempts.
 */
export class TransferOrchestrator {
  private history: HistoryStore
  private settings: AppSettings
  private log: LogService
  private openSession: SessionFactory
  private now: () => Date

  constructor(options: OrchestratorOptions) {
    this.history = options.history
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings }
    this.log = options.log ?? getLogService()
    this.openSession = options.openSession ?? TransferSession.open
    this.now = options.now ?? (() => new Date())
  }

  upload(params: ConnectionParams, localPath: string, hooks: TransferHooks = {}): Promise<TransferOutcome> {
    return this.execute(params, { direction: 'upload', localPath }, hooks)
  }

  download(
    params: ConnectionParams,
    remoteName: string,
    localSavePath?: string,
    hooks: TransferHooks = {}
  ): Promise<TransferOutcome> {
    return this.execute(params, { direction: 'download', remoteName, localSavePath }, hooks)
  }

  async execute(
    params: ConnectionParams,
    request: TransferRequest,
    hooks: TransferHooks = {}
  ): Promise<TransferOutcome> {
    const attempt = new TransferAttempt(this.log, hooks.onStateChange)
    const { direction } = request
    const requestedName =
      request.direction === 'upload' ? basename(request.localPath) : request.remoteName
    const warnings: string[] = []

    attempt.enter('validating')
    let target: ValidatedTransfer
    try {
      target = await this.validate(params, request, hooks)
    } catch (err) {
      const error =
        err instanceof CourierError
          ? err
          : new ValidationError(direction === 'upload' ? 'localPath' : 'localSavePath', errorMessage(err))
      // Only an attempt that named its file is recorded: a declined download
      // destination, or an upload whose file cannot be read
      const record =
        error instanceof TransferError ||
        (error instanceof ValidationError && error.missingField === 'localSavePath')
      return this.fail(attempt, direction, requestedName, error, record, warnings)
    }

    attempt.enter('connecting')
    let session: RemoteSession
    try {
      session = await this.openSession(target.connection, {
        attemptId: attempt.id,
        log: this.log,
        readyTimeout: this.settings.connectionTimeout * 1000,
        keepAliveInterval: this.settings.connectionKeepAliveInterval * 1000,
        chunkSize: this.settings.transferChunkSize,
        bandwidthLimit: this.settings.transferBandwidthLimit
      })
    } catch (err) {
      const error =
        err instanceof CourierError
          ? err
          : new ConnectionError('handshake', errorMessage(err, 'Connection failed'), err)
      return this.fail(attempt, direction, target.fileName, error, true, warnings)
    }

    attempt.enter('transferring')
    const reporter = new ProgressReporter(
      (sample) => hooks.onProgress?.(sample),
      attempt.id,
      this.log
    )
    const report = (sample: ProgressSample) => reporter.report(sample)

    let transferError: CourierError | null = null
    try {
      if (direction === 'upload') {
        await session.upload(target.localPath, target.remoteName, report, hooks.signal)
      } else {
        await session.download(target.remoteName, target.localPath, report, hooks.signal)
      }
    } catch (err) {
      transferError =
        err instanceof CourierError
          ? err
          : new TransferError('remote-io', errorMessage(err, 'Transfer failed'), err)
    } finally {
      reporter.flush()
      this.closeSession(session, attempt.id)
    }

    if (transferError) {
      LogService.transferFailed(this.log, attempt.id, target.fileName, transferError.message)
      return this.fail(attempt, direction, target.fileName, transferError, true, warnings)
    }

    LogService.transferCompleted(this.log, attempt.id, target.fileName)
    attempt.enter('recording')
    const entry = this.record(attempt.id, direction, target.fileName, 'success', warnings)
    attempt.enter('done')

    return {
      status: 'success',
      attemptId: attempt.id,
      direction,
      fileName: target.fileName,
      effectivePath: direction === 'upload' ? target.remoteName : target.localPath,
      entry,
      warnings
    }
  }

  private async validate(
    params: ConnectionParams,
    request: TransferRequest,
    hooks: TransferHooks
  ): Promise<ValidatedTransfer> {
    if (request.direction === 'upload') {
      const localPath = request.localPath.trim()
      if (!localPath) {
        throw new ValidationError('localPath', 'Select a file to upload')
      }
      const connection = validateConnectionParams(params)
      await this.assertReadableFile(localPath)
      const fileName = basename(localPath)
      return { connection, fileName, remoteName: fileName, localPath }
    }

    const remoteName = request.remoteName.trim()
    if (!remoteName) {
      throw new ValidationError('remoteName', 'Enter the name of the remote file to download')
    }
    const connection = validateConnectionParams(params)

    const chosen = request.localSavePath || (await hooks.chooseDestination?.(remoteName))
    if (!chosen) {
      throw new ValidationError('localSavePath', 'Download cancelled: no save location chosen')
    }
    return { connection, fileName: remoteName, remoteName, localPath: chosen }
  }

  private async assertReadableFile(localPath: string): Promise<void> {
    try {
      const stats = await fsp.stat(localPath)
      if (!stats.isFile()) {
        throw new TransferError('local-io', `Not a regular file: ${localPath}`)
      }
      await fsp.access(localPath, fsConstants.R_OK)
    } catch (err) {
      if (err instanceof TransferError) throw err
      throw new TransferError('local-io', `Cannot read ${localPath}: ${errorMessage(err)}`, err)
    }
  }

  private closeSession(session: RemoteSession, attemptId: string): void {
    try {
      session.close()
    } catch (err) {
      this.log.log(attemptId, 'warning', 'ssh', 'Error while closing the session.', errorMessage(err))
    }
  }

  private fail(
    attempt: TransferAttempt,
    direction: TransferDirection,
    fileName: string,
    error: CourierError,
    record: boolean,
    warnings: string[]
  ): TransferFailure {
    attempt.enter('failed')
    const entry = record
      ? this.record(attempt.id, direction, fileName, 'failed', warnings)
      : undefined

    return {
      status: 'failed',
      attemptId: attempt.id,
      direction,
      fileName,
      errorKind: errorKindOf(error),
      message: `${ACTION_LABEL[direction]} failed: ${error.message}`,
      error,
      entry,
      warnings
    }
  }

  /** Append to history; a storage failure becomes a warning, never an error */
  private record(
    attemptId: string,
    direction: TransferDirection,
    fileName: string,
    status: HistoryEntry['status'],
    warnings: string[]
  ): HistoryEntry {
    const entry = createHistoryEntry(direction, fileName, status, this.now())
    try {
      this.history.append(entry)
      LogService.historyRecorded(this.log, attemptId, fileName, status)
    } catch (err) {
      const reason = err instanceof StorageError ? err.message : errorMessage(err)
      LogService.historyWriteFailed(this.log, attemptId, reason)
      warnings.push(reason)
    }
    return entry
  }
}

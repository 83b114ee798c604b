import ssh2, { type ConnectConfig } from 'ssh2'
import { createReadStream, createWriteStream, promises as fsp } from 'fs'
import { Transform, type Readable, type TransformCallback, type Writable } from 'stream'
import { pipeline } from 'stream/promises'
import { getLogService, LogService } from './LogService'
import {
  ConnectionError,
  TransferError,
  ValidationError,
  errorCode,
  errorMessage,
  type ConnectionFailureReason,
  type TransferFailureReason
} from '../utils/errors'
import type { ConnectionParams, ProgressSample, TransferDirection } from '../../src/types/transfer'

export const DEFAULT_SSH_PORT = 22

// SFTP status codes (draft-ietf-secsh-filexfer-02, section 7)
const SFTP_NO_SUCH_FILE = 2
const SFTP_PERMISSION_DENIED = 3

/** Subset of ssh2's SFTPWrapper a single transfer needs */
export interface SFTPChannel {
  stat(path: string, callback: (err: Error | undefined, stats: { size: number }) => void): void
  createReadStream(path: string, options?: { highWaterMark?: number }): Readable
  createWriteStream(path: string): Writable
  end(): void
}

/** An authenticated SSH transport with its SFTP subsystem open */
export interface SFTPConnection {
  sftp: SFTPChannel
  /** Set when the transport reported an error after the SFTP channel opened */
  readonly lastError?: Error
  end(): void
}

export type SFTPConnector = (config: ConnectConfig) => Promise<SFTPConnection>

export type ProgressCallback = (sample: ProgressSample) => void

export interface SessionOptions {
  attemptId?: string
  /** Handshake + auth timeout in ms */
  readyTimeout?: number
  /** Keep-alive interval in ms, 0 disables */
  keepAliveInterval?: number
  /** Bytes per local read */
  chunkSize?: number
  /** KB/s, 0 = unlimited */
  bandwidthLimit?: number
  log?: LogService
  connector?: SFTPConnector
}

/**
 * MeterTransform — counts bytes as they pass and optionally limits
 * throughput to a given KB/s rate.
 */
export class MeterTransform extends Transform {
  transferred = 0
  private bytesPerSecond: number
  private startTime = Date.now()
  private onChunk: (transferred: number) => void

  constructor(kbPerSecond: number, onChunk: (transferred: number) => void) {
    super()
    this.bytesPerSecond = kbPerSecond * 1024
    this.onChunk = onChunk
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
    this.transferred += chunk.length
    const emit = () => {
      this.push(chunk)
      this.onChunk(this.transferred)
      callback()
    }

    if (this.bytesPerSecond <= 0) {
      emit()
      return
    }

    const elapsed = (Date.now() - this.startTime) / 1000
    const expectedTime = this.transferred / this.bytesPerSecond
    const delay = Math.max(0, (expectedTime - elapsed) * 1000)
    if (delay > 0) {
      setTimeout(emit, delay)
    } else {
      emit()
    }
  }
}

/** Check that every connection field is present; fills in the default port */
export function validateConnectionParams(params: ConnectionParams): Required<ConnectionParams> {
  const host = params.host.trim()
  if (!host) throw new ValidationError('host', 'Server address is required')
  if (!params.username) throw new ValidationError('username', 'Username is required')
  if (!params.credential) throw new ValidationError('credential', 'Password is required')

  const port = params.port ?? DEFAULT_SSH_PORT
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ValidationError('port', `Invalid port: ${port}`)
  }

  return { host, port, username: params.username, credential: params.credential }
}

function connectionReason(err: unknown): ConnectionFailureReason {
  const level =
    typeof err === 'object' && err !== null && 'level' in err ? err.level : undefined
  switch (level) {
    case 'client-authentication':
      return 'auth'
    case 'client-timeout':
      return 'timeout'
    case 'client-socket':
    case 'client-dns':
      return 'unreachable'
    default:
      return 'handshake'
  }
}

/**
 * Connect with ssh2, authenticate and open the SFTP subsystem.
 * The transport is ended on every failure path.
 */
export function connectSFTP(config: ConnectConfig): Promise<SFTPConnection> {
  const client = new ssh2.Client()

  return new Promise<SFTPConnection>((resolve, reject) => {
    let settled = false
    let lastError: Error | undefined

    const fail = (err: Error) => {
      if (settled) {
        lastError = err
        return
      }
      settled = true
      client.end()
      reject(err)
    }

    // Stays attached for the life of the client: a late transport error must
    // not crash the process, it is reported through lastError instead.
    client.on('error', fail)

    client.once('ready', () => {
      client.sftp((err, sftp) => {
        if (err) {
          fail(err)
          return
        }
        settled = true
        resolve({
          sftp,
          get lastError() {
            return lastError
          },
          end: () => client.end()
        })
      })
    })

    try {
      client.connect(config)
    } catch (err) {
      fail(err instanceof Error ? err : new Error(errorMessage(err, 'Connection failed')))
    }
  })
}

/**
 * TransferSession — one authenticated SFTP connection used for exactly one
 * upload or download, then closed.
 */
export class TransferSession {
  private connection: SFTPConnection | null
  private attemptId: string
  private chunkSize: number
  private bandwidthLimit: number
  private log: LogService

  private constructor(connection: SFTPConnection, attemptId: string, options: SessionOptions) {
    this.connection = connection
    this.attemptId = attemptId
    this.chunkSize = options.chunkSize ?? 32 * 1024
    this.bandwidthLimit = options.bandwidthLimit ?? 0
    this.log = options.log ?? getLogService()
  }

  /** Establish transport, authenticate and open SFTP */
  static async open(params: ConnectionParams, options: SessionOptions = {}): Promise<TransferSession> {
    const { host, port, username, credential } = validateConnectionParams(params)
    const log = options.log ?? getLogService()
    const attemptId = options.attemptId ?? 'session'
    const connector = options.connector ?? connectSFTP

    LogService.connecting(log, attemptId, host, port)
    LogService.authenticating(log, attemptId, username)

    let connection: SFTPConnection
    try {
      connection = await connector({
        host,
        port,
        username,
        password: credential,
        tryKeyboard: false,
        readyTimeout: options.readyTimeout ?? 15_000,
        keepaliveInterval: options.keepAliveInterval ?? 30_000
      })
    } catch (err) {
      const wrapped =
        err instanceof ConnectionError
          ? err
          : new ConnectionError(connectionReason(err), errorMessage(err, 'Connection failed'), err)
      LogService.connectionFailed(log, attemptId, wrapped.message)
      throw wrapped
    }

    LogService.authSuccess(log, attemptId)
    LogService.sftpOpened(log, attemptId)
    return new TransferSession(connection, attemptId, options)
  }

  /**
   * Upload a local file to `remoteName`, relative to the remote working
   * directory. A partially written remote file is left in place on failure.
   */
  async upload(
    localPath: string,
    remoteName: string,
    onProgress: ProgressCallback,
    signal?: AbortSignal
  ): Promise<void> {
    const connection = this.requireConnection()

    let totalBytes: number
    try {
      totalBytes = (await fsp.stat(localPath)).size
    } catch (err) {
      throw new TransferError('local-io', `Cannot read ${localPath}: ${errorMessage(err)}`, err)
    }

    LogService.transferStarted(this.log, this.attemptId, remoteName, 'upload')
    await this.pump(
      'upload',
      remoteName,
      () => createReadStream(localPath, { highWaterMark: this.chunkSize }),
      () => connection.sftp.createWriteStream(remoteName),
      totalBytes,
      onProgress,
      signal
    )
  }

  /**
   * Download `remoteName` into `localSavePath`. The remote size is read first,
   * so a missing file fails before anything is created locally.
   */
  async download(
    remoteName: string,
    localSavePath: string,
    onProgress: ProgressCallback,
    signal?: AbortSignal
  ): Promise<void> {
    const connection = this.requireConnection()
    const totalBytes = await this.remoteSize(connection.sftp, remoteName)

    LogService.transferStarted(this.log, this.attemptId, remoteName, 'download')
    await this.pump(
      'download',
      remoteName,
      () => connection.sftp.createReadStream(remoteName, { highWaterMark: this.chunkSize }),
      () => createWriteStream(localSavePath),
      totalBytes,
      onProgress,
      signal
    )
  }

  /** Release the connection. Safe to call more than once. */
  close(): void {
    const connection = this.connection
    if (!connection) return
    this.connection = null

    try {
      connection.sftp.end()
    } finally {
      connection.end()
      LogService.terminated(this.log, this.attemptId)
    }
  }

  private requireConnection(): SFTPConnection {
    if (!this.connection) {
      throw new TransferError('disconnected', 'Session is closed')
    }
    return this.connection
  }

  private remoteSize(sftp: SFTPChannel, remoteName: string): Promise<number> {
    return new Promise((resolve, reject) => {
      sftp.stat(remoteName, (err, stats) => {
        if (err) {
          reject(this.classify(err, remoteName, 'download'))
          return
        }
        resolve(stats.size)
      })
    })
  }

  private async pump(
    direction: TransferDirection,
    remoteName: string,
    openSource: () => Readable,
    openDestination: () => Writable,
    totalBytes: number,
    onProgress: ProgressCallback,
    signal?: AbortSignal
  ): Promise<void> {
    if (signal?.aborted) {
      throw new TransferError('aborted', 'Transfer cancelled')
    }

    onProgress({ transferredBytes: 0, totalBytes })

    const meter = new MeterTransform(this.bandwidthLimit, (transferred) => {
      onProgress({ transferredBytes: Math.min(transferred, totalBytes), totalBytes })
    })

    try {
      const source = openSource()
      const destination = openDestination()
      await pipeline(source, meter, destination, { signal })
    } catch (err) {
      throw this.classify(err, remoteName, direction, signal)
    }

    // The source may have changed size since it was measured; what moved is the total
    onProgress({ transferredBytes: meter.transferred, totalBytes: meter.transferred })
  }

  private classify(
    err: unknown,
    remoteName: string,
    direction: TransferDirection,
    signal?: AbortSignal
  ): TransferError {
    if (err instanceof TransferError) return err
    if (signal?.aborted) {
      return new TransferError('aborted', 'Transfer cancelled', err)
    }

    const code = errorCode(err)
    let reason: TransferFailureReason

    if (code === SFTP_NO_SUCH_FILE) {
      reason = 'not-found'
    } else if (code === SFTP_PERMISSION_DENIED || code === 'EACCES' || code === 'EPERM') {
      reason = 'permission-denied'
    } else if (typeof code === 'string') {
      // Node fs errors carry string codes (ENOENT, EISDIR, ...)
      reason = 'local-io'
    } else if (this.connection?.lastError) {
      reason = 'disconnected'
    } else {
      reason = 'remote-io'
    }

    const message =
      reason === 'not-found'
        ? `No such remote file: ${remoteName}`
        : errorMessage(err, `${direction} failed`)
    return new TransferError(reason, message, err)
  }
}

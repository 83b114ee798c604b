export interface SerializedError {
  name: string
  code: string
  message: string
  details?: unknown
}

/**
 * Base error for everything a transfer attempt can fail with.
 */
export class CourierError extends Error {
  readonly code: string
  readonly details?: unknown

  constructor(message: string, code: string, details?: unknown) {
    super(message)
    this.name = 'CourierError'
    this.code = code
    this.details = details
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details
    }
  }
}

export type MissingField =
  | 'host'
  | 'port'
  | 'username'
  | 'credential'
  | 'localPath'
  | 'remoteName'
  | 'localSavePath'

/** A required input is absent; the attempt never starts */
export class ValidationError extends CourierError {
  readonly missingField: MissingField

  constructor(missingField: MissingField, message: string) {
    super(message, 'VALIDATION_ERROR', { missingField })
    this.name = 'ValidationError'
    this.missingField = missingField
  }
}

export type ConnectionFailureReason = 'unreachable' | 'auth' | 'handshake' | 'timeout'

/** Transport, handshake or authentication failure */
export class ConnectionError extends CourierError {
  readonly reason: ConnectionFailureReason

  constructor(reason: ConnectionFailureReason, message: string, cause?: unknown) {
    super(message, 'CONNECTION_ERROR', { reason })
    this.name = 'ConnectionError'
    this.reason = reason
    if (cause !== undefined) this.cause = cause
  }
}

export type TransferFailureReason =
  | 'not-found'
  | 'permission-denied'
  | 'local-io'
  | 'remote-io'
  | 'disconnected'
  | 'aborted'

/** Failure while bytes were (or were about to be) moving */
export class TransferError extends CourierError {
  readonly reason: TransferFailureReason

  constructor(reason: TransferFailureReason, message: string, cause?: unknown) {
    super(message, 'TRANSFER_ERROR', { reason })
    this.name = 'TransferError'
    this.reason = reason
    if (cause !== undefined) this.cause = cause
  }
}

export type StorageOperation = 'load' | 'append' | 'delete' | 'clear'

/** History persistence failure */
export class StorageError extends CourierError {
  readonly operation: StorageOperation

  constructor(operation: StorageOperation, message: string, cause?: unknown) {
    super(message, 'STORAGE_ERROR', { operation })
    this.name = 'StorageError'
    this.operation = operation
    if (cause !== undefined) this.cause = cause
  }
}

/** Extract a printable message from anything thrown */
export function errorMessage(err: unknown, fallback: string = 'Unknown error'): string {
  if (err instanceof Error) return err.message || fallback
  if (typeof err === 'string' && err) return err
  return fallback
}

/** Node/ssh2 error code, when present */
export function errorCode(err: unknown): string | number | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined
  const code = err.code
  return typeof code === 'string' || typeof code === 'number' ? code : undefined
}

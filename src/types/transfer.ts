/** Transfer direction */
export type TransferDirection = 'upload' | 'download'

/** Lifecycle of a single transfer attempt */
export type TransferPhase =
  | 'idle'
  | 'validating'
  | 'connecting'
  | 'transferring'
  | 'recording'
  | 'done'
  | 'failed'

/** Connection details supplied by the caller for one attempt. Never persisted. */
export interface ConnectionParams {
  host: string
  port?: number        // defaults to 22
  username: string
  credential: string
}

export interface UploadRequest {
  direction: 'upload'
  localPath: string
}

export interface DownloadRequest {
  direction: 'download'
  remoteName: string
  /** When omitted, the destination chooser is asked before connecting */
  localSavePath?: string
}

export type TransferRequest = UploadRequest | DownloadRequest

/** A (transferred, total) byte-count pair reported while a transfer runs */
export interface ProgressSample {
  transferredBytes: number
  totalBytes: number
}

/** Error category carried by a failed outcome */
export type TransferErrorKind = 'validation' | 'connection' | 'transfer'

/** Application settings persisted by the SettingsStore */
export interface AppSettings {
  // Connection
  connectionPort: number
  connectionTimeout: number            // seconds
  connectionKeepAliveInterval: number  // seconds

  // Transfer
  transferChunkSize: number            // bytes per read
  transferBandwidthLimit: number       // KB/s, 0 = unlimited

  // History
  historyFileName: string

  // Log
  logMaxEntries: number
  logDebugMode: boolean
}

export const DEFAULT_SETTINGS: AppSettings = {
  connectionPort: 22,
  connectionTimeout: 15,
  connectionKeepAliveInterval: 30,

  transferChunkSize: 32 * 1024,
  transferBandwidthLimit: 0,

  historyFileName: 'transfer-history',

  logMaxEntries: 5000,
  logDebugMode: false
}

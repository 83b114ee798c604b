import Conf from 'conf'
import { DEFAULT_SETTINGS, type AppSettings } from '../../src/types/settings'

export const PROJECT_NAME = 'sftp-courier'

export interface StoreLocation {
  /** Directory holding the JSON files; defaults to the per-user config dir */
  cwd?: string
}

/**
 * SettingsStore — persists app preferences using conf.
 */
export class SettingsStore {
  private store: Conf<{ settings: AppSettings }>

  constructor(location: StoreLocation = {}) {
    this.store = new Conf<{ settings: AppSettings }>({
      projectName: PROJECT_NAME,
      cwd: location.cwd,
      configName: 'settings',
      defaults: {
        settings: DEFAULT_SETTINGS
      }
    })
  }

  /** Where the settings file lives */
  get path(): string {
    return this.store.path
  }

  /** Get all settings (saved values over defaults, so new keys get defaults) */
  getAll(): AppSettings {
    const saved: Partial<AppSettings> | undefined = this.store.get('settings')
    return { ...DEFAULT_SETTINGS, ...saved }
  }

  /** Get a single setting value */
  get<K extends keyof AppSettings>(key: K): AppSettings[K] {
    return this.getAll()[key]
  }

  /** Set a single setting value */
  set<K extends keyof AppSettings>(key: K, value: AppSettings[K]): void {
    this.store.set(`settings.${key}`, value)
  }

  /** Reset all settings to defaults */
  reset(): AppSettings {
    this.store.set('settings', DEFAULT_SETTINGS)
    return { ...DEFAULT_SETTINGS }
  }
}

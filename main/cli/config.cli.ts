import { Command } from 'commander'
import chalk from 'chalk'
import { SettingsStore } from '../services/SettingsStore'
import { errorMessage } from '../utils/errors'
import { DEFAULT_SETTINGS } from '../../src/types/settings'

let settingsStore: SettingsStore | null = null

export function getSettingsStore(): SettingsStore {
  if (!settingsStore) {
    settingsStore = new SettingsStore()
  }
  return settingsStore
}

function toNumber(key: string, raw: string, min: number): number {
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min}`)
  }
  return value
}

function toBoolean(key: string, raw: string): boolean {
  if (['true', 'on', 'yes', '1'].includes(raw)) return true
  if (['false', 'off', 'no', '0'].includes(raw)) return false
  throw new Error(`${key} must be true or false`)
}

/** Parse and store one setting; throws on unknown keys or bad values */
export function applySetting(store: SettingsStore, key: string, raw: string): void {
  switch (key) {
    case 'connectionPort':
      if (Number(raw) > 65535) throw new Error('connectionPort must be <= 65535')
      store.set(key, toNumber(key, raw, 1))
      break
    case 'connectionTimeout':
    case 'logMaxEntries':
    case 'transferChunkSize':
      store.set(key, toNumber(key, raw, 1))
      break
    case 'connectionKeepAliveInterval':
    case 'transferBandwidthLimit':
      store.set(key, toNumber(key, raw, 0))
      break
    case 'historyFileName':
      if (!/^[\w.-]+$/.test(raw)) throw new Error('historyFileName may only contain letters, digits, ".", "_" and "-"')
      store.set(key, raw)
      break
    case 'logDebugMode':
      store.set(key, toBoolean(key, raw))
      break
    default:
      throw new Error(`Unknown setting "${key}". Known: ${Object.keys(DEFAULT_SETTINGS).join(', ')}`)
  }
}

const showCommand = new Command('show')
  .description('Print the current settings')
  .action(() => {
    const store = getSettingsStore()
    console.log(chalk.dim(store.path))
    for (const [key, value] of Object.entries(store.getAll())) {
      console.log(`${key.padEnd(28)} ${String(value)}`)
    }
  })

const setCommand = new Command('set')
  .description('Change one setting')
  .argument('<key>', 'setting name')
  .argument('<value>', 'new value')
  .action((key: string, value: string) => {
    try {
      applySetting(getSettingsStore(), key, value)
      console.log(chalk.green(`${key} = ${value}`))
    } catch (err) {
      console.error(chalk.red(errorMessage(err)))
      process.exitCode = 1
    }
  })

const resetCommand = new Command('reset')
  .description('Restore the default settings')
  .action(() => {
    getSettingsStore().reset()
    console.log(chalk.green('Settings reset to defaults.'))
  })

export const configCommand = new Command('config')
  .description('View or change settings')
  .addCommand(showCommand, { isDefault: true })
  .addCommand(setCommand)
  .addCommand(resetCommand)

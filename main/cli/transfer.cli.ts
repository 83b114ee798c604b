import { Command } from 'commander'
import chalk from 'chalk'
import { basename, resolve } from 'path'
import { ask, isInteractive } from './prompt'
import { formatLogEntry, renderProgress } from './progress'
import { getHistoryStore } from './history.cli'
import { getSettingsStore } from './config.cli'
import { getLogService } from '../services/LogService'
import { TransferOrchestrator, type TransferOutcome } from '../services/TransferOrchestrator'
import { transferStore } from '../../src/stores/transferStore'
import type { LogEntry } from '../../src/types/log'
import type { ConnectionParams, TransferRequest } from '../../src/types/transfer'

export const PASSWORD_ENV = 'SFTP_COURIER_PASSWORD'

interface ConnectionOptions {
  host?: string
  port?: number
  user?: string
  password?: string
  verbose?: boolean
}

interface DownloadOptions extends ConnectionOptions {
  output?: string
}

function parsePort(value: string): number {
  return Number.parseInt(value, 10)
}

function withConnectionOptions(command: Command): Command {
  return command
    .option('-H, --host <host>', 'SSH server address')
    .option('-p, --port <port>', 'SSH port (default: from config, 22)', parsePort)
    .option('-u, --user <username>', 'username')
    .option('--password <password>', `password (default: $${PASSWORD_ENV})`)
    .option('-v, --verbose', 'print the connection activity log')
}

function connectionParams(options: ConnectionOptions, defaultPort: number): ConnectionParams {
  return {
    host: options.host ?? '',
    port: options.port ?? defaultPort,
    username: options.user ?? '',
    credential: options.password ?? process.env[PASSWORD_ENV] ?? ''
  }
}

/** Ask where to save a download. Blank keeps the suggestion, "-" cancels. */
async function askDestination(remoteName: string): Promise<string | null> {
  const suggested = resolve(basename(remoteName))
  if (!isInteractive()) return suggested

  const answer = (await ask(`Save ${remoteName} to [${suggested}] ("-" to cancel): `)).trim()
  if (answer === '-') return null
  return answer ? resolve(answer) : suggested
}

function printOutcome(outcome: TransferOutcome): void {
  for (const warning of outcome.warnings) {
    console.warn(chalk.yellow(`Warning: ${warning}`))
  }

  if (outcome.status === 'success') {
    const where = outcome.direction === 'upload' ? 'Uploaded to' : 'Saved to'
    console.log(chalk.green(`${where} ${outcome.effectivePath}`))
  } else {
    console.error(chalk.red(outcome.message))
  }
}

/** Run one attempt with progress rendering and Ctrl-C cancellation */
async function runTransfer(request: TransferRequest, options: ConnectionOptions): Promise<void> {
  const settings = getSettingsStore().getAll()
  const log = getLogService()
  log.setMaxEntries(settings.logMaxEntries)
  log.setDebugMode(settings.logDebugMode)

  const printEntry = (_attemptId: string, entry: LogEntry) => {
    process.stderr.write(`${formatLogEntry(entry)}\n`)
  }
  if (options.verbose) log.on('entry', printEntry)

  const history = getHistoryStore()
  history.load()

  const orchestrator = new TransferOrchestrator({ history, settings, log })
  const controller = new AbortController()
  const onInterrupt = () => controller.abort()
  process.once('SIGINT', onInterrupt)

  const store = transferStore.getState()
  const fileName = request.direction === 'upload' ? basename(request.localPath) : request.remoteName
  const stopRendering = renderProgress(transferStore)

  let outcome: TransferOutcome
  try {
    outcome = await orchestrator.execute(connectionParams(options, settings.connectionPort), request, {
      signal: controller.signal,
      chooseDestination: askDestination,
      onStateChange: (phase, attemptId) => {
        if (phase === 'validating') store.begin(attemptId, request.direction, fileName)
        store.setPhase(phase)
      },
      onProgress: (sample) => store.updateProgress(sample)
    })
  } finally {
    stopRendering()
    process.removeListener('SIGINT', onInterrupt)
    log.removeListener('entry', printEntry)
  }

  printOutcome(outcome)
  if (outcome.status === 'failed' && !options.verbose) {
    const activity = log.exportLog(outcome.attemptId)
    if (activity) process.stderr.write(`${chalk.dim(activity)}\n`)
  }
  process.exitCode = outcome.status === 'success' ? 0 : 1
}

export const uploadCommand = withConnectionOptions(
  new Command('upload')
    .description('Upload a local file to the remote working directory')
    .argument('<localPath>', 'file to upload')
).action(async (localPath: string, options: ConnectionOptions) => {
  await runTransfer({ direction: 'upload', localPath }, options)
})

export const downloadCommand = withConnectionOptions(
  new Command('download')
    .description('Download a file from the remote working directory')
    .argument('<remoteName>', 'remote file name')
    .option('-o, --output <path>', 'local save path (asked for when omitted)')
).action(async (remoteName: string, options: DownloadOptions) => {
  const localSavePath = options.output ? resolve(options.output) : undefined
  await runTransfer({ direction: 'download', remoteName, localSavePath }, options)
})

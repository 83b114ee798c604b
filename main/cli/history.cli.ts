import { Command } from 'commander'
import chalk from 'chalk'
import { confirm, isInteractive } from './prompt'
import { getSettingsStore } from './config.cli'
import { HistoryStore } from '../services/HistoryStore'
import { errorMessage } from '../utils/errors'
import { formatHistoryTable, parseStatus } from '../../src/utils/historyFormat'

let historyStore: HistoryStore | null = null

export function getHistoryStore(): HistoryStore {
  if (!historyStore) {
    historyStore = new HistoryStore({ fileName: getSettingsStore().get('historyFileName') })
  }
  return historyStore
}

/** Ask before a destructive change unless --yes was given */
async function confirmed(question: string, yes: boolean | undefined): Promise<boolean> {
  if (yes) return true
  if (!isInteractive()) {
    console.error(chalk.red('Refusing to modify history without --yes in a non-interactive shell.'))
    return false
  }
  return confirm(question)
}

const listCommand = new Command('list')
  .description('Show past transfers, most recent first')
  .action(() => {
    const history = getHistoryStore()
    const log = history.load()
    if (log.length === 0) {
      console.log(chalk.dim('No transfers yet.'))
      return
    }

    const [header, ...rows] = formatHistoryTable(log)
    console.log(chalk.bold(header))
    for (const row of rows) {
      console.log(row.endsWith('Failed') ? chalk.red(row) : row)
    }
  })

interface DeleteOptions {
  date: string
  file: string
  status: string
  yes?: boolean
}

const deleteCommand = new Command('delete')
  .description('Delete one history entry, identified by date, file and status')
  .requiredOption('--date <date>', 'entry date, "YYYY-MM-DD HH:MM"')
  .requiredOption('--file <name>', 'file name')
  .requiredOption('--status <status>', 'success or failed')
  .option('-y, --yes', 'do not ask for confirmation')
  .action(async (options: DeleteOptions) => {
    const status = parseStatus(options.status)
    if (!status) {
      console.error(chalk.red(`Unknown status "${options.status}". Use success or failed.`))
      process.exitCode = 1
      return
    }

    const history = getHistoryStore()
    history.load()
    if (!(await confirmed('Delete the selected entry?', options.yes))) return

    try {
      const removed = history.deleteMatching({ date: options.date, file: options.file, status })
      if (!removed) {
        console.error(chalk.yellow('No matching history entry.'))
        process.exitCode = 1
        return
      }
      console.log(chalk.green('Entry deleted.'))
    } catch (err) {
      console.error(chalk.red(errorMessage(err)))
      process.exitCode = 1
    }
  })

const clearCommand = new Command('clear')
  .description('Delete the whole transfer history')
  .option('-y, --yes', 'do not ask for confirmation')
  .action(async (options: { yes?: boolean }) => {
    const history = getHistoryStore()
    if (!(await confirmed('Clear the entire transfer history?', options.yes))) return

    try {
      history.clear()
      console.log(chalk.green('History cleared.'))
    } catch (err) {
      console.error(chalk.red(errorMessage(err)))
      process.exitCode = 1
    }
  })

export const historyCommand = new Command('history')
  .description('Inspect or edit the transfer history')
  .addCommand(listCommand, { isDefault: true })
  .addCommand(deleteCommand)
  .addCommand(clearCommand)

import { Command } from 'commander'
import chalk from 'chalk'
import { uploadCommand, downloadCommand } from './cli/transfer.cli'
import { historyCommand } from './cli/history.cli'
import { configCommand } from './cli/config.cli'
import { errorMessage } from './utils/errors'

export const program = new Command()
  .name('sftp-courier')
  .description('Upload or download a single file over SFTP, with a persistent transfer history')
  .version('0.1.0')

program.addCommand(uploadCommand)
program.addCommand(downloadCommand)
program.addCommand(historyCommand)
program.addCommand(configCommand)

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(errorMessage(err)))
  process.exitCode = 1
})

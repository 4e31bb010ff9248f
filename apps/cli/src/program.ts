/**
 * kbforge command tree.
 */

import { Command, Option } from 'commander'
import type { CommandContext, CommandResult } from './utils/context.js'
import { executeSync } from './commands/sync.js'
import type { SyncCommandOptions } from './commands/sync.js'
import { executeList } from './commands/list.js'
import type { ListCommandOptions } from './commands/list.js'
import { executeStatus } from './commands/status.js'
import type { StatusCommandOptions } from './commands/status.js'
import { executeStats } from './commands/stats.js'
import type { StatsCommandOptions } from './commands/stats.js'
import { executeDelete } from './commands/delete.js'
import type { DeleteCommandOptions } from './commands/delete.js'
import { executePurge } from './commands/purge.js'
import type { PurgeCommandOptions } from './commands/purge.js'
import { executeSearch } from './commands/search.js'
import type { SearchCommandOptions } from './commands/search.js'
import { executeGenerate } from './commands/generate.js'
import type { GenerateCommandOptions } from './commands/generate.js'

export const VERSION = '0.1.0'

export interface ProgramIO {
  write(text: string): void
  writeError(text: string): void
  setExitCode(code: number): void
}

export const processIO: ProgramIO = {
  write: (text) => console.log(text),
  writeError: (text) => console.error(text),
  setExitCode: (code) => {
    process.exitCode = code
  },
}

const formatOption = (): Option =>
  new Option('--format <format>', 'output format').choices(['text', 'json']).default('text')

export function createProgram(base: CommandContext = {}, io: ProgramIO = processIO): Command {
  const program = new Command()

  const context = (): CommandContext => {
    const opts = program.opts<{ config?: string }>()
    return { ...base, configPath: opts.config ?? base.configPath }
  }

  const report = (result: CommandResult): void => {
    if (result.exitCode === 0) io.write(result.output)
    else io.writeError(result.output)
    io.setExitCode(result.exitCode)
  }

  program
    .name('kbforge')
    .description('Generate knowledge-base articles and keep the document index in sync')
    .version(VERSION)
    .addOption(new Option('-c, --config <path>', 'config file path').env('KBFORGE_CONFIG'))

  program
    .command('sync')
    .description('Sync configured sources into the index')
    .option('--force', 'rehash and re-embed every document')
    .option('--source <names...>', 'only these sources')
    .addOption(formatOption())
    .action(async (options: SyncCommandOptions) => {
      report(await executeSync(options, context()))
    })

  program
    .command('list')
    .description('List indexed documents')
    .option('--source <name>', 'only this source')
    .addOption(formatOption())
    .action(async (options: ListCommandOptions) => {
      report(await executeList(options, context()))
    })

  program
    .command('status')
    .description('Show whether the index needs a sync')
    .addOption(formatOption())
    .action(async (options: StatusCommandOptions) => {
      report(await executeStatus(options, context()))
    })

  program
    .command('stats')
    .description('Show index statistics')
    .addOption(formatOption())
    .action(async (options: StatsCommandOptions) => {
      report(await executeStats(options, context()))
    })

  program
    .command('delete')
    .description('Delete one document from the index')
    .option('--doc-id <id>', 'document id, e.g. kb:guides/retries')
    .action(async (options: DeleteCommandOptions) => {
      report(await executeDelete(options, context()))
    })

  program
    .command('purge')
    .description('Delete every document of a source from the index')
    .option('--source <name>', 'source name')
    .action(async (options: PurgeCommandOptions) => {
      report(await executePurge(options, context()))
    })

  program
    .command('search')
    .description('Search the index')
    .argument('<query>', 'search query')
    .option('--top-k <n>', 'number of results')
    .addOption(formatOption())
    .action(async (query: string, options: SearchCommandOptions) => {
      report(await executeSearch(query, options, context()))
    })

  program
    .command('generate')
    .description('Generate articles for topics or an outline section')
    .argument('[topics...]', 'topics to write about')
    .option('--outline <file>', 'outline file')
    .option('--section <number>', 'outline section, e.g. 2.6')
    .option('--workers <n>', 'concurrent topics')
    .option('--dry-run', 'print the plan without generating')
    .addOption(formatOption())
    .action(async (topics: string[], options: GenerateCommandOptions) => {
      const controller = new AbortController()
      const onInterrupt = (): void => {
        io.writeError('Cancelling: waiting for in-flight topics...')
        controller.abort()
      }
      process.once('SIGINT', onInterrupt)
      try {
        report(await executeGenerate(topics, { ...options, signal: controller.signal }, context()))
      } finally {
        process.removeListener('SIGINT', onInterrupt)
      }
    })

  return program
}

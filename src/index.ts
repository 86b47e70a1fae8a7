#!/usr/bin/env node

import { Command } from 'commander'
import {
  projectAddCommand,
  projectListCommand,
  storeCommand,
  retrieveCommand,
  outcomeCommand,
  profileCommand,
  transfersCommand,
  ingestCommand,
  maintainCommand,
  serveCommand,
  purgeCommand,
  statsCommand,
  configCommand
} from './cli/commands.js'

const program = new Command()

program
  .name('recollect')
  .description('Context intelligence for coding assistants: store, rank and transfer what a developer has learned')
  .version('0.1.0')

const project = program
  .command('project')
  .description('Manage projects')

project
  .command('add <id>')
  .description('Register a project (idempotent)')
  .option('--name <name>', 'Display name')
  .option('--tech <list>', 'Comma-separated technologies')
  .action(async (id: string, options: { name?: string; tech?: string }) => {
    await projectAddCommand(id, options)
  })

project
  .command('list')
  .description('List registered projects')
  .action(async () => {
    await projectListCommand()
  })

program
  .command('store')
  .description('Store a context item')
  .requiredOption('--project <id>', 'Project id')
  .requiredOption('--dev <id>', 'Developer id')
  .requiredOption('--kind <kind>', 'conversation | decision | code_pattern | anti_pattern')
  .option('--tech <list>', 'Comma-separated technology tags')
  .option('--content <text>', 'Item content')
  .option('--file <path>', 'Read content from a file')
  .action(async (options: { project: string; dev: string; kind: string; tech?: string; content?: string; file?: string }) => {
    await storeCommand(options)
  })

program
  .command('retrieve <query>')
  .description('Rank stored context for a query and fit it to a budget')
  .requiredOption('--project <id>', 'Project id')
  .requiredOption('--dev <id>', 'Developer id')
  .option('-k <count>', 'Maximum candidates', '10')
  .option('--budget <units>', 'Budget size', '2000')
  .option('--unit <unit>', 'tokens | characters | items')
  .option('--tech <list>', 'Restrict to these technologies')
  .option('--cross-project', 'Include other projects at a discount')
  .option('--compress', 'Compress items that do not fit whole')
  .option('--json', 'Print JSON')
  .action(async (query: string, options: {
    project: string
    dev: string
    k: string
    budget: string
    unit?: string
    tech?: string
    crossProject?: boolean
    compress?: boolean
    json?: boolean
  }) => {
    await retrieveCommand(query, options)
  })

program
  .command('outcome <id> <result>')
  .description('Report success or failure for an item or pattern link')
  .action(async (id: string, result: string) => {
    await outcomeCommand(id, result)
  })

program
  .command('profile <developer>')
  .description('Show a developer profile')
  .option('--history <technology>', 'Show the weight history for one technology')
  .action(async (developer: string, options: { history?: string }) => {
    await profileCommand(developer, options)
  })

program
  .command('transfers <patternId> <technology>')
  .description('List cross-technology equivalents of a pattern')
  .action(async (patternId: string, technology: string) => {
    await transfersCommand(patternId, technology)
  })

program
  .command('ingest <path>')
  .description('Store observations from a project directory or JSONL file')
  .requiredOption('--project <id>', 'Project id')
  .requiredOption('--dev <id>', 'Developer id')
  .action(async (path: string, options: { project: string; dev: string }) => {
    await ingestCommand(path, options)
  })

program
  .command('maintain')
  .description('Backfill missing embeddings and recompute pattern links once')
  .action(async () => {
    await maintainCommand()
  })

program
  .command('serve')
  .description('Run scheduled maintenance in the foreground')
  .action(async () => {
    await serveCommand()
  })

program
  .command('purge')
  .description('Delete stale, unused, low-outcome items')
  .action(async () => {
    await purgeCommand()
  })

program
  .command('stats')
  .description('Show store statistics')
  .action(async () => {
    await statsCommand()
  })

program
  .command('config [action] [key] [value]')
  .description('Show configuration, or set a value with dot notation')
  .action(async (action?: string, key?: string, value?: string) => {
    await configCommand(action, key, value)
  })

program.parseAsync(process.argv).catch((err) => {
  console.error(err)
  process.exit(1)
})

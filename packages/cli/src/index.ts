#!/usr/bin/env node
import { Command } from 'commander'
import { initCommand } from './commands/init.js'
import { showCommand } from './commands/show.js'
import { lockCommand } from './commands/lock.js'
import { shellCommand } from './commands/shell.js'
import { envCommand } from './commands/env.js'
import { platformsCommand } from './commands/platforms.js'

const program = new Command()

program
  .name('shellpin')
  .description('Resolve pinned dev shell descriptors into per-platform shells')
  .version('0.1.0')

program
  .command('init')
  .description('Create a starter devshell.yaml')
  .option('--description <text>', 'Descriptor description')
  .option('--packages <source>', 'Package snapshot source (host:owner/repo/ref)')
  .option('--force', 'Overwrite existing devshell.yaml')
  .action(async (options) => {
    const result = await initCommand(options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('show')
  .description('Resolve the dev shell for every supported platform, or one')
  .option('--platform <platform>', 'Resolve only this platform')
  .option('--json', 'Output as JSON')
  .option('--offline', 'Use only cached snapshots')
  .action(async (options) => {
    const result = await showCommand(options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    } else if (result.value.summary.failed > 0) {
      process.exit(1)
    }
  })

program
  .command('lock')
  .description('Pin every input and write devshell-lock.yaml')
  .option('--update', 'Ignore the existing lockfile and re-pin moving refs')
  .option('--offline', 'Use only cached data')
  .action(async (options) => {
    const result = await lockCommand(options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('shell')
  .description('Enter an interactive dev shell')
  .option('--platform <platform>', 'Platform to resolve (default: host)')
  .option('--offline', 'Use only cached snapshots')
  .action(async (options) => {
    const result = await shellCommand(options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
    process.exit(result.value)
  })

program
  .command('env')
  .description('Print the dev shell environment as a sourceable script')
  .option('--platform <platform>', 'Platform to resolve (default: host)')
  .option('--offline', 'Use only cached snapshots')
  .action(async (options) => {
    const result = await envCommand(options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('platforms')
  .description('List the platforms the descriptor supports')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const result = await platformsCommand(options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

await program.parseAsync()

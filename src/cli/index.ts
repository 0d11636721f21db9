#!/usr/bin/env node
import { Command } from 'commander'
import { registerInitCommand } from './commands/init.js'
import { registerInspectCommand } from './commands/inspect.js'
import { registerUpgradeCommand } from './commands/upgrade.js'

const program = new Command()

program
  .name('localdb')
  .description('Versioned SQLite databases: inspect and upgrade')
  .version('0.1.0')

registerInitCommand(program)
registerInspectCommand(program)
registerUpgradeCommand(program)

export { program }

await program.parseAsync()

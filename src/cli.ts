#!/usr/bin/env node

import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { createCommand } from './commands/create.js'

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName('vendor-patch')
    .usage('$0 <vendor/package> [options]')
    .command(createCommand())
    .help()
    .alias('h', 'help')
    .version()
    .alias('v', 'version')
    .strict()
    .parse()
}

main().catch((error: Error) => {
  console.error('Error:', error.message)
  process.exit(1)
})

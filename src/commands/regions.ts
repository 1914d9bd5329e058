// File: src/commands/regions.ts
// 'list-regions' shows the regions a documentation run would visit

import { Command } from 'commander'
import { BaseCommandOptions } from '../types'
import { formatOutput } from '../utils/formatter'
import { createEC2Client } from '../utils/clients'
import { getEnabledRegions } from '../services'
import { DEFAULT_OUTPUT_FORMAT, DEFAULT_REGION } from '../config/constants'

export function registerRegionCommands(program: Command): void {
  program
    .command('list-regions')
    .description('List the regions enabled for the current account')
    .option('--profile <profile>', 'AWS profile to use (defaults to AWS environment variables if not specified)')
    .option('-o, --output <format>', 'Output format (json, table)', DEFAULT_OUTPUT_FORMAT)
    .action(async (options: BaseCommandOptions) => {
      await listRegions(options)
    })
}

async function listRegions(options: BaseCommandOptions): Promise<void> {
  const client = createEC2Client(DEFAULT_REGION, null, options.profile)

  try {
    const regions = await getEnabledRegions(client)
    formatOutput(
      regions.map((region) => ({ Region: region })),
      options.output,
    )
  } catch (error) {
    console.error('Error listing regions:', error)
    process.exit(1)
  } finally {
    client.destroy()
  }
}

// File: src/commands/accounts.ts
// This file contains the command listing the accounts the documentation run would visit

import { Command } from 'commander'
import { BaseCommandOptions } from '../types'
import { formatOutput } from '../utils/formatter'
import { logProgress } from '../utils/logger'
import { createOrganizationsClient } from '../utils/clients'
import { getOrganizationAccounts } from '../services'
import { DEFAULT_OUTPUT_FORMAT } from '../config/constants'

/**
 * Register account-related commands with the Commander program
 * @param program The Commander program instance to register commands with
 */
export function registerAccountCommands(program: Command): void {
  program
    .command('list-accounts')
    .description('List all accounts in the organization, including nested OUs')
    .option('--profile <profile>', 'AWS profile to use (defaults to AWS environment variables if not specified)')
    .option('-o, --output <format>', 'Output format (json, table)', DEFAULT_OUTPUT_FORMAT)
    .action(async (options: BaseCommandOptions) => {
      await listAccounts(options)
    })
}

/**
 * Implementation of the list-accounts command
 *
 * @param options Command options including profile and output format
 */
async function listAccounts(options: BaseCommandOptions): Promise<void> {
  const client = createOrganizationsClient(options.profile)

  try {
    logProgress('Walking the organization tree...')

    const accounts = await getOrganizationAccounts(client)

    logProgress(`Found ${accounts.length} accounts total`)

    formatOutput(accounts, options.output)
  } catch (error) {
    console.error('Error fetching accounts:', error)
    process.exit(1)
  } finally {
    client.destroy()
  }
}

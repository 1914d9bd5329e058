// File: src/commands/document.ts
// This file implements the 'document' command, which collects networking resources from
// every account and region of the organization and stores them as one JSON object in S3.
// It is the default command, so running the CLI without arguments runs it.

import { Command } from 'commander'
import { DocumentCommandOptions } from '../types'
import { formatOutput } from '../utils/formatter'
import { collectRegions } from '../utils'
import { generateDocumentation, summarizeDocumentation } from '../services'
import {
  DEFAULT_BUCKET_NAME,
  DEFAULT_OBJECT_KEY,
  DEFAULT_OUTPUT_FORMAT,
  DEFAULT_ROLE_NAME,
} from '../config/constants'

/**
 * Register the 'document' command with the CLI program
 *
 * @param program The Commander program instance to register the command with
 */
export function registerDocumentCommands(program: Command): void {
  program
    .command('document', { isDefault: true })
    .description('Document VPC networking resources of every account in the organization and store them in S3')
    .option('--profile <profile>', 'AWS profile to use (defaults to AWS environment variables if not specified)')
    .option('-r, --role-name <roleName>', 'Role name to assume in target accounts', DEFAULT_ROLE_NAME)
    .option('-b, --bucket <bucket>', 'S3 bucket to store the documentation in', DEFAULT_BUCKET_NAME)
    .option('-k, --key <key>', 'S3 object key for the documentation', DEFAULT_OBJECT_KEY)
    .option('--bucket-region <region>', 'Region of the S3 bucket (redirects are followed when omitted)')
    .option('-a, --account-id <accountId>', 'Specific account ID to document (optional)')
    .option(
      '--region <region>',
      'AWS region to check (can be specified multiple times, defaults to all enabled regions)',
      collectRegions,
    )
    .option('-o, --output <format>', 'Summary output format (json, table)', DEFAULT_OUTPUT_FORMAT)
    .action(async (options: DocumentCommandOptions) => {
      await documentNetwork(options)
    })
}

/**
 * Implements the document command
 *
 * 1. Walks the organization (or takes the single requested account)
 * 2. Collects networking resources per account and region
 * 3. Uploads the result to S3
 * 4. Prints the document (json) or a per-region resource count summary (table)
 */
async function documentNetwork(options: DocumentCommandOptions): Promise<void> {
  try {
    const { documentation } = await generateDocumentation({
      profile: options.profile,
      roleName: options.roleName,
      bucket: options.bucket,
      key: options.key,
      bucketRegion: options.bucketRegion,
      regions: options.region,
      accountId: options.accountId,
    })

    if (options.output === 'json') {
      formatOutput(documentation, 'json')
    } else {
      formatOutput(summarizeDocumentation(documentation), options.output)
    }
  } catch (error) {
    console.error('Error generating network documentation:', error)
    process.exit(1) // Exit with error code 1 to indicate failure
  }
}

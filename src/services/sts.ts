// File: src/services/sts.ts
// AWS Security Token Service (STS) operations
// This module provides functionality for assuming IAM roles across accounts.

import { STSClient, AssumeRoleCommand } from '@aws-sdk/client-sts'
import { RoleCredentials } from '../types'
import { DEFAULT_SESSION_DURATION } from '../config/constants'

/**
 * Assume role in target account
 *
 * This function uses the AWS STS AssumeRole API to obtain temporary security
 * credentials for accessing resources in another AWS account.
 *
 * @param stsClient - STS client carrying the caller's own identity
 * @param accountId - Target AWS account ID where role will be assumed
 * @param roleName - IAM role name to assume in the target account
 * @param durationSeconds - Lifetime of the temporary credentials
 * @returns Promise resolving to temporary credentials, or undefined if assumption fails
 */
export async function assumeRole(
  stsClient: STSClient,
  accountId: string,
  roleName: string,
  durationSeconds = DEFAULT_SESSION_DURATION,
): Promise<RoleCredentials | undefined> {
  try {
    // Construct the full role ARN (Amazon Resource Name)
    const roleArn = `arn:aws:iam::${accountId}:role/${roleName}`

    // Create a unique session name with timestamp to aid in auditing/debugging
    const sessionName = `network-documentation-${Date.now()}`

    const response = await stsClient.send(
      new AssumeRoleCommand({
        RoleArn: roleArn,
        RoleSessionName: sessionName,
        DurationSeconds: durationSeconds,
      }),
    )

    const credentials = response.Credentials

    // Validate that a full set of credentials was returned
    if (!credentials?.AccessKeyId || !credentials.SecretAccessKey || !credentials.SessionToken) {
      console.warn(`Incomplete credentials returned for role ${roleName} in account ${accountId}`)
      return undefined
    }

    return {
      accessKeyId: credentials.AccessKeyId,
      secretAccessKey: credentials.SecretAccessKey,
      sessionToken: credentials.SessionToken,
    }
  } catch (error) {
    // A warning rather than an error: member accounts without the role are expected
    console.warn(`Failed to assume role ${roleName} in account ${accountId}:`, error)
    return undefined
  }
}

// File: src/services/documentation.ts
/**
 * Network Documentation Module
 *
 * Ties the other services together: walks the organization, assumes a role in every
 * account, runs the networking collectors in every region and hands the combined result
 * to the S3 store.
 *
 * Accounts, regions and resource types are processed one after another. Failures below
 * the account level degrade to empty entries so one broken account or region never
 * stops the run; only the final upload is allowed to fail it.
 */

import { Organizations } from '@aws-sdk/client-organizations'
import { STSClient } from '@aws-sdk/client-sts'
import {
  AccountDocumentation,
  Documentation,
  DocumentationOptions,
  OrganizationAccount,
  RegionDocumentation,
  RegionSummary,
  StoredDocumentation,
} from '../types'
import {
  RegionSession,
  withRegionSession,
  createOrganizationsClient,
  createSTSClient,
  createEC2Client,
  createS3Client,
} from '../utils/clients'
import { logProgress } from '../utils/logger'
import { DEFAULT_REGION } from '../config/constants'
import { assumeRole } from './sts'
import { getOrganizationAccounts } from './organization'
import { storeDocumentation } from './s3'
import { getLoadBalancers } from './elb'
import {
  getEnabledRegions,
  getVpcs,
  getSubnets,
  getSecurityGroups,
  getNetworkAcls,
  getRouteTables,
  getVpcEndpoints,
  getVpcPeeringConnections,
} from './ec2'

/**
 * Run all eight collectors against one region session
 *
 * Collectors run sequentially; the object literal fixes the key order of the output.
 */
export async function collectRegionDocumentation(session: RegionSession): Promise<RegionDocumentation> {
  return {
    vpcs: await getVpcs(session),
    subnets: await getSubnets(session),
    security_groups: await getSecurityGroups(session),
    network_acls: await getNetworkAcls(session),
    route_tables: await getRouteTables(session),
    vpc_endpoints: await getVpcEndpoints(session),
    vpc_peering_connections: await getVpcPeeringConnections(session),
    load_balancers: await getLoadBalancers(session),
  }
}

/**
 * Document every region of one account
 *
 * @param stsClient - STS client used to assume the role
 * @param accountId - Account to document
 * @param regions - Regions to visit, in order
 * @param roleName - Role to assume in the account
 * @returns Region-keyed documentation; empty if the role could not be assumed,
 *          partial if processing failed part-way
 */
export async function getAccountDocumentation(
  stsClient: STSClient,
  accountId: string,
  regions: string[],
  roleName: string,
): Promise<AccountDocumentation> {
  const accountInfo: AccountDocumentation = {}

  try {
    const credentials = await assumeRole(stsClient, accountId, roleName)

    if (!credentials) {
      console.warn(`Skipping account ${accountId}: no credentials`)
      return accountInfo
    }

    for (const region of regions) {
      logProgress(`Documenting ${region} in account ${accountId}...`)
      accountInfo[region] = await withRegionSession(region, credentials, collectRegionDocumentation)
    }
  } catch (error) {
    console.error(`Error extracting resources for account ${accountId}:`, error)
  }

  return accountInfo
}

/**
 * Accounts to document: one explicitly requested account, or the whole organization
 */
async function resolveAccounts(client: Organizations, accountId?: string): Promise<OrganizationAccount[]> {
  if (accountId) {
    return [{ Id: accountId, ParentId: 'Unknown' }]
  }

  return getOrganizationAccounts(client)
}

/**
 * Build the documentation for every account and store it
 *
 * @param options - Role, destination and optional account/region restrictions
 * @returns The documentation that was stored and where it went
 */
export async function generateDocumentation(
  options: DocumentationOptions,
): Promise<{ documentation: Documentation; stored: StoredDocumentation }> {
  const organizationsClient = createOrganizationsClient(options.profile)
  const stsClient = createSTSClient(options.profile)
  const ec2Client = createEC2Client(DEFAULT_REGION, null, options.profile)
  const s3Client = createS3Client(options.profile, options.bucketRegion)

  try {
    const accounts = await resolveAccounts(organizationsClient, options.accountId)
    logProgress(`Found ${accounts.length} accounts to document`)

    const regions =
      options.regions && options.regions.length > 0 ? options.regions : await getEnabledRegions(ec2Client)
    logProgress(`Checking ${regions.length} regions per account`)

    const documentation: Documentation = {}
    for (const account of accounts) {
      logProgress(`Starting account: ${account.Id} (${account.Name || 'Unknown'})`)
      documentation[account.Id] = await getAccountDocumentation(stsClient, account.Id, regions, options.roleName)
    }

    const stored = await storeDocumentation(s3Client, documentation, { bucket: options.bucket, key: options.key })

    return { documentation, stored }
  } finally {
    organizationsClient.destroy()
    stsClient.destroy()
    ec2Client.destroy()
    s3Client.destroy()
  }
}

/**
 * Flatten documentation into one row of resource counts per account and region
 *
 * Accounts with no regions (role not assumable) produce no rows.
 */
export function summarizeDocumentation(documentation: Documentation): RegionSummary[] {
  const rows: RegionSummary[] = []

  for (const [accountId, regions] of Object.entries(documentation)) {
    for (const [region, resources] of Object.entries(regions)) {
      rows.push({
        AccountId: accountId,
        Region: region,
        VPCs: resources.vpcs.length,
        Subnets: resources.subnets.length,
        SecurityGroups: resources.security_groups.length,
        NetworkACLs: resources.network_acls.length,
        RouteTables: resources.route_tables.length,
        VPCEndpoints: resources.vpc_endpoints.length,
        PeeringConnections: resources.vpc_peering_connections.length,
        LoadBalancers: resources.load_balancers.length,
      })
    }
  }

  return rows
}

// File: src/services/organization.ts
// Organizations service functions - This module walks the AWS Organizations tree
// to find every member account and the root or OU it belongs to

import { Organizations, OrganizationalUnit } from '@aws-sdk/client-organizations'
import { OrganizationAccount } from '../types'

/**
 * Get organization root
 *
 * This function retrieves the root ID, which is the top-level container for all
 * accounts and OUs in the organization.
 *
 * @param client - The AWS Organizations client instance
 * @returns Promise resolving to the root ID string
 */
export async function getOrganizationRoot(client: Organizations): Promise<string> {
  const rootsResponse = await client.listRoots({})

  // Validate that roots were returned
  if (!rootsResponse.Roots || rootsResponse.Roots.length === 0) {
    throw new Error('No organization roots found')
  }

  // Get the ID of the first (and only) root
  const rootId = rootsResponse.Roots[0].Id
  if (!rootId) {
    throw new Error('Root ID is undefined')
  }

  return rootId
}

/**
 * Get the organizational units directly under a parent (one level, all pages)
 *
 * @param client - The AWS Organizations client instance
 * @param parentId - Root or OU ID
 */
export async function getOrganizationalUnits(client: Organizations, parentId: string): Promise<OrganizationalUnit[]> {
  let units: OrganizationalUnit[] = []
  let nextToken: string | undefined

  do {
    const response = await client.listOrganizationalUnitsForParent({ ParentId: parentId, NextToken: nextToken })

    if (response.OrganizationalUnits) {
      units = units.concat(response.OrganizationalUnits)
    }

    nextToken = response.NextToken
  } while (nextToken)

  return units
}

/**
 * Get the accounts directly under a parent (all pages)
 *
 * @param client - The AWS Organizations client instance
 * @param parentId - Root or OU ID
 */
export async function getAccountsForParent(client: Organizations, parentId: string): Promise<OrganizationAccount[]> {
  const accounts: OrganizationAccount[] = []
  let nextToken: string | undefined

  do {
    const response = await client.listAccountsForParent({ ParentId: parentId, NextToken: nextToken })

    for (const account of response.Accounts ?? []) {
      if (!account.Id) {
        continue
      }

      accounts.push({
        Id: account.Id,
        Name: account.Name,
        Email: account.Email,
        Status: account.Status,
        ParentId: parentId,
      })
    }

    nextToken = response.NextToken
  } while (nextToken)

  return accounts
}

/**
 * Depth-first walk below one parent: its own accounts, then each child OU in turn
 *
 * A failing listing is logged and only drops what that listing would have returned.
 */
async function walkParent(client: Organizations, parentId: string, accounts: OrganizationAccount[]): Promise<void> {
  try {
    accounts.push(...(await getAccountsForParent(client, parentId)))
  } catch (error) {
    console.error(`Error fetching accounts for parent ${parentId}:`, error)
  }

  let children: OrganizationalUnit[] = []
  try {
    children = await getOrganizationalUnits(client, parentId)
  } catch (error) {
    console.error(`Error fetching OUs for parent ${parentId}:`, error)
  }

  for (const ou of children) {
    if (ou.Id) {
      await walkParent(client, ou.Id, accounts)
    }
  }
}

/**
 * Get every account in the organization
 *
 * Starts at the root and includes accounts placed directly under it as well as those
 * in nested OUs. If the root itself cannot be read the result is empty.
 *
 * @param client - The AWS Organizations client instance
 * @returns Promise resolving to accounts tagged with their parent ID
 */
export async function getOrganizationAccounts(client: Organizations): Promise<OrganizationAccount[]> {
  let rootId: string
  try {
    rootId = await getOrganizationRoot(client)
  } catch (error) {
    console.error('Error fetching organization root:', error)
    return []
  }

  const accounts: OrganizationAccount[] = []
  await walkParent(client, rootId, accounts)
  return accounts
}

// File: src/utils/collector.ts
// Shared "list a resource type, tolerate failure" helper used by every collector

import { ResourcePage } from '../types'

/**
 * Collect every item of a paginated list call
 *
 * fetchPage is called with the token returned by the previous page (undefined for the
 * first page) until no token comes back. Any failure is logged and turns the whole
 * result into an empty list; items from pages already read are dropped.
 *
 * @param label - Resource type name used in the log line (e.g. "VPCs")
 * @param region - Region the call is made in, for the log line
 * @param fetchPage - Performs one API call
 */
export async function collectResources<T>(
  label: string,
  region: string,
  fetchPage: (token?: string) => Promise<ResourcePage<T>>,
): Promise<T[]> {
  let items: T[] = []
  let nextToken: string | undefined

  try {
    do {
      const page = await fetchPage(nextToken)

      if (page.items) {
        items = items.concat(page.items)
      }

      nextToken = page.nextToken
    } while (nextToken)

    return items
  } catch (error) {
    console.error(`Error retrieving ${label} for region ${region}:`, error)
    return []
  }
}

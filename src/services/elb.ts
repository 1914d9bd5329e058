// File: src/services/elb.ts
// Elastic Load Balancing (v2) collector: Application, Network and Gateway Load Balancers

import { DescribeLoadBalancersCommand, LoadBalancer } from '@aws-sdk/client-elastic-load-balancing-v2'
import { RegionSession } from '../utils/clients'
import { collectResources } from '../utils/collector'

/**
 * Get all v2 load balancers in the session's region
 *
 * ELBv2 paginates with Marker/NextMarker rather than NextToken.
 */
export async function getLoadBalancers(session: RegionSession): Promise<LoadBalancer[]> {
  return collectResources('load balancers', session.region, async (marker) => {
    const response = await session.elbv2().send(new DescribeLoadBalancersCommand({ Marker: marker }))
    return { items: response.LoadBalancers, nextToken: response.NextMarker }
  })
}

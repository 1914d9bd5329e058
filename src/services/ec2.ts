// File: src/services/ec2.ts
/**
 * EC2 Networking Service Module
 *
 * Region discovery and the collectors for the virtual-networking resources served by
 * the EC2 API: VPCs, subnets, security groups, network ACLs, route tables, VPC endpoints
 * and VPC peering connections.
 *
 * Each collector lists every page of its resource type in the session's region and
 * returns the records exactly as the API describes them. A failing call is logged and
 * yields an empty list (see collectResources).
 */

import {
  EC2Client,
  DescribeRegionsCommand,
  DescribeVpcsCommand,
  DescribeSubnetsCommand,
  DescribeSecurityGroupsCommand,
  DescribeNetworkAclsCommand,
  DescribeRouteTablesCommand,
  DescribeVpcEndpointsCommand,
  DescribeVpcPeeringConnectionsCommand,
  NetworkAcl,
  RouteTable,
  SecurityGroup,
  Subnet,
  Vpc,
  VpcEndpoint,
  VpcPeeringConnection,
} from '@aws-sdk/client-ec2'
import { RegionSession } from '../utils/clients'
import { collectResources } from '../utils/collector'

/**
 * Get the regions enabled for the calling account
 *
 * @param ec2Client - EC2 client using the caller's own credentials
 * @returns Promise resolving to region codes, or an empty array if the call fails
 */
export async function getEnabledRegions(ec2Client: EC2Client): Promise<string[]> {
  try {
    const response = await ec2Client.send(new DescribeRegionsCommand({}))

    const regions: string[] = []
    for (const region of response.Regions ?? []) {
      if (region.RegionName) {
        regions.push(region.RegionName)
      }
    }

    return regions
  } catch (error) {
    console.error('Error retrieving enabled regions:', error)
    return []
  }
}

export async function getVpcs(session: RegionSession): Promise<Vpc[]> {
  return collectResources('VPCs', session.region, async (token) => {
    const response = await session.ec2().send(new DescribeVpcsCommand({ NextToken: token }))
    return { items: response.Vpcs, nextToken: response.NextToken }
  })
}

export async function getSubnets(session: RegionSession): Promise<Subnet[]> {
  return collectResources('subnets', session.region, async (token) => {
    const response = await session.ec2().send(new DescribeSubnetsCommand({ NextToken: token }))
    return { items: response.Subnets, nextToken: response.NextToken }
  })
}

export async function getSecurityGroups(session: RegionSession): Promise<SecurityGroup[]> {
  return collectResources('security groups', session.region, async (token) => {
    const response = await session.ec2().send(new DescribeSecurityGroupsCommand({ NextToken: token }))
    return { items: response.SecurityGroups, nextToken: response.NextToken }
  })
}

export async function getNetworkAcls(session: RegionSession): Promise<NetworkAcl[]> {
  return collectResources('network ACLs', session.region, async (token) => {
    const response = await session.ec2().send(new DescribeNetworkAclsCommand({ NextToken: token }))
    return { items: response.NetworkAcls, nextToken: response.NextToken }
  })
}

export async function getRouteTables(session: RegionSession): Promise<RouteTable[]> {
  return collectResources('route tables', session.region, async (token) => {
    const response = await session.ec2().send(new DescribeRouteTablesCommand({ NextToken: token }))
    return { items: response.RouteTables, nextToken: response.NextToken }
  })
}

export async function getVpcEndpoints(session: RegionSession): Promise<VpcEndpoint[]> {
  return collectResources('VPC endpoints', session.region, async (token) => {
    const response = await session.ec2().send(new DescribeVpcEndpointsCommand({ NextToken: token }))
    return { items: response.VpcEndpoints, nextToken: response.NextToken }
  })
}

export async function getVpcPeeringConnections(session: RegionSession): Promise<VpcPeeringConnection[]> {
  return collectResources('VPC peering connections', session.region, async (token) => {
    const response = await session.ec2().send(new DescribeVpcPeeringConnectionsCommand({ NextToken: token }))
    return { items: response.VpcPeeringConnections, nextToken: response.NextToken }
  })
}
